export interface ImportantMoment {
  startTime: string; // MM:SS
  endTime: string;
  text: string;
  description: string;
}

export interface MeetingInsights {
  meetingId: string;
  projectId: string;
  createdAt: string;
  insights: string;
  importantMoments: ImportantMoment[];
}

export function createMeetingInsights(
  meetingId: string,
  projectId: string,
  insights: string,
  importantMoments: ImportantMoment[]
): MeetingInsights {
  return {
    meetingId,
    projectId,
    createdAt: new Date().toISOString(),
    insights,
    importantMoments,
  };
}
