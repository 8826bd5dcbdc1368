export interface MeetingSummary {
  meetingId: string;
  projectId: string;
  createdAt: string;
  summary: string;
}

export function createMeetingSummary(meetingId: string, projectId: string, summary: string): MeetingSummary {
  return {
    meetingId,
    projectId,
    createdAt: new Date().toISOString(),
    summary,
  };
}
