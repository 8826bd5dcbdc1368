export interface Transcript {
  meetingId: string;
  projectId: string;
  createdAt: string;
  transcript: string;
  language?: string;
}

export interface CreateTranscriptInput {
  meetingId: string;
  projectId: string;
  text: string;
  language?: string;
}

export function createTranscript(input: CreateTranscriptInput): Transcript {
  return {
    meetingId: input.meetingId,
    projectId: input.projectId,
    createdAt: new Date().toISOString(),
    transcript: input.text,
    language: input.language,
  };
}
