export const PREVIEW_LENGTH = 100;

export interface SourceReference {
  chunkId: number;
  similarityScore: number;
  textPreview: string;
}

export interface QueryRecord {
  meetingId: string;
  query: string;
  answer: string;
  sources: SourceReference[];
  timestamp: string;
}

export function makeTextPreview(text: string, length: number = PREVIEW_LENGTH): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

export function createQueryRecord(
  meetingId: string,
  query: string,
  answer: string,
  sources: SourceReference[]
): QueryRecord {
  return {
    meetingId,
    query,
    answer,
    sources,
    timestamp: new Date().toISOString(),
  };
}
