import type { Transcript } from '../entities/Transcript';

export interface TranscriptRepository {
  findByMeetingId(meetingId: string): Promise<Transcript | null>;
  exists(meetingId: string): Promise<boolean>;
  save(transcript: Transcript): Promise<void>;
}
