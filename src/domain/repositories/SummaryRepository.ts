import type { MeetingSummary } from '../entities/MeetingSummary';

export interface SummaryRepository {
  findByMeetingId(meetingId: string): Promise<MeetingSummary | null>;
  save(summary: MeetingSummary): Promise<void>;
}
