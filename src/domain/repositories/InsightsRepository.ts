import type { MeetingInsights } from '../entities/MeetingInsights';

export interface InsightsRepository {
  findByMeetingId(meetingId: string): Promise<MeetingInsights | null>;
  save(insights: MeetingInsights): Promise<void>;
}
