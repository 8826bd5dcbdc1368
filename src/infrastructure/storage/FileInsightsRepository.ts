import type { MeetingInsights } from '../../domain/entities/MeetingInsights';
import type { InsightsRepository } from '../../domain/repositories/InsightsRepository';
import { meetingInsightsFromJson, meetingInsightsSchema, meetingInsightsToJson } from '../schemas';
import { readJsonFile, writeJsonAtomic } from './atomicFile';
import type { StoragePaths } from './StoragePaths';

export class FileInsightsRepository implements InsightsRepository {
  constructor(private paths: StoragePaths) {}

  async findByMeetingId(meetingId: string): Promise<MeetingInsights | null> {
    const json = await readJsonFile(this.paths.insights(meetingId), meetingInsightsSchema);
    return json ? meetingInsightsFromJson(json) : null;
  }

  async save(insights: MeetingInsights): Promise<void> {
    await writeJsonAtomic(this.paths.insights(insights.meetingId), meetingInsightsToJson(insights));
  }
}
