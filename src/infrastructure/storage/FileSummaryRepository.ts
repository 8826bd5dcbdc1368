import type { MeetingSummary } from '../../domain/entities/MeetingSummary';
import type { SummaryRepository } from '../../domain/repositories/SummaryRepository';
import { meetingSummaryFromJson, meetingSummarySchema, meetingSummaryToJson } from '../schemas';
import { readJsonFile, writeJsonAtomic } from './atomicFile';
import type { StoragePaths } from './StoragePaths';

export class FileSummaryRepository implements SummaryRepository {
  constructor(private paths: StoragePaths) {}

  async findByMeetingId(meetingId: string): Promise<MeetingSummary | null> {
    const json = await readJsonFile(this.paths.summary(meetingId), meetingSummarySchema);
    return json ? meetingSummaryFromJson(json) : null;
  }

  async save(summary: MeetingSummary): Promise<void> {
    await writeJsonAtomic(this.paths.summary(summary.meetingId), meetingSummaryToJson(summary));
  }
}
