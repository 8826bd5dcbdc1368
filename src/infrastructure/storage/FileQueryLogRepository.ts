import type { QueryRecord } from '../../domain/entities/QueryRecord';
import type { QueryLogRepository } from '../../domain/repositories/QueryLogRepository';
import { queryLogSchema, queryRecordFromJson, queryRecordToJson } from '../schemas';
import { readJsonFile, writeJsonAtomic } from './atomicFile';
import type { StoragePaths } from './StoragePaths';
import { KeyedMutex } from '../../utils/KeyedMutex';

export class FileQueryLogRepository implements QueryLogRepository {
  private writers = new KeyedMutex();

  constructor(private paths: StoragePaths) {}

  async append(meetingId: string, record: QueryRecord): Promise<void> {
    const path = this.paths.queryLog(meetingId);

    await this.writers.runExclusive(meetingId, async () => {
      const existing = (await readJsonFile(path, queryLogSchema)) ?? [];
      existing.push(queryRecordToJson(record));
      await writeJsonAtomic(path, existing);
    });
  }

  async list(meetingId: string): Promise<QueryRecord[]> {
    const records = await readJsonFile(this.paths.queryLog(meetingId), queryLogSchema);
    return (records ?? []).map(queryRecordFromJson);
  }
}
