import type { QueryRecord } from '../entities/QueryRecord';

export interface QueryLogRepository {
  append(meetingId: string, record: QueryRecord): Promise<void>;
  /** Records in insertion order; empty when nothing was asked yet. */
  list(meetingId: string): Promise<QueryRecord[]>;
}
