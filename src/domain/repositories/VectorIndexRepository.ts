import type { IndexMetadata } from '../entities/IndexMetadata';
import type { FlatL2Index } from '../services/VectorIndex';

export interface StoredIndex {
  index: FlatL2Index;
  metadata: IndexMetadata;
}

export interface IndexLocation {
  vectorIndexPath: string;
  metaPath: string;
}

export interface VectorIndexRepository {
  /** Replaces both artifacts for the meeting; readers see either the old pair or the new one. */
  save(meetingId: string, index: FlatL2Index, metadata: IndexMetadata): Promise<IndexLocation>;
  /** Throws NotFoundError unless both the index and its metadata exist. */
  load(meetingId: string): Promise<StoredIndex>;
  /** Metadata only, or null when the meeting has not been indexed. */
  findMetadata(meetingId: string): Promise<IndexMetadata | null>;
  locate(meetingId: string): IndexLocation;
}
