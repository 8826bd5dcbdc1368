import type { IndexMetadata } from '../../domain/entities/IndexMetadata';
import type {
  IndexLocation,
  StoredIndex,
  VectorIndexRepository,
} from '../../domain/repositories/VectorIndexRepository';
import { FlatL2Index } from '../../domain/services/VectorIndex';
import { CorruptStateError, NotFoundError } from '../../domain/errors';
import { indexMetadataFromJson, indexMetadataSchema, indexMetadataToJson } from '../schemas';
import { fileExists, readFileIfExists, readJsonFile, writeFilesAtomic } from './atomicFile';
import type { StoragePaths } from './StoragePaths';
import { log } from '../../utils/logger';

export class FileVectorIndexRepository implements VectorIndexRepository {
  constructor(private paths: StoragePaths) {}

  locate(meetingId: string): IndexLocation {
    return {
      vectorIndexPath: this.paths.vectorIndex(meetingId),
      metaPath: this.paths.indexMetadata(meetingId),
    };
  }

  async save(meetingId: string, index: FlatL2Index, metadata: IndexMetadata): Promise<IndexLocation> {
    const location = this.locate(meetingId);

    // Metadata is renamed last; load() rejects a new index next to old metadata
    await writeFilesAtomic([
      { path: location.vectorIndexPath, data: index.serialize() },
      { path: location.metaPath, data: JSON.stringify(indexMetadataToJson(metadata), null, 2) },
    ]);

    log('debug', 'Vector index persisted', {
      meetingId,
      size: index.size,
      dimension: index.dimension,
    });
    return location;
  }

  async load(meetingId: string): Promise<StoredIndex> {
    const location = this.locate(meetingId);

    const indexBytes = await readFileIfExists(location.vectorIndexPath);
    const metadata = await this.readMetadata(meetingId);

    if (indexBytes === null || metadata === null) {
      throw new NotFoundError('index', `Vector index not found for meeting_id: ${meetingId}`);
    }

    const index = FlatL2Index.deserialize(indexBytes);
    assertConsistent(meetingId, index, metadata);

    return { index, metadata };
  }

  async findMetadata(meetingId: string): Promise<IndexMetadata | null> {
    if (!(await fileExists(this.paths.vectorIndex(meetingId)))) {
      return null;
    }
    return this.readMetadata(meetingId);
  }

  private async readMetadata(meetingId: string): Promise<IndexMetadata | null> {
    const json = await readJsonFile(this.paths.indexMetadata(meetingId), indexMetadataSchema);
    return json ? indexMetadataFromJson(json) : null;
  }
}

// A reader racing a rebuild, or a crash between the two renames, can leave a new
// index next to old metadata; fail instead of pairing texts with foreign vectors
function assertConsistent(meetingId: string, index: FlatL2Index, metadata: IndexMetadata): void {
  if (metadata.meetingId !== meetingId) {
    throw new CorruptStateError(
      `Metadata for ${meetingId} belongs to meeting ${metadata.meetingId}`
    );
  }
  if (metadata.numChunks !== index.size || metadata.vectors.length !== index.size) {
    throw new CorruptStateError(
      `Index for ${meetingId} holds ${index.size} vectors but metadata lists ` +
        `${metadata.numChunks} chunks (${metadata.vectors.length} records)`
    );
  }
  if (index.size > 0 && metadata.dimension !== index.dimension) {
    throw new CorruptStateError(
      `Index for ${meetingId} has dimension ${index.dimension}, metadata says ${metadata.dimension}`
    );
  }

  metadata.vectors.forEach((chunk, position) => {
    if (chunk.chunkId !== position) {
      throw new CorruptStateError(
        `Metadata for ${meetingId} lists chunk ${chunk.chunkId} at position ${position}`
      );
    }
    // Stored vectors are float32; compare the metadata copy after the same rounding
    const stored = index.vectorAt(position);
    const matches =
      chunk.embedding.length === stored.length &&
      chunk.embedding.every((value, d) => Math.fround(value) === stored[d]);
    if (!matches) {
      throw new CorruptStateError(
        `Index vector at position ${position} does not match chunk ${chunk.chunkId} in metadata for ${meetingId}`
      );
    }
  });
}
