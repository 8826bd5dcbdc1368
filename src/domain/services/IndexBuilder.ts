import type { EmbeddingProvider } from './AIProvider';
import { WordWindowChunker } from './TextChunker';
import { FlatL2Index } from './VectorIndex';
import type { TranscriptRepository } from '../repositories/TranscriptRepository';
import type { VectorIndexRepository } from '../repositories/VectorIndexRepository';
import { createIndexMetadata, type IndexMetadata } from '../entities/IndexMetadata';
import { CorruptStateError, NotFoundError, ProviderError, ValidationError } from '../errors';
import { KeyedMutex } from '../../utils/KeyedMutex';
import { log } from '../../utils/logger';

export interface IndexBuilderConfig {
  batchSize: number;
  concurrency: number;
}

export interface BuildOptions {
  signal?: AbortSignal;
  onProgress?: (embedded: number, total: number) => void;
}

export interface BuildResult {
  meetingId: string;
  numChunks: number;
  vectorIndexPath: string;
  metaPath: string;
  status: 'completed';
}

export type EmbeddingStatus =
  | { meetingId: string; status: 'not_embedded' }
  | {
      meetingId: string;
      status: 'embedded';
      numChunks: number;
      embeddingModel: string;
      createdAt: string;
    };

/**
 * Turns a stored transcript into a persisted vector index plus metadata.
 *
 * Builds for the same meeting run one at a time. Chunks are embedded in
 * batches, several batches in flight, and every vector is stored at its chunk
 * id regardless of which batch finishes first. Nothing is written until every
 * chunk has an embedding.
 */
export class IndexBuilder {
  private builds = new KeyedMutex();

  constructor(
    private transcripts: TranscriptRepository,
    private indexRepository: VectorIndexRepository,
    private embeddings: EmbeddingProvider,
    private chunker: WordWindowChunker,
    private config: IndexBuilderConfig
  ) {}

  async build(meetingId: string, options: BuildOptions = {}): Promise<BuildResult> {
    if (this.builds.isLocked(meetingId)) {
      log('info', 'Index build already running, queued', { meetingId });
    }
    return this.builds.runExclusive(meetingId, () => this.buildExclusive(meetingId, options));
  }

  /** Unreadable metadata counts as not embedded; a rebuild replaces it. */
  async status(meetingId: string): Promise<EmbeddingStatus> {
    let metadata: IndexMetadata | null;
    try {
      metadata = await this.indexRepository.findMetadata(meetingId);
    } catch (error) {
      if (!(error instanceof CorruptStateError)) {
        throw error;
      }
      log('warn', 'Index metadata is unreadable', { meetingId, error: error.message });
      metadata = null;
    }

    if (!metadata) {
      return { meetingId, status: 'not_embedded' };
    }
    return {
      meetingId,
      status: 'embedded',
      numChunks: metadata.numChunks,
      embeddingModel: metadata.embeddingModel,
      createdAt: metadata.createdAt,
    };
  }

  private async buildExclusive(meetingId: string, options: BuildOptions): Promise<BuildResult> {
    const transcript = await this.transcripts.findByMeetingId(meetingId);
    if (!transcript) {
      throw new NotFoundError('transcript', `Transcript not found for meeting_id: ${meetingId}`);
    }

    const texts = this.chunker.split(transcript.transcript);
    if (texts.length === 0) {
      throw new ValidationError(`No transcript text found for meeting_id: ${meetingId}`);
    }

    log('info', 'Starting index build', {
      meetingId,
      chunks: texts.length,
      chunkSizeWords: this.chunker.chunkSizeWords,
      overlapWords: this.chunker.overlapWords,
    });

    const startTime = performance.now();
    const vectors = await this.embedAll(texts, options);
    const dimension = vectors[0].length;

    vectors.forEach((vector, chunkId) => {
      if (vector.length !== dimension || dimension === 0) {
        throw new ProviderError(
          `Embedding for chunk ${chunkId} has ${vector.length} dimensions, expected ${dimension}`
        );
      }
    });

    const index = FlatL2Index.fromVectors(vectors);
    const metadata = createIndexMetadata({
      meetingId,
      projectId: transcript.projectId,
      chunkSizeWords: this.chunker.chunkSizeWords,
      overlapWords: this.chunker.overlapWords,
      embeddingModel: this.embeddings.model,
      dimension,
      vectors: texts.map((text, chunkId) => ({ chunkId, text, embedding: vectors[chunkId] })),
    });

    const location = await this.indexRepository.save(meetingId, index, metadata);

    log('info', 'Index build completed', {
      meetingId,
      chunks: texts.length,
      dimension,
      elapsedMs: Math.round(performance.now() - startTime),
    });

    return {
      meetingId,
      numChunks: texts.length,
      vectorIndexPath: location.vectorIndexPath,
      metaPath: location.metaPath,
      status: 'completed',
    };
  }

  private async embedAll(texts: string[], options: BuildOptions): Promise<number[][]> {
    const { batchSize, concurrency } = this.config;
    const vectors: number[][] = new Array(texts.length);
    const batchStarts: number[] = [];
    for (let i = 0; i < texts.length; i += batchSize) {
      batchStarts.push(i);
    }

    let nextBatch = 0;
    let embedded = 0;
    let failed = false;

    const worker = async (): Promise<void> => {
      while (!failed && nextBatch < batchStarts.length) {
        options.signal?.throwIfAborted();

        const start = batchStarts[nextBatch++];
        const batch = texts.slice(start, start + batchSize);
        let batchVectors: number[][];
        try {
          batchVectors = await this.embeddings.embedBatch(batch);
        } catch (error) {
          failed = true;
          throw error;
        }

        if (batchVectors.length !== batch.length) {
          failed = true;
          throw new ProviderError(
            `Embedding provider returned ${batchVectors.length} vectors for ${batch.length} chunks`
          );
        }
        batchVectors.forEach((vector, offset) => {
          vectors[start + offset] = vector;
        });

        embedded += batch.length;
        options.onProgress?.(embedded, texts.length);
        log('debug', 'Embeddings progress', { embedded, total: texts.length });
      }
    };

    const workers = Array.from({ length: Math.min(concurrency, batchStarts.length) }, () => worker());
    await Promise.all(workers);

    return vectors;
  }
}
