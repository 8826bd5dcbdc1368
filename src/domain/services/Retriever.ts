import type { EmbeddingProvider } from './AIProvider';
import type { VectorIndexRepository, StoredIndex } from '../repositories/VectorIndexRepository';
import type { TranscriptRepository } from '../repositories/TranscriptRepository';
import { similarityFromDistance, type SearchResult } from '../entities/SearchResult';
import { CorruptStateError, NotFoundError, ValidationError } from '../errors';
import { log } from '../../utils/logger';

export const DEFAULT_TOP_K = 5;
export const MAX_TOP_K = 100;

export class Retriever {
  constructor(
    private indexRepository: VectorIndexRepository,
    private transcriptRepository: TranscriptRepository,
    private embeddings: EmbeddingProvider
  ) {}

  /**
   * Ranks the meeting's transcript chunks against `queryText`, most similar first.
   * Ties on similarity keep the lower chunk id first.
   */
  async retrieve(meetingId: string, queryText: string, topK: number = DEFAULT_TOP_K): Promise<SearchResult[]> {
    if (!queryText.trim()) {
      throw new ValidationError('Query text must not be empty');
    }
    if (!Number.isInteger(topK) || topK < 1 || topK > MAX_TOP_K) {
      throw new ValidationError(`top_k must be an integer between 1 and ${MAX_TOP_K}, got ${topK}`);
    }

    const { index, metadata } = await this.loadIndex(meetingId);

    if (index.size === 0) {
      log('info', 'Search skipped, index is empty', { meetingId });
      return [];
    }

    const startTime = performance.now();
    const queryVector = await this.embeddings.embed(queryText);
    const hits = index.search(queryVector, topK);

    const results = hits.map((hit) => {
      const chunk = metadata.vectors[hit.position];
      if (!chunk || chunk.chunkId !== hit.position) {
        throw new CorruptStateError(
          `Index position ${hit.position} has no matching chunk in metadata for ${meetingId}`
        );
      }
      return {
        chunkId: chunk.chunkId,
        text: chunk.text,
        similarityScore: similarityFromDistance(hit.distance),
        distance: hit.distance,
      };
    });

    results.sort((a, b) => b.similarityScore - a.similarityScore || a.chunkId - b.chunkId);

    log('info', 'Search completed', {
      meetingId,
      topK,
      results: results.length,
      bestScore: results[0]?.similarityScore,
      elapsedMs: Math.round(performance.now() - startTime),
    });

    return results.map((result, i) => ({ rank: i + 1, ...result }));
  }

  private async loadIndex(meetingId: string): Promise<StoredIndex> {
    try {
      return await this.indexRepository.load(meetingId);
    } catch (error) {
      if (error instanceof NotFoundError && !(await this.transcriptRepository.exists(meetingId))) {
        throw new NotFoundError('meeting', `No meeting found with meeting_id: ${meetingId}`);
      }
      if (error instanceof NotFoundError) {
        throw new NotFoundError(
          'index',
          `Meeting ${meetingId} exists but has not been indexed yet`
        );
      }
      throw error;
    }
  }
}
