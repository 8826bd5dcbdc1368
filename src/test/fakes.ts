import { setTimeout as sleep } from 'node:timers/promises';
import type {
  ChatProvider,
  CompletionRequest,
  CompletionResponse,
  EmbeddingProvider,
  TranscriptSegment,
  TranscriptionProvider,
  TranscriptionRequest,
} from '../domain/services/AIProvider';
import type { TranscriptRepository } from '../domain/repositories/TranscriptRepository';
import type { QueryLogRepository } from '../domain/repositories/QueryLogRepository';
import type { AudioRepository, StoredAudio } from '../domain/repositories/AudioRepository';
import type { SummaryRepository } from '../domain/repositories/SummaryRepository';
import type { MeetingSummary } from '../domain/entities/MeetingSummary';
import type { MeetingInsights } from '../domain/entities/MeetingInsights';
import type { InsightsRepository } from '../domain/repositories/InsightsRepository';
import type {
  IndexLocation,
  StoredIndex,
  VectorIndexRepository,
} from '../domain/repositories/VectorIndexRepository';
import type { Transcript } from '../domain/entities/Transcript';
import type { QueryRecord } from '../domain/entities/QueryRecord';
import type { IndexMetadata } from '../domain/entities/IndexMetadata';
import type { FlatL2Index } from '../domain/services/VectorIndex';
import { NotFoundError, ProviderError } from '../domain/errors';

export const VOCABULARY = ['river', 'killer', 'budget', 'quarter', 'lunch', 'menu'];

// Three six-word windows: crime, budget, lunch
export const RIVER_TRANSCRIPT =
  'the river killer was never caught ' +
  'budget talk for the next quarter ' +
  'lunch menu was pasta and salad';

/** Counts vocabulary words; anything else contributes nothing. */
export function bagOfWords(text: string): number[] {
  const words = text.toLowerCase().split(/[^a-z]+/);
  return VOCABULARY.map((term) => words.filter((word) => word === term).length);
}

export interface FakeEmbeddingOptions {
  delayMs?: (batch: string[]) => number;
  failOnBatch?: number;
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'fake-embedding';
  readonly batches: string[][] = [];
  embedCalls = 0;
  maxInFlight = 0;
  private inFlight = 0;

  constructor(private options: FakeEmbeddingOptions = {}) {}

  async embed(text: string): Promise<number[]> {
    this.embedCalls++;
    return bagOfWords(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const batchNumber = this.batches.push(texts) - 1;
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      await sleep(this.options.delayMs?.(texts) ?? 0);
      if (batchNumber === this.options.failOnBatch) {
        throw new ProviderError('embedding service unavailable', 503);
      }
      return texts.map(bagOfWords);
    } finally {
      this.inFlight--;
    }
  }
}

export class FakeChatProvider implements ChatProvider {
  readonly requests: CompletionRequest[] = [];

  constructor(private reply: string | ((request: CompletionRequest) => string) = 'The river killer was never caught.') {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    const content = typeof this.reply === 'string' ? this.reply : this.reply(request);
    return { content, metadata: { totalTokens: 42, responseTimeMs: 1 } };
  }
}

export class FakeTranscriptionProvider implements TranscriptionProvider {
  readonly requests: TranscriptionRequest[] = [];
  readonly segmentRequests: TranscriptionRequest[] = [];

  constructor(
    private text: string = RIVER_TRANSCRIPT,
    private segments: TranscriptSegment[] | Error = []
  ) {}

  async transcribe(request: TranscriptionRequest): Promise<string> {
    this.requests.push(request);
    return this.text;
  }

  async transcribeSegments(request: TranscriptionRequest): Promise<TranscriptSegment[]> {
    this.segmentRequests.push(request);
    if (this.segments instanceof Error) {
      throw this.segments;
    }
    return this.segments;
  }
}

export class InMemoryTranscriptRepository implements TranscriptRepository {
  private transcripts = new Map<string, Transcript>();

  async findByMeetingId(meetingId: string): Promise<Transcript | null> {
    return this.transcripts.get(meetingId) ?? null;
  }

  async exists(meetingId: string): Promise<boolean> {
    return this.transcripts.has(meetingId);
  }

  async save(transcript: Transcript): Promise<void> {
    this.transcripts.set(transcript.meetingId, transcript);
  }
}

export class InMemoryVectorIndexRepository implements VectorIndexRepository {
  readonly stored = new Map<string, StoredIndex>();
  saves = 0;

  locate(meetingId: string): IndexLocation {
    return {
      vectorIndexPath: `memory/${meetingId}.index`,
      metaPath: `memory/${meetingId}_meta.json`,
    };
  }

  async save(meetingId: string, index: FlatL2Index, metadata: IndexMetadata): Promise<IndexLocation> {
    this.saves++;
    this.stored.set(meetingId, { index, metadata });
    return this.locate(meetingId);
  }

  async load(meetingId: string): Promise<StoredIndex> {
    const stored = this.stored.get(meetingId);
    if (!stored) {
      throw new NotFoundError('index', `Vector index not found for meeting_id: ${meetingId}`);
    }
    return stored;
  }

  async findMetadata(meetingId: string): Promise<IndexMetadata | null> {
    return this.stored.get(meetingId)?.metadata ?? null;
  }
}

export class InMemoryQueryLogRepository implements QueryLogRepository {
  private records = new Map<string, QueryRecord[]>();

  async append(meetingId: string, record: QueryRecord): Promise<void> {
    const existing = this.records.get(meetingId) ?? [];
    this.records.set(meetingId, [...existing, record]);
  }

  async list(meetingId: string): Promise<QueryRecord[]> {
    return this.records.get(meetingId) ?? [];
  }
}

export class InMemoryAudioRepository implements AudioRepository {
  readonly files = new Map<string, StoredAudio>();

  async save(meetingId: string, extension: string, content: Buffer): Promise<string> {
    const filename = `${meetingId}_audio${extension}`;
    this.files.set(meetingId, { meetingId, filename, content });
    return filename;
  }

  async findByMeetingId(meetingId: string): Promise<StoredAudio | null> {
    return this.files.get(meetingId) ?? null;
  }

  async exists(meetingId: string): Promise<boolean> {
    return this.files.has(meetingId);
  }
}

export class InMemorySummaryRepository implements SummaryRepository {
  private summaries = new Map<string, MeetingSummary>();

  async findByMeetingId(meetingId: string): Promise<MeetingSummary | null> {
    return this.summaries.get(meetingId) ?? null;
  }

  async save(summary: MeetingSummary): Promise<void> {
    this.summaries.set(summary.meetingId, summary);
  }
}

export class InMemoryInsightsRepository implements InsightsRepository {
  private insights = new Map<string, MeetingInsights>();

  async findByMeetingId(meetingId: string): Promise<MeetingInsights | null> {
    return this.insights.get(meetingId) ?? null;
  }

  async save(insights: MeetingInsights): Promise<void> {
    this.insights.set(insights.meetingId, insights);
  }
}
