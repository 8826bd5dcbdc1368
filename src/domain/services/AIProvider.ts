export interface AIResponseMetadata {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
  responseTimeMs: number;
}

export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  model?: string; // Override the provider's default chat model
  temperature: number;
  maxTokens: number;
}

export interface CompletionResponse {
  content: string;
  metadata: AIResponseMetadata;
}

export interface TranscriptionRequest {
  audio: Buffer;
  filename: string;
  language?: string;
  temperature?: number;
  prompt?: string;
}

/** A stretch of speech with offsets in seconds from the start of the recording. */
export interface TranscriptSegment {
  start: number;
  end: number;
  text: string;
}

export interface ChatProvider {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export interface EmbeddingProvider {
  readonly model: string;
  embed(text: string): Promise<number[]>;
  /** One vector per input, in input order. */
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface TranscriptionProvider {
  transcribe(request: TranscriptionRequest): Promise<string>;
  transcribeSegments(request: TranscriptionRequest): Promise<TranscriptSegment[]>;
}
