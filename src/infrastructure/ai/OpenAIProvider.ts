import OpenAI, { toFile } from 'openai';
import { z } from 'zod';
import type {
  ChatProvider,
  CompletionRequest,
  CompletionResponse,
  EmbeddingProvider,
  TranscriptSegment,
  TranscriptionProvider,
  TranscriptionRequest,
} from '../../domain/services/AIProvider';
import { ProviderError } from '../../domain/errors';
import { errorMessage, log } from '../../utils/logger';

export interface OpenAIProviderConfig {
  apiKey: string;
  baseUrl?: string;
  chatModel: string;
  embeddingModel: string;
  transcriptionModel: string;
  timeoutMs: number;
}

const verboseTranscriptionSchema = z.object({
  segments: z.array(z.object({ start: z.number(), end: z.number(), text: z.string() })),
});

function toProviderError(operation: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  const status = error instanceof OpenAI.APIError ? error.status : undefined;
  return new ProviderError(`OpenAI ${operation} failed: ${errorMessage(error)}`, status, {
    cause: error,
  });
}

/**
 * Chat completion, embedding and speech-to-text through one OpenAI client.
 * Retries are disabled: a failed call surfaces to the caller as a ProviderError.
 */
export class OpenAIProvider implements ChatProvider, EmbeddingProvider, TranscriptionProvider {
  private client: OpenAI;
  private config: OpenAIProviderConfig;

  constructor(config: OpenAIProviderConfig, client?: OpenAI) {
    this.config = config;
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        maxRetries: 0,
      });
  }

  get model(): string {
    return this.config.embeddingModel;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const modelToUse = request.model ?? this.config.chatModel;

    const messages: OpenAI.ChatCompletionMessageParam[] = [
      { role: 'system', content: request.systemPrompt },
      { role: 'user', content: request.userPrompt },
    ];

    log('debug', 'Sending completion request to OpenAI', { model: modelToUse });

    const requestParams: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model: modelToUse,
      messages,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    };

    const startTime = performance.now();
    let response: OpenAI.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(requestParams);
    } catch (error) {
      throw toProviderError('completion', error);
    }
    const responseTimeMs = performance.now() - startTime;

    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new ProviderError('No response content from OpenAI');
    }

    log('debug', 'Received completion from OpenAI', {
      tokensUsed: response.usage?.total_tokens,
      responseTimeMs,
    });

    return {
      content,
      metadata: {
        inputTokens: response.usage?.prompt_tokens,
        outputTokens: response.usage?.completion_tokens,
        totalTokens: response.usage?.total_tokens,
        responseTimeMs,
      },
    };
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    let response: OpenAI.CreateEmbeddingResponse;
    try {
      response = await this.client.embeddings.create({
        model: this.config.embeddingModel,
        input: texts,
      });
    } catch (error) {
      throw toProviderError('embedding', error);
    }

    if (response.data.length !== texts.length) {
      throw new ProviderError(
        `OpenAI returned ${response.data.length} embeddings for ${texts.length} inputs`
      );
    }

    // The API tags every vector with its input index; do not trust array order
    const vectors: number[][] = new Array(texts.length);
    for (const item of response.data) {
      if (item.index < 0 || item.index >= texts.length || vectors[item.index]) {
        throw new ProviderError(`OpenAI returned an unexpected embedding index ${item.index}`);
      }
      vectors[item.index] = item.embedding;
    }

    log('debug', 'Received embeddings from OpenAI', {
      count: texts.length,
      tokensUsed: response.usage?.total_tokens,
    });

    return vectors;
  }

  async transcribe(request: TranscriptionRequest): Promise<string> {
    log('info', 'Sending audio for transcription', {
      filename: request.filename,
      size: request.audio.length,
      model: this.config.transcriptionModel,
    });

    try {
      const file = await toFile(request.audio, request.filename);
      const result = await this.client.audio.transcriptions.create({
        model: this.config.transcriptionModel,
        file,
        language: request.language,
        temperature: request.temperature,
        prompt: request.prompt,
      });
      return result.text;
    } catch (error) {
      throw toProviderError('transcription', error);
    }
  }

  async transcribeSegments(request: TranscriptionRequest): Promise<TranscriptSegment[]> {
    let result: unknown;
    try {
      const file = await toFile(request.audio, request.filename);
      result = await this.client.audio.transcriptions.create({
        model: this.config.transcriptionModel,
        file,
        response_format: 'verbose_json',
        language: request.language,
        temperature: request.temperature,
        prompt: request.prompt,
      });
    } catch (error) {
      throw toProviderError('timestamped transcription', error);
    }

    const parsed = verboseTranscriptionSchema.safeParse(result);
    if (!parsed.success) {
      throw new ProviderError('OpenAI returned a transcription without segments');
    }
    return parsed.data.segments.map(({ start, end, text }) => ({ start, end, text: text.trim() }));
  }
}
