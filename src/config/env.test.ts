import { describe, expect, it } from 'vitest';
import { loadConfig } from './env';

describe('loadConfig', () => {
  it('applies defaults when only the API key is set', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-secret' });

    expect(config.port).toBe(8000);
    expect(config.logLevel).toBe('info');
    expect(config.storagePath).toBe('./storage');
    expect(config.openai).toMatchObject({
      apiKey: 'test-secret',
      chatModel: 'gpt-3.5-turbo',
      summaryModel: 'gpt-4',
      embeddingModel: 'text-embedding-ada-002',
      transcriptionModel: 'whisper-1',
      timeoutMs: 60_000,
    });
    expect(config.chunking).toEqual({ chunkSizeWords: 500, overlapWords: 50 });
    expect(config.embedding).toEqual({ batchSize: 16, concurrency: 4 });
  });

  it('reads overrides and ignores values that do not parse', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-secret',
      PORT: '9100',
      LOG_LEVEL: 'DEBUG',
      CHUNK_SIZE_WORDS: '200',
      CHUNK_OVERLAP_WORDS: '20',
      EMBEDDING_BATCH_SIZE: 'many',
      EMBEDDING_CONCURRENCY: '-2',
    });

    expect(config.port).toBe(9100);
    expect(config.logLevel).toBe('debug');
    expect(config.chunking).toEqual({ chunkSizeWords: 200, overlapWords: 20 });
    expect(config.embedding).toEqual({ batchSize: 16, concurrency: 4 });
  });

  it('falls back to info for unknown log levels', () => {
    expect(loadConfig({ OPENAI_API_KEY: 'test-secret', LOG_LEVEL: 'constructor' }).logLevel).toBe('info');
  });

  it('requires an API key', () => {
    expect(() => loadConfig({})).toThrow('Missing required environment variable: OPENAI_API_KEY');
  });
});
