import { isLogLevel, type LogLevel } from '../utils/logger';

type Env = Record<string, string | undefined>;

function getEnvOrThrow(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

function getEnvAsNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvAsPositiveInt(env: Env, key: string, defaultValue: number): number {
  const parsed = Math.floor(getEnvAsNumber(env, key, defaultValue));
  return parsed > 0 ? parsed : defaultValue;
}

function getLogLevel(env: Env): LogLevel {
  const value = getEnvOrDefault(env, 'LOG_LEVEL', 'info').toLowerCase();
  return isLogLevel(value) ? value : 'info';
}

export function loadConfig(env: Env = process.env) {
  return {
    port: getEnvAsPositiveInt(env, 'PORT', 8000),
    logLevel: getLogLevel(env),

    // Root for audio/, transcripts/, vectors/ and outputs/
    storagePath: getEnvOrDefault(env, 'STORAGE_PATH', './storage'),
    maxUploadMb: getEnvAsPositiveInt(env, 'MAX_UPLOAD_MB', 100),
    defaultProjectId: getEnvOrDefault(env, 'DEFAULT_PROJECT_ID', 'demo_project'),

    openai: {
      apiKey: getEnvOrThrow(env, 'OPENAI_API_KEY'),
      baseUrl: getEnvOrDefault(env, 'OPENAI_BASE_URL', 'https://api.openai.com/v1'),
      chatModel: getEnvOrDefault(env, 'OPENAI_CHAT_MODEL', 'gpt-3.5-turbo'),
      summaryModel: getEnvOrDefault(env, 'OPENAI_SUMMARY_MODEL', 'gpt-4'),
      embeddingModel: getEnvOrDefault(env, 'OPENAI_EMBEDDING_MODEL', 'text-embedding-ada-002'),
      transcriptionModel: getEnvOrDefault(env, 'OPENAI_TRANSCRIPTION_MODEL', 'whisper-1'),
      timeoutMs: getEnvAsPositiveInt(env, 'PROVIDER_TIMEOUT_MS', 60_000),
    },

    transcription: {
      language: getEnvOrDefault(env, 'TRANSCRIPTION_LANGUAGE', 'en'),
      temperature: getEnvAsNumber(env, 'TRANSCRIPTION_TEMPERATURE', 0),
      prompt: getEnvOrDefault(
        env,
        'TRANSCRIPTION_PROMPT',
        'This is a meeting recording. Transcribe accurately.'
      ),
    },

    chunking: {
      chunkSizeWords: getEnvAsPositiveInt(env, 'CHUNK_SIZE_WORDS', 500),
      overlapWords: Math.max(0, Math.floor(getEnvAsNumber(env, 'CHUNK_OVERLAP_WORDS', 50))),
    },

    embedding: {
      batchSize: getEnvAsPositiveInt(env, 'EMBEDDING_BATCH_SIZE', 16),
      concurrency: getEnvAsPositiveInt(env, 'EMBEDDING_CONCURRENCY', 4),
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;
