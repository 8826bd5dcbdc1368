import { loadConfig } from './config/env';
import { StoragePaths } from './infrastructure/storage/StoragePaths';
import { FileAudioRepository } from './infrastructure/storage/FileAudioRepository';
import { FileTranscriptRepository } from './infrastructure/storage/FileTranscriptRepository';
import { FileSummaryRepository } from './infrastructure/storage/FileSummaryRepository';
import { FileVectorIndexRepository } from './infrastructure/storage/FileVectorIndexRepository';
import { FileQueryLogRepository } from './infrastructure/storage/FileQueryLogRepository';
import { FileInsightsRepository } from './infrastructure/storage/FileInsightsRepository';
import { OpenAIProvider } from './infrastructure/ai/OpenAIProvider';
import { WordWindowChunker } from './domain/services/TextChunker';
import { Retriever } from './domain/services/Retriever';
import { AnswerComposer } from './domain/services/AnswerComposer';
import { IndexBuilder } from './domain/services/IndexBuilder';
import { UploadAudioUseCase } from './application/usecases/UploadAudio';
import { TranscribeMeetingUseCase } from './application/usecases/TranscribeMeeting';
import { SummarizeMeetingUseCase } from './application/usecases/SummarizeMeeting';
import { ProcessMeetingUseCase } from './application/usecases/ProcessMeeting';
import { GenerateInsightsUseCase } from './application/usecases/GenerateInsights';
import { PipelineStatusUseCase } from './application/usecases/PipelineStatus';
import { ApiServer, createApp } from './infrastructure/api/ApiServer';
import { errorMessage, log, setLogLevel } from './utils/logger';

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  log('info', 'Starting application...', { storagePath: config.storagePath });

  // Initialize repositories
  const paths = new StoragePaths(config.storagePath);
  const audioRepository = new FileAudioRepository(paths);
  const transcriptRepository = new FileTranscriptRepository(paths, config.defaultProjectId);
  const summaryRepository = new FileSummaryRepository(paths);
  const indexRepository = new FileVectorIndexRepository(paths);
  const queryLogRepository = new FileQueryLogRepository(paths);
  const insightsRepository = new FileInsightsRepository(paths);

  // One client serves chat, embeddings and transcription
  const aiProvider = new OpenAIProvider({
    apiKey: config.openai.apiKey,
    baseUrl: config.openai.baseUrl,
    chatModel: config.openai.chatModel,
    embeddingModel: config.openai.embeddingModel,
    transcriptionModel: config.openai.transcriptionModel,
    timeoutMs: config.openai.timeoutMs,
  });

  // Initialize services
  const chunker = new WordWindowChunker(config.chunking);
  const indexBuilder = new IndexBuilder(
    transcriptRepository,
    indexRepository,
    aiProvider,
    chunker,
    config.embedding
  );
  const retriever = new Retriever(indexRepository, transcriptRepository, aiProvider);
  const answerComposer = new AnswerComposer(retriever, aiProvider, queryLogRepository);

  // Initialize use cases
  const transcribeMeeting = new TranscribeMeetingUseCase(audioRepository, transcriptRepository, aiProvider, {
    ...config.transcription,
    projectId: config.defaultProjectId,
  });
  const summarizeMeeting = new SummarizeMeetingUseCase(
    transcriptRepository,
    summaryRepository,
    aiProvider,
    config.openai.summaryModel
  );

  const generateInsights = new GenerateInsightsUseCase(
    transcriptRepository,
    insightsRepository,
    audioRepository,
    aiProvider,
    aiProvider,
    config.transcription
  );

  const app = createApp({
    indexBuilder,
    retriever,
    answerComposer,
    maxUploadMb: config.maxUploadMb,
    meetings: {
      upload: new UploadAudioUseCase(audioRepository),
      transcribe: transcribeMeeting,
      summarize: summarizeMeeting,
      process: new ProcessMeetingUseCase(transcribeMeeting, summarizeMeeting, indexBuilder, generateInsights),
      insights: generateInsights,
      pipelineStatus: new PipelineStatusUseCase(
        audioRepository,
        transcriptRepository,
        summaryRepository,
        insightsRepository,
        indexBuilder
      ),
    },
  });
  const apiServer = new ApiServer(app, config.port);

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    log('info', `Received ${signal}, shutting down gracefully...`);

    try {
      await apiServer.stop();
      log('info', 'Shutdown complete');
      process.exit(0);
    } catch (error) {
      log('error', 'Error during shutdown', { error: errorMessage(error) });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await apiServer.start();
}

main().catch((error) => {
  log('error', 'Fatal error', {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
