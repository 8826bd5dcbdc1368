import { beforeEach, describe, expect, it } from 'vitest';
import { ProcessMeetingUseCase } from './ProcessMeeting';
import { TranscribeMeetingUseCase } from './TranscribeMeeting';
import { SummarizeMeetingUseCase } from './SummarizeMeeting';
import { GenerateInsightsUseCase } from './GenerateInsights';
import { IndexBuilder } from '../../domain/services/IndexBuilder';
import { WordWindowChunker } from '../../domain/services/TextChunker';
import { NotFoundError, ProviderError } from '../../domain/errors';
import {
  FakeChatProvider,
  FakeEmbeddingProvider,
  FakeTranscriptionProvider,
  InMemoryAudioRepository,
  InMemoryInsightsRepository,
  InMemorySummaryRepository,
  InMemoryTranscriptRepository,
  InMemoryVectorIndexRepository,
  RIVER_TRANSCRIPT,
} from '../../test/fakes';

const settings = { language: 'en', temperature: 0, prompt: 'Meeting recording.', projectId: 'demo_project' };

describe('meeting processing', () => {
  let audio: InMemoryAudioRepository;
  let transcripts: InMemoryTranscriptRepository;
  let summaries: InMemorySummaryRepository;
  let indexes: InMemoryVectorIndexRepository;
  let insightsRepository: InMemoryInsightsRepository;
  let transcriber: FakeTranscriptionProvider;
  let chat: FakeChatProvider;

  beforeEach(async () => {
    audio = new InMemoryAudioRepository();
    transcripts = new InMemoryTranscriptRepository();
    summaries = new InMemorySummaryRepository();
    indexes = new InMemoryVectorIndexRepository();
    insightsRepository = new InMemoryInsightsRepository();
    transcriber = new FakeTranscriptionProvider();
    chat = new FakeChatProvider('Budget and lunch were discussed.');
    await audio.save('standup', '.wav', Buffer.from('fake audio'));
  });

  function pipeline(transcriptionProvider = transcriber): ProcessMeetingUseCase {
    const transcribe = new TranscribeMeetingUseCase(audio, transcripts, transcriptionProvider, settings);
    const summarize = new SummarizeMeetingUseCase(transcripts, summaries, chat, 'summary-model');
    const indexBuilder = new IndexBuilder(
      transcripts,
      indexes,
      new FakeEmbeddingProvider(),
      new WordWindowChunker({ chunkSizeWords: 6, overlapWords: 0 }),
      { batchSize: 2, concurrency: 2 }
    );
    const insights = new GenerateInsightsUseCase(
      transcripts,
      insightsRepository,
      audio,
      chat,
      transcriptionProvider,
      settings
    );
    return new ProcessMeetingUseCase(transcribe, summarize, indexBuilder, insights);
  }

  it('transcribes, summarizes, indexes and analyses a meeting', async () => {
    const result = await pipeline().execute('standup');

    expect(result.stepsCompleted).toEqual(['transcribe', 'summarize', 'embed', 'insights']);
    expect(result.transcript).toMatchObject({
      meetingId: 'standup',
      projectId: 'demo_project',
      transcript: RIVER_TRANSCRIPT,
      language: 'en',
    });
    expect(result.summary.summary).toBe('Budget and lunch were discussed.');
    expect(result.embedding.numChunks).toBe(3);

    expect(transcriber.requests[0]).toMatchObject({ filename: 'standup_audio.wav', language: 'en' });
    expect(chat.requests[0]).toMatchObject({
      userPrompt: RIVER_TRANSCRIPT,
      model: 'summary-model',
      temperature: 0.3,
    });
    expect(await summaries.findByMeetingId('standup')).toEqual(result.summary);

    expect(chat.requests).toHaveLength(2);
    expect(chat.requests[1]).toMatchObject({ userPrompt: RIVER_TRANSCRIPT, temperature: 0.4, maxTokens: 1000 });
    expect(result.insights).toMatchObject({ meetingId: 'standup', insights: 'Budget and lunch were discussed.' });
    expect(await insightsRepository.findByMeetingId('standup')).toEqual(result.insights);
  });

  it('stops at the first failing step', async () => {
    const error = await pipeline(new FakeTranscriptionProvider('   ')).execute('standup').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(await transcripts.exists('standup')).toBe(false);
    expect(chat.requests).toHaveLength(0);
    expect(indexes.saves).toBe(0);
  });

  it('reports missing audio', async () => {
    const error = await pipeline().execute('unknown').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ resource: 'audio' });
  });

  it('reports a missing summary', async () => {
    const summarize = new SummarizeMeetingUseCase(transcripts, summaries, chat);

    await expect(summarize.get('standup')).rejects.toThrow('Summary not found for meeting_id: standup');
  });
});
