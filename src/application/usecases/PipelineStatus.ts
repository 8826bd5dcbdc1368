import type { AudioRepository } from '../../domain/repositories/AudioRepository';
import type { TranscriptRepository } from '../../domain/repositories/TranscriptRepository';
import type { SummaryRepository } from '../../domain/repositories/SummaryRepository';
import type { InsightsRepository } from '../../domain/repositories/InsightsRepository';
import type { IndexBuilder } from '../../domain/services/IndexBuilder';
import type { PipelineStep } from './ProcessMeeting';
import { CorruptStateError } from '../../domain/errors';
import { log } from '../../utils/logger';

export type PipelineStage = 'upload' | PipelineStep;

const ALL_STAGES: PipelineStage[] = ['upload', 'transcribe', 'summarize', 'embed', 'insights'];

export interface PipelineStatusOutput {
  meetingId: string;
  status: 'completed' | 'in_progress' | 'not_started';
  stepsCompleted: PipelineStage[];
  transcript: { createdAt: string; transcriptLength: number } | null;
  summary: { createdAt: string; summaryLength: number } | null;
  embedding: { createdAt: string; numChunks: number; embeddingModel: string } | null;
  insights: { createdAt: string; importantMoments: number } | null;
}

/** Reports which pipeline stages have left their artifacts on disk. */
export class PipelineStatusUseCase {
  constructor(
    private audioRepository: AudioRepository,
    private transcriptRepository: TranscriptRepository,
    private summaryRepository: SummaryRepository,
    private insightsRepository: InsightsRepository,
    private indexBuilder: IndexBuilder
  ) {}

  async execute(meetingId: string): Promise<PipelineStatusOutput> {
    const uploaded = await this.audioRepository.exists(meetingId);
    const transcript = await this.readStage('transcribe', meetingId, () =>
      this.transcriptRepository.findByMeetingId(meetingId)
    );
    const summary = await this.readStage('summarize', meetingId, () =>
      this.summaryRepository.findByMeetingId(meetingId)
    );
    const embedding = await this.indexBuilder.status(meetingId);
    const insights = await this.readStage('insights', meetingId, () =>
      this.insightsRepository.findByMeetingId(meetingId)
    );

    const done: Record<PipelineStage, boolean> = {
      upload: uploaded,
      transcribe: transcript !== null,
      summarize: summary !== null,
      embed: embedding.status === 'embedded',
      insights: insights !== null,
    };
    const stepsCompleted = ALL_STAGES.filter((stage) => done[stage]);

    return {
      meetingId,
      status:
        stepsCompleted.length === ALL_STAGES.length
          ? 'completed'
          : stepsCompleted.length > 0
            ? 'in_progress'
            : 'not_started',
      stepsCompleted,
      transcript: transcript && {
        createdAt: transcript.createdAt,
        transcriptLength: transcript.transcript.length,
      },
      summary: summary && { createdAt: summary.createdAt, summaryLength: summary.summary.length },
      embedding:
        embedding.status === 'embedded'
          ? {
              createdAt: embedding.createdAt,
              numChunks: embedding.numChunks,
              embeddingModel: embedding.embeddingModel,
            }
          : null,
      insights: insights && {
        createdAt: insights.createdAt,
        importantMoments: insights.importantMoments.length,
      },
    };
  }

  // An unreadable artifact means the stage has to run again
  private async readStage<T>(
    stage: PipelineStage,
    meetingId: string,
    read: () => Promise<T | null>
  ): Promise<T | null> {
    try {
      return await read();
    } catch (error) {
      if (!(error instanceof CorruptStateError)) {
        throw error;
      }
      log('warn', `Stored ${stage} output is unreadable`, { meetingId, error: error.message });
      return null;
    }
  }
}
