import type { TranscribeMeetingUseCase } from './TranscribeMeeting';
import type { SummarizeMeetingUseCase } from './SummarizeMeeting';
import type { GenerateInsightsUseCase } from './GenerateInsights';
import type { BuildResult, IndexBuilder } from '../../domain/services/IndexBuilder';
import type { Transcript } from '../../domain/entities/Transcript';
import type { MeetingSummary } from '../../domain/entities/MeetingSummary';
import type { MeetingInsights } from '../../domain/entities/MeetingInsights';
import { errorMessage, log } from '../../utils/logger';

export type PipelineStep = 'transcribe' | 'summarize' | 'embed' | 'insights';

export interface ProcessMeetingOutput {
  meetingId: string;
  status: 'completed';
  stepsCompleted: PipelineStep[];
  transcript: Transcript;
  summary: MeetingSummary;
  embedding: BuildResult;
  insights: MeetingInsights;
}

export class ProcessMeetingUseCase {
  constructor(
    private transcribe: TranscribeMeetingUseCase,
    private summarize: SummarizeMeetingUseCase,
    private indexBuilder: IndexBuilder,
    private generateInsights: GenerateInsightsUseCase
  ) {}

  async execute(meetingId: string): Promise<ProcessMeetingOutput> {
    const stepsCompleted: PipelineStep[] = [];
    log('info', 'Pipeline started', { meetingId });

    try {
      const transcript = await this.transcribe.execute(meetingId);
      stepsCompleted.push('transcribe');

      const summary = await this.summarize.execute(meetingId);
      stepsCompleted.push('summarize');

      const embedding = await this.indexBuilder.build(meetingId);
      stepsCompleted.push('embed');

      const insights = await this.generateInsights.execute(meetingId);
      stepsCompleted.push('insights');

      log('info', 'Pipeline completed', { meetingId, stepsCompleted });
      return { meetingId, status: 'completed', stepsCompleted, transcript, summary, embedding, insights };
    } catch (error) {
      log('error', 'Pipeline failed', { meetingId, stepsCompleted, error: errorMessage(error) });
      throw error;
    }
  }
}
