import type { ChatProvider } from '../../domain/services/AIProvider';
import type { TranscriptRepository } from '../../domain/repositories/TranscriptRepository';
import type { SummaryRepository } from '../../domain/repositories/SummaryRepository';
import { createMeetingSummary, type MeetingSummary } from '../../domain/entities/MeetingSummary';
import { NotFoundError, ValidationError } from '../../domain/errors';
import { log } from '../../utils/logger';

const SUMMARY_PROMPT =
  'You are a professional meeting summarizer. Create a concise but comprehensive summary of the ' +
  'following meeting transcript. Focus on key discussion points, decisions made, and the overall ' +
  'narrative flow.';

export class SummarizeMeetingUseCase {
  constructor(
    private transcriptRepository: TranscriptRepository,
    private summaryRepository: SummaryRepository,
    private chat: ChatProvider,
    private model?: string
  ) {}

  async execute(meetingId: string): Promise<MeetingSummary> {
    const transcript = await this.transcriptRepository.findByMeetingId(meetingId);
    if (!transcript) {
      throw new NotFoundError('transcript', `Transcript not found for meeting_id: ${meetingId}`);
    }
    if (!transcript.transcript.trim()) {
      throw new ValidationError(`Transcript text is empty for meeting_id: ${meetingId}`);
    }

    const response = await this.chat.complete({
      systemPrompt: SUMMARY_PROMPT,
      userPrompt: transcript.transcript,
      model: this.model,
      temperature: 0.3,
      maxTokens: 1000,
    });

    const summary = createMeetingSummary(meetingId, transcript.projectId, response.content);
    await this.summaryRepository.save(summary);

    log('info', 'Summary generated', {
      meetingId,
      summaryLength: summary.summary.length,
      tokensUsed: response.metadata.totalTokens,
    });
    return summary;
  }

  async get(meetingId: string): Promise<MeetingSummary> {
    const summary = await this.summaryRepository.findByMeetingId(meetingId);
    if (!summary) {
      throw new NotFoundError('summary', `Summary not found for meeting_id: ${meetingId}`);
    }
    return summary;
  }
}
