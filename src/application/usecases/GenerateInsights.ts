import type {
  ChatProvider,
  TranscriptSegment,
  TranscriptionProvider,
} from '../../domain/services/AIProvider';
import type { AudioRepository } from '../../domain/repositories/AudioRepository';
import type { TranscriptRepository } from '../../domain/repositories/TranscriptRepository';
import type { InsightsRepository } from '../../domain/repositories/InsightsRepository';
import {
  createMeetingInsights,
  type ImportantMoment,
  type MeetingInsights,
} from '../../domain/entities/MeetingInsights';
import { NotFoundError, ProviderError, ValidationError } from '../../domain/errors';
import { log } from '../../utils/logger';

const INSIGHTS_PROMPT =
  'You are an expert at identifying key insights from meeting transcripts and audio recordings. ' +
  'Analyze this transcript and extract: 1) Important moments (with timestamps if available), ' +
  '2) Recurring patterns or themes, 3) Potential risks or opportunities mentioned, ' +
  '4) Emotional tone or sentiment shifts. Format as bullet points under each category. ' +
  'For important moments, include timestamps when available, written as [MM:SS-MM:SS].';

const MOMENT_PATTERN = /\[(\d{2}:\d{2})-(\d{2}:\d{2})\]/g;
const MOMENT_DESCRIPTION = 'Important moment identified in analysis';

export interface InsightsSettings {
  language: string;
  temperature: number;
  prompt: string;
}

export function formatTimestamp(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);
  return `${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
}

export function formatSegments(segments: TranscriptSegment[]): string {
  return segments
    .filter((segment) => segment.text)
    .map((segment) => `[${formatTimestamp(segment.start)}-${formatTimestamp(segment.end)}] ${segment.text}`)
    .join('\n');
}

/** Every `[MM:SS-MM:SS]` range the model cited, with the segment text when one matches exactly. */
export function extractImportantMoments(insights: string, segments: TranscriptSegment[]): ImportantMoment[] {
  return Array.from(insights.matchAll(MOMENT_PATTERN), ([, startTime, endTime]) => {
    const segment = segments.find(
      (candidate) =>
        formatTimestamp(candidate.start) === startTime && formatTimestamp(candidate.end) === endTime
    );
    return { startTime, endTime, text: segment?.text ?? '', description: MOMENT_DESCRIPTION };
  });
}

export class GenerateInsightsUseCase {
  constructor(
    private transcriptRepository: TranscriptRepository,
    private insightsRepository: InsightsRepository,
    private audioRepository: AudioRepository,
    private chat: ChatProvider,
    private transcriber: TranscriptionProvider,
    private settings: InsightsSettings,
    private model?: string
  ) {}

  async execute(meetingId: string): Promise<MeetingInsights> {
    const transcript = await this.transcriptRepository.findByMeetingId(meetingId);
    if (!transcript) {
      throw new NotFoundError('transcript', `Transcript not found for meeting_id: ${meetingId}`);
    }
    if (!transcript.transcript.trim()) {
      throw new ValidationError(`Transcript text is empty for meeting_id: ${meetingId}`);
    }

    const segments = await this.timestampedSegments(meetingId);
    const context = segments.length
      ? `${transcript.transcript}\n\nTimestamped segments:\n${formatSegments(segments)}`
      : transcript.transcript;

    const response = await this.chat.complete({
      systemPrompt: INSIGHTS_PROMPT,
      userPrompt: context,
      model: this.model,
      temperature: 0.4,
      maxTokens: 1000,
    });

    const insights = createMeetingInsights(
      meetingId,
      transcript.projectId,
      response.content,
      extractImportantMoments(response.content, segments)
    );
    await this.insightsRepository.save(insights);

    log('info', 'Insights generated', {
      meetingId,
      segments: segments.length,
      importantMoments: insights.importantMoments.length,
      tokensUsed: response.metadata.totalTokens,
    });
    return insights;
  }

  async get(meetingId: string): Promise<MeetingInsights> {
    const insights = await this.insightsRepository.findByMeetingId(meetingId);
    if (!insights) {
      throw new NotFoundError('insights', `Insights not found for meeting_id: ${meetingId}`);
    }
    return insights;
  }

  // Timestamps only enrich the prompt; without audio or segments the transcript alone is analysed
  private async timestampedSegments(meetingId: string): Promise<TranscriptSegment[]> {
    const audio = await this.audioRepository.findByMeetingId(meetingId);
    if (!audio) {
      return [];
    }

    try {
      return await this.transcriber.transcribeSegments({
        audio: audio.content,
        filename: audio.filename,
        language: this.settings.language,
        temperature: this.settings.temperature,
        prompt: this.settings.prompt,
      });
    } catch (error) {
      if (!(error instanceof ProviderError)) {
        throw error;
      }
      log('warn', 'Timestamped transcription failed, analysing transcript without timestamps', {
        meetingId,
        error: error.message,
      });
      return [];
    }
  }
}
