import type { TranscriptionProvider } from '../../domain/services/AIProvider';
import type { AudioRepository } from '../../domain/repositories/AudioRepository';
import type { TranscriptRepository } from '../../domain/repositories/TranscriptRepository';
import { createTranscript, type Transcript } from '../../domain/entities/Transcript';
import { NotFoundError, ProviderError } from '../../domain/errors';
import { log } from '../../utils/logger';

export interface TranscriptionSettings {
  language: string;
  temperature: number;
  prompt: string;
  projectId: string;
}

export class TranscribeMeetingUseCase {
  constructor(
    private audioRepository: AudioRepository,
    private transcriptRepository: TranscriptRepository,
    private transcriber: TranscriptionProvider,
    private settings: TranscriptionSettings
  ) {}

  async execute(meetingId: string): Promise<Transcript> {
    const audio = await this.audioRepository.findByMeetingId(meetingId);
    if (!audio) {
      throw new NotFoundError('audio', `Audio file not found for meeting_id: ${meetingId}`);
    }

    const startTime = performance.now();
    const text = await this.transcriber.transcribe({
      audio: audio.content,
      filename: audio.filename,
      language: this.settings.language,
      temperature: this.settings.temperature,
      prompt: this.settings.prompt,
    });

    if (!text.trim()) {
      throw new ProviderError(`Transcription returned no text for meeting_id: ${meetingId}`);
    }

    const transcript = createTranscript({
      meetingId,
      projectId: this.settings.projectId,
      text,
      language: this.settings.language,
    });
    await this.transcriptRepository.save(transcript);

    log('info', 'Transcription completed', {
      meetingId,
      textLength: text.length,
      elapsedMs: Math.round(performance.now() - startTime),
    });
    return transcript;
  }
}
