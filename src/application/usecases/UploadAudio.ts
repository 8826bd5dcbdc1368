import { extname } from 'node:path';
import type { AudioRepository } from '../../domain/repositories/AudioRepository';
import { createMeetingId } from '../../domain/entities/Meeting';
import { ValidationError } from '../../domain/errors';
import { log } from '../../utils/logger';

export const SUPPORTED_AUDIO_EXTENSIONS = [
  '.mp3', '.wav', '.m4a', '.flac', '.ogg', '.aac', '.mp4', '.mpeg', '.mpga', '.oga', '.webm',
];

const FALLBACK_EXTENSION = '.mp3';

export interface UploadAudioInput {
  filename: string;
  contentType?: string;
  content: Buffer;
}

export interface UploadAudioOutput {
  meetingId: string;
  filename: string;
}

export class UploadAudioUseCase {
  constructor(private audioRepository: AudioRepository) {}

  async execute(input: UploadAudioInput): Promise<UploadAudioOutput> {
    if (input.content.length === 0) {
      throw new ValidationError('Uploaded file is empty');
    }

    const extension = extname(input.filename).toLowerCase();
    const isAudioExtension = SUPPORTED_AUDIO_EXTENSIONS.includes(extension);
    const isAudioContent = input.contentType?.startsWith('audio/') ?? false;

    if (!isAudioExtension && !isAudioContent) {
      throw new ValidationError(
        `File must be an audio file. Supported: ${SUPPORTED_AUDIO_EXTENSIONS.join(', ')}`
      );
    }

    const meetingId = createMeetingId();
    const filename = await this.audioRepository.save(
      meetingId,
      isAudioExtension ? extension : FALLBACK_EXTENSION,
      input.content
    );

    log('info', 'Audio uploaded', { meetingId, filename, size: input.content.length });
    return { meetingId, filename };
  }
}
