import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { AudioRepository, StoredAudio } from '../../domain/repositories/AudioRepository';
import { isMissingFile, writeFileAtomic } from './atomicFile';
import type { StoragePaths } from './StoragePaths';

export class FileAudioRepository implements AudioRepository {
  constructor(private paths: StoragePaths) {}

  async save(meetingId: string, extension: string, content: Buffer): Promise<string> {
    const path = this.paths.audioFile(meetingId, extension);
    await writeFileAtomic(path, content);
    return `${meetingId}_audio${extension}`;
  }

  async findByMeetingId(meetingId: string): Promise<StoredAudio | null> {
    const filename = await this.findFilename(meetingId);
    if (!filename) {
      return null;
    }

    const content = await readFile(join(this.paths.audioDir, filename));
    return { meetingId, filename, content };
  }

  async exists(meetingId: string): Promise<boolean> {
    return (await this.findFilename(meetingId)) !== null;
  }

  // The extension is only known from the upload, so match on the prefix
  private async findFilename(meetingId: string): Promise<string | null> {
    let entries: string[];
    try {
      entries = await readdir(this.paths.audioDir);
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    const prefix = `${meetingId}_audio.`;
    return entries.find((entry) => entry.startsWith(prefix) && !entry.endsWith('.tmp')) ?? null;
  }
}
