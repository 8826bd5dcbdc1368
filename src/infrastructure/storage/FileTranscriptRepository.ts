import type { Transcript } from '../../domain/entities/Transcript';
import type { TranscriptRepository } from '../../domain/repositories/TranscriptRepository';
import { transcriptFromJson, transcriptSchema, transcriptToJson } from '../schemas';
import { fileExists, readJsonFile, writeJsonAtomic } from './atomicFile';
import type { StoragePaths } from './StoragePaths';

export class FileTranscriptRepository implements TranscriptRepository {
  constructor(
    private paths: StoragePaths,
    private defaultProjectId: string
  ) {}

  async findByMeetingId(meetingId: string): Promise<Transcript | null> {
    const json = await readJsonFile(this.paths.transcript(meetingId), transcriptSchema);
    return json ? transcriptFromJson(json, this.defaultProjectId) : null;
  }

  async exists(meetingId: string): Promise<boolean> {
    return fileExists(this.paths.transcript(meetingId));
  }

  async save(transcript: Transcript): Promise<void> {
    await writeJsonAtomic(this.paths.transcript(transcript.meetingId), transcriptToJson(transcript));
  }
}
