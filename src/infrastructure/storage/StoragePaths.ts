import { join, resolve } from 'node:path';

/**
 * File layout under the storage root, one set of artifacts per meeting:
 *
 *   audio/{id}_audio{ext}
 *   transcripts/{id}.json
 *   vectors/{id}.index, vectors/{id}_meta.json
 *   outputs/{id}_summary.json, outputs/{id}_insights.json, outputs/{id}_queries.json
 */
export class StoragePaths {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  get audioDir(): string {
    return join(this.root, 'audio');
  }

  audioFile(meetingId: string, extension: string): string {
    return join(this.audioDir, `${meetingId}_audio${extension}`);
  }

  transcript(meetingId: string): string {
    return join(this.root, 'transcripts', `${meetingId}.json`);
  }

  vectorIndex(meetingId: string): string {
    return join(this.root, 'vectors', `${meetingId}.index`);
  }

  indexMetadata(meetingId: string): string {
    return join(this.root, 'vectors', `${meetingId}_meta.json`);
  }

  summary(meetingId: string): string {
    return join(this.root, 'outputs', `${meetingId}_summary.json`);
  }

  insights(meetingId: string): string {
    return join(this.root, 'outputs', `${meetingId}_insights.json`);
  }

  queryLog(meetingId: string): string {
    return join(this.root, 'outputs', `${meetingId}_queries.json`);
  }
}
