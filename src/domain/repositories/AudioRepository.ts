export interface StoredAudio {
  meetingId: string;
  filename: string;
  content: Buffer;
}

export interface AudioRepository {
  /** Stores the audio and returns the file name it was saved under. */
  save(meetingId: string, extension: string, content: Buffer): Promise<string>;
  findByMeetingId(meetingId: string): Promise<StoredAudio | null>;
  exists(meetingId: string): Promise<boolean>;
}
