import { randomUUID } from 'crypto';
import { ValidationError } from '../errors';

const MEETING_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export function createMeetingId(): string {
  return randomUUID();
}

// Meeting ids name files on disk, so they are restricted to a safe alphabet
export function assertMeetingId(meetingId: string): string {
  const trimmed = meetingId.trim();
  if (!MEETING_ID_PATTERN.test(trimmed)) {
    throw new ValidationError(`Invalid meeting_id: "${meetingId}"`);
  }
  return trimmed;
}
