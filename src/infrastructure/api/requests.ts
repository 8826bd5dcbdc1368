import { z } from 'zod';
import { ValidationError } from '../../domain/errors';
import { assertMeetingId } from '../../domain/entities/Meeting';

const meetingIdField = z
  .string({ required_error: 'meeting_id is required' })
  .trim()
  .min(1, 'meeting_id is required');

export const meetingRequestSchema = z.object({
  meeting_id: meetingIdField,
});

export const searchRequestSchema = z.object({
  meeting_id: meetingIdField,
  query_text: z.string({ required_error: 'query_text is required' }),
  top_k: z.number().int('top_k must be an integer').optional(),
});

export const queryRequestSchema = z.object({
  meeting_id: meetingIdField,
  query: z.string({ required_error: 'query is required' }).trim().min(1, 'query is required'),
});

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue ? issue.message : 'Invalid request body');
  }
  return result.data;
}

export function meetingIdParam(value: string | undefined): string {
  return assertMeetingId(value ?? '');
}
