import { Router, type Request, type Response } from 'express';
import type { AnswerComposer } from '../../../domain/services/AnswerComposer';
import { assertMeetingId } from '../../../domain/entities/Meeting';
import { queryRecordToJson } from '../../schemas';
import { meetingIdParam, parseBody, queryRequestSchema } from '../requests';
import { sendError } from '../errors';

export function createQueryRoutes(answerComposer: AnswerComposer): Router {
  const router = Router();

  router.post('/query', async (req: Request, res: Response) => {
    try {
      const body = parseBody(queryRequestSchema, req.body);
      const record = await answerComposer.answer(assertMeetingId(body.meeting_id), body.query);
      res.json(queryRecordToJson(record));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/query-history/:meetingId', async (req: Request, res: Response) => {
    try {
      const meetingId = meetingIdParam(req.params.meetingId);
      const queries = await answerComposer.history(meetingId);
      res.json({ meeting_id: meetingId, queries: queries.map(queryRecordToJson) });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
