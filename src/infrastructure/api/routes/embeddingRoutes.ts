import { Router, type Request, type Response } from 'express';
import type { IndexBuilder, BuildResult, EmbeddingStatus } from '../../../domain/services/IndexBuilder';
import type { Retriever } from '../../../domain/services/Retriever';
import { assertMeetingId } from '../../../domain/entities/Meeting';
import { searchResultToJson } from '../../schemas';
import { meetingIdParam, meetingRequestSchema, parseBody, searchRequestSchema } from '../requests';
import { sendError } from '../errors';

export function buildResultToJson(result: BuildResult) {
  return {
    meeting_id: result.meetingId,
    num_chunks: result.numChunks,
    vector_index_path: result.vectorIndexPath,
    meta_path: result.metaPath,
    status: result.status,
  };
}

function statusToJson(status: EmbeddingStatus) {
  if (status.status === 'not_embedded') {
    return { meeting_id: status.meetingId, status: status.status };
  }
  return {
    meeting_id: status.meetingId,
    status: status.status,
    num_chunks: status.numChunks,
    embedding_model: status.embeddingModel,
    created_at: status.createdAt,
  };
}

export function createEmbeddingRoutes(indexBuilder: IndexBuilder, retriever: Retriever): Router {
  const router = Router();

  router.post('/embedding/embed', async (req: Request, res: Response) => {
    try {
      const body = parseBody(meetingRequestSchema, req.body);
      const result = await indexBuilder.build(assertMeetingId(body.meeting_id));
      res.json(buildResultToJson(result));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/embedding/search', async (req: Request, res: Response) => {
    try {
      const body = parseBody(searchRequestSchema, req.body);
      const meetingId = assertMeetingId(body.meeting_id);
      const results = await retriever.retrieve(meetingId, body.query_text, body.top_k);

      res.json({
        meeting_id: meetingId,
        query_text: body.query_text,
        results: results.map(searchResultToJson),
        total_results: results.length,
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/embedding/status/:meetingId', async (req: Request, res: Response) => {
    try {
      const status = await indexBuilder.status(meetingIdParam(req.params.meetingId));
      res.json(statusToJson(status));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
