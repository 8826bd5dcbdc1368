import express, { Router, type Request, type Response } from 'express';
import type { UploadAudioUseCase } from '../../../application/usecases/UploadAudio';
import type { TranscribeMeetingUseCase } from '../../../application/usecases/TranscribeMeeting';
import type { SummarizeMeetingUseCase } from '../../../application/usecases/SummarizeMeeting';
import type { ProcessMeetingUseCase } from '../../../application/usecases/ProcessMeeting';
import type { GenerateInsightsUseCase } from '../../../application/usecases/GenerateInsights';
import type {
  PipelineStatusOutput,
  PipelineStatusUseCase,
} from '../../../application/usecases/PipelineStatus';
import { assertMeetingId } from '../../../domain/entities/Meeting';
import { meetingInsightsToJson, meetingSummaryToJson, transcriptToJson } from '../../schemas';
import { meetingIdParam, meetingRequestSchema, parseBody } from '../requests';
import { sendError } from '../errors';
import { buildResultToJson } from './embeddingRoutes';

export interface MeetingUseCases {
  upload: UploadAudioUseCase;
  transcribe: TranscribeMeetingUseCase;
  summarize: SummarizeMeetingUseCase;
  process: ProcessMeetingUseCase;
  insights: GenerateInsightsUseCase;
  pipelineStatus: PipelineStatusUseCase;
}

function pipelineStatusToJson(output: PipelineStatusOutput) {
  const progress: Record<string, { status: 'completed'; data?: Record<string, string | number> }> = {};

  if (output.stepsCompleted.includes('upload')) {
    progress.upload = { status: 'completed' };
  }
  if (output.transcript) {
    progress.transcribe = {
      status: 'completed',
      data: { created_at: output.transcript.createdAt, transcript_length: output.transcript.transcriptLength },
    };
  }
  if (output.summary) {
    progress.summarize = {
      status: 'completed',
      data: { created_at: output.summary.createdAt, summary_length: output.summary.summaryLength },
    };
  }
  if (output.embedding) {
    progress.embed = {
      status: 'completed',
      data: {
        created_at: output.embedding.createdAt,
        num_chunks: output.embedding.numChunks,
        embedding_model: output.embedding.embeddingModel,
      },
    };
  }
  if (output.insights) {
    progress.insights = {
      status: 'completed',
      data: { created_at: output.insights.createdAt, important_moments: output.insights.importantMoments },
    };
  }

  return {
    meeting_id: output.meetingId,
    status: output.status,
    steps_completed: output.stepsCompleted,
    progress,
  };
}

function uploadFilename(req: Request): string {
  const fromQuery = req.query.filename;
  if (typeof fromQuery === 'string' && fromQuery) {
    return fromQuery;
  }
  return req.header('x-filename') ?? 'audio';
}

export function createMeetingRoutes(useCases: MeetingUseCases, maxUploadMb: number): Router {
  const router = Router();

  router.post(
    '/upload',
    express.raw({ type: () => true, limit: `${maxUploadMb}mb` }),
    async (req: Request, res: Response) => {
      try {
        const content: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
        const result = await useCases.upload.execute({
          filename: uploadFilename(req),
          contentType: req.header('content-type'),
          content,
        });
        res.json({ meeting_id: result.meetingId, filename: result.filename });
      } catch (error) {
        sendError(res, error);
      }
    }
  );

  router.post('/transcribe', async (req: Request, res: Response) => {
    try {
      const body = parseBody(meetingRequestSchema, req.body);
      const transcript = await useCases.transcribe.execute(assertMeetingId(body.meeting_id));
      res.json(transcriptToJson(transcript));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/summarize', async (req: Request, res: Response) => {
    try {
      const body = parseBody(meetingRequestSchema, req.body);
      const summary = await useCases.summarize.execute(assertMeetingId(body.meeting_id));
      res.json(meetingSummaryToJson(summary));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/summarize/:meetingId', async (req: Request, res: Response) => {
    try {
      const summary = await useCases.summarize.get(meetingIdParam(req.params.meetingId));
      res.json(meetingSummaryToJson(summary));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/pipeline/process', async (req: Request, res: Response) => {
    try {
      const body = parseBody(meetingRequestSchema, req.body);
      const result = await useCases.process.execute(assertMeetingId(body.meeting_id));
      res.json({
        meeting_id: result.meetingId,
        status: result.status,
        steps_completed: result.stepsCompleted,
        transcript: transcriptToJson(result.transcript),
        summary: meetingSummaryToJson(result.summary),
        embedding: buildResultToJson(result.embedding),
        insights: meetingInsightsToJson(result.insights),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/pipeline/status/:meetingId', async (req: Request, res: Response) => {
    try {
      const status = await useCases.pipelineStatus.execute(meetingIdParam(req.params.meetingId));
      res.json(pipelineStatusToJson(status));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/insights', async (req: Request, res: Response) => {
    try {
      const body = parseBody(meetingRequestSchema, req.body);
      const insights = await useCases.insights.execute(assertMeetingId(body.meeting_id));
      res.json(meetingInsightsToJson(insights));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/insights/:meetingId', async (req: Request, res: Response) => {
    try {
      const insights = await useCases.insights.get(meetingIdParam(req.params.meetingId));
      res.json(meetingInsightsToJson(insights));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
