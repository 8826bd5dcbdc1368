import express, { type Express, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import type { IndexBuilder } from '../../domain/services/IndexBuilder';
import type { Retriever } from '../../domain/services/Retriever';
import type { AnswerComposer } from '../../domain/services/AnswerComposer';
import { createEmbeddingRoutes } from './routes/embeddingRoutes';
import { createQueryRoutes } from './routes/queryRoutes';
import { createMeetingRoutes, type MeetingUseCases } from './routes/meetingRoutes';
import { bodyParserErrorHandler, fallbackErrorHandler } from './errors';
import { log } from '../../utils/logger';

export const API_PREFIX = '/api/v1';

export interface ApiDependencies {
  indexBuilder: IndexBuilder;
  retriever: Retriever;
  answerComposer: AnswerComposer;
  meetings: MeetingUseCases;
  maxUploadMb: number;
}

export function createApp(deps: ApiDependencies): Express {
  const app = express();

  // Upload route parses its own raw body, so JSON parsing is limited to JSON requests
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.use(API_PREFIX, createMeetingRoutes(deps.meetings, deps.maxUploadMb));
  app.use(API_PREFIX, createEmbeddingRoutes(deps.indexBuilder, deps.retriever));
  app.use(API_PREFIX, createQueryRoutes(deps.answerComposer));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });
  app.use(bodyParserErrorHandler);
  app.use(fallbackErrorHandler);

  return app;
}

export class ApiServer {
  private server: Server | null = null;

  constructor(
    private app: Express,
    private port: number
  ) {}

  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        log('info', `API server running on http://localhost:${this.port}${API_PREFIX}`);
        resolve();
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    this.server = null;
    log('info', 'API server stopped');
  }
}
