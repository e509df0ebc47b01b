import express, { type Application } from 'express';
import type { Logger } from 'pino';

import { loggers } from './logger';
import { createErrorHandler } from './middleware/errorHandler';
import { createRequestLogger } from './middleware/requestLogger';
import { createEvaluateRouter } from './routes/evaluate';
import { createListResultsHandler, createResultRouter } from './routes/result';
import { createUploadRouter } from './routes/upload';
import type { EvaluationOrchestrator } from './services/orchestrator';
import type { FileStore } from './store/files';

export type AppDeps = {
  orchestrator: EvaluationOrchestrator;
  contextStore: string;
  fileStore?: FileStore;
  maxUploadBytes?: number;
  exposeErrors?: boolean;
  log?: Logger;
};

export const createApp = ({
  orchestrator,
  contextStore,
  fileStore,
  maxUploadBytes = 10 * 1024 * 1024,
  exposeErrors = false,
  log = loggers.http,
}: AppDeps): Application => {
  const app = express();

  app.use(createRequestLogger(log));
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      provider: orchestrator.providerNames[0],
      context_store: contextStore,
    });
  });

  if (fileStore) {
    app.use('/upload', createUploadRouter({ fileStore, maxUploadBytes }));
  }

  app.use('/evaluate', createEvaluateRouter(orchestrator));
  app.use('/result', createResultRouter(orchestrator));
  app.get('/results', createListResultsHandler(orchestrator));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(createErrorHandler({ log, exposeErrors }));

  return app;
};
