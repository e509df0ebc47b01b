import 'dotenv/config';

import { createApp } from './app';
import { type AppConfig, loadConfig } from './config';
import { createProviderChain } from './llm/providers';
import { logger, loggers, serializeError } from './logger';
import { FileTextExtractor } from './pipeline/extract';
import { ContextRetriever } from './pipeline/retrieve';
import { ChromaContextStore } from './rag/client';
import { InMemoryContextStore, loadSeedChunks } from './rag/memoryStore';
import type { ContextStore } from './rag/schema';
import { EvaluationOrchestrator } from './services/orchestrator';
import { FileStore } from './store/files';
import { JobRegistry } from './store/jobs';
import { RetryExecutor } from './util/retry';
import { WorkerPool } from './util/workerPool';

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

const createContextStore = async ({ context }: AppConfig): Promise<ContextStore> => {
  if (context.store === 'chroma') {
    return new ChromaContextStore(context.chroma);
  }

  try {
    const chunks = await loadSeedChunks(context.seedPath);
    loggers.rag.info({ chunks: chunks.length, seedPath: context.seedPath }, 'In-memory context store seeded.');
    return new InMemoryContextStore(chunks);
  } catch (error) {
    loggers.rag.warn({ err: serializeError(error) }, 'Context seed unavailable; starting with an empty store.');
    return new InMemoryContextStore();
  }
};

const main = async (): Promise<void> => {
  const config = loadConfig();
  logger.level = config.server.logLevel;

  const fileStore = new FileStore(config.files.dataDir, loggers.files);
  const retriever = new ContextRetriever(await createContextStore(config));
  const providers = createProviderChain(config.llm);
  const pool = new WorkerPool(config.jobs.concurrency, loggers.jobs);

  loggers.llm.info({ providers: config.llm.providers, timeoutMs: config.llm.timeoutMs }, 'LLM provider chain resolved.');

  const orchestrator = new EvaluationOrchestrator({
    registry: new JobRegistry(),
    extractor: new FileTextExtractor(fileStore),
    retriever,
    providers,
    retry: new RetryExecutor(),
    pool,
    log: loggers.jobs,
    options: {
      topK: config.context.topK,
      providerTimeoutMs: config.llm.timeoutMs,
      providerRetry: config.llm.retry,
      retrievalRetry: config.context.retry,
    },
  });

  const app = createApp({
    orchestrator,
    contextStore: retriever.storeKind,
    fileStore,
    maxUploadBytes: config.files.maxUploadBytes,
    exposeErrors: config.server.isDevelopment,
  });

  const server = app.listen(config.server.port, () => {
    logger.info(
      { port: config.server.port, contextStore: retriever.storeKind },
      `Server listening on port ${config.server.port}`,
    );
  });

  const cleanupTimer = setInterval(() => {
    orchestrator.cleanupExpired(config.jobs.retentionMs);
  }, CLEANUP_INTERVAL_MS);
  cleanupTimer.unref();

  let shuttingDown = false;

  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    logger.info({ signal, pendingJobs: pool.pending, activeJobs: pool.active }, 'Shutting down.');
    clearInterval(cleanupTimer);

    server.close((error) => {
      if (error) {
        logger.error({ err: serializeError(error) }, 'HTTP server did not close cleanly.');
      }
    });

    void orchestrator
      .onIdle()
      .then(() => {
        logger.info('All evaluation jobs drained.');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error({ err: serializeError(error) }, 'Failed to drain evaluation jobs.');
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
};

main().catch((error: unknown) => {
  logger.fatal({ err: serializeError(error) }, 'Server failed to start.');
  process.exitCode = 1;
});
