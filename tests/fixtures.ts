import pino from 'pino';
import { vi } from 'vitest';

import { ExtractionError, ProviderError } from '../src/errors';
import { MockProvider } from '../src/llm/providers/mock';
import type { LlmProvider, Prompt, ProviderName } from '../src/llm/types';
import type { TextExtractor } from '../src/pipeline/extract';
import { ContextRetriever } from '../src/pipeline/retrieve';
import { InMemoryContextStore } from '../src/rag/memoryStore';
import type { ContextStore } from '../src/rag/schema';
import { EvaluationOrchestrator, type OrchestratorOptions } from '../src/services/orchestrator';
import { JobRegistry } from '../src/store/jobs';
import { RetryExecutor } from '../src/util/retry';
import { WorkerPool } from '../src/util/workerPool';

export const silentLogger = pino({ level: 'silent' });

export class FakeExtractor implements TextExtractor {
  constructor(private readonly texts: Record<string, string>) {}

  async extract(fileId: string): Promise<string> {
    const text = this.texts[fileId];

    if (text === undefined) {
      throw new ExtractionError(`File ${fileId} could not be found.`, { fileId });
    }

    return text;
  }
}

export const transientFailure = () => new ProviderError('openai', 'transient', 'rate limited', { status: 429 });

export const permanentFailure = () => new ProviderError('openai', 'permanent', 'invalid api key', { status: 401 });

const mock = new MockProvider();

/** A provider whose behaviour each test scripts through `evaluate`; defaults to the mock's answer. */
export const scriptedProvider = (name: ProviderName = 'openai') => {
  const evaluate = vi.fn<LlmProvider['evaluate']>((prompt: Prompt) => mock.evaluate(prompt));
  const provider: LlmProvider = { name, evaluate };
  return { provider, evaluate };
};

export const deferred = () => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

export const nextTick = () => new Promise<void>((resolve) => setImmediate(resolve));

export const seedStore = () =>
  new InMemoryContextStore([
    {
      id: 'job_description_backend_1',
      namespace: 'job_description',
      content: 'Senior Python engineer building backend services and APIs',
    },
    { id: 'cv_rubric_1', namespace: 'cv_rubric', content: 'Score Python experience and backend depth' },
  ]);

export type HarnessOptions = {
  providers?: LlmProvider[];
  store?: ContextStore;
  texts?: Record<string, string>;
  options?: Partial<OrchestratorOptions>;
  now?: () => Date;
};

export const createHarness = ({
  providers = [new MockProvider()],
  store = seedStore(),
  texts = { abc: 'Python engineer with Django and PostgreSQL', report: 'Built a Python evaluation service' },
  options = {},
  now,
}: HarnessOptions = {}) => {
  const registry = new JobRegistry(now ? { now } : {});
  const pool = new WorkerPool(2, silentLogger);
  const sleep = vi.fn(async (_ms: number) => undefined);

  const orchestrator = new EvaluationOrchestrator({
    registry,
    extractor: new FakeExtractor(texts),
    retriever: new ContextRetriever(store),
    providers,
    retry: new RetryExecutor({ sleep, random: () => 0.5 }),
    pool,
    log: silentLogger,
    options: {
      topK: 3,
      providerTimeoutMs: 1_000,
      providerRetry: { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100, jitter: 0 },
      retrievalRetry: { maxAttempts: 2, baseDelayMs: 10, maxDelayMs: 100, jitter: 0 },
      ...options,
    },
  });

  return { orchestrator, registry, pool, sleep };
};
