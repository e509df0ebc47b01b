import type { Logger } from 'pino';

import { ExhaustedRetriesError, NotFoundError, ProviderError, toJobError } from '../errors';
import { serializeError } from '../logger';
import type { LlmProvider, Prompt, ProviderResponse } from '../llm/types';
import type { TextExtractor } from '../pipeline/extract';
import { parseResult } from '../pipeline/parseResult';
import { buildPrompt } from '../pipeline/prompt';
import type { ContextRetriever } from '../pipeline/retrieve';
import type { ContextSnippet } from '../rag/schema';
import { isTerminal, type JobRegistry } from '../store/jobs';
import type { EvaluationResult, Job, JobInput, JobStats, JobTransition } from '../types';
import type { RetryExecutor, RetryPolicy } from '../util/retry';
import { TimeoutError, withTimeout } from '../util/timeout';
import type { WorkerPool } from '../util/workerPool';

export type OrchestratorOptions = {
  topK: number;
  providerTimeoutMs: number;
  providerRetry: RetryPolicy;
  retrievalRetry: RetryPolicy;
};

export type OrchestratorDeps = {
  registry: JobRegistry;
  extractor: TextExtractor;
  retriever: ContextRetriever;
  providers: LlmProvider[];
  retry: RetryExecutor;
  pool: WorkerPool;
  log: Logger;
  options: OrchestratorOptions;
};

/** Raised inside a pipeline when its job was deleted mid-flight. */
class JobDiscardedError extends Error {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} was deleted while processing.`);
    this.name = 'JobDiscardedError';
  }
}

export class EvaluationOrchestrator {
  private readonly registry: JobRegistry;

  private readonly extractor: TextExtractor;

  private readonly retriever: ContextRetriever;

  private readonly providers: LlmProvider[];

  private readonly retry: RetryExecutor;

  private readonly pool: WorkerPool;

  private readonly log: Logger;

  private readonly options: OrchestratorOptions;

  constructor(deps: OrchestratorDeps) {
    if (!deps.providers.length) {
      throw new RangeError('At least one LLM provider is required.');
    }

    this.registry = deps.registry;
    this.extractor = deps.extractor;
    this.retriever = deps.retriever;
    this.providers = deps.providers;
    this.retry = deps.retry;
    this.pool = deps.pool;
    this.log = deps.log;
    this.options = deps.options;
  }

  get providerNames(): string[] {
    return this.providers.map((provider) => provider.name);
  }

  /**
   * Registers a job and schedules its pipeline. Returns as soon as the job is
   * stored; validation failures throw synchronously and no job is created.
   */
  submit(input: JobInput): string {
    const job = this.registry.create(input);

    this.log.info({ jobId: job.id, hasProject: Boolean(job.input.projectFileId) }, 'Evaluation job submitted.');
    this.pool.submit(() => this.process(job.id));

    return job.id;
  }

  getStatus(id: string): Job['status'] {
    return this.registry.get(id).status;
  }

  getResult(id: string): Job {
    return this.registry.get(id);
  }

  find(id: string): Job | undefined {
    return this.registry.find(id);
  }

  list(): Job[] {
    return this.registry.list();
  }

  delete(id: string): boolean {
    const deleted = this.registry.delete(id);

    if (deleted) {
      this.log.info({ jobId: id }, 'Evaluation job deleted.');
    }

    return deleted;
  }

  stats(): JobStats {
    const stats: JobStats = { total: 0, queued: 0, processing: 0, completed: 0, failed: 0 };

    for (const job of this.registry.list()) {
      stats.total += 1;
      stats[job.status] += 1;
    }

    return stats;
  }

  cleanupExpired(maxAgeMs: number, now: Date = new Date()): number {
    const cutoff = now.getTime() - maxAgeMs;
    let removed = 0;

    for (const job of this.registry.list()) {
      if (isTerminal(job.status) && job.updatedAt.getTime() < cutoff && this.registry.delete(job.id)) {
        removed += 1;
      }
    }

    if (removed) {
      this.log.info({ removed }, 'Expired evaluation jobs removed.');
    }

    return removed;
  }

  onIdle(): Promise<void> {
    return this.pool.onIdle();
  }

  private async process(jobId: string): Promise<void> {
    const log = this.log.child({ jobId });

    try {
      this.advance(jobId, { status: 'processing' });
      log.info('Evaluation started.');

      const result = await this.runPipeline(jobId, log);

      this.advance(jobId, { status: 'completed', result });
      log.info({ overallScore: result.cvEvaluation.overall_score }, 'Evaluation completed.');
    } catch (error) {
      if (error instanceof JobDiscardedError) {
        log.info('Job was deleted during processing; result discarded.');
        return;
      }

      const jobError = toJobError(error);
      log.warn({ err: serializeError(error), code: jobError.code }, 'Evaluation failed.');

      try {
        this.advance(jobId, { status: 'failed', error: jobError });
      } catch (transitionError) {
        if (transitionError instanceof JobDiscardedError) {
          log.info('Job was deleted during processing; failure discarded.');
          return;
        }
        throw transitionError;
      }
    }
  }

  private async runPipeline(jobId: string, log: Logger): Promise<EvaluationResult> {
    const { input } = this.registry.get(jobId);

    const cvText = await this.extractor.extract(input.cvFileId);
    const projectText = input.projectFileId ? await this.extractor.extract(input.projectFileId) : undefined;
    this.ensureExists(jobId);

    const context = await this.retrieveContext(input.jobRequirements, log);
    this.ensureExists(jobId);

    const prompt = buildPrompt({ cvText, projectText, requirements: input.jobRequirements, context });
    const response = await this.callProviders(prompt, log);
    this.ensureExists(jobId);

    return parseResult(response, { projectSubmitted: projectText !== undefined });
  }

  private async retrieveContext(query: string, log: Logger): Promise<ContextSnippet[]> {
    try {
      return await this.retry.execute(
        () => this.retriever.retrieve(query, this.options.topK),
        this.options.retrievalRetry,
        {
          onRetry: (error, attempt, delayMs) =>
            log.warn({ err: serializeError(error), attempt, delayMs }, 'Context retrieval failed; retrying.'),
        },
      );
    } catch (error) {
      log.warn({ err: serializeError(error) }, 'Context retrieval unavailable; continuing without context.');
      return [];
    }
  }

  private async callProviders(prompt: Prompt, log: Logger): Promise<ProviderResponse> {
    let lastError: unknown;

    for (const provider of this.providers) {
      try {
        return await this.retry.execute(
          () => this.callWithTimeout(provider, prompt),
          this.options.providerRetry,
          {
            onRetry: (error, attempt, delayMs) =>
              log.warn(
                { err: serializeError(error), provider: provider.name, attempt, delayMs },
                'Provider call failed; retrying.',
              ),
          },
        );
      } catch (error) {
        if (!(error instanceof ExhaustedRetriesError)) {
          throw error;
        }

        lastError = error;
        log.warn({ provider: provider.name, attempts: error.attempts }, 'Provider exhausted; trying next provider.');
      }
    }

    throw lastError;
  }

  private async callWithTimeout(provider: LlmProvider, prompt: Prompt): Promise<ProviderResponse> {
    try {
      return await withTimeout((signal) => provider.evaluate(prompt, { signal }), this.options.providerTimeoutMs);
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new ProviderError(provider.name, 'transient', `${provider.name} call timed out.`, { cause: error });
      }
      throw error;
    }
  }

  private ensureExists(jobId: string): void {
    if (!this.registry.has(jobId)) {
      throw new JobDiscardedError(jobId);
    }
  }

  private advance(jobId: string, change: JobTransition): Job {
    try {
      return this.registry.transition(jobId, change);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new JobDiscardedError(jobId);
      }
      throw error;
    }
  }
}
