import type { Logger } from 'pino';

export type Task = () => Promise<void>;

/**
 * Runs submitted tasks with at most `concurrency` in flight. Submission only
 * enqueues; tasks start on a later tick so callers never run task code inline.
 */
export class WorkerPool {
  private readonly queue: Task[] = [];

  private running = 0;

  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly concurrency: number,
    private readonly log: Logger,
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Worker pool concurrency must be a positive integer, got ${concurrency}.`);
    }
  }

  get active(): number {
    return this.running;
  }

  get pending(): number {
    return this.queue.length;
  }

  submit(task: Task): void {
    this.queue.push(task);
    setImmediate(() => this.drain());
  }

  onIdle(): Promise<void> {
    if (this.running === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private drain(): void {
    while (this.running < this.concurrency && this.queue.length > 0) {
      const task = this.queue.shift();

      if (!task) {
        break;
      }

      this.running += 1;
      void this.run(task)
        .catch((error: unknown) => {
          this.log.error({ err: error }, 'Background task rejected.');
        })
        .finally(() => {
          this.running -= 1;
          this.drain();
          this.notifyIdle();
        });
    }
  }

  private async run(task: Task): Promise<void> {
    await task();
  }

  private notifyIdle(): void {
    if (this.running > 0 || this.queue.length > 0) {
      return;
    }

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
