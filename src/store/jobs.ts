import { v4 as uuidv4 } from 'uuid';

import { InvalidTransitionError, NotFoundError, ValidationError, type ValidationIssue } from '../errors';
import type { Job, JobInput, JobStatus, JobTransition, TerminalStatus } from '../types';

const STATUS_RANK: Record<JobStatus, number> = {
  queued: 0,
  processing: 1,
  completed: 2,
  failed: 2,
};

export const isTerminal = (status: JobStatus): status is TerminalStatus => status === 'completed' || status === 'failed';

export type JobRegistryOptions = {
  now?: () => Date;
  generateId?: () => string;
};

const validateInput = (input: JobInput): ValidationIssue[] => {
  const issues: ValidationIssue[] = [];

  if (!input.cvFileId?.trim()) {
    issues.push({ path: 'cvFileId', message: 'cvFileId is required' });
  }

  if (!input.jobRequirements?.trim()) {
    issues.push({ path: 'jobRequirements', message: 'jobRequirements is required' });
  }

  if (input.projectFileId !== undefined && !input.projectFileId.trim()) {
    issues.push({ path: 'projectFileId', message: 'projectFileId must not be empty when provided' });
  }

  return issues;
};

const applyTransition = (existing: Job, change: JobTransition, updatedAt: Date): Job => {
  const base = {
    id: existing.id,
    createdAt: existing.createdAt,
    updatedAt,
    input: existing.input,
  };

  switch (change.status) {
    case 'processing':
      return { ...base, status: 'processing' };
    case 'completed':
      return { ...base, status: 'completed', result: structuredClone(change.result) };
    case 'failed':
      return { ...base, status: 'failed', error: { ...change.error } };
  }
};

/**
 * In-memory owner of every job. Entries are replaced wholesale on each
 * mutation and callers only ever receive deep copies, so a reader can never
 * observe a partially applied transition.
 */
export class JobRegistry {
  private readonly jobsById = new Map<string, Job>();

  private readonly now: () => Date;

  private readonly generateId: () => string;

  constructor({ now = () => new Date(), generateId = uuidv4 }: JobRegistryOptions = {}) {
    this.now = now;
    this.generateId = generateId;
  }

  create(input: JobInput): Job {
    const issues = validateInput(input);

    if (issues.length) {
      throw new ValidationError('Invalid evaluation input.', issues);
    }

    const id = this.generateId();

    if (this.jobsById.has(id)) {
      throw new InvalidTransitionError(`Job id ${id} is already in use.`, { id });
    }

    const timestamp = this.now();
    const job: Job = {
      id,
      status: 'queued',
      createdAt: timestamp,
      updatedAt: timestamp,
      input: {
        cvFileId: input.cvFileId.trim(),
        jobRequirements: input.jobRequirements.trim(),
        ...(input.projectFileId !== undefined && { projectFileId: input.projectFileId.trim() }),
      },
    };

    this.jobsById.set(id, job);

    return structuredClone(job);
  }

  find(id: string): Job | undefined {
    const job = this.jobsById.get(id);
    return job ? structuredClone(job) : undefined;
  }

  get(id: string): Job {
    const job = this.find(id);

    if (!job) {
      throw new NotFoundError(`Job ${id} not found.`, { id });
    }

    return job;
  }

  has(id: string): boolean {
    return this.jobsById.has(id);
  }

  list(): Job[] {
    return Array.from(this.jobsById.values(), (job) => structuredClone(job));
  }

  get size(): number {
    return this.jobsById.size;
  }

  transition(id: string, change: JobTransition): Job {
    const existing = this.jobsById.get(id);

    if (!existing) {
      throw new NotFoundError(`Job ${id} not found.`, { id });
    }

    if (isTerminal(existing.status)) {
      throw new InvalidTransitionError(`Job ${id} is already ${existing.status}.`, {
        id,
        from: existing.status,
        to: change.status,
      });
    }

    if (STATUS_RANK[change.status] <= STATUS_RANK[existing.status]) {
      throw new InvalidTransitionError(`Job ${id} cannot move from ${existing.status} to ${change.status}.`, {
        id,
        from: existing.status,
        to: change.status,
      });
    }

    const updated = applyTransition(existing, change, this.now());

    this.jobsById.set(id, updated);

    return structuredClone(updated);
  }

  delete(id: string): boolean {
    return this.jobsById.delete(id);
  }
}
