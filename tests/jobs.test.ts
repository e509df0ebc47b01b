import { describe, expect, it } from 'vitest';

import { InvalidTransitionError, NotFoundError, ValidationError } from '../src/errors';
import { isTerminal, JobRegistry } from '../src/store/jobs';
import type { EvaluationResult } from '../src/types';

const result: EvaluationResult = {
  cvEvaluation: {
    technical_skills_score: 80,
    experience_score: 70,
    education_score: 60,
    overall_score: 73,
    strengths: ['Strong backend background'],
    weaknesses: [],
    recommendations: [],
  },
  overallSummary: 'Solid candidate.',
  finalRecommendation: 'Advance.',
};

const createRegistry = () => {
  let counter = 0;
  let clock = Date.parse('2024-01-01T00:00:00.000Z');

  const registry = new JobRegistry({
    generateId: () => {
      counter += 1;
      return `job-${counter}`;
    },
    now: () => new Date(clock),
  });

  return {
    registry,
    tick: (ms: number) => {
      clock += ms;
    },
  };
};

const input = { cvFileId: 'cv-1', jobRequirements: 'Senior TypeScript engineer' };

describe('JobRegistry', () => {
  it('creates queued jobs with trimmed input', () => {
    const { registry } = createRegistry();

    const job = registry.create({ cvFileId: '  cv-1 ', jobRequirements: ' Node.js ', projectFileId: ' pr-1 ' });

    expect(job).toMatchObject({
      id: 'job-1',
      status: 'queued',
      input: { cvFileId: 'cv-1', jobRequirements: 'Node.js', projectFileId: 'pr-1' },
    });
    expect(job.createdAt.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(job.updatedAt.getTime()).toBe(job.createdAt.getTime());
  });

  it('rejects empty required input without creating a job', () => {
    const { registry } = createRegistry();

    expect(() => registry.create({ cvFileId: ' ', jobRequirements: '' })).toThrow(ValidationError);
    expect(registry.size).toBe(0);
  });

  it('reports every invalid field', () => {
    const { registry } = createRegistry();

    try {
      registry.create({ cvFileId: '', jobRequirements: 'x', projectFileId: '' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toHaveProperty('issues', [
        { path: 'cvFileId', message: 'cvFileId is required' },
        { path: 'projectFileId', message: 'projectFileId must not be empty when provided' },
      ]);
    }
  });

  it('returns copies that cannot mutate the stored job', () => {
    const { registry } = createRegistry();
    const job = registry.create(input);

    Object.assign(job.input, { cvFileId: 'tampered' });

    expect(registry.get('job-1').input.cvFileId).toBe('cv-1');
  });

  it('lists jobs in insertion order', () => {
    const { registry } = createRegistry();
    registry.create(input);
    registry.create(input);
    registry.create(input);

    expect(registry.list().map((job) => job.id)).toEqual(['job-1', 'job-2', 'job-3']);
  });

  it('throws NotFoundError for unknown ids and find returns undefined', () => {
    const { registry } = createRegistry();

    expect(() => registry.get('missing')).toThrow(NotFoundError);
    expect(registry.find('missing')).toBeUndefined();
  });

  it('moves forward through the lifecycle and refreshes updatedAt', () => {
    const { registry, tick } = createRegistry();
    registry.create(input);

    tick(1000);
    const processing = registry.transition('job-1', { status: 'processing' });
    tick(1000);
    const completed = registry.transition('job-1', { status: 'completed', result });

    expect(processing.status).toBe('processing');
    expect(processing.updatedAt.toISOString()).toBe('2024-01-01T00:00:01.000Z');
    expect(completed).toMatchObject({ status: 'completed', result });
    expect(completed.updatedAt.toISOString()).toBe('2024-01-01T00:00:02.000Z');
    expect(completed.createdAt.toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  it('allows failing a queued job directly', () => {
    const { registry } = createRegistry();
    registry.create(input);

    const failed = registry.transition('job-1', {
      status: 'failed',
      error: { code: 'InternalError', message: 'boom' },
    });

    expect(failed).toMatchObject({ status: 'failed', error: { code: 'InternalError', message: 'boom' } });
  });

  it('rejects repeated and backward transitions', () => {
    const { registry } = createRegistry();
    registry.create(input);
    registry.transition('job-1', { status: 'processing' });

    expect(() => registry.transition('job-1', { status: 'processing' })).toThrow(InvalidTransitionError);
  });

  it('never leaves a terminal state', () => {
    const { registry } = createRegistry();
    registry.create(input);
    registry.transition('job-1', { status: 'completed', result });

    expect(() =>
      registry.transition('job-1', { status: 'failed', error: { code: 'InternalError', message: 'late' } }),
    ).toThrow(InvalidTransitionError);
    expect(registry.get('job-1').status).toBe('completed');
  });

  it('throws NotFoundError when transitioning a deleted job', () => {
    const { registry } = createRegistry();
    registry.create(input);
    registry.delete('job-1');

    expect(() => registry.transition('job-1', { status: 'processing' })).toThrow(NotFoundError);
  });

  it('deletes idempotently', () => {
    const { registry } = createRegistry();
    registry.create(input);

    expect(registry.delete('job-1')).toBe(true);
    expect(registry.delete('job-1')).toBe(false);
    expect(registry.has('job-1')).toBe(false);
  });

  it('never reuses an id', () => {
    const registry = new JobRegistry({ generateId: () => 'fixed' });
    registry.create(input);

    expect(() => registry.create(input)).toThrow(InvalidTransitionError);
  });
});

describe('isTerminal', () => {
  it('matches completed and failed only', () => {
    expect(isTerminal('queued')).toBe(false);
    expect(isTerminal('processing')).toBe(false);
    expect(isTerminal('completed')).toBe(true);
    expect(isTerminal('failed')).toBe(true);
  });
});
