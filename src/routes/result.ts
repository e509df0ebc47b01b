import { type RequestHandler, Router } from 'express';

import type { EvaluationOrchestrator } from '../services/orchestrator';
import type { Job, ResultResponse } from '../types';

export const toResultResponse = (job: Job): ResultResponse => {
  const base = {
    job_id: job.id,
    status: job.status,
    created_at: job.createdAt.toISOString(),
    updated_at: job.updatedAt.toISOString(),
  };

  if (job.status === 'completed') {
    return { ...base, result: job.result };
  }

  if (job.status === 'failed') {
    return { ...base, error: job.error };
  }

  return base;
};

/** Lists every job in insertion order; served at both `/result` and `/results`. */
export const createListResultsHandler =
  (orchestrator: EvaluationOrchestrator): RequestHandler =>
  (_req, res) => {
    const results = orchestrator.list().map(toResultResponse);
    res.json({ total: results.length, results });
  };

export const createResultRouter = (orchestrator: EvaluationOrchestrator): Router => {
  const router = Router();

  router.get('/', createListResultsHandler(orchestrator));

  router.get('/:id', (req, res) => {
    const job = orchestrator.find(req.params.id);

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    res.json(toResultResponse(job));
  });

  router.delete('/:id', (req, res) => {
    res.json({ deleted: orchestrator.delete(req.params.id) });
  });

  return router;
};
