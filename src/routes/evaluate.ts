import { Router } from 'express';
import { z } from 'zod';

import { ValidationError } from '../errors';
import type { EvaluationOrchestrator } from '../services/orchestrator';
import type { StatsResponse, SubmitResponse } from '../types';

const evaluateSchema = z.object({
  cv_file_id: z.string().trim().min(1, 'cv_file_id is required'),
  project_file_id: z.string().trim().min(1, 'project_file_id must not be empty').nullish(),
  job_requirements: z.string().trim().min(1, 'job_requirements is required'),
});

export const createEvaluateRouter = (orchestrator: EvaluationOrchestrator): Router => {
  const router = Router();

  router.post('/', (req, res, next) => {
    const validation = evaluateSchema.safeParse(req.body ?? {});

    if (!validation.success) {
      const issues = validation.error.issues.map((issue) => ({
        path: issue.path.join('.') || undefined,
        message: issue.message,
      }));

      next(new ValidationError('Invalid evaluation request.', issues));
      return;
    }

    const { cv_file_id, project_file_id, job_requirements } = validation.data;

    try {
      const jobId = orchestrator.submit({
        cvFileId: cv_file_id,
        jobRequirements: job_requirements,
        ...(project_file_id != null && { projectFileId: project_file_id }),
      });

      const body: SubmitResponse = { job_id: jobId, status: 'processing' };
      res.status(202).json(body);
    } catch (error) {
      next(error);
    }
  });

  router.get('/stats', (_req, res) => {
    const stats = orchestrator.stats();

    const body: StatsResponse = {
      total_jobs: stats.total,
      completed_jobs: stats.completed,
      failed_jobs: stats.failed,
      pending_jobs: stats.queued + stats.processing,
      status_breakdown: {
        queued: stats.queued,
        processing: stats.processing,
        completed: stats.completed,
        failed: stats.failed,
      },
    };

    res.json(body);
  });

  return router;
};
