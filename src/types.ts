import type { JobError } from './errors';

export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed';

export type TerminalStatus = Extract<JobStatus, 'completed' | 'failed'>;

export interface JobInput {
  cvFileId: string;
  projectFileId?: string;
  jobRequirements: string;
}

export interface CvEvaluation {
  technical_skills_score: number;
  experience_score: number;
  education_score: number;
  overall_score: number;
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
}

export interface ProjectEvaluation {
  technical_implementation_score: number;
  code_quality_score: number;
  documentation_score: number;
  innovation_score: number;
  overall_score: number;
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
}

export interface EvaluationResult {
  cvEvaluation: CvEvaluation;
  projectEvaluation?: ProjectEvaluation;
  overallSummary: string;
  finalRecommendation: string;
}

type JobBase = {
  readonly id: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly input: Readonly<JobInput>;
};

export type Job =
  | (JobBase & { readonly status: 'queued' | 'processing' })
  | (JobBase & { readonly status: 'completed'; readonly result: EvaluationResult })
  | (JobBase & { readonly status: 'failed'; readonly error: JobError });

export type JobTransition =
  | { status: 'processing' }
  | { status: 'completed'; result: EvaluationResult }
  | { status: 'failed'; error: JobError };

export interface JobStats {
  total: number;
  queued: number;
  processing: number;
  completed: number;
  failed: number;
}

export interface SubmitResponse {
  job_id: string;
  status: 'processing';
}

export interface ResultResponse {
  job_id: string;
  status: JobStatus;
  created_at: string;
  updated_at: string;
  result?: EvaluationResult;
  error?: JobError;
}

export interface StatsResponse {
  total_jobs: number;
  completed_jobs: number;
  failed_jobs: number;
  pending_jobs: number;
  status_breakdown: Record<JobStatus, number>;
}

export interface UploadedFile {
  id: string;
  name: string;
  kind: 'cv' | 'project_report';
}

export interface UploadResponse {
  files: UploadedFile[];
}
