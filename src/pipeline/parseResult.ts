import { z } from 'zod';

import { MalformedResponseError } from '../errors';
import type { ProviderResponse } from '../llm/types';
import type { EvaluationResult } from '../types';

const score = z.number().finite().min(0, 'must be between 0 and 100').max(100, 'must be between 0 and 100');

const notes = z.array(z.string()).default([]);

const cvEvaluationSchema = z.object({
  technical_skills_score: score,
  experience_score: score,
  education_score: score,
  overall_score: score,
  strengths: notes,
  weaknesses: notes,
  recommendations: notes,
});

const projectEvaluationSchema = z.object({
  technical_implementation_score: score,
  code_quality_score: score,
  documentation_score: score,
  innovation_score: score,
  overall_score: score,
  strengths: notes,
  weaknesses: notes,
  recommendations: notes,
});

const baseSchema = z.object({
  cv_evaluation: cvEvaluationSchema,
  overall_summary: z.string().min(1),
  final_recommendation: z.string().min(1),
});

const withProjectSchema = baseSchema.extend({
  project_evaluation: projectEvaluationSchema,
});

export type ParseResultOptions = {
  projectSubmitted: boolean;
};

export const extractJsonObject = (content: string): unknown => {
  const unfenced = content.replace(/^\s*```(?:json)?\s*/i, '').replace(/\s*```\s*$/, '');
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');

  if (start === -1 || end <= start) {
    throw new MalformedResponseError('Provider response did not contain a JSON object.');
  }

  try {
    return JSON.parse(unfenced.slice(start, end + 1));
  } catch (error) {
    throw new MalformedResponseError(
      `Failed to parse provider JSON response: ${error instanceof Error ? error.message : 'Unknown error'}`,
    );
  }
};

const describeIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

const validate = <S extends z.ZodTypeAny>(schema: S, payload: unknown, provider: string): z.output<S> => {
  const parsed = schema.safeParse(payload);

  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    throw new MalformedResponseError(`Provider response failed validation: ${issues.join('; ')}`, {
      provider,
      issues,
    });
  }

  return parsed.data;
};

/**
 * Validates a provider payload into an evaluation result. Missing or
 * out-of-range scores are rejected, never clamped. Project scores are only
 * required (and only kept) when a project report was submitted.
 */
export const parseResult = (response: ProviderResponse, { projectSubmitted }: ParseResultOptions): EvaluationResult => {
  const payload = extractJsonObject(response.content);

  if (projectSubmitted) {
    const data = validate(withProjectSchema, payload, response.provider);

    return {
      cvEvaluation: data.cv_evaluation,
      projectEvaluation: data.project_evaluation,
      overallSummary: data.overall_summary,
      finalRecommendation: data.final_recommendation,
    };
  }

  const data = validate(baseSchema, payload, response.provider);

  return {
    cvEvaluation: data.cv_evaluation,
    overallSummary: data.overall_summary,
    finalRecommendation: data.final_recommendation,
  };
};
