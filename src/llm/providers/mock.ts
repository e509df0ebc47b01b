import { tokenizeTerms } from '../../rag/memoryStore';
import type { LlmProvider, Prompt, ProviderResponse } from '../types';

export const MOCK_MODEL = 'mock-evaluator-v1';

const clampScore = (value: number): number => Math.min(100, Math.max(0, Math.round(value)));

export const requirementCoverage = (requirements: string, text: string): number => {
  const wanted = new Set(tokenizeTerms(requirements));

  if (!wanted.size) {
    return 0;
  }

  const present = new Set(tokenizeTerms(text));
  let matched = 0;

  wanted.forEach((term) => {
    if (present.has(term)) {
      matched += 1;
    }
  });

  return matched / wanted.size;
};

const buildCvEvaluation = (coverage: number, contextCount: number) => {
  const technical = clampScore(45 + coverage * 50);
  const experience = clampScore(50 + coverage * 35);
  const education = clampScore(60 + Math.min(contextCount, 5) * 2);
  const overall = clampScore((technical * 2 + experience + education) / 4);

  return {
    technical_skills_score: technical,
    experience_score: experience,
    education_score: education,
    overall_score: overall,
    strengths: coverage >= 0.5
      ? ['Covers most of the stated technical requirements.']
      : ['Shows a foundation that can be built on.'],
    weaknesses: coverage >= 0.5
      ? ['Depth of production experience is not fully evidenced.']
      : ['Several stated requirements are not reflected in the CV.'],
    recommendations: ['Probe hands-on experience with the core stack in an interview.'],
  };
};

const buildProjectEvaluation = (projectText: string, coverage: number) => {
  const lengthFactor = Math.min(1, tokenizeTerms(projectText).length / 400);
  const implementation = clampScore(50 + coverage * 40);
  const quality = clampScore(55 + lengthFactor * 25);
  const documentation = clampScore(50 + lengthFactor * 35);
  const innovation = clampScore(45 + coverage * 20);
  const overall = clampScore((implementation + quality + documentation + innovation) / 4);

  return {
    technical_implementation_score: implementation,
    code_quality_score: quality,
    documentation_score: documentation,
    innovation_score: innovation,
    overall_score: overall,
    strengths: ['Report describes the delivered solution end to end.'],
    weaknesses: ['Failure handling and trade-offs could be documented in more depth.'],
    recommendations: ['Ask for a walkthrough of error handling and test coverage.'],
  };
};

/**
 * Deterministic, latency-free provider. Scores are derived from how many
 * requirement terms appear in the submitted text, so identical prompts always
 * produce identical responses.
 */
export class MockProvider implements LlmProvider {
  readonly name = 'mock' as const;

  async evaluate(prompt: Prompt): Promise<ProviderResponse> {
    const { cvText, projectText, requirements, context } = prompt.sections;
    const coverage = requirementCoverage(requirements, cvText);
    const cvEvaluation = buildCvEvaluation(coverage, context.length);
    const projectEvaluation = projectText
      ? buildProjectEvaluation(projectText, requirementCoverage(requirements, projectText))
      : undefined;
    const verdict = cvEvaluation.overall_score >= 70
      ? 'Recommend advancing to interview.'
      : 'Consider for a more junior role or hold.';

    const payload = {
      cv_evaluation: cvEvaluation,
      ...(projectEvaluation && { project_evaluation: projectEvaluation }),
      overall_summary: `Candidate covers ${Math.round(coverage * 100)}% of the stated requirements with an overall CV score of ${cvEvaluation.overall_score}.`,
      final_recommendation: verdict,
    };

    return {
      provider: this.name,
      model: MOCK_MODEL,
      content: JSON.stringify(payload),
    };
  }
}
