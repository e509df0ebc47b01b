import { describe, expect, it } from 'vitest';

import { MOCK_MODEL, MockProvider, requirementCoverage } from '../src/llm/providers/mock';
import { buildPrompt } from '../src/pipeline/prompt';
import { parseResult } from '../src/pipeline/parseResult';

describe('requirementCoverage', () => {
  it('measures the share of requirement terms present in the text', () => {
    expect(requirementCoverage('Senior Python engineer', 'Python engineer with Django')).toBeCloseTo(2 / 3);
  });

  it('is zero when the requirements have no usable terms', () => {
    expect(requirementCoverage('a the of', 'anything')).toBe(0);
  });
});

describe('MockProvider', () => {
  const provider = new MockProvider();

  it('derives scores from requirement coverage', async () => {
    const prompt = buildPrompt({
      cvText: 'Python engineer with Django',
      requirements: 'Senior Python engineer',
      context: [],
    });

    const response = await provider.evaluate(prompt);
    const result = parseResult(response, { projectSubmitted: false });

    expect(response).toMatchObject({ provider: 'mock', model: MOCK_MODEL });
    expect(result.cvEvaluation).toMatchObject({
      technical_skills_score: 78,
      experience_score: 73,
      education_score: 60,
      overall_score: 72,
    });
    expect(result.overallSummary).toBe(
      'Candidate covers 67% of the stated requirements with an overall CV score of 72.',
    );
    expect(result.finalRecommendation).toBe('Recommend advancing to interview.');
    expect(result).not.toHaveProperty('projectEvaluation');
  });

  it('adds a project evaluation only when a project report is present', async () => {
    const prompt = buildPrompt({
      cvText: 'Python engineer',
      projectText: 'Built a Python evaluation service',
      requirements: 'Python engineer',
      context: [],
    });

    const result = parseResult(await provider.evaluate(prompt), { projectSubmitted: true });

    expect(result.projectEvaluation?.overall_score).toBeGreaterThanOrEqual(0);
    expect(result.projectEvaluation?.overall_score).toBeLessThanOrEqual(100);
  });

  it('is deterministic', async () => {
    const prompt = buildPrompt({ cvText: 'Go developer', requirements: 'Rust developer', context: [] });

    const [first, second] = await Promise.all([provider.evaluate(prompt), provider.evaluate(prompt)]);

    expect(first.content).toBe(second.content);
  });
});
