export const EVALUATION_PROMPT = `You are an assistant that evaluates a candidate for a specific job.
Use the job requirements and the reference context (job descriptions and scoring rubrics) to guide your assessment.
Every score is a number between 0 and 100. Lists contain short, specific sentences.
Respond ONLY with valid JSON following this schema:
{
  "cv_evaluation": {
    "technical_skills_score": <number>,
    "experience_score": <number>,
    "education_score": <number>,
    "overall_score": <number>,
    "strengths": ["<string>"],
    "weaknesses": ["<string>"],
    "recommendations": ["<string>"]
  },{{PROJECT_SCHEMA}}
  "overall_summary": "<succinct synthesis for a hiring manager>",
  "final_recommendation": "<one-line hiring verdict>"
}`;

export const PROJECT_SCHEMA = `
  "project_evaluation": {
    "technical_implementation_score": <number>,
    "code_quality_score": <number>,
    "documentation_score": <number>,
    "innovation_score": <number>,
    "overall_score": <number>,
    "strengths": ["<string>"],
    "weaknesses": ["<string>"],
    "recommendations": ["<string>"]
  },`;

export const NO_PROJECT_NOTE = `
No project report was submitted: omit "project_evaluation" entirely.`;
