import { EVALUATION_PROMPT, NO_PROJECT_NOTE, PROJECT_SCHEMA } from '../llm/prompts';
import type { Prompt } from '../llm/types';
import type { ContextSnippet } from '../rag/schema';

export type BuildPromptArgs = {
  cvText: string;
  projectText?: string;
  requirements: string;
  context: ContextSnippet[];
};

const formatContext = (context: ContextSnippet[]): string => {
  if (!context.length) {
    return 'No reference context available.';
  }

  return context
    .map((snippet, index) => {
      const label = snippet.namespace ?? snippet.sourceId;
      return `[${index + 1}] (${label}, relevance ${snippet.relevanceScore.toFixed(2)})\n${snippet.text.trim()}`;
    })
    .join('\n\n');
};

export const buildPrompt = ({ cvText, projectText, requirements, context }: BuildPromptArgs): Prompt => {
  const project = projectText?.trim() ? projectText : undefined;
  const system = project !== undefined
    ? EVALUATION_PROMPT.replace('{{PROJECT_SCHEMA}}', PROJECT_SCHEMA)
    : `${EVALUATION_PROMPT.replace('{{PROJECT_SCHEMA}}', '')}\n${NO_PROJECT_NOTE.trim()}`;

  const sections = [
    `JOB REQUIREMENTS:\n${requirements.trim()}`,
    `REFERENCE CONTEXT:\n${formatContext(context)}`,
    `CANDIDATE CV:\n${cvText.trim()}`,
  ];

  if (project !== undefined) {
    sections.push(`PROJECT REPORT:\n${project.trim()}`);
  }

  return {
    system,
    user: sections.join('\n\n'),
    sections: {
      cvText,
      requirements,
      context: context.map((snippet) => ({ ...snippet })),
      ...(project !== undefined && { projectText: project }),
    },
  };
};
