import type { ContextSnippet } from '../rag/schema';

export type ProviderName = 'mock' | 'openai' | 'gemini';

export type PromptSections = {
  cvText: string;
  projectText?: string;
  requirements: string;
  context: ContextSnippet[];
};

export type Prompt = {
  system: string;
  user: string;
  sections: PromptSections;
};

export type ProviderResponse = {
  provider: ProviderName;
  model: string;
  content: string;
};

export type EvaluateOptions = {
  signal?: AbortSignal;
};

export interface LlmProvider {
  readonly name: ProviderName;
  evaluate(prompt: Prompt, options?: EvaluateOptions): Promise<ProviderResponse>;
}
