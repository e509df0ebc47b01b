import { ApiError, GoogleGenAI } from '@google/genai';

import { type FailureKind, ProviderError } from '../../errors';
import type { EvaluateOptions, LlmProvider, Prompt, ProviderResponse } from '../types';

export type GeminiProviderOptions = {
  apiKey: string;
  model: string;
};

const TRANSIENT_STATUSES = new Set([408, 429, 500, 502, 503, 504]);
const PERMANENT_STATUSES = new Set([400, 401, 403, 404]);

export const classifyGeminiStatus = (status: number): FailureKind => {
  if (TRANSIENT_STATUSES.has(status)) {
    return 'transient';
  }

  if (PERMANENT_STATUSES.has(status)) {
    return 'permanent';
  }

  return status >= 500 ? 'transient' : 'permanent';
};

export const toGeminiError = (error: unknown): ProviderError => {
  if (error instanceof ProviderError) {
    return error;
  }

  if (error instanceof ApiError) {
    return new ProviderError('gemini', classifyGeminiStatus(error.status), `Gemini request failed: ${error.message}`, {
      status: error.status,
      cause: error,
    });
  }

  // Anything that is not an API response (fetch failure, abort) never reached the model.
  const detail = error instanceof Error ? error.message : 'Unknown error';
  return new ProviderError('gemini', 'transient', `Gemini call failed: ${detail}`, { cause: error });
};

export class GeminiProvider implements LlmProvider {
  readonly name = 'gemini' as const;

  private readonly client: GoogleGenAI;

  constructor(private readonly options: GeminiProviderOptions) {
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
  }

  async evaluate(prompt: Prompt, { signal }: EvaluateOptions = {}): Promise<ProviderResponse> {
    let content: string | undefined;

    try {
      const response = await this.client.models.generateContent({
        model: this.options.model,
        contents: prompt.user,
        config: {
          systemInstruction: prompt.system,
          responseMimeType: 'application/json',
          temperature: 0.2,
          abortSignal: signal,
        },
      });

      content = response.text;
    } catch (error) {
      throw toGeminiError(error);
    }

    if (!content) {
      throw new ProviderError('gemini', 'permanent', 'LLM response did not contain any content.');
    }

    return {
      provider: this.name,
      model: this.options.model,
      content,
    };
  }
}
