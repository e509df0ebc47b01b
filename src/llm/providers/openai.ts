import OpenAI, { APIConnectionError, APIError } from 'openai';

import { type FailureKind, ProviderError } from '../../errors';
import type { EvaluateOptions, LlmProvider, Prompt, ProviderResponse } from '../types';

export type OpenAiProviderOptions = {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
};

const TRANSIENT_STATUSES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);
const PERMANENT_STATUSES = new Set([400, 401, 403, 404, 413, 422]);

export const classifyOpenAiStatus = (status: number | undefined): FailureKind => {
  if (status === undefined || TRANSIENT_STATUSES.has(status)) {
    return 'transient';
  }

  if (PERMANENT_STATUSES.has(status)) {
    return 'permanent';
  }

  return status >= 500 ? 'transient' : 'permanent';
};

export const toOpenAiError = (error: unknown): ProviderError => {
  if (error instanceof ProviderError) {
    return error;
  }

  // Connection failures (including SDK timeouts) carry no HTTP status.
  if (error instanceof APIConnectionError) {
    return new ProviderError('openai', 'transient', `OpenAI connection failed: ${error.message}`, { cause: error });
  }

  if (error instanceof APIError) {
    return new ProviderError('openai', classifyOpenAiStatus(error.status), `OpenAI request failed: ${error.message}`, {
      status: error.status,
      cause: error,
    });
  }

  const detail = error instanceof Error ? error.message : 'Unknown error';
  return new ProviderError('openai', 'transient', `OpenAI call failed: ${detail}`, { cause: error });
};

export class OpenAiProvider implements LlmProvider {
  readonly name = 'openai' as const;

  private readonly client: OpenAI;

  constructor(private readonly options: OpenAiProviderOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async evaluate(prompt: Prompt, { signal }: EvaluateOptions = {}): Promise<ProviderResponse> {
    let content: string | null | undefined;

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.options.model,
          temperature: 0.2,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: prompt.system },
            { role: 'user', content: prompt.user },
          ],
        },
        { signal },
      );

      content = response.choices[0]?.message?.content;
    } catch (error) {
      throw toOpenAiError(error);
    }

    if (!content) {
      throw new ProviderError('openai', 'permanent', 'LLM response did not contain any content.');
    }

    return {
      provider: this.name,
      model: this.options.model,
      content,
    };
  }
}
