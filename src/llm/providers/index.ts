import type { AppConfig } from '../../config';
import { ConfigError } from '../../errors';
import type { LlmProvider, ProviderName } from '../types';
import { GeminiProvider } from './gemini';
import { MockProvider } from './mock';
import { OpenAiProvider } from './openai';

export const createProvider = (name: ProviderName, llm: AppConfig['llm']): LlmProvider => {
  switch (name) {
    case 'mock':
      return new MockProvider();
    case 'openai':
      if (!llm.openai.apiKey) {
        throw new ConfigError('OPENAI_API_KEY is required for the openai provider.');
      }
      return new OpenAiProvider({
        apiKey: llm.openai.apiKey,
        baseUrl: llm.openai.baseUrl,
        model: llm.openai.model,
        timeoutMs: llm.timeoutMs,
      });
    case 'gemini':
      if (!llm.gemini.apiKey) {
        throw new ConfigError('GEMINI_API_KEY is required for the gemini provider.');
      }
      return new GeminiProvider({ apiKey: llm.gemini.apiKey, model: llm.gemini.model });
  }
};

export const createProviderChain = (llm: AppConfig['llm']): LlmProvider[] =>
  llm.providers.map((name) => createProvider(name, llm));

export { GeminiProvider, MockProvider, OpenAiProvider };
