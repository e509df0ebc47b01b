import { ApiError } from '@google/genai';
import { APIConnectionError, APIError } from 'openai';
import { describe, expect, it } from 'vitest';

import { loadConfig } from '../src/config';
import {
  classifyFailure,
  type FailureKind,
  ExhaustedRetriesError,
  ExtractionError,
  MalformedResponseError,
  NotFoundError,
  ProviderError,
  RetrievalError,
  toJobError,
  ValidationError,
} from '../src/errors';
import { createProvider, createProviderChain, GeminiProvider, MockProvider, OpenAiProvider } from '../src/llm/providers';
import { classifyGeminiStatus, toGeminiError } from '../src/llm/providers/gemini';
import { classifyOpenAiStatus, toOpenAiError } from '../src/llm/providers/openai';

const openAiCases: Array<[number, FailureKind]> = [
  [408, 'transient'],
  [409, 'transient'],
  [429, 'transient'],
  [500, 'transient'],
  [503, 'transient'],
  [599, 'transient'],
  [400, 'permanent'],
  [401, 'permanent'],
  [403, 'permanent'],
  [422, 'permanent'],
  [418, 'permanent'],
];

describe('OpenAI failure classification', () => {
  it.each(openAiCases)('classifies HTTP %i as %s', (status, kind) => {
    expect(classifyOpenAiStatus(status)).toBe(kind);
  });

  it('treats a missing status as transient', () => {
    expect(classifyOpenAiStatus(undefined)).toBe('transient');
  });

  it('maps SDK errors by class and status', () => {
    const unavailable = toOpenAiError(new APIError(503, undefined, 'unavailable', {}));
    const unauthorized = toOpenAiError(new APIError(401, undefined, 'bad key', {}));
    const connection = toOpenAiError(new APIConnectionError({ message: 'socket hang up' }));

    expect(unavailable).toMatchObject({ provider: 'openai', kind: 'transient', status: 503 });
    expect(unauthorized).toMatchObject({ provider: 'openai', kind: 'permanent', status: 401 });
    expect(connection).toMatchObject({ provider: 'openai', kind: 'transient' });
    expect(connection.status).toBeUndefined();
  });

  it('keeps provider errors untouched', () => {
    const original = new ProviderError('openai', 'permanent', 'empty');
    expect(toOpenAiError(original)).toBe(original);
  });
});

describe('Gemini failure classification', () => {
  it('classifies by status code', () => {
    expect(classifyGeminiStatus(429)).toBe('transient');
    expect(classifyGeminiStatus(500)).toBe('transient');
    expect(classifyGeminiStatus(529)).toBe('transient');
    expect(classifyGeminiStatus(400)).toBe('permanent');
    expect(classifyGeminiStatus(403)).toBe('permanent');
  });

  it('maps API errors by status and everything else as transient', () => {
    expect(toGeminiError(new ApiError({ message: 'quota exceeded', status: 429 }))).toMatchObject({
      provider: 'gemini',
      kind: 'transient',
      status: 429,
    });
    expect(toGeminiError(new ApiError({ message: 'invalid argument', status: 400 }))).toMatchObject({
      kind: 'permanent',
      status: 400,
    });
    expect(toGeminiError(new TypeError('fetch failed'))).toMatchObject({
      kind: 'transient',
      message: 'Gemini call failed: fetch failed',
    });
  });
});

describe('createProvider', () => {
  it('builds every provider in the configured chain', () => {
    const config = loadConfig({
      LLM_PROVIDER: 'gemini',
      LLM_FALLBACK_PROVIDERS: 'openai',
      OPENAI_API_KEY: 'test-secret',
      GEMINI_API_KEY: 'test-secret',
    });

    const chain = createProviderChain(config.llm);

    expect(chain.map((provider) => provider.name)).toEqual(['gemini', 'openai', 'mock']);
    expect(chain[0]).toBeInstanceOf(GeminiProvider);
    expect(chain[1]).toBeInstanceOf(OpenAiProvider);
    expect(chain[2]).toBeInstanceOf(MockProvider);
  });

  it('refuses a remote provider without credentials', () => {
    const { llm } = loadConfig({});

    expect(() => createProvider('openai', llm)).toThrow('OPENAI_API_KEY is required for the openai provider.');
  });
});

describe('error classification', () => {
  it('classifies failures for the retry executor', () => {
    expect(classifyFailure(new ProviderError('openai', 'transient', 'x'))).toBe('transient');
    expect(classifyFailure(new ProviderError('openai', 'permanent', 'x'))).toBe('permanent');
    expect(classifyFailure(new RetrievalError('down'))).toBe('transient');
    expect(classifyFailure(new MalformedResponseError('bad'))).toBe('permanent');
    expect(classifyFailure('string failure')).toBe('permanent');
  });

  it('maps failures onto job error codes', () => {
    const cause = new ProviderError('openai', 'transient', 'rate limited');

    expect(toJobError(new ExhaustedRetriesError(3, cause))).toEqual({
      code: 'ExhaustedRetries',
      message: 'Operation failed after 3 attempt(s): rate limited',
    });
    expect(toJobError(new ProviderError('gemini', 'permanent', 'bad key')).code).toBe('PermanentProviderFailure');
    expect(toJobError(new ProviderError('openai', 'transient', 'rate limited')).code).toBe('InternalError');
    expect(toJobError(new MalformedResponseError('bad json')).code).toBe('MalformedResponse');
    expect(toJobError(new ExtractionError('unreadable')).code).toBe('ExtractionError');
    expect(toJobError(new ValidationError('invalid')).code).toBe('ValidationError');
    expect(toJobError(new NotFoundError('gone')).code).toBe('InternalError');
    expect(toJobError(42)).toEqual({ code: 'InternalError', message: 'Unknown error' });
  });

  it('names errors after their class', () => {
    expect(new ExtractionError('x').name).toBe('ExtractionError');
  });
});
