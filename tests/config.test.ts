import { describe, expect, it } from 'vitest';

import { loadConfig, resolveProviderChain } from '../src/config';
import { ConfigError } from '../src/errors';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.server).toEqual({
      port: 3000,
      nodeEnv: 'development',
      isDevelopment: true,
      isTest: false,
      logLevel: 'debug',
    });
    expect(config.llm.providers).toEqual(['mock']);
    expect(config.llm.retry).toEqual({ maxAttempts: 3, baseDelayMs: 2000, maxDelayMs: 30000, jitter: 0.1 });
    expect(config.context).toMatchObject({ store: 'memory', topK: 3, seedPath: 'data/reference-context.json' });
    expect(config.jobs).toEqual({ concurrency: 4, retentionMs: 24 * 60 * 60 * 1000 });
    expect(config.files).toEqual({ dataDir: '.data', maxUploadBytes: 10 * 1024 * 1024 });
  });

  it('ignores blank values', () => {
    expect(loadConfig({ PORT: '', WORKER_CONCURRENCY: '  ' }).server.port).toBe(3000);
  });

  it('coerces numeric values', () => {
    const config = loadConfig({ PORT: '8080', LLM_MAX_ATTEMPTS: '5', JOB_RETENTION_HOURS: '2' });

    expect(config.server.port).toBe(8080);
    expect(config.llm.retry.maxAttempts).toBe(5);
    expect(config.jobs.retentionMs).toBe(2 * 60 * 60 * 1000);
  });

  it('lists every invalid variable', () => {
    try {
      loadConfig({ PORT: 'abc', CONTEXT_STORE: 'redis' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toHaveProperty('details.problems', [
        'PORT: Expected number, received nan',
        "CONTEXT_STORE: Invalid enum value. Expected 'memory' | 'chroma', received 'redis'",
      ]);
    }
  });

  it('rejects delays setTimeout cannot honour', () => {
    expect(() => loadConfig({ LLM_TIMEOUT_MS: '3000000000' })).toThrow(
      'LLM_TIMEOUT_MS: Number must be less than or equal to 2147483647',
    );
    expect(() => loadConfig({ RETRIEVAL_RETRY_MAX_DELAY_MS: '2147483648' })).toThrow(
      'RETRIEVAL_RETRY_MAX_DELAY_MS: Number must be less than or equal to 2147483647',
    );
    expect(loadConfig({ LLM_TIMEOUT_MS: '2147483647' }).llm.timeoutMs).toBe(2_147_483_647);
  });

  it('requires credentials for enabled remote providers', () => {
    expect(() => loadConfig({ LLM_PROVIDER: 'openai' })).toThrow(
      'OPENAI_API_KEY is required when the openai provider is enabled.',
    );
    expect(() => loadConfig({ LLM_FALLBACK_PROVIDERS: 'gemini' })).toThrow(
      'GEMINI_API_KEY is required when the gemini provider is enabled.',
    );
  });

  it('builds the provider chain from primary, fallbacks and mock', () => {
    const config = loadConfig({
      LLM_PROVIDER: 'openai',
      LLM_FALLBACK_PROVIDERS: ' Gemini , openai',
      OPENAI_API_KEY: 'test-secret',
      GEMINI_API_KEY: 'test-secret',
    });

    expect(config.llm.providers).toEqual(['openai', 'gemini', 'mock']);
  });

  it('can disable the mock fallback', () => {
    const config = loadConfig({ LLM_PROVIDER: 'openai', OPENAI_API_KEY: 'test-secret', LLM_FALLBACK_TO_MOCK: 'false' });

    expect(config.llm.providers).toEqual(['openai']);
  });

  it('silences logs under test unless a level is given', () => {
    expect(loadConfig({ NODE_ENV: 'test' }).server.logLevel).toBe('silent');
    expect(loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'warn' }).server.logLevel).toBe('warn');
    expect(loadConfig({ NODE_ENV: 'production' }).server.logLevel).toBe('info');
  });
});

describe('resolveProviderChain', () => {
  it('deduplicates while keeping order', () => {
    expect(resolveProviderChain('gemini', ['gemini', 'openai'], true)).toEqual(['gemini', 'openai', 'mock']);
    expect(resolveProviderChain('mock', ['openai'], true)).toEqual(['mock', 'openai']);
    expect(resolveProviderChain('openai', [], false)).toEqual(['openai']);
  });
});
