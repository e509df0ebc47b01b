import { z } from 'zod';

import { ConfigError } from './errors';
import type { ProviderName } from './llm/types';

// Largest delay setTimeout honours; anything above fires immediately.
const MAX_TIMER_MS = 2_147_483_647;

const delayMs = z.coerce.number().min(0).max(MAX_TIMER_MS);

const PROVIDER_NAMES = ['mock', 'openai', 'gemini'] as const satisfies readonly ProviderName[];

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const providerList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim().toLowerCase())
      .filter(Boolean),
  )
  .pipe(z.array(z.enum(PROVIDER_NAMES)));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  LLM_PROVIDER: z.enum(PROVIDER_NAMES).default('mock'),
  LLM_FALLBACK_PROVIDERS: providerList.default(''),
  LLM_FALLBACK_TO_MOCK: booleanFlag.default('true'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(60_000),
  LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  LLM_RETRY_BASE_DELAY_MS: delayMs.default(2_000),
  LLM_RETRY_MAX_DELAY_MS: delayMs.default(30_000),
  LLM_RETRY_JITTER: z.coerce.number().min(0).max(1).default(0.1),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  OPENAI_MODEL: z.string().min(1).default('mistralai/mistral-small-3.2-24b-instruct:free'),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().min(1).default('gemini-2.0-flash'),

  CONTEXT_STORE: z.enum(['memory', 'chroma']).default('memory'),
  CONTEXT_SEED_PATH: z.string().min(1).default('data/reference-context.json'),
  CONTEXT_TOP_K: z.coerce.number().int().min(1).default(3),
  RETRIEVAL_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(2),
  RETRIEVAL_RETRY_BASE_DELAY_MS: delayMs.default(1_000),
  RETRIEVAL_RETRY_MAX_DELAY_MS: delayMs.default(10_000),
  CHROMA_URL: z.string().url().default('http://127.0.0.1:8000'),
  CHROMA_COLLECTION: z.string().min(1).default('ground-truth-ollama'),
  OLLAMA_EMBED_URL: z.string().url().default('http://127.0.0.1:11434'),
  OLLAMA_EMBED_MODEL: z.string().min(1).default('nomic-embed-text'),

  WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  JOB_RETENTION_HOURS: z.coerce.number().positive().default(24),
  DATA_DIR: z.string().min(1).default('.data'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
});

export type RetryPolicyConfig = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: number;
};

export type AppConfig = {
  server: {
    port: number;
    nodeEnv: 'development' | 'production' | 'test';
    isDevelopment: boolean;
    isTest: boolean;
    logLevel: string;
  };
  llm: {
    providers: ProviderName[];
    timeoutMs: number;
    retry: RetryPolicyConfig;
    openai: { apiKey?: string; baseUrl: string; model: string };
    gemini: { apiKey?: string; model: string };
  };
  context: {
    store: 'memory' | 'chroma';
    seedPath: string;
    topK: number;
    retry: RetryPolicyConfig;
    chroma: { url: string; collection: string; embedUrl: string; embedModel: string };
  };
  jobs: {
    concurrency: number;
    retentionMs: number;
  };
  files: {
    dataDir: string;
    maxUploadBytes: number;
  };
};

type Env = Record<string, string | undefined>;

const withoutBlanks = (env: Env): Env =>
  Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''));

export const resolveProviderChain = (
  primary: ProviderName,
  fallbacks: ProviderName[],
  fallbackToMock: boolean,
): ProviderName[] => {
  const chain: ProviderName[] = [];

  for (const name of [primary, ...fallbacks]) {
    if (!chain.includes(name)) {
      chain.push(name);
    }
  }

  if (fallbackToMock && !chain.includes('mock')) {
    chain.push('mock');
  }

  return chain;
};

export const loadConfig = (env: Env = process.env): AppConfig => {
  const parsed = envSchema.safeParse(withoutBlanks(env));

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`, { problems });
  }

  const values = parsed.data;
  const providers = resolveProviderChain(
    values.LLM_PROVIDER,
    values.LLM_FALLBACK_PROVIDERS,
    values.LLM_FALLBACK_TO_MOCK,
  );

  if (providers.includes('openai') && !values.OPENAI_API_KEY) {
    throw new ConfigError('OPENAI_API_KEY is required when the openai provider is enabled.');
  }

  if (providers.includes('gemini') && !values.GEMINI_API_KEY) {
    throw new ConfigError('GEMINI_API_KEY is required when the gemini provider is enabled.');
  }

  const isDevelopment = values.NODE_ENV === 'development';
  const isTest = values.NODE_ENV === 'test';

  return {
    server: {
      port: values.PORT,
      nodeEnv: values.NODE_ENV,
      isDevelopment,
      isTest,
      logLevel: values.LOG_LEVEL ?? (isTest ? 'silent' : isDevelopment ? 'debug' : 'info'),
    },
    llm: {
      providers,
      timeoutMs: values.LLM_TIMEOUT_MS,
      retry: {
        maxAttempts: values.LLM_MAX_ATTEMPTS,
        baseDelayMs: values.LLM_RETRY_BASE_DELAY_MS,
        maxDelayMs: values.LLM_RETRY_MAX_DELAY_MS,
        jitter: values.LLM_RETRY_JITTER,
      },
      openai: {
        apiKey: values.OPENAI_API_KEY,
        baseUrl: values.OPENAI_BASE_URL,
        model: values.OPENAI_MODEL,
      },
      gemini: {
        apiKey: values.GEMINI_API_KEY,
        model: values.GEMINI_MODEL,
      },
    },
    context: {
      store: values.CONTEXT_STORE,
      seedPath: values.CONTEXT_SEED_PATH,
      topK: values.CONTEXT_TOP_K,
      retry: {
        maxAttempts: values.RETRIEVAL_MAX_ATTEMPTS,
        baseDelayMs: values.RETRIEVAL_RETRY_BASE_DELAY_MS,
        maxDelayMs: values.RETRIEVAL_RETRY_MAX_DELAY_MS,
        jitter: values.LLM_RETRY_JITTER,
      },
      chroma: {
        url: values.CHROMA_URL,
        collection: values.CHROMA_COLLECTION,
        embedUrl: values.OLLAMA_EMBED_URL,
        embedModel: values.OLLAMA_EMBED_MODEL,
      },
    },
    jobs: {
      concurrency: values.WORKER_CONCURRENCY,
      retentionMs: values.JOB_RETENTION_HOURS * 60 * 60 * 1000,
    },
    files: {
      dataDir: values.DATA_DIR,
      maxUploadBytes: values.MAX_UPLOAD_BYTES,
    },
  };
};
