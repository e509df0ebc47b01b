import pino, { type Logger, type LoggerOptions } from 'pino';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isDevelopment = nodeEnv === 'development';

const defaultLevel = (): string => {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  if (nodeEnv === 'test') {
    return 'silent';
  }

  return isDevelopment ? 'debug' : 'info';
};

const baseOptions: LoggerOptions = {
  level: defaultLevel(),
  base: {
    pid: process.pid,
    env: nodeEnv,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.cookie',
      'apiKey',
      '*.apiKey',
      'token',
      '*.token',
    ],
    remove: true,
  },
};

const developmentOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:HH:MM:ss.l',
      ignore: 'pid,hostname,env',
    },
  },
};

export const logger: Logger = pino(isDevelopment ? developmentOptions : baseOptions);

export const createComponentLogger = (component: string): Logger => logger.child({ component });

export const loggers = {
  http: createComponentLogger('http'),
  jobs: createComponentLogger('jobs'),
  llm: createComponentLogger('llm'),
  rag: createComponentLogger('rag'),
  files: createComponentLogger('files'),
};

export const serializeError = (error: unknown): Record<string, unknown> => {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  const extras: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(error)) {
    if (key !== 'cause') {
      extras[key] = value;
    }
  }

  return {
    type: error.name,
    message: error.message,
    stack: isDevelopment ? error.stack : undefined,
    ...extras,
    ...(error.cause !== undefined && { cause: serializeError(error.cause) }),
  };
};

export default logger;
