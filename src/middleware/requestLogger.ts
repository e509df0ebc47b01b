import { randomUUID } from 'node:crypto';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Logger, LevelWithSilent } from 'pino';
import pinoHttp from 'pino-http';

const genReqId = (req: IncomingMessage): string => {
  const existingId = req.headers['x-request-id'] ?? req.headers['x-correlation-id'];
  return typeof existingId === 'string' ? existingId : randomUUID();
};

const customLogLevel = (req: IncomingMessage, res: ServerResponse, error?: Error): LevelWithSilent => {
  if (error || res.statusCode >= 500) {
    return 'error';
  }
  if (res.statusCode >= 400) {
    return 'warn';
  }
  // Pollers hit these constantly.
  if (req.url === '/health' || req.url?.startsWith('/result/')) {
    return 'debug';
  }
  return 'info';
};

export const createRequestLogger = (log: Logger) =>
  pinoHttp({
    logger: log,
    genReqId,
    customLogLevel,
    customSuccessMessage: (req, res, responseTime) =>
      `${req.method} ${req.url} ${res.statusCode} ${responseTime.toFixed(0)}ms`,
    customErrorMessage: (req, res, error) => `${req.method} ${req.url} ${res.statusCode} - ${error.message}`,
    serializers: {
      req: (req: IncomingMessage & { id?: unknown }) => ({ id: req.id, method: req.method, url: req.url }),
      res: (res: ServerResponse) => ({ statusCode: res.statusCode }),
    },
    customAttributeKeys: {
      reqId: 'requestId',
    },
  });
