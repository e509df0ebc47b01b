import type { ErrorRequestHandler } from 'express';
import multer from 'multer';
import type { Logger } from 'pino';

import { NotFoundError, ValidationError } from '../errors';
import { serializeError } from '../logger';

export type ErrorHandlerOptions = {
  log: Logger;
  exposeErrors: boolean;
};

type HttpFailure = {
  statusCode: number;
  body: Record<string, unknown>;
};

const hasClientStatus = (error: unknown): error is { status: number; message: string } =>
  typeof error === 'object' &&
  error !== null &&
  'status' in error &&
  typeof error.status === 'number' &&
  error.status >= 400 &&
  error.status < 500 &&
  'message' in error &&
  typeof error.message === 'string';

const toHttpFailure = (error: unknown): HttpFailure => {
  if (error instanceof ValidationError) {
    return { statusCode: 400, body: { errors: error.issues.length ? error.issues : [{ message: error.message }] } };
  }

  if (error instanceof NotFoundError) {
    return { statusCode: 404, body: { error: error.message } };
  }

  if (error instanceof multer.MulterError) {
    const statusCode = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    return { statusCode, body: { error: error.message, code: error.code } };
  }

  // Body parser failures (malformed JSON, oversized payloads) carry their own 4xx status.
  if (hasClientStatus(error)) {
    return { statusCode: error.status, body: { error: error.message } };
  }

  return { statusCode: 500, body: { error: 'Internal Server Error' } };
};

/**
 * Centralized Express error handler. Client errors are logged at warn, server
 * errors at error; 5xx bodies never carry the original message unless
 * `exposeErrors` is set.
 */
export const createErrorHandler = ({ log, exposeErrors }: ErrorHandlerOptions): ErrorRequestHandler => {
  return (error: unknown, req, res, _next) => {
    const { statusCode, body } = toHttpFailure(error);
    const context = { err: serializeError(error), method: req.method, path: req.path, statusCode };
    const message = error instanceof Error ? error.message : 'Unknown error';

    if (statusCode >= 500) {
      log.error(context, `Request failed: ${message}`);
    } else {
      log.warn(context, `Client error: ${message}`);
    }

    if (statusCode >= 500 && exposeErrors && error instanceof Error) {
      body.message = error.message;
      body.stack = error.stack;
    }

    res.status(statusCode).json(body);
  };
};
