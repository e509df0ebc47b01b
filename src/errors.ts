export type FailureKind = 'transient' | 'permanent';

export type JobErrorCode =
  | 'ValidationError'
  | 'ExtractionError'
  | 'ExhaustedRetries'
  | 'PermanentProviderFailure'
  | 'MalformedResponse'
  | 'InternalError';

export type ErrorDetails = Record<string, unknown>;

export class EvaluationError extends Error {
  readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }
}

export type ValidationIssue = {
  path?: string;
  message: string;
};

export class ValidationError extends EvaluationError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message, { issues });
    this.issues = issues;
  }
}

export class ExtractionError extends EvaluationError {}

export class RetrievalError extends EvaluationError {}

export class ProviderError extends EvaluationError {
  readonly kind: FailureKind;

  readonly provider: string;

  readonly status?: number;

  constructor(
    provider: string,
    kind: FailureKind,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { provider, kind, status: options.status }, { cause: options.cause });
    this.provider = provider;
    this.kind = kind;
    this.status = options.status;
  }
}

export class ExhaustedRetriesError extends EvaluationError {
  readonly attempts: number;

  constructor(attempts: number, lastError: unknown) {
    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Operation failed after ${attempts} attempt(s): ${detail}`, { attempts }, { cause: lastError });
    this.attempts = attempts;
  }
}

export class MalformedResponseError extends EvaluationError {}

export class InvalidTransitionError extends EvaluationError {}

export class NotFoundError extends EvaluationError {}

export class ConfigError extends EvaluationError {}

export const classifyFailure = (error: unknown): FailureKind => {
  if (error instanceof ProviderError) {
    return error.kind;
  }

  if (error instanceof RetrievalError) {
    return 'transient';
  }

  return 'permanent';
};

export type JobError = {
  code: JobErrorCode;
  message: string;
};

export const toJobError = (error: unknown): JobError => {
  const message = error instanceof Error ? error.message : 'Unknown error';

  if (error instanceof ExhaustedRetriesError) {
    return { code: 'ExhaustedRetries', message };
  }

  if (error instanceof ProviderError && error.kind === 'permanent') {
    return { code: 'PermanentProviderFailure', message };
  }

  if (error instanceof MalformedResponseError) {
    return { code: 'MalformedResponse', message };
  }

  if (error instanceof ExtractionError) {
    return { code: 'ExtractionError', message };
  }

  if (error instanceof ValidationError) {
    return { code: 'ValidationError', message };
  }

  return { code: 'InternalError', message };
};
