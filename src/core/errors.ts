import { BrokenCircuitError, TaskCancelledError } from 'cockatiel';

export type ErrorCode =
  | 'MissingContext'
  | 'UpstreamUnavailable'
  | 'NotFound'
  | 'StageExecutionError';

export interface StandardError {
  code: string;
  message: string;
  details?: unknown;
  causeId?: string;
}

/**
 * Base class for failures that abort a pipeline run. Every subclass carries
 * a stable `code` that ends up in the run record.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A template referenced a blackboard key nobody wrote. */
export class MissingContextError extends PipelineError {
  readonly code = 'MissingContext';

  constructor(public readonly key: string, where?: string) {
    super(where ? `Missing context key '${key}' in ${where}` : `Missing context key '${key}'`);
    this.name = 'MissingContextError';
  }
}

export class UpstreamUnavailableError extends PipelineError {
  readonly code = 'UpstreamUnavailable';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpstreamUnavailableError';
  }
}

export class NotFoundError extends PipelineError {
  readonly code = 'NotFound';

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class StageExecutionError extends PipelineError {
  readonly code = 'StageExecutionError';
  /** Code of the underlying failure, e.g. NotFound for a missing method. */
  readonly causeCode: string;

  constructor(public readonly role: string, cause: unknown) {
    const std = toStdError(cause);
    super(`Stage ${role} failed (${std.code}): ${std.message}`, { cause });
    this.name = 'StageExecutionError';
    this.causeCode = std.code;
  }
}

/**
 * Maps any thrown value to the standard error shape used in logs and run
 * records.
 */
export function toStdError(error: unknown, ctx?: string): StandardError {
  if (error instanceof PipelineError) {
    return {
      code: error.code,
      message: error.message,
      ...(error instanceof StageExecutionError ? { details: { role: error.role, cause: error.causeCode } } : {}),
      causeId: ctx,
    };
  }

  if (error instanceof TaskCancelledError || (error instanceof Error && error.name === 'AbortError')) {
    return {
      code: 'timeout',
      message: error.message || 'Operation timed out',
      causeId: ctx,
    };
  }

  if (error instanceof BrokenCircuitError) {
    return {
      code: 'circuit_open',
      message: error.message || 'Circuit breaker is open',
      causeId: ctx,
    };
  }

  if (error instanceof Error) {
    return {
      code: error.name && error.name !== 'Error' ? error.name : 'internal_error',
      message: error.message,
      causeId: ctx,
    };
  }

  return {
    code: 'unknown_error',
    message: typeof error === 'string' ? error : 'Unknown error occurred',
    details: error,
    causeId: ctx,
  };
}

/** One-line summary for a failed run: `<code>: <message>`. */
export function describeError(error: unknown): string {
  const std = toStdError(error);
  return `${std.code}: ${std.message}`;
}
