/**
 * Error taxonomy for the subtitle pipeline. Every failure that reaches a client
 * is one of these; vendor errors are classified at the provider boundary.
 */

import type { ErrorKind } from '../models/types.js';

export class PipelineError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = kind;
  }
}

export class ValidationError extends PipelineError {
  constructor(message: string) {
    super('ValidationError', message);
  }
}

/** Downloader failure: unavailable video, network failure, unsupported source */
export class FetchError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FetchError', message, options);
  }
}

export class AuthenticationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AuthenticationError', message, options);
  }
}

export class RateLimitError extends PipelineError {
  retryAfter?: number;

  constructor(message: string, retryAfter?: number, options?: { cause?: unknown }) {
    super('RateLimitError', message, options);
    this.retryAfter = retryAfter;
  }
}

export class ConnectionError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ConnectionError', message, options);
  }
}

export class InvalidModelError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('InvalidModelError', message, options);
  }
}

export class InvalidProviderError extends PipelineError {
  constructor(message: string) {
    super('InvalidProviderError', message);
  }
}

/** Model output does not line up with its input (cue count, JSON shape) */
export class AlignmentError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AlignmentError', message, options);
  }
}

export class TimeoutError extends PipelineError {
  constructor(message: string) {
    super('TimeoutError', message);
  }
}

/** Provider failed outside the named kinds, e.g. a 5xx */
export class ProviderError extends PipelineError {
  statusCode?: number;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super('ProviderError', message, options);
    this.statusCode = statusCode;
  }
}

/** Could not allocate the temporary audio file. Fatal to the job. */
export class ResourceError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ResourceError', message, options);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Anything that is not already classified becomes a ProviderError. */
export function toPipelineError(err: unknown): PipelineError {
  if (err instanceof PipelineError) return err;
  return new ProviderError(errorMessage(err) || 'Unexpected failure', undefined, { cause: err });
}
