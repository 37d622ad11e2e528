// src/lib/errors.ts

export type ErrorCode =
  | 'invalid_input'
  | 'auth_error'
  | 'not_found'
  | 'conflict'
  | 'rate_limited'
  | 'ai_service_error'
  | 'parse_error'
  | 'write_error'
  | 'host_error';

export interface ErrorDetail {
  path: Array<string | number>;
  message: string;
}

/**
 * Base class for every failure a request can end in. Carries the wire code and
 * the HTTP status the request handler replies with.
 */
export abstract class UpdaterError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: number;
  readonly details?: ErrorDetail[];

  constructor(message: string, options: { cause?: unknown; details?: ErrorDetail[] } = {}) {
    super(message, { cause: options.cause });
    this.details = options.details;
  }

  toJSON() {
    return {
      success: false as const,
      error: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

export class InputValidationError extends UpdaterError {
  readonly name = 'InputValidationError';
  readonly code = 'invalid_input';
  readonly status = 400;
}

export class AuthError extends UpdaterError {
  readonly name = 'AuthError';
  readonly code = 'auth_error';
  readonly status = 401;
}

export class NotFoundError extends UpdaterError {
  readonly name = 'NotFoundError';
  readonly code = 'not_found';
  readonly status = 404;
}

export class ConflictError extends UpdaterError {
  readonly name = 'ConflictError';
  readonly code = 'conflict';
  readonly status = 409;
}

export class RateLimitedError extends UpdaterError {
  readonly name = 'RateLimitedError';
  readonly code = 'rate_limited';
  readonly status = 429;
  readonly resetAt?: Date;

  constructor(message: string, options: { cause?: unknown; resetAt?: Date } = {}) {
    super(message, { cause: options.cause });
    this.resetAt = options.resetAt;
  }
}

export class AIServiceError extends UpdaterError {
  readonly name = 'AIServiceError';
  readonly code = 'ai_service_error';
  readonly status = 502;
}

export class ParseError extends UpdaterError {
  readonly name = 'ParseError';
  readonly code = 'parse_error';
  readonly status = 502;
}

export class WriteError extends UpdaterError {
  readonly name = 'WriteError';
  readonly code = 'write_error';
  readonly status = 502;
}

/** The hosting API failed in a way none of the kinds above describe (5xx, network). */
export class HostError extends UpdaterError {
  readonly name = 'HostError';
  readonly code = 'host_error';
  readonly status = 502;
}

/** Startup-time misconfiguration. Never surfaced per request. */
export class ConfigError extends Error {
  readonly name = 'ConfigError';
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
