/**
 * Gateway error taxonomy.
 *
 * Every failure that reaches a caller is one of these classes; the error
 * normalizer decides how each is rendered.
 *
 * @packageDocumentation
 */

import type { Endpoint } from './endpoint-registry.js';

export const ErrorKinds = [
  'authentication_error',
  'rate_limit_exceeded',
  'upstream_unavailable',
  'upstream_stream_interrupted',
  'protocol_violation',
  'invalid_request',
  'not_found',
  'internal_error',
] as const;

export type ErrorKind = (typeof ErrorKinds)[number];

export abstract class GatewayError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AuthenticationError extends GatewayError {
  readonly kind = 'authentication_error' as const;

  constructor(message = 'Invalid API key.') {
    super(message);
  }
}

export class RateLimitExceededError extends GatewayError {
  readonly kind = 'rate_limit_exceeded' as const;
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    const seconds = Math.max(1, Math.ceil(retryAfterMs / 1000));
    super(`Rate limit exceeded. Retry in ${seconds} second${seconds === 1 ? '' : 's'}.`);
    this.retryAfterMs = retryAfterMs;
  }

  get retryAfterSeconds(): number {
    return Math.max(1, Math.ceil(this.retryAfterMs / 1000));
  }
}

/**
 * Why a single endpoint attempt failed.
 */
export type AttemptFailureReason = 'timeout' | 'network' | 'status' | 'invalid_response' | 'stream_error';

/**
 * Failure of one endpoint attempt. Internal: never rendered to callers.
 */
export class UpstreamAttemptError extends Error {
  readonly reason: AttemptFailureReason;
  readonly status: number | null;
  readonly detail: string | null;

  constructor(reason: AttemptFailureReason, message: string, opts: { status?: number; detail?: string; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'UpstreamAttemptError';
    this.reason = reason;
    this.status = opts.status ?? null;
    this.detail = opts.detail ?? null;
  }
}

export interface EndpointFailure {
  endpoint: Endpoint;
  error: UpstreamAttemptError;
}

export class UpstreamUnavailableError extends GatewayError {
  readonly kind = 'upstream_unavailable' as const;
  readonly failures: readonly EndpointFailure[];

  constructor(failures: readonly EndpointFailure[]) {
    const last = failures[failures.length - 1];
    super('The AI service is temporarily down. Please try again later.', { cause: last?.error });
    this.failures = failures;
  }

  get lastCause(): UpstreamAttemptError | undefined {
    return this.failures[this.failures.length - 1]?.error;
  }
}

export class UpstreamStreamInterruptedError extends GatewayError {
  readonly kind = 'upstream_stream_interrupted' as const;

  constructor(cause?: unknown) {
    super('The AI service stream was interrupted. Output received so far may be incomplete.', { cause });
  }
}

export class ProtocolViolationError extends GatewayError {
  readonly kind = 'protocol_violation' as const;
}

export interface ValidationIssue {
  path: Array<string | number>;
  message: string;
}

export class InvalidRequestError extends GatewayError {
  readonly kind = 'invalid_request' as const;
  readonly issues: readonly ValidationIssue[];
  /** HTTP status for this request problem (400 malformed, 413 too large, 422 schema). */
  readonly status: number;

  constructor(message: string, opts: { issues?: readonly ValidationIssue[]; status?: number } = {}) {
    super(message);
    this.issues = opts.issues ?? [];
    this.status = opts.status ?? (this.issues.length > 0 ? 422 : 400);
  }
}

export class NotFoundError extends GatewayError {
  readonly kind = 'not_found' as const;
}

export class InternalError extends GatewayError {
  readonly kind = 'internal_error' as const;

  constructor(cause?: unknown) {
    super('Internal server error.', { cause });
  }
}
