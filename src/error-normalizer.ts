/**
 * Error Normalizer
 *
 * Classifies any failure into the gateway taxonomy and renders it for the
 * calling surface. Rendering is a pure function of the error and the caller
 * context.
 *
 * @packageDocumentation
 */

import {
  GatewayError,
  InternalError,
  InvalidRequestError,
  RateLimitExceededError,
  type ErrorKind,
} from './errors.js';

export type CallerContext =
  | { surface: 'http'; accept?: string }
  | { surface: 'frame' };

export interface RenderedError {
  status: number;
  headers: Record<string, string>;
  body: string;
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  authentication_error: 401,
  rate_limit_exceeded: 429,
  upstream_unavailable: 503,
  upstream_stream_interrupted: 502,
  protocol_violation: 400,
  invalid_request: 400,
  not_found: 404,
  internal_error: 500,
};

const TITLE_BY_KIND: Record<ErrorKind, string> = {
  authentication_error: 'Authentication required',
  rate_limit_exceeded: 'Too many requests',
  upstream_unavailable: 'Service temporarily unavailable',
  upstream_stream_interrupted: 'Response interrupted',
  protocol_violation: 'Protocol error',
  invalid_request: 'Invalid request',
  not_found: 'Not found',
  internal_error: 'Something went wrong',
};

/**
 * Map any thrown value to a gateway error. Unclassified values become
 * InternalError with the original kept as `cause`.
 */
export function normalizeError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  return new InternalError(err);
}

/**
 * True when the caller would rather read an HTML page than JSON.
 */
export function prefersHtml(accept: string | undefined): boolean {
  if (!accept) return false;
  const html = accept.indexOf('text/html');
  if (html === -1) return false;
  const json = accept.indexOf('application/json');
  return json === -1 || html < json;
}

export function statusFor(err: GatewayError): number {
  if (err instanceof InvalidRequestError) return err.status;
  return STATUS_BY_KIND[err.kind];
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function renderHtmlPage(err: GatewayError, status: number): string {
  const title = TITLE_BY_KIND[err.kind];
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${status} ${escapeHtml(title)}</title>`,
    '</head>',
    `<body data-error-type="${err.kind}">`,
    `<h1>${escapeHtml(title)}</h1>`,
    `<p>${escapeHtml(err.message)}</p>`,
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

/**
 * Render an error for its caller.
 */
export function renderError(error: unknown, context: CallerContext): RenderedError {
  const err = normalizeError(error);
  const status = statusFor(err);
  const retryAfter = err instanceof RateLimitExceededError ? err.retryAfterSeconds : undefined;

  if (context.surface === 'frame') {
    const frame: Record<string, unknown> = { error: err.message, type: err.kind };
    if (retryAfter !== undefined) frame['retryAfterSeconds'] = retryAfter;
    return { status, headers: {}, body: JSON.stringify(frame) };
  }

  const headers: Record<string, string> = {};
  if (retryAfter !== undefined) headers['Retry-After'] = String(retryAfter);

  if (prefersHtml(context.accept)) {
    headers['Content-Type'] = 'text/html; charset=utf-8';
    return { status, headers, body: renderHtmlPage(err, status) };
  }

  const payload: Record<string, unknown> = { type: err.kind, message: err.message };
  if (retryAfter !== undefined) payload['retry_after_seconds'] = retryAfter;
  if (err instanceof InvalidRequestError && err.issues.length > 0) payload['issues'] = err.issues;

  headers['Content-Type'] = 'application/json';
  return { status, headers, body: JSON.stringify({ error: payload }) };
}
