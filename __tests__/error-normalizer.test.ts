import { describe, it, expect } from 'vitest';
import { normalizeError, prefersHtml, renderError } from '../src/error-normalizer.js';
import {
  AuthenticationError,
  InternalError,
  InvalidRequestError,
  NotFoundError,
  ProtocolViolationError,
  RateLimitExceededError,
  UpstreamStreamInterruptedError,
  UpstreamUnavailableError,
} from '../src/errors.js';

describe('normalizeError', () => {
  it('passes gateway errors through', () => {
    const err = new AuthenticationError();
    expect(normalizeError(err)).toBe(err);
  });

  it('wraps anything else as an internal error keeping the cause', () => {
    const cause = new RangeError('bad index');
    const err = normalizeError(cause);
    expect(err).toBeInstanceOf(InternalError);
    expect(err.message).toBe('Internal server error.');
    expect(err.cause).toBe(cause);
  });
});

describe('renderError (http, JSON)', () => {
  it('renders authentication failures as 401', () => {
    expect(renderError(new AuthenticationError(), { surface: 'http' })).toEqual({
      status: 401,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ error: { type: 'authentication_error', message: 'Invalid API key.' } }),
    });
  });

  it('renders rate limits as 429 with Retry-After', () => {
    const rendered = renderError(new RateLimitExceededError(1_500), { surface: 'http', accept: 'application/json' });
    expect(rendered.status).toBe(429);
    expect(rendered.headers).toEqual({ 'Retry-After': '2', 'Content-Type': 'application/json' });
    expect(JSON.parse(rendered.body)).toEqual({
      error: {
        type: 'rate_limit_exceeded',
        message: 'Rate limit exceeded. Retry in 2 seconds.',
        retry_after_seconds: 2,
      },
    });
  });

  it('maps every kind to its status', () => {
    expect(renderError(new UpstreamUnavailableError([]), { surface: 'http' }).status).toBe(503);
    expect(renderError(new UpstreamStreamInterruptedError(), { surface: 'http' }).status).toBe(502);
    expect(renderError(new ProtocolViolationError('nope'), { surface: 'http' }).status).toBe(400);
    expect(renderError(new InvalidRequestError('Invalid JSON'), { surface: 'http' }).status).toBe(400);
    expect(renderError(new InvalidRequestError('too big', { status: 413 }), { surface: 'http' }).status).toBe(413);
    expect(renderError(new NotFoundError('Unknown endpoint: /x'), { surface: 'http' }).status).toBe(404);
    expect(renderError(new Error('boom'), { surface: 'http' }).status).toBe(500);
  });

  it('includes validation issues', () => {
    const err = new InvalidRequestError('Request body failed validation.', {
      issues: [{ path: ['messages'], message: 'Required' }],
    });
    const rendered = renderError(err, { surface: 'http' });
    expect(rendered.status).toBe(422);
    expect(JSON.parse(rendered.body)).toEqual({
      error: {
        type: 'invalid_request',
        message: 'Request body failed validation.',
        issues: [{ path: ['messages'], message: 'Required' }],
      },
    });
  });

  it('never exposes the internal cause', () => {
    const rendered = renderError(new Error('db password is test-secret'), { surface: 'http' });
    expect(JSON.parse(rendered.body)).toEqual({ error: { type: 'internal_error', message: 'Internal server error.' } });
  });
});

describe('renderError (http, HTML)', () => {
  it('renders a page titled by the kind', () => {
    const rendered = renderError(new UpstreamUnavailableError([]), {
      surface: 'http',
      accept: 'text/html,application/xhtml+xml',
    });
    expect(rendered.status).toBe(503);
    expect(rendered.headers).toEqual({ 'Content-Type': 'text/html; charset=utf-8' });
    expect(rendered.body).toContain('<title>503 Service temporarily unavailable</title>');
    expect(rendered.body).toContain('<body data-error-type="upstream_unavailable">');
    expect(rendered.body).toContain('<p>The AI service is temporarily down. Please try again later.</p>');
  });

  it('escapes the message', () => {
    const rendered = renderError(new ProtocolViolationError('<script>"x"</script>'), { surface: 'http', accept: 'text/html' });
    expect(rendered.body).toContain('<p>&lt;script&gt;&quot;x&quot;&lt;/script&gt;</p>');
  });

  it('keeps Retry-After on HTML pages', () => {
    const rendered = renderError(new RateLimitExceededError(59_000), { surface: 'http', accept: 'text/html' });
    expect(rendered.headers['Retry-After']).toBe('59');
  });
});

describe('renderError (frame)', () => {
  it('renders a compact JSON frame', () => {
    expect(JSON.parse(renderError(new UpstreamStreamInterruptedError(), { surface: 'frame' }).body)).toEqual({
      error: 'The AI service stream was interrupted. Output received so far may be incomplete.',
      type: 'upstream_stream_interrupted',
    });
  });

  it('carries the retry hint for rate limits', () => {
    expect(JSON.parse(renderError(new RateLimitExceededError(58_000), { surface: 'frame' }).body)).toEqual({
      error: 'Rate limit exceeded. Retry in 58 seconds.',
      type: 'rate_limit_exceeded',
      retryAfterSeconds: 58,
    });
  });
});

describe('prefersHtml', () => {
  it('follows the order of the Accept header', () => {
    expect(prefersHtml('text/html')).toBe(true);
    expect(prefersHtml('text/html, application/json')).toBe(true);
    expect(prefersHtml('application/json, text/html')).toBe(false);
    expect(prefersHtml('*/*')).toBe(false);
    expect(prefersHtml(undefined)).toBe(false);
  });
});
