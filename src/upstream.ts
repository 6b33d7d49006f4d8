/**
 * Upstream transport
 *
 * Issues chat-completion calls to a single endpoint, over fetch. Fallback
 * across endpoints lives in the dispatcher; this module only knows how to
 * talk to one.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import type { Endpoint } from './endpoint-registry.js';
import { UpstreamAttemptError } from './errors.js';
import { parseSseStream } from './sse.js';
import type { ChatCompletionResponse, ChatRequest, StreamEvent } from './types.js';

export interface UpstreamCallOptions {
  /** Credential sent as `Authorization: Bearer <apiKey>`. */
  apiKey?: string;
  signal: AbortSignal;
}

export interface UpstreamTransport {
  /** Blocking call: resolves with the complete response. */
  complete(endpoint: Endpoint, request: ChatRequest, opts: UpstreamCallOptions): Promise<ChatCompletionResponse>;
  /** Streaming call: resolves once the upstream accepted the call. */
  openStream(endpoint: Endpoint, request: ChatRequest, opts: UpstreamCallOptions): Promise<AsyncIterator<StreamEvent>>;
}

const UpstreamCompletionSchema = z.object({
  id: z.string().nullish(),
  object: z.string().nullish(),
  created: z.number().nullish(),
  model: z.string().nullish(),
  choices: z.array(z.object({
    index: z.number().nullish(),
    message: z.unknown(),
    finish_reason: z.string().nullish(),
  })).nullish(),
  usage: z.record(z.unknown()).nullish(),
});

/**
 * Reduce an upstream completion body to the OpenAI-compatible shape handed
 * to clients. Throws when the body is not a completion object.
 */
export function toChatCompletion(data: unknown): ChatCompletionResponse {
  const parsed = UpstreamCompletionSchema.safeParse(data);
  if (!parsed.success) {
    throw new UpstreamAttemptError('invalid_response', 'Upstream returned an unexpected response body', {
      detail: parsed.error.message,
    });
  }
  const body = parsed.data;
  return {
    id: body.id ?? null,
    object: body.object ?? null,
    created: body.created ?? null,
    model: body.model ?? null,
    choices: (body.choices ?? []).map((choice) => ({
      index: choice.index ?? null,
      message: choice.message ?? null,
      finish_reason: choice.finish_reason ?? null,
    })),
    usage: body.usage ?? {},
  };
}

/**
 * Body forwarded upstream: the validated request with `stream` pinned for
 * the call mode (absent for blocking calls).
 */
export function buildUpstreamBody(request: ChatRequest, stream: boolean): Record<string, unknown> {
  const { stream: _ignored, ...rest } = request;
  return stream ? { ...rest, stream: true } : rest;
}

/**
 * Decode a fetch body into text pieces.
 */
async function* readBodyText(
  body: ReadableStream<Uint8Array>
): AsyncGenerator<string, void, unknown> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let finished = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      yield decoder.decode(value, { stream: true });
    }
    finished = true;
    const rest = decoder.decode();
    if (rest) yield rest;
  } finally {
    if (!finished) {
      // The body may already be errored by an abort; either way it is released
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }
}

export interface FetchTransportOptions {
  /** Path appended to each endpoint (default: "/chat/completions") */
  chatPath?: string;
  fetch?: typeof fetch;
}

export class FetchTransport implements UpstreamTransport {
  private readonly chatPath: string;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: FetchTransportOptions = {}) {
    this.chatPath = opts.chatPath ?? '/chat/completions';
    this.fetchImpl = opts.fetch ?? fetch;
  }

  urlFor(endpoint: Endpoint): string {
    return `${endpoint.id}${this.chatPath}`;
  }

  async complete(endpoint: Endpoint, request: ChatRequest, opts: UpstreamCallOptions): Promise<ChatCompletionResponse> {
    const response = await this.post(endpoint, buildUpstreamBody(request, false), opts, 'application/json');
    const text = await response.text();

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      throw new UpstreamAttemptError('invalid_response', 'Upstream returned a body that is not JSON', {
        status: response.status,
        detail: text.slice(0, 500),
        cause: err,
      });
    }
    return toChatCompletion(data);
  }

  async openStream(endpoint: Endpoint, request: ChatRequest, opts: UpstreamCallOptions): Promise<AsyncIterator<StreamEvent>> {
    const response = await this.post(endpoint, buildUpstreamBody(request, true), opts, 'text/event-stream');
    if (!response.body) {
      throw new UpstreamAttemptError('invalid_response', 'Upstream stream has no body', { status: response.status });
    }
    return parseSseStream(readBodyText(response.body))[Symbol.asyncIterator]();
  }

  private async post(
    endpoint: Endpoint,
    body: Record<string, unknown>,
    opts: UpstreamCallOptions,
    accept: string
  ): Promise<Response> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: accept,
    };
    if (opts.apiKey) {
      headers['Authorization'] = `Bearer ${opts.apiKey}`;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.urlFor(endpoint), {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: opts.signal,
      });
    } catch (err) {
      if (opts.signal.aborted) throw err;
      const msg = err instanceof Error ? err.message : String(err);
      throw new UpstreamAttemptError('network', `Cannot connect to ${endpoint.id}: ${msg}`, { cause: err });
    }

    if (!response.ok) {
      const detail = await response.text().catch((err: unknown) => `<unreadable body: ${String(err)}>`);
      throw new UpstreamAttemptError('status', `Upstream ${endpoint.id} returned ${response.status}`, {
        status: response.status,
        detail: detail.slice(0, 500),
      });
    }

    return response;
  }
}
