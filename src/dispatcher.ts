/**
 * Endpoint Dispatcher
 *
 * Tries endpoints in registry order until one succeeds. Every request starts
 * from the first endpoint; nothing is remembered between requests.
 *
 * Blocking mode succeeds when a complete response is decoded. Streaming mode
 * succeeds once the upstream accepted the call and produced its first event;
 * from then on the stream is committed and a failure is surfaced as an
 * interruption instead of moving on to the next endpoint.
 *
 * @packageDocumentation
 */

import type { Endpoint, EndpointRegistry } from './endpoint-registry.js';
import {
  UpstreamAttemptError,
  UpstreamStreamInterruptedError,
  UpstreamUnavailableError,
  type EndpointFailure,
} from './errors.js';
import { defaultLogger, type Logger } from './logger.js';
import { nullSink, type EventSink } from './stats.js';
import type { ChatCompletionResponse, ChatRequest, StreamEvent } from './types.js';
import type { UpstreamTransport } from './upstream.js';

export type DispatchMode = 'blocking' | 'streaming';

export interface DispatchOptions {
  /** Credential forwarded to the upstream. */
  apiKey?: string;
  /** Caller cancellation (client disconnect). */
  signal?: AbortSignal;
}

/**
 * A committed upstream stream. `events` starts with the event that committed
 * it; iteration failures are UpstreamStreamInterruptedError.
 */
export interface UpstreamStream {
  endpoint: Endpoint;
  events: AsyncGenerator<StreamEvent, void, unknown>;
  /** Abort the upstream read and release the connection. */
  cancel(): void;
}

export interface EndpointDispatcherOptions {
  registry: EndpointRegistry;
  transport: UpstreamTransport;
  /** Per-attempt timeout in ms (default: 15000) */
  attemptTimeoutMs?: number;
  /** Longest wait for the next event of a committed stream (default: attemptTimeoutMs) */
  streamIdleTimeoutMs?: number;
  logger?: Logger;
  events?: EventSink;
}

interface Attempt {
  controller: AbortController;
  timedOut(): boolean;
  /** Stop the attempt timer; the controller stays linked to the caller. */
  disarm(): void;
  /** Unlink from the caller signal. */
  release(): void;
}

/**
 * AbortController for one attempt, aborted by its own timer or by the caller.
 */
function startAttempt(timeoutMs: number, parent?: AbortSignal): Attempt {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`Attempt timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    controller,
    timedOut: () => expired,
    disarm: () => clearTimeout(timer),
    release: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

function callerAbortError(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason;
  const err = new Error('Request aborted by caller');
  err.name = 'AbortError';
  return err;
}

export class EndpointDispatcher {
  private readonly registry: EndpointRegistry;
  private readonly transport: UpstreamTransport;
  private readonly attemptTimeoutMs: number;
  private readonly streamIdleTimeoutMs: number;
  private readonly logger: Logger;
  private readonly events: EventSink;

  constructor(opts: EndpointDispatcherOptions) {
    this.registry = opts.registry;
    this.transport = opts.transport;
    this.attemptTimeoutMs = opts.attemptTimeoutMs ?? 15_000;
    this.streamIdleTimeoutMs = opts.streamIdleTimeoutMs ?? this.attemptTimeoutMs;
    this.logger = opts.logger ?? defaultLogger;
    this.events = opts.events ?? nullSink;
  }

  dispatch(request: ChatRequest, mode: 'blocking', opts?: DispatchOptions): Promise<ChatCompletionResponse>;
  dispatch(request: ChatRequest, mode: 'streaming', opts?: DispatchOptions): Promise<UpstreamStream>;
  dispatch(
    request: ChatRequest,
    mode: DispatchMode,
    opts: DispatchOptions = {}
  ): Promise<ChatCompletionResponse | UpstreamStream> {
    return mode === 'blocking' ? this.dispatchBlocking(request, opts) : this.dispatchStreaming(request, opts);
  }

  private async dispatchBlocking(request: ChatRequest, opts: DispatchOptions): Promise<ChatCompletionResponse> {
    const failures: EndpointFailure[] = [];

    for (const endpoint of this.registry.listEndpoints()) {
      this.throwIfCallerAborted(opts.signal);
      this.events.record({ type: 'endpoint_attempt', endpoint: endpoint.id, mode: 'blocking' });
      const attempt = startAttempt(this.attemptTimeoutMs, opts.signal);
      try {
        const response = await this.transport.complete(endpoint, request, {
          apiKey: opts.apiKey,
          signal: attempt.controller.signal,
        });
        this.logger.debug(`Upstream ${endpoint.id} answered (attempt ${failures.length + 1})`);
        return response;
      } catch (err) {
        this.throwIfCallerAborted(opts.signal);
        failures.push({ endpoint, error: this.recordFailure(endpoint, err, attempt) });
      } finally {
        attempt.release();
      }
    }

    throw this.exhausted(failures);
  }

  private async dispatchStreaming(request: ChatRequest, opts: DispatchOptions): Promise<UpstreamStream> {
    const failures: EndpointFailure[] = [];

    for (const endpoint of this.registry.listEndpoints()) {
      this.throwIfCallerAborted(opts.signal);
      this.events.record({ type: 'endpoint_attempt', endpoint: endpoint.id, mode: 'streaming' });
      const attempt = startAttempt(this.attemptTimeoutMs, opts.signal);
      let iterator: AsyncIterator<StreamEvent> | null = null;
      try {
        iterator = await this.transport.openStream(endpoint, request, {
          apiKey: opts.apiKey,
          signal: attempt.controller.signal,
        });
        const first = await iterator.next();
        if (first.done) {
          throw new UpstreamAttemptError('stream_error', `Upstream ${endpoint.id} closed the stream before any event`);
        }
        if (first.value.type === 'error') {
          throw new UpstreamAttemptError('stream_error', `Upstream ${endpoint.id} sent an error event`, {
            detail: first.value.data.slice(0, 500),
          });
        }
        attempt.disarm();
        this.logger.debug(`Upstream ${endpoint.id} committed stream (attempt ${failures.length + 1})`);
        return this.committed(endpoint, first.value, iterator, attempt);
      } catch (err) {
        attempt.release();
        if (iterator?.return) {
          await iterator.return(undefined).catch((closeErr: unknown) => {
            this.logger.debug(`Closing failed stream from ${endpoint.id}: ${String(closeErr)}`);
          });
        }
        this.throwIfCallerAborted(opts.signal);
        failures.push({ endpoint, error: this.recordFailure(endpoint, err, attempt) });
      }
    }

    throw this.exhausted(failures);
  }

  private committed(
    endpoint: Endpoint,
    first: StreamEvent,
    iterator: AsyncIterator<StreamEvent>,
    attempt: Attempt
  ): UpstreamStream {
    const logger = this.logger;
    const idleMs = this.streamIdleTimeoutMs;
    const controller = attempt.controller;
    const signal = controller.signal;

    async function* events(): AsyncGenerator<StreamEvent, void, unknown> {
      try {
        yield first;
        if (first.type === 'done') return;
        while (true) {
          let next: IteratorResult<StreamEvent>;
          // Only the wait on the upstream counts, not time spent by the consumer
          let stalled = false;
          const gap = setTimeout(() => {
            stalled = true;
            controller.abort(new Error(`No data from ${endpoint.id} for ${idleMs}ms`));
          }, idleMs);
          try {
            next = await iterator.next();
          } catch (err) {
            if (stalled) {
              logger.warn(`Stream from ${endpoint.id} stalled for ${idleMs}ms`);
              throw new UpstreamStreamInterruptedError(err);
            }
            if (signal.aborted) throw callerAbortError(signal);
            logger.error(`Stream from ${endpoint.id} failed mid-stream: ${err instanceof Error ? err.message : String(err)}`);
            throw new UpstreamStreamInterruptedError(err);
          } finally {
            clearTimeout(gap);
          }
          if (next.done) return;
          yield next.value;
          if (next.value.type === 'done') return;
        }
      } finally {
        attempt.release();
        if (iterator.return) {
          await iterator.return(undefined).catch((err: unknown) => {
            logger.debug(`Closing stream from ${endpoint.id}: ${String(err)}`);
          });
        }
      }
    }

    return {
      endpoint,
      events: events(),
      cancel: () => attempt.controller.abort(new Error('Stream cancelled')),
    };
  }

  private recordFailure(endpoint: Endpoint, err: unknown, attempt: Attempt): UpstreamAttemptError {
    let failure: UpstreamAttemptError;
    if (attempt.timedOut()) {
      failure = new UpstreamAttemptError('timeout', `Upstream ${endpoint.id} timed out after ${this.attemptTimeoutMs}ms`, { cause: err });
    } else if (err instanceof UpstreamAttemptError) {
      failure = err;
    } else {
      const msg = err instanceof Error ? err.message : String(err);
      failure = new UpstreamAttemptError('network', `Upstream ${endpoint.id} failed: ${msg}`, { cause: err });
    }

    const detail = failure.detail ? ` - ${failure.detail}` : '';
    this.logger.warn(`${failure.message}${detail}`);
    this.events.record({ type: 'endpoint_failure', endpoint: endpoint.id, reason: failure.reason });
    return failure;
  }

  private exhausted(failures: EndpointFailure[]): UpstreamUnavailableError {
    this.logger.error(`All ${failures.length} upstream endpoints failed`);
    return new UpstreamUnavailableError(failures);
  }

  private throwIfCallerAborted(signal?: AbortSignal): void {
    if (signal?.aborted) throw callerAbortError(signal);
  }
}
