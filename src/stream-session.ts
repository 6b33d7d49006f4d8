/**
 * Streaming Relay session
 *
 * One session per live client connection. The first message authenticates;
 * every later message is a chat request relayed from the upstream chunk by
 * chunk. The session owns the AbortController of its in-flight upstream call,
 * so closing the session stops the upstream read.
 *
 * States: awaiting-auth → authenticated ⇄ serving → closed
 *
 * @packageDocumentation
 */

import { EventEmitter } from 'node:events';
import type { ZodType, ZodTypeDef } from 'zod';
import { nanoid } from 'nanoid';
import type { TierResolver } from './auth.js';
import type { EndpointDispatcher } from './dispatcher.js';
import {
  AuthenticationError,
  InternalError,
  InvalidRequestError,
  ProtocolViolationError,
  RateLimitExceededError,
  UpstreamStreamInterruptedError,
} from './errors.js';
import { normalizeError, renderError } from './error-normalizer.js';
import { defaultLogger, type Logger } from './logger.js';
import type { RateLimiter } from './rate-limiter.js';
import { DONE_FRAME, formatSseData } from './sse.js';
import { nullSink, type EventSink } from './stats.js';
import {
  AuthMessageSchema,
  ChatRequestSchema,
  type ChatRequest,
  type ClientIdentity,
  type SessionState,
} from './types.js';
import { isRecord, parseJson, validateChatRequest } from './validation.js';

export const CloseCodes = {
  normal: 1000,
  goingAway: 1001,
  policyViolation: 1008,
} as const;

/**
 * What a session needs from the client connection.
 */
export interface SessionTransport {
  /** Resolves once the frame was handed to the socket. */
  send(frame: string): Promise<void>;
  close(code: number, reason: string): void;
}

export interface StreamSessionDeps {
  resolver: TierResolver;
  rateLimiter: RateLimiter;
  dispatcher: EndpointDispatcher;
  requestSchema?: ZodType<ChatRequest, ZodTypeDef, unknown>;
  /** Credential sent upstream instead of the client's key. */
  upstreamApiKey?: string;
  /** Close after this long without a client message while not serving (default: 300000) */
  idleTimeoutMs?: number;
  logger?: Logger;
  events?: EventSink;
}

export interface StateChange {
  from: SessionState;
  to: SessionState;
}

export class StreamSession extends EventEmitter {
  readonly id = nanoid();

  private state: SessionState = 'awaiting-auth';
  private identity: ClientIdentity | null = null;
  private inflight: AbortController | null = null;
  private inbox: Promise<void> = Promise.resolve();
  private relay: Promise<void> = Promise.resolve();
  private idleTimer: NodeJS.Timeout | null = null;

  private readonly transport: SessionTransport;
  private readonly deps: StreamSessionDeps;
  private readonly requestSchema: ZodType<ChatRequest, ZodTypeDef, unknown>;
  private readonly idleTimeoutMs: number;
  private readonly logger: Logger;
  private readonly events: EventSink;

  constructor(transport: SessionTransport, deps: StreamSessionDeps) {
    super();
    this.transport = transport;
    this.deps = deps;
    this.requestSchema = deps.requestSchema ?? ChatRequestSchema;
    this.idleTimeoutMs = deps.idleTimeoutMs ?? 300_000;
    this.logger = deps.logger ?? defaultLogger;
    this.events = deps.events ?? nullSink;
    this.armIdleTimer();
  }

  getState(): SessionState {
    return this.state;
  }

  getIdentity(): ClientIdentity | null {
    return this.identity;
  }

  /**
   * Feed one client message. Messages are handled one at a time in arrival
   * order; the returned promise settles once this one has been handled (a
   * relay it starts keeps running, see `whenIdle`).
   */
  handleMessage(raw: string): Promise<void> {
    const handled = this.inbox.then(() => this.process(raw));
    this.inbox = handled;
    return handled;
  }

  /** Settles once queued messages and the current relay are finished. */
  whenIdle(): Promise<void> {
    return this.inbox.then(() => this.relay);
  }

  /** The client went away; nothing more is sent. */
  handleDisconnect(): void {
    if (this.state === 'closed') return;
    this.transitionTo('closed');
  }

  close(code: number = CloseCodes.normal, reason = ''): void {
    if (this.state === 'closed') return;
    this.transitionTo('closed');
    this.transport.close(code, reason);
  }

  private async process(raw: string): Promise<void> {
    if (this.state === 'closed') return;
    const before = this.state;
    if (before !== 'serving') this.armIdleTimer();

    try {
      if (before === 'awaiting-auth') {
        await this.authenticate(raw);
      } else {
        await this.acceptRequest(raw);
      }
    } catch (err) {
      const fatal = before === 'awaiting-auth' || err instanceof ProtocolViolationError;
      await this.reportError(err);
      if (fatal) this.close(CloseCodes.policyViolation, normalizeError(err).kind);
    }
  }

  private async authenticate(raw: string): Promise<void> {
    const data = parseJson(raw);
    if (isRecord(data) && 'messages' in data) {
      throw new ProtocolViolationError('Send {"api_key": "..."} before any chat request.');
    }
    const auth = AuthMessageSchema.safeParse(data);
    if (!auth.success) {
      throw new AuthenticationError('API Key is required');
    }

    const identity = this.deps.resolver.resolve(auth.data.api_key);
    this.identity = identity;
    this.transitionTo('authenticated');
    await this.send(JSON.stringify({ event: 'authenticated', session: this.id, tier: identity.tier }));
  }

  private async acceptRequest(raw: string): Promise<void> {
    const data = parseJson(raw);
    if (isRecord(data) && 'api_key' in data) {
      throw new ProtocolViolationError('Session is already authenticated.');
    }
    if (this.state === 'serving') {
      throw new InvalidRequestError('A chat request is already in flight on this session.');
    }

    const request = validateChatRequest(this.requestSchema, data);
    const identity = this.identity;
    if (!identity) {
      throw new InternalError(new Error(`Session ${this.id} has no identity in state ${this.state}`));
    }

    const decision = this.deps.rateLimiter.admit(identity);
    if (!decision.allowed) {
      throw new RateLimitExceededError(decision.retryAfterMs);
    }

    const controller = new AbortController();
    this.inflight = controller;
    this.clearIdleTimer();
    this.transitionTo('serving');
    this.relay = this.runRelay(identity, request, controller.signal);
  }

  private async runRelay(identity: ClientIdentity, request: ChatRequest, signal: AbortSignal): Promise<void> {
    const started = Date.now();
    let success = false;

    try {
      const upstream = await this.deps.dispatcher.dispatch(request, 'streaming', {
        apiKey: this.deps.upstreamApiKey ?? identity.key,
        signal,
      });
      this.logger.debug(`Session ${this.id} relaying from ${upstream.endpoint.id}`);

      let finished = false;
      for await (const event of upstream.events) {
        if (event.type === 'chunk') {
          await this.send(formatSseData(event.data));
        } else if (event.type === 'done') {
          await this.send(DONE_FRAME);
          finished = true;
          break;
        } else {
          throw new UpstreamStreamInterruptedError(new Error(event.data.slice(0, 500)));
        }
      }
      if (!finished) {
        throw new UpstreamStreamInterruptedError(new Error('Upstream stream ended without the terminal marker'));
      }
      success = true;
    } catch (err) {
      await this.reportError(err);
    } finally {
      this.inflight = null;
      this.events.record({ type: 'request_completed', latencyMs: Date.now() - started, success, streaming: true });
      if (this.state === 'serving') {
        this.transitionTo('authenticated');
        this.armIdleTimer();
      }
    }
  }

  /**
   * Send one normalized error frame. Nothing is sent once closed.
   */
  private async reportError(err: unknown): Promise<void> {
    if (this.state === 'closed') return;
    const normalized = normalizeError(err);
    if (normalized instanceof InternalError) {
      this.logger.error(`Session ${this.id} failed: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    }
    try {
      await this.send(renderError(normalized, { surface: 'frame' }).body);
    } catch (sendErr) {
      this.logger.debug(`Session ${this.id} could not deliver error frame: ${String(sendErr)}`);
    }
  }

  /**
   * Send a frame; a failed send means the client is gone, so the session
   * closes and the error propagates to stop the caller.
   */
  private async send(frame: string): Promise<void> {
    try {
      await this.transport.send(frame);
    } catch (err) {
      this.logger.debug(`Session ${this.id} send failed: ${err instanceof Error ? err.message : String(err)}`);
      this.close(CloseCodes.goingAway, 'send failed');
      throw err;
    }
  }

  private transitionTo(to: SessionState): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;

    if (to === 'closed') {
      this.clearIdleTimer();
      this.inflight?.abort(new Error(`Session ${this.id} closed`));
      this.inflight = null;
    }

    this.logger.debug(`Session ${this.id}: ${from} -> ${to}`);
    this.events.record({ type: 'session_transition', session: this.id, from, to });
    this.emit('stateChange', { from, to } satisfies StateChange);
  }

  private armIdleTimer(): void {
    this.clearIdleTimer();
    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      this.logger.info(`Session ${this.id} idle for ${this.idleTimeoutMs}ms, closing`);
      this.close(CloseCodes.goingAway, 'idle timeout');
    }, this.idleTimeoutMs);
    this.idleTimer.unref();
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }
}
