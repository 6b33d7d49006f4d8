/**
 * Chat Gateway Server
 *
 * HTTP and WebSocket front end for the dispatch core.
 *
 * Routes:
 * - `POST /api/v1/chat/completions`: blocking call (cached when possible), or
 *   an SSE relay when the body asks for `stream: true`
 * - `WS /ws/v1/chat/completions`: streaming relay sessions
 * - `GET /health`, `GET /stats`
 *
 * @packageDocumentation
 */

import * as http from 'node:http';
import type { AddressInfo } from 'node:net';
import type { ZodType, ZodTypeDef } from 'zod';
import { nanoid } from 'nanoid';
import { parseBearerToken, TierResolver } from './auth.js';
import { DEFAULT_CONFIG, getTierBudgets, watchConfig, type Config } from './config.js';
import { EndpointDispatcher } from './dispatcher.js';
import { EndpointRegistry } from './endpoint-registry.js';
import {
  InternalError,
  InvalidRequestError,
  NotFoundError,
  RateLimitExceededError,
  UpstreamStreamInterruptedError,
} from './errors.js';
import { normalizeError, renderError } from './error-normalizer.js';
import { fingerprintRequest } from './fingerprint.js';
import { handleHealthRequest } from './health.js';
import { defaultLogger, type Logger } from './logger.js';
import { RateLimiter } from './rate-limiter.js';
import { isCacheable, ResponseCache } from './response-cache.js';
import { DONE_FRAME, formatSseData } from './sse.js';
import { StatsCollector } from './stats.js';
import { buildChatRequestSchema, type ChatRequest, type ClientIdentity } from './types.js';
import { FetchTransport, type UpstreamTransport } from './upstream.js';
import { MAX_BODY_BYTES, parseJson, validateChatRequest } from './validation.js';
import { StreamRelay } from './ws-relay.js';

export const CHAT_COMPLETIONS_PATH = '/api/v1/chat/completions';
export const STREAM_PATH = '/ws/v1/chat/completions';

export type CacheStatus = 'HIT' | 'MISS' | 'BYPASS';

/**
 * Gateway server options
 */
export interface GatewayServerOptions {
  /** Validated configuration (default: DEFAULT_CONFIG) */
  config?: Config;
  /** Overrides `config.server.port` */
  port?: number;
  /** Overrides `config.server.host` */
  host?: string;
  /** Reload tiers and cache settings when this file changes */
  watchPath?: string;
  transport?: UpstreamTransport;
  stats?: StatsCollector;
  logger?: Logger;
}

async function readRequestBody(req: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) {
      throw new InvalidRequestError('Request body too large (max 10MB)', { status: 413 });
    }
    chunks.push(buf);
  }
  return Buffer.concat(chunks).toString('utf8');
}

function writeFrame(res: http.ServerResponse, frame: string): Promise<void> {
  return new Promise((resolve, reject) => {
    res.write(frame, (err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Chat Gateway Server
 */
export class GatewayServer {
  private server: http.Server | null = null;
  private stopWatching: (() => void) | null = null;
  private config: Config;
  private cacheEnabled: boolean;

  private readonly port: number;
  private readonly host: string;
  private readonly watchPath: string | undefined;
  private readonly logger: Logger;
  private readonly registry: EndpointRegistry;
  private readonly dispatcher: EndpointDispatcher;
  private readonly resolver: TierResolver;
  private readonly rateLimiter: RateLimiter;
  private readonly cache: ResponseCache;
  private readonly requestSchema: ZodType<ChatRequest, ZodTypeDef, unknown>;
  private readonly upstreamApiKey: string | undefined;
  private readonly relay: StreamRelay;
  readonly stats: StatsCollector;

  constructor(opts: GatewayServerOptions = {}) {
    this.config = opts.config ?? DEFAULT_CONFIG;
    this.port = opts.port ?? this.config.server.port;
    this.host = opts.host ?? this.config.server.host;
    this.watchPath = opts.watchPath;
    this.logger = opts.logger ?? defaultLogger;
    this.stats = opts.stats ?? new StatsCollector();
    this.cacheEnabled = this.config.cache.enabled;
    this.upstreamApiKey = this.config.upstream.apiKey;

    this.registry = new EndpointRegistry(this.config.upstream.endpoints);
    this.dispatcher = new EndpointDispatcher({
      registry: this.registry,
      transport: opts.transport ?? new FetchTransport({ chatPath: this.config.upstream.chatPath }),
      attemptTimeoutMs: this.config.upstream.attemptTimeoutMs,
      streamIdleTimeoutMs: this.config.upstream.streamIdleTimeoutMs,
      logger: this.logger,
      events: this.stats,
    });
    this.resolver = new TierResolver(this.config);
    this.rateLimiter = new RateLimiter({
      budgets: getTierBudgets(this.config),
      idleWindows: this.config.rateLimiter.idleWindows,
      events: this.stats,
    });
    this.cache = new ResponseCache({
      ttlMs: this.config.cache.ttlSeconds * 1000,
      maxEntries: this.config.cache.maxEntries,
    });
    this.requestSchema = buildChatRequestSchema(this.config.models);
    this.relay = new StreamRelay({
      resolver: this.resolver,
      rateLimiter: this.rateLimiter,
      dispatcher: this.dispatcher,
      requestSchema: this.requestSchema,
      upstreamApiKey: this.upstreamApiKey,
      idleTimeoutMs: this.config.session.idleTimeoutMs,
      logger: this.logger,
      events: this.stats,
    });
  }

  /**
   * Start the gateway server
   */
  async start(): Promise<void> {
    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        this.logger.error(`Unhandled error: ${String(err)}`);
        this.sendError(req, res, err);
      });
    });

    server.on('upgrade', (req: http.IncomingMessage, socket, head: Buffer) => {
      const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
      if (pathname !== STREAM_PATH) {
        socket.end('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
        return;
      }
      this.relay.handleUpgrade(req, socket, head);
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    this.server = server;

    const addr = this.address();
    this.logger.info(`Chat gateway listening on http://${this.host}:${addr?.port ?? this.port}`);
    this.logger.info(`Upstream endpoints: ${this.registry.listEndpoints().map((e) => e.id).join(', ')}`);

    if (this.watchPath) {
      this.stopWatching = watchConfig((config) => this.applyConfig(config), this.watchPath, this.logger);
    }
  }

  /**
   * Stop the gateway server, closing live sessions first
   */
  async stop(): Promise<void> {
    this.stopWatching?.();
    this.stopWatching = null;
    await this.relay.closeAll();

    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
    this.logger.info('Gateway server stopped');
  }

  address(): AddressInfo | null {
    const addr = this.server?.address();
    return addr && typeof addr !== 'string' ? addr : null;
  }

  getConfig(): Config {
    return this.config;
  }

  get activeSessions(): number {
    return this.relay.activeSessions;
  }

  /**
   * Apply reloaded settings: tier keys, rate budgets and cache options.
   * Endpoints and the upstream credential stay as started.
   */
  applyConfig(config: Config): void {
    this.config = config;
    this.resolver.updateConfig(config);
    this.rateLimiter.updateBudgets(getTierBudgets(config), config.rateLimiter.idleWindows);
    this.cache.updateOptions({ ttlMs: config.cache.ttlSeconds * 1000, maxEntries: config.cache.maxEntries });
    if (this.cacheEnabled && !config.cache.enabled) this.cache.clear();
    this.cacheEnabled = config.cache.enabled;
    this.logger.info('Configuration reloaded');
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');

    if (url.pathname === '/health' && req.method === 'GET') {
      handleHealthRequest(res, { endpoints: this.registry.size, activeSessions: this.relay.activeSessions });
      return;
    }

    if (url.pathname === '/stats' && req.method === 'GET') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(this.stats.getStats()));
      return;
    }

    if (url.pathname === CHAT_COMPLETIONS_PATH && req.method === 'POST') {
      await this.handleChatCompletions(req, res);
      return;
    }

    this.sendError(req, res, new NotFoundError(`Unknown endpoint: ${url.pathname}`));
  }

  private async handleChatCompletions(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const startTime = Date.now();
    const requestId = nanoid(12);
    res.setHeader('X-Request-Id', requestId);
    let streaming = false;
    let success = false;

    try {
      const identity = this.resolver.resolve(parseBearerToken(req.headers.authorization));
      const body = await readRequestBody(req);
      const request = validateChatRequest(this.requestSchema, parseJson(body));

      const decision = this.rateLimiter.admit(identity);
      if (!decision.allowed) {
        throw new RateLimitExceededError(decision.retryAfterMs);
      }
      this.logger.debug(`[${requestId}] ${identity.tier} ${request.model} stream=${request.stream === true}`);

      if (request.stream === true) {
        streaming = true;
        success = await this.relaySse(res, request, identity);
      } else {
        await this.respondBlocking(res, request, identity);
        success = true;
      }
    } catch (err) {
      this.sendError(req, res, err);
    } finally {
      const latencyMs = Date.now() - startTime;
      this.stats.record({ type: 'request_completed', latencyMs, success, streaming });
      this.logger.debug(`[${requestId}] finished in ${latencyMs}ms (${success ? 'ok' : 'failed'})`);
    }
  }

  private async respondBlocking(res: http.ServerResponse, request: ChatRequest, identity: ClientIdentity): Promise<void> {
    let fingerprint: string | null = null;

    if (this.cacheEnabled && isCacheable(request)) {
      fingerprint = fingerprintRequest(request);
      const hit = this.cache.lookup(fingerprint);
      if (hit) {
        this.stats.record({ type: 'cache_hit', fingerprint });
        this.sendPayload(res, hit.payload, 'HIT');
        return;
      }
      this.stats.record({ type: 'cache_miss', fingerprint });
    }

    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) controller.abort(new Error('Client disconnected'));
    };
    res.on('close', onClose);

    try {
      const response = await this.dispatcher.dispatch(request, 'blocking', {
        apiKey: this.upstreamApiKey ?? identity.key,
        signal: controller.signal,
      });
      const payload = JSON.stringify(response);
      if (fingerprint) this.cache.store(fingerprint, payload);
      this.sendPayload(res, payload, fingerprint ? 'MISS' : 'BYPASS');
    } finally {
      res.off('close', onClose);
    }
  }

  /**
   * Relay an upstream stream as SSE. Failures before the stream commits are
   * thrown (normal error response); later ones become one error event.
   */
  private async relaySse(res: http.ServerResponse, request: ChatRequest, identity: ClientIdentity): Promise<boolean> {
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) controller.abort(new Error('Client disconnected'));
    };
    res.on('close', onClose);

    try {
      const upstream = await this.dispatcher.dispatch(request, 'streaming', {
        apiKey: this.upstreamApiKey ?? identity.key,
        signal: controller.signal,
      });

      res.writeHead(200, {
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        'Connection': 'keep-alive',
      });

      try {
        let finished = false;
        for await (const event of upstream.events) {
          if (event.type === 'chunk') {
            await writeFrame(res, formatSseData(event.data));
          } else if (event.type === 'done') {
            await writeFrame(res, DONE_FRAME);
            finished = true;
            break;
          } else {
            throw new UpstreamStreamInterruptedError(new Error(event.data.slice(0, 500)));
          }
        }
        if (!finished) {
          throw new UpstreamStreamInterruptedError(new Error('Upstream stream ended without the terminal marker'));
        }
        return true;
      } catch (err) {
        if (controller.signal.aborted) {
          this.logger.debug('SSE client disconnected mid-stream');
          return false;
        }
        const normalized = normalizeError(err);
        if (normalized instanceof InternalError) {
          this.logger.error(`SSE relay failed: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
        }
        await writeFrame(res, formatSseData(renderError(normalized, { surface: 'frame' }).body));
        return false;
      } finally {
        res.end();
      }
    } finally {
      res.off('close', onClose);
    }
  }

  private sendPayload(res: http.ServerResponse, payload: string, cache: CacheStatus): void {
    res.writeHead(200, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(payload),
      'X-Cache': cache,
    });
    res.end(payload);
  }

  /**
   * Send error response
   */
  private sendError(req: http.IncomingMessage, res: http.ServerResponse, err: unknown): void {
    if (res.destroyed) {
      this.logger.debug(`Client went away: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }

    const normalized = normalizeError(err);
    if (normalized instanceof InternalError) {
      this.logger.error(`Request failed: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    }

    if (res.headersSent) {
      if (!res.writableEnded) res.end();
      return;
    }

    const rendered = renderError(normalized, { surface: 'http', accept: req.headers.accept });
    res.writeHead(rendered.status, rendered.headers);
    res.end(rendered.body);
  }
}
