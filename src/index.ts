/**
 * chat-relay-gateway
 *
 * Chat-completion forwarding gateway: in-order endpoint fallback, response
 * caching, tiered rate limits and a WebSocket streaming relay.
 *
 * @example
 * ```typescript
 * import { GatewayServer, loadConfig } from 'chat-relay-gateway';
 *
 * const server = new GatewayServer({ config: loadConfig() });
 * await server.start();
 * ```
 *
 * @packageDocumentation
 */

// Server
export { GatewayServer, CHAT_COMPLETIONS_PATH, STREAM_PATH } from './server.js';
export type { GatewayServerOptions, CacheStatus } from './server.js';

// Configuration
export {
  DEFAULT_CONFIG,
  parseConfig,
  loadConfig,
  writeDefaultConfig,
  applyEnvOverrides,
  getConfigPath,
  getTierBudget,
  getTierBudgets,
  watchConfig,
} from './config.js';
export type { Config, ConfigInput, TierConfig } from './config.js';

// Dispatch core
export { EndpointRegistry } from './endpoint-registry.js';
export type { Endpoint } from './endpoint-registry.js';
export { EndpointDispatcher } from './dispatcher.js';
export type { DispatchMode, DispatchOptions, UpstreamStream, EndpointDispatcherOptions } from './dispatcher.js';
export { FetchTransport, toChatCompletion, buildUpstreamBody } from './upstream.js';
export type { UpstreamTransport, UpstreamCallOptions, FetchTransportOptions } from './upstream.js';
export { parseSseStream, formatSseData, DONE_FRAME, DONE_MARKER } from './sse.js';
export { RateLimiter } from './rate-limiter.js';
export type { AdmitResult, RateBucket, RateLimiterOptions } from './rate-limiter.js';
export { ResponseCache, isCacheable } from './response-cache.js';
export type { CachedArtifact, ResponseCacheOptions } from './response-cache.js';
export { fingerprintRequest, canonicalJson } from './fingerprint.js';
export { TierResolver, parseBearerToken } from './auth.js';

// Streaming relay
export { StreamSession, CloseCodes } from './stream-session.js';
export type { SessionTransport, StreamSessionDeps, StateChange } from './stream-session.js';
export { StreamRelay } from './ws-relay.js';

// Errors
export {
  GatewayError,
  AuthenticationError,
  RateLimitExceededError,
  UpstreamAttemptError,
  UpstreamUnavailableError,
  UpstreamStreamInterruptedError,
  ProtocolViolationError,
  InvalidRequestError,
  NotFoundError,
  InternalError,
  ErrorKinds,
} from './errors.js';
export type { ErrorKind, AttemptFailureReason, EndpointFailure, ValidationIssue } from './errors.js';
export { normalizeError, renderError, prefersHtml } from './error-normalizer.js';
export type { CallerContext, RenderedError } from './error-normalizer.js';

// Observability
export { StatsCollector, nullSink } from './stats.js';
export type { GatewayEvent, EventSink, StatsSnapshot } from './stats.js';
export { createLogger, defaultLogger, silentLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

// Types
export {
  Tiers,
  DEFAULT_MODELS,
  ChatRequestSchema,
  buildChatRequestSchema,
  SessionStates,
} from './types.js';
export type {
  Tier,
  RateBudget,
  ClientIdentity,
  ChatRequest,
  ChatMessage,
  ChatCompletionResponse,
  StreamEvent,
  SessionState,
} from './types.js';
