/**
 * Response Cache
 *
 * Fingerprint → serialized non-streaming response, expired lazily at lookup.
 * The payload is kept as the exact bytes sent to the first caller so a hit
 * replays them unchanged.
 *
 * @packageDocumentation
 */

import type { ChatRequest } from './types.js';

export interface CachedArtifact {
  payload: string;
  createdAt: number;
  ttlMs: number;
}

export interface ResponseCacheOptions {
  /** Default time-to-live in ms (default: 300000) */
  ttlMs?: number;
  /** Maximum number of entries; oldest inserted go first (default: 1000) */
  maxEntries?: number;
}

export class ResponseCache {
  private readonly entries = new Map<string, CachedArtifact>();
  private ttlMs: number;
  private maxEntries: number;

  constructor(opts: ResponseCacheOptions = {}) {
    this.ttlMs = opts.ttlMs ?? 300_000;
    this.maxEntries = opts.maxEntries ?? 1000;
  }

  updateOptions(opts: ResponseCacheOptions): void {
    if (opts.ttlMs !== undefined) this.ttlMs = opts.ttlMs;
    if (opts.maxEntries !== undefined) this.maxEntries = opts.maxEntries;
  }

  lookup(fingerprint: string): CachedArtifact | undefined {
    const entry = this.entries.get(fingerprint);
    if (!entry) return undefined;
    if (Date.now() - entry.createdAt >= entry.ttlMs) {
      this.entries.delete(fingerprint);
      return undefined;
    }
    return { ...entry };
  }

  /** Last writer wins for a fingerprint. */
  store(fingerprint: string, payload: string, ttlMs: number = this.ttlMs): void {
    // Re-insert so overwrites count as newest for eviction
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, { payload, createdAt: Date.now(), ttlMs });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  clear(): void {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }
}

/**
 * Whether a response to this request may be cached and replayed.
 * Streaming requests never are; neither are requests that ask for sampling
 * randomness without pinning a seed.
 */
export function isCacheable(request: ChatRequest): boolean {
  if (request.stream === true) return false;
  const seeded = request.seed !== undefined && request.seed !== null;
  if (seeded) return true;
  if (typeof request.temperature === 'number' && request.temperature > 0) return false;
  if (typeof request.top_p === 'number' && request.top_p < 1) return false;
  return true;
}
