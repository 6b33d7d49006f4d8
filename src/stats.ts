/**
 * Stats Collector for the gateway
 *
 * Event sink for the dispatch core. Keeps discrete events in a rolling
 * 1-hour window and summarizes them on demand.
 *
 * @packageDocumentation
 */

import type { SessionState, Tier } from './types.js';

export type GatewayEvent =
  | { type: 'cache_hit'; fingerprint: string }
  | { type: 'cache_miss'; fingerprint: string }
  | { type: 'endpoint_attempt'; endpoint: string; mode: 'blocking' | 'streaming' }
  | { type: 'endpoint_failure'; endpoint: string; reason: string }
  | { type: 'rate_limited'; tier: Tier }
  | { type: 'session_transition'; session: string; from: SessionState; to: SessionState }
  | { type: 'request_completed'; latencyMs: number; success: boolean; streaming: boolean };

type TimedEvent = GatewayEvent & { timestamp: number };

/**
 * Anything that accepts gateway events.
 */
export interface EventSink {
  record(event: GatewayEvent): void;
}

export interface StatsSnapshot {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  streamingRequests: number;
  cacheHits: number;
  cacheMisses: number;
  cacheHitRate: number;
  endpointAttempts: number;
  endpointFailures: Record<string, number>;
  rateLimited: Record<Tier, number>;
  sessionsOpened: number;
  sessionsClosed: number;
  avgLatencyMs: number;
  p50LatencyMs: number;
  p95LatencyMs: number;
  p99LatencyMs: number;
}

const ROLLING_WINDOW_MS = 60 * 60 * 1000; // 1 hour

export class StatsCollector implements EventSink {
  private events: TimedEvent[] = [];

  record(event: GatewayEvent): void {
    this.events.push({ ...event, timestamp: Date.now() });
    this.prune();
  }

  getStats(): StatsSnapshot {
    this.prune();

    const completed = this.events.filter(
      (e): e is Extract<TimedEvent, { type: 'request_completed' }> => e.type === 'request_completed'
    );
    const hits = this.count('cache_hit');
    const misses = this.count('cache_miss');
    const latencies = completed.map((r) => r.latencyMs).sort((a, b) => a - b);

    const endpointFailures: Record<string, number> = {};
    const rateLimited: Record<Tier, number> = { customer: 0, business: 0 };
    let sessionsOpened = 0;
    let sessionsClosed = 0;
    for (const e of this.events) {
      if (e.type === 'endpoint_failure') {
        endpointFailures[e.endpoint] = (endpointFailures[e.endpoint] ?? 0) + 1;
      } else if (e.type === 'rate_limited') {
        rateLimited[e.tier]++;
      } else if (e.type === 'session_transition') {
        if (e.from === 'awaiting-auth' && e.to === 'authenticated') sessionsOpened++;
        if (e.to === 'closed') sessionsClosed++;
      }
    }

    return {
      totalRequests: completed.length,
      successfulRequests: completed.filter((r) => r.success).length,
      failedRequests: completed.filter((r) => !r.success).length,
      streamingRequests: completed.filter((r) => r.streaming).length,
      cacheHits: hits,
      cacheMisses: misses,
      cacheHitRate: hits + misses > 0 ? hits / (hits + misses) : 0,
      endpointAttempts: this.count('endpoint_attempt'),
      endpointFailures,
      rateLimited,
      sessionsOpened,
      sessionsClosed,
      avgLatencyMs: latencies.length ? Math.round(latencies.reduce((a, b) => a + b, 0) / latencies.length) : 0,
      p50LatencyMs: percentile(latencies, 0.5),
      p95LatencyMs: percentile(latencies, 0.95),
      p99LatencyMs: percentile(latencies, 0.99),
    };
  }

  private count(type: GatewayEvent['type']): number {
    return this.events.filter((e) => e.type === type).length;
  }

  private prune(): void {
    const cutoff = Date.now() - ROLLING_WINDOW_MS;
    if (this.events.length > 0 && (this.events[0]?.timestamp ?? cutoff) < cutoff) {
      this.events = this.events.filter((e) => e.timestamp >= cutoff);
    }
  }
}

/** Sink that drops everything. */
export const nullSink: EventSink = { record: () => {} };

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.ceil(p * sorted.length) - 1;
  return sorted[Math.max(0, idx)] ?? 0;
}
