import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { StatsCollector } from '../src/stats.js';

describe('StatsCollector', () => {
  let stats: StatsCollector;

  beforeEach(() => {
    stats = new StatsCollector();
  });

  it('starts with empty stats', () => {
    const s = stats.getStats();
    expect(s.totalRequests).toBe(0);
    expect(s.failedRequests).toBe(0);
    expect(s.cacheHitRate).toBe(0);
    expect(s.avgLatencyMs).toBe(0);
    expect(s.p50LatencyMs).toBe(0);
    expect(s.p95LatencyMs).toBe(0);
    expect(s.p99LatencyMs).toBe(0);
    expect(s.rateLimited).toEqual({ customer: 0, business: 0 });
  });

  it('tracks request outcomes', () => {
    stats.record({ type: 'request_completed', latencyMs: 100, success: true, streaming: false });
    stats.record({ type: 'request_completed', latencyMs: 50, success: true, streaming: true });
    stats.record({ type: 'request_completed', latencyMs: 200, success: false, streaming: false });

    const s = stats.getStats();
    expect(s.totalRequests).toBe(3);
    expect(s.successfulRequests).toBe(2);
    expect(s.failedRequests).toBe(1);
    expect(s.streamingRequests).toBe(1);
  });

  it('calculates percentiles correctly', () => {
    for (let i = 1; i <= 100; i++) {
      stats.record({ type: 'request_completed', latencyMs: i, success: true, streaming: false });
    }

    const s = stats.getStats();
    expect(s.p50LatencyMs).toBe(50);
    expect(s.p95LatencyMs).toBe(95);
    expect(s.p99LatencyMs).toBe(99);
    expect(s.avgLatencyMs).toBe(51); // Math.round(5050/100)
  });

  it('computes the cache hit rate', () => {
    stats.record({ type: 'cache_hit', fingerprint: 'a' });
    stats.record({ type: 'cache_miss', fingerprint: 'b' });
    stats.record({ type: 'cache_miss', fingerprint: 'c' });
    stats.record({ type: 'cache_hit', fingerprint: 'a' });

    const s = stats.getStats();
    expect(s.cacheHits).toBe(2);
    expect(s.cacheMisses).toBe(2);
    expect(s.cacheHitRate).toBe(0.5);
  });

  it('counts endpoint failures per endpoint', () => {
    stats.record({ type: 'endpoint_attempt', endpoint: 'http://a.test', mode: 'blocking' });
    stats.record({ type: 'endpoint_failure', endpoint: 'http://a.test', reason: 'timeout' });
    stats.record({ type: 'endpoint_attempt', endpoint: 'http://b.test', mode: 'blocking' });
    stats.record({ type: 'endpoint_attempt', endpoint: 'http://a.test', mode: 'streaming' });
    stats.record({ type: 'endpoint_failure', endpoint: 'http://a.test', reason: 'status' });

    const s = stats.getStats();
    expect(s.endpointAttempts).toBe(3);
    expect(s.endpointFailures).toEqual({ 'http://a.test': 2 });
  });

  it('counts opened and closed sessions', () => {
    stats.record({ type: 'session_transition', session: 's1', from: 'awaiting-auth', to: 'authenticated' });
    stats.record({ type: 'session_transition', session: 's1', from: 'authenticated', to: 'serving' });
    stats.record({ type: 'session_transition', session: 's1', from: 'serving', to: 'closed' });
    stats.record({ type: 'session_transition', session: 's2', from: 'awaiting-auth', to: 'closed' });

    const s = stats.getStats();
    expect(s.sessionsOpened).toBe(1);
    expect(s.sessionsClosed).toBe(2);
  });

  describe('rolling window', () => {
    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(0);
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('prunes events older than 1 hour', () => {
      const local = new StatsCollector();
      local.record({ type: 'request_completed', latencyMs: 10, success: true, streaming: false });

      vi.setSystemTime(60 * 60 * 1000 + 1);
      local.record({ type: 'request_completed', latencyMs: 20, success: true, streaming: false });

      const s = local.getStats();
      expect(s.totalRequests).toBe(1);
      expect(s.avgLatencyMs).toBe(20);
    });
  });
});
