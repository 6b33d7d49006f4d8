/**
 * Rate Limiter
 *
 * Fixed-window admission gate keyed by (tier, client key). Each bucket
 * counts requests inside its active window; a rollover resets the count.
 *
 * `admit` has no suspension point, so every decision on a bucket runs to
 * completion before the next one starts. Buckets for different keys share no
 * state beyond the map that holds them.
 *
 * @packageDocumentation
 */

import type { ClientIdentity, RateBudget, Tier } from './types.js';
import { nullSink, type EventSink } from './stats.js';

export interface RateBucket {
  used: number;
  windowStart: number;
  /** Window length the bucket was last judged against. */
  windowMs: number;
  lastSeen: number;
}

export interface AdmitResult {
  allowed: boolean;
  /** Ms until the current window ends (0 when admitted with budget left). */
  retryAfterMs: number;
  /** Requests left in the current window after this decision. */
  remaining: number;
}

export interface RateLimiterOptions {
  /** Override a tier's budget instead of taking the one on the identity. */
  budgets?: Partial<Record<Tier, RateBudget>>;
  /** Buckets idle for this many windows are dropped (default: 10) */
  idleWindows?: number;
  /** Minimum ms between opportunistic sweeps (default: 60000) */
  sweepIntervalMs?: number;
  events?: EventSink;
}

export class RateLimiter {
  private readonly buckets = new Map<string, RateBucket>();
  private budgets: Partial<Record<Tier, RateBudget>>;
  private idleWindows: number;
  private readonly sweepIntervalMs: number;
  private readonly events: EventSink;
  private lastSweep = Date.now();

  constructor(opts: RateLimiterOptions = {}) {
    this.budgets = { ...opts.budgets };
    this.idleWindows = opts.idleWindows ?? 10;
    this.sweepIntervalMs = opts.sweepIntervalMs ?? 60_000;
    this.events = opts.events ?? nullSink;
  }

  /**
   * Replace tier budgets (config reload). Existing buckets keep their count
   * and are judged against the new budget from their next decision on.
   */
  updateBudgets(budgets: Partial<Record<Tier, RateBudget>>, idleWindows?: number): void {
    this.budgets = { ...budgets };
    if (idleWindows !== undefined) this.idleWindows = idleWindows;
  }

  admit(identity: ClientIdentity): AdmitResult {
    const now = Date.now();
    const budget = this.budgets[identity.tier] ?? identity.budget;
    this.maybeSweep(now);

    const id = `${identity.tier}:${identity.key}`;
    let bucket = this.buckets.get(id);
    if (!bucket) {
      bucket = { used: 0, windowStart: now, windowMs: budget.windowMs, lastSeen: now };
      this.buckets.set(id, bucket);
    }
    bucket.lastSeen = now;
    bucket.windowMs = budget.windowMs;

    if (now - bucket.windowStart >= budget.windowMs) {
      bucket.used = 0;
      bucket.windowStart = now;
    }

    const windowEndsIn = bucket.windowStart + budget.windowMs - now;

    if (bucket.used < budget.requests) {
      bucket.used++;
      const remaining = budget.requests - bucket.used;
      return { allowed: true, retryAfterMs: remaining > 0 ? 0 : windowEndsIn, remaining };
    }

    this.events.record({ type: 'rate_limited', tier: identity.tier });
    return { allowed: false, retryAfterMs: windowEndsIn, remaining: 0 };
  }

  /** Snapshot of a bucket, mainly for inspection and tests. */
  peek(identity: Pick<ClientIdentity, 'tier' | 'key'>): Readonly<RateBucket> | undefined {
    const bucket = this.buckets.get(`${identity.tier}:${identity.key}`);
    return bucket ? { ...bucket } : undefined;
  }

  size(): number {
    return this.buckets.size;
  }

  /**
   * Drop buckets that have been idle past `idleWindows` of their tier's window.
   */
  sweep(now: number = Date.now()): number {
    let removed = 0;
    for (const [id, bucket] of this.buckets) {
      if (now - bucket.lastSeen >= bucket.windowMs * this.idleWindows) {
        this.buckets.delete(id);
        removed++;
      }
    }
    this.lastSweep = now;
    return removed;
  }

  private maybeSweep(now: number): void {
    if (now - this.lastSweep >= this.sweepIntervalMs) {
      this.sweep(now);
    }
  }
}
