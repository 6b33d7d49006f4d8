/**
 * Authentication resolver: raw client key → tier.
 *
 * Keys are matched against each tier's explicit key list first, then against
 * its key prefixes. A key that matches nothing is rejected; there is no
 * default tier.
 *
 * @packageDocumentation
 */

import { getTierBudget, type Config } from './config.js';
import { AuthenticationError } from './errors.js';
import { Tiers, type ClientIdentity, type Tier } from './types.js';

export class TierResolver {
  private config: Config;

  constructor(config: Config) {
    this.config = config;
  }

  /** Swap in reloaded tier definitions. */
  updateConfig(config: Config): void {
    this.config = config;
  }

  /**
   * Resolve a presented key. Throws AuthenticationError when missing or unknown.
   */
  resolve(rawKey: string | null | undefined): ClientIdentity {
    const key = rawKey?.trim();
    if (!key) {
      throw new AuthenticationError('API Key is required');
    }

    const tier = this.matchTier(key);
    if (!tier) {
      throw new AuthenticationError('Invalid API key.');
    }

    return { key, tier, budget: getTierBudget(this.config, tier) };
  }

  private matchTier(key: string): Tier | null {
    for (const tier of Tiers) {
      if (this.config.tiers[tier].keys.includes(key)) return tier;
    }
    // Longest prefix wins so "bus_" and "bus_x_" style prefixes can coexist
    let best: { tier: Tier; length: number } | null = null;
    for (const tier of Tiers) {
      for (const prefix of this.config.tiers[tier].keyPrefixes) {
        if (key.startsWith(prefix) && key.length > prefix.length && (!best || prefix.length > best.length)) {
          best = { tier, length: prefix.length };
        }
      }
    }
    return best?.tier ?? null;
  }
}

/**
 * Extract the key from an `Authorization: Bearer <key>` header.
 * Returns null when the header is absent or uses another scheme.
 */
export function parseBearerToken(header: string | string[] | undefined): string | null {
  const value = Array.isArray(header) ? header[0] : header;
  if (!value || !value.startsWith('Bearer ')) return null;
  const token = value.slice('Bearer '.length).trim();
  return token.length > 0 ? token : null;
}
