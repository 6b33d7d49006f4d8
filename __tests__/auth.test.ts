import { describe, it, expect } from 'vitest';
import { TierResolver, parseBearerToken } from '../src/auth.js';
import { parseConfig } from '../src/config.js';
import { AuthenticationError } from '../src/errors.js';

const config = parseConfig({
  upstream: { endpoints: ['http://127.0.0.1:9/v1'] },
  tiers: {
    customer: { keyPrefixes: ['cus_'], keys: ['bus_legacy'], requests: 10, windowSeconds: 60 },
    business: { keyPrefixes: ['bus_', 'cus_vip_'], requests: 100, windowSeconds: 30 },
  },
});

describe('TierResolver', () => {
  const resolver = new TierResolver(config);

  it('resolves a prefixed key to its tier and budget', () => {
    expect(resolver.resolve('cus_alice')).toEqual({
      key: 'cus_alice',
      tier: 'customer',
      budget: { requests: 10, windowMs: 60_000 },
    });
  });

  it('trims surrounding whitespace', () => {
    expect(resolver.resolve('  bus_acme  ')).toEqual({
      key: 'bus_acme',
      tier: 'business',
      budget: { requests: 100, windowMs: 30_000 },
    });
  });

  it('matches explicit keys before prefixes', () => {
    expect(resolver.resolve('bus_legacy').tier).toBe('customer');
  });

  it('picks the longest matching prefix', () => {
    expect(resolver.resolve('cus_vip_7').tier).toBe('business');
  });

  it('rejects missing keys', () => {
    for (const key of [null, undefined, '', '   ']) {
      expect(() => resolver.resolve(key)).toThrow(new AuthenticationError('API Key is required'));
    }
  });

  it('rejects unknown keys and bare prefixes', () => {
    expect(() => resolver.resolve('sk-unknown')).toThrow('Invalid API key.');
    expect(() => resolver.resolve('cus_')).toThrow(AuthenticationError);
  });

  it('picks up reloaded tier definitions', () => {
    const local = new TierResolver(config);
    local.updateConfig(
      parseConfig({
        upstream: { endpoints: ['http://127.0.0.1:9/v1'] },
        tiers: {
          customer: { keyPrefixes: ['c-'], requests: 1, windowSeconds: 1 },
          business: { keyPrefixes: ['b-'], requests: 1, windowSeconds: 1 },
        },
      })
    );
    expect(local.resolve('c-1').tier).toBe('customer');
    expect(() => local.resolve('cus_alice')).toThrow('Invalid API key.');
  });
});

describe('parseBearerToken', () => {
  it('extracts the token', () => {
    expect(parseBearerToken('Bearer cus_alice')).toBe('cus_alice');
    expect(parseBearerToken(['Bearer first', 'Bearer second'])).toBe('first');
  });

  it('returns null for absent or foreign schemes', () => {
    expect(parseBearerToken(undefined)).toBeNull();
    expect(parseBearerToken('Basic dXNlcjpwYXNz')).toBeNull();
    expect(parseBearerToken('Bearer    ')).toBeNull();
  });
});
