import { describe, it, expect } from 'vitest';
import { canonicalJson, fingerprintRequest } from '../src/fingerprint.js';
import type { ChatRequest } from '../src/types.js';

const request: ChatRequest = {
  model: 'openai/gpt-4o-mini',
  messages: [{ role: 'user', content: 'Hello' }],
  temperature: 0,
};

describe('canonicalJson', () => {
  it('sorts keys at every depth', () => {
    expect(canonicalJson({ b: 1, a: { d: [1, 2], c: null } })).toBe('{"a":{"c":null,"d":[1,2]},"b":1}');
  });

  it('drops undefined members and nulls undefined array items', () => {
    expect(canonicalJson({ a: undefined, b: [undefined, 'x'] })).toBe('{"b":[null,"x"]}');
  });
});

describe('fingerprintRequest', () => {
  it('is a 64-character hex digest', () => {
    expect(fingerprintRequest(request)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('ignores key order', () => {
    const reordered: ChatRequest = {
      temperature: 0,
      messages: [{ content: 'Hello', role: 'user' }],
      model: 'openai/gpt-4o-mini',
    };
    expect(fingerprintRequest(reordered)).toBe(fingerprintRequest(request));
  });

  it('ignores the stream flag', () => {
    expect(fingerprintRequest({ ...request, stream: false })).toBe(fingerprintRequest(request));
  });

  it('changes with any output-shaping field', () => {
    const fp = fingerprintRequest(request);
    expect(fingerprintRequest({ ...request, temperature: 0.5 })).not.toBe(fp);
    expect(fingerprintRequest({ ...request, model: 'google/gemini-2.0-flash-001' })).not.toBe(fp);
    expect(fingerprintRequest({ ...request, messages: [{ role: 'user', content: 'Hello!' }] })).not.toBe(fp);
  });

  it('keeps message order significant', () => {
    const a: ChatRequest = {
      model: 'm',
      messages: [{ role: 'system', content: 'one' }, { role: 'user', content: 'two' }],
    };
    const b: ChatRequest = {
      model: 'm',
      messages: [{ role: 'user', content: 'two' }, { role: 'system', content: 'one' }],
    };
    expect(fingerprintRequest(a)).not.toBe(fingerprintRequest(b));
  });
});
