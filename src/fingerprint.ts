/**
 * Request fingerprinting for the response cache.
 * @packageDocumentation
 */

import { createHash } from 'node:crypto';
import type { ChatRequest } from './types.js';

/**
 * JSON with object keys sorted at every depth and `undefined` members dropped.
 * Array order is kept: message order is meaningful.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map((v) => (v === undefined ? 'null' : canonicalJson(v))).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
  return `{${entries.join(',')}}`;
}

/**
 * SHA-256 digest of everything in the request that shapes the output.
 * The `stream` flag is left out: it changes transport, not content.
 */
export function fingerprintRequest(request: ChatRequest): string {
  const { stream: _stream, ...content } = request;
  return createHash('sha256').update(canonicalJson(content)).digest('hex');
}
