/**
 * Health endpoint handler.
 * @packageDocumentation
 */

import type * as http from 'node:http';

const startTime = Date.now();

export interface HealthInfo {
  /** Configured upstream endpoints. */
  endpoints: number;
  /** Live WebSocket sessions. */
  activeSessions: number;
}

/**
 * Handle GET /health.
 * Returns { ok: true, uptime: <seconds>, endpoints, activeSessions }.
 */
export function handleHealthRequest(res: http.ServerResponse, info: HealthInfo): void {
  const body = JSON.stringify({
    ok: true,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    endpoints: info.endpoints,
    activeSessions: info.activeSessions,
  });
  res.writeHead(200, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(body) });
  res.end(body);
}
