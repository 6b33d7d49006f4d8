import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as http from 'node:http';
import { handleHealthRequest } from '../src/health.js';

describe('Health endpoint', () => {
  let server: http.Server;
  let url: string;

  beforeAll(() => new Promise<void>((resolve) => {
    server = http.createServer((req, res) => {
      if (req.url === '/health') {
        handleHealthRequest(res, { endpoints: 3, activeSessions: 1 });
      } else {
        res.writeHead(404);
        res.end();
      }
    });
    server.listen(0, '127.0.0.1', () => {
      const addr = server.address();
      url = `http://127.0.0.1:${addr && typeof addr === 'object' ? addr.port : 0}`;
      resolve();
    });
  }));

  afterAll(() => new Promise<void>((resolve) => {
    server.close(() => resolve());
    server.closeAllConnections();
  }));

  it('returns ok, uptime and gateway counters', async () => {
    const res = await fetch(`${url}/health`);
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('application/json');
    expect(body).toMatchObject({ ok: true, endpoints: 3, activeSessions: 1 });
    expect(body).toHaveProperty('uptime', expect.any(Number));
  });
});
