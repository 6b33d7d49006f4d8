/**
 * Shared test helpers: loopback mock servers and small builders.
 */
import * as http from 'node:http';
import { parseConfig, type Config } from '../src/config.js';

export interface MockServer {
  server: http.Server;
  port: number;
  url: string;
  requests: Array<{ url: string; headers: http.IncomingHttpHeaders; body: string }>;
}

// Helper: create a simple HTTP server that records what it received
export function createMockServer(handler: (req: http.IncomingMessage, res: http.ServerResponse, body: string) => void): Promise<MockServer> {
  return new Promise((resolve) => {
    const requests: MockServer['requests'] = [];
    const server = http.createServer((req, res) => {
      let body = '';
      req.on('data', (c: Buffer) => (body += c.toString('utf8')));
      req.on('end', () => {
        requests.push({ url: req.url ?? '', headers: req.headers, body });
        handler(req, res, body);
      });
    });
    server.listen(0, '127.0.0.1', () => {
      const addr = server.address();
      const port = addr && typeof addr === 'object' ? addr.port : 0;
      resolve({ server, port, url: `http://127.0.0.1:${port}`, requests });
    });
  });
}

export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
    server.closeAllConnections();
  });
}

/** A port nothing listens on: bind, note the port, close. */
export async function unusedPort(): Promise<number> {
  const mock = await createMockServer((_req, res) => res.end());
  await closeServer(mock.server);
  return mock.port;
}

export function completionBody(content: string, id = 'chatcmpl-1'): Record<string, unknown> {
  return {
    id,
    object: 'chat.completion',
    created: 1700000000,
    model: 'openai/gpt-4o-mini',
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop', logprobs: null }],
    usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 },
    system_fingerprint: 'fp_test',
  };
}

export function sseBody(chunks: string[], done = true): string {
  return chunks.map((c) => `data: ${c}\n\n`).join('') + (done ? 'data: [DONE]\n\n' : '');
}

export function testConfig(endpoints: string[], overrides: Partial<Config> = {}): Config {
  return {
    ...parseConfig({
      server: { host: '127.0.0.1', port: 0 },
      upstream: { endpoints, attemptTimeoutMs: 2_000 },
      tiers: {
        customer: { keyPrefixes: ['cus_'], requests: 2, windowSeconds: 60 },
        business: { keyPrefixes: ['bus_'], requests: 100, windowSeconds: 60 },
      },
    }),
    ...overrides,
  };
}
