/**
 * WebSocket binding for stream sessions.
 *
 * Each accepted socket gets one StreamSession; the relay tracks live sessions
 * so the server can report and shut them down.
 *
 * @packageDocumentation
 */

import type * as http from 'node:http';
import type { Duplex } from 'node:stream';
import WebSocket, { WebSocketServer, type RawData } from 'ws';
import { defaultLogger, type Logger } from './logger.js';
import { CloseCodes, StreamSession, type StateChange, type StreamSessionDeps } from './stream-session.js';
import { MAX_BODY_BYTES } from './validation.js';

/** Client messages are text; binary frames are read as UTF-8. */
export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

export class StreamRelay {
  private readonly wss: WebSocketServer;
  private readonly sessions = new Set<StreamSession>();
  private readonly deps: StreamSessionDeps;
  private readonly logger: Logger;
  private closed = false;

  constructor(deps: StreamSessionDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? defaultLogger;
    this.wss = new WebSocketServer({ noServer: true, maxPayload: MAX_BODY_BYTES });
  }

  get activeSessions(): number {
    return this.sessions.size;
  }

  /**
   * Complete a WebSocket handshake for an HTTP upgrade request.
   */
  handleUpgrade(req: http.IncomingMessage, socket: Duplex, head: Buffer): void {
    if (this.closed) {
      socket.destroy();
      return;
    }
    this.wss.handleUpgrade(req, socket, head, (ws) => {
      this.accept(ws);
    });
  }

  accept(ws: WebSocket): StreamSession {
    const session = new StreamSession(
      {
        send: (frame) =>
          new Promise<void>((resolve, reject) => {
            if (ws.readyState !== WebSocket.OPEN) {
              reject(new Error('WebSocket is not open'));
              return;
            }
            ws.send(frame, (err) => (err ? reject(err) : resolve()));
          }),
        close: (code, reason) => ws.close(code, reason),
      },
      this.deps
    );

    this.sessions.add(session);
    session.on('stateChange', ({ to }: StateChange) => {
      if (to === 'closed') this.sessions.delete(session);
    });
    this.logger.debug(`Session ${session.id} connected (${this.sessions.size} active)`);

    ws.on('message', (data) => {
      session.handleMessage(rawDataToString(data)).catch((err: unknown) => {
        this.logger.error(`Session ${session.id} message handling failed: ${String(err)}`);
      });
    });
    ws.on('close', () => session.handleDisconnect());
    ws.on('error', (err) => {
      this.logger.warn(`Session ${session.id} socket error: ${err.message}`);
      session.handleDisconnect();
    });

    return session;
  }

  /**
   * Close every live session and stop accepting upgrades. Sockets that do
   * not finish the close handshake within `graceMs` are terminated.
   */
  async closeAll(graceMs = 1000): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const session of [...this.sessions]) {
      session.close(CloseCodes.goingAway, 'server shutting down');
    }

    await Promise.all(
      [...this.wss.clients].map(
        (ws) =>
          new Promise<void>((resolve) => {
            if (ws.readyState === WebSocket.CLOSED) {
              resolve();
              return;
            }
            const timer = setTimeout(() => ws.terminate(), graceMs);
            timer.unref();
            ws.once('close', () => {
              clearTimeout(timer);
              resolve();
            });
          })
      )
    );

    await new Promise<void>((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
