/**
 * WebSocket Server for Drumwatch
 * One session per connection: audio and control messages in, results and
 * play instructions out.
 */

import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { Server as HttpServer } from 'http';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';
import { orchestrator as defaultOrchestrator, type Orchestrator } from '../orchestrator/index.js';
import { ENV } from '../config/env.js';
import type { ServerMessage } from '../types/index.js';
import type { Session } from '../session/Session.js';

// 1013: "Try Again Later"
export const CLOSE_NOT_READY = 1013;

export interface GatewayOptions {
  path?: string;
  pingIntervalMs?: number;
  /** Send a timeout notice after this long without a message; 0 disables */
  idleTimeoutMs?: number;
}

interface Client {
  ws: WebSocket;
  session: Session;
  connectedAt: number;
  isAlive: boolean;
  idleTimer: NodeJS.Timeout | null;
}

export class SessionGateway {
  private wss: WebSocketServer | null = null;
  private clients: Map<WebSocket, Client> = new Map();
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private readonly path: string;
  private readonly pingIntervalMs: number;
  private readonly idleTimeoutMs: number;

  constructor(private orchestrator: Orchestrator, options: GatewayOptions = {}) {
    this.path = options.path ?? '/ws';
    this.pingIntervalMs = options.pingIntervalMs ?? 15000;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 30000;
  }

  /**
   * Start WebSocket server
   * @param serverOrPort - Either an HTTP server instance or a port number
   */
  start(serverOrPort: HttpServer | number): void {
    if (this.wss) {
      logger.warn('WebSocket', 'Server already running');
      return;
    }

    if (typeof serverOrPort === 'number') {
      this.wss = new WebSocketServer({ port: serverOrPort, path: this.path });
      logger.info('WebSocket', `Server started on ws://localhost:${serverOrPort}${this.path}`);
    } else {
      this.wss = new WebSocketServer({ server: serverOrPort, path: this.path });
      logger.info('WebSocket', `Server attached to HTTP server at ${this.path}`);
    }

    this.wss.on('connection', (ws: WebSocket) => this.handleConnection(ws));
    this.wss.on('error', (err) => {
      logger.error('WebSocket', 'Server error', err);
    });

    // Detect dead connections
    this.heartbeatTimer = setInterval(() => this.heartbeat(), this.pingIntervalMs);
  }

  private handleConnection(ws: WebSocket): void {
    if (!this.orchestrator.isReady()) {
      logger.warn('WebSocket', 'Refusing connection: engine not ready');
      ws.close(CLOSE_NOT_READY, 'Engine not ready');
      return;
    }

    let session: Session;
    try {
      session = this.orchestrator.openSession((message) => this.send(ws, message));
    } catch (err) {
      logger.error('WebSocket', `Refusing connection: ${errorMessage(err)}`);
      ws.close(CLOSE_NOT_READY, 'Engine not ready');
      return;
    }

    const client: Client = { ws, session, connectedAt: Date.now(), isAlive: true, idleTimer: null };
    this.clients.set(ws, client);
    this.armIdleTimer(client);
    logger.info('WebSocket', `Client connected: ${session.id}`);

    const { audio } = this.orchestrator.config;
    this.send(ws, {
      type: 'ready',
      sessionId: session.id,
      mode: session.getMode(),
      sampleRate: audio.sampleRate,
      windowSamples: audio.windowSamples,
    });

    ws.on('pong', () => {
      client.isAlive = true;
    });

    ws.on('message', (data: RawData, isBinary: boolean) => {
      client.isAlive = true;
      this.armIdleTimer(client);
      if (isBinary) {
        this.send(ws, { type: 'warning', code: 'invalid_message', message: 'Binary frames are not supported' });
        return;
      }
      void session.handleRaw(rawToString(data));
    });

    ws.on('close', () => {
      this.clearIdleTimer(client);
      this.clients.delete(ws);
      this.orchestrator.closeSession(session.id);
      logger.info('WebSocket', `Client disconnected: ${session.id} after ${Date.now() - client.connectedAt}ms`);
    });

    ws.on('error', (err) => {
      logger.error('WebSocket', `Client error: ${session.id}`, err);
    });
  }

  // The connection stays open; the notice repeats for each idle stretch
  private armIdleTimer(client: Client): void {
    if (this.idleTimeoutMs <= 0) return;
    this.clearIdleTimer(client);
    client.idleTimer = setTimeout(() => {
      client.idleTimer = null;
      logger.debug('WebSocket', `No data for ${this.idleTimeoutMs}ms`, undefined, client.session.id);
      this.send(client.ws, { type: 'timeout', idleSeconds: this.idleTimeoutMs / 1000 });
    }, this.idleTimeoutMs);
  }

  private clearIdleTimer(client: Client): void {
    if (client.idleTimer) {
      clearTimeout(client.idleTimer);
      client.idleTimer = null;
    }
  }

  private heartbeat(): void {
    for (const [ws, client] of this.clients) {
      if (!client.isAlive) {
        logger.warn('WebSocket', `Terminating dead connection: ${client.session.id}`);
        ws.terminate();
        continue;
      }
      client.isAlive = false;
      ws.ping();
    }
  }

  private send(ws: WebSocket, message: ServerMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  async stop(): Promise<void> {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }

    for (const client of this.clients.values()) {
      this.clearIdleTimer(client);
      client.ws.terminate();
    }
    this.clients.clear();

    const wss = this.wss;
    this.wss = null;
    if (wss) {
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }
    logger.info('WebSocket', 'Server stopped');
  }

  getClientCount(): number {
    return this.clients.size;
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

// Singleton instance
export const wsServer = new SessionGateway(defaultOrchestrator, {
  path: ENV.WS_PATH,
  idleTimeoutMs: ENV.WS_IDLE_TIMEOUT_SECONDS * 1000,
});
