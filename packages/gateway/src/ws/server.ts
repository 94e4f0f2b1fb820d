/**
 * Plan observer gateway
 *
 * Observer channel for live plan status, attached to the HTTP server
 * through upgrade handling.
 */

import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import type { IncomingMessage, Server as HttpServer } from 'node:http';
import type { Duplex } from 'node:stream';
import { z } from 'zod';
import type { PlanEngine } from '@taskrelay/core';
import type { ClientSocket, ClientEvents, Session } from './types.js';
import { SessionManager } from './session.js';
import { PlanEventBridge } from './plan-bridge.js';
import { formatIssues } from '../middleware/validation.js';
import {
  WS_PATH,
  WS_HEARTBEAT_INTERVAL_MS,
  WS_MAX_PAYLOAD_BYTES,
  WS_MAX_CONNECTIONS,
  WS_READY_STATE_OPEN,
  WS_CLOSE_TOO_MANY_CONNECTIONS,
  WS_CLOSE_POLICY_VIOLATION,
  WS_CLOSE_GOING_AWAY,
} from '../config/defaults.js';
import { getLog } from '../services/log.js';

const log = getLog('WebSocket');

const planIdSchema = z.object({ planId: z.string().min(1).max(200) });

/** Client frames; anything else is answered with an error frame */
const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('plan:subscribe'), payload: planIdSchema }),
  z.object({ type: z.literal('plan:unsubscribe'), payload: planIdSchema }),
  z.object({ type: z.literal('session:ping'), payload: z.object({}).strict().optional() }),
]);

type ClientMessage = z.infer<typeof clientMessageSchema>;

export interface WSGatewayConfig {
  /** Upgrade requests to any other path are refused */
  path?: string;
  heartbeatInterval?: number;
  /** Bytes; larger frames close the socket */
  maxPayloadSize?: number;
  maxConnections?: number;
  /** Empty accepts every origin */
  allowedOrigins?: string[];
}

const DEFAULT_CONFIG: Required<WSGatewayConfig> = {
  path: WS_PATH,
  heartbeatInterval: WS_HEARTBEAT_INTERVAL_MS,
  maxPayloadSize: WS_MAX_PAYLOAD_BYTES,
  maxConnections: WS_MAX_CONNECTIONS,
  allowedOrigins: [],
};

function acceptsOrigin(allowed: readonly string[], origin: string | undefined): boolean {
  return allowed.length === 0 || (origin !== undefined && allowed.includes(origin));
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return data.toString('utf-8');
}

export class WSGateway {
  readonly sessions = new SessionManager();
  private readonly bridge: PlanEventBridge;
  private readonly config: Required<WSGatewayConfig>;
  private readonly sockets = new Set<ClientSocket>();
  private wss?: WebSocketServer;
  private pinger?: NodeJS.Timeout;
  private detach?: () => void;

  constructor(engine: PlanEngine, config: WSGatewayConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.bridge = new PlanEventBridge(engine, this.sessions);
  }

  /** Serve upgrades arriving on `server` at the configured path. */
  attachToServer(server: HttpServer): void {
    if (this.wss) {
      throw new Error('WSGateway is already attached');
    }

    const wss = new WebSocketServer({
      noServer: true,
      maxPayload: this.config.maxPayloadSize,
    });
    this.wss = wss;

    wss.on('connection', (socket: WebSocket, request: IncomingMessage) => {
      this.handleConnection(socket, {
        origin: request.headers.origin,
        remoteAddress: request.socket.remoteAddress,
      });
    });
    wss.on('error', (error) => {
      log.error('Server error', { error: error.message });
    });

    const onUpgrade = (request: IncomingMessage, socket: Duplex, head: Buffer): void => {
      const { pathname } = new URL(request.url ?? '/', `http://${request.headers.host ?? 'localhost'}`);
      if (pathname !== this.config.path) {
        socket.destroy();
        return;
      }
      wss.handleUpgrade(request, socket, head, (ws) => wss.emit('connection', ws, request));
    };
    server.on('upgrade', onUpgrade);
    this.detach = () => server.removeListener('upgrade', onUpgrade);

    this.pinger = setInterval(() => this.pingAll(), this.config.heartbeatInterval);
    this.pinger.unref();
    log.info('Gateway attached', { path: this.config.path });
  }

  /**
   * Handle new WebSocket connection. Returns the session, or null when
   * the connection was refused.
   */
  handleConnection(
    socket: ClientSocket,
    request: { origin?: string; remoteAddress?: string } = {},
  ): Session | null {
    const { maxConnections, allowedOrigins } = this.config;
    if (this.sessions.count >= maxConnections) {
      log.warn('Refusing connection: at capacity', { maxConnections });
      socket.close(WS_CLOSE_TOO_MANY_CONNECTIONS, 'Maximum connections reached');
      return null;
    }

    if (!acceptsOrigin(allowedOrigins, request.origin)) {
      log.warn('Refusing connection: origin not allowed', { origin: request.origin });
      socket.close(WS_CLOSE_POLICY_VIOLATION, 'Origin not allowed');
      return null;
    }

    const session = this.sessions.create(socket);
    this.sockets.add(socket);
    log.info('New connection', { sessionId: session.id, remoteAddress: request.remoteAddress });

    this.sessions.send(session.id, 'connection:ready', { sessionId: session.id });

    socket.on('message', (data) => {
      this.handleMessage(session.id, rawToString(data));
    });

    socket.on('close', (code, reason) => {
      log.info('Connection closed', { sessionId: session.id, code, reason: String(reason) });
      this.sockets.delete(socket);
      this.sessions.removeBySocket(socket);
    });
    socket.on('error', (error) => {
      log.error('Socket error', { sessionId: session.id, error: error.message });
    });
    socket.on('pong', () => this.sessions.touch(session.id));

    return session;
  }

  /** One client frame: budget check, JSON parse, schema check, dispatch. */
  handleMessage(sessionId: string, text: string): void {
    if (!this.sessions.consumeRateLimit(sessionId)) {
      this.sendError(sessionId, 'RATE_LIMITED', 'Too many messages, slow down');
      return;
    }

    this.sessions.touch(sessionId);

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      this.sendError(sessionId, 'PARSE_ERROR', 'Invalid JSON message');
      return;
    }

    const parsed = clientMessageSchema.safeParse(raw);
    if (!parsed.success) {
      this.sendError(sessionId, 'INVALID_MESSAGE', formatIssues(parsed.error.issues));
      return;
    }

    this.dispatch(sessionId, parsed.data);
  }

  private dispatch(sessionId: string, message: ClientMessage): void {
    switch (message.type) {
      case 'plan:subscribe':
        this.onSubscribe(sessionId, message.payload);
        break;
      case 'plan:unsubscribe':
        this.onUnsubscribe(sessionId, message.payload);
        break;
      case 'session:ping':
        this.sessions.send(sessionId, 'session:pong', { timestamp: new Date().toISOString() });
        break;
    }
  }

  private onSubscribe(sessionId: string, { planId }: ClientEvents['plan:subscribe']): void {
    const outcome = this.bridge.subscribe(sessionId, planId);
    if (!outcome.ok) {
      this.sendError(sessionId, outcome.code, outcome.message);
    }
  }

  private onUnsubscribe(sessionId: string, { planId }: ClientEvents['plan:unsubscribe']): void {
    if (!this.bridge.unsubscribe(sessionId, planId)) {
      this.sendError(sessionId, 'NOT_SUBSCRIBED', `Not subscribed to plan: ${planId}`);
    }
  }

  private sendError(sessionId: string, code: string, message: string): void {
    this.sessions.send(sessionId, 'error', { code, message });
  }

  private pingAll(): void {
    for (const socket of this.sockets) {
      if (socket.readyState === WS_READY_STATE_OPEN) socket.ping();
    }
  }

  get connectionCount(): number {
    return this.sessions.count;
  }

  /** Close every session with 1001, detach from the HTTP server and shut the socket server. */
  async stop(): Promise<void> {
    clearInterval(this.pinger);
    this.pinger = undefined;
    this.detach?.();
    this.detach = undefined;

    this.sessions.closeAll(WS_CLOSE_GOING_AWAY, 'Server shutting down');
    this.sockets.clear();

    const wss = this.wss;
    if (!wss) return;
    await new Promise<void>((resolve, reject) => {
      wss.close((error) => (error ? reject(error) : resolve()));
    });
    this.wss = undefined;
  }
}
