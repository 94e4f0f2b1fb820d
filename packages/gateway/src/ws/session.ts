/**
 * Session Manager
 *
 * Tracks connected WebSocket clients, their plan subscriptions and a
 * per-session message budget.
 */

import { randomUUID } from 'node:crypto';
import type { Unsubscribe } from '@taskrelay/core';
import type { Session, SessionSocket, ServerEvents, WSMessage } from './types.js';
import { getLog } from '../services/log.js';
import {
  WS_RATE_LIMIT_MESSAGES_PER_SEC,
  WS_RATE_LIMIT_BURST,
  WS_MAX_SUBSCRIPTIONS_PER_SESSION,
  WS_READY_STATE_OPEN,
} from '../config/defaults.js';

const log = getLog('SessionManager');

/** Refills continuously at `ratePerSec`, never above `capacity`. */
class TokenBucket {
  private tokens: number;
  private refilledAt = Date.now();

  constructor(
    private readonly capacity: number,
    private readonly ratePerSec: number
  ) {
    this.tokens = capacity;
  }

  take(): boolean {
    const now = Date.now();
    const earned = ((now - this.refilledAt) / 1000) * this.ratePerSec;
    this.tokens = Math.min(this.capacity, this.tokens + earned);
    this.refilledAt = now;
    if (this.tokens < 1) return false;
    this.tokens -= 1;
    return true;
  }
}

interface Connection {
  readonly id: string;
  readonly connectedAt: Date;
  lastActivityAt: Date;
  readonly socket: SessionSocket;
  /** planId -> release function of the bus subscription */
  readonly plans: Map<string, Unsubscribe>;
  readonly budget: TokenBucket;
}

export class SessionManager {
  private readonly connections = new Map<string, Connection>();
  private readonly bySocket = new WeakMap<SessionSocket, string>();

  create(socket: SessionSocket): Session {
    const now = new Date();
    const connection: Connection = {
      id: randomUUID(),
      connectedAt: now,
      lastActivityAt: now,
      socket,
      plans: new Map(),
      budget: new TokenBucket(WS_RATE_LIMIT_BURST, WS_RATE_LIMIT_MESSAGES_PER_SEC),
    };
    this.connections.set(connection.id, connection);
    this.bySocket.set(socket, connection.id);
    return describe(connection);
  }

  get(sessionId: string): Session | undefined {
    const connection = this.connections.get(sessionId);
    return connection && describe(connection);
  }

  has(sessionId: string): boolean {
    return this.connections.has(sessionId);
  }

  touch(sessionId: string): void {
    const connection = this.connections.get(sessionId);
    if (connection) connection.lastActivityAt = new Date();
  }

  /**
   * Spend one message from the session's budget. False when the session is
   * unknown or has sent more than the burst allows.
   */
  consumeRateLimit(sessionId: string): boolean {
    return this.connections.get(sessionId)?.budget.take() ?? false;
  }

  /**
   * Track a plan subscription. Replaces (and releases) an existing one for
   * the same plan. False when the session is gone or at its limit.
   */
  addSubscription(sessionId: string, planId: string, unsubscribe: Unsubscribe): boolean {
    const connection = this.connections.get(sessionId);
    if (!connection) return false;

    const previous = connection.plans.get(planId);
    if (previous) {
      previous();
    } else if (connection.plans.size >= WS_MAX_SUBSCRIPTIONS_PER_SESSION) {
      return false;
    }
    connection.plans.set(planId, unsubscribe);
    return true;
  }

  /** False if the session was not subscribed to the plan. */
  removeSubscription(sessionId: string, planId: string): boolean {
    const plans = this.connections.get(sessionId)?.plans;
    const release = plans?.get(planId);
    if (!plans || !release) return false;
    plans.delete(planId);
    release();
    return true;
  }

  isSubscribed(sessionId: string, planId: string): boolean {
    return this.connections.get(sessionId)?.plans.has(planId) ?? false;
  }

  subscriptionCount(sessionId: string): number {
    return this.connections.get(sessionId)?.plans.size ?? 0;
  }

  /** Forget a session and release every subscription it holds. */
  remove(sessionId: string): boolean {
    const connection = this.connections.get(sessionId);
    if (!connection) return false;

    this.connections.delete(sessionId);
    this.bySocket.delete(connection.socket);
    const releases = [...connection.plans.values()];
    connection.plans.clear();
    releases.forEach((release) => release());
    return true;
  }

  removeBySocket(socket: SessionSocket): boolean {
    const sessionId = this.bySocket.get(socket);
    return sessionId !== undefined && this.remove(sessionId);
  }

  /**
   * Deliver one enveloped event. A socket that is no longer open, or that
   * throws on send, takes its session with it.
   */
  send<K extends keyof ServerEvents>(sessionId: string, event: K, payload: ServerEvents[K]): boolean {
    const connection = this.connections.get(sessionId);
    if (!connection) return false;
    if (connection.socket.readyState !== WS_READY_STATE_OPEN) {
      this.remove(sessionId);
      return false;
    }

    const envelope: WSMessage<ServerEvents[K]> = {
      type: event,
      payload,
      timestamp: new Date().toISOString(),
    };
    try {
      connection.socket.send(JSON.stringify(envelope));
    } catch (error) {
      log.warn('Send failed, dropping session', {
        sessionId,
        event,
        error: error instanceof Error ? error.message : String(error),
      });
      this.remove(sessionId);
      return false;
    }
    return true;
  }

  closeAll(code: number, reason: string): void {
    for (const connection of [...this.connections.values()]) {
      try {
        connection.socket.close(code, reason);
      } catch (error) {
        log.debug('Socket close failed', { sessionId: connection.id, error });
      }
      this.remove(connection.id);
    }
  }

  get count(): number {
    return this.connections.size;
  }
}

/** Public view of a connection, without the socket. */
function describe(connection: Connection): Session {
  return {
    id: connection.id,
    connectedAt: connection.connectedAt,
    lastActivityAt: connection.lastActivityAt,
    plans: new Set(connection.plans.keys()),
  };
}
