/**
 * WebSocket Gateway Types
 *
 * Observer channel for live plan status. Every frame in either direction
 * is a JSON envelope `{ type, payload, timestamp }`.
 */

import type { RawData } from 'ws';
import type { PlanSnapshot, StatusEvent } from '@taskrelay/core';

/**
 * Session representing a connected client
 */
export interface Session {
  readonly id: string;
  readonly connectedAt: Date;
  readonly lastActivityAt: Date;
  /** Plan ids this session receives events for */
  readonly plans: ReadonlySet<string>;
}

/**
 * The parts of a socket the session manager writes to.
 */
export interface SessionSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

/**
 * The parts of a socket the gateway listens on.
 */
export interface ClientSocket extends SessionSocket {
  on(event: 'message', listener: (data: RawData) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'pong', listener: () => void): unknown;
  ping(): void;
}

/**
 * WebSocket message envelope
 */
export interface WSMessage<T = unknown> {
  type: string;
  payload: T;
  timestamp: string;
}

/**
 * Events sent by the client
 */
export interface ClientEvents {
  'plan:subscribe': { planId: string };
  'plan:unsubscribe': { planId: string };
  'session:ping': Record<string, never>;
}

/**
 * Events sent by the server
 */
export interface ServerEvents {
  'connection:ready': { sessionId: string };
  'plan:subscribed': { planId: string; snapshot: PlanSnapshot };
  'plan:event': StatusEvent;
  'plan:unsubscribed': { planId: string; reason: 'requested' | 'finished' };
  'session:pong': { timestamp: string };
  error: { code: string; message: string };
}
