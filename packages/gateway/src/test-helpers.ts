/**
 * Shared Test Helpers
 *
 * Usage:
 *   import { setupTestEngine, teardownTestEngine, FakeSocket } from '../test-helpers.js';
 */

import { EventEmitter } from 'node:events';
import {
  initServiceRegistry,
  resetServiceRegistry,
  getServiceRegistry,
  hasServiceRegistry,
  PlanEngine,
  Services,
  type ILogService,
  type PlanEngineOptions,
} from '@taskrelay/core';
import type { ClientSocket, WSMessage } from './ws/types.js';

// ============================================================
// Silent log
// ============================================================

function createSilentLog(): ILogService {
  const log: ILogService = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => log,
  };
  return log;
}

// ============================================================
// Engine in the service registry
// ============================================================

/**
 * Initialize the global registry with a silent logger and a fresh engine.
 * Pair with teardownTestEngine() in afterEach.
 */
export function setupTestEngine(options: PlanEngineOptions = {}): PlanEngine {
  const registry = initServiceRegistry();
  registry.register(Services.Log, createSilentLog());

  const engine = new PlanEngine({
    ...options,
    config: { cancelGraceMs: 50, strictConsistency: true, ...options.config },
  });
  registry.register(Services.Agents, engine.agents);
  registry.register(Services.Events, engine.events);
  registry.register(Services.Engine, engine);
  return engine;
}

export async function teardownTestEngine(): Promise<void> {
  if (!hasServiceRegistry()) return;
  const engine = getServiceRegistry().tryGet(Services.Engine);
  await engine?.shutdown();
  await resetServiceRegistry();
}

/**
 * Resolve once the signal aborts. For agents that only stop when cancelled.
 */
export function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(new Error('aborted'));
      return;
    }
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

/**
 * Let pending microtasks and zero-delay timers run.
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

// ============================================================
// Fake WebSocket
// ============================================================

/**
 * In-process stand-in for a ws socket. Frames sent by the server are kept
 * in `sent`; client frames are delivered with `receive()`.
 */
export class FakeSocket extends EventEmitter implements ClientSocket {
  readyState = 1;
  readonly sent: string[] = [];
  pings = 0;
  closedWith: { code?: number; reason?: string } | null = null;
  /** Make the next send() calls throw */
  failSends = false;

  send(data: string): void {
    if (this.failSends) throw new Error('socket write failed');
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.readyState = 3;
    this.closedWith = { code, reason };
  }

  ping(): void {
    this.pings++;
  }

  /** Deliver a client frame */
  receive(message: unknown): void {
    this.emit('message', Buffer.from(JSON.stringify(message)));
  }

  /** Parsed server frames */
  messages(): WSMessage[] {
    return this.sent.map((frame): WSMessage => JSON.parse(frame));
  }

  types(): string[] {
    return this.messages().map((m) => m.type);
  }
}
