/**
 * PlanEventBridge
 *
 * Forwards engine status events to WebSocket sessions.
 *
 * - Each (session, plan) pair gets its own bus listener, so a slow or
 *   broken socket only holds up its own buffer
 * - The subscriber gets the current snapshot first, then every later event
 * - When the plan reaches a terminal status the session is told and the
 *   listener released
 * - A failed send drops the session; the bus logs the delivery failure
 */

import {
  isTerminalPlanStatus,
  ObserverDeliveryError,
  type PlanEngine,
  type StatusEvent,
} from '@taskrelay/core';
import type { SessionManager } from './session.js';
import { getLog } from '../services/log.js';

const log = getLog('PlanEventBridge');

export type SubscribeOutcome =
  | { ok: true; status: 'subscribed' | 'finished' }
  | { ok: false; code: 'NOT_FOUND' | 'SUBSCRIPTION_LIMIT' | 'SESSION_GONE'; message: string };

export class PlanEventBridge {
  constructor(
    private readonly engine: PlanEngine,
    private readonly sessions: SessionManager,
  ) {}

  /**
   * Subscribe a session to a plan's events.
   */
  subscribe(sessionId: string, planId: string): SubscribeOutcome {
    if (!this.sessions.has(sessionId)) {
      return { ok: false, code: 'SESSION_GONE', message: 'Session closed' };
    }

    const snapshot = this.engine.status(planId);
    if (!snapshot) {
      return { ok: false, code: 'NOT_FOUND', message: `Plan not found: ${planId}` };
    }

    // Events are not replayed: a finished plan is described by its snapshot alone
    if (isTerminalPlanStatus(snapshot.status)) {
      this.sessions.send(sessionId, 'plan:subscribed', { planId, snapshot });
      this.sessions.send(sessionId, 'plan:unsubscribed', { planId, reason: 'finished' });
      return { ok: true, status: 'finished' };
    }

    const unsubscribe = this.engine.listen(planId, (event) => this.forward(sessionId, event));
    if (!this.sessions.addSubscription(sessionId, planId, unsubscribe)) {
      unsubscribe();
      return {
        ok: false,
        code: 'SUBSCRIPTION_LIMIT',
        message: 'Maximum plan subscriptions reached',
      };
    }

    // Events published from here on are queued behind this frame
    this.sessions.send(sessionId, 'plan:subscribed', { planId, snapshot });
    log.debug('Session subscribed to plan', { sessionId, planId });
    return { ok: true, status: 'subscribed' };
  }

  /**
   * Stop forwarding a plan's events to a session.
   */
  unsubscribe(sessionId: string, planId: string): boolean {
    const removed = this.sessions.removeSubscription(sessionId, planId);
    if (removed) {
      this.sessions.send(sessionId, 'plan:unsubscribed', { planId, reason: 'requested' });
    }
    return removed;
  }

  private forward(sessionId: string, event: StatusEvent): void {
    if (!this.sessions.isSubscribed(sessionId, event.planId)) return;

    if (!this.sessions.send(sessionId, 'plan:event', event)) {
      this.sessions.remove(sessionId);
      throw new ObserverDeliveryError(event.planId);
    }

    if (event.kind === 'plan' && isTerminalPlanStatus(event.to)) {
      this.sessions.removeSubscription(sessionId, event.planId);
      this.sessions.send(sessionId, 'plan:unsubscribed', { planId: event.planId, reason: 'finished' });
    }
  }
}
