/**
 * WebSocket observer channel
 */

export { WSGateway, type WSGatewayConfig } from './server.js';
export { SessionManager } from './session.js';
export { PlanEventBridge, type SubscribeOutcome } from './plan-bridge.js';
export type {
  Session,
  SessionSocket,
  ClientSocket,
  WSMessage,
  ClientEvents,
  ServerEvents,
} from './types.js';
