/**
 * Plan status events
 */

export type {
  RetrySummary,
  PlanStatusEvent,
  StepStatusEvent,
  StatusEvent,
  StatusEventHandler,
  Unsubscribe,
  SubscribeOptions,
} from './types.js';

export {
  DEFAULT_SUBSCRIBER_BUFFER_SIZE,
  PlanSubscription,
  PlanEventBus,
} from './plan-event-bus.js';
