/**
 * Run command - executes a plan file locally against simulated agents
 * and prints status transitions as they happen.
 */

import { randomUUID } from 'node:crypto';
import {
  PlanEngine,
  registerSimulatedAgents,
  initServiceRegistry,
  hasServiceRegistry,
  getServiceRegistry,
  Services,
  getErrorMessage,
  type EngineConfigInput,
  type LogLevel,
  type PlanSnapshot,
  type StatusEvent,
} from '@taskrelay/core';
import {
  createLogService,
  toPlanInput,
  SIMULATED_AGENT_DELAY_MS,
  type PlanSubmission,
} from '@taskrelay/gateway';
import { loadPlanFile } from './plan-file.js';

export interface RunOptions {
  concurrency?: number;
  timeout?: number;
  retries?: number;
  /** Simulated agent latency (ms) */
  delay?: number;
  failFast?: boolean;
  json?: boolean;
  logLevel?: LogLevel;
}

export function formatEvent(event: StatusEvent): string {
  const seq = String(event.sequence).padStart(3, ' ');
  const subject = event.kind === 'plan' ? 'plan' : `step ${event.stepId}`;
  let line = `[${seq}] ${subject}: ${event.from} → ${event.to}`;
  if (event.kind === 'step' && event.retry) {
    line += ` (retry ${event.retry.attempt}/${event.retry.maxRetries} in ${event.retry.delayMs}ms)`;
  }
  if (event.error) {
    line += ` - ${event.error.code}: ${event.error.message}`;
  }
  return line;
}

export function toEngineConfig(options: RunOptions): EngineConfigInput {
  return {
    ...(options.concurrency !== undefined ? { maxConcurrentSteps: options.concurrency } : {}),
    ...(options.timeout !== undefined ? { stepTimeoutMs: options.timeout } : {}),
    ...(options.retries !== undefined ? { maxRetries: options.retries } : {}),
    ...(options.failFast ? { failurePolicy: 'fail-fast' as const } : {}),
  };
}

function printSummary(snapshot: PlanSnapshot): void {
  const icon = snapshot.status === 'succeeded' ? '✅' : '❌';
  console.log('');
  console.log(`${icon} Plan ${snapshot.id} ${snapshot.status}`);
  for (const step of snapshot.steps) {
    const suffix = step.error ? ` (${step.error.code}: ${step.error.message})` : '';
    console.log(`   - ${step.id} [${step.capability}] ${step.status}${suffix}`);
  }
}

export async function runPlanFile(file: string, options: RunOptions = {}): Promise<void> {
  let submission: PlanSubmission;
  try {
    submission = await loadPlanFile(file);
  } catch (error) {
    console.error(`❌ ${getErrorMessage(error)}`);
    process.exitCode = 1;
    return;
  }

  // The engine logs through the registry; keep it quiet unless asked
  if (!hasServiceRegistry()) {
    initServiceRegistry().register(
      Services.Log,
      createLogService({ level: options.logLevel ?? 'warn' }),
    );
  }

  const engine = new PlanEngine({ config: toEngineConfig(options) });
  registerSimulatedAgents(engine.agents, { delayMs: options.delay ?? SIMULATED_AGENT_DELAY_MS });
  getServiceRegistry().register(Services.Engine, engine);

  const { planId = randomUUID(), input } = toPlanInput(submission);

  // Subscribe first: the pending → running transition is published by start()
  const subscription = engine.subscribe(planId);
  const started = engine.start(input, { planId });
  if (!started.ok) {
    subscription.close();
    console.error(`❌ Invalid plan (${started.error.kind}): ${started.error.message}`);
    process.exitCode = 1;
    return;
  }

  if (!options.json) {
    console.log(`🚀 Running plan ${planId}: ${input.goal}`);
  }

  const printing = (async () => {
    for await (const event of subscription) {
      if (!options.json) console.log(formatEvent(event));
    }
  })();

  let snapshot: PlanSnapshot;
  try {
    [snapshot] = await Promise.all([started.value.done, printing]);
  } catch (error) {
    subscription.close();
    console.error(`❌ Plan ${planId} aborted: ${getErrorMessage(error)}`);
    process.exitCode = 1;
    return;
  }

  if (options.json) {
    console.log(JSON.stringify(snapshot, null, 2));
  } else {
    printSummary(snapshot);
  }
  if (snapshot.status !== 'succeeded') {
    process.exitCode = 1;
  }
}
