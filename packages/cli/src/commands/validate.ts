/**
 * Validate command - checks a plan file without running it
 */

import { validatePlan, getErrorMessage, type PlanInput, type PlanValidationDetails } from '@taskrelay/core';
import { toPlanInput } from '@taskrelay/gateway';
import { loadPlanFile } from './plan-file.js';

interface ValidateOptions {
  json?: boolean;
}

export async function validatePlanFile(file: string, options: ValidateOptions = {}): Promise<void> {
  let input: PlanInput;
  try {
    input = toPlanInput(await loadPlanFile(file)).input;
  } catch (error) {
    report(options, { valid: false, error: { message: getErrorMessage(error) } });
    process.exitCode = 1;
    return;
  }

  const result = validatePlan(input);
  if (!result.ok) {
    const { kind, message, details } = result.error;
    report(options, { valid: false, error: { kind, message, details } });
    process.exitCode = 1;
    return;
  }

  const plan = result.value;
  if (options.json) {
    console.log(JSON.stringify({ valid: true, goal: plan.goal, order: plan.order }, null, 2));
    return;
  }

  console.log(`✅ Plan is valid: ${plan.steps.length} step(s)`);
  console.log(`   Goal: ${plan.goal}`);
  for (const id of plan.order) {
    const step = plan.steps.find((s) => s.id === id);
    if (!step) continue;
    const deps = step.dependsOn.length > 0 ? ` after ${step.dependsOn.join(', ')}` : '';
    console.log(`   - ${step.id} [${step.capability}]${deps}`);
  }
}

interface InvalidReport {
  valid: false;
  error: { kind?: string; message: string; details?: PlanValidationDetails };
}

function report(options: ValidateOptions, outcome: InvalidReport): void {
  if (options.json) {
    console.log(JSON.stringify(outcome, null, 2));
    return;
  }
  const label = outcome.error.kind ? ` (${outcome.error.kind})` : '';
  console.error(`❌ Invalid plan${label}: ${outcome.error.message}`);
}
