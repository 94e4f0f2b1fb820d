/**
 * Plan file loading shared by `validate` and `run`
 */

import { readFile } from 'node:fs/promises';
import { planSubmissionSchema, validateBody, type PlanSubmission } from '@taskrelay/gateway';
import { getErrorMessage } from '@taskrelay/core';

/**
 * Read a planner JSON file and check it against the submission schema.
 * Graph checks (cycles, references) are left to the engine.
 */
export async function loadPlanFile(file: string): Promise<PlanSubmission> {
  let text: string;
  try {
    text = await readFile(file, 'utf-8');
  } catch (error) {
    throw new Error(`Cannot read plan file ${file}: ${getErrorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new Error(`Plan file ${file} is not valid JSON`);
  }

  return validateBody(planSubmissionSchema, raw);
}
