/**
 * Shared Test Helpers
 */

import { vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export interface PlanDir {
  write(name: string, plan: unknown): Promise<string>;
  cleanup(): Promise<void>;
}

/**
 * Temporary directory for plan files. Call cleanup() in afterAll.
 */
export async function createPlanDir(): Promise<PlanDir> {
  const dir = await mkdtemp(join(tmpdir(), 'taskrelay-cli-'));
  return {
    async write(name, plan) {
      const file = join(dir, name);
      await writeFile(file, JSON.stringify(plan), 'utf-8');
      return file;
    },
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/**
 * Silence console output and keep the calls for assertions.
 */
export function spyOnConsole() {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const error = vi.spyOn(console, 'error').mockImplementation(() => {});
  const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
  return {
    log,
    error,
    warn,
    /** Everything passed to console.log, one string per call */
    lines: (): string[] => log.mock.calls.map((args) => args.map(String).join(' ')),
  };
}
