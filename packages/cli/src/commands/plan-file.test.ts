import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadPlanFile } from './plan-file.js';

describe('loadPlanFile', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'taskrelay-plan-file-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function write(name: string, content: string): Promise<string> {
    const file = join(dir, name);
    await writeFile(file, content, 'utf-8');
    return file;
  }

  it('normalizes planner fields', async () => {
    const file = await write('ok.json', JSON.stringify({
      id: 'trip',
      goal: 'Book a trip',
      steps: [
        { id: 'find', capability: 'search', parameters: { q: 'flights' } },
        { id: 'tell', capability: 'messaging', depends_on: ['find'], max_retries: 2 },
      ],
    }));

    const submission = await loadPlanFile(file);

    expect(submission.id).toBe('trip');
    expect(submission.steps[1]).toEqual({
      id: 'tell',
      capability: 'messaging',
      parameters: {},
      dependsOn: ['find'],
      maxRetries: 2,
    });
  });

  it('reports a missing file', async () => {
    await expect(loadPlanFile(join(dir, 'absent.json'))).rejects.toThrow(/^Cannot read plan file /);
  });

  it('reports malformed JSON', async () => {
    const file = await write('broken.json', '{ "goal": ');

    await expect(loadPlanFile(file)).rejects.toThrow(`Plan file ${file} is not valid JSON`);
  });

  it('reports schema problems', async () => {
    const file = await write('no-goal.json', JSON.stringify({ steps: [] }));

    await expect(loadPlanFile(file)).rejects.toThrow('Validation failed: goal: Required');
  });
});
