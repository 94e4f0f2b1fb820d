import { describe, it, expect } from 'vitest';

describe('CLI', () => {
  it('should export commands', async () => {
    const commands = await import('./commands/index.js');

    expect(typeof commands.startServer).toBe('function');
    expect(typeof commands.validatePlanFile).toBe('function');
    expect(typeof commands.runPlanFile).toBe('function');
    expect(typeof commands.loadPlanFile).toBe('function');
  });
});
