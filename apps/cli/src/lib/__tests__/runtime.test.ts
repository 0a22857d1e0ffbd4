import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, it, expect } from 'vitest';
import { createRuntime, type Runtime } from '../runtime.js';

const MISSING_CONFIG = path.join(os.tmpdir(), 'cadence-no-config', 'cadence.json');

let runtime: Runtime | undefined;

afterEach(async () => {
  await runtime?.close();
  runtime = undefined;
});

describe('createRuntime', () => {
  it('falls back to default config and uses the given database', async () => {
    runtime = createRuntime({ configPath: MISSING_CONFIG, dbPath: ':memory:' });

    expect(runtime.config.scheduler.tickIntervalMs).toBe(5_000);
    expect(await runtime.scheduler.getAllTasks()).toEqual([]);
  });

  it('wires injected collaborators through to the executors', async () => {
    runtime = createRuntime({
      configPath: MISSING_CONFIG,
      dbPath: ':memory:',
      deps: { notifier: { notify: async () => undefined } },
    });

    const task = await runtime.scheduler.addTask({
      name: 'Break', schedule: '@once', type: 'reminder', reminderMessage: 'Stretch',
    });
    const execution = await runtime.scheduler.runTaskNow(task.id);

    expect(execution.status).toBe('success');
    expect(execution.output).toBe('{"title":"Reminder","message":"Stretch"}');
    expect(await runtime.store.loadExecutions(task.id)).toHaveLength(1);
  });

  it('closes cleanly', async () => {
    const local = createRuntime({ configPath: MISSING_CONFIG, dbPath: ':memory:' });
    await local.scheduler.start();
    await local.close();
    expect(local.scheduler.isRunning()).toBe(false);
  });
});
