import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, it, expect } from 'vitest';
import { createTask, type TaskOf } from '@cadence/scheduler';
import { ShellExecutor, isCommandAllowed, runCommand } from '../shell.js';

function shellTask(command: string): TaskOf<'shell_command'> {
  const task = createTask({ name: 'Shell', schedule: '@once', command });
  if (task.type !== 'shell_command') throw new Error('expected a shell task');
  return task;
}

let tempDir: string | undefined;

afterEach(() => {
  if (tempDir) {
    fs.rmSync(tempDir, { recursive: true, force: true });
    tempDir = undefined;
  }
});

describe('isCommandAllowed', () => {
  it('allows everything with the wildcard', () => {
    expect(isCommandAllowed('anything --goes', ['*'])).toBe(true);
  });

  it('matches the allow-list on the first word', () => {
    const allowed = ['echo', 'ls'];
    expect(isCommandAllowed('echo hi', allowed)).toBe(true);
    expect(isCommandAllowed('  ls -la', allowed)).toBe(true);
    expect(isCommandAllowed('cat /etc/hosts', allowed)).toBe(false);
    expect(isCommandAllowed('', allowed)).toBe(false);
  });
});

describe('runCommand', () => {
  it('captures stdout, stderr and the exit code', async () => {
    const outcome = await runCommand('echo out; echo err >&2; exit 2', { timeoutMs: 5_000 });
    expect(outcome).toEqual({ stdout: 'out\n', stderr: 'err\n', exitCode: 2, signal: null, timedOut: false });
  });

  it('marks a command killed at the timeout', async () => {
    const outcome = await runCommand('exec sleep 5', { timeoutMs: 100 });
    expect(outcome).toMatchObject({ exitCode: null, signal: 'SIGKILL', timedOut: true });
  });

  it('reports a signal the command received from elsewhere', async () => {
    const outcome = await runCommand('kill -TERM $$', { timeoutMs: 5_000 });
    expect(outcome).toMatchObject({ exitCode: null, signal: 'SIGTERM', timedOut: false });
  });
});

describe('ShellExecutor', () => {
  it('returns trimmed stdout on success', async () => {
    const result = await new ShellExecutor().execute(shellTask('echo hi'));
    expect(result).toEqual({ status: 'success', data: 'hi' });
  });

  it('reports a non-zero exit with stderr', async () => {
    const result = await new ShellExecutor().execute(shellTask('echo oops >&2; exit 3'));
    expect(result).toEqual({ status: 'error', error: 'Command exited with code 3: oops' });
  });

  it('falls back to stdout, then to the bare code', async () => {
    const executor = new ShellExecutor();
    expect(await executor.execute(shellTask('echo partial; exit 1'))).toEqual({
      status: 'error',
      error: 'Command exited with code 1: partial',
    });
    expect(await executor.execute(shellTask('exit 4'))).toEqual({
      status: 'error',
      error: 'Command exited with code 4',
    });
  });

  it('refuses commands outside the allow-list', async () => {
    const executor = new ShellExecutor({ allowedCommands: ['echo'] });
    expect(await executor.execute(shellTask('ls'))).toEqual({ status: 'error', error: 'Command not allowed: ls' });
  });

  it('reports a command ended by a signal', async () => {
    const result = await new ShellExecutor().execute(shellTask('kill -TERM $$'));
    expect(result).toEqual({ status: 'error', error: 'Command killed by SIGTERM' });
  });

  it('kills a command that runs past the timeout', async () => {
    const executor = new ShellExecutor({ timeoutMs: 100 });
    expect(await executor.execute(shellTask('exec sleep 5'))).toEqual({
      status: 'error',
      error: 'Command timed out after 100ms: exec sleep 5',
    });
  });

  it('runs in the configured working directory', async () => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'cadence-shell-')));
    const result = await new ShellExecutor({ cwd: tempDir }).execute(shellTask('pwd'));
    expect(result).toEqual({ status: 'success', data: tempDir });
  });
});
