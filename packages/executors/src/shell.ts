import { spawn } from 'node:child_process';
import { ExecutorFault, createLogger, errorMessage } from '@cadence/shared';
import type { ShellExecutorConfig } from '@cadence/shared';
import type { ExecutorResult, TaskExecutor, TaskOf } from '@cadence/scheduler';

const log = createLogger('executors:shell');

const DEFAULT_TIMEOUT_MS = 30_000;

/** How a command ended. `exitCode` is null when a signal ended it. */
export interface CommandOutcome {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
}

export interface RunCommandOptions {
  timeoutMs: number;
  cwd?: string;
}

/**
 * Allow-list check on the command's first word. `*` lets every command
 * through; anything after the first word (arguments, pipes) is not inspected.
 */
export function isCommandAllowed(command: string, allowed: readonly string[]): boolean {
  if (allowed.includes('*')) return true;
  const [program = ''] = command.trim().split(/\s+/);
  return allowed.includes(program);
}

/** Runs `command` under `sh -c`, killing it with SIGKILL once `timeoutMs` passes. */
export function runCommand(command: string, options: RunCommandOptions): Promise<CommandOutcome> {
  return new Promise((resolve, reject) => {
    const child = spawn('sh', ['-c', command], {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      timeout: options.timeoutMs,
      killSignal: 'SIGKILL',
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.once('error', (err) => {
      reject(new ExecutorFault(`Could not start command: ${err.message}`, 'shell_command'));
    });

    child.once('close', (exitCode, signal) => {
      resolve({
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
        exitCode,
        signal,
        // Only the spawn timeout kills the child from this side.
        timedOut: child.killed,
      });
    });
  });
}

/** Runs shell_command tasks; stdout on exit 0 is the result data. */
export class ShellExecutor implements TaskExecutor<'shell_command'> {
  private allowed: readonly string[];
  private timeoutMs: number;
  private cwd?: string;

  constructor(config: Partial<ShellExecutorConfig> = {}) {
    this.allowed = config.allowedCommands ?? ['*'];
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.cwd = config.cwd;
  }

  async execute(task: TaskOf<'shell_command'>): Promise<ExecutorResult> {
    const { command } = task;
    if (!isCommandAllowed(command, this.allowed)) {
      log.warn({ taskId: task.id, command }, 'Command refused by allow-list');
      return { status: 'error', error: `Command not allowed: ${command}` };
    }

    log.info({ taskId: task.id, command }, 'Running shell command');

    let outcome: CommandOutcome;
    try {
      outcome = await runCommand(command, { timeoutMs: this.timeoutMs, cwd: this.cwd });
    } catch (err) {
      return { status: 'error', error: errorMessage(err) };
    }

    if (outcome.timedOut) {
      return { status: 'error', error: `Command timed out after ${this.timeoutMs}ms: ${command}` };
    }
    if (outcome.exitCode === null) {
      return { status: 'error', error: `Command killed by ${outcome.signal ?? 'signal'}` };
    }
    if (outcome.exitCode !== 0) {
      const detail = outcome.stderr.trim() || outcome.stdout.trim();
      return {
        status: 'error',
        error: `Command exited with code ${outcome.exitCode}${detail ? `: ${detail}` : ''}`,
      };
    }
    return { status: 'success', data: outcome.stdout.trim() };
  }
}
