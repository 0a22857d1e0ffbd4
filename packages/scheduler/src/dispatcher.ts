import { NoExecutorError, createLogger, errorMessage } from '@cadence/shared';
import { closeFailure, closeSuccess, openExecution } from './execution.js';
import type { Execution, ExecutorRegistry, ExecutorResult, Task } from './types.js';

const log = createLogger('scheduler:dispatcher');

export type DispatcherOptions = {
  now?: () => Date;
};

function isExecutorResult(value: unknown): value is ExecutorResult {
  if (typeof value !== 'object' || value === null || !('status' in value)) return false;
  if (value.status === 'success') return true;
  return value.status === 'error' && 'error' in value && typeof value.error === 'string';
}

function serializeOutput(data: unknown): string | null {
  if (data === undefined || data === null) return null;
  if (typeof data === 'string') return data;
  try {
    return JSON.stringify(data) ?? String(data);
  } catch {
    return String(data);
  }
}

/**
 * Routes a task to the executor registered for its type and turns whatever
 * happens there into a closed Execution. Never throws.
 */
export class ExecutorDispatcher {
  private executors: ExecutorRegistry;
  private now: () => Date;

  constructor(executors: ExecutorRegistry, options: DispatcherOptions = {}) {
    this.executors = { ...executors };
    this.now = options.now ?? (() => new Date());
  }

  hasExecutor(type: Task['type']): boolean {
    return this.executors[type] !== undefined;
  }

  async dispatch(task: Task): Promise<Execution> {
    const execution = openExecution(task.id, this.now());
    log.debug({ taskId: task.id, type: task.type, executionId: execution.id }, 'Dispatching task');

    let result: unknown;
    try {
      const pending = this.invoke(task);
      if (!pending) {
        const err = new NoExecutorError(task.type);
        log.error({ taskId: task.id, type: task.type }, err.message);
        return closeFailure(execution, err.message, this.now());
      }
      result = await pending;
    } catch (err) {
      const message = errorMessage(err);
      log.warn({ taskId: task.id, type: task.type, err: message }, 'Executor raised');
      return closeFailure(execution, message || 'Executor failed without a message', this.now());
    }

    if (!isExecutorResult(result)) {
      log.warn({ taskId: task.id, type: task.type }, 'Executor returned a malformed result');
      return closeFailure(execution, `Executor for ${task.type} returned a malformed result`, this.now());
    }

    if (result.status === 'error') {
      log.info({ taskId: task.id, type: task.type, err: result.error }, 'Task failed');
      return closeFailure(execution, result.error, this.now());
    }

    log.info({ taskId: task.id, type: task.type }, 'Task succeeded');
    return closeSuccess(execution, serializeOutput(result.data), this.now());
  }

  private invoke(task: Task): Promise<ExecutorResult> | null {
    switch (task.type) {
      case 'shell_command':
        return this.executors.shell_command?.execute(task) ?? null;
      case 'api_call':
        return this.executors.api_call?.execute(task) ?? null;
      case 'ai':
        return this.executors.ai?.execute(task) ?? null;
      case 'reminder':
        return this.executors.reminder?.execute(task) ?? null;
      case 'tool_call':
        return this.executors.tool_call?.execute(task) ?? null;
    }
  }
}
