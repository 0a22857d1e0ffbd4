export class CadenceError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'CadenceError';
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends CadenceError {
  public readonly field: string;

  constructor(message: string, field: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class ScheduleParseError extends CadenceError {
  public readonly expression: string;

  constructor(message: string, expression: string, details?: Record<string, unknown>) {
    super(message, 'SCHEDULE_PARSE_ERROR', details);
    this.name = 'ScheduleParseError';
    this.expression = expression;
  }
}

export class TaskNotFoundError extends CadenceError {
  public readonly taskId: string;

  constructor(taskId: string) {
    super(`Task not found: ${taskId}`, 'TASK_NOT_FOUND', { taskId });
    this.name = 'TaskNotFoundError';
    this.taskId = taskId;
  }
}

export class TaskDisabledError extends CadenceError {
  public readonly taskId: string;

  constructor(taskId: string) {
    super(`Task is disabled: ${taskId}`, 'TASK_DISABLED', { taskId });
    this.name = 'TaskDisabledError';
    this.taskId = taskId;
  }
}

export class NoExecutorError extends CadenceError {
  public readonly taskType: string;

  constructor(taskType: string) {
    super(`No executor registered for task type: ${taskType}`, 'NO_EXECUTOR', { taskType });
    this.name = 'NoExecutorError';
    this.taskType = taskType;
  }
}

export class ExecutorFault extends CadenceError {
  public readonly taskType: string;

  constructor(message: string, taskType: string, details?: Record<string, unknown>) {
    super(message, 'EXECUTOR_FAULT', details);
    this.name = 'ExecutorFault';
    this.taskType = taskType;
  }
}

export class StorageError extends CadenceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORAGE_ERROR', details);
    this.name = 'StorageError';
  }
}

export class ConfigError extends CadenceError {
  public readonly path?: string;

  constructor(message: string, path?: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
