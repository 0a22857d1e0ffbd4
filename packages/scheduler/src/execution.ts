import { nanoid } from 'nanoid';
import { z } from 'zod';
import { CadenceError, sanitizeOptional, sanitizeText } from '@cadence/shared';
import { EXECUTION_STATUSES, type Execution, type ExecutionRecord } from './types.js';

export function generateExecutionId(): string {
  return `exec_${nanoid(12)}`;
}

export function isClosed(execution: Execution): boolean {
  return execution.endTime !== null;
}

export function openExecution(taskId: string, now: Date = new Date()): Execution {
  return {
    id: generateExecutionId(),
    taskId,
    startTime: now,
    endTime: null,
    status: 'running',
    output: null,
    error: null,
  };
}

function assertOpen(execution: Execution): void {
  if (isClosed(execution)) {
    throw new CadenceError(`Execution already closed: ${execution.id}`, 'EXECUTION_CLOSED', {
      executionId: execution.id,
    });
  }
}

export function closeSuccess(execution: Execution, output: string | null, now: Date = new Date()): Execution {
  assertOpen(execution);
  return Object.freeze({
    ...execution,
    endTime: now,
    status: 'success' as const,
    output: sanitizeOptional(output),
    error: null,
  });
}

export function closeFailure(execution: Execution, error: string, now: Date = new Date()): Execution {
  assertOpen(execution);
  return Object.freeze({
    ...execution,
    endTime: now,
    status: 'failed' as const,
    output: null,
    error: sanitizeText(error),
  });
}

export function serializeExecution(execution: Execution): ExecutionRecord {
  return {
    id: execution.id,
    task_id: execution.taskId,
    start_time: execution.startTime.toISOString(),
    end_time: execution.endTime ? execution.endTime.toISOString() : null,
    status: execution.status,
    output: execution.output,
    error: execution.error,
  };
}

const timestamp = z.string().refine(v => !Number.isNaN(Date.parse(v)), { message: 'Invalid timestamp' });

export const executionRecordSchema = z.object({
  id: z.string().min(1),
  task_id: z.string().min(1),
  start_time: timestamp,
  end_time: timestamp.nullable(),
  status: z.enum(EXECUTION_STATUSES),
  output: z.string().nullable(),
  error: z.string().nullable(),
});

export function deserializeExecution(raw: unknown): Execution {
  const record = executionRecordSchema.parse(raw);
  const execution: Execution = {
    id: record.id,
    taskId: record.task_id,
    startTime: new Date(record.start_time),
    endTime: record.end_time === null ? null : new Date(record.end_time),
    status: record.status,
    output: record.output,
    error: record.error,
  };
  return execution.endTime ? Object.freeze(execution) : execution;
}
