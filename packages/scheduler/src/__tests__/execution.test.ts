import { describe, it, expect } from 'vitest';
import { CadenceError } from '@cadence/shared';
import {
  closeFailure,
  closeSuccess,
  deserializeExecution,
  isClosed,
  openExecution,
  serializeExecution,
} from '../execution.js';

const START = new Date('2024-05-01T08:00:00.000Z');
const END = new Date('2024-05-01T08:00:02.500Z');

describe('openExecution', () => {
  it('opens a running execution with no end time', () => {
    const exec = openExecution('task_abc', START);

    expect(exec.id).toMatch(/^exec_[A-Za-z0-9_-]{12}$/);
    expect(exec).toMatchObject({
      taskId: 'task_abc',
      startTime: START,
      endTime: null,
      status: 'running',
      output: null,
      error: null,
    });
    expect(isClosed(exec)).toBe(false);
  });
});

describe('closing', () => {
  it('closes with success and output', () => {
    const exec = closeSuccess(openExecution('task_abc', START), 'hi', END);

    expect(exec).toMatchObject({ status: 'success', endTime: END, output: 'hi', error: null });
    expect(isClosed(exec)).toBe(true);
    expect(Object.isFrozen(exec)).toBe(true);
  });

  it('closes with failure and sanitizes the error', () => {
    const exec = closeFailure(openExecution('task_abc', START), 'boom – bad', END);
    expect(exec).toMatchObject({ status: 'failed', endTime: END, output: null, error: 'boom  bad' });
  });

  it('keeps the id and start time', () => {
    const open = openExecution('task_abc', START);
    const closed = closeSuccess(open, null, END);
    expect(closed.id).toBe(open.id);
    expect(closed.startTime).toEqual(START);
    expect(closed.output).toBeNull();
  });

  it('refuses to close twice', () => {
    const closed = closeSuccess(openExecution('task_abc', START), 'hi', END);
    expect(() => closeFailure(closed, 'late', END)).toThrow(CadenceError);
    expect(() => closeSuccess(closed, 'again', END)).toThrow('Execution already closed');
  });
});

describe('serialization', () => {
  it('writes snake_case fields and ISO timestamps', () => {
    const closed = closeFailure(openExecution('task_abc', START), 'exit 1', END);

    expect(serializeExecution(closed)).toEqual({
      id: closed.id,
      task_id: 'task_abc',
      start_time: '2024-05-01T08:00:00.000Z',
      end_time: '2024-05-01T08:00:02.500Z',
      status: 'failed',
      output: null,
      error: 'exit 1',
    });
  });

  it('reads a record back', () => {
    const closed = closeSuccess(openExecution('task_abc', START), '{"pong":true}', END);
    const restored = deserializeExecution(serializeExecution(closed));
    expect(restored).toEqual(closed);
    expect(Object.isFrozen(restored)).toBe(true);
  });

  it('rejects an unknown status', () => {
    const record = { ...serializeExecution(openExecution('task_abc', START)), status: 'completed' };
    expect(() => deserializeExecution(record)).toThrow();
  });
});
