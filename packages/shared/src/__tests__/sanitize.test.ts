import { describe, it, expect } from 'vitest';
import { sanitizeOptional, sanitizeText } from '../sanitize.js';
import { CadenceError, TaskNotFoundError, ValidationError, errorMessage } from '../errors.js';

describe('sanitizeText', () => {
  it('keeps printable ASCII and common whitespace', () => {
    expect(sanitizeText('line one\n\tline two\r\n')).toBe('line one\n\tline two\r\n');
  });

  it('drops everything else', () => {
    expect(sanitizeText('café ☃ \u0007bell')).toBe('caf  bell');
  });
});

describe('sanitizeOptional', () => {
  it('passes null and undefined through as null', () => {
    expect(sanitizeOptional(null)).toBeNull();
    expect(sanitizeOptional(undefined)).toBeNull();
    expect(sanitizeOptional('okÿ')).toBe('ok');
  });
});

describe('errors', () => {
  it('carry a code and stay CadenceErrors', () => {
    const err = new ValidationError('name is required', 'name');
    expect(err).toBeInstanceOf(CadenceError);
    expect(err).toMatchObject({ code: 'VALIDATION_ERROR', field: 'name', name: 'ValidationError' });
    expect(new TaskNotFoundError('task_1').message).toBe('Task not found: task_1');
  });

  it('errorMessage reads errors and other values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
