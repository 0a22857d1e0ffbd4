import { nanoid } from 'nanoid';
import { z } from 'zod';
import { ValidationError, sanitizeOptional, sanitizeText } from '@cadence/shared';
import { validateSchedule, type ScheduleOptions } from './schedule.js';
import {
  TASK_STATUSES,
  TASK_TYPES,
  type Task,
  type TaskInput,
  type TaskPatch,
  type TaskPayload,
  type TaskRecord,
  type TaskState,
  type TaskType,
} from './types.js';

const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'];

type TextField = 'command' | 'apiUrl' | 'prompt' | 'reminderMessage' | 'tool' | 'method';

/** Record-level names, used in validation messages. */
const FIELD_NAMES: Record<TextField, string> = {
  command: 'command',
  apiUrl: 'api_url',
  prompt: 'prompt',
  reminderMessage: 'reminder_message',
  tool: 'tool',
  method: 'method',
};

export const REQUIRED_FIELDS: Record<TaskType, readonly TextField[]> = {
  shell_command: ['command'],
  api_call: ['apiUrl'],
  ai: ['prompt'],
  reminder: ['reminderMessage'],
  tool_call: ['tool', 'method'],
};

export function generateTaskId(): string {
  return `task_${nanoid(12)}`;
}

export function isTaskType(value: unknown): value is TaskType {
  return TASK_TYPES.some(t => t === value);
}

function requireText(input: TaskInput, key: TextField, type: TaskType, sanitize: boolean): string {
  const raw = input[key];
  const value = typeof raw === 'string' ? (sanitize ? sanitizeText(raw) : raw).trim() : '';
  if (!value) {
    const field = FIELD_NAMES[key];
    throw new ValidationError(`${field} is required for ${type} tasks`, field, { type });
  }
  return value;
}

function buildPayload(input: TaskInput, type: TaskType): TaskPayload {
  switch (type) {
    case 'shell_command':
      return { type, command: requireText(input, 'command', type, true) };

    case 'api_call': {
      const apiUrl = requireText(input, 'apiUrl', type, false);
      if (!URL.canParse(apiUrl)) {
        throw new ValidationError(`api_url is not a valid URL: ${apiUrl}`, 'api_url', { type });
      }
      const apiMethod = (input.apiMethod?.trim() || 'GET').toUpperCase();
      if (!HTTP_METHODS.includes(apiMethod)) {
        throw new ValidationError(`api_method is not a supported HTTP method: ${apiMethod}`, 'api_method', { type });
      }
      return {
        type,
        apiUrl,
        apiMethod,
        apiHeaders: input.apiHeaders ?? null,
        apiBody: input.apiBody ?? null,
      };
    }

    case 'ai':
      return { type, prompt: requireText(input, 'prompt', type, true) };

    case 'reminder':
      return {
        type,
        reminderMessage: requireText(input, 'reminderMessage', type, true),
        reminderTitle: sanitizeOptional(input.reminderTitle),
      };

    case 'tool_call':
      return {
        type,
        tool: requireText(input, 'tool', type, false),
        method: requireText(input, 'method', type, false),
        params: input.params ?? {},
      };
  }
}

function requireName(input: TaskInput): string {
  const name = typeof input.name === 'string' ? sanitizeText(input.name).trim() : '';
  if (!name) {
    throw new ValidationError('name is required', 'name');
  }
  return name;
}

function resolveType(input: TaskInput): TaskType {
  const type: unknown = input.type ?? 'shell_command';
  if (!isTaskType(type)) {
    throw new ValidationError(
      `type must be one of ${TASK_TYPES.join(', ')}; got "${String(type)}"`,
      'type',
    );
  }
  return type;
}

/**
 * Build a new task from loose input. The payload fields required by the
 * task type must be present; free-text fields are sanitized. `nextRun` is
 * left unset: the scheduler fills it in when the task is added.
 */
export function createTask(input: TaskInput, now: Date = new Date(), options: ScheduleOptions = {}): Task {
  const type = resolveType(input);
  const name = requireName(input);
  const schedule = input.schedule?.trim() ?? '';
  validateSchedule(schedule, options);
  const payload = buildPayload(input, type);
  const enabled = input.enabled ?? true;

  const state: TaskState = {
    id: generateTaskId(),
    name,
    description: sanitizeOptional(input.description),
    schedule,
    enabled,
    doOnlyOnce: input.doOnlyOnce ?? true,
    lastRun: null,
    nextRun: null,
    status: enabled ? 'pending' : 'disabled',
    createdAt: now,
    updatedAt: now,
  };

  return { ...state, ...payload };
}

export function toTaskInput(task: Task): TaskInput {
  const base: TaskInput = {
    name: task.name,
    schedule: task.schedule,
    type: task.type,
    description: task.description,
    enabled: task.enabled,
    doOnlyOnce: task.doOnlyOnce,
  };

  switch (task.type) {
    case 'shell_command':
      return { ...base, command: task.command };
    case 'api_call':
      return {
        ...base,
        apiUrl: task.apiUrl,
        apiMethod: task.apiMethod,
        apiHeaders: task.apiHeaders,
        apiBody: task.apiBody,
      };
    case 'ai':
      return { ...base, prompt: task.prompt };
    case 'reminder':
      return { ...base, reminderMessage: task.reminderMessage, reminderTitle: task.reminderTitle };
    case 'tool_call':
      return { ...base, tool: task.tool, method: task.method, params: task.params };
  }
}

/**
 * Apply a patch to descriptive and payload fields. The type is fixed at
 * creation; scheduling bookkeeping (status, lastRun, nextRun) is left to
 * the scheduler.
 */
export function updateTask(task: Task, patch: TaskPatch, now: Date = new Date(), options: ScheduleOptions = {}): Task {
  const input: TaskInput = { ...toTaskInput(task), ...patch, type: task.type };
  const name = requireName(input);
  const schedule = input.schedule?.trim() ?? '';
  validateSchedule(schedule, options);
  const payload = buildPayload(input, task.type);

  const state: TaskState = {
    id: task.id,
    name,
    description: sanitizeOptional(input.description),
    schedule,
    enabled: task.enabled,
    doOnlyOnce: input.doOnlyOnce ?? task.doOnlyOnce,
    lastRun: task.lastRun,
    nextRun: task.nextRun,
    status: task.status,
    createdAt: task.createdAt,
    updatedAt: now,
  };

  return { ...state, ...payload };
}

// ── Serialization ───────────────────────────────────────────────────

function isoOrNull(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

export function serializeTask(task: Task): TaskRecord {
  const record: TaskRecord = {
    id: task.id,
    name: task.name,
    description: task.description,
    schedule: task.schedule,
    type: task.type,
    command: null,
    api_url: null,
    api_method: null,
    api_headers: null,
    api_body: null,
    prompt: null,
    tool: null,
    method: null,
    params: null,
    reminder_title: null,
    reminder_message: null,
    enabled: task.enabled,
    do_only_once: task.doOnlyOnce,
    last_run: isoOrNull(task.lastRun),
    next_run: isoOrNull(task.nextRun),
    status: task.status,
    created_at: task.createdAt.toISOString(),
    updated_at: task.updatedAt.toISOString(),
  };

  switch (task.type) {
    case 'shell_command':
      record.command = task.command;
      break;
    case 'api_call':
      record.api_url = task.apiUrl;
      record.api_method = task.apiMethod;
      record.api_headers = task.apiHeaders;
      record.api_body = task.apiBody;
      break;
    case 'ai':
      record.prompt = task.prompt;
      break;
    case 'reminder':
      record.reminder_title = task.reminderTitle;
      record.reminder_message = task.reminderMessage;
      break;
    case 'tool_call':
      record.tool = task.tool;
      record.method = task.method;
      record.params = task.params;
      break;
  }

  return record;
}

const timestamp = z.string().refine(v => !Number.isNaN(Date.parse(v)), { message: 'Invalid timestamp' });

export const taskRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string().nullable(),
  schedule: z.string(),
  type: z.enum(TASK_TYPES),
  command: z.string().nullable(),
  api_url: z.string().nullable(),
  api_method: z.string().nullable(),
  api_headers: z.record(z.string()).nullable(),
  api_body: z.record(z.unknown()).nullable(),
  prompt: z.string().nullable(),
  tool: z.string().nullable(),
  method: z.string().nullable(),
  params: z.record(z.unknown()).nullable(),
  reminder_title: z.string().nullable(),
  reminder_message: z.string().nullable(),
  enabled: z.boolean(),
  do_only_once: z.boolean(),
  last_run: timestamp.nullable(),
  next_run: timestamp.nullable(),
  status: z.enum(TASK_STATUSES),
  created_at: timestamp,
  updated_at: timestamp,
});

function dateOrNull(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

/**
 * Inverse of serializeTask. Throws a ZodError for a malformed record and a
 * ValidationError when the payload does not satisfy its type.
 */
export function deserializeTask(raw: unknown): Task {
  const record = taskRecordSchema.parse(raw);

  const payload = buildPayload(
    {
      name: record.name,
      schedule: record.schedule,
      command: record.command,
      apiUrl: record.api_url,
      apiMethod: record.api_method,
      apiHeaders: record.api_headers,
      apiBody: record.api_body,
      prompt: record.prompt,
      tool: record.tool,
      method: record.method,
      params: record.params,
      reminderTitle: record.reminder_title,
      reminderMessage: record.reminder_message,
    },
    record.type,
  );

  const state: TaskState = {
    id: record.id,
    name: record.name,
    description: record.description,
    schedule: record.schedule,
    enabled: record.enabled,
    doOnlyOnce: record.do_only_once,
    lastRun: dateOrNull(record.last_run),
    nextRun: dateOrNull(record.next_run),
    status: record.status,
    createdAt: new Date(record.created_at),
    updatedAt: new Date(record.updated_at),
  };

  return { ...state, ...payload };
}
