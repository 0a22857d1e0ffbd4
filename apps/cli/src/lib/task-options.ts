import { z } from 'zod';
import { ValidationError } from '@cadence/shared';
import { isTaskType, type TaskInput } from '@cadence/scheduler';

export type TaskAddOptions = {
  schedule: string;
  type: string;
  description?: string;
  command?: string;
  apiUrl?: string;
  apiMethod?: string;
  header?: string[];
  body?: string;
  prompt?: string;
  tool?: string;
  method?: string;
  params?: string;
  title?: string;
  message?: string;
  recurring?: boolean;
  disabled?: boolean;
};

const jsonObjectSchema = z.record(z.unknown());

function parseJsonObject(raw: string | undefined, field: string): Record<string, unknown> | undefined {
  if (raw === undefined) return undefined;
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError(`${field} must be valid JSON: ${err instanceof Error ? err.message : String(err)}`, field);
  }
  const parsed = jsonObjectSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`${field} must be a JSON object`, field);
  }
  return parsed.data;
}

/** Parses repeated `Name: value` header flags. */
export function parseHeaders(entries: string[] | undefined): Record<string, string> | undefined {
  if (!entries || entries.length === 0) return undefined;
  const headers: Record<string, string> = {};
  for (const entry of entries) {
    const idx = entry.indexOf(':');
    if (idx <= 0) {
      throw new ValidationError(`Header must look like "Name: value"; got "${entry}"`, 'api_headers');
    }
    headers[entry.slice(0, idx).trim()] = entry.slice(idx + 1).trim();
  }
  return headers;
}

export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function toTaskInput(name: string, opts: TaskAddOptions): TaskInput {
  if (!isTaskType(opts.type)) {
    throw new ValidationError(`Unknown task type: ${opts.type}`, 'type');
  }

  return {
    name,
    schedule: opts.schedule,
    type: opts.type,
    description: opts.description,
    enabled: !opts.disabled,
    doOnlyOnce: !opts.recurring,
    command: opts.command,
    apiUrl: opts.apiUrl,
    apiMethod: opts.apiMethod,
    apiHeaders: parseHeaders(opts.header),
    apiBody: parseJsonObject(opts.body, 'api_body'),
    prompt: opts.prompt,
    tool: opts.tool,
    method: opts.method,
    params: parseJsonObject(opts.params, 'params'),
    reminderTitle: opts.title,
    reminderMessage: opts.message,
  };
}
