import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const CADENCE_DIR = path.join(os.homedir(), '.cadence');
export const CONFIG_PATH = path.join(CADENCE_DIR, 'cadence.json');
export const DATA_DIR = path.join(CADENCE_DIR, 'data');
export const DEFAULT_DB_PATH = path.join(DATA_DIR, 'cadence.db');

const shellExecutorSchema = z.object({
  timeoutMs: z.number().int().positive().default(30_000),
  allowedCommands: z.array(z.string()).default(['*']),
  cwd: z.string().optional(),
});

const apiExecutorSchema = z.object({
  timeoutMs: z.number().int().positive().default(15_000),
  userAgent: z.string().default('Cadence/1.0'),
});

const aiExecutorSchema = z.object({
  apiKey: z.string().optional(),
  baseUrl: z.string().optional(),
  model: z.string().default('gpt-4o-mini'),
  maxTokens: z.number().int().positive().default(1024),
  temperature: z.number().min(0).max(2).default(0.7),
});

const reminderExecutorSchema = z.object({
  defaultTitle: z.string().default('Reminder'),
});

const toolCallExecutorSchema = z.object({
  baseUrl: z.string().default(''),
  timeoutMs: z.number().int().positive().default(30_000),
});

export const cadenceConfigSchema = z.object({
  scheduler: z.object({
    tickIntervalMs: z.number().int().positive().default(5_000),
    busyPollIntervalMs: z.number().int().positive().default(1_000),
    timezone: z.string().optional(),
  }).default({}),

  storage: z.object({
    path: z.string().default(DEFAULT_DB_PATH),
  }).default({}),

  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  }).default({}),

  executors: z.object({
    shell: shellExecutorSchema.default({}),
    api: apiExecutorSchema.default({}),
    ai: aiExecutorSchema.default({}),
    reminder: reminderExecutorSchema.default({}),
    toolCall: toolCallExecutorSchema.default({}),
  }).default({}),
});

export type CadenceConfig = z.infer<typeof cadenceConfigSchema>;
export type ShellExecutorConfig = z.infer<typeof shellExecutorSchema>;
export type ApiExecutorConfig = z.infer<typeof apiExecutorSchema>;
export type AiExecutorConfig = z.infer<typeof aiExecutorSchema>;
export type ReminderExecutorConfig = z.infer<typeof reminderExecutorSchema>;
export type ToolCallExecutorConfig = z.infer<typeof toolCallExecutorSchema>;

export function parseConfig(raw: unknown): CadenceConfig {
  return cadenceConfigSchema.parse(raw);
}

export function resolveEnvVars(value: string): string {
  return value.replace(/\$\{(\w+)\}/g, (_, key: string) => process.env[key] ?? '');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function resolveConfigEnvVars(config: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(config)) {
    if (typeof value === 'string') {
      result[key] = resolveEnvVars(value);
    } else if (isPlainObject(value)) {
      result[key] = resolveConfigEnvVars(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

export function resolveHomePath(value: string): string {
  const trimmed = value.trim();
  if (trimmed.startsWith('~')) {
    return path.resolve(trimmed.replace('~', os.homedir()));
  }
  return trimmed === ':memory:' ? trimmed : path.resolve(trimmed);
}

/**
 * Load the config file, falling back to defaults when it does not exist.
 * A file that exists but cannot be parsed or validated raises ConfigError.
 */
export function loadConfig(configPath: string = CONFIG_PATH): CadenceConfig {
  if (!fs.existsSync(configPath)) {
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to read config at ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      configPath,
    );
  }

  if (!isPlainObject(raw)) {
    throw new ConfigError(`Config at ${configPath} must be a JSON object`, configPath);
  }

  const result = cadenceConfigSchema.safeParse(resolveConfigEnvVars(raw));
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid config at ${configPath}: ${issues.join('; ')}`, configPath, { issues });
  }
  return result.data;
}
