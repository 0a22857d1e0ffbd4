import { z } from 'zod';
import { ExecutorFault, createLogger, errorMessage } from '@cadence/shared';
import type { ToolCallExecutorConfig } from '@cadence/shared';
import type { ExecutorResult, TaskExecutor, TaskOf } from '@cadence/scheduler';

const log = createLogger('executors:tool-call');

/**
 * Remote tool collaborator. Constructed once at startup and handed to the
 * executor, so tests can substitute a fake.
 */
export interface ToolClient {
  invoke(tool: string, method: string, params: Record<string, unknown>): Promise<unknown>;
}

const jsonRpcId = z.union([z.number(), z.string(), z.null()]);

// Error variant first: `result` is optional under z.unknown().
const jsonRpcResponseSchema = z.union([
  z.object({
    jsonrpc: z.literal('2.0'),
    id: jsonRpcId,
    error: z.object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    }),
  }),
  z.object({
    jsonrpc: z.literal('2.0'),
    id: jsonRpcId,
    result: z.unknown(),
  }),
]);

/**
 * Calls `tools/call` over JSON-RPC 2.0 via HTTP POST. `tool` is either a
 * full URL or a path resolved against the configured base URL.
 */
export class HttpToolClient implements ToolClient {
  private baseUrl: string;
  private timeoutMs: number;
  private nextId = 1;

  constructor(config: Partial<ToolCallExecutorConfig> = {}) {
    this.baseUrl = (config.baseUrl ?? '').replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 30_000;
  }

  resolveEndpoint(tool: string): string {
    if (/^https?:\/\//i.test(tool)) return tool;
    if (!this.baseUrl) {
      throw new ExecutorFault(
        `Tool "${tool}" is not a URL and no executors.toolCall.baseUrl is configured`,
        'tool_call',
      );
    }
    return `${this.baseUrl}/${tool.replace(/^\/+/, '')}`;
  }

  async invoke(tool: string, method: string, params: Record<string, unknown>): Promise<unknown> {
    const endpoint = this.resolveEndpoint(tool);
    const id = this.nextId++;

    const response = await fetch(endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify({
        jsonrpc: '2.0',
        id,
        method: 'tools/call',
        params: { name: method, arguments: params },
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new ExecutorFault(`Tool endpoint returned HTTP ${response.status}`, 'tool_call', {
        endpoint,
        status: response.status,
      });
    }

    const parsed = jsonRpcResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExecutorFault('Tool endpoint returned a malformed JSON-RPC response', 'tool_call', { endpoint });
    }
    if ('error' in parsed.data) {
      throw new ExecutorFault(
        `Tool call ${tool}.${method} failed: ${parsed.data.error.message}`,
        'tool_call',
        { code: parsed.data.error.code },
      );
    }
    return parsed.data.result;
  }
}

export class ToolCallExecutor implements TaskExecutor<'tool_call'> {
  constructor(private client: ToolClient) {}

  async execute(task: TaskOf<'tool_call'>): Promise<ExecutorResult> {
    log.info({ taskId: task.id, tool: task.tool, method: task.method }, 'Invoking tool');

    try {
      const result = await this.client.invoke(task.tool, task.method, task.params);
      return { status: 'success', data: result };
    } catch (err) {
      log.warn({ taskId: task.id, tool: task.tool, err: errorMessage(err) }, 'Tool call failed');
      return { status: 'error', error: errorMessage(err) };
    }
  }
}
