import { createLogger, errorMessage } from '@cadence/shared';
import type { ApiExecutorConfig } from '@cadence/shared';
import type { ExecutorResult, TaskExecutor, TaskOf } from '@cadence/scheduler';

const log = createLogger('executors:api-call');

const MAX_BODY_LENGTH = 10_000;
const BODYLESS_METHODS = new Set(['GET', 'HEAD']);

function truncate(text: string): string {
  return text.length > MAX_BODY_LENGTH ? `${text.slice(0, MAX_BODY_LENGTH)}\n...(truncated)` : text;
}

export class ApiCallExecutor implements TaskExecutor<'api_call'> {
  private timeoutMs: number;
  private userAgent: string;

  constructor(config: Partial<ApiExecutorConfig> = {}) {
    this.timeoutMs = config.timeoutMs ?? 15_000;
    this.userAgent = config.userAgent ?? 'Cadence/1.0';
  }

  async execute(task: TaskOf<'api_call'>): Promise<ExecutorResult> {
    const method = task.apiMethod;
    const sendBody = task.apiBody !== null && !BODYLESS_METHODS.has(method);

    log.info({ taskId: task.id, method, url: task.apiUrl }, 'Calling API');

    try {
      const response = await fetch(task.apiUrl, {
        method,
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/json, text/plain, */*',
          ...(sendBody ? { 'Content-Type': 'application/json' } : {}),
          ...(task.apiHeaders ?? {}),
        },
        body: sendBody ? JSON.stringify(task.apiBody) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      const text = await response.text();
      if (!response.ok) {
        return {
          status: 'error',
          error: `HTTP ${response.status}: ${response.statusText}${text ? ` - ${truncate(text)}` : ''}`,
        };
      }
      return { status: 'success', data: truncate(text) };
    } catch (err) {
      return { status: 'error', error: `Request to ${task.apiUrl} failed: ${errorMessage(err)}` };
    }
  }
}
