import OpenAI from 'openai';
import { ExecutorFault, createLogger, errorMessage } from '@cadence/shared';
import type { AiExecutorConfig } from '@cadence/shared';
import type { ExecutorResult, TaskExecutor, TaskOf } from '@cadence/scheduler';

const log = createLogger('executors:ai');

/** One prompt in, one completion out. */
export interface CompletionClient {
  readonly model: string;
  complete(prompt: string): Promise<string>;
}

export class OpenAICompletionClient implements CompletionClient {
  readonly model: string;
  private options: Partial<AiExecutorConfig>;
  private client: OpenAI | null = null;

  constructor(options: Partial<AiExecutorConfig> = {}) {
    this.options = options;
    this.model = options.model ?? 'gpt-4o-mini';
  }

  private ensureClient(): OpenAI {
    if (this.client) return this.client;
    const apiKey = this.options.apiKey ?? process.env['OPENAI_API_KEY'];
    if (!apiKey) {
      throw new ExecutorFault('AI executor is not configured. Set executors.ai.apiKey or OPENAI_API_KEY', 'ai');
    }
    this.client = new OpenAI({ apiKey, baseURL: this.options.baseUrl });
    return this.client;
  }

  async complete(prompt: string): Promise<string> {
    const client = this.ensureClient();
    const completion = await client.chat.completions.create({
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      max_tokens: this.options.maxTokens ?? 1024,
      temperature: this.options.temperature ?? 0.7,
    });
    return completion.choices[0]?.message?.content ?? '';
  }
}

export class AiExecutor implements TaskExecutor<'ai'> {
  constructor(private client: CompletionClient) {}

  async execute(task: TaskOf<'ai'>): Promise<ExecutorResult> {
    log.info({ taskId: task.id, model: this.client.model }, 'Sending prompt');

    try {
      const text = await this.client.complete(task.prompt);
      return { status: 'success', data: text };
    } catch (err) {
      return { status: 'error', error: `AI completion failed: ${errorMessage(err)}` };
    }
  }
}
