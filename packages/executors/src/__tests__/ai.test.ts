import { afterEach, describe, it, expect, vi } from 'vitest';
import { ExecutorFault } from '@cadence/shared';
import { createTask, type TaskOf } from '@cadence/scheduler';
import { AiExecutor, OpenAICompletionClient, type CompletionClient } from '../ai.js';

function aiTask(prompt: string): TaskOf<'ai'> {
  const task = createTask({ name: 'Ask', schedule: '@once', type: 'ai', prompt });
  if (task.type !== 'ai') throw new Error('expected an ai task');
  return task;
}

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('AiExecutor', () => {
  it('returns the completion text', async () => {
    const complete = vi.fn(async (prompt: string) => `echo: ${prompt}`);
    const client: CompletionClient = { model: 'test-model', complete };

    const result = await new AiExecutor(client).execute(aiTask('Summarize the day'));

    expect(complete).toHaveBeenCalledWith('Summarize the day');
    expect(result).toEqual({ status: 'success', data: 'echo: Summarize the day' });
  });

  it('reports a provider failure', async () => {
    const client: CompletionClient = {
      model: 'test-model',
      complete: async () => {
        throw new Error('rate limited');
      },
    };
    const result = await new AiExecutor(client).execute(aiTask('Hello'));
    expect(result).toEqual({ status: 'error', error: 'AI completion failed: rate limited' });
  });
});

describe('OpenAICompletionClient', () => {
  it('defaults the model', () => {
    expect(new OpenAICompletionClient().model).toBe('gpt-4o-mini');
    expect(new OpenAICompletionClient({ model: 'gpt-4o' }).model).toBe('gpt-4o');
  });

  it('refuses to run without an API key', async () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    const client = new OpenAICompletionClient();
    await expect(client.complete('Hello')).rejects.toBeInstanceOf(ExecutorFault);
  });

  it('surfaces the missing key as a failed run', async () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    const result = await new AiExecutor(new OpenAICompletionClient()).execute(aiTask('Hello'));
    expect(result).toEqual({
      status: 'error',
      error: 'AI completion failed: AI executor is not configured. Set executors.ai.apiKey or OPENAI_API_KEY',
    });
  });
});
