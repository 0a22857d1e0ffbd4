import type { CadenceConfig } from '@cadence/shared';
import type { ExecutorRegistry } from '@cadence/scheduler';
import { AiExecutor, OpenAICompletionClient, type CompletionClient } from './ai.js';
import { ApiCallExecutor } from './api-call.js';
import { LogNotifier, ReminderExecutor, type Notifier } from './reminder.js';
import { ShellExecutor } from './shell.js';
import { HttpToolClient, ToolCallExecutor, type ToolClient } from './tool-call.js';

export type ExecutorDependencies = {
  completionClient?: CompletionClient;
  notifier?: Notifier;
  toolClient?: ToolClient;
};

/**
 * Builds one executor per task type. Collaborators not supplied are
 * constructed from config, once, here.
 */
export function createExecutors(
  config: CadenceConfig['executors'],
  deps: ExecutorDependencies = {},
): ExecutorRegistry {
  const completionClient = deps.completionClient ?? new OpenAICompletionClient(config.ai);
  const notifier = deps.notifier ?? new LogNotifier();
  const toolClient = deps.toolClient ?? new HttpToolClient(config.toolCall);

  return {
    shell_command: new ShellExecutor(config.shell),
    api_call: new ApiCallExecutor(config.api),
    ai: new AiExecutor(completionClient),
    reminder: new ReminderExecutor(notifier, config.reminder),
    tool_call: new ToolCallExecutor(toolClient),
  };
}
