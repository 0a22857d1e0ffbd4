export { ShellExecutor, isCommandAllowed, runCommand } from './shell.js';
export type { CommandOutcome, RunCommandOptions } from './shell.js';
export { ApiCallExecutor } from './api-call.js';
export { AiExecutor, OpenAICompletionClient, type CompletionClient } from './ai.js';
export { ReminderExecutor, LogNotifier, type Notifier, type Reminder } from './reminder.js';
export { ToolCallExecutor, HttpToolClient, type ToolClient } from './tool-call.js';
export { createExecutors, type ExecutorDependencies } from './registry.js';
