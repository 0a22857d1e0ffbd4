// ── Enumerations ────────────────────────────────────────────────────

export const TASK_TYPES = ['shell_command', 'api_call', 'ai', 'reminder', 'tool_call'] as const;
export type TaskType = (typeof TASK_TYPES)[number];

export const TASK_STATUSES = ['pending', 'running', 'completed', 'failed', 'disabled'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const EXECUTION_STATUSES = ['running', 'success', 'failed'] as const;
export type ExecutionStatus = (typeof EXECUTION_STATUSES)[number];

/** Schedule token meaning "fire once, as soon as eligible, then never again". */
export const ONE_SHOT_SCHEDULE = '@once';

// ── Payloads ────────────────────────────────────────────────────────

export type ShellCommandPayload = {
  type: 'shell_command';
  command: string;
};

export type ApiCallPayload = {
  type: 'api_call';
  apiUrl: string;
  apiMethod: string;
  apiHeaders: Record<string, string> | null;
  apiBody: Record<string, unknown> | null;
};

export type AiPayload = {
  type: 'ai';
  prompt: string;
};

export type ReminderPayload = {
  type: 'reminder';
  reminderMessage: string;
  reminderTitle: string | null;
};

export type ToolCallPayload = {
  type: 'tool_call';
  tool: string;
  method: string;
  params: Record<string, unknown>;
};

export type TaskPayload =
  | ShellCommandPayload
  | ApiCallPayload
  | AiPayload
  | ReminderPayload
  | ToolCallPayload;

// ── Task ────────────────────────────────────────────────────────────

export type TaskState = {
  id: string;
  name: string;
  description: string | null;
  schedule: string;
  enabled: boolean;
  doOnlyOnce: boolean;
  lastRun: Date | null;
  nextRun: Date | null;
  status: TaskStatus;
  createdAt: Date;
  updatedAt: Date;
};

export type Task = TaskState & TaskPayload;

export type TaskOf<T extends TaskType> = Extract<Task, { type: T }>;

/**
 * Loose construction input. Which payload fields are required depends on
 * `type` and is checked when the task is built.
 */
export type TaskInput = {
  name: string;
  schedule: string;
  type?: TaskType;
  description?: string | null;
  enabled?: boolean;
  doOnlyOnce?: boolean;

  command?: string | null;

  apiUrl?: string | null;
  apiMethod?: string | null;
  apiHeaders?: Record<string, string> | null;
  apiBody?: Record<string, unknown> | null;

  prompt?: string | null;

  reminderMessage?: string | null;
  reminderTitle?: string | null;

  tool?: string | null;
  method?: string | null;
  params?: Record<string, unknown> | null;
};

export type TaskPatch = Partial<Omit<TaskInput, 'type' | 'enabled'>>;

/** Plain structured form of a task: snake_case keys, string tags, ISO timestamps. */
export type TaskRecord = {
  id: string;
  name: string;
  description: string | null;
  schedule: string;
  type: TaskType;
  command: string | null;
  api_url: string | null;
  api_method: string | null;
  api_headers: Record<string, string> | null;
  api_body: Record<string, unknown> | null;
  prompt: string | null;
  tool: string | null;
  method: string | null;
  params: Record<string, unknown> | null;
  reminder_title: string | null;
  reminder_message: string | null;
  enabled: boolean;
  do_only_once: boolean;
  last_run: string | null;
  next_run: string | null;
  status: TaskStatus;
  created_at: string;
  updated_at: string;
};

// ── Execution ───────────────────────────────────────────────────────

export type Execution = {
  readonly id: string;
  readonly taskId: string;
  readonly startTime: Date;
  readonly endTime: Date | null;
  readonly status: ExecutionStatus;
  readonly output: string | null;
  readonly error: string | null;
};

export type ExecutionRecord = {
  id: string;
  task_id: string;
  start_time: string;
  end_time: string | null;
  status: ExecutionStatus;
  output: string | null;
  error: string | null;
};

// ── Executors ───────────────────────────────────────────────────────

export type ExecutorResult =
  | { status: 'success'; data?: unknown }
  | { status: 'error'; error: string };

export interface TaskExecutor<T extends TaskType = TaskType> {
  execute(task: TaskOf<T>): Promise<ExecutorResult>;
}

/** Closed mapping from task type to the executor that carries it out. */
export type ExecutorRegistry = {
  [K in TaskType]?: TaskExecutor<K>;
};
