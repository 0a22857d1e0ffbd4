import { createLogger, errorMessage } from '@cadence/shared';
import type { ReminderExecutorConfig } from '@cadence/shared';
import type { ExecutorResult, TaskExecutor, TaskOf } from '@cadence/scheduler';

const log = createLogger('executors:reminder');

export type Reminder = {
  taskId: string;
  title: string;
  message: string;
};

export interface Notifier {
  notify(reminder: Reminder): Promise<void>;
}

/** Delivers reminders to the process log. */
export class LogNotifier implements Notifier {
  async notify(reminder: Reminder): Promise<void> {
    log.info({ taskId: reminder.taskId, title: reminder.title }, reminder.message);
  }
}

export class ReminderExecutor implements TaskExecutor<'reminder'> {
  private notifier: Notifier;
  private defaultTitle: string;

  constructor(notifier: Notifier = new LogNotifier(), config: Partial<ReminderExecutorConfig> = {}) {
    this.notifier = notifier;
    this.defaultTitle = config.defaultTitle ?? 'Reminder';
  }

  async execute(task: TaskOf<'reminder'>): Promise<ExecutorResult> {
    const reminder: Reminder = {
      taskId: task.id,
      title: task.reminderTitle ?? this.defaultTitle,
      message: task.reminderMessage,
    };

    try {
      await this.notifier.notify(reminder);
      return { status: 'success', data: { title: reminder.title, message: reminder.message } };
    } catch (err) {
      return { status: 'error', error: `Reminder delivery failed: ${errorMessage(err)}` };
    }
  }
}
