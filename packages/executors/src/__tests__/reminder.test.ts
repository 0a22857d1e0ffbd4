import { describe, it, expect } from 'vitest';
import { createTask, type TaskOf } from '@cadence/scheduler';
import { LogNotifier, ReminderExecutor, type Notifier, type Reminder } from '../reminder.js';

function reminderTask(message: string, title?: string): TaskOf<'reminder'> {
  const task = createTask({
    name: 'Remind', schedule: '@once', type: 'reminder', reminderMessage: message, reminderTitle: title,
  });
  if (task.type !== 'reminder') throw new Error('expected a reminder task');
  return task;
}

class RecordingNotifier implements Notifier {
  delivered: Reminder[] = [];

  async notify(reminder: Reminder): Promise<void> {
    this.delivered.push(reminder);
  }
}

describe('ReminderExecutor', () => {
  it('delivers the reminder with its title', async () => {
    const notifier = new RecordingNotifier();
    const task = reminderTask('Stand up and stretch', 'Break');

    const result = await new ReminderExecutor(notifier).execute(task);

    expect(notifier.delivered).toEqual([{ taskId: task.id, title: 'Break', message: 'Stand up and stretch' }]);
    expect(result).toEqual({ status: 'success', data: { title: 'Break', message: 'Stand up and stretch' } });
  });

  it('falls back to the configured default title', async () => {
    const notifier = new RecordingNotifier();
    await new ReminderExecutor(notifier, { defaultTitle: 'Heads up' }).execute(reminderTask('Water the plants'));
    expect(notifier.delivered[0]?.title).toBe('Heads up');
  });

  it('reports a delivery failure', async () => {
    const notifier: Notifier = {
      notify: async () => {
        throw new Error('offline');
      },
    };
    const result = await new ReminderExecutor(notifier).execute(reminderTask('Ping'));
    expect(result).toEqual({ status: 'error', error: 'Reminder delivery failed: offline' });
  });

  it('logs by default', async () => {
    const result = await new ReminderExecutor().execute(reminderTask('Ping'));
    expect(result).toEqual({ status: 'success', data: { title: 'Reminder', message: 'Ping' } });
    await expect(new LogNotifier().notify({ taskId: 't', title: 'T', message: 'M' })).resolves.toBeUndefined();
  });
});
