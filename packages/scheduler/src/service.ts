import {
  CadenceError,
  ScheduleParseError,
  TaskDisabledError,
  TaskNotFoundError,
  createLogger,
  errorMessage,
} from '@cadence/shared';
import type { ExecutorDispatcher } from './dispatcher.js';
import { nextOccurrence } from './schedule.js';
import type { TaskStore } from './store.js';
import { createTask, updateTask as applyTaskPatch } from './task.js';
import type { Execution, Task, TaskInput, TaskPatch, TaskStatus } from './types.js';

const log = createLogger('scheduler:service');

export const DEFAULT_TICK_INTERVAL_MS = 5_000;
export const DEFAULT_BUSY_POLL_INTERVAL_MS = 1_000;

export type SchedulerOptions = {
  store: TaskStore;
  dispatcher: ExecutorDispatcher;
  tickIntervalMs?: number;
  /** How often runTaskNow re-checks a task another process is running. */
  busyPollIntervalMs?: number;
  timezone?: string;
  now?: () => Date;
};

export function isDue(task: Task, now: Date): boolean {
  return task.enabled
    && task.status === 'pending'
    && task.nextRun !== null
    && task.nextRun.getTime() <= now.getTime();
}

function isTerminal(status: TaskStatus): boolean {
  return status === 'completed' || status === 'failed';
}

/**
 * Runs the periodic tick, dispatches due and requested tasks, and writes
 * every state transition through the store.
 *
 * The store holds the only copy of task state, so schedulers in separate
 * processes can share it. A task is claimed by a compare-and-set to
 * `running` in the store; whoever loses the claim does not dispatch. The
 * scheduler itself only remembers which of its own runs are in flight.
 */
export class Scheduler {
  private store: TaskStore;
  private dispatcher: ExecutorDispatcher;
  private tickIntervalMs: number;
  private busyPollIntervalMs: number;
  private timezone?: string;
  private now: () => Date;

  private inFlight = new Map<string, Promise<void>>();
  private activeTick: Promise<void> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private stopped = false;
  private halted: Promise<void>;
  private releaseWaiters: () => void = () => undefined;

  constructor(opts: SchedulerOptions) {
    this.store = opts.store;
    this.dispatcher = opts.dispatcher;
    this.tickIntervalMs = opts.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.busyPollIntervalMs = opts.busyPollIntervalMs ?? DEFAULT_BUSY_POLL_INTERVAL_MS;
    this.timezone = opts.timezone;
    this.now = opts.now ?? (() => new Date());
    this.halted = this.createHaltSignal();
  }

  // ── Lifecycle ──────────────────────────────────────────────────────

  /**
   * Resets tasks a crashed process left `running`, then starts ticking.
   * Only the process that owns the tick does this; one-off callers such as
   * the CLI never start.
   */
  async start(): Promise<void> {
    if (this.timer) return;

    if (this.stopped) {
      this.stopped = false;
      this.halted = this.createHaltSignal();
    }

    await this.recoverInterrupted();

    this.timer = setInterval(() => {
      this.runTick();
    }, this.tickIntervalMs);

    log.info({ tickIntervalMs: this.tickIntervalMs }, 'Scheduler started');
  }

  /**
   * Halts the tick and releases callers waiting to run a busy task. Runs
   * already dispatched keep going; use idle() to wait for them.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (!this.stopped) {
      this.stopped = true;
      this.releaseWaiters();
      log.info({ inFlight: this.inFlight.size }, 'Scheduler stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** Resolves once the current tick and every run it started have been recorded. */
  async idle(): Promise<void> {
    while (this.activeTick || this.inFlight.size > 0) {
      if (this.activeTick) await this.activeTick;
      await Promise.all([...this.inFlight.values()]);
    }
  }

  // ── Task CRUD ──────────────────────────────────────────────────────

  async addTask(input: TaskInput): Promise<Task> {
    const now = this.now();
    const created = createTask(input, now, { timezone: this.timezone });
    const task: Task = {
      ...created,
      nextRun: nextOccurrence(created.schedule, now, false, { timezone: this.timezone }),
    };

    await this.store.saveTask(task);
    log.info({ taskId: task.id, type: task.type, schedule: task.schedule, nextRun: task.nextRun }, 'Task added');
    return task;
  }

  /**
   * Applies a patch. A new schedule recomputes nextRun. A finished task
   * whose schedule changes, or that becomes recurring, is scheduled again.
   */
  async updateTask(id: string, patch: TaskPatch): Promise<Task> {
    const now = this.now();
    const updated = await this.store.mutateTask(id, (current) => {
      const next = applyTaskPatch(current, patch, now, { timezone: this.timezone });
      if (current.status === 'running') return next;

      const scheduleChanged = next.schedule !== current.schedule;
      const revived = isTerminal(current.status)
        && (scheduleChanged || (current.doOnlyOnce && !next.doOnlyOnce));
      if (!scheduleChanged && !revived) return next;

      const nextRun = nextOccurrence(next.schedule, now, false, { timezone: this.timezone });
      if (!revived) return { ...next, nextRun };
      return { ...next, nextRun, status: next.enabled ? 'pending' : 'disabled' };
    });

    if (!updated) throw new TaskNotFoundError(id);
    log.info({ taskId: id, status: updated.status }, 'Task updated');
    return updated;
  }

  async getTask(id: string): Promise<Task | null> {
    return this.store.loadTask(id);
  }

  async getAllTasks(): Promise<Task[]> {
    return this.store.loadAllTasks();
  }

  async enableTask(id: string): Promise<Task> {
    return this.setEnabled(id, true);
  }

  /** Does not cancel a run already in flight; that run lands in `disabled`. */
  async disableTask(id: string): Promise<Task> {
    return this.setEnabled(id, false);
  }

  /**
   * Removes the task. A run in flight finishes and its execution is kept,
   * but the task row is not written back.
   */
  async deleteTask(id: string): Promise<boolean> {
    const removed = await this.store.deleteTask(id);
    if (removed) {
      log.info({ taskId: id, inFlight: this.inFlight.has(id) }, 'Task deleted');
    }
    return removed;
  }

  async getExecutions(taskId: string, limit?: number): Promise<Execution[]> {
    return this.store.loadExecutions(taskId, limit);
  }

  // ── Dispatch ───────────────────────────────────────────────────────

  /**
   * Dispatches the task immediately, regardless of nextRun. If the task is
   * already running, here or in another process, waits for that run to
   * close first.
   */
  async runTaskNow(id: string): Promise<Execution> {
    for (;;) {
      if (this.stopped) {
        throw new CadenceError('Scheduler is stopped', 'SCHEDULER_STOPPED', { taskId: id });
      }

      const claimed = await this.claim(id, task => task.enabled && task.status !== 'running');
      if (claimed) {
        log.info({ taskId: id }, 'Running task on demand');
        return this.launch(claimed);
      }

      const task = await this.store.loadTask(id);
      if (!task) throw new TaskNotFoundError(id);
      if (!task.enabled) throw new TaskDisabledError(id);
      if (task.status !== 'running') continue;

      log.debug({ taskId: id }, 'Task busy, waiting for the in-flight run');
      await Promise.race([this.inFlight.get(id) ?? this.pause(this.busyPollIntervalMs), this.halted]);
    }
  }

  /**
   * One scan of the store. Claims every due task and dispatches each
   * independently; returns the ids that were dispatched.
   */
  async tick(now: Date = this.now()): Promise<string[]> {
    if (this.stopped) return [];

    const dispatched: string[] = [];
    for (const due of await this.store.loadDueTasks(now)) {
      if (this.stopped) break;
      if (this.inFlight.has(due.id)) continue;

      const claimed = await this.claim(due.id, task => isDue(task, now));
      if (!claimed) continue;

      dispatched.push(claimed.id);
      void this.launch(claimed).catch((err: unknown) => {
        log.error({ taskId: claimed.id, err: errorMessage(err) }, 'Scheduled run could not be recorded');
      });
    }

    if (dispatched.length > 0) {
      log.debug({ count: dispatched.length }, 'Tick dispatched tasks');
    }
    return dispatched;
  }

  // ── Internals ──────────────────────────────────────────────────────

  private runTick(): void {
    if (this.activeTick) return;
    this.activeTick = this.tick().then(
      () => {
        this.activeTick = null;
      },
      (err: unknown) => {
        this.activeTick = null;
        log.error({ err: errorMessage(err) }, 'Tick failed');
      },
    );
  }

  private createHaltSignal(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.releaseWaiters = resolve;
    });
  }

  private pause(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      setTimeout(resolve, ms);
    });
  }

  private async recoverInterrupted(): Promise<void> {
    const now = this.now();
    for (const task of await this.store.loadAllTasks()) {
      if (task.status !== 'running' || this.inFlight.has(task.id)) continue;
      // The interrupted occurrence is lost; the task goes back to waiting.
      const recovered = await this.store.mutateTask(task.id, current => (current.status === 'running'
        ? { ...current, status: current.enabled ? 'pending' : 'disabled', updatedAt: now }
        : null));
      if (recovered) {
        log.warn({ taskId: task.id }, 'Recovered task left running by a previous process');
      }
    }
  }

  private async setEnabled(id: string, enabled: boolean): Promise<Task> {
    const now = this.now();
    const updated = await this.store.mutateTask(id, (current) => {
      if (current.enabled === enabled) return current;

      let status: TaskStatus = current.status;
      if (!enabled && current.status === 'pending') status = 'disabled';
      if (enabled && current.status === 'disabled') status = 'pending';
      return { ...current, enabled, status, updatedAt: now };
    });

    if (!updated) throw new TaskNotFoundError(id);
    log.info({ taskId: id, enabled }, enabled ? 'Task enabled' : 'Task disabled');
    return updated;
  }

  /** Compare-and-set to `running`; null when the task is gone or `claimable` says no. */
  private claim(id: string, claimable: (task: Task) => boolean): Promise<Task | null> {
    const now = this.now();
    return this.store.mutateTask(id, current => (claimable(current)
      ? { ...current, status: 'running', updatedAt: now }
      : null));
  }

  /** Starts the run of a task this scheduler has just claimed. */
  private launch(claimed: Task): Promise<Execution> {
    const run = this.execute(claimed);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.inFlight.set(claimed.id, settled);
    void settled.then(() => {
      if (this.inFlight.get(claimed.id) === settled) {
        this.inFlight.delete(claimed.id);
      }
    });
    return run;
  }

  private async execute(claimed: Task): Promise<Execution> {
    const execution = await this.dispatcher.dispatch(claimed);
    const finishedAt = this.now();

    try {
      await this.store.saveExecution(execution);
    } finally {
      // Settled against the stored row, so a delete or disable that landed
      // during the run is kept.
      const settled = await this.store.mutateTask(claimed.id, current => this.settle(current, execution, finishedAt));
      if (!settled) {
        log.info({ taskId: claimed.id, executionId: execution.id }, 'Task deleted while running; not rescheduling');
      }
    }
    return execution;
  }

  /** Post-run bookkeeping: timing, terminal status or the next occurrence. */
  private settle(task: Task, execution: Execution, finishedAt: Date): Task {
    const succeeded = execution.status === 'success';
    const terminal: TaskStatus = succeeded ? 'completed' : 'failed';
    const base: Task = { ...task, lastRun: finishedAt, updatedAt: finishedAt };

    if (task.doOnlyOnce) {
      return { ...base, status: terminal };
    }

    let nextRun: Date | null;
    try {
      nextRun = nextOccurrence(task.schedule, finishedAt, true, { timezone: this.timezone });
    } catch (err) {
      if (!(err instanceof ScheduleParseError)) throw err;
      log.error({ taskId: task.id, schedule: task.schedule, err: err.message }, 'Cannot reschedule task');
      return { ...base, status: 'failed' };
    }

    if (nextRun === null) {
      return { ...base, status: terminal };
    }

    return { ...base, nextRun, status: task.enabled ? 'pending' : 'disabled' };
  }
}
