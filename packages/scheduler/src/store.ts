import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { CadenceError, StorageError, createLogger, errorMessage, resolveHomePath } from '@cadence/shared';
import { deserializeExecution, serializeExecution } from './execution.js';
import { deserializeTask, serializeTask } from './task.js';
import type { Execution, ExecutionRecord, Task, TaskRecord } from './types.js';

const log = createLogger('scheduler:store');

/**
 * Given the stored task, returns the task to write back, or null to leave
 * the row untouched.
 */
export type TaskMutation = (current: Task) => Task | null;

/**
 * Durable home of tasks and executions, and the only copy of task state:
 * several schedulers may share one store. Loads return fresh objects.
 */
export interface TaskStore {
  /** Inserts the task, or replaces the row with the same id. */
  saveTask(task: Task): Promise<void>;
  loadTask(id: string): Promise<Task | null>;
  loadAllTasks(): Promise<Task[]>;
  /** Enabled, pending tasks whose nextRun is at or before `now`. */
  loadDueTasks(now: Date): Promise<Task[]>;
  /**
   * Reads the task, applies `mutate` and writes the result, atomically with
   * respect to every other writer. Never creates a row: resolves to null when
   * the task does not exist or `mutate` declined, otherwise to the written task.
   */
  mutateTask(id: string, mutate: TaskMutation): Promise<Task | null>;
  deleteTask(id: string): Promise<boolean>;
  saveExecution(execution: Execution): Promise<void>;
  /** Newest first. */
  loadExecutions(taskId: string, limit?: number): Promise<Execution[]>;
  close(): Promise<void>;
}

interface TaskRow {
  id: string;
  name: string;
  description: string | null;
  schedule: string;
  type: string;
  command: string | null;
  api_url: string | null;
  api_method: string | null;
  api_headers: string | null;
  api_body: string | null;
  prompt: string | null;
  tool: string | null;
  method: string | null;
  params: string | null;
  reminder_title: string | null;
  reminder_message: string | null;
  enabled: number;
  do_only_once: number;
  last_run: string | null;
  next_run: string | null;
  status: string;
  created_at: string;
  updated_at: string;
}

interface ExecutionRow {
  id: string;
  task_id: string;
  start_time: string;
  end_time: string | null;
  status: string;
  output: string | null;
  error: string | null;
}

function jsonOrNull(value: unknown): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value);
}

function parseJsonColumn(value: string | null): unknown {
  return value === null ? null : JSON.parse(value);
}

function toTaskRow(record: TaskRecord): TaskRow {
  return {
    ...record,
    api_headers: jsonOrNull(record.api_headers),
    api_body: jsonOrNull(record.api_body),
    params: jsonOrNull(record.params),
    enabled: record.enabled ? 1 : 0,
    do_only_once: record.do_only_once ? 1 : 0,
  };
}

function fromTaskRow(row: TaskRow): Task {
  return deserializeTask({
    ...row,
    api_headers: parseJsonColumn(row.api_headers),
    api_body: parseJsonColumn(row.api_body),
    params: parseJsonColumn(row.params),
    enabled: row.enabled === 1,
    do_only_once: row.do_only_once === 1,
  });
}

export class SqliteTaskStore implements TaskStore {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:') {
    const resolved = resolveHomePath(dbPath);
    if (resolved !== ':memory:') {
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
    }
    this.db = new Database(resolved);
    if (resolved !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.init();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        description TEXT,
        schedule TEXT NOT NULL,
        type TEXT NOT NULL,
        command TEXT,
        api_url TEXT,
        api_method TEXT,
        api_headers TEXT,
        api_body TEXT,
        prompt TEXT,
        tool TEXT,
        method TEXT,
        params TEXT,
        reminder_title TEXT,
        reminder_message TEXT,
        enabled INTEGER NOT NULL DEFAULT 1,
        do_only_once INTEGER NOT NULL DEFAULT 1,
        last_run TEXT,
        next_run TEXT,
        status TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS executions (
        id TEXT PRIMARY KEY,
        task_id TEXT NOT NULL,
        start_time TEXT NOT NULL,
        end_time TEXT,
        status TEXT NOT NULL,
        output TEXT,
        error TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_executions_task ON executions(task_id, start_time);
    `);
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof CadenceError) throw err;
      log.error({ operation, err: errorMessage(err) }, 'Storage operation failed');
      throw new StorageError(`${operation} failed: ${errorMessage(err)}`, { operation });
    }
  }

  private writeTask(task: Task, mode: 'upsert' | 'update'): number {
    const row = toTaskRow(serializeTask(task));
    if (mode === 'upsert') {
      return this.db.prepare<TaskRow>(`
        INSERT OR REPLACE INTO tasks (
          id, name, description, schedule, type, command, api_url, api_method, api_headers, api_body,
          prompt, tool, method, params, reminder_title, reminder_message, enabled, do_only_once,
          last_run, next_run, status, created_at, updated_at
        ) VALUES (
          @id, @name, @description, @schedule, @type, @command, @api_url, @api_method, @api_headers, @api_body,
          @prompt, @tool, @method, @params, @reminder_title, @reminder_message, @enabled, @do_only_once,
          @last_run, @next_run, @status, @created_at, @updated_at
        )
      `).run(row).changes;
    }
    return this.db.prepare<TaskRow>(`
      UPDATE tasks SET
        name = @name, description = @description, schedule = @schedule, type = @type,
        command = @command, api_url = @api_url, api_method = @api_method, api_headers = @api_headers,
        api_body = @api_body, prompt = @prompt, tool = @tool, method = @method, params = @params,
        reminder_title = @reminder_title, reminder_message = @reminder_message, enabled = @enabled,
        do_only_once = @do_only_once, last_run = @last_run, next_run = @next_run, status = @status,
        created_at = @created_at, updated_at = @updated_at
      WHERE id = @id
    `).run(row).changes;
  }

  private readTask(id: string): Task | null {
    const row = this.db.prepare<[string], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(id);
    return row ? fromTaskRow(row) : null;
  }

  async saveTask(task: Task): Promise<void> {
    this.guard('saveTask', () => {
      this.writeTask(task, 'upsert');
    });
  }

  async loadTask(id: string): Promise<Task | null> {
    return this.guard('loadTask', () => this.readTask(id));
  }

  async loadAllTasks(): Promise<Task[]> {
    return this.guard('loadAllTasks', () => {
      const rows = this.db.prepare<[], TaskRow>('SELECT * FROM tasks ORDER BY created_at, rowid').all();
      return rows.map(fromTaskRow);
    });
  }

  async loadDueTasks(now: Date): Promise<Task[]> {
    return this.guard('loadDueTasks', () => {
      const rows = this.db.prepare<[string], TaskRow>(`
        SELECT * FROM tasks
        WHERE enabled = 1 AND status = 'pending' AND next_run IS NOT NULL AND next_run <= ?
        ORDER BY next_run, rowid
      `).all(now.toISOString());
      return rows.map(fromTaskRow);
    });
  }

  async mutateTask(id: string, mutate: TaskMutation): Promise<Task | null> {
    // IMMEDIATE takes the write lock before the read, so no other connection
    // can change the row between the two.
    const transaction = this.db.transaction((): Task | null => {
      const current = this.readTask(id);
      if (!current) return null;
      const next = mutate(current);
      if (!next) return null;
      if (next.id !== id) {
        throw new StorageError(`mutateTask for ${id} returned task ${next.id}`, { operation: 'mutateTask' });
      }
      this.writeTask(next, 'update');
      return next;
    });
    return this.guard('mutateTask', () => transaction.immediate());
  }

  async deleteTask(id: string): Promise<boolean> {
    return this.guard('deleteTask', () => {
      const result = this.db.prepare('DELETE FROM tasks WHERE id = ?').run(id);
      return result.changes > 0;
    });
  }

  async saveExecution(execution: Execution): Promise<void> {
    const record = serializeExecution(execution);
    this.guard('saveExecution', () => {
      this.db.prepare<ExecutionRecord>(`
        INSERT OR REPLACE INTO executions (id, task_id, start_time, end_time, status, output, error)
        VALUES (@id, @task_id, @start_time, @end_time, @status, @output, @error)
      `).run(record);
    });
  }

  async loadExecutions(taskId: string, limit?: number): Promise<Execution[]> {
    return this.guard('loadExecutions', () => {
      const rows = this.db.prepare<[string, number], ExecutionRow>(
        'SELECT * FROM executions WHERE task_id = ? ORDER BY start_time DESC, rowid DESC LIMIT ?',
      ).all(taskId, limit ?? -1);
      return rows.map(row => deserializeExecution(row));
    });
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}
