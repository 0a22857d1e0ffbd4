import { Command } from 'commander';
import { CadenceError } from '@cadence/shared';
import { ONE_SHOT_SCHEDULE, TASK_TYPES, serializeTask } from '@cadence/scheduler';
import { createRuntime, type Runtime } from '../lib/runtime.js';
import { collect, toTaskInput, type TaskAddOptions } from '../lib/task-options.js';
import { colors, formatExecutionLine, formatTaskLine } from '../ui/terminal.js';

type GlobalOptions = {
  config?: string;
  db?: string;
};

async function withRuntime(command: Command, fn: (runtime: Runtime) => Promise<void>): Promise<void> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  let runtime: Runtime | null = null;
  try {
    runtime = createRuntime({ configPath: globals.config, dbPath: globals.db });
    await fn(runtime);
  } catch (err) {
    if (err instanceof CadenceError) {
      console.error(colors.error(`\n  ${err.name}: ${err.message}\n`));
      process.exitCode = 1;
      return;
    }
    throw err;
  } finally {
    await runtime?.close();
  }
}

export const taskCommand = new Command('task')
  .description('Manage scheduled tasks');

// ── task add ────────────────────────────────────────────────────────

taskCommand
  .command('add <name>')
  .description('Register a new task')
  .requiredOption('-s, --schedule <expr>', `Cron expression or ${ONE_SHOT_SCHEDULE}`)
  .option('-t, --type <type>', `Task type (${TASK_TYPES.join(', ')})`, 'shell_command')
  .option('-d, --description <text>', 'Description')
  .option('--command <command>', 'Shell command (shell_command)')
  .option('--api-url <url>', 'Request URL (api_call)')
  .option('--api-method <method>', 'HTTP method (api_call)')
  .option('--header <header>', 'Request header "Name: value" (api_call, repeatable)', collect)
  .option('--body <json>', 'JSON request body (api_call)')
  .option('--prompt <text>', 'Prompt (ai)')
  .option('--tool <tool>', 'Tool name or URL (tool_call)')
  .option('--method <method>', 'Tool method (tool_call)')
  .option('--params <json>', 'JSON params (tool_call)')
  .option('--title <text>', 'Reminder title (reminder)')
  .option('--message <text>', 'Reminder message (reminder)')
  .option('--recurring', 'Keep firing on every schedule occurrence')
  .option('--disabled', 'Create the task disabled')
  .action(async (name: string, opts: TaskAddOptions, command: Command) => {
    await withRuntime(command, async ({ scheduler }) => {
      const task = await scheduler.addTask(toTaskInput(name, opts));
      console.log();
      console.log(`  ${colors.success('Task created')}`);
      console.log(formatTaskLine(task));
      console.log();
    });
  });

// ── task list ───────────────────────────────────────────────────────

taskCommand
  .command('list')
  .description('List all tasks')
  .action(async (_opts: unknown, command: Command) => {
    await withRuntime(command, async ({ scheduler }) => {
      const tasks = await scheduler.getAllTasks();
      console.log();
      if (tasks.length === 0) {
        console.log(colors.secondary('  No tasks registered.'));
        console.log();
        return;
      }
      console.log(`  ${colors.white('Tasks')}`);
      console.log(`  ${colors.dim('-----')}`);
      for (const task of tasks) {
        console.log(formatTaskLine(task));
        console.log();
      }
    });
  });

// ── task show ───────────────────────────────────────────────────────

taskCommand
  .command('show <id>')
  .description('Print a task as JSON')
  .action(async (id: string, _opts: unknown, command: Command) => {
    await withRuntime(command, async ({ scheduler }) => {
      const task = await scheduler.getTask(id);
      if (!task) {
        console.log(colors.secondary(`\n  Task ${id} not found.\n`));
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(serializeTask(task), null, 2));
    });
  });

// ── task enable / disable / remove ──────────────────────────────────

taskCommand
  .command('enable <id>')
  .description('Enable a task')
  .action(async (id: string, _opts: unknown, command: Command) => {
    await withRuntime(command, async ({ scheduler }) => {
      await scheduler.enableTask(id);
      console.log(colors.success(`\n  Enabled task ${id}.\n`));
    });
  });

taskCommand
  .command('disable <id>')
  .description('Disable a task')
  .action(async (id: string, _opts: unknown, command: Command) => {
    await withRuntime(command, async ({ scheduler }) => {
      await scheduler.disableTask(id);
      console.log(colors.success(`\n  Disabled task ${id}.\n`));
    });
  });

taskCommand
  .command('remove <id>')
  .description('Delete a task')
  .action(async (id: string, _opts: unknown, command: Command) => {
    await withRuntime(command, async ({ scheduler }) => {
      const removed = await scheduler.deleteTask(id);
      console.log(removed ? colors.success(`\n  Removed task ${id}.\n`) : colors.secondary(`\n  Task ${id} not found.\n`));
    });
  });

// ── task run ────────────────────────────────────────────────────────

taskCommand
  .command('run <id>')
  .description('Run a task now, ignoring its schedule')
  .action(async (id: string, _opts: unknown, command: Command) => {
    await withRuntime(command, async ({ scheduler }) => {
      const execution = await scheduler.runTaskNow(id);
      console.log();
      console.log(formatExecutionLine(execution));
      console.log();
      if (execution.status !== 'success') process.exitCode = 1;
    });
  });

// ── task history ────────────────────────────────────────────────────

taskCommand
  .command('history <id>')
  .description('Show recent executions of a task')
  .option('-n, --limit <count>', 'Number of executions', '10')
  .action(async (id: string, opts: { limit: string }, command: Command) => {
    await withRuntime(command, async ({ scheduler }) => {
      const limit = Number.parseInt(opts.limit, 10);
      const executions = await scheduler.getExecutions(id, Number.isFinite(limit) && limit > 0 ? limit : 10);
      console.log();
      if (executions.length === 0) {
        console.log(colors.secondary(`  No executions recorded for ${id}.`));
      }
      for (const execution of executions) {
        console.log(formatExecutionLine(execution));
      }
      console.log();
    });
  });
