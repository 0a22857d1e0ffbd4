import { Command } from 'commander';
import { createLogger } from '@cadence/shared';
import { createRuntime } from '../lib/runtime.js';
import { colors } from '../ui/terminal.js';

const log = createLogger('cli:start');

type StartOptions = {
  config?: string;
  db?: string;
};

export const startCommand = new Command('start')
  .description('Run the scheduler in the foreground')
  .action(async (_opts: unknown, command: Command) => {
    const globals = command.optsWithGlobals<StartOptions>();
    const runtime = createRuntime({ configPath: globals.config, dbPath: globals.db });
    await runtime.scheduler.start();

    const tasks = await runtime.scheduler.getAllTasks();
    console.log();
    console.log(`  ${colors.primary('Cadence')} ${colors.white('scheduler running')}`);
    console.log(`  ${colors.dim(`${tasks.length} task(s), tick every ${runtime.config.scheduler.tickIntervalMs}ms. Ctrl+C to stop.`)}`);
    console.log();

    let shuttingDown = false;
    const shutdown = (signal: string): void => {
      if (shuttingDown) return;
      shuttingDown = true;
      log.info({ signal }, 'Shutting down');
      runtime.close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log.error({ err: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
          process.exit(1);
        });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  });
