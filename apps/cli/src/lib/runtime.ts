import { CONFIG_PATH, loadConfig, setLogLevel } from '@cadence/shared';
import type { CadenceConfig } from '@cadence/shared';
import { ExecutorDispatcher, Scheduler, SqliteTaskStore } from '@cadence/scheduler';
import { createExecutors, type ExecutorDependencies } from '@cadence/executors';

export type RuntimeOptions = {
  configPath?: string;
  /** Overrides `storage.path` from the config file. */
  dbPath?: string;
  deps?: ExecutorDependencies;
};

export type Runtime = {
  config: CadenceConfig;
  store: SqliteTaskStore;
  scheduler: Scheduler;
  close(): Promise<void>;
};

export function createRuntime(opts: RuntimeOptions = {}): Runtime {
  const config = loadConfig(opts.configPath ?? CONFIG_PATH);
  setLogLevel(config.logging.level);

  const store = new SqliteTaskStore(opts.dbPath ?? config.storage.path);
  const dispatcher = new ExecutorDispatcher(createExecutors(config.executors, opts.deps));
  const scheduler = new Scheduler({
    store,
    dispatcher,
    tickIntervalMs: config.scheduler.tickIntervalMs,
    busyPollIntervalMs: config.scheduler.busyPollIntervalMs,
    timezone: config.scheduler.timezone,
  });

  return {
    config,
    store,
    scheduler,
    async close() {
      await scheduler.stop();
      await scheduler.idle();
      await store.close();
    },
  };
}
