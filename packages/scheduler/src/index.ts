export * from './types.js';
export {
  createTask,
  updateTask,
  toTaskInput,
  serializeTask,
  deserializeTask,
  taskRecordSchema,
  generateTaskId,
  isTaskType,
  REQUIRED_FIELDS,
} from './task.js';
export {
  openExecution,
  closeSuccess,
  closeFailure,
  isClosed,
  serializeExecution,
  deserializeExecution,
  executionRecordSchema,
  generateExecutionId,
} from './execution.js';
export { nextOccurrence, validateSchedule, isOneShot, type ScheduleOptions } from './schedule.js';
export { ExecutorDispatcher, type DispatcherOptions } from './dispatcher.js';
export { SqliteTaskStore, type TaskStore, type TaskMutation } from './store.js';
export {
  Scheduler,
  isDue,
  DEFAULT_TICK_INTERVAL_MS,
  DEFAULT_BUSY_POLL_INTERVAL_MS,
  type SchedulerOptions,
} from './service.js';
