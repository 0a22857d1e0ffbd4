import pino from 'pino';

const loggers = new Set<pino.Logger>();

export function createLogger(name: string, level: string = process.env['CADENCE_LOG_LEVEL'] ?? 'info'): pino.Logger {
  const instance = pino({
    name,
    level,
    transport: process.env['NODE_ENV'] !== 'production'
      ? { target: 'pino/file', options: { destination: 1 } }
      : undefined,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  loggers.add(instance);
  return instance;
}

/** Applies `level` to every logger created so far. */
export function setLogLevel(level: string): void {
  for (const instance of loggers) {
    instance.level = level;
  }
}

export const logger = createLogger('cadence');

export type Logger = pino.Logger;
