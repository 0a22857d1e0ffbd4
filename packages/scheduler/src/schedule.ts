import { Cron } from 'croner';
import { ScheduleParseError } from '@cadence/shared';
import { ONE_SHOT_SCHEDULE } from './types.js';

export type ScheduleOptions = {
  /** IANA zone the cron fields are read in. Defaults to the process zone. */
  timezone?: string;
};

function resolveCronTimezone(tz?: string): string {
  const trimmed = typeof tz === 'string' ? tz.trim() : '';
  if (trimmed) return trimmed;
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

export function isOneShot(expr: string): boolean {
  return expr.trim() === ONE_SHOT_SCHEDULE;
}

function parseCron(expr: string, timezone?: string): Cron {
  const trimmed = expr.trim();
  if (!trimmed) {
    throw new ScheduleParseError('Schedule expression is empty', expr);
  }
  try {
    return new Cron(trimmed, { timezone: resolveCronTimezone(timezone) });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ScheduleParseError(`Invalid schedule expression "${trimmed}": ${reason}`, expr);
  }
}

/**
 * Throws ScheduleParseError unless `expr` is the one-shot marker or a
 * cron expression croner accepts.
 */
export function validateSchedule(expr: string, options: ScheduleOptions = {}): void {
  if (isOneShot(expr)) return;
  parseCron(expr, options.timezone);
}

/**
 * Earliest firing time for `expr` after `after`.
 *
 * One-shot: `after` itself until the task has fired, then null.
 * Cron: the first matching instant strictly greater than `after`.
 */
export function nextOccurrence(
  expr: string,
  after: Date,
  alreadyFired: boolean,
  options: ScheduleOptions = {},
): Date | null {
  if (isOneShot(expr)) {
    return alreadyFired ? null : new Date(after.getTime());
  }

  const cron = parseCron(expr, options.timezone);
  const afterMs = after.getTime();

  let cursor = afterMs;
  for (let attempt = 0; attempt < 3; attempt++) {
    const next = cron.nextRun(new Date(cursor));
    if (!next) return null;
    const nextMs = next.getTime();
    if (Number.isFinite(nextMs) && nextMs > afterMs) return next;
    cursor += 1_000;
  }
  return null;
}
