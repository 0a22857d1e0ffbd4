import chalk from 'chalk';
import type { Execution, Task } from '@cadence/scheduler';

// ── Color Palette ──────────────────────────────────────────────────────
export const colors = {
  primary: chalk.hex('#3B82F6'),
  secondary: chalk.hex('#F59E0B'),
  success: chalk.hex('#2ECC71'),
  dim: chalk.hex('#666666'),
  white: chalk.hex('#FFFFFF'),
  error: chalk.hex('#E74C3C'),
};

// ── Formatting ─────────────────────────────────────────────────────────

function formatTime(value: Date | null): string {
  return value ? value.toISOString() : '-';
}

function statusColor(status: string): (text: string) => string {
  switch (status) {
    case 'completed':
    case 'success':
      return colors.success;
    case 'failed':
      return colors.error;
    case 'running':
      return colors.secondary;
    case 'disabled':
      return colors.dim;
    default:
      return colors.primary;
  }
}

export function formatTaskLine(task: Task): string {
  const marker = task.enabled ? colors.success('●') : colors.dim('○');
  const mode = task.doOnlyOnce ? 'once' : 'recurring';
  return [
    `  ${marker} ${colors.white(task.name)} ${colors.dim(`(${task.id})`)}`,
    `    ${task.type} | ${task.schedule} | ${mode} | ${statusColor(task.status)(task.status)}`,
    `    Last run: ${formatTime(task.lastRun)} | Next run: ${formatTime(task.nextRun)}`,
  ].join('\n');
}

export function formatExecutionLine(execution: Execution): string {
  const status = statusColor(execution.status)(execution.status.padEnd(7));
  const detail = execution.error ?? execution.output ?? '';
  const firstLine = detail.split('\n')[0] ?? '';
  return `  ${status} ${colors.dim(execution.id)} ${formatTime(execution.startTime)} -> ${formatTime(execution.endTime)}${firstLine ? `\n    ${firstLine}` : ''}`;
}
