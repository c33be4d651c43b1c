// =============================================================================
// Output Formatting Utilities
// =============================================================================

import chalk from 'chalk';
import Table from 'cli-table3';
import {
  TASK_STATUSES,
  TASK_STATUS_DISPLAY_NAMES,
  type BackoffState,
  type BackoffStatistics,
  type BackupInfo,
  type CleanupReport,
  type CycleOutcome,
  type QueueStatus,
  type Task,
  type TaskStatus,
} from '@relayq/shared';
import { describeTask } from '@relayq/engine';

export function formatDate(isoString: string | undefined | null): string {
  if (!isoString) return '-';
  const date = new Date(isoString);
  return date.toLocaleString();
}

export function formatRelativeTime(isoString: string, now: Date = new Date()): string {
  const date = new Date(isoString);
  const diff = now.getTime() - date.getTime();

  const seconds = Math.floor(diff / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (seconds < 60) return 'just now';
  if (minutes < 60) return `${minutes}m ago`;
  if (hours < 24) return `${hours}h ago`;
  if (days < 7) return `${days}d ago`;

  return date.toLocaleDateString();
}

export function formatDuration(seconds: number | undefined): string {
  if (!seconds) return '-';
  const hrs = Math.floor(seconds / 3600);
  const mins = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);
  if (hrs > 0) return `${hrs}h ${mins}m`;
  if (mins > 0) return `${mins}m ${secs}s`;
  return `${secs}s`;
}

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.floor(Math.log(bytes) / Math.log(k));
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`;
}

const STATUS_COLORS: Record<TaskStatus, (s: string) => string> = {
  pending: chalk.blue,
  in_progress: chalk.yellow,
  completed: chalk.green,
  failed: chalk.magenta,
  failed_permanent: chalk.red,
};

export function formatStatus(status: TaskStatus): string {
  return STATUS_COLORS[status](TASK_STATUS_DISPLAY_NAMES[status]);
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

// =============================================================================
// Tasks
// =============================================================================

export function renderTaskTable(tasks: Task[], now: Date = new Date()): string {
  const table = new Table({
    head: [
      chalk.bold('ID'),
      chalk.bold('Type'),
      chalk.bold('Status'),
      chalk.bold('Pri'),
      chalk.bold('Retries'),
      chalk.bold('Description'),
      chalk.bold('Updated'),
    ],
  });

  for (const task of tasks) {
    table.push([
      task.id,
      task.type,
      formatStatus(task.status),
      String(task.priority),
      String(task.retryCount),
      truncate(describeTask(task), 40),
      formatRelativeTime(task.updatedAt, now),
    ]);
  }

  return table.toString();
}

export function printTasks(tasks: Task[]): void {
  if (tasks.length === 0) {
    console.log(chalk.yellow('No tasks found.'));
    return;
  }

  console.log(renderTaskTable(tasks));
}

export function renderTaskDetail(task: Task): string {
  const lines = [
    `${chalk.bold('ID:')}          ${task.id}`,
    `${chalk.bold('Type:')}        ${task.type}`,
    `${chalk.bold('Status:')}      ${formatStatus(task.status)}`,
    `${chalk.bold('Priority:')}    ${task.priority}`,
    `${chalk.bold('Description:')} ${describeTask(task)}`,
  ];

  if (task.command) lines.push(`${chalk.bold('Command:')}     ${task.command}`);
  if (task.reference) lines.push(`${chalk.bold('Reference:')}   #${task.reference}`);
  lines.push(`${chalk.bold('Retries:')}     ${task.retryCount}${task.maxRetries !== undefined ? `/${task.maxRetries}` : ''}`);
  if (task.timeoutSeconds) lines.push(`${chalk.bold('Timeout:')}     ${formatDuration(task.timeoutSeconds)}`);
  if (task.retryAfter) lines.push(`${chalk.bold('Retry after:')} ${formatDate(task.retryAfter)}`);
  if (task.lastError) lines.push(`${chalk.bold('Last error:')}  ${chalk.red(task.lastError)}`);
  lines.push(`${chalk.bold('Created:')}     ${formatDate(task.createdAt)}`);
  lines.push(`${chalk.bold('Updated:')}     ${formatDate(task.updatedAt)}`);
  if (task.startedAt) lines.push(`${chalk.bold('Started:')}     ${formatDate(task.startedAt)}`);
  if (task.completedAt) lines.push(`${chalk.bold('Finished:')}    ${formatDate(task.completedAt)}`);

  return lines.join('\n');
}

export function printTaskDetail(task: Task): void {
  console.log(renderTaskDetail(task));
}

// =============================================================================
// Queue Status
// =============================================================================

const HEALTH_COLORS: Record<QueueStatus['health'], (s: string) => string> = {
  healthy: chalk.green,
  paused: chalk.yellow,
  degraded: chalk.red,
};

export function renderBackoffState(state: BackoffState, now: Date = new Date()): string {
  const remainingSeconds = Math.max(0, Math.ceil((Date.parse(state.estimatedResumeAt) - now.getTime()) / 1000));
  return `${state.detectedPattern} (occurrence ${state.occurrenceCount}), resumes ${formatDate(state.estimatedResumeAt)}`
    + ` (${remainingSeconds > 0 ? `in ${formatDuration(remainingSeconds)}` : 'due now'})`;
}

export function renderQueueStatus(status: QueueStatus, now: Date = new Date()): string {
  const lines = [
    `${chalk.bold('Health:')}  ${HEALTH_COLORS[status.health](status.health)}`,
    `${chalk.bold('Paused:')}  ${status.paused ? chalk.yellow(`yes (${status.pauseReason ?? 'no reason'})`) : 'no'}`,
  ];

  if (status.paused && status.pausedAt) {
    lines.push(`${chalk.bold('Since:')}   ${formatDate(status.pausedAt)}`);
  }
  if (status.backoff) {
    lines.push(`${chalk.bold('Backoff:')} ${renderBackoffState(status.backoff, now)}`);
  }

  lines.push(`${chalk.bold('Current:')} ${status.currentTaskId ?? '-'}`);
  lines.push(`${chalk.bold('Next:')}    ${status.nextTaskId ?? '-'}`);

  const counts = TASK_STATUSES.map((taskStatus) => `${TASK_STATUS_DISPLAY_NAMES[taskStatus]}: ${status.counts[taskStatus]}`);
  lines.push(`${chalk.bold('Tasks:')}   ${status.total} (${counts.join(', ')})`);

  const stats = status.statistics;
  lines.push(
    `${chalk.bold('Totals:')}  processed ${stats.totalProcessed}, completed ${stats.totalCompleted},`
      + ` failed ${stats.totalFailed}, retries ${stats.totalRetries}`,
  );

  return lines.join('\n');
}

export function printQueueStatus(status: QueueStatus): void {
  console.log(renderQueueStatus(status));
}

// =============================================================================
// Maintenance
// =============================================================================

export function printBackups(backups: BackupInfo[]): void {
  if (backups.length === 0) {
    console.log(chalk.yellow('No backups found.'));
    return;
  }

  const table = new Table({
    head: [chalk.bold('Name'), chalk.bold('Created'), chalk.bold('Size')],
  });

  for (const backup of backups) {
    table.push([backup.name, formatDate(backup.createdAt), formatBytes(backup.sizeBytes)]);
  }

  console.log(table.toString());
}

export function renderCleanupReport(report: CleanupReport): string {
  return [
    `Removed ${report.removedCompletedTasks} completed task(s)`,
    `${report.removedBackups} backup(s)`,
    `${report.removedCheckpoints} checkpoint(s)`,
  ].join(', ');
}

export function renderBackoffStatistics(statistics: BackoffStatistics): string {
  const config = statistics.configuration;
  return [
    `${chalk.bold('Active:')}       ${statistics.active ? chalk.yellow('yes') : 'no'}`,
    `${chalk.bold('Occurrences:')}  ${statistics.totalOccurrences} across ${statistics.uniquePatterns} pattern(s)`,
    `${chalk.bold('Last seen:')}    ${formatDate(statistics.lastOccurrenceAt)}`,
    `${chalk.bold('Resume at:')}    ${formatDate(statistics.estimatedResumeAt)}`,
    `${chalk.bold('Config:')}       cooldown ${config.cooldownSeconds}s, factor ${config.factor},`
      + ` max ${config.maxWaitSeconds}s, min ${config.minWaitSeconds}s`,
  ].join('\n');
}

export function describeCycleOutcome(outcome: CycleOutcome): string {
  switch (outcome.kind) {
    case 'paused':
      return `Queue paused (${outcome.reason ?? 'no reason'})${outcome.resumeAt ? `, resumes ${formatDate(outcome.resumeAt)}` : ''}`;
    case 'resumed':
      return 'Usage-limit wait over; queue resumed';
    case 'idle':
      return 'No eligible task';
    case 'completed':
      return `Completed ${outcome.taskId}`;
    case 'rate_limited':
      return `Rate limited on ${outcome.taskId}; waiting ${formatDuration(outcome.waitSeconds)}`;
    case 'failed':
      return outcome.failure.outcome === 'retried'
        ? `Task ${outcome.taskId} failed; retry ${outcome.failure.retryCount} in ${formatDuration(outcome.failure.delaySeconds)}`
        : `Task ${outcome.taskId} failed permanently${outcome.failure.queuePaused ? '; queue paused' : ''}`;
    case 'conflict':
      return `Task ${outcome.taskId} changed underneath the scheduler; skipped this cycle`;
    case 'busy':
      return `Task ${outcome.runningTaskId} is running elsewhere; ${outcome.taskId} waits`;
    case 'stopped':
      return outcome.taskId ? `Stopped while ${outcome.taskId} was running` : 'Stopped';
    case 'error':
      return `Cycle failed: ${outcome.message}`;
  }
}
