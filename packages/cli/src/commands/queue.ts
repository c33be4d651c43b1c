// =============================================================================
// Queue Commands
// =============================================================================

import chalk from 'chalk';
import * as clack from '@clack/prompts';
import {
  TASK_PRIORITY_MAX,
  TASK_PRIORITY_MIN,
  TASK_STATUSES,
  TASK_TYPES,
  isTaskStatus,
  isTaskType,
  type ConfigureTaskRequest,
  type CreateTaskRequest,
} from '@relayq/shared';
import type { TaskListFilter } from '@relayq/engine';
import { getQueueService } from '../context.js';
import { createError, parseBooleanOption, parseIntegerOption } from '../utils/error-handler.js';
import { printQueueStatus, printTaskDetail, printTasks } from '../utils/format.js';

export interface AddOptions {
  type?: string;
  description?: string;
  priority?: string;
  timeout?: string;
  maxRetries?: string;
  reference?: string;
  clearContext?: string;
}

/** Turn `relayq add` arguments into a create request. */
export function parseAddOptions(command: string | undefined, options: AddOptions): CreateTaskRequest {
  const type = options.type ?? 'custom';
  if (!isTaskType(type)) {
    throw createError(`--type must be one of: ${TASK_TYPES.join(', ')}`);
  }

  const request: CreateTaskRequest = { type };
  if (command !== undefined) request.command = command;
  if (options.description !== undefined) request.description = options.description;
  if (options.reference !== undefined) request.reference = options.reference;

  // Reference tasks can take the number as the positional argument: `relayq add 42 --type issue_reference`.
  if (type !== 'custom' && request.reference === undefined && command !== undefined) {
    request.reference = command;
    delete request.command;
  }

  const priority = parseIntegerOption(options.priority, '--priority', TASK_PRIORITY_MIN, TASK_PRIORITY_MAX);
  if (priority !== undefined) request.priority = priority;
  const timeout = parseIntegerOption(options.timeout, '--timeout', 1);
  if (timeout !== undefined) request.timeoutSeconds = timeout;
  const maxRetries = parseIntegerOption(options.maxRetries, '--max-retries', 0);
  if (maxRetries !== undefined) request.maxRetries = maxRetries;
  const clearContext = parseBooleanOption(options.clearContext, '--clear-context');
  if (clearContext !== undefined) request.clearContext = clearContext;

  return request;
}

export interface ConfigureOptions {
  priority?: string;
  timeout?: string;
  maxRetries?: string;
}

export function parseConfigureOptions(options: ConfigureOptions): ConfigureTaskRequest {
  const request: ConfigureTaskRequest = {};
  const priority = parseIntegerOption(options.priority, '--priority', TASK_PRIORITY_MIN, TASK_PRIORITY_MAX);
  if (priority !== undefined) request.priority = priority;
  const timeout = parseIntegerOption(options.timeout, '--timeout', 1);
  if (timeout !== undefined) request.timeoutSeconds = timeout;
  const maxRetries = parseIntegerOption(options.maxRetries, '--max-retries', 0);
  if (maxRetries !== undefined) request.maxRetries = maxRetries;
  return request;
}

export function parseListOptions(options: { status?: string; type?: string }): TaskListFilter {
  const filter: TaskListFilter = {};
  if (options.status !== undefined) {
    if (!isTaskStatus(options.status)) {
      throw createError(`--status must be one of: ${TASK_STATUSES.join(', ')}`);
    }
    filter.status = options.status;
  }
  if (options.type !== undefined) {
    if (!isTaskType(options.type)) {
      throw createError(`--type must be one of: ${TASK_TYPES.join(', ')}`);
    }
    filter.type = options.type;
  }
  return filter;
}

// ============================================================================
// Task Add / List / Show
// ============================================================================
export async function queueAdd(command: string | undefined, options: AddOptions): Promise<void> {
  const task = await getQueueService().addTask(parseAddOptions(command, options));
  console.log(chalk.green(`✓ Added task ${task.id} (priority ${task.priority})`));
}

export async function queueList(options: { status?: string; type?: string; json?: boolean }): Promise<void> {
  const tasks = await getQueueService().listTasks(parseListOptions(options));
  if (options.json) {
    console.log(JSON.stringify(tasks, null, 2));
    return;
  }
  printTasks(tasks);
}

export async function queueShow(taskId: string, options: { json?: boolean }): Promise<void> {
  const task = await getQueueService().showTask(taskId);
  if (options.json) {
    console.log(JSON.stringify(task, null, 2));
    return;
  }
  printTaskDetail(task);
}

export async function queueStatus(options: { json?: boolean }): Promise<void> {
  const status = await getQueueService().getQueueStatus();
  if (options.json) {
    console.log(JSON.stringify(status, null, 2));
    return;
  }
  printQueueStatus(status);
}

// ============================================================================
// Pause / Resume / Clear
// ============================================================================
export async function queuePause(reason: string | undefined): Promise<void> {
  const document = await getQueueService().pauseQueue(reason);
  console.log(chalk.yellow(`⏸ Queue paused (${document.pauseReason ?? 'manual'})`));
}

export async function queueResume(): Promise<void> {
  await getQueueService().resumeQueue();
  console.log(chalk.green('▶ Queue resumed'));
}

export async function queueClear(options: { yes?: boolean }): Promise<void> {
  if (!options.yes) {
    const confirmed = await clack.confirm({
      message: 'Remove every task from the queue? A backup is taken first.',
    });

    if (clack.isCancel(confirmed) || !confirmed) {
      console.log(chalk.gray('Cancelled'));
      return;
    }
  }

  const removed = await getQueueService().clearQueue();
  console.log(chalk.green(`✓ Removed ${removed} task(s)`));
}

// ============================================================================
// Retry / Skip / Configure
// ============================================================================
export async function queueRetry(taskId: string): Promise<void> {
  const task = await getQueueService().retryTask(taskId);
  console.log(chalk.green(`✓ Task ${task.id} is pending again`));
}

export async function queueSkip(taskId: string): Promise<void> {
  const task = await getQueueService().skipTask(taskId);
  console.log(chalk.yellow(`⏭ Task ${task.id} skipped`));
}

export async function queueConfigure(taskId: string, options: ConfigureOptions): Promise<void> {
  const task = await getQueueService().configureTask(taskId, parseConfigureOptions(options));
  console.log(chalk.green(`✓ Updated task ${task.id}`));
  printTaskDetail(task);
}
