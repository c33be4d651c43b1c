import type { TaskStatus } from '@relayq/shared';
import { logger as defaultLogger, type LoggerLike } from './logger.js';

export interface TaskStatusTransition {
  kind: 'status-transition';
  taskId: string;
  source: string;
  reason?: string;
  from: TaskStatus;
  to: TaskStatus;
}

export interface LogTaskStatusTransitionOptions {
  taskId: string;
  from: TaskStatus;
  to: TaskStatus;
  source: string;
  reason?: string;
  logger?: LoggerLike;
}

/**
 * Emit a structured log entry for a task status change. No-op transitions are
 * skipped. The message stays compact; the details ride along as entry data.
 */
export function logTaskStatusTransition(options: LogTaskStatusTransitionOptions): TaskStatusTransition | null {
  const { taskId, from, to, source, reason } = options;
  if (from === to) {
    return null;
  }

  const transition: TaskStatusTransition = { kind: 'status-transition', taskId, source, from, to };
  if (reason) {
    transition.reason = reason;
  }

  (options.logger ?? defaultLogger).info(`[Transition] ${taskId}: ${from} -> ${to}`, transition);
  return transition;
}
