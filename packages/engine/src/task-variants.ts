import type { Task, TaskType } from '@relayq/shared';
import { ValidationError, errorMessage } from './errors.js';
import type { ExecutionSession } from './execution-session.js';

export interface TaskVariantHandler {
  /** The command line sent to the session for this task. */
  renderCommand(task: Task): string;
  describe(task: Task): string;
}

export type ExecuteTaskResult =
  | { ok: true; command: string }
  | { ok: false; command: string; error: string };

function requireReference(task: Task): string {
  const reference = task.reference?.replace(/^#/, '').trim();
  if (!reference) {
    throw new ValidationError('reference', `Task ${task.id} (${task.type}) has no reference number`);
  }
  return reference;
}

export const TASK_VARIANT_HANDLERS: Record<TaskType, TaskVariantHandler> = {
  custom: {
    renderCommand(task) {
      if (!task.command.trim()) {
        throw new ValidationError('command', `Task ${task.id} has an empty command`);
      }
      return task.command;
    },
    describe(task) {
      return task.description || task.command;
    },
  },
  issue_reference: {
    renderCommand(task) {
      return `/dev ${requireReference(task)}`;
    },
    describe(task) {
      return task.description || `Issue #${task.reference ?? '?'}`;
    },
  },
  pr_reference: {
    renderCommand(task) {
      return `/review ${requireReference(task)}`;
    },
    describe(task) {
      return task.description || `Pull request #${task.reference ?? '?'}`;
    },
  },
};

/**
 * Marker the agent is asked to print when the task is done: the configured
 * completion pattern tagged with the task id, so output left over from an
 * earlier task never completes this one.
 */
export function completionMarkerFor(completionPattern: string, taskId: string): string {
  if (completionPattern.length > 3 && completionPattern.endsWith('###')) {
    return `${completionPattern.slice(0, -3)}:${taskId}###`;
  }
  return `${completionPattern}:${taskId}`;
}

/**
 * The line sent to the session. With a marker, an instruction to print it is
 * appended on the same line; a newline would submit the command early.
 */
export function renderTaskCommand(task: Task, completionMarker?: string): string {
  const command = TASK_VARIANT_HANDLERS[task.type].renderCommand(task);
  if (!completionMarker) {
    return command;
  }
  return `${command} (When this task is complete, output exactly: ${completionMarker})`;
}

export function describeTask(task: Task): string {
  return TASK_VARIANT_HANDLERS[task.type].describe(task);
}

/** Send the task's command to the session. Never throws; failures come back as a result. */
export async function executeTask(
  session: ExecutionSession,
  task: Task,
  completionMarker?: string,
): Promise<ExecuteTaskResult> {
  let command = '';
  try {
    command = renderTaskCommand(task, completionMarker);
    await session.send(command);
    return { ok: true, command };
  } catch (err) {
    return { ok: false, command, error: errorMessage(err) };
  }
}
