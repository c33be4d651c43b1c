// =============================================================================
// Engine Errors
// =============================================================================

import type { TaskStatus } from '@relayq/shared';

export type RelayqErrorCode =
  | 'TASK_NOT_FOUND'
  | 'PERSISTENCE_FAILED'
  | 'DETECTION_AMBIGUOUS'
  | 'TASK_TIMEOUT'
  | 'PERMANENT_FAILURE'
  | 'STATUS_CONFLICT'
  | 'EXECUTION_BUSY'
  | 'INVALID_INPUT';

export class RelayqError extends Error {
  readonly code: RelayqErrorCode;

  constructor(code: RelayqErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends RelayqError {
  readonly taskId: string;

  constructor(taskId: string) {
    super('TASK_NOT_FOUND', `Task not found: ${taskId}`);
    this.taskId = taskId;
  }
}

export type PersistenceOperation = 'read' | 'write' | 'backup' | 'restore' | 'delete';

export class PersistenceError extends RelayqError {
  readonly operation: PersistenceOperation;
  readonly path: string;

  constructor(operation: PersistenceOperation, path: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : cause === undefined ? '' : String(cause);
    super('PERSISTENCE_FAILED', `Queue ${operation} failed for ${path}${detail ? `: ${detail}` : ''}`, { cause });
    this.operation = operation;
    this.path = path;
  }
}

/** Unavailability text matched but no usable resume time could be extracted. */
export class DetectionAmbiguousError extends RelayqError {
  readonly matchedText: string;

  constructor(matchedText: string, reason: string) {
    super('DETECTION_AMBIGUOUS', `Could not derive a resume time from "${matchedText}": ${reason}`);
    this.matchedText = matchedText;
  }
}

export class TaskTimeoutError extends RelayqError {
  readonly taskId: string;
  readonly timeoutSeconds: number;

  constructor(taskId: string, timeoutSeconds: number) {
    super('TASK_TIMEOUT', `Task ${taskId} did not complete within ${timeoutSeconds}s`);
    this.taskId = taskId;
    this.timeoutSeconds = timeoutSeconds;
  }
}

export class PermanentFailureError extends RelayqError {
  readonly taskId: string;
  readonly retryCount: number;

  constructor(taskId: string, retryCount: number, reason: string) {
    super('PERMANENT_FAILURE', `Task ${taskId} failed permanently after ${retryCount} retries: ${reason}`);
    this.taskId = taskId;
    this.retryCount = retryCount;
  }
}

export class StatusConflictError extends RelayqError {
  readonly taskId: string;
  readonly expected: TaskStatus | TaskStatus[];
  readonly actual: TaskStatus;

  constructor(taskId: string, expected: TaskStatus | TaskStatus[], actual: TaskStatus) {
    const expectedText = Array.isArray(expected) ? expected.join('|') : expected;
    super('STATUS_CONFLICT', `Task ${taskId} is ${actual}, expected ${expectedText}`);
    this.taskId = taskId;
    this.expected = expected;
    this.actual = actual;
  }
}

/** A claim was refused because another task is still being executed. */
export class ExecutionBusyError extends RelayqError {
  readonly taskId: string;
  readonly runningTaskId: string;

  constructor(taskId: string, runningTaskId: string) {
    super('EXECUTION_BUSY', `Cannot start ${taskId}: ${runningTaskId} is already in progress`);
    this.taskId = taskId;
    this.runningTaskId = runningTaskId;
  }
}

export class ValidationError extends RelayqError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('INVALID_INPUT', message);
    this.field = field;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
