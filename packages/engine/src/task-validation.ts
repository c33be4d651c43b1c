import {
  TASK_PRIORITY_MAX,
  TASK_PRIORITY_MIN,
  TASK_TYPES,
  isTaskType,
  type ConfigureTaskRequest,
  type CreateTaskRequest,
} from '@relayq/shared';

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; field: string; error: string };

function fail<T>(field: string, error: string): ValidationResult<T> {
  return { ok: false, field, error };
}

function checkPriority(value: number | undefined): string | null {
  if (value === undefined) return null;
  if (!Number.isInteger(value) || value < TASK_PRIORITY_MIN || value > TASK_PRIORITY_MAX) {
    return `priority must be an integer between ${TASK_PRIORITY_MIN} and ${TASK_PRIORITY_MAX}`;
  }
  return null;
}

function checkTimeout(value: number | undefined): string | null {
  if (value === undefined) return null;
  return Number.isInteger(value) && value > 0 ? null : 'timeout must be a positive whole number of seconds';
}

function checkMaxRetries(value: number | undefined): string | null {
  if (value === undefined) return null;
  return Number.isInteger(value) && value >= 0 ? null : 'maxRetries must be a non-negative integer';
}

const REFERENCE_PATTERN = /^#?\d+$/;

export function validateCreateTaskRequest(input: CreateTaskRequest): ValidationResult<CreateTaskRequest> {
  const type = input.type ?? 'custom';
  if (!isTaskType(type)) {
    return fail('type', `type must be one of: ${TASK_TYPES.join(', ')}`);
  }

  const command = input.command?.trim() ?? '';
  const reference = input.reference?.trim() ?? '';

  if (type === 'custom' && !command) {
    return fail('command', 'custom tasks need a command');
  }

  if (type !== 'custom' && !REFERENCE_PATTERN.test(reference)) {
    return fail('reference', `${type} tasks need a numeric reference such as 123 or #123`);
  }

  const priorityError = checkPriority(input.priority);
  if (priorityError) return fail('priority', priorityError);

  const timeoutError = checkTimeout(input.timeoutSeconds);
  if (timeoutError) return fail('timeoutSeconds', timeoutError);

  const retriesError = checkMaxRetries(input.maxRetries);
  if (retriesError) return fail('maxRetries', retriesError);

  const value: CreateTaskRequest = { ...input, type, command };
  if (type !== 'custom') {
    value.reference = reference.replace(/^#/, '');
  } else {
    delete value.reference;
  }
  if (input.description !== undefined) {
    value.description = input.description.trim();
  }

  return { ok: true, value };
}

export function validateConfigureTaskRequest(input: ConfigureTaskRequest): ValidationResult<ConfigureTaskRequest> {
  if (input.priority === undefined && input.timeoutSeconds === undefined && input.maxRetries === undefined) {
    return fail('request', 'nothing to configure: pass a priority, timeout or maxRetries');
  }

  const priorityError = checkPriority(input.priority);
  if (priorityError) return fail('priority', priorityError);

  const timeoutError = checkTimeout(input.timeoutSeconds);
  if (timeoutError) return fail('timeoutSeconds', timeoutError);

  const retriesError = checkMaxRetries(input.maxRetries);
  if (retriesError) return fail('maxRetries', retriesError);

  return { ok: true, value: { ...input } };
}
