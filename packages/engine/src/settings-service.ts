// =============================================================================
// Scheduler Settings
// =============================================================================
// Resolves SchedulerSettings from built-in defaults, an optional YAML config
// file, and RELAYQ_* environment overrides (in that order of precedence).

import { readFileSync } from 'fs';
import YAML from 'yaml';
import {
  DEFAULT_BACKOFF_SETTINGS,
  DEFAULT_SCHEDULER_SETTINGS,
  TASK_PRIORITY_MAX,
  TASK_PRIORITY_MIN,
  type BackoffSettings,
  type SchedulerSettings,
} from '@relayq/shared';
import { getDefaultConfigPath, getDefaultQueueDir, resolveTildePath } from './relayq-home.js';
import { resolveQueueDir } from './queue-storage.js';
import { logger as defaultLogger, type LoggerLike } from './logger.js';

export const CONFIG_PATH_ENV_VAR = 'RELAYQ_CONFIG';

type FieldResult<T> = { ok: true; value: T } | { ok: false; error: string };

export interface SchedulerSettingsPatch extends Partial<Omit<SchedulerSettings, 'backoff'>> {
  backoff?: Partial<BackoffSettings>;
}

export interface NormalizedSettingsPayload {
  value: SchedulerSettingsPatch;
  errors: string[];
}

function hasOwn(obj: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function parseInteger(value: unknown, fieldName: string, min: number, max: number): FieldResult<number> {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    return { ok: false, error: `${fieldName} must be an integer between ${min} and ${max}` };
  }

  return { ok: true, value };
}

function parsePositiveNumber(value: unknown, fieldName: string): FieldResult<number> {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return { ok: false, error: `${fieldName} must be a positive number` };
  }

  return { ok: true, value };
}

function parseBoolean(value: unknown, fieldName: string): FieldResult<boolean> {
  if (typeof value !== 'boolean') {
    return { ok: false, error: `${fieldName} must be a boolean` };
  }

  return { ok: true, value };
}

function parseNonEmptyString(value: unknown, fieldName: string): FieldResult<string> {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return { ok: false, error: `${fieldName} must be a non-empty string` };
  }

  return { ok: true, value };
}

const ONE_WEEK_SECONDS = 7 * 24 * 60 * 60;

type TopLevelField = Exclude<keyof SchedulerSettings, 'backoff'>;

const TOP_LEVEL_PARSERS: { [K in TopLevelField]: (value: unknown, field: string) => FieldResult<SchedulerSettings[K]> } = {
  queueDir: parseNonEmptyString,
  defaultTimeoutSeconds: (value, field) => parseInteger(value, field, 1, ONE_WEEK_SECONDS),
  maxRetries: (value, field) => parseInteger(value, field, 0, 100),
  retryDelaySeconds: (value, field) => parseInteger(value, field, 0, ONE_WEEK_SECONDS),
  maxRetryDelaySeconds: (value, field) => parseInteger(value, field, 0, ONE_WEEK_SECONDS),
  defaultPriority: (value, field) => parseInteger(value, field, TASK_PRIORITY_MIN, TASK_PRIORITY_MAX),
  completionPattern: parseNonEmptyString,
  pollIntervalSeconds: parsePositiveNumber,
  cycleDelaySeconds: (value, field) => parseInteger(value, field, 0, 86_400),
  idleDelaySeconds: (value, field) => parseInteger(value, field, 1, 86_400),
  clearContextBetweenTasks: parseBoolean,
  clearContextCommand: parseNonEmptyString,
  autoPauseOnPermanentFailure: parseBoolean,
  backupRetentionDays: (value, field) => parseInteger(value, field, 1, 3650),
  completedTaskRetentionDays: (value, field) => parseInteger(value, field, 1, 3650),
  writeRetries: (value, field) => parseInteger(value, field, 0, 20),
  leaseTtlSeconds: (value, field) => parseInteger(value, field, 5, 86_400),
};

const BACKOFF_PARSERS: { [K in keyof BackoffSettings]: (value: unknown, field: string) => FieldResult<BackoffSettings[K]> } = {
  cooldownSeconds: (value, field) => parseInteger(value, field, 1, ONE_WEEK_SECONDS),
  factor: (value, field) => {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 1) {
      return { ok: false, error: `${field} must be a number >= 1` };
    }
    return { ok: true, value };
  },
  maxWaitSeconds: (value, field) => parseInteger(value, field, 1, ONE_WEEK_SECONDS),
  minWaitSeconds: (value, field) => parseInteger(value, field, 0, ONE_WEEK_SECONDS),
  minTimedWaitSeconds: (value, field) => parseInteger(value, field, 0, ONE_WEEK_SECONDS),
};

function isTopLevelField(key: string): key is TopLevelField {
  return hasOwn(TOP_LEVEL_PARSERS, key);
}

function isBackoffField(key: string): key is keyof BackoffSettings {
  return hasOwn(BACKOFF_PARSERS, key);
}

function assignField<T extends object, K extends keyof T>(target: T, key: K, value: T[K]): void {
  target[key] = value;
}

/**
 * Validate a raw settings payload (parsed YAML or JSON). Invalid fields are
 * dropped and reported with their dotted path; valid fields are kept.
 */
export function normalizeSchedulerSettingsPayload(raw: unknown): NormalizedSettingsPayload {
  const errors: string[] = [];
  const value: SchedulerSettingsPatch = {};

  if (raw === null || raw === undefined) {
    return { value, errors };
  }

  if (!isRecord(raw)) {
    return { value, errors: ['settings must be an object'] };
  }

  for (const [key, rawValue] of Object.entries(raw)) {
    if (key === 'backoff') continue;
    if (!isTopLevelField(key)) {
      errors.push(`${key} is not a recognised setting`);
      continue;
    }

    const result = TOP_LEVEL_PARSERS[key](rawValue, key);
    if (result.ok) {
      assignField<SchedulerSettingsPatch, TopLevelField>(value, key, result.value);
    } else {
      errors.push(result.error);
    }
  }

  if (hasOwn(raw, 'backoff')) {
    const rawBackoff = raw.backoff;
    if (!isRecord(rawBackoff)) {
      errors.push('backoff must be an object');
    } else {
      const backoff: Partial<BackoffSettings> = {};
      for (const [key, rawValue] of Object.entries(rawBackoff)) {
        if (!isBackoffField(key)) {
          errors.push(`backoff.${key} is not a recognised setting`);
          continue;
        }

        const result = BACKOFF_PARSERS[key](rawValue, `backoff.${key}`);
        if (result.ok) {
          backoff[key] = result.value;
        } else {
          errors.push(result.error);
        }
      }
      value.backoff = backoff;
    }
  }

  return { value, errors };
}

function readPositiveIntEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const rawValue = env[name];
  if (!rawValue) {
    return undefined;
  }

  const parsed = Number(rawValue);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return undefined;
  }

  return Math.floor(parsed);
}

function readBooleanEnv(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === '1' || raw === 'true') return true;
  if (raw === '0' || raw === 'false') return false;
  return undefined;
}

/** Collect RELAYQ_* environment overrides as a raw payload for normalization. */
export function readEnvironmentOverrides(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const backoff: Record<string, unknown> = {};

  const setIfDefined = (target: Record<string, unknown>, key: string, value: unknown): void => {
    if (value !== undefined) target[key] = value;
  };

  setIfDefined(overrides, 'queueDir', env.RELAYQ_QUEUE_DIR?.trim() || undefined);
  setIfDefined(overrides, 'defaultTimeoutSeconds', readPositiveIntEnv(env, 'RELAYQ_DEFAULT_TIMEOUT'));
  setIfDefined(overrides, 'maxRetries', readPositiveIntEnv(env, 'RELAYQ_MAX_RETRIES'));
  setIfDefined(overrides, 'retryDelaySeconds', readPositiveIntEnv(env, 'RELAYQ_RETRY_DELAY'));
  setIfDefined(overrides, 'completionPattern', env.RELAYQ_COMPLETION_PATTERN || undefined);
  setIfDefined(overrides, 'pollIntervalSeconds', readPositiveIntEnv(env, 'RELAYQ_POLL_INTERVAL'));
  setIfDefined(overrides, 'cycleDelaySeconds', readPositiveIntEnv(env, 'RELAYQ_CYCLE_DELAY'));
  setIfDefined(overrides, 'clearContextBetweenTasks', readBooleanEnv(env, 'RELAYQ_CLEAR_CONTEXT'));
  setIfDefined(overrides, 'autoPauseOnPermanentFailure', readBooleanEnv(env, 'RELAYQ_AUTO_PAUSE_ON_FAILURE'));
  setIfDefined(overrides, 'backupRetentionDays', readPositiveIntEnv(env, 'RELAYQ_BACKUP_RETENTION_DAYS'));

  setIfDefined(backoff, 'cooldownSeconds', readPositiveIntEnv(env, 'RELAYQ_USAGE_LIMIT_COOLDOWN'));
  setIfDefined(backoff, 'maxWaitSeconds', readPositiveIntEnv(env, 'RELAYQ_MAX_WAIT_TIME'));
  const factor = env.RELAYQ_BACKOFF_FACTOR ? Number(env.RELAYQ_BACKOFF_FACTOR) : undefined;
  setIfDefined(backoff, 'factor', factor !== undefined && Number.isFinite(factor) ? factor : undefined);

  if (Object.keys(backoff).length > 0) {
    overrides.backoff = backoff;
  }

  return overrides;
}

export function resolveSchedulerSettings(
  ...patches: Array<SchedulerSettingsPatch | null | undefined>
): SchedulerSettings {
  let resolved: SchedulerSettings = {
    ...DEFAULT_SCHEDULER_SETTINGS,
    queueDir: getDefaultQueueDir(),
    backoff: { ...DEFAULT_BACKOFF_SETTINGS },
  };

  for (const patch of patches) {
    if (!patch) continue;
    const { backoff, ...rest } = patch;
    resolved = {
      ...resolved,
      ...rest,
      backoff: { ...resolved.backoff, ...(backoff ?? {}) },
    };
  }

  if (resolved.maxRetryDelaySeconds < resolved.retryDelaySeconds) {
    resolved.maxRetryDelaySeconds = resolved.retryDelaySeconds;
  }

  resolved.queueDir = resolveQueueDir(resolved.queueDir);
  return resolved;
}

export function resolveConfigPath(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): string {
  const candidate = explicitPath?.trim() || env[CONFIG_PATH_ENV_VAR]?.trim();
  return candidate ? resolveTildePath(candidate) : getDefaultConfigPath(env);
}

export function readSettingsFile(configPath: string): unknown {
  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }

  return YAML.parse(content);
}

export interface LoadSchedulerSettingsOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: SchedulerSettingsPatch;
  logger?: LoggerLike;
}

/**
 * Load settings for a scheduler or CLI invocation. A missing config file is not
 * an error; an unreadable one, or invalid fields, are logged and the defaults kept.
 */
export function loadSchedulerSettings(options: LoadSchedulerSettingsOptions = {}): SchedulerSettings {
  const log = options.logger ?? defaultLogger;
  const env = options.env ?? process.env;
  const configPath = resolveConfigPath(options.configPath, env);

  let fileRaw: unknown = null;
  try {
    fileRaw = readSettingsFile(configPath);
  } catch (err) {
    log.warn('[Settings] Failed to read config file; using defaults', {
      configPath,
      error: err instanceof Error ? err.message : String(err),
    });
  }

  const fromFile = normalizeSchedulerSettingsPayload(fileRaw);
  for (const error of fromFile.errors) {
    log.warn(`[Settings] Ignoring invalid config value: ${error}`, { configPath });
  }

  const fromEnv = normalizeSchedulerSettingsPayload(readEnvironmentOverrides(env));
  for (const error of fromEnv.errors) {
    log.warn(`[Settings] Ignoring invalid environment override: ${error}`);
  }

  return resolveSchedulerSettings(fromFile.value, fromEnv.value, options.overrides);
}
