import { homedir } from 'os';
import { join } from 'path';

export const RELAYQ_HOME_ENV_VAR = 'RELAYQ_HOME';
export const LOG_PATH_ENV_VAR = 'RELAYQ_LOG_PATH';

export function resolveTildePath(rawPath: string): string {
  if (rawPath === '~') {
    return homedir();
  }

  if (rawPath.startsWith('~/')) {
    return join(homedir(), rawPath.slice(2));
  }

  return rawPath;
}

function resolveHomeDirPath(env: NodeJS.ProcessEnv): string {
  const override = env[RELAYQ_HOME_ENV_VAR]?.trim();
  if (override) {
    return resolveTildePath(override);
  }

  return join(homedir(), '.relayq');
}

export function getDefaultQueueDir(env: NodeJS.ProcessEnv = process.env): string {
  return join(resolveHomeDirPath(env), 'queue');
}

export function getDefaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(resolveHomeDirPath(env), 'config.yaml');
}

/** Engine log file: `RELAYQ_LOG_PATH` when set, else `logs/engine.jsonl` under the relayq home. */
export function resolveLogPath(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env[LOG_PATH_ENV_VAR]?.trim();
  if (configured) {
    return resolveTildePath(configured);
  }

  return join(resolveHomeDirPath(env), 'logs', 'engine.jsonl');
}
