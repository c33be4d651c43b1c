// =============================================================================
// Completion Monitor
// =============================================================================
// Polls the execution session until the completion marker shows up, the task's
// deadline passes, or the caller asks to stop. Only output after the echo of the
// dispatched command counts. Other output (including text that looks like an
// error) only gets logged.

import type { CompletionResult, DetectionResult } from '@relayq/shared';
import { errorMessage } from './errors.js';
import { extractNewOutput, outputAfterCommandEcho, type ExecutionSession } from './execution-session.js';
import { logger as defaultLogger, type LoggerLike } from './logger.js';

export interface ProgressNotice {
  taskId: string;
  /** 1 to 9: tenths of the timeout elapsed. */
  decile: number;
  elapsedMs: number;
  timeoutMs: number;
}

export interface CompletionMonitorOptions {
  completionPattern: string;
  pollIntervalMs: number;
  /** Output captured before dispatch; only text after it is inspected. */
  baselineOutput?: string;
  /** Command line that was sent; its echo and anything before it are ignored. */
  dispatchedCommand?: string;
  /** When given, a match ends monitoring early with an `unavailable` result. */
  detectUnavailability?: (output: string) => DetectionResult | null;
  shouldStop?: () => boolean;
  onProgress?: (notice: ProgressNotice) => void;
  onHeartbeat?: (elapsedMs: number) => Promise<void>;
  heartbeatIntervalMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: LoggerLike;
}

const ERROR_LINE_PATTERN = /\b(error|exception|failed)\b/i;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function lastErrorLine(output: string): string | null {
  const lines = output.split('\n');
  for (let index = lines.length - 1; index >= 0; index -= 1) {
    const line = lines[index].trim();
    if (line && ERROR_LINE_PATTERN.test(line)) {
      return line;
    }
  }
  return null;
}

export async function awaitCompletion(
  session: ExecutionSession,
  timeoutSeconds: number,
  taskId: string,
  options: CompletionMonitorOptions,
): Promise<CompletionResult> {
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? defaultSleep;
  const log = options.logger ?? defaultLogger;
  const timeoutMs = timeoutSeconds * 1000;
  const baseline = options.baselineOutput ?? '';

  const startedAt = now();
  let lastDecile = 0;
  let lastHeartbeatAt = startedAt;
  let lastLoggedError: string | null = null;
  let output = '';

  for (;;) {
    const elapsedBeforeRead = now() - startedAt;
    if (options.shouldStop?.()) {
      log.info(`[CompletionMonitor] Stop requested while monitoring ${taskId}`);
      return { status: 'stopped', elapsedMs: elapsedBeforeRead, output };
    }

    try {
      const newOutput = extractNewOutput(await session.readRecentOutput(), baseline);
      output = options.dispatchedCommand ? outputAfterCommandEcho(newOutput, options.dispatchedCommand) : newOutput;
    } catch (err) {
      log.warn(`[CompletionMonitor] Could not read session output for ${taskId}`, { error: errorMessage(err) });
    }

    const elapsedMs = now() - startedAt;

    if (output.includes(options.completionPattern)) {
      log.info(`[CompletionMonitor] Task ${taskId} completed after ${Math.round(elapsedMs / 1000)}s`);
      return { status: 'completed', elapsedMs, output };
    }

    const detection = options.detectUnavailability?.(output) ?? null;
    if (detection) {
      return { status: 'unavailable', elapsedMs, output, detection };
    }

    const errorLine = lastErrorLine(output);
    if (errorLine && errorLine !== lastLoggedError) {
      lastLoggedError = errorLine;
      log.warn(`[CompletionMonitor] Error-like output from ${taskId}; still waiting`, { line: errorLine });
    }

    if (elapsedMs >= timeoutMs) {
      log.warn(`[CompletionMonitor] Task ${taskId} timed out after ${timeoutSeconds}s`);
      return { status: 'timed_out', elapsedMs, output };
    }

    const decile = Math.min(9, Math.floor((elapsedMs * 10) / timeoutMs));
    if (decile > lastDecile) {
      lastDecile = decile;
      log.info(`[CompletionMonitor] Task ${taskId} still running (${decile * 10}% of timeout elapsed)`);
      options.onProgress?.({ taskId, decile, elapsedMs, timeoutMs });
    }

    const sinceHeartbeatMs = startedAt + elapsedMs - lastHeartbeatAt;
    if (options.onHeartbeat && options.heartbeatIntervalMs && sinceHeartbeatMs >= options.heartbeatIntervalMs) {
      lastHeartbeatAt = startedAt + elapsedMs;
      try {
        await options.onHeartbeat(elapsedMs);
      } catch (err) {
        log.warn(`[CompletionMonitor] Heartbeat failed for ${taskId}`, { error: errorMessage(err) });
      }
    }

    await sleep(Math.max(1, Math.min(options.pollIntervalMs, timeoutMs - elapsedMs)));
  }
}
