import { PAUSE_REASONS, type FailureOutcome, type SchedulerSettings } from '@relayq/shared';
import { PermanentFailureError } from './errors.js';
import { logger as defaultLogger, type LoggerLike } from './logger.js';
import type { QueueStore } from './queue-store.js';

export type RetrySettings = Pick<
  SchedulerSettings,
  'maxRetries' | 'retryDelaySeconds' | 'maxRetryDelaySeconds' | 'autoPauseOnPermanentFailure'
>;

export interface HandleFailureOptions {
  settings: RetrySettings;
  logger?: LoggerLike;
  now?: () => Date;
}

/** Delay before the next attempt, growing linearly with the retries already made. */
export function computeRetryDelaySeconds(retryCount: number, settings: RetrySettings): number {
  return Math.min(settings.maxRetryDelaySeconds, settings.retryDelaySeconds * (retryCount + 1));
}

/**
 * Record a failed attempt. In one document write the attempt is marked
 * `failed`, then the task either goes back to `pending` with a `retryAfter`
 * delay or, once its retries are used up, moves to `failed_permanent` (pausing
 * the queue when auto-pause is on). Tasks are never deleted here.
 */
export async function handleFailure(
  store: QueueStore,
  taskId: string,
  reason: string,
  options: HandleFailureOptions,
): Promise<FailureOutcome> {
  const log = options.logger ?? defaultLogger;
  const now = options.now ?? (() => new Date());
  const { settings } = options;

  const result = await store.mutate((document) => {
    const failed = store.applyStatus(document, taskId, ['in_progress', 'failed'], 'failed', { lastError: reason });
    const maxRetries = failed.maxRetries ?? settings.maxRetries;

    if (failed.retryCount < maxRetries) {
      const delaySeconds = computeRetryDelaySeconds(failed.retryCount, settings);
      const retryCount = failed.retryCount + 1;
      const retryAfter = new Date(now().getTime() + delaySeconds * 1000).toISOString();
      store.applyStatus(document, taskId, 'failed', 'pending', { retryCount, retryAfter });

      const outcome: FailureOutcome = { outcome: 'retried', taskId, retryCount, delaySeconds, retryAfter };
      return { outcome, maxRetries };
    }

    store.applyStatus(document, taskId, 'failed', 'failed_permanent', { completedAt: now().toISOString() });
    if (settings.autoPauseOnPermanentFailure) {
      store.applyPause(document, true, PAUSE_REASONS.permanentFailure);
    }

    const outcome: FailureOutcome = {
      outcome: 'permanently_failed',
      taskId,
      retryCount: failed.retryCount,
      queuePaused: settings.autoPauseOnPermanentFailure,
    };
    return { outcome, maxRetries };
  });

  const { outcome, maxRetries } = result;
  if (outcome.outcome === 'retried') {
    log.warn(
      `[Retry] Task ${taskId} failed (${reason}); retry ${outcome.retryCount}/${maxRetries} in ${outcome.delaySeconds}s`,
    );
    return outcome;
  }

  log.error(`[Retry] ${new PermanentFailureError(taskId, outcome.retryCount, reason).message}`);
  if (outcome.queuePaused) {
    log.warn(`[Retry] Queue paused after permanent failure of ${taskId}; resume it explicitly to continue`);
  }
  return outcome;
}
