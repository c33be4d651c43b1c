import { StatusConflictError, errorMessage } from './errors.js';
import {
  DEFAULT_EXECUTION_LEASE_TTL_MS,
  clearExecutionLease,
  isExecutionLeaseFresh,
  loadExecutionLeases,
  type ExecutionLease,
} from './execution-lease-service.js';
import { logger as defaultLogger, type LoggerLike } from './logger.js';
import type { QueueStore } from './queue-store.js';
import { logTaskStatusTransition } from './state-transition.js';

export interface StartupRecoveryResult {
  inspectedTaskCount: number;
  recoveredTaskIds: string[];
  skippedFreshTaskIds: string[];
}

export interface RecoverStaleTasksOptions {
  nowMs?: number;
  ttlMs?: number;
  logger?: LoggerLike;
}

function formatStaleReason(lease: ExecutionLease | undefined, nowMs: number, ttlMs: number): string {
  if (!lease) {
    return 'missing lease metadata';
  }

  const heartbeatMs = Date.parse(lease.lastHeartbeatAt);
  if (!Number.isFinite(heartbeatMs) || heartbeatMs <= 0) {
    return `invalid lease heartbeat timestamp (owner=${lease.ownerId})`;
  }

  const ageMs = Math.max(0, nowMs - heartbeatMs);
  return `lease heartbeat expired (${ageMs}ms > ${ttlMs}ms, owner=${lease.ownerId})`;
}

/**
 * Return abandoned `in_progress` tasks to `pending`. A task counts as abandoned
 * when no instance holds a fresh lease on it; tasks under a fresh lease belong
 * to a live scheduler and are left alone.
 */
export async function recoverStaleTasksOnStartup(
  store: QueueStore,
  options: RecoverStaleTasksOptions = {},
): Promise<StartupRecoveryResult> {
  const nowMs = options.nowMs ?? Date.now();
  const ttlMs = options.ttlMs ?? DEFAULT_EXECUTION_LEASE_TTL_MS;
  const log = options.logger ?? defaultLogger;
  const recoveredTaskIds: string[] = [];
  const skippedFreshTaskIds: string[] = [];

  const document = await store.load();
  const inFlight = document.tasks.filter((task) => task.status === 'in_progress');
  if (inFlight.length === 0) {
    return { inspectedTaskCount: 0, recoveredTaskIds, skippedFreshTaskIds };
  }

  const leases = await loadExecutionLeases(store.queueDir);

  for (const task of inFlight) {
    const lease = leases[task.id];
    if (isExecutionLeaseFresh(lease, { nowMs, ttlMs })) {
      skippedFreshTaskIds.push(task.id);
      continue;
    }

    const staleReason = formatStaleReason(lease, nowMs, ttlMs);
    try {
      await store.updateStatusIf(task.id, 'in_progress', 'pending', {
        lastError: `Recovered after interruption (${staleReason})`,
      });
    } catch (err) {
      if (err instanceof StatusConflictError) {
        log.info(`[Startup] Task ${task.id} changed state during recovery; leaving it`);
        continue;
      }
      throw err;
    }

    recoveredTaskIds.push(task.id);
    logTaskStatusTransition({
      taskId: task.id,
      from: 'in_progress',
      to: 'pending',
      source: 'startup-recovery',
      reason: staleReason,
      logger: log,
    });

    try {
      await clearExecutionLease(store.queueDir, task.id);
    } catch (err) {
      log.warn(`[Startup] Could not clear lease for ${task.id}`, { error: errorMessage(err) });
    }
  }

  if (recoveredTaskIds.length > 0) {
    log.info(`[Startup] Recovered ${recoveredTaskIds.length} stale in-progress task(s)`);
  }

  return {
    inspectedTaskCount: inFlight.length,
    recoveredTaskIds,
    skippedFreshTaskIds,
  };
}
