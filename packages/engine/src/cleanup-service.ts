import type { CleanupReport, SchedulerSettings, Task } from '@relayq/shared';
import { listCheckpoints, removeCheckpointFile } from './backoff-markers.js';
import { errorMessage } from './errors.js';
import { logger as defaultLogger, type LoggerLike } from './logger.js';
import type { QueueStore } from './queue-store.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CleanupOptions {
  settings: Pick<SchedulerSettings, 'backupRetentionDays' | 'completedTaskRetentionDays'>;
  logger?: LoggerLike;
  now?: () => Date;
}

function finishedAtMs(task: Task): number {
  return Date.parse(task.completedAt ?? task.updatedAt);
}

/**
 * Periodic housekeeping: prune old backups, drop completed tasks past their
 * retention window, and remove checkpoints that no longer belong to a waiting
 * task. Permanently failed tasks are kept until cleared explicitly.
 */
export async function runCleanup(store: QueueStore, options: CleanupOptions): Promise<CleanupReport> {
  const log = options.logger ?? defaultLogger;
  const nowMs = (options.now ?? (() => new Date()))().getTime();
  const { backupRetentionDays, completedTaskRetentionDays } = options.settings;

  const completedCutoffMs = nowMs - completedTaskRetentionDays * DAY_MS;
  const removedTasks = await store.removeWhere(
    (task) => task.status === 'completed' && finishedAtMs(task) < completedCutoffMs,
    'before-cleanup',
  );

  const removedBackups = await store.cleanupBackups(backupRetentionDays);

  const document = await store.load();
  const waitingTaskIds = new Set(
    document.tasks
      .filter((task) => task.status === 'pending' || task.status === 'in_progress')
      .map((task) => task.id),
  );

  let removedCheckpoints = 0;
  for (const file of await listCheckpoints(store.queueDir)) {
    if (file.checkpoint && waitingTaskIds.has(file.checkpoint.taskId)) {
      continue;
    }

    try {
      if (await removeCheckpointFile(file.path)) {
        removedCheckpoints += 1;
      }
    } catch (err) {
      log.warn(`[Cleanup] Could not remove checkpoint ${file.path}`, { error: errorMessage(err) });
    }
  }

  const report: CleanupReport = {
    removedBackups,
    removedCompletedTasks: removedTasks.length,
    removedCheckpoints,
  };
  log.info('[Cleanup] Finished', report);
  return report;
}
