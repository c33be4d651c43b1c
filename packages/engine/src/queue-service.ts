// =============================================================================
// Queue Service
// =============================================================================
// Operator-facing queue operations. The CLI calls these as plain functions;
// every write goes through the Queue Store, every read through the cache.

import {
  PAUSE_REASONS,
  type BackoffState,
  type BackoffStatistics,
  type BackupInfo,
  type CleanupReport,
  type ConfigureTaskRequest,
  type CreateTaskRequest,
  type QueueDocument,
  type QueueHealth,
  type QueueStatus,
  type SchedulerSettings,
  type Task,
  type TaskStatus,
  type TaskType,
} from '@relayq/shared';
import { BackoffController, readBackoffState } from './backoff-controller.js';
import { runCleanup } from './cleanup-service.js';
import { NotFoundError, ValidationError, errorMessage } from './errors.js';
import { logger as defaultLogger, type LoggerLike } from './logger.js';
import { QueueCache } from './queue-cache.js';
import { QueueStore } from './queue-store.js';
import { logTaskStatusTransition } from './state-transition.js';
import { validateConfigureTaskRequest, validateCreateTaskRequest } from './task-validation.js';

export interface TaskListFilter {
  status?: TaskStatus;
  type?: TaskType;
}

export interface QueueServiceOptions {
  settings: SchedulerSettings;
  store?: QueueStore;
  cache?: QueueCache;
  backoff?: BackoffController;
  logger?: LoggerLike;
  now?: () => Date;
}

function deriveHealth(document: QueueDocument, failedPermanent: number): QueueHealth {
  if (document.paused) return 'paused';
  return failedPermanent > 0 ? 'degraded' : 'healthy';
}

export class QueueService {
  readonly settings: SchedulerSettings;
  readonly store: QueueStore;
  readonly cache: QueueCache;
  readonly backoff: BackoffController;
  private readonly log: LoggerLike;
  private readonly now: () => Date;

  constructor(options: QueueServiceOptions) {
    this.settings = options.settings;
    this.log = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());

    this.store = options.store ?? new QueueStore({
      queueDir: options.settings.queueDir,
      writeRetries: options.settings.writeRetries,
      defaultPriority: options.settings.defaultPriority,
      logger: this.log,
      now: this.now,
    });
    this.cache = options.cache ?? new QueueCache({ store: this.store, logger: this.log, now: this.now });
    this.backoff = options.backoff ?? new BackoffController({
      queueDir: options.settings.queueDir,
      store: this.store,
      settings: options.settings.backoff,
      logger: this.log,
      now: this.now,
    });
  }

  async addTask(request: CreateTaskRequest): Promise<Task> {
    const validation = validateCreateTaskRequest(request);
    if (!validation.ok) {
      throw new ValidationError(validation.field, validation.error);
    }

    const task = await this.store.append(validation.value);
    this.log.info(`[QueueService] Added ${task.type} task ${task.id} (priority ${task.priority})`);
    return task;
  }

  async listTasks(filter: TaskListFilter = {}): Promise<Task[]> {
    const tasks = await this.cache.listTasks();
    return tasks.filter((task) =>
      (!filter.status || task.status === filter.status)
      && (!filter.type || task.type === filter.type));
  }

  async showTask(id: string): Promise<Task> {
    const task = await this.cache.get(id);
    if (!task) {
      throw new NotFoundError(id);
    }
    return task;
  }

  async pauseQueue(reason: string = PAUSE_REASONS.manual): Promise<QueueDocument> {
    const document = await this.store.setPaused(true, reason);
    this.log.info(`[QueueService] Queue paused (${reason})`);
    return document;
  }

  /** Un-pause the queue whatever the reason, ending an outstanding usage-limit wait too. */
  async resumeQueue(): Promise<QueueDocument> {
    const backoffState = await this.readBackoffStateSafely();
    if (backoffState) {
      if (!this.backoff.isActive()) {
        await this.backoff.restore();
      }
      await this.backoff.resume();
    }

    const document = await this.store.setPaused(false);
    this.log.info('[QueueService] Queue resumed');
    return document;
  }

  /** Remove every task (a backup is taken first). Returns the number removed. */
  async clearQueue(): Promise<number> {
    const removed = await this.store.clear();
    this.log.warn(`[QueueService] Cleared ${removed} task(s) from the queue`);
    return removed;
  }

  /** Put a failed task back in line with a fresh retry budget. */
  async retryTask(id: string): Promise<Task> {
    const before = await this.showTask(id);
    const task = await this.store.updateStatusIf(id, ['failed', 'failed_permanent'], 'pending', {
      retryCount: 0,
      retryAfter: undefined,
      lastError: undefined,
      completedAt: undefined,
    });

    logTaskStatusTransition({ taskId: id, from: before.status, to: 'pending', source: 'operator', logger: this.log });
    return task;
  }

  /** Give up on a pending or running task; it stays visible as failed_permanent. */
  async skipTask(id: string): Promise<Task> {
    const before = await this.showTask(id);
    const task = await this.store.updateStatusIf(id, ['pending', 'in_progress'], 'failed_permanent', {
      lastError: 'skipped',
      completedAt: this.now().toISOString(),
    });

    logTaskStatusTransition({
      taskId: id,
      from: before.status,
      to: 'failed_permanent',
      source: 'operator',
      reason: 'skipped',
      logger: this.log,
    });
    return task;
  }

  async configureTask(id: string, request: ConfigureTaskRequest): Promise<Task> {
    const validation = validateConfigureTaskRequest(request);
    if (!validation.ok) {
      throw new ValidationError(validation.field, validation.error);
    }

    const patch: ConfigureTaskRequest = {};
    if (validation.value.priority !== undefined) patch.priority = validation.value.priority;
    if (validation.value.timeoutSeconds !== undefined) patch.timeoutSeconds = validation.value.timeoutSeconds;
    if (validation.value.maxRetries !== undefined) patch.maxRetries = validation.value.maxRetries;

    const task = await this.store.updateTask(id, patch);
    this.log.info(`[QueueService] Reconfigured task ${id}`, patch);
    return task;
  }

  async getQueueStatus(): Promise<QueueStatus> {
    const document = await this.cache.getDocument();
    const stats = await this.cache.stats();
    const next = await this.cache.getNextPending();
    const current = document.tasks.find((task) => task.status === 'in_progress') ?? null;

    return {
      paused: document.paused,
      pauseReason: document.pauseReason,
      pausedAt: document.pausedAt,
      counts: stats.counts,
      total: stats.total,
      currentTaskId: current?.id ?? null,
      nextTaskId: next?.id ?? null,
      backoff: await this.readBackoffStateSafely(),
      statistics: document.statistics,
      health: deriveHealth(document, stats.counts.failed_permanent),
      lastModified: document.lastModified,
    };
  }

  async runCleanup(): Promise<CleanupReport> {
    return runCleanup(this.store, { settings: this.settings, logger: this.log, now: this.now });
  }

  async listBackups(): Promise<BackupInfo[]> {
    return this.store.listBackups();
  }

  async restoreBackup(name: string): Promise<QueueDocument> {
    const document = await this.store.restoreBackup(name);
    this.cache.invalidate();
    return document;
  }

  async getBackoffStatus(): Promise<{ state: BackoffState | null; statistics: BackoffStatistics }> {
    if (!this.backoff.isActive()) {
      await this.backoff.restore();
    }
    return { state: this.backoff.getState(), statistics: this.backoff.getStatistics() };
  }

  async resetBackoff(): Promise<void> {
    await this.backoff.resetStatistics();
  }

  private async readBackoffStateSafely(): Promise<BackoffState | null> {
    try {
      return await readBackoffState(this.settings.queueDir);
    } catch (err) {
      this.log.warn('[QueueService] Could not read usage-limit marker', { error: errorMessage(err) });
      return null;
    }
  }
}
