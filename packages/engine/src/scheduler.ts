// =============================================================================
// Scheduler
// =============================================================================
// Runs queued tasks one at a time against a single execution session:
// check pause -> pick next -> claim (compare-and-set, refused while another
// task runs) -> reset context -> dispatch -> monitor -> classify -> record ->
// delay -> repeat.

import { setTimeout as delay } from 'timers/promises';
import { PAUSE_REASONS, type CycleOutcome, type SchedulerSettings, type Task } from '@relayq/shared';
import type { BackoffController } from './backoff-controller.js';
import { awaitCompletion } from './completion-monitor.js';
import {
  ExecutionBusyError,
  NotFoundError,
  PersistenceError,
  StatusConflictError,
  TaskTimeoutError,
  errorMessage,
} from './errors.js';
import {
  clearExecutionLease,
  getExecutionLeaseHeartbeatIntervalMs,
  getExecutionLeaseOwnerId,
  isTaskExecutionActive,
  loadExecutionLeases,
  upsertExecutionLease,
} from './execution-lease-service.js';
import type { ExecutionSession } from './execution-session.js';
import { logger as defaultLogger, type LoggerLike } from './logger.js';
import type { QueueCache } from './queue-cache.js';
import type { QueueStore } from './queue-store.js';
import { handleFailure } from './retry-handler.js';
import { recoverStaleTasksOnStartup, type StartupRecoveryResult } from './startup-recovery.js';
import { logTaskStatusTransition } from './state-transition.js';
import { completionMarkerFor, describeTask, executeTask } from './task-variants.js';

const CONTEXT_RESET_SETTLE_MS = 2_000;
const CONFLICT_RETRY_DELAY_MS = 1_000;

export type SchedulerSleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SchedulerOptions {
  store: QueueStore;
  cache: QueueCache;
  backoff: BackoffController;
  session: ExecutionSession;
  settings: SchedulerSettings;
  ownerId?: string;
  logger?: LoggerLike;
  now?: () => Date;
  sleep?: SchedulerSleep;
  onCycle?: (outcome: CycleOutcome) => void;
}

async function defaultSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) {
      throw err;
    }
  }
}

export class Scheduler {
  private readonly store: QueueStore;
  private readonly cache: QueueCache;
  private readonly backoff: BackoffController;
  private readonly session: ExecutionSession;
  private readonly settings: SchedulerSettings;
  private readonly ownerId: string;
  private readonly log: LoggerLike;
  private readonly now: () => Date;
  private readonly sleepFn: SchedulerSleep;
  private readonly onCycle: ((outcome: CycleOutcome) => void) | undefined;

  private running = false;
  private stopRequested = false;
  private initialized = false;
  private currentTaskId: string | null = null;
  private cycleCount = 0;
  private sleepController = new AbortController();
  private loopPromise: Promise<void> | null = null;

  constructor(options: SchedulerOptions) {
    this.store = options.store;
    this.cache = options.cache;
    this.backoff = options.backoff;
    this.session = options.session;
    this.settings = options.settings;
    this.ownerId = options.ownerId ?? getExecutionLeaseOwnerId();
    this.log = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
    this.sleepFn = options.sleep ?? defaultSleep;
    this.onCycle = options.onCycle;
  }

  isRunning(): boolean {
    return this.running;
  }

  getCurrentTaskId(): string | null {
    return this.currentTaskId;
  }

  getCycleCount(): number {
    return this.cycleCount;
  }

  /**
   * Startup pass: reset abandoned in-progress tasks and pick up an outstanding
   * rate-limit pause from disk. Safe to call more than once.
   */
  async initialize(): Promise<StartupRecoveryResult> {
    const recovery = await recoverStaleTasksOnStartup(this.store, {
      nowMs: this.now().getTime(),
      ttlMs: this.settings.leaseTtlSeconds * 1000,
      logger: this.log,
    });

    if (!this.backoff.isActive()) {
      await this.backoff.restore();
    }

    this.initialized = true;
    return recovery;
  }

  /** Run cycles until `stop()` is called. Resolves once the loop has unwound. */
  async start(): Promise<void> {
    if (this.running) {
      return this.loopPromise ?? Promise.resolve();
    }

    this.running = true;
    this.stopRequested = false;
    this.sleepController = new AbortController();
    this.loopPromise = this.loop();
    return this.loopPromise;
  }

  /** Ask the loop to stop at its next suspension point. */
  requestStop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.sleepController.abort();
    this.log.info('[Scheduler] Stop requested');
  }

  async stop(): Promise<void> {
    this.requestStop();
    await this.loopPromise;
  }

  private async loop(): Promise<void> {
    this.log.info(`[Scheduler] Started (owner ${this.ownerId})`);

    try {
      if (!this.initialized) {
        await this.initialize();
      }

      while (!this.stopRequested) {
        const outcome = await this.runCycle();
        if (this.stopRequested) break;
        await this.sleepFn(this.delayAfter(outcome), this.sleepController.signal);
      }
    } finally {
      this.running = false;
      this.log.info('[Scheduler] Stopped');
    }
  }

  /** Delay before the next cycle, in milliseconds. */
  delayAfter(outcome: CycleOutcome): number {
    const idleMs = this.settings.idleDelaySeconds * 1000;

    switch (outcome.kind) {
      case 'paused': {
        if (!outcome.resumeAt) return idleMs;
        const remainingMs = Date.parse(outcome.resumeAt) - this.now().getTime();
        return Math.max(1_000, Math.min(idleMs, remainingMs));
      }
      case 'resumed':
      case 'stopped':
        return 0;
      case 'conflict':
        return CONFLICT_RETRY_DELAY_MS;
      case 'idle':
      case 'busy':
      case 'error':
        return idleMs;
      case 'completed':
      case 'failed':
      case 'rate_limited':
        return this.settings.cycleDelaySeconds * 1000;
    }
  }

  /** One pass of the state machine. Never throws; problems surface as an `error` outcome. */
  async runCycle(): Promise<CycleOutcome> {
    this.cycleCount += 1;
    let outcome: CycleOutcome;

    try {
      outcome = await this.runCycleUnsafe();
    } catch (err) {
      outcome = await this.handleCycleError(err);
    }

    this.onCycle?.(outcome);
    return outcome;
  }

  private async runCycleUnsafe(): Promise<CycleOutcome> {
    const stats = await this.cache.stats();
    if (stats.paused) {
      return this.handlePausedQueue(stats.pauseReason);
    }

    if (this.backoff.isActive()) {
      this.log.info('[Scheduler] Queue was resumed externally; dropping the pending usage-limit wait');
      this.backoff.forget();
    }

    const task = await this.cache.getNextPending();
    if (!task) {
      this.log.debug('[Scheduler] No eligible pending task');
      return { kind: 'idle' };
    }

    return this.processTask(task);
  }

  private async handlePausedQueue(reason: string | null): Promise<CycleOutcome> {
    if (reason !== PAUSE_REASONS.usageLimit) {
      return { kind: 'paused', reason, resumeAt: null };
    }

    if (!this.backoff.isActive()) {
      // Another instance may have paused the queue; its marker carries the wait.
      await this.backoff.restore();
    }

    if (this.backoff.isActive() && !this.backoff.isWaitComplete(this.now())) {
      const state = this.backoff.getState();
      return { kind: 'paused', reason, resumeAt: state?.estimatedResumeAt ?? null };
    }

    await this.backoff.resume();
    this.cache.invalidate();
    return { kind: 'resumed' };
  }

  private async processTask(task: Task): Promise<CycleOutcome> {
    const leases = await loadExecutionLeases(this.store.queueDir);
    const activity = { nowMs: this.now().getTime(), ttlMs: this.settings.leaseTtlSeconds * 1000 };

    try {
      await this.store.claim(task.id, (other) => isTaskExecutionActive(other, leases, activity), {
        startedAt: this.now().toISOString(),
        retryAfter: undefined,
      });
    } catch (err) {
      if (err instanceof ExecutionBusyError) {
        this.log.info(`[Scheduler] ${err.message}; waiting`);
        return { kind: 'busy', taskId: task.id, runningTaskId: err.runningTaskId };
      }
      if (err instanceof StatusConflictError || err instanceof NotFoundError) {
        this.log.info(`[Scheduler] Task ${task.id} was claimed or changed elsewhere; skipping`);
        this.cache.invalidate();
        return { kind: 'conflict', taskId: task.id };
      }
      throw err;
    }

    logTaskStatusTransition({
      taskId: task.id,
      from: 'pending',
      to: 'in_progress',
      source: 'scheduler',
      logger: this.log,
    });

    this.currentTaskId = task.id;
    await upsertExecutionLease(this.store.queueDir, task.id, this.ownerId, this.now());

    try {
      return await this.executeClaimedTask(task);
    } finally {
      this.currentTaskId = null;
      try {
        await clearExecutionLease(this.store.queueDir, task.id);
      } catch (err) {
        this.log.warn(`[Scheduler] Could not clear lease for ${task.id}`, { error: errorMessage(err) });
      }
    }
  }

  private async executeClaimedTask(task: Task): Promise<CycleOutcome> {
    this.log.info(`[Scheduler] Dispatching ${task.id}: ${describeTask(task)}`);

    const sessionError = await this.prepareSession(task);
    if (sessionError) {
      return this.recordFailure(task.id, sessionError);
    }

    let baselineOutput = '';
    try {
      baselineOutput = await this.session.readRecentOutput();
    } catch (err) {
      this.log.warn('[Scheduler] Could not capture output before dispatch', { error: errorMessage(err) });
    }

    const completionMarker = completionMarkerFor(this.settings.completionPattern, task.id);
    const dispatch = await executeTask(this.session, task, completionMarker);
    if (!dispatch.ok) {
      return this.recordFailure(task.id, `Dispatch failed: ${dispatch.error}`);
    }

    const timeoutSeconds = task.timeoutSeconds ?? this.settings.defaultTimeoutSeconds;
    const queueDir = this.store.queueDir;
    const result = await awaitCompletion(this.session, timeoutSeconds, task.id, {
      completionPattern: completionMarker,
      pollIntervalMs: this.settings.pollIntervalSeconds * 1000,
      baselineOutput,
      dispatchedCommand: dispatch.command,
      detectUnavailability: (output) => this.backoff.detect(output),
      shouldStop: () => this.stopRequested,
      onHeartbeat: () => upsertExecutionLease(queueDir, task.id, this.ownerId, this.now()),
      heartbeatIntervalMs: getExecutionLeaseHeartbeatIntervalMs(this.settings.leaseTtlSeconds * 1000),
      now: () => this.now().getTime(),
      sleep: (ms) => this.sleepFn(ms, this.sleepController.signal),
      logger: this.log,
    });

    switch (result.status) {
      case 'completed': {
        await this.store.updateStatusIf(task.id, 'in_progress', 'completed', {
          completedAt: this.now().toISOString(),
          lastError: undefined,
        });
        logTaskStatusTransition({
          taskId: task.id,
          from: 'in_progress',
          to: 'completed',
          source: 'scheduler',
          logger: this.log,
        });
        return { kind: 'completed', taskId: task.id };
      }

      case 'unavailable': {
        // Not a failed attempt: the task goes back untouched and the queue waits.
        await this.store.updateStatusIf(task.id, 'in_progress', 'pending', {
          lastError: `Unavailable: ${result.detection.matchedText}`,
        });
        logTaskStatusTransition({
          taskId: task.id,
          from: 'in_progress',
          to: 'pending',
          source: 'scheduler',
          reason: result.detection.pattern,
          logger: this.log,
        });
        const state = await this.backoff.handleDetection(task.id, result.detection);
        return {
          kind: 'rate_limited',
          taskId: task.id,
          waitSeconds: state.waitSeconds,
          resumeAt: state.estimatedResumeAt,
        };
      }

      case 'timed_out':
        return this.recordFailure(task.id, new TaskTimeoutError(task.id, timeoutSeconds).message);

      case 'stopped':
        // Left in_progress on purpose; the next startup recovery returns it to pending.
        this.log.warn(`[Scheduler] Stopped while ${task.id} was running; it stays in_progress until recovery`);
        return { kind: 'stopped', taskId: task.id };
    }
  }

  /** Error text when the session cannot take a task, or null when it is ready. */
  private async prepareSession(task: Task): Promise<string | null> {
    try {
      if (!(await this.session.isResponsive())) {
        this.log.warn('[Scheduler] Session unresponsive; attempting recovery');
        await this.session.recover();
        if (!(await this.session.isResponsive())) {
          return 'Execution session is unresponsive';
        }
      }

      const clearContext = task.clearContext ?? this.settings.clearContextBetweenTasks;
      if (clearContext) {
        this.log.debug(`[Scheduler] Resetting session context before ${task.id}`);
        await this.session.send(this.settings.clearContextCommand);
        await this.sleepFn(CONTEXT_RESET_SETTLE_MS, this.sleepController.signal);
      }
      return null;
    } catch (err) {
      return `Session preparation failed: ${errorMessage(err)}`;
    }
  }

  private async recordFailure(taskId: string, reason: string): Promise<CycleOutcome> {
    const failure = await handleFailure(this.store, taskId, reason, {
      settings: this.settings,
      logger: this.log,
      now: this.now,
    });

    logTaskStatusTransition({
      taskId,
      from: 'in_progress',
      to: failure.outcome === 'retried' ? 'pending' : 'failed_permanent',
      source: 'retry-handler',
      reason,
      logger: this.log,
    });

    return { kind: 'failed', taskId, failure };
  }

  private async handleCycleError(err: unknown): Promise<CycleOutcome> {
    const message = errorMessage(err);

    if (err instanceof StatusConflictError || err instanceof NotFoundError) {
      // The task was skipped, retried or removed by an operator while it ran.
      this.log.warn(`[Scheduler] ${message}`);
      this.cache.invalidate();
      return { kind: 'conflict', taskId: err.taskId };
    }

    if (err instanceof PersistenceError) {
      this.log.error('[Scheduler] Queue persistence failed; pausing the scheduler', { error: message });
      try {
        await this.store.setPaused(true, PAUSE_REASONS.persistenceError);
      } catch (pauseErr) {
        this.log.error('[Scheduler] Could not record the pause in the queue document', {
          error: errorMessage(pauseErr),
        });
      }
      this.requestStop();
      return { kind: 'error', message };
    }

    this.log.error('[Scheduler] Cycle failed', { error: message });
    return { kind: 'error', message };
  }
}
