// =============================================================================
// Backoff Controller
// =============================================================================
// Owns the rate-limit pause: detection, wait calculation, the on-disk pause
// marker and per-task checkpoints. The scheduler holds one injected instance;
// nothing here is module-global, so tests can run several side by side.

import { randomUUID } from 'crypto';
import { hostname } from 'os';
import {
  DEFAULT_BACKOFF_SETTINGS,
  PAUSE_REASONS,
  type BackoffSettings,
  type BackoffState,
  type BackoffStatistics,
  type DetectionResult,
  type PauseMarker,
} from '@relayq/shared';
import {
  deleteCheckpoint,
  deletePauseMarker,
  readPauseMarker,
  writeCheckpoint,
  writePauseMarker,
} from './backoff-markers.js';
import { errorMessage } from './errors.js';
import { logger as defaultLogger, type LoggerLike } from './logger.js';
import type { QueueStore } from './queue-store.js';
import { computeWaitSeconds, detectUnavailability } from './usage-limit-detector.js';

const HOUR_MS = 60 * 60 * 1000;

export interface BackoffOccurrence {
  at: string;
  key: string;
  taskId: string | null;
  pattern: string;
  extractedTime?: string;
  waitSeconds: number;
}

export interface PauseRequest {
  waitSeconds: number;
  taskId: string | null;
  detection: DetectionResult;
  occurrenceCount?: number;
}

export interface BackoffControllerOptions {
  queueDir: string;
  store: QueueStore;
  settings?: BackoffSettings;
  historyRetentionHours?: number;
  ownerId?: string;
  logger?: LoggerLike;
  now?: () => Date;
}

function occurrenceKey(taskId: string | null, pattern: string): string {
  return `${taskId ?? 'system'}:${pattern}`;
}

export function pauseMarkerToState(marker: PauseMarker): BackoffState {
  return {
    active: true,
    detectedPattern: marker.pattern,
    occurrenceCount: marker.occurrenceCount,
    taskId: marker.taskId,
    waitSeconds: marker.estimatedWaitSeconds,
    pauseStartedAt: marker.pauseTime,
    estimatedResumeAt: marker.estimatedResumeTime,
  };
}

/** Current pause as recorded on disk, whichever process wrote it. */
export async function readBackoffState(queueDir: string): Promise<BackoffState | null> {
  const marker = await readPauseMarker(queueDir);
  return marker ? pauseMarkerToState(marker) : null;
}

export class BackoffController {
  readonly settings: BackoffSettings;
  private readonly queueDir: string;
  private readonly store: QueueStore;
  private readonly historyRetentionMs: number;
  private readonly ownerId: string;
  private readonly log: LoggerLike;
  private readonly now: () => Date;
  private readonly occurrenceCounts = new Map<string, number>();
  private history: BackoffOccurrence[] = [];
  private state: BackoffState | null = null;

  constructor(options: BackoffControllerOptions) {
    this.queueDir = options.queueDir;
    this.store = options.store;
    this.settings = { ...DEFAULT_BACKOFF_SETTINGS, ...options.settings };
    this.historyRetentionMs = (options.historyRetentionHours ?? 168) * HOUR_MS;
    this.ownerId = options.ownerId ?? `${hostname()}:${process.pid}:${randomUUID().slice(0, 8)}`;
    this.log = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  detect(output: string): DetectionResult | null {
    return detectUnavailability(output, { now: this.now(), logger: this.log });
  }

  getOccurrenceCount(taskId: string | null, pattern: string): number {
    return this.occurrenceCounts.get(occurrenceKey(taskId, pattern)) ?? 0;
  }

  /** Count one more sighting of this pattern for the task; returns the new count. */
  recordOccurrence(taskId: string | null, detection: DetectionResult): number {
    const key = occurrenceKey(taskId, detection.pattern);
    const count = (this.occurrenceCounts.get(key) ?? 0) + 1;
    this.occurrenceCounts.set(key, count);
    return count;
  }

  computeWaitSeconds(detection: DetectionResult, occurrenceCount: number): number {
    return computeWaitSeconds(detection, occurrenceCount, this.settings, this.now());
  }

  /**
   * Record a detection, work out the wait and pause. This is what the scheduler
   * calls when a task's output shows the agent is unavailable.
   */
  async handleDetection(taskId: string | null, detection: DetectionResult): Promise<BackoffState> {
    const occurrenceCount = this.recordOccurrence(taskId, detection);
    const waitSeconds = this.computeWaitSeconds(detection, occurrenceCount);

    this.log.warn(`[Backoff] Unavailability detected (${detection.pattern}); waiting ${waitSeconds}s`, {
      taskId,
      matchedText: detection.matchedText,
      occurrenceCount,
    });

    const state = await this.pause({ waitSeconds, taskId, detection, occurrenceCount });

    const occurrence: BackoffOccurrence = {
      at: this.now().toISOString(),
      key: occurrenceKey(taskId, detection.pattern),
      taskId,
      pattern: detection.pattern,
      waitSeconds,
    };
    if (detection.extractedTime) {
      occurrence.extractedTime = detection.extractedTime;
    }
    this.history.push(occurrence);
    this.pruneHistory();

    return state;
  }

  /**
   * Enter (or extend) the paused state. Calling this while already paused
   * replaces the current state, marker and checkpoint instead of stacking them;
   * occurrence counts and history are left to handleDetection().
   */
  async pause(request: PauseRequest): Promise<BackoffState> {
    const { waitSeconds, taskId, detection } = request;
    const occurrenceCount = request.occurrenceCount ?? Math.max(1, this.getOccurrenceCount(taskId, detection.pattern));
    const now = this.now();
    const nowIso = now.toISOString();
    const resumeAt = new Date(now.getTime() + waitSeconds * 1000).toISOString();

    const pauseStartedAt = this.state?.active ? this.state.pauseStartedAt : nowIso;
    const state: BackoffState = {
      active: true,
      detectedPattern: detection.pattern,
      occurrenceCount,
      taskId,
      waitSeconds,
      pauseStartedAt,
      estimatedResumeAt: resumeAt,
    };

    const marker: PauseMarker = {
      pauseTime: pauseStartedAt,
      estimatedWaitSeconds: waitSeconds,
      estimatedResumeTime: resumeAt,
      taskId,
      pattern: detection.pattern,
      occurrenceCount,
      pauseReason: 'usage_limit',
      ownerId: this.ownerId,
    };

    await writePauseMarker(this.queueDir, marker);
    if (taskId) {
      await writeCheckpoint(this.queueDir, {
        taskId,
        reason: 'usage_limit',
        checkpointTime: nowIso,
        pattern: detection.pattern,
        ...(detection.extractedTime ? { extractedTime: detection.extractedTime } : {}),
        waitSeconds,
        estimatedResumeTime: resumeAt,
        occurrenceCount,
      });
    }
    await this.store.setPaused(true, PAUSE_REASONS.usageLimit);

    this.state = state;
    this.log.info(`[Backoff] Queue paused until ${resumeAt}`, { taskId, waitSeconds });
    return { ...state };
  }

  getState(): BackoffState | null {
    return this.state ? { ...this.state } : null;
  }

  isActive(): boolean {
    return this.state?.active === true;
  }

  /** Drop the in-memory pause without touching disk, e.g. after another process resumed the queue. */
  forget(): void {
    this.state = null;
  }

  /** True when no wait is outstanding at `at`. Has no side effects. */
  isWaitComplete(at: Date = this.now()): boolean {
    if (!this.state?.active) {
      return true;
    }
    return at.getTime() >= Date.parse(this.state.estimatedResumeAt);
  }

  /** Seconds left on the current wait; 0 when not paused. */
  getRemainingSeconds(at: Date = this.now()): number {
    if (!this.state?.active) {
      return 0;
    }
    return Math.max(0, Math.ceil((Date.parse(this.state.estimatedResumeAt) - at.getTime()) / 1000));
  }

  /**
   * Leave the rate-limit pause: clears state, marker and checkpoint, and
   * un-pauses the queue when (and only when) it is paused for a usage limit.
   */
  async resume(): Promise<void> {
    const previous = this.state;
    this.state = null;

    await deletePauseMarker(this.queueDir);
    if (previous?.taskId) {
      await deleteCheckpoint(this.queueDir, previous.taskId);
    }

    await this.store.mutate((document) => {
      if (document.paused && document.pauseReason === PAUSE_REASONS.usageLimit) {
        document.paused = false;
        document.pauseReason = null;
        document.pausedAt = null;
      }
    });

    this.log.info('[Backoff] Resumed after usage limit wait', {
      taskId: previous?.taskId ?? null,
      pattern: previous?.detectedPattern ?? null,
    });
  }

  /**
   * Rebuild the in-memory state from the pause marker on disk, so a restarted
   * scheduler honours an outstanding wait. Returns the restored state.
   */
  async restore(): Promise<BackoffState | null> {
    let marker: PauseMarker | null;
    try {
      marker = await readPauseMarker(this.queueDir);
    } catch (err) {
      this.log.warn('[Backoff] Could not read pause marker', { error: errorMessage(err) });
      return null;
    }

    if (!marker) {
      return null;
    }

    this.state = pauseMarkerToState(marker);

    const key = occurrenceKey(marker.taskId, marker.pattern);
    this.occurrenceCounts.set(key, Math.max(this.occurrenceCounts.get(key) ?? 0, marker.occurrenceCount));

    this.log.info(`[Backoff] Restored usage limit pause until ${marker.estimatedResumeTime}`);
    return { ...this.state };
  }

  getHistory(): BackoffOccurrence[] {
    return this.history.map((entry) => ({ ...entry }));
  }

  /** Drop history entries older than the retention window. Returns the number removed. */
  pruneHistory(): number {
    const cutoffMs = this.now().getTime() - this.historyRetentionMs;
    const before = this.history.length;
    this.history = this.history.filter((entry) => Date.parse(entry.at) >= cutoffMs);
    return before - this.history.length;
  }

  getStatistics(): BackoffStatistics {
    let totalOccurrences = 0;
    for (const count of this.occurrenceCounts.values()) {
      totalOccurrences += count;
    }

    return {
      active: this.isActive(),
      totalOccurrences,
      uniquePatterns: this.occurrenceCounts.size,
      lastOccurrenceAt: this.history.length > 0 ? this.history[this.history.length - 1].at : null,
      pauseStartedAt: this.state?.pauseStartedAt ?? null,
      estimatedResumeAt: this.state?.estimatedResumeAt ?? null,
      configuration: { ...this.settings },
    };
  }

  /** Forget all occurrence counts and history and drop any pause marker. */
  async resetStatistics(): Promise<void> {
    this.occurrenceCounts.clear();
    this.history = [];
    this.state = null;
    await deletePauseMarker(this.queueDir);
    this.log.info('[Backoff] Statistics reset');
  }
}
