// =============================================================================
// Queue Cache
// =============================================================================
// Read-side index over the queue document. The index is rebuilt whenever the
// document's modification marker changes (or the index outlives its max age),
// so every caller observes writes made by any process on the next read.

import {
  createEmptyStatusCounts,
  type QueueDocument,
  type Task,
  type TaskStatus,
  type TaskStatusCounts,
} from '@relayq/shared';
import { errorMessage } from './errors.js';
import { logger as defaultLogger, type LoggerLike } from './logger.js';
import type { QueueStore } from './queue-store.js';

export interface QueueStats {
  counts: TaskStatusCounts;
  total: number;
  paused: boolean;
  pauseReason: string | null;
}

export interface CacheStats {
  hits: number;
  misses: number;
  rebuilds: number;
  failedRebuilds: number;
  lastRebuildAt: string | null;
  indexedTasks: number;
  marker: string | null;
}

interface CacheIndex {
  document: QueueDocument;
  byId: Map<string, Task>;
  /** Pending tasks ordered by priority then insertion order. */
  pending: Task[];
  counts: TaskStatusCounts;
  marker: string | null;
  builtAtMs: number;
}

export interface QueueCacheOptions {
  store: QueueStore;
  maxAgeSeconds?: number;
  logger?: LoggerLike;
  now?: () => Date;
}

function buildIndex(document: QueueDocument, marker: string | null, builtAtMs: number): CacheIndex {
  const byId = new Map<string, Task>();
  const counts = createEmptyStatusCounts();
  const pending: Task[] = [];

  for (const task of document.tasks) {
    byId.set(task.id, task);
    counts[task.status] += 1;
    if (task.status === 'pending') {
      pending.push(task);
    }
  }

  // Array#sort is stable, so equal priorities keep document (FIFO) order.
  pending.sort((a, b) => a.priority - b.priority);

  return { document, byId, pending, counts, marker, builtAtMs };
}

export class QueueCache {
  private readonly store: QueueStore;
  private readonly maxAgeMs: number;
  private readonly log: LoggerLike;
  private readonly now: () => Date;
  private index: CacheIndex | null = null;
  private hits = 0;
  private misses = 0;
  private rebuilds = 0;
  private failedRebuilds = 0;
  private lastRebuildAt: string | null = null;

  constructor(options: QueueCacheOptions) {
    this.store = options.store;
    this.maxAgeMs = (options.maxAgeSeconds ?? 300) * 1000;
    this.log = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  /** Next eligible pending task, or null when the queue is paused or empty. */
  async getNextPending(): Promise<Task | null> {
    const index = await this.ensureFresh();
    if (index.document.paused) {
      return null;
    }

    const nowMs = this.now().getTime();
    const next = index.pending.find((task) => !task.retryAfter || Date.parse(task.retryAfter) <= nowMs);
    return next ? { ...next } : null;
  }

  /** Earliest retryAfter among pending tasks still waiting out a retry delay. */
  async getNextRetryAt(): Promise<string | null> {
    const index = await this.ensureFresh();
    const nowMs = this.now().getTime();
    let earliest: string | null = null;

    for (const task of index.pending) {
      if (!task.retryAfter || Date.parse(task.retryAfter) <= nowMs) continue;
      if (earliest === null || Date.parse(task.retryAfter) < Date.parse(earliest)) {
        earliest = task.retryAfter;
      }
    }
    return earliest;
  }

  async get(id: string): Promise<Task | null> {
    const index = await this.ensureFresh();
    const task = index.byId.get(id);
    return task ? { ...task } : null;
  }

  async exists(id: string): Promise<boolean> {
    const index = await this.ensureFresh();
    return index.byId.has(id);
  }

  async stats(): Promise<QueueStats> {
    const index = await this.ensureFresh();
    return {
      counts: { ...index.counts },
      total: index.document.tasks.length,
      paused: index.document.paused,
      pauseReason: index.document.pauseReason,
    };
  }

  async getTasksByStatus(status: TaskStatus): Promise<Task[]> {
    const index = await this.ensureFresh();
    return index.document.tasks
      .filter((task) => task.status === status)
      .map((task) => ({ ...task }));
  }

  async listTasks(): Promise<Task[]> {
    const index = await this.ensureFresh();
    return index.document.tasks.map((task) => ({ ...task }));
  }

  async getDocument(): Promise<QueueDocument> {
    const index = await this.ensureFresh();
    return {
      ...index.document,
      tasks: index.document.tasks.map((task) => ({ ...task })),
      statistics: { ...index.document.statistics },
    };
  }

  /** Force the next read to rebuild from disk. */
  invalidate(): void {
    this.index = null;
  }

  getCacheStats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      rebuilds: this.rebuilds,
      failedRebuilds: this.failedRebuilds,
      lastRebuildAt: this.lastRebuildAt,
      indexedTasks: this.index?.document.tasks.length ?? 0,
      marker: this.index?.marker ?? null,
    };
  }

  private async ensureFresh(): Promise<CacheIndex> {
    const current = this.index;
    const nowMs = this.now().getTime();

    if (current && nowMs - current.builtAtMs < this.maxAgeMs) {
      const marker = await this.readMarker();
      if (marker !== undefined && marker === current.marker) {
        this.hits += 1;
        return current;
      }
    }

    this.misses += 1;
    return this.rebuild(nowMs);
  }

  /** Undefined when the marker itself could not be read. */
  private async readMarker(): Promise<string | null | undefined> {
    try {
      return await this.store.getModificationMarker();
    } catch (err) {
      this.log.warn('[QueueCache] Could not stat queue document', { error: errorMessage(err) });
      return undefined;
    }
  }

  private async rebuild(nowMs: number): Promise<CacheIndex> {
    try {
      const snapshot = await this.store.readSnapshot();
      const index = buildIndex(snapshot.document, snapshot.marker, nowMs);
      this.index = index;
      this.rebuilds += 1;
      this.lastRebuildAt = new Date(nowMs).toISOString();
      return index;
    } catch (err) {
      this.failedRebuilds += 1;

      if (this.index) {
        this.log.warn('[QueueCache] Rebuild failed; keeping previous index', { error: errorMessage(err) });
        return this.index;
      }

      this.log.error('[QueueCache] Rebuild failed with no previous index; loading with fallback', {
        error: errorMessage(err),
      });
      const document = await this.store.load();
      // Pin the unreadable version so it is not re-parsed on every read.
      const marker = (await this.readMarker()) ?? null;
      const index = buildIndex(document, marker, nowMs);
      this.index = index;
      return index;
    }
  }
}
