// =============================================================================
// Queue Store
// =============================================================================
// Durable persistence of the queue document (tasks + queue metadata) as one
// JSON file. Every write is published atomically (temp file + rename) and every
// mutation is an optimistic read-modify-write that re-checks the file's
// modification marker right before publishing, so concurrent scheduler
// instances never overwrite each other's changes blindly.

import { randomUUID } from 'crypto';
import { copyFile, mkdir, readdir, readFile, rename, rm, stat, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import {
  QUEUE_DOCUMENT_VERSION,
  TASK_PRIORITY_MAX,
  TASK_PRIORITY_MIN,
  createEmptyQueueDocument,
  createEmptyQueueStatistics,
  isTaskStatus,
  isTaskType,
  type BackupInfo,
  type CreateTaskRequest,
  type QueueDocument,
  type QueueStatistics,
  type Task,
  type TaskStatus,
} from '@relayq/shared';
import {
  ExecutionBusyError,
  NotFoundError,
  PersistenceError,
  StatusConflictError,
  ValidationError,
} from './errors.js';
import { logger as defaultLogger, type LoggerLike } from './logger.js';
import {
  formatBackupName,
  getBackupDir,
  getQueueDocumentPath,
  parseBackupName,
} from './queue-storage.js';

const MAX_OPTIMISTIC_ATTEMPTS = 5;
const WRITE_RETRY_BASE_DELAY_MS = 50;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Writes to the same document path are serialized within a process. */
const writeChainByPath = new Map<string, Promise<unknown>>();

export type TaskPatch = Partial<Omit<Task, 'id' | 'status' | 'createdAt'>>;

export interface QueueSnapshot {
  document: QueueDocument;
  /** Opaque marker of the on-disk version; null when no document exists yet. */
  marker: string | null;
}

export interface QueueStoreOptions {
  queueDir: string;
  writeRetries?: number;
  defaultPriority?: number;
  logger?: LoggerLike;
  now?: () => Date;
}

// =============================================================================
// Document normalization
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function optionalPositiveInt(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : undefined;
}

function optionalNonNegativeInt(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : undefined;
}

export function normalizeTask(raw: unknown): Task | null {
  if (!isRecord(raw)) return null;

  const id = optionalString(raw.id);
  const createdAt = optionalString(raw.createdAt);
  if (!id || !createdAt || !isTaskType(raw.type) || !isTaskStatus(raw.status)) {
    return null;
  }

  const priority = typeof raw.priority === 'number' && Number.isInteger(raw.priority)
    ? Math.min(TASK_PRIORITY_MAX, Math.max(TASK_PRIORITY_MIN, raw.priority))
    : 5;

  const task: Task = {
    id,
    type: raw.type,
    description: typeof raw.description === 'string' ? raw.description : '',
    command: typeof raw.command === 'string' ? raw.command : '',
    status: raw.status,
    priority,
    retryCount: optionalNonNegativeInt(raw.retryCount) ?? 0,
    createdAt,
    updatedAt: optionalString(raw.updatedAt) ?? createdAt,
  };

  const reference = optionalString(raw.reference);
  if (reference) task.reference = reference;
  const timeoutSeconds = optionalPositiveInt(raw.timeoutSeconds);
  if (timeoutSeconds !== undefined) task.timeoutSeconds = timeoutSeconds;
  const maxRetries = optionalNonNegativeInt(raw.maxRetries);
  if (maxRetries !== undefined) task.maxRetries = maxRetries;
  const retryAfter = optionalString(raw.retryAfter);
  if (retryAfter) task.retryAfter = retryAfter;
  const lastError = optionalString(raw.lastError);
  if (lastError) task.lastError = lastError;
  if (typeof raw.clearContext === 'boolean') task.clearContext = raw.clearContext;
  const startedAt = optionalString(raw.startedAt);
  if (startedAt) task.startedAt = startedAt;
  const completedAt = optionalString(raw.completedAt);
  if (completedAt) task.completedAt = completedAt;

  return task;
}

function normalizeStatistics(raw: unknown): QueueStatistics {
  const empty = createEmptyQueueStatistics();
  if (!isRecord(raw)) return empty;

  return {
    totalProcessed: optionalNonNegativeInt(raw.totalProcessed) ?? empty.totalProcessed,
    totalCompleted: optionalNonNegativeInt(raw.totalCompleted) ?? empty.totalCompleted,
    totalFailed: optionalNonNegativeInt(raw.totalFailed) ?? empty.totalFailed,
    totalRetries: optionalNonNegativeInt(raw.totalRetries) ?? empty.totalRetries,
    lastProcessedAt: optionalString(raw.lastProcessedAt) ?? null,
  };
}

/**
 * Coerce parsed JSON into a QueueDocument. Throws when the top-level shape is
 * unusable; individual malformed tasks are dropped and counted.
 */
export function normalizeQueueDocument(raw: unknown): { document: QueueDocument; droppedTasks: number } {
  if (!isRecord(raw) || !Array.isArray(raw.tasks)) {
    throw new Error('queue document must be an object with a tasks array');
  }

  const tasks: Task[] = [];
  const seenIds = new Set<string>();
  let droppedTasks = 0;

  for (const candidate of raw.tasks) {
    const task = normalizeTask(candidate);
    if (!task || seenIds.has(task.id)) {
      droppedTasks += 1;
      continue;
    }
    seenIds.add(task.id);
    tasks.push(task);
  }

  const document: QueueDocument = {
    version: typeof raw.version === 'number' ? raw.version : QUEUE_DOCUMENT_VERSION,
    tasks,
    paused: raw.paused === true,
    pauseReason: typeof raw.pauseReason === 'string' ? raw.pauseReason : null,
    pausedAt: typeof raw.pausedAt === 'string' ? raw.pausedAt : null,
    lastModified: typeof raw.lastModified === 'string' ? raw.lastModified : new Date(0).toISOString(),
    statistics: normalizeStatistics(raw.statistics),
  };

  return { document, droppedTasks };
}

export function generateTaskId(type: Task['type'], now: Date = new Date()): string {
  const epochSeconds = Math.floor(now.getTime() / 1000);
  return `${type}-${epochSeconds}-${randomUUID().slice(0, 8)}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function applyStatisticsForTransition(
  statistics: QueueStatistics,
  from: TaskStatus,
  to: TaskStatus,
  nowIso: string,
): void {
  if (from === to) return;

  if (to === 'completed') {
    statistics.totalProcessed += 1;
    statistics.totalCompleted += 1;
    statistics.lastProcessedAt = nowIso;
  } else if (to === 'failed_permanent') {
    statistics.totalProcessed += 1;
    statistics.totalFailed += 1;
    statistics.lastProcessedAt = nowIso;
  } else if (to === 'pending' && (from === 'failed' || from === 'failed_permanent')) {
    statistics.totalRetries += 1;
  }
}

// =============================================================================
// Queue Store
// =============================================================================

export class QueueStore {
  readonly queueDir: string;
  readonly documentPath: string;
  private readonly writeRetries: number;
  private readonly defaultPriority: number;
  private readonly log: LoggerLike;
  private readonly now: () => Date;

  constructor(options: QueueStoreOptions) {
    this.queueDir = options.queueDir;
    this.documentPath = getQueueDocumentPath(options.queueDir);
    this.writeRetries = options.writeRetries ?? 3;
    this.defaultPriority = options.defaultPriority ?? 5;
    this.log = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Opaque version marker of the on-disk document, built from mtime, inode and
   * size. Every publish renames a fresh temp file into place, so the inode
   * changes even when two writes land within the same mtime tick.
   */
  async getModificationMarker(): Promise<string | null> {
    try {
      const stats = await stat(this.documentPath);
      return `${stats.mtimeMs}:${stats.ino}:${stats.size}`;
    } catch (err) {
      if (isMissingFileError(err)) {
        return null;
      }
      throw new PersistenceError('read', this.documentPath, err);
    }
  }

  /**
   * Read the document together with its marker. Throws PersistenceError when the
   * file exists but cannot be read or parsed; a missing file is an empty queue.
   */
  async readSnapshot(): Promise<QueueSnapshot> {
    const marker = await this.getModificationMarker();
    if (marker === null) {
      return { document: createEmptyQueueDocument(this.now()), marker: null };
    }

    let content: string;
    try {
      content = await readFile(this.documentPath, 'utf-8');
    } catch (err) {
      if (isMissingFileError(err)) {
        return { document: createEmptyQueueDocument(this.now()), marker: null };
      }
      throw new PersistenceError('read', this.documentPath, err);
    }

    try {
      const { document, droppedTasks } = normalizeQueueDocument(JSON.parse(content));
      if (droppedTasks > 0) {
        this.log.warn(`[QueueStore] Dropped ${droppedTasks} malformed task record(s) while loading`, {
          path: this.documentPath,
        });
      }
      return { document, marker };
    } catch (err) {
      throw new PersistenceError('read', this.documentPath, err);
    }
  }

  /**
   * Load the document, falling back to an empty queue when it is unreadable.
   * A corrupt file is copied aside as a backup before anything overwrites it.
   */
  async load(): Promise<QueueDocument> {
    const snapshot = await this.loadSnapshotWithFallback();
    return snapshot.document;
  }

  private async loadSnapshotWithFallback(): Promise<QueueSnapshot> {
    try {
      return await this.readSnapshot();
    } catch (err) {
      this.log.error('[QueueStore] Queue document unreadable; continuing with an empty queue', {
        path: this.documentPath,
        error: err instanceof Error ? err.message : String(err),
      });

      try {
        await this.snapshotBackup('corrupt');
      } catch (backupErr) {
        this.log.error('[QueueStore] Failed to preserve corrupt queue document', backupErr);
      }

      const marker = await this.getModificationMarker().catch(() => null);
      return { document: createEmptyQueueDocument(this.now()), marker };
    }
  }

  /** Publish a whole document, replacing whatever is on disk. */
  async save(document: QueueDocument): Promise<void> {
    await this.enqueueWrite(async () => {
      await this.publish({ ...document, lastModified: this.now().toISOString() });
    });
  }

  /**
   * Optimistic read-modify-write. The mutator runs against a fresh copy of the
   * document; if the file changed on disk while it ran, the whole cycle is
   * repeated. Errors thrown by the mutator abort without writing.
   */
  async mutate<T>(mutator: (document: QueueDocument) => T): Promise<T> {
    return this.enqueueWrite(async () => {
      for (let attempt = 1; attempt <= MAX_OPTIMISTIC_ATTEMPTS; attempt += 1) {
        const { document, marker } = await this.loadSnapshotWithFallback();
        const result = mutator(document);
        document.lastModified = this.now().toISOString();

        const currentMarker = await this.getModificationMarker();
        if (currentMarker !== marker) {
          this.log.debug(`[QueueStore] Document changed during update; retrying (attempt ${attempt})`);
          continue;
        }

        await this.publish(document);
        return result;
      }

      throw new PersistenceError(
        'write',
        this.documentPath,
        `document kept changing across ${MAX_OPTIMISTIC_ATTEMPTS} attempts`,
      );
    });
  }

  async append(request: CreateTaskRequest): Promise<Task> {
    const now = this.now();
    const nowIso = now.toISOString();
    const type = request.type ?? 'custom';

    const priority = request.priority ?? this.defaultPriority;
    if (!Number.isInteger(priority) || priority < TASK_PRIORITY_MIN || priority > TASK_PRIORITY_MAX) {
      throw new ValidationError(
        'priority',
        `priority must be an integer between ${TASK_PRIORITY_MIN} and ${TASK_PRIORITY_MAX}`,
      );
    }

    const task: Task = {
      id: request.id?.trim() || generateTaskId(type, now),
      type,
      description: request.description ?? '',
      command: request.command ?? '',
      status: 'pending',
      priority,
      retryCount: 0,
      createdAt: nowIso,
      updatedAt: nowIso,
    };
    if (request.reference) task.reference = request.reference;
    if (request.timeoutSeconds !== undefined) task.timeoutSeconds = request.timeoutSeconds;
    if (request.maxRetries !== undefined) task.maxRetries = request.maxRetries;
    if (request.clearContext !== undefined) task.clearContext = request.clearContext;

    return this.mutate((document) => {
      if (document.tasks.some((existing) => existing.id === task.id)) {
        throw new ValidationError('id', `Task id already exists: ${task.id}`);
      }
      document.tasks.push(task);
      return { ...task };
    });
  }

  async get(id: string): Promise<Task | null> {
    const document = await this.load();
    const task = document.tasks.find((candidate) => candidate.id === id);
    return task ? { ...task } : null;
  }

  async updateStatus(id: string, status: TaskStatus, patch: TaskPatch = {}): Promise<Task> {
    return this.mutate((document) => this.applyStatus(document, id, null, status, patch));
  }

  /**
   * Compare-and-set status transition: only applies when the task's current
   * status is one of `expected`. Throws StatusConflictError otherwise.
   */
  async updateStatusIf(
    id: string,
    expected: TaskStatus | TaskStatus[],
    status: TaskStatus,
    patch: TaskPatch = {},
  ): Promise<Task> {
    return this.mutate((document) => this.applyStatus(document, id, expected, status, patch));
  }

  /**
   * Move a pending task to `in_progress`, provided no other task is still being
   * executed. `isStillRunning` decides that for each other `in_progress` task;
   * a refusal throws ExecutionBusyError and writes nothing.
   */
  async claim(id: string, isStillRunning: (task: Task) => boolean, patch: TaskPatch = {}): Promise<Task> {
    return this.mutate((document) => {
      const running = document.tasks.find(
        (candidate) => candidate.id !== id && candidate.status === 'in_progress' && isStillRunning(candidate),
      );
      if (running) {
        throw new ExecutionBusyError(id, running.id);
      }
      return this.applyStatus(document, id, 'pending', 'in_progress', patch);
    });
  }

  async updateTask(id: string, patch: TaskPatch): Promise<Task> {
    return this.mutate((document) => {
      const task = document.tasks.find((candidate) => candidate.id === id);
      if (!task) {
        throw new NotFoundError(id);
      }

      Object.assign(task, patch, { updatedAt: this.now().toISOString() });
      return { ...task };
    });
  }

  async remove(id: string): Promise<Task> {
    return this.mutate((document) => {
      const index = document.tasks.findIndex((candidate) => candidate.id === id);
      if (index < 0) {
        throw new NotFoundError(id);
      }

      const [removed] = document.tasks.splice(index, 1);
      return removed;
    });
  }

  async setPaused(paused: boolean, reason: string | null = null): Promise<QueueDocument> {
    return this.mutate((document) => {
      this.applyPause(document, paused, reason);
      return { ...document, tasks: [...document.tasks] };
    });
  }

  /** Remove every task. A backup is taken first; returns the number removed. */
  async clear(): Promise<number> {
    await this.snapshotBackup('before-clear');
    return this.mutate((document) => {
      const removed = document.tasks.length;
      document.tasks = [];
      return removed;
    });
  }

  /** Remove tasks matching the predicate after taking a backup. */
  async removeWhere(predicate: (task: Task) => boolean, backupReason: string): Promise<Task[]> {
    const current = await this.load();
    if (!current.tasks.some(predicate)) {
      return [];
    }

    await this.snapshotBackup(backupReason);
    return this.mutate((document) => {
      const removed = document.tasks.filter(predicate);
      document.tasks = document.tasks.filter((task) => !predicate(task));
      return removed;
    });
  }

  // ===========================================================================
  // Backups
  // ===========================================================================

  /** Copy the current document into the backup directory. Null when nothing exists yet. */
  async snapshotBackup(reason: string): Promise<BackupInfo | null> {
    const backupDir = getBackupDir(this.queueDir);
    const createdAt = this.now();
    const name = formatBackupName(reason, createdAt);
    const backupPath = join(backupDir, name);

    try {
      await mkdir(backupDir, { recursive: true });
      await copyFile(this.documentPath, backupPath);
    } catch (err) {
      if (isMissingFileError(err)) {
        this.log.debug('[QueueStore] No queue document to back up');
        return null;
      }
      throw new PersistenceError('backup', backupPath, err);
    }

    const stats = await stat(backupPath);
    this.log.info(`[QueueStore] Created backup ${name}`);
    return { name, path: backupPath, createdAt: createdAt.toISOString(), sizeBytes: stats.size };
  }

  async listBackups(): Promise<BackupInfo[]> {
    const backupDir = getBackupDir(this.queueDir);
    let entries: string[];
    try {
      entries = await readdir(backupDir);
    } catch (err) {
      if (isMissingFileError(err)) return [];
      throw new PersistenceError('read', backupDir, err);
    }

    const backups: BackupInfo[] = [];
    for (const name of entries) {
      if (!name.startsWith('backup-') || !name.endsWith('.json')) continue;

      const backupPath = join(backupDir, name);
      const stats = await stat(backupPath);
      const parsed = parseBackupName(name);
      backups.push({
        name,
        path: backupPath,
        createdAt: (parsed?.createdAt ?? stats.mtime).toISOString(),
        sizeBytes: stats.size,
      });
    }

    backups.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    return backups;
  }

  /** Replace the document with a backup after validating it; the current state is backed up first. */
  async restoreBackup(name: string): Promise<QueueDocument> {
    const backupPath = join(getBackupDir(this.queueDir), name);

    let restored: QueueDocument;
    try {
      const content = await readFile(backupPath, 'utf-8');
      restored = normalizeQueueDocument(JSON.parse(content)).document;
    } catch (err) {
      throw new PersistenceError('restore', backupPath, err);
    }

    await this.snapshotBackup('before-restore');
    await this.save(restored);
    this.log.info(`[QueueStore] Restored queue from backup ${name}`);
    return restored;
  }

  /** Delete backups older than the retention window. Returns the number removed. */
  async cleanupBackups(retentionDays: number): Promise<number> {
    const cutoffMs = this.now().getTime() - retentionDays * DAY_MS;
    const backups = await this.listBackups();
    let removed = 0;

    for (const backup of backups) {
      if (Date.parse(backup.createdAt) >= cutoffMs) continue;

      try {
        await rm(backup.path, { force: true });
        removed += 1;
      } catch (err) {
        this.log.warn(`[QueueStore] Failed to remove old backup ${backup.name}`, err);
      }
    }

    if (removed > 0) {
      this.log.info(`[QueueStore] Removed ${removed} backup(s) older than ${retentionDays} day(s)`);
    }
    return removed;
  }

  // ===========================================================================
  // Document edits for use inside mutate()
  // ===========================================================================

  /** Set the pause flag; an already paused queue keeps its original `pausedAt`. */
  applyPause(document: QueueDocument, paused: boolean, reason: string | null = null): void {
    const alreadyPaused = document.paused && document.pausedAt !== null;
    document.pausedAt = paused ? (alreadyPaused ? document.pausedAt : this.now().toISOString()) : null;
    document.paused = paused;
    document.pauseReason = paused ? reason : null;
  }

  /**
   * Status transition on a document being mutated, with statistics. `expected`
   * null skips the status check. Returns a copy of the updated task.
   */
  applyStatus(
    document: QueueDocument,
    id: string,
    expected: TaskStatus | TaskStatus[] | null,
    status: TaskStatus,
    patch: TaskPatch,
  ): Task {
    const task = document.tasks.find((candidate) => candidate.id === id);
    if (!task) {
      throw new NotFoundError(id);
    }

    if (expected !== null) {
      const allowed = Array.isArray(expected) ? expected : [expected];
      if (!allowed.includes(task.status)) {
        throw new StatusConflictError(id, expected, task.status);
      }
    }

    const nowIso = this.now().toISOString();
    applyStatisticsForTransition(document.statistics, task.status, status, nowIso);

    Object.assign(task, patch);
    task.status = status;
    task.updatedAt = nowIso;
    return { ...task };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async enqueueWrite<T>(operation: () => Promise<T>): Promise<T> {
    const previous = writeChainByPath.get(this.documentPath) ?? Promise.resolve();
    const next = previous
      .catch(() => undefined)
      .then(operation);

    writeChainByPath.set(this.documentPath, next);

    try {
      return await next;
    } finally {
      if (writeChainByPath.get(this.documentPath) === next) {
        writeChainByPath.delete(this.documentPath);
      }
    }
  }

  private serialize(document: QueueDocument): string {
    const serialized = JSON.stringify(document, null, 2);

    // Re-parse before publishing so a document that would not load back is never written.
    const { document: reparsed, droppedTasks } = normalizeQueueDocument(JSON.parse(serialized));
    if (droppedTasks > 0 || reparsed.tasks.length !== document.tasks.length) {
      throw new Error(`refusing to publish queue document with ${droppedTasks} invalid task record(s)`);
    }

    return `${serialized}\n`;
  }

  private async publish(document: QueueDocument): Promise<void> {
    let serialized: string;
    try {
      serialized = this.serialize(document);
    } catch (err) {
      throw new PersistenceError('write', this.documentPath, err);
    }

    let lastError: unknown;
    for (let attempt = 0; attempt <= this.writeRetries; attempt += 1) {
      if (attempt > 0) {
        await sleep(WRITE_RETRY_BASE_DELAY_MS * attempt);
      }

      const tempPath = `${this.documentPath}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`;
      try {
        await mkdir(dirname(this.documentPath), { recursive: true });
        await writeFile(tempPath, serialized, 'utf-8');
        await rename(tempPath, this.documentPath);
        return;
      } catch (err) {
        lastError = err;
        this.log.warn(`[QueueStore] Write attempt ${attempt + 1} failed`, {
          path: this.documentPath,
          error: err instanceof Error ? err.message : String(err),
        });
        await rm(tempPath, { force: true }).catch(() => undefined);
      }
    }

    throw new PersistenceError('write', this.documentPath, lastError);
  }
}
