import { randomUUID } from 'crypto';
import { mkdir, readdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { Checkpoint, PauseMarker } from '@relayq/shared';
import { PersistenceError } from './errors.js';
import { getCheckpointDir, getCheckpointPath, getPauseMarkerPath } from './queue-storage.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`;
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
    await rename(tempPath, filePath);
  } catch (err) {
    await rm(tempPath, { force: true }).catch(() => undefined);
    throw new PersistenceError('write', filePath, err);
  }
}

async function readJson(filePath: string): Promise<unknown> {
  try {
    return JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (err) {
    if (isMissingFileError(err)) {
      return null;
    }
    throw new PersistenceError('read', filePath, err);
  }
}

async function removeFile(filePath: string): Promise<boolean> {
  try {
    await rm(filePath);
    return true;
  } catch (err) {
    if (isMissingFileError(err)) {
      return false;
    }
    throw new PersistenceError('delete', filePath, err);
  }
}

// =============================================================================
// Pause marker
// =============================================================================

export function normalizePauseMarker(raw: unknown): PauseMarker | null {
  if (!isRecord(raw)) return null;

  const { pauseTime, estimatedResumeTime, estimatedWaitSeconds, pattern, ownerId } = raw;
  if (typeof pauseTime !== 'string' || typeof estimatedResumeTime !== 'string') return null;
  if (!Number.isFinite(Date.parse(pauseTime)) || !Number.isFinite(Date.parse(estimatedResumeTime))) return null;

  return {
    pauseTime,
    estimatedResumeTime,
    estimatedWaitSeconds: typeof estimatedWaitSeconds === 'number' ? estimatedWaitSeconds : 0,
    taskId: typeof raw.taskId === 'string' ? raw.taskId : null,
    pattern: typeof pattern === 'string' ? pattern : 'unknown',
    occurrenceCount: typeof raw.occurrenceCount === 'number' ? raw.occurrenceCount : 1,
    pauseReason: 'usage_limit',
    ownerId: typeof ownerId === 'string' ? ownerId : 'unknown',
  };
}

export async function readPauseMarker(queueDir: string): Promise<PauseMarker | null> {
  return normalizePauseMarker(await readJson(getPauseMarkerPath(queueDir)));
}

export async function writePauseMarker(queueDir: string, marker: PauseMarker): Promise<void> {
  await writeJsonAtomic(getPauseMarkerPath(queueDir), marker);
}

export async function deletePauseMarker(queueDir: string): Promise<boolean> {
  return removeFile(getPauseMarkerPath(queueDir));
}

// =============================================================================
// Checkpoints
// =============================================================================

export function normalizeCheckpoint(raw: unknown): Checkpoint | null {
  if (!isRecord(raw)) return null;
  if (typeof raw.taskId !== 'string' || typeof raw.checkpointTime !== 'string') return null;

  const checkpoint: Checkpoint = {
    taskId: raw.taskId,
    reason: typeof raw.reason === 'string' ? raw.reason : 'usage_limit',
    checkpointTime: raw.checkpointTime,
    pattern: typeof raw.pattern === 'string' ? raw.pattern : 'unknown',
    waitSeconds: typeof raw.waitSeconds === 'number' ? raw.waitSeconds : 0,
    estimatedResumeTime: typeof raw.estimatedResumeTime === 'string' ? raw.estimatedResumeTime : raw.checkpointTime,
    occurrenceCount: typeof raw.occurrenceCount === 'number' ? raw.occurrenceCount : 1,
  };
  if (typeof raw.extractedTime === 'string') {
    checkpoint.extractedTime = raw.extractedTime;
  }
  return checkpoint;
}

/** One checkpoint per task; writing again replaces the previous one. */
export async function writeCheckpoint(queueDir: string, checkpoint: Checkpoint): Promise<void> {
  await writeJsonAtomic(getCheckpointPath(queueDir, checkpoint.taskId), checkpoint);
}

export async function readCheckpoint(queueDir: string, taskId: string): Promise<Checkpoint | null> {
  return normalizeCheckpoint(await readJson(getCheckpointPath(queueDir, taskId)));
}

export async function deleteCheckpoint(queueDir: string, taskId: string): Promise<boolean> {
  return removeFile(getCheckpointPath(queueDir, taskId));
}

export interface CheckpointFile {
  path: string;
  checkpoint: Checkpoint | null;
}

export async function listCheckpoints(queueDir: string): Promise<CheckpointFile[]> {
  const dir = getCheckpointDir(queueDir);
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (isMissingFileError(err)) return [];
    throw new PersistenceError('read', dir, err);
  }

  const files: CheckpointFile[] = [];
  for (const name of entries.filter((entry) => entry.endsWith('.json')).sort()) {
    const path = join(dir, name);
    let checkpoint: Checkpoint | null = null;
    try {
      checkpoint = normalizeCheckpoint(await readJson(path));
    } catch {
      checkpoint = null;
    }
    files.push({ path, checkpoint });
  }
  return files;
}

export async function removeCheckpointFile(path: string): Promise<boolean> {
  return removeFile(path);
}
