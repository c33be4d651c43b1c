import { isAbsolute, join, resolve } from 'path';
import { resolveTildePath } from './relayq-home.js';

export const QUEUE_DOCUMENT_FILENAME = 'queue.json';
export const LEASE_FILENAME = 'leases.json';
export const PAUSE_MARKER_FILENAME = 'usage-limit-pause.json';
export const BACKUP_DIRNAME = 'backups';
export const CHECKPOINT_DIRNAME = 'checkpoints';

export function resolveQueueDir(rawDir: string, cwd: string = process.cwd()): string {
  const expanded = resolveTildePath(rawDir.trim());
  return isAbsolute(expanded) ? expanded : resolve(cwd, expanded);
}

export function getQueueStoragePath(queueDir: string, ...segments: string[]): string {
  return join(queueDir, ...segments);
}

export function getQueueDocumentPath(queueDir: string): string {
  return getQueueStoragePath(queueDir, QUEUE_DOCUMENT_FILENAME);
}

export function getBackupDir(queueDir: string): string {
  return getQueueStoragePath(queueDir, BACKUP_DIRNAME);
}

export function getLeaseFilePath(queueDir: string): string {
  return getQueueStoragePath(queueDir, LEASE_FILENAME);
}

export function getPauseMarkerPath(queueDir: string): string {
  return getQueueStoragePath(queueDir, PAUSE_MARKER_FILENAME);
}

export function getCheckpointDir(queueDir: string): string {
  return getQueueStoragePath(queueDir, CHECKPOINT_DIRNAME);
}

function sanitizeFileSegment(value: string): string {
  return value.replace(/[^a-zA-Z0-9._-]/g, '_');
}

export function getCheckpointPath(queueDir: string, taskId: string): string {
  return join(getCheckpointDir(queueDir), `usage-limit-${sanitizeFileSegment(taskId)}.json`);
}

/**
 * Backup names are `backup-<timestamp>-<reason>.json`, with the timestamp in a
 * filesystem-safe form of ISO 8601 so lexical order is chronological.
 */
export function formatBackupName(reason: string, at: Date = new Date()): string {
  const stamp = at.toISOString().replace(/[:.]/g, '-');
  return `backup-${stamp}-${sanitizeFileSegment(reason) || 'manual'}.json`;
}

const BACKUP_NAME_PATTERN = /^backup-(\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}-\d{3}Z)-(.+)\.json$/;

export function parseBackupName(name: string): { createdAt: Date; reason: string } | null {
  const match = name.match(BACKUP_NAME_PATTERN);
  if (!match) {
    return null;
  }

  const [, stamp, reason] = match;
  const iso = stamp.replace(/^(\d{4}-\d{2}-\d{2}T)(\d{2})-(\d{2})-(\d{2})-(\d{3})Z$/, '$1$2:$3:$4.$5Z');
  const createdAt = new Date(iso);
  if (Number.isNaN(createdAt.getTime())) {
    return null;
  }

  return { createdAt, reason };
}
