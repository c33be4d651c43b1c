import { randomUUID } from 'crypto';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { hostname } from 'os';
import { dirname } from 'path';
import type { Task } from '@relayq/shared';
import { getLeaseFilePath } from './queue-storage.js';

/** Ownership record of the task an instance is currently executing. */
export interface ExecutionLease {
  taskId: string;
  ownerId: string;
  startedAt: string;
  lastHeartbeatAt: string;
}

interface ExecutionLeaseFile {
  leases: Record<string, ExecutionLease>;
}

export const DEFAULT_EXECUTION_LEASE_TTL_MS = 2 * 60 * 1000;

const startupId = randomUUID().slice(0, 8);
const ownerStartedAt = new Date().toISOString();
const EXECUTION_LEASE_OWNER_ID = `${hostname()}:${process.pid}:${startupId}:${ownerStartedAt}`;

const writeQueueByQueueDir = new Map<string, Promise<void>>();

export function getExecutionLeaseOwnerId(): string {
  return EXECUTION_LEASE_OWNER_ID;
}

/** Heartbeats land at a third of the TTL so one missed beat does not expire a lease. */
export function getExecutionLeaseHeartbeatIntervalMs(ttlMs: number): number {
  return Math.max(5_000, Math.floor(ttlMs / 3));
}

async function readLeaseFile(queueDir: string): Promise<ExecutionLeaseFile> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(getLeaseFilePath(queueDir), 'utf-8'));
  } catch {
    // Missing or unreadable lease files mean "no leases": recovery then treats
    // every in-flight task as stale, which is the safe direction.
    return { leases: {} };
  }

  if (!parsed || typeof parsed !== 'object' || !('leases' in parsed)) {
    return { leases: {} };
  }

  const rawLeases: unknown = parsed.leases;
  if (!rawLeases || typeof rawLeases !== 'object') {
    return { leases: {} };
  }

  const normalized: Record<string, ExecutionLease> = {};
  for (const [taskId, candidate] of Object.entries(rawLeases)) {
    if (!candidate || typeof candidate !== 'object' || Array.isArray(candidate)) continue;
    const ownerId = 'ownerId' in candidate && typeof candidate.ownerId === 'string' ? candidate.ownerId : '';
    const startedAt = 'startedAt' in candidate && typeof candidate.startedAt === 'string' ? candidate.startedAt : '';
    const lastHeartbeatAt = 'lastHeartbeatAt' in candidate && typeof candidate.lastHeartbeatAt === 'string'
      ? candidate.lastHeartbeatAt
      : '';
    if (!taskId || !ownerId || !startedAt || !lastHeartbeatAt) continue;

    normalized[taskId] = { taskId, ownerId, startedAt, lastHeartbeatAt };
  }

  return { leases: normalized };
}

async function writeLeaseFile(queueDir: string, data: ExecutionLeaseFile): Promise<void> {
  const filePath = getLeaseFilePath(queueDir);
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
  await rename(tempPath, filePath);
}

async function updateLeaseFile(
  queueDir: string,
  updater: (current: ExecutionLeaseFile) => ExecutionLeaseFile,
): Promise<void> {
  const previous = writeQueueByQueueDir.get(queueDir) || Promise.resolve();

  const next = previous
    .catch(() => undefined)
    .then(async () => {
      const current = await readLeaseFile(queueDir);
      const updated = updater(current);
      await writeLeaseFile(queueDir, updated);
    });

  writeQueueByQueueDir.set(queueDir, next);

  try {
    await next;
  } finally {
    if (writeQueueByQueueDir.get(queueDir) === next) {
      writeQueueByQueueDir.delete(queueDir);
    }
  }
}

export async function loadExecutionLeases(queueDir: string): Promise<Record<string, ExecutionLease>> {
  const data = await readLeaseFile(queueDir);
  return data.leases;
}

export function isExecutionLeaseFresh(
  lease: ExecutionLease | undefined,
  options: { nowMs?: number; ttlMs?: number } = {},
): boolean {
  if (!lease) {
    return false;
  }

  const nowMs = options.nowMs ?? Date.now();
  const ttlMs = options.ttlMs ?? DEFAULT_EXECUTION_LEASE_TTL_MS;
  const heartbeatMs = Date.parse(lease.lastHeartbeatAt);

  if (!Number.isFinite(heartbeatMs) || heartbeatMs <= 0) {
    return false;
  }

  return nowMs - heartbeatMs <= ttlMs;
}

/**
 * Whether the executor of an `in_progress` task is still alive: its lease is
 * fresh, or it has no lease yet and was started within the TTL (the lease is
 * written just after the claim).
 */
export function isTaskExecutionActive(
  task: Pick<Task, 'id' | 'startedAt'>,
  leases: Record<string, ExecutionLease>,
  options: { nowMs: number; ttlMs: number },
): boolean {
  const lease = leases[task.id];
  if (lease) {
    return isExecutionLeaseFresh(lease, options);
  }

  const startedMs = task.startedAt ? Date.parse(task.startedAt) : Number.NaN;
  return Number.isFinite(startedMs) && options.nowMs - startedMs <= options.ttlMs;
}

/** Create the lease, or refresh its heartbeat if this task already has one. */
export async function upsertExecutionLease(
  queueDir: string,
  taskId: string,
  ownerId: string = EXECUTION_LEASE_OWNER_ID,
  now: Date = new Date(),
): Promise<void> {
  const nowIso = now.toISOString();

  await updateLeaseFile(queueDir, (current) => {
    const existing = current.leases[taskId];
    const startedAt = existing?.ownerId === ownerId ? existing.startedAt : nowIso;

    return {
      leases: {
        ...current.leases,
        [taskId]: { taskId, ownerId, startedAt, lastHeartbeatAt: nowIso },
      },
    };
  });
}

export async function clearExecutionLease(queueDir: string, taskId: string): Promise<void> {
  await updateLeaseFile(queueDir, (current) => {
    if (!current.leases[taskId]) {
      return current;
    }

    const leases = { ...current.leases };
    delete leases[taskId];
    return { leases };
  });
}
