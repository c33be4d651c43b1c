import { afterEach, describe, expect, it } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import type { Checkpoint } from '@relayq/shared';
import { listCheckpoints, writeCheckpoint } from '../src/backoff-markers.js';
import { runCleanup } from '../src/cleanup-service.js';
import { getCheckpointDir } from '../src/queue-storage.js';
import { QueueStore } from '../src/queue-store.js';
import { T0, cleanupTempDirs, createClock, createTempDir, createTestLogger } from './helpers.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function checkpointFor(taskId: string): Checkpoint {
  return {
    taskId,
    reason: 'usage_limit',
    checkpointTime: new Date(T0).toISOString(),
    pattern: 'generic:rate limit',
    waitSeconds: 300,
    estimatedResumeTime: new Date(T0 + 300_000).toISOString(),
    occurrenceCount: 1,
  };
}

afterEach(() => {
  cleanupTempDirs();
});

describe('runCleanup', () => {
  it('prunes old completed tasks, stale backups and orphaned checkpoints', async () => {
    const clock = createClock();
    const logger = createTestLogger();
    const store = new QueueStore({ queueDir: createTempDir(), logger, now: clock.now });
    await store.append({ id: 't-1', command: 'done already' });
    await store.append({ id: 't-2', command: 'still waiting' });
    await store.updateStatus('t-1', 'completed', { completedAt: new Date(T0).toISOString() });
    await store.snapshotBackup('manual');
    await writeCheckpoint(store.queueDir, checkpointFor('t-1'));
    await writeCheckpoint(store.queueDir, checkpointFor('t-2'));
    writeFileSync(join(getCheckpointDir(store.queueDir), 'usage-limit-junk.json'), 'not json');

    clock.advance(31 * DAY_MS);
    const report = await runCleanup(store, {
      settings: { backupRetentionDays: 30, completedTaskRetentionDays: 7 },
      logger,
      now: clock.now,
    });

    expect(report).toEqual({ removedBackups: 1, removedCompletedTasks: 1, removedCheckpoints: 2 });
    expect((await store.load()).tasks.map((task) => task.id)).toEqual(['t-2']);
    expect((await store.listBackups()).map((backup) => backup.name)).toEqual([
      `backup-${new Date(T0 + 31 * DAY_MS).toISOString().replace(/[:.]/g, '-')}-before-cleanup.json`,
    ]);
    expect((await listCheckpoints(store.queueDir)).map((file) => file.checkpoint?.taskId)).toEqual(['t-2']);
  });

  it('keeps recent completions and permanently failed tasks', async () => {
    const clock = createClock();
    const store = new QueueStore({ queueDir: createTempDir(), logger: createTestLogger(), now: clock.now });
    await store.append({ id: 't-1', command: 'fresh' });
    await store.append({ id: 't-2', command: 'broken' });
    await store.updateStatus('t-1', 'completed', { completedAt: new Date(T0).toISOString() });
    await store.updateStatus('t-2', 'failed_permanent');

    clock.advance(3 * DAY_MS);
    const report = await runCleanup(store, {
      settings: { backupRetentionDays: 30, completedTaskRetentionDays: 7 },
      logger: createTestLogger(),
      now: clock.now,
    });

    expect(report).toEqual({ removedBackups: 0, removedCompletedTasks: 0, removedCheckpoints: 0 });
    expect((await store.load()).tasks).toHaveLength(2);
  });
});
