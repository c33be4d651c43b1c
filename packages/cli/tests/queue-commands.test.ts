import { afterEach, beforeAll, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import chalk from 'chalk';
import { DEFAULT_BACKOFF_SETTINGS, DEFAULT_SCHEDULER_SETTINGS } from '@relayq/shared';
import { QueueService } from '@relayq/engine';
import { useQueueService } from '../src/context.js';
import { backupsRestore, cleanup } from '../src/commands/maintenance.js';
import {
  parseAddOptions,
  parseListOptions,
  queueAdd,
  queueClear,
  queueList,
  queuePause,
  queueResume,
  queueRetry,
  queueSkip,
} from '../src/commands/queue.js';
import { CLIError } from '../src/utils/error-handler.js';

const tempDirs: string[] = [];
let service: QueueService;
let logSpy: MockInstance<typeof console.log>;

function silentLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function printed(): string[] {
  return logSpy.mock.calls.map((call) => String(call[0]));
}

beforeAll(() => {
  chalk.level = 0;
});

beforeEach(() => {
  const queueDir = mkdtempSync(join(tmpdir(), 'relayq-cli-'));
  tempDirs.push(queueDir);
  service = new QueueService({
    settings: { ...DEFAULT_SCHEDULER_SETTINGS, queueDir, backoff: { ...DEFAULT_BACKOFF_SETTINGS } },
    logger: silentLogger(),
  });
  useQueueService(service);
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  useQueueService(null);
  for (const dir of tempDirs) {
    rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe('parseAddOptions', () => {
  it('builds a custom task request from flags', () => {
    expect(parseAddOptions('npm test', { priority: '2', timeout: '600', maxRetries: '1', clearContext: 'false' })).toEqual({
      type: 'custom',
      command: 'npm test',
      priority: 2,
      timeoutSeconds: 600,
      maxRetries: 1,
      clearContext: false,
    });
  });

  it('takes the positional argument as the reference for reference tasks', () => {
    expect(parseAddOptions('42', { type: 'issue_reference' })).toEqual({ type: 'issue_reference', reference: '42' });
  });

  it('rejects unknown types and out-of-range priorities', () => {
    expect(() => parseAddOptions('x', { type: 'chore' })).toThrow('--type must be one of: custom, issue_reference, pr_reference');
    expect(() => parseAddOptions('x', { priority: '0' })).toThrow('--priority must be at least 1');
  });
});

describe('parseListOptions', () => {
  it('validates the filters', () => {
    expect(parseListOptions({ status: 'failed_permanent', type: 'custom' })).toEqual({ status: 'failed_permanent', type: 'custom' });
    expect(() => parseListOptions({ status: 'done' })).toThrow(CLIError);
  });
});

describe('queue commands', () => {
  it('adds a task and lists it as JSON', async () => {
    await queueAdd('npm test', { priority: '2' });
    const [task] = await service.listTasks();

    expect(printed()).toEqual([`✓ Added task ${task?.id} (priority 2)`]);

    logSpy.mockClear();
    await queueList({ json: true });
    expect(JSON.parse(printed()[0] ?? '[]')).toEqual([expect.objectContaining({ command: 'npm test', priority: 2 })]);
  });

  it('reports an empty queue', async () => {
    await queueList({});

    expect(printed()).toEqual(['No tasks found.']);
  });

  it('pauses and resumes the queue', async () => {
    await queuePause('maintenance');
    expect((await service.getQueueStatus()).pauseReason).toBe('maintenance');

    await queueResume();
    expect((await service.getQueueStatus()).paused).toBe(false);
    expect(printed()).toEqual(['⏸ Queue paused (maintenance)', '▶ Queue resumed']);
  });

  it('skips and then retries a task', async () => {
    await service.addTask({ id: 't-1', command: 'npm test' });

    await queueSkip('t-1');
    await queueRetry('t-1');

    expect(printed()).toEqual(['⏭ Task t-1 skipped', '✓ Task t-1 is pending again']);
    expect((await service.showTask('t-1')).status).toBe('pending');
  });

  it('clears without asking when confirmed up front', async () => {
    await service.addTask({ id: 't-1', command: 'npm test' });

    await queueClear({ yes: true });

    expect(printed()).toEqual(['✓ Removed 1 task(s)']);
    expect(await service.listTasks()).toEqual([]);
  });
});

describe('maintenance commands', () => {
  it('refuses to restore a backup that does not exist', async () => {
    await expect(backupsRestore('backup-missing.json', { yes: true })).rejects.toMatchObject({
      message: 'Backup not found: backup-missing.json',
      exitCode: 2,
    });
  });

  it('restores a backup taken before a clear', async () => {
    await service.addTask({ id: 't-1', command: 'npm test' });
    await service.clearQueue();
    const [backup] = await service.listBackups();

    await backupsRestore(backup?.name ?? '', { yes: true });

    expect(printed()).toEqual([`✓ Restored 1 task(s) from ${backup?.name}`]);
  });

  it('prints the cleanup report', async () => {
    await cleanup();

    expect(printed()).toEqual(['✓ Removed 0 completed task(s), 0 backup(s), 0 checkpoint(s)']);
  });
});
