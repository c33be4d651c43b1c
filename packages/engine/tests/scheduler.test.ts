import { afterEach, describe, expect, it } from 'vitest';
import type { CycleOutcome, DetectionResult, SchedulerSettings, Task } from '@relayq/shared';
import { BackoffController } from '../src/backoff-controller.js';
import { PersistenceError } from '../src/errors.js';
import { loadExecutionLeases, upsertExecutionLease } from '../src/execution-lease-service.js';
import { QueueCache, type QueueCacheOptions } from '../src/queue-cache.js';
import { QueueStore } from '../src/queue-store.js';
import { Scheduler } from '../src/scheduler.js';
import {
  FakeSession,
  T0,
  cleanupTempDirs,
  createClock,
  createTempDir,
  createTestLogger,
  createTestSettings,
} from './helpers.js';

function markerFor(taskId: string): string {
  return `###TASK_COMPLETE:${taskId}###`;
}

/** The line the scheduler types for a task. */
function dispatched(command: string, taskId = 't-1'): string {
  return `${command} (When this task is complete, output exactly: ${markerFor(taskId)})`;
}

/** Offers whatever task it is given, as a cache that missed a write would. */
class StaleCache extends QueueCache {
  constructor(options: QueueCacheOptions, private readonly offered: { task: Task | null }) {
    super(options);
  }

  async getNextPending(): Promise<Task | null> {
    return this.offered.task ? { ...this.offered.task } : null;
  }
}

class DiskFullStore extends QueueStore {
  async claim(): Promise<Task> {
    throw new PersistenceError('write', this.documentPath, 'disk full');
  }
}

interface SetupOptions {
  settings?: Partial<SchedulerSettings>;
  store?: (queueDir: string, now: () => Date) => QueueStore;
  cache?: (options: QueueCacheOptions) => QueueCache;
  onCycle?: (outcome: CycleOutcome) => void;
}

function setup(options: SetupOptions = {}) {
  const queueDir = createTempDir();
  const clock = createClock();
  const logger = createTestLogger();
  const settings = createTestSettings(queueDir, options.settings);
  const store = options.store?.(queueDir, clock.now) ?? new QueueStore({ queueDir, logger, now: clock.now });
  const cacheOptions: QueueCacheOptions = { store, logger, now: clock.now };
  const cache = options.cache?.(cacheOptions) ?? new QueueCache(cacheOptions);
  const backoff = new BackoffController({
    queueDir,
    store,
    settings: settings.backoff,
    logger,
    now: clock.now,
    ownerId: 'owner-test',
  });
  const session = new FakeSession();
  const sleeps: number[] = [];

  const scheduler = new Scheduler({
    store,
    cache,
    backoff,
    session,
    settings,
    ownerId: 'owner-test',
    logger,
    now: clock.now,
    sleep: async (ms) => {
      sleeps.push(ms);
      clock.advance(ms);
    },
    onCycle: options.onCycle,
  });

  return { queueDir, clock, logger, settings, store, cache, backoff, session, sleeps, scheduler };
}

function completeOn(command: string, taskId = 't-1') {
  return (sent: string, session: FakeSession) => {
    if (sent === dispatched(command, taskId)) session.print(`done\n${markerFor(taskId)}`);
  };
}

afterEach(() => {
  cleanupTempDirs();
});

describe('Scheduler.runCycle', () => {
  it('resets the context, dispatches the task and marks it completed', async () => {
    const { store, session, scheduler, sleeps, queueDir } = setup();
    await store.append({ id: 't-1', command: 'npm test' });
    session.onSend = completeOn('npm test');

    const outcome = await scheduler.runCycle();

    expect(outcome).toEqual({ kind: 'completed', taskId: 't-1' });
    expect(session.sent).toEqual(['/clear', dispatched('npm test')]);
    expect(sleeps).toEqual([2_000]);
    expect(await store.get('t-1')).toMatchObject({
      status: 'completed',
      startedAt: new Date(T0).toISOString(),
      completedAt: new Date(T0 + 2_000).toISOString(),
    });
    expect((await store.load()).statistics.totalCompleted).toBe(1);
    expect(await loadExecutionLeases(queueDir)).toEqual({});
  });

  it('skips the context reset when the task opts out', async () => {
    const { store, session, scheduler } = setup();
    await store.append({ id: 't-1', command: 'npm test', clearContext: false });
    session.onSend = completeOn('npm test');

    await scheduler.runCycle();

    expect(session.sent).toEqual([dispatched('npm test')]);
  });

  it('renders reference tasks into their slash commands', async () => {
    const { store, session, scheduler } = setup({ settings: { clearContextBetweenTasks: false } });
    await store.append({ id: 'i-1', type: 'issue_reference', reference: '42' });
    session.onSend = completeOn('/dev 42', 'i-1');

    expect(await scheduler.runCycle()).toEqual({ kind: 'completed', taskId: 'i-1' });
    expect(session.sent).toEqual([dispatched('/dev 42', 'i-1')]);
  });

  it('runs a task whose command mentions a rate limit', async () => {
    const command = 'Fix the rate limit handling in the API client';
    const { store, session, scheduler, backoff } = setup();
    await store.append({ id: 't-1', command });
    // Read 1 is the pre-dispatch baseline; the agent answers on the second poll.
    session.onRead = (read, s) => {
      if (read === 3) s.print(`done\n${markerFor('t-1')}`);
    };

    expect(await scheduler.runCycle()).toEqual({ kind: 'completed', taskId: 't-1' });
    expect(session.reads).toBe(3);
    expect(backoff.isActive()).toBe(false);
    expect((await store.load()).paused).toBe(false);
  });

  it('does not complete a task on the marker in its own command', async () => {
    const { store, scheduler } = setup();
    await store.append({ id: 't-1', command: `Refactor the parser, then print ${markerFor('t-1')}`, timeoutSeconds: 10 });

    const outcome = await scheduler.runCycle();

    expect(outcome.kind).toBe('failed');
    expect(await store.get('t-1')).toMatchObject({
      status: 'pending',
      lastError: 'Task t-1 did not complete within 10s',
    });
  });

  it('reports idle when nothing is eligible', async () => {
    const { scheduler } = setup();

    expect(await scheduler.runCycle()).toEqual({ kind: 'idle' });
  });

  it('does nothing while the queue is paused by an operator', async () => {
    const { store, session, scheduler } = setup();
    await store.append({ id: 't-1', command: 'npm test' });
    await store.setPaused(true, 'manual');

    expect(await scheduler.runCycle()).toEqual({ kind: 'paused', reason: 'manual', resumeAt: null });
    expect(session.sent).toEqual([]);
  });

  it('waits out a usage limit and then runs the task again', async () => {
    const { store, session, scheduler, clock, backoff } = setup();
    await store.append({ id: 't-1', command: 'npm test' });
    session.onSend = (sent, s) => {
      if (sent === dispatched('npm test')) s.print('Usage limit reached. Please try again later.');
    };

    const resumeAt = new Date(T0 + 2_000 + 300_000).toISOString();
    expect(await scheduler.runCycle()).toEqual({ kind: 'rate_limited', taskId: 't-1', waitSeconds: 300, resumeAt });
    expect(await store.get('t-1')).toMatchObject({ status: 'pending', retryCount: 0, lastError: 'Unavailable: Usage limit' });
    expect(await store.load()).toMatchObject({ paused: true, pauseReason: 'usage_limit' });

    expect(await scheduler.runCycle()).toEqual({ kind: 'paused', reason: 'usage_limit', resumeAt });

    clock.advance(300_000);
    expect(await scheduler.runCycle()).toEqual({ kind: 'resumed' });
    expect(backoff.isActive()).toBe(false);

    session.onSend = completeOn('npm test');
    expect(await scheduler.runCycle()).toEqual({ kind: 'completed', taskId: 't-1' });
    expect(session.sent).toEqual(['/clear', dispatched('npm test'), '/clear', dispatched('npm test')]);
  });

  it('honours a usage-limit wait recorded by another instance', async () => {
    const { store, scheduler, queueDir, logger, clock } = setup();
    const detection: DetectionResult = { kind: 'generic', pattern: 'generic:rate limit', matchedText: 'rate limit' };
    const other = new BackoffController({ queueDir, store, logger, now: clock.now, ownerId: 'owner-other' });
    await other.handleDetection('t-9', detection);

    expect(await scheduler.runCycle()).toEqual({
      kind: 'paused',
      reason: 'usage_limit',
      resumeAt: new Date(T0 + 300_000).toISOString(),
    });
  });

  it('drops its wait when an operator resumes the queue', async () => {
    const { store, session, scheduler, backoff } = setup();
    await store.append({ id: 't-1', command: 'npm test' });
    session.onSend = (sent, s) => {
      if (sent === dispatched('npm test')) s.print('rate limit exceeded');
    };
    await scheduler.runCycle();
    expect(backoff.isActive()).toBe(true);

    await store.setPaused(false);
    session.onSend = completeOn('npm test');

    expect(await scheduler.runCycle()).toEqual({ kind: 'completed', taskId: 't-1' });
    expect(backoff.isActive()).toBe(false);
  });

  it('counts a timeout as a failed attempt and schedules a retry', async () => {
    const { store, scheduler, sleeps } = setup();
    await store.append({ id: 't-1', command: 'npm test', timeoutSeconds: 10 });

    const outcome = await scheduler.runCycle();

    expect(outcome).toEqual({
      kind: 'failed',
      taskId: 't-1',
      failure: {
        outcome: 'retried',
        taskId: 't-1',
        retryCount: 1,
        delaySeconds: 300,
        retryAfter: new Date(T0 + 12_000 + 300_000).toISOString(),
      },
    });
    expect(sleeps).toEqual([2_000, 5_000, 5_000]);
    expect(await store.get('t-1')).toMatchObject({
      status: 'pending',
      lastError: 'Task t-1 did not complete within 10s',
    });
    expect(await scheduler.runCycle()).toEqual({ kind: 'idle' });
  });

  it('recovers an unresponsive session before dispatching', async () => {
    const { store, session, scheduler } = setup();
    await store.append({ id: 't-1', command: 'npm test' });
    session.responsive = false;
    session.onSend = completeOn('npm test');

    expect(await scheduler.runCycle()).toEqual({ kind: 'completed', taskId: 't-1' });
    expect(session.recoverCalls).toBe(1);
  });

  it('fails the attempt when the session cannot be recovered', async () => {
    const { store, session, scheduler } = setup();
    await store.append({ id: 't-1', command: 'npm test' });
    session.responsive = false;
    session.recoverable = false;

    const outcome = await scheduler.runCycle();

    expect(outcome.kind).toBe('failed');
    expect(session.sent).toEqual([]);
    expect((await store.get('t-1'))?.lastError).toBe('Execution session is unresponsive');
  });

  it('reports a conflict when the task was claimed elsewhere', async () => {
    const offered: { task: Task | null } = { task: null };
    const { store, session, scheduler } = setup({ cache: (options) => new StaleCache(options, offered) });
    offered.task = await store.append({ id: 't-1', command: 'npm test' });
    await store.updateStatus('t-1', 'in_progress');

    expect(await scheduler.runCycle()).toEqual({ kind: 'conflict', taskId: 't-1' });
    expect(session.sent).toEqual([]);
    expect((await store.get('t-1'))?.status).toBe('in_progress');
  });

  it('waits while another instance is running a task', async () => {
    const { store, session, scheduler, queueDir, logger, clock } = setup();
    await store.append({ id: 't-1', command: 'npm run build' });
    await store.append({ id: 't-2', command: 'npm test' });
    const other = new QueueStore({ queueDir, logger, now: clock.now });
    await other.claim('t-1', () => false, { startedAt: clock.now().toISOString() });
    await upsertExecutionLease(queueDir, 't-1', 'owner-other', clock.now());

    expect(await scheduler.runCycle()).toEqual({ kind: 'busy', taskId: 't-2', runningTaskId: 't-1' });
    expect(session.sent).toEqual([]);
    expect((await store.get('t-2'))?.status).toBe('pending');
  });

  it('claims the next task once the other instance stops heartbeating', async () => {
    const { store, session, scheduler, queueDir, logger, clock } = setup({ settings: { clearContextBetweenTasks: false } });
    await store.append({ id: 't-1', command: 'npm run build' });
    await store.append({ id: 't-2', command: 'npm test' });
    const other = new QueueStore({ queueDir, logger, now: clock.now });
    await other.claim('t-1', () => false, { startedAt: clock.now().toISOString() });
    await upsertExecutionLease(queueDir, 't-1', 'owner-other', clock.now());
    clock.advance(121_000);
    session.onSend = completeOn('npm test', 't-2');

    expect(await scheduler.runCycle()).toEqual({ kind: 'completed', taskId: 't-2' });
    expect(session.sent).toEqual([dispatched('npm test', 't-2')]);
  });

  it('pauses and stops when the queue document cannot be written', async () => {
    const { store, scheduler } = setup({
      store: (queueDir, now) => new DiskFullStore({ queueDir, logger: createTestLogger(), now }),
    });
    await store.append({ id: 't-1', command: 'npm test' });

    const outcome = await scheduler.runCycle();

    expect(outcome).toEqual({ kind: 'error', message: `Queue write failed for ${store.documentPath}: disk full` });
    expect(await store.load()).toMatchObject({ paused: true, pauseReason: 'persistence_error' });
  });
});

describe('Scheduler loop', () => {
  it('runs cycles until asked to stop', async () => {
    const outcomes: CycleOutcome[] = [];
    let stop: () => void = () => undefined;
    const { scheduler, sleeps } = setup({
      onCycle: (outcome) => {
        outcomes.push(outcome);
        stop();
      },
    });
    stop = () => scheduler.requestStop();

    await scheduler.start();

    expect(outcomes).toEqual([{ kind: 'idle' }]);
    expect(sleeps).toEqual([]);
    expect(scheduler.isRunning()).toBe(false);
    expect(scheduler.getCycleCount()).toBe(1);
  });

  it('requeues a task left running by a previous process on startup', async () => {
    const { store, scheduler } = setup();
    await store.append({ id: 't-1', command: 'npm test' });
    await store.updateStatus('t-1', 'in_progress');

    const recovery = await scheduler.initialize();

    expect(recovery.recoveredTaskIds).toEqual(['t-1']);
    expect(await store.get('t-1')).toMatchObject({
      status: 'pending',
      lastError: 'Recovered after interruption (missing lease metadata)',
    });
  });

  it('spaces cycles according to their outcome', () => {
    const { scheduler } = setup();

    expect(scheduler.delayAfter({ kind: 'completed', taskId: 't-1' })).toBe(30_000);
    expect(scheduler.delayAfter({ kind: 'idle' })).toBe(60_000);
    expect(scheduler.delayAfter({ kind: 'conflict', taskId: 't-1' })).toBe(1_000);
    expect(scheduler.delayAfter({ kind: 'busy', taskId: 't-2', runningTaskId: 't-1' })).toBe(60_000);
    expect(scheduler.delayAfter({ kind: 'resumed' })).toBe(0);
    expect(scheduler.delayAfter({ kind: 'paused', reason: 'manual', resumeAt: null })).toBe(60_000);
    expect(scheduler.delayAfter({
      kind: 'paused',
      reason: 'usage_limit',
      resumeAt: new Date(T0 + 5_000).toISOString(),
    })).toBe(5_000);
  });
});
