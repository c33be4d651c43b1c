import { readdirSync } from 'fs';
import { afterEach, describe, expect, it } from 'vitest';
import type { DetectionResult } from '@relayq/shared';
import { BackoffController, readBackoffState } from '../src/backoff-controller.js';
import { readCheckpoint, readPauseMarker } from '../src/backoff-markers.js';
import { getCheckpointDir } from '../src/queue-storage.js';
import { QueueStore } from '../src/queue-store.js';
import { T0, cleanupTempDirs, createClock, createTempDir, createTestLogger } from './helpers.js';

const rateLimit: DetectionResult = { kind: 'generic', pattern: 'generic:rate limit', matchedText: 'rate limit' };

function setup(options: { historyRetentionHours?: number } = {}) {
  const queueDir = createTempDir();
  const clock = createClock();
  const logger = createTestLogger();
  const store = new QueueStore({ queueDir, logger, now: clock.now });
  const createController = () => new BackoffController({
    queueDir,
    store,
    logger,
    now: clock.now,
    ownerId: 'owner-test',
    historyRetentionHours: options.historyRetentionHours,
  });
  return { queueDir, clock, store, controller: createController(), createController };
}

afterEach(() => {
  cleanupTempDirs();
});

describe('BackoffController', () => {
  it('pauses the queue and records the marker and checkpoint', async () => {
    const { controller, store, queueDir } = setup();

    const state = await controller.handleDetection('t-1', rateLimit);

    expect(state).toEqual({
      active: true,
      detectedPattern: 'generic:rate limit',
      occurrenceCount: 1,
      taskId: 't-1',
      waitSeconds: 300,
      pauseStartedAt: new Date(T0).toISOString(),
      estimatedResumeAt: new Date(T0 + 300_000).toISOString(),
    });

    expect(await store.load()).toMatchObject({ paused: true, pauseReason: 'usage_limit' });
    expect(await readPauseMarker(queueDir)).toMatchObject({
      pauseTime: new Date(T0).toISOString(),
      estimatedWaitSeconds: 300,
      taskId: 't-1',
      pattern: 'generic:rate limit',
      pauseReason: 'usage_limit',
      ownerId: 'owner-test',
    });
    expect(await readCheckpoint(queueDir, 't-1')).toMatchObject({
      taskId: 't-1',
      reason: 'usage_limit',
      waitSeconds: 300,
      occurrenceCount: 1,
    });
  });

  it('backs off further on repeats and keeps the original pause start', async () => {
    const { controller, clock, queueDir } = setup();

    await controller.handleDetection('t-1', rateLimit);
    clock.advance(10_000);
    const second = await controller.handleDetection('t-1', rateLimit);

    expect(second.occurrenceCount).toBe(2);
    expect(second.waitSeconds).toBe(450);
    expect(second.pauseStartedAt).toBe(new Date(T0).toISOString());
    expect(second.estimatedResumeAt).toBe(new Date(T0 + 10_000 + 450_000).toISOString());
    expect((await readPauseMarker(queueDir))?.estimatedWaitSeconds).toBe(450);
  });

  it('pauses idempotently when the same request is repeated', async () => {
    const { controller, queueDir } = setup();
    const first = await controller.handleDetection('t-1', rateLimit);
    const request = { waitSeconds: first.waitSeconds, taskId: 't-1', detection: rateLimit };

    await controller.pause(request);
    const repeated = await controller.pause(request);

    expect(repeated).toEqual(first);
    expect(readdirSync(getCheckpointDir(queueDir))).toEqual(['usage-limit-t-1.json']);
    expect(await readCheckpoint(queueDir, 't-1')).toMatchObject({ occurrenceCount: 1 });
    expect(await readPauseMarker(queueDir)).toMatchObject({ occurrenceCount: 1 });
    expect(controller.getOccurrenceCount('t-1', 'generic:rate limit')).toBe(1);
    expect(controller.getStatistics().totalOccurrences).toBe(1);
    expect(controller.getHistory()).toHaveLength(1);
  });

  it('counts occurrences per task and pattern', async () => {
    const { controller } = setup();

    await controller.handleDetection('t-1', rateLimit);
    const other = await controller.handleDetection('t-2', rateLimit);

    expect(other.waitSeconds).toBe(300);
    expect(controller.getOccurrenceCount('t-1', 'generic:rate limit')).toBe(1);
    expect(controller.getOccurrenceCount('t-2', 'generic:rate limit')).toBe(1);
    expect(controller.getStatistics()).toMatchObject({
      active: true,
      totalOccurrences: 2,
      uniquePatterns: 2,
      lastOccurrenceAt: new Date(T0).toISOString(),
    });
  });

  it('reports whether the wait is over without side effects', async () => {
    const { controller } = setup();
    expect(controller.isWaitComplete(new Date(T0))).toBe(true);

    await controller.handleDetection('t-1', rateLimit);

    expect(controller.isWaitComplete(new Date(T0 + 299_000))).toBe(false);
    expect(controller.getRemainingSeconds(new Date(T0 + 100_000))).toBe(200);
    expect(controller.isWaitComplete(new Date(T0 + 300_000))).toBe(true);
    expect(controller.isActive()).toBe(true);
  });

  it('clears the marker and checkpoint and unpauses on resume', async () => {
    const { controller, store, queueDir } = setup();
    await controller.handleDetection('t-1', rateLimit);

    await controller.resume();

    expect(controller.isActive()).toBe(false);
    expect(controller.getState()).toBeNull();
    expect(await readPauseMarker(queueDir)).toBeNull();
    expect(await readCheckpoint(queueDir, 't-1')).toBeNull();
    expect(await store.load()).toMatchObject({ paused: false, pauseReason: null, pausedAt: null });
  });

  it('leaves an operator pause in place when resuming', async () => {
    const { controller, store } = setup();
    await controller.handleDetection('t-1', rateLimit);
    await store.setPaused(true, 'manual');

    await controller.resume();

    expect(await store.load()).toMatchObject({ paused: true, pauseReason: 'manual' });
  });

  it('restores an outstanding wait written by another instance', async () => {
    const { controller, createController, queueDir } = setup();
    await controller.handleDetection('t-1', rateLimit);

    const restarted = createController();
    const restored = await restarted.restore();

    expect(restored).toMatchObject({ active: true, taskId: 't-1', waitSeconds: 300 });
    expect(await readBackoffState(queueDir)).toEqual(restored);
    expect(restarted.getOccurrenceCount('t-1', 'generic:rate limit')).toBe(1);
    expect((await restarted.handleDetection('t-1', rateLimit)).waitSeconds).toBe(450);
  });

  it('restores nothing when no marker exists', async () => {
    const { controller } = setup();

    expect(await controller.restore()).toBeNull();
    expect(controller.isActive()).toBe(false);
  });

  it('waits until an explicit resume time', async () => {
    const { controller } = setup();
    const detection: DetectionResult = {
      kind: 'time_based',
      pattern: 'time_based:available again at',
      matchedText: 'available again at 11am',
      extractedTime: '11am',
      resumeAt: new Date(T0 + 3_600_000).toISOString(),
    };

    const state = await controller.handleDetection('t-1', detection);

    expect(state.waitSeconds).toBe(3600);
    expect(controller.getHistory()).toEqual([
      {
        at: new Date(T0).toISOString(),
        key: 't-1:time_based:available again at',
        taskId: 't-1',
        pattern: 'time_based:available again at',
        extractedTime: '11am',
        waitSeconds: 3600,
      },
    ]);
  });

  it('prunes history past the retention window', async () => {
    const { controller, clock } = setup({ historyRetentionHours: 1 });
    await controller.handleDetection('t-1', rateLimit);

    clock.advance(2 * 60 * 60 * 1000);

    expect(controller.pruneHistory()).toBe(1);
    expect(controller.getHistory()).toEqual([]);
  });

  it('forgets counts and the marker on reset', async () => {
    const { controller, queueDir } = setup();
    await controller.handleDetection('t-1', rateLimit);

    await controller.resetStatistics();

    expect(controller.getStatistics()).toMatchObject({ active: false, totalOccurrences: 0, uniquePatterns: 0 });
    expect(await readPauseMarker(queueDir)).toBeNull();
  });
});
