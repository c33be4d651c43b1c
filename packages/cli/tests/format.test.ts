import { beforeAll, describe, expect, it } from 'vitest';
import chalk from 'chalk';
import type { BackoffState } from '@relayq/shared';
import {
  describeCycleOutcome,
  formatBytes,
  formatDuration,
  formatRelativeTime,
  renderBackoffState,
  renderCleanupReport,
} from '../src/utils/format.js';

beforeAll(() => {
  chalk.level = 0;
});

describe('formatDuration', () => {
  it('picks the two largest units', () => {
    expect(formatDuration(undefined)).toBe('-');
    expect(formatDuration(45)).toBe('45s');
    expect(formatDuration(450)).toBe('7m 30s');
    expect(formatDuration(5400)).toBe('1h 30m');
  });
});

describe('formatRelativeTime', () => {
  it('describes recent times relative to now', () => {
    const now = new Date('2026-02-18T10:00:00.000Z');
    expect(formatRelativeTime('2026-02-18T09:59:30.000Z', now)).toBe('just now');
    expect(formatRelativeTime('2026-02-18T09:15:00.000Z', now)).toBe('45m ago');
    expect(formatRelativeTime('2026-02-18T04:00:00.000Z', now)).toBe('6h ago');
    expect(formatRelativeTime('2026-02-16T10:00:00.000Z', now)).toBe('2d ago');
  });
});

describe('formatBytes', () => {
  it('scales to the nearest unit', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
  });
});

describe('renderCleanupReport', () => {
  it('lists each kind of removal', () => {
    expect(renderCleanupReport({ removedCompletedTasks: 3, removedBackups: 1, removedCheckpoints: 0 }))
      .toBe('Removed 3 completed task(s), 1 backup(s), 0 checkpoint(s)');
  });
});

describe('renderBackoffState', () => {
  const state: BackoffState = {
    active: true,
    detectedPattern: 'generic:rate limit',
    occurrenceCount: 2,
    taskId: 't-1',
    waitSeconds: 450,
    pauseStartedAt: '2026-02-18T10:00:00.000Z',
    estimatedResumeAt: '2026-02-18T10:07:30.000Z',
  };

  it('shows the time left until the wait ends', () => {
    const rendered = renderBackoffState(state, new Date('2026-02-18T10:00:00.000Z'));

    expect(rendered.startsWith('generic:rate limit (occurrence 2), resumes ')).toBe(true);
    expect(rendered.endsWith('(in 7m 30s)')).toBe(true);
  });

  it('says the wait is due once it has passed', () => {
    expect(renderBackoffState(state, new Date('2026-02-18T11:00:00.000Z')).endsWith('(due now)')).toBe(true);
  });
});

describe('describeCycleOutcome', () => {
  it.each([
    [{ kind: 'idle' as const }, 'No eligible task'],
    [{ kind: 'resumed' as const }, 'Usage-limit wait over; queue resumed'],
    [{ kind: 'completed' as const, taskId: 't-1' }, 'Completed t-1'],
    [{ kind: 'paused' as const, reason: 'manual', resumeAt: null }, 'Queue paused (manual)'],
    [{ kind: 'conflict' as const, taskId: 't-1' }, 'Task t-1 changed underneath the scheduler; skipped this cycle'],
    [{ kind: 'busy' as const, taskId: 't-2', runningTaskId: 't-1' }, 'Task t-1 is running elsewhere; t-2 waits'],
    [{ kind: 'stopped' as const, taskId: null }, 'Stopped'],
    [{ kind: 'error' as const, message: 'disk full' }, 'Cycle failed: disk full'],
  ])('describes %o', (outcome, text) => {
    expect(describeCycleOutcome(outcome)).toBe(text);
  });

  it('describes failures by what happens next', () => {
    expect(describeCycleOutcome({
      kind: 'failed',
      taskId: 't-1',
      failure: { outcome: 'retried', taskId: 't-1', retryCount: 2, delaySeconds: 600, retryAfter: '2026-02-18T10:10:00.000Z' },
    })).toBe('Task t-1 failed; retry 2 in 10m 0s');
    expect(describeCycleOutcome({
      kind: 'failed',
      taskId: 't-1',
      failure: { outcome: 'permanently_failed', taskId: 't-1', retryCount: 3, queuePaused: true },
    })).toBe('Task t-1 failed permanently; queue paused');
  });

  it('mentions rate-limit waits', () => {
    expect(describeCycleOutcome({
      kind: 'rate_limited',
      taskId: 't-1',
      waitSeconds: 300,
      resumeAt: '2026-02-18T10:05:00.000Z',
    })).toBe('Rate limited on t-1; waiting 5m 0s');
  });
});
