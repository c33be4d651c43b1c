import { afterEach, describe, expect, it } from 'vitest';
import { writeFileSync } from 'fs';
import {
  deletePauseMarker,
  normalizeCheckpoint,
  normalizePauseMarker,
  readPauseMarker,
} from '../src/backoff-markers.js';
import { PersistenceError } from '../src/errors.js';
import { getPauseMarkerPath } from '../src/queue-storage.js';
import { cleanupTempDirs, createTempDir } from './helpers.js';

afterEach(() => {
  cleanupTempDirs();
});

describe('normalizePauseMarker', () => {
  it('fills in missing optional fields', () => {
    expect(normalizePauseMarker({
      pauseTime: '2026-02-18T10:00:00.000Z',
      estimatedResumeTime: '2026-02-18T10:05:00.000Z',
    })).toEqual({
      pauseTime: '2026-02-18T10:00:00.000Z',
      estimatedResumeTime: '2026-02-18T10:05:00.000Z',
      estimatedWaitSeconds: 0,
      taskId: null,
      pattern: 'unknown',
      occurrenceCount: 1,
      pauseReason: 'usage_limit',
      ownerId: 'unknown',
    });
  });

  it('rejects markers without usable timestamps', () => {
    expect(normalizePauseMarker({ pauseTime: 'yesterday', estimatedResumeTime: '2026-02-18T10:05:00.000Z' })).toBeNull();
    expect(normalizePauseMarker({ pauseTime: '2026-02-18T10:00:00.000Z' })).toBeNull();
    expect(normalizePauseMarker('marker')).toBeNull();
  });
});

describe('normalizeCheckpoint', () => {
  it('defaults the resume time to the checkpoint time', () => {
    expect(normalizeCheckpoint({ taskId: 't-1', checkpointTime: '2026-02-18T10:00:00.000Z', extractedTime: '3pm' })).toEqual({
      taskId: 't-1',
      reason: 'usage_limit',
      checkpointTime: '2026-02-18T10:00:00.000Z',
      pattern: 'unknown',
      waitSeconds: 0,
      estimatedResumeTime: '2026-02-18T10:00:00.000Z',
      occurrenceCount: 1,
      extractedTime: '3pm',
    });
  });
});

describe('pause marker file', () => {
  it('reads a missing marker as none and reports deletes', async () => {
    const queueDir = createTempDir();

    expect(await readPauseMarker(queueDir)).toBeNull();
    expect(await deletePauseMarker(queueDir)).toBe(false);
  });

  it('raises a persistence error for an unreadable marker', async () => {
    const queueDir = createTempDir();
    writeFileSync(getPauseMarkerPath(queueDir), '{ truncated');

    await expect(readPauseMarker(queueDir)).rejects.toBeInstanceOf(PersistenceError);
  });
});
