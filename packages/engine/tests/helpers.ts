import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { vi } from 'vitest';
import {
  DEFAULT_BACKOFF_SETTINGS,
  DEFAULT_SCHEDULER_SETTINGS,
  type SchedulerSettings,
} from '@relayq/shared';
import type { ExecutionSession } from '../src/execution-session.js';
import type { LoggerLike } from '../src/logger.js';

export const T0 = Date.parse('2026-02-18T10:00:00.000Z');

const tempRoots: string[] = [];

export function createTempDir(prefix = 'relayq-test-'): string {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  tempRoots.push(dir);
  return dir;
}

export function cleanupTempDirs(): void {
  for (const root of tempRoots) {
    rmSync(root, { recursive: true, force: true });
  }
  tempRoots.length = 0;
}

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies LoggerLike;
}

export interface TestClock {
  now: () => Date;
  nowMs: () => number;
  advance: (ms: number) => void;
  set: (ms: number) => void;
}

export function createClock(startMs: number = T0): TestClock {
  let current = startMs;
  return {
    now: () => new Date(current),
    nowMs: () => current,
    advance: (ms) => {
      current += ms;
    },
    set: (ms) => {
      current = ms;
    },
  };
}

export function createTestSettings(queueDir: string, overrides: Partial<SchedulerSettings> = {}): SchedulerSettings {
  return {
    ...DEFAULT_SCHEDULER_SETTINGS,
    queueDir,
    backoff: { ...DEFAULT_BACKOFF_SETTINGS },
    ...overrides,
  };
}

/** In-memory stand-in for a terminal session: output only grows and typed commands are echoed, like a pane. */
export class FakeSession implements ExecutionSession {
  readonly sent: string[] = [];
  responsive = true;
  recoverCalls = 0;
  /** Whether recover() brings the session back. */
  recoverable = true;
  onSend: ((command: string, session: FakeSession) => void) | null = null;
  /** Runs before each read with its 1-based number, e.g. to answer after a few polls. */
  onRead: ((read: number, session: FakeSession) => void) | null = null;
  reads = 0;
  private output = '';

  async send(command: string): Promise<void> {
    this.sent.push(command);
    this.print(`> ${command}`);
    this.onSend?.(command, this);
  }

  async readRecentOutput(): Promise<string> {
    this.reads += 1;
    this.onRead?.(this.reads, this);
    return this.output;
  }

  async isResponsive(): Promise<boolean> {
    return this.responsive;
  }

  async recover(): Promise<void> {
    this.recoverCalls += 1;
    this.responsive = this.recoverable;
  }

  print(text: string): void {
    this.output = this.output ? `${this.output}\n${text}` : text;
  }
}
