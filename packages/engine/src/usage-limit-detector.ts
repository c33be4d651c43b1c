// =============================================================================
// Usage Limit Detection
// =============================================================================
// Scans execution-session output for signs that the agent is temporarily
// unavailable (rate limits, quotas) and works out how long to wait.

import type { BackoffSettings, DetectionResult } from '@relayq/shared';
import { DetectionAmbiguousError } from './errors.js';
import { logger as defaultLogger, type LoggerLike } from './logger.js';

/** Checked in order; the first phrase found wins. */
export const GENERIC_UNAVAILABILITY_MARKERS = [
  'usage limit',
  'rate limit',
  'too many requests',
  'please try again later',
  'request limit exceeded',
  'quota exceeded',
  'temporarily unavailable',
  'service temporarily overloaded',
  'daily usage limit',
  'hourly rate limit',
  'api quota exceeded',
] as const;

/** Phrases that introduce an explicit resume time, e.g. "blocked until 3pm". */
export const TIME_MARKER_PHRASES = [
  'available again at',
  'available tomorrow at',
  'try tomorrow at',
  'blocked until',
  'try again at',
  'wait until',
  'retry at',
  'available at',
] as const;

const TIME_MARKER_PATTERN = new RegExp(
  `\\b(${TIME_MARKER_PHRASES.map((phrase) => phrase.replace(/ /g, '\\s+')).join('|')})\\b`,
  'i',
);

const CLOCK_TIME_PATTERN = /^\s*(\d{1,2})(?::(\d{2}))?\s*([ap])\.?\s*m\b\.?|^\s*(\d{1,2}):(\d{2})\b/i;

const TOMORROW_PATTERN = /\btomorrow\b/i;

export interface ClockTime {
  hour: number;
  minute: number;
  /** The time as written, whitespace removed, e.g. "3:30pm". */
  text: string;
}

/**
 * Parse a clock time at the start of `text`. Accepts 12-hour times with a
 * meridiem ("3pm", "9:30 am", "11:15p.m.") and 24-hour times ("15:00").
 * Throws DetectionAmbiguousError when no usable time is present.
 */
export function parseClockTime(text: string): ClockTime {
  const match = text.match(CLOCK_TIME_PATTERN);
  if (!match) {
    throw new DetectionAmbiguousError(text.trim().slice(0, 40), 'no clock time follows the marker');
  }

  const [raw, meridiemHour, meridiemMinute, meridiem, plainHour, plainMinute] = match;
  const compact = raw.replace(/[\s.]/g, '').toLowerCase();

  if (meridiem) {
    const hour12 = Number(meridiemHour);
    const minute = meridiemMinute ? Number(meridiemMinute) : 0;
    if (hour12 < 1 || hour12 > 12 || minute > 59) {
      throw new DetectionAmbiguousError(compact, 'hour or minute out of range');
    }

    const isPm = meridiem.toLowerCase() === 'p';
    const hour = isPm ? (hour12 % 12) + 12 : hour12 % 12;
    return { hour, minute, text: compact };
  }

  const hour = Number(plainHour);
  const minute = Number(plainMinute);
  if (hour > 23 || minute > 59) {
    throw new DetectionAmbiguousError(compact, 'hour or minute out of range');
  }
  return { hour, minute, text: compact };
}

/**
 * Local timestamp at which a clock time next occurs. Today's occurrence is used
 * only when it is strictly in the future; `tomorrow` always means the next
 * calendar day.
 */
export function resolveResumeTime(time: Pick<ClockTime, 'hour' | 'minute'>, now: Date, tomorrow: boolean): Date {
  const candidate = new Date(now.getTime());
  candidate.setHours(time.hour, time.minute, 0, 0);

  if (tomorrow || candidate.getTime() <= now.getTime()) {
    candidate.setDate(candidate.getDate() + 1);
  }
  return candidate;
}

function lineAround(output: string, index: number): string {
  const start = output.lastIndexOf('\n', index) + 1;
  const end = output.indexOf('\n', index);
  return output.slice(start, end < 0 ? output.length : end);
}

function normalizePhrase(phrase: string): string {
  return phrase.toLowerCase().replace(/\s+/g, ' ');
}

function detectGeneric(output: string): DetectionResult | null {
  const lowered = output.toLowerCase();
  for (const marker of GENERIC_UNAVAILABILITY_MARKERS) {
    const index = lowered.indexOf(marker);
    if (index >= 0) {
      return {
        kind: 'generic',
        pattern: `generic:${marker}`,
        matchedText: output.slice(index, index + marker.length),
      };
    }
  }
  return null;
}

export interface DetectOptions {
  now?: Date;
  logger?: LoggerLike;
}

/**
 * Look for an unavailability marker in session output. Time-specific markers
 * take precedence; a time marker whose time cannot be parsed falls back to a
 * generic detection keyed on the marker phrase.
 */
export function detectUnavailability(output: string, options: DetectOptions = {}): DetectionResult | null {
  if (!output.trim()) {
    return null;
  }

  const now = options.now ?? new Date();
  const log = options.logger ?? defaultLogger;

  const markerMatch = TIME_MARKER_PATTERN.exec(output);
  if (markerMatch) {
    const phrase = normalizePhrase(markerMatch[1]);
    const afterMarker = output.slice(markerMatch.index + markerMatch[0].length);

    try {
      const time = parseClockTime(afterMarker);
      const line = lineAround(output, markerMatch.index);
      const tomorrow = TOMORROW_PATTERN.test(line);
      const resumeAt = resolveResumeTime(time, now, tomorrow);

      return {
        kind: 'time_based',
        pattern: `time_based:${phrase}`,
        matchedText: `${markerMatch[0]} ${time.text}`,
        extractedTime: time.text,
        resumeAt: resumeAt.toISOString(),
        tomorrow,
      };
    } catch (err) {
      if (!(err instanceof DetectionAmbiguousError)) {
        throw err;
      }

      log.warn(`[UsageLimit] ${err.message}; using exponential backoff`);
      return detectGeneric(output) ?? {
        kind: 'generic',
        pattern: `generic:${phrase}`,
        matchedText: markerMatch[0],
      };
    }
  }

  return detectGeneric(output);
}

/**
 * Seconds to wait for a detection. Time-specific detections wait until their
 * resume time (floored at `minTimedWaitSeconds`); generic ones back off
 * exponentially with the number of times this pattern was seen for the task.
 */
export function computeWaitSeconds(
  detection: DetectionResult,
  occurrenceCount: number,
  settings: BackoffSettings,
  now: Date = new Date(),
): number {
  if (detection.kind === 'time_based' && detection.resumeAt) {
    const remainingMs = Date.parse(detection.resumeAt) - now.getTime();
    const seconds = Math.ceil(remainingMs / 1000);
    return Math.max(settings.minTimedWaitSeconds, Number.isFinite(seconds) ? seconds : 0);
  }

  const exponent = Math.max(0, occurrenceCount - 1);
  const raw = Math.round(settings.cooldownSeconds * Math.pow(settings.factor, exponent));
  return Math.min(settings.maxWaitSeconds, Math.max(settings.minWaitSeconds, raw));
}
