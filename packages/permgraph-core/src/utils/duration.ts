/**
 * Duration Utilities
 *
 * Parses and formats the short duration strings used for temporary nodes:
 *   1w2d3h4m5s, 30m, 1d
 */

import { PermissionError } from '../errors/permission-error';

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const WEEK = 7 * DAY;

const DURATION_PATTERN = /^(?:(\d+)w)?(?:(\d+)d)?(?:(\d+)h)?(?:(\d+)m)?(?:(\d+)s)?$/;
const PERMANENT_WORDS = new Set(['permanent', 'perm', 'forever']);

/**
 * Parse a duration string into milliseconds.
 * Returns undefined for blank input, "permanent"/"perm"/"forever",
 * malformed input, or a zero duration.
 */
export function parseDuration(input: string | undefined): number | undefined {
  if (input === undefined) {
    return undefined;
  }
  const trimmed = input.trim().toLowerCase();
  if (trimmed.length === 0 || PERMANENT_WORDS.has(trimmed)) {
    return undefined;
  }

  const match = DURATION_PATTERN.exec(trimmed);
  if (!match) {
    return undefined;
  }

  const [, weeks, days, hours, minutes, seconds] = match;
  const total =
    Number(weeks ?? 0) * WEEK +
    Number(days ?? 0) * DAY +
    Number(hours ?? 0) * HOUR +
    Number(minutes ?? 0) * MINUTE +
    Number(seconds ?? 0) * SECOND;

  return total > 0 ? total : undefined;
}

/**
 * Parse a duration that must be present and positive
 */
export function requireDuration(input: string): number {
  const ms = parseDuration(input);
  if (ms === undefined) {
    throw new PermissionError(`Invalid duration: ${input}`, 'INVALID_DURATION');
  }
  return ms;
}

/**
 * Format milliseconds as "1d 2h 3m 4s"; non-positive durations are "now"
 */
export function formatDuration(ms: number): string {
  if (ms <= 0) {
    return 'now';
  }

  const totalSeconds = Math.floor(ms / SECOND);
  const days = Math.floor(totalSeconds / 86400);
  const hours = Math.floor((totalSeconds % 86400) / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (seconds > 0 || parts.length === 0) parts.push(`${seconds}s`);

  return parts.join(' ');
}

/**
 * Describe a node expiry relative to now
 */
export function formatExpiry(expiry: number | undefined, now: number = Date.now()): string {
  if (expiry === undefined) {
    return 'permanent';
  }
  const remaining = expiry - now;
  if (remaining < 0) {
    return `expired ${formatDuration(-remaining)} ago`;
  }
  if (remaining === 0) {
    return 'expires now';
  }
  return `expires in ${formatDuration(remaining)}`;
}
