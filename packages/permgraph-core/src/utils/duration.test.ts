import { describe, expect, it } from 'vitest';
import { PermissionError } from '../errors/permission-error';
import { formatDuration, formatExpiry, parseDuration, requireDuration } from './duration';

describe('duration', () => {
  it('should parse combined units', () => {
    expect(parseDuration('30m')).toBe(30 * 60_000);
    expect(parseDuration('1d')).toBe(86_400_000);
    expect(parseDuration('1w2d3h4m5s')).toBe(
      ((7 + 2) * 86_400 + 3 * 3600 + 4 * 60 + 5) * 1000
    );
    expect(parseDuration(' 2H ')).toBe(7_200_000);
  });

  it('should return undefined for permanent, blank, malformed or zero input', () => {
    for (const input of [undefined, '', '  ', 'permanent', 'perm', 'Forever', '5x', 'm5', '0s']) {
      expect(parseDuration(input)).toBeUndefined();
    }
  });

  it('should require a positive duration', () => {
    expect(requireDuration('10s')).toBe(10_000);
    expect(() => requireDuration('soon')).toThrow(PermissionError);
    expect(() => requireDuration('soon')).toThrow('Invalid duration: soon');
  });

  it('should format durations', () => {
    expect(formatDuration(0)).toBe('now');
    expect(formatDuration(500)).toBe('0s');
    expect(formatDuration(90_061_000)).toBe('1d 1h 1m 1s');
    expect(formatDuration(3_600_000)).toBe('1h');
  });

  it('should describe expiry relative to now', () => {
    expect(formatExpiry(undefined)).toBe('permanent');
    expect(formatExpiry(1000, 1000)).toBe('expires now');
    expect(formatExpiry(61_000, 1000)).toBe('expires in 1m');
    expect(formatExpiry(1000, 3000)).toBe('expired 2s ago');
  });
});
