/**
 * Unit tests for window-evaluator module
 */

import { describe, it, expect } from 'vitest';
import { evaluateWindow, isOvernightWindow } from '@/lib/window-evaluator';
import { anchorWallClock } from '@/lib/time-normalizer';
import { REFERENCE_DATE_UTC, type NormalizedInstant } from '@/types/schedule';

const PRAGUE_WINTER: NormalizedInstant = {
  hour: 0,
  minute: 0,
  timeZone: 'Europe/Prague',
  utcOffsetMinutes: 60,
  epochMs: REFERENCE_DATE_UTC - 60 * 60_000,
};

function at(hour: number, minute = 0): NormalizedInstant {
  return anchorWallClock({ hour, minute }, PRAGUE_WINTER);
}

describe('window-evaluator', () => {
  describe('evaluateWindow (08:00 to 16:00)', () => {
    const start = at(8);
    const stop = at(16);

    it('should be active inside the window', () => {
      expect(evaluateWindow(at(12), start, stop)).toBe('active');
    });

    it('should include both endpoints', () => {
      expect(evaluateWindow(at(8), start, stop)).toBe('active');
      expect(evaluateWindow(at(16), start, stop)).toBe('active');
    });

    it('should be inactive one minute outside either endpoint', () => {
      expect(evaluateWindow(at(7, 59), start, stop)).toBe('inactive');
      expect(evaluateWindow(at(16, 1), start, stop)).toBe('inactive');
    });

    it('should be inactive late in the evening', () => {
      expect(evaluateWindow(at(20), start, stop)).toBe('inactive');
    });
  });

  describe('overnight windows', () => {
    const start = at(22);
    const stop = at(6);

    it('should never be active when start is after stop', () => {
      expect(evaluateWindow(at(23), start, stop)).toBe('inactive');
      expect(evaluateWindow(at(3), start, stop)).toBe('inactive');
      expect(evaluateWindow(at(12), start, stop)).toBe('inactive');
    });

    it('should be detected', () => {
      expect(isOvernightWindow(start, stop)).toBe(true);
      expect(isOvernightWindow(stop, start)).toBe(false);
    });
  });

  describe('zero-length windows', () => {
    it('should be active only at the single shared minute', () => {
      const noon = at(12);

      expect(evaluateWindow(at(12), noon, noon)).toBe('active');
      expect(evaluateWindow(at(12, 1), noon, noon)).toBe('inactive');
      expect(isOvernightWindow(noon, noon)).toBe(false);
    });
  });
});
