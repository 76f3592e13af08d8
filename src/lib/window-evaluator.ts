/**
 * Window Evaluator
 * Single start→stop interval per day. Both endpoints are inside the window.
 */

import type { NormalizedInstant, WindowState } from '@/types/schedule';
import { isAfter, isBefore } from '@/lib/time-normalizer';

/**
 * 'inactive' once now is strictly past stop or strictly before start,
 * 'active' otherwise.
 *
 * A window whose start is later than its stop (e.g. 22:00 → 06:00) is never
 * active: no wrap-around across midnight.
 */
export function evaluateWindow(
  now: NormalizedInstant,
  start: NormalizedInstant,
  stop: NormalizedInstant
): WindowState {
  if (isBefore(stop, now) || isAfter(start, now)) {
    return 'inactive';
  }
  return 'active';
}

export function isOvernightWindow(start: NormalizedInstant, stop: NormalizedInstant): boolean {
  return isAfter(start, stop);
}
