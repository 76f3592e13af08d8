/**
 * Action Decider
 * Compares the window state implied by the schedule with the observed
 * run-state. Returns 'no-action' whenever the two already agree.
 */

import type {
  ClockReading,
  CronJobAction,
  DeploymentAction,
  DeploymentScheduleSpec,
  ObservedCronJobState,
  ObservedDeploymentState,
  ScheduleSpec,
  WindowState,
} from '@/types/schedule';
import { anchorWallClock } from '@/lib/time-normalizer';
import { evaluateWindow } from '@/lib/window-evaluator';
import { matchesDay } from '@/lib/schedule-parser';

/**
 * Window state for the spec at the given clock reading, or null when
 * today is not a scheduled day.
 */
export function scheduledWindowState(spec: ScheduleSpec, clock: ClockReading): WindowState | null {
  if (!matchesDay(spec.days, clock.today)) return null;

  const start = anchorWallClock(spec.startTime, clock.now);
  const stop = anchorWallClock(spec.stopTime, clock.now);
  return evaluateWindow(clock.now, start, stop);
}

export function decideDeploymentAction(
  spec: DeploymentScheduleSpec,
  observed: ObservedDeploymentState,
  clock: ClockReading
): DeploymentAction {
  const window = scheduledWindowState(spec, clock);

  // An unparsable downtime count still yields scale-down; the planner rejects it.
  if (
    window === 'inactive' &&
    (spec.downTimeReplicas === null || observed.currentReplicas !== spec.downTimeReplicas)
  ) {
    return 'scale-down';
  }
  // An absent original count still yields scale-up; the planner rejects it.
  if (window === 'active' && observed.currentReplicas !== observed.originalReplicas) {
    return 'scale-up';
  }
  return 'no-action';
}

export function decideCronJobAction(
  spec: ScheduleSpec,
  observed: ObservedCronJobState,
  clock: ClockReading
): CronJobAction {
  const window = scheduledWindowState(spec, clock);

  if (window === 'inactive' && !observed.suspended) return 'suspend';
  if (window === 'active' && observed.suspended) return 'resume';
  return 'no-action';
}
