/**
 * Schedule Evaluator
 * Runs opt-in check → clock → day → parse → window → decide → plan for one
 * workload. Pure: the caller supplies nowMs and applies the resulting decision.
 */

import {
  ANNOTATIONS,
  type Annotations,
  type ClockReading,
  type CronJobEvaluation,
  type DeploymentEvaluation,
  type EvaluationWarning,
  type ObservedCronJobState,
  type ObservedDeploymentState,
  type ScheduleAnnotation,
  type ScheduleError,
  type ScheduleSpec,
  type WindowTimes,
} from '@/types/schedule';
import { anchorWallClock, readClock } from '@/lib/time-normalizer';
import { isOvernightWindow } from '@/lib/window-evaluator';
import {
  DEPLOYMENT_REQUIRED_KEYS,
  REQUIRED_KEYS,
  findMissingAnnotation,
  matchesDay,
  parseDeploymentScheduleSpec,
  parseReplicaAnnotation,
  parseScheduleSpec,
} from '@/lib/schedule-parser';
import { decideCronJobAction, decideDeploymentAction, scheduledWindowState } from '@/lib/action-decider';
import { planCronJobMutation, planDeploymentMutation } from '@/lib/mutation-planner';

export function readObservedDeploymentState(
  annotations: Annotations,
  replicas: number
): ObservedDeploymentState {
  const raw = annotations[ANNOTATIONS.originalReplicas];
  if (raw === undefined) return { currentReplicas: replicas };

  const parsed = parseReplicaAnnotation(raw);
  return parsed === null
    ? { currentReplicas: replicas, originalReplicasRaw: raw }
    : { currentReplicas: replicas, originalReplicas: parsed, originalReplicasRaw: raw };
}

type ScheduleGate =
  | { status: 'opt-out'; field: ScheduleAnnotation }
  | { status: 'failed'; error: ScheduleError }
  | { status: 'off-day'; today: string }
  | { status: 'scheduled'; clock: ClockReading };

/**
 * Checks that run before the window times are parsed. A workload whose
 * schedule does not cover today is left alone without validating its times.
 */
function gateSchedule(
  annotations: Annotations,
  keys: readonly ScheduleAnnotation[],
  nowMs: number
): ScheduleGate {
  const missing = findMissingAnnotation(annotations, keys);
  if (missing) return { status: 'opt-out', field: missing };

  const clock = readClock(annotations[ANNOTATIONS.timeZone], nowMs);
  if (!clock.ok) return { status: 'failed', error: clock.error };

  if (!matchesDay(annotations[ANNOTATIONS.days], clock.value.today)) {
    return { status: 'off-day', today: clock.value.today };
  }
  return { status: 'scheduled', clock: clock.value };
}

function windowTimes(spec: ScheduleSpec, clock: ClockReading): WindowTimes {
  return {
    now: clock.now,
    start: anchorWallClock(spec.startTime, clock.now),
    stop: anchorWallClock(spec.stopTime, clock.now),
  };
}

function collectWarnings(times: WindowTimes): EvaluationWarning[] {
  return isOvernightWindow(times.start, times.stop) ? ['overnight-window'] : [];
}

export function evaluateDeployment(
  workload: { annotations: Annotations; replicas: number },
  nowMs: number
): DeploymentEvaluation {
  const gate = gateSchedule(workload.annotations, DEPLOYMENT_REQUIRED_KEYS, nowMs);
  if (gate.status === 'opt-out' || gate.status === 'failed') return gate;
  if (gate.status === 'off-day') {
    return {
      status: 'decided',
      action: 'no-action',
      decision: { action: 'no-action', annotationUpdates: {} },
      window: null,
      times: null,
      today: gate.today,
      warnings: [],
    };
  }
  const { clock } = gate;

  const parsed = parseDeploymentScheduleSpec(workload.annotations);
  if (!parsed.ok) return { status: 'failed', error: parsed.error };
  const spec = parsed.value;

  const observed = readObservedDeploymentState(workload.annotations, workload.replicas);
  const action = decideDeploymentAction(spec, observed, clock);

  const planned = planDeploymentMutation(action, spec, observed);
  if (!planned.ok) return { status: 'failed', error: planned.error };

  const times = windowTimes(spec, clock);
  return {
    status: 'decided',
    action,
    decision: planned.value,
    window: scheduledWindowState(spec, clock),
    times,
    today: clock.today,
    warnings: collectWarnings(times),
  };
}

export function evaluateCronJob(
  workload: { annotations: Annotations; suspended: boolean },
  nowMs: number
): CronJobEvaluation {
  const gate = gateSchedule(workload.annotations, REQUIRED_KEYS, nowMs);
  if (gate.status === 'opt-out' || gate.status === 'failed') return gate;
  if (gate.status === 'off-day') {
    return {
      status: 'decided',
      action: 'no-action',
      decision: planCronJobMutation('no-action'),
      window: null,
      times: null,
      today: gate.today,
      warnings: [],
    };
  }
  const { clock } = gate;

  const parsed = parseScheduleSpec(workload.annotations);
  if (!parsed.ok) return { status: 'failed', error: parsed.error };
  const spec = parsed.value;

  const observed: ObservedCronJobState = { suspended: workload.suspended };
  const action = decideCronJobAction(spec, observed, clock);
  const times = windowTimes(spec, clock);

  return {
    status: 'decided',
    action,
    decision: planCronJobMutation(action),
    window: scheduledWindowState(spec, clock),
    times,
    today: clock.today,
    warnings: collectWarnings(times),
  };
}
