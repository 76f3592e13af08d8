/**
 * ScheduleSpec Parser
 * Projects the untyped annotation map into a ScheduleSpec.
 */

import {
  ANNOTATIONS,
  fail,
  ok,
  type Annotations,
  type DeploymentScheduleSpec,
  type ScheduleAnnotation,
  type ScheduleResult,
  type ScheduleSpec,
} from '@/types/schedule';
import { parseWallClock } from '@/lib/time-normalizer';

const INTEGER_PATTERN = /^\+?\d+$/;
const INT32_MAX = 2_147_483_647;

/** Keys whose absence means the workload has not opted in */
export const REQUIRED_KEYS: readonly ScheduleAnnotation[] = [
  ANNOTATIONS.days,
  ANNOTATIONS.startTime,
  ANNOTATIONS.stopTime,
  ANNOTATIONS.timeZone,
];

export const DEPLOYMENT_REQUIRED_KEYS: readonly ScheduleAnnotation[] = [
  ...REQUIRED_KEYS,
  ANNOTATIONS.downTimeReplicas,
];

/**
 * Parse a non-negative base-10 replica count that fits in int32.
 */
export function parseReplicaAnnotation(value: string): number | null {
  if (!INTEGER_PATTERN.test(value)) return null;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed) || parsed > INT32_MAX) return null;
  return parsed;
}

/**
 * Loose membership test: "Monday,Tuesday" matches "Mon".
 */
export function matchesDay(days: string, today: string): boolean {
  return today.length > 0 && days.includes(today);
}

/**
 * First key in `keys` absent from the annotations, or null when all are set.
 */
export function findMissingAnnotation(
  annotations: Annotations,
  keys: readonly ScheduleAnnotation[]
): ScheduleAnnotation | null {
  return keys.find((key) => annotations[key] === undefined) ?? null;
}

export function parseScheduleSpec(annotations: Annotations): ScheduleResult<ScheduleSpec> {
  const missing = findMissingAnnotation(annotations, REQUIRED_KEYS);
  if (missing) return fail({ code: 'MISSING_FIELD', field: missing });

  const rawStart = annotations[ANNOTATIONS.startTime];
  const startTime = parseWallClock(rawStart);
  if (!startTime) {
    return fail({ code: 'INVALID_TIME_FORMAT', field: ANNOTATIONS.startTime, value: rawStart });
  }

  const rawStop = annotations[ANNOTATIONS.stopTime];
  const stopTime = parseWallClock(rawStop);
  if (!stopTime) {
    return fail({ code: 'INVALID_TIME_FORMAT', field: ANNOTATIONS.stopTime, value: rawStop });
  }

  return ok({
    days: annotations[ANNOTATIONS.days],
    startTime,
    stopTime,
    timeZone: annotations[ANNOTATIONS.timeZone],
  });
}

/**
 * Deployments additionally need d8r/downTimeReplicas. Its value is only
 * validated when a scale-down is planned.
 */
export function parseDeploymentScheduleSpec(
  annotations: Annotations
): ScheduleResult<DeploymentScheduleSpec> {
  const base = parseScheduleSpec(annotations);
  if (!base.ok) return base;

  const raw = annotations[ANNOTATIONS.downTimeReplicas];
  if (raw === undefined) {
    return fail({ code: 'MISSING_FIELD', field: ANNOTATIONS.downTimeReplicas });
  }

  return ok({ ...base.value, downTimeReplicas: parseReplicaAnnotation(raw), downTimeReplicasRaw: raw });
}
