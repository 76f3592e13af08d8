/**
 * Schedule Types
 * Annotation-driven daily up/down windows for Deployments and CronJobs.
 */

// ============================================================
// Annotation Keys
// ============================================================

export const ANNOTATIONS = {
  days: 'd8r/days',
  startTime: 'd8r/startTime',
  stopTime: 'd8r/stopTime',
  timeZone: 'd8r/timeZone',
  downTimeReplicas: 'd8r/downTimeReplicas',
  originalReplicas: 'd8r/originalReplicas',
} as const;

export type ScheduleAnnotation = (typeof ANNOTATIONS)[keyof typeof ANNOTATIONS];

export type Annotations = Readonly<Record<string, string>>;

// ============================================================
// Schedule Spec
// ============================================================

export interface WallClock {
  hour: number;    // 0-23
  minute: number;  // 0-59
}

export interface ScheduleSpec {
  /** Raw d8r/days value; matched by substring against the weekday abbreviation */
  days: string;
  startTime: WallClock;
  stopTime: WallClock;
  timeZone: string;
}

export interface DeploymentScheduleSpec extends ScheduleSpec {
  /** null when d8r/downTimeReplicas is not a valid count; only needed at downtime */
  downTimeReplicas: number | null;
  downTimeReplicasRaw: string;
}

// ============================================================
// Normalized Time
// ============================================================

/**
 * Time of day anchored to REFERENCE_DATE_UTC with the zone offset observed
 * at evaluation time. Only instants sharing timeZone and utcOffsetMinutes
 * may be compared.
 */
export interface NormalizedInstant {
  hour: number;
  minute: number;
  timeZone: string;
  utcOffsetMinutes: number;
  epochMs: number;
}

export interface ClockReading {
  now: NormalizedInstant;
  /** First three letters of the English weekday name in the target zone */
  today: string;
}

export const REFERENCE_DATE_UTC = Date.UTC(2000, 0, 1);

export type WindowState = 'active' | 'inactive';

export interface WindowTimes {
  now: NormalizedInstant;
  start: NormalizedInstant;
  stop: NormalizedInstant;
}

// ============================================================
// Observed State
// ============================================================

export interface ObservedDeploymentState {
  currentReplicas: number;
  originalReplicas?: number;
  /** Raw d8r/originalReplicas value when present, parsed or not */
  originalReplicasRaw?: string;
}

export interface ObservedCronJobState {
  suspended: boolean;
}

// ============================================================
// Actions & Decisions
// ============================================================

export type DeploymentAction = 'no-action' | 'scale-down' | 'scale-up';
export type CronJobAction = 'no-action' | 'suspend' | 'resume';

export interface DeploymentDecision {
  action: DeploymentAction;
  newReplicaCount?: number;
  annotationUpdates: Record<string, string>;
}

export interface CronJobDecision {
  action: CronJobAction;
  suspend?: boolean;
  annotationUpdates: Record<string, string>;
}

// ============================================================
// Errors
// ============================================================

export type ScheduleError =
  | { code: 'MISSING_FIELD'; field: ScheduleAnnotation }
  | { code: 'INVALID_TIME_ZONE'; timeZone: string }
  | { code: 'INVALID_TIME_FORMAT'; field: ScheduleAnnotation | 'time'; value: string }
  | { code: 'INVALID_INTEGER_ANNOTATION'; field: ScheduleAnnotation; value: string }
  | { code: 'MISSING_ORIGINAL_REPLICAS' };

export type ScheduleErrorCode = ScheduleError['code'];

export type ScheduleResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ScheduleError };

export function ok<T>(value: T): ScheduleResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: ScheduleError): ScheduleResult<T> {
  return { ok: false, error };
}

/**
 * Human-readable description used in reconciler logs
 */
export function describeScheduleError(error: ScheduleError): string {
  switch (error.code) {
    case 'MISSING_FIELD':
      return `missing annotation ${error.field}`;
    case 'INVALID_TIME_ZONE':
      return `unknown time zone "${error.timeZone}"`;
    case 'INVALID_TIME_FORMAT':
      return `invalid time "${error.value}" in ${error.field}, expected HH:MM`;
    case 'INVALID_INTEGER_ANNOTATION':
      return `invalid integer "${error.value}" in ${error.field}`;
    case 'MISSING_ORIGINAL_REPLICAS':
      return `cannot scale up without ${ANNOTATIONS.originalReplicas}`;
  }
}

// ============================================================
// Evaluation Outcome
// ============================================================

export type EvaluationWarning = 'overnight-window';

export type ScheduleEvaluation<A, D> =
  | { status: 'opt-out'; field: ScheduleAnnotation }
  | { status: 'failed'; error: ScheduleError }
  | {
      status: 'decided';
      action: A;
      decision: D;
      /** null when today is not a scheduled day */
      window: WindowState | null;
      /** null when today is not a scheduled day */
      times: WindowTimes | null;
      today: string;
      warnings: EvaluationWarning[];
    };

export type DeploymentEvaluation = ScheduleEvaluation<DeploymentAction, DeploymentDecision>;
export type CronJobEvaluation = ScheduleEvaluation<CronJobAction, CronJobDecision>;
