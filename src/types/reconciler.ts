/**
 * Reconciler Types
 * Poll-cycle configuration, history entries and cycle reports.
 */

import type { CronJobAction, DeploymentAction, ScheduleErrorCode } from './schedule';
import type { WorkloadKind } from './workload';

export interface ReconcilerConfig {
  /** node-cron expression (seconds field supported) */
  pollSchedule: string;
  /** Log planned mutations without patching */
  dryRun: boolean;
  /** Restrict to one namespace; all namespaces when undefined */
  namespace?: string;
  /** Applied mutations kept in the history store */
  historyLimit: number;
}

export const DEFAULT_RECONCILER_CONFIG: ReconcilerConfig = {
  pollSchedule: process.env.D8R_POLL_SCHEDULE || '*/10 * * * * *',
  dryRun: process.env.D8R_DRY_RUN === 'true',
  namespace: process.env.D8R_NAMESPACE || undefined,
  historyLimit: parseInt(process.env.D8R_HISTORY_LIMIT || '', 10) || 50,
};

export interface ReconcileHistoryEntry {
  timestamp: string;
  kind: WorkloadKind;
  namespace: string;
  name: string;
  action: Exclude<DeploymentAction | CronJobAction, 'no-action'>;
  /** Replica count or suspend flag before the mutation */
  from: number | boolean;
  /** Replica count or suspend flag requested */
  to: number | boolean;
  dryRun: boolean;
}

export interface WorkloadFailure {
  kind: WorkloadKind;
  namespace: string;
  name: string;
  /** Schedule error code, or 'APPLY_FAILED' when the patch was rejected */
  code: ScheduleErrorCode | 'APPLY_FAILED';
  message: string;
}

export interface KindSummary {
  evaluated: number;
  optedOut: number;
  unchanged: number;
  mutated: number;
  failed: number;
}

export interface ReconcileCycleReport {
  startedAt: string;
  durationMs: number;
  dryRun: boolean;
  deployments: KindSummary;
  cronJobs: KindSummary;
  failures: WorkloadFailure[];
}
