/**
 * Reconciler
 * One poll cycle: evaluate every Deployment, then every CronJob, and apply
 * the planned mutations one workload at a time.
 */

import { describeScheduleError, type ScheduleError, type WindowTimes } from '@/types/schedule';
import type { CronJobWorkload, DeploymentWorkload, WorkloadKind, WorkloadStore } from '@/types/workload';
import type {
  KindSummary,
  ReconcileCycleReport,
  ReconcileHistoryEntry,
  WorkloadFailure,
} from '@/types/reconciler';
import type { IStateStore } from '@/types/redis';
import { evaluateCronJob, evaluateDeployment } from '@/lib/schedule-evaluator';
import { formatInstant } from '@/lib/time-normalizer';

export interface ReconcileOptions {
  workloads: WorkloadStore;
  history: IStateStore;
  dryRun?: boolean;
  /** Evaluation instant; Date.now() when omitted */
  nowMs?: number;
}

function emptySummary(): KindSummary {
  return { evaluated: 0, optedOut: 0, unchanged: 0, mutated: 0, failed: 0 };
}

function workloadLabel(kind: WorkloadKind, namespace: string, name: string): string {
  return `${kind === 'Deployment' ? 'deployment' : 'cronjob'} ${namespace}/${name}`;
}

function logWindowTimes(label: string, times: WindowTimes | null): void {
  if (process.env.DEBUG_D8R !== 'true' || !times) return;
  console.debug(
    `[Reconciler] ${label}: now ${formatInstant(times.now)}, start ${formatInstant(times.start)}, stop ${formatInstant(times.stop)}`
  );
}

class CycleContext {
  readonly deployments = emptySummary();
  readonly cronJobs = emptySummary();
  readonly failures: WorkloadFailure[] = [];
  readonly options: ReconcileOptions;
  readonly nowMs: number;
  readonly dryRun: boolean;

  constructor(options: ReconcileOptions, nowMs: number, dryRun: boolean) {
    this.options = options;
    this.nowMs = nowMs;
    this.dryRun = dryRun;
  }

  summary(kind: WorkloadKind): KindSummary {
    return kind === 'Deployment' ? this.deployments : this.cronJobs;
  }

  scheduleFailure(kind: WorkloadKind, namespace: string, name: string, error: ScheduleError): void {
    const message = describeScheduleError(error);
    console.error(`[Reconciler] ${workloadLabel(kind, namespace, name)}: ${message}`);
    this.summary(kind).failed++;
    this.failures.push({ kind, namespace, name, code: error.code, message });
  }

  applyFailure(kind: WorkloadKind, namespace: string, name: string, error: unknown): void {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`[Reconciler] ${workloadLabel(kind, namespace, name)}: update failed: ${message}`);
    this.summary(kind).failed++;
    this.failures.push({ kind, namespace, name, code: 'APPLY_FAILED', message });
  }

  async recordMutation(entry: Omit<ReconcileHistoryEntry, 'timestamp' | 'dryRun'>): Promise<void> {
    this.summary(entry.kind).mutated++;
    try {
      await this.options.history.addReconcileHistory({
        ...entry,
        timestamp: new Date(this.nowMs).toISOString(),
        dryRun: this.dryRun,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      console.warn(`[Reconciler] Failed to record history: ${message}`);
    }
  }
}

async function reconcileDeployment(ctx: CycleContext, workload: DeploymentWorkload): Promise<void> {
  const { namespace, name } = workload;
  const summary = ctx.deployments;
  summary.evaluated++;

  const outcome = evaluateDeployment(workload, ctx.nowMs);
  if (outcome.status === 'opt-out') {
    summary.optedOut++;
    return;
  }
  if (outcome.status === 'failed') {
    ctx.scheduleFailure('Deployment', namespace, name, outcome.error);
    return;
  }
  logWindowTimes(workloadLabel('Deployment', namespace, name), outcome.times);
  if (outcome.warnings.includes('overnight-window')) {
    console.warn(`[Reconciler] ${workloadLabel('Deployment', namespace, name)}: start time is after stop time, window never active`);
  }
  if (outcome.action === 'no-action' || outcome.decision.newReplicaCount === undefined) {
    summary.unchanged++;
    return;
  }

  const to = outcome.decision.newReplicaCount;
  console.info(
    `[Reconciler] ${workloadLabel('Deployment', namespace, name)}, replicas: ${workload.replicas}, action needed: ${outcome.action} → ${to}${ctx.dryRun ? ' [DRY RUN]' : ''}`
  );

  if (!ctx.dryRun) {
    try {
      await ctx.options.workloads.applyDeploymentDecision(workload, outcome.decision);
    } catch (error) {
      ctx.applyFailure('Deployment', namespace, name, error);
      return;
    }
  }

  await ctx.recordMutation({
    kind: 'Deployment',
    namespace,
    name,
    action: outcome.action,
    from: workload.replicas,
    to,
  });
}

async function reconcileCronJob(ctx: CycleContext, workload: CronJobWorkload): Promise<void> {
  const { namespace, name } = workload;
  const summary = ctx.cronJobs;
  summary.evaluated++;

  const outcome = evaluateCronJob(workload, ctx.nowMs);
  if (outcome.status === 'opt-out') {
    summary.optedOut++;
    return;
  }
  if (outcome.status === 'failed') {
    ctx.scheduleFailure('CronJob', namespace, name, outcome.error);
    return;
  }
  logWindowTimes(workloadLabel('CronJob', namespace, name), outcome.times);
  if (outcome.warnings.includes('overnight-window')) {
    console.warn(`[Reconciler] ${workloadLabel('CronJob', namespace, name)}: start time is after stop time, window never active`);
  }
  if (outcome.action === 'no-action' || outcome.decision.suspend === undefined) {
    summary.unchanged++;
    return;
  }

  console.info(
    `[Reconciler] ${workloadLabel('CronJob', namespace, name)}, action needed: ${outcome.action}${ctx.dryRun ? ' [DRY RUN]' : ''}`
  );

  if (!ctx.dryRun) {
    try {
      await ctx.options.workloads.applyCronJobDecision(workload, outcome.decision);
    } catch (error) {
      ctx.applyFailure('CronJob', namespace, name, error);
      return;
    }
  }

  await ctx.recordMutation({
    kind: 'CronJob',
    namespace,
    name,
    action: outcome.action,
    from: workload.suspended,
    to: outcome.decision.suspend,
  });
}

/**
 * Run one reconcile cycle. Throws WorkloadListError when a listing fails;
 * every per-workload problem is logged and counted instead.
 */
export async function runReconcileCycle(options: ReconcileOptions): Promise<ReconcileCycleReport> {
  const startedMs = Date.now();
  const ctx = new CycleContext(options, options.nowMs ?? startedMs, options.dryRun ?? false);

  const deployments = await options.workloads.listDeployments();
  for (const workload of deployments) {
    await reconcileDeployment(ctx, workload);
  }

  const cronJobs = await options.workloads.listCronJobs();
  for (const workload of cronJobs) {
    await reconcileCronJob(ctx, workload);
  }

  const report: ReconcileCycleReport = {
    startedAt: new Date(startedMs).toISOString(),
    durationMs: Date.now() - startedMs,
    dryRun: ctx.dryRun,
    deployments: ctx.deployments,
    cronJobs: ctx.cronJobs,
    failures: ctx.failures,
  };

  try {
    await options.history.setLastCycleReport(report);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.warn(`[Reconciler] Failed to store cycle report: ${message}`);
  }

  return report;
}
