/**
 * Scheduler Module
 * Runs the reconcile cycle on a fixed cadence (default every 10s).
 * A tick is skipped while the previous cycle is still running.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { runReconcileCycle } from '@/lib/reconciler';
import { KubectlWorkloadStore } from '@/lib/workload-store';
import { getStore } from '@/lib/redis-store';
import { DEFAULT_RECONCILER_CONFIG, type ReconcileCycleReport, type ReconcilerConfig } from '@/types/reconciler';
import { WorkloadListError, type WorkloadStore } from '@/types/workload';
import type { IStateStore } from '@/types/redis';

export interface SchedulerOptions {
  config?: Partial<ReconcilerConfig>;
  workloads?: WorkloadStore;
  history?: IStateStore;
  /** Called when the workload collection cannot be listed */
  onFatal?: (error: WorkloadListError) => void;
}

let initialized = false;
let reconcileTask: ScheduledTask | null = null;
let reconcileTaskRunning = false;
let activeConfig: ReconcilerConfig = DEFAULT_RECONCILER_CONFIG;
let workloadStore: WorkloadStore | null = null;
let historyStore: IStateStore | null = null;
let fatalHandler: ((error: WorkloadListError) => void) | null = null;
let lastReport: ReconcileCycleReport | null = null;

/**
 * Run one cycle now with the scheduler's stores. Returns null when a cycle
 * is already in progress or the scheduler is not initialized.
 */
export async function runCycleNow(): Promise<ReconcileCycleReport | null> {
  const workloads = workloadStore;
  const history = historyStore;
  if (reconcileTaskRunning || !workloads || !history) return null;

  reconcileTaskRunning = true;
  try {
    const report = await runReconcileCycle({ workloads, history, dryRun: activeConfig.dryRun });
    lastReport = report;
    const { deployments, cronJobs } = report;
    if (deployments.mutated + cronJobs.mutated + report.failures.length > 0) {
      console.info(
        `[Scheduler] Cycle completed (${report.durationMs}ms): ${deployments.mutated} deployment(s), ${cronJobs.mutated} cronjob(s) changed, ${report.failures.length} failure(s)`
      );
    }
    return report;
  } catch (error) {
    if (error instanceof WorkloadListError) {
      console.error('[Scheduler] Listing failed:', error.message);
      fatalHandler?.(error);
    } else {
      const msg = error instanceof Error ? error.message : 'Unknown error';
      console.error('[Scheduler] Reconcile cycle error:', msg);
    }
    return null;
  } finally {
    reconcileTaskRunning = false;
  }
}

/**
 * Initialize the poll loop. Repeated calls are no-ops until stopScheduler.
 */
export function initializeScheduler(options: SchedulerOptions = {}): void {
  if (initialized) {
    console.info('[Scheduler] Already initialized, skipping');
    return;
  }

  activeConfig = { ...DEFAULT_RECONCILER_CONFIG, ...options.config };
  if (!cron.validate(activeConfig.pollSchedule)) {
    throw new Error(`Invalid poll schedule: ${activeConfig.pollSchedule}`);
  }

  workloadStore = options.workloads ?? new KubectlWorkloadStore({ namespace: activeConfig.namespace });
  historyStore = options.history ?? getStore(activeConfig.historyLimit);
  fatalHandler = options.onFatal ?? null;

  reconcileTask = cron.schedule(activeConfig.pollSchedule, async () => {
    await runCycleNow();
  });

  initialized = true;
  console.info(
    `[Scheduler] Initialized, poll: ${activeConfig.pollSchedule}, scope: ${activeConfig.namespace ?? 'all namespaces'}${activeConfig.dryRun ? ', dry run' : ''}`
  );
}

/**
 * Stop the poll loop.
 */
export function stopScheduler(): void {
  if (reconcileTask) {
    reconcileTask.stop();
    reconcileTask = null;
  }
  workloadStore = null;
  historyStore = null;
  fatalHandler = null;
  initialized = false;
  console.info('[Scheduler] Stopped');
}

export function getSchedulerStatus(): {
  initialized: boolean;
  reconcileTaskRunning: boolean;
  pollSchedule: string;
  dryRun: boolean;
  lastReport: ReconcileCycleReport | null;
} {
  return {
    initialized,
    reconcileTaskRunning,
    pollSchedule: activeConfig.pollSchedule,
    dryRun: activeConfig.dryRun,
    lastReport,
  };
}
