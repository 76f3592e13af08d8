/**
 * Workload Types
 * Minimal projections of the cluster objects the reconciler touches.
 */

import type { Annotations, CronJobDecision, DeploymentDecision } from './schedule';

export type WorkloadKind = 'Deployment' | 'CronJob';

interface WorkloadBase {
  namespace: string;
  name: string;
  /** Sent back with every patch so concurrent edits are rejected */
  resourceVersion?: string;
  annotations: Annotations;
}

export interface DeploymentWorkload extends WorkloadBase {
  replicas: number;
}

export interface CronJobWorkload extends WorkloadBase {
  suspended: boolean;
}

/**
 * Cluster resource store used by the reconciler.
 * List failures are fatal to a poll cycle; apply failures affect one workload.
 */
export interface WorkloadStore {
  listDeployments(): Promise<DeploymentWorkload[]>;
  listCronJobs(): Promise<CronJobWorkload[]>;
  applyDeploymentDecision(workload: DeploymentWorkload, decision: DeploymentDecision): Promise<void>;
  applyCronJobDecision(workload: CronJobWorkload, decision: CronJobDecision): Promise<void>;
}

export class WorkloadListError extends Error {
  kind: WorkloadKind;

  constructor(kind: WorkloadKind, message: string) {
    super(`Failed to list ${kind} resources: ${message}`);
    this.name = 'WorkloadListError';
    this.kind = kind;
  }
}
