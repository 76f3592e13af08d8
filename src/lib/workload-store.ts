/**
 * Workload Store
 * Lists Deployments/CronJobs and applies planned mutations via kubectl.
 */

import type { CronJobDecision, DeploymentDecision } from '@/types/schedule';
import {
  WorkloadListError,
  type CronJobWorkload,
  type DeploymentWorkload,
  type WorkloadKind,
  type WorkloadStore,
} from '@/types/workload';
import { escapeShellArg, isValidResourceName, runK8sCommand } from '@/lib/k8s-config';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================
// JSON Projection
// ============================================================

interface ObjectMeta {
  namespace: string;
  name: string;
  resourceVersion?: string;
  annotations: Record<string, string>;
}

function readMetadata(item: JsonObject): ObjectMeta | null {
  const metadata = item.metadata;
  if (!isObject(metadata)) return null;
  if (typeof metadata.name !== 'string' || typeof metadata.namespace !== 'string') return null;

  const annotations: Record<string, string> = {};
  if (isObject(metadata.annotations)) {
    for (const [key, value] of Object.entries(metadata.annotations)) {
      if (typeof value === 'string') annotations[key] = value;
    }
  }

  return {
    namespace: metadata.namespace,
    name: metadata.name,
    resourceVersion: typeof metadata.resourceVersion === 'string' ? metadata.resourceVersion : undefined,
    annotations,
  };
}

function readItems(stdout: string, kind: WorkloadKind): JsonObject[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new WorkloadListError(kind, `invalid kubectl output: ${message}`);
  }
  if (!isObject(parsed) || !Array.isArray(parsed.items)) {
    throw new WorkloadListError(kind, 'kubectl output has no items list');
  }
  return parsed.items.filter(isObject);
}

export function parseDeploymentList(stdout: string): DeploymentWorkload[] {
  const workloads: DeploymentWorkload[] = [];
  for (const item of readItems(stdout, 'Deployment')) {
    const meta = readMetadata(item);
    if (!meta) continue;
    const spec = isObject(item.spec) ? item.spec : {};
    // The API server defaults spec.replicas to 1
    const replicas = typeof spec.replicas === 'number' ? spec.replicas : 1;
    workloads.push({ ...meta, replicas });
  }
  return workloads;
}

export function parseCronJobList(stdout: string): CronJobWorkload[] {
  const workloads: CronJobWorkload[] = [];
  for (const item of readItems(stdout, 'CronJob')) {
    const meta = readMetadata(item);
    if (!meta) continue;
    const spec = isObject(item.spec) ? item.spec : {};
    workloads.push({ ...meta, suspended: spec.suspend === true });
  }
  return workloads;
}

// ============================================================
// Patch Construction
// ============================================================

function patchMetadata(
  resourceVersion: string | undefined,
  annotationUpdates: Record<string, string>
): JsonObject | null {
  const metadata: JsonObject = {};
  if (resourceVersion) metadata.resourceVersion = resourceVersion;
  if (Object.keys(annotationUpdates).length > 0) metadata.annotations = { ...annotationUpdates };
  return Object.keys(metadata).length > 0 ? metadata : null;
}

/**
 * Merge patch for a deployment decision, or null when nothing changes.
 */
export function buildDeploymentPatch(
  workload: DeploymentWorkload,
  decision: DeploymentDecision
): JsonObject | null {
  if (decision.action === 'no-action' || decision.newReplicaCount === undefined) return null;

  const patch: JsonObject = { spec: { replicas: decision.newReplicaCount } };
  const metadata = patchMetadata(workload.resourceVersion, decision.annotationUpdates);
  if (metadata) patch.metadata = metadata;
  return patch;
}

export function buildCronJobPatch(
  workload: CronJobWorkload,
  decision: CronJobDecision
): JsonObject | null {
  if (decision.action === 'no-action' || decision.suspend === undefined) return null;

  const patch: JsonObject = { spec: { suspend: decision.suspend } };
  const metadata = patchMetadata(workload.resourceVersion, decision.annotationUpdates);
  if (metadata) patch.metadata = metadata;
  return patch;
}

// ============================================================
// kubectl Store
// ============================================================

export interface KubectlWorkloadStoreOptions {
  /** Restrict listing to one namespace; all namespaces when unset */
  namespace?: string;
}

export class KubectlWorkloadStore implements WorkloadStore {
  private namespace?: string;

  constructor(options: KubectlWorkloadStoreOptions = {}) {
    if (options.namespace && !isValidResourceName(options.namespace)) {
      throw new Error(`Invalid namespace: ${options.namespace.substring(0, 63)}`);
    }
    this.namespace = options.namespace;
  }

  private scopeArgs(): string {
    return this.namespace ? `-n ${this.namespace}` : '--all-namespaces';
  }

  private async list(resource: string, kind: WorkloadKind): Promise<string> {
    try {
      const { stdout } = await runK8sCommand(`get ${resource} ${this.scopeArgs()} -o json`);
      return stdout;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new WorkloadListError(kind, message);
    }
  }

  async listDeployments(): Promise<DeploymentWorkload[]> {
    return parseDeploymentList(await this.list('deployments', 'Deployment'));
  }

  async listCronJobs(): Promise<CronJobWorkload[]> {
    return parseCronJobList(await this.list('cronjobs', 'CronJob'));
  }

  private async patch(resource: string, namespace: string, name: string, patch: JsonObject): Promise<void> {
    if (!isValidResourceName(namespace) || !isValidResourceName(name)) {
      throw new Error(`Refusing to patch ${resource} with invalid name ${namespace}/${name}`);
    }
    const cmd = `patch ${resource} ${name} -n ${namespace} --type=merge -p ${escapeShellArg(JSON.stringify(patch))}`;
    await runK8sCommand(cmd);
  }

  async applyDeploymentDecision(workload: DeploymentWorkload, decision: DeploymentDecision): Promise<void> {
    const patch = buildDeploymentPatch(workload, decision);
    if (!patch) return;
    await this.patch('deployment', workload.namespace, workload.name, patch);
  }

  async applyCronJobDecision(workload: CronJobWorkload, decision: CronJobDecision): Promise<void> {
    const patch = buildCronJobPatch(workload, decision);
    if (!patch) return;
    await this.patch('cronjob', workload.namespace, workload.name, patch);
  }
}
