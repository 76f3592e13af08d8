/**
 * Mutation Planner
 * Turns a decided action into the desired state the workload store writes.
 */

import {
  ANNOTATIONS,
  fail,
  ok,
  type CronJobAction,
  type CronJobDecision,
  type DeploymentAction,
  type DeploymentDecision,
  type DeploymentScheduleSpec,
  type ObservedDeploymentState,
  type ScheduleResult,
} from '@/types/schedule';

export function planDeploymentMutation(
  action: DeploymentAction,
  spec: DeploymentScheduleSpec,
  observed: ObservedDeploymentState
): ScheduleResult<DeploymentDecision> {
  switch (action) {
    case 'scale-down':
      if (spec.downTimeReplicas === null) {
        return fail({
          code: 'INVALID_INTEGER_ANNOTATION',
          field: ANNOTATIONS.downTimeReplicas,
          value: spec.downTimeReplicasRaw,
        });
      }
      return ok({
        action,
        newReplicaCount: spec.downTimeReplicas,
        annotationUpdates: {
          [ANNOTATIONS.originalReplicas]: String(observed.currentReplicas),
        },
      });

    case 'scale-up':
      if (observed.originalReplicas === undefined) {
        if (observed.originalReplicasRaw !== undefined) {
          return fail({
            code: 'INVALID_INTEGER_ANNOTATION',
            field: ANNOTATIONS.originalReplicas,
            value: observed.originalReplicasRaw,
          });
        }
        return fail({ code: 'MISSING_ORIGINAL_REPLICAS' });
      }
      return ok({
        action,
        newReplicaCount: observed.originalReplicas,
        annotationUpdates: {},
      });

    case 'no-action':
      return ok({ action, annotationUpdates: {} });
  }
}

export function planCronJobMutation(action: CronJobAction): CronJobDecision {
  switch (action) {
    case 'suspend':
      return { action, suspend: true, annotationUpdates: {} };
    case 'resume':
      return { action, suspend: false, annotationUpdates: {} };
    case 'no-action':
      return { action, annotationUpdates: {} };
  }
}
