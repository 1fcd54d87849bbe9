import type { AppInstanceStatus, AppStatus, DeploymentState } from './types';

/**
 * Reduce the states of all instances to one app-level state.
 *
 * A single distinct state wins outright. Mixed states resolve in order of
 * severity: error, deploying, partial (some deployed), failed.
 */
export function reduceDeploymentState(states: Iterable<DeploymentState>): DeploymentState {
  const distinct = new Set(states);

  if (distinct.size === 0) return 'unknown';
  if (distinct.size === 1) {
    const [only] = distinct;
    return only ?? 'unknown';
  }
  if (distinct.has('error')) return 'error';
  if (distinct.has('deploying')) return 'deploying';
  if (distinct.has('deployed') || distinct.has('partial')) return 'partial';
  if (distinct.has('failed')) return 'failed';
  return 'partial';
}

/**
 * Fold instance statuses into an AppStatus. Instances are keyed by id; a later
 * instance with the same id replaces an earlier one.
 */
export function buildAppStatus(
  deploymentId: string,
  instances: readonly AppInstanceStatus[],
): AppStatus {
  const byId: Record<string, AppInstanceStatus> = {};
  for (const instance of instances) {
    byId[instance.id] = instance;
  }

  return {
    deploymentId,
    instances: byId,
    state: reduceDeploymentState(Object.values(byId).map((instance) => instance.state)),
  };
}
