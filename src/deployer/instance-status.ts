/**
 * Maps a single pod to a normalized instance status.
 */

import type { V1ContainerStatus, V1Pod } from '@kubernetes/client-node';
import type { DeployerConfig } from '../config/types';
import type { AppInstanceStatus, DeploymentState } from '../domain/types';

export type RestartLimits = Pick<
  DeployerConfig,
  'maxTerminatedErrorRestarts' | 'maxCrashLoopBackOffRestarts'
>;

export interface InstanceStatusClassifier {
  /** `pod` is undefined for the placeholder used when the cluster returned no pod list */
  classify: (appId: string, pod: V1Pod | undefined, config: RestartLimits) => AppInstanceStatus;
}

/** Id reported for the absent-instance placeholder */
export const ABSENT_INSTANCE_ID = 'N/A';

const OOM_KILLED_EXIT_CODE = 137;

function singleContainerStatus(pod: V1Pod): V1ContainerStatus | undefined {
  const statuses = pod.status?.containerStatuses ?? [];
  return statuses.length === 1 ? statuses[0] : undefined;
}

function isRepeatedlyTerminated(container: V1ContainerStatus, limits: RestartLimits): boolean {
  const terminated = container.lastState?.terminated;
  return (
    container.restartCount > limits.maxTerminatedErrorRestarts &&
    terminated !== undefined &&
    (terminated.exitCode === OOM_KILLED_EXIT_CODE || terminated.reason === 'Error')
  );
}

function isCrashLooping(container: V1ContainerStatus, limits: RestartLimits): boolean {
  return (
    container.restartCount > limits.maxCrashLoopBackOffRestarts &&
    container.state?.waiting?.reason === 'CrashLoopBackOff'
  );
}

function mapState(
  phase: string | undefined,
  container: V1ContainerStatus,
  limits: RestartLimits,
): DeploymentState {
  switch (phase) {
    case 'Pending':
      return 'deploying';
    case 'Running':
      if (container.ready) return 'deployed';
      if (isRepeatedlyTerminated(container, limits)) return 'failed';
      if (isCrashLooping(container, limits)) return 'failed';
      return 'deploying';
    case 'Failed':
      return 'failed';
    default:
      return 'unknown';
  }
}

function podAttributes(
  pod: V1Pod,
  container: V1ContainerStatus | undefined,
): Record<string, string> {
  const status = pod.status;
  const attributes: Record<string, string> = {};

  if (status?.startTime) attributes.pod_starttime = new Date(status.startTime).toISOString();
  if (status?.podIP) attributes.pod_ip = status.podIP;
  if (status?.hostIP) attributes.host_ip = status.hostIP;
  if (status?.phase) attributes.phase = status.phase;
  if (container) attributes.container_restart_count = String(container.restartCount);

  return attributes;
}

/**
 * Pods are expected to run exactly one container; anything else reports `unknown`.
 */
export const defaultInstanceStatusClassifier: InstanceStatusClassifier = {
  classify(appId, pod, config) {
    if (pod === undefined) {
      return { id: ABSENT_INSTANCE_ID, state: 'unknown', attributes: {} };
    }

    const container = singleContainerStatus(pod);
    return {
      id: pod.metadata?.name ?? appId,
      state: container ? mapState(pod.status?.phase, container, config) : 'unknown',
      attributes: podAttributes(pod, container),
    };
  },
};
