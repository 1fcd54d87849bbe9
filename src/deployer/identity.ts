/**
 * App identity and label conventions.
 *
 * The labels are the only link between a Service, its ReplicationController and
 * the pods it runs; every lookup goes through them.
 */

import type { DeploymentRequest } from '../domain/types';

export const APP_ID_LABEL = 'kubedeploy-app-id';
export const GROUP_ID_LABEL = 'kubedeploy-group-id';
export const DEPLOYMENT_ID_LABEL = 'kubedeploy-deployment-id';
export const MARKER_LABEL = 'role';
export const MARKER_VALUE = 'kubedeploy-app';

/** Environment property naming the group an app belongs to */
export const GROUP_PROPERTY_KEY = 'deployer.group';

export type IdMap = Readonly<Record<string, string>>;

/**
 * Derive the app id: `name`, or `group-name` when a group is set.
 * Kubernetes names may not contain dots, so they become dashes.
 */
export function createDeploymentId(request: DeploymentRequest): string {
  const groupId = request.environmentProperties[GROUP_PROPERTY_KEY];
  const name = request.definition.name;
  const deploymentId = groupId === undefined ? name : `${groupId}-${name}`;
  return deploymentId.replace(/\./g, '-');
}

/**
 * Labels used as the selector of both the Service and the ReplicationController
 */
export function createIdMap(appId: string, request: DeploymentRequest): IdMap {
  const groupId = request.environmentProperties[GROUP_PROPERTY_KEY];
  return {
    [APP_ID_LABEL]: appId,
    ...(groupId !== undefined && { [GROUP_ID_LABEL]: groupId }),
    [DEPLOYMENT_ID_LABEL]: createDeploymentId(request),
  };
}

/**
 * Metadata labels: the id map plus the marker identifying resources we own
 */
export function createLabels(idMap: IdMap): IdMap {
  return { ...idMap, [MARKER_LABEL]: MARKER_VALUE };
}

/**
 * Selector matching every pod of an app
 */
export function appSelector(appId: string): IdMap {
  return { [APP_ID_LABEL]: appId };
}
