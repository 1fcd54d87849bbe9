/**
 * Public API: deploy applications to Kubernetes and report their status
 */

export * from './deployer';
export { buildAppStatus, reduceDeploymentState } from './domain/app-status';
export {
  DEPLOYMENT_STATES,
  createDeploymentRequest,
  type AppDefinition,
  type AppDeployer,
  type AppInstanceStatus,
  type AppStatus,
  type DeploymentRequest,
  type DeploymentState,
} from './domain/types';
export * from './errors';
export * from './config';
export {
  createKubernetesClusterClient,
  toLabelSelector,
  type ClusterClient,
  type ClusterClientOptions,
  type LabelMap,
} from './lib/kubernetes';
export { createLogger, createTimer, type Logger, type Timer } from './lib/logger';
export { sleep, type Sleeper } from './shared/async';
