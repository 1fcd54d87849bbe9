/**
 * Core type definitions for the deployer.
 */

/**
 * What to run: a named definition and its application properties.
 */
export interface AppDefinition {
  readonly name: string;
  /** Passed to the application, e.g. `server.port` */
  readonly properties: Readonly<Record<string, string>>;
}

/**
 * A platform-agnostic request to deploy one application.
 * Never mutated by the deployer.
 */
export interface DeploymentRequest {
  readonly definition: AppDefinition;
  /** Container image reference, optionally prefixed with `docker:` */
  readonly resource: string;
  /** Deployer-level settings such as replica count, group id and resource overrides */
  readonly environmentProperties: Readonly<Record<string, string>>;
  readonly commandlineArguments: readonly string[];
}

export const DEPLOYMENT_STATES = [
  'unknown',
  'deploying',
  'deployed',
  'partial',
  'failed',
  'error',
] as const;

export type DeploymentState = (typeof DEPLOYMENT_STATES)[number];

/**
 * Status of one running instance (pod) of an app
 */
export interface AppInstanceStatus {
  readonly id: string;
  readonly state: DeploymentState;
  readonly attributes: Readonly<Record<string, string>>;
}

/**
 * Aggregate status of all instances of one app
 */
export interface AppStatus {
  readonly deploymentId: string;
  readonly instances: Readonly<Record<string, AppInstanceStatus>>;
  readonly state: DeploymentState;
}

/**
 * Operations exposed to callers. Each call is independent of the others.
 */
export interface AppDeployer {
  deploy(request: DeploymentRequest): Promise<string>;
  undeploy(appId: string): Promise<void>;
  status(appId: string): Promise<AppStatus>;
}

/**
 * Build a request with empty defaults for the optional maps
 */
export function createDeploymentRequest(
  init: Pick<DeploymentRequest, 'resource'> & {
    name: string;
    properties?: Record<string, string>;
    environmentProperties?: Record<string, string>;
    commandlineArguments?: string[];
  },
): DeploymentRequest {
  return Object.freeze({
    definition: Object.freeze({ name: init.name, properties: { ...init.properties } }),
    resource: init.resource,
    environmentProperties: { ...init.environmentProperties },
    commandlineArguments: [...(init.commandlineArguments ?? [])],
  });
}
