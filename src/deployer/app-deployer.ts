/**
 * Kubernetes App Deployer
 *
 * Deploys an app as a Service plus a ReplicationController sharing one label
 * set, reports status from the pods carrying those labels, and tears both down
 * again. Every call reads the cluster afresh; nothing is cached between calls.
 */

import type {
  V1ReplicationController,
  V1Service,
  V1ServiceSpec,
} from '@kubernetes/client-node';
import type { Logger } from 'pino';
import type { DeployerConfig } from '../config/types';
import { DEFAULT_APP_PORT, DEFAULT_REPLICA_COUNT } from '../config/defaults';
import { buildAppStatus } from '../domain/app-status';
import type { AppDeployer, AppStatus, DeploymentRequest } from '../domain/types';
import { DeploymentConflictError, KubernetesError, UndeployError, toError } from '../errors';
import type { ClusterClient } from '../lib/kubernetes';
import { createTimer } from '../lib/logger';
import { sleep as defaultSleep, type Sleeper } from '../shared/async';
import { parseIntegerProperty } from '../shared/parse';
import { DefaultContainerFactory, type ContainerFactory } from './container-factory';
import {
  appSelector,
  createDeploymentId,
  createIdMap,
  createLabels,
  type IdMap,
} from './identity';
import { defaultInstanceStatusClassifier, type InstanceStatusClassifier } from './instance-status';
import { createPodSpec } from './pod-spec';

/** Definition property naming the port the app listens on */
export const SERVER_PORT_KEY = 'server.port';

/** Environment property naming the number of instances */
export const COUNT_PROPERTY_KEY = 'deployer.count';

export const LOAD_BALANCER_TYPE = 'LoadBalancer';

export interface KubernetesAppDeployerOptions {
  client: ClusterClient;
  config: DeployerConfig;
  logger: Logger;
  containerFactory?: ContainerFactory;
  statusClassifier?: InstanceStatusClassifier;
  sleep?: Sleeper;
}

function isConflict(error: unknown): error is KubernetesError {
  return error instanceof KubernetesError && error.statusCode === 409;
}

/**
 * True while the cluster reports a load balancer ingress list that is present but empty
 */
function awaitingIngressRelease(service: V1Service | undefined): boolean {
  const ingress = service?.status?.loadBalancer?.ingress;
  return ingress !== undefined && ingress.length === 0;
}

export class KubernetesAppDeployer implements AppDeployer {
  private readonly client: ClusterClient;
  private readonly config: DeployerConfig;
  private readonly logger: Logger;
  private readonly containerFactory: ContainerFactory;
  private readonly statusClassifier: InstanceStatusClassifier;
  private readonly sleep: Sleeper;

  constructor(options: KubernetesAppDeployerOptions) {
    this.client = options.client;
    this.config = options.config;
    this.logger = options.logger.child({ component: 'KubernetesAppDeployer' });
    this.containerFactory =
      options.containerFactory ?? new DefaultContainerFactory(options.config, this.logger);
    this.statusClassifier = options.statusClassifier ?? defaultInstanceStatusClassifier;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Deploy the request and return its app id.
   *
   * Rejects an app id that already has instances. The Service is created before
   * the ReplicationController and is left in place if the second create fails;
   * `undeploy` removes it.
   */
  async deploy(request: DeploymentRequest): Promise<string> {
    const appId = createDeploymentId(request);
    const idMap = createIdMap(appId, request);
    const timer = createTimer(this.logger, 'deploy', { appId });

    try {
      this.logger.debug({ appId }, 'Deploying app');

      const current = await this.status(appId);
      if (current.state !== 'unknown') {
        throw new DeploymentConflictError(appId);
      }

      const port = this.resolvePort(request);
      const replicas = this.resolveReplicaCount(request);
      const controller = this.buildReplicationController(appId, request, idMap, port, replicas);

      this.logger.debug({ appId, port }, 'Creating service');
      const service = this.buildService(appId, idMap, port);
      await this.createGuarded(appId, () => this.client.createService(service));

      this.logger.debug({ appId, port, replicas }, 'Creating replication controller');
      await this.createGuarded(appId, () => this.client.createReplicationController(controller));

      timer.end({ port, replicas });
      return appId;
    } catch (error) {
      timer.error(error);
      throw error;
    }
  }

  /**
   * Remove the Service, the ReplicationController and the app's pods.
   * A LoadBalancer service is first given time to release its ingress.
   */
  async undeploy(appId: string): Promise<void> {
    const timer = createTimer(this.logger, 'undeploy', { appId });

    try {
      const service = await this.client.readService(appId);
      if (service?.spec?.type === LOAD_BALANCER_TYPE) {
        await this.waitForLoadBalancer(appId, service);
      }

      const serviceDeleted = await this.client.deleteService(appId);
      this.logger.debug({ appId, deleted: serviceDeleted }, 'Deleted service');

      const controllerDeleted = await this.client.deleteReplicationController(appId);
      this.logger.debug({ appId, deleted: controllerDeleted }, 'Deleted replication controller');

      const podsDeleted = await this.client.deletePods(appSelector(appId));
      this.logger.debug({ appId, deleted: podsDeleted }, 'Deleted pods');

      timer.end();
    } catch (error) {
      timer.error(error);
      throw new UndeployError(appId, toError(error));
    }
  }

  async status(appId: string): Promise<AppStatus> {
    const pods = await this.client.listPods(appSelector(appId));

    const instances =
      pods === undefined
        ? [this.statusClassifier.classify(appId, undefined, this.config)]
        : pods.items.map((pod) => this.statusClassifier.classify(appId, pod, this.config));

    const status = buildAppStatus(appId, instances);
    this.logger.debug(
      { appId, state: status.state, instances: instances.length },
      'Resolved app status',
    );
    return status;
  }

  private resolvePort(request: DeploymentRequest): number {
    const value = request.definition.properties[SERVER_PORT_KEY];
    return value === undefined ? DEFAULT_APP_PORT : parseIntegerProperty(SERVER_PORT_KEY, value);
  }

  private resolveReplicaCount(request: DeploymentRequest): number {
    const value = request.environmentProperties[COUNT_PROPERTY_KEY];
    return value === undefined
      ? DEFAULT_REPLICA_COUNT
      : parseIntegerProperty(COUNT_PROPERTY_KEY, value);
  }

  /**
   * The cluster's name uniqueness is the authoritative duplicate guard: a 409
   * on create means another deploy of the same id got there first.
   */
  private async createGuarded(appId: string, create: () => Promise<unknown>): Promise<void> {
    try {
      await create();
    } catch (error) {
      if (isConflict(error)) {
        throw new DeploymentConflictError(appId, error);
      }
      throw error;
    }
  }

  private buildService(appId: string, idMap: IdMap, port: number): V1Service {
    const spec: V1ServiceSpec = {
      selector: { ...idMap },
      ports: [{ port }],
    };
    if (this.config.createLoadBalancer) {
      spec.type = LOAD_BALANCER_TYPE;
    }

    return {
      apiVersion: 'v1',
      kind: 'Service',
      metadata: { name: appId, labels: { ...createLabels(idMap) } },
      spec,
    };
  }

  private buildReplicationController(
    appId: string,
    request: DeploymentRequest,
    idMap: IdMap,
    port: number,
    replicas: number,
  ): V1ReplicationController {
    const labels = createLabels(idMap);

    return {
      apiVersion: 'v1',
      kind: 'ReplicationController',
      metadata: { name: appId, labels: { ...labels } },
      spec: {
        replicas,
        selector: { ...idMap },
        template: {
          metadata: { labels: { ...labels } },
          spec: createPodSpec(appId, request, port, {
            containerFactory: this.containerFactory,
            config: this.config,
            logger: this.logger,
          }),
        },
      },
    };
  }

  private async waitForLoadBalancer(appId: string, initial: V1Service): Promise<void> {
    const { attempts, intervalMs } = this.config.loadBalancerWait;
    let service: V1Service | undefined = initial;

    for (let attempt = 1; attempt <= attempts && awaitingIngressRelease(service); attempt++) {
      this.logger.debug({ appId, attempt }, 'Waiting for load balancer');
      try {
        await this.sleep(intervalMs);
      } catch (error) {
        this.logger.debug(
          { appId, attempt, error: toError(error).message },
          'Load balancer wait interrupted',
        );
      }
      service = await this.client.readService(appId);
    }

    this.logger.debug(
      { appId, ingress: service?.status?.loadBalancer?.ingress },
      'Load balancer ingress',
    );
  }
}
