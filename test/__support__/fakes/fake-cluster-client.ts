/**
 * In-memory ClusterClient for unit tests.
 * Resources live in maps; `schedulePods` plays the part of the controller manager.
 */

import type {
  V1Pod,
  V1ReplicationController,
  V1Service,
} from '@kubernetes/client-node';
import { KubernetesError } from '../../../src/errors';
import type { ClusterClient, LabelMap } from '../../../src/lib/kubernetes';

export type ClusterOperation =
  | 'createService'
  | 'readService'
  | 'deleteService'
  | 'createReplicationController'
  | 'deleteReplicationController'
  | 'listPods'
  | 'deletePods';

function matches(labels: Record<string, string> | undefined, selector: LabelMap): boolean {
  return Object.entries(selector).every(([key, value]) => labels?.[key] === value);
}

export class FakeClusterClient implements ClusterClient {
  readonly namespace = 'test-namespace';
  readonly services = new Map<string, V1Service>();
  readonly controllers = new Map<string, V1ReplicationController>();
  pods: V1Pod[] = [];

  /** Every call in order, as `operation:argument` */
  readonly calls: string[] = [];
  /** When set, listPods resolves to undefined */
  podListAbsent = false;
  /** Successive readService results; the stored service is returned once drained */
  serviceReads: Array<V1Service | undefined> = [];

  private readonly failures = new Map<ClusterOperation, Error>();

  failOn(operation: ClusterOperation, error: Error): void {
    this.failures.set(operation, error);
  }

  count(operation: ClusterOperation): number {
    return this.calls.filter((call) => call.startsWith(`${operation}:`)).length;
  }

  async createService(service: V1Service): Promise<V1Service> {
    const name = service.metadata?.name ?? '';
    this.record('createService', name);
    if (this.services.has(name)) {
      throw this.conflict(`service/${name}`);
    }
    this.services.set(name, service);
    return service;
  }

  async readService(name: string): Promise<V1Service | undefined> {
    this.record('readService', name);
    if (this.serviceReads.length > 0) {
      return this.serviceReads.shift();
    }
    return this.services.get(name);
  }

  async deleteService(name: string): Promise<boolean> {
    this.record('deleteService', name);
    return this.services.delete(name);
  }

  async createReplicationController(
    controller: V1ReplicationController,
  ): Promise<V1ReplicationController> {
    const name = controller.metadata?.name ?? '';
    this.record('createReplicationController', name);
    if (this.controllers.has(name)) {
      throw this.conflict(`replicationcontroller/${name}`);
    }
    this.controllers.set(name, controller);
    return controller;
  }

  async deleteReplicationController(name: string): Promise<boolean> {
    this.record('deleteReplicationController', name);
    return this.controllers.delete(name);
  }

  async listPods(labels: LabelMap): Promise<{ items: V1Pod[] } | undefined> {
    this.record('listPods', JSON.stringify(labels));
    if (this.podListAbsent) {
      return undefined;
    }
    return { items: this.pods.filter((pod) => matches(pod.metadata?.labels, labels)) };
  }

  async deletePods(labels: LabelMap): Promise<boolean> {
    this.record('deletePods', JSON.stringify(labels));
    const before = this.pods.length;
    this.pods = this.pods.filter((pod) => !matches(pod.metadata?.labels, labels));
    return this.pods.length < before;
  }

  /**
   * Create the pods a replication controller asks for, all running and ready
   */
  schedulePods(name: string): V1Pod[] {
    const controller = this.controllers.get(name);
    const replicas = controller?.spec?.replicas ?? 0;
    const labels = controller?.spec?.template?.metadata?.labels ?? {};

    const created: V1Pod[] = [];
    for (let index = 0; index < replicas; index++) {
      created.push({
        metadata: { name: `${name}-${index}`, labels: { ...labels } },
        status: {
          phase: 'Running',
          containerStatuses: [
            { name, image: 'test-image', imageID: '', ready: true, restartCount: 0 },
          ],
        },
      });
    }
    this.pods.push(...created);
    return created;
  }

  private record(operation: ClusterOperation, argument: string): void {
    this.calls.push(`${operation}:${argument}`);
    const failure = this.failures.get(operation);
    if (failure) {
      throw failure;
    }
  }

  private conflict(resource: string): KubernetesError {
    return new KubernetesError(
      `Failed to create ${resource}: already exists`,
      'K8S_CONFLICT',
      'create',
      resource,
      this.namespace,
      409,
    );
  }
}
