/**
 * Kubernetes Client - Direct k8s API Access
 *
 * The deployer talks to the cluster only through `ClusterClient`. The production
 * implementation wraps @kubernetes/client-node and converts every API failure
 * into a `KubernetesError`.
 */

import * as k8s from '@kubernetes/client-node';
import type { Logger } from 'pino';
import { KubernetesError, toError } from '../errors';

export type LabelMap = Readonly<Record<string, string>>;

export interface ClusterClient {
  /** Namespace every resource is created in and read from */
  readonly namespace: string;

  createService: (service: k8s.V1Service) => Promise<k8s.V1Service>;
  /** Resolves to undefined when the service does not exist */
  readService: (name: string) => Promise<k8s.V1Service | undefined>;
  /** Resolves to false when there was nothing to delete */
  deleteService: (name: string) => Promise<boolean>;

  createReplicationController: (
    controller: k8s.V1ReplicationController,
  ) => Promise<k8s.V1ReplicationController>;
  deleteReplicationController: (name: string) => Promise<boolean>;

  /** Resolves to undefined when the cluster returned no list at all */
  listPods: (labels: LabelMap) => Promise<k8s.V1PodList | undefined>;
  deletePods: (labels: LabelMap) => Promise<boolean>;
}

export interface ClusterClientOptions {
  namespace: string;
  /** Path to a kubeconfig file; the default loading rules apply when absent */
  kubeconfig?: string;
  context?: string;
}

interface HttpError extends Error {
  statusCode?: number;
}

function isHttpError(error: unknown): error is HttpError {
  return error instanceof Error && 'statusCode' in error;
}

function statusCodeOf(error: unknown): number | undefined {
  return isHttpError(error) ? error.statusCode : undefined;
}

export function toLabelSelector(labels: LabelMap): string {
  return Object.entries(labels)
    .map(([key, value]) => `${key}=${value}`)
    .join(',');
}

/**
 * Create a cluster client bound to one namespace
 */
export const createKubernetesClusterClient = (
  logger: Logger,
  options: ClusterClientOptions,
): ClusterClient => {
  const kc = new k8s.KubeConfig();

  if (options.kubeconfig) {
    kc.loadFromFile(options.kubeconfig);
  } else {
    kc.loadFromDefault();
  }
  if (options.context) {
    kc.setCurrentContext(options.context);
  }

  const coreApi = kc.makeApiClient(k8s.CoreV1Api);
  const namespace = options.namespace;
  const log = logger.child({ component: 'ClusterClient', namespace });

  const fail = (operation: string, resource: string, error: unknown): KubernetesError => {
    const statusCode = statusCodeOf(error);
    const code =
      statusCode === 404 ? 'K8S_NOT_FOUND' : statusCode === 409 ? 'K8S_CONFLICT' : 'K8S_ERROR';
    const cause = toError(error);
    log.debug({ operation, resource, statusCode, error: cause.message }, 'Kubernetes call failed');
    return new KubernetesError(
      `Failed to ${operation} ${resource}: ${cause.message}`,
      code,
      operation,
      resource,
      namespace,
      statusCode,
      cause,
    );
  };

  const deleteIgnoringMissing = async (
    resource: string,
    remove: () => Promise<unknown>,
  ): Promise<boolean> => {
    try {
      await remove();
      return true;
    } catch (error) {
      if (statusCodeOf(error) === 404) {
        return false;
      }
      throw fail('delete', resource, error);
    }
  };

  const listPods = async (labels: LabelMap): Promise<k8s.V1PodList | undefined> => {
    const labelSelector = toLabelSelector(labels);
    try {
      const { body } = await coreApi.listNamespacedPod(
        namespace,
        undefined,
        undefined,
        undefined,
        undefined,
        labelSelector,
      );
      return body;
    } catch (error) {
      throw fail('list', `pods(${labelSelector})`, error);
    }
  };

  return {
    namespace,

    async createService(service) {
      const name = service.metadata?.name ?? 'unnamed';
      try {
        const { body } = await coreApi.createNamespacedService(namespace, service);
        return body;
      } catch (error) {
        throw fail('create', `service/${name}`, error);
      }
    },

    async readService(name) {
      try {
        const { body } = await coreApi.readNamespacedService(name, namespace);
        return body;
      } catch (error) {
        if (statusCodeOf(error) === 404) {
          return undefined;
        }
        throw fail('read', `service/${name}`, error);
      }
    },

    deleteService(name) {
      return deleteIgnoringMissing(`service/${name}`, () =>
        coreApi.deleteNamespacedService(name, namespace),
      );
    },

    async createReplicationController(controller) {
      const name = controller.metadata?.name ?? 'unnamed';
      try {
        const { body } = await coreApi.createNamespacedReplicationController(
          namespace,
          controller,
        );
        return body;
      } catch (error) {
        throw fail('create', `replicationcontroller/${name}`, error);
      }
    },

    deleteReplicationController(name) {
      return deleteIgnoringMissing(`replicationcontroller/${name}`, () =>
        coreApi.deleteNamespacedReplicationController(name, namespace),
      );
    },

    listPods,

    async deletePods(labels) {
      const pods = await listPods(labels);
      const names = (pods?.items ?? [])
        .map((pod) => pod.metadata?.name)
        .filter((name): name is string => name !== undefined);

      let deleted = false;
      for (const name of names) {
        const removed = await deleteIgnoringMissing(`pod/${name}`, () =>
          coreApi.deleteNamespacedPod(name, namespace),
        );
        deleted = deleted || removed;
      }
      return deleted;
    },
  };
};
