import type { V1PodSpec } from '@kubernetes/client-node';
import type { Logger } from 'pino';
import type { DeployerConfig } from '../config/types';
import type { DeploymentRequest } from '../domain/types';
import type { ContainerFactory } from './container-factory';
import { deduceResourceLimits } from './resource-limits';

export interface PodSpecDependencies {
  containerFactory: ContainerFactory;
  config: Pick<DeployerConfig, 'memory' | 'cpu' | 'imagePullSecret'>;
  logger?: Logger;
}

/**
 * Pod spec holding the factory's container with resolved limits, plus the
 * configured image pull secret
 */
export function createPodSpec(
  appId: string,
  request: DeploymentRequest,
  port: number,
  { containerFactory, config, logger }: PodSpecDependencies,
): V1PodSpec {
  const container = containerFactory.create(appId, request, port);
  const limits = deduceResourceLimits(request, config, logger);

  return {
    ...(config.imagePullSecret !== undefined && {
      imagePullSecrets: [{ name: config.imagePullSecret }],
    }),
    containers: [
      {
        ...container,
        resources: { ...container.resources, limits: { memory: limits.memory, cpu: limits.cpu } },
      },
    ],
  };
}
