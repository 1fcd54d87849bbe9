import type { Logger } from 'pino';
import type { DeployerConfig } from '../config/types';
import type { DeploymentRequest } from '../domain/types';

export const MEMORY_PROPERTY_KEY = 'deployer.kubernetes.memory';
export const CPU_PROPERTY_KEY = 'deployer.kubernetes.cpu';

export interface ResourceLimits {
  memory: string;
  cpu: string;
}

/**
 * Resolve container limits. A per-request environment property wins over the
 * configured default. Quantities are passed through unchecked; the cluster
 * rejects malformed ones on create.
 */
export function deduceResourceLimits(
  request: DeploymentRequest,
  config: Pick<DeployerConfig, 'memory' | 'cpu'>,
  logger?: Logger,
): ResourceLimits {
  const memory = request.environmentProperties[MEMORY_PROPERTY_KEY] ?? config.memory;
  const cpu = request.environmentProperties[CPU_PROPERTY_KEY] ?? config.cpu;

  logger?.debug({ cpu, memory }, 'Using resource limits');
  return { memory, cpu };
}
