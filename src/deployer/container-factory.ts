/**
 * Container construction.
 *
 * Orchestration asks a `ContainerFactory` for the container to run, so the way
 * images, arguments and probes are laid out can be swapped without touching
 * deploy logic.
 */

import type { V1Container, V1EnvVar, V1Probe } from '@kubernetes/client-node';
import type { Logger } from 'pino';
import type { DeployerConfig, ProbeConfig } from '../config/types';
import type { DeploymentRequest } from '../domain/types';
import { ValidationError } from '../errors';

export interface ContainerFactory {
  create: (appId: string, request: DeploymentRequest, port: number) => V1Container;
}

const DOCKER_SCHEME = 'docker:';

/**
 * Image reference from a request resource, without a `docker:` scheme
 */
export function resolveImage(resource: string): string {
  const image = resource.startsWith(DOCKER_SCHEME)
    ? resource.slice(DOCKER_SCHEME.length)
    : resource;
  if (image.trim() === '') {
    throw new ValidationError(`Unable to resolve a container image from '${resource}'`, [
      'resource',
    ]);
  }
  return image;
}

/**
 * Definition properties become `--key=value` arguments, ahead of the request's own arguments
 */
export function createCommandArgs(request: DeploymentRequest): string[] {
  const args = Object.entries(request.definition.properties).map(
    ([key, value]) => `--${key}=${value}`,
  );
  return [...args, ...request.commandlineArguments];
}

/**
 * Parse configured `KEY=value` entries, splitting on the first `=`
 */
export function createEnvVars(entries: readonly string[]): V1EnvVar[] {
  return entries.map((entry) => {
    const separator = entry.indexOf('=');
    if (separator <= 0) {
      throw new ValidationError(`Environment variable '${entry}' is not in KEY=value form`, [
        'environmentVariables',
      ]);
    }
    return { name: entry.slice(0, separator), value: entry.slice(separator + 1) };
  });
}

function createProbe(port: number, probe: ProbeConfig): V1Probe {
  return {
    httpGet: { path: probe.path, port },
    initialDelaySeconds: probe.delay,
    periodSeconds: probe.period,
    timeoutSeconds: probe.timeout,
  };
}

/**
 * One container named after the app, exposing the port with HTTP health probes
 */
export class DefaultContainerFactory implements ContainerFactory {
  constructor(
    private readonly config: Pick<
      DeployerConfig,
      'environmentVariables' | 'livenessProbe' | 'readinessProbe'
    >,
    private readonly logger?: Logger,
  ) {}

  create(appId: string, request: DeploymentRequest, port: number): V1Container {
    const image = resolveImage(request.resource);
    this.logger?.info({ appId, image }, 'Using container image');

    return {
      name: appId,
      image,
      env: createEnvVars(this.config.environmentVariables),
      args: createCommandArgs(request),
      ports: [{ containerPort: port }],
      readinessProbe: createProbe(port, this.config.readinessProbe),
      livenessProbe: createProbe(port, this.config.livenessProbe),
    };
  }
}
