/**
 * Deployer configuration with environment overrides
 */

import { readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import type { ZodError } from 'zod';
import { ConfigurationError, toError } from '../errors';
import {
  DEFAULT_LOAD_BALANCER_WAIT,
  DEFAULT_NAMESPACE,
  DEFAULT_PROBES,
  DEFAULT_RESOURCES,
  DEFAULT_RESTART_LIMITS,
} from './defaults';
import {
  deployerConfigOverridesSchema,
  deployerConfigSchema,
  type DeployerConfig,
  type DeployerConfigOverrides,
} from './types';

type Env = Record<string, string | undefined>;

/**
 * Create default configuration
 */
function createDefaultConfig(): DeployerConfig {
  return {
    namespace: DEFAULT_NAMESPACE,
    memory: DEFAULT_RESOURCES.memory,
    cpu: DEFAULT_RESOURCES.cpu,
    createLoadBalancer: false,
    environmentVariables: [],
    livenessProbe: { ...DEFAULT_PROBES.liveness },
    readinessProbe: { ...DEFAULT_PROBES.readiness },
    maxTerminatedErrorRestarts: DEFAULT_RESTART_LIMITS.maxTerminatedErrorRestarts,
    maxCrashLoopBackOffRestarts: DEFAULT_RESTART_LIMITS.maxCrashLoopBackOffRestarts,
    loadBalancerWait: { ...DEFAULT_LOAD_BALANCER_WAIT },
  };
}

/**
 * Handle empty string environment variables as unset
 */
function getEnvValue(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return ['true', '1', 'yes'].includes(value.toLowerCase());
}

/**
 * Read overrides from environment variables
 */
function readEnvOverrides(env: Env): DeployerConfigOverrides {
  const overrides: DeployerConfigOverrides = {};

  const namespace = getEnvValue(env, 'K8S_NAMESPACE');
  if (namespace) overrides.namespace = namespace;

  const memory = getEnvValue(env, 'DEPLOYER_MEMORY');
  if (memory) overrides.memory = memory;

  const cpu = getEnvValue(env, 'DEPLOYER_CPU');
  if (cpu) overrides.cpu = cpu;

  const imagePullSecret = getEnvValue(env, 'DEPLOYER_IMAGE_PULL_SECRET');
  if (imagePullSecret) overrides.imagePullSecret = imagePullSecret;

  const createLoadBalancer = parseBoolean(getEnvValue(env, 'DEPLOYER_CREATE_LOAD_BALANCER'));
  if (createLoadBalancer !== undefined) overrides.createLoadBalancer = createLoadBalancer;

  const environmentVariables = getEnvValue(env, 'DEPLOYER_ENVIRONMENT_VARIABLES');
  if (environmentVariables) {
    overrides.environmentVariables = environmentVariables
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  }

  return overrides;
}

function mergeConfig(base: DeployerConfig, overrides: DeployerConfigOverrides): DeployerConfig {
  return {
    ...base,
    ...overrides,
    livenessProbe: { ...base.livenessProbe, ...overrides.livenessProbe },
    readinessProbe: { ...base.readinessProbe, ...overrides.readinessProbe },
    loadBalancerWait: { ...base.loadBalancerWait, ...overrides.loadBalancerWait },
  };
}

function toViolations(error: ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

/**
 * Create the deployer configuration: defaults, then environment, then explicit overrides.
 * @throws ConfigurationError when the merged configuration is invalid
 */
export function createDeployerConfig(
  overrides: DeployerConfigOverrides = {},
  env: Env = process.env,
): DeployerConfig {
  const merged = mergeConfig(mergeConfig(createDefaultConfig(), readEnvOverrides(env)), overrides);

  const parsed = deployerConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const violations = toViolations(parsed.error);
    throw new ConfigurationError(
      `Invalid deployer configuration: ${violations.map((v) => `${v.path}: ${v.message}`).join('; ')}`,
      violations,
    );
  }
  return Object.freeze(parsed.data);
}

/**
 * Load configuration overrides from a YAML (or JSON) file
 */
export function loadConfigFile(path: string): DeployerConfigOverrides {
  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Unable to read configuration file ${path}`, [], toError(error));
  }

  const parsed = deployerConfigOverridesSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const violations = toViolations(parsed.error);
    throw new ConfigurationError(
      `Invalid configuration file ${path}: ${violations.map((v) => `${v.path}: ${v.message}`).join('; ')}`,
      violations,
    );
  }
  return parsed.data;
}
