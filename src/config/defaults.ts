/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for the deployer's default values.
 */

/**
 * Default container resource limits, in Kubernetes quantity syntax
 */
export const DEFAULT_RESOURCES = {
  memory: '512Mi',
  cpu: '500m',
} as const;

/**
 * Default probe settings (seconds)
 */
export const DEFAULT_PROBES = {
  liveness: { path: '/health', delay: 10, period: 60, timeout: 2 },
  readiness: { path: '/health', delay: 10, period: 10, timeout: 2 },
} as const;

/**
 * Restart thresholds after which a running instance is reported as failed
 */
export const DEFAULT_RESTART_LIMITS = {
  maxTerminatedErrorRestarts: 2,
  maxCrashLoopBackOffRestarts: 4,
} as const;

/**
 * Load balancer release wait used on undeploy
 */
export const DEFAULT_LOAD_BALANCER_WAIT = {
  attempts: 30,
  intervalMs: 10000, // 10 seconds
} as const;

export const DEFAULT_NAMESPACE = 'default';

/** Port exposed when the request does not name one */
export const DEFAULT_APP_PORT = 8080;

/** Replica count when the request does not name one */
export const DEFAULT_REPLICA_COUNT = 1;
