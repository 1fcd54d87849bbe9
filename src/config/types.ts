/**
 * Configuration Types
 */

import { z } from 'zod';

const probeSchema = z.object({
  path: z.string().startsWith('/'),
  delay: z.number().int().nonnegative(),
  period: z.number().int().positive(),
  timeout: z.number().int().positive(),
});

export const deployerConfigSchema = z.object({
  namespace: z.string().min(1),
  memory: z.string().min(1),
  cpu: z.string().min(1),
  imagePullSecret: z.string().min(1).optional(),
  createLoadBalancer: z.boolean(),
  environmentVariables: z.array(
    z.string().regex(/^[^=]+=/, 'Must be in KEY=value form'),
  ),
  livenessProbe: probeSchema,
  readinessProbe: probeSchema,
  maxTerminatedErrorRestarts: z.number().int().nonnegative(),
  maxCrashLoopBackOffRestarts: z.number().int().nonnegative(),
  loadBalancerWait: z.object({
    attempts: z.number().int().nonnegative(),
    intervalMs: z.number().int().nonnegative(),
  }),
});

export type ProbeConfig = z.infer<typeof probeSchema>;

/**
 * Process-wide deployer settings. Read-only for the lifetime of a deployer.
 */
export type DeployerConfig = Readonly<z.infer<typeof deployerConfigSchema>>;

/**
 * Partial configuration accepted from files and callers
 */
export const deployerConfigOverridesSchema = deployerConfigSchema
  .extend({
    livenessProbe: probeSchema.partial(),
    readinessProbe: probeSchema.partial(),
    loadBalancerWait: deployerConfigSchema.shape.loadBalancerWait.partial(),
  })
  .partial();

export type DeployerConfigOverrides = z.infer<typeof deployerConfigOverridesSchema>;
