#!/usr/bin/env node
/**
 * kubedeploy CLI entry point
 */

import pino from 'pino';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createDeployerConfig, loadConfigFile } from '../config';
import { KubernetesAppDeployer } from '../deployer/app-deployer';
import { createKubernetesClusterClient } from '../lib/kubernetes';
import { createLogger } from '../lib/logger';
import { createProgram, type GlobalOptions } from './program';

// dist/src/cli/ -> root, src/cli/ -> root
const packageJsonPath = __dirname.includes('dist')
  ? join(__dirname, '../../../package.json')
  : join(__dirname, '../../package.json');
const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
const version =
  typeof packageJson === 'object' &&
  packageJson !== null &&
  'version' in packageJson &&
  typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

function createDeployer(options: GlobalOptions): KubernetesAppDeployer {
  const logger = createLogger(
    { name: 'kubedeploy-cli', level: options.logLevel },
    pino.destination(2),
  );
  const overrides = options.config ? loadConfigFile(options.config) : {};
  const config = createDeployerConfig({
    ...overrides,
    ...(options.namespace !== undefined && { namespace: options.namespace }),
  });

  const client = createKubernetesClusterClient(logger, {
    namespace: config.namespace,
    ...(options.kubeconfig !== undefined && { kubeconfig: options.kubeconfig }),
    ...(options.context !== undefined && { context: options.context }),
  });
  return new KubernetesAppDeployer({ client, config, logger });
}

const program = createProgram({
  version,
  io: {
    out: (text) => process.stdout.write(`${text}\n`),
    err: (text) => process.stderr.write(`${text}\n`),
    setExitCode: (code) => {
      process.exitCode = code;
    },
  },
  createDeployer,
});

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
