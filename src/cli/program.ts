/**
 * Command definitions for the kubedeploy CLI.
 *
 * Kept free of cluster wiring so commands can run against any AppDeployer.
 */

import { Command, Option } from 'commander';
import yaml from 'js-yaml';
import { createDeploymentRequest, type AppDeployer } from '../domain/types';
import { GROUP_PROPERTY_KEY } from '../deployer/identity';
import { COUNT_PROPERTY_KEY } from '../deployer/app-deployer';
import { ValidationError, executeAsResult } from '../errors';

export interface GlobalOptions {
  namespace?: string;
  config?: string;
  kubeconfig?: string;
  context?: string;
  logLevel: string;
}

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
  setExitCode: (code: number) => void;
}

export interface ProgramDependencies {
  version: string;
  io: CliIO;
  createDeployer: (options: GlobalOptions) => AppDeployer;
}

interface DeployOptions {
  image: string;
  property: string[];
  env: string[];
  arg: string[];
  count?: string;
  group?: string;
}

interface StatusOptions {
  output: 'json' | 'yaml';
}

const collect = (value: string, previous: string[]): string[] => [...previous, value];

/**
 * Parse repeated `key=value` flags into a map. The value may itself contain `=`.
 */
export function parseKeyValuePairs(
  pairs: readonly string[],
  flag: string,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new ValidationError(`Expected key=value for ${flag}, got '${pair}'`, [flag]);
    }
    result[pair.slice(0, separator)] = pair.slice(separator + 1);
  }
  return result;
}

export function createProgram({ version, io, createDeployer }: ProgramDependencies): Command {
  const program = new Command();

  const run = async <T>(fn: () => Promise<T>, render: (value: T) => string): Promise<void> => {
    const result = await executeAsResult(fn);
    if (result.ok) {
      io.out(render(result.value));
    } else {
      io.err(`${result.code}: ${result.error}`);
      io.setExitCode(1);
    }
  };

  const deployer = (): AppDeployer => createDeployer(program.opts<GlobalOptions>());

  program
    .name('kubedeploy')
    .description('Deploy applications to Kubernetes and report their status')
    .version(version)
    .option(
      '-n, --namespace <namespace>',
      'Kubernetes namespace (default: K8S_NAMESPACE or default)',
    )
    .option('--config <path>', 'YAML configuration file')
    .option('--kubeconfig <path>', 'kubeconfig file (default: standard loading rules)')
    .option('--context <name>', 'kubeconfig context to use')
    .option('--log-level <level>', 'logging level: debug, info, warn, error', 'warn');

  program
    .command('deploy')
    .description('Deploy an application and print its app id')
    .argument('<name>', 'application definition name')
    .requiredOption('--image <ref>', 'container image, optionally prefixed with docker:')
    .option('-p, --property <key=value>', 'application property (repeatable)', collect, [])
    .option('-e, --env <key=value>', 'deployer environment property (repeatable)', collect, [])
    .option('--arg <value>', 'extra container argument (repeatable)', collect, [])
    .option('--count <n>', `instance count (sets ${COUNT_PROPERTY_KEY})`)
    .option('--group <id>', `group id (sets ${GROUP_PROPERTY_KEY})`)
    .action(async (name: string, options: DeployOptions) => {
      await run(
        async () => {
          const environmentProperties = parseKeyValuePairs(options.env, '--env');
          if (options.count !== undefined) {
            environmentProperties[COUNT_PROPERTY_KEY] = options.count;
          }
          if (options.group !== undefined) {
            environmentProperties[GROUP_PROPERTY_KEY] = options.group;
          }

          const request = createDeploymentRequest({
            name,
            resource: options.image,
            properties: parseKeyValuePairs(options.property, '--property'),
            environmentProperties,
            commandlineArguments: options.arg,
          });
          return deployer().deploy(request);
        },
        (appId) => appId,
      );
    });

  program
    .command('status')
    .description('Print the aggregated status of an application')
    .argument('<appId>', 'app id returned by deploy')
    .addOption(
      new Option('-o, --output <format>', 'output format').choices(['json', 'yaml']).default('json'),
    )
    .action(async (appId: string, options: StatusOptions) => {
      await run(
        () => deployer().status(appId),
        (status) =>
          options.output === 'yaml' ? yaml.dump(status).trimEnd() : JSON.stringify(status, null, 2),
      );
    });

  program
    .command('undeploy')
    .description('Remove an application and all of its instances')
    .argument('<appId>', 'app id returned by deploy')
    .action(async (appId: string) => {
      await run(
        () => deployer().undeploy(appId),
        () => `Undeployed ${appId}`,
      );
    });

  return program;
}
