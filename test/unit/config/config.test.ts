import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createDeployerConfig, loadConfigFile } from '../../../src/config';
import { ConfigurationError } from '../../../src/errors';

describe('createDeployerConfig', () => {
  it('provides defaults', () => {
    expect(createDeployerConfig({}, {})).toEqual({
      namespace: 'default',
      memory: '512Mi',
      cpu: '500m',
      createLoadBalancer: false,
      environmentVariables: [],
      livenessProbe: { path: '/health', delay: 10, period: 60, timeout: 2 },
      readinessProbe: { path: '/health', delay: 10, period: 10, timeout: 2 },
      maxTerminatedErrorRestarts: 2,
      maxCrashLoopBackOffRestarts: 4,
      loadBalancerWait: { attempts: 30, intervalMs: 10000 },
    });
  });

  it('applies environment variables', () => {
    const config = createDeployerConfig(
      {},
      {
        K8S_NAMESPACE: 'apps',
        DEPLOYER_MEMORY: '1Gi',
        DEPLOYER_CPU: '1',
        DEPLOYER_IMAGE_PULL_SECRET: 'registry-credentials',
        DEPLOYER_CREATE_LOAD_BALANCER: 'true',
        DEPLOYER_ENVIRONMENT_VARIABLES: 'A=1, B=two ,',
      },
    );

    expect(config).toMatchObject({
      namespace: 'apps',
      memory: '1Gi',
      cpu: '1',
      imagePullSecret: 'registry-credentials',
      createLoadBalancer: true,
      environmentVariables: ['A=1', 'B=two'],
    });
  });

  it('ignores blank environment variables', () => {
    const config = createDeployerConfig({}, { K8S_NAMESPACE: '  ', DEPLOYER_MEMORY: '' });

    expect(config.namespace).toBe('default');
    expect(config.memory).toBe('512Mi');
  });

  it('lets explicit overrides win over the environment', () => {
    const config = createDeployerConfig(
      { namespace: 'explicit', readinessProbe: { path: '/ready' } },
      { K8S_NAMESPACE: 'from-env' },
    );

    expect(config.namespace).toBe('explicit');
    expect(config.readinessProbe).toEqual({ path: '/ready', delay: 10, period: 10, timeout: 2 });
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(createDeployerConfig({}, {}))).toBe(true);
  });

  it('reports every invalid setting', () => {
    const error = (() => {
      try {
        createDeployerConfig(
          { environmentVariables: ['NO_VALUE'], loadBalancerWait: { attempts: -1 } },
          {},
        );
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      code: 'CONFIG_ERROR',
      violations: [
        { path: 'environmentVariables.0', message: 'Must be in KEY=value form' },
        { path: 'loadBalancerWait.attempts', message: 'Number must be greater than or equal to 0' },
      ],
    });
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'kubedeploy-config-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads overrides from YAML', () => {
    const path = join(dir, 'deployer.yaml');
    writeFileSync(
      path,
      ['namespace: streams', 'createLoadBalancer: true', 'livenessProbe:', '  delay: 45', ''].join(
        '\n',
      ),
    );

    expect(loadConfigFile(path)).toEqual({
      namespace: 'streams',
      createLoadBalancer: true,
      livenessProbe: { delay: 45 },
    });
  });

  it('treats an empty file as no overrides', () => {
    const path = join(dir, 'empty.yaml');
    writeFileSync(path, '');

    expect(loadConfigFile(path)).toEqual({});
  });

  it('rejects values of the wrong type', () => {
    const path = join(dir, 'bad.yaml');
    writeFileSync(path, 'createLoadBalancer: sometimes\n');

    expect(() => loadConfigFile(path)).toThrow(ConfigurationError);
  });

  it('rejects a missing file', () => {
    expect(() => loadConfigFile(join(dir, 'missing.yaml'))).toThrow(
      `Unable to read configuration file ${join(dir, 'missing.yaml')}`,
    );
  });
});
