import { describe, it, expect } from '@jest/globals';
import { createDeployerConfig } from '../../../src/config';
import { createDeploymentRequest } from '../../../src/domain/types';
import {
  DefaultContainerFactory,
  createCommandArgs,
  createEnvVars,
  resolveImage,
} from '../../../src/deployer/container-factory';
import { ValidationError } from '../../../src/errors';

describe('resolveImage', () => {
  it('strips the docker scheme', () => {
    expect(resolveImage('docker:registry.local/time:1.2')).toBe('registry.local/time:1.2');
  });

  it('keeps references without a scheme', () => {
    expect(resolveImage('nginx:1.27')).toBe('nginx:1.27');
  });

  it('rejects an empty reference', () => {
    expect(() => resolveImage('docker:')).toThrow(ValidationError);
  });
});

describe('createCommandArgs', () => {
  it('puts definition properties before command line arguments', () => {
    const request = createDeploymentRequest({
      name: 'time',
      resource: 'docker:time',
      properties: { 'server.port': '9000', 'trigger.delay': '5' },
      commandlineArguments: ['--debug'],
    });

    expect(createCommandArgs(request)).toEqual([
      '--server.port=9000',
      '--trigger.delay=5',
      '--debug',
    ]);
  });
});

describe('createEnvVars', () => {
  it('splits on the first equals sign', () => {
    expect(createEnvVars(['APP_OPTS=-Xmx1g -Dkey=value', 'EMPTY='])).toEqual([
      { name: 'APP_OPTS', value: '-Xmx1g -Dkey=value' },
      { name: 'EMPTY', value: '' },
    ]);
  });

  it('rejects entries without a name', () => {
    expect(() => createEnvVars(['=value'])).toThrow(ValidationError);
  });
});

describe('DefaultContainerFactory', () => {
  it('builds a container with port, args and health probes', () => {
    const config = createDeployerConfig({ environmentVariables: ['MODE=test'] }, {});
    const factory = new DefaultContainerFactory(config);
    const request = createDeploymentRequest({
      name: 'time',
      resource: 'docker:time:1.0',
      properties: { 'server.port': '9000' },
    });

    expect(factory.create('time', request, 9000)).toEqual({
      name: 'time',
      image: 'time:1.0',
      env: [{ name: 'MODE', value: 'test' }],
      args: ['--server.port=9000'],
      ports: [{ containerPort: 9000 }],
      readinessProbe: {
        httpGet: { path: '/health', port: 9000 },
        initialDelaySeconds: 10,
        periodSeconds: 10,
        timeoutSeconds: 2,
      },
      livenessProbe: {
        httpGet: { path: '/health', port: 9000 },
        initialDelaySeconds: 10,
        periodSeconds: 60,
        timeoutSeconds: 2,
      },
    });
  });

  it('applies configured probe settings', () => {
    const config = createDeployerConfig(
      { livenessProbe: { path: '/alive', delay: 30 }, readinessProbe: { timeout: 5 } },
      {},
    );
    const container = new DefaultContainerFactory(config).create(
      'time',
      createDeploymentRequest({ name: 'time', resource: 'time' }),
      8080,
    );

    expect(container.livenessProbe).toEqual({
      httpGet: { path: '/alive', port: 8080 },
      initialDelaySeconds: 30,
      periodSeconds: 60,
      timeoutSeconds: 2,
    });
    expect(container.readinessProbe?.timeoutSeconds).toBe(5);
  });
});
