export { createDeployerConfig, loadConfigFile } from './config';
export * from './defaults';
export {
  deployerConfigSchema,
  deployerConfigOverridesSchema,
  type DeployerConfig,
  type DeployerConfigOverrides,
  type ProbeConfig,
} from './types';
