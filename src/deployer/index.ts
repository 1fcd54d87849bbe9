export {
  KubernetesAppDeployer,
  COUNT_PROPERTY_KEY,
  LOAD_BALANCER_TYPE,
  SERVER_PORT_KEY,
  type KubernetesAppDeployerOptions,
} from './app-deployer';
export {
  DefaultContainerFactory,
  createCommandArgs,
  createEnvVars,
  resolveImage,
  type ContainerFactory,
} from './container-factory';
export * from './identity';
export {
  ABSENT_INSTANCE_ID,
  defaultInstanceStatusClassifier,
  type InstanceStatusClassifier,
  type RestartLimits,
} from './instance-status';
export { createPodSpec, type PodSpecDependencies } from './pod-spec';
export {
  CPU_PROPERTY_KEY,
  MEMORY_PROPERTY_KEY,
  deduceResourceLimits,
  type ResourceLimits,
} from './resource-limits';
