/**
 * cluster-bootstrap public API
 */

export { runDeployment, backendSettingsFrom, type DeploymentDeps } from './workflows/deployment';
export { EXIT_CODES, exitCodeFor, formatReport } from './workflows/report';
export type { DeploymentReport, DeploymentStatus, WorkflowStep } from './workflows/types';

export { selectBackend } from './tools/select-backend';
export { ensureCluster } from './tools/prepare-cluster';
export { ensureRegistryReachable } from './tools/connect-registry';
export { applyManifests } from './tools/apply-manifests';
export { watchRollout } from './tools/watch-rollout';
export { verifyHealth } from './tools/verify-deployment';
export { setImage } from './tools/set-image';

export {
  createClusterBackend,
  detectClusterTools,
  type BackendSettings,
  type ClusterBackend,
} from './infrastructure/backends';
export { CommandExecutor, type CommandRunner } from './infrastructure/command-executor';
export { DockerClient, type ContainerRuntime } from './infrastructure/docker-client';
export {
  KubernetesClient,
  createClusterApi,
  type ClusterApi,
} from './infrastructure/kubernetes-client';

export { createAppConfig, type AppConfig, type ConfigOverrides } from './config/app-config';
export { createContainer, type Deps } from './app/container';
export { loadManifestSet, validateManifestOrder } from './lib/manifests';
export { createLogger } from './lib/logger';
export type { Clock } from './lib/clock';

export * from './errors';
export * from './domain/types';
