/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for the default values used by the deploy pipeline.
 */

export const DEFAULT_CLUSTER = {
  name: 'local-cicd',
  kindNetwork: 'kind',
  /** NodePort the workload service exposes, mapped onto the host by kind */
  nodePort: 30080,
  hostPort: 30080,
  reachabilityAttempts: 10,
} as const;

export const DEFAULT_REGISTRY = {
  name: 'local-registry',
  image: 'registry:2',
  /** Published on the host */
  port: 5000,
  /** registry:2 always listens here inside its container */
  containerPort: 5000,
} as const;

export const DEFAULT_DEPLOYMENT = {
  namespace: 'cicd-demo',
  appName: 'demo-app',
  manifestsDir: './kubernetes',
} as const;

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  clusterCreate: 600000, // 10 minutes
  clusterReachabilityPoll: 3000,
  command: 30000,
  rollout: 300000, // 5 minutes
  rolloutPoll: 2000,
  healthInitialDelay: 5000,
  healthBackoff: 2000,
  healthRequest: 5000,
} as const;

export const DEFAULT_HEALTH = {
  path: '/health',
  attempts: 5,
} as const;

export const DEFAULT_DOCKER_SOCKET = '/var/run/docker.sock';

/**
 * Manifest files applied by the deploy command, in apply order
 */
export const MANIFEST_FILES = ['namespace.yaml', 'deployment.yaml', 'service.yaml'] as const;
