/**
 * Unified Application Configuration
 *
 * Defaults, then environment variables, then CLI overrides, validated with Zod.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { LOG_LEVELS } from '../lib/logger';
import {
  DEFAULT_CLUSTER,
  DEFAULT_DEPLOYMENT,
  DEFAULT_DOCKER_SOCKET,
  DEFAULT_HEALTH,
  DEFAULT_REGISTRY,
  DEFAULT_TIMEOUTS,
} from './defaults';

const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

const dnsLabel = z
  .string()
  .max(63, 'must be 63 characters or less')
  .regex(DNS_LABEL, 'must contain only lowercase letters, numbers, and hyphens');

const PortSchema = z.coerce.number().int().min(1).max(65535);
const PositiveIntSchema = z.coerce.number().int().positive();

const BooleanSchema = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

const AppConfigSchema = z.object({
  cluster: z.object({
    name: dnsLabel,
    backend: z.enum(['kind', 'minikube']).optional(),
    nodePort: PortSchema,
    hostPort: PortSchema,
    reachabilityAttempts: PositiveIntSchema,
    reachabilityIntervalMs: PositiveIntSchema,
  }),
  registry: z.object({
    name: dnsLabel,
    image: z.string().min(1),
    port: PortSchema,
    continueOnFailure: BooleanSchema,
  }),
  deployment: z.object({
    namespace: dnsLabel,
    appName: dnsLabel,
    manifestsDir: z.string().min(1),
    image: z.string().min(1).optional(),
  }),
  rollout: z.object({
    timeoutMs: PositiveIntSchema,
    pollIntervalMs: PositiveIntSchema,
  }),
  health: z.object({
    path: z.string().startsWith('/'),
    attempts: PositiveIntSchema,
    backoffMs: z.coerce.number().int().nonnegative(),
    initialDelayMs: z.coerce.number().int().nonnegative(),
    requestTimeoutMs: PositiveIntSchema,
  }),
  docker: z.object({
    socketPath: z.string().min(1),
  }),
  kubernetes: z.object({
    kubeconfig: z.string().min(1).optional(),
  }),
  logging: z.object({
    level: z.enum(LOG_LEVELS),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Values the CLI can override; unset keys fall through to env and defaults
 */
export interface ConfigOverrides {
  clusterName?: string;
  backend?: string;
  namespace?: string;
  appName?: string;
  manifestsDir?: string;
  image?: string;
  timeoutSeconds?: number;
  continueOnRegistryFailure?: boolean;
  dockerSocket?: string;
  logLevel?: string;
}

/**
 * Empty strings count as unset
 */
function getEnvValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function secondsToMs(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) ? Math.round(seconds * 1000) : Number.NaN;
}

/**
 * Create configuration with environment variable overrides and validation
 */
export function createAppConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): AppConfig {
  const read = (key: string): string | undefined => getEnvValue(env, key);

  const rawConfig = {
    cluster: {
      name: overrides.clusterName ?? read('CLUSTER_NAME') ?? DEFAULT_CLUSTER.name,
      backend: overrides.backend ?? read('CLUSTER_BACKEND'),
      nodePort: read('NODE_PORT') ?? DEFAULT_CLUSTER.nodePort,
      hostPort: read('HOST_PORT') ?? DEFAULT_CLUSTER.hostPort,
      reachabilityAttempts: DEFAULT_CLUSTER.reachabilityAttempts,
      reachabilityIntervalMs: DEFAULT_TIMEOUTS.clusterReachabilityPoll,
    },
    registry: {
      name: read('REGISTRY_NAME') ?? DEFAULT_REGISTRY.name,
      image: read('REGISTRY_IMAGE') ?? DEFAULT_REGISTRY.image,
      port: read('REGISTRY_PORT') ?? DEFAULT_REGISTRY.port,
      continueOnFailure:
        overrides.continueOnRegistryFailure ?? read('CONTINUE_ON_REGISTRY_FAILURE') ?? false,
    },
    deployment: {
      namespace: overrides.namespace ?? read('NAMESPACE') ?? DEFAULT_DEPLOYMENT.namespace,
      appName: overrides.appName ?? read('APP_NAME') ?? DEFAULT_DEPLOYMENT.appName,
      manifestsDir:
        overrides.manifestsDir ?? read('MANIFESTS_DIR') ?? DEFAULT_DEPLOYMENT.manifestsDir,
      image: overrides.image ?? read('IMAGE'),
    },
    rollout: {
      timeoutMs:
        secondsToMs(overrides.timeoutSeconds ?? read('ROLLOUT_TIMEOUT')) ??
        DEFAULT_TIMEOUTS.rollout,
      pollIntervalMs: read('ROLLOUT_POLL_INTERVAL') ?? DEFAULT_TIMEOUTS.rolloutPoll,
    },
    health: {
      path: read('HEALTH_PATH') ?? DEFAULT_HEALTH.path,
      attempts: read('HEALTH_ATTEMPTS') ?? DEFAULT_HEALTH.attempts,
      backoffMs: read('HEALTH_BACKOFF') ?? DEFAULT_TIMEOUTS.healthBackoff,
      initialDelayMs: read('HEALTH_INITIAL_DELAY') ?? DEFAULT_TIMEOUTS.healthInitialDelay,
      requestTimeoutMs: read('HEALTH_TIMEOUT') ?? DEFAULT_TIMEOUTS.healthRequest,
    },
    docker: {
      socketPath: overrides.dockerSocket ?? read('DOCKER_SOCKET') ?? DEFAULT_DOCKER_SOCKET,
    },
    kubernetes: {
      kubeconfig: read('KUBECONFIG'),
    },
    logging: {
      level: overrides.logLevel ?? read('LOG_LEVEL') ?? 'info',
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Configuration validation failed: ${issues.join('; ')}`, issues);
  }

  return result.data;
}
