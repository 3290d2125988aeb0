/**
 * Dependency Injection Container
 *
 * Builds the adapters every command needs from one validated configuration.
 * Tests pass overrides for any of them.
 */

import type { Logger } from 'pino';
import { createLogger } from '../lib/logger';
import { systemClock, type Clock } from '../lib/clock';
import type { AppConfig } from '../config/app-config';
import { CommandExecutor, type CommandRunner } from '../infrastructure/command-executor';
import { DockerClient, type ContainerRuntime } from '../infrastructure/docker-client';
import { createClusterApi, type ClusterApi } from '../infrastructure/kubernetes-client';

/**
 * All application dependencies with their types
 */
export interface Deps {
  config: AppConfig;
  logger: Logger;
  clock: Clock;

  // Infrastructure
  runner: CommandRunner;
  runtime: ContainerRuntime;
  connect: (context: string) => ClusterApi;
}

/**
 * Partial dependency overrides for testing
 */
export type DepsOverrides = Partial<Omit<Deps, 'config'>>;

/**
 * Create application container with all dependencies
 */
export function createContainer(config: AppConfig, overrides: DepsOverrides = {}): Deps {
  const logger = overrides.logger ?? createLogger({ level: config.logging.level });

  return {
    config,
    logger,
    clock: overrides.clock ?? systemClock,
    runner: overrides.runner ?? new CommandExecutor(logger),
    runtime:
      overrides.runtime ?? new DockerClient({ socketPath: config.docker.socketPath }, logger),
    connect:
      overrides.connect ??
      ((context: string) => createClusterApi(context, logger, config.kubernetes.kubeconfig)),
  };
}
