import type { Logger } from 'pino';
import type { ClusterTool } from '../../domain/types';
import type { CommandRunner } from '../command-executor';
import { KindBackend } from './kind';
import { MinikubeBackend } from './minikube';
import type { BackendSettings, ClusterBackend } from './types';

export { buildKindClusterConfig, KindBackend } from './kind';
export { MinikubeBackend, parseMinikubeStatus } from './minikube';
export type { BackendSettings, ClusterBackend } from './types';

/** Preference order when more than one tool is installed */
export const CLUSTER_TOOLS: readonly ClusterTool[] = ['kind', 'minikube'];

/**
 * Which cluster tools are on PATH, in preference order
 */
export async function detectClusterTools(runner: CommandRunner): Promise<ClusterTool[]> {
  const installed: ClusterTool[] = [];
  for (const tool of CLUSTER_TOOLS) {
    if (await runner.isAvailable(tool)) {
      installed.push(tool);
    }
  }
  return installed;
}

export function createClusterBackend(
  tool: ClusterTool,
  runner: CommandRunner,
  settings: BackendSettings,
  logger: Logger,
): ClusterBackend {
  switch (tool) {
    case 'kind':
      return new KindBackend(runner, settings, logger);
    case 'minikube':
      return new MinikubeBackend(runner, settings, logger);
  }
}
