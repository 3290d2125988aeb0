/**
 * Select Backend Tool
 *
 * Picks one cluster backend from the tools installed on the host. kind is preferred
 * over minikube; a forced backend must itself be installed.
 *
 * @example
 * ```typescript
 * const installed = await detectClusterTools(runner);
 * const result = selectBackend(installed, config.cluster.backend);
 * if (result.ok) {
 *   logger.info({ tool: result.value }, 'Backend selected');
 * }
 * ```
 */

import { NoBackendAvailableError } from '../../errors';
import { Failure, Success, type Result } from '../../domain/types';
import type { ClusterTool } from '../../domain/types';
import { CLUSTER_TOOLS } from '../../infrastructure/backends';

export function selectBackend(
  installed: readonly ClusterTool[],
  preference?: ClusterTool,
): Result<ClusterTool, NoBackendAvailableError> {
  if (preference !== undefined) {
    return installed.includes(preference)
      ? Success(preference)
      : Failure(
          new NoBackendAvailableError(
            `Requested backend ${preference} is not installed`,
            [preference],
          ),
        );
  }

  const tool = CLUSTER_TOOLS.find((candidate) => installed.includes(candidate));
  if (tool === undefined) {
    return Failure(
      new NoBackendAvailableError(
        'Neither kind nor minikube is installed. Please install one of them.',
        CLUSTER_TOOLS,
      ),
    );
  }
  return Success(tool);
}
