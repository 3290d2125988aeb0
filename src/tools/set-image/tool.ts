/**
 * Set Image Tool
 *
 * Points a running deployment's container at a new image. The rollout that follows
 * is watched by the caller.
 */

import { createTimer } from '../../lib/logger';
import { ErrorCodes, KubernetesError, extractErrorMessage, toError } from '../../errors';
import { Failure, Success, type Result } from '../../domain/types';
import type { ClusterApi } from '../../infrastructure/kubernetes-client';
import type { ToolContext } from '../types';

export interface SetImageParams {
  deployment: string;
  namespace: string;
  image: string;
  /** Defaults to the first container of the pod template */
  container?: string | undefined;
}

export interface SetImageResult {
  deployment: string;
  namespace: string;
  container: string;
  image: string;
}

async function setImageImpl(
  params: SetImageParams,
  api: ClusterApi,
  context: ToolContext,
): Promise<Result<SetImageResult, KubernetesError>> {
  const logger = context.logger.child({ component: 'set-image' });
  const { deployment, namespace, image, container } = params;
  const timer = createTimer(logger, 'set-image', { deployment, namespace, image });

  try {
    const updated = await api.setImage(deployment, namespace, container, image);
    timer.end({ container: updated });
    return Success({ deployment, namespace, container: updated, image });
  } catch (error) {
    timer.error(error);
    return Failure(
      error instanceof KubernetesError
        ? error
        : new KubernetesError(
            `Failed to set image: ${extractErrorMessage(error)}`,
            ErrorCodes.K8S_ERROR,
            `Deployment/${deployment}`,
            namespace,
            undefined,
            toError(error),
          ),
    );
  }
}

export const setImage = setImageImpl;
