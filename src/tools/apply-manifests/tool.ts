/**
 * Apply Manifests Tool
 *
 * Creates the target namespace, then applies Namespace → Deployment → Service one at a
 * time. The order is checked before the cluster is touched; the first failed apply
 * stops the run and leaves earlier resources in place.
 */

import { createTimer } from '../../lib/logger';
import {
  deploymentTargetFrom,
  prepareManifests,
  validateManifestOrder,
} from '../../lib/manifests';
import { ManifestApplyError, extractErrorMessage, toError } from '../../errors';
import { Failure, Success, type Result } from '../../domain/types';
import type { AppliedManifest, DeploymentTarget, K8sManifest } from '../../domain/types';
import { resourceName, type ClusterApi } from '../../infrastructure/kubernetes-client';
import type { ToolContext } from '../types';

export interface ApplyManifestsParams {
  namespace: string;
  manifests: readonly K8sManifest[];
  /** Replaces the first container image of the Deployment */
  image?: string | undefined;
  /** When set, the Deployment must carry this name */
  appName?: string | undefined;
}

export interface ApplyManifestsResult {
  namespace: { name: string; action: 'created' | 'exists' };
  applied: AppliedManifest[];
  target: DeploymentTarget;
}

async function applyManifestsImpl(
  params: ApplyManifestsParams,
  api: ClusterApi,
  context: ToolContext,
): Promise<Result<ApplyManifestsResult, ManifestApplyError>> {
  const logger = context.logger.child({ component: 'apply-manifests' });
  const { namespace, image } = params;

  const order = validateManifestOrder(params.manifests);
  if (!order.ok) {
    logger.error({ resource: order.error.resource }, order.error.message);
    return Failure(order.error);
  }

  let manifests: K8sManifest[];
  let target: DeploymentTarget;
  try {
    manifests = prepareManifests(params.manifests, namespace, image);
    target = deploymentTargetFrom(manifests, namespace);
  } catch (error) {
    return Failure(
      error instanceof ManifestApplyError
        ? error
        : new ManifestApplyError(extractErrorMessage(error), 'Deployment', toError(error)),
    );
  }

  if (params.appName !== undefined && target.name !== params.appName) {
    const resource = `Deployment/${target.name}`;
    const message = `${resource} does not match the workload name ${params.appName}`;
    logger.error({ resource, appName: params.appName }, message);
    return Failure(new ManifestApplyError(message, resource));
  }

  const timer = createTimer(logger, 'apply-manifests', {
    namespace,
    manifestCount: manifests.length,
  });

  let namespaceAction: 'created' | 'exists';
  try {
    namespaceAction = await api.ensureNamespace(namespace);
  } catch (error) {
    timer.error(error);
    return Failure(
      new ManifestApplyError(
        `Namespace ${namespace} could not be created: ${extractErrorMessage(error)}`,
        `Namespace/${namespace}`,
        toError(error),
      ),
    );
  }

  const applied: AppliedManifest[] = [];
  for (const manifest of manifests) {
    const resource = resourceName(manifest);
    try {
      const action = await api.applyManifest(manifest);
      applied.push({ resource, action });
    } catch (error) {
      timer.error(error, { resource, applied: applied.length });
      return Failure(
        new ManifestApplyError(
          `Failed to apply ${resource}: ${extractErrorMessage(error)}`,
          resource,
          toError(error),
        ),
      );
    }
  }

  timer.end({ applied: applied.map((entry) => `${entry.resource} ${entry.action}`) });
  return Success({ namespace: { name: namespace, action: namespaceAction }, applied, target });
}

export const applyManifests = applyManifestsImpl;
