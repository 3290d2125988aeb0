/**
 * Connect Registry Tool
 *
 * Makes sure the local registry container runs and sits on the cluster's container
 * network so nodes can pull from it. Backends without a container network skip this.
 */

import { createTimer } from '../../lib/logger';
import { DEFAULT_REGISTRY } from '../../config/defaults';
import { RegistryBridgeError, extractErrorMessage, toError } from '../../errors';
import { Failure, Success, type Result } from '../../domain/types';
import type { ClusterHandle, RegistryBinding } from '../../domain/types';
import type { ContainerRuntime } from '../../infrastructure/docker-client';
import type { ToolContext } from '../types';
import { connectRegistrySchema, type ConnectRegistryParams } from './schema';

async function ensureRegistryReachableImpl(
  handle: Pick<ClusterHandle, 'tool' | 'network'>,
  params: ConnectRegistryParams,
  runtime: ContainerRuntime,
  context: ToolContext,
): Promise<Result<RegistryBinding, RegistryBridgeError>> {
  const logger = context.logger.child({ component: 'connect-registry' });
  const { name, image, port } = connectRegistrySchema.parse(params);
  const network = handle.network;

  if (network === null) {
    logger.info({ tool: handle.tool }, 'Registry bridge not needed for this backend');
    return Success({
      containerName: name,
      network: null,
      running: false,
      attached: false,
      skipped: `${handle.tool} clusters have no container network to join`,
    });
  }

  const timer = createTimer(logger, 'connect-registry', { registry: name, network });

  try {
    const state = await runtime.getContainerState(name);
    if (state === 'stopped') {
      logger.warn({ registry: name }, 'Local registry is not running. Starting it...');
      await runtime.startContainer(name);
    } else if (state === 'absent') {
      logger.info({ registry: name, image }, 'Creating local registry');
      await runtime.runContainer({
        name,
        image,
        ports: [{ containerPort: DEFAULT_REGISTRY.containerPort, hostPort: port }],
        restartPolicy: 'always',
      });
    }

    if (await runtime.isAttached(network, name)) {
      logger.debug({ registry: name, network }, 'Registry already on cluster network');
    } else {
      await runtime.connectNetwork(network, name);
    }

    timer.end({ state });
    return Success({ containerName: name, network, running: true, attached: true });
  } catch (error) {
    timer.error(error);
    return Failure(
      new RegistryBridgeError(
        `Registry ${name} could not be attached to ${network}: ${extractErrorMessage(error)}`,
        name,
        network,
        toError(error),
      ),
    );
  }
}

export const ensureRegistryReachable = ensureRegistryReachableImpl;
