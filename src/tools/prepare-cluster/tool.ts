/**
 * Prepare Cluster Tool
 *
 * Creates or reuses a named cluster through the selected backend, then waits for
 * its API server to answer. Calling it again with the same name reuses the cluster.
 *
 * @example
 * ```typescript
 * const result = await ensureCluster({ name: 'local-cicd' }, { backend, connect }, { logger });
 * if (result.ok) {
 *   logger.info({ context: result.value.handle.context }, 'Cluster ready');
 * }
 * ```
 */

import type { Logger } from 'pino';
import { createTimer } from '../../lib/logger';
import { systemClock, type Clock } from '../../lib/clock';
import { ClusterProvisionError, extractErrorMessage, toError } from '../../errors';
import { Failure, Success, type Result } from '../../domain/types';
import type { ClusterHandle } from '../../domain/types';
import type { ClusterBackend } from '../../infrastructure/backends';
import type { ClusterApi } from '../../infrastructure/kubernetes-client';
import type { ToolContext } from '../types';
import { prepareClusterSchema, type PrepareClusterParams } from './schema';

export interface PrepareClusterDeps {
  backend: ClusterBackend;
  /** Build a cluster API client bound to a kubeconfig context */
  connect: (context: string) => ClusterApi;
}

export interface PrepareClusterResult {
  handle: ClusterHandle;
  api: ClusterApi;
  serverVersion: string;
}

/**
 * Ping the API server until it answers or the attempts run out
 */
async function waitForApiServer(
  api: ClusterApi,
  attempts: number,
  intervalMs: number,
  clock: Clock,
  logger: Logger,
): Promise<string> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await api.ping();
    } catch (error) {
      lastError = error;
      logger.debug(
        { attempt, attempts, error: extractErrorMessage(error) },
        'API server not reachable yet',
      );
      if (attempt < attempts) {
        await clock.sleep(intervalMs);
      }
    }
  }
  throw toError(lastError);
}

async function ensureClusterImpl(
  params: PrepareClusterParams,
  deps: PrepareClusterDeps,
  context: ToolContext,
): Promise<Result<PrepareClusterResult, ClusterProvisionError>> {
  const logger = context.logger.child({ component: 'prepare-cluster' });
  const clock = context.clock ?? systemClock;

  const parsed = prepareClusterSchema.safeParse(params);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => issue.message).join('; ');
    return Failure(new ClusterProvisionError(`Invalid cluster name: ${message}`, params.name));
  }

  const { name, reachabilityAttempts, reachabilityIntervalMs } = parsed.data;
  const { backend } = deps;
  const timer = createTimer(logger, 'prepare-cluster', { cluster: name, tool: backend.tool });

  try {
    const status = await backend.clusterStatus(name);

    if (status === 'running') {
      logger.info({ cluster: name }, 'Cluster already exists');
      await backend.exportKubeconfig(name);
    } else {
      logger.info({ cluster: name, status }, 'Provisioning cluster');
      await backend.createCluster(name);
    }

    const handle: ClusterHandle = {
      name,
      backend: backend.kind,
      tool: backend.tool,
      existed: status !== 'absent',
      network: backend.networkName(name),
      context: backend.contextName(name),
    };

    const api = deps.connect(handle.context);
    const serverVersion = await waitForApiServer(
      api,
      reachabilityAttempts,
      reachabilityIntervalMs,
      clock,
      logger,
    );

    timer.end({ existed: handle.existed, serverVersion });
    return Success({ handle, api, serverVersion });
  } catch (error) {
    timer.error(error);
    return Failure(
      new ClusterProvisionError(
        `Cluster ${name} could not be provisioned: ${extractErrorMessage(error)}`,
        name,
        toError(error),
      ),
    );
  }
}

export const ensureCluster = ensureClusterImpl;
