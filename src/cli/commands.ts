/**
 * CLI command handlers. Each returns the text for stdout and the process exit code;
 * cli.ts does the printing and exiting.
 */

import type { Deps } from '../app/container';
import {
  InternalError,
  extractErrorMessage,
  isApplicationError,
  toError,
  type ApplicationError,
  type NoBackendAvailableError,
} from '../errors';
import { Failure, Success, type Result } from '../domain/types';
import type {
  DeploymentStatusSnapshot,
  DeploymentTarget,
  PodSnapshot,
  RolloutOutcome,
  ServiceSnapshot,
} from '../domain/types';
import {
  createClusterBackend,
  detectClusterTools,
  type ClusterBackend,
} from '../infrastructure/backends';
import { selectBackend } from '../tools/select-backend';
import { setImage } from '../tools/set-image';
import { watchRollout } from '../tools/watch-rollout';
import { toLabelSelector } from '../lib/manifests';
import { backendSettingsFrom, runDeployment } from '../workflows/deployment';
import { EXIT_CODES, exitCodeFor, formatReport } from '../workflows/report';

export interface CommandOutcome {
  output: string;
  exitCode: number;
}

export interface OutputOptions {
  pretty?: boolean;
}

function render(value: unknown, pretty: boolean | undefined, text: () => string): string {
  return pretty === true ? text() : JSON.stringify(value, null, 2);
}

function failure(error: ApplicationError, pretty: boolean | undefined): CommandOutcome {
  const serialized = error.toJSON();
  return {
    output: render({ error: serialized }, pretty, () => `Error [${serialized.code}]: ${serialized.message}`),
    exitCode: exitCodeFor(error.code),
  };
}

function asApplicationError(error: unknown, stage: string): ApplicationError {
  return isApplicationError(error)
    ? error
    : new InternalError(extractErrorMessage(error), stage, toError(error));
}

async function resolveBackend(deps: Deps): Promise<Result<ClusterBackend, NoBackendAvailableError>> {
  const installed = await detectClusterTools(deps.runner);
  const selected = selectBackend(installed, deps.config.cluster.backend);
  if (!selected.ok) {
    return Failure(selected.error);
  }
  return Success(
    createClusterBackend(selected.value, deps.runner, backendSettingsFrom(deps.config), deps.logger),
  );
}

/**
 * The workload the app name points at, used when no manifests are read
 */
function appTarget(deps: Deps): DeploymentTarget {
  const { appName, namespace } = deps.config.deployment;
  return {
    name: appName,
    namespace,
    selector: { app: appName },
    desiredReplicas: 1,
    serviceName: appName,
  };
}

/**
 * `deploy`: the full pipeline
 */
export async function deployCommand(deps: Deps, options: OutputOptions = {}): Promise<CommandOutcome> {
  const report = await runDeployment(deps.config, {
    logger: deps.logger,
    runner: deps.runner,
    runtime: deps.runtime,
    connect: deps.connect,
    clock: deps.clock,
  });
  return {
    output: render(report, options.pretty, () => formatReport(report)),
    exitCode: report.exitCode,
  };
}

export interface StatusView {
  cluster: string;
  context: string;
  namespace: string;
  deployment: DeploymentStatusSnapshot | null;
  pods: PodSnapshot[];
  services: ServiceSnapshot[];
  error?: string;
}

function formatStatus(view: StatusView): string {
  const lines = [`Cluster ${view.cluster} (context ${view.context}), namespace ${view.namespace}`];
  lines.push(
    view.deployment
      ? `Deployment: ${view.deployment.readyReplicas}/${view.deployment.desiredReplicas} ready, ${view.deployment.updatedReplicas} updated`
      : `Deployment: not found${view.error ? ` (${view.error})` : ''}`,
  );
  for (const pod of view.pods) {
    lines.push(`Pod ${pod.name}: ${pod.phase}${pod.ready ? ', ready' : ''}, restarts ${pod.restarts}`);
  }
  for (const service of view.services) {
    const ports = service.ports
      .map((port) => (port.nodePort ? `${port.port}:${port.nodePort}` : String(port.port)))
      .join(', ');
    lines.push(`Service ${service.name}: ${service.type} ${ports}`);
  }
  return lines.join('\n');
}

/**
 * `status`: read-only view of the deployment, its pods and the namespace's services
 */
export async function statusCommand(deps: Deps, options: OutputOptions = {}): Promise<CommandOutcome> {
  const backend = await resolveBackend(deps);
  if (!backend.ok) {
    return failure(backend.error, options.pretty);
  }

  const cluster = deps.config.cluster.name;
  const context = backend.value.contextName(cluster);
  const target = appTarget(deps);

  try {
    const api = deps.connect(context);
    const [deployment, pods, services] = await Promise.allSettled([
      api.getDeploymentStatus(target.name, target.namespace),
      api.listPods(target.namespace, toLabelSelector(target.selector)),
      api.listServices(target.namespace),
    ]);

    const view: StatusView = {
      cluster,
      context,
      namespace: target.namespace,
      deployment: deployment.status === 'fulfilled' ? deployment.value : null,
      pods: pods.status === 'fulfilled' ? pods.value : [],
      services: services.status === 'fulfilled' ? services.value : [],
    };
    if (deployment.status === 'rejected') {
      view.error = extractErrorMessage(deployment.reason);
    }

    return { output: render(view, options.pretty, () => formatStatus(view)), exitCode: EXIT_CODES.SUCCESS };
  } catch (error) {
    return failure(asApplicationError(error, 'status'), options.pretty);
  }
}

export interface SetImageOptions extends OutputOptions {
  container?: string;
}

export interface SetImageView {
  deployment: string;
  namespace: string;
  container: string;
  image: string;
  rollout: RolloutOutcome;
}

/**
 * `set-image <image>`: update the running deployment and wait for its rollout
 */
export async function setImageCommand(
  deps: Deps,
  image: string,
  options: SetImageOptions = {},
): Promise<CommandOutcome> {
  const backend = await resolveBackend(deps);
  if (!backend.ok) {
    return failure(backend.error, options.pretty);
  }

  const target = appTarget(deps);
  const context = { logger: deps.logger, clock: deps.clock };

  try {
    const api = deps.connect(backend.value.contextName(deps.config.cluster.name));
    const updated = await setImage(
      { deployment: target.name, namespace: target.namespace, image, container: options.container },
      api,
      context,
    );
    if (!updated.ok) {
      return failure(updated.error, options.pretty);
    }

    const rollout = await watchRollout(
      target,
      {
        timeoutMs: deps.config.rollout.timeoutMs,
        pollIntervalMs: deps.config.rollout.pollIntervalMs,
      },
      api,
      context,
    );
    const view: SetImageView = { ...updated.value, rollout };
    const exitCode =
      rollout.state === 'Succeeded'
        ? EXIT_CODES.SUCCESS
        : rollout.state === 'TimedOut'
          ? EXIT_CODES.ROLLOUT_TIMED_OUT
          : EXIT_CODES.ROLLOUT_ERRORED;

    return {
      output: render(
        view,
        options.pretty,
        () =>
          `${view.deployment}/${view.container} -> ${view.image}: rollout ${rollout.state} after ${rollout.elapsedMs}ms`,
      ),
      exitCode,
    };
  } catch (error) {
    return failure(asApplicationError(error, 'set-image'), options.pretty);
  }
}

export interface TeardownOptions extends OutputOptions {
  /** Delete the whole cluster instead of only the namespace */
  cluster?: boolean;
}

export interface TeardownView {
  namespace: { name: string; result: 'deleted' | 'absent' } | null;
  cluster: { name: string; result: 'deleted' } | null;
}

/**
 * `teardown`: delete the namespace, or with `--cluster` the cluster itself
 */
export async function teardownCommand(
  deps: Deps,
  options: TeardownOptions = {},
): Promise<CommandOutcome> {
  const backend = await resolveBackend(deps);
  if (!backend.ok) {
    return failure(backend.error, options.pretty);
  }

  const clusterName = deps.config.cluster.name;
  const namespace = deps.config.deployment.namespace;
  const view: TeardownView = { namespace: null, cluster: null };

  try {
    if (options.cluster === true) {
      await backend.value.deleteCluster(clusterName);
      view.cluster = { name: clusterName, result: 'deleted' };
    } else {
      const api = deps.connect(backend.value.contextName(clusterName));
      view.namespace = { name: namespace, result: await api.deleteNamespace(namespace) };
    }
  } catch (error) {
    return failure(asApplicationError(error, 'teardown'), options.pretty);
  }

  return {
    output: render(view, options.pretty, () =>
      view.cluster
        ? `Cluster ${view.cluster.name} deleted`
        : `Namespace ${namespace} ${view.namespace?.result ?? 'untouched'}`,
    ),
    exitCode: EXIT_CODES.SUCCESS,
  };
}
