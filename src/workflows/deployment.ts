/**
 * Deployment Workflow - runs the local deployment pipeline end to end
 *
 * Steps:
 * 1. Select the cluster backend (kind, then minikube)
 * 2. Create or reuse the cluster
 * 3. Attach the local registry to the cluster network
 * 4. Apply the namespace, deployment and service manifests
 * 5. Wait for the rollout
 * 6. Verify the health endpoint
 *
 * The first fatal failure stops the run. A report is produced either way.
 */

import { nanoid } from 'nanoid';
import { createTimer, type Logger } from '../lib/logger';
import { systemClock, type Clock } from '../lib/clock';
import { loadManifestSet } from '../lib/manifests';
import type { AppConfig } from '../config/app-config';
import { DEFAULT_TIMEOUTS } from '../config/defaults';
import {
  ErrorCodes,
  HealthCheckError,
  InternalError,
  ManifestApplyError,
  RolloutError,
  extractErrorMessage,
  isApplicationError,
  toError,
  type ApplicationError,
  type SerializedError,
} from '../errors';
import {
  BACKEND_KIND,
  type AppliedManifest,
  type ClusterHandle,
  type ClusterTool,
  type K8sManifest,
  type RegistryBinding,
  type RolloutOutcome,
} from '../domain/types';
import type { CommandRunner } from '../infrastructure/command-executor';
import type { ContainerRuntime } from '../infrastructure/docker-client';
import type { ClusterApi } from '../infrastructure/kubernetes-client';
import {
  createClusterBackend,
  detectClusterTools,
  type BackendSettings,
  type ClusterBackend,
} from '../infrastructure/backends';
import { selectBackend } from '../tools/select-backend';
import { ensureCluster } from '../tools/prepare-cluster';
import { ensureRegistryReachable } from '../tools/connect-registry';
import { applyManifests } from '../tools/apply-manifests';
import { watchRollout } from '../tools/watch-rollout';
import { verifyHealth } from '../tools/verify-deployment';
import type { ToolContext } from '../tools/types';
import { EXIT_CODES, exitCodeFor, statusFor, summarize } from './report';
import {
  DEPLOYMENT_STAGES,
  type DeploymentReport,
  type HealthOutcome,
  type StageName,
  type WorkflowStep,
} from './types';

export interface DeploymentDeps {
  logger: Logger;
  runner: CommandRunner;
  runtime: ContainerRuntime;
  /** Cluster API client for a kubeconfig context */
  connect: (context: string) => ClusterApi;
  createBackend?: (tool: ClusterTool, settings: BackendSettings) => ClusterBackend;
  loadManifests?: (dir: string) => Promise<K8sManifest[]>;
  fetch?: typeof fetch;
  clock?: Clock;
  runId?: string;
}

export function backendSettingsFrom(config: AppConfig): BackendSettings {
  return {
    registryName: config.registry.name,
    registryPort: config.registry.port,
    nodePort: config.cluster.nodePort,
    hostPort: config.cluster.hostPort,
    createTimeoutMs: DEFAULT_TIMEOUTS.clusterCreate,
  };
}

/**
 * Tracks step status and collects what each stage produced
 */
class RunState {
  readonly steps: WorkflowStep[] = DEPLOYMENT_STAGES.map((name) => ({ name, status: 'pending' }));
  lastCompletedStage: StageName | null = null;
  cluster: ClusterHandle | null = null;
  tool: ClusterTool | null = null;
  registry: RegistryBinding | null = null;
  manifests: AppliedManifest[] = [];
  rollout: RolloutOutcome | null = null;
  health: HealthOutcome = null;
  error: ApplicationError | null = null;
  readonly advisories: ApplicationError[] = [];

  constructor(private readonly clock: Clock) {}

  private step(name: StageName): WorkflowStep {
    const step = this.steps.find((candidate) => candidate.name === name);
    if (!step) {
      throw new Error(`Unknown stage ${name}`);
    }
    return step;
  }

  private now(): string {
    return new Date(this.clock.now()).toISOString();
  }

  begin(name: StageName): void {
    const step = this.step(name);
    step.status = 'running';
    step.startTime = this.now();
  }

  complete(name: StageName): void {
    const step = this.step(name);
    step.status = 'completed';
    step.endTime = this.now();
    this.lastCompletedStage = name;
  }

  fail(name: StageName, error: ApplicationError, fatal: boolean): void {
    const step = this.step(name);
    step.status = 'failed';
    step.endTime = this.now();
    step.error = error.message;
    if (fatal) {
      this.error = error;
    } else {
      this.advisories.push(error);
    }
  }

  skipRemaining(): void {
    for (const step of this.steps) {
      if (step.status === 'pending') {
        step.status = 'skipped';
      }
    }
  }
}

async function runPipeline(
  config: AppConfig,
  deps: DeploymentDeps,
  state: RunState,
  context: ToolContext,
): Promise<void> {
  const { logger } = context;

  // 1. Select backend
  state.begin('select-backend');
  const installed = await detectClusterTools(deps.runner);
  const selected = selectBackend(installed, config.cluster.backend);
  if (!selected.ok) {
    state.fail('select-backend', selected.error, true);
    return;
  }
  state.tool = selected.value;
  state.complete('select-backend');
  logger.info({ tool: selected.value, installed }, 'Backend selected');

  const settings = backendSettingsFrom(config);
  const backend = deps.createBackend
    ? deps.createBackend(selected.value, settings)
    : createClusterBackend(selected.value, deps.runner, settings, logger);

  // 2. Provision cluster
  state.begin('provision-cluster');
  const cluster = await ensureCluster(
    {
      name: config.cluster.name,
      reachabilityAttempts: config.cluster.reachabilityAttempts,
      reachabilityIntervalMs: config.cluster.reachabilityIntervalMs,
    },
    { backend, connect: deps.connect },
    context,
  );
  if (!cluster.ok) {
    state.fail('provision-cluster', cluster.error, true);
    return;
  }
  const { handle, api } = cluster.value;
  state.cluster = handle;
  state.complete('provision-cluster');

  // 3. Registry bridge
  state.begin('connect-registry');
  const registry = await ensureRegistryReachable(
    handle,
    { name: config.registry.name, image: config.registry.image, port: config.registry.port },
    deps.runtime,
    context,
  );
  if (registry.ok) {
    state.registry = registry.value;
    state.complete('connect-registry');
  } else if (config.registry.continueOnFailure) {
    logger.warn({ error: registry.error.message }, 'Registry bridge failed, continuing');
    state.registry = {
      containerName: config.registry.name,
      network: handle.network,
      running: false,
      attached: false,
    };
    state.fail('connect-registry', registry.error, false);
  } else {
    state.fail('connect-registry', registry.error, true);
    return;
  }

  // 4. Apply manifests
  state.begin('apply-manifests');
  let manifests: K8sManifest[];
  try {
    manifests = await (deps.loadManifests ?? loadManifestSet)(config.deployment.manifestsDir);
  } catch (error) {
    state.fail(
      'apply-manifests',
      error instanceof ManifestApplyError
        ? error
        : new ManifestApplyError(
            extractErrorMessage(error),
            config.deployment.manifestsDir,
            toError(error),
          ),
      true,
    );
    return;
  }

  const applied = await applyManifests(
    {
      namespace: config.deployment.namespace,
      manifests,
      image: config.deployment.image,
      appName: config.deployment.appName,
    },
    api,
    context,
  );
  if (!applied.ok) {
    state.fail('apply-manifests', applied.error, true);
    return;
  }
  state.manifests = applied.value.applied;
  state.complete('apply-manifests');
  const { target } = applied.value;

  // 5. Rollout
  state.begin('watch-rollout');
  const rollout = await watchRollout(
    target,
    { timeoutMs: config.rollout.timeoutMs, pollIntervalMs: config.rollout.pollIntervalMs },
    api,
    context,
  );
  state.rollout = rollout;
  if (rollout.state !== 'Succeeded') {
    state.health = 'skipped';
    state.fail(
      'watch-rollout',
      new RolloutError(
        rollout.error ?? `Rollout ${rollout.state}`,
        rollout.state === 'TimedOut' ? ErrorCodes.ROLLOUT_TIMED_OUT : ErrorCodes.ROLLOUT_ERRORED,
        target.name,
        target.namespace,
      ),
      true,
    );
    return;
  }
  state.complete('watch-rollout');

  // 6. Health
  state.begin('verify-health');
  const health = await verifyHealth(
    target,
    { ...config.health, fallbackNodePort: config.cluster.nodePort },
    {
      api,
      backend,
      clusterName: handle.name,
      ...(deps.fetch !== undefined && { fetch: deps.fetch }),
    },
    context,
  );
  state.health = health;
  if (health.reachable) {
    state.complete('verify-health');
  } else {
    state.fail(
      'verify-health',
      new HealthCheckError(
        `Health check failed at ${health.endpoint || 'unresolved endpoint'}: ${health.error ?? 'unreachable'}`,
        health.endpoint,
        health.attempts,
      ),
      false,
    );
  }
}

function serialize(error: ApplicationError): SerializedError {
  return error.toJSON();
}

/**
 * Run the complete deployment workflow and build its report
 */
export async function runDeployment(
  config: AppConfig,
  deps: DeploymentDeps,
): Promise<DeploymentReport> {
  const clock = deps.clock ?? systemClock;
  const runId = deps.runId ?? nanoid(10);
  const logger = deps.logger.child({ runId });
  const context: ToolContext = { logger, clock };
  const state = new RunState(clock);
  const startedAt = clock.now();
  const timer = createTimer(logger, 'deployment-workflow', {
    cluster: config.cluster.name,
    namespace: config.deployment.namespace,
  });

  try {
    await runPipeline(config, deps, state, context);
  } catch (error) {
    // between stages nothing is running; blame the next one
    const current =
      state.steps.find((step) => step.status === 'running') ??
      state.steps.find((step) => step.status === 'pending');
    const stage = current?.name ?? 'select-backend';
    logger.error({ stage, error: extractErrorMessage(error) }, 'Unexpected failure');
    state.fail(
      stage,
      isApplicationError(error)
        ? error
        : new InternalError(
            `Unexpected failure in ${stage}: ${extractErrorMessage(error)}`,
            stage,
            toError(error),
          ),
      true,
    );
  }
  state.skipRemaining();

  const finishedAt = clock.now();
  const status = statusFor(state.rollout, state.health, state.error !== null);
  const exitCode = state.error ? exitCodeFor(state.error.code) : EXIT_CODES.SUCCESS;
  const backendKind = state.tool ? BACKEND_KIND[state.tool] : null;

  const report: DeploymentReport = {
    runId,
    startedAt: new Date(startedAt).toISOString(),
    finishedAt: new Date(finishedAt).toISOString(),
    durationMs: finishedAt - startedAt,
    status,
    exitCode,
    summary: summarize(backendKind, state.rollout, state.health),
    backend: backendKind,
    tool: state.tool,
    cluster: state.cluster,
    registry: state.registry,
    namespace: config.deployment.namespace,
    manifests: state.manifests,
    rollout: state.rollout,
    health: state.health,
    lastCompletedStage: state.lastCompletedStage,
    steps: state.steps,
    error: state.error ? serialize(state.error) : null,
    advisories: state.advisories.map(serialize),
  };

  if (state.error) {
    timer.error(state.error, { status, exitCode });
  } else {
    timer.end({ status });
  }
  return report;
}
