/**
 * Watch Rollout Tool
 *
 * Polls the deployment until it is fully ready, errors, or the wait window closes.
 *
 *   Pending ──status changes──▶ Progressing
 *   Pending | Progressing ──ready == desired, generation observed──▶ Succeeded
 *   Pending | Progressing ──window elapsed──▶ TimedOut
 *
 * A status read gets the time left in the window, and never less than one poll
 * interval. A read that does not answer in time ends the watch as TimedOut.
 *   Pending | Progressing ──API error / ProgressDeadlineExceeded──▶ Errored
 *
 * A pod and service snapshot is taken on the way out, whatever the outcome.
 */

import type { Logger } from 'pino';
import { createTimer } from '../../lib/logger';
import { settleWithin, systemClock, type Bounded } from '../../lib/clock';
import { toLabelSelector } from '../../lib/manifests';
import { extractErrorMessage } from '../../errors';
import type {
  DeploymentStatusSnapshot,
  DeploymentTarget,
  PodSnapshot,
  RolloutOutcome,
  RolloutState,
  RolloutTransition,
  ServiceSnapshot,
  TerminalRolloutState,
} from '../../domain/types';
import type { ClusterApi } from '../../infrastructure/kubernetes-client';
import type { ToolContext } from '../types';
import { watchRolloutSchema, type WatchRolloutOptions } from './schema';

export function isRolledOut(status: DeploymentStatusSnapshot): boolean {
  const generationObserved =
    status.generation === undefined ||
    (status.observedGeneration !== undefined && status.observedGeneration >= status.generation);
  return status.readyReplicas === status.desiredReplicas && generationObserved;
}

export function statusChanged(
  previous: DeploymentStatusSnapshot,
  current: DeploymentStatusSnapshot,
): boolean {
  return (
    previous.replicas !== current.replicas ||
    previous.readyReplicas !== current.readyReplicas ||
    previous.updatedReplicas !== current.updatedReplicas ||
    previous.availableReplicas !== current.availableReplicas ||
    previous.observedGeneration !== current.observedGeneration
  );
}

function settledValue<T>(result: Bounded<T>, what: string, logger: Logger): T | undefined {
  if (result.state === 'fulfilled') return result.value;
  const error =
    result.state === 'rejected' ? extractErrorMessage(result.reason) : 'no answer in time';
  logger.warn({ error }, `Could not list ${what}`);
  return undefined;
}

async function captureSnapshot(
  api: ClusterApi,
  target: DeploymentTarget,
  boundMs: number,
  logger: Logger,
): Promise<{ pods: PodSnapshot[]; services: ServiceSnapshot[] }> {
  const [pods, services] = await Promise.all([
    settleWithin(api.listPods(target.namespace, toLabelSelector(target.selector)), boundMs),
    settleWithin(api.listServices(target.namespace), boundMs),
  ]);

  return {
    pods: settledValue(pods, 'pods', logger) ?? [],
    services: settledValue(services, 'services', logger) ?? [],
  };
}

async function watchRolloutImpl(
  target: DeploymentTarget,
  options: WatchRolloutOptions,
  api: ClusterApi,
  context: ToolContext,
): Promise<RolloutOutcome> {
  const logger = context.logger.child({
    component: 'watch-rollout',
    deployment: target.name,
    namespace: target.namespace,
  });
  const clock = context.clock ?? systemClock;
  const { timeoutMs, pollIntervalMs } = watchRolloutSchema.parse(options);
  const timer = createTimer(logger, 'watch-rollout', { timeoutMs, pollIntervalMs });

  const startedAt = clock.now();
  const deadline = startedAt + timeoutMs;
  const transitions: RolloutTransition[] = [];

  let state: RolloutState = 'Pending';
  let polls = 0;
  let previous: DeploymentStatusSnapshot | undefined;
  let error: string | undefined;

  const moveTo = (next: RolloutState): void => {
    transitions.push({ from: state, to: next, atMs: clock.now() - startedAt });
    logger.info({ from: state, to: next }, `Rollout ${next}`);
    state = next;
  };

  let terminal: TerminalRolloutState | undefined;
  while (terminal === undefined) {
    polls++;

    const budgetMs = Math.max(deadline - clock.now(), pollIntervalMs);
    const read = await settleWithin(
      api.getDeploymentStatus(target.name, target.namespace),
      budgetMs,
    );
    if (read.state === 'expired') {
      error = `Deployment status read did not answer within ${budgetMs}ms`;
      moveTo('TimedOut');
      terminal = 'TimedOut';
      break;
    }
    if (read.state === 'rejected') {
      error = extractErrorMessage(read.reason);
      moveTo('Errored');
      terminal = 'Errored';
      break;
    }
    const status = read.value;

    logger.debug(
      { ready: status.readyReplicas, desired: status.desiredReplicas, polls },
      'Deployment status',
    );

    if (isRolledOut(status)) {
      previous = status;
      moveTo('Succeeded');
      terminal = 'Succeeded';
      break;
    }
    if (status.progressDeadlineExceeded) {
      previous = status;
      error = 'Deployment exceeded its progress deadline (ProgressDeadlineExceeded)';
      moveTo('Errored');
      terminal = 'Errored';
      break;
    }
    if (state === 'Pending' && previous !== undefined && statusChanged(previous, status)) {
      moveTo('Progressing');
    }
    previous = status;

    const remaining = deadline - clock.now();
    if (remaining <= 0) {
      error = `Deployment ${target.name} not ready after ${timeoutMs}ms (${status.readyReplicas}/${status.desiredReplicas} ready)`;
      moveTo('TimedOut');
      terminal = 'TimedOut';
      break;
    }
    await clock.sleep(Math.min(pollIntervalMs, remaining));
  }

  const { pods, services } = await captureSnapshot(api, target, pollIntervalMs, logger);
  const elapsedMs = clock.now() - startedAt;

  const outcome: RolloutOutcome = {
    state: terminal,
    deployment: target.name,
    namespace: target.namespace,
    elapsedMs,
    polls,
    transitions,
    pods,
    services,
  };
  if (previous !== undefined) outcome.lastStatus = previous;
  if (error !== undefined) outcome.error = error;

  if (terminal === 'Succeeded') {
    timer.end({ polls, elapsedMs });
  } else {
    timer.error(error, { state: terminal, polls, elapsedMs });
  }
  return outcome;
}

export const watchRollout = watchRolloutImpl;
