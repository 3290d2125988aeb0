import { describe, it, expect, beforeEach } from '@jest/globals';
import { isRolledOut, statusChanged, watchRollout } from '../../../src/tools/watch-rollout';
import { KubernetesError } from '../../../src/errors';
import { systemClock } from '../../../src/lib/clock';
import type {
  DeploymentStatusSnapshot,
  DeploymentTarget,
  PodSnapshot,
} from '../../../src/domain/types';
import { demoService } from '../../__support__/fixtures/manifests';
import {
  FakeClock,
  FakeClusterApi,
  createSilentLogger,
  deploymentStatus,
} from '../../__support__/utilities/fakes';

const target: DeploymentTarget = {
  name: 'demo-app',
  namespace: 'cicd-demo',
  selector: { app: 'demo-app' },
  desiredReplicas: 2,
  serviceName: 'demo-app-svc',
};

const runningPod: PodSnapshot = {
  name: 'demo-app-5c9d7b6f4-x2k8q',
  phase: 'Running',
  ready: true,
  restarts: 0,
  images: ['localhost:5000/demo-app:latest'],
};

describe('isRolledOut', () => {
  it('should require every desired replica to be ready', () => {
    expect(isRolledOut(deploymentStatus(2))).toBe(true);
    expect(isRolledOut(deploymentStatus(1))).toBe(false);
  });

  it('should wait for the controller to observe the latest generation', () => {
    expect(isRolledOut(deploymentStatus(2, { generation: 3, observedGeneration: 2 }))).toBe(false);
    expect(isRolledOut(deploymentStatus(2, { generation: 3, observedGeneration: 3 }))).toBe(true);
  });
});

describe('statusChanged', () => {
  it('should compare replica counters and the observed generation', () => {
    expect(statusChanged(deploymentStatus(0), deploymentStatus(0))).toBe(false);
    expect(statusChanged(deploymentStatus(0), deploymentStatus(1))).toBe(true);
    expect(statusChanged(deploymentStatus(0), deploymentStatus(0, { observedGeneration: 2 }))).toBe(
      true,
    );
  });
});

describe('watchRollout', () => {
  let api: FakeClusterApi;
  let clock: FakeClock;
  const context = () => ({ logger: createSilentLogger(), clock });

  beforeEach(() => {
    api = new FakeClusterApi();
    api.pods = [runningPod];
    api.services = [demoService];
    clock = new FakeClock();
  });

  it('should move through Progressing to Succeeded', async () => {
    api.statuses = [deploymentStatus(0), deploymentStatus(1), deploymentStatus(2)];

    const outcome = await watchRollout(target, { timeoutMs: 60000, pollIntervalMs: 2000 }, api, context());

    expect(outcome.state).toBe('Succeeded');
    expect(outcome.polls).toBe(3);
    expect(outcome.elapsedMs).toBe(4000);
    expect(outcome.transitions).toEqual([
      { from: 'Pending', to: 'Progressing', atMs: 2000 },
      { from: 'Progressing', to: 'Succeeded', atMs: 4000 },
    ]);
    expect(outcome.lastStatus).toEqual(deploymentStatus(2));
    expect(outcome.pods).toEqual([runningPod]);
    expect(outcome.services).toEqual([demoService]);
    expect(outcome.error).toBeUndefined();
    expect(api.calls).toContain('listPods:cicd-demo:app=demo-app');
  });

  it('should succeed on the first poll when the deployment is already ready', async () => {
    api.statuses = [deploymentStatus(2)];

    const outcome = await watchRollout(target, {}, api, context());

    expect(outcome.state).toBe('Succeeded');
    expect(outcome.polls).toBe(1);
    expect(outcome.transitions).toEqual([{ from: 'Pending', to: 'Succeeded', atMs: 0 }]);
    expect(clock.sleeps).toEqual([]);
  });

  it('should time out exactly when the window closes', async () => {
    api.statuses = [deploymentStatus(0)];

    const outcome = await watchRollout(target, { timeoutMs: 10000, pollIntervalMs: 3000 }, api, context());

    expect(outcome.state).toBe('TimedOut');
    expect(outcome.elapsedMs).toBe(10000);
    expect(outcome.polls).toBe(5);
    expect(clock.sleeps).toEqual([3000, 3000, 3000, 1000]);
    expect(outcome.transitions).toEqual([{ from: 'Pending', to: 'TimedOut', atMs: 10000 }]);
    expect(outcome.error).toBe('Deployment demo-app not ready after 10000ms (0/2 ready)');
    expect(outcome.pods).toEqual([runningPod]);
  });

  it('should error when the deployment cannot be read', async () => {
    api.statuses = [
      deploymentStatus(0),
      new KubernetesError('Failed to read deployment: HTTP 403: forbidden'),
    ];

    const outcome = await watchRollout(target, { timeoutMs: 60000, pollIntervalMs: 2000 }, api, context());

    expect(outcome.state).toBe('Errored');
    expect(outcome.error).toBe('Failed to read deployment: HTTP 403: forbidden');
    expect(outcome.transitions).toEqual([{ from: 'Pending', to: 'Errored', atMs: 2000 }]);
    expect(outcome.lastStatus).toEqual(deploymentStatus(0));
  });

  it('should error when the progress deadline is exceeded', async () => {
    api.statuses = [deploymentStatus(1, { progressDeadlineExceeded: true })];

    const outcome = await watchRollout(target, {}, api, context());

    expect(outcome.state).toBe('Errored');
    expect(outcome.polls).toBe(1);
    expect(outcome.error).toBe('Deployment exceeded its progress deadline (ProgressDeadlineExceeded)');
  });

  it('should still finish when the snapshot cannot be taken', async () => {
    api.statuses = [deploymentStatus(2)];
    api.podsError = new Error('pods is forbidden');

    const outcome = await watchRollout(target, {}, api, context());

    expect(outcome.state).toBe('Succeeded');
    expect(outcome.pods).toEqual([]);
    expect(outcome.services).toEqual([demoService]);
  });

  it('should time out when a status read never answers', async () => {
    api.getDeploymentStatus = () => new Promise<DeploymentStatusSnapshot>(() => undefined);

    const outcome = await watchRollout(
      target,
      { timeoutMs: 50, pollIntervalMs: 20 },
      api,
      { logger: createSilentLogger(), clock: systemClock },
    );

    expect(outcome.state).toBe('TimedOut');
    expect(outcome.polls).toBe(1);
    expect(outcome.error).toBe('Deployment status read did not answer within 50ms');
    expect(outcome.transitions.map((transition) => transition.to)).toEqual(['TimedOut']);
    expect(outcome.lastStatus).toBeUndefined();
    expect(outcome.elapsedMs).toBeLessThan(1000);
    expect(outcome.pods).toEqual([runningPod]);
  });
});
