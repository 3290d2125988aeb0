/**
 * Deployment workflow tests: the whole pipeline against in-process fakes
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { runDeployment, type DeploymentDeps } from '../../../src/workflows/deployment';
import { createAppConfig, type ConfigOverrides } from '../../../src/config/app-config';
import { DockerError } from '../../../src/errors';
import type { ClusterTool, K8sManifest } from '../../../src/domain/types';
import {
  demoService,
  deploymentManifest,
  manifestSet,
  serviceManifest,
} from '../../__support__/fixtures/manifests';
import {
  FakeBackend,
  FakeClock,
  FakeClusterApi,
  FakeCommandRunner,
  FakeContainerRuntime,
  createFakeFetch,
  createSilentLogger,
  deploymentStatus,
} from '../../__support__/utilities/fakes';

const healthy = () =>
  new Response(JSON.stringify({ status: 'healthy' }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });

describe('runDeployment', () => {
  let api: FakeClusterApi;
  let runtime: FakeContainerRuntime;
  let backend: FakeBackend;
  let clock: FakeClock;
  let fetchResponses: Array<() => Response | Error>;
  let manifests: K8sManifest[];

  function deps(installed: ClusterTool[] = ['kind']): DeploymentDeps {
    return {
      logger: createSilentLogger(),
      runner: new FakeCommandRunner(installed),
      runtime,
      connect: () => api,
      createBackend: () => backend,
      loadManifests: async () => manifests,
      fetch: createFakeFetch(fetchResponses).fetch,
      clock,
      runId: 'run-1',
    };
  }

  const config = (overrides: ConfigOverrides = {}) => createAppConfig({}, overrides);

  beforeEach(() => {
    api = new FakeClusterApi();
    api.statuses = [deploymentStatus(2)];
    api.services = [demoService];
    runtime = new FakeContainerRuntime();
    backend = new FakeBackend('kind');
    clock = new FakeClock(Date.parse('2026-01-01T00:00:00.000Z'));
    fetchResponses = [healthy];
    manifests = manifestSet();
  });

  it('should deploy and verify on a fresh kind cluster', async () => {
    const report = await runDeployment(config(), deps());

    expect(report.summary).toEqual({ backend: 'ephemeral-node', rollout: 'Succeeded', health: true });
    expect(report.status).toBe('deployed');
    expect(report.exitCode).toBe(0);
    expect(report.runId).toBe('run-1');
    expect(report.startedAt).toBe('2026-01-01T00:00:00.000Z');
    expect(report.tool).toBe('kind');
    expect(report.cluster).toEqual({
      name: 'local-cicd',
      backend: 'ephemeral-node',
      tool: 'kind',
      existed: false,
      network: 'kind',
      context: 'kind-local-cicd',
    });
    expect(report.registry).toEqual({
      containerName: 'local-registry',
      network: 'kind',
      running: true,
      attached: true,
    });
    expect(report.manifests).toEqual([
      { resource: 'Namespace/cicd-demo', action: 'configured' },
      { resource: 'Deployment/demo-app', action: 'created' },
      { resource: 'Service/demo-app-svc', action: 'created' },
    ]);
    expect(report.health).toMatchObject({
      endpoint: 'http://localhost:30080/health',
      reachable: true,
      statusCode: 200,
    });
    expect(report.steps.map((step) => step.status)).toEqual([
      'completed',
      'completed',
      'completed',
      'completed',
      'completed',
      'completed',
    ]);
    expect(report.lastCompletedStage).toBe('verify-health');
    expect(report.error).toBeNull();
    expect(report.advisories).toEqual([]);
  });

  it('should reuse the cluster and configure resources on a second run', async () => {
    await runDeployment(config(), deps());
    const report = await runDeployment(config(), deps());

    expect(report.cluster?.existed).toBe(true);
    expect(report.manifests.map((manifest) => manifest.action)).toEqual([
      'configured',
      'configured',
      'configured',
    ]);
    expect(runtime.calls.filter((call) => call.startsWith('connect:'))).toEqual([
      'connect:kind:local-registry',
    ]);
  });

  it('should skip the registry bridge on minikube', async () => {
    backend = new FakeBackend('minikube');

    const report = await runDeployment(config(), deps(['minikube']));

    expect(report.summary.backend).toBe('vm-based');
    expect(report.registry?.skipped).toBe('minikube clusters have no container network to join');
    expect(report.status).toBe('deployed');
    expect(runtime.calls).toEqual([]);
  });

  it('should stop with exit 2 when no backend is installed', async () => {
    const report = await runDeployment(config(), deps([]));

    expect(report.exitCode).toBe(2);
    expect(report.status).toBe('failed');
    expect(report.error?.code).toBe('NO_BACKEND_AVAILABLE');
    expect(report.summary).toEqual({ backend: null, rollout: null, health: null });
    expect(report.steps.map((step) => step.status)).toEqual([
      'failed',
      'skipped',
      'skipped',
      'skipped',
      'skipped',
      'skipped',
    ]);
    expect(report.lastCompletedStage).toBeNull();
    expect(backend.calls).toEqual([]);
  });

  it('should stop with exit 3 when the cluster cannot be created', async () => {
    backend.createError = new Error('docker daemon not running');

    const report = await runDeployment(config(), deps());

    expect(report.exitCode).toBe(3);
    expect(report.error?.message).toBe(
      'Cluster local-cicd could not be provisioned: docker daemon not running',
    );
    expect(report.lastCompletedStage).toBe('select-backend');
  });

  it('should stop with exit 4 when the registry cannot be attached', async () => {
    runtime.connectError = new DockerError('network kind not found', 'connectNetwork', 404);

    const report = await runDeployment(config(), deps());

    expect(report.exitCode).toBe(4);
    expect(report.error?.code).toBe('REGISTRY_BRIDGE_FAILED');
    expect(report.lastCompletedStage).toBe('provision-cluster');
    expect(api.calls).toEqual(['ping']);
  });

  it('should continue past a registry failure when asked to', async () => {
    runtime.connectError = new DockerError('network kind not found', 'connectNetwork', 404);

    const report = await runDeployment(config({ continueOnRegistryFailure: true }), deps());

    expect(report.exitCode).toBe(0);
    expect(report.status).toBe('deployed');
    expect(report.registry).toEqual({
      containerName: 'local-registry',
      network: 'kind',
      running: false,
      attached: false,
    });
    expect(report.steps[2]).toMatchObject({ name: 'connect-registry', status: 'failed' });
    expect(report.advisories.map((advisory) => advisory.code)).toEqual(['REGISTRY_BRIDGE_FAILED']);
  });

  it('should stop with exit 5 on an out-of-order manifest set', async () => {
    manifests = [serviceManifest, deploymentManifest];

    const report = await runDeployment(config(), deps());

    expect(report.exitCode).toBe(5);
    expect(report.error?.context).toEqual({ resource: 'Deployment/demo-app' });
    expect(report.manifests).toEqual([]);
    expect(api.calls).toEqual(['ping']);
  });

  it('should stop with exit 5 when the manifests deploy a different workload', async () => {
    const report = await runDeployment(config({ appName: 'web' }), deps());

    expect(report.exitCode).toBe(5);
    expect(report.error?.message).toBe('Deployment/demo-app does not match the workload name web');
    expect(report.manifests).toEqual([]);
    expect(api.calls).toEqual(['ping']);
  });

  it('should report a manifest directory that cannot be read', async () => {
    const report = await runDeployment(config(), {
      ...deps(),
      loadManifests: async () => {
        throw new Error('EACCES: permission denied');
      },
    });

    expect(report.exitCode).toBe(5);
    expect(report.error?.context).toEqual({ resource: './kubernetes' });
  });

  it('should stop with exit 6 and skip health when the rollout times out', async () => {
    api.statuses = [deploymentStatus(0)];

    const report = await runDeployment(config({ timeoutSeconds: 10 }), deps());

    expect(report.exitCode).toBe(6);
    expect(report.status).toBe('rollout-timed-out');
    expect(report.summary).toEqual({ backend: 'ephemeral-node', rollout: 'TimedOut', health: 'skipped' });
    expect(report.health).toBe('skipped');
    expect(report.rollout?.elapsedMs).toBe(10000);
    expect(report.error?.code).toBe('ROLLOUT_TIMED_OUT');
    expect(report.steps.map((step) => step.status)).toEqual([
      'completed',
      'completed',
      'completed',
      'completed',
      'failed',
      'skipped',
    ]);
    expect(report.lastCompletedStage).toBe('apply-manifests');
  });

  it('should stop with exit 7 when the rollout errors', async () => {
    api.statuses = [deploymentStatus(1, { progressDeadlineExceeded: true })];

    const report = await runDeployment(config(), deps());

    expect(report.exitCode).toBe(7);
    expect(report.status).toBe('rollout-errored');
    expect(report.health).toBe('skipped');
  });

  it('should exit 0 with an advisory when the health check fails', async () => {
    fetchResponses = [() => new Error('connect ECONNREFUSED 127.0.0.1:30080')];

    const report = await runDeployment(config(), deps());

    expect(report.exitCode).toBe(0);
    expect(report.status).toBe('deployed-health-check-failed');
    expect(report.summary.health).toBe(false);
    expect(report.steps[5]).toMatchObject({ name: 'verify-health', status: 'failed' });
    expect(report.advisories).toEqual([
      {
        name: 'HealthCheckError',
        code: 'HEALTH_CHECK_FAILED',
        message:
          'Health check failed at http://localhost:30080/health: connect ECONNREFUSED 127.0.0.1:30080',
        context: { endpoint: 'http://localhost:30080/health', attempts: 5 },
      },
    ]);
    expect(report.error).toBeNull();
  });

  it('should report unexpected failures against the stage they happened in', async () => {
    const report = await runDeployment(config(), {
      ...deps(),
      createBackend: () => {
        throw new TypeError('backend factory exploded');
      },
    });

    expect(report.exitCode).toBe(1);
    expect(report.error).toEqual({
      name: 'InternalError',
      code: 'INTERNAL_ERROR',
      message: 'Unexpected failure in provision-cluster: backend factory exploded',
      context: { stage: 'provision-cluster' },
    });
    expect(report.steps[0]?.status).toBe('completed');
    expect(report.steps[1]?.status).toBe('failed');
  });
});
