import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  setImageCommand,
  statusCommand,
  teardownCommand,
} from '../../../src/cli/commands';
import { createContainer, type Deps } from '../../../src/app/container';
import { createAppConfig, type ConfigOverrides } from '../../../src/config/app-config';
import { CommandExecutor } from '../../../src/infrastructure/command-executor';
import { DockerClient } from '../../../src/infrastructure/docker-client';
import { systemClock } from '../../../src/lib/clock';
import type { PodSnapshot } from '../../../src/domain/types';
import { demoService } from '../../__support__/fixtures/manifests';
import {
  FakeClock,
  FakeClusterApi,
  FakeCommandRunner,
  FakeContainerRuntime,
  createSilentLogger,
  deploymentStatus,
} from '../../__support__/utilities/fakes';

const pod: PodSnapshot = {
  name: 'demo-app-5c9d7b6f4-x2k8q',
  phase: 'Running',
  ready: true,
  restarts: 1,
  images: ['localhost:5000/demo-app:latest'],
};

describe('CLI commands', () => {
  let api: FakeClusterApi;
  let runner: FakeCommandRunner;
  let contexts: string[];

  function deps(overrides: ConfigOverrides = {}): Deps {
    return createContainer(createAppConfig({}, overrides), {
      logger: createSilentLogger(),
      clock: new FakeClock(),
      runner,
      runtime: new FakeContainerRuntime(),
      connect: (context) => {
        contexts.push(context);
        return api;
      },
    });
  }

  beforeEach(() => {
    api = new FakeClusterApi();
    api.statuses = [deploymentStatus(2)];
    api.pods = [pod];
    api.services = [demoService];
    runner = new FakeCommandRunner(['kind']);
    contexts = [];
  });

  describe('status', () => {
    it('should print the deployment, pods and services as JSON', async () => {
      const outcome = await statusCommand(deps());

      expect(outcome.exitCode).toBe(0);
      expect(JSON.parse(outcome.output)).toEqual({
        cluster: 'local-cicd',
        context: 'kind-local-cicd',
        namespace: 'cicd-demo',
        deployment: deploymentStatus(2),
        pods: [pod],
        services: [demoService],
      });
      expect(contexts).toEqual(['kind-local-cicd']);
      expect(api.calls).toContain('listPods:cicd-demo:app=demo-app');
    });

    it('should print a missing deployment in text form', async () => {
      api.statuses = [];
      api.pods = [];

      const outcome = await statusCommand(deps(), { pretty: true });

      expect(outcome.output.split('\n')).toEqual([
        'Cluster local-cicd (context kind-local-cicd), namespace cicd-demo',
        'Deployment: not found (deployments.apps "demo-app" not found)',
        'Service demo-app-svc: NodePort 80:30080',
      ]);
    });

    it('should exit 2 when no backend is installed', async () => {
      runner = new FakeCommandRunner();

      const outcome = await statusCommand(deps());

      expect(outcome.exitCode).toBe(2);
      expect(JSON.parse(outcome.output)).toEqual({
        error: {
          name: 'NoBackendAvailableError',
          code: 'NO_BACKEND_AVAILABLE',
          message: 'Neither kind nor minikube is installed. Please install one of them.',
          context: { searched: ['kind', 'minikube'] },
        },
      });
    });
  });

  describe('set-image', () => {
    it('should update the image and wait for the rollout', async () => {
      const outcome = await setImageCommand(deps(), 'localhost:5000/demo-app:1.2.1');

      expect(outcome.exitCode).toBe(0);
      expect(JSON.parse(outcome.output)).toMatchObject({
        deployment: 'demo-app',
        namespace: 'cicd-demo',
        container: 'demo-app',
        image: 'localhost:5000/demo-app:1.2.1',
        rollout: { state: 'Succeeded', polls: 1 },
      });
      expect(api.images.get('demo-app')).toBe('localhost:5000/demo-app:1.2.1');
    });

    it('should exit 6 when the new rollout does not finish', async () => {
      api.statuses = [deploymentStatus(1)];

      const outcome = await setImageCommand(deps({ timeoutSeconds: 4 }), 'localhost:5000/demo-app:1.2.1', {
        pretty: true,
      });

      expect(outcome.exitCode).toBe(6);
      expect(outcome.output).toBe(
        'demo-app/demo-app -> localhost:5000/demo-app:1.2.1: rollout TimedOut after 4000ms',
      );
    });

    it('should report an unknown container', async () => {
      const outcome = await setImageCommand(deps(), 'envoy:1.30', { container: 'proxy' });

      expect(outcome.exitCode).toBe(1);
      expect(JSON.parse(outcome.output)).toMatchObject({
        error: { name: 'KubernetesError', code: 'K8S_NOT_FOUND' },
      });
      expect(api.calls).not.toContain('getDeploymentStatus:cicd-demo/demo-app');
    });
  });

  describe('teardown', () => {
    it('should delete the namespace by default', async () => {
      api.namespaces.add('cicd-demo');

      const outcome = await teardownCommand(deps());

      expect(outcome.exitCode).toBe(0);
      expect(JSON.parse(outcome.output)).toEqual({
        namespace: { name: 'cicd-demo', result: 'deleted' },
        cluster: null,
      });
    });

    it('should report a namespace that was already gone', async () => {
      const outcome = await teardownCommand(deps({ namespace: 'team-a' }), { pretty: true });

      expect(outcome.output).toBe('Namespace team-a absent');
    });

    it('should delete the cluster with --cluster', async () => {
      const outcome = await teardownCommand(deps(), { cluster: true });

      expect(outcome.exitCode).toBe(0);
      expect(runner.commandLines()).toEqual(['kind delete cluster --name local-cicd']);
      expect(contexts).toEqual([]);
    });

    it('should report a failed cluster delete', async () => {
      runner.respond('kind delete cluster --name local-cicd', { exitCode: 1, stderr: 'permission denied' });

      const outcome = await teardownCommand(deps(), { cluster: true });

      expect(outcome.exitCode).toBe(1);
      expect(JSON.parse(outcome.output)).toMatchObject({ error: { code: 'COMMAND_FAILED' } });
    });
  });
});

describe('createContainer', () => {
  it('should build the real adapters when nothing is overridden', () => {
    const logger = createSilentLogger();
    const deps = createContainer(createAppConfig({}), { logger });

    expect(deps.logger).toBe(logger);
    expect(deps.clock).toBe(systemClock);
    expect(deps.runner).toBeInstanceOf(CommandExecutor);
    expect(deps.runtime).toBeInstanceOf(DockerClient);
    expect(deps.config.cluster.name).toBe('local-cicd');
  });
});
