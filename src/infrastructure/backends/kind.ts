/**
 * kind backend: Kubernetes nodes run as containers on the `kind` network
 */

import { dump } from 'js-yaml';
import type { Logger } from 'pino';
import { BACKEND_KIND, type ClusterStatus } from '../../domain/types';
import { DEFAULT_CLUSTER, DEFAULT_REGISTRY } from '../../config/defaults';
import { runChecked, type CommandRunner } from '../command-executor';
import type { BackendSettings, ClusterBackend } from './types';

/**
 * Cluster config fed to `kind create cluster --config=-`: one control-plane node
 * publishing the NodePort on the host and a containerd mirror for the local registry.
 * Images are tagged `localhost:<registryPort>`; nodes pull them from the registry
 * container on the kind network, where it listens on its container port.
 */
export function buildKindClusterConfig(settings: BackendSettings): string {
  const registryHost = `localhost:${settings.registryPort}`;
  const config = {
    kind: 'Cluster',
    apiVersion: 'kind.x-k8s.io/v1alpha4',
    nodes: [
      {
        role: 'control-plane',
        extraPortMappings: [
          { containerPort: settings.nodePort, hostPort: settings.hostPort, protocol: 'TCP' },
        ],
      },
    ],
    containerdConfigPatches: [
      `[plugins."io.containerd.grpc.v1.cri".registry.mirrors."${registryHost}"]\n` +
        `  endpoint = ["http://${settings.registryName}:${DEFAULT_REGISTRY.containerPort}"]`,
    ],
  };
  return dump(config, { lineWidth: -1 });
}

/** kind names the single node container after the cluster */
function controlPlaneNode(name: string): string {
  return `${name}-control-plane`;
}

export class KindBackend implements ClusterBackend {
  readonly tool = 'kind' as const;
  readonly kind = BACKEND_KIND.kind;
  private readonly logger: Logger;

  constructor(
    private readonly runner: CommandRunner,
    private readonly settings: BackendSettings,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'KindBackend' });
  }

  async clusterStatus(name: string): Promise<ClusterStatus> {
    const { stdout } = await runChecked(this.runner, 'kind', ['get', 'clusters']);
    const clusters = stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    this.logger.debug({ name, clusters }, 'Checking kind cluster existence');
    if (!clusters.includes(name)) {
      return 'absent';
    }
    return (await this.nodeStopped(name)) ? 'stopped' : 'running';
  }

  /**
   * Create the cluster. A cluster whose node container was stopped (after a Docker
   * restart, say) is started again instead, since `kind create` refuses existing nodes.
   */
  async createCluster(name: string): Promise<void> {
    if (await this.nodeStopped(name)) {
      this.logger.info({ name, node: controlPlaneNode(name) }, 'Starting stopped kind cluster');
      await runChecked(this.runner, 'docker', ['start', controlPlaneNode(name)]);
      await this.exportKubeconfig(name);
      return;
    }
    this.logger.info({ name }, 'Creating kind cluster');
    await runChecked(this.runner, 'kind', ['create', 'cluster', '--name', name, '--config=-'], {
      input: buildKindClusterConfig(this.settings),
      timeout: this.settings.createTimeoutMs,
    });
  }

  /** A missing node container counts as not stopped */
  private async nodeStopped(name: string): Promise<boolean> {
    const result = await this.runner.execute('docker', [
      'inspect',
      '--format',
      '{{.State.Running}}',
      controlPlaneNode(name),
    ]);
    return result.exitCode === 0 && result.stdout.trim() === 'false';
  }

  async exportKubeconfig(name: string): Promise<void> {
    await runChecked(this.runner, 'kind', ['export', 'kubeconfig', '--name', name]);
  }

  contextName(name: string): string {
    return `kind-${name}`;
  }

  networkName(): string {
    return DEFAULT_CLUSTER.kindNetwork;
  }

  async resolveBaseUrl(_name: string, nodePort: number): Promise<string> {
    const port = nodePort === this.settings.nodePort ? this.settings.hostPort : nodePort;
    return `http://localhost:${port}`;
  }

  async deleteCluster(name: string): Promise<void> {
    this.logger.info({ name }, 'Deleting kind cluster');
    await runChecked(this.runner, 'kind', ['delete', 'cluster', '--name', name], {
      timeout: this.settings.createTimeoutMs,
    });
  }
}
