/**
 * In-process stand-ins for the adapters behind the pipeline stages
 */

import pino from 'pino';
import type { Logger } from 'pino';
import type { Clock } from '../../../src/lib/clock';
import { ErrorCodes, KubernetesError } from '../../../src/errors';
import {
  BACKEND_KIND,
  type ClusterStatus,
  type ClusterTool,
  type DeploymentStatusSnapshot,
  type K8sManifest,
  type PodSnapshot,
  type ServiceSnapshot,
} from '../../../src/domain/types';
import type {
  CommandOptions,
  CommandResult,
  CommandRunner,
} from '../../../src/infrastructure/command-executor';
import type {
  ContainerRuntime,
  ContainerState,
  RunContainerOptions,
} from '../../../src/infrastructure/docker-client';
import type { ClusterApi } from '../../../src/infrastructure/kubernetes-client';
import type { ClusterBackend } from '../../../src/infrastructure/backends';

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * `sleep` moves time forward without waiting
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

export function deploymentStatus(
  ready: number,
  overrides: Partial<DeploymentStatusSnapshot> = {},
): DeploymentStatusSnapshot {
  return {
    desiredReplicas: 2,
    replicas: 2,
    readyReplicas: ready,
    updatedReplicas: ready,
    availableReplicas: ready,
    generation: 1,
    observedGeneration: 1,
    progressDeadlineExceeded: false,
    ...overrides,
  };
}

/**
 * Cluster API backed by in-memory maps. Deployment status reads walk through
 * `statuses`; the last entry repeats.
 */
export class FakeClusterApi implements ClusterApi {
  readonly calls: string[] = [];
  readonly namespaces = new Set<string>();
  readonly objects = new Map<string, K8sManifest>();
  readonly failOn = new Set<string>();
  readonly images = new Map<string, string>();
  statuses: Array<DeploymentStatusSnapshot | Error> = [];
  pingResults: Array<string | Error> = [];
  pods: PodSnapshot[] = [];
  services: ServiceSnapshot[] = [];
  containers: string[] = ['demo-app'];
  podsError: Error | undefined;

  async ping(): Promise<string> {
    this.calls.push('ping');
    const next = this.pingResults.length > 1 ? this.pingResults.shift() : this.pingResults[0];
    if (next instanceof Error) throw next;
    return next ?? 'v1.30.0';
  }

  async ensureNamespace(name: string): Promise<'created' | 'exists'> {
    this.calls.push(`ensureNamespace:${name}`);
    if (this.failOn.has(`Namespace/${name}`)) {
      throw new KubernetesError(`namespaces "${name}" is forbidden`);
    }
    if (this.namespaces.has(name)) return 'exists';
    this.namespaces.add(name);
    return 'created';
  }

  async applyManifest(manifest: K8sManifest): Promise<'created' | 'configured'> {
    const resource = `${manifest.kind}/${manifest.metadata.name}`;
    this.calls.push(`apply:${resource}`);
    if (this.failOn.has(resource)) {
      throw new KubernetesError(`admission webhook denied ${resource}`);
    }
    const exists =
      this.objects.has(resource) ||
      (manifest.kind === 'Namespace' && this.namespaces.has(manifest.metadata.name));
    this.objects.set(resource, manifest);
    if (manifest.kind === 'Namespace') this.namespaces.add(manifest.metadata.name);
    return exists ? 'configured' : 'created';
  }

  async getDeploymentStatus(name: string, namespace: string): Promise<DeploymentStatusSnapshot> {
    this.calls.push(`getDeploymentStatus:${namespace}/${name}`);
    const next = this.statuses.length > 1 ? this.statuses.shift() : this.statuses[0];
    if (next === undefined) {
      throw new KubernetesError(
        `deployments.apps "${name}" not found`,
        ErrorCodes.K8S_NOT_FOUND,
        `Deployment/${name}`,
        namespace,
        404,
      );
    }
    if (next instanceof Error) throw next;
    return next;
  }

  async listPods(namespace: string, labelSelector?: string): Promise<PodSnapshot[]> {
    this.calls.push(`listPods:${namespace}:${labelSelector ?? ''}`);
    if (this.podsError) throw this.podsError;
    return this.pods;
  }

  async listServices(namespace: string): Promise<ServiceSnapshot[]> {
    this.calls.push(`listServices:${namespace}`);
    return this.services;
  }

  async getService(name: string, namespace: string): Promise<ServiceSnapshot> {
    this.calls.push(`getService:${namespace}/${name}`);
    const service = this.services.find((candidate) => candidate.name === name);
    if (!service) {
      throw new KubernetesError(
        `services "${name}" not found`,
        ErrorCodes.K8S_NOT_FOUND,
        `Service/${name}`,
        namespace,
        404,
      );
    }
    return service;
  }

  async setImage(
    deployment: string,
    namespace: string,
    container: string | undefined,
    image: string,
  ): Promise<string> {
    this.calls.push(`setImage:${namespace}/${deployment}`);
    const target = container ?? this.containers[0];
    if (target === undefined || !this.containers.includes(target)) {
      throw new KubernetesError(
        `Deployment/${deployment} has no container named ${container ?? ''}`,
        ErrorCodes.K8S_NOT_FOUND,
        `Deployment/${deployment}`,
        namespace,
      );
    }
    this.images.set(target, image);
    return target;
  }

  async deleteNamespace(name: string): Promise<'deleted' | 'absent'> {
    this.calls.push(`deleteNamespace:${name}`);
    return this.namespaces.delete(name) ? 'deleted' : 'absent';
  }
}

/**
 * Registry containers and network membership held in memory
 */
export class FakeContainerRuntime implements ContainerRuntime {
  readonly calls: string[] = [];
  readonly states = new Map<string, ContainerState>();
  readonly attached = new Map<string, Set<string>>();
  readonly runs: RunContainerOptions[] = [];
  connectError: Error | undefined;

  async getContainerState(name: string): Promise<ContainerState> {
    this.calls.push(`state:${name}`);
    return this.states.get(name) ?? 'absent';
  }

  async startContainer(name: string): Promise<void> {
    this.calls.push(`start:${name}`);
    this.states.set(name, 'running');
  }

  async runContainer(options: RunContainerOptions): Promise<void> {
    this.calls.push(`run:${options.name}`);
    this.runs.push(options);
    this.states.set(options.name, 'running');
  }

  async isAttached(network: string, container: string): Promise<boolean> {
    return this.attached.get(network)?.has(container) ?? false;
  }

  async connectNetwork(
    network: string,
    container: string,
  ): Promise<'connected' | 'already-connected'> {
    this.calls.push(`connect:${network}:${container}`);
    if (this.connectError) throw this.connectError;
    const members = this.attached.get(network) ?? new Set<string>();
    const already = members.has(container);
    members.add(container);
    this.attached.set(network, members);
    return already ? 'already-connected' : 'connected';
  }
}

export interface RecordedCommand {
  command: string;
  args: string[];
  options: CommandOptions;
}

/**
 * Answers commands from a table keyed by the full command line
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];
  readonly responses = new Map<string, Partial<CommandResult>>();
  readonly available: Set<string>;

  constructor(available: string[] = []) {
    this.available = new Set(available);
  }

  respond(commandLine: string, result: Partial<CommandResult>): this {
    this.responses.set(commandLine, result);
    return this;
  }

  commandLines(): string[] {
    return this.calls.map((call) => [call.command, ...call.args].join(' '));
  }

  async execute(
    command: string,
    args: string[] = [],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    const response = this.responses.get([command, ...args].join(' ')) ?? {};
    return { stdout: '', stderr: '', exitCode: 0, ...response };
  }

  async isAvailable(command: string): Promise<boolean> {
    return this.available.has(command);
  }
}

/**
 * Cluster backend whose cluster comes up as soon as it is created
 */
export class FakeBackend implements ClusterBackend {
  readonly kind: ClusterBackend['kind'];
  readonly calls: string[] = [];
  createError: Error | undefined;
  baseUrlError: Error | undefined;

  constructor(
    readonly tool: ClusterTool,
    public status: ClusterStatus = 'absent',
  ) {
    this.kind = BACKEND_KIND[tool];
  }

  async clusterStatus(name: string): Promise<ClusterStatus> {
    this.calls.push(`clusterStatus:${name}`);
    return this.status;
  }

  async createCluster(name: string): Promise<void> {
    this.calls.push(`createCluster:${name}`);
    if (this.createError) throw this.createError;
    this.status = 'running';
  }

  async exportKubeconfig(name: string): Promise<void> {
    this.calls.push(`exportKubeconfig:${name}`);
  }

  contextName(name: string): string {
    return this.tool === 'kind' ? `kind-${name}` : name;
  }

  networkName(): string | null {
    return this.tool === 'kind' ? 'kind' : null;
  }

  async resolveBaseUrl(name: string, nodePort: number): Promise<string> {
    this.calls.push(`resolveBaseUrl:${name}:${nodePort}`);
    if (this.baseUrlError) throw this.baseUrlError;
    return `http://localhost:${nodePort}`;
  }

  async deleteCluster(name: string): Promise<void> {
    this.calls.push(`deleteCluster:${name}`);
    this.status = 'absent';
  }
}

/**
 * `fetch` answering from a list; an Error entry is thrown. The last entry repeats.
 */
export function createFakeFetch(responses: Array<() => Response | Error>): {
  fetch: typeof fetch;
  urls: string[];
} {
  const urls: string[] = [];
  const queue = [...responses];
  const fakeFetch: typeof fetch = async (input) => {
    urls.push(typeof input === 'string' ? input : input.toString());
    const next = queue.length > 1 ? queue.shift() : queue[0];
    const result = next ? next() : new Error('no response configured');
    if (result instanceof Error) throw result;
    return result;
  };
  return { fetch: fakeFetch, urls };
}
