/**
 * Kubernetes Client - direct API client for the target cluster
 */

import * as k8s from '@kubernetes/client-node';
import type { Logger } from 'pino';
import { ErrorCodes, KubernetesError } from '../errors';
import type {
  DeploymentStatusSnapshot,
  K8sManifest,
  PodSnapshot,
  ServiceSnapshot,
} from '../domain/types';

// Type guard for Error objects
function isError(error: unknown): error is Error {
  return error instanceof Error;
}

// Type guard for HTTP errors with statusCode
interface HttpError extends Error {
  statusCode?: number;
}

function isHttpError(error: unknown): error is HttpError {
  return isError(error) && 'statusCode' in error;
}

function describe(error: unknown): string {
  if (isHttpError(error) && error.statusCode !== undefined) {
    return `HTTP ${error.statusCode}: ${error.message || 'request failed'}`;
  }
  return isError(error) ? error.message : 'Unknown error';
}

export function resourceName(manifest: Pick<K8sManifest, 'kind' | 'metadata'>): string {
  return `${manifest.kind}/${manifest.metadata.name}`;
}

/**
 * What the pipeline stages need from a cluster
 */
export interface ClusterApi {
  /** Resolves when the API server answers; throws otherwise */
  ping(): Promise<string>;
  ensureNamespace(name: string): Promise<'created' | 'exists'>;
  /** Create, or strategic-merge patch when the object already exists */
  applyManifest(manifest: K8sManifest): Promise<'created' | 'configured'>;
  getDeploymentStatus(name: string, namespace: string): Promise<DeploymentStatusSnapshot>;
  listPods(namespace: string, labelSelector?: string): Promise<PodSnapshot[]>;
  listServices(namespace: string): Promise<ServiceSnapshot[]>;
  getService(name: string, namespace: string): Promise<ServiceSnapshot>;
  /** Returns the name of the container whose image was replaced */
  setImage(
    deployment: string,
    namespace: string,
    container: string | undefined,
    image: string,
  ): Promise<string>;
  deleteNamespace(name: string): Promise<'deleted' | 'absent'>;
}

export interface KubernetesClientConfig {
  kubeconfig?: string;
  context?: string;
}

export function toDeploymentSnapshot(deployment: k8s.V1Deployment): DeploymentStatusSnapshot {
  const status = deployment.status;
  const snapshot: DeploymentStatusSnapshot = {
    desiredReplicas: deployment.spec?.replicas ?? 1,
    replicas: status?.replicas ?? 0,
    readyReplicas: status?.readyReplicas ?? 0,
    updatedReplicas: status?.updatedReplicas ?? 0,
    availableReplicas: status?.availableReplicas ?? 0,
    progressDeadlineExceeded: (status?.conditions ?? []).some(
      (condition) =>
        condition.type === 'Progressing' && condition.reason === 'ProgressDeadlineExceeded',
    ),
  };
  if (deployment.metadata?.generation !== undefined) {
    snapshot.generation = deployment.metadata.generation;
  }
  if (status?.observedGeneration !== undefined) {
    snapshot.observedGeneration = status.observedGeneration;
  }
  return snapshot;
}

export function toPodSnapshot(pod: k8s.V1Pod): PodSnapshot {
  const containers = pod.status?.containerStatuses ?? [];
  return {
    name: pod.metadata?.name ?? 'unknown',
    phase: pod.status?.phase ?? 'Unknown',
    ready: (pod.status?.conditions ?? []).some(
      (condition) => condition.type === 'Ready' && condition.status === 'True',
    ),
    restarts: containers.reduce((total, container) => total + container.restartCount, 0),
    images: containers.map((container) => container.image),
  };
}

export function toServiceSnapshot(service: k8s.V1Service): ServiceSnapshot {
  const snapshot: ServiceSnapshot = {
    name: service.metadata?.name ?? 'unknown',
    type: service.spec?.type ?? 'ClusterIP',
    ports: (service.spec?.ports ?? []).map((port) => ({
      port: port.port,
      ...(port.nodePort !== undefined && { nodePort: port.nodePort }),
      ...(port.targetPort !== undefined && { targetPort: port.targetPort }),
      ...(port.protocol !== undefined && { protocol: port.protocol }),
    })),
  };
  if (service.spec?.clusterIP) {
    snapshot.clusterIP = service.spec.clusterIP;
  }
  return snapshot;
}

export class KubernetesClient implements ClusterApi {
  private readonly kc: k8s.KubeConfig;
  private readonly coreApi: k8s.CoreV1Api;
  private readonly appsApi: k8s.AppsV1Api;
  private readonly versionApi: k8s.VersionApi;
  private readonly objectApi: k8s.KubernetesObjectApi;
  private readonly logger: Logger;

  constructor(config: KubernetesClientConfig, logger: Logger) {
    this.logger = logger.child({ component: 'KubernetesClient' });
    this.kc = new k8s.KubeConfig();

    try {
      if (config.kubeconfig != null) {
        this.kc.loadFromFile(config.kubeconfig);
      } else {
        this.kc.loadFromDefault();
      }
    } catch (error: unknown) {
      throw new KubernetesError(
        `Failed to load kubeconfig: ${describe(error)}`,
        ErrorCodes.K8S_ERROR,
        undefined,
        undefined,
        undefined,
        isError(error) ? error : undefined,
      );
    }

    if (config.context != null) {
      this.kc.setCurrentContext(config.context);
    }

    this.coreApi = this.kc.makeApiClient(k8s.CoreV1Api);
    this.appsApi = this.kc.makeApiClient(k8s.AppsV1Api);
    this.versionApi = this.kc.makeApiClient(k8s.VersionApi);
    this.objectApi = k8s.KubernetesObjectApi.makeApiClient(this.kc);
  }

  async ping(): Promise<string> {
    try {
      const { body } = await this.versionApi.getCode();
      return body.gitVersion;
    } catch (error: unknown) {
      throw this.wrap('API server not reachable', error);
    }
  }

  async ensureNamespace(name: string): Promise<'created' | 'exists'> {
    try {
      await this.coreApi.createNamespace({ metadata: { name } });
      this.logger.info({ namespace: name }, 'Namespace created');
      return 'created';
    } catch (error: unknown) {
      if (isHttpError(error) && error.statusCode === 409) {
        this.logger.debug({ namespace: name }, 'Namespace already exists');
        return 'exists';
      }
      throw this.wrap('Failed to create namespace', error, `Namespace/${name}`);
    }
  }

  async applyManifest(manifest: K8sManifest): Promise<'created' | 'configured'> {
    const resource = resourceName(manifest);
    const namespace = manifest.metadata.namespace;

    try {
      await this.objectApi.create(manifest);
      this.logger.info({ resource, namespace }, 'Resource created');
      return 'created';
    } catch (error: unknown) {
      if (!(isHttpError(error) && error.statusCode === 409)) {
        throw this.wrap(`Failed to apply ${resource}`, error, resource, namespace);
      }
    }

    try {
      await this.objectApi.patch(manifest);
      this.logger.info({ resource, namespace }, 'Resource configured');
      return 'configured';
    } catch (error: unknown) {
      throw this.wrap(`Failed to patch ${resource}`, error, resource, namespace);
    }
  }

  async getDeploymentStatus(name: string, namespace: string): Promise<DeploymentStatusSnapshot> {
    try {
      const { body } = await this.appsApi.readNamespacedDeployment(name, namespace);
      return toDeploymentSnapshot(body);
    } catch (error: unknown) {
      throw this.wrap('Failed to read deployment', error, `Deployment/${name}`, namespace);
    }
  }

  async listPods(namespace: string, labelSelector?: string): Promise<PodSnapshot[]> {
    try {
      const { body } = await this.coreApi.listNamespacedPod(
        namespace,
        undefined,
        undefined,
        undefined,
        undefined,
        labelSelector,
      );
      return body.items.map(toPodSnapshot);
    } catch (error: unknown) {
      throw this.wrap('Failed to list pods', error, undefined, namespace);
    }
  }

  async listServices(namespace: string): Promise<ServiceSnapshot[]> {
    try {
      const { body } = await this.coreApi.listNamespacedService(namespace);
      return body.items.map(toServiceSnapshot);
    } catch (error: unknown) {
      throw this.wrap('Failed to list services', error, undefined, namespace);
    }
  }

  async getService(name: string, namespace: string): Promise<ServiceSnapshot> {
    try {
      const { body } = await this.coreApi.readNamespacedService(name, namespace);
      return toServiceSnapshot(body);
    } catch (error: unknown) {
      throw this.wrap('Failed to read service', error, `Service/${name}`, namespace);
    }
  }

  async setImage(
    deployment: string,
    namespace: string,
    container: string | undefined,
    image: string,
  ): Promise<string> {
    const resource = `Deployment/${deployment}`;
    let containerName: string;

    try {
      const { body } = await this.appsApi.readNamespacedDeployment(deployment, namespace);
      const containers = body.spec?.template.spec?.containers ?? [];
      const target =
        container === undefined
          ? containers[0]
          : containers.find((candidate) => candidate.name === container);
      if (!target) {
        throw new KubernetesError(
          container === undefined
            ? `${resource} has no containers`
            : `${resource} has no container named ${container}`,
          ErrorCodes.K8S_NOT_FOUND,
          resource,
          namespace,
        );
      }
      containerName = target.name;
    } catch (error: unknown) {
      if (error instanceof KubernetesError) throw error;
      throw this.wrap('Failed to read deployment', error, resource, namespace);
    }

    try {
      await this.objectApi.patch({
        apiVersion: 'apps/v1',
        kind: 'Deployment',
        metadata: { name: deployment, namespace },
        spec: { template: { spec: { containers: [{ name: containerName, image }] } } },
      });
      this.logger.info({ resource, namespace, container: containerName, image }, 'Image updated');
      return containerName;
    } catch (error: unknown) {
      throw this.wrap('Failed to update image', error, resource, namespace);
    }
  }

  async deleteNamespace(name: string): Promise<'deleted' | 'absent'> {
    try {
      await this.coreApi.deleteNamespace(name);
      this.logger.info({ namespace: name }, 'Namespace deleted');
      return 'deleted';
    } catch (error: unknown) {
      if (isHttpError(error) && error.statusCode === 404) {
        this.logger.info({ namespace: name }, 'Namespace not found, already deleted');
        return 'absent';
      }
      throw this.wrap('Failed to delete namespace', error, `Namespace/${name}`);
    }
  }

  private wrap(
    message: string,
    error: unknown,
    resource?: string,
    namespace?: string,
  ): KubernetesError {
    const statusCode = isHttpError(error) ? error.statusCode : undefined;
    return new KubernetesError(
      `${message}: ${describe(error)}`,
      statusCode === 404 ? ErrorCodes.K8S_NOT_FOUND : ErrorCodes.K8S_ERROR,
      resource,
      namespace,
      statusCode,
      isError(error) ? error : undefined,
    );
  }
}

/**
 * Build a client bound to one kubeconfig context
 */
export function createClusterApi(
  context: string,
  logger: Logger,
  kubeconfig?: string,
): ClusterApi {
  return new KubernetesClient(
    kubeconfig === undefined ? { context } : { context, kubeconfig },
    logger,
  );
}
