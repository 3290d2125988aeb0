import type { BackendKind, ClusterStatus, ClusterTool } from '../../domain/types';

export interface BackendSettings {
  registryName: string;
  /** Host port of the registry, used in image references */
  registryPort: number;
  /** NodePort the demo service is published on */
  nodePort: number;
  /** Host port the kind node maps `nodePort` to */
  hostPort: number;
  createTimeoutMs: number;
}

/**
 * One cluster tool behind the calls the pipeline makes
 */
export interface ClusterBackend {
  readonly tool: ClusterTool;
  readonly kind: BackendKind;

  /** `stopped` when the cluster exists but its nodes are not running */
  clusterStatus(name: string): Promise<ClusterStatus>;
  /** Create the cluster, or start it again when it exists but is stopped */
  createCluster(name: string): Promise<void>;
  /** Write the cluster's context into the active kubeconfig */
  exportKubeconfig(name: string): Promise<void>;
  contextName(name: string): string;
  /** Container network the nodes run on, null when there is none to join */
  networkName(name: string): string | null;
  /** Base URL a host process reaches `nodePort` on */
  resolveBaseUrl(name: string, nodePort: number): Promise<string>;
  deleteCluster(name: string): Promise<void>;
}
