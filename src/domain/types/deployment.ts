/**
 * Deployment domain types shared by every pipeline stage
 */

export type ClusterTool = 'kind' | 'minikube';

/**
 * `ephemeral-node` runs nodes as containers (kind), `vm-based` runs one VM node (minikube)
 */
export type BackendKind = 'ephemeral-node' | 'vm-based';

export const BACKEND_KIND: Record<ClusterTool, BackendKind> = {
  kind: 'ephemeral-node',
  minikube: 'vm-based',
};

export type ClusterStatus = 'running' | 'stopped' | 'absent';

/**
 * Produced by the provisioner, read-only for every later stage
 */
export interface ClusterHandle {
  readonly name: string;
  readonly backend: BackendKind;
  readonly tool: ClusterTool;
  /** The cluster was already there before this run */
  readonly existed: boolean;
  /** Container network the nodes live on, null for VM-based clusters */
  readonly network: string | null;
  readonly context: string;
}

export interface RegistryBinding {
  containerName: string;
  network: string | null;
  running: boolean;
  attached: boolean;
  /** Set when the bridge does not apply to the backend */
  skipped?: string;
}

export interface PortMapping {
  containerPort: number;
  hostPort: number;
  protocol?: 'TCP' | 'UDP';
}

export interface K8sManifest {
  apiVersion: string;
  kind: string;
  metadata: {
    name: string;
    namespace?: string;
    labels?: Record<string, string>;
    annotations?: Record<string, string>;
  };
  spec?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface DeploymentTarget {
  name: string;
  namespace: string;
  selector: Record<string, string>;
  desiredReplicas: number;
  serviceName: string;
}

export interface AppliedManifest {
  resource: string;
  action: 'created' | 'configured';
}

export type RolloutState = 'Pending' | 'Progressing' | 'Succeeded' | 'TimedOut' | 'Errored';

export type TerminalRolloutState = Extract<RolloutState, 'Succeeded' | 'TimedOut' | 'Errored'>;

export interface DeploymentStatusSnapshot {
  desiredReplicas: number;
  replicas: number;
  readyReplicas: number;
  updatedReplicas: number;
  availableReplicas: number;
  generation?: number;
  observedGeneration?: number;
  progressDeadlineExceeded: boolean;
}

export interface PodSnapshot {
  name: string;
  phase: string;
  ready: boolean;
  restarts: number;
  images: string[];
}

export interface ServiceSnapshot {
  name: string;
  type: string;
  clusterIP?: string;
  ports: Array<{
    port: number;
    nodePort?: number;
    targetPort?: string | number;
    protocol?: string;
  }>;
}

export interface RolloutTransition {
  from: RolloutState;
  to: RolloutState;
  atMs: number;
}

export interface RolloutOutcome {
  state: TerminalRolloutState;
  deployment: string;
  namespace: string;
  elapsedMs: number;
  polls: number;
  transitions: RolloutTransition[];
  lastStatus?: DeploymentStatusSnapshot;
  pods: PodSnapshot[];
  services: ServiceSnapshot[];
  error?: string;
}

export interface HealthResult {
  endpoint: string;
  reachable: boolean;
  attempts: number;
  latencyMs?: number;
  statusCode?: number;
  /** Parsed JSON body, or the raw text when the body is not JSON */
  body?: unknown;
  error?: string;
}
