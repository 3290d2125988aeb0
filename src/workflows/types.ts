/**
 * Workflow Types
 */

import type { SerializedError } from '../errors';
import type {
  AppliedManifest,
  BackendKind,
  ClusterHandle,
  ClusterTool,
  HealthResult,
  RegistryBinding,
  RolloutOutcome,
  TerminalRolloutState,
} from '../domain/types';

export const DEPLOYMENT_STAGES = [
  'select-backend',
  'provision-cluster',
  'connect-registry',
  'apply-manifests',
  'watch-rollout',
  'verify-health',
] as const;

export type StageName = (typeof DEPLOYMENT_STAGES)[number];

export interface WorkflowStep {
  name: StageName;
  status: 'pending' | 'running' | 'completed' | 'failed' | 'skipped';
  startTime?: string;
  endTime?: string;
  error?: string;
}

export type DeploymentStatus =
  | 'deployed'
  | 'deployed-health-check-failed'
  | 'rollout-timed-out'
  | 'rollout-errored'
  | 'failed';

/**
 * `health` is `'skipped'` when the rollout ran and did not succeed, null when the
 * run stopped before the rollout
 */
export type HealthOutcome = HealthResult | 'skipped' | null;

export interface DeploymentSummary {
  backend: BackendKind | null;
  rollout: TerminalRolloutState | null;
  health: boolean | 'skipped' | null;
}

/**
 * End-of-run report printed on stdout
 */
export interface DeploymentReport {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  status: DeploymentStatus;
  exitCode: number;
  summary: DeploymentSummary;
  backend: BackendKind | null;
  tool: ClusterTool | null;
  cluster: ClusterHandle | null;
  registry: RegistryBinding | null;
  namespace: string;
  manifests: AppliedManifest[];
  rollout: RolloutOutcome | null;
  health: HealthOutcome;
  lastCompletedStage: StageName | null;
  steps: WorkflowStep[];
  error: SerializedError | null;
  /** Failures that did not stop the run */
  advisories: SerializedError[];
}
