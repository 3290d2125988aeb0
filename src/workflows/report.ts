/**
 * Report assembly, exit codes and the human-readable rendering
 */

import { ErrorCodes, type ErrorCode } from '../errors';
import type { DeploymentReport, DeploymentStatus, DeploymentSummary, HealthOutcome } from './types';
import type { BackendKind, RolloutOutcome } from '../domain/types';

export const EXIT_CODES = {
  SUCCESS: 0,
  CONFIG_ERROR: 1,
  NO_BACKEND: 2,
  CLUSTER_PROVISION_FAILED: 3,
  REGISTRY_BRIDGE_FAILED: 4,
  MANIFEST_APPLY_FAILED: 5,
  ROLLOUT_TIMED_OUT: 6,
  ROLLOUT_ERRORED: 7,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(code: ErrorCode): ExitCode {
  switch (code) {
    case ErrorCodes.NO_BACKEND_AVAILABLE:
      return EXIT_CODES.NO_BACKEND;
    case ErrorCodes.CLUSTER_PROVISION_FAILED:
      return EXIT_CODES.CLUSTER_PROVISION_FAILED;
    case ErrorCodes.REGISTRY_BRIDGE_FAILED:
      return EXIT_CODES.REGISTRY_BRIDGE_FAILED;
    case ErrorCodes.MANIFEST_APPLY_FAILED:
      return EXIT_CODES.MANIFEST_APPLY_FAILED;
    case ErrorCodes.ROLLOUT_TIMED_OUT:
      return EXIT_CODES.ROLLOUT_TIMED_OUT;
    case ErrorCodes.ROLLOUT_ERRORED:
      return EXIT_CODES.ROLLOUT_ERRORED;
    default:
      return EXIT_CODES.CONFIG_ERROR;
  }
}

export function statusFor(
  rollout: RolloutOutcome | null,
  health: HealthOutcome,
  failed: boolean,
): DeploymentStatus {
  if (rollout?.state === 'TimedOut') return 'rollout-timed-out';
  if (rollout?.state === 'Errored') return 'rollout-errored';
  if (failed || rollout?.state !== 'Succeeded') return 'failed';
  return health !== null && health !== 'skipped' && !health.reachable
    ? 'deployed-health-check-failed'
    : 'deployed';
}

export function summarize(
  backend: BackendKind | null,
  rollout: RolloutOutcome | null,
  health: HealthOutcome,
): DeploymentSummary {
  return {
    backend,
    rollout: rollout?.state ?? null,
    health: health === null || health === 'skipped' ? health : health.reachable,
  };
}

function line(label: string, value: string): string {
  return `  ${label.padEnd(12)} ${value}`;
}

/**
 * Plain-text summary for `--pretty`
 */
export function formatReport(report: DeploymentReport): string {
  const lines: string[] = [];
  lines.push(`Deployment ${report.status} (exit ${report.exitCode})`, '');

  lines.push(line('Run', report.runId));
  lines.push(line('Backend', report.tool ? `${report.tool} (${report.backend})` : 'none'));
  if (report.cluster) {
    lines.push(
      line(
        'Cluster',
        `${report.cluster.name} [${report.cluster.existed ? 'existing' : 'created'}] context ${report.cluster.context}`,
      ),
    );
  }
  if (report.registry) {
    lines.push(
      line(
        'Registry',
        report.registry.skipped ??
          `${report.registry.containerName} on ${report.registry.network ?? '-'} (${report.registry.attached ? 'attached' : 'not attached'})`,
      ),
    );
  }
  lines.push(line('Namespace', report.namespace));
  for (const manifest of report.manifests) {
    lines.push(line('', `${manifest.resource} ${manifest.action}`));
  }

  if (report.rollout) {
    const { rollout } = report;
    const ready = rollout.lastStatus
      ? ` ${rollout.lastStatus.readyReplicas}/${rollout.lastStatus.desiredReplicas} ready`
      : '';
    lines.push(line('Rollout', `${rollout.state}${ready} after ${rollout.elapsedMs}ms`));
    for (const pod of rollout.pods) {
      lines.push(
        line('', `pod ${pod.name} ${pod.phase}${pod.ready ? ' ready' : ''} restarts=${pod.restarts}`),
      );
    }
    for (const service of rollout.services) {
      const ports = service.ports
        .map((port) => (port.nodePort ? `${port.port}:${port.nodePort}` : String(port.port)))
        .join(',');
      lines.push(line('', `svc ${service.name} ${service.type} ${ports}`));
    }
  }

  if (report.health === 'skipped') {
    lines.push(line('Health', 'skipped'));
  } else if (report.health) {
    const { health } = report;
    lines.push(
      line(
        'Health',
        health.reachable
          ? `passed ${health.endpoint} (${health.statusCode ?? '-'}, ${health.latencyMs ?? 0}ms)`
          : `failed ${health.endpoint || '-'}: ${health.error ?? 'unreachable'}`,
      ),
    );
  }

  if (report.error) {
    lines.push('', `Error [${report.error.code}]: ${report.error.message}`);
  }
  for (const advisory of report.advisories) {
    lines.push(`Warning [${advisory.code}]: ${advisory.message}`);
  }

  return lines.join('\n');
}
