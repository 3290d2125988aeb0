/**
 * minikube backend: a single VM (docker driver) per profile
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { BACKEND_KIND, type ClusterStatus } from '../../domain/types';
import { extractErrorMessage } from '../../errors';
import { runChecked, type CommandRunner } from '../command-executor';
import type { BackendSettings, ClusterBackend } from './types';

const MinikubeStatusSchema = z
  .object({
    Host: z.string(),
    Kubelet: z.string().optional(),
    APIServer: z.string().optional(),
  })
  .passthrough();

/**
 * Interpret `minikube status -o json`. The command exits non-zero for stopped and
 * missing profiles, so only the printed document is used.
 */
export function parseMinikubeStatus(stdout: string): ClusterStatus {
  let document: unknown;
  try {
    document = JSON.parse(stdout);
  } catch {
    return 'absent';
  }

  const parsed = MinikubeStatusSchema.safeParse(document);
  if (!parsed.success || parsed.data.Host === 'Nonexistent') {
    return 'absent';
  }
  return parsed.data.Host === 'Running' && parsed.data.APIServer === 'Running'
    ? 'running'
    : 'stopped';
}

export class MinikubeBackend implements ClusterBackend {
  readonly tool = 'minikube' as const;
  readonly kind = BACKEND_KIND.minikube;
  private readonly logger: Logger;

  constructor(
    private readonly runner: CommandRunner,
    private readonly settings: BackendSettings,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'MinikubeBackend' });
  }

  async clusterStatus(name: string): Promise<ClusterStatus> {
    const { stdout } = await this.runner.execute('minikube', ['status', '-p', name, '-o', 'json']);
    const status = parseMinikubeStatus(stdout);
    this.logger.debug({ name, status }, 'Checking minikube profile');
    return status;
  }

  async createCluster(name: string): Promise<void> {
    this.logger.info({ name }, 'Starting minikube');
    await runChecked(
      this.runner,
      'minikube',
      [
        'start',
        '-p',
        name,
        '--driver=docker',
        `--insecure-registry=localhost:${this.settings.registryPort}`,
      ],
      { timeout: this.settings.createTimeoutMs },
    );

    try {
      await runChecked(this.runner, 'minikube', ['addons', 'enable', 'ingress', '-p', name], {
        timeout: this.settings.createTimeoutMs,
      });
    } catch (error) {
      this.logger.warn({ name, error: extractErrorMessage(error) }, 'Ingress addon not enabled');
    }
  }

  async exportKubeconfig(name: string): Promise<void> {
    await runChecked(this.runner, 'minikube', ['update-context', '-p', name]);
  }

  contextName(name: string): string {
    return name;
  }

  networkName(): null {
    return null;
  }

  async resolveBaseUrl(name: string, nodePort: number): Promise<string> {
    const { stdout } = await runChecked(this.runner, 'minikube', ['ip', '-p', name]);
    return `http://${stdout.trim()}:${nodePort}`;
  }

  async deleteCluster(name: string): Promise<void> {
    this.logger.info({ name }, 'Deleting minikube profile');
    await runChecked(this.runner, 'minikube', ['delete', '-p', name], {
      timeout: this.settings.createTimeoutMs,
    });
  }
}
