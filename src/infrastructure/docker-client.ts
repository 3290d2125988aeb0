/**
 * Docker Client - direct interface to the Docker daemon for the local
 * registry container and the cluster's container network
 */

import Docker from 'dockerode';
import { z } from 'zod';
import type { Logger } from 'pino';
import { DockerError, extractErrorMessage, toError } from '../errors';
import type { PortMapping } from '../domain/types';

export type ContainerState = 'running' | 'stopped' | 'absent';

export interface RunContainerOptions {
  name: string;
  image: string;
  ports: PortMapping[];
  restartPolicy?: 'no' | 'always' | 'unless-stopped' | 'on-failure';
}

/**
 * Container operations the registry bridge relies on
 */
export interface ContainerRuntime {
  getContainerState(name: string): Promise<ContainerState>;
  startContainer(name: string): Promise<void>;
  /** Pull the image if it is missing, then create and start the container */
  runContainer(options: RunContainerOptions): Promise<void>;
  isAttached(network: string, container: string): Promise<boolean>;
  connectNetwork(network: string, container: string): Promise<'connected' | 'already-connected'>;
}

export interface DockerClientConfig {
  socketPath?: string;
  host?: string;
  port?: number;
}

const NetworkInspectSchema = z.object({
  Name: z.string().optional(),
  Containers: z
    .record(z.object({ Name: z.string().optional() }).passthrough())
    .nullable()
    .optional(),
});

export function dockerStatusCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    return typeof error.statusCode === 'number' ? error.statusCode : undefined;
  }
  return undefined;
}

/**
 * The daemon refuses a second attach with "endpoint with name X already exists in network Y"
 */
export function isAlreadyConnectedError(error: unknown): boolean {
  return /already exists in network/i.test(extractErrorMessage(error));
}

export function containerNamesOnNetwork(inspect: unknown): string[] {
  const parsed = NetworkInspectSchema.safeParse(inspect);
  if (!parsed.success || !parsed.data.Containers) {
    return [];
  }
  return Object.values(parsed.data.Containers).flatMap((entry) =>
    entry.Name ? [entry.Name.replace(/^\//, '')] : [],
  );
}

export class DockerClient implements ContainerRuntime {
  private readonly docker: Docker;
  private readonly logger: Logger;

  constructor(config: DockerClientConfig, logger: Logger) {
    this.logger = logger.child({ component: 'DockerClient' });

    const dockerOptions: Docker.DockerOptions = {};
    if (config.socketPath != null) {
      dockerOptions.socketPath = config.socketPath;
    } else if (config.host != null) {
      dockerOptions.host = config.host;
      dockerOptions.port = config.port ?? 2375;
      dockerOptions.protocol = 'http';
    }

    this.docker = new Docker(dockerOptions);
  }

  async ping(): Promise<boolean> {
    try {
      await this.docker.ping();
      return true;
    } catch (error) {
      this.logger.warn({ error: extractErrorMessage(error) }, 'Docker daemon not reachable');
      return false;
    }
  }

  async getContainerState(name: string): Promise<ContainerState> {
    try {
      const info = await this.docker.getContainer(name).inspect();
      return info.State.Running ? 'running' : 'stopped';
    } catch (error) {
      if (dockerStatusCode(error) === 404) {
        return 'absent';
      }
      throw new DockerError(
        `Failed to inspect container ${name}: ${extractErrorMessage(error)}`,
        'inspectContainer',
        dockerStatusCode(error),
        toError(error),
      );
    }
  }

  async startContainer(name: string): Promise<void> {
    try {
      await this.docker.getContainer(name).start();
      this.logger.info({ container: name }, 'Container started');
    } catch (error) {
      // 304: already started
      if (dockerStatusCode(error) === 304) {
        return;
      }
      throw new DockerError(
        `Failed to start container ${name}: ${extractErrorMessage(error)}`,
        'startContainer',
        dockerStatusCode(error),
        toError(error),
      );
    }
  }

  async runContainer(options: RunContainerOptions): Promise<void> {
    const { name, image, ports, restartPolicy = 'always' } = options;

    await this.ensureImage(image);

    const exposedPorts: Record<string, object> = {};
    const portBindings: Record<string, Array<{ HostPort: string }>> = {};
    for (const mapping of ports) {
      const key = `${mapping.containerPort}/${(mapping.protocol ?? 'TCP').toLowerCase()}`;
      exposedPorts[key] = {};
      portBindings[key] = [{ HostPort: String(mapping.hostPort) }];
    }

    try {
      const container = await this.docker.createContainer({
        name,
        Image: image,
        ExposedPorts: exposedPorts,
        HostConfig: {
          PortBindings: portBindings,
          RestartPolicy: { Name: restartPolicy },
        },
      });
      await container.start();
      this.logger.info({ container: name, image }, 'Container created and started');
    } catch (error) {
      throw new DockerError(
        `Failed to run container ${name}: ${extractErrorMessage(error)}`,
        'runContainer',
        dockerStatusCode(error),
        toError(error),
      );
    }
  }

  async isAttached(network: string, container: string): Promise<boolean> {
    try {
      const inspect: unknown = await this.docker.getNetwork(network).inspect();
      return containerNamesOnNetwork(inspect).includes(container);
    } catch (error) {
      throw new DockerError(
        `Failed to inspect network ${network}: ${extractErrorMessage(error)}`,
        'inspectNetwork',
        dockerStatusCode(error),
        toError(error),
      );
    }
  }

  async connectNetwork(
    network: string,
    container: string,
  ): Promise<'connected' | 'already-connected'> {
    try {
      await this.docker.getNetwork(network).connect({ Container: container });
      this.logger.info({ network, container }, 'Container attached to network');
      return 'connected';
    } catch (error) {
      if (isAlreadyConnectedError(error)) {
        this.logger.debug({ network, container }, 'Container already attached to network');
        return 'already-connected';
      }
      throw new DockerError(
        `Failed to connect ${container} to network ${network}: ${extractErrorMessage(error)}`,
        'connectNetwork',
        dockerStatusCode(error),
        toError(error),
      );
    }
  }

  private async ensureImage(image: string): Promise<void> {
    try {
      await this.docker.getImage(image).inspect();
      return;
    } catch (error) {
      if (dockerStatusCode(error) !== 404) {
        throw new DockerError(
          `Failed to inspect image ${image}: ${extractErrorMessage(error)}`,
          'inspectImage',
          dockerStatusCode(error),
          toError(error),
        );
      }
    }

    this.logger.info({ image }, 'Pulling image');
    try {
      const stream: NodeJS.ReadableStream = await this.docker.pull(image);
      await new Promise<void>((resolve, reject) => {
        this.docker.modem.followProgress(stream, (err: Error | null) => {
          if (err) {
            reject(err);
          } else {
            resolve();
          }
        });
      });
    } catch (error) {
      throw new DockerError(
        `Failed to pull image ${image}: ${extractErrorMessage(error)}`,
        'pull',
        dockerStatusCode(error),
        toError(error),
      );
    }
  }
}
