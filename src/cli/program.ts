/**
 * Command-line surface: options, commands and how they map onto configuration
 */

import { Command } from 'commander';
import { z } from 'zod';
import type { ConfigOverrides } from '../config/app-config';

export const CliOptionsSchema = z.object({
  clusterName: z.string().optional(),
  namespace: z.string().optional(),
  appName: z.string().optional(),
  backend: z.string().optional(),
  dockerSocket: z.string().optional(),
  logLevel: z.string().optional(),
  json: z.boolean().optional(),
  pretty: z.boolean().optional(),
  manifests: z.string().optional(),
  image: z.string().optional(),
  timeout: z.coerce.number().optional(),
  continueOnRegistryFailure: z.boolean().optional(),
  container: z.string().optional(),
  cluster: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export type CliRequest =
  | { command: 'deploy' | 'status' | 'teardown'; options: Record<string, unknown> }
  | { command: 'set-image'; image: string; options: Record<string, unknown> };

export function toOverrides(options: CliOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.clusterName !== undefined) overrides.clusterName = options.clusterName;
  if (options.namespace !== undefined) overrides.namespace = options.namespace;
  if (options.appName !== undefined) overrides.appName = options.appName;
  if (options.backend !== undefined) overrides.backend = options.backend;
  if (options.dockerSocket !== undefined) overrides.dockerSocket = options.dockerSocket;
  if (options.logLevel !== undefined) overrides.logLevel = options.logLevel;
  if (options.manifests !== undefined) overrides.manifestsDir = options.manifests;
  if (options.image !== undefined) overrides.image = options.image;
  if (options.timeout !== undefined) overrides.timeoutSeconds = options.timeout;
  if (options.continueOnRegistryFailure !== undefined) {
    overrides.continueOnRegistryFailure = options.continueOnRegistryFailure;
  }
  return overrides;
}

/** JSON is the default; `--json` wins over `--pretty` */
export function wantsPretty(options: CliOptions): boolean {
  return options.pretty === true && options.json !== true;
}

export function createProgram(
  dispatch: (request: CliRequest) => Promise<void>,
  version: string,
): Command {
  const program = new Command();

  program
    .name('cluster-bootstrap')
    .description('Bootstrap a local Kubernetes cluster, deploy a workload and verify it')
    .version(version)
    .option('--cluster-name <name>', 'cluster name (default: local-cicd)')
    .option('--namespace <namespace>', 'target namespace (default: cicd-demo)')
    .option(
      '--app-name <name>',
      'workload (Deployment) name; deploy requires the manifests to use it (default: demo-app)',
    )
    .option('--backend <tool>', 'force a backend: kind or minikube (default: auto)')
    .option('--docker-socket <path>', 'Docker socket path (default: /var/run/docker.sock)')
    .option('--log-level <level>', 'logging level: trace, debug, info, warn, error, silent')
    .option('--json', 'print the result as JSON (default)')
    .option('--pretty', 'print a human-readable summary instead of JSON')
    .addHelpText(
      'after',
      `

Examples:
  $ cluster-bootstrap                                   Deploy with defaults
  $ cluster-bootstrap deploy --image localhost:5000/demo-app:1.2.0 --pretty
  $ cluster-bootstrap status --namespace cicd-demo
  $ cluster-bootstrap set-image localhost:5000/demo-app:1.2.1
  $ cluster-bootstrap teardown --cluster

Exit codes:
  0 deployed (health failures are reported, not fatal)   1 configuration error
  2 no backend   3 cluster provision failed   4 registry bridge failed
  5 manifest apply failed   6 rollout timed out   7 rollout errored

Environment Variables:
  CLUSTER_NAME, NAMESPACE, APP_NAME, CLUSTER_BACKEND, MANIFESTS_DIR, IMAGE,
  REGISTRY_NAME, REGISTRY_PORT, NODE_PORT, HOST_PORT, ROLLOUT_TIMEOUT,
  ROLLOUT_POLL_INTERVAL, HEALTH_PATH, HEALTH_ATTEMPTS, HEALTH_BACKOFF,
  HEALTH_INITIAL_DELAY, HEALTH_TIMEOUT, CONTINUE_ON_REGISTRY_FAILURE,
  DOCKER_SOCKET, KUBECONFIG, LOG_LEVEL
`,
    );

  program
    .command('deploy', { isDefault: true })
    .description('provision the cluster, attach the registry, apply manifests and verify')
    .option('--manifests <dir>', 'directory with namespace.yaml, deployment.yaml, service.yaml')
    .option('--image <image>', 'override the deployment image')
    .option('--timeout <seconds>', 'rollout wait window in seconds (default: 300)')
    .option('--continue-on-registry-failure', 'keep going when the registry cannot be attached')
    .action(async (_options: unknown, command: Command) => {
      await dispatch({ command: 'deploy', options: command.optsWithGlobals() });
    });

  program
    .command('status')
    .description('show the deployment, its pods and the namespace services')
    .action(async (_options: unknown, command: Command) => {
      await dispatch({ command: 'status', options: command.optsWithGlobals() });
    });

  program
    .command('set-image')
    .description('set the image of the running deployment and wait for the rollout')
    .argument('<image>', 'new container image')
    .option('--container <name>', 'container to update (default: the first one)')
    .option('--timeout <seconds>', 'rollout wait window in seconds (default: 300)')
    .action(async (image: string, _options: unknown, command: Command) => {
      await dispatch({ command: 'set-image', image, options: command.optsWithGlobals() });
    });

  program
    .command('teardown')
    .description('delete the namespace (or the whole cluster with --cluster)')
    .option('--cluster', 'delete the cluster instead of only the namespace')
    .action(async (_options: unknown, command: Command) => {
      await dispatch({ command: 'teardown', options: command.optsWithGlobals() });
    });

  return program;
}
