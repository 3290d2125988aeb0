#!/usr/bin/env node
/**
 * cluster-bootstrap CLI
 *
 * Stands up a local kind or minikube cluster, deploys the demo workload and checks it.
 * The report goes to stdout, logs to stderr.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { createContainer, type Deps } from '../app/container';
import { createAppConfig } from '../config/app-config';
import { ConfigurationError, extractErrorMessage } from '../errors';
import { EXIT_CODES } from '../workflows/report';
import {
  deployCommand,
  setImageCommand,
  statusCommand,
  teardownCommand,
  type CommandOutcome,
} from './commands';
import {
  CliOptionsSchema,
  createProgram,
  toOverrides,
  wantsPretty,
  type CliRequest,
} from './program';

const PackageJsonSchema = z.object({ version: z.string() }).passthrough();

function readVersion(): string {
  // src/cli and dist/cli both sit two levels below the package root
  try {
    const raw: unknown = JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8'));
    const parsed = PackageJsonSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function emit(outcome: CommandOutcome): void {
  process.stdout.write(`${outcome.output}\n`);
  process.exitCode = outcome.exitCode;
}

/**
 * Validate options, build the container and hand off to a command handler
 */
async function dispatch(request: CliRequest): Promise<void> {
  const parsed = CliOptionsSchema.safeParse(request.options);
  if (!parsed.success) {
    process.stderr.write(`❌ Invalid options: ${parsed.error.message}\n`);
    process.exitCode = EXIT_CODES.CONFIG_ERROR;
    return;
  }
  const options = parsed.data;

  let deps: Deps;
  try {
    deps = createContainer(createAppConfig(process.env, toOverrides(options)));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      process.stderr.write('❌ Configuration errors:\n');
      error.issues.forEach((issue) => process.stderr.write(`  • ${issue}\n`));
      process.exitCode = EXIT_CODES.CONFIG_ERROR;
      return;
    }
    throw error;
  }

  const pretty = wantsPretty(options);
  switch (request.command) {
    case 'deploy':
      emit(await deployCommand(deps, { pretty }));
      return;
    case 'status':
      emit(await statusCommand(deps, { pretty }));
      return;
    case 'set-image':
      emit(
        await setImageCommand(deps, request.image, {
          pretty,
          ...(options.container !== undefined && { container: options.container }),
        }),
      );
      return;
    case 'teardown':
      emit(await teardownCommand(deps, { pretty, cluster: options.cluster }));
      return;
  }
}

createProgram(dispatch, readVersion())
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.stderr.write(`❌ ${extractErrorMessage(error)}\n`);
    process.exitCode = EXIT_CODES.CONFIG_ERROR;
  });
