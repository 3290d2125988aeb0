/**
 * Command Executor - runs the cluster CLIs (kind, minikube) as child processes
 */

import { spawn, SpawnOptions } from 'node:child_process';
import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS } from '../config/defaults';
import { CommandError } from '../errors';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number;
  maxBuffer?: number;
  /** Written to the child's stdin, which is then closed */
  input?: string;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut?: boolean;
}

/**
 * What the cluster backends need from a process runner
 */
export interface CommandRunner {
  execute(command: string, args?: string[], options?: CommandOptions): Promise<CommandResult>;
  isAvailable(command: string): Promise<boolean>;
}

export class CommandExecutor implements CommandRunner {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'CommandExecutor' });
  }

  /**
   * Execute a command with arguments
   */
  async execute(
    command: string,
    args: string[] = [],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    const {
      cwd = process.cwd(),
      env = process.env,
      timeout = DEFAULT_TIMEOUTS.command,
      maxBuffer = 10 * 1024 * 1024, // 10MB
      input,
    } = options;

    this.logger.debug({ command, args, cwd }, 'Executing command');

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;
      let timeoutHandle: NodeJS.Timeout | undefined;

      const spawnOptions: SpawnOptions = {
        cwd,
        env,
        shell: false,
        stdio: [input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
      };

      const child = spawn(command, args, spawnOptions);

      if (timeout > 0) {
        timeoutHandle = setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
          setTimeout(() => {
            if (child.exitCode === null) {
              child.kill('SIGKILL');
            }
          }, 5000).unref();
        }, timeout);
      }

      if (input !== undefined && child.stdin) {
        child.stdin.on('error', (error: Error) => {
          this.logger.debug({ command, error: error.message }, 'stdin closed early');
        });
        child.stdin.end(input);
      }

      child.stdout?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        if (stdout.length + chunk.length <= maxBuffer) {
          stdout += chunk;
        } else if (!settled) {
          settled = true;
          child.kill('SIGTERM');
          reject(new Error(`Command output exceeded maximum buffer size of ${maxBuffer} bytes`));
        }
      });

      child.stderr?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        if (stderr.length + chunk.length <= maxBuffer) {
          stderr += chunk;
        }
      });

      child.on('close', (code: number | null) => {
        if (timeoutHandle) {
          clearTimeout(timeoutHandle);
        }
        if (settled) return;
        settled = true;

        const exitCode = code ?? -1;

        this.logger.debug({ command, exitCode, timedOut }, 'Command completed');

        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode,
          timedOut,
        });
      });

      child.on('error', (error: Error) => {
        if (timeoutHandle) {
          clearTimeout(timeoutHandle);
        }
        if (settled) return;
        settled = true;

        this.logger.error({ command, error: error.message }, 'Command execution failed');

        reject(error);
      });
    });
  }

  /**
   * Check if a command is on PATH
   */
  async isAvailable(command: string): Promise<boolean> {
    try {
      const result = await this.execute('which', [command], { timeout: 5000 });
      return result.exitCode === 0 && result.stdout.length > 0;
    } catch (error) {
      this.logger.debug({ command, error }, 'Availability check failed');
      return false;
    }
  }
}

/**
 * Run a command and throw a CommandError unless it exits 0
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  options: CommandOptions = {},
): Promise<CommandResult> {
  const result = await runner.execute(command, args, options);
  if (result.timedOut === true) {
    throw new CommandError(
      `${command} ${args.join(' ')} timed out`,
      command,
      result.exitCode,
      result.stderr,
    );
  }
  if (result.exitCode !== 0) {
    throw new CommandError(
      `${command} ${args.join(' ')} exited with code ${result.exitCode}: ${result.stderr || result.stdout}`,
      command,
      result.exitCode,
      result.stderr,
    );
  }
  return result;
}
