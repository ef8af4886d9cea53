/**
 * Runs helper binaries (gcloud) with a timeout and captured output
 */

import { spawn } from 'node:child_process';
import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS } from '../config/defaults';

export interface CommandOptions {
  env?: NodeJS.ProcessEnv;
  timeout?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
}

export class CommandExecutor {
  constructor(private readonly logger: Logger) {}

  async execute(command: string, args: string[] = [], options: CommandOptions = {}): Promise<CommandResult> {
    const { env = process.env, timeout = DEFAULT_TIMEOUTS.command } = options;

    this.logger.debug({ command, args }, 'Executing command');

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;

      const child = spawn(command, args, { env, shell: false });

      const timeoutHandle = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
      }, timeout);

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code: number | null) => {
        clearTimeout(timeoutHandle);
        const exitCode = code ?? -1;
        this.logger.debug({ command, exitCode, timedOut }, 'Command completed');
        resolve({ stdout: stdout.trim(), stderr: stderr.trim(), exitCode, timedOut });
      });

      child.on('error', (error: Error) => {
        clearTimeout(timeoutHandle);
        this.logger.error({ command, error: error.message }, 'Command execution failed');
        reject(error);
      });
    });
  }
}
