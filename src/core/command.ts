/**
 * External command runner shared by the recon and scan adapters.
 */

import { execa } from 'execa';

export interface CommandOptions {
  timeout?: number;
  signal?: AbortSignal;
  cwd?: string;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode?: number;
  failed: boolean;
  timedOut: boolean;
  /** Process could not be started, usually because the binary is not installed */
  notFound: boolean;
}

export type CommandRunner = (file: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (file, args, options = {}) => {
  try {
    const result = await execa(file, args, {
      cwd: options.cwd,
      timeout: options.timeout,
      signal: options.signal,
      env: {
        ...process.env,
        NO_COLOR: '1',
      },
      reject: false,
    });
    const exitCode = typeof result.exitCode === 'number' ? result.exitCode : undefined;
    return {
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      exitCode,
      failed: result.failed,
      timedOut: result.timedOut,
      // A process that never started has no exit code
      notFound: result.failed && exitCode === undefined && !result.timedOut && !result.isCanceled,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      stdout: '',
      stderr: message,
      failed: true,
      timedOut: false,
      notFound: message.includes('ENOENT'),
    };
  }
};
