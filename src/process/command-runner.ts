import { spawn } from 'child_process';

export interface CommandOutput {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface CommandExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Seam over subprocess execution so the compiler and the compiled program can be
 * replaced in tests.
 */
export interface CommandRunner {
  /**
   * Run to completion, buffering stdout and stderr.
   * Rejects only when the process cannot be started (e.g. ENOENT).
   */
  capture(command: string, args: readonly string[]): Promise<CommandOutput>;

  /**
   * Run to completion sharing this process's stdin, stdout and stderr.
   */
  inherit(command: string, args: readonly string[]): Promise<CommandExit>;
}

export class ProcessRunner implements CommandRunner {
  capture(command: string, args: readonly string[]): Promise<CommandOutput> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: 'pipe' });

      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        resolve({ code, signal, stdout, stderr });
      });

      child.on('error', (error: Error) => {
        reject(error);
      });
    });
  }

  inherit(command: string, args: readonly string[]): Promise<CommandExit> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: 'inherit' });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        resolve({ code, signal });
      });

      child.on('error', (error: Error) => {
        reject(error);
      });
    });
  }
}
