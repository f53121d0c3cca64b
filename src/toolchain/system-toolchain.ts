import { ToolchainError } from '../errors/index';
import type { CommandOutput, CommandRunner } from '../process/command-runner';
import { ToolchainKind, type ToolchainHandle } from './types';

/**
 * Check the compiler on PATH by asking for its version.
 */
export async function probeSystemToolchain(compiler: string, runner: CommandRunner): Promise<ToolchainHandle> {
  let output: CommandOutput;
  try {
    output = await runner.capture(compiler, ['--version']);
  } catch {
    throw new ToolchainError('rustc not found. Please install Rust from https://rustup.rs/');
  }

  if (output.code !== 0) {
    throw new ToolchainError('rustc not working properly');
  }

  return { kind: ToolchainKind.System, compilerPath: compiler };
}

/**
 * First line of `rustc --version`, or an empty string when it cannot be read.
 */
export async function readCompilerVersion(compilerPath: string, runner: CommandRunner): Promise<string> {
  try {
    const output = await runner.capture(compilerPath, ['--version']);
    if (output.code !== 0) return '';
    return output.stdout.split(/\r?\n/)[0]?.trim() ?? '';
  } catch {
    return '';
  }
}
