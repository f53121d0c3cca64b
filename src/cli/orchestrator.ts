import { performance } from 'perf_hooks';
import type { CacheStore } from '../cache/cache-store';
import type { CompileResult } from '../cache/types';
import { synthesize } from '../codegen/synthesizer';
import { isStdinSource } from '../codegen/formats';
import { RustCompiler, type ToolchainProvider } from '../compiler/rust-compiler';
import { ExecutionError, handleUnknownError, IoError } from '../errors/index';
import { debug } from '../output/logger';
import type { CommandExit, CommandRunner } from '../process/command-runner';
import type { PipelineReport, PipelineRequest } from './types';

export interface PipelineDeps {
  cache: CacheStore;
  /** Called only when the binary is not cached */
  resolveToolchain: ToolchainProvider;
  runner: CommandRunner;
  artifactRoots?: () => Iterable<string>;
  now?: () => number;
}

/*
 * Status reported for a program that did not exit normally.
 */
function exitStatus(exit: CommandExit): number {
  return exit.code ?? 1;
}

/*
 * Reuse or build the binary for the source. The toolchain is handed over
 * unresolved so a cache hit never touches it.
 */
function buildBinary(source: string, expression: string, deps: PipelineDeps): Promise<CompileResult> {
  const compiler = new RustCompiler({
    toolchain: deps.resolveToolchain,
    runner: deps.runner,
    ...(deps.artifactRoots ? { artifactRoots: deps.artifactRoots } : {}),
  });
  return compiler.compileAndCache(source, deps.cache, expression);
}

/*
 * Runs one expression end to end: synthesize, look up or compile, execute.
 * The program inherits this process's stdio, so its output is never buffered here.
 */
export async function runPipeline(request: PipelineRequest, deps: PipelineDeps): Promise<PipelineReport> {
  const now = deps.now ?? (() => performance.now());
  const start = now();

  const source = synthesize(request.expression, request.input, request.outputFormat);
  debug('Generated source:');
  debug(source);

  const compileStart = now();
  const compileResult = await buildBinary(source, request.expression, deps);
  const compileMs = now() - compileStart;
  debug(`Binary: ${compileResult.binaryPath}`);

  const args = isStdinSource(request.input) ? [] : request.input.files;
  const executeStart = now();
  let exit: CommandExit;
  try {
    exit = await deps.runner.inherit(compileResult.binaryPath, args);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Running program');
    throw new IoError(`Failed to run ${compileResult.binaryPath}: ${err.message}`, e);
  }
  const executeMs = now() - executeStart;

  if (exit.code !== 0) {
    const status = exitStatus(exit);
    const message = exit.signal
      ? `Program terminated by signal ${exit.signal}`
      : `Program exited with status ${status}`;
    throw new ExecutionError(message, status, exit.signal ?? undefined);
  }

  return {
    compileResult,
    compileMs,
    executeMs,
    totalMs: now() - start,
  };
}
