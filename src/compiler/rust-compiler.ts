import type { CacheStore } from '../cache/cache-store';
import type { CompileResult } from '../cache/types';
import { CORE_CRATE, PRELUDE_CRATE, RUST_EDITION } from '../config/constants';
import { formatCompilationError } from '../diagnostics/diagnostic-formatter';
import { CompilationError, IoError, handleUnknownError } from '../errors/index';
import { debug } from '../output/logger';
import type { CommandOutput, CommandRunner } from '../process/command-runner';
import { toolchainSysroot, type ToolchainHandle } from '../toolchain/types';
import { locateArtifacts, type LibraryArtifacts } from './artifact-locator';

/** Resolves the toolchain on the first compile; a cache hit never calls it */
export type ToolchainProvider = () => Promise<ToolchainHandle>;

export interface RustCompilerOptions {
  toolchain: ToolchainProvider;
  runner: CommandRunner;
  /** Candidate build-output roots searched for the support libraries before each compile */
  artifactRoots?: () => Iterable<string>;
}

/**
 * Full rustc argument list: fixed optimized-binary flags, then the support
 * libraries when found, then the sysroot override for embedded toolchains.
 */
export function buildCompilerArgs(
  sourcePath: string,
  outputPath: string,
  artifacts: LibraryArtifacts | undefined,
  sysroot: string | undefined
): string[] {
  const args = [
    `--edition=${RUST_EDITION}`,
    '-C',
    'opt-level=3',
    '--crate-type',
    'bin',
    '-o',
    outputPath,
    sourcePath,
  ];

  if (artifacts) {
    args.push(
      '--extern',
      `${PRELUDE_CRATE}=${artifacts.prelude}`,
      '--extern',
      `${CORE_CRATE}=${artifacts.core}`,
      '-L',
      `dependency=${artifacts.dependencyDir}`
    );
  }

  if (sysroot) {
    args.push('--sysroot', sysroot);
  }

  return args;
}

/**
 * Compiles generated programs with a resolved toolchain.
 */
export class RustCompiler {
  private readonly provideToolchain: ToolchainProvider;
  private toolchain: ToolchainHandle | undefined;
  private readonly runner: CommandRunner;
  private readonly artifactRoots: () => Iterable<string>;

  constructor(options: RustCompilerOptions) {
    this.provideToolchain = options.toolchain;
    this.runner = options.runner;
    this.artifactRoots = options.artifactRoots ?? (() => []);
  }

  private async resolveToolchain(): Promise<ToolchainHandle> {
    if (!this.toolchain) {
      this.toolchain = await this.provideToolchain();
    }
    return this.toolchain;
  }

  resolveArtifacts(): LibraryArtifacts | undefined {
    const artifacts = locateArtifacts(this.artifactRoots());
    if (artifacts) {
      debug(`Support libraries found in ${artifacts.root}`);
    } else {
      debug('Support libraries not found, compiling without them');
    }
    return artifacts;
  }

  /**
   * Compile one source file. A non-zero exit throws a CompilationError whose
   * message is the translated report, never the raw stderr.
   */
  async compile(sourcePath: string, outputPath: string, expression?: string): Promise<void> {
    const toolchain = await this.resolveToolchain();
    const args = buildCompilerArgs(sourcePath, outputPath, this.resolveArtifacts(), toolchainSysroot(toolchain));

    let output: CommandOutput;
    try {
      output = await this.runner.capture(toolchain.compilerPath, args);
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Running compiler');
      throw new IoError(`Failed to run ${toolchain.compilerPath}: ${err.message}`, e);
    }

    if (output.code !== 0) {
      throw new CompilationError(formatCompilationError(output.stderr, expression));
    }
  }

  /**
   * Reuse the cached binary for this source or compile and store it. The binary
   * is only moved into the cache after the compiler reports success.
   */
  async compileAndCache(source: string, cache: CacheStore, expression?: string): Promise<CompileResult> {
    const key = cache.hashSource(source);

    const cached = cache.lookup(key);
    if (cached) {
      debug(`Cache hit: ${key}`);
      return { binaryPath: cached, cacheHit: true };
    }

    debug(`Cache miss: ${key}, compiling`);
    const sourcePath = cache.storeSource(key, source);
    const staged = cache.stagingPath(key);
    try {
      await this.compile(sourcePath, staged, expression);
    } catch (e: unknown) {
      cache.discardStaged(staged);
      throw e;
    }

    return { binaryPath: cache.commitBinary(key, staged), cacheHit: false };
  }
}
