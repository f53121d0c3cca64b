import { handleUnknownError } from '../errors/index';
import type { CommandRunner } from '../process/command-runner';
import { debug } from '../output/logger';
import type { EmbeddedToolchain } from './embedded-toolchain';
import { probeSystemToolchain } from './system-toolchain';
import type { ToolchainHandle } from './types';

export interface ToolchainSources {
  embedded: EmbeddedToolchain;
  systemCompiler: string;
  runner: CommandRunner;
}

/**
 * Embedded toolchain first, then the system compiler. The system probe's error is
 * what surfaces when both are unusable.
 */
export async function resolveToolchain(sources: ToolchainSources): Promise<ToolchainHandle> {
  try {
    sources.embedded.ensureExtracted();
    if (sources.embedded.isValid()) {
      debug('Using embedded Rust toolchain');
      return sources.embedded.handle();
    }
    debug('Embedded toolchain invalid, falling back to system rustc');
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Embedded toolchain');
    debug(`Embedded toolchain not available: ${err.message}`);
    debug('Falling back to system rustc');
  }

  const handle = await probeSystemToolchain(sources.systemCompiler, sources.runner);
  debug(`Using system compiler: ${handle.compilerPath}`);
  return handle;
}
