/*
 * Packs the installed Rust toolchain into assets/toolchain.tar.gz when
 * RPIPE_EMBED_TOOLCHAIN=1, otherwise writes the empty placeholder so the
 * runtime falls back to the system compiler.
 */
import * as path from 'path';
import { DEFAULT_SYSTEM_COMPILER, TOOLCHAIN_ARCHIVE_FILENAME } from '../src/config/constants';
import { formatSize } from '../src/cache/cache-store';
import { handleUnknownError } from '../src/errors/index';
import { ProcessRunner } from '../src/process/command-runner';
import { packToolchain, readSysroot, writePlaceholder } from '../src/toolchain/toolchain-packer';

const archivePath = path.resolve(__dirname, '..', 'assets', TOOLCHAIN_ARCHIVE_FILENAME);

async function main(): Promise<void> {
  if (process.env.RPIPE_EMBED_TOOLCHAIN !== '1') {
    writePlaceholder(archivePath);
    console.log(`Wrote empty toolchain placeholder to ${archivePath}`);
    return;
  }

  const compiler = process.env.RPIPE_RUSTC || DEFAULT_SYSTEM_COMPILER;
  const sysroot = await readSysroot(compiler, new ProcessRunner());
  // The rustc on PATH may be a rustup proxy; the sysroot holds the real binary
  const binary = process.platform === 'win32' ? 'rustc.exe' : 'rustc';
  const compilerPath = path.join(sysroot, 'bin', binary);

  console.log(`Packing toolchain from ${sysroot}...`);
  const result = packToolchain({ compilerPath, sysroot, archivePath });
  console.log(`Embedded ${result.libraryCount} libraries (${formatSize(result.bytes)}) into ${result.archivePath}`);
}

main().catch((e: unknown) => {
  const err = handleUnknownError(e, 'Embedding toolchain');
  console.error(`Error: ${err.message}`);
  process.exit(1);
});
