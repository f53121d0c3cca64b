import { copyFileSync, existsSync, mkdirSync, mkdtempSync, readdirSync, rmSync, statSync, writeFileSync } from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as tar from 'tar';
import { TOOLCHAIN_COMPILER_PATH } from '../config/constants';
import { ToolchainError } from '../errors/index';
import type { CommandRunner } from '../process/command-runner';

// Only linkable library artifacts are kept from the sysroot; sources and docs are dropped
const LIBRARY_EXTENSIONS = new Set(['.rlib', '.so', '.dylib', '.dll', '.a']);

export interface PackOptions {
  compilerPath: string;
  sysroot: string;
  archivePath: string;
}

export interface PackResult {
  archivePath: string;
  libraryCount: number;
  bytes: number;
}

function copyLibraries(src: string, dest: string): number {
  let copied = 0;
  for (const entry of readdirSync(src, { withFileTypes: true })) {
    const from = path.join(src, entry.name);
    const to = path.join(dest, entry.name);
    if (entry.isDirectory()) {
      copied += copyLibraries(from, to);
    } else if (entry.isFile() && LIBRARY_EXTENSIONS.has(path.extname(entry.name))) {
      mkdirSync(dest, { recursive: true });
      copyFileSync(from, to);
      copied += 1;
    }
  }
  return copied;
}

/**
 * Build the archive the embedded toolchain is extracted from: the compiler at
 * bin/rustc plus the library files under lib/rustlib of its sysroot.
 */
export function packToolchain(options: PackOptions): PackResult {
  const rustlib = path.join(options.sysroot, 'lib', 'rustlib');
  if (!existsSync(rustlib)) {
    throw new ToolchainError(`Sysroot lib directory not found: ${rustlib}`);
  }

  const staging = mkdtempSync(path.join(os.tmpdir(), 'rpipe-toolchain-'));
  try {
    const compilerDest = path.join(staging, ...TOOLCHAIN_COMPILER_PATH);
    mkdirSync(path.dirname(compilerDest), { recursive: true });
    copyFileSync(options.compilerPath, compilerDest);

    const libraryCount = copyLibraries(rustlib, path.join(staging, 'lib', 'rustlib'));
    const entries = readdirSync(staging);

    mkdirSync(path.dirname(options.archivePath), { recursive: true });
    tar.c({ gzip: true, file: options.archivePath, cwd: staging, sync: true, portable: true }, entries);

    return {
      archivePath: options.archivePath,
      libraryCount,
      bytes: statSync(options.archivePath).size,
    };
  } finally {
    rmSync(staging, { recursive: true, force: true });
  }
}

/**
 * Empty archive: the runtime reads it as "no embedded toolchain" and uses the system compiler.
 */
export function writePlaceholder(archivePath: string): void {
  mkdirSync(path.dirname(archivePath), { recursive: true });
  writeFileSync(archivePath, Buffer.alloc(0));
}

/**
 * Sysroot reported by an installed compiler (`rustc --print sysroot`).
 */
export async function readSysroot(compiler: string, runner: CommandRunner): Promise<string> {
  const output = await runner.capture(compiler, ['--print', 'sysroot']);
  const sysroot = output.stdout.trim();
  if (output.code !== 0 || !sysroot) {
    throw new ToolchainError('Failed to get sysroot');
  }
  return sysroot;
}
