import { chmodSync, existsSync, mkdirSync, renameSync, rmSync, statSync } from 'fs';
import { randomBytes } from 'crypto';
import * as path from 'path';
import * as tar from 'tar';
import { TOOLCHAIN_COMPILER_PATH } from '../config/constants';
import { ToolchainError, handleUnknownError } from '../errors/index';
import { debug, info, warn } from '../output/logger';
import { ToolchainKind, type ToolchainHandle } from './types';

export interface EmbeddedToolchainOptions {
  /** Fixed extraction directory, shared by every run */
  toolchainDir: string;
  /** gzip'd tar shipped with the package; a zero-byte file means "none embedded" */
  archivePath: string;
  platform?: NodeJS.Platform;
}

const EXECUTABLE_MODE = 0o755;

/**
 * Toolchain packaged into the build and unpacked lazily into the cache.
 *
 * A directory only counts as extracted when the compiler exists inside it. A
 * leftover directory without one (an interrupted first run) is replaced.
 */
export class EmbeddedToolchain {
  private readonly toolchainDir: string;
  private readonly archivePath: string;
  private readonly platform: NodeJS.Platform;

  constructor(options: EmbeddedToolchainOptions) {
    this.toolchainDir = options.toolchainDir;
    this.archivePath = options.archivePath;
    this.platform = options.platform ?? process.platform;
  }

  get compilerPath(): string {
    return path.join(this.toolchainDir, ...TOOLCHAIN_COMPILER_PATH);
  }

  get sysroot(): string {
    return this.toolchainDir;
  }

  isValid(): boolean {
    return existsSync(this.compilerPath);
  }

  /**
   * Whether the build shipped a real archive rather than the empty placeholder.
   */
  hasArchive(): boolean {
    return existsSync(this.archivePath) && statSync(this.archivePath).size > 0;
  }

  handle(): ToolchainHandle {
    return { kind: ToolchainKind.Embedded, compilerPath: this.compilerPath, sysroot: this.sysroot };
  }

  /**
   * Extract on first need. Returns true when this call performed the extraction.
   */
  ensureExtracted(): boolean {
    if (this.isValid()) {
      return false;
    }

    if (!this.hasArchive()) {
      throw new ToolchainError(
        'No embedded toolchain available. This build was packaged without an embedded toolchain.'
      );
    }

    if (existsSync(this.toolchainDir)) {
      warn(`Toolchain directory ${this.toolchainDir} has no compiler, extracting again`);
      rmSync(this.toolchainDir, { recursive: true, force: true });
    }

    debug(`Extracting embedded Rust toolchain from ${this.archivePath}`);
    const staging = `${this.toolchainDir}.${process.pid}.${randomBytes(4).toString('hex')}.partial`;
    try {
      mkdirSync(staging, { recursive: true });
      tar.x({ file: this.archivePath, cwd: staging, sync: true, strict: true });
      this.markExecutable(path.join(staging, ...TOOLCHAIN_COMPILER_PATH));
      this.promote(staging);
    } catch (e: unknown) {
      rmSync(staging, { recursive: true, force: true });
      const err = handleUnknownError(e, 'Extracting toolchain');
      throw new ToolchainError(`Failed to extract toolchain: ${err.message}`);
    }
    info(`Embedded Rust toolchain ready in ${this.toolchainDir}`);
    return true;
  }

  private markExecutable(compiler: string): void {
    if (this.platform === 'win32' || !existsSync(compiler)) {
      return;
    }
    chmodSync(compiler, EXECUTABLE_MODE);
  }

  // Another process may have finished first; its complete copy wins
  private promote(staging: string): void {
    mkdirSync(path.dirname(this.toolchainDir), { recursive: true });
    try {
      renameSync(staging, this.toolchainDir);
    } catch (e: unknown) {
      if (!this.isValid()) {
        throw e;
      }
      rmSync(staging, { recursive: true, force: true });
    }
  }
}
