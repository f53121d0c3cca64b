import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import stripAnsi from 'strip-ansi';
import { CacheStore } from '../src/cache/cache-store';
import { buildCompilerArgs, RustCompiler } from '../src/compiler/rust-compiler';
import { CompilationError, IoError } from '../src/errors/index';
import { ToolchainKind, type ToolchainHandle } from '../src/toolchain/types';
import { FakeRunner, enoent, output } from './utils';

const SYSTEM: ToolchainHandle = { kind: ToolchainKind.System, compilerPath: 'rustc' };
const system = (): Promise<ToolchainHandle> => Promise.resolve(SYSTEM);

// Writes the requested output file, like a successful rustc run
function linkingRunner(): FakeRunner {
  return new FakeRunner((_command, args) => {
    const out = args[args.indexOf('-o') + 1];
    if (out) writeFileSync(out, 'compiled');
    return output(0);
  });
}

describe('Rust Compiler', () => {
  describe('buildCompilerArgs', () => {
    it('builds an optimized binary without extras', () => {
      expect(buildCompilerArgs('/c/sources/k.rs', '/c/binaries/k', undefined, undefined)).toEqual([
        '--edition=2021',
        '-C',
        'opt-level=3',
        '--crate-type',
        'bin',
        '-o',
        '/c/binaries/k',
        '/c/sources/k.rs',
      ]);
    });

    it('links the support libraries and overrides the sysroot', () => {
      const artifacts = {
        root: '/w/target/debug',
        dependencyDir: '/w/target/debug/deps',
        prelude: '/w/target/debug/librpipe_prelude.rlib',
        core: '/w/target/debug/librpipe_core.rlib',
      };

      expect(buildCompilerArgs('in.rs', 'out', artifacts, '/tc')).toEqual([
        '--edition=2021',
        '-C',
        'opt-level=3',
        '--crate-type',
        'bin',
        '-o',
        'out',
        'in.rs',
        '--extern',
        'rpipe_prelude=/w/target/debug/librpipe_prelude.rlib',
        '--extern',
        'rpipe_core=/w/target/debug/librpipe_core.rlib',
        '-L',
        'dependency=/w/target/debug/deps',
        '--sysroot',
        '/tc',
      ]);
    });
  });

  describe('compileAndCache', () => {
    let root: string;
    let cache: CacheStore;

    beforeEach(() => {
      root = mkdtempSync(path.join(tmpdir(), 'rpipe-compiler-'));
      cache = new CacheStore(path.join(root, 'cache'));
    });

    afterEach(() => {
      rmSync(root, { recursive: true, force: true });
    });

    it('compiles on a miss and stores source and binary under the hash', async () => {
      const runner = linkingRunner();
      const compiler = new RustCompiler({ toolchain: system, runner });
      const key = cache.hashSource('fn main() {}\n');

      const result = await compiler.compileAndCache('fn main() {}\n', cache);

      expect(result).toEqual({ binaryPath: cache.binaryPath(key), cacheHit: false });
      expect(readFileSync(result.binaryPath, 'utf-8')).toBe('compiled');
      expect(readFileSync(cache.sourcePath(key), 'utf-8')).toBe('fn main() {}\n');
      expect(runner.calls).toHaveLength(1);
      expect(runner.calls[0]?.command).toBe('rustc');
      expect(runner.calls[0]?.args.at(-1)).toBe(cache.sourcePath(key));
    });

    it('reuses the binary on a hit without invoking the compiler', async () => {
      const runner = linkingRunner();
      const compiler = new RustCompiler({ toolchain: system, runner });
      const first = await compiler.compileAndCache('fn main() {}\n', cache);

      const second = await compiler.compileAndCache('fn main() {}\n', cache);

      expect(second).toEqual({ binaryPath: first.binaryPath, cacheHit: true });
      expect(runner.calls).toHaveLength(1);
    });

    it('keeps one binary per distinct source', async () => {
      const runner = linkingRunner();
      const compiler = new RustCompiler({ toolchain: system, runner });

      const first = await compiler.compileAndCache('fn main() { println!("a"); }\n', cache);
      const second = await compiler.compileAndCache('fn main() { println!("b"); }\n', cache);

      expect(first.binaryPath).not.toBe(second.binaryPath);
      expect(existsSync(first.binaryPath)).toBe(true);
      expect(existsSync(second.binaryPath)).toBe(true);
      expect(cache.stats().binaryCount).toBe(2);
    });

    it('resolves the toolchain once, and only when compiling', async () => {
      let resolutions = 0;
      const toolchain = (): Promise<ToolchainHandle> => {
        resolutions += 1;
        return Promise.resolve(SYSTEM);
      };
      const compiler = new RustCompiler({ toolchain, runner: linkingRunner() });

      await compiler.compileAndCache('fn main() {}\n', cache);
      await compiler.compileAndCache('fn main() {}\n', cache);
      expect(resolutions).toBe(1);

      await compiler.compileAndCache('fn main() { let _ = 1; }\n', cache);
      expect(resolutions).toBe(1);
    });

    it('passes the embedded sysroot to the compiler', async () => {
      const runner = linkingRunner();
      const toolchain: ToolchainHandle = {
        kind: ToolchainKind.Embedded,
        compilerPath: '/tc/bin/rustc',
        sysroot: '/tc',
      };

      await new RustCompiler({ toolchain: () => Promise.resolve(toolchain), runner }).compileAndCache('fn main() {}\n', cache);

      expect(runner.calls[0]?.command).toBe('/tc/bin/rustc');
      expect(runner.calls[0]?.args.slice(-2)).toEqual(['--sysroot', '/tc']);
    });

    it('links libraries found in the candidate roots', async () => {
      const buildRoot = path.join(root, 'target', 'release');
      mkdirSync(buildRoot, { recursive: true });
      writeFileSync(path.join(buildRoot, 'librpipe_prelude.rlib'), '');
      writeFileSync(path.join(buildRoot, 'librpipe_core.rlib'), '');
      const runner = linkingRunner();
      const compiler = new RustCompiler({
        toolchain: system,
        runner,
        artifactRoots: () => [path.join(root, 'missing'), buildRoot],
      });

      await compiler.compileAndCache('fn main() {}\n', cache);

      const args = runner.calls[0]?.args ?? [];
      expect(args.slice(8)).toEqual([
        '--extern',
        `rpipe_prelude=${path.join(buildRoot, 'librpipe_prelude.rlib')}`,
        '--extern',
        `rpipe_core=${path.join(buildRoot, 'librpipe_core.rlib')}`,
        '-L',
        `dependency=${path.join(buildRoot, 'deps')}`,
      ]);
    });

    it('translates compiler errors and caches nothing', async () => {
      const runner = new FakeRunner((_command, args) => {
        const out = args[args.indexOf('-o') + 1];
        if (out) writeFileSync(out, 'half-written');
        return output(1, 'error[E0425]: cannot find function `frobnicate` in this scope');
      });
      const compiler = new RustCompiler({ toolchain: system, runner });

      const attempt = compiler.compileAndCache('fn main() { frobnicate(); }\n', cache, '_.frobnicate()');

      await expect(attempt).rejects.toBeInstanceOf(CompilationError);
      const message = await attempt.catch((e: unknown) => (e instanceof Error ? stripAnsi(e.message) : ''));
      expect(message).toContain('  Your expression: _.frobnicate()');
      expect(message).toContain('  Problem: Unknown function or method');
      expect(readdirSync(path.join(cache.root, 'binaries'))).toEqual([]);
      expect(cache.stats().binaryCount).toBe(0);
    });

    it('reports a compiler that cannot be started as an IO error', async () => {
      const runner = new FakeRunner(() => {
        throw enoent('rustc');
      });
      const compiler = new RustCompiler({ toolchain: system, runner });

      const attempt = compiler.compileAndCache('fn main() {}\n', cache);

      await expect(attempt).rejects.toBeInstanceOf(IoError);
      await expect(attempt).rejects.toThrow('Failed to run rustc: spawn rustc ENOENT');
      expect(existsSync(cache.binaryPath(cache.hashSource('fn main() {}\n')))).toBe(false);
    });
  });
});
