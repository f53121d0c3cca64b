import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { loadConfig, platformCacheDir, resolveCacheRoot } from '../src/boundaries/config-loader';
import { parseEnvironment } from '../src/boundaries/env-parser';
import { CacheError } from '../src/errors/index';

const LINUX = { platform: 'linux' as const, homedir: '/home/dev' };
const MAC = { platform: 'darwin' as const, homedir: '/Users/dev' };
const WINDOWS = { platform: 'win32' as const, homedir: '/users/dev' };

describe('Config Loader', () => {
  describe('platformCacheDir', () => {
    it('uses XDG_CACHE_HOME on Linux when it is absolute', () => {
      expect(platformCacheDir(parseEnvironment({ XDG_CACHE_HOME: '/xdg' }), LINUX)).toBe('/xdg');
    });

    it('ignores a relative XDG_CACHE_HOME', () => {
      expect(platformCacheDir(parseEnvironment({ XDG_CACHE_HOME: 'cache' }), LINUX)).toBe('/home/dev/.cache');
    });

    it('uses ~/Library/Caches on macOS', () => {
      expect(platformCacheDir(parseEnvironment({}), MAC)).toBe('/Users/dev/Library/Caches');
    });

    it('uses LOCALAPPDATA on Windows', () => {
      expect(platformCacheDir(parseEnvironment({ LOCALAPPDATA: '/appdata' }), WINDOWS)).toBe('/appdata');
      expect(platformCacheDir(parseEnvironment({}), WINDOWS)).toBeUndefined();
    });
  });

  describe('resolveCacheRoot', () => {
    it('namespaces the platform directory', () => {
      expect(resolveCacheRoot(parseEnvironment({}), LINUX)).toBe('/home/dev/.cache/rpipe');
    });

    it('uses RPIPE_CACHE_DIR verbatim', () => {
      expect(resolveCacheRoot(parseEnvironment({ RPIPE_CACHE_DIR: '/tmp/custom' }), LINUX)).toBe('/tmp/custom');
    });

    it('fails when no cache directory can be determined', () => {
      const env = parseEnvironment({});
      expect(() => resolveCacheRoot(env, WINDOWS)).toThrow(CacheError);
      expect(() => resolveCacheRoot(env, { platform: 'linux', homedir: '' })).toThrow('No cache directory found');
    });
  });

  describe('loadConfig', () => {
    it('derives every location from the cache root', () => {
      const config = loadConfig(parseEnvironment({ XDG_CACHE_HOME: '/xdg' }), LINUX);

      expect(config.cacheRoot).toBe('/xdg/rpipe');
      expect(config.toolchainDir).toBe('/xdg/rpipe/toolchain');
      expect(config.systemCompiler).toBe('rustc');
      expect(config.toolchainArchive.endsWith(path.join('assets', 'toolchain.tar.gz'))).toBe(true);
      expect('manifestDir' in config).toBe(false);
    });

    it('applies overrides', () => {
      const config = loadConfig(
        parseEnvironment({
          RPIPE_CACHE_DIR: '/c',
          RPIPE_RUSTC: '/opt/rustc',
          RPIPE_TOOLCHAIN_ARCHIVE: '/dist/toolchain.tar.gz',
          CARGO_MANIFEST_DIR: '/work/crate',
        }),
        LINUX
      );

      expect(config).toEqual({
        cacheRoot: '/c',
        toolchainDir: '/c/toolchain',
        toolchainArchive: '/dist/toolchain.tar.gz',
        systemCompiler: '/opt/rustc',
        manifestDir: '/work/crate',
      });
    });
  });
});
