import * as os from 'os';
import * as path from 'path';
import { CONFIG_SCHEMA, type RpipeConfig } from '../schemas/config-schemas';
import type { EnvConfig } from '../schemas/env-schemas';
import { CacheError, ValidationError } from '../errors/index';
import {
  APP_NAME,
  TOOLCHAIN_ARCHIVE_FILENAME,
  TOOLCHAIN_DIRNAME,
} from '../config/constants';

export interface PlatformInfo {
  platform: NodeJS.Platform;
  homedir: string;
}

const DEFAULT_ARCHIVE_PATH = path.resolve(__dirname, '..', '..', 'assets', TOOLCHAIN_ARCHIVE_FILENAME);

function currentPlatform(): PlatformInfo {
  return { platform: process.platform, homedir: os.homedir() };
}

/**
 * Platform-standard per-user cache directory, before the app namespace is added.
 * Returns undefined when the host offers none.
 */
export function platformCacheDir(env: EnvConfig, host: PlatformInfo = currentPlatform()): string | undefined {
  switch (host.platform) {
    case 'win32':
      return env.LOCALAPPDATA;
    case 'darwin':
      return host.homedir ? path.join(host.homedir, 'Library', 'Caches') : undefined;
    default:
      if (env.XDG_CACHE_HOME && path.isAbsolute(env.XDG_CACHE_HOME)) {
        return env.XDG_CACHE_HOME;
      }
      return host.homedir ? path.join(host.homedir, '.cache') : undefined;
  }
}

export function resolveCacheRoot(env: EnvConfig, host: PlatformInfo = currentPlatform()): string {
  if (env.RPIPE_CACHE_DIR) {
    return path.resolve(env.RPIPE_CACHE_DIR);
  }
  const base = platformCacheDir(env, host);
  if (!base) {
    throw new CacheError('No cache directory found');
  }
  return path.join(base, APP_NAME);
}

/**
 * Build the explicit configuration value from validated environment variables.
 */
export function loadConfig(env: EnvConfig, host: PlatformInfo = currentPlatform()): RpipeConfig {
  const cacheRoot = resolveCacheRoot(env, host);
  const config = {
    cacheRoot,
    toolchainDir: path.join(cacheRoot, TOOLCHAIN_DIRNAME),
    toolchainArchive: env.RPIPE_TOOLCHAIN_ARCHIVE
      ? path.resolve(env.RPIPE_TOOLCHAIN_ARCHIVE)
      : DEFAULT_ARCHIVE_PATH,
    systemCompiler: env.RPIPE_RUSTC,
    ...(env.CARGO_MANIFEST_DIR ? { manifestDir: path.resolve(env.CARGO_MANIFEST_DIR) } : {}),
  };
  const result = CONFIG_SCHEMA.safeParse(config);
  if (!result.success) {
    throw new ValidationError(`Invalid configuration: ${result.error.message}`);
  }
  return result.data;
}
