import { existsSync, readdirSync, statSync } from 'fs';
import * as path from 'path';
import { CORE_CRATE, PRELUDE_CRATE } from '../config/constants';

/**
 * Where the support crates were found: one rlib per crate plus the root whose
 * deps/ directory holds their transitive dependencies.
 */
export interface LibraryArtifacts {
  root: string;
  dependencyDir: string;
  prelude: string;
  core: string;
}

export interface ArtifactSearchContext {
  /** Manifest directory marker (CARGO_MANIFEST_DIR) */
  manifestDir?: string | undefined;
  /** Directory of the running executable */
  executableDir?: string | undefined;
  cwd: string;
}

const BUILD_PROFILES = ['debug', 'release'] as const;
const DEPS_DIRNAME = 'deps';

function libraryFileName(crate: string): string {
  return `lib${crate}.rlib`;
}

function* ancestors(start: string): Generator<string> {
  let current = path.resolve(start);
  while (true) {
    yield current;
    const parent = path.dirname(current);
    if (parent === current) return;
    current = parent;
  }
}

function* profileDirs(base: string): Generator<string> {
  for (const profile of BUILD_PROFILES) {
    yield path.join(base, 'target', profile);
  }
}

function* manifestRoots(manifestDir: string | undefined): Generator<string> {
  if (!manifestDir) return;
  for (const dir of ancestors(manifestDir)) {
    yield* profileDirs(dir);
  }
}

function* executableRoots(executableDir: string | undefined): Generator<string> {
  if (!executableDir) return;
  const parent = path.dirname(executableDir);
  // Per-test binaries live one level down, in <profile>/deps
  if (path.basename(executableDir) === DEPS_DIRNAME) {
    yield parent;
  }
  for (const profile of BUILD_PROFILES) {
    yield path.join(parent, profile);
  }
  yield executableDir;
}

function* cwdRoots(cwd: string): Generator<string> {
  yield* profileDirs(cwd);
  for (const dir of ancestors(cwd)) {
    yield* profileDirs(dir);
  }
}

/**
 * Candidate build-output roots in priority order, de-duplicated and produced lazily:
 * manifest dir and its ancestors, the executable's location, the working directory,
 * then every ancestor of the working directory.
 */
export function* candidateRoots(context: ArtifactSearchContext): Generator<string> {
  const seen = new Set<string>();
  const sources = [
    manifestRoots(context.manifestDir),
    executableRoots(context.executableDir),
    cwdRoots(context.cwd),
  ];
  for (const source of sources) {
    for (const root of source) {
      const resolved = path.resolve(root);
      if (seen.has(resolved)) continue;
      seen.add(resolved);
      yield resolved;
    }
  }
}

/**
 * Newest `lib<crate>-<hash>.rlib` in a deps directory, as left by test builds.
 */
export function findHashedLibrary(depsDir: string, crate: string): string | undefined {
  if (!existsSync(depsDir)) return undefined;

  const prefix = `lib${crate}-`;
  let newest: { file: string; mtime: number } | undefined;
  try {
    for (const entry of readdirSync(depsDir, { withFileTypes: true })) {
      if (!entry.isFile() || !entry.name.startsWith(prefix) || !entry.name.endsWith('.rlib')) continue;
      const file = path.join(depsDir, entry.name);
      const mtime = statSync(file).mtimeMs;
      if (!newest || mtime > newest.mtime) {
        newest = { file, mtime };
      }
    }
  } catch {
    // unreadable directory: not a candidate
    return undefined;
  }
  return newest?.file;
}

/**
 * Both support libraries under one root, direct build outputs first, hashed test
 * outputs second.
 */
export function checkRoot(root: string): LibraryArtifacts | undefined {
  const dependencyDir = path.join(root, DEPS_DIRNAME);

  const directPrelude = path.join(root, libraryFileName(PRELUDE_CRATE));
  const directCore = path.join(root, libraryFileName(CORE_CRATE));
  if (existsSync(directPrelude) && existsSync(directCore)) {
    return { root, dependencyDir, prelude: directPrelude, core: directCore };
  }

  const hashedPrelude = findHashedLibrary(dependencyDir, PRELUDE_CRATE);
  const hashedCore = findHashedLibrary(dependencyDir, CORE_CRATE);
  if (hashedPrelude && hashedCore) {
    return { root, dependencyDir, prelude: hashedPrelude, core: hashedCore };
  }

  return undefined;
}

/**
 * First candidate root that satisfies both libraries wins.
 */
export function locateArtifacts(roots: Iterable<string>): LibraryArtifacts | undefined {
  for (const root of roots) {
    const found = checkRoot(root);
    if (found) return found;
  }
  return undefined;
}
