import { existsSync, mkdirSync, readdirSync, renameSync, rmSync, statSync, writeFileSync } from 'fs';
import { randomBytes } from 'crypto';
import * as path from 'path';
import type { CachePaths, CacheStats } from './types';
import { hashSource, isCacheKey } from './content-hasher';
import { BINARIES_DIRNAME, SOURCES_DIRNAME, SOURCE_EXTENSION } from '../config/constants';
import { toIoError } from '../errors/index';

const KB = 1024;
const MB = 1024 * KB;
const GB = 1024 * MB;

/**
 * Human-scaled byte count: "512 B", "1.50 KB", "2.00 MB".
 */
export function formatSize(bytes: number): string {
    if (bytes >= GB) return `${(bytes / GB).toFixed(2)} GB`;
    if (bytes >= MB) return `${(bytes / MB).toFixed(2)} MB`;
    if (bytes >= KB) return `${(bytes / KB).toFixed(2)} KB`;
    return `${bytes} B`;
}

// Dot-prefixed names are in-flight writes, never cache entries
function tempName(key: string, suffix: string): string {
    return `.${key}.${process.pid}.${randomBytes(4).toString('hex')}.${suffix}`;
}

/**
 * Content-addressed store for generated sources and compiled binaries.
 *
 * Layout under the root: sources/<key>.rs and binaries/<key>. Entries are never
 * mutated once written. Every write lands under a temporary name and is renamed
 * into place, so a concurrent reader sees either no file or a complete one.
 */
export class CacheStore {
    private readonly paths: CachePaths;

    constructor(root: string) {
        this.paths = {
            root,
            sourcesDir: path.join(root, SOURCES_DIRNAME),
            binariesDir: path.join(root, BINARIES_DIRNAME),
        };
        this.ensureDirs();
    }

    get root(): string {
        return this.paths.root;
    }

    private ensureDirs(): void {
        try {
            mkdirSync(this.paths.sourcesDir, { recursive: true });
            mkdirSync(this.paths.binariesDir, { recursive: true });
        } catch (e: unknown) {
            throw toIoError(e, `Creating cache directory ${this.paths.root}`);
        }
    }

    hashSource(source: string): string {
        return hashSource(source);
    }

    /**
     * Existing binary for a key, or undefined. Existence check only.
     */
    lookup(key: string): string | undefined {
        const binary = this.binaryPath(key);
        return existsSync(binary) ? binary : undefined;
    }

    sourcePath(key: string): string {
        return path.join(this.paths.sourcesDir, `${key}${SOURCE_EXTENSION}`);
    }

    /**
     * Where the binary for a key lives. Does not imply it exists.
     */
    binaryPath(key: string): string {
        return path.join(this.paths.binariesDir, key);
    }

    storeSource(key: string, source: string): string {
        const target = this.sourcePath(key);
        const staged = path.join(this.paths.sourcesDir, tempName(key, 'tmp'));
        try {
            mkdirSync(this.paths.sourcesDir, { recursive: true });
            writeFileSync(staged, source, 'utf-8');
            renameSync(staged, target);
        } catch (e: unknown) {
            rmSync(staged, { force: true });
            throw toIoError(e, `Writing cached source ${target}`);
        }
        return target;
    }

    /**
     * Unique temporary output path for a compiler run producing this key.
     */
    stagingPath(key: string): string {
        mkdirSync(this.paths.binariesDir, { recursive: true });
        return path.join(this.paths.binariesDir, tempName(key, 'partial'));
    }

    /**
     * Move a successfully linked binary into its final slot.
     */
    commitBinary(key: string, stagedPath: string): string {
        const target = this.binaryPath(key);
        try {
            renameSync(stagedPath, target);
        } catch (e: unknown) {
            throw toIoError(e, `Storing cached binary ${target}`);
        }
        return target;
    }

    discardStaged(stagedPath: string): void {
        rmSync(stagedPath, { force: true });
    }

    /**
     * Remove every cached source and binary. Safe on an empty or half-missing cache.
     */
    clear(): void {
        try {
            for (const dir of [this.paths.binariesDir, this.paths.sourcesDir]) {
                rmSync(dir, { recursive: true, force: true });
                mkdirSync(dir, { recursive: true });
            }
        } catch (e: unknown) {
            throw toIoError(e, 'Clearing cache');
        }
    }

    stats(): CacheStats {
        const stats: CacheStats = { binaryCount: 0, totalBytes: 0 };
        if (!existsSync(this.paths.binariesDir)) {
            return stats;
        }
        try {
            for (const entry of readdirSync(this.paths.binariesDir, { withFileTypes: true })) {
                // In-flight staging files are dot-prefixed and never match a key
                if (!entry.isFile() || !isCacheKey(entry.name)) continue;
                stats.binaryCount += 1;
                stats.totalBytes += statSync(path.join(this.paths.binariesDir, entry.name)).size;
            }
        } catch (e: unknown) {
            throw toIoError(e, 'Reading cache statistics');
        }
        return stats;
    }
}
