/**
 * Outcome of compiling (or reusing) the binary for one generated source.
 */
export interface CompileResult {
    binaryPath: string;
    cacheHit: boolean;
}

export interface CacheStats {
    binaryCount: number;
    totalBytes: number;
}

export interface CachePaths {
    root: string;
    sourcesDir: string;
    binariesDir: string;
}
