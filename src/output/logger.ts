/**
 * Logger utility for rpipe
 *
 * Standard output belongs to the compiled program (and to explicit command
 * output such as --show-source), so every log line goes to stderr.
 */

const PREFIX = '[rpipe]';

let verboseMode = false;

/**
 * Enable or disable verbose mode. debug() is a no-op unless verbose.
 */
export function setVerboseMode(verbose: boolean): void {
    verboseMode = verbose;
}

export function isVerboseMode(): boolean {
    return verboseMode;
}

/**
 * Progress message to stderr.
 */
export function info(...args: unknown[]): void {
    console.error(...args);
}

/**
 * Log warning to stderr.
 */
export function warn(...args: unknown[]): void {
    console.warn(PREFIX, ...args);
}

/**
 * Verbose-only diagnostics.
 */
export function debug(...args: unknown[]): void {
    if (verboseMode) {
        console.error(PREFIX, ...args);
    }
}

/**
 * Log error to stderr. Always written, whatever the verbosity.
 */
export function error(...args: unknown[]): void {
    console.error(...args);
}
