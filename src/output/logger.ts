/**
 * Logger utility for lintmux
 *
 * Machine-readable output formats (json, rdjson) write ONLY the structured
 * payload to stdout, so warn() can be silenced. Debug output is
 * opt-in through verbose mode.
 */

let silentMode = false;
let verboseMode = false;

/**
 * Enable or disable silent mode.
 * When enabled, log(), warn() and debug() output nothing.
 * error() always outputs to stderr.
 */
export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

export function setVerboseMode(verbose: boolean): void {
    verboseMode = verbose;
}

/**
 * Log to stdout. Silenced in silent mode.
 */
export function log(...args: unknown[]): void {
    if (!silentMode) {
        console.log(...args);
    }
}

/**
 * Log warning to stderr. Silenced in silent mode.
 */
export function warn(...args: unknown[]): void {
    if (!silentMode) {
        console.warn(...args);
    }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
    console.error(...args);
}

/**
 * Verbose diagnostics to stderr, prefixed with [lintmux].
 */
export function debug(...args: unknown[]): void {
    if (verboseMode && !silentMode) {
        console.error('[lintmux]', ...args);
    }
}
