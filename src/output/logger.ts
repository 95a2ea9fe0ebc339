/**
 * Logger utility for faqforge
 *
 * Console output functions shared by the pipeline and the providers. Silent
 * mode mutes everything except errors so a caller embedding the library can
 * keep stdout clean; verbose mode enables debug() output.
 */

const PREFIX = '[faqforge]';

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

/**
 * Enable or disable debug output.
 */
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
 * Log a prefixed diagnostic line, only in verbose mode.
 */
export function debug(...args: unknown[]): void {
    if (verboseMode && !silentMode) {
        console.log(PREFIX, ...args);
    }
}

/**
 * Log warning to stderr. Silenced in silent mode.
 */
export function warn(...args: unknown[]): void {
    if (!silentMode) {
        console.warn(PREFIX, ...args);
    }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
    console.error(PREFIX, ...args);
}
