import pc from "picocolors";
import { loggers } from "../observability";

let verboseMode = false;

/**
 * Toggle `[DEBUG]` lines on the console (`--verbose`)
 */
export function setVerbose(verbose: boolean): void {
	verboseMode = verbose;
}

/**
 * Print a runner failure and record it in the structured log
 */
export function logError(...args: unknown[]): void {
	console.error(pc.red("[ERROR]"), ...args);
	loggers.cli.error({ args }, args.join(" "));
}

/**
 * Print a status line with `--verbose`; always recorded at debug level
 */
export function logDebug(...args: unknown[]): void {
	// stdout carries Tailwind's output, so status goes to stderr
	if (verboseMode) {
		console.error(pc.dim("[DEBUG]"), ...args);
	}
	loggers.cli.debug({ args }, args.join(" "));
}

/**
 * Build time as "850ms", "2.4s" or "1m 5s"
 */
export function formatDuration(ms: number): string {
	if (ms < 1000) return `${Math.round(ms)}ms`;
	const seconds = ms / 1000;
	if (seconds < 60) return `${seconds.toFixed(1)}s`;
	return `${Math.floor(seconds / 60)}m ${Math.floor(seconds % 60)}s`;
}
