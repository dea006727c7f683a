/**
 * @fileoverview Execution Types
 *
 * @module execution/types
 */

import type { PlatformId } from "../platform/types";

/**
 * Output of a successful Tailwind CLI run. Both streams are decoded as UTF-8
 * and trimmed of leading and trailing whitespace.
 */
export interface TailwindCliOutput {
	readonly stdout: string;
	readonly stderr: string;
}

/**
 * What a process produced before any decoding
 */
export interface RawProcessOutcome {
	/** Exit code, or null when the process was killed by a signal */
	exitCode: number | null;
	signal: NodeJS.Signals | null;
	stdout: Buffer;
	stderr: Buffer;
}

/**
 * Options passed to the spawned process
 */
export interface InvokeOptions {
	/** Working directory for the child */
	cwd: string;
	/** Complete environment for the child */
	env: NodeJS.ProcessEnv;
}

/**
 * Input to executable materialization
 */
export interface MaterializeRequest {
	bytes: Uint8Array;
	platform: PlatformId;
	/** Package version, embedded in the file name */
	version: string;
	/** Directory the temporary file is created in */
	directory: string;
}
