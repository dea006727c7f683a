/**
 * Error classes for Tailwind CLI invocation
 *
 * Every failure of an invocation is reported as one of these, each with a
 * literal `kind` so callers can switch on it.
 *
 * @module execution/errors
 */

import type { HostInfo, PlatformId } from "../platform/types";
import type { TailwindCliOutput } from "./types";

export type TailwindCliErrorKind =
	| "unsupported-platform"
	| "missing-binary"
	| "temp-file-io"
	| "spawn-failed"
	| "tool-failed"
	| "cleanup-failed";

/**
 * Base class for all invocation errors
 */
export abstract class TailwindCliError extends Error {
	abstract readonly kind: TailwindCliErrorKind;
	/** The operation that was being performed */
	public readonly operation: string;
	/** The file path involved (if applicable) */
	public readonly filePath?: string;
	/** Additional context for debugging */
	public readonly context?: Record<string, unknown>;

	constructor(
		message: string,
		options: {
			operation: string;
			filePath?: string;
			context?: Record<string, unknown>;
			cause?: unknown;
		},
	) {
		super(message, { cause: options.cause });
		this.name = "TailwindCliError";
		this.operation = options.operation;
		this.filePath = options.filePath;
		this.context = options.context;
	}

	/**
	 * Get a formatted error message with context
	 */
	toDetailedString(): string {
		const parts = [this.message];
		if (this.filePath) {
			parts.push(`  File: ${this.filePath}`);
		}
		parts.push(`  Operation: ${this.operation}`);
		if (this.context) {
			parts.push(`  Context: ${JSON.stringify(this.context)}`);
		}
		if (this.cause) {
			parts.push(`  Cause: ${this.cause}`);
		}
		return parts.join("\n");
	}
}

/**
 * No vendored binary exists for the host's OS/architecture pair.
 * Raised before any file or process is touched.
 */
export class UnsupportedPlatformError extends TailwindCliError {
	readonly kind = "unsupported-platform";
	public readonly host: HostInfo;

	constructor(host: HostInfo, message: string) {
		super(message, { operation: "resolve-platform", context: { os: host.os, arch: host.arch } });
		this.name = "UnsupportedPlatformError";
		this.host = host;
	}
}

/**
 * The vendored binary for a supported platform could not be read.
 * Indicates a broken package rather than a bad host.
 */
export class MissingBinaryError extends TailwindCliError {
	readonly kind = "missing-binary";
	public readonly platform: PlatformId;

	constructor(platform: PlatformId, filePath?: string, cause?: unknown) {
		super(`Vendored Tailwind CLI binary for ${platform} is missing`, {
			operation: "load-binary",
			filePath,
			cause,
		});
		this.name = "MissingBinaryError";
		this.platform = platform;
	}
}

export type TempFileStage = "create" | "write" | "flush" | "permissions" | "close";

/**
 * Writing the executable to its temporary file failed
 */
export class TempFileError extends TailwindCliError {
	readonly kind = "temp-file-io";
	public readonly stage: TempFileStage;

	constructor(stage: TempFileStage, filePath: string, cause: unknown) {
		super(`Couldn't save Tailwind CLI executable to temporary file (${stage})`, {
			operation: "materialize",
			filePath,
			context: { stage },
			cause,
		});
		this.name = "TempFileError";
		this.stage = stage;
	}
}

/**
 * The operating system could not start the executable
 */
export class SpawnError extends TailwindCliError {
	readonly kind = "spawn-failed";
	/** errno code reported by Node, e.g. "ENOENT" */
	public readonly code?: string;

	constructor(executablePath: string, cause: unknown, code?: string) {
		super(`Couldn't invoke Tailwind CLI${code ? ` (${code})` : ""}`, {
			operation: "spawn",
			filePath: executablePath,
			cause,
		});
		this.name = "SpawnError";
		this.code = code;
	}
}

/**
 * Tailwind started but exited non-zero or was killed by a signal.
 * Usually caused by the caller's arguments or input files, not by the runner.
 */
export class ToolFailedError extends TailwindCliError {
	readonly kind = "tool-failed";
	public readonly stdout: string;
	public readonly stderr: string;
	public readonly exitCode: number | null;
	public readonly signal: NodeJS.Signals | null;

	constructor(output: TailwindCliOutput, exitCode: number | null, signal: NodeJS.Signals | null) {
		super(
			signal
				? `Tailwind CLI was terminated by ${signal}`
				: `Tailwind CLI exited with code ${exitCode}`,
			{ operation: "invoke", context: { exitCode, signal } },
		);
		this.name = "ToolFailedError";
		this.stdout = output.stdout;
		this.stderr = output.stderr;
		this.exitCode = exitCode;
		this.signal = signal;
	}

	override toDetailedString(): string {
		return [
			this.message,
			"",
			"stdout:",
			this.stdout,
			"",
			"stderr:",
			this.stderr,
		].join("\n");
	}
}

/**
 * Result of running an executable that was successfully materialized
 */
export type InvocationOutcome =
	| { ok: true; output: TailwindCliOutput }
	| { ok: false; error: SpawnError | ToolFailedError };

/**
 * The temporary executable could not be deleted.
 * `outcome` still holds what the invocation produced.
 */
export class CleanupError extends TailwindCliError {
	readonly kind = "cleanup-failed";
	public readonly outcome: InvocationOutcome;

	constructor(filePath: string, cause: unknown, outcome: InvocationOutcome) {
		super("Couldn't delete Tailwind CLI executable temporary file", {
			operation: "cleanup",
			filePath,
			cause,
		});
		this.name = "CleanupError";
		this.outcome = outcome;
	}
}

export type RunError =
	| UnsupportedPlatformError
	| MissingBinaryError
	| TempFileError
	| SpawnError
	| ToolFailedError
	| CleanupError;
