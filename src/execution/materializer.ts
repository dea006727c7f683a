/**
 * @fileoverview Executable Materializer
 *
 * Writes a vendored binary to a uniquely named temporary file and marks it
 * executable. The returned handle owns the file: it is deleted exactly once,
 * through {@link MaterializedExecutable.dispose}.
 *
 * @module execution/materializer
 */

import { randomUUID } from "node:crypto";
import { closeSync, fchmodSync, fsyncSync, mkdirSync, openSync, rmSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { loggers } from "../observability";
import { isWindowsPlatform } from "../platform/resolver";
import type { PlatformId } from "../platform/types";
import { CleanupError, type InvocationOutcome, TempFileError, type TempFileStage } from "./errors";
import type { MaterializeRequest, TailwindCliOutput } from "./types";

/**
 * Prefix of every temporary executable's file name
 */
export const TEMP_FILE_PREFIX = "tailwindcss";

const TEMP_FILE_PATTERN = new RegExp(
	`^${TEMP_FILE_PREFIX}-[a-z0-9]+-[a-z0-9]+-v[^/\\\\]+-[0-9a-f]{8}(?:-[0-9a-f]{4}){3}-[0-9a-f]{12}(?:\\.exe)?$`,
);

/** 0755: owner read/write/execute, group and others read/execute */
const EXECUTABLE_MODE = 0o755;

/**
 * Build the file name for a temporary executable,
 * e.g. `tailwindcss-linux-x64-v3.4.1-0-<uuid>`
 */
export function temporaryFileName(platform: PlatformId, version: string, token: string): string {
	const extension = isWindowsPlatform(platform) ? ".exe" : "";
	return `${TEMP_FILE_PREFIX}-${platform}-v${version}-${token}${extension}`;
}

/**
 * Whether a file name follows the temporary executable naming convention
 */
export function isTemporaryExecutableName(name: string): boolean {
	return TEMP_FILE_PATTERN.test(name);
}

export type DisposeResult = { ok: true } | { ok: false; cause: unknown };

/**
 * A temporary executable owned by the invocation that created it
 */
export class MaterializedExecutable {
	private disposed = false;

	constructor(
		public readonly path: string,
		public readonly platform: PlatformId,
	) {}

	get isDisposed(): boolean {
		return this.disposed;
	}

	/**
	 * Delete the file. Only the first call touches the filesystem.
	 */
	dispose(): DisposeResult {
		if (this.disposed) {
			return { ok: true };
		}
		this.disposed = true;

		try {
			rmSync(this.path, { force: true });
			loggers.materializer.debug({ path: this.path }, "Deleted temporary executable");
			return { ok: true };
		} catch (error) {
			loggers.materializer.warn({ path: this.path, err: error }, "Couldn't delete temporary executable");
			return { ok: false, cause: error };
		}
	}
}

export type MaterializeResult =
	| { ok: true; executable: MaterializedExecutable }
	| { ok: false; error: TempFileError };

/**
 * Write the binary to a new temporary file and make it executable.
 *
 * The file is created exclusively with mode 0600 and only switched to 0755
 * after its contents are flushed, so a half-written file is never executable.
 * On failure the partial file is removed.
 */
export function materializeExecutable(request: MaterializeRequest): MaterializeResult {
	const { bytes, platform, version } = request;
	// The child runs in another cwd and a bare name would go through PATH, so the path is absolute
	const directory = resolve(request.directory);
	// A UUID per call keeps concurrent invocations from colliding
	const path = resolve(directory, temporaryFileName(platform, version, randomUUID()));

	let stage: TempFileStage = "create";
	let fd: number | undefined;
	try {
		mkdirSync(directory, { recursive: true });
		fd = openSync(path, "wx", 0o600);
		loggers.materializer.debug({ path }, "Created temporary file");

		stage = "write";
		writeFileSync(fd, bytes);

		stage = "flush";
		fsyncSync(fd);

		// Windows decides executability by extension
		if (!isWindowsPlatform(platform)) {
			stage = "permissions";
			fchmodSync(fd, EXECUTABLE_MODE);
		}

		stage = "close";
		const openFd = fd;
		fd = undefined;
		closeSync(openFd);
	} catch (error) {
		if (fd !== undefined) {
			closeQuietly(fd, path);
		}
		if (stage !== "create" || fd !== undefined) {
			removeQuietly(path);
		}
		loggers.materializer.error({ path, stage, err: error }, "Couldn't materialize executable");
		return { ok: false, error: new TempFileError(stage, path, error) };
	}

	loggers.materializer.debug({ path, bytes: bytes.byteLength, platform }, "Materialized executable");
	return { ok: true, executable: new MaterializedExecutable(path, platform) };
}

function closeQuietly(fd: number, path: string): void {
	try {
		closeSync(fd);
	} catch (error) {
		loggers.materializer.warn({ path, err: error }, "Couldn't close temporary file");
	}
}

function removeQuietly(path: string): void {
	try {
		rmSync(path, { force: true });
	} catch (error) {
		loggers.materializer.warn({ path, err: error }, "Couldn't remove partial temporary file");
	}
}

/**
 * Outcome of a scoped materialize-and-use
 */
export type MaterializedRun =
	| { ok: true; output: TailwindCliOutput }
	| { ok: false; error: Exclude<InvocationOutcome, { ok: true }>["error"] | TempFileError | CleanupError };

function settle(executable: MaterializedExecutable, outcome: InvocationOutcome): MaterializedRun {
	const cleanup = executable.dispose();
	if (!cleanup.ok) {
		return { ok: false, error: new CleanupError(executable.path, cleanup.cause, outcome) };
	}
	return outcome;
}

/**
 * Materialize an executable, hand it to `use`, and delete it afterwards.
 *
 * The file is deleted whether `use` succeeds, reports a failure or throws.
 * If materialization fails there is nothing to delete.
 *
 * @example
 * ```typescript
 * const result = withMaterializedExecutable(request, (executable) =>
 *   classify(executable.path),
 * );
 * ```
 */
export function withMaterializedExecutable(
	request: MaterializeRequest,
	use: (executable: MaterializedExecutable) => InvocationOutcome,
): MaterializedRun {
	const materialized = materializeExecutable(request);
	if (!materialized.ok) {
		return materialized;
	}

	const { executable } = materialized;
	try {
		return settle(executable, use(executable));
	} finally {
		// No-op unless `use` threw before settling
		executable.dispose();
	}
}

/**
 * Async counterpart of {@link withMaterializedExecutable}
 */
export async function withMaterializedExecutableAsync(
	request: MaterializeRequest,
	use: (executable: MaterializedExecutable) => Promise<InvocationOutcome>,
): Promise<MaterializedRun> {
	const materialized = materializeExecutable(request);
	if (!materialized.ok) {
		return materialized;
	}

	const { executable } = materialized;
	try {
		return settle(executable, await use(executable));
	} finally {
		executable.dispose();
	}
}
