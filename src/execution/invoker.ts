/**
 * @fileoverview Process Invoker
 *
 * Spawns an executable with verbatim arguments and captures stdout and
 * stderr separately and in full. stdin is not connected.
 *
 * @module execution/invoker
 */

import { type ChildProcessByStdio, type SpawnSyncReturns, spawn, spawnSync } from "node:child_process";
import type { Readable } from "node:stream";
import { loggers } from "../observability";
import { SpawnError } from "./errors";
import type { InvokeOptions, RawProcessOutcome } from "./types";

export type InvokeResult = { ok: true; raw: RawProcessOutcome } | { ok: false; error: SpawnError };

function errorCode(error: unknown): string | undefined {
	if (error instanceof Error && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}

function spawnFailure(path: string, error: unknown): InvokeResult {
	const code = errorCode(error);
	loggers.invoker.error({ path, code, err: error }, "Couldn't start process");
	return { ok: false, error: new SpawnError(path, error, code) };
}

/**
 * Run an executable and block until it exits and both streams are drained
 *
 * @param path - Executable to run
 * @param args - Arguments, passed through unmodified
 * @param options - Working directory and environment
 */
export function invokeProcess(path: string, args: readonly string[], options: InvokeOptions): InvokeResult {
	loggers.invoker.debug({ path, args, cwd: options.cwd }, "Invoking process");

	let result: SpawnSyncReturns<Buffer>;
	try {
		result = spawnSync(path, args, {
			cwd: options.cwd,
			env: options.env,
			stdio: ["ignore", "pipe", "pipe"],
			// Unbounded: output is never truncated
			maxBuffer: Number.POSITIVE_INFINITY,
			windowsHide: true,
		});
	} catch (error) {
		// Argument validation (e.g. a NUL byte) throws before anything starts
		return spawnFailure(path, error);
	}

	if (result.error) {
		return spawnFailure(path, result.error);
	}

	loggers.invoker.debug({ path, exitCode: result.status, signal: result.signal }, "Process exited");
	return {
		ok: true,
		raw: {
			exitCode: result.status,
			signal: result.signal,
			stdout: result.stdout,
			stderr: result.stderr,
		},
	};
}

/**
 * Run an executable without blocking the event loop
 *
 * Same contract as {@link invokeProcess}. Chunks are kept as bytes and
 * joined once the process closes so multi-byte characters split across
 * chunks decode correctly.
 */
export function invokeProcessAsync(
	path: string,
	args: readonly string[],
	options: InvokeOptions,
): Promise<InvokeResult> {
	loggers.invoker.debug({ path, args, cwd: options.cwd }, "Invoking process");

	return new Promise((resolve) => {
		const stdout: Buffer[] = [];
		const stderr: Buffer[] = [];
		let spawnFailed = false;

		let child: ChildProcessByStdio<null, Readable, Readable>;
		try {
			child = spawn(path, args, {
				cwd: options.cwd,
				env: options.env,
				stdio: ["ignore", "pipe", "pipe"],
				windowsHide: true,
			});
		} catch (error) {
			// Errors other than ENOENT/EACCES/EAGAIN/EMFILE/ENFILE are thrown synchronously
			resolve(spawnFailure(path, error));
			return;
		}

		child.stdout.on("data", (chunk: Buffer) => {
			stdout.push(chunk);
		});

		child.stderr.on("data", (chunk: Buffer) => {
			stderr.push(chunk);
		});

		child.on("error", (error: Error) => {
			// "error" without a pid means the process never started
			if (child.pid === undefined) {
				spawnFailed = true;
				resolve(spawnFailure(path, error));
				return;
			}
			loggers.invoker.warn({ path, err: error }, "Process error after start");
		});

		child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
			if (spawnFailed) return;
			loggers.invoker.debug({ path, exitCode: code, signal }, "Process exited");
			resolve({
				ok: true,
				raw: {
					exitCode: code,
					signal,
					stdout: Buffer.concat(stdout),
					stderr: Buffer.concat(stderr),
				},
			});
		});
	});
}
