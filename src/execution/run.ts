/**
 * @fileoverview Tailwind CLI Runner
 *
 * Public entry points. Each call resolves the platform, materializes the
 * matching binary, runs it, classifies the result and deletes the binary
 * again. Failures are returned, not thrown.
 *
 * @module execution/run
 *
 * @example
 * ```typescript
 * const result = run(["--input", "src/main.css", "--output", "dist/built.css"]);
 * if (!result.ok) {
 *   console.error(result.error.toDetailedString());
 * }
 * ```
 */

import { type ResolvedRunOptions, type RunOptions, resolveRunOptions } from "../config/options";
import { loggers } from "../observability";
import { resolvePlatform } from "../platform/resolver";
import { PACKAGE_VERSION } from "../version";
import { classifyOutcome } from "./classifier";
import {
	type InvocationOutcome,
	MissingBinaryError,
	type RunError,
	type UnsupportedPlatformError,
} from "./errors";
import { invokeProcess, invokeProcessAsync } from "./invoker";
import {
	type MaterializedRun,
	withMaterializedExecutable,
	withMaterializedExecutableAsync,
} from "./materializer";
import type { MaterializeRequest, TailwindCliOutput } from "./types";

export type RunResult = { ok: true; output: TailwindCliOutput } | { ok: false; error: RunError };

type Preparation =
	| { ok: true; request: MaterializeRequest }
	| { ok: false; error: UnsupportedPlatformError | MissingBinaryError };

/**
 * Resolve the platform and look up its bytes. Touches no files beyond
 * reading the vendored binary.
 */
function prepare(options: ResolvedRunOptions): Preparation {
	const resolution = resolvePlatform(options.host);
	if (!resolution.ok) {
		loggers.runner.error({ host: options.host }, resolution.error.message);
		return resolution;
	}

	const { platform } = resolution;
	let bytes: Uint8Array;
	try {
		bytes = options.store.bytesFor(platform);
	} catch (error) {
		const missing = error instanceof MissingBinaryError ? error : new MissingBinaryError(platform, undefined, error);
		loggers.runner.error({ platform, err: missing }, missing.message);
		return { ok: false, error: missing };
	}

	loggers.runner.debug({ platform, bytes: bytes.byteLength }, "Loaded CLI executable bytes");
	return {
		ok: true,
		request: { bytes, platform, version: PACKAGE_VERSION, directory: options.tempDir },
	};
}

function report(result: MaterializedRun): RunResult {
	if (result.ok) {
		loggers.runner.debug({ stdout: result.output.stdout, stderr: result.output.stderr }, "CLI executable returned successfully");
	} else {
		loggers.runner.debug({ kind: result.error.kind }, result.error.message);
	}
	return result;
}

/**
 * Run the Tailwind CLI with the given arguments, blocking until it exits
 *
 * @param args - Arguments passed to Tailwind verbatim
 * @param options - Temp directory, working directory, environment and store overrides
 */
export function run(args: Iterable<string>, options?: RunOptions): RunResult {
	const argv = [...args];
	const resolved = resolveRunOptions(options);
	loggers.runner.debug({ args: argv }, "Running Tailwind CLI");

	const prepared = prepare(resolved);
	if (!prepared.ok) {
		return prepared;
	}

	return report(
		withMaterializedExecutable(prepared.request, (executable): InvocationOutcome => {
			const invoked = invokeProcess(executable.path, argv, { cwd: resolved.cwd, env: resolved.env });
			return invoked.ok ? classifyOutcome(invoked.raw) : invoked;
		}),
	);
}

/**
 * Run the Tailwind CLI without blocking the event loop.
 * Concurrent calls each get their own temporary executable.
 */
export async function runAsync(args: Iterable<string>, options?: RunOptions): Promise<RunResult> {
	const argv = [...args];
	const resolved = resolveRunOptions(options);
	loggers.runner.debug({ args: argv }, "Running Tailwind CLI");

	const prepared = prepare(resolved);
	if (!prepared.ok) {
		return prepared;
	}

	return report(
		await withMaterializedExecutableAsync(prepared.request, async (executable): Promise<InvocationOutcome> => {
			const invoked = await invokeProcessAsync(executable.path, argv, {
				cwd: resolved.cwd,
				env: resolved.env,
			});
			return invoked.ok ? classifyOutcome(invoked.raw) : invoked;
		}),
	);
}

/**
 * Like {@link run}, but throws the error instead of returning it
 *
 * @throws {TailwindCliError}
 */
export function runOrThrow(args: Iterable<string>, options?: RunOptions): TailwindCliOutput {
	const result = run(args, options);
	if (!result.ok) {
		throw result.error;
	}
	return result.output;
}
