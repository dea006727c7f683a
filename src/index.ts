/**
 * @fileoverview tailwind-cli-runner
 *
 * Run the standalone Tailwind CSS CLI without installing it. The binary for
 * the current platform is written to a temporary file, executed, and removed.
 *
 * @example
 * ```typescript
 * import { runOrThrow } from "tailwind-cli-runner";
 *
 * const { stdout } = runOrThrow(["--input", "src/main.css", "--output", "dist/built.css"]);
 * ```
 */

export { run, runAsync, runOrThrow, type RunResult } from "./execution/run";
export {
	CleanupError,
	MissingBinaryError,
	SpawnError,
	TailwindCliError,
	TempFileError,
	ToolFailedError,
	UnsupportedPlatformError,
	type InvocationOutcome,
	type RunError,
	type TailwindCliErrorKind,
	type TempFileStage,
} from "./execution/errors";
export type { TailwindCliOutput } from "./execution/types";
export { isTemporaryExecutableName, TEMP_FILE_PREFIX } from "./execution/materializer";
export { type RunOptions, RunOptionsSchema } from "./config/options";
export {
	BINARY_FILE_NAMES,
	type BinaryStore,
	InMemoryBinaryStore,
	VendoredBinaryStore,
	singleBinaryStore,
} from "./binaries/store";
export { PLATFORM_IDS, type HostInfo, type PlatformId } from "./platform/types";
export { resolvePlatform } from "./platform/resolver";
export { PACKAGE_VERSION, tailwindVersion } from "./version";
