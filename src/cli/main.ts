#!/usr/bin/env node
import type { RunOptions } from "../config/options";
import { run } from "../execution/run";
import { formatDuration, logDebug, logError, setVerbose } from "../ui/logger";
import { parseArgs } from "./args";

/** Exit code for failures of the runner itself (as opposed to Tailwind's) */
export const RUNNER_FAILURE_EXIT_CODE = 2;

/**
 * Run Tailwind with the given argv and return the process exit code
 *
 * @param options - Defaults for the run; `--temp-dir` overrides `tempDir`
 */
export function main(argv: string[], options: RunOptions = {}): number {
	const { toolArgs, tempDir, verbose } = parseArgs(argv);
	setVerbose(verbose);
	logDebug("Running Tailwind CLI with args:", JSON.stringify(toolArgs));

	const startedAt = Date.now();
	const result = run(toolArgs, { ...options, tempDir: tempDir ?? options.tempDir });
	logDebug(`Finished in ${formatDuration(Date.now() - startedAt)}`);

	if (result.ok) {
		writeStreams(result.output.stdout, result.output.stderr);
		return 0;
	}

	const { error } = result;
	switch (error.kind) {
		case "tool-failed":
			writeStreams(error.stdout, error.stderr);
			return error.exitCode ?? 1;
		case "cleanup-failed":
			logError(error.toDetailedString());
			if (error.outcome.ok) {
				writeStreams(error.outcome.output.stdout, error.outcome.output.stderr);
			} else if (error.outcome.error.kind === "tool-failed") {
				writeStreams(error.outcome.error.stdout, error.outcome.error.stderr);
			}
			return RUNNER_FAILURE_EXIT_CODE;
		default:
			logError(error.toDetailedString());
			return RUNNER_FAILURE_EXIT_CODE;
	}
}

function writeStreams(stdout: string, stderr: string): void {
	if (stdout) process.stdout.write(`${stdout}\n`);
	if (stderr) process.stderr.write(`${stderr}\n`);
}

if (require.main === module) {
	process.exitCode = main(process.argv);
}
