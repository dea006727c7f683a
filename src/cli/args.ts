/**
 * @fileoverview CLI Argument Parser
 *
 * Parses the runner's own options with Commander.js. Everything else,
 * including unknown options and whatever follows `--`, is handed to
 * Tailwind untouched.
 *
 * @module cli/args
 *
 * @example
 * ```typescript
 * const { toolArgs, tempDir } = parseArgs(process.argv);
 * ```
 */

import { Command } from "commander";
import { PACKAGE_VERSION, tailwindVersion } from "../version";

export interface ParsedArgs {
	/** Arguments for Tailwind, in order */
	toolArgs: string[];
	tempDir?: string;
	verbose: boolean;
}

/**
 * Create the CLI program.
 *
 * `--help` and `-v` belong to Tailwind, so the runner's help and version
 * flags are renamed.
 */
export function createProgram(): Command {
	return new Command()
		.name("tailwind-cli-runner")
		.description(`Run the bundled Tailwind CSS CLI v${tailwindVersion()}`)
		.usage("[runner options] [--] <tailwind args...>")
		.version(PACKAGE_VERSION, "--runner-version", "Print the runner version")
		.helpOption("--runner-help", "Show runner help")
		.argument("[args...]", "Arguments passed to Tailwind")
		.option("--temp-dir <dir>", "Directory for the temporary executable")
		.option("--verbose", "Print debug output")
		.allowUnknownOption(true)
		.allowExcessArguments(true)
		.passThroughOptions(true);
}

/**
 * Parse process.argv-style arguments
 */
export function parseArgs(argv: string[]): ParsedArgs {
	const program = createProgram();
	program.parse(argv);
	const opts = program.opts<{ tempDir?: string; verbose?: boolean }>();

	return {
		toolArgs: [...program.args],
		tempDir: opts.tempDir,
		verbose: opts.verbose ?? false,
	};
}
