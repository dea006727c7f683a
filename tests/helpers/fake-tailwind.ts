/**
 * Shell-script stand-in for the Tailwind CLI.
 *
 * Served through an in-memory store so process-level tests run without the
 * real vendored binaries. Requires a POSIX shell.
 *
 * Supported arguments:
 * - `--help`                       print the version banner and exit 0
 * - `-i/--input`, `-o/--output`    copy input to output; fail if input is missing
 * - `--echo <text>`                print text to stdout
 * - `--echo-stderr <text>`         print text to stderr
 * - `--sleep <seconds>`            sleep
 * - `--self`                       print the script's own path
 * - `--invalid-utf8`               print bytes that are not valid UTF-8
 * - `--exit <code>`                exit with the code
 * - `--kill`                       terminate itself with SIGTERM
 * - `--replace-self`               swap its own file for a directory so deletion fails
 */

import { readdirSync } from "node:fs";
import { singleBinaryStore } from "../../src/binaries/store";
import { isTemporaryExecutableName } from "../../src/execution/materializer";
import { tailwindVersion } from "../../src/version";

/** printf escapes for 0xFF 0xFE */
const INVALID_UTF8 = "\\377\\376";

export const FAKE_TAILWIND_SCRIPT = String.raw`#!/bin/sh
if [ "$1" = "--help" ]; then
	printf '\ntailwindcss v${tailwindVersion()}\n\nUsage:\n   tailwindcss [--input input.css] [--output output.css] [options...]\n\n'
	exit 0
fi
input=""
output=""
while [ "$#" -gt 0 ]; do
	case "$1" in
		-i|--input) input="$2"; shift 2 ;;
		-o|--output) output="$2"; shift 2 ;;
		--echo) printf '%s\n' "$2"; shift 2 ;;
		--echo-stderr) printf '%s\n' "$2" >&2; shift 2 ;;
		--sleep) sleep "$2"; shift 2 ;;
		--self) printf '%s\n' "$0"; shift ;;
		--invalid-utf8) printf '${INVALID_UTF8}ok'; shift ;;
		--exit) exit "$2" ;;
		--kill) kill -TERM $$ ;;
		--replace-self) rm "$0" && mkdir "$0"; shift ;;
		*) shift ;;
	esac
done
if [ -n "$input" ]; then
	if [ ! -f "$input" ]; then
		printf '\nSpecified input file %s does not exist.\n' "$input" >&2
		exit 1
	fi
	if [ -n "$output" ]; then
		cat "$input" > "$output"
	fi
	printf '\nRebuilding...\n\nDone in 12ms.\n' >&2
fi
exit 0
`;

/**
 * Store serving the stand-in for every platform
 */
export function fakeTailwindStore() {
	return singleBinaryStore(Buffer.from(FAKE_TAILWIND_SCRIPT, "utf8"));
}

/**
 * Store serving a script whose interpreter does not exist, so the OS
 * refuses to start it
 */
export function unstartableStore() {
	return singleBinaryStore(Buffer.from("#!/nonexistent/interpreter\n", "utf8"));
}

/**
 * Temporary executables left in a directory
 */
export function leftoverExecutables(directory: string): string[] {
	return readdirSync(directory).filter(isTemporaryExecutableName);
}

/** Process-level tests need a POSIX shell */
export const isWindows = process.platform === "win32";
