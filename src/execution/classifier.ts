/**
 * @fileoverview Output Classifier
 *
 * Turns a raw process outcome into a success or a tool failure.
 *
 * @module execution/classifier
 */

import { type InvocationOutcome, ToolFailedError } from "./errors";
import type { RawProcessOutcome, TailwindCliOutput } from "./types";

const decoder = new TextDecoder("utf-8", { fatal: false });

/**
 * Decode a captured stream as UTF-8 and trim surrounding whitespace.
 * Invalid byte sequences become U+FFFD instead of failing.
 */
export function decodeStream(bytes: Uint8Array): string {
	return decoder.decode(bytes).trim();
}

/**
 * Classify a finished process. Exit code 0 is success; a non-zero code or
 * a terminating signal is a tool failure that keeps both streams.
 */
export function classifyOutcome(raw: RawProcessOutcome): InvocationOutcome {
	const output: TailwindCliOutput = {
		stdout: decodeStream(raw.stdout),
		stderr: decodeStream(raw.stderr),
	};

	if (raw.exitCode === 0) {
		return { ok: true, output };
	}
	return { ok: false, error: new ToolFailedError(output, raw.exitCode, raw.signal) };
}
