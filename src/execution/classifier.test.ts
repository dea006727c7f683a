import { describe, expect, it } from "vitest";
import { classifyOutcome, decodeStream } from "./classifier";
import { ToolFailedError } from "./errors";
import type { RawProcessOutcome } from "./types";

function outcome(overrides: Partial<RawProcessOutcome>): RawProcessOutcome {
	return {
		exitCode: 0,
		signal: null,
		stdout: Buffer.alloc(0),
		stderr: Buffer.alloc(0),
		...overrides,
	};
}

describe("decodeStream", () => {
	it("should trim leading and trailing whitespace", () => {
		expect(decodeStream(Buffer.from("\n\t  tailwindcss v3.4.1\n\n  "))).toBe("tailwindcss v3.4.1");
	});

	it("should keep inner whitespace", () => {
		expect(decodeStream(Buffer.from("\nline one\n\nline two\n"))).toBe("line one\n\nline two");
	});

	it("should replace invalid UTF-8 instead of failing", () => {
		expect(decodeStream(Buffer.from([0xff, 0xfe, 0x6f, 0x6b]))).toBe("\uFFFD\uFFFDok");
	});

	it("should decode multi-byte characters", () => {
		expect(decodeStream(Buffer.from(" Done in 12ms ✓ ", "utf8"))).toBe("Done in 12ms ✓");
	});
});

describe("classifyOutcome", () => {
	it("should return trimmed output for exit code 0", () => {
		const result = classifyOutcome(
			outcome({ stdout: Buffer.from("  built  \n"), stderr: Buffer.from("\nDone in 5ms.\n") }),
		);

		expect(result).toEqual({ ok: true, output: { stdout: "built", stderr: "Done in 5ms." } });
	});

	it("should keep both streams on a non-zero exit", () => {
		const result = classifyOutcome(
			outcome({
				exitCode: 1,
				stderr: Buffer.from("\nSpecified input file src/missing.css does not exist.\n"),
			}),
		);

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error).toBeInstanceOf(ToolFailedError);
		expect(result.error.kind).toBe("tool-failed");
		if (result.error.kind !== "tool-failed") return;
		expect(result.error.stdout).toBe("");
		expect(result.error.stderr).toBe("Specified input file src/missing.css does not exist.");
		expect(result.error.exitCode).toBe(1);
		expect(result.error.message).toBe("Tailwind CLI exited with code 1");
	});

	it("should treat termination by a signal as a tool failure", () => {
		const result = classifyOutcome(outcome({ exitCode: null, signal: "SIGTERM" }));

		expect(result.ok).toBe(false);
		if (result.ok || result.error.kind !== "tool-failed") return;
		expect(result.error.exitCode).toBeNull();
		expect(result.error.signal).toBe("SIGTERM");
		expect(result.error.message).toBe("Tailwind CLI was terminated by SIGTERM");
	});

	it("should render both streams in the detailed message", () => {
		const result = classifyOutcome(
			outcome({ exitCode: 2, stdout: Buffer.from("out"), stderr: Buffer.from("err") }),
		);

		if (result.ok) throw new Error("expected failure");
		expect(result.error.toDetailedString()).toBe(
			"Tailwind CLI exited with code 2\n\nstdout:\nout\n\nstderr:\nerr",
		);
	});
});
