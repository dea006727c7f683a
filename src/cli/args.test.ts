import { describe, expect, it } from "vitest";
import { parseArgs } from "./args";

const argv = (...args: string[]) => ["node", "tailwind-cli-runner", ...args];

describe("parseArgs", () => {
	it("should pass tool arguments through", () => {
		expect(parseArgs(argv("--input", "src/main.css", "-o", "dist/built.css", "--minify"))).toEqual({
			toolArgs: ["--input", "src/main.css", "-o", "dist/built.css", "--minify"],
			tempDir: undefined,
			verbose: false,
		});
	});

	it("should read runner options before the separator", () => {
		expect(parseArgs(argv("--temp-dir", "target", "--verbose", "--", "--help"))).toEqual({
			toolArgs: ["--help"],
			tempDir: "target",
			verbose: true,
		});
	});

	it("should leave --help to the tool", () => {
		expect(parseArgs(argv("--help")).toolArgs).toEqual(["--help"]);
	});

	it("should allow no arguments", () => {
		expect(parseArgs(argv()).toolArgs).toEqual([]);
	});
});
