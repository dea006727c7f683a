import { readFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { PACKAGE_VERSION, tailwindVersion } from "./version";

describe("version", () => {
	it("should match package.json", () => {
		const manifest: { version: string } = JSON.parse(readFileSync(join(process.cwd(), "package.json"), "utf8"));
		expect(PACKAGE_VERSION).toBe(manifest.version);
	});

	it("should strip the wrapper revision", () => {
		expect(tailwindVersion("3.4.1-0")).toBe("3.4.1");
		expect(tailwindVersion("3.4.17-12")).toBe("3.4.17");
		expect(tailwindVersion("4.0.0")).toBe("4.0.0");
		expect(tailwindVersion()).toBe("3.4.1");
	});
});
