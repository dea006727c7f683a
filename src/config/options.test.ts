import { tmpdir } from "node:os";
import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { VendoredBinaryStore, singleBinaryStore } from "../binaries/store";
import { RunOptionsSchema, resolveRunOptions } from "./options";

describe("resolveRunOptions", () => {
	it("should apply defaults", () => {
		const resolved = resolveRunOptions();

		expect(resolved.tempDir).toBe(tmpdir());
		expect(resolved.cwd).toBe(process.cwd());
		expect(resolved.env).toBe(process.env);
		expect(resolved.host).toEqual({ os: process.platform, arch: process.arch });
		expect(resolved.store).toBeInstanceOf(VendoredBinaryStore);
	});

	it("should merge env over the parent environment", () => {
		const resolved = resolveRunOptions({ env: { TW_RUNNER_MODE: "test" } });

		expect(resolved.env.TW_RUNNER_MODE).toBe("test");
		expect(resolved.env.PATH).toBe(process.env.PATH);
		expect(process.env.TW_RUNNER_MODE).toBeUndefined();
	});

	it("should keep explicit values", () => {
		const store = singleBinaryStore(new Uint8Array([1]));
		const resolved = resolveRunOptions({
			tempDir: "/var/tmp/tw",
			cwd: "/srv/site",
			host: { os: "linux", arch: "arm" },
			store,
		});

		expect(resolved.tempDir).toBe("/var/tmp/tw");
		expect(resolved.cwd).toBe("/srv/site");
		expect(resolved.host).toEqual({ os: "linux", arch: "arm" });
		expect(resolved.store).toBe(store);
	});

	it("should reject an empty temp directory", () => {
		expect(() => resolveRunOptions({ tempDir: "" })).toThrow(ZodError);
	});

	it("should reject unknown options", () => {
		expect(RunOptionsSchema.safeParse({ tempdir: "/tmp" }).success).toBe(false);
	});
});
