/**
 * @fileoverview Run Options
 *
 * Schema and defaults for the options accepted by `run` and `runAsync`.
 *
 * @module config/options
 */

import { tmpdir } from "node:os";
import { z } from "zod";
import { type BinaryStore, VendoredBinaryStore } from "../binaries/store";
import { currentHost } from "../platform/resolver";
import type { HostInfo } from "../platform/types";

export const HostInfoSchema = z.object({
	os: z.string().min(1),
	arch: z.string().min(1),
	armVersion: z.number().int().positive().optional(),
});

/**
 * Serializable run options
 */
export const RunOptionsSchema = z
	.object({
		/** Directory for the temporary executable (default: OS temp dir) */
		tempDir: z.string().min(1).optional(),
		/** Working directory for Tailwind (default: process.cwd()) */
		cwd: z.string().min(1).optional(),
		/** Variables merged over process.env for the child */
		env: z.record(z.string(), z.string()).optional(),
		/** Host override (default: the current process) */
		host: HostInfoSchema.optional(),
	})
	.strict();

export type RunOptionsInput = z.input<typeof RunOptionsSchema>;

export interface RunOptions extends RunOptionsInput {
	/** Source of executable bytes (default: the package's vendored binaries) */
	store?: BinaryStore;
}

/**
 * Options with every default applied
 */
export interface ResolvedRunOptions {
	tempDir: string;
	cwd: string;
	env: NodeJS.ProcessEnv;
	host: HostInfo;
	store: BinaryStore;
}

/**
 * Validate options and fill in defaults
 *
 * @throws {z.ZodError} when an option has the wrong shape
 */
export function resolveRunOptions(options: RunOptions = {}): ResolvedRunOptions {
	const { store, ...serializable } = options;
	const parsed = RunOptionsSchema.parse(serializable);

	return {
		tempDir: parsed.tempDir ?? tmpdir(),
		cwd: parsed.cwd ?? process.cwd(),
		env: parsed.env ? { ...process.env, ...parsed.env } : process.env,
		host: parsed.host ?? currentHost(),
		store: store ?? new VendoredBinaryStore(),
	};
}
