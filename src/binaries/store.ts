/**
 * @fileoverview Embedded Binary Store
 *
 * Supplies the Tailwind CLI executable bytes for each platform. The package
 * ships them in `vendor/`; embedding programs and tests can provide their own.
 *
 * @module binaries/store
 */

import { readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { MissingBinaryError } from "../execution/errors";
import type { PlatformId } from "../platform/types";

/**
 * Lookup of executable bytes by platform
 */
export interface BinaryStore {
	/**
	 * @throws {MissingBinaryError} when the bytes for a platform are unavailable
	 */
	bytesFor(platform: PlatformId): Uint8Array;
}

/**
 * Vendored file name for every platform
 */
export const BINARY_FILE_NAMES: Readonly<Record<PlatformId, string>> = {
	"macos-arm64": "tailwindcss-macos-arm64",
	"macos-x64": "tailwindcss-macos-x64",
	"linux-arm64": "tailwindcss-linux-arm64",
	"linux-armv7": "tailwindcss-linux-armv7",
	"linux-x64": "tailwindcss-linux-x64",
	"windows-arm64": "tailwindcss-windows-arm64.exe",
	"windows-x64": "tailwindcss-windows-x64.exe",
};

/**
 * `vendor/` at the package root (two levels above this module in both
 * `src/` and `dist/`)
 */
export const DEFAULT_VENDOR_DIR = resolve(__dirname, "..", "..", "vendor");

/**
 * Reads binaries from the package's vendor directory on each lookup
 */
export class VendoredBinaryStore implements BinaryStore {
	constructor(public readonly vendorDir: string = DEFAULT_VENDOR_DIR) {}

	pathFor(platform: PlatformId): string {
		return join(this.vendorDir, BINARY_FILE_NAMES[platform]);
	}

	bytesFor(platform: PlatformId): Uint8Array {
		const path = this.pathFor(platform);
		try {
			return readFileSync(path);
		} catch (error) {
			throw new MissingBinaryError(platform, path, error);
		}
	}
}

/**
 * Holds binaries in memory, one entry required per platform
 */
export class InMemoryBinaryStore implements BinaryStore {
	constructor(private readonly binaries: Readonly<Record<PlatformId, Uint8Array>>) {}

	bytesFor(platform: PlatformId): Uint8Array {
		return this.binaries[platform];
	}
}

/**
 * Store that serves the same bytes for every platform
 */
export function singleBinaryStore(bytes: Uint8Array): BinaryStore {
	return { bytesFor: () => bytes };
}
