/**
 * @fileoverview Platform Types
 *
 * Type definitions for platform detection. Each supported platform has
 * exactly one vendored Tailwind CLI executable.
 *
 * @module platform/types
 */

/**
 * Every platform a binary is vendored for
 */
export const PLATFORM_IDS = [
	"macos-arm64",
	"macos-x64",
	"linux-arm64",
	"linux-armv7",
	"linux-x64",
	"windows-arm64",
	"windows-x64",
] as const;

/**
 * Supported (operating system, CPU architecture) pair
 */
export type PlatformId = (typeof PLATFORM_IDS)[number];

/**
 * Operating system and architecture as reported by the runtime
 * (`process.platform` / `process.arch` naming)
 */
export interface HostInfo {
	/** Operating system name, e.g. "darwin", "linux", "win32" */
	os: string;
	/** CPU architecture, e.g. "arm64", "x64", "arm" */
	arch: string;
	/** ARM revision for 32-bit ARM builds of Node (6 or 7) */
	armVersion?: number;
}
