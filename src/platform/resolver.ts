/**
 * @fileoverview Platform Resolver
 *
 * Maps the host operating system and architecture to the platform whose
 * vendored binary should run. Pure: nothing is cached between calls.
 *
 * @module platform/resolver
 */

import { UnsupportedPlatformError } from "../execution/errors";
import { loggers } from "../observability";
import type { HostInfo, PlatformId } from "./types";

/**
 * Node.js platform and architecture names mapped to our platform ids.
 * Node reports 32-bit ARM as "arm"; the vendored Linux build targets armv7.
 */
const MIN_ARM_VERSION = 7;
const PLATFORM_TABLE: Readonly<Record<string, Readonly<Record<string, PlatformId>>>> = {
	darwin: {
		arm64: "macos-arm64",
		x64: "macos-x64",
	},
	linux: {
		arm64: "linux-arm64",
		arm: "linux-armv7",
		x64: "linux-x64",
	},
	win32: {
		arm64: "windows-arm64",
		x64: "windows-x64",
	},
};

/**
 * Result of platform resolution
 */
export type PlatformResolution =
	| { ok: true; platform: PlatformId }
	| { ok: false; error: UnsupportedPlatformError };

/**
 * Detect the host the current process runs on
 */
export function currentHost(): HostInfo {
	const host: HostInfo = { os: process.platform, arch: process.arch };
	if (process.arch === "arm") {
		const armVersion = Number(Reflect.get(process.config.variables, "arm_version"));
		if (Number.isInteger(armVersion)) host.armVersion = armVersion;
	}
	return host;
}

/**
 * Resolve the platform id for a host
 *
 * @param host - Host to resolve, defaults to the current process
 * @returns The matching platform, or an unsupported-platform error
 */
export function resolvePlatform(host: HostInfo = currentHost()): PlatformResolution {
	const architectures = Object.hasOwn(PLATFORM_TABLE, host.os) ? PLATFORM_TABLE[host.os] : undefined;
	if (!architectures) {
		return { ok: false, error: new UnsupportedPlatformError(host, `Unsupported OS: ${host.os}`) };
	}

	const platform = Object.hasOwn(architectures, host.arch) ? architectures[host.arch] : undefined;
	if (!platform) {
		return {
			ok: false,
			error: new UnsupportedPlatformError(host, `Unsupported architecture: ${host.arch} (${host.os})`),
		};
	}

	if (host.arch === "arm" && host.armVersion !== undefined && host.armVersion < MIN_ARM_VERSION) {
		return {
			ok: false,
			error: new UnsupportedPlatformError(host, `Unsupported architecture: armv${host.armVersion} (${host.os})`),
		};
	}

	loggers.platform.debug({ host, platform }, "Resolved platform");
	return { ok: true, platform };
}

/**
 * Whether a platform runs Windows executables
 */
export function isWindowsPlatform(platform: PlatformId): boolean {
	return platform.startsWith("windows-");
}
