import type { PlatformId } from "../platform/types";
import { BINARY_FILE_NAMES } from "./store";

const RELEASE_BASE_URL = "https://github.com/tailwindlabs/tailwindcss/releases/download";

/**
 * Download URL of the standalone CLI for a Tailwind version and platform.
 * Release assets share the vendored file names.
 */
export function releaseAssetUrl(version: string, platform: PlatformId): string {
	return `${RELEASE_BASE_URL}/v${version}/${BINARY_FILE_NAMES[platform]}`;
}
