/**
 * Download the standalone Tailwind CLI for every platform into vendor/.
 *
 * Run before publishing so the package carries all binaries and needs no
 * network access at run time.
 *
 * Usage: npm run vendor
 *        npx tsx scripts/vendor-binaries.ts --force
 */

import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import pc from "picocolors";
import { releaseAssetUrl } from "../src/binaries/release";
import { BINARY_FILE_NAMES, DEFAULT_VENDOR_DIR } from "../src/binaries/store";
import { PLATFORM_IDS, type PlatformId } from "../src/platform/types";
import { tailwindVersion } from "../src/version";

function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`;
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

async function vendorBinary(version: string, platform: PlatformId, force: boolean): Promise<void> {
	const target = join(DEFAULT_VENDOR_DIR, BINARY_FILE_NAMES[platform]);
	if (existsSync(target) && !force) {
		console.log(`${pc.dim("[skip]")} ${platform} (already vendored)`);
		return;
	}

	const url = releaseAssetUrl(version, platform);
	const response = await fetch(url);
	if (!response.ok) {
		throw new Error(`Download of ${url} failed: ${response.status} ${response.statusText}`);
	}

	const bytes = new Uint8Array(await response.arrayBuffer());
	writeFileSync(target, bytes);
	console.log(`${pc.green("[ok]")} ${platform} ${formatBytes(bytes.byteLength)}`);
}

async function main(): Promise<void> {
	const force = process.argv.includes("--force");
	const version = tailwindVersion();
	mkdirSync(DEFAULT_VENDOR_DIR, { recursive: true });

	console.log(`Vendoring Tailwind CLI v${version} into ${DEFAULT_VENDOR_DIR}`);
	for (const platform of PLATFORM_IDS) {
		await vendorBinary(version, platform, force);
	}
}

main().catch((error: unknown) => {
	console.error(pc.red("[error]"), error instanceof Error ? error.message : error);
	process.exitCode = 1;
});
