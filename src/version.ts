/**
 * Package version, `<tailwind version>-<wrapper revision>`.
 *
 * The wrapper revision lets a new release ship without changing the bundled
 * Tailwind version. Keep in sync with package.json.
 */
export const PACKAGE_VERSION = "3.4.1-0";

/**
 * Version of the bundled Tailwind CSS CLI (everything before the first dash)
 */
export function tailwindVersion(packageVersion: string = PACKAGE_VERSION): string {
	const [version] = packageVersion.split("-");
	return version;
}
