/**
 * Version Provider
 *
 * A release build stamps `__VERSION__`; a `tsc` build ships next to its
 * package.json and reads the version from there. Only when neither is
 * available does the CLI report the dev sentinel.
 * @module
 */

import { readFileSync } from "node:fs"
import { packageManifestSchema } from "../schemas/release.js"
import { errorMessage } from "../utils/errors.js"
import { logger } from "../utils/logger.js"
import type { VersionProvider } from "./types.js"

// =============================================================================
// BUILD-TIME VERSION
// =============================================================================

/** Sentinel reported by builds that were not stamped with a release version */
export const DEV_VERSION = "dev"

/** Version injected at build time by the release pipeline */
declare const __VERSION__: string | undefined

/** package.json of the CLI package, from both `src/self-update/` and `dist/self-update/` */
const PACKAGE_JSON_URL = new URL("../../package.json", import.meta.url)

/**
 * Read `version` from a package manifest.
 *
 * @returns The version, or undefined if the file is missing or has no usable version
 */
export function readPackageVersion(manifestUrl: URL = PACKAGE_JSON_URL): string | undefined {
	try {
		const parsed = packageManifestSchema.safeParse(JSON.parse(readFileSync(manifestUrl, "utf-8")))
		return parsed.success ? parsed.data.version : undefined
	} catch (error) {
		logger.debug(`No package version at ${manifestUrl.href}: ${errorMessage(error)}`)
		return undefined
	}
}

/**
 * Pick the first usable version: build stamp, then package manifest, then dev.
 */
export function resolveVersion(
	stamped: string | undefined,
	readManifest: () => string | undefined = readPackageVersion,
): string {
	if (stamped) return stamped
	return readManifest() ?? DEV_VERSION
}

/**
 * Provides the running CLI's version, resolved once on first access.
 */
export class BuildTimeVersionProvider implements VersionProvider {
	private resolved: string | undefined

	get version(): string {
		if (this.resolved === undefined) {
			const stamped = typeof __VERSION__ !== "undefined" ? __VERSION__ : undefined
			this.resolved = resolveVersion(stamped)
		}
		return this.resolved
	}
}

/** Default version provider instance for production use */
export const defaultVersionProvider = new BuildTimeVersionProvider()
