/**
 * Platform resolution for release artifacts.
 *
 * Maps Node's `process.platform`/`process.arch` onto release naming
 * (linux/darwin/windows, amd64/arm64), resolves the one artifact name per
 * supported pair and picks the install strategy for the OS.
 */

import { UnsupportedPlatformError } from "../utils/errors.js"
import type { InstallStrategy, PlatformTarget } from "./types.js"

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * Supported matrix, keyed by `${os}/${arch}`.
 * Any pair missing here fails fast; there is no fallback artifact.
 */
const PLATFORM_ARTIFACTS = new Map<string, string>([
	["linux/amd64", "branchd-linux-amd64"],
	["linux/arm64", "branchd-linux-arm64"],
	["darwin/amd64", "branchd-darwin-amd64"],
	["darwin/arm64", "branchd-darwin-arm64"],
	["windows/amd64", "branchd-windows-amd64.exe"],
])

export const SUPPORTED_PLATFORMS: readonly string[] = [...PLATFORM_ARTIFACTS.keys()]

const NODE_OS_NAMES: Partial<Record<NodeJS.Platform, string>> = {
	win32: "windows",
}

const NODE_ARCH_NAMES: Record<string, string> = {
	x64: "amd64",
}

// =============================================================================
// RESOLUTION
// =============================================================================

/**
 * Translate Node's platform/arch names into release naming.
 * Unknown values pass through unchanged and are rejected by `resolvePlatformArtifact`.
 */
export function toPlatformTarget(platform: NodeJS.Platform, arch: string): PlatformTarget {
	return {
		os: NODE_OS_NAMES[platform] ?? platform,
		arch: NODE_ARCH_NAMES[arch] ?? arch,
	}
}

/** Platform of the running process */
export function currentPlatform(): PlatformTarget {
	return toPlatformTarget(process.platform, process.arch)
}

/**
 * Resolve the release artifact name for an OS/arch pair.
 *
 * @throws UnsupportedPlatformError for any pair outside the supported matrix
 */
export function resolvePlatformArtifact(os: string, arch: string): string {
	const artifact = PLATFORM_ARTIFACTS.get(`${os}/${arch}`)

	if (!artifact) {
		throw new UnsupportedPlatformError(os, arch, SUPPORTED_PLATFORMS)
	}

	return artifact
}

/**
 * Windows refuses to overwrite a loaded executable, so it is renamed away instead.
 * Every other supported OS lets the running binary be overwritten in place.
 */
export function selectInstallStrategy(os: string): InstallStrategy {
	return os === "windows" ? "rename" : "copy"
}
