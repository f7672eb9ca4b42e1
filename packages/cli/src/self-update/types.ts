/**
 * Self-Update Type Definitions
 *
 * Shared shapes passed between the version check, downloader, verifier,
 * installer and orchestrator.
 * @module
 */

// =============================================================================
// VERSION PROVIDER
// =============================================================================

/**
 * Provider for version information, enabling testable version checks.
 * Implementations can provide version from build-time constants or test fixtures.
 */
export interface VersionProvider {
	/** The current CLI version string (e.g., "v1.2.3" or "dev") */
	readonly version: string
}

// =============================================================================
// RELEASE
// =============================================================================

/** Latest published release, fetched once per check */
export interface ReleaseDescriptor {
	readonly tag: string
	readonly displayName: string
	readonly releaseUrl: string
}

// =============================================================================
// PLATFORM
// =============================================================================

/** Platform in release naming (linux/darwin/windows, amd64/arm64) */
export interface PlatformTarget {
	readonly os: string
	readonly arch: string
}

/**
 * How the live executable gets replaced.
 * - "copy": the running binary may be overwritten in place
 * - "rename": the OS locks a loaded executable, so it is renamed away first
 */
export type InstallStrategy = "copy" | "rename"

// =============================================================================
// DOWNLOAD
// =============================================================================

/** A binary downloaded into its own temp directory, not yet verified */
export interface DownloadedArtifact {
	/** File holding the downloaded bytes */
	readonly path: string
	/** Private temp directory owning `path`; removed on cleanup */
	readonly directory: string
	readonly url: string
	readonly platform: PlatformTarget
}

export interface DownloadProgress {
	bytesDownloaded: number
	totalBytes: number | null
}

export type DownloadProgressCallback = (progress: DownloadProgress) => void
