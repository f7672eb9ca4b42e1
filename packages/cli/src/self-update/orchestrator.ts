/**
 * Self-update orchestration.
 *
 * One invocation is one complete attempt:
 *   check version → resolve artifact → download → verify checksum →
 *   mark executable → install
 * Each stage runs only if the previous one succeeded; nothing is retried.
 */

import { BranchdError, errorMessage, SelfUpdateError } from "../utils/errors.js"
import type { FetchLike } from "../utils/http.js"
import { logger } from "../utils/logger.js"
import { withSpinner } from "../utils/spinner.js"
import { compareVersions, fetchLatestRelease } from "./check.js"
import { loadSelfUpdateConfig, type SelfUpdateConfig } from "./config.js"
import { cleanupDownload, downloadToTemp, getDownloadUrl, markExecutable } from "./download.js"
import { resolveExecutablePath } from "./executable.js"
import { BinaryInstaller, type FileOps } from "./install.js"
import { currentPlatform, resolvePlatformArtifact, selectInstallStrategy } from "./platform.js"
import type { InstallStrategy, PlatformTarget, ReleaseDescriptor } from "./types.js"
import { assertChecksum, fetchExpectedChecksum } from "./verify.js"

// =============================================================================
// TYPES
// =============================================================================

export interface SelfUpdateOptions {
	/** Version of the running binary, passed in explicitly */
	currentVersion: string
	/** Reinstall even when the comparator reports the build as current */
	force?: boolean
	quiet?: boolean
	config?: SelfUpdateConfig
	fetch?: FetchLike
	platform?: PlatformTarget
	/** Executable to replace; resolved (symlinks dereferenced) once per run */
	executablePath?: string
	/** Defaults to the strategy for `platform.os`; chosen once per run */
	strategy?: InstallStrategy
	fileOps?: FileOps
}

export type UpdateOutcome =
	| { status: "up-to-date"; current: string; release: ReleaseDescriptor }
	| {
			status: "updated"
			from: string
			to: string
			release: ReleaseDescriptor
			strategy: InstallStrategy
			targetPath: string
			backupPath: string
			backupRetained: boolean
	  }

export type UpdateStage =
	| "resolve-executable"
	| "check"
	| "resolve-artifact"
	| "download"
	| "verify"
	| "stage"
	| "install"

// =============================================================================
// STAGES
// =============================================================================

/**
 * Run one stage. Typed errors pass through untouched; anything else is
 * wrapped so the user sees which stage broke.
 */
async function runStage<T>(stage: UpdateStage, fn: () => T | Promise<T>): Promise<T> {
	logger.debug(`self-update: ${stage}`)
	try {
		return await fn()
	} catch (error) {
		if (error instanceof BranchdError) throw error
		throw new SelfUpdateError(`Self-update failed during ${stage}: ${errorMessage(error)}`, {
			cause: error,
		})
	}
}

// =============================================================================
// ORCHESTRATION
// =============================================================================

/**
 * Update the running binary to the latest release.
 *
 * @returns "up-to-date" without downloading anything, or "updated" with install details
 * @throws BranchdError subclasses from whichever stage failed
 */
export async function runSelfUpdate(options: SelfUpdateOptions): Promise<UpdateOutcome> {
	const { currentVersion, quiet } = options
	const config = options.config ?? loadSelfUpdateConfig()
	const platform = options.platform ?? currentPlatform()
	const strategy = options.strategy ?? selectInstallStrategy(platform.os)

	const targetPath = await runStage("resolve-executable", () =>
		resolveExecutablePath(options.executablePath),
	)

	const release = await runStage("check", () =>
		withSpinner({ text: "Checking for updates...", quiet }, () =>
			fetchLatestRelease({
				url: config.releasesApiUrl,
				timeoutMs: config.timeouts.releaseMs,
				fetch: options.fetch,
			}),
		),
	)

	if (!compareVersions(currentVersion, release.tag) && !options.force) {
		return { status: "up-to-date", current: currentVersion, release }
	}

	const artifactName = await runStage("resolve-artifact", () =>
		resolvePlatformArtifact(platform.os, platform.arch),
	)
	const url = getDownloadUrl(config.downloadBaseUrl, release.tag, artifactName)

	const artifact = await runStage("download", () =>
		downloadToTemp(url, {
			artifact: artifactName,
			platform,
			timeoutMs: config.timeouts.downloadMs,
			fetch: options.fetch,
			quiet,
		}),
	)

	try {
		await runStage("verify", () =>
			withSpinner({ text: "Verifying checksum...", quiet }, async () => {
				const expected = await fetchExpectedChecksum(url, {
					timeoutMs: config.timeouts.checksumMs,
					fetch: options.fetch,
				})
				await assertChecksum(artifact.path, expected, url)
			}),
		)

		await runStage("stage", () => markExecutable(artifact.path))

		const result = await runStage("install", () =>
			new BinaryInstaller({
				sourcePath: artifact.path,
				targetPath,
				strategy,
				fileOps: options.fileOps,
			}).install(),
		)

		return {
			status: "updated",
			from: currentVersion,
			to: release.tag,
			release,
			strategy: result.strategy,
			targetPath: result.targetPath,
			backupPath: result.backupPath,
			backupRetained: result.backupRetained,
		}
	} finally {
		cleanupDownload(artifact)
	}
}
