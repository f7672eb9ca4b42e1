/**
 * Self-Update Binary Download
 *
 * Streams the platform artifact into a private temp directory outside the
 * install target's directory, so a partial download can never shadow the live
 * binary. The directory is the unit of cleanup.
 */

import { chmodSync, rmSync } from "node:fs"
import { type FileHandle, mkdtemp, open, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { DownloadError, errorMessage, NetworkError, SelfUpdateError } from "../utils/errors.js"
import { type FetchLike, httpGet, isTimeout } from "../utils/http.js"
import { logger } from "../utils/logger.js"
import { createSpinner } from "../utils/spinner.js"
import { normalizeBaseUrl } from "./config.js"
import type { DownloadedArtifact, DownloadProgressCallback, PlatformTarget } from "./types.js"

// =============================================================================
// URL GENERATION
// =============================================================================

/**
 * Get the artifact URL for a release tag.
 *
 * @param baseUrl - Release download base (trailing slashes ignored)
 * @param tag - Release tag exactly as published (e.g. "v1.2.0")
 * @param artifact - Platform artifact name
 */
export function getDownloadUrl(baseUrl: string, tag: string, artifact: string): string {
	return `${normalizeBaseUrl(baseUrl)}/${tag}/${artifact}`
}

// =============================================================================
// DOWNLOAD
// =============================================================================

export interface DownloadOptions {
	artifact: string
	platform: PlatformTarget
	timeoutMs: number
	fetch?: FetchLike
	quiet?: boolean
	onProgress?: DownloadProgressCallback
}

/**
 * Download binary with progress indicator.
 *
 * @throws NetworkError if the host is unreachable or the transfer times out
 * @throws DownloadError on non-2xx status, missing body or interrupted transfer
 */
async function downloadWithProgress(
	url: string,
	dest: string,
	options: DownloadOptions,
): Promise<void> {
	const spin = createSpinner({ text: "Downloading update...", quiet: options.quiet })
	spin.start()

	let response: Response
	try {
		response = await httpGet(url, { timeoutMs: options.timeoutMs, fetch: options.fetch })
	} catch (error) {
		spin.fail("Download failed")
		throw error
	}

	// Early exit: HTTP error
	if (!response.ok) {
		spin.fail("Download failed")
		throw new DownloadError(
			`Failed to download ${url}: HTTP ${response.status} ${response.statusText}`.trim(),
			url,
			response.status,
		)
	}

	// Early exit: no response body
	if (!response.body) {
		spin.fail("Download failed")
		throw new DownloadError(`Failed to download ${url}: empty response body`, url, response.status)
	}

	const lengthHeader = response.headers.get("content-length")
	const total = lengthHeader ? Number.parseInt(lengthHeader, 10) : Number.NaN
	const totalBytes = Number.isFinite(total) && total > 0 ? total : null
	let received = 0

	const reader = response.body.getReader()
	let file: FileHandle | undefined

	try {
		file = await open(dest, "wx", 0o600)
		while (true) {
			const { done, value } = await reader.read()
			if (done) break
			await file.write(value)
			received += value.byteLength

			options.onProgress?.({ bytesDownloaded: received, totalBytes })
			if (totalBytes !== null) {
				spin.text = `Downloading... ${Math.round((received / totalBytes) * 100)}%`
			}
		}
		spin.succeed("Download complete")
	} catch (error) {
		spin.fail("Download failed")
		// Release the connection
		await reader.cancel().catch((cancelError: unknown) => {
			logger.debug(`Could not cancel download of ${url}: ${errorMessage(cancelError)}`)
		})
		if (isTimeout(error)) {
			throw new NetworkError(
				`Download of ${url} timed out after ${options.timeoutMs}ms`,
				url,
				{ cause: error, timedOut: true },
			)
		}
		throw new DownloadError(`Download of ${url} interrupted: ${errorMessage(error)}`, url, undefined, {
			cause: error,
		})
	} finally {
		await file?.close()
	}
}

/**
 * Download the artifact at `url` into a fresh temp directory.
 * On any failure the directory is removed before the error propagates.
 */
export async function downloadToTemp(
	url: string,
	options: DownloadOptions,
): Promise<DownloadedArtifact> {
	const directory = await mkdtemp(join(tmpdir(), "branchd-update-"))
	const path = join(directory, options.artifact)

	try {
		await downloadWithProgress(url, path, options)
	} catch (error) {
		await rm(directory, { recursive: true, force: true })
		throw error
	}

	logger.debug(`Downloaded ${url} to ${path}`)
	return { path, directory, url, platform: options.platform }
}

// =============================================================================
// STAGING
// =============================================================================

/**
 * Set executable permissions (rwxr-xr-x) on a verified artifact.
 *
 * @throws SelfUpdateError if permissions cannot be changed
 */
export function markExecutable(path: string): void {
	try {
		chmodSync(path, 0o755)
	} catch (error) {
		throw new SelfUpdateError(`Failed to set permissions on ${path}: ${errorMessage(error)}`, {
			cause: error,
		})
	}
}

/**
 * Remove a download's temp directory.
 * Tolerates the directory (or the staged file inside it) being gone already.
 */
export function cleanupDownload(artifact: DownloadedArtifact): void {
	try {
		rmSync(artifact.directory, { recursive: true, force: true })
	} catch (error) {
		logger.warn(`Could not remove temporary download ${artifact.directory}: ${errorMessage(error)}`)
	}
}
