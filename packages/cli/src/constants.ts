/**
 * branchd URL Constants
 *
 * Centralized URL definitions to avoid hardcoding throughout the codebase.
 */

export const CLI_NAME = "branchd"
export const GITHUB_REPO = "branchd-dev/branchd"

/** Identifying client header required by the release registry */
export const USER_AGENT = "branchd-cli"

// GitHub URLs
export const GITHUB_RELEASES_API_URL = `https://api.github.com/repos/${GITHUB_REPO}/releases/latest`
export const GITHUB_DOWNLOAD_BASE_URL = `https://github.com/${GITHUB_REPO}/releases/download`

// Timeouts: short for metadata, long for the binary payload
export const RELEASE_CHECK_TIMEOUT_MS = 10_000
export const CHECKSUM_FETCH_TIMEOUT_MS = 30_000
export const BINARY_DOWNLOAD_TIMEOUT_MS = 5 * 60_000

/** Passive check before other commands must not hold up the user */
export const PASSIVE_CHECK_TIMEOUT_MS = 1_500
