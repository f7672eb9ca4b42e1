/**
 * Self-update configuration, read from the environment.
 *
 * - `BRANCHD_RELEASES_API_URL`: latest-release endpoint (mirrors, air-gapped setups)
 * - `BRANCHD_DOWNLOAD_URL`: base URL that release artifacts are served from
 * - `BRANCHD_NO_UPDATE_CHECK`: disable the passive check before commands
 */

import {
	BINARY_DOWNLOAD_TIMEOUT_MS,
	CHECKSUM_FETCH_TIMEOUT_MS,
	GITHUB_DOWNLOAD_BASE_URL,
	GITHUB_RELEASES_API_URL,
	RELEASE_CHECK_TIMEOUT_MS,
} from "../constants.js"
import { selfUpdateEnvSchema } from "../schemas/release.js"
import { parseEnvBool } from "../utils/env.js"
import { ConfigError } from "../utils/errors.js"

export interface SelfUpdateConfig {
	releasesApiUrl: string
	downloadBaseUrl: string
	updateCheckDisabled: boolean
	timeouts: {
		releaseMs: number
		checksumMs: number
		downloadMs: number
	}
}

/**
 * Load the self-update configuration.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadSelfUpdateConfig(env: NodeJS.ProcessEnv = process.env): SelfUpdateConfig {
	const parsed = selfUpdateEnvSchema.safeParse(env)

	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
			.join("\n")
		throw new ConfigError(`Invalid self-update configuration:\n${details}`)
	}

	const vars = parsed.data
	return {
		releasesApiUrl: vars.BRANCHD_RELEASES_API_URL ?? GITHUB_RELEASES_API_URL,
		downloadBaseUrl: normalizeBaseUrl(vars.BRANCHD_DOWNLOAD_URL ?? GITHUB_DOWNLOAD_BASE_URL),
		updateCheckDisabled: parseEnvBool(vars.BRANCHD_NO_UPDATE_CHECK, false),
		timeouts: {
			releaseMs: RELEASE_CHECK_TIMEOUT_MS,
			checksumMs: CHECKSUM_FETCH_TIMEOUT_MS,
			downloadMs: BINARY_DOWNLOAD_TIMEOUT_MS,
		},
	}
}

/** Remove trailing slash(es) */
export function normalizeBaseUrl(url: string): string {
	return url.replace(/\/+$/, "")
}
