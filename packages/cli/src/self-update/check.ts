/**
 * Check for available updates to the branchd CLI.
 *
 * `fetchLatestRelease` reads the release registry, `compareVersions` decides
 * whether the running build is stale, and `checkForUpdate` folds both into a
 * discriminated union for callers that must never throw.
 */

import { PASSIVE_CHECK_TIMEOUT_MS } from "../constants.js"
import { releaseResponseSchema } from "../schemas/release.js"
import { NetworkError, ProtocolError } from "../utils/errors.js"
import { type FetchLike, httpGet, readBodyText } from "../utils/http.js"
import type { ReleaseDescriptor } from "./types.js"
import { DEV_VERSION } from "./version-provider.js"

// =============================================================================
// TYPES
// =============================================================================

export interface FetchReleaseOptions {
	url: string
	timeoutMs: number
	fetch?: FetchLike
}

/**
 * Result of checking for available updates.
 * Discriminated union: ok=true for success, ok=false with reason for failure.
 */
export type CheckResult =
	| {
			ok: true
			current: string
			latest: string
			release: ReleaseDescriptor
			updateAvailable: boolean
	  }
	| { ok: false; reason: "timeout" | "network-error" | "invalid-response" }

/** Extract failure type for error message mapping */
export type CheckFailure = Extract<CheckResult, { ok: false }>

export type { VersionProvider } from "./types.js"

// =============================================================================
// VERSION SOURCE
// =============================================================================

/**
 * Fetch the latest published release descriptor.
 *
 * @throws NetworkError on transport failure or timeout
 * @throws ProtocolError on non-2xx status or a malformed payload
 */
export async function fetchLatestRelease(options: FetchReleaseOptions): Promise<ReleaseDescriptor> {
	const { url } = options
	const response = await httpGet(url, {
		timeoutMs: options.timeoutMs,
		fetch: options.fetch,
		accept: "application/vnd.github+json",
	})

	if (!response.ok) {
		throw new ProtocolError(
			`Release registry returned HTTP ${response.status} for ${url}`,
			url,
			response.status,
		)
	}

	const body = await readBodyText(response, url, options.timeoutMs)

	let payload: unknown
	try {
		payload = JSON.parse(body)
	} catch {
		throw new ProtocolError(`Release registry returned invalid JSON from ${url}`, url, response.status)
	}

	const parsed = releaseResponseSchema.safeParse(payload)
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ")
		throw new ProtocolError(`Unexpected release payload from ${url}: ${issues}`, url, response.status)
	}

	const release = parsed.data
	return Object.freeze({
		tag: release.tag_name,
		displayName: release.name ?? release.tag_name,
		releaseUrl: release.html_url,
	})
}

// =============================================================================
// VERSION COMPARATOR
// =============================================================================

function stripVersionPrefix(version: string): string {
	const trimmed = version.trim()
	return trimmed.startsWith("v") ? trimmed.slice(1) : trimmed
}

/**
 * Decide whether `latest` should replace `current`.
 *
 * Plain inequality after removing one leading "v"; NOT semantic-version
 * ordering, so a textual downgrade also reports true. Dev builds and
 * unstamped builds always report true.
 */
export function compareVersions(current: string, latest: string): boolean {
	const normalizedCurrent = stripVersionPrefix(current)

	if (normalizedCurrent === "" || normalizedCurrent === DEV_VERSION) {
		return true
	}

	return normalizedCurrent !== stripVersionPrefix(latest)
}

// =============================================================================
// VERSION CHECK
// =============================================================================

/**
 * Check whether a newer release exists without ever throwing.
 * Used by the passive notification before other commands.
 */
export async function checkForUpdate(
	currentVersion: string,
	options: Omit<FetchReleaseOptions, "timeoutMs"> & { timeoutMs?: number },
): Promise<CheckResult> {
	try {
		const release = await fetchLatestRelease({
			...options,
			timeoutMs: options.timeoutMs ?? PASSIVE_CHECK_TIMEOUT_MS,
		})

		return {
			ok: true,
			current: currentVersion,
			latest: release.tag,
			release,
			updateAvailable: compareVersions(currentVersion, release.tag),
		}
	} catch (error) {
		if (error instanceof NetworkError) {
			return { ok: false, reason: error.timedOut ? "timeout" : "network-error" }
		}
		return { ok: false, reason: "invalid-response" }
	}
}
