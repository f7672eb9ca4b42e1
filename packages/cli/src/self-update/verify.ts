/**
 * SHA256 verification for self-update downloads.
 *
 * Each artifact is published with a companion `<artifact>.sha256` manifest in
 * "hex  filename" form. Only the first token is read.
 */

import { createHash } from "node:crypto"
import { createReadStream } from "node:fs"
import { sha256HexSchema } from "../schemas/release.js"
import { ChecksumMismatchError, ProtocolError } from "../utils/errors.js"
import { type FetchLike, httpGet, readBodyText } from "../utils/http.js"

// =============================================================================
// MANIFEST PARSING
// =============================================================================

/**
 * Parse a checksum manifest into its expected digest.
 * Accepts "<hash>  <filename>", "<hash> *<filename>" and a bare "<hash>".
 *
 * @param content - Raw manifest text
 * @param url - Manifest URL for error messages
 * @returns Lowercase hex digest
 * @throws ProtocolError if the first token is not a SHA-256 hex digest
 */
export function parseChecksumManifest(content: string, url: string): string {
	const [first] = content.trim().split(/\s+/)
	const parsed = sha256HexSchema.safeParse(first ?? "")

	if (!parsed.success) {
		throw new ProtocolError(`Invalid checksum manifest at ${url}: expected "<sha256>  <filename>"`, url)
	}

	return parsed.data.toLowerCase()
}

// =============================================================================
// MANIFEST FETCHING
// =============================================================================

export interface FetchChecksumOptions {
	timeoutMs: number
	fetch?: FetchLike
}

/** The manifest lives next to the artifact */
export function getChecksumUrl(artifactUrl: string): string {
	return `${artifactUrl}.sha256`
}

/**
 * Download and parse the checksum manifest for an artifact.
 *
 * @param artifactUrl - URL of the artifact (not of the manifest)
 * @throws NetworkError if the manifest host is unreachable
 * @throws ProtocolError on non-2xx status or malformed text
 */
export async function fetchExpectedChecksum(
	artifactUrl: string,
	options: FetchChecksumOptions,
): Promise<string> {
	const url = getChecksumUrl(artifactUrl)
	const response = await httpGet(url, { timeoutMs: options.timeoutMs, fetch: options.fetch })

	if (!response.ok) {
		throw new ProtocolError(
			`Failed to fetch checksum manifest ${url}: HTTP ${response.status}`,
			url,
			response.status,
		)
	}

	return parseChecksumManifest(await readBodyText(response, url, options.timeoutMs), url)
}

// =============================================================================
// HASHING
// =============================================================================

/**
 * Hash content using SHA256.
 *
 * @returns Lowercase hex-encoded SHA256 hash
 */
export function hashContent(content: Buffer | string): string {
	return createHash("sha256").update(content).digest("hex")
}

/**
 * Hash a file using SHA256, streaming so large binaries are never held in memory.
 *
 * @returns Lowercase hex-encoded SHA256 hash
 */
export async function hashFile(filePath: string): Promise<string> {
	const hash = createHash("sha256")
	for await (const chunk of createReadStream(filePath)) {
		hash.update(chunk)
	}
	return hash.digest("hex")
}

// =============================================================================
// VERIFICATION
// =============================================================================

function digestsMatch(actual: string, expected: string): boolean {
	return actual.toLowerCase() === expected.trim().toLowerCase()
}

/**
 * Check a file against an expected digest (case-insensitive).
 */
export async function verifyChecksum(filePath: string, expectedHex: string): Promise<boolean> {
	return digestsMatch(await hashFile(filePath), expectedHex)
}

/**
 * Verify a downloaded file, failing hard on mismatch.
 *
 * @param filePath - Path to file to verify
 * @param expectedHex - Expected SHA256 hash
 * @param label - Artifact URL or name for the error message
 * @throws ChecksumMismatchError if checksum does not match
 */
export async function assertChecksum(
	filePath: string,
	expectedHex: string,
	label: string,
): Promise<void> {
	const actual = await hashFile(filePath)

	if (!digestsMatch(actual, expectedHex)) {
		throw new ChecksumMismatchError(label, expectedHex.toLowerCase(), actual)
	}
}
