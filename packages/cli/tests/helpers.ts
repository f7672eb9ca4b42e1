import { existsSync } from "node:fs"
import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { vi } from "vitest"
import type { SelfUpdateConfig } from "../src/self-update/config.js"

export const RELEASES_URL = "https://releases.test/repos/branchd/latest"
export const DOWNLOAD_BASE = "https://downloads.test/releases/download"

export const TEST_CONFIG: SelfUpdateConfig = {
	releasesApiUrl: RELEASES_URL,
	downloadBaseUrl: DOWNLOAD_BASE,
	updateCheckDisabled: false,
	timeouts: { releaseMs: 1_000, checksumMs: 1_000, downloadMs: 1_000 },
}

export async function createTempDir(prefix: string): Promise<string> {
	return mkdtemp(join(tmpdir(), `branchd-${prefix}-`))
}

export async function cleanupTempDir(path: string): Promise<void> {
	if (existsSync(path)) {
		await rm(path, { recursive: true, force: true })
	}
}

// =============================================================================
// In-process HTTP stand-in
// =============================================================================

export interface FakeRoute {
	status?: number
	body?: string | Uint8Array | ReadableStream<Uint8Array>
	headers?: Record<string, string>
	/** Reject the request instead of answering */
	error?: Error
}

/**
 * Fetch stand-in answering from a URL → route table.
 * Unknown URLs answer 404 so a test never reaches the network.
 */
export function createFakeFetch(routes: Record<string, FakeRoute>) {
	return vi.fn(async (input: string, _init?: RequestInit): Promise<Response> => {
		const route = routes[input]
		if (!route) {
			return new Response("not found", { status: 404 })
		}
		if (route.error) {
			throw route.error
		}
		return new Response(route.body ?? "", {
			status: route.status ?? 200,
			headers: route.headers,
		})
	})
}

export function releaseRoute(tag: string): FakeRoute {
	return {
		body: JSON.stringify({
			tag_name: tag,
			name: `Release ${tag}`,
			html_url: `https://github.test/branchd/releases/tag/${tag}`,
		}),
		headers: { "content-type": "application/json" },
	}
}

export function timeoutError(): Error {
	const error = new Error("The operation was aborted due to timeout")
	error.name = "TimeoutError"
	return error
}

/** Body stream that fails on first read, as a stalled or dropped transfer does */
export function failingStream(error: Error): ReadableStream<Uint8Array> {
	return new ReadableStream<Uint8Array>({
		pull(controller) {
			controller.error(error)
		},
	})
}
