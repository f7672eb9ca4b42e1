/**
 * HTTP GET helper shared by the release, checksum and artifact fetchers.
 * Transport failures and timeouts surface as NetworkError; status handling is left to callers.
 */

import { USER_AGENT } from "../constants.js"
import { errorMessage, NetworkError } from "./errors.js"

/** Subset of the global fetch signature, injectable for tests */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface HttpGetOptions {
	timeoutMs: number
	fetch?: FetchLike
	accept?: string
}

export async function httpGet(url: string, options: HttpGetOptions): Promise<Response> {
	const fetchImpl = options.fetch ?? fetch
	const headers: Record<string, string> = { "User-Agent": USER_AGENT }
	if (options.accept) {
		headers.Accept = options.accept
	}

	try {
		return await fetchImpl(url, {
			headers,
			redirect: "follow",
			signal: AbortSignal.timeout(options.timeoutMs),
		})
	} catch (error) {
		if (isTimeout(error)) {
			throw new NetworkError(`Request to ${url} timed out after ${options.timeoutMs}ms`, url, {
				cause: error,
				timedOut: true,
			})
		}
		throw new NetworkError(`Cannot reach ${url}: ${errorMessage(error)}`, url, { cause: error })
	}
}

/**
 * Read a response body as text.
 * The request's timeout keeps running while the body streams in, so a stalled
 * body surfaces here as a timed-out NetworkError.
 */
export async function readBodyText(response: Response, url: string, timeoutMs: number): Promise<string> {
	try {
		return await response.text()
	} catch (error) {
		if (isTimeout(error)) {
			throw new NetworkError(`Reading response from ${url} timed out after ${timeoutMs}ms`, url, {
				cause: error,
				timedOut: true,
			})
		}
		throw new NetworkError(
			`Connection to ${url} failed while reading the response: ${errorMessage(error)}`,
			url,
			{ cause: error },
		)
	}
}

/** AbortSignal.timeout rejects with a TimeoutError; a bare abort reports AbortError */
export function isTimeout(error: unknown): boolean {
	return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")
}
