/**
 * JSON output utilities for CI/CD integration
 * Following GitHub CLI patterns for consistent --json flag handling
 */

// JSON response envelope
export interface JsonResponse<T = unknown> {
	success: boolean
	data?: T
	meta?: {
		timestamp: string
		version: string
	}
}

/**
 * Output data as JSON
 */
export function outputJson(data: unknown): void {
	console.log(JSON.stringify(data, null, 2))
}

/**
 * Output success response
 */
export function outputSuccess<T>(data: T, version: string): void {
	const response: JsonResponse<T> = {
		success: true,
		data,
		meta: {
			timestamp: new Date().toISOString(),
			version,
		},
	}
	outputJson(response)
}
