/**
 * Custom error classes with error codes
 * Following fail-fast philosophy: every error names the URL, path or digest involved
 */

export type ErrorCode =
	| "NETWORK_ERROR"
	| "PROTOCOL_ERROR"
	| "DOWNLOAD_ERROR"
	| "UNSUPPORTED_PLATFORM"
	| "CHECKSUM_MISMATCH"
	| "INSTALL_ERROR"
	| "SELF_UPDATE_ERROR"
	| "CONFIG_ERROR"
	| "VALIDATION_ERROR"

/** sysexits(3)-style exit codes */
export const EXIT_CODES = {
	SUCCESS: 0,
	GENERAL: 1,
	DATA: 65,
	NETWORK: 69,
	IO: 74,
	PROTOCOL: 76,
	CONFIG: 78,
} as const

export class BranchdError extends Error {
	constructor(
		message: string,
		public readonly code: ErrorCode,
		public readonly exitCode: number = EXIT_CODES.GENERAL,
		options?: { cause?: unknown },
	) {
		super(message, options)
		this.name = "BranchdError"
	}
}

/** Registry or artifact host unreachable, or the request timed out */
export class NetworkError extends BranchdError {
	public readonly timedOut: boolean

	constructor(
		message: string,
		public readonly url: string,
		options?: { cause?: unknown; timedOut?: boolean },
	) {
		super(message, "NETWORK_ERROR", EXIT_CODES.NETWORK, { cause: options?.cause })
		this.name = "NetworkError"
		this.timedOut = options?.timedOut ?? false
	}
}

/** Non-2xx status, or a payload that does not have the expected shape */
export class ProtocolError extends BranchdError {
	constructor(
		message: string,
		public readonly url: string,
		public readonly status?: number,
	) {
		super(message, "PROTOCOL_ERROR", EXIT_CODES.PROTOCOL)
		this.name = "ProtocolError"
	}
}

export class DownloadError extends BranchdError {
	constructor(
		message: string,
		public readonly url: string,
		public readonly status?: number,
		options?: { cause?: unknown },
	) {
		super(message, "DOWNLOAD_ERROR", EXIT_CODES.NETWORK, options)
		this.name = "DownloadError"
	}
}

export class UnsupportedPlatformError extends BranchdError {
	constructor(
		public readonly os: string,
		public readonly arch: string,
		supported: readonly string[],
	) {
		super(
			`Unsupported platform: ${os}/${arch}\nSupported platforms: ${supported.join(", ")}`,
			"UNSUPPORTED_PLATFORM",
			EXIT_CODES.GENERAL,
		)
		this.name = "UnsupportedPlatformError"
	}
}

export class ChecksumMismatchError extends BranchdError {
	constructor(
		public readonly artifact: string,
		public readonly expected: string,
		public readonly actual: string,
	) {
		super(
			`Checksum mismatch for ${artifact}\n  expected: ${expected}\n  actual:   ${actual}\nThe download was discarded and nothing was installed.`,
			"CHECKSUM_MISMATCH",
			EXIT_CODES.DATA,
		)
		this.name = "ChecksumMismatchError"
	}
}

/**
 * Terminal state an install attempt stopped in.
 * - "rolled-back": the target holds the original binary
 * - "failed": the restore itself failed, manual recovery is required
 */
export type InstallFailurePhase = "rolled-back" | "failed"

export class InstallError extends BranchdError {
	constructor(
		message: string,
		public readonly phase: InstallFailurePhase,
		public readonly targetPath: string,
		public readonly backupPath: string,
		options?: { cause?: unknown },
	) {
		super(message, "INSTALL_ERROR", EXIT_CODES.IO, options)
		this.name = "InstallError"
	}
}

export class SelfUpdateError extends BranchdError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "SELF_UPDATE_ERROR", EXIT_CODES.GENERAL, options)
		this.name = "SelfUpdateError"
	}
}

export class ConfigError extends BranchdError {
	constructor(message: string) {
		super(message, "CONFIG_ERROR", EXIT_CODES.CONFIG)
		this.name = "ConfigError"
	}
}

/** Render an unknown thrown value as a message */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
