/**
 * Error handler for CLI commands
 * Converts errors to user-friendly output with proper exit codes
 */

import { ZodError } from "zod"

import { isDebug } from "./env.js"
import { BranchdError, EXIT_CODES, InstallError } from "./errors.js"
import { logger } from "./logger.js"

export interface HandleErrorOptions {
	json?: boolean
}

/**
 * Handle errors consistently across all commands
 * Fail-fast: exit immediately with appropriate code
 */
export function handleError(error: unknown, options: HandleErrorOptions = {}): never {
	// JSON mode: structured output
	if (options.json) {
		const output = formatErrorAsJson(error)
		console.log(JSON.stringify(output, null, 2))
		process.exit(output.exitCode)
	}

	// Known errors with codes
	if (error instanceof BranchdError) {
		logger.error(error.message)
		if (error instanceof InstallError && error.phase === "rolled-back") {
			logger.info("The previous binary is still installed.")
		}
		if (isDebug() && error.cause !== undefined) {
			console.error(error.cause)
		}
		process.exit(error.exitCode)
	}

	// Zod validation errors: format nicely
	if (error instanceof ZodError) {
		logger.error("Validation failed:")
		for (const issue of error.issues) {
			const path = issue.path.join(".")
			logger.error(`  ${path}: ${issue.message}`)
		}
		process.exit(EXIT_CODES.CONFIG)
	}

	// Unknown errors
	if (error instanceof Error) {
		logger.error(error.message)
		if (isDebug()) {
			console.error(error.stack)
		}
	} else {
		logger.error("An unknown error occurred")
	}

	process.exit(EXIT_CODES.GENERAL)
}

/**
 * Wrap a command action so any thrown error goes through handleError.
 * JSON mode is read from the last argument Commander passes (the options object).
 */
export function wrapAction<Args extends unknown[]>(
	action: (...args: Args) => void | Promise<void>,
): (...args: Args) => Promise<void> {
	return async (...args: Args) => {
		try {
			await action(...args)
		} catch (error) {
			handleError(error, { json: wantsJson(args) })
		}
	}
}

function wantsJson(args: unknown[]): boolean {
	// Commander calls actions with (...arguments, options, command)
	for (const candidate of [args.at(-1), args.at(-2)]) {
		if (typeof candidate === "object" && candidate !== null && "json" in candidate) {
			return candidate.json === true
		}
	}
	return false
}

interface JsonErrorOutput {
	success: false
	error: {
		code: string
		message: string
	}
	exitCode: number
	meta: {
		timestamp: string
	}
}

export function formatErrorAsJson(error: unknown): JsonErrorOutput {
	const meta = { timestamp: new Date().toISOString() }

	if (error instanceof BranchdError) {
		return {
			success: false,
			error: { code: error.code, message: error.message },
			exitCode: error.exitCode,
			meta,
		}
	}

	if (error instanceof ZodError) {
		return {
			success: false,
			error: {
				code: "VALIDATION_ERROR",
				message: error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
			},
			exitCode: EXIT_CODES.CONFIG,
			meta,
		}
	}

	return {
		success: false,
		error: {
			code: "UNKNOWN_ERROR",
			message: error instanceof Error ? error.message : "An unknown error occurred",
		},
		exitCode: EXIT_CODES.GENERAL,
		meta,
	}
}
