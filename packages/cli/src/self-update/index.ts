/**
 * Self-Update Hook Integration
 *
 * Registers a pre-action hook that checks for a newer release before CLI
 * commands. The check is best-effort: it never blocks for long and never
 * interrupts the command on failure.
 */

import type { Command } from "commander"
import { isCI } from "../utils/env.js"
import type { FetchLike } from "../utils/http.js"
import { logger } from "../utils/logger.js"
import { checkForUpdate } from "./check.js"
import { loadSelfUpdateConfig } from "./config.js"
import { notifyUpdate } from "./notify.js"
import type { VersionProvider } from "./types.js"

// =============================================================================
// UPDATE CHECK CONDITIONS
// =============================================================================

/** Commands that must not trigger the notice */
const SKIPPED_COMMANDS = new Set(["update", "version"])

export interface UpdateCheckHookOptions {
	versionProvider: VersionProvider
	fetch?: FetchLike
	/** Defaults to process.stdout.isTTY */
	isInteractive?: () => boolean
}

/**
 * Check environment conditions for running the update check.
 * Returns false if any condition indicates we should skip.
 */
export function shouldCheckForUpdate(isInteractive: () => boolean): boolean {
	if (isCI) return false

	// Can't display the notice anyway
	if (!isInteractive()) return false

	return true
}

// =============================================================================
// HOOK REGISTRATION
// =============================================================================

/**
 * Register pre-action hook for update checks.
 * Call this on the root program to check before every command except `update` and `version`.
 */
export function registerUpdateCheckHook(program: Command, options: UpdateCheckHookOptions): void {
	const isInteractive = options.isInteractive ?? (() => Boolean(process.stdout.isTTY))

	program.hook("preAction", async (_thisCommand, actionCommand) => {
		// actionCommand is the leaf command being run
		if (SKIPPED_COMMANDS.has(actionCommand.name())) return

		// --no-update-check
		if (program.opts().updateCheck === false) return

		if (!shouldCheckForUpdate(isInteractive)) return

		try {
			const config = loadSelfUpdateConfig()
			if (config.updateCheckDisabled) return

			const result = await checkForUpdate(options.versionProvider.version, {
				url: config.releasesApiUrl,
				fetch: options.fetch,
			})

			if (result.ok && result.updateAvailable) {
				notifyUpdate(result.current, result.latest)
			} else if (!result.ok) {
				logger.debug(`Update check skipped: ${result.reason}`)
			}
		} catch (error) {
			// Never interrupt the user's command
			logger.debug("Update check failed:", error)
		}
	})
}

// =============================================================================
// RE-EXPORTS
// =============================================================================

export { checkForUpdate, compareVersions, fetchLatestRelease } from "./check.js"
export { notifyBackupRetained, notifyUpdate, notifyUpdated, notifyUpToDate } from "./notify.js"
export { runSelfUpdate, type UpdateOutcome } from "./orchestrator.js"
