/**
 * Update Command
 *
 * Replaces the running branchd binary with the latest release:
 * download → verify checksum → swap, rolling back on failure.
 */

import type { Command } from "commander"
import { notifyBackupRetained, notifyUpdated, notifyUpToDate } from "../self-update/notify.js"
import { runSelfUpdate, type SelfUpdateOptions } from "../self-update/orchestrator.js"
import type { VersionProvider } from "../self-update/types.js"
import { wrapAction } from "../utils/handle-error.js"
import { outputSuccess } from "../utils/json-output.js"
import { logger } from "../utils/logger.js"
import { sharedOptions } from "../utils/shared-options.js"

// =============================================================================
// TYPES
// =============================================================================

interface UpdateOptions {
	force?: boolean
	json?: boolean
	quiet?: boolean
}

/** Collaborators the command forwards to the orchestrator (tests swap these) */
export type UpdateCommandDeps = Omit<SelfUpdateOptions, "currentVersion" | "force" | "quiet">

// =============================================================================
// COMMAND IMPLEMENTATION
// =============================================================================

export async function updateCommand(
	versionProvider: VersionProvider,
	options: UpdateOptions,
	deps: UpdateCommandDeps = {},
): Promise<void> {
	const current = versionProvider.version

	if (!options.json) {
		logger.debug(`Current version: ${current}`)
	}

	const outcome = await runSelfUpdate({
		...deps,
		currentVersion: current,
		force: options.force,
		quiet: options.quiet || options.json,
	})

	if (options.json) {
		outputSuccess(outcome, current)
		return
	}

	if (outcome.status === "up-to-date") {
		notifyUpToDate(outcome.current)
		return
	}

	notifyUpdated(outcome.from, outcome.to)
	if (outcome.strategy === "rename" && outcome.backupRetained) {
		notifyBackupRetained(outcome.backupPath)
	}
}

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerUpdateCommand(
	program: Command,
	versionProvider: VersionProvider,
	deps: UpdateCommandDeps = {},
): void {
	program
		.command("update")
		.description("Update branchd CLI")
		.addOption(sharedOptions.force())
		.addOption(sharedOptions.json())
		.addOption(sharedOptions.quiet())
		.action(
			wrapAction(async (options: UpdateOptions) => {
				await updateCommand(
					versionProvider,
					// `branchd --quiet update` sets the flag on the root program
					{ ...options, quiet: options.quiet === true || program.opts().quiet === true },
					deps,
				)
			}),
		)
}
