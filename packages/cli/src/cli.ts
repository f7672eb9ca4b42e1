/**
 * branchd CLI program definition.
 * Database branching for PostgreSQL; this package carries the self-update surface.
 */

import { Command } from "commander"
import { registerUpdateCommand, type UpdateCommandDeps } from "./commands/update.js"
import { registerVersionCommand } from "./commands/version.js"
import { CLI_NAME } from "./constants.js"
import { registerUpdateCheckHook } from "./self-update/index.js"
import type { VersionProvider } from "./self-update/types.js"
import { defaultVersionProvider } from "./self-update/version-provider.js"
import { setLoggerOptions } from "./utils/logger.js"
import { sharedOptions } from "./utils/shared-options.js"

export interface CreateProgramOptions {
	versionProvider?: VersionProvider
	updateDeps?: UpdateCommandDeps
	/** Defaults to process.stdout.isTTY */
	isInteractive?: () => boolean
}

export function createProgram(options: CreateProgramOptions = {}): Command {
	const versionProvider = options.versionProvider ?? defaultVersionProvider
	const program = new Command()

	program
		.name(CLI_NAME)
		.description("Branchd - Database branching for PostgreSQL")
		.version(versionProvider.version)
		.addOption(sharedOptions.verbose())
		.addOption(sharedOptions.quiet())
		.addOption(sharedOptions.noUpdateCheck())

	// Logger modes are set before the update check hook so its debug output honours --verbose
	program.hook("preAction", (_thisCommand, actionCommand) => {
		const rootOpts = program.opts()
		const commandOpts = actionCommand.opts()
		setLoggerOptions({
			verbose: rootOpts.verbose === true,
			quiet: rootOpts.quiet === true || commandOpts.quiet === true || commandOpts.json === true,
		})
	})

	// Runs before every command except `update` and `version`. Those are the only
	// commands in this package; branch, server and config commands register on
	// the returned program and get the notice from here.
	registerUpdateCheckHook(program, {
		versionProvider,
		fetch: options.updateDeps?.fetch,
		isInteractive: options.isInteractive,
	})

	registerVersionCommand(program, versionProvider)
	registerUpdateCommand(program, versionProvider, options.updateDeps)

	return program
}
