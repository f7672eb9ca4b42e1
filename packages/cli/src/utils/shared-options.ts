/**
 * Shared CLI Options Factory
 *
 * Reusable option definitions for consistent command interfaces.
 */

import { Option } from "commander"

export const sharedOptions = {
	/** Suppress non-essential output */
	quiet: () => new Option("-q, --quiet", "Suppress output"),

	/** Output as JSON */
	json: () => new Option("--json", "Output as JSON"),

	/** Reinstall even if already up to date */
	force: () => new Option("-f, --force", "Reinstall even if already up to date"),

	/** Verbose output */
	verbose: () => new Option("-v, --verbose", "Verbose output"),

	/** Skip the passive update check */
	noUpdateCheck: () => new Option("--no-update-check", "Skip checking for a newer release"),
}
