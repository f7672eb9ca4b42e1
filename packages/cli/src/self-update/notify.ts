/**
 * Self-update notification display for terminal output.
 *
 * @example
 * ```ts
 * import { notifyUpdate } from "./notify.js"
 *
 * notifyUpdate("v1.0.0", "v1.1.0")
 * // Prints: "New version v1.0.0 -> v1.1.0. Run: branchd update"
 * ```
 *
 * @module
 */

import kleur from "kleur"

/**
 * Passive notice printed before other commands.
 * Goes to stderr so piped stdout stays clean.
 */
export function notifyUpdate(current: string, latest: string): void {
	console.error(
		`New version ${kleur.dim(current)} -> ${kleur.green(latest)}. Run: ${kleur.cyan("branchd update")}\n`,
	)
}

/**
 * Output format:
 *   Already up to date (version v1.2.2)
 */
export function notifyUpToDate(version: string): void {
	console.log(`Already up to date (version ${version})`)
}

/**
 * Output format:
 *   ✓ Successfully updated to version v1.3.0! (from v1.2.2)
 */
export function notifyUpdated(from: string, to: string): void {
	console.log(`\n${kleur.green("✓")} Successfully updated to version ${to}! ${kleur.dim(`(from ${from})`)}`)
}

/** The rename strategy keeps the previous binary; tell the operator where it is */
export function notifyBackupRetained(backupPath: string): void {
	console.log(`\nNote: old binary saved as ${backupPath} - you can delete it manually`)
}
