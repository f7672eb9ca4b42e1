/**
 * Executable Path Utilities
 *
 * Locates the binary that a self-update replaces. The path is resolved once
 * per run with every symlink dereferenced, so a link in PATH is never swapped
 * for a regular file and the target cannot drift mid-replace.
 */

import { realpathSync } from "node:fs"
import { basename } from "node:path"
import { errorMessage, SelfUpdateError } from "../utils/errors.js"

/** Interpreter names that mean we are running as a script, not as a standalone binary */
const NODE_RUNTIMES = new Set(["node", "nodejs"])

/**
 * Check if running as a standalone compiled binary.
 * When launched through `node`, process.execPath is the interpreter itself.
 */
export function isStandaloneBinary(execPath: string = process.execPath): boolean {
	const name = basename(execPath).toLowerCase().replace(/\.exe$/, "")
	return !NODE_RUNTIMES.has(name)
}

/**
 * Resolve the running executable to its real, symlink-free path.
 *
 * @throws SelfUpdateError when running under a Node interpreter or when the path cannot be resolved
 */
export function resolveExecutablePath(execPath: string = process.execPath): string {
	if (!isStandaloneBinary(execPath)) {
		throw new SelfUpdateError(
			`Self-update only works for the standalone branchd binary (running under ${execPath}).\n` +
				"Reinstall with the install script or update through the package manager that installed it.",
		)
	}

	try {
		return realpathSync(execPath)
	} catch (error) {
		throw new SelfUpdateError(`Failed to resolve executable path ${execPath}: ${errorMessage(error)}`, {
			cause: error,
		})
	}
}
