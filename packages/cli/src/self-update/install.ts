/**
 * Binary Installer
 *
 * Replaces the running executable with a verified, staged binary as a small
 * state machine:
 *
 *   idle → staged → backed-up → installed → committed
 *                         ↘ rolled-back | failed
 *
 * - "rolled-back": the target holds the original binary (never touched, or restored)
 * - "failed": the restore itself failed; the error names both paths for manual recovery
 *
 * Every step is a single synchronous filesystem call, keeping the window
 * between "installed" and "committed" as short as possible.
 *
 * SECURITY: Only run this AFTER the staged file's checksum has been verified.
 */

import { chmodSync, copyFileSync, existsSync, renameSync, rmSync, statSync } from "node:fs"
import { errorMessage, InstallError, SelfUpdateError } from "../utils/errors.js"
import { logger } from "../utils/logger.js"
import type { InstallStrategy } from "./types.js"

// =============================================================================
// TYPES
// =============================================================================

export type InstallPhase =
	| "idle"
	| "staged"
	| "backed-up"
	| "installed"
	| "committed"
	| "rolled-back"
	| "failed"

export interface InstallTransaction {
	readonly sourcePath: string
	readonly targetPath: string
	readonly backupPath: string
	phase: InstallPhase
}

/**
 * Filesystem calls the installer makes, injectable so failures can be simulated.
 */
export interface FileOps {
	exists(path: string): boolean
	copyFile(src: string, dest: string): void
	rename(from: string, to: string): void
	remove(path: string): void
	/** Permission bits of a file */
	getMode(path: string): number
	setMode(path: string, mode: number): void
}

export const nodeFileOps: FileOps = {
	exists: (path) => existsSync(path),
	copyFile: (src, dest) => copyFileSync(src, dest),
	rename: (from, to) => renameSync(from, to),
	remove: (path) => rmSync(path, { force: true }),
	getMode: (path) => statSync(path).mode & 0o7777,
	setMode: (path, mode) => chmodSync(path, mode),
}

export interface BinaryInstallerOptions {
	/** Verified, executable binary to install */
	sourcePath: string
	/** Resolved, symlink-free path of the live executable */
	targetPath: string
	strategy: InstallStrategy
	fileOps?: FileOps
}

export interface InstallResult {
	phase: "committed"
	strategy: InstallStrategy
	targetPath: string
	backupPath: string
	/** True when the backup is still on disk (always for "rename") */
	backupRetained: boolean
}

// =============================================================================
// CONSTANTS
// =============================================================================

const TRANSITIONS: Record<InstallPhase, readonly InstallPhase[]> = {
	idle: ["staged", "rolled-back"],
	staged: ["backed-up", "rolled-back"],
	"backed-up": ["installed", "rolled-back", "failed"],
	installed: ["committed"],
	committed: [],
	"rolled-back": [],
	failed: [],
}

/**
 * Backup location for a strategy.
 * The rename strategy keeps a distinct ".old" suffix since that file outlives the run.
 */
export function backupPathFor(targetPath: string, strategy: InstallStrategy): string {
	return strategy === "rename" ? `${targetPath}.old` : `${targetPath}.backup`
}

function isCrossDevice(error: unknown): boolean {
	return typeof error === "object" && error !== null && "code" in error && error.code === "EXDEV"
}

// =============================================================================
// INSTALLER
// =============================================================================

export class BinaryInstaller {
	private readonly transaction: InstallTransaction
	private readonly strategy: InstallStrategy
	private readonly fs: FileOps

	constructor(options: BinaryInstallerOptions) {
		this.strategy = options.strategy
		this.fs = options.fileOps ?? nodeFileOps
		this.transaction = {
			sourcePath: options.sourcePath,
			targetPath: options.targetPath,
			backupPath: backupPathFor(options.targetPath, options.strategy),
			phase: "idle",
		}
	}

	get phase(): InstallPhase {
		return this.transaction.phase
	}

	get backupPath(): string {
		return this.transaction.backupPath
	}

	/**
	 * Run the full transaction.
	 *
	 * @throws InstallError with phase "rolled-back" when the original binary is intact,
	 *   or "failed" when manual recovery is required
	 */
	install(): InstallResult {
		if (this.transaction.phase !== "idle") {
			throw new SelfUpdateError(
				`Installer for ${this.transaction.targetPath} already ran (phase: ${this.transaction.phase})`,
			)
		}

		this.stage()
		this.backUp()
		this.replace()
		return this.commit()
	}

	// ---------------------------------------------------------------------------
	// Transitions
	// ---------------------------------------------------------------------------

	private transition(next: InstallPhase): void {
		const current = this.transaction.phase
		if (!TRANSITIONS[current].includes(next)) {
			throw new SelfUpdateError(`Illegal install transition: ${current} -> ${next}`)
		}
		logger.debug(`install: ${current} -> ${next}`)
		this.transaction.phase = next
	}

	private stage(): void {
		const { sourcePath, targetPath, backupPath } = this.transaction

		if (!this.fs.exists(sourcePath)) {
			this.abort(`Staged binary ${sourcePath} is missing`)
		}
		if (!this.fs.exists(targetPath)) {
			this.abort(`Installed binary ${targetPath} is missing, nothing to back up`)
		}

		// A previous run on a rename platform leaves its backup behind
		if (this.strategy === "rename" && this.fs.exists(backupPath)) {
			try {
				this.fs.remove(backupPath)
			} catch (error) {
				this.abort(`Failed to remove stale backup ${backupPath}`, error)
			}
		}

		this.transition("staged")
	}

	private backUp(): void {
		const { targetPath, backupPath } = this.transaction

		try {
			if (this.strategy === "rename") {
				this.fs.rename(targetPath, backupPath)
			} else {
				this.fs.copyFile(targetPath, backupPath)
			}
		} catch (error) {
			if (this.strategy === "copy") {
				this.discardPartialBackup()
			}
			this.abort(`Failed to back up ${targetPath} to ${backupPath}`, error)
		}

		if (!this.fs.exists(backupPath)) {
			this.abort(`Backup ${backupPath} was not created`)
		}

		this.transition("backed-up")
	}

	private replace(): void {
		const { sourcePath, targetPath } = this.transaction

		try {
			if (this.strategy === "rename") {
				this.moveInto(sourcePath, targetPath)
			} else {
				const mode = this.fs.getMode(targetPath)
				this.fs.copyFile(sourcePath, targetPath)
				this.fs.setMode(targetPath, mode)
			}
		} catch (error) {
			this.restore(error)
		}

		this.transition("installed")
	}

	private commit(): InstallResult {
		const { targetPath, backupPath } = this.transaction
		let backupRetained = true

		if (this.strategy === "copy") {
			try {
				this.fs.remove(backupPath)
				backupRetained = false
			} catch (error) {
				logger.warn(
					`Update installed, but the backup ${backupPath} could not be removed: ${errorMessage(error)}`,
				)
			}
		}

		this.transition("committed")
		return {
			phase: "committed",
			strategy: this.strategy,
			targetPath,
			backupPath,
			backupRetained,
		}
	}

	// ---------------------------------------------------------------------------
	// Recovery
	// ---------------------------------------------------------------------------

	/** Rename, falling back to copy + delete when the staged file lives on another volume */
	private moveInto(sourcePath: string, targetPath: string): void {
		try {
			this.fs.rename(sourcePath, targetPath)
		} catch (error) {
			if (!isCrossDevice(error)) throw error
			this.fs.copyFile(sourcePath, targetPath)
			this.fs.remove(sourcePath)
		}
	}

	private discardPartialBackup(): void {
		const { backupPath } = this.transaction
		try {
			this.fs.remove(backupPath)
		} catch (error) {
			logger.warn(`Could not remove partial backup ${backupPath}: ${errorMessage(error)}`)
		}
	}

	/** Fail before the target was touched */
	private abort(reason: string, cause?: unknown): never {
		const { targetPath, backupPath } = this.transaction
		this.transition("rolled-back")
		const detail = cause === undefined ? "" : `: ${errorMessage(cause)}`
		throw new InstallError(
			`${reason}${detail}. The installed binary at ${targetPath} was not changed.`,
			"rolled-back",
			targetPath,
			backupPath,
			{ cause },
		)
	}

	/** Put the backup back after a failed replace; one attempt only */
	private restore(installError: unknown): never {
		const { targetPath, backupPath } = this.transaction

		if (!this.fs.exists(backupPath)) {
			this.fail(installError, new Error(`backup ${backupPath} is missing`))
		}

		try {
			if (this.strategy === "rename") {
				this.fs.rename(backupPath, targetPath)
			} else {
				this.fs.copyFile(backupPath, targetPath)
			}
		} catch (restoreError) {
			this.fail(installError, restoreError)
		}

		if (this.strategy === "copy") {
			this.discardPartialBackup()
		}

		this.transition("rolled-back")
		throw new InstallError(
			`Failed to install new binary at ${targetPath}: ${errorMessage(installError)}. ` +
				`Restored the previous binary from ${backupPath}.`,
			"rolled-back",
			targetPath,
			backupPath,
			{ cause: installError },
		)
	}

	private fail(installError: unknown, restoreError: unknown): never {
		const { targetPath, backupPath } = this.transaction
		this.transition("failed")

		const restoreCommand =
			this.strategy === "rename"
				? `move /Y "${backupPath}" "${targetPath}"`
				: `cp "${backupPath}" "${targetPath}"`

		throw new InstallError(
			[
				"Update failed and the previous binary could not be restored automatically.",
				`  target: ${targetPath}`,
				`  backup: ${backupPath}`,
				"Restore it manually with:",
				`  ${restoreCommand}`,
				`Install error: ${errorMessage(installError)}`,
				`Restore error: ${errorMessage(restoreError)}`,
			].join("\n"),
			"failed",
			targetPath,
			backupPath,
			{ cause: restoreError },
		)
	}
}
