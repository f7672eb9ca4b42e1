/**
 * Console logger for the branchd CLI.
 *
 * `--quiet` and `--json` silence everything except errors; `--verbose` adds
 * debug lines. Each line starts with a coloured label.
 */

import kleur from "kleur"
import { supportsColor } from "./env.js"

kleur.enabled = supportsColor

export interface LoggerOptions {
	quiet?: boolean
	verbose?: boolean
}

let mode: LoggerOptions = {}

/** Set once per invocation from the parsed root and command options */
export function setLoggerOptions(opts: LoggerOptions): void {
	mode = { ...opts }
}

type Level = "info" | "warn" | "error" | "debug"

const LABELS: Record<Level, () => string> = {
	info: () => kleur.blue("info"),
	warn: () => kleur.yellow("warn"),
	error: () => kleur.red("error"),
	debug: () => kleur.gray("debug"),
}

function enabled(level: Level): boolean {
	switch (level) {
		case "error":
			return true
		case "debug":
			return mode.verbose === true
		default:
			return mode.quiet !== true
	}
}

function write(level: Level, args: unknown[]): void {
	if (!enabled(level)) return
	// stdout stays for results; warnings and errors go to stderr
	const sink = level === "warn" || level === "error" ? console.error : console.log
	sink(LABELS[level](), ...args)
}

export const logger = {
	info: (...args: unknown[]): void => write("info", args),
	warn: (...args: unknown[]): void => write("warn", args),
	error: (...args: unknown[]): void => write("error", args),
	debug: (...args: unknown[]): void => write("debug", args),
}
