/**
 * Process environment checks.
 *
 * Output decisions (spinners, colour, stack traces) and the passive update
 * check all read the environment through here. Checks take the environment
 * as a parameter; the exported constants are their values for this process.
 */

/** Variables set by the CI providers we know of */
const CI_VARIABLES = ["CI", "GITHUB_ACTIONS", "GITLAB_CI", "CIRCLECI", "JENKINS_URL", "BUILDKITE"] as const

const TRUTHY = new Set(["true", "1", "yes", "on"])
const FALSY = new Set(["false", "0", "no", "off"])

/**
 * Read a boolean flag from an environment value.
 * "true/1/yes/on" and "false/0/no/off" in any case; anything else yields `defaultValue`.
 *
 * @example
 * parseEnvBool(process.env.BRANCHD_NO_UPDATE_CHECK, false)
 */
export function parseEnvBool(value: string | undefined, defaultValue: boolean): boolean {
	const normalized = value?.trim().toLowerCase()
	if (!normalized) return defaultValue
	if (TRUTHY.has(normalized)) return true
	if (FALSY.has(normalized)) return false
	return defaultValue
}

export function detectCI(env: NodeJS.ProcessEnv = process.env): boolean {
	return CI_VARIABLES.some((name) => Boolean(env[name]))
}

/** NO_COLOR wins over everything; FORCE_COLOR=0 also disables */
export function colorEnabled(env: NodeJS.ProcessEnv, interactive: boolean): boolean {
	if (env.NO_COLOR !== undefined || env.FORCE_COLOR === "0") return false
	return interactive
}

/**
 * `DEBUG` turns on causes and stack traces in error output.
 * Any value other than an explicit "off" spelling enables it (`DEBUG=*` included).
 */
export function isDebug(env: NodeJS.ProcessEnv = process.env): boolean {
	return Boolean(env.DEBUG) && parseEnvBool(env.DEBUG, true)
}

export const isCI = detectCI()

/** Interactive terminal, never in CI */
export const isTTY = Boolean(process.stdout.isTTY) && !isCI

export const supportsColor = colorEnabled(process.env, isTTY)
