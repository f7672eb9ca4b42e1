/**
 * Environment check tests.
 */

import { describe, expect, it } from "vitest"
import { colorEnabled, detectCI, isDebug, parseEnvBool } from "../../src/utils/env.js"

// =============================================================================
// parseEnvBool
// =============================================================================

describe("parseEnvBool", () => {
	for (const value of ["true", "TRUE", "1", "yes", "On", "  true  "]) {
		it(`reads '${value}' as true`, () => {
			expect(parseEnvBool(value, false)).toBe(true)
		})
	}

	for (const value of ["false", "FaLsE", "0", "no", "OFF", "\toff\n"]) {
		it(`reads '${value}' as false`, () => {
			expect(parseEnvBool(value, true)).toBe(false)
		})
	}

	it("falls back to the default when unset or blank", () => {
		expect(parseEnvBool(undefined, true)).toBe(true)
		expect(parseEnvBool("", false)).toBe(false)
		expect(parseEnvBool("   ", true)).toBe(true)
	})

	it("falls back to the default for unknown words", () => {
		expect(parseEnvBool("maybe", true)).toBe(true)
		expect(parseEnvBool("12345", false)).toBe(false)
	})
})

// =============================================================================
// detectCI
// =============================================================================

describe("detectCI", () => {
	it("is false with no provider variables", () => {
		expect(detectCI({})).toBe(false)
	})

	it("recognises provider variables", () => {
		expect(detectCI({ GITHUB_ACTIONS: "true" })).toBe(true)
		expect(detectCI({ BUILDKITE: "1" })).toBe(true)
	})

	it("ignores empty values", () => {
		expect(detectCI({ CI: "" })).toBe(false)
	})
})

// =============================================================================
// colorEnabled
// =============================================================================

describe("colorEnabled", () => {
	it("follows the terminal by default", () => {
		expect(colorEnabled({}, true)).toBe(true)
		expect(colorEnabled({}, false)).toBe(false)
	})

	it("is disabled by NO_COLOR even when empty", () => {
		expect(colorEnabled({ NO_COLOR: "" }, true)).toBe(false)
	})

	it("is disabled by FORCE_COLOR=0", () => {
		expect(colorEnabled({ FORCE_COLOR: "0" }, true)).toBe(false)
	})
})

// =============================================================================
// isDebug
// =============================================================================

describe("isDebug", () => {
	it("is off when DEBUG is unset or empty", () => {
		expect(isDebug({})).toBe(false)
		expect(isDebug({ DEBUG: "" })).toBe(false)
	})

	it("is on for flags and patterns", () => {
		expect(isDebug({ DEBUG: "1" })).toBe(true)
		expect(isDebug({ DEBUG: "*" })).toBe(true)
	})

	it("honours an explicit off", () => {
		expect(isDebug({ DEBUG: "false" })).toBe(false)
		expect(isDebug({ DEBUG: "0" })).toBe(false)
	})
})
