import { describe, expect, it } from "vitest"
import {
	currentPlatform,
	resolvePlatformArtifact,
	selectInstallStrategy,
	SUPPORTED_PLATFORMS,
	toPlatformTarget,
} from "../../src/self-update/platform.js"
import { UnsupportedPlatformError } from "../../src/utils/errors.js"

// =============================================================================
// resolvePlatformArtifact
// =============================================================================

describe("resolvePlatformArtifact", () => {
	const matrix: Array<[string, string, string]> = [
		["linux", "amd64", "branchd-linux-amd64"],
		["linux", "arm64", "branchd-linux-arm64"],
		["darwin", "amd64", "branchd-darwin-amd64"],
		["darwin", "arm64", "branchd-darwin-arm64"],
		["windows", "amd64", "branchd-windows-amd64.exe"],
	]

	for (const [os, arch, expected] of matrix) {
		it(`resolves ${os}/${arch} to ${expected}`, () => {
			expect(resolvePlatformArtifact(os, arch)).toBe(expected)
		})
	}

	const unsupported: Array<[string, string]> = [
		["windows", "arm64"],
		["linux", "386"],
		["freebsd", "amd64"],
		["linux", "x64"],
		["", ""],
	]

	for (const [os, arch] of unsupported) {
		it(`rejects ${os || "(empty)"}/${arch || "(empty)"}`, () => {
			expect(() => resolvePlatformArtifact(os, arch)).toThrow(UnsupportedPlatformError)
		})
	}

	it("names the platform and the supported matrix in the error", () => {
		expect(() => resolvePlatformArtifact("freebsd", "riscv64")).toThrow(
			"Unsupported platform: freebsd/riscv64\nSupported platforms: linux/amd64, linux/arm64, darwin/amd64, darwin/arm64, windows/amd64",
		)
	})

	it("exposes exactly five supported pairs", () => {
		expect(SUPPORTED_PLATFORMS).toHaveLength(5)
	})
})

// =============================================================================
// toPlatformTarget
// =============================================================================

describe("toPlatformTarget", () => {
	it("maps Node names onto release names", () => {
		expect(toPlatformTarget("win32", "x64")).toEqual({ os: "windows", arch: "amd64" })
		expect(toPlatformTarget("darwin", "arm64")).toEqual({ os: "darwin", arch: "arm64" })
		expect(toPlatformTarget("linux", "x64")).toEqual({ os: "linux", arch: "amd64" })
	})

	it("passes unknown values through unchanged", () => {
		expect(toPlatformTarget("aix", "ppc64")).toEqual({ os: "aix", arch: "ppc64" })
	})

	it("describes the running process", () => {
		expect(currentPlatform()).toEqual(toPlatformTarget(process.platform, process.arch))
	})
})

// =============================================================================
// selectInstallStrategy
// =============================================================================

describe("selectInstallStrategy", () => {
	it("renames on windows", () => {
		expect(selectInstallStrategy("windows")).toBe("rename")
	})

	it("copies everywhere else", () => {
		expect(selectInstallStrategy("linux")).toBe("copy")
		expect(selectInstallStrategy("darwin")).toBe("copy")
	})
})
