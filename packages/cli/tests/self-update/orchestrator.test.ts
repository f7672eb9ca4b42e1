import {
	chmodSync,
	existsSync,
	lstatSync,
	readdirSync,
	readFileSync,
	realpathSync,
	statSync,
	symlinkSync,
	writeFileSync,
} from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { runSelfUpdate, type SelfUpdateOptions } from "../../src/self-update/orchestrator.js"
import { hashContent } from "../../src/self-update/verify.js"
import {
	ChecksumMismatchError,
	DownloadError,
	NetworkError,
	SelfUpdateError,
	UnsupportedPlatformError,
} from "../../src/utils/errors.js"
import {
	cleanupTempDir,
	createFakeFetch,
	createTempDir,
	DOWNLOAD_BASE,
	type FakeRoute,
	failingStream,
	RELEASES_URL,
	releaseRoute,
	TEST_CONFIG,
	timeoutError,
} from "../helpers.js"

const NEW_BINARY = "new-binary"
const OLD_BINARY = "old-binary"
const ARTIFACT_URL = `${DOWNLOAD_BASE}/v1.1.0/branchd-linux-amd64`
const CHECKSUM_URL = `${ARTIFACT_URL}.sha256`

function releaseRoutes(overrides: Record<string, FakeRoute> = {}): Record<string, FakeRoute> {
	return {
		[RELEASES_URL]: releaseRoute("v1.1.0"),
		[ARTIFACT_URL]: { body: NEW_BINARY },
		[CHECKSUM_URL]: { body: `${hashContent(NEW_BINARY)}  branchd-linux-amd64\n` },
		...overrides,
	}
}

function downloadDirs(): string[] {
	return readdirSync(tmpdir()).filter((name) => name.startsWith("branchd-update-"))
}

describe("runSelfUpdate", () => {
	let dir: string
	let executable: string
	let before: string[]

	beforeEach(async () => {
		dir = await createTempDir("orchestrator")
		executable = join(dir, "branchd")
		writeFileSync(executable, OLD_BINARY)
		chmodSync(executable, 0o755)
		before = downloadDirs()
	})

	afterEach(async () => {
		await cleanupTempDir(dir)
	})

	function options(overrides: Partial<SelfUpdateOptions> = {}): SelfUpdateOptions {
		return {
			currentVersion: "v1.0.0",
			quiet: true,
			config: TEST_CONFIG,
			platform: { os: "linux", arch: "amd64" },
			executablePath: executable,
			strategy: "copy",
			...overrides,
		}
	}

	// ===========================================================================
	// up to date
	// ===========================================================================

	it("stops after the version check when already current", async () => {
		const fetch = createFakeFetch({ [RELEASES_URL]: releaseRoute("v1.0.0") })

		const outcome = await runSelfUpdate(options({ currentVersion: "1.0.0", fetch }))

		expect(outcome).toEqual({
			status: "up-to-date",
			current: "1.0.0",
			release: {
				tag: "v1.0.0",
				displayName: "Release v1.0.0",
				releaseUrl: "https://github.test/branchd/releases/tag/v1.0.0",
			},
		})
		expect(fetch).toHaveBeenCalledTimes(1)
		expect(fetch.mock.calls[0]?.[0]).toBe(RELEASES_URL)
		expect(readFileSync(executable, "utf-8")).toBe(OLD_BINARY)
	})

	// ===========================================================================
	// updates
	// ===========================================================================

	it("downloads, verifies and installs a newer release", async () => {
		const fetch = createFakeFetch(releaseRoutes())
		const target = realpathSync(executable)

		const outcome = await runSelfUpdate(options({ fetch }))

		expect(outcome).toMatchObject({
			status: "updated",
			from: "v1.0.0",
			to: "v1.1.0",
			strategy: "copy",
			targetPath: target,
			backupPath: `${target}.backup`,
			backupRetained: false,
		})
		expect(fetch.mock.calls.map((call) => call[0])).toEqual([RELEASES_URL, ARTIFACT_URL, CHECKSUM_URL])
		expect(readFileSync(executable, "utf-8")).toBe(NEW_BINARY)
		expect(statSync(executable).mode & 0o777).toBe(0o755)
		expect(existsSync(`${target}.backup`)).toBe(false)
		expect(downloadDirs()).toEqual(before)
	})

	it("keeps the old binary with the rename strategy", async () => {
		const fetch = createFakeFetch(releaseRoutes())
		const target = realpathSync(executable)

		const outcome = await runSelfUpdate(options({ fetch, strategy: "rename" }))

		expect(outcome).toMatchObject({
			status: "updated",
			strategy: "rename",
			backupPath: `${target}.old`,
			backupRetained: true,
		})
		expect(readFileSync(executable, "utf-8")).toBe(NEW_BINARY)
		expect(readFileSync(`${target}.old`, "utf-8")).toBe(OLD_BINARY)
		expect(downloadDirs()).toEqual(before)
	})

	it("reinstalls the current release with force", async () => {
		const fetch = createFakeFetch(releaseRoutes())

		const outcome = await runSelfUpdate(options({ currentVersion: "v1.1.0", force: true, fetch }))

		expect(outcome.status).toBe("updated")
		expect(readFileSync(executable, "utf-8")).toBe(NEW_BINARY)
	})

	it("updates a dev build even when the tags match", async () => {
		const fetch = createFakeFetch(releaseRoutes())

		const outcome = await runSelfUpdate(options({ currentVersion: "dev", fetch }))

		expect(outcome).toMatchObject({ status: "updated", from: "dev", to: "v1.1.0" })
	})

	it("replaces the file a symlink points at, not the link", async () => {
		const fetch = createFakeFetch(releaseRoutes())
		const link = join(dir, "branchd-link")
		symlinkSync(executable, link)

		await runSelfUpdate(options({ fetch, executablePath: link }))

		expect(lstatSync(link).isSymbolicLink()).toBe(true)
		expect(readFileSync(executable, "utf-8")).toBe(NEW_BINARY)
	})

	// ===========================================================================
	// failures
	// ===========================================================================

	it("discards a download whose checksum does not match", async () => {
		const fetch = createFakeFetch(
			releaseRoutes({
				[CHECKSUM_URL]: { body: `${hashContent("something-else")}  branchd-linux-amd64\n` },
			}),
		)

		const error = await runSelfUpdate(options({ fetch })).catch((e: unknown) => e)

		expect(error).toBeInstanceOf(ChecksumMismatchError)
		if (error instanceof ChecksumMismatchError) {
			expect(error.expected).toBe(hashContent("something-else"))
			expect(error.actual).toBe(hashContent(NEW_BINARY))
			expect(error.artifact).toBe(ARTIFACT_URL)
		}
		expect(readFileSync(executable, "utf-8")).toBe(OLD_BINARY)
		expect(existsSync(`${executable}.backup`)).toBe(false)
		expect(downloadDirs()).toEqual(before)
	})

	it("reports a stalled checksum manifest as a network timeout", async () => {
		const fetch = createFakeFetch(releaseRoutes({ [CHECKSUM_URL]: { body: failingStream(timeoutError()) } }))

		const error = await runSelfUpdate(options({ fetch })).catch((e: unknown) => e)

		expect(error).toBeInstanceOf(NetworkError)
		if (error instanceof NetworkError) {
			expect(error.timedOut).toBe(true)
			expect(error.exitCode).toBe(69)
		}
		expect(readFileSync(executable, "utf-8")).toBe(OLD_BINARY)
		expect(downloadDirs()).toEqual(before)
	})

	it("rejects an unsupported platform before downloading", async () => {
		const fetch = createFakeFetch(releaseRoutes())

		await expect(
			runSelfUpdate(options({ fetch, platform: { os: "linux", arch: "386" } })),
		).rejects.toBeInstanceOf(UnsupportedPlatformError)
		expect(fetch).toHaveBeenCalledTimes(1)
	})

	it("leaves the binary alone when the artifact is missing", async () => {
		const fetch = createFakeFetch(releaseRoutes({ [ARTIFACT_URL]: { status: 404, body: "missing" } }))

		await expect(runSelfUpdate(options({ fetch }))).rejects.toBeInstanceOf(DownloadError)
		expect(readFileSync(executable, "utf-8")).toBe(OLD_BINARY)
		expect(downloadDirs()).toEqual(before)
	})

	it("refuses to replace the node interpreter", async () => {
		const fetch = createFakeFetch(releaseRoutes())

		await expect(
			runSelfUpdate(options({ fetch, executablePath: "/usr/local/bin/node" })),
		).rejects.toBeInstanceOf(SelfUpdateError)
		expect(fetch).not.toHaveBeenCalled()
	})

	it("wraps unexpected errors with the failing stage", async () => {
		const fetch = createFakeFetch(releaseRoutes())

		await expect(
			runSelfUpdate(
				options({
					fetch,
					fileOps: {
						exists: () => {
							throw new Error("disk vanished")
						},
						copyFile: () => {},
						rename: () => {},
						remove: () => {},
						getMode: () => 0o755,
						setMode: () => {},
					},
				}),
			),
		).rejects.toThrow("Self-update failed during install: disk vanished")
		expect(readFileSync(executable, "utf-8")).toBe(OLD_BINARY)
	})
})
