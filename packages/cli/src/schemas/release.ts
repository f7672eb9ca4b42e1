/**
 * Release Schemas
 *
 * Zod schemas for the release registry payload and the environment overrides
 * of the self-update subsystem. Parsed once at the boundary, trusted afterwards.
 */

import { z } from "zod"

/**
 * Latest-release payload from the registry.
 * Only the fields the updater reads are declared; extra fields pass through untouched.
 */
export const releaseResponseSchema = z.object({
	tag_name: z.string().trim().min(1, "tag_name must not be empty"),
	name: z.string().nullable().optional(),
	html_url: z.string(),
})

export type ReleaseResponse = z.infer<typeof releaseResponseSchema>

/** A SHA-256 digest in hex, any case */
export const sha256HexSchema = z
	.string()
	.regex(/^[a-fA-F0-9]{64}$/, "Expected a 64-character hex SHA-256 digest")

/** Environment variables that override self-update behaviour */
export const selfUpdateEnvSchema = z.object({
	BRANCHD_RELEASES_API_URL: z.string().url().optional(),
	BRANCHD_DOWNLOAD_URL: z.string().url().optional(),
	BRANCHD_NO_UPDATE_CHECK: z.string().optional(),
})

export type SelfUpdateEnv = z.infer<typeof selfUpdateEnvSchema>

/** The one field read from the CLI's own package.json */
export const packageManifestSchema = z.object({
	version: z.string().trim().min(1),
})
