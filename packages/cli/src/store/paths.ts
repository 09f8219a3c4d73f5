import path from "node:path"
import { z } from "zod"
import { CURRENT_LINK_NAME, VERSIONS_DIR_NAME } from "../constants.js"
import { ValidationError } from "../utils/errors.js"

// =============================================================================
// VERSION IDENTIFIERS
// =============================================================================

/**
 * Version identifiers are opaque, but each one names a directory, so it must
 * be a single path segment.
 */
export const versionIdSchema = z
	.string()
	.min(1, "Version is required")
	.refine((val) => !val.includes("\0"), "Version cannot contain null bytes")
	.refine((val) => !/[/\\]/.test(val), "Version cannot contain path separators")
	.refine((val) => val !== "." && val !== "..", "Version cannot be '.' or '..'")

/**
 * @throws ValidationError if the version cannot name a directory
 */
export function assertVersionId(version: string): void {
	const result = versionIdSchema.safeParse(version)
	if (!result.success) {
		throw new ValidationError(
			`Invalid version "${version}": ${result.error.issues[0]?.message ?? "invalid"}`,
		)
	}
}

// =============================================================================
// LAYOUT HELPERS
// =============================================================================

/**
 * @returns <baseDir>/versions
 */
export function getVersionsDir(baseDir: string): string {
	return path.join(baseDir, VERSIONS_DIR_NAME)
}

/**
 * @returns <baseDir>/versions/<version>
 */
export function getVersionDir(baseDir: string, version: string): string {
	return path.join(getVersionsDir(baseDir), version)
}

/**
 * @returns <baseDir>/current
 */
export function getCurrentLink(baseDir: string): string {
	return path.join(baseDir, CURRENT_LINK_NAME)
}

/**
 * Link target written into `current`. Relative, so the base directory can move.
 */
export function getCurrentLinkTarget(version: string): string {
	return path.join(VERSIONS_DIR_NAME, version)
}

/**
 * @returns <baseDir>/current/bin, the directory shells put on PATH
 */
export function getActiveBinDir(baseDir: string): string {
	return path.join(getCurrentLink(baseDir), "bin")
}
