import { rename, symlink, unlink } from "node:fs/promises"
import { errnoCode } from "../utils/errors.js"
import { logger } from "../utils/logger.js"

/**
 * Swap a symlink to point to a new target.
 * Uses temp symlink + rename: rename replaces an existing link (dangling or
 * not) without following it, so there is never a moment with no link.
 *
 * @param target - New symlink target (relative or absolute path)
 * @param linkPath - Path where symlink should exist
 */
export async function atomicSymlink(target: string, linkPath: string): Promise<void> {
	const tempLink = `${linkPath}.tmp.${process.pid}`
	try {
		// Leftover from a crashed run with the same pid
		await unlinkIfPresent(tempLink)
		await symlink(target, tempLink)
		await rename(tempLink, linkPath)
	} catch (error) {
		try {
			await unlinkIfPresent(tempLink)
		} catch (cleanupError) {
			logger.debug(`Could not remove ${tempLink}:`, cleanupError)
		}
		throw error
	}
}

async function unlinkIfPresent(filePath: string): Promise<void> {
	try {
		await unlink(filePath)
	} catch (error) {
		if (errnoCode(error) === "ENOENT") {
			return
		}
		throw error
	}
}
