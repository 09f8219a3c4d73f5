/**
 * Archive extraction for release tarballs.
 */

import * as tar from "tar"
import { errnoCode, ExtractError } from "../utils/errors.js"

export interface ArchiveExtractor {
	/**
	 * Extract an archive into an existing directory.
	 *
	 * @throws ExtractError on extraction failure
	 */
	extract(archivePath: string, destDir: string): Promise<void>
}

/**
 * Extractor for .tgz / .tar.gz archives using the `tar` package.
 * Keeps the archive's tree and mode bits; entries that would land outside
 * destDir are stripped by tar itself.
 */
export class TarGzExtractor implements ArchiveExtractor {
	async extract(archivePath: string, destDir: string): Promise<void> {
		try {
			await tar.extract({
				file: archivePath,
				cwd: destDir,
				strict: true,
				preserveOwner: false,
			})
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error)
			const code = errnoCode(error)
			if (code === "EACCES" || code === "EPERM") {
				throw new ExtractError(`Permission denied extracting to ${destDir}: ${message}`, code)
			}
			if (message.includes("TAR") || message.includes("zlib") || message.includes("unexpected end")) {
				throw new ExtractError(`Invalid or corrupt archive at ${archivePath}: ${message}`, code)
			}
			throw new ExtractError(`Failed to extract ${archivePath}: ${message}`, code)
		}
	}
}
