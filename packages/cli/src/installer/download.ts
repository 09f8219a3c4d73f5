/**
 * Stream an asset body to disk.
 *
 * One sequential pipeline: read a chunk, append it, report progress.
 * Read failures are network errors, write failures are I/O errors.
 */

import { type FileHandle, open } from "node:fs/promises"
import type { AssetStream } from "../catalog/client.js"
import { NetworkError, toIoError } from "../utils/errors.js"
import { logger } from "../utils/logger.js"
import type { DownloadProgress } from "./progress.js"

/**
 * Write the whole stream to `destPath`, truncating any existing file.
 *
 * @returns Number of bytes written
 * @throws NetworkError if the stream fails mid-transfer
 * @throws IoError if the file cannot be opened or written
 */
export async function streamToFile(
	stream: AssetStream,
	destPath: string,
	onProgress?: (progress: DownloadProgress) => void,
): Promise<number> {
	let file: FileHandle
	try {
		file = await open(destPath, "w")
	} catch (error) {
		throw toIoError(error, `open ${destPath}`)
	}

	const reader = stream.body.getReader()
	let transferred = 0

	try {
		while (true) {
			const chunk = await reader.read().catch((error: unknown) => {
				const message = error instanceof Error ? error.message : String(error)
				throw new NetworkError(`Download interrupted after ${transferred} bytes: ${message}`)
			})
			if (chunk.done) break

			try {
				await file.write(chunk.value)
			} catch (error) {
				// Nothing left to write to; stop the transfer
				await reader.cancel().catch((cancelError: unknown) => {
					logger.debug("Could not cancel download:", cancelError)
				})
				throw toIoError(error, `write ${destPath}`)
			}

			transferred += chunk.value.byteLength
			onProgress?.({ transferred, total: stream.totalBytes })
		}
	} catch (error) {
		reader.releaseLock()
		await file.close().catch((closeError: unknown) => {
			logger.debug(`Could not close ${destPath}:`, closeError)
		})
		throw error
	}

	reader.releaseLock()
	try {
		await file.close()
	} catch (error) {
		throw toIoError(error, `close ${destPath}`)
	}

	if (stream.totalBytes > 0 && transferred < stream.totalBytes) {
		throw new NetworkError(
			`Download ended early: got ${transferred} of ${stream.totalBytes} bytes`,
		)
	}
	return transferred
}
