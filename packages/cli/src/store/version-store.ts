import { mkdir, readdir, readlink, rm, stat } from "node:fs/promises"
import path from "node:path"
import type { SuivmConfig } from "../config/index.js"
import { errnoCode, InvalidStateError, NoActiveVersionError, toIoError } from "../utils/errors.js"
import { logger } from "../utils/logger.js"
import { atomicSymlink } from "./atomic.js"
import {
	assertVersionId,
	getCurrentLink,
	getCurrentLinkTarget,
	getVersionDir,
	getVersionsDir,
} from "./paths.js"

/**
 * Installed versions and the active pointer.
 * Directory existence under versions/ is the only "installed" signal and the
 * `current` link is the only "active" signal; there is no manifest.
 */
export interface VersionStore {
	readonly baseDir: string

	/** Create the base directory and versions/ if missing */
	ensureLayout(): Promise<void>

	/** Names of the directories directly under versions/ */
	listInstalled(): Promise<Set<string>>

	/**
	 * Version the `current` link points at.
	 * @throws NoActiveVersionError if there is no link
	 * @throws InvalidStateError if the link's last segment is not a version name
	 */
	getActiveVersion(): Promise<string>

	isInstalled(version: string): Promise<boolean>

	/** Absolute path of versions/<version> */
	versionDir(version: string): string

	/** mkdir -p versions/<version>; an existing directory is kept as is */
	createVersionDir(version: string): Promise<string>

	/** rm -r versions/<version>; leaves `current` alone */
	removeVersionDir(version: string): Promise<void>

	/** Replace `current` with a link to versions/<version> */
	pointActiveAt(version: string): Promise<void>

	/** First binary candidate present in versions/<version>, or null */
	findBinary(version: string): Promise<string | null>
}

/**
 * VersionStore backed by the real filesystem.
 */
export class FileVersionStore implements VersionStore {
	private constructor(
		readonly baseDir: string,
		private readonly binaryCandidates: readonly string[],
	) {}

	static create(config: Pick<SuivmConfig, "baseDir" | "binaryCandidates">): FileVersionStore {
		return new FileVersionStore(config.baseDir, config.binaryCandidates)
	}

	async ensureLayout(): Promise<void> {
		try {
			await mkdir(getVersionsDir(this.baseDir), { recursive: true })
		} catch (error) {
			throw toIoError(error, `create ${getVersionsDir(this.baseDir)}`)
		}
	}

	async listInstalled(): Promise<Set<string>> {
		const versionsDir = getVersionsDir(this.baseDir)
		try {
			const entries = await readdir(versionsDir, { withFileTypes: true })
			return new Set(entries.filter((e) => e.isDirectory()).map((e) => e.name))
		} catch (error) {
			if (errnoCode(error) === "ENOENT") {
				return new Set()
			}
			throw toIoError(error, `read ${versionsDir}`)
		}
	}

	async getActiveVersion(): Promise<string> {
		const linkPath = getCurrentLink(this.baseDir)

		let target: Buffer
		try {
			target = await readlink(linkPath, { encoding: "buffer" })
		} catch (error) {
			if (errnoCode(error) === "ENOENT") {
				throw new NoActiveVersionError()
			}
			throw toIoError(error, `read link ${linkPath}`)
		}

		return decodeFinalSegment(target)
	}

	async isInstalled(version: string): Promise<boolean> {
		assertVersionId(version)
		const dir = this.versionDir(version)
		try {
			const stats = await stat(dir)
			return stats.isDirectory()
		} catch (error) {
			const code = errnoCode(error)
			if (code === "ENOENT" || code === "ENOTDIR") {
				return false
			}
			throw toIoError(error, `inspect ${dir}`)
		}
	}

	versionDir(version: string): string {
		return getVersionDir(this.baseDir, version)
	}

	async createVersionDir(version: string): Promise<string> {
		assertVersionId(version)
		const dir = this.versionDir(version)
		try {
			await mkdir(dir, { recursive: true })
		} catch (error) {
			throw toIoError(error, `create ${dir}`)
		}
		return dir
	}

	async removeVersionDir(version: string): Promise<void> {
		assertVersionId(version)
		const dir = this.versionDir(version)
		try {
			await rm(dir, { recursive: true })
		} catch (error) {
			throw toIoError(error, `remove ${dir}`)
		}
		logger.debug(`Removed ${dir}`)
	}

	async pointActiveAt(version: string): Promise<void> {
		assertVersionId(version)
		const linkPath = getCurrentLink(this.baseDir)
		try {
			await atomicSymlink(getCurrentLinkTarget(version), linkPath)
		} catch (error) {
			throw toIoError(error, `update ${linkPath}`)
		}
		logger.debug(`${linkPath} -> ${getCurrentLinkTarget(version)}`)
	}

	async findBinary(version: string): Promise<string | null> {
		assertVersionId(version)
		const dir = this.versionDir(version)
		for (const candidate of this.binaryCandidates) {
			const binaryPath = path.join(dir, candidate)
			try {
				const stats = await stat(binaryPath)
				if (stats.isFile()) {
					return binaryPath
				}
			} catch (error) {
				const code = errnoCode(error)
				if (code !== "ENOENT" && code !== "ENOTDIR") {
					throw toIoError(error, `inspect ${binaryPath}`)
				}
			}
		}
		return null
	}
}

/**
 * Active version, or null when no `current` link exists.
 * Other failures (unreadable or corrupt link) propagate.
 */
export async function getActiveVersionOrNull(store: VersionStore): Promise<string | null> {
	try {
		return await store.getActiveVersion()
	} catch (error) {
		if (error instanceof NoActiveVersionError) {
			return null
		}
		throw error
	}
}

// =============================================================================
// LINK DECODING
// =============================================================================

const SLASH = 0x2f
const utf8 = new TextDecoder("utf-8", { fatal: true })

/**
 * Take the last path segment of a raw link target and decode it as UTF-8.
 * @throws InvalidStateError if the segment is empty or not valid UTF-8
 */
export function decodeFinalSegment(target: Uint8Array): string {
	let end = target.length
	while (end > 0 && target[end - 1] === SLASH) {
		end--
	}
	const start = target.lastIndexOf(SLASH, end - 1) + 1
	const segment = target.subarray(start, end)

	let name: string
	try {
		name = utf8.decode(segment)
	} catch {
		throw new InvalidStateError("Invalid version link: target is not valid UTF-8")
	}

	if (name === "" || name === "." || name === "..") {
		throw new InvalidStateError("Invalid version link: target names no version")
	}
	return name
}
