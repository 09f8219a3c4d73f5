/**
 * Activator
 *
 * Moves the active pointer and removes installed versions, checking the
 * store before each change.
 */

import path from "node:path"
import { getActiveVersionOrNull, type VersionStore } from "../store/version-store.js"
import {
	ActiveVersionConflictError,
	BinaryMissingError,
	NotInstalledError,
} from "../utils/errors.js"
import { logger } from "../utils/logger.js"

export interface ActivatorDeps {
	store: VersionStore
	/** Relative paths tried, in order, when looking for the binary */
	binaryCandidates: readonly string[]
}

export class Activator {
	constructor(private readonly deps: ActivatorDeps) {}

	/**
	 * Point `current` at versions/<version>.
	 *
	 * The link is replaced before the binary is looked up, so a
	 * BinaryMissingError leaves `current` already moved to the new version.
	 *
	 * @throws NotInstalledError
	 * @throws BinaryMissingError
	 */
	async setActive(version: string): Promise<string> {
		const { store } = this.deps

		if (!(await store.isInstalled(version))) {
			throw new NotInstalledError(version)
		}

		await store.pointActiveAt(version)

		const binary = await store.findBinary(version)
		if (!binary) {
			const expected = this.deps.binaryCandidates[0] ?? "sui"
			throw new BinaryMissingError(path.join(store.versionDir(version), expected))
		}

		logger.debug(`Active binary: ${binary}`)
		return binary
	}

	/**
	 * Delete versions/<version>. The active version cannot be removed; with no
	 * active version set the check is skipped. `current` is never touched.
	 *
	 * @throws NotInstalledError
	 * @throws ActiveVersionConflictError
	 */
	async uninstall(version: string): Promise<void> {
		const { store } = this.deps

		if (!(await store.isInstalled(version))) {
			throw new NotInstalledError(version)
		}

		const active = await getActiveVersionOrNull(store)
		if (active === version) {
			throw new ActiveVersionConflictError(version)
		}

		await store.removeVersionDir(version)
	}
}
