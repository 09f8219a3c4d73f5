/**
 * Installer
 *
 * install(version) is an ordered list of fallible steps with no rollback:
 *
 *   1. fetch catalog          fails with VersionNotFound, nothing on disk
 *   2. select asset           fails with NoCompatibleAsset, nothing on disk
 *   3. create versions/<v>    idempotent
 *   4. download archive       into versions/<v>/<asset name>
 *   5. extract                into versions/<v>
 *   6. delete archive
 *   7. print shell guidance   never fails the install
 *
 * A failure in steps 3-6 leaves versions/<v> as it was at that moment.
 * Installing again overwrites it; uninstall removes it.
 */

import { unlink } from "node:fs/promises"
import path from "node:path"
import type { ReleaseCatalog } from "../catalog/client.js"
import type { Asset } from "../catalog/schema.js"
import type { TargetTriple } from "../config/index.js"
import { printShellGuidance } from "../shell/config.js"
import { assertVersionId } from "../store/paths.js"
import type { VersionStore } from "../store/version-store.js"
import { NoCompatibleAssetError, toIoError, VersionNotFoundError } from "../utils/errors.js"
import { highlight, logger } from "../utils/logger.js"
import { streamToFile } from "./download.js"
import { type ArchiveExtractor, TarGzExtractor } from "./extract.js"
import { type ProgressReporter, silentProgress } from "./progress.js"
import { findRelease, selectAsset } from "./select-asset.js"

export interface InstallerDeps {
	catalog: ReleaseCatalog
	store: VersionStore
	target: TargetTriple
	extractor?: ArchiveExtractor
	/** Called after a successful install; defaults to printing shell guidance */
	onInstalled?: (version: string) => void
}

export interface InstallOptions {
	progress?: ProgressReporter
}

export interface InstallResult {
	version: string
	asset: Asset
	versionDir: string
	bytes: number
}

export class Installer {
	private readonly extractor: ArchiveExtractor
	private readonly onInstalled: (version: string) => void

	constructor(private readonly deps: InstallerDeps) {
		this.extractor = deps.extractor ?? new TarGzExtractor()
		this.onInstalled = deps.onInstalled ?? (() => printShellGuidance(deps.store.baseDir))
	}

	async install(version: string, options: InstallOptions = {}): Promise<InstallResult> {
		assertVersionId(version)
		const { catalog, store, target } = this.deps
		const progress = options.progress ?? silentProgress

		// 1-2. Resolve the asset before touching the filesystem
		const releases = await catalog.fetchReleases()
		const release = findRelease(releases, version)
		if (!release) {
			throw new VersionNotFoundError(version)
		}
		const asset = selectAsset(release, target)
		if (!asset) {
			throw new NoCompatibleAssetError(version)
		}

		// 3. Target directory
		await store.ensureLayout()
		const versionDir = await store.createVersionDir(version)
		// Asset names come from the network; keep the archive inside versionDir
		const archivePath = path.join(versionDir, path.basename(asset.name))

		// 4. Download
		logger.info(`Downloading: ${highlight.version(asset.name)}`)
		const bytes = await this.download(asset, archivePath, progress)

		// 5. Extract
		logger.info("Extracting files...")
		await this.extractor.extract(archivePath, versionDir)

		// 6. Cleanup
		try {
			await unlink(archivePath)
		} catch (error) {
			throw toIoError(error, `remove ${archivePath}`)
		}

		logger.success("Installation completed successfully!")

		// 7. Guidance
		try {
			this.onInstalled(version)
		} catch (error) {
			logger.warn("Could not print shell guidance:", error)
		}

		return { version, asset, versionDir, bytes }
	}

	private async download(
		asset: Asset,
		archivePath: string,
		progress: ProgressReporter,
	): Promise<number> {
		const stream = await this.deps.catalog.openAsset(asset)
		progress.start(`Downloading ${asset.name}`, stream.totalBytes)
		try {
			const bytes = await streamToFile(stream, archivePath, (p) => progress.update(p))
			progress.succeed("Download completed")
			return bytes
		} catch (error) {
			progress.fail("Download failed")
			throw error
		}
	}
}
