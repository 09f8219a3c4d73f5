/**
 * Per-invocation wiring of config, store, catalog and the core operations.
 */

import { Activator } from "./activator/activator.js"
import { type FetchLike, GitHubReleaseCatalog, type ReleaseCatalog } from "./catalog/client.js"
import { loadConfig, type SuivmConfig } from "./config/index.js"
import { Installer } from "./installer/installer.js"
import { FileVersionStore, type VersionStore } from "./store/version-store.js"

export interface SuivmContext {
	config: SuivmConfig
	store: VersionStore
	catalog: ReleaseCatalog
	installer: Installer
	activator: Activator
}

export type ContextFactory = () => Promise<SuivmContext>

export interface CreateContextOptions {
	fetchFn?: FetchLike
}

export function createContext(config: SuivmConfig, options: CreateContextOptions = {}): SuivmContext {
	const store = FileVersionStore.create(config)
	const catalog = new GitHubReleaseCatalog(config, options.fetchFn)
	return {
		config,
		store,
		catalog,
		installer: new Installer({ catalog, store, target: config.target }),
		activator: new Activator({ store, binaryCandidates: config.binaryCandidates }),
	}
}

/** Context for the real user: ~/.suivm plus its optional config.jsonc */
export const defaultContextFactory: ContextFactory = async () => createContext(await loadConfig())
