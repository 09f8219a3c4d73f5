/**
 * suivm Library Exports
 *
 * The version lifecycle for programmatic use, without the CLI.
 */

export { Activator, type ActivatorDeps } from "../activator/activator.js"
export {
	type AssetStream,
	type FetchLike,
	GitHubReleaseCatalog,
	type ReleaseCatalog,
} from "../catalog/client.js"
export type { Asset, Release } from "../catalog/schema.js"
export { createConfig, loadConfig, type SuivmConfig, type TargetTriple } from "../config/index.js"
export { createContext, type SuivmContext } from "../context.js"
export { type ArchiveExtractor, TarGzExtractor } from "../installer/extract.js"
export {
	type InstallOptions,
	type InstallResult,
	Installer,
	type InstallerDeps,
} from "../installer/installer.js"
export type { DownloadProgress, ProgressReporter } from "../installer/progress.js"
export { findRelease, selectAsset } from "../installer/select-asset.js"
export { getCpuArch, getOsName } from "../platform/probe.js"
export {
	parseShellKind,
	SUPPORTED_SHELLS,
	type ShellKind,
	shellRcFile,
	shellSnippet,
} from "../shell/config.js"
export {
	FileVersionStore,
	getActiveVersionOrNull,
	type VersionStore,
} from "../store/version-store.js"
export * from "../utils/errors.js"
