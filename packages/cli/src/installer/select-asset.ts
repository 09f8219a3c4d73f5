import type { Asset, Release } from "../catalog/schema.js"
import type { TargetTriple } from "../config/index.js"

/**
 * Release whose tag equals `version` exactly (case-sensitive).
 */
export function findRelease(releases: readonly Release[], version: string): Release | undefined {
	return releases.find((release) => release.tag === version)
}

/** Asset names carry the target triple as plain substrings, e.g. sui-v1.2.0-macos-arm64.tgz */
export function isCompatibleAsset(asset: Asset, target: TargetTriple): boolean {
	return asset.name.includes(target.os) && asset.name.includes(target.arch)
}

/**
 * First compatible asset in catalog order. No sorting: when a release has
 * several compatible assets, the catalog's order decides.
 */
export function selectAsset(release: Release, target: TargetTriple): Asset | undefined {
	return release.assets.find((asset) => isCompatibleAsset(asset, target))
}
