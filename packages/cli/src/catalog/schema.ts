/**
 * Release Catalog Schemas
 *
 * Parse the GitHub releases payload at the boundary; everything past
 * this module works with the camel-cased Release/Asset types.
 */

import { z } from "zod"

export const githubAssetSchema = z
	.object({
		name: z.string(),
		browser_download_url: z.string(),
	})
	.transform((asset) => ({
		name: asset.name,
		downloadUrl: asset.browser_download_url,
	}))

export const githubReleaseSchema = z
	.object({
		tag_name: z.string(),
		assets: z.array(githubAssetSchema),
	})
	.transform((release) => ({
		tag: release.tag_name,
		assets: release.assets,
	}))

export const githubReleaseListSchema = z.array(githubReleaseSchema)

export type Asset = z.output<typeof githubAssetSchema>
export type Release = z.output<typeof githubReleaseSchema>
