/**
 * Release Catalog Client
 *
 * Reads the list of published releases and opens asset downloads.
 * One request per call: no caching, no retries, no timeout beyond the
 * transport's own.
 */

import type { SuivmConfig } from "../config/index.js"
import { DecodeError, NetworkError } from "../utils/errors.js"
import { logger } from "../utils/logger.js"
import { type Asset, githubReleaseListSchema, type Release } from "./schema.js"

// =============================================================================
// TYPES
// =============================================================================

/** The slice of the global fetch signature the client relies on */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>

/**
 * An opened asset download.
 * `totalBytes` is 0 when the server did not declare a size.
 */
export interface AssetStream {
	body: ReadableStream<Uint8Array>
	totalBytes: number
}

export interface ReleaseCatalog {
	/**
	 * Fetch every release, in catalog order.
	 * @throws NetworkError on transport failure or a non-2xx status
	 * @throws DecodeError when the body is not a release list
	 */
	fetchReleases(): Promise<Release[]>

	/**
	 * Start downloading an asset.
	 * @throws NetworkError on transport failure, non-2xx status or empty body
	 */
	openAsset(asset: Asset): Promise<AssetStream>
}

// =============================================================================
// GITHUB IMPLEMENTATION
// =============================================================================

export class GitHubReleaseCatalog implements ReleaseCatalog {
	constructor(
		private readonly config: Pick<SuivmConfig, "catalogUrl" | "userAgent">,
		private readonly fetchFn: FetchLike = fetch,
	) {}

	async fetchReleases(): Promise<Release[]> {
		const url = this.config.catalogUrl
		logger.debug(`GET ${url}`)

		const response = await this.request(url, {
			Accept: "application/vnd.github+json",
		})

		let json: unknown
		try {
			json = await response.json()
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error)
			throw new DecodeError(`Release catalog is not valid JSON: ${message}`)
		}

		const result = githubReleaseListSchema.safeParse(json)
		if (!result.success) {
			const details = result.error.issues
				.slice(0, 3)
				.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
				.join("; ")
			throw new DecodeError(`Unexpected release catalog format: ${details}`)
		}

		logger.debug(`Catalog lists ${result.data.length} releases`)
		return result.data
	}

	async openAsset(asset: Asset): Promise<AssetStream> {
		logger.debug(`GET ${asset.downloadUrl}`)
		const response = await this.request(asset.downloadUrl)

		// Early exit: no response body
		if (!response.body) {
			throw new NetworkError(`Download of ${asset.name} returned an empty body`)
		}

		const declared = Number(response.headers.get("content-length") ?? 0)
		return {
			body: response.body,
			totalBytes: Number.isFinite(declared) && declared > 0 ? declared : 0,
		}
	}

	private async request(url: string, headers: Record<string, string> = {}): Promise<Response> {
		let response: Response
		try {
			response = await this.fetchFn(url, {
				redirect: "follow",
				headers: { "User-Agent": this.config.userAgent, ...headers },
			})
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error)
			throw new NetworkError(`Network error requesting ${url}: ${message}`)
		}

		// Early exit: HTTP error
		if (!response.ok) {
			throw new NetworkError(`HTTP ${response.status} ${response.statusText} from ${url}`)
		}

		return response
	}
}
