import { chmod, mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { dirname, join } from "node:path"
import * as tar from "tar"
import type { FetchLike } from "../src/catalog/client.js"
import { createConfig, type SuivmConfig } from "../src/config/index.js"

export const CATALOG_URL = "https://releases.example.test/repos/sui/releases"

// =============================================================================
// TEMP DIRECTORIES
// =============================================================================

export async function createTempDir(prefix: string): Promise<string> {
	return mkdtemp(join(tmpdir(), `suivm-test-${prefix}-`))
}

export async function cleanupTempDir(path: string): Promise<void> {
	await rm(path, { recursive: true, force: true })
}

/** Config rooted at a temp base directory */
export function testConfig(baseDir: string): SuivmConfig {
	return createConfig({ baseDir, catalogUrl: CATALOG_URL })
}

// =============================================================================
// ARCHIVES
// =============================================================================

export interface ArchiveEntry {
	content: string
	mode?: number
}

/**
 * Build a .tgz from a map of relative path -> file, and return its bytes.
 */
export async function buildTarball(entries: Record<string, ArchiveEntry>): Promise<Buffer> {
	const workDir = await createTempDir("tarball")
	try {
		const srcDir = join(workDir, "src")
		for (const [relativePath, entry] of Object.entries(entries)) {
			const filePath = join(srcDir, relativePath)
			await mkdir(dirname(filePath), { recursive: true })
			await writeFile(filePath, entry.content)
			await chmod(filePath, entry.mode ?? 0o644)
		}

		const archivePath = join(workDir, "archive.tgz")
		const topLevel = [...new Set(Object.keys(entries).map((p) => p.split("/")[0] ?? p))]
		await tar.create({ gzip: true, file: archivePath, cwd: srcDir }, topLevel)
		return await readFile(archivePath)
	} finally {
		await cleanupTempDir(workDir)
	}
}

/** A release tarball with an executable at bin/sui */
export function buildSuiTarball(): Promise<Buffer> {
	return buildTarball({
		"bin/sui": { content: "#!/bin/sh\necho sui\n", mode: 0o755 },
	})
}

// =============================================================================
// NETWORK STAND-IN
// =============================================================================

export interface GithubAssetJson {
	name: string
	browser_download_url: string
}

export interface GithubReleaseJson {
	tag_name: string
	assets: GithubAssetJson[]
}

export function assetUrl(name: string): string {
	return `https://downloads.example.test/${name}`
}

export function release(tag: string, assetNames: string[]): GithubReleaseJson {
	return {
		tag_name: tag,
		assets: assetNames.map((name) => ({ name, browser_download_url: assetUrl(name) })),
	}
}

export function jsonResponse(data: unknown): Response {
	return new Response(JSON.stringify(data), {
		status: 200,
		headers: { "content-type": "application/json" },
	})
}

export function binaryResponse(body: Uint8Array, declareLength = true): Response {
	const headers: Record<string, string> = { "content-type": "application/octet-stream" }
	if (declareLength) {
		headers["content-length"] = String(body.byteLength)
	}
	return new Response(body, { status: 200, headers })
}

export interface FetchCall {
	url: string
	init?: RequestInit
}

export interface FakeFetch {
	fetchFn: FetchLike
	calls: FetchCall[]
}

/**
 * In-process fetch: each URL maps to a function producing a fresh Response.
 * Unknown URLs answer 404.
 */
export function createFakeFetch(routes: Record<string, () => Response | Promise<Response>>): FakeFetch {
	const calls: FetchCall[] = []
	const fetchFn: FetchLike = async (url, init) => {
		calls.push({ url, init })
		const route = routes[url]
		if (!route) {
			return new Response("Not Found", { status: 404, statusText: "Not Found" })
		}
		return route()
	}
	return { fetchFn, calls }
}

/**
 * Catalog + asset routes for the given releases, every asset serving `archive`.
 */
export function catalogRoutes(
	releases: GithubReleaseJson[],
	archive: Uint8Array,
): Record<string, () => Response> {
	const routes: Record<string, () => Response> = {
		[CATALOG_URL]: () => jsonResponse(releases),
	}
	for (const rel of releases) {
		for (const asset of rel.assets) {
			routes[asset.browser_download_url] = () => binaryResponse(archive)
		}
	}
	return routes
}
