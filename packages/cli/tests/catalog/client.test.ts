/**
 * Release Catalog Client Tests
 */

import { describe, expect, it } from "vitest"
import { GitHubReleaseCatalog } from "../../src/catalog/client.js"
import { DecodeError, NetworkError } from "../../src/utils/errors.js"
import {
	assetUrl,
	binaryResponse,
	CATALOG_URL,
	createFakeFetch,
	jsonResponse,
	release,
} from "../helpers.js"

const config = { catalogUrl: CATALOG_URL, userAgent: "sui-version-manager" }

describe("GitHubReleaseCatalog.fetchReleases", () => {
	it("decodes releases in catalog order", async () => {
		const { fetchFn } = createFakeFetch({
			[CATALOG_URL]: () =>
				jsonResponse([
					release("v1.3.0", ["sui-v1.3.0-macos-arm64.tgz"]),
					release("v1.2.0", ["sui-v1.2.0-ubuntu-x86_64.tgz", "sui-v1.2.0-macos-arm64.tgz"]),
				]),
		})
		const catalog = new GitHubReleaseCatalog(config, fetchFn)

		const releases = await catalog.fetchReleases()

		expect(releases).toEqual([
			{
				tag: "v1.3.0",
				assets: [
					{ name: "sui-v1.3.0-macos-arm64.tgz", downloadUrl: assetUrl("sui-v1.3.0-macos-arm64.tgz") },
				],
			},
			{
				tag: "v1.2.0",
				assets: [
					{
						name: "sui-v1.2.0-ubuntu-x86_64.tgz",
						downloadUrl: assetUrl("sui-v1.2.0-ubuntu-x86_64.tgz"),
					},
					{ name: "sui-v1.2.0-macos-arm64.tgz", downloadUrl: assetUrl("sui-v1.2.0-macos-arm64.tgz") },
				],
			},
		])
	})

	it("sends the User-Agent header", async () => {
		const { fetchFn, calls } = createFakeFetch({ [CATALOG_URL]: () => jsonResponse([]) })
		const catalog = new GitHubReleaseCatalog(config, fetchFn)

		await catalog.fetchReleases()

		expect(calls).toHaveLength(1)
		expect(new Headers(calls[0]?.init?.headers).get("User-Agent")).toBe("sui-version-manager")
	})

	it("ignores fields it does not use", async () => {
		const { fetchFn } = createFakeFetch({
			[CATALOG_URL]: () =>
				jsonResponse([
					{
						tag_name: "v1.0.0",
						name: "Release 1.0.0",
						prerelease: false,
						assets: [{ name: "a.tgz", browser_download_url: "https://x.test/a.tgz", size: 10 }],
					},
				]),
		})
		const catalog = new GitHubReleaseCatalog(config, fetchFn)

		const releases = await catalog.fetchReleases()

		expect(releases).toEqual([
			{ tag: "v1.0.0", assets: [{ name: "a.tgz", downloadUrl: "https://x.test/a.tgz" }] },
		])
	})

	it("throws NetworkError when fetch rejects", async () => {
		const catalog = new GitHubReleaseCatalog(config, async () => {
			throw new Error("getaddrinfo ENOTFOUND")
		})

		await expect(catalog.fetchReleases()).rejects.toThrow(NetworkError)
	})

	it("throws NetworkError on a non-2xx status", async () => {
		const { fetchFn } = createFakeFetch({
			[CATALOG_URL]: () => new Response("rate limited", { status: 403, statusText: "Forbidden" }),
		})
		const catalog = new GitHubReleaseCatalog(config, fetchFn)

		await expect(catalog.fetchReleases()).rejects.toThrow(
			`HTTP 403 Forbidden from ${CATALOG_URL}`,
		)
	})

	it("throws DecodeError when the body is not JSON", async () => {
		const { fetchFn } = createFakeFetch({ [CATALOG_URL]: () => new Response("<html>") })
		const catalog = new GitHubReleaseCatalog(config, fetchFn)

		await expect(catalog.fetchReleases()).rejects.toThrow(DecodeError)
	})

	it("throws DecodeError when a release has no assets field", async () => {
		const { fetchFn } = createFakeFetch({
			[CATALOG_URL]: () => jsonResponse([{ tag_name: "v1.0.0" }]),
		})
		const catalog = new GitHubReleaseCatalog(config, fetchFn)

		const error = await catalog.fetchReleases().catch((e: unknown) => e)

		expect(error).toBeInstanceOf(DecodeError)
		expect(error).toHaveProperty("message", expect.stringContaining("0.assets"))
	})

	it("throws DecodeError when the body is an object instead of a list", async () => {
		const { fetchFn } = createFakeFetch({
			[CATALOG_URL]: () => jsonResponse({ message: "Not Found" }),
		})
		const catalog = new GitHubReleaseCatalog(config, fetchFn)

		await expect(catalog.fetchReleases()).rejects.toThrow(DecodeError)
	})
})

describe("GitHubReleaseCatalog.openAsset", () => {
	const asset = { name: "sui.tgz", downloadUrl: assetUrl("sui.tgz") }

	it("reports the declared size", async () => {
		const { fetchFn } = createFakeFetch({
			[asset.downloadUrl]: () => binaryResponse(new Uint8Array(42)),
		})
		const catalog = new GitHubReleaseCatalog(config, fetchFn)

		const stream = await catalog.openAsset(asset)

		expect(stream.totalBytes).toBe(42)
	})

	it("reports 0 when the server omits the size", async () => {
		const { fetchFn } = createFakeFetch({
			[asset.downloadUrl]: () => binaryResponse(new Uint8Array(42), false),
		})
		const catalog = new GitHubReleaseCatalog(config, fetchFn)

		const stream = await catalog.openAsset(asset)

		expect(stream.totalBytes).toBe(0)
	})

	it("throws NetworkError on 404", async () => {
		const { fetchFn } = createFakeFetch({})
		const catalog = new GitHubReleaseCatalog(config, fetchFn)

		await expect(catalog.openAsset(asset)).rejects.toThrow(NetworkError)
	})
})
