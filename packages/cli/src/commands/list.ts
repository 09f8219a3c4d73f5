/**
 * List command - remote releases with local install/active markers
 */

import type { Command } from "commander"
import type { Release } from "../catalog/schema.js"
import type { ContextFactory, SuivmContext } from "../context.js"
import type { VersionStore } from "../store/version-store.js"
import { SuivmError } from "../utils/errors.js"
import { wrapAction } from "../utils/handle-error.js"
import { outputSuccess } from "../utils/json-output.js"
import { highlight, logger } from "../utils/logger.js"
import { sharedOptions } from "../utils/shared-options.js"
import { withSpinner } from "../utils/spinner.js"

interface ListOptions {
	json?: boolean
}

export interface VersionStatus {
	version: string
	installed: boolean
	active: boolean
}

/**
 * Pair every release, in catalog order, with its local state.
 */
export function collectVersionStatus(
	releases: readonly Release[],
	installed: ReadonlySet<string>,
	active: string | null,
): VersionStatus[] {
	return releases.map((release) => ({
		version: release.tag,
		installed: installed.has(release.tag),
		active: active === release.tag,
	}))
}

/** `[*] v1.2.0 (default)` */
export function formatVersionLine(status: VersionStatus): string {
	const installMarker = status.installed ? "[*]" : "[ ]"
	const defaultMarker = status.active ? " (default)" : ""
	return `${installMarker} ${status.version}${defaultMarker}`
}

export function registerListCommand(program: Command, getContext: ContextFactory): void {
	program
		.command("list")
		.alias("ls")
		.description("List all available Sui versions")
		.addOption(sharedOptions.json())
		.action(
			wrapAction(async (options: ListOptions) => {
				await runList(await getContext(), options)
			}),
		)
}

/**
 * Installed version `current` points at. A missing, dangling or unreadable
 * link only drops the marker; `list` still shows every release.
 */
export async function findDefaultVersion(
	store: VersionStore,
	installed: ReadonlySet<string>,
): Promise<string | null> {
	try {
		const active = await store.getActiveVersion()
		return installed.has(active) ? active : null
	} catch (error) {
		if (error instanceof SuivmError) {
			logger.debug(`No default version: ${error.message}`)
			return null
		}
		throw error
	}
}

export async function runList(ctx: SuivmContext, options: ListOptions = {}): Promise<VersionStatus[]> {
	const releases = await withSpinner(
		{ text: "Fetching releases...", quiet: options.json },
		() => ctx.catalog.fetchReleases(),
	)
	const installed = await ctx.store.listInstalled()
	const active = await findDefaultVersion(ctx.store, installed)
	const versions = collectVersionStatus(releases, installed, active)

	if (options.json) {
		outputSuccess({ versions })
		return versions
	}

	logger.log("Available versions:")
	for (const status of versions) {
		const line = formatVersionLine(status)
		logger.log(status.active ? highlight.bold(line) : line)
	}
	return versions
}
