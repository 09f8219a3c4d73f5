/**
 * Uninstall command - remove an installed version
 */

import type { Command } from "commander"
import type { ContextFactory, SuivmContext } from "../context.js"
import { wrapAction } from "../utils/handle-error.js"
import { highlight, logger } from "../utils/logger.js"

export function registerUninstallCommand(program: Command, getContext: ContextFactory): void {
	program
		.command("uninstall")
		.alias("rm")
		.description("Uninstall a specific version")
		.argument("<version>", "Installed version to remove")
		.action(
			wrapAction(async (version: string) => {
				await runUninstall(await getContext(), version)
			}),
		)
}

export async function runUninstall(ctx: SuivmContext, version: string): Promise<void> {
	logger.info(`Uninstalling version: ${highlight.version(version)}`)
	await ctx.activator.uninstall(version)
	logger.success(`Successfully uninstalled version ${highlight.version(version)}`)
}
