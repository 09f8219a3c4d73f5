/**
 * Use command - set the default version
 * This updates the symlink at ~/.suivm/current.
 */

import type { Command } from "commander"
import type { ContextFactory, SuivmContext } from "../context.js"
import { wrapAction } from "../utils/handle-error.js"
import { highlight, logger } from "../utils/logger.js"

export function registerUseCommand(program: Command, getContext: ContextFactory): void {
	program
		.command("use")
		.description("Set default version")
		.argument("<version>", "Installed version to activate")
		.action(
			wrapAction(async (version: string) => {
				await runUse(await getContext(), version)
			}),
		)
}

export async function runUse(ctx: SuivmContext, version: string): Promise<void> {
	logger.info(`Setting default version to: ${highlight.version(version)}`)
	const binary = await ctx.activator.setActive(version)
	logger.success(`Successfully set default version to ${highlight.version(version)}`)
	logger.debug(`Binary: ${highlight.path(binary)}`)
}
