/**
 * Install command - download and unpack one release
 */

import type { Command } from "commander"
import type { ContextFactory, SuivmContext } from "../context.js"
import { SpinnerProgress } from "../installer/progress.js"
import { wrapAction } from "../utils/handle-error.js"
import { highlight, logger } from "../utils/logger.js"

export function registerInstallCommand(program: Command, getContext: ContextFactory): void {
	program
		.command("install")
		.alias("i")
		.description("Install a specific version")
		.argument("<version>", "Release tag, e.g. mainnet-v1.38.1")
		.action(
			wrapAction(async (version: string) => {
				await runInstall(await getContext(), version)
			}),
		)
}

export async function runInstall(ctx: SuivmContext, version: string): Promise<void> {
	logger.info(`Installing version: ${highlight.version(version)}`)
	await ctx.installer.install(version, { progress: new SpinnerProgress() })
	logger.success(`Successfully installed version ${highlight.version(version)}`)
	logger.break()
	logger.log(`Run ${highlight.command(`suivm use ${version}`)} to make it the default.`)
}
