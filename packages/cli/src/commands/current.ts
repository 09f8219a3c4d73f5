/**
 * Current command - print the active version
 */

import type { Command } from "commander"
import type { ContextFactory, SuivmContext } from "../context.js"
import { getActiveVersionOrNull } from "../store/version-store.js"
import { wrapAction } from "../utils/handle-error.js"
import { outputSuccess } from "../utils/json-output.js"
import { logger } from "../utils/logger.js"
import { sharedOptions } from "../utils/shared-options.js"

interface CurrentOptions {
	json?: boolean
}

export function registerCurrentCommand(program: Command, getContext: ContextFactory): void {
	program
		.command("current")
		.description("Show the version currently in use")
		.addOption(sharedOptions.json())
		.action(
			wrapAction(async (options: CurrentOptions) => {
				await runCurrent(await getContext(), options)
			}),
		)
}

export async function runCurrent(
	ctx: SuivmContext,
	options: CurrentOptions = {},
): Promise<string | null> {
	const active = await getActiveVersionOrNull(ctx.store)

	if (options.json) {
		outputSuccess({ version: active })
		return active
	}

	logger.log(active ?? "No version currently in use")
	return active
}
