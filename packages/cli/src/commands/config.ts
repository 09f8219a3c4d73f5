/**
 * Config command - print the PATH snippet for a shell
 */

import type { Command } from "commander"
import type { ContextFactory } from "../context.js"
import { parseShellKind, SUPPORTED_SHELLS, shellRcFile, shellSnippet, sourceHint } from "../shell/config.js"
import { wrapAction } from "../utils/handle-error.js"
import { highlight, logger } from "../utils/logger.js"

export function registerConfigCommand(program: Command, getContext: ContextFactory): void {
	program
		.command("config")
		.description("Show shell configuration")
		.argument("[shell]", `Shell type (${SUPPORTED_SHELLS.join("/")})`, "bash")
		.action(
			wrapAction(async (shell: string) => {
				const { config } = await getContext()
				runConfig(config.baseDir, shell)
			}),
		)
}

/**
 * @throws UnsupportedShellError
 */
export function runConfig(baseDir: string, shell: string): string {
	const kind = parseShellKind(shell)
	const snippet = shellSnippet(baseDir, kind)

	logger.log(`Add the following to your ${highlight.path(shellRcFile(kind))}:`)
	logger.break()
	logger.log(snippet)
	logger.break()
	logger.log("Then restart your shell or run:")
	logger.log(sourceHint(kind))
	return snippet
}
