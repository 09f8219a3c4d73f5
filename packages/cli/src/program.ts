/**
 * Builds the suivm command tree.
 */

import { Command } from "commander"
import { registerConfigCommand } from "./commands/config.js"
import { registerCurrentCommand } from "./commands/current.js"
import { registerInstallCommand } from "./commands/install.js"
import { registerListCommand } from "./commands/list.js"
import { registerUninstallCommand } from "./commands/uninstall.js"
import { registerUseCommand } from "./commands/use.js"
import { createConfig, type TargetTriple } from "./config/index.js"
import { VERSION } from "./constants.js"
import type { ContextFactory } from "./context.js"
import { assertSupportedPlatform, detectPlatform, type PlatformInfo } from "./platform/probe.js"
import { setLoggerOptions } from "./utils/logger.js"
import { addVerbosityOptions } from "./utils/shared-options.js"

export interface ProgramOptions {
	getContext: ContextFactory
	/** Host platform; probed from the running process by default */
	platform?: PlatformInfo
	target?: TargetTriple
}

interface GlobalOptions {
	quiet?: boolean
	verbose?: boolean
}

export function createProgram(options: ProgramOptions): Command {
	const program = new Command()
		.name("suivm")
		.description("Sui Version Manager")
		.version(VERSION)

	addVerbosityOptions(program)

	let platformChecked = false
	program.hook("preAction", () => {
		const globals = program.opts<GlobalOptions>()
		setLoggerOptions({ quiet: globals.quiet, verbose: globals.verbose })

		if (platformChecked) return
		platformChecked = true
		assertSupportedPlatform(
			options.platform ?? detectPlatform(),
			options.target ?? createConfig().target,
		)
	})

	registerListCommand(program, options.getContext)
	registerInstallCommand(program, options.getContext)
	registerUninstallCommand(program, options.getContext)
	registerUseCommand(program, options.getContext)
	registerConfigCommand(program, options.getContext)
	registerCurrentCommand(program, options.getContext)

	return program
}
