/**
 * Shell integration snippets.
 * Pure functions of the base directory and the shell kind.
 */

import { getActiveBinDir } from "../store/paths.js"
import { UnsupportedShellError } from "../utils/errors.js"
import { highlight, logger } from "../utils/logger.js"

export const SUPPORTED_SHELLS = ["bash", "zsh", "fish"] as const

export type ShellKind = (typeof SUPPORTED_SHELLS)[number]

const RC_FILES: Record<ShellKind, string> = {
	bash: "~/.bashrc",
	zsh: "~/.zshrc",
	fish: "~/.config/fish/config.fish",
}

/**
 * Parse a shell name, ignoring case.
 * @throws UnsupportedShellError
 */
export function parseShellKind(input: string): ShellKind {
	const normalized = input.trim().toLowerCase()
	const shell = SUPPORTED_SHELLS.find((s) => s === normalized)
	if (!shell) {
		throw new UnsupportedShellError(input)
	}
	return shell
}

/**
 * One line that prepends <baseDir>/current/bin to PATH.
 * @throws UnsupportedShellError
 */
export function shellSnippet(baseDir: string, shell: string): string {
	const binDir = getActiveBinDir(baseDir)
	switch (parseShellKind(shell)) {
		case "fish":
			return `set -gx PATH ${binDir} $PATH`
		case "bash":
		case "zsh":
			return `export PATH="${binDir}:$PATH"`
	}
}

export function shellRcFile(shell: ShellKind): string {
	return RC_FILES[shell]
}

/** How to reload the rc file without opening a new terminal */
export function sourceHint(shell: ShellKind): string {
	const rcFile = shellRcFile(shell)
	return shell === "fish" ? `source ${rcFile}` : `source ${rcFile} # or restart your terminal`
}

/**
 * Log the PATH snippet for every supported shell.
 */
export function printShellGuidance(baseDir: string): void {
	logger.break()
	logger.log("To configure your shell, add the following to your shell config file:")

	for (const shell of SUPPORTED_SHELLS) {
		logger.break()
		logger.log(`For ${shell} (${highlight.path(shellRcFile(shell))}):`)
		logger.log(highlight.command(shellSnippet(baseDir, shell)))
	}

	logger.break()
	logger.log("Then restart your shell or run:")
	for (const shell of SUPPORTED_SHELLS) {
		logger.log(`  source ${shellRcFile(shell)}  ${highlight.dim(`# for ${shell}`)}`)
	}
}
