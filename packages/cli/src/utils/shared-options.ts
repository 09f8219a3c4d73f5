/**
 * Shared CLI Options Factory
 *
 * Reusable option definitions for consistent command interfaces.
 */

import { Option } from "commander"

export const sharedOptions = {
	/** Suppress non-essential output */
	quiet: () => new Option("-q, --quiet", "Suppress output"),

	/** Output as JSON */
	json: () => new Option("--json", "Output as JSON"),

	/** Verbose output */
	verbose: () => new Option("-v, --verbose", "Verbose output"),
}

/**
 * Add the output verbosity options (quiet, verbose) to a command.
 *
 * @example
 * ```typescript
 * addVerbosityOptions(program).hook("preAction", applyVerbosity)
 * ```
 */
export function addVerbosityOptions<T extends { addOption: (opt: Option) => T }>(cmd: T): T {
	return cmd.addOption(sharedOptions.quiet()).addOption(sharedOptions.verbose())
}
