/**
 * Error handler for CLI commands
 * Converts errors to user-friendly output with proper exit codes
 */

import { ZodError } from "zod"

import { EXIT_CODES, SuivmError } from "./errors.js"
import { buildErrorEnvelope, outputJson } from "./json-output.js"
import { logger } from "./logger.js"

export interface HandleErrorOptions {
	json?: boolean
}

/**
 * Map an error to the exit status the command should finish with.
 */
export function exitCodeFor(error: unknown): number {
	if (error instanceof SuivmError) return error.exitCode
	if (error instanceof ZodError) return EXIT_CODES.CONFIG
	return EXIT_CODES.GENERAL
}

/**
 * Report an error and record the exit status.
 * The process is left to finish on its own; nothing calls process.exit.
 */
export function handleError(error: unknown, options: HandleErrorOptions = {}): void {
	process.exitCode = exitCodeFor(error)

	// JSON mode: structured output
	if (options.json) {
		outputJson(buildErrorEnvelope(error))
		return
	}

	if (error instanceof SuivmError) {
		logger.error(error.message)
		return
	}

	// Zod validation errors: format nicely
	if (error instanceof ZodError) {
		logger.error("Validation failed:")
		for (const issue of error.issues) {
			const path = issue.path.join(".")
			logger.error(`  ${path}: ${issue.message}`)
		}
		return
	}

	if (error instanceof Error) {
		logger.error(error.message)
		logger.debug(error.stack)
		return
	}

	logger.error("An unknown error occurred")
}

/**
 * Wrap a commander action so thrown errors go through handleError.
 * The last argument commander passes is the Command; its opts decide JSON mode.
 */
export function wrapAction<Args extends unknown[]>(
	action: (...args: Args) => Promise<void>,
): (...args: Args) => Promise<void> {
	return async (...args: Args) => {
		try {
			await action(...args)
		} catch (error) {
			handleError(error, { json: wantsJson(args) })
		}
	}
}

function wantsJson(args: unknown[]): boolean {
	return args.some(
		(arg) => typeof arg === "object" && arg !== null && "json" in arg && arg.json === true,
	)
}
