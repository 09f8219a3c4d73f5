/**
 * Process configuration
 *
 * Built once at startup and handed to every component, so tests can point
 * the whole tool at a temp directory instead of the user's home.
 */

import { readFile } from "node:fs/promises"
import { homedir } from "node:os"
import path from "node:path"
import { type ParseError, parse as parseJsonc, printParseErrorCode } from "jsonc-parser"
import { z } from "zod"
import {
	BASE_DIR_NAME,
	BINARY_CANDIDATES,
	CONFIG_FILE_NAME,
	DEFAULT_CATALOG_URL,
	TARGET_ARCH,
	TARGET_OS,
	USER_AGENT,
} from "../constants.js"
import { ConfigError, errnoCode, toIoError } from "../utils/errors.js"

// =============================================================================
// TYPES
// =============================================================================

export interface TargetTriple {
	/** Substring every compatible asset name contains for the OS */
	os: string
	/** Substring every compatible asset name contains for the CPU */
	arch: string
}

export interface SuivmConfig {
	readonly baseDir: string
	readonly catalogUrl: string
	readonly userAgent: string
	readonly target: TargetTriple
	readonly binaryCandidates: readonly string[]
}

/**
 * User-editable settings in <baseDir>/config.jsonc.
 * Only the catalog location is overridable (mirrors, air-gapped setups).
 */
export const userConfigSchema = z
	.object({
		$schema: z.string().optional(),
		catalogUrl: z.string().url().optional(),
	})
	.strict()

export type UserConfig = z.infer<typeof userConfigSchema>

// =============================================================================
// FACTORIES
// =============================================================================

export function getDefaultBaseDir(homeDir: string = homedir()): string {
	return path.join(homeDir, BASE_DIR_NAME)
}

/**
 * Build a config from defaults. Does not touch the filesystem.
 */
export function createConfig(overrides: Partial<SuivmConfig> = {}): SuivmConfig {
	return {
		baseDir: overrides.baseDir ?? getDefaultBaseDir(),
		catalogUrl: overrides.catalogUrl ?? DEFAULT_CATALOG_URL,
		userAgent: overrides.userAgent ?? USER_AGENT,
		target: overrides.target ?? { os: TARGET_OS, arch: TARGET_ARCH },
		binaryCandidates: overrides.binaryCandidates ?? BINARY_CANDIDATES,
	}
}

export interface LoadConfigOptions {
	/** Defaults to the OS home directory */
	homeDir?: string
}

/**
 * Build the config and merge <baseDir>/config.jsonc when it exists.
 * @throws ConfigError if the file is not valid JSONC or fails validation
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<SuivmConfig> {
	const baseDir = getDefaultBaseDir(options.homeDir)
	const userConfig = await readUserConfig(path.join(baseDir, CONFIG_FILE_NAME))
	return createConfig({ baseDir, catalogUrl: userConfig?.catalogUrl })
}

/**
 * Read and validate the user config file.
 * @returns null when the file does not exist
 */
export async function readUserConfig(configPath: string): Promise<UserConfig | null> {
	let content: string
	try {
		content = await readFile(configPath, "utf8")
	} catch (error) {
		if (errnoCode(error) === "ENOENT") {
			return null
		}
		throw toIoError(error, `read ${configPath}`)
	}

	const errors: ParseError[] = []
	const json: unknown = parseJsonc(content, errors, { allowTrailingComma: true })
	const firstError = errors[0]
	if (firstError) {
		throw new ConfigError(
			`Invalid JSONC in ${configPath}: ${printParseErrorCode(firstError.error)} at offset ${firstError.offset}`,
		)
	}

	const result = userConfigSchema.safeParse(json)
	if (!result.success) {
		const details = result.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ")
		throw new ConfigError(`Invalid config in ${configPath}: ${details}`)
	}
	return result.data
}
