/**
 * Custom error classes with error codes
 * Every core operation throws one of these; the command layer renders them.
 */

export type ErrorCode =
	| "NETWORK_ERROR"
	| "DECODE_ERROR"
	| "VERSION_NOT_FOUND"
	| "NO_COMPATIBLE_ASSET"
	| "IO_ERROR"
	| "NOT_INSTALLED"
	| "ACTIVE_VERSION_CONFLICT"
	| "NO_ACTIVE_VERSION"
	| "INVALID_STATE"
	| "BINARY_MISSING"
	| "UNSUPPORTED_SHELL"
	| "UNSUPPORTED_PLATFORM"
	| "VALIDATION_ERROR"
	| "CONFIG_ERROR"

export const EXIT_CODES = {
	SUCCESS: 0,
	GENERAL: 1,
	USAGE: 64,
	DATA: 65,
	NOT_FOUND: 66,
	NETWORK: 69,
	IO: 74,
	CONFIG: 78,
} as const

export class SuivmError extends Error {
	constructor(
		message: string,
		public readonly code: ErrorCode,
		public readonly exitCode: number = EXIT_CODES.GENERAL,
	) {
		super(message)
		this.name = "SuivmError"
	}
}

// =============================================================================
// REMOTE CATALOG
// =============================================================================

export class NetworkError extends SuivmError {
	constructor(message: string) {
		super(message, "NETWORK_ERROR", EXIT_CODES.NETWORK)
		this.name = "NetworkError"
	}
}

export class DecodeError extends SuivmError {
	constructor(message: string) {
		super(message, "DECODE_ERROR", EXIT_CODES.DATA)
		this.name = "DecodeError"
	}
}

export class VersionNotFoundError extends SuivmError {
	constructor(public readonly version: string) {
		super(`Version ${version} not found`, "VERSION_NOT_FOUND", EXIT_CODES.NOT_FOUND)
		this.name = "VersionNotFoundError"
	}
}

export class NoCompatibleAssetError extends SuivmError {
	constructor(public readonly version: string) {
		super(
			`No compatible binary found for version ${version}`,
			"NO_COMPATIBLE_ASSET",
			EXIT_CODES.NOT_FOUND,
		)
		this.name = "NoCompatibleAssetError"
	}
}

// =============================================================================
// LOCAL STATE
// =============================================================================

export class IoError extends SuivmError {
	constructor(
		message: string,
		/** errno code of the underlying failure, when there was one */
		public readonly fsCode?: string,
	) {
		super(message, "IO_ERROR", EXIT_CODES.IO)
		this.name = "IoError"
	}
}

export class ExtractError extends IoError {
	constructor(message: string, fsCode?: string) {
		super(message, fsCode)
		this.name = "ExtractError"
	}
}

export class NotInstalledError extends SuivmError {
	constructor(public readonly version: string) {
		super(
			`Version ${version} is not installed. Please install it first.`,
			"NOT_INSTALLED",
			EXIT_CODES.NOT_FOUND,
		)
		this.name = "NotInstalledError"
	}
}

export class ActiveVersionConflictError extends SuivmError {
	constructor(public readonly version: string) {
		super(
			"Cannot uninstall the currently active version. Please switch to another version first.",
			"ACTIVE_VERSION_CONFLICT",
			EXIT_CODES.GENERAL,
		)
		this.name = "ActiveVersionConflictError"
	}
}

export class NoActiveVersionError extends SuivmError {
	constructor() {
		super("No version currently in use", "NO_ACTIVE_VERSION", EXIT_CODES.NOT_FOUND)
		this.name = "NoActiveVersionError"
	}
}

export class InvalidStateError extends SuivmError {
	constructor(message: string) {
		super(message, "INVALID_STATE", EXIT_CODES.GENERAL)
		this.name = "InvalidStateError"
	}
}

export class BinaryMissingError extends SuivmError {
	constructor(public readonly expectedPath: string) {
		super(`Sui binary not found at: ${expectedPath}`, "BINARY_MISSING", EXIT_CODES.GENERAL)
		this.name = "BinaryMissingError"
	}
}

// =============================================================================
// INPUT AND ENVIRONMENT
// =============================================================================

export class UnsupportedShellError extends SuivmError {
	constructor(public readonly shell: string) {
		super(`Unsupported shell: ${shell}`, "UNSUPPORTED_SHELL", EXIT_CODES.USAGE)
		this.name = "UnsupportedShellError"
	}
}

export class UnsupportedPlatformError extends SuivmError {
	constructor(public readonly os: string) {
		super(
			`Sorry, this program only supports macOS (detected: ${os}).`,
			"UNSUPPORTED_PLATFORM",
			EXIT_CODES.GENERAL,
		)
		this.name = "UnsupportedPlatformError"
	}
}

export class ValidationError extends SuivmError {
	constructor(message: string) {
		super(message, "VALIDATION_ERROR", EXIT_CODES.USAGE)
		this.name = "ValidationError"
	}
}

export class ConfigError extends SuivmError {
	constructor(message: string) {
		super(message, "CONFIG_ERROR", EXIT_CODES.CONFIG)
		this.name = "ConfigError"
	}
}

// =============================================================================
// HELPERS
// =============================================================================

/** Read the errno code off a Node.js system error, if it has one. */
export function errnoCode(error: unknown): string | undefined {
	if (error instanceof Error && "code" in error && typeof error.code === "string") {
		return error.code
	}
	return undefined
}

/**
 * Wrap a filesystem failure as an IoError, keeping the errno code.
 * SuivmErrors pass through untouched.
 */
export function toIoError(error: unknown, action: string): SuivmError {
	if (error instanceof SuivmError) {
		return error
	}
	const message = error instanceof Error ? error.message : String(error)
	return new IoError(`Failed to ${action}: ${message}`, errnoCode(error))
}
