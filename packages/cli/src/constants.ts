/**
 * suivm Constants
 *
 * Centralized values to avoid hardcoding throughout the codebase.
 */

export const VERSION = "0.1.0"

// GitHub
export const SUI_GITHUB_REPO = "MystenLabs/sui"
export const DEFAULT_CATALOG_URL = `https://api.github.com/repos/${SUI_GITHUB_REPO}/releases`
export const USER_AGENT = "sui-version-manager"

// On-disk layout
export const BASE_DIR_NAME = ".suivm"
export const VERSIONS_DIR_NAME = "versions"
export const CURRENT_LINK_NAME = "current"
export const CONFIG_FILE_NAME = "config.jsonc"

// Target triple, matched as substrings of asset names
export const TARGET_OS = "macos"
export const TARGET_ARCH = "arm64"

/** Where the toolchain binary may sit inside a version directory, in lookup order */
export const BINARY_CANDIDATES = ["bin/sui", "sui"] as const
