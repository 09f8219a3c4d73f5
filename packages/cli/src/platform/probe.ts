/**
 * Platform Probe
 *
 * Reports the host OS and CPU in the vocabulary used by release asset names,
 * and gates execution to the one supported OS.
 */

import type { TargetTriple } from "../config/index.js"
import { UnsupportedPlatformError } from "../utils/errors.js"
import { logger } from "../utils/logger.js"

export type CpuArch = "x86_64" | "arm64" | "unknown"

export interface PlatformInfo {
	os: string
	arch: CpuArch
}

/** Map Node's platform id to the name used in release assets */
export function getOsName(platform: NodeJS.Platform = process.platform): string {
	switch (platform) {
		case "darwin":
			return "macos"
		case "win32":
			return "windows"
		default:
			return platform
	}
}

export function getCpuArch(arch: string = process.arch): CpuArch {
	switch (arch) {
		case "x64":
			return "x86_64"
		case "arm64":
			return "arm64"
		default:
			return "unknown"
	}
}

export function detectPlatform(): PlatformInfo {
	return { os: getOsName(), arch: getCpuArch() }
}

/**
 * Fail on any OS but the target's. A CPU mismatch only warns: the target
 * triple is fixed, so assets are picked for it regardless of the host CPU.
 *
 * @throws UnsupportedPlatformError
 */
export function assertSupportedPlatform(info: PlatformInfo, target: TargetTriple): void {
	if (info.os !== target.os) {
		throw new UnsupportedPlatformError(info.os)
	}

	if (info.arch !== target.arch) {
		logger.warn(
			`Host CPU is ${info.arch}; suivm installs ${target.os}-${target.arch} builds only.`,
		)
	}
}
