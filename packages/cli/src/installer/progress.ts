/**
 * Download progress reporting.
 */

import type { Ora } from "ora"
import { createSpinner } from "../utils/spinner.js"

export interface DownloadProgress {
	/** Bytes written so far */
	transferred: number
	/** Declared size, 0 when the server did not send one */
	total: number
}

export interface ProgressReporter {
	start(label: string, total: number): void
	update(progress: DownloadProgress): void
	succeed(message: string): void
	fail(message: string): void
}

/** Reporter that drops everything */
export const silentProgress: ProgressReporter = {
	start: () => {},
	update: () => {},
	succeed: () => {},
	fail: () => {},
}

const UNITS = ["B", "KiB", "MiB", "GiB"] as const

export function formatBytes(bytes: number): string {
	let value = bytes
	let unit = 0
	while (value >= 1024 && unit < UNITS.length - 1) {
		value /= 1024
		unit++
	}
	return unit === 0 ? `${value} ${UNITS[0]}` : `${value.toFixed(1)} ${UNITS[unit]}`
}

/**
 * Spinner text for a progress update. Without a declared size there is no
 * percentage, only the byte counter.
 */
export function formatProgress(label: string, { transferred, total }: DownloadProgress): string {
	if (total > 0) {
		const pct = Math.min(100, Math.round((transferred / total) * 100))
		return `${label} ${pct}% (${formatBytes(transferred)}/${formatBytes(total)})`
	}
	return `${label} ${formatBytes(transferred)}`
}

/**
 * ProgressReporter drawn with an ora spinner.
 */
export class SpinnerProgress implements ProgressReporter {
	private spinner: Ora | null = null
	private label = ""

	start(label: string, total: number): void {
		this.label = label
		this.spinner = createSpinner({ text: formatProgress(label, { transferred: 0, total }) })
		this.spinner.start()
	}

	update(progress: DownloadProgress): void {
		if (!this.spinner) return
		this.spinner.text = formatProgress(this.label, progress)
	}

	succeed(message: string): void {
		this.spinner?.succeed(message)
		this.spinner = null
	}

	fail(message: string): void {
		this.spinner?.fail(message)
		this.spinner = null
	}
}
