/**
 * JSON output utilities for scripting
 * Following GitHub CLI patterns for consistent --json flag handling
 */

import { ZodError } from "zod"
import { VERSION } from "../constants.js"
import { type ErrorCode, SuivmError } from "./errors.js"

// JSON response envelope
export interface JsonResponse<T = unknown> {
	success: boolean
	data?: T
	error?: {
		code: ErrorCode | "UNKNOWN_ERROR"
		message: string
	}
	meta: {
		timestamp: string
		version: string
	}
}

function meta(): JsonResponse["meta"] {
	return {
		timestamp: new Date().toISOString(),
		version: VERSION,
	}
}

/**
 * Output data as JSON
 */
export function outputJson(data: unknown): void {
	console.log(JSON.stringify(data, null, 2))
}

/**
 * Output success response
 */
export function outputSuccess<T>(data: T): void {
	const response: JsonResponse<T> = {
		success: true,
		data,
		meta: meta(),
	}
	outputJson(response)
}

/**
 * Build the error envelope for any thrown value
 */
export function buildErrorEnvelope(error: unknown): JsonResponse<never> {
	if (error instanceof SuivmError) {
		return { success: false, error: { code: error.code, message: error.message }, meta: meta() }
	}

	if (error instanceof ZodError) {
		return {
			success: false,
			error: {
				code: "VALIDATION_ERROR",
				message: error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
			},
			meta: meta(),
		}
	}

	return {
		success: false,
		error: {
			code: "UNKNOWN_ERROR",
			message: error instanceof Error ? error.message : "An unknown error occurred",
		},
		meta: meta(),
	}
}
