import { afterEach, describe, expect, it, vi } from "vitest"
import { z } from "zod"
import { exitCodeFor, handleError, wrapAction } from "../../src/utils/handle-error.js"
import {
	NetworkError,
	NotInstalledError,
	UnsupportedShellError,
	VersionNotFoundError,
} from "../../src/utils/errors.js"

afterEach(() => {
	process.exitCode = undefined
})

describe("exitCodeFor", () => {
	it("maps error kinds to exit codes", () => {
		expect(exitCodeFor(new NetworkError("offline"))).toBe(69)
		expect(exitCodeFor(new VersionNotFoundError("v1"))).toBe(66)
		expect(exitCodeFor(new UnsupportedShellError("csh"))).toBe(64)
		expect(exitCodeFor(new Error("boom"))).toBe(1)
	})
})

describe("handleError", () => {
	it("logs the message and sets the exit code", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {})

		handleError(new NotInstalledError("v1"))

		expect(error).toHaveBeenCalledWith(
			"error",
			"Version v1 is not installed. Please install it first.",
		)
		expect(process.exitCode).toBe(66)
	})

	it("prints a JSON envelope in JSON mode", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {})

		handleError(new VersionNotFoundError("v9"), { json: true })

		const output: unknown = JSON.parse(String(log.mock.calls[0]?.[0]))
		expect(output).toMatchObject({
			success: false,
			error: { code: "VERSION_NOT_FOUND", message: "Version v9 not found" },
		})
	})

	it("lists zod issues", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {})
		const result = z.object({ name: z.string() }).safeParse({ name: 1 })
		if (result.success) throw new Error("expected a parse failure")

		handleError(result.error)

		expect(error).toHaveBeenNthCalledWith(1, "error", "Validation failed:")
		expect(error).toHaveBeenNthCalledWith(2, "error", "  name: Expected string, received number")
		expect(process.exitCode).toBe(78)
	})
})

describe("wrapAction", () => {
	it("routes thrown errors to handleError", async () => {
		vi.spyOn(console, "error").mockImplementation(() => {})
		const action = wrapAction(async () => {
			throw new NetworkError("offline")
		})

		await action()

		expect(process.exitCode).toBe(69)
	})

	it("switches to JSON when an options argument sets json", async () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {})
		const action = wrapAction(async (_options: { json?: boolean }) => {
			throw new NetworkError("offline")
		})

		await action({ json: true })

		expect(String(log.mock.calls[0]?.[0])).toContain('"code": "NETWORK_ERROR"')
	})
})
