import { afterEach, describe, expect, it, vi } from "vitest"
import {
	parseShellKind,
	printShellGuidance,
	shellRcFile,
	shellSnippet,
	sourceHint,
} from "../../src/shell/config.js"
import { UnsupportedShellError } from "../../src/utils/errors.js"
import { setLoggerOptions } from "../../src/utils/logger.js"

const BASE = "/home/u/.suivm"

describe("shellSnippet", () => {
	it("exports PATH for bash and zsh", () => {
		expect(shellSnippet(BASE, "bash")).toBe('export PATH="/home/u/.suivm/current/bin:$PATH"')
		expect(shellSnippet(BASE, "zsh")).toBe('export PATH="/home/u/.suivm/current/bin:$PATH"')
	})

	it("uses set -gx for fish", () => {
		expect(shellSnippet(BASE, "fish")).toBe("set -gx PATH /home/u/.suivm/current/bin $PATH")
	})

	it("ignores case", () => {
		expect(shellSnippet(BASE, "ZSH")).toBe(shellSnippet(BASE, "zsh"))
	})

	it("rejects other shells", () => {
		expect(() => shellSnippet(BASE, "powershell")).toThrow("Unsupported shell: powershell")
	})
})

describe("parseShellKind", () => {
	it("trims and lowercases", () => {
		expect(parseShellKind(" Fish ")).toBe("fish")
	})

	it("throws UnsupportedShellError", () => {
		expect(() => parseShellKind("tcsh")).toThrow(UnsupportedShellError)
	})
})

describe("sourceHint", () => {
	it("names the rc file", () => {
		expect(shellRcFile("zsh")).toBe("~/.zshrc")
		expect(sourceHint("bash")).toBe("source ~/.bashrc # or restart your terminal")
		expect(sourceHint("fish")).toBe("source ~/.config/fish/config.fish")
	})
})

describe("printShellGuidance", () => {
	afterEach(() => {
		setLoggerOptions({})
	})

	it("prints a snippet for every shell", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {})

		printShellGuidance(BASE)

		const lines = log.mock.calls.map((args) => args.join(" "))
		expect(lines).toContain('export PATH="/home/u/.suivm/current/bin:$PATH"')
		expect(lines).toContain("set -gx PATH /home/u/.suivm/current/bin $PATH")
		expect(lines).toContain("For fish (~/.config/fish/config.fish):")
	})

	it("prints nothing in quiet mode", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {})
		setLoggerOptions({ quiet: true })

		printShellGuidance(BASE)

		expect(log).not.toHaveBeenCalled()
	})
})
