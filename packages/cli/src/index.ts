#!/usr/bin/env node
/**
 * suivm CLI
 * Install and switch between Sui toolchain releases
 */

import { defaultContextFactory } from "./context.js"
import { createProgram } from "./program.js"
import { handleError } from "./utils/handle-error.js"

const program = createProgram({ getContext: defaultContextFactory })

// Command actions report their own errors; this only sees the platform gate
program.parseAsync(process.argv).catch((error: unknown) => handleError(error))
