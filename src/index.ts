#!/usr/bin/env node
import { createProgram } from './cli/program.js'
import { errorMessage } from './core/errors.js'
import { formatError } from './cli/ui.js'

createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
        console.error(formatError(errorMessage(error)))
        process.exitCode = 1
    })
