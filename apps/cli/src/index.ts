#!/usr/bin/env node
/**
 * kbforge CLI
 */

import { createProgram, processIO } from './program.js'

createProgram().parseAsync(process.argv).catch((err: unknown) => {
  processIO.writeError(`Error: ${err instanceof Error ? err.message : String(err)}`)
  processIO.setExitCode(1)
})
