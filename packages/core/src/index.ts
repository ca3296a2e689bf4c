#!/usr/bin/env node
import { INTERRUPTED } from './cli/app.js'
import { createProgram } from './cli/program.js'
import { CalendarGraphError, errorMessage } from './errors.js'

process.on('SIGINT', () => {
  console.log(`\n\n${INTERRUPTED}`)
  process.exit(0)
})

createProgram()
  .parseAsync(process.argv)
  .catch((err) => {
    // Expected failures get a one-line message, anything else the stack
    if (err instanceof CalendarGraphError) {
      console.error(`\n✗ FEHLER: ${errorMessage(err)}`)
    } else {
      console.error('Fatal error:', err)
    }
    process.exit(1)
  })
