#!/usr/bin/env node

import { program } from 'commander'
import { setupCommands } from './cli'
import packageJson from '../package.json'
import { surfaceEvents } from './lib/events'
import { EXIT_USAGE } from './lib/utils/errors'
import './verbosity'

// Setup global error handling
process.on('unhandledRejection', (reason) => {
  surfaceEvents.emitEvent({
    type: 'unhandled_rejection',
    level: 'error',
    data: {
      reason
    }
  })
  process.exit(1)
})

process.on('uncaughtException', (error) => {
  surfaceEvents.emitEvent({
    type: 'uncaught_exception',
    level: 'error',
    data: {
      error
    }
  })
  process.exit(1)
})

async function main(): Promise<void> {
  try {
    // Configure the main program
    program
      .name('lambda-surface')
      .description('Find the methods of a library surface that can take lambda expressions, and which are new since a baseline')
      .version(packageJson.version)

    // Setup all commands
    setupCommands(program)

    // Parse arguments
    await program.parseAsync(process.argv)
  } catch (error) {
    surfaceEvents.emitEvent({
      type: 'cli_error',
      level: 'error',
      data: {
        message: error instanceof Error ? error.message : String(error)
      }
    })
    process.exit(EXIT_USAGE)
  }
}

void main()
