import { Command } from 'commander'
import * as dotenv from 'dotenv'
import * as path from 'path'
import { ENV_CONFIG, loadConfig } from '../lib/config-loader'
import { surfaceEvents, toVerbosityLevel } from '../lib/events'
import { SurfaceConfig } from '../lib/types/config'
import { exitCodeFor } from '../lib/utils/errors'
import { setVerbosity } from '../verbosity'

export interface CommonOptions {
  config?: string
  dotenv?: string
  verbose: number
}

/**
 * Adds the --output option to a command.
 */
export const outputOption = (cmd: Command): Command =>
  cmd.option('-o, --output <path>', 'Output file for the report ("-" for stdout)')

/**
 * Adds the --roots option to a command.
 */
export const rootsOption = (cmd: Command): Command =>
  cmd.option('--roots <prefixes>', 'Comma-separated namespace roots of candidate types (default: java,org)')

/**
 * Adds the --dotenv option to a command.
 */
export const dotenvOption = (cmd: Command): Command =>
  cmd.option('--dotenv <path>', 'Path to a custom .env file')

/**
 * Adds the --config option to a command.
 */
export const configOption = (cmd: Command): Command =>
  cmd.option('--config <path>', 'Path to a configuration file (lambda-surface.config.{json|yml|yaml})')

/**
 * Adds verbosity options to a command.
 */
export const verbosityOption = (cmd: Command): Command =>
  cmd.option('-v, --verbose', 'Enable verbose logging (use -vv or -vvv for more detail)', (_: string, previous: number) => previous + 1, 0)

/**
 * Loads environment variables from the specified .env file path.
 */
export function loadDotenv(options: { dotenv?: string }): void {
  const dotenvPath = options.dotenv ? path.resolve(options.dotenv) : path.resolve(process.cwd(), '.env')
  dotenv.config({ path: dotenvPath })
}

/**
 * Shared start of every command: .env, verbosity, then the configuration file.
 */
export async function prepareCommand(options: CommonOptions): Promise<SurfaceConfig> {
  loadDotenv(options)
  setVerbosity(toVerbosityLevel(options.verbose))
  return loadConfig(options.config ?? process.env[ENV_CONFIG])
}

/**
 * Reports a failed command and exits with the status matching the failure.
 */
export function failCommand(error: unknown): never {
  surfaceEvents.emitEvent({
    type: 'cli_error',
    level: 'error',
    data: {
      message: error instanceof Error ? error.message : String(error)
    }
  })
  process.exit(exitCodeFor(error))
}
