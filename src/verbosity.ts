import { CLIEventAdapter, surfaceEvents, VerbosityLevel } from './lib/events'

// Set up CLI event adapter to convert events to console output
export const cliAdapter = new CLIEventAdapter(surfaceEvents)

export function setVerbosity(level: VerbosityLevel): void {
  cliAdapter.setVerbosity(level)
}
