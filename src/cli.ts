import { Command } from 'commander'
import { makeScanCommand, makeExportBaselineCommand } from './commands'

export function setupCommands(program: Command): void {
  // Make scan the default command when no subcommand is provided
  program.addCommand(makeScanCommand(), {
    isDefault: true,
    hidden: false // Keep it visible in help
  })

  program.addCommand(makeExportBaselineCommand())
}
