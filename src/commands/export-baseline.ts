import { Command } from 'commander'
import { exportBaselineRecords } from '../lib/baseline/exporter'
import { resolveSettings } from '../lib/config-loader'
import { SurfaceArchive } from '../lib/surface/archive'
import { candidateTypeNames } from '../lib/surface/candidates'
import { ArchiveTypeProvider } from '../lib/surface/provider'
import { STDOUT_DESTINATION, writeReport } from '../lib/report/report-writer'
import {
  CommonOptions,
  configOption,
  dotenvOption,
  failCommand,
  outputOption,
  prepareCommand,
  rootsOption,
  verbosityOption
} from './common'

interface ExportBaselineOptions extends CommonOptions {
  output?: string
  roots?: string
}

export function makeExportBaselineCommand(): Command {
  const exportBaseline = new Command('export-baseline')
    .description('Write the method list of an archive in baseline format, for use as the baseline of a later release')
    .argument('<archive>', 'Archive directory or bundle to export')

  outputOption(exportBaseline)
  rootsOption(exportBaseline)
  configOption(exportBaseline)
  dotenvOption(exportBaseline)
  verbosityOption(exportBaseline)

  exportBaseline.action(async (archivePath: string, options: ExportBaselineOptions) => {
    try {
      const config = await prepareCommand(options)
      const settings = resolveSettings({ roots: options.roots }, config)

      const archive = await SurfaceArchive.open(archivePath)
      const candidates = candidateTypeNames(archive.entryNames(), settings.roots)
      const records = exportBaselineRecords(candidates, new ArchiveTypeProvider(archive))

      const text = records.length > 0 ? records.join('\n') + '\n' : ''
      await writeReport(options.output ?? STDOUT_DESTINATION, text)
    } catch (error) {
      failCommand(error)
    }
  })

  return exportBaseline
}
