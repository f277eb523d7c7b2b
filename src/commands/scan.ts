import { Command, Option } from 'commander'
import { resolveSettings, splitList } from '../lib/config-loader'
import { SurfaceAnalyser } from '../lib/core/analyser'
import { absentFromBaseline, neverNewType, NoveltyPolicy } from '../lib/core/novelty'
import { ScanResult } from '../lib/core/scanner'
import { ReportWriter, writeReport } from '../lib/report/report-writer'
import { NewTypeMode } from '../lib/types/config'
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

interface ScanOptions extends CommonOptions {
  output?: string
  type?: string
  functional?: string
  printContractTypes: boolean
  sources: boolean
  markNew: boolean
  markNewTypes: boolean
  ignoreNamespace: boolean
  roots?: string
  sourceType?: string
  strictBaseline: boolean
}

export interface ScanReportRequest {
  /** Analyse just this type. */
  type?: string
  /** Search for uses of these functional interfaces, one pass each. */
  functional: string[]
  printContractTypes: boolean
  sources: boolean
  markNew: boolean
  newTypes: NewTypeMode
  excludeNamespace?: string
}

interface ScanPass {
  target?: string
  result: ScanResult
}

/**
 * Runs the requested passes and renders the report text.
 * All scanning happens before any section is rendered.
 * @throws UnknownContractTypeError if a requested functional interface is unknown.
 */
export function buildScanReport(analyser: SurfaceAnalyser, request: ScanReportRequest): string {
  let passes: ScanPass[]
  if (request.type) {
    passes = [{ result: analyser.analyseType(request.type) }]
  } else if (request.functional.length > 0) {
    passes = analyser.findUsesOfEach(request.functional)
  } else {
    passes = [{ result: analyser.analyseAll() }]
  }

  const novelty = new NoveltyPolicy(analyser.baseline, {
    newType: request.newTypes === 'absent' ? absentFromBaseline : neverNewType
  })
  const writer = new ReportWriter(novelty, {
    markNew: request.markNew,
    excludeNamespace: request.excludeNamespace
  })

  if (request.printContractTypes) {
    writer.writeContractTypes(analyser.contractTypes)
  }
  for (const pass of passes) {
    writer.writeParameterUsage(pass.result, pass.target)
  }
  // The return role does not depend on the parameter matcher, so any pass will do
  if (request.sources) {
    writer.writeSources(passes[0].result)
  }

  return writer.toString()
}

export function makeScanCommand(): Command {
  const scan = new Command('scan')
    .description('Find methods that can take lambda expressions, and mark those new since the baseline')
    .argument('<baseline>', 'Baseline method list (CSV: type[,method,param...])')
    .argument('<archive>', 'Candidate archive: a directory of type definitions or a .json/.yml bundle')
    .addOption(new Option('-t, --type <name>', 'Type to analyse (rather than the full surface)'))
    .addOption(new Option('-f, --functional <types>', 'Comma-separated functional interfaces to search for').conflicts('type'))
    .option('-p, --print-contract-types', 'Record details of functional interfaces found', false)
    .option('-s, --sources', 'Record all methods that return the source type', false)
    .option('-n, --mark-new', 'Mark new types and methods', false)
    .option('--mark-new-types', 'Treat types missing from the baseline as new', false)
    .option('-i, --ignore-namespace', 'Ignore the excluded namespace (default java.util.stream) in listings', false)
    .option('--source-type <name>', 'Return type that marks a source method (default java.util.stream.Stream)')
    .option('--strict-baseline', 'Fail on malformed baseline records instead of skipping them', false)

  outputOption(scan)
  rootsOption(scan)
  configOption(scan)
  dotenvOption(scan)
  verbosityOption(scan)

  scan.action(async (baselinePath: string, archivePath: string, options: ScanOptions) => {
    try {
      const config = await prepareCommand(options)
      const settings = resolveSettings({
        roots: options.roots,
        sourceType: options.sourceType,
        output: options.output,
        newTypes: options.markNewTypes ? 'absent' : undefined
      }, config)

      const analyser = await SurfaceAnalyser.load(baselinePath, archivePath, {
        roots: settings.roots,
        sourceType: settings.sourceType,
        strictBaseline: options.strictBaseline
      })

      const report = buildScanReport(analyser, {
        type: options.type,
        functional: options.functional ? splitList(options.functional) : [],
        printContractTypes: options.printContractTypes,
        sources: options.sources,
        markNew: options.markNew,
        newTypes: settings.newTypes,
        excludeNamespace: options.ignoreNamespace ? settings.excludeNamespace : undefined
      })

      await writeReport(settings.output, report)
    } catch (error) {
      failCommand(error)
    }
  })

  return scan
}
