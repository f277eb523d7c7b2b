import chalk from 'chalk'
import { SurfaceEvent, SurfaceEventType } from '../types/events'
import { SurfaceEventEmitter } from './emitter'

/**
 * Verbosity levels for filtering console output:
 * 0 (default): statistics, warnings and errors
 * 1 (-v): add input loading and scan progress
 * 2 (-vv): add per-pass counts
 * 3 (-vvv): full debug, one line per scanned type
 */
export type VerbosityLevel = 0 | 1 | 2 | 3

const LEVEL_0_EVENTS: ReadonlySet<SurfaceEventType> = new Set<SurfaceEventType>([
  'baseline_loaded', 'baseline_record_skipped', 'archive_loaded', 'contract_types_found',
  'type_not_found', 'parameter_usage_summary', 'source_usage_summary',
  'cli_error', 'unhandled_rejection', 'uncaught_exception'
])

const LEVEL_1_EVENTS: ReadonlySet<SurfaceEventType> = new Set<SurfaceEventType>([
  'baseline_loading_started', 'scan_started', 'report_written'
])

const LEVEL_2_EVENTS: ReadonlySet<SurfaceEventType> = new Set<SurfaceEventType>([
  'scan_completed'
])

export function toVerbosityLevel(count: number): VerbosityLevel {
  if (count <= 0) return 0
  if (count === 1) return 1
  if (count === 2) return 2
  return 3
}

/**
 * CLI adapter that converts structured events into colored progress lines.
 * Everything goes to stderr so a report written to stdout stays clean.
 */
export class CLIEventAdapter {
  private readonly listener: (event: SurfaceEvent) => void

  constructor(
    private readonly emitter: SurfaceEventEmitter,
    private verbosity: VerbosityLevel = 0
  ) {
    this.listener = (event) => this.handleEvent(event)
    this.emitter.onAnyEvent(this.listener)
  }

  /**
   * Updates the verbosity level for this adapter.
   */
  setVerbosity(verbosity: VerbosityLevel): void {
    this.verbosity = verbosity
  }

  private getEventVerbosityLevel(eventType: SurfaceEventType): VerbosityLevel {
    if (LEVEL_0_EVENTS.has(eventType)) return 0
    if (LEVEL_1_EVENTS.has(eventType)) return 1
    if (LEVEL_2_EVENTS.has(eventType)) return 2
    // Default to level 3 for anything uncategorized
    return 3
  }

  private handleEvent(event: SurfaceEvent): void {
    if (this.verbosity < this.getEventVerbosityLevel(event.type)) {
      return
    }

    switch (event.type) {
      case 'baseline_loading_started':
        console.error(chalk.blue(`Reading baseline method list from ${event.data.path}...`))
        break

      case 'baseline_loaded':
        console.error(chalk.green(`Baseline has ${event.data.typeCount} types (${event.data.signatureCount} methods)`))
        if (event.data.skippedRecords > 0) {
          console.error(chalk.yellow(`   ${event.data.skippedRecords} malformed baseline records skipped`))
        }
        break

      case 'baseline_record_skipped':
        console.error(chalk.yellow(`Warning: skipping baseline line ${event.data.lineNumber}: ${event.data.reason}`))
        break

      case 'archive_loaded':
        console.error(chalk.green(`Candidate surface has ${event.data.candidateCount} types (${event.data.entryCount} archive entries)`))
        break

      case 'contract_types_found':
        console.error(chalk.green(`Found ${event.data.count} functional interfaces`))
        break

      case 'type_not_found':
        console.error(chalk.yellow(`Type not found: ${event.data.typeName} (${event.data.reason})`))
        break

      case 'scan_started':
        if (event.data.target) {
          console.error(chalk.blue(`Searching for methods that can use ${event.data.target}`))
        } else {
          console.error(chalk.blue(`Searching ${event.data.typeCount} types for methods that can use lambda expressions`))
        }
        break

      case 'scan_completed':
        console.error(chalk.gray(`   ${event.data.typeCount} types searched: ${event.data.parameterTypeCount} with lambda parameters, ${event.data.sourceTypeCount} with sources, ${event.data.unresolvedCount} not found`))
        break

      case 'parameter_usage_summary':
        console.error(`Lambda usage: ${event.data.methodCount} methods (of which ${event.data.newMethodCount} are new) in ${event.data.typeCount} types`)
        break

      case 'source_usage_summary':
        console.error(`Stream sources/intermediate operations: ${event.data.methodCount} methods in ${event.data.typeCount} types`)
        break

      case 'report_written':
        console.error(chalk.green(`Report written to ${event.data.destination}`))
        break

      case 'cli_error':
        console.error(chalk.red('Error:'), event.data.message)
        break

      case 'unhandled_rejection':
        console.error(chalk.red('Unhandled Rejection:'), event.data.reason)
        break

      case 'uncaught_exception':
        console.error(chalk.red('Uncaught Exception:'), event.data.error)
        break

      case 'debug_info': {
        const levelColor = event.level === 'warn' ? chalk.yellow :
                          event.level === 'info' ? chalk.blue :
                          chalk.gray
        console.error(levelColor(`[${event.level.toUpperCase()}] ${event.data.message}`))
        break
      }
    }
  }

  /**
   * Stop listening to events.
   */
  public destroy(): void {
    this.emitter.offAnyEvent(this.listener)
  }
}
