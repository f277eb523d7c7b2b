import * as fs from 'fs/promises'
import { NoveltyPolicy } from '../core/novelty'
import { ScanResult } from '../core/scanner'
import { Signature } from '../core/signature'
import { SurfaceEventEmitter, surfaceEvents } from '../events'
import { SurfaceIOError } from '../utils/errors'

export const CONTRACT_TYPES_TITLE = 'Functional Interfaces'
export const PARAMETER_USAGE_TITLE = 'Methods that can use Lambda expressions for parameters'
export const SOURCES_TITLE = 'Stream sources'
export const NEW_MARKER = ' NEW'
export const STDOUT_DESTINATION = '-'

export interface ReportOptions {
  /** Suffix new types and methods with a marker. */
  markNew?: boolean
  /** Leave types under this namespace prefix out of the listings and their statistics. */
  excludeNamespace?: string
  events?: SurfaceEventEmitter
}

export interface ParameterUsageStats {
  methodCount: number
  newMethodCount: number
  typeCount: number
}

export interface SourceUsageStats {
  methodCount: number
  typeCount: number
}

/**
 * Builds the text report section by section. Groups are sorted by type name,
 * and every header is underlined to its own length.
 */
export class ReportWriter {
  private lines: string[] = []
  private readonly markNew: boolean
  private readonly excludeNamespace?: string
  private readonly events: SurfaceEventEmitter

  constructor(private readonly novelty: NoveltyPolicy, options: ReportOptions = {}) {
    this.markNew = options.markNew === true
    this.excludeNamespace = options.excludeNamespace
    this.events = options.events ?? surfaceEvents
  }

  /**
   * Lists functional interfaces, marking those the baseline does not know.
   */
  public writeContractTypes(typeNames: Iterable<string>): void {
    this.writeSectionHeader(CONTRACT_TYPES_TITLE)
    const sorted = [...typeNames].sort()
    for (const typeName of sorted) {
      this.lines.push(typeName + this.marker(this.novelty.isAbsentType(typeName)))
    }
    if (sorted.length > 0) {
      this.lines.push('')
    }
  }

  /**
   * Lists methods that take a functional interface parameter.
   * @param target The single functional interface searched for, if any.
   */
  public writeParameterUsage(result: ScanResult, target?: string): ParameterUsageStats {
    this.writeSectionHeader(target ? `${PARAMETER_USAGE_TITLE} (${target})` : PARAMETER_USAGE_TITLE)

    const stats: ParameterUsageStats = { methodCount: 0, newMethodCount: 0, typeCount: 0 }
    for (const [typeName, signatures] of this.included(result.parameterRole)) {
      stats.typeCount++
      stats.methodCount += signatures.length
      stats.newMethodCount += this.writeGroup(typeName, signatures)
    }

    this.events.emitEvent({
      type: 'parameter_usage_summary',
      level: 'info',
      data: { ...stats }
    })
    return stats
  }

  /**
   * Lists methods returning the source type, i.e. sources and intermediate operations.
   */
  public writeSources(result: ScanResult): SourceUsageStats {
    this.writeSectionHeader(SOURCES_TITLE)

    const stats: SourceUsageStats = { methodCount: 0, typeCount: 0 }
    for (const [typeName, signatures] of this.included(result.returnRole)) {
      stats.typeCount++
      stats.methodCount += signatures.length
      this.writeGroup(typeName, signatures)
    }

    this.events.emitEvent({
      type: 'source_usage_summary',
      level: 'info',
      data: { ...stats }
    })
    return stats
  }

  public toString(): string {
    return this.lines.join('\n')
  }

  private included(mapping: Map<string, Signature[]>): Array<[string, Signature[]]> {
    const exclude = this.excludeNamespace
    return [...mapping.entries()]
      .filter(([typeName]) => !(exclude && typeName.startsWith(exclude)))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  }

  /**
   * @returns how many of the signatures are new
   */
  private writeGroup(typeName: string, signatures: Signature[]): number {
    this.lines.push(typeName + this.marker(this.novelty.isNewType(typeName)))
    this.lines.push(underline('-', typeName))

    let newCount = 0
    for (const signature of signatures) {
      const isNew = this.novelty.isNewOperation(typeName, signature)
      if (isNew) {
        newCount++
      }
      this.lines.push(signature.render() + this.marker(isNew))
    }
    this.lines.push('')
    return newCount
  }

  private writeSectionHeader(title: string): void {
    this.lines.push(title, underline('=', title), '')
  }

  private marker(isNew: boolean): string {
    return this.markNew && isNew ? NEW_MARKER : ''
  }
}

export function underline(character: string, text: string): string {
  return character.repeat(text.length)
}

/**
 * Writes the finished report to a file, or to stdout for `-`.
 * @throws SurfaceIOError if the file cannot be written.
 */
export async function writeReport(
  destination: string,
  text: string,
  events: SurfaceEventEmitter = surfaceEvents
): Promise<void> {
  if (destination === STDOUT_DESTINATION) {
    process.stdout.write(text)
  } else {
    try {
      await fs.writeFile(destination, text, 'utf-8')
    } catch (error) {
      throw new SurfaceIOError(destination, error)
    }
  }

  events.emitEvent({
    type: 'report_written',
    level: 'info',
    data: { destination: destination === STDOUT_DESTINATION ? 'stdout' : destination }
  })
}
