import * as fs from 'fs/promises'
import { Signature } from '../core/signature'
import { SignatureSet } from '../core/signature-set'
import { SurfaceEventEmitter, surfaceEvents } from '../events'
import { BaselineParseError, SurfaceIOError } from '../utils/errors'

export const BASELINE_FIELD_SEPARATOR = ','

export interface BaselineIndexOptions {
  /** Reject malformed records instead of skipping them. */
  strict?: boolean
  events?: SurfaceEventEmitter
}

const BYTE_ORDER_MARK = '\uFEFF'

export function stripByteOrderMark(content: string): string {
  return content.startsWith(BYTE_ORDER_MARK) ? content.slice(BYTE_ORDER_MARK.length) : content
}

/**
 * Splits a record on commas, dropping trailing empty fields. There is no escaping.
 */
export function splitRecord(line: string): string[] {
  const fields = line.split(BASELINE_FIELD_SEPARATOR)
  while (fields.length > 1 && fields[fields.length - 1] === '') {
    fields.pop()
  }
  return fields
}

/**
 * Types and method signatures of the baseline surface, read from records of the form
 * `typeName[,methodName,paramType1,paramType2,...]`.
 */
export class BaselineIndex {
  private types: Map<string, SignatureSet> = new Map()
  private skipped = 0
  private readonly strict: boolean
  private readonly events: SurfaceEventEmitter

  constructor(options: BaselineIndexOptions = {}) {
    this.strict = options.strict === true
    this.events = options.events ?? surfaceEvents
  }

  static fromLines(lines: Iterable<string>, options: BaselineIndexOptions = {}): BaselineIndex {
    const index = new BaselineIndex(options)
    let lineNumber = 0
    for (const line of lines) {
      lineNumber++
      index.addRecord(line, lineNumber)
    }
    return index
  }

  /**
   * Reads a baseline file.
   * @throws SurfaceIOError if the file cannot be read.
   */
  static async loadFrom(filePath: string, options: BaselineIndexOptions = {}): Promise<BaselineIndex> {
    const events = options.events ?? surfaceEvents
    events.emitEvent({
      type: 'baseline_loading_started',
      level: 'info',
      data: { path: filePath }
    })

    let content: string
    try {
      content = await fs.readFile(filePath, 'utf-8')
    } catch (error) {
      throw new SurfaceIOError(filePath, error)
    }

    const index = BaselineIndex.fromLines(stripByteOrderMark(content).split('\n'), options)
    events.emitEvent({
      type: 'baseline_loaded',
      level: 'info',
      data: {
        typeCount: index.typeCount,
        signatureCount: index.signatureCount,
        skippedRecords: index.skippedRecords
      }
    })
    return index
  }

  /**
   * Adds one record. Blank lines are ignored.
   */
  public addRecord(line: string, lineNumber: number): void {
    const record = line.endsWith('\r') ? line.slice(0, -1) : line
    if (record.trim() === '') {
      return
    }

    const [typeName, methodName, ...parameters] = splitRecord(record)
    if (typeName === '') {
      this.reject(lineNumber, 'missing type name')
      return
    }
    if (methodName === '' && parameters.length > 0) {
      this.reject(lineNumber, `missing method name for type ${typeName}`)
      return
    }

    let signatures = this.types.get(typeName)
    if (!signatures) {
      signatures = new SignatureSet()
      this.types.set(typeName, signatures)
    }

    // Nothing further to do for types with no methods
    if (methodName === undefined || methodName === '') {
      return
    }
    signatures.add(Signature.create(methodName, parameters))
  }

  public hasType(typeName: string): boolean {
    return this.types.has(typeName)
  }

  public signaturesOf(typeName: string): readonly Signature[] | undefined {
    return this.types.get(typeName)?.values()
  }

  public contains(typeName: string, signature: Signature): boolean {
    return this.types.get(typeName)?.has(signature) ?? false
  }

  public typeNames(): string[] {
    return [...this.types.keys()]
  }

  public get typeCount(): number {
    return this.types.size
  }

  public get signatureCount(): number {
    let count = 0
    for (const signatures of this.types.values()) {
      count += signatures.size
    }
    return count
  }

  public get skippedRecords(): number {
    return this.skipped
  }

  private reject(lineNumber: number, reason: string): void {
    if (this.strict) {
      throw new BaselineParseError(lineNumber, reason)
    }
    this.skipped++
    this.events.emitEvent({
      type: 'baseline_record_skipped',
      level: 'warn',
      data: { lineNumber, reason }
    })
  }
}
