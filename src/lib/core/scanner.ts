import { SurfaceEventEmitter, surfaceEvents } from '../events'
import { OperationRecord, TypeMetadataProvider } from '../types/surface'
import { ContractTypeSet, isSyntheticName } from './classifier'
import { ARRAY_MARKER, Signature } from './signature'
import { SignatureSet } from './signature-set'

export const DEFAULT_SOURCE_TYPE = 'java.util.stream.Stream'

/**
 * Decides whether a (non-array) parameter type makes an operation usable with a lambda.
 */
export type ParameterMatcher = (parameterType: string) => boolean

/** Matches exactly one requested contract type. */
export function targetTypeMatcher(typeName: string): ParameterMatcher {
  return (parameterType) => parameterType === typeName
}

/** Matches any member of the contract type set. */
export function contractSetMatcher(contractTypes: ContractTypeSet): ParameterMatcher {
  return (parameterType) => contractTypes.has(parameterType)
}

export interface ScanResult {
  /** Operations taking a contract type parameter, by type name. */
  parameterRole: Map<string, Signature[]>
  /** Operations returning the source type, by type name. */
  returnRole: Map<string, Signature[]>
  /** Types that could not be resolved. */
  unresolved: string[]
}

export function createScanResult(): ScanResult {
  return {
    parameterRole: new Map(),
    returnRole: new Map(),
    unresolved: []
  }
}

export function hasMatchingParameter(signature: Signature, matcher: ParameterMatcher): boolean {
  return signature.parameters.some(parameter => !parameter.startsWith(ARRAY_MARKER) && matcher(parameter))
}

export interface SurfaceScannerOptions {
  /** Exact return type that marks an operation as a source. */
  sourceType?: string
  events?: SurfaceEventEmitter
}

/**
 * Searches candidate types for operations that take a contract type parameter
 * and for operations that return the source type.
 */
export class SurfaceScanner {
  private readonly sourceType: string
  private readonly events: SurfaceEventEmitter

  constructor(
    private readonly provider: TypeMetadataProvider,
    options: SurfaceScannerOptions = {}
  ) {
    this.sourceType = options.sourceType ?? DEFAULT_SOURCE_TYPE
    this.events = options.events ?? surfaceEvents
  }

  /**
   * Runs one pass over the given types. Each pass starts from empty result maps.
   */
  public scan(typeNames: Iterable<string>, matcher: ParameterMatcher): ScanResult {
    const result = createScanResult()
    for (const typeName of [...typeNames].sort()) {
      this.scanType(typeName, matcher, result)
    }
    return result
  }

  /**
   * Records the matches of a single type into `result`. An unresolvable type is reported and skipped.
   */
  public scanType(typeName: string, matcher: ParameterMatcher, result: ScanResult): void {
    const resolved = this.provider.resolve(typeName)
    if (!resolved.found) {
      result.unresolved.push(typeName)
      this.events.emitEvent({
        type: 'type_not_found',
        level: 'warn',
        data: { typeName, reason: resolved.reason }
      })
      return
    }

    const operations = resolved.type.operations.filter(operation => !isSyntheticName(operation.name))

    const parameterMatches = this.findParameterMatches(operations, matcher)
    if (parameterMatches.length > 0) {
      result.parameterRole.set(typeName, parameterMatches)
    }

    const sourceMatches = operations
      .filter(operation => operation.returnType === this.sourceType)
      .map(toSignature)
    if (sourceMatches.length > 0) {
      result.returnRole.set(typeName, sourceMatches)
    }

    this.events.emitEvent({
      type: 'debug_info',
      level: 'debug',
      data: { message: `${typeName}: ${parameterMatches.length} parameter matches, ${sourceMatches.length} source matches` }
    })
  }

  private findParameterMatches(operations: OperationRecord[], matcher: ParameterMatcher): Signature[] {
    // Operations differing only in return type collapse to one signature
    const matches = new SignatureSet()
    for (const operation of operations) {
      const signature = toSignature(operation)
      if (hasMatchingParameter(signature, matcher)) {
        matches.add(signature)
      }
    }
    return [...matches]
  }
}

export function toSignature(operation: OperationRecord): Signature {
  return Signature.create(operation.name, operation.parameters)
}
