import { BaselineIndex } from '../baseline/baseline-index'
import { SurfaceEventEmitter, surfaceEvents } from '../events'
import { SurfaceArchive } from '../surface/archive'
import { candidateTypeNames, DEFAULT_NAMESPACE_ROOTS } from '../surface/candidates'
import { ArchiveTypeProvider } from '../surface/provider'
import { TypeMetadataProvider } from '../types/surface'
import { UnknownContractTypeError } from '../utils/errors'
import { buildContractTypeSet, ContractTypeSet, TypeClassifier } from './classifier'
import { contractSetMatcher, ParameterMatcher, ScanResult, SurfaceScanner, targetTypeMatcher } from './scanner'

export interface SurfaceAnalyserOptions {
  /** Namespace root prefixes that select candidate types from the archive. */
  roots?: readonly string[]
  /** Exact return type of source operations. */
  sourceType?: string
  /** Reject malformed baseline records. */
  strictBaseline?: boolean
  events?: SurfaceEventEmitter
}

export interface TargetScan {
  target: string
  result: ScanResult
}

/**
 * Compares a candidate surface against a baseline: finds the functional interfaces of
 * the candidate surface and the methods that can take lambda expressions or return a source type.
 */
export class SurfaceAnalyser {
  /** Functional interfaces of the candidate surface. */
  public readonly contractTypes: ContractTypeSet
  private readonly scanner: SurfaceScanner
  private readonly events: SurfaceEventEmitter

  constructor(
    public readonly baseline: BaselineIndex,
    provider: TypeMetadataProvider,
    public readonly candidateTypes: readonly string[],
    options: SurfaceAnalyserOptions = {}
  ) {
    const events = options.events ?? surfaceEvents
    this.events = events
    this.scanner = new SurfaceScanner(provider, { sourceType: options.sourceType, events })
    this.contractTypes = buildContractTypeSet(candidateTypes, new TypeClassifier(provider, events))

    events.emitEvent({
      type: 'contract_types_found',
      level: 'info',
      data: { count: this.contractTypes.size }
    })
  }

  /**
   * Reads the baseline file and the candidate archive, then classifies the candidate types.
   * @throws SurfaceIOError if either input cannot be read.
   */
  static async load(baselinePath: string, archivePath: string, options: SurfaceAnalyserOptions = {}): Promise<SurfaceAnalyser> {
    const events = options.events ?? surfaceEvents
    const baseline = await BaselineIndex.loadFrom(baselinePath, { strict: options.strictBaseline, events })
    const archive = await SurfaceArchive.open(archivePath)
    const candidates = candidateTypeNames(archive.entryNames(), options.roots ?? DEFAULT_NAMESPACE_ROOTS)

    events.emitEvent({
      type: 'archive_loaded',
      level: 'info',
      data: {
        path: archive.source,
        entryCount: archive.size,
        candidateCount: candidates.length
      }
    })

    return new SurfaceAnalyser(baseline, new ArchiveTypeProvider(archive), candidates, options)
  }

  /**
   * Searches every candidate type for methods taking any functional interface, and for source methods.
   */
  public analyseAll(): ScanResult {
    return this.runPass(this.candidateTypes, contractSetMatcher(this.contractTypes))
  }

  /**
   * Searches a single type, which need not be a top-level candidate.
   */
  public analyseType(typeName: string): ScanResult {
    return this.runPass([typeName], contractSetMatcher(this.contractTypes))
  }

  /**
   * Searches the candidate surface for methods taking one specific functional interface.
   * @throws UnknownContractTypeError if the type is not a functional interface.
   */
  public findUsesOf(target: string): ScanResult {
    this.assertContractType(target)
    return this.runPass(this.candidateTypes, targetTypeMatcher(target), target)
  }

  /**
   * One independent pass per target. All targets are checked before the first pass starts.
   * @throws UnknownContractTypeError if any target is not a functional interface.
   */
  public findUsesOfEach(targets: readonly string[]): TargetScan[] {
    targets.forEach(target => this.assertContractType(target))
    return targets.map(target => ({ target, result: this.findUsesOf(target) }))
  }

  private runPass(typeNames: readonly string[], matcher: ParameterMatcher, target?: string): ScanResult {
    this.events.emitEvent({
      type: 'scan_started',
      level: 'info',
      data: { typeCount: typeNames.length, target }
    })

    const result = this.scanner.scan(typeNames, matcher)

    this.events.emitEvent({
      type: 'scan_completed',
      level: 'info',
      data: {
        typeCount: typeNames.length,
        parameterTypeCount: result.parameterRole.size,
        sourceTypeCount: result.returnRole.size,
        unresolvedCount: result.unresolved.length,
        target
      }
    })
    return result
  }

  private assertContractType(typeName: string): void {
    if (!this.contractTypes.has(typeName)) {
      throw new UnknownContractTypeError(typeName)
    }
  }
}
