import { OperationRecord, TypeKind, TypeMetadataProvider, TypeRecord } from '../types/surface'
import { SurfaceEventEmitter, surfaceEvents } from '../events'

/**
 * Names containing this character are compiler generated and never part of a type's contract.
 */
export const SYNTHETIC_NAME_MARKER = '$'

export function isSyntheticName(name: string): boolean {
  return name.includes(SYNTHETIC_NAME_MARKER)
}

export function isInterfaceKind(kind: TypeKind): boolean {
  return kind === 'interface' || kind === 'annotation'
}

function isAbstractOperation(operation: OperationRecord): boolean {
  return !isSyntheticName(operation.name) &&
    !operation.isSynthetic &&
    !operation.isDefault &&
    !operation.isStatic
}

/**
 * A functional interface has exactly one abstract operation, so default and
 * static operations are ignored. Anything that is not an interface never qualifies.
 */
export function isContractType(type: Pick<TypeRecord, 'kind' | 'operations'>): boolean {
  if (!isInterfaceKind(type.kind)) {
    return false
  }
  return type.operations.filter(isAbstractOperation).length === 1
}

/**
 * Classifies types by qualified name, resolving them through a provider.
 * Results are memoized; an unresolvable type is reported and classified as not qualifying.
 */
export class TypeClassifier {
  private cache: Map<string, boolean> = new Map()

  constructor(
    private readonly provider: TypeMetadataProvider,
    private readonly events: SurfaceEventEmitter = surfaceEvents
  ) {}

  public classify(qualifiedName: string): boolean {
    const cached = this.cache.get(qualifiedName)
    if (cached !== undefined) {
      return cached
    }

    const resolved = this.provider.resolve(qualifiedName)
    let result = false
    if (resolved.found) {
      result = isContractType(resolved.type)
    } else {
      this.events.emitEvent({
        type: 'type_not_found',
        level: 'warn',
        data: { typeName: qualifiedName, reason: resolved.reason }
      })
    }

    this.cache.set(qualifiedName, result)
    return result
  }
}

/**
 * Sorted, deduplicated list of contract type names with constant-time membership.
 */
export class ContractTypeSet implements Iterable<string> {
  private readonly names: readonly string[]
  private readonly lookup: ReadonlySet<string>

  constructor(names: Iterable<string>) {
    this.lookup = new Set(names)
    this.names = Object.freeze([...this.lookup].sort())
  }

  public has(typeName: string): boolean {
    return this.lookup.has(typeName)
  }

  public get size(): number {
    return this.names.length
  }

  public toArray(): readonly string[] {
    return this.names
  }

  [Symbol.iterator](): Iterator<string> {
    return this.names[Symbol.iterator]()
  }
}

export function buildContractTypeSet(candidateTypes: Iterable<string>, classifier: TypeClassifier): ContractTypeSet {
  const contractTypes: string[] = []
  for (const typeName of candidateTypes) {
    if (classifier.classify(typeName)) {
      contractTypes.push(typeName)
    }
  }
  return new ContractTypeSet(contractTypes)
}
