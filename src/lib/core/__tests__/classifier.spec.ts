import { SurfaceEventEmitter } from '../../events'
import { SurfaceEvent } from '../../types/events'
import { OperationRecord, ResolveResult, TypeKind, TypeMetadataProvider, TypeRecord } from '../../types/surface'
import { buildContractTypeSet, ContractTypeSet, isContractType, TypeClassifier } from '../classifier'

function operation(name: string, flags: Partial<OperationRecord> = {}): OperationRecord {
  return {
    name,
    parameters: [],
    returnType: 'void',
    isDefault: false,
    isStatic: false,
    isSynthetic: false,
    ...flags
  }
}

function type(kind: TypeKind, operations: OperationRecord[], qualifiedName = 'test.Type'): TypeRecord {
  return { qualifiedName, kind, operations }
}

class MapProvider implements TypeMetadataProvider {
  public calls: string[] = []

  constructor(private readonly types: Record<string, TypeRecord>) {}

  resolve(qualifiedName: string): ResolveResult {
    this.calls.push(qualifiedName)
    const found = this.types[qualifiedName]
    return found ? { found: true, type: found } : { found: false, reason: 'not in test surface' }
  }
}

describe('isContractType', () => {
  it('should accept an interface with exactly one abstract operation', () => {
    expect(isContractType(type('interface', [operation('accept')]))).toBe(true)
  })

  it('should ignore default operations', () => {
    expect(isContractType(type('interface', [
      operation('apply'),
      operation('andThen', { isDefault: true })
    ]))).toBe(true)
  })

  it('should ignore static operations', () => {
    expect(isContractType(type('interface', [
      operation('compare'),
      operation('naturalOrder', { isStatic: true })
    ]))).toBe(true)
  })

  it('should ignore synthetic operations, flagged or by name', () => {
    expect(isContractType(type('interface', [
      operation('test'),
      operation('bridge', { isSynthetic: true }),
      operation('lambda$negate$0')
    ]))).toBe(true)
  })

  it('should reject an interface with two abstract operations', () => {
    expect(isContractType(type('interface', [operation('a'), operation('b')]))).toBe(false)
  })

  it('should reject an interface with no abstract operation', () => {
    expect(isContractType(type('interface', []))).toBe(false)
    expect(isContractType(type('interface', [operation('helper', { isDefault: true })]))).toBe(false)
  })

  it('should reject a class with one operation', () => {
    expect(isContractType(type('class', [operation('run')]))).toBe(false)
  })

  it('should reject enums and records', () => {
    expect(isContractType(type('enum', [operation('run')]))).toBe(false)
    expect(isContractType(type('record', [operation('run')]))).toBe(false)
  })

  it('should treat annotation types as interfaces', () => {
    expect(isContractType(type('annotation', [operation('value')]))).toBe(true)
  })
})

describe('TypeClassifier', () => {
  let events: SurfaceEventEmitter
  let emitted: SurfaceEvent[]

  beforeEach(() => {
    events = new SurfaceEventEmitter()
    emitted = []
    events.onAnyEvent(event => emitted.push(event))
  })

  it('should classify resolvable types', () => {
    const provider = new MapProvider({
      'java.util.function.Supplier': type('interface', [operation('get')], 'java.util.function.Supplier'),
      'java.util.ArrayList': type('class', [operation('add')], 'java.util.ArrayList')
    })
    const classifier = new TypeClassifier(provider, events)

    expect(classifier.classify('java.util.function.Supplier')).toBe(true)
    expect(classifier.classify('java.util.ArrayList')).toBe(false)
  })

  it('should treat an unresolvable type as not qualifying and report it', () => {
    const classifier = new TypeClassifier(new MapProvider({}), events)

    expect(classifier.classify('java.missing.Type')).toBe(false)
    expect(emitted).toHaveLength(1)
    expect(emitted[0]).toMatchObject({
      type: 'type_not_found',
      level: 'warn',
      data: { typeName: 'java.missing.Type', reason: 'not in test surface' }
    })
  })

  it('should memoize classification per type name', () => {
    const provider = new MapProvider({
      'java.lang.Runnable': type('interface', [operation('run')], 'java.lang.Runnable')
    })
    const classifier = new TypeClassifier(provider, events)

    classifier.classify('java.lang.Runnable')
    classifier.classify('java.lang.Runnable')
    classifier.classify('java.missing.Type')
    classifier.classify('java.missing.Type')

    expect(provider.calls).toEqual(['java.lang.Runnable', 'java.missing.Type'])
    expect(emitted).toHaveLength(1)
  })
})

describe('buildContractTypeSet', () => {
  it('should return the sorted, deduplicated functional interfaces', () => {
    const provider = new MapProvider({
      'java.util.function.Supplier': type('interface', [operation('get')]),
      'java.lang.Runnable': type('interface', [operation('run')]),
      'java.util.List': type('interface', [operation('add'), operation('get')]),
      'java.lang.Thread': type('class', [operation('run')])
    })
    const set = buildContractTypeSet([
      'java.util.function.Supplier',
      'java.lang.Thread',
      'java.lang.Runnable',
      'java.util.List',
      'java.lang.Runnable'
    ], new TypeClassifier(provider, new SurfaceEventEmitter()))

    expect(set.toArray()).toEqual(['java.lang.Runnable', 'java.util.function.Supplier'])
    expect(set.size).toBe(2)
    expect(set.has('java.lang.Runnable')).toBe(true)
    expect(set.has('java.lang.Thread')).toBe(false)
  })
})

describe('ContractTypeSet', () => {
  it('should be immutable once built', () => {
    const names = ['b.B', 'a.A']
    const set = new ContractTypeSet(names)
    names.push('c.C')

    expect([...set]).toEqual(['a.A', 'b.B'])
    expect(Object.isFrozen(set.toArray())).toBe(true)
  })
})
