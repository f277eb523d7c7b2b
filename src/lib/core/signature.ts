/**
 * Display names for the element codes of primitive array tokens such as `[I`.
 */
const PRIMITIVE_ARRAY_NAMES: Record<string, string> = {
  Z: 'boolean[]',
  B: 'byte[]',
  C: 'char[]',
  D: 'double[]',
  F: 'float[]',
  I: 'int[]',
  J: 'long[]',
  S: 'short[]'
}

export const ARRAY_MARKER = '['

function stringHash(value: string): number {
  let hash = 0
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(hash, 31) + value.charCodeAt(i)) | 0
  }
  return hash
}

/**
 * Converts a parameter type token into the short form used in reports.
 *
 * `[I` becomes `int[]`, `[Ljava.util.Map$Entry;` becomes `Map.Entry[]`,
 * `java.util.function.Function` becomes `Function`. Primitives pass through.
 */
export function displayTypeName(type: string): string {
  if (type.startsWith(ARRAY_MARKER)) {
    const code = type.substring(1, 2)
    const primitive = PRIMITIVE_ARRAY_NAMES[code]
    if (primitive) {
      return primitive
    }
    if (code === 'L') {
      const elementType = type.endsWith(';') ? type.slice(2, -1) : type.slice(2)
      return elementType.substring(elementType.lastIndexOf('.') + 1).replace(/\$/g, '.') + '[]'
    }
    // Nested arrays and unknown element codes
    return '[]'
  }

  if (type.includes('.')) {
    return type.substring(type.lastIndexOf('.') + 1).replace(/\$/g, '.')
  }

  return type
}

/**
 * Operation name plus ordered parameter types. The return type takes no part in equality.
 */
export class Signature {
  private cachedHash?: number

  private constructor(
    public readonly name: string,
    public readonly parameters: readonly string[]
  ) {}

  static create(name: string, parameterTypes: readonly string[]): Signature {
    return new Signature(name, Object.freeze([...parameterTypes]))
  }

  get arity(): number {
    return this.parameters.length
  }

  equals(other: Signature | null | undefined): boolean {
    if (!other) {
      return false
    }
    if (other === this) {
      return true
    }
    if (this.name !== other.name || this.arity !== other.arity) {
      return false
    }
    return this.parameters.every((parameter, i) => parameter === other.parameters[i])
  }

  /**
   * 32-bit hash; order sensitive, so `f(a, b)` and `f(b, a)` usually differ.
   */
  hashValue(): number {
    if (this.cachedHash === undefined) {
      let hash = (47 + stringHash(this.name)) | 0
      for (const parameter of this.parameters) {
        hash = (Math.imul(hash, 31) + stringHash(parameter)) | 0
      }
      this.cachedHash = hash
    }
    return this.cachedHash
  }

  /**
   * Canonical raw form, e.g. `map(java.util.function.Function)`.
   */
  key(): string {
    return `${this.name}(${this.parameters.join(',')})`
  }

  render(): string {
    return `${this.name}(${this.parameters.map(displayTypeName).join(', ')})`
  }

  toString(): string {
    return this.render()
  }
}
