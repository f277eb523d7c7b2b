import { Signature } from './signature'

/**
 * Set of signatures under structural equality. Buckets by `hashValue()`, compares with `equals()`.
 * Iteration follows insertion order.
 */
export class SignatureSet implements Iterable<Signature> {
  private buckets: Map<number, Signature[]> = new Map()
  private ordered: Signature[] = []

  constructor(signatures: Iterable<Signature> = []) {
    for (const signature of signatures) {
      this.add(signature)
    }
  }

  /**
   * Adds a signature unless an equal one is present.
   * @returns true if the set changed.
   */
  public add(signature: Signature): boolean {
    const hash = signature.hashValue()
    const bucket = this.buckets.get(hash)
    if (!bucket) {
      this.buckets.set(hash, [signature])
    } else if (bucket.some(existing => existing.equals(signature))) {
      return false
    } else {
      bucket.push(signature)
    }
    this.ordered.push(signature)
    return true
  }

  public has(signature: Signature): boolean {
    const bucket = this.buckets.get(signature.hashValue())
    return bucket !== undefined && bucket.some(existing => existing.equals(signature))
  }

  public get size(): number {
    return this.ordered.length
  }

  public values(): readonly Signature[] {
    return this.ordered
  }

  [Symbol.iterator](): Iterator<Signature> {
    return this.ordered[Symbol.iterator]()
  }
}
