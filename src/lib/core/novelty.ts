import { BaselineIndex } from '../baseline/baseline-index'
import { Signature } from './signature'

/**
 * Decides whether a whole type counts as new.
 */
export type NewTypeStrategy = (typeName: string, baseline: BaselineIndex) => boolean

/**
 * Types are never reported as new; only their operations are.
 */
export const neverNewType: NewTypeStrategy = () => false

/**
 * Counts a type as new when the baseline has never seen it.
 */
export const absentFromBaseline: NewTypeStrategy = (typeName, baseline) => !baseline.hasType(typeName)

export interface NoveltyPolicyOptions {
  newType?: NewTypeStrategy
}

/**
 * Novelty of candidate types and operations relative to a baseline.
 */
export class NoveltyPolicy {
  private readonly newType: NewTypeStrategy

  constructor(
    private readonly baseline: BaselineIndex,
    options: NoveltyPolicyOptions = {}
  ) {
    this.newType = options.newType ?? neverNewType
  }

  /**
   * True unless the baseline has a structurally equal signature under the same type name.
   */
  public isNewOperation(typeName: string, signature: Signature): boolean {
    return !this.baseline.contains(typeName, signature)
  }

  public isNewType(typeName: string): boolean {
    return this.newType(typeName, this.baseline)
  }

  public isAbsentType(typeName: string): boolean {
    return !this.baseline.hasType(typeName)
  }
}
