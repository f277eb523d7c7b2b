/**
 * How a whole type is judged new: never (only methods are), or when the baseline lacks it.
 */
export type NewTypeMode = 'never' | 'absent'

/**
 * Contents of a lambda-surface.config.{json,yml,yaml} file. Every key is optional.
 */
export interface SurfaceConfig {
  roots?: string[]
  sourceType?: string
  excludeNamespace?: string
  output?: string
  newTypes?: NewTypeMode
}

/**
 * Effective settings after combining CLI options, environment and config file.
 */
export interface SurfaceSettings {
  roots: string[]
  sourceType: string
  excludeNamespace: string
  output: string
  newTypes: NewTypeMode
}
