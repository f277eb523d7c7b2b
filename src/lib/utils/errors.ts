/**
 * Error types for lambda-surface.
 * Every failure the CLI reports extends SurfaceError so the exit status can be derived from it.
 */

export class SurfaceError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'SurfaceError'
    Error.captureStackTrace(this, this.constructor)
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details
    }
  }
}

/**
 * Invalid configuration file, option value or bundle layout.
 */
export class ConfigError extends SurfaceError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details)
    this.name = 'ConfigError'
  }
}

/**
 * A requested contract type is not part of the candidate surface's contract types.
 * Raised before any scanning starts.
 */
export class UnknownContractTypeError extends SurfaceError {
  constructor(public readonly typeName: string) {
    super('E_UNKNOWN_CONTRACT_TYPE', `Type is not a functional interface: ${typeName}`, { typeName })
    this.name = 'UnknownContractTypeError'
  }
}

/**
 * A baseline record that strict parsing rejects.
 */
export class BaselineParseError extends SurfaceError {
  constructor(public readonly lineNumber: number, reason: string) {
    super('E_BASELINE_RECORD', `Malformed baseline record at line ${lineNumber}: ${reason}`, { lineNumber, reason })
    this.name = 'BaselineParseError'
  }
}

/**
 * Reading an input or writing the report failed.
 */
export class SurfaceIOError extends SurfaceError {
  constructor(public readonly path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super('E_IO', `Error with input or output: ${path}: ${reason}`, { path })
    this.name = 'SurfaceIOError'
  }
}

export const EXIT_USAGE = 1
export const EXIT_IO = 2

/**
 * Maps a failure to the process exit status: I/O problems are distinct from usage problems.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof SurfaceIOError ? EXIT_IO : EXIT_USAGE
}
