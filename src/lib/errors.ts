/**
 * Typed failures raised by the analysis engine.
 * The engine never formats user-facing text; see messages.ts for that.
 */

export type EngineErrorKind = 'schema' | 'configuration' | 'validation'

export class EngineError extends Error {
  readonly kind: EngineErrorKind

  constructor(kind: EngineErrorKind, message: string) {
    super(message)
    this.kind = kind
    this.name = 'EngineError'
  }
}

/** Required identifier column is missing; blocks the whole session. */
export class SchemaError extends EngineError {
  readonly missingColumns: readonly string[]

  constructor(message: string, missingColumns: readonly string[] = []) {
    super('schema', message)
    this.name = 'SchemaError'
    this.missingColumns = missingColumns
  }
}

/** Parameters inconsistent with the classification (absent grouping, unknown metric, ...). */
export class ConfigurationError extends EngineError {
  constructor(message: string) {
    super('configuration', message)
    this.name = 'ConfigurationError'
  }
}

/** Malformed or empty user query. */
export class ValidationError extends EngineError {
  constructor(message: string) {
    super('validation', message)
    this.name = 'ValidationError'
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError
}
