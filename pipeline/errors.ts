/**
 * Run-level errors. Chunk-level problems never use these; they travel as
 * StageResult failures instead.
 */

export type FatalSetupCode =
  | 'INPUT_NOT_FOUND'
  | 'INPUT_NOT_FILE'
  | 'INPUT_NOT_READABLE'
  | 'MISSING_CREDENTIAL'
  | 'EMPTY_TRANSCRIPT'
  | 'INVALID_CONFIG'
  | 'OUTPUT_NOT_WRITABLE'

/**
 * Aborts a run. Only OUTPUT_NOT_WRITABLE is raised after chunk processing
 * started; every other code is raised before any output is attempted.
 */
export class FatalSetupError extends Error {
  readonly code: FatalSetupCode

  constructor(code: FatalSetupCode, message: string) {
    super(message)
    this.name = 'FatalSetupError'
    this.code = code
  }
}

export class ConfigError extends FatalSetupError {
  readonly field: string

  constructor(field: string, message: string) {
    super('INVALID_CONFIG', `Invalid configuration for ${field}: ${message}`)
    this.name = 'ConfigError'
    this.field = field
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
