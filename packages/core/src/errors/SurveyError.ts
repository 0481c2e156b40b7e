/**
 * Survey Error Classes
 *
 * Custom error classes with cause chaining. Every fatal condition of a
 * survey run surfaces as one of these so the CLI has a single exit path.
 */

/**
 * Base error class for all survey processing errors.
 */
export class SurveyError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Additional context about the error */
  readonly context?: Record<string, unknown>

  constructor(
    message: string,
    options?: {
      code?: string
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, { cause: options?.cause })
    this.name = 'SurveyError'
    this.code = options?.code ?? 'SURVEY_ERROR'
    this.context = options?.context

    Error.captureStackTrace?.(this, this.constructor)
  }

  /**
   * Get the full error chain as an array
   */
  getErrorChain(): Error[] {
    const chain: Error[] = [this]
    let current: unknown = this.cause

    while (current instanceof Error) {
      chain.push(current)
      current = current.cause
    }

    return chain
  }

  /**
   * Format error with full context for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
      stack: this.stack,
    }
  }
}

/**
 * Configuration errors (missing config, malformed JSON, unknown team)
 */
export class ConfigurationError extends SurveyError {
  constructor(
    message: string,
    options?: {
      cause?: unknown
      path?: string
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      cause: options?.cause,
      context: {
        ...options?.context,
        path: options?.path,
      },
    })
    this.name = 'ConfigurationError'
  }
}

/**
 * Survey file could not be read or parsed
 */
export class SurveyInputError extends SurveyError {
  constructor(
    message: string,
    options?: {
      cause?: unknown
      path?: string
    }
  ) {
    super(message, {
      code: 'INPUT_ERROR',
      cause: options?.cause,
      context: { path: options?.path },
    })
    this.name = 'SurveyInputError'
  }
}

/**
 * A skill level cell held text outside the known level scale.
 * The run never guesses a default level.
 */
export class SkillLevelError extends SurveyError {
  /** The unrecognized level text */
  readonly level: string

  constructor(
    level: string,
    options?: {
      column?: number
      context?: Record<string, unknown>
    }
  ) {
    super(`Unrecognized skill level "${level}"`, {
      code: 'SKILL_LEVEL_ERROR',
      context: {
        ...options?.context,
        column: options?.column,
      },
    })
    this.name = 'SkillLevelError'
    this.level = level
  }
}

/**
 * Mad-libs template placeholder without a value
 */
export class TemplateError extends SurveyError {
  readonly placeholder: string

  constructor(placeholder: string, options?: { context?: Record<string, unknown> }) {
    super(`No value for template placeholder "{${placeholder}}"`, {
      code: 'TEMPLATE_ERROR',
      context: options?.context,
    })
    this.name = 'TemplateError'
    this.placeholder = placeholder
  }
}

/**
 * An identity column needed by a reshaper was never found in the header row
 */
export class ColumnLookupError extends SurveyError {
  readonly column: string

  constructor(column: string) {
    super(`Column "${column}" was not found in the survey header row`, {
      code: 'COLUMN_LOOKUP_ERROR',
      context: { column },
    })
    this.name = 'ColumnLookupError'
    this.column = column
  }
}

/**
 * Wrap an unknown error in a SurveyError if not already one
 */
export function wrapError(
  error: unknown,
  message: string,
  options?: {
    code?: string
    context?: Record<string, unknown>
  }
): SurveyError {
  if (error instanceof SurveyError) {
    return error
  }

  return new SurveyError(message, {
    code: options?.code,
    cause: error,
    context: options?.context,
  })
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  return 'Unknown error'
}

export function isSurveyError(error: unknown): error is SurveyError {
  return error instanceof SurveyError
}
