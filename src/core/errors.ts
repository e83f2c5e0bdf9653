import { ZodError } from 'zod'

/**
 * A target descriptor (or the config document holding it) is malformed or ambiguous.
 * Raised before any probe starts.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly validationErrors: ZodError['issues'] = [],
  ) {
    super(message)
    this.name = 'ConfigurationError'
  }

  /**
   * Returns a human-readable summary of all validation errors
   */
  getErrorSummary(): string {
    if (this.validationErrors.length === 0) {
      return this.message
    }

    return this.validationErrors
      .map((err) => {
        const path = err.path.map(String).join('.')
        return `${path ? `${path}: ` : ''}${err.message}`
      })
      .join('\n')
  }
}

export class ConfigLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConfigLoadError'
  }
}

// TCP dial failed: DNS, refused, unreachable or timed out
export class ConnectionError extends Error {
  readonly code: string | null

  constructor(message: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'ConnectionError'
    this.code = options.code ?? null
  }
}

// HTTP request could not complete, so there is no status to report
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TransportError'
  }
}

export class StatusMismatchError extends Error {
  constructor(
    public readonly status: number,
    public readonly expectedStatus: number,
    public readonly details: string | null,
  ) {
    super(`Unexpected HTTP status: ${status} (expected ${expectedStatus})`)
    this.name = 'StatusMismatchError'
  }
}
