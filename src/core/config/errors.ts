import { ZodError } from 'zod'

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly validationErrors: ZodError['issues'],
  ) {
    super(message)
    this.name = 'ConfigValidationError'
  }

  /**
   * Returns a human-readable summary of all validation errors
   */
  getErrorSummary(): string {
    return this.validationErrors
      .map((err) => {
        const path = err.path.map(String).join('.')
        return `${path ? `${path}: ` : ''}${err.message}`
      })
      .join('\n')
  }
}

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message)
    this.name = 'ConfigLoadError'
  }
}

/**
 * Raised at startup when a ${VAR} reference in the login configuration names
 * an environment variable that is not set
 */
export class UndefinedEnvVarError extends Error {
  constructor(public readonly envVar: string) {
    super(`Environment variable "${envVar}" is not defined (referenced in login configuration)`)
    this.name = 'UndefinedEnvVarError'
  }
}

/**
 * Raised at startup when the login secret is required but the environment does not provide it
 */
export class MissingSecretError extends Error {
  constructor(public readonly envVar: string) {
    super(`Login secret is required but environment variable "${envVar}" is not set`)
    this.name = 'MissingSecretError'
  }
}
