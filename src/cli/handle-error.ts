import { ConfigLoadError, ConfigValidationError, MissingSecretError, UndefinedEnvVarError } from '../core/config'
import { AppRegistryError } from '../apps'
import { logger } from '../logger'

/**
 * Reports an error that stopped a command before it produced a result and
 * marks the process as failed
 */
export function handleCommandError(error: unknown): void {
  if (error instanceof ConfigLoadError) {
    logger.error('Failed to load configuration:')
    logger.error(error.message)
  } else if (error instanceof ConfigValidationError) {
    logger.error('Configuration validation failed:')
    logger.error(error.getErrorSummary())
  } else if (
    error instanceof MissingSecretError ||
    error instanceof UndefinedEnvVarError ||
    error instanceof AppRegistryError
  ) {
    logger.error(error.message)
  } else {
    logger.error('Unexpected error:', error)
  }

  process.exitCode = 1
}
