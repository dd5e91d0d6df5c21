import { ZodError } from 'zod'
import { CaptureConfig, CaptureConfigSchema } from '../types'
import { ConfigValidationError } from './errors'

/**
 * Validates a configuration object against the schema
 * @param config Raw configuration object to validate
 * @returns Validated config with defaults filled in
 * @throws ConfigValidationError if validation fails
 */
export default function validateConfig(config: unknown): CaptureConfig {
  try {
    return CaptureConfigSchema.parse(config)
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigValidationError('Configuration validation failed', error.issues)
    }
    throw error
  }
}
