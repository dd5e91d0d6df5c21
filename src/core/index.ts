/**
 * Core module - contains fundamental types, configuration and utilities
 * Used by all other modules for shared functionality
 */

export * from './types'
export * from './config'
export { resolveCredentials, resolveEnvVars } from './utils/resolve-credentials'
export { createRunId } from './utils/run-id'
export { withTimeout, type TimedOutcome } from './utils/timing'
