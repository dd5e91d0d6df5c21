import type { Credentials, LoginConfig } from '../types'
import { MissingSecretError, UndefinedEnvVarError } from '../config/errors'
import type { Logger } from '../../logger'

/**
 * Resolves environment variable references in strings
 * Supports ${VAR_NAME} syntax
 */
export function resolveEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    const envValue = env[varName]

    if (envValue === undefined) {
      throw new UndefinedEnvVarError(varName)
    }

    return envValue
  })
}

/**
 * Reads the login identity and secret once.
 *
 * A missing secret is a startup warning unless `requireSecret` is set, in which
 * case it is a MissingSecretError. The identity may reference env vars.
 */
export function resolveCredentials(
  login: LoginConfig,
  logger: Logger,
  env: NodeJS.ProcessEnv = process.env,
): Credentials {
  const identity = resolveEnvVars(login.identity, env)
  const secret = env[login.secretEnv] ?? ''

  if (secret === '') {
    if (login.requireSecret) {
      throw new MissingSecretError(login.secretEnv)
    }
    logger.warn(`Environment variable ${login.secretEnv} is not set; login will be attempted with an empty secret`)
  }

  if (identity === '') {
    logger.warn('No login identity configured (login.identity); the agent will be asked to log in without one')
  }

  return { identity, secret }
}
