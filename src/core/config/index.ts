export { loadConfig, createDefaultConfig, type LoadConfigOptions } from './load'
export { default as validateConfig } from './validate'
export { ConfigLoadError, ConfigValidationError, MissingSecretError, UndefinedEnvVarError } from './errors'
