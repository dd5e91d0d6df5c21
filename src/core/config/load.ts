import { readFile, access } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import type { CaptureConfig } from '../types'
import validateConfig from './validate'
import { ConfigLoadError } from './errors'

type ConfigRecord = Record<string, unknown>

export function createDefaultConfig(): CaptureConfig {
  return validateConfig({})
}

export interface LoadConfigOptions {
  cwd?: string
  configPath?: string
  envPrefix?: string
  env?: NodeJS.ProcessEnv
  cliArgs?: ConfigRecord
}

const CONFIG_FILENAMES = ['capture.config.js', 'capture.config.cjs', 'capture.config.json']

/**
 * Loads configuration from multiple sources with proper precedence:
 * 1. Schema defaults (lowest priority)
 * 2. Config file (capture.config.{js,cjs,json})
 * 3. Environment variables
 * 4. CLI arguments (highest priority)
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CaptureConfig> {
  const { cwd = process.cwd(), configPath, envPrefix = 'CAPTURE_', env = process.env, cliArgs = {} } = options

  let config: ConfigRecord = {}

  try {
    const fileConfig = await loadConfigFile(cwd, configPath)
    if (fileConfig) {
      config = mergeConfig(config, fileConfig)
    }
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to load config file: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined,
    )
  }

  const envConfig = loadConfigFromEnv(envPrefix, env)
  if (Object.keys(envConfig).length > 0) {
    config = mergeConfig(config, envConfig)
  }

  if (Object.keys(cliArgs).length > 0) {
    config = mergeConfig(config, cliArgs)
  }

  return validateConfig(config)
}

/**
 * Loads configuration from a file, supporting JSON and CommonJS modules
 */
async function loadConfigFile(cwd: string, configPath?: string): Promise<ConfigRecord | null> {
  let targetPath: string | null = null

  if (configPath) {
    targetPath = resolve(cwd, configPath)
  } else {
    for (const filename of CONFIG_FILENAMES) {
      const filePath = join(cwd, filename)
      try {
        await access(filePath)
        targetPath = filePath
        break
      } catch {
        // Not present, try the next name
      }
    }
  }

  if (!targetPath) {
    return null
  }

  let loaded: unknown
  try {
    if (targetPath.endsWith('.json')) {
      const content = await readFile(targetPath, 'utf-8')
      loaded = JSON.parse(content)
    } else {
      const configModule: unknown = await import(targetPath)
      loaded = isRecord(configModule) && 'default' in configModule ? configModule.default : configModule
    }
  } catch (error) {
    throw new Error(
      `Failed to load config file ${targetPath}: ${error instanceof Error ? error.message : String(error)}`,
    )
  }

  if (!isRecord(loaded)) {
    throw new Error(`Config file ${targetPath} must export an object`)
  }

  return loaded
}

function loadConfigFromEnv(prefix: string, env: NodeJS.ProcessEnv): ConfigRecord {
  const config: ConfigRecord = {}

  const envMappings = {
    [`${prefix}OUTPUT_DIR`]: 'outputDir',
    [`${prefix}LOG_LEVEL`]: 'logLevel',
    [`${prefix}PROFILE_DIR`]: 'browser.profileDir',
    [`${prefix}CHROME_PATH`]: 'browser.executablePath',
    [`${prefix}HEADLESS`]: 'browser.headless',
    [`${prefix}IDENTITY`]: 'login.identity',
    [`${prefix}LOGIN_MODE`]: 'login.mode',
    [`${prefix}AGENT_MODULE`]: 'agent.module',
    [`${prefix}AGENT_MODEL`]: 'agent.model',
    [`${prefix}AGENT_TIMEOUT`]: 'timeouts.agentSeconds',
    [`${prefix}COST_ENABLED`]: 'cost.enabled',
  }

  Object.entries(envMappings).forEach(([envVar, configPath]) => {
    const value = env[envVar]
    if (value !== undefined) {
      setNestedValue(config, configPath, parseEnvValue(value))
    }
  })

  return config
}

/**
 * Parses environment variable values to appropriate types
 */
function parseEnvValue(value: string): unknown {
  if (/^\d+$/.test(value)) {
    return parseInt(value, 10)
  }

  if (value.toLowerCase() === 'true') return true
  if (value.toLowerCase() === 'false') return false

  if (value.startsWith('[') || value.startsWith('{')) {
    try {
      return JSON.parse(value)
    } catch {
      // Not JSON, keep the raw string
    }
  }

  return value
}

/**
 * Sets a nested value in an object using dot notation
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const keys = path.split('.')
  let current = obj

  for (let i = 0; i < keys.length - 1; i++) {
    const key = keys[i]
    if (!key) continue

    const next = current[key]
    if (isRecord(next)) {
      current = next
    } else {
      const created: ConfigRecord = {}
      current[key] = created
      current = created
    }
  }

  const finalKey = keys[keys.length - 1]
  if (finalKey) {
    current[finalKey] = value
  }
}

/**
 * Deep merges two configuration objects, with the second taking precedence
 */
function mergeConfig(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result = { ...base }

  Object.entries(override).forEach(([key, value]) => {
    if (value === undefined) return

    const existing = result[key]
    if (isRecord(existing) && isRecord(value)) {
      result[key] = mergeConfig(existing, value)
    } else {
      result[key] = value
    }
  })

  return result
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
