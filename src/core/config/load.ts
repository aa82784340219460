import { readFile, access } from 'node:fs/promises'
import { hostname } from 'node:os'
import { join, resolve } from 'node:path'
import type { AgentConfig } from '../types'
import validateConfig from './validate'
import { ConfigLoadError } from './errors'

type RawConfig = Record<string, unknown>

const CONFIG_FILENAMES = ['agent.config.json', 'agent.config.js', 'agent.config.cjs']

function createDefaultConfig(cwd: string): RawConfig {
  return {
    name: hostname(),
    workDir: join(cwd, 'work'),
    browsers: {},
  }
}

/** Executable overrides for the built-in `Chrome` and `Canary` browser selectors */
export interface BrowserPaths {
  chrome?: string
  canary?: string
}

export interface LoadConfigOptions {
  cwd?: string
  configPath?: string
  envPrefix?: string
  cliArgs?: RawConfig
  browserPaths?: BrowserPaths
}

/**
 * Loads configuration from multiple sources with proper precedence:
 * 1. Defaults (lowest priority)
 * 2. Config file (agent.config.{json,js,cjs} or an explicit path)
 * 3. Environment variables
 * 4. CLI arguments (highest priority)
 *
 * The result is produced once at startup and passed to every component.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AgentConfig> {
  const { cwd = process.cwd(), configPath, envPrefix = 'AGENT_', cliArgs = {}, browserPaths = {} } = options

  let config = createDefaultConfig(cwd)

  const fileConfig = await loadConfigFile(cwd, configPath)
  if (fileConfig) {
    config = mergeConfig(config, fileConfig)
  }

  const envConfig = loadConfigFromEnv(envPrefix)
  if (Object.keys(envConfig).length > 0) {
    config = mergeConfig(config, envConfig)
  }

  if (Object.keys(cliArgs).length > 0) {
    config = mergeConfig(config, cliArgs)
  }

  config = applyBrowserPaths(config, browserPaths)

  const validated = validateConfig(config)

  return {
    ...validated,
    workDir: resolve(cwd, validated.workDir),
  }
}

/**
 * Loads configuration from a file, supporting JSON and CommonJS modules
 */
async function loadConfigFile(cwd: string, configPath?: string): Promise<RawConfig | null> {
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
        // not present, try the next name
      }
    }
  }

  if (!targetPath) {
    return null
  }

  let loaded: unknown
  try {
    if (targetPath.endsWith('.json')) {
      loaded = JSON.parse(await readFile(targetPath, 'utf-8'))
    } else {
      const configModule: unknown = await import(targetPath)
      loaded = isRecord(configModule) && 'default' in configModule ? configModule.default : configModule
    }
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to load config file ${targetPath}: ${error instanceof Error ? error.message : String(error)}`,
      targetPath,
    )
  }

  if (!isRecord(loaded)) {
    throw new ConfigLoadError(`Config file ${targetPath} must export an object`, targetPath)
  }

  return loaded
}

function loadConfigFromEnv(prefix: string): RawConfig {
  const config: RawConfig = {}

  const stringMappings: Record<string, string> = {
    [`${prefix}SERVER`]: 'server',
    [`${prefix}LOCATION`]: 'location',
    [`${prefix}KEY`]: 'key',
    [`${prefix}NAME`]: 'name',
    [`${prefix}WORK_DIR`]: 'workDir',
  }

  const typedMappings: Record<string, string> = {
    [`${prefix}POLL_INTERVAL`]: 'pollInterval',
    [`${prefix}POLL_TIMEOUT`]: 'pollTimeout',
    [`${prefix}UPLOAD_TIMEOUT`]: 'uploadTimeout',
    [`${prefix}HEADLESS`]: 'headless',
  }

  Object.entries(stringMappings).forEach(([envVar, key]) => {
    const value = process.env[envVar]
    if (value !== undefined && value !== '') {
      config[key] = value
    }
  })

  Object.entries(typedMappings).forEach(([envVar, key]) => {
    const value = process.env[envVar]
    if (value !== undefined && value !== '') {
      config[key] = parseEnvValue(value)
    }
  })

  return config
}

/**
 * Parses numeric and boolean environment variable values
 */
function parseEnvValue(value: string): unknown {
  if (/^\d+$/.test(value)) {
    return parseInt(value, 10)
  }

  if (value.toLowerCase() === 'true') return true
  if (value.toLowerCase() === 'false') return false

  return value
}

function applyBrowserPaths(config: RawConfig, paths: BrowserPaths): RawConfig {
  const overrides: RawConfig = {}

  if (paths.chrome) {
    overrides.Chrome = { executablePath: paths.chrome }
  }
  if (paths.canary) {
    overrides.Canary = { executablePath: paths.canary }
  }

  if (Object.keys(overrides).length === 0) {
    return config
  }

  return mergeConfig(config, { browsers: overrides })
}

/**
 * Deep merges two configuration objects, with the second taking precedence
 */
function mergeConfig(base: RawConfig, override: RawConfig): RawConfig {
  const result = { ...base }

  Object.entries(override).forEach(([key, value]) => {
    if (value === undefined) return

    const current = result[key]
    if (isRecord(current) && isRecord(value)) {
      result[key] = mergeConfig(current, value)
    } else {
      result[key] = value
    }
  })

  return result
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
