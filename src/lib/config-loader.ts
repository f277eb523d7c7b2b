import * as fs from 'fs/promises'
import * as path from 'path'
import { parse as parseYaml } from 'yaml'
import { DEFAULT_SOURCE_TYPE } from './core/scanner'
import { DEFAULT_NAMESPACE_ROOTS } from './surface/candidates'
import { NewTypeMode, SurfaceConfig, SurfaceSettings } from './types/config'
import { ConfigError } from './utils/errors'

export const CONFIG_FILE_CANDIDATES = [
  'lambda-surface.config.json',
  'lambda-surface.config.yml',
  'lambda-surface.config.yaml'
]

export const DEFAULT_OUTPUT = 'lambda-surface-report.txt'
export const DEFAULT_EXCLUDED_NAMESPACE = 'java.util.stream'

export const ENV_OUTPUT = 'LAMBDA_SURFACE_OUTPUT'
export const ENV_CONFIG = 'LAMBDA_SURFACE_CONFIG'
export const ENV_ROOTS = 'LAMBDA_SURFACE_ROOTS'
export const ENV_SOURCE_TYPE = 'LAMBDA_SURFACE_SOURCE_TYPE'

const CONFIG_KEYS = new Set(['roots', 'sourceType', 'excludeNamespace', 'output', 'newTypes'])

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0
}

function isNewTypeMode(value: unknown): value is NewTypeMode {
  return value === 'never' || value === 'absent'
}

/**
 * Validates a parsed configuration document.
 * @throws ConfigError naming the offending key.
 */
export function validateConfig(parsed: unknown, source: string): SurfaceConfig {
  if (parsed === null || parsed === undefined) {
    return {}
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError('E_CONFIG', `Invalid configuration in ${source}: expected an object.`)
  }

  const entries = new Map<string, unknown>(Object.entries(parsed))
  for (const key of entries.keys()) {
    if (!CONFIG_KEYS.has(key)) {
      throw new ConfigError('E_CONFIG', `Invalid configuration in ${source}: unknown key "${key}".`)
    }
  }

  const config: SurfaceConfig = {}
  const roots = entries.get('roots')
  if (roots !== undefined) {
    if (!Array.isArray(roots) || roots.length === 0 || !roots.every(isNonEmptyString)) {
      throw new ConfigError('E_CONFIG', `Invalid configuration in ${source}: "roots" must be a non-empty array of strings.`)
    }
    config.roots = roots.filter(isNonEmptyString)
  }
  for (const key of ['sourceType', 'excludeNamespace', 'output'] as const) {
    const value = entries.get(key)
    if (value === undefined) continue
    if (!isNonEmptyString(value)) {
      throw new ConfigError('E_CONFIG', `Invalid configuration in ${source}: "${key}" must be a non-empty string.`)
    }
    config[key] = value
  }
  const newTypes = entries.get('newTypes')
  if (newTypes !== undefined) {
    if (!isNewTypeMode(newTypes)) {
      throw new ConfigError('E_CONFIG', `Invalid configuration in ${source}: "newTypes" must be "never" or "absent".`)
    }
    config.newTypes = newTypes
  }
  return config
}

/**
 * Find the default configuration file in a directory.
 */
async function findConfigFile(dir: string): Promise<string | undefined> {
  for (const candidate of CONFIG_FILE_CANDIDATES) {
    const fullPath = path.join(dir, candidate)
    try {
      await fs.access(fullPath)
      return fullPath
    } catch {
      // File doesn't exist, try next
      continue
    }
  }
  return undefined
}

/**
 * Loads the configuration file. An explicitly named file must exist; without one the
 * default file names are tried in `cwd` and a missing file means an empty configuration.
 * @throws ConfigError if the file is missing, unparsable or invalid.
 */
export async function loadConfig(configPath: string | undefined, cwd: string = process.cwd()): Promise<SurfaceConfig> {
  const filePath = configPath ? path.resolve(cwd, configPath) : await findConfigFile(cwd)
  if (!filePath) {
    return {}
  }

  let content: string
  try {
    content = await fs.readFile(filePath, 'utf-8')
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigError('E_CONFIG', `Failed to read configuration ${filePath}: ${message}`)
  }

  let parsed: unknown
  try {
    // YAML is a superset of JSON, so one parser covers both extensions
    parsed = parseYaml(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigError('E_CONFIG', `Failed to parse configuration ${filePath}: ${message}`)
  }
  return validateConfig(parsed, filePath)
}

export function splitList(value: string): string[] {
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0)
}

export interface SettingOverrides {
  roots?: string
  sourceType?: string
  output?: string
  newTypes?: NewTypeMode
}

/**
 * Resolves each setting from the CLI option, then the environment, then the config file,
 * then the built-in default.
 */
export function resolveSettings(
  overrides: SettingOverrides,
  config: SurfaceConfig,
  env: NodeJS.ProcessEnv = process.env
): SurfaceSettings {
  const rootsOption = overrides.roots ?? env[ENV_ROOTS]
  const roots = rootsOption !== undefined ? splitList(rootsOption) : config.roots ?? [...DEFAULT_NAMESPACE_ROOTS]
  if (roots.length === 0) {
    throw new ConfigError('E_CONFIG', 'At least one namespace root is required.')
  }

  return {
    roots,
    sourceType: overrides.sourceType ?? env[ENV_SOURCE_TYPE] ?? config.sourceType ?? DEFAULT_SOURCE_TYPE,
    excludeNamespace: config.excludeNamespace ?? DEFAULT_EXCLUDED_NAMESPACE,
    output: overrides.output ?? env[ENV_OUTPUT] ?? config.output ?? DEFAULT_OUTPUT,
    newTypes: overrides.newTypes ?? config.newTypes ?? 'never'
  }
}
