import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { configSchema, type Config } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.hostward.yaml'

let cachedConfig: Config | null = null

export interface LoadConfigOptions {
  /** Project directory searched for .hostward.yaml (default: process.cwd()) */
  cwd?: string
  /** Explicit config file; must exist and must validate */
  path?: string
}

/**
 * Find config files (global + project).
 * The global file is the base, the project file overrides it.
 */
function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const homePath = join(homedir(), CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)

  // Running from $HOME would load the same file twice
  const isHomeCwd = projectDir === homedir()

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/**
 * Load configuration.
 * Lookup: --config path → ~/.hostward.yaml + ./.hostward.yaml → defaults
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  if (cachedConfig) return cachedConfig

  if (options.path) {
    if (!existsSync(options.path)) {
      throw AppError.configNotFound(options.path)
    }
    const result = configSchema.safeParse(await parseYamlFile(options.path))
    if (!result.success) {
      const issues = result.error.issues
        .slice(0, 3)
        .map(i => `${i.path.join('.')}: ${i.message}`)
        .join('; ')
      throw AppError.configInvalid(issues)
    }
    cachedConfig = applyEnvOverrides(result.data)
    logger.debug(`Loaded config from ${options.path}`)
    return cachedConfig
  }

  const { globalPath, projectPath } = findConfigPaths(options.cwd)

  if (!globalPath && !projectPath) {
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  const globalRaw = globalPath ? await parseYamlFile(globalPath) : {}
  const projectRaw = projectPath ? await parseYamlFile(projectPath) : {}
  const merged = deepMergeConfig(globalRaw, projectRaw)

  const result = configSchema.safeParse(merged)
  if (!result.success) {
    logger.warn('Config file format error, using defaults', result.error.issues)
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  cachedConfig = applyEnvOverrides(result.data)
  return cachedConfig
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse a YAML file; empty or comment-only files yield {}
 */
async function parseYamlFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readFile(filePath, 'utf-8')
  let parsed: unknown
  try {
    parsed = YAML.parse(content)
  } catch {
    throw AppError.configInvalid(`${filePath} is not valid YAML`)
  }
  if (parsed == null) return {}
  if (!isRecord(parsed)) {
    throw AppError.configInvalid(`${filePath} is not a YAML mapping`)
  }
  return parsed
}

/**
 * Project fields override global fields.
 * Nested objects are merged, arrays are replaced.
 */
function deepMergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base }
  for (const key of Object.keys(override)) {
    const val = override[key]
    if (val === undefined || val === null) continue
    const current = result[key]
    if (isRecord(val) && isRecord(current)) {
      result[key] = deepMergeConfig(current, val)
    } else {
      result[key] = val
    }
  }
  return result
}

/**
 * Environment overrides, applied after validation
 */
export function applyEnvOverrides(config: Config): Config {
  const env = process.env

  if (env.HOSTWARD_SSHD_CONFIG) {
    config = { ...config, paths: { ...config.paths, sshdConfig: env.HOSTWARD_SSHD_CONFIG } }
  }

  if (env.HOSTWARD_BACKUP_DIR) {
    config = { ...config, backup: { ...config.backup, directory: env.HOSTWARD_BACKUP_DIR } }
  }

  return config
}

export function getDefaultConfig(): Config {
  return configSchema.parse({})
}

export function clearConfigCache(): void {
  cachedConfig = null
}
