import { readFile, access } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { NetcheckConfig } from '../types'
import validateConfig from './validate'
import { ConfigLoadError } from '../errors'
import { resolveConfigEnv } from '../utils/resolve-env'
import { parseTomlConfig } from './toml'

export const CONFIG_FILENAMES = [
  'netcheck.config.js',
  'netcheck.config.cjs',
  'netcheck.config.json',
  'netcheck.config.toml',
] as const

export interface LoadConfigOptions {
  cwd?: string
  configPath?: string
}

export interface LoadedConfig {
  config: NetcheckConfig
  path: string
}

/**
 * Loads, validates and resolves the target list:
 * 1. An explicit config path, or the first netcheck.config.{js,cjs,json,toml} found in cwd
 * 2. ${VAR} references resolved from the environment (ConfigLoadError)
 * 3. Schema validation of the resolved values (ConfigurationError)
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<NetcheckConfig> {
  const { config } = await loadConfigWithPath(options)
  return config
}

export async function loadConfigWithPath(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const { cwd = process.cwd(), configPath } = options

  const targetPath = await findConfigFile(cwd, configPath)
  if (!targetPath) {
    throw new ConfigLoadError(`No configuration file found in ${cwd} (looked for ${CONFIG_FILENAMES.join(', ')})`)
  }

  let raw: unknown
  try {
    raw = await readConfigFile(targetPath)
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to load config file ${targetPath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    )
  }

  let resolved: unknown
  try {
    resolved = resolveConfigEnv(raw)
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to resolve environment references: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    )
  }

  return { config: validateConfig(resolved), path: targetPath }
}

async function findConfigFile(cwd: string, configPath?: string): Promise<string | null> {
  if (configPath) {
    // Explicit paths must exist; the read below reports a missing file
    return resolve(cwd, configPath)
  }

  for (const filename of CONFIG_FILENAMES) {
    const filePath = join(cwd, filename)
    try {
      await access(filePath)
      return filePath
    } catch {
      // not there, try the next name
    }
  }

  return null
}

async function readConfigFile(targetPath: string): Promise<unknown> {
  if (targetPath.endsWith('.toml')) {
    return parseTomlConfig(await readFile(targetPath, 'utf-8'))
  }

  if (targetPath.endsWith('.json')) {
    const content = await readFile(targetPath, 'utf-8')
    const parsed: unknown = JSON.parse(content)
    return parsed
  }

  const configModule: unknown = await import(targetPath)
  if (typeof configModule === 'object' && configModule !== null && 'default' in configModule) {
    return configModule.default
  }
  return configModule
}
