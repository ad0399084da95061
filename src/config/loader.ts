/**
 * YAML configuration loader with type-safe parsing
 */

import { readFileSync, existsSync } from 'fs'
import { resolve } from 'path'
import * as yaml from 'js-yaml'
import { validateConfig, validateConfigSafe, type DriverConfig } from './schema'
import { ConfigurationError, loadConfigFromEnv } from './environment'

export const DEFAULT_CONFIG_PATHS = [
  'blobvfs.config.yaml',
  'blobvfs.config.yml',
  'config/blobvfs.yaml',
  'config/blobvfs.yml',
]

/**
 * Load and validate config from YAML file
 * @throws ConfigurationError if file doesn't exist or validation fails
 */
export function loadConfig(filePath: string): DriverConfig {
  const absolutePath = resolve(filePath)

  if (!existsSync(absolutePath)) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`, {
      searchedPaths: [absolutePath],
    })
  }

  try {
    const fileContent = readFileSync(absolutePath, 'utf-8')
    const rawConfig = yaml.load(fileContent)

    return validateConfig(rawConfig)
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigurationError(`Failed to load config from ${filePath}: ${error.message}`)
    }
    throw error
  }
}

/**
 * Load config with detailed error reporting
 * Returns success/failure with error messages
 */
export function loadConfigSafe(
  filePath: string
): { success: true; data: DriverConfig } | { success: false; errors: string[] } {
  const absolutePath = resolve(filePath)

  if (!existsSync(absolutePath)) {
    return {
      success: false,
      errors: [`Config file not found: ${absolutePath}`],
    }
  }

  try {
    const fileContent = readFileSync(absolutePath, 'utf-8')
    const rawConfig = yaml.load(fileContent)

    return validateConfigSafe(rawConfig)
  } catch (error) {
    if (error instanceof Error) {
      return {
        success: false,
        errors: [`Failed to parse YAML: ${error.message}`],
      }
    }
    return {
      success: false,
      errors: ['Unknown error loading config'],
    }
  }
}

/**
 * Load config from BLOBVFS_CONFIG_PATH, then the default locations,
 * then the environment
 */
export function loadConfigAuto(env: Record<string, string | undefined> = process.env): DriverConfig {
  const configPath = env.BLOBVFS_CONFIG_PATH
  if (configPath) {
    return loadConfig(configPath)
  }

  const found = DEFAULT_CONFIG_PATHS.find((path) => existsSync(path))
  if (found) {
    return loadConfig(found)
  }

  return loadConfigFromEnv(env)
}
