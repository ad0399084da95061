/**
 * Environment Configuration
 *
 * Maps environment variables onto the driver config shape. Validation happens
 * in the zod schema, so this layer only collects and coerces.
 */

import { validateConfigSafe, type DriverConfig } from './schema'

export class ConfigurationError extends Error {
  public readonly details?: {
    key?: string
    errors?: string[]
    searchedPaths?: string[]
  }

  constructor(message: string, details?: ConfigurationError['details']) {
    super(message)
    this.name = 'ConfigurationError'
    this.details = details
  }
}

type Env = Record<string, string | undefined>

function parseBoolean(env: Env, key: string): boolean | undefined {
  const raw = env[key]
  if (raw === undefined || raw === '') return undefined

  const value = raw.trim().toLowerCase()
  if (value === 'true' || value === '1') return true
  if (value === 'false' || value === '0') return false
  throw new ConfigurationError(`${key} must be true or false, got "${raw}"`, { key })
}

function parseInteger(env: Env, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw === '') return undefined

  const value = Number(raw)
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${key} must be an integer, got "${raw}"`, { key })
  }
  return value
}

function compact(record: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined && value !== '') {
      out[key] = value
    }
  }
  return out
}

/**
 * Collect raw driver config from environment variables
 */
export function readEnvironmentConfig(env: Env = process.env): Record<string, unknown> {
  const azure = compact({
    connectionString: env.AZURE_STORAGE_CONNECTION_STRING,
    accountName: env.AZURE_STORAGE_ACCOUNT,
    accountKey: env.AZURE_STORAGE_KEY,
    realm: env.AZURE_STORAGE_REALM,
    accountUrl: env.AZURE_STORAGE_ACCOUNT_URL,
  })

  return compact({
    backend: env.BLOBVFS_BACKEND,
    container: env.AZURE_STORAGE_CONTAINER,
    rootDirectory: env.BLOBVFS_ROOT_DIRECTORY,
    createContainer: parseBoolean(env, 'BLOBVFS_CREATE_CONTAINER'),
    maxChunkSize: parseInteger(env, 'BLOBVFS_MAX_CHUNK_SIZE'),
    azure: Object.keys(azure).length > 0 ? azure : undefined,
    logging: compact({
      level: env.LOG_LEVEL,
      pretty: parseBoolean(env, 'LOG_PRETTY'),
    }),
  })
}

/**
 * Load and validate driver config from environment variables
 * @throws ConfigurationError listing every invalid or missing setting
 */
export function loadConfigFromEnv(env: Env = process.env): DriverConfig {
  const result = validateConfigSafe(readEnvironmentConfig(env))
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid driver configuration from environment: ${result.errors.join('; ')}`,
      { errors: result.errors }
    )
  }
  return result.data
}
