/**
 * Zod schemas for driver configuration
 * Validates YAML config files and environment-derived config
 */

import { z } from 'zod'

export const MAX_CHUNK_SIZE = 4 * 1024 * 1024

/**
 * Azure credentials. Exactly how the client authenticates is left to the SDK.
 */
export const AzureConfigSchema = z.object({
  connectionString: z.string().min(1).optional(),
  accountName: z.string().min(1).optional(),
  accountKey: z.string().min(1).optional(),
  realm: z.string().min(1).default('core.windows.net'),
  accountUrl: z.string().url().optional(),
})

export type AzureConfig = z.infer<typeof AzureConfigSchema>

export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  pretty: z.boolean().default(false),
})

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>

export const DriverConfigSchema = z
  .object({
    backend: z.enum(['azure', 'inmemory']).default('azure'),
    container: z.string().min(1),
    rootDirectory: z.string().default(''),
    createContainer: z.boolean().default(true),
    maxChunkSize: z.number().int().positive().max(MAX_CHUNK_SIZE).default(MAX_CHUNK_SIZE),
    azure: AzureConfigSchema.optional(),
    logging: LoggingConfigSchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (config.backend !== 'azure') return

    const azure = config.azure
    const hasCredentials =
      !!azure &&
      (!!azure.connectionString || (!!azure.accountName && !!azure.accountKey) || !!azure.accountUrl)

    if (!hasCredentials) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['azure'],
        message: 'azure backend requires connectionString, accountName and accountKey, or accountUrl',
      })
    }
  })

export type DriverConfig = z.infer<typeof DriverConfigSchema>

/**
 * Validate and parse config with defaults
 */
export function validateConfig(config: unknown): DriverConfig {
  return DriverConfigSchema.parse(config)
}

/**
 * Validate config with detailed error messages
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: DriverConfig } | { success: false; errors: string[] } {
  const result = DriverConfigSchema.safeParse(config)

  if (result.success) {
    return { success: true, data: result.data }
  }

  const errors = result.error.issues.map((issue) => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })

  return { success: false, errors }
}
