/**
 * Configuration module
 * YAML or environment config, validated with Zod
 */

export * from './schema'
export * from './environment'
export * from './loader'
