/**
 * blobvfs - hierarchical virtual filesystem over flat blob storage
 */

export * from './driver'
export * from './storage'
export * from './config'
export { Observability, InMemoryMetrics, obs, metrics } from './observability'
export type { Metrics, LoggingOptions } from './observability'
