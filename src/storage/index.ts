export * from './blob-store'
export * from './stream-utils'
export * from './adapter-factory'

// Implementations
export * from './in-memory-blob-store'
export * from './azure-blob-store'
