import type { DriverConfig } from '../config/schema'
import { obs } from '../observability'
import { createBlobStore } from '../storage/adapter-factory'
import type { BlobStore } from '../storage/blob-store'
import { BlobDriver } from './blob-driver'

/**
 * Build a driver from validated config: configure logging, create the
 * backing store, create its container when asked to, wire the driver.
 */
export async function createDriver(config: DriverConfig, store?: BlobStore): Promise<BlobDriver> {
  obs.configure(config.logging)

  const blobStore = store ?? (await createBlobStore(config))
  if (config.createContainer) {
    await blobStore.createIfAbsent()
  }

  const logger = obs.createChildLogger({
    component: 'blob-driver',
    backend: config.backend,
    container: config.container,
  })
  logger.info({ rootDirectory: config.rootDirectory }, 'driver ready')

  return new BlobDriver(blobStore, {
    rootDirectory: config.rootDirectory,
    maxChunkSize: config.maxChunkSize,
    logger,
  })
}
