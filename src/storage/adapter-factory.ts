/**
 * Adapter Factory - configuration-based BlobStore instantiation
 */

import type { DriverConfig } from '../config/schema'
import { ConfigurationError } from '../config/environment'
import type { BlobStore } from './blob-store'
import { AzureBlobStore, type AzureCredentialOptions } from './azure-blob-store'
import { InMemoryBlobStore } from './in-memory-blob-store'

/**
 * Pick credentials in order of precedence: connection string, shared key, account URL
 */
export function resolveAzureCredentials(config: DriverConfig): AzureCredentialOptions {
  const azure = config.azure
  if (azure?.connectionString) {
    return { connectionString: azure.connectionString }
  }
  if (azure?.accountName && azure.accountKey) {
    return { accountName: azure.accountName, accountKey: azure.accountKey, realm: azure.realm }
  }
  if (azure?.accountUrl) {
    return { accountUrl: azure.accountUrl }
  }
  throw new ConfigurationError('Azure credentials required for azure BlobStore', { key: 'azure' })
}

/**
 * Create and initialize the configured BlobStore. Does not create the container.
 */
export async function createBlobStore(config: DriverConfig): Promise<BlobStore> {
  if (config.backend === 'inmemory') {
    return new InMemoryBlobStore()
  }

  const store = new AzureBlobStore(resolveAzureCredentials(config), config.container)
  await store.initialize()
  return store
}
