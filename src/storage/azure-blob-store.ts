import {
  BlobServiceClient,
  ContainerClient,
  RestError,
  StorageSharedKeyCredential,
  type BlobType,
} from '@azure/storage-blob'
import { DefaultAzureCredential } from '@azure/identity'
import {
  BlobNotFoundError,
  type BlobObjectType,
  type BlobProperties,
  type BlobStore,
  type ListingPage,
  type ListPageOptions,
} from './blob-store'
import { streamToBuffer } from './stream-utils'

/**
 * Largest block blob accepted by a single Put Blob call (service versions after 2016-05-31)
 */
export const AZURE_MAX_PUT_SIZE = 256 * 1024 * 1024

/**
 * Largest block accepted by Append Block
 */
export const AZURE_MAX_APPEND_SIZE = 4 * 1024 * 1024

export type AzureCredentialOptions =
  | { connectionString: string }
  | { accountName: string; accountKey: string; realm?: string }
  | { accountUrl: string }

/**
 * AzureBlobStore - Azure Blob Storage implementation
 *
 * Whole-object writes use block blobs; chunked writes use append blobs.
 *
 * Usage:
 *   const store = new AzureBlobStore({ connectionString }, 'registry')
 *   await store.initialize()
 *   await store.createIfAbsent()
 */
export class AzureBlobStore implements BlobStore {
  readonly maxPutSize = AZURE_MAX_PUT_SIZE
  readonly maxAppendSize = AZURE_MAX_APPEND_SIZE

  private containerClient: ContainerClient | null = null

  constructor(
    private credentials: AzureCredentialOptions,
    private containerName: string
  ) {}

  /**
   * Build the service client. Does not touch the network.
   */
  async initialize(): Promise<void> {
    const blobServiceClient = this.createServiceClient()
    this.containerClient = blobServiceClient.getContainerClient(this.containerName)
  }

  private createServiceClient(): BlobServiceClient {
    const credentials = this.credentials
    if ('connectionString' in credentials) {
      return BlobServiceClient.fromConnectionString(credentials.connectionString)
    }
    if ('accountKey' in credentials) {
      const realm = credentials.realm || 'core.windows.net'
      return new BlobServiceClient(
        `https://${credentials.accountName}.blob.${realm}`,
        new StorageSharedKeyCredential(credentials.accountName, credentials.accountKey)
      )
    }
    return new BlobServiceClient(credentials.accountUrl, new DefaultAzureCredential())
  }

  private ensureInitialized(): ContainerClient {
    if (!this.containerClient) {
      throw new Error('AzureBlobStore not initialized. Call initialize() first.')
    }
    return this.containerClient
  }

  async createIfAbsent(): Promise<void> {
    await this.ensureInitialized().createIfNotExists()
  }

  async get(key: string): Promise<Buffer> {
    const stream = await this.read(key, 0)
    return streamToBuffer(stream)
  }

  async read(key: string, offset: number): Promise<NodeJS.ReadableStream> {
    const blobClient = this.ensureInitialized().getBlobClient(key)

    try {
      const downloadResponse = await blobClient.download(offset)
      if (!downloadResponse.readableStreamBody) {
        throw new Error(`Blob ${key} has no content`)
      }
      return downloadResponse.readableStreamBody
    } catch (error) {
      throw translateNotFound(error, key)
    }
  }

  async put(key: string, data: Buffer): Promise<void> {
    const blockBlobClient = this.ensureInitialized().getBlockBlobClient(key)
    await blockBlobClient.upload(data, data.length)
  }

  async properties(key: string): Promise<BlobProperties> {
    const blobClient = this.ensureInitialized().getBlobClient(key)

    try {
      const props = await blobClient.getProperties()
      return {
        size: props.contentLength ?? 0,
        modTime: props.lastModified ?? new Date(0),
        objectType: toObjectType(props.blobType),
      }
    } catch (error) {
      throw translateNotFound(error, key)
    }
  }

  async exists(key: string): Promise<boolean> {
    return await this.ensureInitialized().getBlobClient(key).exists()
  }

  async deleteIfExists(key: string): Promise<boolean> {
    const response = await this.ensureInitialized().getBlobClient(key).deleteIfExists()
    return response.succeeded
  }

  async delete(key: string): Promise<void> {
    try {
      await this.ensureInitialized().getBlobClient(key).delete()
    } catch (error) {
      throw translateNotFound(error, key)
    }
  }

  async listPage(prefix: string, options: ListPageOptions = {}): Promise<ListingPage> {
    const pages = this.ensureInitialized()
      .listBlobsFlat({ prefix: prefix || undefined })
      .byPage({
        continuationToken: options.marker || undefined,
        maxPageSize: options.maxResults,
      })

    const result = await pages.next()
    if (result.done) {
      return { keys: [], nextMarker: '' }
    }

    const page = result.value
    return {
      keys: page.segment.blobItems.map((blob) => blob.name),
      nextMarker: page.continuationToken ?? '',
    }
  }

  async createAppendable(key: string): Promise<void> {
    await this.ensureInitialized().getAppendBlobClient(key).create()
  }

  async appendChunk(key: string, data: Buffer): Promise<void> {
    await this.ensureInitialized().getAppendBlobClient(key).appendBlock(data, data.length)
  }

  async copy(sourceKey: string, destKey: string): Promise<void> {
    const containerClient = this.ensureInitialized()
    const source = containerClient.getBlobClient(sourceKey)
    const dest = containerClient.getBlobClient(destKey)

    try {
      const poller = await dest.beginCopyFromURL(source.url)
      await poller.pollUntilDone()
    } catch (error) {
      throw translateNotFound(error, sourceKey)
    }
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof RestError && error.statusCode === 404
}

function translateNotFound(error: unknown, key: string): unknown {
  return isNotFound(error) ? new BlobNotFoundError(key) : error
}

function toObjectType(blobType: BlobType | undefined): BlobObjectType {
  switch (blobType) {
    case 'AppendBlob':
      return 'append'
    case 'PageBlob':
      return 'page'
    default:
      return 'block'
  }
}
