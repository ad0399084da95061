/**
 * BlobStore - flat, key-addressed object storage consumed by the driver
 *
 * Keys are plain strings with no hierarchy of their own. Directory semantics
 * live entirely in the driver layer.
 */

export type BlobObjectType = 'block' | 'append' | 'page'

export interface BlobProperties {
  size: number
  modTime: Date
  objectType: BlobObjectType
}

/**
 * One page of a prefix listing. An empty `nextMarker` marks the last page.
 */
export interface ListingPage {
  keys: string[]
  nextMarker: string
}

export interface ListPageOptions {
  marker?: string
  maxResults?: number
}

export class BlobNotFoundError extends Error {
  constructor(public readonly key: string) {
    super(`Blob not found: ${key}`)
    this.name = 'BlobNotFoundError'
  }
}

export interface BlobStore {
  /**
   * Largest payload accepted by a single `put` call
   */
  readonly maxPutSize: number

  /**
   * Largest payload accepted by a single `appendChunk` call
   */
  readonly maxAppendSize: number

  /**
   * Download a whole blob
   * @throws BlobNotFoundError
   */
  get(key: string): Promise<Buffer>

  /**
   * Stream a blob starting at `offset`
   * @throws BlobNotFoundError
   */
  read(key: string, offset: number): Promise<NodeJS.ReadableStream>

  /**
   * Overwrite a blob with a block-type object
   */
  put(key: string, data: Buffer): Promise<void>

  /**
   * @throws BlobNotFoundError
   */
  properties(key: string): Promise<BlobProperties>

  exists(key: string): Promise<boolean>

  /**
   * Delete a blob, returning whether anything was deleted
   */
  deleteIfExists(key: string): Promise<boolean>

  /**
   * @throws BlobNotFoundError
   */
  delete(key: string): Promise<void>

  /**
   * List one page of keys starting with `prefix`, in lexical order
   */
  listPage(prefix: string, options?: ListPageOptions): Promise<ListingPage>

  /**
   * Create an empty append-capable blob, replacing whatever is at `key`
   */
  createAppendable(key: string): Promise<void>

  /**
   * Append one chunk to an append-capable blob
   */
  appendChunk(key: string, data: Buffer): Promise<void>

  /**
   * Server-side copy
   * @throws BlobNotFoundError when the source is missing
   */
  copy(sourceKey: string, destKey: string): Promise<void>

  /**
   * Create the backing container if it does not exist yet
   */
  createIfAbsent(): Promise<void>
}
