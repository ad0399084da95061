import { Readable } from 'stream'
import { obs } from '../observability'
import {
  BlobNotFoundError,
  type BlobObjectType,
  type BlobProperties,
  type BlobStore,
  type ListingPage,
  type ListPageOptions,
} from './blob-store'

interface StoredBlob {
  data: Buffer
  objectType: BlobObjectType
  modTime: Date
}

export interface InMemoryBlobStoreOptions {
  /**
   * Keys per listing page when the caller does not ask for fewer
   */
  pageSize?: number
  maxPutSize?: number
  maxAppendSize?: number
  now?: () => Date
}

/**
 * InMemoryBlobStore - deterministic in-process backend for tests and local runs
 *
 * Listing markers are the first key of the next page, so pagination is
 * stable as long as nothing is inserted in between.
 */
export class InMemoryBlobStore implements BlobStore {
  readonly maxPutSize: number
  readonly maxAppendSize: number

  private store = new Map<string, StoredBlob>()
  private containerCreated = false
  private readonly pageSize: number
  private readonly now: () => Date

  constructor(options: InMemoryBlobStoreOptions = {}) {
    this.pageSize = options.pageSize ?? 5000
    this.maxPutSize = options.maxPutSize ?? 256 * 1024 * 1024
    this.maxAppendSize = options.maxAppendSize ?? 4 * 1024 * 1024
    this.now = options.now ?? (() => new Date())

    if (process.env.NODE_ENV === 'production') {
      obs.logger.warn(
        { component: 'in-memory-blob-store' },
        'Using in-memory blob store in production. Contents are lost on restart.'
      )
    }
  }

  async get(key: string): Promise<Buffer> {
    return Buffer.from(this.lookup(key).data)
  }

  async read(key: string, offset: number): Promise<NodeJS.ReadableStream> {
    const data = this.lookup(key).data.subarray(offset)
    return Readable.from(data.length > 0 ? [Buffer.from(data)] : [])
  }

  async put(key: string, data: Buffer): Promise<void> {
    if (data.length > this.maxPutSize) {
      throw new Error(`Payload of ${data.length} bytes exceeds put limit of ${this.maxPutSize}`)
    }
    this.store.set(key, { data: Buffer.from(data), objectType: 'block', modTime: this.now() })
  }

  async properties(key: string): Promise<BlobProperties> {
    const blob = this.lookup(key)
    return { size: blob.data.length, modTime: blob.modTime, objectType: blob.objectType }
  }

  async exists(key: string): Promise<boolean> {
    return this.store.has(key)
  }

  async deleteIfExists(key: string): Promise<boolean> {
    return this.store.delete(key)
  }

  async delete(key: string): Promise<void> {
    if (!this.store.delete(key)) {
      throw new BlobNotFoundError(key)
    }
  }

  async listPage(prefix: string, options: ListPageOptions = {}): Promise<ListingPage> {
    const matching = [...this.store.keys()].filter((key) => key.startsWith(prefix)).sort()

    let start = 0
    if (options.marker) {
      const marker = options.marker
      start = matching.findIndex((key) => key >= marker)
      if (start === -1) start = matching.length
    }

    const limit = Math.min(options.maxResults ?? this.pageSize, this.pageSize)
    const keys = matching.slice(start, start + limit)
    const next = start + keys.length
    return {
      keys,
      nextMarker: next < matching.length ? matching[next] : '',
    }
  }

  async createAppendable(key: string): Promise<void> {
    this.store.set(key, { data: Buffer.alloc(0), objectType: 'append', modTime: this.now() })
  }

  async appendChunk(key: string, data: Buffer): Promise<void> {
    const blob = this.lookup(key)
    if (blob.objectType !== 'append') {
      throw new Error(`Blob ${key} is a ${blob.objectType} blob and cannot be appended to`)
    }
    if (data.length > this.maxAppendSize) {
      throw new Error(`Chunk of ${data.length} bytes exceeds append limit of ${this.maxAppendSize}`)
    }
    blob.data = Buffer.concat([blob.data, data])
    blob.modTime = this.now()
  }

  async copy(sourceKey: string, destKey: string): Promise<void> {
    const source = this.lookup(sourceKey)
    this.store.set(destKey, {
      data: Buffer.from(source.data),
      objectType: source.objectType,
      modTime: this.now(),
    })
  }

  async createIfAbsent(): Promise<void> {
    this.containerCreated = true
  }

  /**
   * Whether `createIfAbsent` has been called
   */
  isContainerCreated(): boolean {
    return this.containerCreated
  }

  /**
   * Store a blob of a given type directly, bypassing the put path
   */
  seed(key: string, data: Buffer, objectType: BlobObjectType = 'block'): void {
    this.store.set(key, { data: Buffer.from(data), objectType, modTime: this.now() })
  }

  keys(): string[] {
    return [...this.store.keys()].sort()
  }

  private lookup(key: string): StoredBlob {
    const blob = this.store.get(key)
    if (!blob) {
      throw new BlobNotFoundError(key)
    }
    return blob
  }
}
