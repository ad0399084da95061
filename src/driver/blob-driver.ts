import { Readable } from 'stream'
import type { Logger } from 'pino'
import { obs } from '../observability'
import { BlobNotFoundError, type BlobProperties, type BlobStore } from '../storage/blob-store'
import { ChunkedWriter } from './chunked-writer'
import {
  DRIVER_NAME,
  InvalidOffsetError,
  PathNotFoundError,
  SizeLimitExceededError,
  UnsupportedMethodError,
} from './errors'
import { directDescendants, listBlobs, listingPrefix } from './lister'
import { PathMapper } from './path-mapper'
import { assertValidDirectoryPath, assertValidPath, ROOT_PATH } from './paths'
import { directoryEntry, fileEntry, type VirtualEntry } from './virtual-entry'
import { walkFallback, type Walkable, type WalkVisitor } from './walk'

export interface BlobDriverOptions {
  /**
   * Key prefix every virtual path is stored under
   */
  rootDirectory?: string
  /**
   * Upper bound for a single append; capped at what the store accepts
   */
  maxChunkSize?: number
  logger?: Logger
}

/**
 * BlobDriver - hierarchical filesystem façade over a flat BlobStore
 *
 * Files are blobs; directories exist only as shared key prefixes. Every
 * operation awaits its backend calls one at a time.
 */
export class BlobDriver implements Walkable {
  readonly name = DRIVER_NAME
  readonly maxChunkSize: number

  private readonly mapper: PathMapper
  private readonly logger: Logger

  constructor(
    private store: BlobStore,
    options: BlobDriverOptions = {}
  ) {
    this.mapper = new PathMapper(options.rootDirectory)
    this.maxChunkSize = Math.min(options.maxChunkSize ?? store.maxAppendSize, store.maxAppendSize)
    this.logger =
      options.logger ??
      obs.createChildLogger({ component: 'blob-driver', root: this.mapper.rootKey })
  }

  /**
   * Content of the file at `path`
   */
  async getContent(path: string): Promise<Buffer> {
    assertValidPath(path)
    return this.measure('getContent', async () => {
      try {
        return await this.store.get(this.mapper.map(path))
      } catch (error) {
        throw notFoundAs(error, path)
      }
    })
  }

  /**
   * Overwrite the file at `path` with a single block upload
   */
  async putContent(path: string, contents: Buffer): Promise<void> {
    assertValidPath(path)
    if (contents.length > this.store.maxPutSize) {
      throw new SizeLimitExceededError(path, contents.length, this.store.maxPutSize)
    }

    return this.measure('putContent', async () => {
      const key = this.mapper.map(path)
      const existing = await this.propertiesOrNull(key)

      if (existing && existing.objectType !== 'block') {
        await this.replaceLegacyBlob(path, key, existing, contents)
        return
      }
      await this.store.put(key, contents)
    })
  }

  /**
   * Replace a non-block object with a block blob.
   *
   * The backend cannot overwrite across object types in one call, so this
   * deletes first and uploads second. Between the two calls the path does not
   * exist, and if the upload fails the previous content is gone.
   */
  protected async replaceLegacyBlob(
    path: string,
    key: string,
    existing: BlobProperties,
    contents: Buffer
  ): Promise<void> {
    this.logger.info(
      { path, objectType: existing.objectType, size: existing.size },
      'replacing legacy blob with block blob'
    )
    await this.deleteKey(key, path)
    await this.store.put(key, contents)
  }

  /**
   * Stream the file at `path` starting at `offset`. An offset at or past the
   * end yields an empty stream.
   */
  async reader(path: string, offset: number = 0): Promise<NodeJS.ReadableStream> {
    assertValidPath(path)
    if (!Number.isInteger(offset) || offset < 0) {
      throw new InvalidOffsetError(path, offset)
    }

    return this.measure('reader', async () => {
      const key = this.mapper.map(path)
      const props = await this.propertiesOrNull(key)
      if (!props) {
        throw new PathNotFoundError(path)
      }
      if (offset >= props.size) {
        return Readable.from([])
      }

      try {
        return await this.store.read(key, offset)
      } catch (error) {
        throw notFoundAs(error, path)
      }
    })
  }

  /**
   * Open a writer session on `path`.
   *
   * Without `append` any existing object is replaced by an empty append-capable
   * one. With `append` the object must exist and the session resumes at its size.
   */
  async writer(path: string, append: boolean = false): Promise<ChunkedWriter> {
    assertValidPath(path)

    return this.measure('writer', async () => {
      const key = this.mapper.map(path)
      const exists = await this.store.exists(key)
      let size = 0

      if (exists && append) {
        const props = await this.propertiesOrNull(key)
        if (!props) {
          throw new PathNotFoundError(path)
        }
        size = props.size
      } else if (exists) {
        await this.deleteKey(key, path)
        await this.store.createAppendable(key)
      } else if (append) {
        throw new PathNotFoundError(path)
      } else {
        await this.store.createAppendable(key)
      }

      this.logger.debug({ path, append, size }, 'writer opened')
      return new ChunkedWriter(
        this.store,
        path,
        key,
        size,
        this.maxChunkSize,
        this.logger.child({ writer: path })
      )
    })
  }

  /**
   * File entry for a blob, synthetic directory entry for a shared prefix
   */
  async stat(path: string): Promise<VirtualEntry> {
    assertValidDirectoryPath(path)

    return this.measure('stat', async () => {
      const key = this.mapper.map(path)

      if (path !== ROOT_PATH && (await this.store.exists(key))) {
        const props = await this.propertiesOrNull(key)
        if (props) {
          return fileEntry(path, props.size, props.modTime)
        }
      }

      const page = await this.store.listPage(listingPrefix(this.mapper, path), { maxResults: 1 })
      if (page.keys.length > 0) {
        return directoryEntry(path)
      }

      throw new PathNotFoundError(path)
    })
  }

  /**
   * Direct descendants of `path`. The root with nothing under it is an
   * empty listing; any other path with nothing under it is not found.
   */
  async list(path: string): Promise<string[]> {
    assertValidDirectoryPath(path)
    const prefix = path === ROOT_PATH ? '' : path

    return this.measure('list', async () => {
      const blobs = await listBlobs(this.store, this.mapper, prefix)
      const children = directDescendants(blobs, prefix)

      if (prefix !== '' && children.length === 0) {
        throw new PathNotFoundError(path)
      }
      return children
    })
  }

  /**
   * Copy then delete. Not atomic: a failed delete leaves both objects.
   */
  async move(sourcePath: string, destPath: string): Promise<void> {
    assertValidPath(sourcePath)
    assertValidPath(destPath)

    return this.measure('move', async () => {
      const sourceKey = this.mapper.map(sourcePath)
      try {
        await this.store.copy(sourceKey, this.mapper.map(destPath))
        await this.store.delete(sourceKey)
      } catch (error) {
        throw notFoundAs(error, sourcePath)
      }
    })
  }

  /**
   * Delete the blob at `path`, or every blob below it
   */
  async delete(path: string): Promise<void> {
    assertValidPath(path)

    return this.measure('delete', async () => {
      if (await this.store.deleteIfExists(this.mapper.map(path))) {
        return
      }

      const blobs = await listBlobs(this.store, this.mapper, path)
      if (blobs.length === 0) {
        throw new PathNotFoundError(path)
      }

      for (const blob of blobs) {
        await this.deleteKey(this.mapper.map(blob), blob)
      }
      this.logger.debug({ path, count: blobs.length }, 'deleted virtual directory')
    })
  }

  /**
   * Signed URLs are backend-specific and not provided by this driver
   */
  async urlFor(path: string, _options: Record<string, unknown> = {}): Promise<string> {
    assertValidPath(path)
    throw new UnsupportedMethodError('urlFor')
  }

  /**
   * Visit every entry below `path`, depth first
   */
  async walk(path: string, visitor: WalkVisitor): Promise<void> {
    assertValidDirectoryPath(path)
    await walkFallback(this, path, visitor, this.logger)
  }

  private async deleteKey(key: string, path: string): Promise<void> {
    try {
      await this.store.delete(key)
    } catch (error) {
      throw notFoundAs(error, path)
    }
  }

  private async propertiesOrNull(key: string): Promise<BlobProperties | null> {
    try {
      return await this.store.properties(key)
    } catch (error) {
      if (error instanceof BlobNotFoundError) return null
      throw error
    }
  }

  private measure<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return obs.measureAsync(`driver.${operation}`, fn)
  }
}

function notFoundAs(error: unknown, path: string): unknown {
  return error instanceof BlobNotFoundError ? new PathNotFoundError(path) : error
}
