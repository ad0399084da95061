import type { Logger } from 'pino'
import { BlobNotFoundError, type BlobStore } from '../storage/blob-store'
import { InvalidStateError, PathNotFoundError } from './errors'

/**
 * Lifecycle of a writer session.
 *
 *   open ──commit──▶ committed ──close──▶ closed
 *   open ──cancel──▶ cancelled ──close──▶ closed
 *   open ──close───────────────────────▶ closed
 */
export type WriterState = 'open' | 'committed' | 'cancelled' | 'closed'

export type WriterOperation = 'write' | 'commit' | 'cancel' | 'close'

/**
 * How the session ended. `uncommitted` means it was closed straight from
 * open: the data is on the backend but the caller never said whether to keep it.
 */
export type WriterOutcome = 'pending' | 'committed' | 'cancelled' | 'uncommitted'

/**
 * States each operation is legal in
 */
export const WRITER_TRANSITIONS: Readonly<Record<WriterOperation, readonly WriterState[]>> = {
  write: ['open'],
  commit: ['open'],
  cancel: ['open'],
  close: ['open', 'committed', 'cancelled'],
}

/**
 * A chunked append stopped part way through. `appended` bytes reached the
 * backend before `failure` was thrown.
 */
export class PartialAppendError extends Error {
  constructor(
    public readonly appended: number,
    public readonly failure: unknown
  ) {
    super(`append failed after ${appended} bytes`)
    this.name = 'PartialAppendError'
  }
}

/**
 * ChunkAppender - splits a block into backend-sized chunks and appends them in order
 */
export class ChunkAppender {
  constructor(
    private store: BlobStore,
    private key: string,
    readonly maxChunkSize: number
  ) {
    if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
      throw new RangeError(`maxChunkSize must be a positive integer, got ${maxChunkSize}`)
    }
  }

  /**
   * @returns bytes appended
   * @throws PartialAppendError on the first failing chunk
   */
  async append(data: Buffer): Promise<number> {
    let appended = 0
    for (let offset = 0; offset < data.length; offset += this.maxChunkSize) {
      const chunk = data.subarray(offset, Math.min(offset + this.maxChunkSize, data.length))
      try {
        await this.store.appendChunk(this.key, chunk)
      } catch (error) {
        throw new PartialAppendError(appended, error)
      }
      appended += chunk.length
    }
    return appended
  }
}

/**
 * ChunkedWriter - buffered writer session over an append-capable blob
 *
 * Writes are buffered until at least one full chunk is available; full chunks
 * are appended immediately and the remainder waits for the next write,
 * commit or close. Single-owner: callers serialize access themselves.
 */
export class ChunkedWriter {
  private _state: WriterState = 'open'
  private _outcome: WriterOutcome = 'pending'
  private _size: number
  private buffer: Buffer = Buffer.alloc(0)
  private readonly appender: ChunkAppender

  constructor(
    private store: BlobStore,
    readonly path: string,
    readonly key: string,
    initialSize: number,
    maxChunkSize: number,
    private logger?: Logger
  ) {
    this._size = initialSize
    this.appender = new ChunkAppender(store, key, maxChunkSize)
  }

  get state(): WriterState {
    return this._state
  }

  get outcome(): WriterOutcome {
    return this._outcome
  }

  /**
   * Logical byte count: bytes on the backend plus bytes still buffered
   */
  get size(): number {
    return this._size
  }

  /**
   * @returns bytes accepted
   */
  async write(data: Buffer | Uint8Array): Promise<number> {
    this.assertAllowed('write')

    this.buffer = this.buffer.length === 0 ? Buffer.from(data) : Buffer.concat([this.buffer, data])
    this._size += data.length

    const chunkSize = this.appender.maxChunkSize
    const full = this.buffer.length - (this.buffer.length % chunkSize)
    if (full > 0) {
      const ready = this.buffer.subarray(0, full)
      this.buffer = this.buffer.subarray(full)
      await this.appendAll(ready)
    }

    return data.length
  }

  async commit(): Promise<void> {
    this.assertAllowed('commit')
    await this.flush()
    this._state = 'committed'
    this._outcome = 'committed'
    this.logger?.debug({ path: this.path, size: this._size }, 'writer committed')
  }

  /**
   * Drop buffered data and delete the backend object
   */
  async cancel(): Promise<void> {
    this.assertAllowed('cancel')
    this._state = 'cancelled'
    this._outcome = 'cancelled'
    this.buffer = Buffer.alloc(0)
    this.logger?.debug({ path: this.path }, 'writer cancelled')
    try {
      await this.store.delete(this.key)
    } catch (error) {
      if (error instanceof BlobNotFoundError) throw new PathNotFoundError(this.path)
      throw error
    }
  }

  async close(): Promise<void> {
    this.assertAllowed('close')
    if (this._state === 'open') {
      await this.flush()
      this._outcome = 'uncommitted'
    }
    this._state = 'closed'
  }

  private assertAllowed(operation: WriterOperation): void {
    if (!WRITER_TRANSITIONS[operation].includes(this._state)) {
      throw new InvalidStateError(operation, this._state)
    }
  }

  private async flush(): Promise<void> {
    if (this.buffer.length === 0) return

    const pending = this.buffer
    this.buffer = Buffer.alloc(0)
    await this.appendAll(pending)
  }

  /**
   * On a partial failure the buffer is dropped and size falls back to the
   * durable backend offset, so the caller can resume from `size` or cancel.
   */
  private async appendAll(data: Buffer): Promise<void> {
    const unsent = this.buffer.length
    try {
      await this.appender.append(data)
    } catch (error) {
      if (!(error instanceof PartialAppendError)) throw error

      this._size -= data.length - error.appended + unsent
      this.buffer = Buffer.alloc(0)
      this.logger?.debug(
        { path: this.path, appended: error.appended, size: this._size },
        'chunk append failed'
      )
      throw error.failure
    }
  }
}
