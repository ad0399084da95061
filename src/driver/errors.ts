export const DRIVER_NAME = 'azure'

/**
 * Base class for errors raised by the driver façade
 */
export class StorageDriverError extends Error {
  public readonly driverName = DRIVER_NAME

  constructor(message: string) {
    super(message)
    this.name = 'StorageDriverError'
  }
}

export class PathNotFoundError extends StorageDriverError {
  constructor(public readonly path: string) {
    super(`${DRIVER_NAME}: Path not found: ${path}`)
    this.name = 'PathNotFoundError'
  }
}

export class InvalidPathError extends StorageDriverError {
  constructor(public readonly path: string) {
    super(`${DRIVER_NAME}: invalid path: ${path}`)
    this.name = 'InvalidPathError'
  }
}

export class InvalidOffsetError extends StorageDriverError {
  constructor(
    public readonly path: string,
    public readonly offset: number
  ) {
    super(`${DRIVER_NAME}: invalid offset: ${offset} for path: ${path}`)
    this.name = 'InvalidOffsetError'
  }
}

/**
 * Whole-object write larger than the backend accepts in one call.
 * Raised before any network call.
 */
export class SizeLimitExceededError extends StorageDriverError {
  constructor(
    public readonly path: string,
    public readonly size: number,
    public readonly limit: number
  ) {
    super(
      `${DRIVER_NAME}: uploading ${size} bytes to ${path} with putContent is not supported; limit: ${limit} bytes`
    )
    this.name = 'SizeLimitExceededError'
  }
}

/**
 * Writer operation invoked outside the states that allow it
 */
export class InvalidStateError extends StorageDriverError {
  constructor(
    public readonly operation: string,
    public readonly state: string
  ) {
    super(`${DRIVER_NAME}: cannot ${operation}: already ${state}`)
    this.name = 'InvalidStateError'
  }
}

export class UnsupportedMethodError extends StorageDriverError {
  constructor(public readonly method: string) {
    super(`${DRIVER_NAME}: unsupported method: ${method}`)
    this.name = 'UnsupportedMethodError'
  }
}

/**
 * The backend handed back a continuation marker it had already returned.
 * `partial` holds the virtual paths collected before the repeat.
 */
export class ListingContractError extends StorageDriverError {
  constructor(
    public readonly prefix: string,
    public readonly marker: string,
    public readonly partial: string[]
  ) {
    super(`${DRIVER_NAME}: listing of "${prefix}" repeated continuation marker "${marker}"`)
    this.name = 'ListingContractError'
  }
}
