import { InvalidPathError } from './errors'

/**
 * Valid virtual paths: one or more `/segment` parts, no empty segments,
 * no trailing separator
 */
export const PATH_PATTERN = /^(\/[A-Za-z0-9._-]+)+$/

export const ROOT_PATH = '/'

export function isValidPath(path: string): boolean {
  return PATH_PATTERN.test(path)
}

/**
 * @throws InvalidPathError
 */
export function assertValidPath(path: string): void {
  if (!isValidPath(path)) {
    throw new InvalidPathError(path)
  }
}

/**
 * Same as `assertValidPath` but also accepts the root
 */
export function assertValidDirectoryPath(path: string): void {
  if (path !== ROOT_PATH && !isValidPath(path)) {
    throw new InvalidPathError(path)
  }
}

/**
 * Append a trailing separator unless the path is empty or already has one
 */
export function containerify(path: string): string {
  return path === '' || path.endsWith('/') ? path : `${path}/`
}
