function trimLeft(value: string, char: string): string {
  let start = 0
  while (start < value.length && value[start] === char) start++
  return value.slice(start)
}

function trimRight(value: string, char: string): string {
  let end = value.length
  while (end > 0 && value[end - 1] === char) end--
  return value.slice(0, end)
}

/**
 * PathMapper - translates virtual paths to blob keys under a root directory
 *
 * map('/x') with root 'registry/' is 'registry/x'; with an empty root it is 'x'.
 * unmap is the left inverse for keys returned by listings under the root.
 */
export class PathMapper {
  /**
   * The root directory as a key prefix, without surrounding separators
   */
  readonly rootKey: string

  private readonly root: string

  constructor(rootDirectory: string = '') {
    this.root = trimRight(rootDirectory, '/')
    this.rootKey = trimLeft(this.root, '/')
  }

  map(virtualPath: string): string {
    return trimLeft(this.root + virtualPath, '/')
  }

  unmap(blobKey: string): string {
    // With no root prefix to strip, keys still need a leading separator to be virtual paths
    if (this.rootKey === '') {
      return `/${blobKey}`
    }
    if (!blobKey.startsWith(this.rootKey)) {
      throw new Error(`Blob key "${blobKey}" is outside root "${this.rootKey}"`)
    }
    return blobKey.slice(this.rootKey.length)
  }
}
