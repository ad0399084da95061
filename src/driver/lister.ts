import type { BlobStore } from '../storage/blob-store'
import { ListingContractError } from './errors'
import type { PathMapper } from './path-mapper'
import { containerify } from './paths'

/**
 * Blob key prefix that lists everything below a virtual path.
 * The empty virtual path lists the whole root.
 */
export function listingPrefix(mapper: PathMapper, virtualPath: string): string {
  return mapper.map(virtualPath === '' ? '/' : containerify(virtualPath))
}

/**
 * Lazily walk the pages of a prefix listing, translated to virtual paths.
 *
 * Each call starts a fresh listing. Iteration stops at the first page with no
 * continuation marker or no keys. A marker seen earlier in the same listing
 * ends it with a ListingContractError carrying everything yielded so far.
 */
export async function* listPages(
  store: BlobStore,
  mapper: PathMapper,
  virtualPath: string
): AsyncGenerator<string[], void, undefined> {
  const prefix = listingPrefix(mapper, virtualPath)
  const seenMarkers = new Set<string>()
  const accumulated: string[] = []
  let marker = ''

  for (;;) {
    const page = await store.listPage(prefix, { marker })
    const paths = page.keys.map((key) => mapper.unmap(key))
    accumulated.push(...paths)
    yield paths

    if (page.keys.length === 0 || page.nextMarker === '') {
      return
    }
    if (page.nextMarker === marker || seenMarkers.has(page.nextMarker)) {
      throw new ListingContractError(prefix, page.nextMarker, accumulated)
    }

    seenMarkers.add(page.nextMarker)
    marker = page.nextMarker
  }
}

/**
 * Every virtual path stored below `virtualPath`, at any depth
 */
export async function listBlobs(
  store: BlobStore,
  mapper: PathMapper,
  virtualPath: string
): Promise<string[]> {
  const out: string[] = []
  for await (const paths of listPages(store, mapper, virtualPath)) {
    out.push(...paths)
  }
  return out
}

/**
 * Direct descendants (blobs or virtual directories) of `prefix` among `paths`.
 *
 * Example: direct descendants of "/" in {"/foo", "/bar/1", "/bar/2"} are
 * {"/foo", "/bar"}, and of "/bar" they are {"/bar/1", "/bar/2"}.
 * Results are de-duplicated and keep first-seen order.
 */
export function directDescendants(paths: Iterable<string>, prefix: string): string[] {
  let dir = prefix.startsWith('/') ? prefix : `/${prefix}`
  dir = containerify(dir)

  const out = new Set<string>()
  for (const path of paths) {
    if (!path.startsWith(dir)) continue

    const rel = path.slice(dir.length)
    const slash = rel.indexOf('/')
    out.add(slash === -1 ? path : dir + rel.slice(0, slash))
  }
  return [...out]
}
