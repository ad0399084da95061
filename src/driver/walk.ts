import type { Logger } from 'pino'
import { PathNotFoundError } from './errors'
import { isDirectory, type VirtualEntry } from './virtual-entry'

/**
 * Returned by a visitor to skip the children of the directory it was given
 */
export const SKIP_DIR = 'skipDir'

export type WalkAction = typeof SKIP_DIR | void

export type WalkVisitor = (entry: VirtualEntry) => WalkAction | Promise<WalkAction>

/**
 * The two driver operations a generic walk is built on
 */
export interface Walkable {
  list(path: string): Promise<string[]>
  stat(path: string): Promise<VirtualEntry>
}

/**
 * Depth-first walk built on list + stat, visiting children in sorted order.
 * A child removed between list and stat is skipped.
 */
export async function walkFallback(
  driver: Walkable,
  from: string,
  visit: WalkVisitor,
  logger?: Logger
): Promise<void> {
  const children = await driver.list(from)
  children.sort()

  for (const child of children) {
    let entry: VirtualEntry
    try {
      entry = await driver.stat(child)
    } catch (error) {
      if (error instanceof PathNotFoundError) {
        logger?.info({ path: child }, 'ignoring deleted path')
        continue
      }
      throw error
    }

    const action = await visit(entry)
    if (isDirectory(entry) && action !== SKIP_DIR) {
      await walkFallback(driver, child, visit, logger)
    }
  }
}
