/**
 * Result of a stat. Directory entries are synthetic: derived from a prefix
 * listing on every call, never stored.
 */
export type VirtualEntry = FileEntry | DirectoryEntry

export interface FileEntry {
  kind: 'file'
  path: string
  size: number
  modTime: Date
}

export interface DirectoryEntry {
  kind: 'directory'
  path: string
}

export function fileEntry(path: string, size: number, modTime: Date): FileEntry {
  return { kind: 'file', path, size, modTime }
}

export function directoryEntry(path: string): DirectoryEntry {
  return { kind: 'directory', path }
}

export function isDirectory(entry: VirtualEntry): entry is DirectoryEntry {
  return entry.kind === 'directory'
}
