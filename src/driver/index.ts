export * from './errors'
export * from './paths'
export * from './path-mapper'
export * from './virtual-entry'
export * from './lister'
export * from './chunked-writer'
export * from './walk'
export * from './blob-driver'
export * from './factory'
