export { writeAtomic, tempPathFor } from './atomic-write.js'
export type { WriteAtomicOptions } from './atomic-write.js'

export { openSnippetRepository, compareNewestFirst } from './repository.js'
export type {
  SnippetRepository,
  SnippetRepositoryOptions,
  SkippedFile,
} from './repository.js'

export type { Snippet } from './types.js'
