import { mkdir, open, readdir, stat, unlink, type FileHandle } from 'node:fs/promises'
import type { Dirent, Stats } from 'node:fs'
import { join, resolve } from 'node:path'
import type { Logger } from 'pino'
import { newId, snippetFilename, idFromFilename, previewOf } from '../codec/index.js'
import {
  errnoCode,
  NotFoundError,
  PermissionDeniedError,
  StoreIoError,
  toStoreIoError,
  type IoOperation,
} from '../errors/catalog.js'
import { writeAtomic } from './atomic-write.js'
import type { Snippet } from './types.js'

/** Files read concurrently by loadAll */
const READ_CONCURRENCY = 32

export interface SnippetRepositoryOptions {
  baseDir: string
  logger: Logger
  /** Called once for every file loadAll had to leave out because it was unreadable */
  onSkip?: (skipped: SkippedFile) => void
}

export interface SkippedFile {
  path: string
  error: StoreIoError
}

export interface SnippetRepository {
  /** Absolute store directory */
  readonly baseDir: string

  /** Persist `content` as a new snippet file */
  save(content: string): Promise<Snippet>

  /** Read every snippet in the directory, newest created first */
  loadAll(): Promise<Snippet[]>
}

/** Newest `created` first; equal timestamps ordered by id ascending. */
export function compareNewestFirst(a: Snippet, b: Snippet): number {
  const byCreated = b.created.getTime() - a.created.getTime()
  if (byCreated !== 0) return byCreated
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

/** File systems without birth time report 0; modification time stands in. */
function timestampsOf(stats: Stats): Pick<Snippet, 'created' | 'modified'> {
  return {
    created: stats.birthtimeMs > 0 ? stats.birthtime : stats.mtime,
    modified: stats.mtime,
  }
}

/** Create the base directory (mkdir -p) and return a repository over it. */
export async function openSnippetRepository(
  options: SnippetRepositoryOptions,
): Promise<SnippetRepository> {
  const baseDir = resolve(options.baseDir)
  const { logger, onSkip } = options

  try {
    await mkdir(baseDir, { recursive: true })
  } catch (err: unknown) {
    throw toStoreIoError('mkdir', baseDir, err)
  }

  /** Report an unreadable file and return null, or rethrow a real failure. */
  function skipOrThrow(operation: IoOperation, path: string, err: unknown): null {
    const error = toStoreIoError(operation, path, err)

    if (error instanceof NotFoundError) {
      // Deleted between listing and reading
      logger.debug({ path }, 'Snippet file vanished during load, skipping')
      return null
    }

    if (
      error instanceof StoreIoError &&
      (error instanceof PermissionDeniedError || error.osCode === 'EISDIR')
    ) {
      logger.warn({ path, errorCode: error.errorCode, osCode: error.osCode }, 'Unreadable snippet file skipped')
      onSkip?.({ path, error })
      return null
    }

    throw error
  }

  async function discardFile(location: string): Promise<void> {
    try {
      await unlink(location)
    } catch (err: unknown) {
      if (errnoCode(err) !== 'ENOENT') {
        logger.warn({ err, path: location }, 'Failed to remove snippet file after aborted save')
      }
    }
  }

  async function readSnippet(id: string, location: string): Promise<Snippet | null> {
    let handle: FileHandle
    try {
      handle = await open(location, 'r')
    } catch (err: unknown) {
      return skipOrThrow('read', location, err)
    }

    try {
      const content = await handle.readFile('utf-8')
      const stats = await handle.stat()
      return {
        id,
        content,
        preview: previewOf(content),
        ...timestampsOf(stats),
        location,
      }
    } catch (err: unknown) {
      return skipOrThrow('read', location, err)
    } finally {
      await handle.close()
    }
  }

  return {
    baseDir,

    async save(content: string): Promise<Snippet> {
      const id = newId()
      const location = join(baseDir, snippetFilename(id))

      await writeAtomic(location, content, { logger })

      let stats: Stats
      try {
        stats = await stat(location)
      } catch (err: unknown) {
        // The caller sees a failed save, so the renamed file must not outlive it
        await discardFile(location)
        throw toStoreIoError('stat', location, err)
      }

      return {
        id,
        content,
        preview: previewOf(content),
        ...timestampsOf(stats),
        location,
      }
    },

    async loadAll(): Promise<Snippet[]> {
      let entries: Dirent[]
      try {
        entries = await readdir(baseDir, { withFileTypes: true })
      } catch (err: unknown) {
        throw toStoreIoError('list', baseDir, err)
      }

      // Direct children only; FIFOs and sockets would block or fail on open
      const candidates: Array<{ id: string; location: string }> = []
      for (const entry of entries) {
        if (!entry.isFile() && !entry.isSymbolicLink()) continue
        const id = idFromFilename(entry.name)
        if (id === null) continue
        candidates.push({ id, location: join(baseDir, entry.name) })
      }

      const snippets: Snippet[] = []
      for (let i = 0; i < candidates.length; i += READ_CONCURRENCY) {
        const batch = candidates.slice(i, i + READ_CONCURRENCY)
        const loaded = await Promise.all(batch.map((c) => readSnippet(c.id, c.location)))
        for (const snippet of loaded) {
          if (snippet !== null) snippets.push(snippet)
        }
      }

      return snippets.sort(compareNewestFirst)
    },
  }
}
