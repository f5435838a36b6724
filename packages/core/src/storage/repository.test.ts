import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import type { Logger } from 'pino'

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>()
  return { ...actual, open: vi.fn(actual.open), stat: vi.fn(actual.stat) }
})

import { mkdtemp, rm, mkdir, readFile, readdir, writeFile, open, stat, unlink } from 'node:fs/promises'
import { openSnippetRepository, compareNewestFirst } from './repository.js'
import type { SkippedFile } from './repository.js'
import type { Snippet } from './types.js'
import { PermissionDeniedError, StoreIoError } from '../errors/catalog.js'
import { makeMockLogger } from '../test-utils/logger.js'

function errno(code: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(`${code}: simulated`)
  err.code = code
  return err
}

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms))

function snippet(id: string, createdMs: number): Snippet {
  return {
    id,
    content: id,
    preview: id,
    created: new Date(createdMs),
    modified: new Date(createdMs),
    location: `/tmp/${id}.txt`,
  }
}

describe('SnippetRepository', () => {
  let root: string
  let baseDir: string
  let logger: Logger

  beforeEach(async () => {
    vi.clearAllMocks()
    root = await mkdtemp(join(tmpdir(), 'repository-test-'))
    baseDir = join(root, 'nested', 'snippets')
    logger = makeMockLogger()
  })

  afterEach(async () => {
    const actual = await vi.importActual<typeof import('node:fs/promises')>('node:fs/promises')
    vi.mocked(open).mockImplementation(actual.open)
    vi.mocked(stat).mockImplementation(actual.stat)
    await rm(root, { recursive: true, force: true })
  })

  describe('openSnippetRepository', () => {
    it('creates the base directory including parents', async () => {
      const repo = await openSnippetRepository({ baseDir, logger })
      expect(repo.baseDir).toBe(baseDir)
      expect(await readdir(baseDir)).toEqual([])
    })

    it('fails with StoreIoError when the base path is a file', async () => {
      const filePath = join(root, 'plain-file')
      await writeFile(filePath, 'x')
      await expect(
        openSnippetRepository({ baseDir: join(filePath, 'snippets'), logger }),
      ).rejects.toBeInstanceOf(StoreIoError)
    })
  })

  describe('save', () => {
    it('writes <id>.txt with the raw content and returns the snippet', async () => {
      const repo = await openSnippetRepository({ baseDir, logger })
      const saved = await repo.save('first line\nsecond line')

      expect(saved.location).toBe(join(baseDir, `${saved.id}.txt`))
      expect(saved.content).toBe('first line\nsecond line')
      expect(saved.preview).toBe('first line second line')
      expect(saved.created).toBeInstanceOf(Date)
      expect(saved.modified).toBeInstanceOf(Date)
      expect(await readFile(saved.location, 'utf-8')).toBe('first line\nsecond line')
    })

    it('gives each save a distinct id', async () => {
      const repo = await openSnippetRepository({ baseDir, logger })
      const a = await repo.save('same')
      const b = await repo.save('same')
      expect(a.id).not.toBe(b.id)
      expect((await readdir(baseDir)).sort()).toEqual([`${a.id}.txt`, `${b.id}.txt`].sort())
    })

    it('fails with StoreIoError and leaves nothing behind when the directory is gone', async () => {
      const repo = await openSnippetRepository({ baseDir, logger })
      await rm(baseDir, { recursive: true })

      await expect(repo.save('lost')).rejects.toBeInstanceOf(StoreIoError)
      await expect(readdir(baseDir)).rejects.toThrow(/ENOENT/)
    })

    it('removes the written file when reading its metadata fails', async () => {
      const repo = await openSnippetRepository({ baseDir, logger })
      vi.mocked(stat).mockRejectedValueOnce(errno('EIO'))

      const failure = repo.save('hello')
      await expect(failure).rejects.toBeInstanceOf(StoreIoError)
      await expect(failure).rejects.toMatchObject({ operation: 'stat', osCode: 'EIO' })

      expect(await readdir(baseDir)).toEqual([])
      expect(await repo.loadAll()).toEqual([])
    })
  })

  describe('loadAll', () => {
    it('round-trips saved content exactly', async () => {
      const repo = await openSnippetRepository({ baseDir, logger })
      const samples = ['', 'plain', 'multi\nline\r\ncontent\n', 'unicode ✓ 漢字 😀', ' leading and trailing  ']

      for (const text of samples) {
        await repo.save(text)
      }

      const loaded = await repo.loadAll()
      for (const text of samples) {
        expect(loaded.filter((s) => s.content === text)).toHaveLength(1)
      }
    })

    it('loads the two-file scenario', async () => {
      await mkdir(baseDir, { recursive: true })
      await writeFile(join(baseDir, 'f1.txt'), 'hello world\nline2\nline3\nline4')
      await sleep(20)
      await writeFile(join(baseDir, 'f2.txt'), 'goodbye')

      const repo = await openSnippetRepository({ baseDir, logger })
      const loaded = await repo.loadAll()

      expect(loaded.map((s) => s.id)).toEqual(['f2', 'f1'])
      const f1 = loaded[1]
      expect(f1.preview).toBe('hello world line2 line3')
      expect(f1.location).toBe(join(baseDir, 'f1.txt'))
    })

    it('returns snippets newest created first', async () => {
      const repo = await openSnippetRepository({ baseDir, logger })
      const first = await repo.save('first')
      await sleep(20)
      const second = await repo.save('second')
      await sleep(20)
      const third = await repo.save('third')

      const loaded = await repo.loadAll()
      expect(loaded.map((s) => s.id)).toEqual([third.id, second.id, first.id])
    })

    it('is deterministic across repeated calls', async () => {
      const repo = await openSnippetRepository({ baseDir, logger })
      for (let i = 0; i < 10; i++) {
        await repo.save(`snippet ${i}`)
      }

      const a = await repo.loadAll()
      const b = await repo.loadAll()
      expect(b).toEqual(a)
    })

    it('ignores other suffixes, temp files and subdirectories', async () => {
      await mkdir(join(baseDir, 'sub.txt'), { recursive: true })
      await writeFile(join(baseDir, 'sub.txt', 'inner.txt'), 'nested')
      await writeFile(join(baseDir, 'notes.md'), 'markdown')
      await writeFile(join(baseDir, 'a.txt.tmp.1234'), 'partial')
      await writeFile(join(baseDir, 'a.txt'), 'kept')

      const repo = await openSnippetRepository({ baseDir, logger })
      const loaded = await repo.loadAll()
      expect(loaded.map((s) => s.id)).toEqual(['a'])
    })

    it('returns an empty collection for an empty directory', async () => {
      const repo = await openSnippetRepository({ baseDir, logger })
      expect(await repo.loadAll()).toEqual([])
    })

    it('skips a file that vanishes between listing and reading', async () => {
      await mkdir(baseDir, { recursive: true })
      await writeFile(join(baseDir, 'gone.txt'), 'bye')
      await writeFile(join(baseDir, 'kept.txt'), 'hi')

      const actual = await vi.importActual<typeof import('node:fs/promises')>('node:fs/promises')
      vi.mocked(open).mockImplementation(async (path, flags, mode) => {
        if (path === join(baseDir, 'gone.txt')) {
          await unlink(path)
        }
        return actual.open(path, flags, mode)
      })

      const onSkip = vi.fn()
      const repo = await openSnippetRepository({ baseDir, logger, onSkip })
      const loaded = await repo.loadAll()

      expect(loaded.map((s) => s.id)).toEqual(['kept'])
      expect(onSkip).not.toHaveBeenCalled()
      expect(logger.warn).not.toHaveBeenCalled()
    })

    it('skips and reports an unreadable file without aborting the load', async () => {
      await mkdir(baseDir, { recursive: true })
      await writeFile(join(baseDir, 'locked.txt'), 'secret')
      await writeFile(join(baseDir, 'open.txt'), 'public')

      const actual = await vi.importActual<typeof import('node:fs/promises')>('node:fs/promises')
      vi.mocked(open).mockImplementation(async (path, flags, mode) => {
        if (path === join(baseDir, 'locked.txt')) {
          throw errno('EACCES')
        }
        return actual.open(path, flags, mode)
      })

      const skipped: SkippedFile[] = []
      const repo = await openSnippetRepository({
        baseDir,
        logger,
        onSkip: (s) => skipped.push(s),
      })
      const loaded = await repo.loadAll()

      expect(loaded.map((s) => s.content)).toEqual(['public'])
      expect(skipped).toHaveLength(1)
      expect(skipped[0].path).toBe(join(baseDir, 'locked.txt'))
      expect(skipped[0].error).toBeInstanceOf(PermissionDeniedError)
      expect(logger.warn).toHaveBeenCalledTimes(1)
    })

    it('propagates unexpected read failures', async () => {
      await mkdir(baseDir, { recursive: true })
      await writeFile(join(baseDir, 'bad.txt'), 'x')

      vi.mocked(open).mockRejectedValueOnce(errno('EIO'))

      const repo = await openSnippetRepository({ baseDir, logger })
      const err = await repo.loadAll().catch((e: unknown) => e)
      expect(err).toBeInstanceOf(StoreIoError)
      expect((err as StoreIoError).osCode).toBe('EIO')
    })

    it('fails with StoreIoError when the directory cannot be listed', async () => {
      const repo = await openSnippetRepository({ baseDir, logger })
      await rm(baseDir, { recursive: true })

      const err = await repo.loadAll().catch((e: unknown) => e)
      expect(err).toBeInstanceOf(StoreIoError)
      expect((err as StoreIoError).operation).toBe('list')
    })
  })
})

describe('compareNewestFirst', () => {
  it('orders by created descending', () => {
    const sorted = [snippet('a', 1000), snippet('b', 3000), snippet('c', 2000)].sort(compareNewestFirst)
    expect(sorted.map((s) => s.id)).toEqual(['b', 'c', 'a'])
  })

  it('breaks ties by id ascending', () => {
    const sorted = [snippet('c', 1000), snippet('a', 1000), snippet('b', 1000)].sort(compareNewestFirst)
    expect(sorted.map((s) => s.id)).toEqual(['a', 'b', 'c'])
  })
})
