import { open, rename, unlink } from 'node:fs/promises'
import { randomUUID } from 'node:crypto'
import type { Logger } from 'pino'
import { errnoCode, toStoreIoError, type IoOperation } from '../errors/catalog.js'

export interface WriteAtomicOptions {
  logger?: Logger
}

/** Temp file path beside the target, so the final rename stays on one file system. */
export function tempPathFor(targetPath: string): string {
  return targetPath + '.tmp.' + randomUUID()
}

/**
 * Atomic write: create a temp file next to the target, write, fsync, close,
 * then rename it over the target.
 *
 * Readers of `targetPath` see either the previous complete content or the new
 * complete content. On any failure the temp file is removed and the target is
 * left as it was.
 */
export async function writeAtomic(
  targetPath: string,
  data: string | Uint8Array,
  options?: WriteAtomicOptions,
): Promise<void> {
  const tempPath = tempPathFor(targetPath)
  let operation: IoOperation = 'write'

  try {
    const handle = await open(tempPath, 'wx')
    try {
      await handle.writeFile(data, 'utf-8')
      operation = 'sync'
      await handle.sync()
    } finally {
      await handle.close()
    }

    operation = 'rename'
    await rename(tempPath, targetPath)
  } catch (err: unknown) {
    await removeTempFile(tempPath, options?.logger)
    throw toStoreIoError(operation, operation === 'rename' ? targetPath : tempPath, err)
  }
}

async function removeTempFile(tempPath: string, logger?: Logger): Promise<void> {
  try {
    await unlink(tempPath)
  } catch (err: unknown) {
    // ENOENT: the temp file was never created, or the rename consumed it
    if (errnoCode(err) !== 'ENOENT') {
      logger?.warn({ err, tempPath }, 'Failed to remove temp file after aborted write')
    }
  }
}
