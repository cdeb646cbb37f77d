/**
 * Atomic file replacement for the decrypted config
 *
 * Data goes to a temp file in the destination directory, is fsynced, then
 * renamed over the destination. Readers see either the old file or the new
 * one; a failure leaves the old file in place and removes the temp file.
 */

import { randomBytes } from 'node:crypto'
import { mkdir, open, rename, rm } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import type { ConfigWriter } from '../types.js'
import { IOError, errorMessage } from './errors.js'

export interface AtomicWriteOptions {
  /** File mode of the written file (default: 0o600) */
  mode?: number
  /** Create the destination directory when missing (default: true) */
  createDir?: boolean
}

/**
 * Temp file name used next to the destination
 */
export function tempPathFor(filePath: string): string {
  const suffix = `${process.pid}.${randomBytes(6).toString('hex')}`
  return join(dirname(filePath), `.${basename(filePath)}.${suffix}.tmp`)
}

/**
 * Write `data` to `filePath` atomically
 *
 * @throws IOError on any filesystem failure
 */
export async function writeFileAtomic(
  filePath: string,
  data: Buffer | string,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const { mode = 0o600, createDir = true } = options
  const tempPath = tempPathFor(filePath)

  try {
    if (createDir) {
      await mkdir(dirname(filePath), { recursive: true })
    }

    const handle = await open(tempPath, 'wx', mode)
    try {
      // open() mode is filtered by the umask
      await handle.chmod(mode)
      await handle.writeFile(data)
      await handle.sync()
    } finally {
      await handle.close()
    }

    await rename(tempPath, filePath)
  } catch (err) {
    const cleanupError = await rm(tempPath, { force: true }).then(
      () => undefined,
      (rmErr: unknown) => errorMessage(rmErr)
    )
    const reason = cleanupError
      ? `${errorMessage(err)} (temp file ${tempPath} not removed: ${cleanupError})`
      : errorMessage(err)
    throw new IOError(filePath, reason, err)
  }
}

export class AtomicFileWriter implements ConfigWriter {
  private readonly options: AtomicWriteOptions

  constructor(options: AtomicWriteOptions = {}) {
    this.options = options
  }

  async write(filePath: string, data: Buffer): Promise<void> {
    await writeFileAtomic(filePath, data, this.options)
  }
}
