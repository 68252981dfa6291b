import fs from 'fs-extra'
import path from 'path'
import { randomBytes } from 'crypto'

export const TEMP_PREFIX = '.tbox-'

/**
 * Write `content` to a new dot-prefixed file inside `dir` and return its path.
 * The name is unique per call, so concurrent writers never share a temp file.
 */
export async function writeTempFile(dir: string, content: string, suffix = '.json'): Promise<string> {
  await fs.ensureDir(dir)
  const tmpPath = path.join(
    dir,
    `${TEMP_PREFIX}${process.pid}-${Date.now()}-${randomBytes(4).toString('hex')}${suffix}`
  )
  try {
    await fs.writeFile(tmpPath, content, { encoding: 'utf-8', flag: 'wx' })
  } catch (error) {
    await fs.remove(tmpPath)
    throw error
  }
  return tmpPath
}

/**
 * Rename a finished temp file over `target`. Readers see the old file or the
 * new one, never a partial write.
 */
export async function commitTempFile(tmpPath: string, target: string): Promise<void> {
  try {
    await fs.rename(tmpPath, target)
  } catch (error) {
    await fs.remove(tmpPath)
    throw error
  }
}

export async function writeFileAtomic(target: string, content: string): Promise<void> {
  const tmpPath = await writeTempFile(path.dirname(target), content, path.extname(target) || '.tmp')
  await commitTempFile(tmpPath, target)
}
