import fs from 'fs-extra'
import path from 'path'
import { createHash } from 'crypto'
import type { ArchiveEntry, SessionDump } from '../models'
import { NotFoundError, errorMessage } from '../utils/errors'
import { commitTempFile, writeFileAtomic, writeTempFile } from '../utils/fs'
import { logger } from '../utils/logger'
import { decodeDump, parseDump, serializeDump } from './DumpCodec'

export const AUTOSAVE_STAMP_FILE = '.tbox-autosave.stamp'

/**
 * Letters, digits, `.`, `_` and `-` survive; anything else becomes `_`
 */
export function sanitizeName(name: string): string {
  const clean = name.replace(/[^\p{L}\p{N}._-]/gu, '_')
  return clean || 'session'
}

/**
 * File name for a session. The SHA-1 suffix keeps names that sanitize alike apart.
 */
export function archiveFileName(name: string): string {
  const digest = createHash('sha1').update(name, 'utf8').digest('hex').slice(0, 8)
  return `${sanitizeName(name)}-${digest}.json`
}

/**
 * Directory of saved session dumps, one JSON file per session
 */
export class ArchiveStore {
  constructor(public readonly dir: string) {}

  pathFor(name: string): string {
    return path.join(this.dir, archiveFileName(name))
  }

  /**
   * Write a dump under `name`. The file is renamed into place, so readers
   * never see a partial write.
   */
  async save(name: string, dump: SessionDump): Promise<ArchiveEntry> {
    const existing = await this.find(name)
    const target = existing?.path ?? this.pathFor(name)
    const content = `${serializeDump({ ...dump, name }, true)}\n`

    const tmpPath = await writeTempFile(this.dir, content)
    await commitTempFile(tmpPath, target)
    logger.debug(`Archived ${name} -> ${target}`)

    const stat = await fs.stat(target)
    return { name, path: target, mtime: stat.mtime, windowCount: dump.windows.length }
  }

  async load(name: string): Promise<SessionDump> {
    const entry = await this.require(name)
    const text = await fs.readFile(entry.path, 'utf-8')
    return parseDump(text, entry.path)
  }

  async delete(name: string): Promise<ArchiveEntry> {
    const entry = await this.require(name)
    await fs.remove(entry.path)
    logger.debug(`Removed archive ${entry.path}`)
    return entry
  }

  /**
   * Entry for `name`: the canonical file, else a file whose recorded session
   * name matches (written under an older naming scheme).
   */
  async find(name: string): Promise<ArchiveEntry | null> {
    const canonical = this.pathFor(name)
    if (await fs.pathExists(canonical)) {
      const entry = await this.readEntry(canonical)
      if (entry) return entry
    }
    const entries = await this.list()
    return entries.find((entry) => entry.name === name) ?? null
  }

  /**
   * Stored sessions, newest first. Unreadable files are skipped with a warning.
   */
  async list(): Promise<ArchiveEntry[]> {
    if (!(await fs.pathExists(this.dir))) return []

    const files = (await fs.readdir(this.dir)).filter((file) => file.endsWith('.json') && !file.startsWith('.'))
    const entries: ArchiveEntry[] = []
    for (const file of files) {
      const entry = await this.readEntry(path.join(this.dir, file))
      if (entry) entries.push(entry)
    }

    return entries.sort((a, b) => b.mtime.getTime() - a.mtime.getTime() || a.name.localeCompare(b.name))
  }

  /**
   * Epoch seconds of the last autosave, null when none was recorded
   */
  async readAutosaveStamp(): Promise<number | null> {
    const stampPath = path.join(this.dir, AUTOSAVE_STAMP_FILE)
    if (!(await fs.pathExists(stampPath))) return null
    const value = Number.parseFloat((await fs.readFile(stampPath, 'utf-8')).trim())
    if (Number.isFinite(value)) return value
    // unreadable content: fall back to when the file was last touched
    const stat = await fs.stat(stampPath)
    return stat.mtimeMs / 1000
  }

  async writeAutosaveStamp(epochSeconds: number): Promise<void> {
    await writeFileAtomic(path.join(this.dir, AUTOSAVE_STAMP_FILE), `${epochSeconds}\n`)
  }

  private async require(name: string): Promise<ArchiveEntry> {
    const entry = await this.find(name)
    if (!entry) {
      throw new NotFoundError(`no stored session named '${name}' in ${this.dir}`, name)
    }
    return entry
  }

  private async readEntry(filePath: string): Promise<ArchiveEntry | null> {
    try {
      const [raw, stat] = await Promise.all([fs.readJson(filePath), fs.stat(filePath)])
      const dump = decodeDump(raw, filePath)
      return {
        name: dump.name ?? path.basename(filePath),
        path: filePath,
        mtime: stat.mtime,
        windowCount: dump.windows.length,
      }
    } catch (error) {
      logger.warn(`Skipping unreadable archive ${filePath}: ${errorMessage(error)}`)
      return null
    }
  }
}
