/**
 * A stored dump on disk
 */
export interface ArchiveEntry {
  /** Session name recorded in the dump (file name when the dump has none) */
  name: string

  /** Absolute path of the JSON file */
  path: string

  /** File modification time */
  mtime: Date

  /** Number of windows in the dump, null when it cannot be told */
  windowCount: number | null
}

export type SessionOrigin = 'LIVE' | 'ARCH'

/**
 * A live or archived session as listed by `tbox select` / `tbox list --all`
 */
export interface MergedSessionView {
  name: string
  origin: SessionOrigin
  windowCount: number | null

  /** Archive mtime; null for a live session without archive */
  updatedAt: Date | null

  /** Archive behind this name, kept on LIVE views too so it can be dropped */
  archive: ArchiveEntry | null
}
