import type { ArchiveEntry, MergedSessionView } from '../models'
import type { LiveSession } from '../utils/tmux'

/**
 * One view per session name. The newest archive wins among duplicates; a
 * live session of the same name takes over the view and keeps the archive
 * reference. LIVE sorts before ARCH, then newest archive, then name.
 */
export function mergeSessions(live: LiveSession[], archived: ArchiveEntry[]): MergedSessionView[] {
  const byName = new Map<string, MergedSessionView>()

  for (const entry of archived) {
    if (!entry.name) continue
    const existing = byName.get(entry.name)
    if (existing?.archive && existing.archive.mtime.getTime() > entry.mtime.getTime()) continue
    byName.set(entry.name, {
      name: entry.name,
      origin: 'ARCH',
      windowCount: entry.windowCount,
      updatedAt: entry.mtime,
      archive: entry,
    })
  }

  for (const session of live) {
    if (!session.name) continue
    const archive = byName.get(session.name)?.archive ?? null
    byName.set(session.name, {
      name: session.name,
      origin: 'LIVE',
      windowCount: session.windows,
      updatedAt: archive?.mtime ?? null,
      archive,
    })
  }

  const rank = (view: MergedSessionView) => (view.origin === 'LIVE' ? 0 : 1)
  const time = (view: MergedSessionView) => view.updatedAt?.getTime() ?? 0

  return [...byName.values()].sort(
    (a, b) => rank(a) - rank(b) || time(b) - time(a) || compareNames(a.name, b.name)
  )
}

function compareNames(a: string, b: string): number {
  if (a === b) return 0
  return a < b ? -1 : 1
}
