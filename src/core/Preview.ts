import type { SessionDump } from '../models'

/**
 * Plain-text outline of a dump, shown in the fuzzy finder's preview window
 */
export function formatPreview(dump: SessionDump, fallbackName: string): string {
  const lines = [`Session: ${dump.name || fallbackName}`, `Windows: ${dump.windows.length}`]
  for (const window of dump.windows) {
    lines.push(`- [${window.index}] ${window.name} (${window.panes.length} panes)`)
    for (const pane of window.panes) {
      const label = pane.title || pane.path
      if (label) lines.push(`  - ${pane.index}: ${label}`)
    }
  }
  return lines.join('\n')
}
