import type { MergedSessionView } from '../../models'
import { logger } from '../../utils/logger'

export type SelectAction = 'activate' | 'drop'

export type Selection =
  | { kind: 'none' }
  | { kind: 'chosen'; view: MergedSessionView; action: SelectAction }

export const NO_SELECTION: Selection = { kind: 'none' }

/**
 * Lets the user pick one session and what to do with it
 */
export interface Selector {
  readonly name: string
  select(views: MergedSessionView[], prompt: string): Promise<Selection>
}

export type SelectorKind = 'fzf' | 'sk' | 'prompt'

/**
 * Backend from an override (`fzf`, `sk`, `prompt`/`none`/`builtin`), else
 * the first fuzzy finder on PATH, else the numeric prompt.
 */
export async function resolveSelectorKind(
  override: string | null,
  isAvailable: (binary: string) => Promise<boolean>
): Promise<SelectorKind> {
  const choice = override?.trim()
  if (!choice) {
    if (await isAvailable('fzf')) return 'fzf'
    if (await isAvailable('sk')) return 'sk'
    return 'prompt'
  }
  if (choice === 'none' || choice === 'prompt' || choice === 'builtin') return 'prompt'
  if (choice === 'fzf' || choice === 'sk') {
    if (await isAvailable(choice)) return choice
    logger.warn(`selector ${choice} not found, using prompt`)
    return 'prompt'
  }
  logger.warn(`unsupported selector ${choice}, using prompt`)
  return 'prompt'
}

const pad2 = (n: number) => String(n).padStart(2, '0')

/**
 * Local time as `YYYY-MM-DD HH:MM`, empty for null
 */
export function formatMtime(date: Date | null): string {
  if (!date) return ''
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}`
  )
}

/** Selector lines are tab-delimited, so the key field must not hold tabs */
export function selectorKey(name: string): string {
  return name.replace(/\t/g, ' ')
}

export function windowsLabel(count: number | null, unknown = ''): string {
  return count === null ? unknown : `${count}w`
}

/**
 * `name  STATUS  Nw  saved  raw-name`, tab separated, first four fields padded
 */
export function formatSelectorLines(views: MergedSessionView[]): string[] {
  if (views.length === 0) return []
  const nameWidth = Math.max(...views.map((v) => selectorKey(v.name).length))
  const windowsWidth = Math.max(...views.map((v) => (v.windowCount === null ? 2 : windowsLabel(v.windowCount).length)))
  const savedWidth = Math.max(...views.map((v) => formatMtime(v.updatedAt).length))

  return views.map((view) => {
    const key = selectorKey(view.name)
    return [
      key.padEnd(nameWidth),
      view.origin.padEnd(4),
      windowsLabel(view.windowCount).padEnd(windowsWidth),
      formatMtime(view.updatedAt).padEnd(savedWidth),
      key,
    ].join('\t')
  })
}
