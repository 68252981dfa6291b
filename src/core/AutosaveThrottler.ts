import { errorMessage } from '../utils/errors'
import { logger } from '../utils/logger'

export interface ThrottleInput {
  throttleSeconds: number
  /** Epoch seconds of the previous run, null when there was none */
  lastRun: number | null
  now: number
}

export interface AutosaveReport {
  skipped: boolean
  saved: string[]
  failed: { name: string; error: string }[]
}

/**
 * Live session names autosave considers: named ones, not tmux's default numbers
 */
export function isNamedSession(name: string): boolean {
  const trimmed = name.trim()
  return trimmed.length > 0 && !/^\d+$/.test(trimmed)
}

export function shouldRun({ throttleSeconds, lastRun, now }: ThrottleInput): boolean {
  if (throttleSeconds <= 0 || lastRun === null) return true
  return now - lastRun >= throttleSeconds
}

/**
 * A run fails only when it tried at least one session and saved none
 */
export function autosaveFailed(report: AutosaveReport): boolean {
  return report.failed.length > 0 && report.saved.length === 0
}

export interface AutosaveSteps {
  writeStamp(now: number): Promise<void>
  listSessions(): Promise<string[]>
  saveSession(name: string): Promise<void>
}

/**
 * Debounced save of every named live session. The stamp is a coarse guard
 * against hook storms, not a lock. Per-session failures are logged and skipped.
 */
export async function runAutosave(input: ThrottleInput, steps: AutosaveSteps): Promise<AutosaveReport> {
  const report: AutosaveReport = { skipped: false, saved: [], failed: [] }
  if (!shouldRun(input)) {
    logger.debug(`Autosave throttled (last run ${input.lastRun}, now ${input.now})`)
    report.skipped = true
    return report
  }

  await steps.writeStamp(input.now)

  for (const name of await steps.listSessions()) {
    if (!isNamedSession(name)) continue
    try {
      await steps.saveSession(name)
      report.saved.push(name)
    } catch (error) {
      logger.warn(`Autosave of '${name}' failed: ${errorMessage(error)}`)
      report.failed.push({ name, error: errorMessage(error) })
    }
  }

  return report
}
