import type { PaneDump } from '../models'
import { isShellCommand, shJoin } from '../utils/shell'

/**
 * Chooses the command line a restored pane runs, or null for a plain shell
 */
export interface CommandReplayPolicy {
  commandFor(pane: PaneDump): string | null
}

/**
 * An explicit start command wins. Otherwise the process list decides: a
 * shell with something running in it replays that program, a pane whose
 * controlling process is not a shell replays it directly.
 */
export class ForegroundCommandPolicy implements CommandReplayPolicy {
  commandFor(pane: PaneDump): string | null {
    const start = pane.startCommand
    if (start.kind === 'literal') return start.command.trim() || null
    if (start.kind === 'tokens') return start.tokens.length ? shJoin(start.tokens) : null

    const [first, second] = pane.processes
    if (!first || first.command.length === 0) return null
    if (isShellCommand(first.command)) {
      return second && second.command.length ? shJoin(second.command) : null
    }
    return shJoin(first.command)
  }
}

/**
 * Wrap a command so the pane drops into the user's shell when it exits
 * instead of closing.
 */
export function bindToShell(command: string): string[] {
  return ['sh', '-c', `${command}; exec "\${SHELL:-/bin/sh}"`]
}
