import type { ProcessRecord } from '../models'
import { execaRunner, type CommandRunner } from '../utils/exec'
import { logger } from '../utils/logger'
import { normalizeTtyForPs } from '../utils/paths'
import { splitCommandLine } from '../utils/shell'

/**
 * A ps row with the fields ordering needs but the dump does not keep
 */
export interface InspectedProcess extends ProcessRecord {
  pgid: number
  /** Foreground process group of the terminal */
  tpgid: number
  elapsedSeconds: number
}

export interface ProcessOrderContext {
  /** pid tmux started in the pane, when known */
  panePid?: number | null
}

/**
 * Decides which process of a tty comes first in a pane's process list
 */
export interface ProcessOrderPolicy {
  order(processes: InspectedProcess[], context: ProcessOrderContext): InspectedProcess[]
}

const PS_FORMAT = 'pid=,ppid=,pgid=,tpgid=,user=,stat=,etime=,args='
const PS_ROW = /^\s*(\d+)\s+(\d+)\s+(-?\d+)\s+(-?\d+)\s+(\S+)\s+(\S+)\s+(\S+)\s?(.*)$/

/**
 * ps elapsed time ([[dd-]hh:]mm:ss) in seconds
 */
export function parseElapsed(etime: string): number {
  const match = /^(?:(\d+)-)?(?:(\d+):)?(\d+):(\d+)$/.exec(etime.trim())
  if (!match) return Number.POSITIVE_INFINITY
  const [, days, hours, minutes, seconds] = match
  return (
    Number(days ?? 0) * 86400 + Number(hours ?? 0) * 3600 + Number(minutes) * 60 + Number(seconds)
  )
}

export function parsePsOutput(stdout: string): InspectedProcess[] {
  const processes: InspectedProcess[] = []
  for (const line of stdout.split('\n')) {
    const match = PS_ROW.exec(line)
    if (!match) continue
    const [, pid, ppid, pgid, tpgid, user, state, etime, args] = match
    const parentPid = Number.parseInt(ppid, 10)
    processes.push({
      pid: Number.parseInt(pid, 10),
      ppid: parentPid > 0 ? parentPid : null,
      pgid: Number.parseInt(pgid, 10),
      tpgid: Number.parseInt(tpgid, 10),
      user,
      state,
      etime,
      elapsedSeconds: parseElapsed(etime),
      command: splitCommandLine(args),
    })
  }
  return processes
}

function depthOf(proc: InspectedProcess, byPid: Map<number, InspectedProcess>): number {
  let depth = 0
  const seen = new Set<number>([proc.pid])
  let parent = proc.ppid === null ? undefined : byPid.get(proc.ppid)
  while (parent && !seen.has(parent.pid)) {
    seen.add(parent.pid)
    depth++
    parent = parent.ppid === null ? undefined : byPid.get(parent.ppid)
  }
  return depth
}

/**
 * Controlling process first (the pane pid, or the oldest root of the tty's
 * process tree), then the terminal's foreground process group, then the rest.
 * Ties: shallower in the tree, then most recently started, then lower pid.
 */
export class ForegroundFirstPolicy implements ProcessOrderPolicy {
  order(processes: InspectedProcess[], context: ProcessOrderContext): InspectedProcess[] {
    if (processes.length === 0) return []

    const byPid = new Map(processes.map((p) => [p.pid, p]))
    const depth = new Map(processes.map((p) => [p.pid, depthOf(p, byPid)]))
    const depthOfPid = (pid: number) => depth.get(pid) ?? 0

    let root = context.panePid != null ? byPid.get(context.panePid) : undefined
    if (!root) {
      root = [...processes].sort(
        (a, b) =>
          depthOfPid(a.pid) - depthOfPid(b.pid) ||
          b.elapsedSeconds - a.elapsedSeconds ||
          a.pid - b.pid
      )[0]
    }

    const rest = processes
      .filter((p) => p !== root)
      .sort((a, b) => {
        const fgA = a.tpgid > 0 && a.pgid === a.tpgid ? 0 : 1
        const fgB = b.tpgid > 0 && b.pgid === b.tpgid ? 0 : 1
        return (
          fgA - fgB ||
          depthOfPid(a.pid) - depthOfPid(b.pid) ||
          a.elapsedSeconds - b.elapsedSeconds ||
          a.pid - b.pid
        )
      })

    return root ? [root, ...rest] : rest
  }
}

/**
 * Lists the processes attached to a terminal device
 */
export class ProcessInspector {
  constructor(
    private readonly runner: CommandRunner = execaRunner,
    private readonly policy: ProcessOrderPolicy = new ForegroundFirstPolicy()
  ) {}

  /**
   * Processes on `tty`, controlling process first. Never throws: any failure
   * means "no process information" and yields an empty list.
   */
  async listProcesses(tty: string | undefined, panePid?: number | null): Promise<ProcessRecord[]> {
    if (!tty?.trim()) return []
    try {
      const { stdout, stderr, exitCode } = await this.runner('ps', ['-o', PS_FORMAT, '-t', normalizeTtyForPs(tty)])
      if (exitCode !== 0) {
        logger.debug(`ps -t ${tty} exited ${exitCode}: ${stderr.trim()}`)
        return []
      }
      const ordered = this.policy.order(parsePsOutput(stdout), { panePid })
      return ordered.map(({ pid, ppid, user, state, etime, command }) => ({ pid, ppid, user, state, etime, command }))
    } catch (error) {
      logger.debug(`Process inspection failed for ${tty}:`, error)
      return []
    }
  }
}
