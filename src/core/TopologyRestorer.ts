import type { PaneDump, SessionDump, WindowDump } from '../models'
import { ConflictError, InvalidInputError, PartialFailureError, errorMessage } from '../utils/errors'
import { logger } from '../utils/logger'
import { expandHome } from '../utils/paths'
import { isShellCommand } from '../utils/shell'
import { sessionTarget, type CreatedWindow, type TmuxCommands } from '../utils/tmux'
import { bindToShell, ForegroundCommandPolicy, type CommandReplayPolicy } from './CommandReplay'

export interface RestoreOptions {
  /** Remove the target's existing windows */
  force?: boolean
  /** Add restored windows after the target's existing ones */
  append?: boolean
  /** Working directory for the first window's panes */
  baseDir?: string
  /** Relaunch the commands recorded for each pane */
  runCommands?: boolean
  /** Restore into this session instead of the one the dump names */
  sessionName?: string
  /** Switch or attach the client to the target when done (default true) */
  attach?: boolean
}

export type TargetState = 'NEW' | 'EXISTING_EMPTY' | 'EXISTING_NONEMPTY'

export interface RestoreResult {
  session: string
  state: TargetState
  /** The target is the session the caller runs in */
  inPlace: boolean
  /** Previous name when the current session was renamed to the dump's name */
  renamedFrom: string | null
  windowsCreated: number
  panesCreated: number
  windowsRemoved: number
  attached: boolean
}

interface ResolvedTarget {
  session: string
  inPlace: boolean
  /** Current session to rename to `session` before restoring */
  renameFrom: string | null
}

/**
 * Rebuilds a session's windows and panes from a dump
 */
export class TopologyRestorer {
  constructor(
    private readonly tmux: TmuxCommands,
    private readonly replay: CommandReplayPolicy = new ForegroundCommandPolicy()
  ) {}

  /**
   * Target name: override, then (inside tmux) the current session, then the
   * name recorded in the dump. Inside tmux without an override the current
   * session takes the dump's name, or `name(1)`... when that one is taken.
   */
  async resolveTarget(dump: SessionDump, override?: string): Promise<ResolvedTarget> {
    const current = this.tmux.isInside() ? await this.tmux.currentSessionName() : null

    if (override) {
      return { session: override, inPlace: current === override, renameFrom: null }
    }

    if (current) {
      if (dump.name && dump.name !== current) {
        const session = await this.tmux.uniqueSessionName(dump.name)
        return { session, inPlace: true, renameFrom: current }
      }
      return { session: current, inPlace: true, renameFrom: null }
    }

    if (dump.name) return { session: dump.name, inPlace: false, renameFrom: null }

    throw new InvalidInputError('session name required: the dump has no name and none was given', '<dump>')
  }

  /**
   * EXISTING_EMPTY is one window holding one pane that runs a shell, or the
   * pane this process runs in.
   */
  async targetState(session: string): Promise<TargetState> {
    if (!(await this.tmux.hasSession(session))) return 'NEW'

    const windows = await this.tmux.listWindows(sessionTarget(session))
    if (windows.length !== 1) return 'EXISTING_NONEMPTY'

    const panes = await this.tmux.listPanes(windows[0].id)
    if (panes.length !== 1) return 'EXISTING_NONEMPTY'

    const [pane] = panes
    if (pane.id === this.tmux.currentPaneId() || isShellCommand(pane.currentCommand)) {
      return 'EXISTING_EMPTY'
    }
    return 'EXISTING_NONEMPTY'
  }

  async restore(dump: SessionDump, options: RestoreOptions = {}): Promise<RestoreResult> {
    const { force = false, append = false, runCommands = true, attach = true } = options
    if (force && append) {
      throw new InvalidInputError('--force and --append cannot be combined', dump.name ?? '<dump>')
    }

    const target = await this.resolveTarget(dump, options.sessionName)
    if (options.baseDir && target.inPlace) {
      throw new InvalidInputError(
        `--base-dir cannot be used when restoring into the current session '${target.renameFrom ?? target.session}'`,
        target.session
      )
    }

    const state = await this.targetState(target.renameFrom ?? target.session)
    if (state === 'EXISTING_NONEMPTY' && !force && !append) {
      throw new ConflictError(
        `Session '${target.renameFrom ?? target.session}' is not empty; use --force to replace or --append to add windows`,
        target.renameFrom ?? target.session
      )
    }

    if (force && state !== 'NEW' && dump.windows.length === 0) {
      throw new InvalidInputError(
        `Dump has no windows; --force would leave nothing in session '${target.renameFrom ?? target.session}'`,
        target.renameFrom ?? target.session
      )
    }

    if (target.renameFrom) {
      await this.tmux.renameSession(target.renameFrom, target.session)
    }

    const session = target.session
    const clear = !append && state !== 'NEW'
    const previousWindows = clear ? (await this.tmux.listWindows(sessionTarget(session))).map((w) => w.id) : []

    const result: RestoreResult = {
      session,
      state,
      inPlace: target.inPlace,
      renamedFrom: target.renameFrom,
      windowsCreated: 0,
      panesCreated: 0,
      windowsRemoved: 0,
      attached: false,
    }

    const baseDir = options.baseDir ? expandHome(options.baseDir) : undefined

    if (dump.windows.length === 0 && state === 'NEW') {
      await this.tmux.newSession(session, { cwd: baseDir })
      logger.warn(`Dump for '${session}' has no windows; created an empty session`)
    }

    let activeWindowId: string | null = null
    for (const [position, window] of dump.windows.entries()) {
      const createSession = state === 'NEW' && position === 0
      const created = await this.restoreWindow(session, window, {
        createSession,
        size: dump.size ?? window.size,
        baseDir: position === 0 ? baseDir : undefined,
        runCommands,
      })
      result.windowsCreated++
      result.panesCreated += Math.max(window.panes.length, 1)
      if (window.active) activeWindowId = created.windowId
    }

    if (activeWindowId) await this.tmux.selectWindow(activeWindowId)

    if (clear && previousWindows.length > 0 && result.windowsCreated > 0) {
      // one invocation: the caller may sit in one of these windows
      await this.tmux.killWindows(previousWindows, session)
      result.windowsRemoved = previousWindows.length
    }

    if (attach && !target.inPlace) {
      await this.tmux.attachOrSwitch(session)
      result.attached = true
    }

    logger.info(
      `Restored ${result.windowsCreated} window(s), ${result.panesCreated} pane(s) into '${session}' (${state})`
    )
    return result
  }

  private async restoreWindow(
    session: string,
    window: WindowDump,
    context: { createSession: boolean; size?: { width: number; height: number }; baseDir?: string; runCommands: boolean }
  ): Promise<CreatedWindow> {
    const panes = window.panes.length ? window.panes : [emptyPane()]
    const cwdFor = (pane: PaneDump) => context.baseDir ?? (pane.path ? expandHome(pane.path) : undefined)
    const commandFor = (pane: PaneDump) => (context.runCommands ? this.replay.commandFor(pane) : null)

    const fail = (pane: PaneDump, error: unknown): PartialFailureError =>
      new PartialFailureError(
        `Restore of '${session}' stopped at window ${window.index} pane ${pane.index}: ${errorMessage(error)}`,
        session,
        window.index,
        pane.index,
        error
      )

    const [first, ...rest] = panes
    const firstCommand = commandFor(first)
    let created: CreatedWindow
    try {
      if (context.createSession) {
        created = await this.tmux.newSession(session, {
          windowName: window.name || undefined,
          cwd: cwdFor(first),
          width: context.size?.width,
          height: context.size?.height,
        })
        if (firstCommand) await this.tmux.respawnPane(created.paneId, bindToShell(firstCommand), cwdFor(first))
      } else {
        created = await this.tmux.newWindow(session, {
          windowName: window.name || undefined,
          cwd: cwdFor(first),
          command: firstCommand ? bindToShell(firstCommand) : undefined,
        })
      }
    } catch (error) {
      throw fail(first, error)
    }

    const paneIds = [created.paneId]
    for (const pane of rest) {
      const command = commandFor(pane)
      try {
        paneIds.push(
          await this.tmux.splitWindow(created.windowId, {
            cwd: cwdFor(pane),
            command: command ? bindToShell(command) : undefined,
          })
        )
        await this.tmux.selectLayout(created.windowId, 'tiled')
      } catch (error) {
        throw fail(pane, error)
      }
    }

    await this.applyWindowState(window, created.windowId, panes, paneIds)
    return created
  }

  /**
   * Layout, titles, automatic-rename, active pane and zoom. These run after
   * every pane exists; a failure here degrades the window but does not stop
   * the restore.
   */
  private async applyWindowState(window: WindowDump, windowId: string, panes: PaneDump[], paneIds: string[]) {
    const attempt = async (what: string, step: () => Promise<void>) => {
      try {
        await step()
      } catch (error) {
        logger.warn(`Could not restore ${what} of window ${window.index} (${window.name}): ${errorMessage(error)}`)
      }
    }

    if (window.layout) await attempt('layout', () => this.tmux.selectLayout(windowId, window.layout))

    for (const [i, pane] of panes.entries()) {
      const paneId = paneIds[i]
      if (pane.title && paneId) await attempt('pane title', () => this.tmux.setPaneTitle(paneId, pane.title))
    }

    if (window.automaticRename === 'on' || window.automaticRename === 'off') {
      const value = window.automaticRename
      await attempt('automatic-rename', () => this.tmux.setWindowOption(windowId, 'automatic-rename', value))
    }

    const activeIndex = panes.findIndex((pane) => pane.active)
    const activePaneId = paneIds[activeIndex >= 0 ? activeIndex : 0]
    if (activePaneId) {
      await attempt('active pane', () => this.tmux.selectPane(activePaneId))
      if (window.zoomed && paneIds.length > 1) {
        await attempt('zoom', () => this.tmux.zoomPane(activePaneId))
      }
    }
  }
}

function emptyPane(): PaneDump {
  return {
    index: 0,
    title: '',
    active: true,
    path: '',
    startCommand: { kind: 'absent' },
    currentCommand: '',
    processes: [],
  }
}
