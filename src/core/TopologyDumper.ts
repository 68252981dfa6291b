import type { PaneDump, SessionDump, WindowDump } from '../models'
import { NotFoundError, UnavailableError } from '../utils/errors'
import { logger } from '../utils/logger'
import { normalizePanePath } from '../utils/paths'
import { isNoServerError, sessionTarget, type LiveSession, type TmuxCommands, type TmuxWindowInfo } from '../utils/tmux'
import { ProcessInspector } from './ProcessInspector'

/**
 * Reads the topology of one live session
 */
export class TopologyDumper {
  constructor(
    private readonly tmux: TmuxCommands,
    private readonly inspector: ProcessInspector = new ProcessInspector()
  ) {}

  /**
   * Session to dump: explicit name, then the session this process runs in,
   * then the first attached session, then the first one listed.
   */
  async resolveSession(name?: string): Promise<LiveSession> {
    const sessions = await this.tmux.listSessions()
    if (sessions.length === 0) {
      throw new UnavailableError('No tmux server running or no sessions', 'tmux')
    }

    if (name) {
      const match = sessions.find((s) => s.name === name)
      if (!match) throw new NotFoundError(`tmux session '${name}' not found`, name)
      return match
    }

    if (this.tmux.isInside()) {
      const current = await this.tmux.currentSessionName()
      const match = current ? sessions.find((s) => s.name === current) : undefined
      if (match) return match
    }

    return sessions.find((s) => s.attached > 0) ?? sessions[0]
  }

  async dump(sessionName?: string): Promise<SessionDump> {
    const session = await this.resolveSession(sessionName)
    logger.debug(`Dumping session ${session.name} (${session.id})`)

    let windowInfos: TmuxWindowInfo[]
    try {
      windowInfos = await this.tmux.listWindows(session.id || sessionTarget(session.name))
    } catch (error) {
      if (isNoServerError(error)) throw new UnavailableError('tmux server went away during dump', 'tmux')
      throw error
    }

    const windows: WindowDump[] = []
    for (const info of windowInfos) {
      const panes = await this.dumpPanes(info.id)
      const automaticRename = (await this.tmux.windowOption(info.id, 'automatic-rename')) ?? ''
      windows.push({
        id: info.id,
        index: info.index,
        name: info.name,
        active: info.active,
        zoomed: info.zoomed,
        automaticRename,
        layout: info.layout,
        size: { width: info.width, height: info.height },
        panes,
      })
    }

    return {
      id: session.id,
      name: session.name,
      created: session.created,
      attached: session.attached > 0,
      size: { width: session.width, height: session.height },
      windows,
    }
  }

  private async dumpPanes(windowId: string): Promise<PaneDump[]> {
    const paneInfos = await this.tmux.listPanes(windowId)
    const panes: PaneDump[] = []
    for (const info of paneInfos) {
      const pane: PaneDump = {
        id: info.id,
        index: info.index,
        title: info.title,
        active: info.active,
        dead: info.dead,
        geometry: { width: info.width, height: info.height, left: info.left, top: info.top },
        path: normalizePanePath(info.currentPath),
        // pane_start_command is whatever a previous restore bound, not what the user ran
        startCommand: { kind: 'absent' },
        currentCommand: info.currentCommand,
        processes: await this.inspector.listProcesses(info.tty, info.pid),
      }
      if (info.tty) pane.tty = info.tty
      if (info.pid !== null) pane.pid = info.pid
      panes.push(pane)
    }
    return panes
  }
}
