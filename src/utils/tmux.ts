import { execaRunner, type CommandRunner } from './exec'
import { logger } from './logger'

/**
 * tmux exited non-zero
 */
export class TmuxError extends Error {
  constructor(
    message: string,
    public command: string,
    public stderr: string,
    public exitCode: number
  ) {
    super(message)
    this.name = 'TmuxError'
  }
}

export function isNoServerError(error: unknown): boolean {
  if (!(error instanceof TmuxError)) return false
  return /no server running|error connecting to|failed to connect to server|server exited/i.test(error.stderr)
}

export interface LiveSession {
  id: string
  name: string
  /** epoch seconds */
  created: number
  /** number of attached clients */
  attached: number
  windows: number
  width: number
  height: number
}

export interface TmuxWindowInfo {
  id: string
  index: number
  name: string
  active: boolean
  panes: number
  layout: string
  zoomed: boolean
  width: number
  height: number
}

export interface TmuxPaneInfo {
  id: string
  index: number
  title: string
  active: boolean
  dead: boolean
  width: number
  height: number
  left: number
  top: number
  tty: string
  pid: number | null
  currentCommand: string
  currentPath: string
}

export interface CreatedWindow {
  windowId: string
  paneId: string
}

export interface CreateWindowOptions {
  windowName?: string
  cwd?: string
  /** argv bound to the first pane instead of the default shell */
  command?: string[]
}

// Each row ends with its one free-text field, which parseFields lets carry tabs.
// Pane titles and commands get their own `pane_id`-keyed queries for the same reason.
const SESSION_FORMAT = [
  '#{session_id}',
  '#{session_created}',
  '#{session_attached}',
  '#{session_windows}',
  '#{window_width}',
  '#{window_height}',
  '#{session_name}',
].join('\t')

const WINDOW_FORMAT = [
  '#{window_id}',
  '#{window_index}',
  '#{window_active}',
  '#{window_panes}',
  '#{window_layout}',
  '#{window_zoomed_flag}',
  '#{window_width}',
  '#{window_height}',
  '#{window_name}',
].join('\t')

const PANE_FORMAT = [
  '#{pane_id}',
  '#{pane_index}',
  '#{pane_active}',
  '#{pane_dead}',
  '#{pane_width}',
  '#{pane_height}',
  '#{pane_left}',
  '#{pane_top}',
  '#{pane_tty}',
  '#{pane_pid}',
  '#{pane_current_path}',
].join('\t')

const CREATED_FORMAT = '#{window_id}\t#{pane_id}'

/**
 * Split a tab-separated tmux row into exactly `count` fields, padding missing ones
 */
export function parseFields(line: string, count: number): string[] {
  const parts = line.split('\t')
  const fields = parts.slice(0, count)
  // the last field (a path or a name) may itself contain tabs
  if (parts.length > count && count > 0) {
    fields[count - 1] = parts.slice(count - 1).join('\t')
  }
  while (fields.length < count) fields.push('')
  return fields
}

function toInt(value: string, fallback = 0): number {
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? fallback : parsed
}

function rows(stdout: string): string[] {
  return stdout.split('\n').filter((line) => line.trim().length > 0)
}

/** `=name` matches a session name exactly instead of by prefix */
export function sessionTarget(name: string): string {
  return `=${name}`
}

/** `=name:` is "next free window index in session name" */
export function sessionWindowTarget(name: string): string {
  return `=${name}:`
}

/**
 * Wrapper around the tmux commands tmux-box needs
 */
export class TmuxCommands {
  constructor(
    private readonly runner: CommandRunner = execaRunner,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * Run a tmux command and return its stdout
   */
  async run(args: string[]): Promise<string> {
    const command = `tmux ${args.join(' ')}`
    logger.debug(command)
    const result = await this.runner('tmux', args)
    if (result.exitCode !== 0) {
      throw new TmuxError(`${command} failed`, command, result.stderr.trim(), result.exitCode)
    }
    return result.stdout.replace(/\n$/, '')
  }

  async isAvailable(): Promise<boolean> {
    const { exitCode } = await this.runner('tmux', ['-V'])
    return exitCode === 0
  }

  /**
   * True when running inside a tmux client
   */
  isInside(): boolean {
    return Boolean(this.env.TMUX?.trim())
  }

  /**
   * Pane this process runs in, if any
   */
  currentPaneId(): string | null {
    return this.isInside() ? this.env.TMUX_PANE?.trim() || null : null
  }

  async currentSessionName(): Promise<string | null> {
    if (!this.isInside()) return null
    const args = ['display-message', '-p']
    const pane = this.currentPaneId()
    if (pane) args.push('-t', pane)
    args.push('#{session_name}')
    try {
      const name = (await this.run(args)).trim()
      return name || null
    } catch (error) {
      logger.debug('Could not resolve current session:', error)
      return null
    }
  }

  /**
   * List live sessions. Empty when no server is running.
   */
  async listSessions(): Promise<LiveSession[]> {
    try {
      const stdout = await this.run(['list-sessions', '-F', SESSION_FORMAT])
      return rows(stdout).map((line) => {
        const [id, created, attached, windows, width, height, name] = parseFields(line, 7)
        return {
          id,
          name,
          created: toInt(created),
          attached: toInt(attached),
          windows: toInt(windows),
          width: toInt(width),
          height: toInt(height),
        }
      })
    } catch (error) {
      if (isNoServerError(error)) return []
      throw error
    }
  }

  async hasSession(name: string): Promise<boolean> {
    const { exitCode } = await this.runner('tmux', ['has-session', '-t', sessionTarget(name)])
    return exitCode === 0
  }

  async listWindows(target: string): Promise<TmuxWindowInfo[]> {
    const stdout = await this.run(['list-windows', '-t', target, '-F', WINDOW_FORMAT])
    return rows(stdout).map((line) => {
      const [id, index, active, panes, layout, zoomed, width, height, name] = parseFields(line, 9)
      return {
        id,
        index: toInt(index),
        name,
        active: active === '1',
        panes: toInt(panes),
        layout,
        zoomed: zoomed === '1',
        width: toInt(width),
        height: toInt(height),
      }
    })
  }

  async listPanes(target: string): Promise<TmuxPaneInfo[]> {
    const stdout = await this.run(['list-panes', '-t', target, '-F', PANE_FORMAT])
    const titles = await this.paneField(target, 'pane_title')
    const commands = await this.paneField(target, 'pane_current_command')
    return rows(stdout).map((line) => {
      const [id, index, active, dead, width, height, left, top, tty, pid, currentPath] = parseFields(line, 11)
      const parsedPid = Number.parseInt(pid, 10)
      return {
        id,
        index: toInt(index),
        title: titles.get(id) ?? '',
        active: active === '1',
        dead: dead === '1',
        width: toInt(width),
        height: toInt(height),
        left: toInt(left),
        top: toInt(top),
        tty,
        pid: Number.isNaN(parsedPid) ? null : parsedPid,
        currentCommand: commands.get(id) ?? '',
        currentPath,
      }
    })
  }

  /**
   * One free-text pane variable per pane id
   */
  private async paneField(target: string, variable: string): Promise<Map<string, string>> {
    const stdout = await this.run(['list-panes', '-t', target, '-F', `#{pane_id}\t#{${variable}}`])
    const values = new Map<string, string>()
    for (const line of rows(stdout)) {
      const [id, value] = parseFields(line, 2)
      values.set(id, value)
    }
    return values
  }

  /**
   * Read a window option, null when tmux refuses
   */
  async windowOption(target: string, option: string): Promise<string | null> {
    try {
      return (await this.run(['show-options', '-w', '-v', '-t', target, option])).trim()
    } catch (error) {
      logger.debug(`show-options ${option} failed for ${target}:`, error)
      return null
    }
  }

  /**
   * Create a detached session and return its first window and pane
   */
  async newSession(
    name: string,
    options: CreateWindowOptions & { width?: number; height?: number } = {}
  ): Promise<CreatedWindow> {
    const args = ['new-session', '-d', '-P', '-F', CREATED_FORMAT, '-s', name]
    if (options.windowName) args.push('-n', options.windowName)
    if (options.cwd) args.push('-c', options.cwd)
    if (options.width && options.height) args.push('-x', String(options.width), '-y', String(options.height))
    if (options.command?.length) args.push(...options.command)
    const [windowId, paneId] = parseFields(await this.run(args), 2)
    logger.info(`Tmux session created: ${name}`)
    return { windowId, paneId }
  }

  /**
   * Append a window to a session
   */
  async newWindow(session: string, options: CreateWindowOptions = {}): Promise<CreatedWindow> {
    const args = ['new-window', '-d', '-P', '-F', CREATED_FORMAT, '-t', sessionWindowTarget(session)]
    if (options.windowName) args.push('-n', options.windowName)
    if (options.cwd) args.push('-c', options.cwd)
    if (options.command?.length) args.push(...options.command)
    const [windowId, paneId] = parseFields(await this.run(args), 2)
    return { windowId, paneId }
  }

  /**
   * Split a window and return the new pane id
   */
  async splitWindow(target: string, options: { cwd?: string; command?: string[] } = {}): Promise<string> {
    const args = ['split-window', '-d', '-P', '-F', '#{pane_id}', '-t', target]
    if (options.cwd) args.push('-c', options.cwd)
    if (options.command?.length) args.push(...options.command)
    return (await this.run(args)).trim()
  }

  async selectLayout(target: string, layout: string): Promise<void> {
    await this.run(['select-layout', '-t', target, layout])
  }

  async setPaneTitle(paneId: string, title: string): Promise<void> {
    await this.run(['select-pane', '-t', paneId, '-T', title])
  }

  async selectPane(paneId: string): Promise<void> {
    await this.run(['select-pane', '-t', paneId])
  }

  async selectWindow(windowId: string): Promise<void> {
    await this.run(['select-window', '-t', windowId])
  }

  async setWindowOption(windowId: string, option: string, value: string): Promise<void> {
    await this.run(['set-window-option', '-t', windowId, option, value])
  }

  async zoomPane(paneId: string): Promise<void> {
    await this.run(['resize-pane', '-Z', '-t', paneId])
  }

  /**
   * Replace the process of a pane with `command`
   */
  async respawnPane(paneId: string, command: string[], cwd?: string): Promise<void> {
    const args = ['respawn-pane', '-k', '-t', paneId]
    if (cwd) args.push('-c', cwd)
    args.push(...command)
    await this.run(args)
  }

  /**
   * Kill several windows in one tmux invocation, so a caller running inside
   * one of them still gets every kill queued before it dies
   */
  async killWindows(windowIds: string[], renumberSession?: string): Promise<void> {
    if (windowIds.length === 0) return
    const args: string[] = []
    windowIds.forEach((id, i) => {
      if (i > 0) args.push(';')
      args.push('kill-window', '-t', id)
    })
    if (renumberSession) args.push(';', 'move-window', '-r', '-t', sessionTarget(renumberSession))
    await this.run(args)
  }

  async renameSession(from: string, to: string): Promise<void> {
    await this.run(['rename-session', '-t', sessionTarget(from), to])
    logger.info(`Tmux session renamed: ${from} -> ${to}`)
  }

  async switchClient(name: string): Promise<void> {
    await this.run(['switch-client', '-t', sessionTarget(name)])
  }

  /**
   * Attach this terminal to a session; returns once the client detaches
   */
  async attachSession(name: string): Promise<void> {
    const args = ['attach-session', '-t', sessionTarget(name)]
    const result = await this.runner('tmux', args, { interactive: true })
    if (result.exitCode !== 0) {
      const command = `tmux ${args.join(' ')}`
      throw new TmuxError(`${command} failed`, command, result.stderr.trim(), result.exitCode)
    }
  }

  /**
   * switch-client inside tmux, attach-session outside
   */
  async attachOrSwitch(name: string): Promise<void> {
    if (this.isInside()) {
      await this.switchClient(name)
      return
    }
    await this.attachSession(name)
  }

  /**
   * First free name among `base`, `base(1)`, `base(2)`, ...
   */
  async uniqueSessionName(base: string): Promise<string> {
    if (!(await this.hasSession(base))) return base
    for (let i = 1; ; i++) {
      const candidate = `${base}(${i})`
      if (!(await this.hasSession(candidate))) return candidate
    }
  }
}
