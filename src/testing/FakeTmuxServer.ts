import type { CommandRunner, RunResult } from '../utils/exec'

export interface FakePane {
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
  pid: number
  currentCommand: string
  startCommand: string
  path: string
}

export interface FakeWindow {
  id: string
  index: number
  name: string
  active: boolean
  layout: string
  zoomed: boolean
  width: number
  height: number
  options: Map<string, string>
  panes: FakePane[]
}

export interface FakeSession {
  id: string
  name: string
  created: number
  attached: number
  width: number
  height: number
  windows: FakeWindow[]
}

export interface PaneSpec {
  path?: string
  title?: string
  command?: string
  startCommand?: string
  active?: boolean
}

export interface WindowSpec {
  name: string
  layout?: string
  active?: boolean
  zoomed?: boolean
  automaticRename?: string
  panes?: PaneSpec[]
}

interface ParsedArgs {
  flags: Map<string, string | true>
  positional: string[]
}

const ok = (stdout = ''): RunResult => ({ stdout, stderr: '', exitCode: 0 })
const fail = (stderr: string): RunResult => ({ stdout: '', stderr, exitCode: 1 })

/**
 * Parse tmux-style arguments. Flag parsing stops at the first positional
 * argument, so a trailing shell command keeps its own flags.
 */
function parseArgs(args: string[], valueFlags: string): ParsedArgs {
  const flags = new Map<string, string | true>()
  let i = 0
  while (i < args.length && args[i].startsWith('-') && args[i].length > 1) {
    const flag = args[i].slice(1)
    if (valueFlags.includes(flag)) {
      flags.set(flag, args[i + 1] ?? '')
      i += 2
    } else {
      flags.set(flag, true)
      i++
    }
  }
  return { flags, positional: args.slice(i) }
}

function flagValue(parsed: ParsedArgs, flag: string): string | undefined {
  const value = parsed.flags.get(flag)
  return typeof value === 'string' ? value : undefined
}

function expand(format: string, vars: Record<string, string | number>): string {
  return format.replace(/#\{([a-z_]+)\}/g, (_, key: string) => {
    const value = vars[key]
    return value === undefined ? '' : String(value)
  })
}

const bit = (value: boolean) => (value ? '1' : '0')

/**
 * In-process stand-in for a tmux server, `ps`, `which` and a fuzzy finder.
 * Interprets exactly the commands tmux-box issues and records every call.
 */
export class FakeTmuxServer {
  sessions: FakeSession[] = []
  /** tmux argv of every call, in order */
  readonly calls: string[][] = []
  /** switch-client / attach-session targets */
  readonly clients: { action: 'switch' | 'attach'; session: string }[] = []
  /** `ps -t` output per tty (without /dev/) */
  readonly ps = new Map<string, string>()
  /** binaries `which` reports as installed */
  readonly binaries = new Set<string>(['tmux'])
  /** stdout of the fuzzy finder, or null to simulate a cancel */
  finderOutput: string | null = null
  readonly finderCalls: { binary: string; args: string[]; input: string }[] = []
  /** Return a message to make a tmux command fail */
  failWhen: ((args: string[]) => string | undefined) | null = null
  defaultShell = 'zsh'
  defaultPath = '/home/test'

  private nextSession = 0
  private nextWindow = 0
  private nextPane = 0

  get running(): boolean {
    return this.sessions.length > 0
  }

  readonly runner: CommandRunner = async (file, args, options = {}) => {
    switch (file) {
      case 'tmux':
        return this.tmux(args)
      case 'ps':
        return this.runPs(args)
      case 'which':
        return this.binaries.has(args[0] ?? '') ? ok(`/usr/bin/${args[0]}\n`) : fail('')
      case 'fzf':
      case 'sk':
        this.finderCalls.push({ binary: file, args, input: options.input ?? '' })
        return this.finderOutput === null ? { stdout: '', stderr: '', exitCode: 130 } : ok(this.finderOutput)
      default:
        return { stdout: '', stderr: `${file}: command not found`, exitCode: 127 }
    }
  }

  /**
   * Build a session directly, bypassing the recorded command log
   */
  addSession(name: string, windows: WindowSpec[], options: { attached?: number } = {}): FakeSession {
    const session = this.createSession(name, 200, 50)
    session.attached = options.attached ?? 0
    for (const spec of windows) {
      const window = this.createWindow(session, spec.name, undefined, undefined, false)
      window.layout = spec.layout ?? window.layout
      window.zoomed = spec.zoomed ?? false
      if (spec.automaticRename !== undefined) window.options.set('automatic-rename', spec.automaticRename)
      const panes: PaneSpec[] = spec.panes?.length ? spec.panes : [{}]
      panes.forEach((paneSpec, i) => {
        const pane = this.createPane(window, paneSpec.path, undefined)
        pane.title = paneSpec.title ?? pane.title
        pane.currentCommand = paneSpec.command ?? pane.currentCommand
        pane.startCommand = paneSpec.startCommand ?? ''
        pane.active = paneSpec.active ?? i === 0
      })
      if (spec.active) this.activate(session, window)
    }
    if (!session.windows.some((w) => w.active) && session.windows[0]) session.windows[0].active = true
    return session
  }

  session(name: string): FakeSession | undefined {
    return this.sessions.find((s) => s.name === name)
  }

  /** tmux calls whose first word is `command` */
  callsOf(command: string): string[][] {
    return this.calls.filter((call) => call[0] === command)
  }

  private tmux(args: string[]): RunResult {
    this.calls.push(args)
    if (args[0] === '-V') return ok('tmux 3.4\n')

    const commands: string[][] = [[]]
    for (const arg of args) {
      if (arg === ';') commands.push([])
      else commands[commands.length - 1].push(arg)
    }

    let stdout = ''
    for (const command of commands) {
      const injected = this.failWhen?.(command)
      if (injected) return fail(injected)
      if (!this.running && command[0] !== 'new-session') {
        return fail('no server running on /tmp/tmux-1000/default')
      }
      const result = this.dispatch(command[0] ?? '', command.slice(1))
      if (result.exitCode !== 0) return result
      stdout += result.stdout
    }
    return ok(stdout)
  }

  private dispatch(name: string, args: string[]): RunResult {
    switch (name) {
      case 'list-sessions': {
        const format = flagValue(parseArgs(args, 'F'), 'F') ?? '#{session_name}'
        return ok(this.sessions.map((s) => `${expand(format, this.sessionVars(s))}\n`).join(''))
      }
      case 'has-session': {
        const target = flagValue(parseArgs(args, 't'), 't') ?? ''
        return this.findSession(target) ? ok() : fail(`can't find session: ${target}`)
      }
      case 'display-message': {
        const parsed = parseArgs(args, 't')
        const target = flagValue(parsed, 't')
        const pane = target ? this.findPane(target) : this.defaultPane()
        if (!pane) return fail(`can't find pane: ${target}`)
        return ok(`${expand(parsed.positional.join(' '), this.paneVars(pane))}\n`)
      }
      case 'list-windows': {
        const parsed = parseArgs(args, 'tF')
        const target = flagValue(parsed, 't') ?? ''
        const session = this.findSession(target)
        if (!session) return fail(`can't find session: ${target}`)
        const format = flagValue(parsed, 'F') ?? '#{window_index}'
        return ok(session.windows.map((w) => `${expand(format, this.windowVars(session, w))}\n`).join(''))
      }
      case 'list-panes': {
        const parsed = parseArgs(args, 'tF')
        const target = flagValue(parsed, 't') ?? ''
        const found = this.findWindow(target)
        if (!found) return fail(`can't find window: ${target}`)
        const format = flagValue(parsed, 'F') ?? '#{pane_index}'
        return ok(found.window.panes.map((p) => `${expand(format, this.paneVars(p))}\n`).join(''))
      }
      case 'show-options': {
        const parsed = parseArgs(args, 't')
        const found = this.findWindow(flagValue(parsed, 't') ?? '')
        const option = parsed.positional[0] ?? ''
        const value = found?.window.options.get(option)
        return value === undefined ? fail(`invalid option: ${option}`) : ok(`${value}\n`)
      }
      case 'new-session':
        return this.newSession(parseArgs(args, 'Fsncxy'))
      case 'new-window':
        return this.newWindow(parseArgs(args, 'Ftnc'))
      case 'split-window':
        return this.splitWindow(parseArgs(args, 'Ftc'))
      case 'select-layout': {
        const parsed = parseArgs(args, 't')
        const found = this.findWindow(flagValue(parsed, 't') ?? '')
        if (!found) return fail('can\'t find window')
        found.window.layout = parsed.positional[0] ?? found.window.layout
        return ok()
      }
      case 'select-pane': {
        const parsed = parseArgs(args, 'tT')
        const pane = this.findPane(flagValue(parsed, 't') ?? '')
        if (!pane) return fail('can\'t find pane')
        const title = flagValue(parsed, 'T')
        if (title !== undefined) {
          pane.title = title
          return ok()
        }
        const window = this.windowOf(pane)
        if (window) window.panes.forEach((p) => (p.active = p === pane))
        return ok()
      }
      case 'select-window': {
        const found = this.findWindow(flagValue(parseArgs(args, 't'), 't') ?? '')
        if (!found) return fail('can\'t find window')
        this.activate(found.session, found.window)
        return ok()
      }
      case 'set-window-option': {
        const parsed = parseArgs(args, 't')
        const found = this.findWindow(flagValue(parsed, 't') ?? '')
        const [option, value] = parsed.positional
        if (!found || !option) return fail('can\'t find window')
        found.window.options.set(option, value ?? '')
        return ok()
      }
      case 'resize-pane': {
        const pane = this.findPane(flagValue(parseArgs(args, 't'), 't') ?? '')
        const window = pane ? this.windowOf(pane) : undefined
        if (!window) return fail('can\'t find pane')
        window.zoomed = !window.zoomed
        return ok()
      }
      case 'respawn-pane': {
        const parsed = parseArgs(args, 'tc')
        const pane = this.findPane(flagValue(parsed, 't') ?? '')
        if (!pane) return fail('can\'t find pane')
        this.bindCommand(pane, parsed.positional)
        const cwd = flagValue(parsed, 'c')
        if (cwd) pane.path = cwd
        return ok()
      }
      case 'kill-window': {
        const found = this.findWindow(flagValue(parseArgs(args, 't'), 't') ?? '')
        if (!found) return fail('can\'t find window')
        found.session.windows = found.session.windows.filter((w) => w !== found.window)
        if (found.session.windows.length === 0) {
          this.sessions = this.sessions.filter((s) => s !== found.session)
        } else if (found.window.active) {
          found.session.windows[0].active = true
        }
        return ok()
      }
      case 'move-window': {
        const session = this.findSession(flagValue(parseArgs(args, 't'), 't') ?? '')
        if (!session) return fail('can\'t find session')
        session.windows.forEach((w, i) => (w.index = i))
        return ok()
      }
      case 'rename-session': {
        const parsed = parseArgs(args, 't')
        const session = this.findSession(flagValue(parsed, 't') ?? '')
        const to = parsed.positional[0]
        if (!session || !to) return fail('can\'t find session')
        if (this.findSession(`=${to}`)) return fail(`duplicate session: ${to}`)
        session.name = to
        return ok()
      }
      case 'switch-client':
      case 'attach-session': {
        const session = this.findSession(flagValue(parseArgs(args, 't'), 't') ?? '')
        if (!session) return fail('can\'t find session')
        this.clients.push({ action: name === 'switch-client' ? 'switch' : 'attach', session: session.name })
        return ok()
      }
      default:
        return fail(`unknown command: ${name}`)
    }
  }

  private newSession(parsed: ParsedArgs): RunResult {
    const name = flagValue(parsed, 's') ?? String(this.nextSession)
    if (this.findSession(`=${name}`)) return fail(`duplicate session: ${name}`)
    const width = Number(flagValue(parsed, 'x') ?? 80)
    const height = Number(flagValue(parsed, 'y') ?? 24)
    const session = this.createSession(name, width, height)
    const window = this.createWindow(session, flagValue(parsed, 'n'), flagValue(parsed, 'c'), parsed.positional)
    window.active = true
    return this.printCreated(parsed, session, window, window.panes[0])
  }

  private newWindow(parsed: ParsedArgs): RunResult {
    const target = flagValue(parsed, 't') ?? ''
    const session = this.findSession(target)
    if (!session) return fail(`can't find session: ${target}`)
    const window = this.createWindow(session, flagValue(parsed, 'n'), flagValue(parsed, 'c'), parsed.positional)
    return this.printCreated(parsed, session, window, window.panes[0])
  }

  private splitWindow(parsed: ParsedArgs): RunResult {
    const target = flagValue(parsed, 't') ?? ''
    const found = this.findWindow(target)
    if (!found) return fail(`can't find window: ${target}`)
    const pane = this.createPane(found.window, flagValue(parsed, 'c'), parsed.positional)
    return this.printCreated(parsed, found.session, found.window, pane)
  }

  private printCreated(parsed: ParsedArgs, session: FakeSession, window: FakeWindow, pane: FakePane): RunResult {
    if (!parsed.flags.has('P')) return ok()
    const format = flagValue(parsed, 'F') ?? '#{session_name}:#{window_index}.#{pane_index}'
    return ok(`${expand(format, { ...this.sessionVars(session), ...this.windowVars(session, window), ...this.paneVars(pane) })}\n`)
  }

  private createSession(name: string, width: number, height: number): FakeSession {
    const session: FakeSession = {
      id: `$${this.nextSession++}`,
      name,
      created: 1700000000 + this.nextSession,
      attached: 0,
      width,
      height,
      windows: [],
    }
    this.sessions.push(session)
    return session
  }

  private createWindow(
    session: FakeSession,
    name: string | undefined,
    cwd: string | undefined,
    command: string[] | undefined,
    withPane = true
  ): FakeWindow {
    const window: FakeWindow = {
      id: `@${this.nextWindow++}`,
      index: session.windows.reduce((max, w) => Math.max(max, w.index + 1), 0),
      name: name ?? (command?.[0] ?? this.defaultShell),
      active: false,
      layout: 'b25d,80x24,0,0,0',
      zoomed: false,
      width: session.width,
      height: session.height,
      options: new Map(),
      panes: [],
    }
    session.windows.push(window)
    if (withPane) this.createPane(window, cwd, command).active = true
    return window
  }

  private createPane(window: FakeWindow, cwd: string | undefined, command: string[] | undefined): FakePane {
    const n = this.nextPane++
    const pane: FakePane = {
      id: `%${n}`,
      index: window.panes.length,
      title: 'fakehost',
      active: false,
      dead: false,
      width: window.width,
      height: window.height,
      left: 0,
      top: 0,
      tty: `/dev/pts/${n}`,
      pid: 1000 + n,
      currentCommand: this.defaultShell,
      startCommand: '',
      path: cwd ?? this.defaultPath,
    }
    window.panes.push(pane)
    if (command?.length) this.bindCommand(pane, command)
    return pane
  }

  private bindCommand(pane: FakePane, command: string[]) {
    if (command.length === 0) return
    pane.startCommand = command.join(' ')
    pane.currentCommand = command[0].split('/').pop() ?? command[0]
  }

  private activate(session: FakeSession, window: FakeWindow) {
    session.windows.forEach((w) => (w.active = w === window))
  }

  private findSession(target: string): FakeSession | undefined {
    const name = target.replace(/:$/, '').replace(/^=/, '')
    if (name.startsWith('$')) return this.sessions.find((s) => s.id === name)
    return this.sessions.find((s) => s.name === name)
  }

  private findWindow(target: string): { session: FakeSession; window: FakeWindow } | undefined {
    if (target.startsWith('@')) {
      for (const session of this.sessions) {
        const window = session.windows.find((w) => w.id === target)
        if (window) return { session, window }
      }
      return undefined
    }
    const session = this.findSession(target)
    const window = session?.windows.find((w) => w.active) ?? session?.windows[0]
    return session && window ? { session, window } : undefined
  }

  private findPane(target: string): FakePane | undefined {
    if (target.startsWith('%')) {
      for (const session of this.sessions) {
        for (const window of session.windows) {
          const pane = window.panes.find((p) => p.id === target)
          if (pane) return pane
        }
      }
      return undefined
    }
    const found = this.findWindow(target)
    return found?.window.panes.find((p) => p.active) ?? found?.window.panes[0]
  }

  private defaultPane(): FakePane | undefined {
    const session = this.sessions.find((s) => s.attached > 0) ?? this.sessions[0]
    return session ? this.findPane(`=${session.name}`) : undefined
  }

  private windowOf(pane: FakePane): FakeWindow | undefined {
    return this.sessionOf(pane)?.window
  }

  private sessionOf(pane: FakePane): { session: FakeSession; window: FakeWindow } | undefined {
    for (const session of this.sessions) {
      const window = session.windows.find((w) => w.panes.includes(pane))
      if (window) return { session, window }
    }
    return undefined
  }

  private sessionVars(session: FakeSession): Record<string, string | number> {
    const active = session.windows.find((w) => w.active) ?? session.windows[0]
    return {
      session_id: session.id,
      session_name: session.name,
      session_created: session.created,
      session_attached: session.attached,
      session_windows: session.windows.length,
      window_width: active?.width ?? session.width,
      window_height: active?.height ?? session.height,
    }
  }

  private windowVars(session: FakeSession, window: FakeWindow): Record<string, string | number> {
    return {
      ...this.sessionVars(session),
      window_id: window.id,
      window_index: window.index,
      window_name: window.name,
      window_active: bit(window.active),
      window_panes: window.panes.length,
      window_layout: window.layout,
      window_zoomed_flag: bit(window.zoomed),
      window_width: window.width,
      window_height: window.height,
    }
  }

  private paneVars(pane: FakePane): Record<string, string | number> {
    const owner = this.sessionOf(pane)
    return {
      ...(owner ? this.windowVars(owner.session, owner.window) : {}),
      pane_id: pane.id,
      pane_index: pane.index,
      pane_title: pane.title,
      pane_active: bit(pane.active),
      pane_dead: bit(pane.dead),
      pane_width: pane.width,
      pane_height: pane.height,
      pane_left: pane.left,
      pane_top: pane.top,
      pane_tty: pane.tty,
      pane_pid: pane.pid,
      pane_current_command: pane.currentCommand,
      pane_current_path: pane.path,
    }
  }

  private runPs(args: string[]): RunResult {
    const parsed = parseArgs(args, 'ot')
    const tty = flagValue(parsed, 't') ?? ''
    const output = this.ps.get(tty)
    return output === undefined ? { stdout: '', stderr: '', exitCode: 1 } : ok(output)
  }
}
