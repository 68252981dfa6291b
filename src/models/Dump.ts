/**
 * Command a pane should be relaunched with
 */
export type StartCommand =
  | { kind: 'absent' }
  | { kind: 'literal'; command: string }
  | { kind: 'tokens'; tokens: string[] }

export interface Size {
  width: number
  height: number
}

export interface Geometry extends Size {
  left: number
  top: number
}

/**
 * One OS process attached to a pane's terminal
 */
export interface ProcessRecord {
  pid: number

  /** Parent pid, null when ps did not report one */
  ppid: number | null

  user: string

  /** ps state column (S, Ss+, R+, ...) */
  state: string

  /** Elapsed time as printed by ps ([[dd-]hh:]mm:ss) */
  etime: string

  /** Command line split into shell words */
  command: string[]
}

/**
 * One terminal pane
 */
export interface PaneDump {
  /** tmux pane id (%n) at dump time */
  id?: string

  index: number

  title: string

  /** Exactly one pane per window is active */
  active: boolean

  dead?: boolean

  geometry?: Geometry

  /** Terminal device (/dev/pts/3) */
  tty?: string

  /** pid of the process tmux started in the pane */
  pid?: number

  /** Working directory, without file:// scheme or host */
  path: string

  /**
   * Explicit command to relaunch; wins over `processes` during replay.
   * Only hand-written dumps carry one: the dumper always leaves it absent.
   */
  startCommand: StartCommand

  /** Foreground command as tmux reports it (informational) */
  currentCommand: string

  /** Processes on the pane's tty, controlling process first */
  processes: ProcessRecord[]
}

/**
 * One tmux window
 */
export interface WindowDump {
  /** tmux window id (@n) at dump time */
  id?: string

  index: number

  name: string

  /** Exactly one window per dump is active */
  active: boolean

  zoomed: boolean

  /** automatic-rename option: "on", "off" or "" when unknown */
  automaticRename: string

  /** Opaque layout string understood by select-layout */
  layout: string

  size?: Size

  /** Panes in creation order */
  panes: PaneDump[]
}

/**
 * Topology of one tmux session
 */
export interface SessionDump {
  /** tmux session id ($n) at dump time */
  id?: string

  /** Session name; needed to pick a restore target outside tmux */
  name?: string

  /** Creation time, epoch seconds */
  created?: number

  attached: boolean

  size?: Size

  /** Windows in creation order */
  windows: WindowDump[]
}
