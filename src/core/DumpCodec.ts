import { z } from 'zod'
import type { PaneDump, ProcessRecord, SessionDump, StartCommand, WindowDump } from '../models'
import { InvalidInputError } from '../utils/errors'
import { splitCommandLine } from '../utils/shell'

// Older dumps wrote numbers as strings and flags as 0/1, so the wire schema is lenient.
const Int = z.union([
  z.number().int(),
  z
    .string()
    .trim()
    .regex(/^-?\d+$/)
    .transform((value) => Number.parseInt(value, 10)),
])
const OptInt = Int.optional().catch(undefined)
const Str = z
  .string()
  .nullish()
  .transform((value) => value ?? '')
const Bool = z
  .union([z.boolean(), z.number(), z.string()])
  .nullish()
  .transform((value) => value === true || value === 1 || value === '1' || value === 'true')

const SizeSchema = z.object({ width: OptInt, height: OptInt })

const GeometrySchema = z.object({ width: OptInt, height: OptInt, left: OptInt, top: OptInt })

const ProcessSchema = z.object({
  pid: Int,
  ppid: Int.nullable().optional().catch(null),
  user: Str,
  state: Str,
  etime: Str,
  command: z.union([z.array(z.string()), z.string()]).nullish(),
})

const PaneSchema = z.object({
  id: z.string().optional(),
  index: OptInt,
  title: Str,
  active: Bool,
  dead: Bool,
  geometry: GeometrySchema.optional(),
  tty: z.string().optional(),
  pid: OptInt,
  path: Str,
  start_command: z.union([z.string(), z.array(z.string())]).nullish(),
  current_command: Str,
  processes: z.array(ProcessSchema).nullish(),
})

const WindowSchema = z.object({
  id: z.string().optional(),
  index: OptInt,
  name: Str,
  active: Bool,
  zoomed: Bool,
  automatic_rename: Str,
  panes_count: OptInt,
  layout: Str,
  size: SizeSchema.optional(),
  panes: z.array(PaneSchema).nullish(),
})

const SessionSchema = z.object({
  id: z.string().optional(),
  name: z.string().nullish(),
  session_name: z.string().nullish(),
  created: OptInt,
  attached: Bool,
  windows_count: OptInt,
  size: SizeSchema.optional(),
  windows: z.array(WindowSchema).nullish(),
  error: z.string().optional(),
})

const LegacyWrapperSchema = z.object({ sessions: z.array(SessionSchema) })

export type WireSessionDump = z.input<typeof SessionSchema>
export type WireWindowDump = z.input<typeof WindowSchema>
export type WirePaneDump = z.input<typeof PaneSchema>

type WireSession = z.output<typeof SessionSchema>
type WireWindow = z.output<typeof WindowSchema>
type WirePane = z.output<typeof PaneSchema>
type WireProcess = z.output<typeof ProcessSchema>

function formatIssues(error: z.ZodError): string {
  const issue = error.issues[0]
  if (!issue) return 'unknown validation error'
  const where = issue.path.length ? issue.path.join('.') : '<root>'
  return `${where}: ${issue.message}`
}

function toSize(size: { width?: number; height?: number } | undefined) {
  if (!size || size.width === undefined || size.height === undefined) return undefined
  return { width: size.width, height: size.height }
}

export function toStartCommand(value: string | string[] | null | undefined): StartCommand {
  if (Array.isArray(value)) {
    return value.length ? { kind: 'tokens', tokens: [...value] } : { kind: 'absent' }
  }
  if (typeof value === 'string' && value.trim()) return { kind: 'literal', command: value }
  return { kind: 'absent' }
}

function decodeProcess(wire: WireProcess): ProcessRecord {
  const command = Array.isArray(wire.command) ? wire.command : splitCommandLine(wire.command ?? '')
  return {
    pid: wire.pid,
    ppid: wire.ppid ?? null,
    user: wire.user,
    state: wire.state,
    etime: wire.etime,
    command,
  }
}

function decodePane(wire: WirePane, position: number): PaneDump {
  const pane: PaneDump = {
    index: wire.index ?? position,
    title: wire.title,
    active: wire.active,
    path: wire.path,
    startCommand: toStartCommand(wire.start_command),
    currentCommand: wire.current_command,
    processes: (wire.processes ?? []).map(decodeProcess),
  }
  if (wire.id) pane.id = wire.id
  if (wire.dead) pane.dead = true
  if (wire.tty) pane.tty = wire.tty
  if (wire.pid !== undefined) pane.pid = wire.pid
  const geometry = wire.geometry
  if (geometry && geometry.width !== undefined && geometry.height !== undefined) {
    pane.geometry = {
      width: geometry.width,
      height: geometry.height,
      left: geometry.left ?? 0,
      top: geometry.top ?? 0,
    }
  }
  return pane
}

function decodeWindow(wire: WireWindow, position: number): WindowDump {
  const window: WindowDump = {
    index: wire.index ?? position,
    name: wire.name,
    active: wire.active,
    zoomed: wire.zoomed,
    automaticRename: wire.automatic_rename,
    layout: wire.layout,
    panes: (wire.panes ?? []).map(decodePane),
  }
  if (wire.id) window.id = wire.id
  const size = toSize(wire.size)
  if (size) window.size = size
  return window
}

function decodeSession(wire: WireSession, source: string): SessionDump {
  const windows = wire.windows ?? []
  if (wire.error && windows.length === 0) {
    throw new InvalidInputError(`Dump ${source} records a failed dump: ${wire.error}`, source)
  }
  const dump: SessionDump = {
    attached: wire.attached,
    windows: windows.map(decodeWindow),
  }
  const name = wire.name || wire.session_name
  if (name) dump.name = name
  if (wire.id) dump.id = wire.id
  if (wire.created !== undefined) dump.created = wire.created
  const size = toSize(wire.size)
  if (size) dump.size = size
  return dump
}

/**
 * Decode a parsed JSON value: a session dump or the legacy `{"sessions": [...]}` wrapper
 */
export function decodeDump(raw: unknown, source = '<input>'): SessionDump {
  if (raw && typeof raw === 'object' && !Array.isArray(raw) && 'sessions' in raw) {
    const legacy = LegacyWrapperSchema.safeParse(raw)
    if (!legacy.success) {
      throw new InvalidInputError(`Invalid dump ${source}: ${formatIssues(legacy.error)}`, source)
    }
    const first = legacy.data.sessions[0]
    if (!first) throw new InvalidInputError(`Dump ${source} contains no sessions`, source)
    return decodeSession(first, source)
  }

  const parsed = SessionSchema.safeParse(raw)
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid dump ${source}: ${formatIssues(parsed.error)}`, source)
  }
  return decodeSession(parsed.data, source)
}

/**
 * Parse dump JSON text
 */
export function parseDump(text: string, source = '<input>'): SessionDump {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new InvalidInputError(`Dump ${source} is not valid JSON: ${reason}`, source)
  }
  return decodeDump(raw, source)
}

function encodeStartCommand(command: StartCommand): string | string[] | undefined {
  switch (command.kind) {
    case 'literal':
      return command.command
    case 'tokens':
      return [...command.tokens]
    case 'absent':
      return undefined
  }
}

function encodePane(pane: PaneDump): WirePaneDump {
  const wire: WirePaneDump = {}
  if (pane.id) wire.id = pane.id
  wire.index = pane.index
  wire.title = pane.title
  wire.active = pane.active
  if (pane.dead !== undefined) wire.dead = pane.dead
  if (pane.geometry) wire.geometry = { ...pane.geometry }
  if (pane.tty) wire.tty = pane.tty
  if (pane.pid !== undefined) wire.pid = pane.pid
  wire.path = pane.path
  const startCommand = encodeStartCommand(pane.startCommand)
  if (startCommand !== undefined) wire.start_command = startCommand
  wire.current_command = pane.currentCommand
  wire.processes = pane.processes.map((proc) => ({
    pid: proc.pid,
    ppid: proc.ppid,
    user: proc.user,
    state: proc.state,
    etime: proc.etime,
    command: [...proc.command],
  }))
  return wire
}

function encodeWindow(window: WindowDump): WireWindowDump {
  const wire: WireWindowDump = {}
  if (window.id) wire.id = window.id
  wire.index = window.index
  wire.name = window.name
  wire.active = window.active
  wire.zoomed = window.zoomed
  wire.automatic_rename = window.automaticRename
  wire.panes_count = window.panes.length
  wire.layout = window.layout
  if (window.size) wire.size = { ...window.size }
  wire.panes = window.panes.map(encodePane)
  return wire
}

/**
 * Convert a dump to its JSON wire shape (snake_case keys, stable key order)
 */
export function encodeDump(dump: SessionDump): WireSessionDump {
  const wire: WireSessionDump = {}
  if (dump.id) wire.id = dump.id
  if (dump.name !== undefined) wire.name = dump.name
  if (dump.created !== undefined) wire.created = dump.created
  wire.attached = dump.attached
  wire.windows_count = dump.windows.length
  if (dump.size) wire.size = { ...dump.size }
  wire.windows = dump.windows.map(encodeWindow)
  return wire
}

export function serializeDump(dump: SessionDump, pretty = false): string {
  return JSON.stringify(encodeDump(dump), null, pretty ? 2 : undefined)
}
