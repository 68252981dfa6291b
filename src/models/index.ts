export type {
  StartCommand,
  Size,
  Geometry,
  ProcessRecord,
  PaneDump,
  WindowDump,
  SessionDump,
} from './Dump'
export type { ArchiveEntry, SessionOrigin, MergedSessionView } from './Archive'
