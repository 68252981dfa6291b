/**
 * tmux-box
 * Persist tmux session topology and bring it back
 */

// Main API
export { TBox, AUTOSAVE_GUARD_ENV } from './core/TBox'
export type { TBoxOptions, ActivateOptions, SelectOutcome } from './core/TBox'
export { resolveConfig, loadConfigFile, DEFAULT_THROTTLE_SECONDS } from './core/Config'
export type { TBoxConfig } from './core/Config'

// Components
export { TopologyDumper } from './core/TopologyDumper'
export { TopologyRestorer } from './core/TopologyRestorer'
export type { RestoreOptions, RestoreResult, TargetState } from './core/TopologyRestorer'
export { ProcessInspector, ForegroundFirstPolicy, parsePsOutput } from './core/ProcessInspector'
export type { ProcessOrderPolicy, InspectedProcess } from './core/ProcessInspector'
export { ForegroundCommandPolicy, bindToShell } from './core/CommandReplay'
export type { CommandReplayPolicy } from './core/CommandReplay'
export { ArchiveStore, archiveFileName, sanitizeName } from './core/ArchiveStore'
export { mergeSessions } from './core/SessionMerger'
export { runAutosave, shouldRun, isNamedSession, autosaveFailed } from './core/AutosaveThrottler'
export type { AutosaveReport } from './core/AutosaveThrottler'
export { createSelector, FuzzyFinderSelector, NumericPromptSelector } from './core/selector'
export type { Selector, Selection } from './core/selector'
export { parseDump, decodeDump, encodeDump, serializeDump } from './core/DumpCodec'
export { formatPreview } from './core/Preview'
export { tmuxSnippet } from './core/TmuxSnippet'

// Models
export type {
  SessionDump,
  WindowDump,
  PaneDump,
  ProcessRecord,
  StartCommand,
  ArchiveEntry,
  MergedSessionView,
} from './models'

// Utilities
export { logger, LogLevel } from './utils/logger'
export { TmuxCommands, TmuxError } from './utils/tmux'
export type { LiveSession } from './utils/tmux'
export { execaRunner } from './utils/exec'
export type { CommandRunner, RunResult } from './utils/exec'
export * from './utils/errors'
