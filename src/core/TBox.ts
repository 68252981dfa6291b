import type { ArchiveEntry, MergedSessionView, SessionDump } from '../models'
import { InvalidInputError, NotFoundError } from '../utils/errors'
import { execaRunner, type CommandRunner } from '../utils/exec'
import { logger } from '../utils/logger'
import { TmuxCommands } from '../utils/tmux'
import { ArchiveStore } from './ArchiveStore'
import { runAutosave, type AutosaveReport } from './AutosaveThrottler'
import { ForegroundCommandPolicy, type CommandReplayPolicy } from './CommandReplay'
import type { TBoxConfig } from './Config'
import { formatPreview } from './Preview'
import { ForegroundFirstPolicy, ProcessInspector, type ProcessOrderPolicy } from './ProcessInspector'
import type { Selector } from './selector'
import { mergeSessions } from './SessionMerger'
import { TopologyDumper } from './TopologyDumper'
import { TopologyRestorer, type RestoreOptions, type RestoreResult } from './TopologyRestorer'

export const AUTOSAVE_GUARD_ENV = 'TBOX_AUTOSAVE_IN_PROGRESS'

export interface TBoxOptions {
  config: TBoxConfig
  runner?: CommandRunner
  env?: NodeJS.ProcessEnv
  replayPolicy?: CommandReplayPolicy
  orderPolicy?: ProcessOrderPolicy
}

export interface ActivateOptions {
  runCommands?: boolean
  /**
   * Restore an archived session under a fresh name (`name(1)`...) when its own
   * name is taken. A live session is always switched to.
   */
  newSession?: boolean
}

export type SelectOutcome =
  | { kind: 'cancelled' }
  | { kind: 'dropped'; entry: ArchiveEntry }
  | { kind: 'switched'; session: string }
  | { kind: 'restored'; result: RestoreResult }

/**
 * tmux-box
 * Saves tmux sessions to an archive directory and brings them back
 */
export class TBox {
  readonly tmux: TmuxCommands
  readonly store: ArchiveStore
  readonly dumper: TopologyDumper
  readonly restorer: TopologyRestorer
  private readonly env: NodeJS.ProcessEnv

  constructor(private readonly options: TBoxOptions) {
    const runner = options.runner ?? execaRunner
    this.env = options.env ?? process.env
    this.tmux = new TmuxCommands(runner, this.env)
    this.store = new ArchiveStore(options.config.storeDir)
    this.dumper = new TopologyDumper(this.tmux, new ProcessInspector(runner, options.orderPolicy ?? new ForegroundFirstPolicy()))
    this.restorer = new TopologyRestorer(this.tmux, options.replayPolicy ?? new ForegroundCommandPolicy())
  }

  get config(): TBoxConfig {
    return this.options.config
  }

  /**
   * `name`, or the session this process runs in
   */
  async resolveSessionName(name?: string): Promise<string> {
    const target = name?.trim() || (await this.tmux.currentSessionName())
    if (!target) throw new InvalidInputError('name is required when not inside tmux', 'session')
    return target
  }

  // --- ARCHIVE ---

  async dump(name?: string): Promise<SessionDump> {
    return this.dumper.dump(name)
  }

  /**
   * Dump a live session into the archive
   */
  async save(name?: string): Promise<ArchiveEntry> {
    const target = await this.resolveSessionName(name)
    const dump = await this.dumper.dump(target)
    const entry = await this.store.save(target, dump)
    logger.info(`Saved ${target} to ${entry.path}`)
    return entry
  }

  async drop(name?: string): Promise<ArchiveEntry> {
    const target = await this.resolveSessionName(name)
    return this.store.delete(target)
  }

  async listArchives(): Promise<ArchiveEntry[]> {
    return this.store.list()
  }

  /**
   * Live sessions and archives, one view per name
   */
  async listAll(): Promise<MergedSessionView[]> {
    const [live, archived] = await Promise.all([this.tmux.listSessions(), this.store.list()])
    return mergeSessions(live, archived)
  }

  /**
   * Outline of an archived session, null when nothing is stored under `name`
   */
  async preview(name: string): Promise<string | null> {
    const entry = await this.store.find(name)
    if (!entry) return null
    return formatPreview(await this.store.load(name), entry.name)
  }

  // --- AUTOSAVE ---

  /**
   * Save every named live session unless the last run is more recent than
   * `throttleSeconds`. Does nothing when started from inside another autosave.
   */
  async autosave(throttleSeconds = this.config.throttleSeconds, now = Date.now() / 1000): Promise<AutosaveReport> {
    if (this.env[AUTOSAVE_GUARD_ENV] === '1') {
      logger.debug('Autosave already in progress')
      return { skipped: true, saved: [], failed: [] }
    }

    const lastRun = await this.store.readAutosaveStamp()
    // processes started from here inherit the guard
    this.env[AUTOSAVE_GUARD_ENV] = '1'
    try {
      return await runAutosave(
        { throttleSeconds, lastRun, now },
        {
          writeStamp: (ts) => this.store.writeAutosaveStamp(ts),
          listSessions: async () => (await this.tmux.listSessions()).map((s) => s.name),
          saveSession: async (name) => {
            await this.save(name)
          },
        }
      )
    } finally {
      delete this.env[AUTOSAVE_GUARD_ENV]
    }
  }

  // --- RESTORE ---

  async restore(dump: SessionDump, options: RestoreOptions = {}): Promise<RestoreResult> {
    return this.restorer.restore(dump, { ...options, runCommands: options.runCommands ?? this.config.runCommands })
  }

  /**
   * Switch to a live session, or restore an archived one and attach to it
   */
  async activate(view: MergedSessionView, options: ActivateOptions = {}): Promise<SelectOutcome> {
    if (view.origin === 'LIVE') {
      await this.tmux.attachOrSwitch(view.name)
      return { kind: 'switched', session: view.name }
    }

    if (!view.archive) {
      throw new NotFoundError(`no archive for session '${view.name}'`, view.name)
    }

    const dump = await this.store.load(view.name)
    const sessionName = options.newSession ? await this.tmux.uniqueSessionName(view.name) : view.name
    const result = await this.restore(dump, { sessionName, runCommands: options.runCommands })
    return { kind: 'restored', result }
  }

  /**
   * Pick a session (by name, or through `selector`) and act on it
   */
  async select(selector: Selector, name?: string, options: ActivateOptions = {}): Promise<SelectOutcome> {
    const views = await this.listAll()
    if (views.length === 0) {
      throw new NotFoundError('no sessions (live or stored)', this.store.dir)
    }

    if (name) {
      const view = views.find((v) => v.name === name)
      if (!view) throw new NotFoundError(`no session named '${name}'`, name)
      return this.activate(view, options)
    }

    const selection = await selector.select(views, 'Select session')
    if (selection.kind === 'none') return { kind: 'cancelled' }

    if (selection.action === 'drop') {
      const entry = await this.store.delete(selection.view.name)
      return { kind: 'dropped', entry }
    }
    return this.activate(selection.view, options)
  }
}
