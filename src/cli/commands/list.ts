import { Command } from 'commander'
import type { MergedSessionView } from '../../models'
import { Output } from '../utils/output'
import { handleError } from '../utils/errors'
import { createTBox } from '../utils/context'

interface ListOptions {
  verbose?: boolean
  all?: boolean
  json?: boolean
}

function toJson(view: MergedSessionView) {
  return {
    name: view.name,
    origin: view.origin,
    windows: view.windowCount,
    updatedAt: view.updatedAt?.toISOString() ?? null,
    archive: view.archive?.path ?? null,
  }
}

export function listCommand(program: Command) {
  program
    .command('list')
    .description('List archived sessions')
    .option('-v, --verbose', 'Show archive file paths')
    .option('--all', 'Include live sessions')
    .option('-j, --json', 'Output as JSON')
    .action(async (options: ListOptions) => {
      try {
        const tbox = await createTBox()
        const views: MergedSessionView[] = options.all
          ? await tbox.listAll()
          : (await tbox.listArchives()).map((entry) => ({
              name: entry.name,
              origin: 'ARCH',
              windowCount: entry.windowCount,
              updatedAt: entry.mtime,
              archive: entry,
            }))

        if (options.json) {
          Output.json(views.map(toJson))
          return
        }
        Output.sessionsTable(views, options.verbose)
      } catch (error) {
        handleError(error)
      }
    })
}
