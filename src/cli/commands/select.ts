import { Command } from 'commander'
import { createSelector } from '../../core/selector'
import type { SelectOutcome } from '../../core/TBox'
import { Output } from '../utils/output'
import { handleError } from '../utils/errors'
import { createTBox, selfCommand } from '../utils/context'

interface SelectOptions {
  new?: boolean
  runCommands?: boolean
}

function report(outcome: SelectOutcome) {
  switch (outcome.kind) {
    case 'cancelled':
      return
    case 'dropped':
      Output.success(`Removed session '${outcome.entry.name}'`)
      return
    case 'switched':
      return
    case 'restored':
      if (!outcome.result.attached) {
        Output.success(`Restored session '${outcome.result.session}'`)
      }
      return
  }
}

export function selectCommand(program: Command) {
  program
    .command('select [name]')
    .description('Pick a live or archived session: switch to it, restore it, or drop its archive')
    .option('-n, --new', 'Restore archived sessions into a new tmux session')
    .option('--run-commands', 'Relaunch the commands recorded in each pane')
    .option('--no-run-commands', 'Restore panes with a plain shell')
    .action(async (name: string | undefined, options: SelectOptions) => {
      try {
        const tbox = await createTBox()
        const selector = await createSelector({
          override: tbox.config.selector,
          previewCommand: `${selfCommand()} preview`,
        })

        const outcome = await tbox.select(selector, name, {
          newSession: options.new,
          runCommands: options.runCommands,
        })
        report(outcome)
      } catch (error) {
        handleError(error)
      }
    })
}
