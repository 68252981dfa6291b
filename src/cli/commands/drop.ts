import { Command } from 'commander'
import { Output } from '../utils/output'
import { handleError } from '../utils/errors'
import { createTBox } from '../utils/context'

export function dropCommand(program: Command) {
  program
    .command('drop [name]')
    .description('Delete the archived copy of a session (default: the current session)')
    .action(async (name: string | undefined) => {
      try {
        const tbox = await createTBox()
        const entry = await tbox.drop(name)
        Output.success(`Removed session '${entry.name}'`)
      } catch (error) {
        handleError(error)
      }
    })
}
