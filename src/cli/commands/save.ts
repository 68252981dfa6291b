import { Command } from 'commander'
import ora from 'ora'
import { Output } from '../utils/output'
import { handleError } from '../utils/errors'
import { createTBox } from '../utils/context'

export function saveCommand(program: Command) {
  program
    .command('save [name]')
    .description('Save a live session to the archive (default: the current session)')
    .action(async (name: string | undefined) => {
      try {
        const tbox = await createTBox()
        const target = await tbox.resolveSessionName(name)

        const spinner = ora(`Saving ${target}...`).start()
        try {
          await tbox.save(target)
        } catch (error) {
          spinner.fail(`Could not save '${target}'`)
          throw error
        }
        spinner.stop()

        Output.success(`Saved session '${target}'`)
      } catch (error) {
        handleError(error)
      }
    })
}
