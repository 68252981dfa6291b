import { Command } from 'commander'
import { Output } from '../utils/output'
import { handleError } from '../utils/errors'
import { createTBox } from '../utils/context'

export function previewCommand(program: Command) {
  program
    .command('preview <name>')
    .description('Print the windows and panes of an archived session')
    .action(async (name: string) => {
      try {
        const tbox = await createTBox()
        const text = await tbox.preview(name)
        // fzf calls this for live sessions too; no archive is not an error
        Output.raw(text ?? `No archive for session: ${name}`)
      } catch (error) {
        handleError(error)
      }
    })
}
