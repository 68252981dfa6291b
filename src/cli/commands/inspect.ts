import { Command } from 'commander'
import fs from 'fs-extra'
import chalk from 'chalk'
import { NotFoundError } from '../../utils/errors'
import { Output } from '../utils/output'
import { handleError } from '../utils/errors'
import { createTBox } from '../utils/context'

export function inspectCommand(program: Command) {
  program
    .command('inspect [name]')
    .description('Show the archive directory, or the stored JSON of one session')
    .action(async (name: string | undefined) => {
      try {
        const tbox = await createTBox()

        if (name) {
          const entry = await tbox.store.find(name)
          if (!entry) throw new NotFoundError(`no stored session named '${name}' in ${tbox.store.dir}`, name)
          Output.raw(await fs.readFile(entry.path, 'utf-8'))
          return
        }

        Output.header('tmux-box archive')
        console.log(`${chalk.gray('Directory:')} ${tbox.store.dir}`)
        console.log(`${chalk.gray('Config:')} ${tbox.config.configPath}`)
        const stamp = await tbox.store.readAutosaveStamp()
        console.log(`${chalk.gray('Last autosave:')} ${stamp === null ? 'never' : new Date(stamp * 1000).toLocaleString()}`)
        console.log()
        Output.archivesTable(await tbox.listArchives())
      } catch (error) {
        handleError(error)
      }
    })
}
