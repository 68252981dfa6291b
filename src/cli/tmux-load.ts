#!/usr/bin/env node

import { Command } from 'commander'
import { parseDump } from '../core/DumpCodec'
import { Output } from './utils/output'
import { handleError } from './utils/errors'
import { createTBox, packageVersion, readDumpSource } from './utils/context'

interface LoadOptions {
  session?: string
  force?: boolean
  append?: boolean
  baseDir?: string
  runCommands?: boolean
  attach: boolean
}

const program = new Command()

program
  .name('tmux-load')
  .description('Rebuild tmux windows and panes from a JSON dump')
  .version(packageVersion())
  .argument('[file]', 'Dump file, - for stdin', '-')
  .option('-s, --session <name>', 'Restore into this session instead of the one the dump names')
  .option('-f, --force', 'Replace the windows of a non-empty target session')
  .option('-a, --append', 'Add windows after those of a non-empty target session')
  .option('--base-dir <dir>', 'Working directory for the panes of the first window')
  .option('--run-commands', 'Relaunch the commands recorded in each pane')
  .option('--no-run-commands', 'Restore panes with a plain shell')
  .option('--no-attach', 'Do not switch or attach to the restored session')
  .action(async (file: string, options: LoadOptions) => {
    try {
      const tbox = await createTBox()
      const dump = parseDump(await readDumpSource(file), file === '-' ? '<stdin>' : file)

      const result = await tbox.restore(dump, {
        sessionName: options.session,
        force: options.force,
        append: options.append,
        baseDir: options.baseDir,
        runCommands: options.runCommands,
        attach: options.attach,
      })

      if (!result.attached) {
        Output.success(`Restored ${result.windowsCreated} window(s) into '${result.session}'`)
      }
    } catch (error) {
      handleError(error)
    }
  })

program.parseAsync().catch(handleError)
