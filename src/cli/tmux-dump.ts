#!/usr/bin/env node

import { Command } from 'commander'
import path from 'path'
import { serializeDump } from '../core/DumpCodec'
import { writeFileAtomic } from '../utils/fs'
import { Output } from './utils/output'
import { handleError } from './utils/errors'
import { createTBox, packageVersion } from './utils/context'

interface DumpOptions {
  session?: string
  pretty?: boolean
}

const program = new Command()

program
  .name('tmux-dump')
  .description('Write the topology of a tmux session as JSON')
  .version(packageVersion())
  .argument('[output]', 'File to write, - for stdout', '-')
  .option('-s, --session <name>', 'Session to dump (default: current, attached, then first)')
  .option('--pretty', 'Indent the JSON')
  .action(async (output: string, options: DumpOptions) => {
    try {
      const tbox = await createTBox()
      const dump = await tbox.dump(options.session)
      const text = `${serializeDump(dump, options.pretty)}\n`

      if (output === '-') {
        Output.raw(text)
        return
      }
      await writeFileAtomic(path.resolve(output), text)
    } catch (error) {
      handleError(error)
    }
  })

program.parseAsync().catch(handleError)
