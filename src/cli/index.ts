#!/usr/bin/env node

import { Command } from 'commander'
import { saveCommand } from './commands/save'
import { autosaveCommand } from './commands/autosave'
import { selectCommand } from './commands/select'
import { dropCommand } from './commands/drop'
import { listCommand } from './commands/list'
import { previewCommand } from './commands/preview'
import { inspectCommand } from './commands/inspect'
import { snippetCommand } from './commands/snippet'
import { handleError } from './utils/errors'
import { packageVersion } from './utils/context'

const program = new Command()

program
  .name('tbox')
  .description('tmux-box: save, restore and switch tmux sessions')
  .version(packageVersion())

// Register commands
saveCommand(program)
autosaveCommand(program)
selectCommand(program)
dropCommand(program)
listCommand(program)
previewCommand(program)
inspectCommand(program)
snippetCommand(program)

// Parse arguments
program.parseAsync().catch(handleError)
