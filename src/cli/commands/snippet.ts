import { Command } from 'commander'
import { tmuxSnippet } from '../../core/TmuxSnippet'
import { Output } from '../utils/output'
import { handleError, parseSeconds } from '../utils/errors'
import { createTBox } from '../utils/context'

interface SnippetCommandOptions {
  throttleSeconds?: number
  tboxCommand?: string
}

export function snippetCommand(program: Command) {
  program
    .command('tmux-snippet')
    .description('Print a tmux.conf fragment with autosave hooks and W/X key bindings')
    .option('--throttle-seconds <seconds>', 'Throttle passed to autosave', parseSeconds)
    .option('--tbox-command <command>', 'How tmux should invoke tbox', 'tbox')
    .action(async (options: SnippetCommandOptions) => {
      try {
        const tbox = await createTBox()
        Output.raw(
          tmuxSnippet({
            command: options.tboxCommand?.trim() || 'tbox',
            throttleSeconds: options.throttleSeconds ?? tbox.config.throttleSeconds,
          })
        )
      } catch (error) {
        handleError(error)
      }
    })
}
