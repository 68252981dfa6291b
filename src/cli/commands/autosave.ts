import { Command } from 'commander'
import { Output } from '../utils/output'
import { CLIError, handleError, parseSeconds } from '../utils/errors'
import { createTBox } from '../utils/context'
import { autosaveFailed } from '../../core/AutosaveThrottler'

interface AutosaveOptions {
  quiet?: boolean
  throttleSeconds?: number
}

export function autosaveCommand(program: Command) {
  program
    .command('autosave')
    .description('Save every named live session, at most once per throttle window')
    .option('-q, --quiet', 'Print nothing on success')
    .option('--throttle-seconds <seconds>', 'Minimum time between two runs', parseSeconds)
    .action(async (options: AutosaveOptions) => {
      try {
        const tbox = await createTBox()
        const report = await tbox.autosave(options.throttleSeconds ?? tbox.config.throttleSeconds)

        if (report.skipped) return

        if (autosaveFailed(report)) {
          throw new CLIError(`Autosave failed for all ${report.failed.length} session(s)`)
        }
        if (!options.quiet) Output.success(`Autosaved ${report.saved.length} session(s)`)
      } catch (error) {
        handleError(error)
      }
    })
}
