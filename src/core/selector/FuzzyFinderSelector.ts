import type { MergedSessionView } from '../../models'
import { execaRunner, type CommandRunner } from '../../utils/exec'
import { logger } from '../../utils/logger'
import { formatSelectorLines, NO_SELECTION, selectorKey, type Selection, type Selector } from './Selector'

export const DROP_KEY = 'ctrl-d'

/**
 * Map fzf/sk output back to a view. With `--expect` the first line is the
 * key that ended the search (empty for enter, dropped here).
 */
export function parseFinderOutput(stdout: string, views: MergedSessionView[]): Selection {
  const lines = stdout.split('\n').filter((line) => line.trim())
  if (lines.length === 0) return NO_SELECTION

  let key = ''
  let selected = lines[0]
  if (lines.length > 1) {
    key = lines[0].trim()
    selected = lines[1]
  }

  const rawName = (selected.split('\t')[4] ?? '').trim()
  const view = views.find((v) => selectorKey(v.name).trim() === rawName)
  if (!view) return NO_SELECTION
  return { kind: 'chosen', view, action: key === DROP_KEY ? 'drop' : 'activate' }
}

/**
 * fzf or skim (both take the same flags)
 */
export class FuzzyFinderSelector implements Selector {
  constructor(
    readonly name: 'fzf' | 'sk',
    /** Shell command prefix that prints an archive preview, e.g. `tbox preview` */
    private readonly previewCommand: string,
    private readonly runner: CommandRunner = execaRunner
  ) {}

  buildArgs(prompt: string): string[] {
    return [
      '--prompt',
      `${prompt}: `,
      '--header',
      `enter=switch/restore, ${DROP_KEY}=drop-archive`,
      '--expect',
      DROP_KEY,
      '--with-nth',
      '1,2,3,4',
      '--delimiter',
      '\t',
      '--preview',
      `${this.previewCommand} {5}`,
      '--preview-window',
      'up,50%',
    ]
  }

  async select(views: MergedSessionView[], prompt: string): Promise<Selection> {
    if (views.length === 0) return NO_SELECTION

    const input = `${formatSelectorLines(views).join('\n')}\n`
    const result = await this.runner(this.name, this.buildArgs(prompt), { input, inheritStderr: true })
    // 1: no match, 130: interrupted with esc/ctrl-c
    if (result.exitCode !== 0) {
      logger.debug(`${this.name} exited ${result.exitCode}`)
      return NO_SELECTION
    }
    return parseFinderOutput(result.stdout, views)
  }
}
