import readline from 'readline'
import type { MergedSessionView } from '../../models'
import { formatMtime, NO_SELECTION, windowsLabel, type Selection, type Selector } from './Selector'

/**
 * Queues input lines so answers typed (or piped) ahead of a question are
 * not lost.
 */
class LineReader {
  private readonly rl: readline.Interface
  private readonly lines: string[] = []
  private readonly waiters: ((line: string | null) => void)[] = []
  private closed = false

  constructor(input: NodeJS.ReadableStream, private readonly output: NodeJS.WritableStream) {
    this.rl = readline.createInterface({ input, terminal: false })
    this.rl.on('line', (line) => {
      const waiter = this.waiters.shift()
      if (waiter) waiter(line)
      else this.lines.push(line)
    })
    this.rl.on('close', () => {
      this.closed = true
      for (const waiter of this.waiters.splice(0)) waiter(null)
    })
  }

  ask(question: string): Promise<string | null> {
    this.output.write(question)
    const queued = this.lines.shift()
    if (queued !== undefined) return Promise.resolve(queued)
    if (this.closed) return Promise.resolve(null)
    return new Promise((resolve) => this.waiters.push(resolve))
  }

  close() {
    this.rl.close()
  }
}

/**
 * Numbered list on the terminal, used when no fuzzy finder is available
 */
export class NumericPromptSelector implements Selector {
  readonly name = 'prompt'

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async select(views: MergedSessionView[], prompt: string): Promise<Selection> {
    if (views.length === 0) return NO_SELECTION

    views.forEach((view, i) => {
      const line = `${i + 1}) ${view.name}  ${view.origin}  ${windowsLabel(view.windowCount, '?w')}  ${formatMtime(view.updatedAt)}`
      this.output.write(`${line.trimEnd()}\n`)
    })

    const reader = new LineReader(this.input, this.output)
    try {
      const answer = (await reader.ask(`${prompt} (number): `))?.trim()
      if (!answer || !/^\d+$/.test(answer)) return NO_SELECTION

      const index = Number.parseInt(answer, 10)
      if (index < 1 || index > views.length) return NO_SELECTION

      const action = (await reader.ask('Action ([s]elect/[d]rop-archive, default s): '))?.trim().toLowerCase() ?? ''
      return { kind: 'chosen', view: views[index - 1], action: action.startsWith('d') ? 'drop' : 'activate' }
    } finally {
      reader.close()
    }
  }
}
