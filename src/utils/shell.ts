export function shQuote(arg: string): string {
  if (arg === '') return "''"
  if (/^[A-Za-z0-9_/:=.,+@%-]+$/.test(arg)) return arg
  return `'${arg.replace(/'/g, `'"'"'`)}'`
}

export function shJoin(args: string[]): string {
  return args.map(shQuote).join(' ')
}

/**
 * POSIX shell word splitting (quotes and backslashes, no expansion).
 * Returns null when quoting is unbalanced.
 */
export function shSplit(line: string): string[] | null {
  const words: string[] = []
  let current = ''
  let inWord = false
  let i = 0

  while (i < line.length) {
    const ch = line[i]

    if (ch === "'") {
      const end = line.indexOf("'", i + 1)
      if (end === -1) return null
      current += line.slice(i + 1, end)
      inWord = true
      i = end + 1
      continue
    }

    if (ch === '"') {
      i++
      let closed = false
      while (i < line.length) {
        const c = line[i]
        if (c === '"') {
          closed = true
          i++
          break
        }
        if (c === '\\' && i + 1 < line.length && '$`"\\\n'.includes(line[i + 1])) {
          current += line[i + 1]
          i += 2
          continue
        }
        current += c
        i++
      }
      if (!closed) return null
      inWord = true
      continue
    }

    if (ch === '\\') {
      if (i + 1 >= line.length) return null
      current += line[i + 1]
      inWord = true
      i += 2
      continue
    }

    if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current)
        current = ''
        inWord = false
      }
      i++
      continue
    }

    current += ch
    inWord = true
    i++
  }

  if (inWord) words.push(current)
  return words
}

/**
 * Split a process command line, keeping the raw text as one token when it
 * cannot be parsed.
 */
export function splitCommandLine(line: string): string[] {
  const trimmed = line.trim()
  if (!trimmed) return []
  return shSplit(trimmed) ?? [trimmed]
}

const SHELLS = new Set(['sh', 'bash', 'zsh', 'fish', 'dash', 'ksh', 'mksh', 'tcsh', 'csh', 'nu', 'xonsh', 'elvish', 'ash'])

/**
 * True for argv[0] values such as `bash`, `-zsh` or `/usr/bin/fish`
 */
export function isShellCommand(command: string[] | string): boolean {
  const first = Array.isArray(command) ? command[0] : command.trim().split(/\s+/)[0]
  if (!first) return false
  const base = first.split('/').pop() ?? first
  return SHELLS.has(base.replace(/^-/, ''))
}
