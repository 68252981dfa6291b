import execa from 'execa'

export interface RunOptions {
  /** Text fed to the child's stdin */
  input?: string
  /** Hand the terminal to the child (attach-session) */
  interactive?: boolean
  /** Let the child draw on stderr while stdout is captured (fzf) */
  inheritStderr?: boolean
  env?: NodeJS.ProcessEnv
}

export interface RunResult {
  stdout: string
  stderr: string
  exitCode: number
}

/**
 * Every external process goes through a runner, so the tmux layer, the
 * process inspector and the fuzzy finder can run against in-process fakes.
 * A runner never throws for a non-zero exit; callers inspect `exitCode`.
 */
export type CommandRunner = (file: string, args: string[], options?: RunOptions) => Promise<RunResult>

export const execaRunner: CommandRunner = async (file, args, options = {}) => {
  const env = options.env ? { ...process.env, ...options.env } : undefined

  if (options.interactive) {
    const result = await execa(file, args, { stdio: 'inherit', reject: false, env })
    return { stdout: '', stderr: '', exitCode: result.exitCode ?? 127 }
  }

  const result = await execa(file, args, {
    input: options.input,
    stderr: options.inheritStderr ? 'inherit' : 'pipe',
    reject: false,
    stripFinalNewline: false,
    env,
  })

  return {
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    // execa leaves exitCode unset when the binary could not be spawned
    exitCode: result.exitCode ?? 127,
  }
}

/**
 * Check whether a binary is on PATH
 */
export async function isCommandAvailable(
  name: string,
  runner: CommandRunner = execaRunner
): Promise<boolean> {
  const { exitCode } = await runner('which', [name])
  return exitCode === 0
}
