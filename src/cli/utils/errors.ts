import chalk from 'chalk'
import { TBoxError } from '../../utils/errors'
import { TmuxError } from '../../utils/tmux'
import { Output } from './output'

/**
 * CLI Error Handler
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public exitCode: number = 1
  ) {
    super(message)
    this.name = 'CLIError'
  }
}

/**
 * 2 for bad input (missing name outside tmux, malformed dump), 1 otherwise
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CLIError) return error.exitCode
  if (error instanceof TBoxError) return error.kind === 'InvalidInput' ? 2 : 1
  return 1
}

/**
 * Handle CLI errors
 */
export function handleError(error: unknown): never {
  if (error instanceof CLIError || error instanceof TBoxError) {
    Output.error(error.message)
    process.exit(exitCodeFor(error))
  }

  if (error instanceof TmuxError) {
    Output.error(error.message)
    if (error.stderr) console.error(chalk.gray(error.stderr))
    process.exit(1)
  }

  if (error instanceof Error) {
    Output.error(`Unexpected error: ${error.message}`)
    console.error(chalk.gray(error.stack))
    process.exit(1)
  }

  Output.error('An unknown error occurred')
  process.exit(1)
}

/**
 * Parse a non-negative number of seconds from an option value
 */
export function parseSeconds(value: string): number {
  const seconds = Number(value)
  if (!value.trim() || !Number.isFinite(seconds) || seconds < 0) {
    throw new CLIError(`Invalid number of seconds: ${value}`, 2)
  }
  return seconds
}
