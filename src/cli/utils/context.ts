import fs from 'fs-extra'
import { readFileSync } from 'fs'
import { join } from 'path'
import { applyLogging, resolveConfig } from '../../core/Config'
import { TBox } from '../../core/TBox'
import { NotFoundError } from '../../utils/errors'
import { shQuote } from '../../utils/shell'

/**
 * Version from package.json (same relative path from src/cli and dist/cli)
 */
export function packageVersion(): string {
  const packageJson: { version?: string } = JSON.parse(readFileSync(join(__dirname, '../../../package.json'), 'utf-8'))
  return packageJson.version ?? '0.0.0'
}

/**
 * Resolve configuration, set up logging and build the facade
 */
export async function createTBox(env: NodeJS.ProcessEnv = process.env): Promise<TBox> {
  const config = await resolveConfig(env)
  applyLogging(config)
  return new TBox({ config, env })
}

/**
 * Shell command that runs this same tbox binary (for fzf's preview)
 */
export function selfCommand(): string {
  const script = process.argv[1]
  return script ? `${shQuote(process.execPath)} ${shQuote(script)}` : 'tbox'
}

export async function readStdin(): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk)
  }
  return Buffer.concat(chunks).toString('utf-8')
}

/**
 * Dump text from a file path, or stdin for `-`
 */
export async function readDumpSource(source: string): Promise<string> {
  if (source === '-') return readStdin()
  if (!(await fs.pathExists(source))) throw new NotFoundError(`dump file not found: ${source}`, source)
  return fs.readFile(source, 'utf-8')
}
