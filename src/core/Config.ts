import fs from 'fs-extra'
import path from 'path'
import { z } from 'zod'
import { errorMessage } from '../utils/errors'
import { logger, LogLevel, parseLogLevel } from '../utils/logger'
import { expandHome, resolveConfigPath, resolveStoreDir } from '../utils/paths'

export const DEFAULT_THROTTLE_SECONDS = 3

/**
 * Settings after merging environment, config file and defaults
 */
export interface TBoxConfig {
  storeDir: string
  configPath: string
  /** Selector override (`fzf`, `sk`, `prompt`...), null to detect one */
  selector: string | null
  runCommands: boolean
  throttleSeconds: number
  logLevel: LogLevel
  logFile: string | null
}

const ConfigFileSchema = z.object({
  storeDir: z.string().min(1).optional(),
  selector: z.string().min(1).optional(),
  runCommands: z.boolean().optional(),
  throttleSeconds: z.number().nonnegative().optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  logFile: z.string().min(1).optional(),
})

export type ConfigFile = z.infer<typeof ConfigFileSchema>

/**
 * Read the optional JSON config file. A missing file is an empty config; a
 * malformed one is reported and ignored.
 */
export async function loadConfigFile(configPath: string): Promise<ConfigFile> {
  if (!(await fs.pathExists(configPath))) return {}
  try {
    const parsed = ConfigFileSchema.safeParse(await fs.readJson(configPath))
    if (parsed.success) {
      logger.debug(`Loaded config from ${configPath}`)
      return parsed.data
    }
    const issue = parsed.error.issues[0]
    logger.warn(`Ignoring config ${configPath}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`)
  } catch (error) {
    logger.warn(`Ignoring config ${configPath}: ${errorMessage(error)}`)
  }
  return {}
}

function envBoolean(name: string, value: string | undefined): boolean | undefined {
  const normalized = value?.trim().toLowerCase()
  if (!normalized) return undefined
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  logger.warn(`Ignoring ${name}=${value}: expected 0 or 1`)
  return undefined
}

function envSeconds(name: string, value: string | undefined): number | undefined {
  if (!value?.trim()) return undefined
  const seconds = Number(value)
  if (Number.isFinite(seconds) && seconds >= 0) return seconds
  logger.warn(`Ignoring ${name}=${value}: expected a non-negative number`)
  return undefined
}

/**
 * Environment wins over the config file, which wins over defaults
 */
export async function resolveConfig(env: NodeJS.ProcessEnv = process.env): Promise<TBoxConfig> {
  const configPath = resolveConfigPath(env)
  const file = await loadConfigFile(configPath)

  let storeDir = resolveStoreDir(env)
  if (!env.TBOX_DIR?.trim() && file.storeDir) {
    storeDir = path.resolve(expandHome(file.storeDir))
  }

  const envLevel = env.TBOX_LOG_LEVEL?.trim() ? parseLogLevel(env.TBOX_LOG_LEVEL) : null
  if (env.TBOX_LOG_LEVEL?.trim() && envLevel === null) {
    logger.warn(`Ignoring TBOX_LOG_LEVEL=${env.TBOX_LOG_LEVEL}`)
  }

  const logFile = env.TBOX_LOG_FILE?.trim() || file.logFile

  return {
    storeDir,
    configPath,
    selector: env.TBOX_SELECTOR?.trim() || file.selector || null,
    runCommands: envBoolean('TBOX_RUN_COMMANDS', env.TBOX_RUN_COMMANDS) ?? file.runCommands ?? true,
    throttleSeconds:
      envSeconds('TBOX_THROTTLE_SECONDS', env.TBOX_THROTTLE_SECONDS) ??
      file.throttleSeconds ??
      DEFAULT_THROTTLE_SECONDS,
    logLevel: envLevel ?? parseLogLevel(file.logLevel) ?? LogLevel.WARN,
    logFile: logFile ? path.resolve(expandHome(logFile)) : null,
  }
}

/**
 * Point the shared logger at the configured level and file
 */
export function applyLogging(config: TBoxConfig): void {
  logger.setLevel(config.logLevel)
  logger.setLogFile(config.logFile)
}
