/**
 * Leveled logger for tmux-box
 *
 * Everything goes to stderr so stdout stays clean for dumps, previews and
 * the lines piped into a fuzzy finder.
 */

import fs from 'fs-extra'
import path from 'path'

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export function parseLogLevel(value: string | undefined): LogLevel | null {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG
    case 'info':
      return LogLevel.INFO
    case 'warn':
    case 'warning':
      return LogLevel.WARN
    case 'error':
      return LogLevel.ERROR
    case 'silent':
    case 'off':
      return LogLevel.SILENT
    default:
      return null
  }
}

class Logger {
  private level: LogLevel = LogLevel.WARN
  private logFilePath: string | null = null

  setLevel(level: LogLevel) {
    this.level = level
  }

  getLevel(): LogLevel {
    return this.level
  }

  setLogFile(filePath: string | null) {
    if (!filePath) {
      this.logFilePath = null
      return
    }
    fs.ensureDirSync(path.dirname(filePath))
    this.logFilePath = filePath
  }

  private writeToFile(level: string, args: unknown[]) {
    if (!this.logFilePath) return

    const timestamp = new Date().toISOString()
    const message = args
      .map((arg) => (arg instanceof Error ? arg.message : typeof arg === 'object' ? JSON.stringify(arg) : String(arg)))
      .join(' ')

    try {
      fs.appendFileSync(this.logFilePath, `${timestamp} [${level}] ${message}\n`)
    } catch (error) {
      const failedPath = this.logFilePath
      this.logFilePath = null
      console.error('[WARN]', `log file disabled, cannot write ${failedPath}:`, error)
    }
  }

  debug(...args: unknown[]) {
    if (this.level <= LogLevel.DEBUG) {
      console.error('[DEBUG]', ...args)
      this.writeToFile('DEBUG', args)
    }
  }

  info(...args: unknown[]) {
    if (this.level <= LogLevel.INFO) {
      console.error('[INFO]', ...args)
      this.writeToFile('INFO', args)
    }
  }

  warn(...args: unknown[]) {
    if (this.level <= LogLevel.WARN) {
      console.error('[WARN]', ...args)
      this.writeToFile('WARN', args)
    }
  }

  error(...args: unknown[]) {
    if (this.level <= LogLevel.ERROR) {
      console.error('[ERROR]', ...args)
      this.writeToFile('ERROR', args)
    }
  }
}

export const logger = new Logger()
