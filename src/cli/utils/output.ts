import chalk from 'chalk'
import Table from 'cli-table3'
import type { ArchiveEntry, MergedSessionView } from '../../models'
import { formatMtime, windowsLabel } from '../../core/selector'

/**
 * Output utilities for CLI
 */
export class Output {
  /**
   * Success message
   */
  static success(message: string) {
    console.log(chalk.green('✓'), message)
  }

  /**
   * Error message
   */
  static error(message: string) {
    console.error(chalk.red('✗'), message)
  }

  /**
   * Warning message
   */
  static warn(message: string) {
    console.warn(chalk.yellow('⚠'), message)
  }

  /**
   * Info message
   */
  static info(message: string) {
    console.log(chalk.blue('ℹ'), message)
  }

  /**
   * Header
   */
  static header(message: string) {
    console.log('\n' + chalk.bold.cyan(message))
    console.log(chalk.gray('─'.repeat(message.length)))
  }

  /**
   * Display sessions table
   */
  static sessionsTable(views: MergedSessionView[], verbose = false) {
    if (views.length === 0) {
      this.warn('No sessions')
      return
    }

    const head = [chalk.bold('Name'), chalk.bold('Status'), chalk.bold('Windows'), chalk.bold('Saved')]
    if (verbose) head.push(chalk.bold('Archive'))
    const table = new Table({ head })

    for (const view of views) {
      const statusColor = view.origin === 'LIVE' ? chalk.green : chalk.yellow
      const row = [view.name, statusColor(view.origin), windowsLabel(view.windowCount), formatMtime(view.updatedAt)]
      if (verbose) row.push(chalk.gray(view.archive?.path ?? ''))
      table.push(row)
    }

    console.log(table.toString())
  }

  /**
   * Archive files with the name recorded in each
   */
  static archivesTable(entries: ArchiveEntry[]) {
    if (entries.length === 0) {
      this.warn('No archives')
      return
    }

    const table = new Table({
      head: [chalk.bold('Name'), chalk.bold('Windows'), chalk.bold('Modified'), chalk.bold('File')],
    })
    for (const entry of entries) {
      table.push([entry.name, windowsLabel(entry.windowCount), formatMtime(entry.mtime), chalk.gray(entry.path)])
    }
    console.log(table.toString())
  }

  /**
   * Display JSON output
   */
  static json(data: unknown) {
    console.log(JSON.stringify(data, null, 2))
  }

  /**
   * Text exactly as given (previews, snippets, dumps)
   */
  static raw(text: string) {
    process.stdout.write(text.endsWith('\n') ? text : `${text}\n`)
  }
}
