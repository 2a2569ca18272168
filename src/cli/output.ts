/**
 * User-facing terminal output: short, no timestamps.
 *
 * Diagnostics go through shared/logger.ts instead.
 */

import chalk from 'chalk'

/** Goes to stderr so a --json report on stdout stays parseable */
export function warn(message: string): void {
  console.error(chalk.yellow('!'), message)
}

export function header(title: string): void {
  console.log()
  console.log(chalk.bold(title))
  console.log(chalk.dim('─'.repeat(Math.min(title.length + 4, 40))))
}

export interface TableColumn {
  key: string
  header: string
  width?: number
}

export function table<T extends Record<string, unknown>>(data: T[], columns: TableColumn[]): void {
  if (data.length === 0) {
    console.log(chalk.dim('  (none)'))
    return
  }

  const widths = columns.map(col => {
    if (col.width) return col.width
    const maxDataLen = Math.max(...data.map(row => String(row[col.key] ?? '').length))
    return Math.max(col.header.length, maxDataLen)
  })

  const headerRow = columns
    .map((col, i) => chalk.bold(col.header.padEnd(widths[i] ?? col.header.length)))
    .join('  ')
  console.log('  ' + headerRow)
  console.log('  ' + chalk.dim(widths.map(w => '─'.repeat(w)).join('──')))

  for (const row of data) {
    const rowStr = columns
      .map((col, i) => {
        const width = widths[i] ?? 10
        return String(row[col.key] ?? '').padEnd(width)
      })
      .join('  ')
    console.log('  ' + rowStr)
  }
}
