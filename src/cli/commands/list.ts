import { Command } from 'commander'
import { loadConfig } from '../../config/index.js'
import { CATEGORY_LABELS, buildRegistry, groupByCategory } from '../../hardening/index.js'
import { printError } from '../../shared/index.js'
import { header, table } from '../output.js'

export function registerListCommand(program: Command) {
  program
    .command('list')
    .alias('ls')
    .description('List the checks in evaluation order')
    .option('-c, --config <path>', 'Config file (default: ~/.hostward.yaml + ./.hostward.yaml)')
    .action(async (options: { config?: string }) => {
      try {
        const config = await loadConfig({ path: options.config })
        const checks = buildRegistry(config)
        for (const group of groupByCategory(checks)) {
          header(CATEGORY_LABELS[group.category])
          table(
            group.items.map(check => ({
              id: check.id,
              title: check.title,
              fix: check.remediate ? (check.requiresConfirmation ? 'confirm' : 'auto') : '-',
            })),
            [
              { key: 'id', header: 'ID' },
              { key: 'title', header: 'Title' },
              { key: 'fix', header: 'Fix' },
            ]
          )
        }
      } catch (error) {
        printError(error instanceof Error ? error : String(error))
        process.exitCode = 1
      }
    })
}
