#!/usr/bin/env node
/**
 * @entry hostward CLI
 *
 *   hostward              - audit (read-only, default)
 *   hostward --apply      - audit, then remediate (root only)
 *   hostward list         - show the check catalog
 */

import { Command } from 'commander'
import { executeHarden, type HardenOptions } from './commands/harden.js'
import { registerListCommand } from './commands/list.js'

const program = new Command()

program
  .name('hostward')
  .description('Audit and harden the security posture of a Linux host')
  .version('0.1.0')
  .option('--audit', 'Read-only audit, no changes (default)')
  .option('--apply', 'Remediate failing checks; requires root')
  .option('-y, --yes', 'Accept every confirmation prompt')
  .option('-c, --config <path>', 'Config file (default: ~/.hostward.yaml + ./.hostward.yaml)')
  .option('--json', 'Print the report as JSON')
  .option('-v, --verbose', 'Debug logging')
  .action(async (options: HardenOptions) => {
    process.exitCode = await executeHarden(options)
  })

registerListCommand(program)

await program.parseAsync()
