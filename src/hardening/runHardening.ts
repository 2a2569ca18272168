import type { Config } from '../config/schema.js'
import type { CommandRunner } from '../host/commandRunner.js'
import { createLogger } from '../shared/logger.js'
import { BackupManager } from './backup.js'
import type { Confirmer } from './confirm.js'
import { evaluateAll, evaluateCheck } from './evaluator.js'
import { assertModePreconditions } from './mode.js'
import { buildRegistry } from './registry.js'
import { remediateAll } from './remediator.js'
import { summarize } from './reporter.js'
import type { Check, CheckContext, CheckResult, Mode, RunReport } from './types.js'

const logger = createLogger('hardening')

export interface RunHardeningOptions {
  mode: Mode
  privileged: boolean
  config: Config
  runner: CommandRunner
  confirmer: Confirmer
  /** Defaults to a manager built from config.backup */
  backups?: BackupManager
  /** Defaults to buildRegistry(config) */
  checks?: readonly Check[]
  now?: () => Date
}

/**
 * Fresh results for every applied remediation. The applied outcome carries
 * over; the status is whatever the host reports now.
 */
async function reevaluateApplied(
  results: readonly CheckResult[],
  checks: readonly Check[],
  ctx: CheckContext
): Promise<CheckResult[]> {
  const byId = new Map(checks.map(check => [check.id, check]))
  const final: CheckResult[] = []

  for (const result of results) {
    const check = byId.get(result.checkId)
    if (result.remediation !== 'applied' || !check) {
      final.push(result)
      continue
    }
    const fresh = await evaluateCheck(check, ctx)
    final.push({
      ...fresh,
      remediation: 'applied',
      remediationNote: result.remediationNote,
      previousStatus: result.status,
    })
  }

  return final
}

/**
 * Evaluate → remediate (APPLY only) → re-evaluate → summarize.
 */
export async function runHardening(options: RunHardeningOptions): Promise<RunReport> {
  const { mode, privileged, config, runner, confirmer } = options
  assertModePreconditions(mode, privileged)

  const checks = options.checks ?? buildRegistry(config)
  const ctx: CheckContext = { mode, privileged, runner }

  logger.info(`Running ${checks.length} checks in ${mode} mode`)
  let results = await evaluateAll(checks, ctx)

  if (mode === 'apply') {
    const backups =
      options.backups ?? new BackupManager({ directory: config.backup.directory, now: options.now })
    const remediated = await remediateAll(results, checks, { ctx, confirmer, backups })
    results = await reevaluateApplied(remediated, checks, ctx)
    logger.debug(`Backups taken: ${backups.list().length}`)
  }

  return summarize(results, { mode, privileged, timestamp: options.now?.().getTime() })
}
