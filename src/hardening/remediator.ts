import { fromPromise } from '../shared/result.js'
import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import { createLogger, logError } from '../shared/logger.js'
import type { BackupManager } from './backup.js'
import type { Confirmer } from './confirm.js'
import type { Check, CheckContext, CheckResult } from './types.js'

const logger = createLogger('remediator')

export interface RemediatorDeps {
  ctx: CheckContext
  confirmer: Confirmer
  backups: BackupManager
}

function withOutcome(
  result: CheckResult,
  remediation: NonNullable<CheckResult['remediation']>,
  remediationNote?: string
): CheckResult {
  return { ...result, remediation, remediationNote }
}

/**
 * Remediate a single non-passing result. Never throws: every failure is
 * recorded on the returned copy.
 */
export async function remediateResult(
  check: Check,
  result: CheckResult,
  { ctx, confirmer, backups }: RemediatorDeps
): Promise<CheckResult> {
  if (!check.remediate || !result.fixable) {
    return withOutcome(result, 'not_attempted', 'No automatic remediation available')
  }

  if (check.requiresConfirmation) {
    const decision = await fromPromise(confirmer.confirm(check, result))
    if (!decision.ok || !decision.value) {
      logger.info(`Skipped ${check.id}: not confirmed`)
      return withOutcome(result, 'declined', 'Declined at confirmation prompt')
    }
  }

  if (check.mutates) {
    for (const file of check.targetFiles) {
      const snapshot = await fromPromise(backups.backup(file))
      if (!snapshot.ok) {
        // No backup, no write
        const error = AppError.remediationFailed(check.id, `backup of ${file} failed: ${snapshot.error.message}`)
        logError(logger, 'Backup failed', snapshot.error, { checkId: check.id, path: file })
        return {
          ...withOutcome(result, 'failed', error.message),
          message: `${result.message} (remediation failed: ${error.message})`,
        }
      }
    }
  }

  const outcome = await fromPromise(check.remediate(ctx))
  if (!outcome.ok) {
    const reason = getErrorMessage(outcome.error)
    logError(logger, 'Remediation failed', outcome.error, { checkId: check.id })
    return {
      ...withOutcome(result, 'failed', reason),
      message: `${result.message} (remediation failed: ${reason})`,
    }
  }

  logger.info(`[${check.id}] ${outcome.value}`)
  return withOutcome(result, 'applied', outcome.value)
}

/**
 * Walk the results in order and remediate every WARN/FAIL one. Each check is
 * an independent unit: a failure neither stops the walk nor undoes earlier
 * changes.
 */
export async function remediateAll(
  results: readonly CheckResult[],
  checks: readonly Check[],
  deps: RemediatorDeps
): Promise<CheckResult[]> {
  const byId = new Map(checks.map(check => [check.id, check]))
  const remediated: CheckResult[] = []

  for (const result of results) {
    const check = byId.get(result.checkId)
    if (result.status === 'pass' || !check) {
      remediated.push(result)
      continue
    }
    remediated.push(await remediateResult(check, result, deps))
  }

  return remediated
}
