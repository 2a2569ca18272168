import { AppError, isPermissionError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import { createLogger } from '../shared/logger.js'
import type { Check, CheckContext, CheckResult, Evaluation } from './types.js'

const logger = createLogger('evaluator')

/**
 * Map a probe error onto a WARN evaluation. A failing probe lowers confidence
 * in that one check; it never stops the run.
 */
function evaluationFromError(error: unknown): Evaluation {
  if (error instanceof AppError && error.code === 'TOOL_MISSING') {
    return { status: 'warn', message: error.message, fixable: false }
  }
  if (isPermissionError(error)) {
    return {
      status: 'warn',
      message: `Insufficient privilege: ${getErrorMessage(error)} (run as root for a complete audit)`,
      fixable: false,
    }
  }
  return { status: 'warn', message: `Probe error: ${getErrorMessage(error)}`, fixable: false }
}

export function toCheckResult(check: Check, evaluation: Evaluation): CheckResult {
  return {
    checkId: check.id,
    title: check.title,
    category: check.category,
    status: evaluation.status,
    message: evaluation.message,
    details: evaluation.details ?? [],
    fixable: check.remediate !== undefined && evaluation.fixable !== false,
  }
}

export async function evaluateCheck(check: Check, ctx: CheckContext): Promise<CheckResult> {
  try {
    return toCheckResult(check, await check.evaluate(ctx))
  } catch (error) {
    logger.debug(`Probe ${check.id} failed: ${getErrorMessage(error)}`)
    return toCheckResult(check, evaluationFromError(error))
  }
}

/**
 * Evaluate every check once, one at a time, in registry order.
 */
export async function evaluateAll(checks: readonly Check[], ctx: CheckContext): Promise<CheckResult[]> {
  const results: CheckResult[] = []
  for (const check of checks) {
    results.push(await evaluateCheck(check, ctx))
  }
  return results
}
