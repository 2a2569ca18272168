/**
 * Check and result builders for the hardening unit tests
 */

import type { CommandRunner } from '../../host/commandRunner.js'
import type { Check, CheckContext, CheckResult, Evaluation } from '../types.js'

export const nullRunner: CommandRunner = {
  async has() {
    return false
  },
  async run() {
    return { exitCode: 0, stdout: '', stderr: '' }
  },
}

export function makeContext(overrides: Partial<CheckContext> = {}): CheckContext {
  return { mode: 'apply', privileged: true, runner: nullRunner, ...overrides }
}

export function makeCheck(overrides: Partial<Check> & { evaluation?: Evaluation } = {}): Check {
  const { evaluation = { status: 'fail', message: 'broken' }, ...rest } = overrides
  return {
    id: 'sample',
    title: 'Sample check',
    category: 'perimeter',
    requiresConfirmation: false,
    mutates: false,
    targetFiles: [],
    async evaluate() {
      return evaluation
    },
    ...rest,
  }
}

export function makeResult(overrides: Partial<CheckResult> = {}): CheckResult {
  return {
    checkId: 'sample',
    title: 'Sample check',
    category: 'perimeter',
    status: 'fail',
    message: 'broken',
    details: [],
    fixable: true,
    ...overrides,
  }
}
