import type { CommandRunner } from '../host/commandRunner.js'

export type CheckStatus = 'pass' | 'warn' | 'fail'

export type Mode = 'audit' | 'apply'

export type CheckCategory =
  | 'remote-access'
  | 'perimeter'
  | 'patching'
  | 'account-policy'
  | 'file-permissions'
  | 'kernel-parameters'
  | 'unnecessary-services'
  | 'audit-subsystem'

export type RemediationOutcome = 'not_attempted' | 'applied' | 'declined' | 'failed'

/** What a probe hands back; the evaluator turns it into a CheckResult */
export interface Evaluation {
  status: CheckStatus
  message: string
  details?: string[]
  /** false when remediate() cannot fix this particular finding */
  fixable?: boolean
}

export interface CheckContext {
  mode: Mode
  privileged: boolean
  runner: CommandRunner
}

export interface Check {
  readonly id: string
  readonly title: string
  readonly category: CheckCategory
  /** remediate() asks the Confirmer first */
  readonly requiresConfirmation: boolean
  /** remediate() writes persistent system state */
  readonly mutates: boolean
  /** Files remediate() may write; each is backed up before the first write */
  readonly targetFiles: readonly string[]
  /** Read-only probe */
  evaluate(ctx: CheckContext): Promise<Evaluation>
  /** Corrective action; resolves to a description of what changed */
  remediate?(ctx: CheckContext): Promise<string>
}

export interface CheckResult {
  checkId: string
  title: string
  category: CheckCategory
  status: CheckStatus
  message: string
  details: string[]
  fixable: boolean
  remediation?: RemediationOutcome
  /** What the remediation did, or why it did not */
  remediationNote?: string
  /** Status before remediation, set on re-evaluated results */
  previousStatus?: CheckStatus
}

export interface RunCounts {
  pass: number
  warn: number
  fail: number
  applied: number
  declined: number
  failedRemediations: number
}

export interface RunReport {
  mode: Mode
  privileged: boolean
  timestamp: number
  results: CheckResult[]
  counts: RunCounts
  status: CheckStatus
  exitCode: 0 | 1
}
