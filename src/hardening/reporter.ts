import { Chalk, type ChalkInstance } from 'chalk'
import { CATEGORY_LABELS, groupByCategory } from './registry.js'
import type { CheckResult, CheckStatus, Mode, RunCounts, RunReport } from './types.js'

const SEVERITY: Record<CheckStatus, number> = { pass: 0, warn: 1, fail: 2 }

export function worstStatus(results: readonly CheckResult[]): CheckStatus {
  let worst: CheckStatus = 'pass'
  for (const result of results) {
    if (SEVERITY[result.status] > SEVERITY[worst]) worst = result.status
  }
  return worst
}

export function countResults(results: readonly CheckResult[]): RunCounts {
  const counts: RunCounts = { pass: 0, warn: 0, fail: 0, applied: 0, declined: 0, failedRemediations: 0 }
  for (const result of results) {
    counts[result.status]++
    if (result.remediation === 'applied') counts.applied++
    else if (result.remediation === 'declined') counts.declined++
    else if (result.remediation === 'failed') counts.failedRemediations++
  }
  return counts
}

export interface SummarizeOptions {
  mode: Mode
  privileged: boolean
  timestamp?: number
}

/**
 * Fold the final results into a RunReport. The exit code depends on nothing
 * but the worst status.
 */
export function summarize(results: readonly CheckResult[], options: SummarizeOptions): RunReport {
  const status = worstStatus(results)
  return {
    mode: options.mode,
    privileged: options.privileged,
    timestamp: options.timestamp ?? Date.now(),
    results: [...results],
    counts: countResults(results),
    status,
    exitCode: status === 'fail' ? 1 : 0,
  }
}

// ============ Text rendering ============

export interface RenderOptions {
  /** Emit ANSI colours (default: off) */
  color?: boolean
}

const RULE = '='.repeat(51)

function statusTag(c: ChalkInstance, status: CheckStatus): string {
  switch (status) {
    case 'pass':
      return c.green('[PASS]')
    case 'warn':
      return c.yellow('[WARN]')
    case 'fail':
      return c.red('[FAIL]')
  }
}

function remediationLine(c: ChalkInstance, result: CheckResult): string | null {
  const note = result.remediationNote ? `: ${result.remediationNote}` : ''
  switch (result.remediation) {
    case undefined:
      return null
    case 'applied': {
      const before = result.previousStatus ? ` (was ${result.previousStatus.toUpperCase()})` : ''
      return c.green(`[APPLIED]${before}${note}`)
    }
    case 'declined':
      return c.yellow(`[DECLINED]${note}`)
    case 'failed':
      return c.red(`[REMEDIATION FAILED]${note}`)
    case 'not_attempted':
      return c.dim(`[NOT ATTEMPTED]${note}`)
  }
}

function verdict(c: ChalkInstance, status: CheckStatus): string {
  switch (status) {
    case 'fail':
      return c.red('Security hardening is needed!')
    case 'warn':
      return c.yellow('Security is good but could be improved')
    case 'pass':
      return c.green('System security posture is strong!')
  }
}

function heading(c: ChalkInstance, title: string): string[] {
  return ['', c.blue(RULE), c.blue(title), c.blue(RULE), '']
}

/**
 * Render the human-readable report. Pure: only reads the finalized report.
 */
export function renderReport(report: RunReport, options: RenderOptions = {}): string {
  const c = new Chalk({ level: options.color ? 1 : 0 })
  const lines: string[] = [...heading(c, 'System Security Hardening Tool')]

  if (report.mode === 'audit') {
    lines.push(c.blue('Mode: AUDIT ONLY (no changes will be made)'))
  } else {
    lines.push(c.yellow('Mode: APPLY (changes WILL be made to the system)'))
  }
  if (!report.privileged && report.mode === 'audit') {
    lines.push(c.yellow('Not running as root - some checks may be limited'))
  }

  for (const group of groupByCategory(report.results)) {
    lines.push(...heading(c, CATEGORY_LABELS[group.category]))
    for (const result of group.items) {
      lines.push(`${statusTag(c, result.status)} ${result.message}`)
      for (const detail of result.details) {
        lines.push(c.dim(`       ${detail}`))
      }
      const remediation = remediationLine(c, result)
      if (remediation) lines.push(`       ${remediation}`)
    }
  }

  const { counts } = report
  lines.push(...heading(c, 'Security Hardening Summary'))
  lines.push(`${c.green('Passed checks:')} ${counts.pass}`)
  lines.push(`${c.red('Failed checks:')} ${counts.fail}`)
  lines.push(`${c.yellow('Warnings:')} ${counts.warn}`)

  if (report.mode === 'apply') {
    lines.push(`${c.green('Changes applied:')} ${counts.applied}`)
    if (counts.declined > 0) lines.push(`${c.yellow('Declined:')} ${counts.declined}`)
    if (counts.failedRemediations > 0) lines.push(`${c.red('Failed remediations:')} ${counts.failedRemediations}`)
    lines.push('')
    lines.push('Some changes may require a system restart to take full effect')
    lines.push('SSH configuration changes require: systemctl restart sshd')
  } else {
    lines.push('')
    lines.push('Run with --apply to automatically fix issues')
  }

  lines.push('')
  lines.push(verdict(c, report.status))
  return lines.join('\n')
}

export function renderJson(report: RunReport): string {
  return JSON.stringify(
    {
      mode: report.mode,
      privileged: report.privileged,
      timestamp: new Date(report.timestamp).toISOString(),
      status: report.status,
      exitCode: report.exitCode,
      counts: report.counts,
      results: report.results,
    },
    null,
    2
  )
}
