/**
 * Unified error type with category, code and a repair suggestion
 */

import chalk from 'chalk'

export type ErrorCategory =
  | 'CONFIG' // configuration file problems
  | 'USAGE' // invalid invocation
  | 'PERMISSION' // insufficient privilege
  | 'DEPENDENCY' // external tool missing
  | 'REMEDIATION' // a corrective action did not succeed
  | 'RUNTIME' // external command failed
  | 'RESOURCE' // file not found etc.
  | 'UNKNOWN'

export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID'
  | 'MODE_CONFLICT'
  | 'PRIVILEGE_REQUIRED'
  | 'PERMISSION_DENIED'
  | 'TOOL_MISSING'
  | 'REMEDIATION_FAILED'
  | 'COMMAND_FAILED'
  | 'FILE_NOT_FOUND'
  | 'UNKNOWN'

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AppError'
  }

  /**
   * Terminal rendering
   */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(chalk.red('✗') + ' ' + chalk.bold('Error') + ` [${colorFn(categoryLabels[this.category])}]`)
    lines.push('')
    lines.push(chalk.dim(`  Code: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  Suggested fix:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  // ============ factories ============

  static configNotFound(path: string): AppError {
    return new AppError(
      'CONFIG_NOT_FOUND',
      `Config not found: ${path}`,
      'CONFIG',
      undefined,
      'Check the path passed to --config'
    )
  }

  static configInvalid(reason: string): AppError {
    return new AppError(
      'CONFIG_INVALID',
      `Invalid config: ${reason}`,
      'CONFIG',
      undefined,
      'Compare the file against the documented keys'
    )
  }

  static modeConflict(): AppError {
    return new AppError(
      'MODE_CONFLICT',
      '--audit and --apply are mutually exclusive',
      'USAGE',
      undefined,
      'Pass only one mode flag (audit is the default)'
    )
  }

  static privilegeRequired(): AppError {
    return new AppError(
      'PRIVILEGE_REQUIRED',
      'Apply mode must be run as root',
      'PERMISSION',
      undefined,
      'Re-run with sudo, or use --audit for a read-only pass'
    )
  }

  static permissionDenied(path: string, cause?: unknown): AppError {
    return new AppError(
      'PERMISSION_DENIED',
      `Permission denied reading ${path}`,
      'PERMISSION',
      cause,
      'Run as root for a complete audit'
    )
  }

  static toolMissing(tool: string): AppError {
    return new AppError(
      'TOOL_MISSING',
      `Required tool not found: ${tool}`,
      'DEPENDENCY',
      undefined,
      `Install ${tool} or make sure it is on PATH`
    )
  }

  static commandFailed(command: string, detail: string, cause?: unknown): AppError {
    return new AppError('COMMAND_FAILED', `${command} failed: ${detail}`, 'RUNTIME', cause)
  }

  static remediationFailed(checkId: string, reason: string, cause?: unknown): AppError {
    return new AppError(
      'REMEDIATION_FAILED',
      `Remediation of ${checkId} failed: ${reason}`,
      'REMEDIATION',
      cause,
      'Review the backup next to the target file and fix manually'
    )
  }

  static fileNotFound(path: string): AppError {
    return new AppError('FILE_NOT_FOUND', `File not found: ${path}`, 'RESOURCE')
  }

  /**
   * Classify a plain Error or string by matching known patterns
   */
  static fromError(error: Error | string): AppError {
    const errorMessage = typeof error === 'string' ? error : error.message
    const cause = typeof error === 'string' ? undefined : error

    for (const pattern of errorPatterns) {
      if (pattern.pattern.test(errorMessage)) {
        return new AppError(pattern.code, errorMessage, pattern.category, cause, pattern.suggestion)
      }
    }

    return new AppError('UNKNOWN', errorMessage, 'UNKNOWN', cause)
  }
}

// ============ pattern matching ============

interface ErrorPattern {
  pattern: RegExp
  category: ErrorCategory
  code: ErrorCode
  suggestion: string
}

const errorPatterns: ErrorPattern[] = [
  {
    pattern: /EACCES|EPERM|permission denied/i,
    category: 'PERMISSION',
    code: 'PERMISSION_DENIED',
    suggestion: 'Run as root',
  },
  {
    pattern: /ENOENT|no such file/i,
    category: 'RESOURCE',
    code: 'FILE_NOT_FOUND',
    suggestion: 'Check the configured path',
  },
]

/** True when the value carries a Node fs permission error code */
export function isPermissionError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.code === 'PERMISSION_DENIED'
  }
  const code = getErrorCode(error)
  return code === 'EACCES' || code === 'EPERM'
}

/** True when the value is a Node fs "no such file" error */
export function isNotFoundError(error: unknown): boolean {
  return getErrorCode(error) === 'ENOENT'
}

function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

// ============ output ============

const categoryLabels: Record<ErrorCategory, string> = {
  CONFIG: 'config',
  USAGE: 'usage',
  PERMISSION: 'permission',
  DEPENDENCY: 'dependency',
  REMEDIATION: 'remediation',
  RUNTIME: 'runtime',
  RESOURCE: 'resource',
  UNKNOWN: 'unknown',
}

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  CONFIG: chalk.yellow,
  USAGE: chalk.yellow,
  PERMISSION: chalk.red,
  DEPENDENCY: chalk.magenta,
  REMEDIATION: chalk.red,
  RUNTIME: chalk.red,
  RESOURCE: chalk.yellow,
  UNKNOWN: chalk.gray,
}

/**
 * Print an error to the terminal
 */
export function printError(error: Error | string | AppError): void {
  if (error instanceof AppError) {
    console.error(error.format())
  } else {
    console.error(AppError.fromError(error).format())
  }
}
