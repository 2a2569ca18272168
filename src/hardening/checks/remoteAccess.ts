import { readTextFile, writeTextFile } from '../../host/files.js'
import { KeyValueConfig, sshdDialect } from '../../host/keyValueConfig.js'
import { AppError } from '../../shared/error.js'
import type { Config } from '../../config/schema.js'
import type { Check, CheckStatus } from '../types.js'

interface SshdRule {
  id: string
  title: string
  key: string
  /** Value written by remediation */
  desired: string
  severity: Exclude<CheckStatus, 'pass'>
  requiresConfirmation: boolean
  isCompliant(value: string | undefined): boolean
  passMessage: string
  failMessage: string
}

function sshdRules(config: Config): SshdRule[] {
  const { maxAuthTries } = config.policy
  return [
    {
      id: 'ssh-root-login',
      title: 'SSH root login',
      key: 'PermitRootLogin',
      desired: 'prohibit-password',
      severity: 'fail',
      requiresConfirmation: false,
      isCompliant: v => ['no', 'prohibit-password', 'without-password'].includes(v?.toLowerCase() ?? ''),
      passMessage: 'Root login is disabled or restricted',
      failMessage: 'Root login should be disabled',
    },
    {
      id: 'ssh-password-auth',
      title: 'SSH password authentication',
      key: 'PasswordAuthentication',
      desired: 'no',
      severity: 'warn',
      // Locks out anyone without a key
      requiresConfirmation: true,
      isCompliant: v => v?.toLowerCase() === 'no',
      passMessage: 'Password authentication is disabled (key-based only)',
      failMessage: 'Consider disabling password authentication for key-based auth only',
    },
    {
      id: 'ssh-protocol',
      title: 'SSH protocol version',
      key: 'Protocol',
      desired: '2',
      severity: 'fail',
      requiresConfirmation: false,
      isCompliant: v => v === undefined || v === '2',
      passMessage: 'SSH Protocol 2 is enforced (or default)',
      failMessage: 'SSH should use Protocol 2 only',
    },
    {
      id: 'ssh-x11-forwarding',
      title: 'SSH X11 forwarding',
      key: 'X11Forwarding',
      desired: 'no',
      severity: 'warn',
      requiresConfirmation: false,
      isCompliant: v => v?.toLowerCase() === 'no',
      passMessage: 'X11 forwarding is disabled',
      failMessage: 'X11 forwarding should be disabled unless needed',
    },
    {
      id: 'ssh-max-auth-tries',
      title: 'SSH max authentication attempts',
      key: 'MaxAuthTries',
      desired: String(maxAuthTries),
      severity: 'warn',
      requiresConfirmation: false,
      isCompliant: v => {
        if (v === undefined || !/^\d+$/.test(v)) return false
        const tries = Number(v)
        return tries >= 1 && tries <= maxAuthTries
      },
      passMessage: 'MaxAuthTries is set to a secure value',
      failMessage: `MaxAuthTries should be set to ${maxAuthTries} or less`,
    },
  ]
}

function createSshdCheck(rule: SshdRule, sshdConfigPath: string): Check {
  return {
    id: rule.id,
    title: rule.title,
    category: 'remote-access',
    requiresConfirmation: rule.requiresConfirmation,
    mutates: true,
    targetFiles: [sshdConfigPath],

    async evaluate() {
      const text = await readTextFile(sshdConfigPath)
      if (text === null) {
        return {
          status: 'warn',
          message: `SSH server not installed or config not found (${sshdConfigPath})`,
          fixable: false,
        }
      }

      const value = KeyValueConfig.parse(text, sshdDialect).get(rule.key)
      if (rule.isCompliant(value)) {
        return { status: 'pass', message: rule.passMessage }
      }
      return {
        status: rule.severity,
        message: rule.failMessage,
        details: [value === undefined ? `${rule.key} is not set` : `${rule.key} is ${value}`],
      }
    },

    async remediate() {
      const text = await readTextFile(sshdConfigPath)
      if (text === null) throw AppError.fileNotFound(sshdConfigPath)

      const doc = KeyValueConfig.parse(text, sshdDialect)
      const outcome = doc.set(rule.key, rule.desired)
      if (outcome !== 'unchanged') {
        await writeTextFile(sshdConfigPath, doc.toString())
      }
      return `Set ${rule.key} to ${rule.desired}`
    },
  }
}

export function createRemoteAccessChecks(config: Config): Check[] {
  return sshdRules(config).map(rule => createSshdCheck(rule, config.paths.sshdConfig))
}
