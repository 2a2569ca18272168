import { runChecked, type CommandRunner } from '../../host/commandRunner.js'
import { AppError } from '../../shared/error.js'
import type { Check, Evaluation } from '../types.js'
import { isServiceActive, startAndEnable } from './systemd.js'

async function isAuditdInstalled(runner: CommandRunner): Promise<boolean> {
  return (await runner.has('auditd')) || (await runner.has('auditctl'))
}

async function installAuditd(runner: CommandRunner): Promise<void> {
  if (await runner.has('apt-get')) {
    await runChecked(runner, 'apt-get', ['install', '-y', 'auditd'], {
      env: { DEBIAN_FRONTEND: 'noninteractive' },
    })
    return
  }
  if (await runner.has('yum')) {
    await runChecked(runner, 'yum', ['install', '-y', 'audit'])
    return
  }
  throw AppError.toolMissing('apt-get or yum')
}

export const auditDaemonCheck: Check = {
  id: 'audit-daemon',
  title: 'Audit daemon',
  category: 'audit-subsystem',
  // May install a package
  requiresConfirmation: true,
  mutates: true,
  targetFiles: [],

  async evaluate({ runner }): Promise<Evaluation> {
    if (!(await isAuditdInstalled(runner))) {
      return { status: 'warn', message: 'auditd is not installed (recommended for security auditing)' }
    }
    if (await isServiceActive(runner, 'auditd')) {
      return { status: 'pass', message: 'auditd is installed and running' }
    }
    return { status: 'warn', message: 'auditd is installed but not running' }
  },

  async remediate({ runner }) {
    if (!(await isAuditdInstalled(runner))) {
      await installAuditd(runner)
      await startAndEnable(runner, 'auditd')
      return 'Installed and enabled auditd'
    }
    await startAndEnable(runner, 'auditd')
    return 'Started and enabled auditd'
  },
}
