import { runChecked, type CommandRunner } from '../../host/commandRunner.js'
import { AppError } from '../../shared/error.js'
import { isServiceActive, startAndEnable } from './systemd.js'
import type { Check, CheckContext, Evaluation } from '../types.js'

type Firewall = 'ufw' | 'firewalld' | 'iptables' | 'none'

async function detectFirewall(runner: CommandRunner): Promise<Firewall> {
  if (await runner.has('ufw')) return 'ufw'
  if (await runner.has('firewall-cmd')) return 'firewalld'
  if (await runner.has('iptables')) return 'iptables'
  return 'none'
}

/**
 * Status probes need root on most distributions; a non-zero exit is a probe
 * error, never a verdict on the firewall.
 */
async function probeStatus(
  { runner, privileged }: CheckContext,
  command: string,
  args: readonly string[]
): Promise<string> {
  const result = await runner.run(command, args)
  if (result.exitCode === 0) return result.stdout

  const probe = `${command} ${args.join(' ')}`
  if (!privileged) throw AppError.permissionDenied(`${probe} output`)
  throw AppError.commandFailed(probe, result.stderr.trim() || `exit code ${result.exitCode}`)
}

export const firewallCheck: Check = {
  id: 'firewall-active',
  title: 'Host firewall',
  category: 'perimeter',
  requiresConfirmation: true,
  mutates: true,
  targetFiles: [],

  async evaluate(ctx): Promise<Evaluation> {
    const { runner } = ctx
    const firewall = await detectFirewall(runner)

    switch (firewall) {
      case 'ufw': {
        const stdout = await probeStatus(ctx, 'ufw', ['status'])
        return stdout.includes('Status: active')
          ? { status: 'pass', message: 'UFW firewall is active' }
          : { status: 'fail', message: 'UFW is installed but not active' }
      }
      case 'firewalld':
        return (await isServiceActive(runner, 'firewalld'))
          ? { status: 'pass', message: 'firewalld is active' }
          : { status: 'fail', message: 'firewalld is installed but not active' }
      case 'iptables': {
        const stdout = await probeStatus(ctx, 'iptables', ['-L', '-n'])
        return stdout.includes('Chain INPUT')
          ? {
              status: 'warn',
              message: 'iptables is available but status unclear - manual review recommended',
              fixable: false,
            }
          : { status: 'fail', message: 'No active firewall detected', fixable: false }
      }
      case 'none':
        return {
          status: 'fail',
          message: 'No firewall detected (ufw, firewalld, or iptables)',
          fixable: false,
        }
    }
  },

  async remediate({ runner }) {
    const firewall = await detectFirewall(runner)
    if (firewall === 'ufw') {
      await runChecked(runner, 'ufw', ['--force', 'enable'])
      return 'Enabled UFW firewall'
    }
    if (firewall === 'firewalld') {
      await startAndEnable(runner, 'firewalld')
      return 'Started and enabled firewalld'
    }
    throw new Error(`No automatic remediation for firewall: ${firewall}`)
  },
}
