import { runChecked, type CommandRunner } from '../../host/commandRunner.js'
import { AppError } from '../../shared/error.js'
import type { Check, Evaluation } from '../types.js'

type PackageManager = 'apt' | 'yum'

/** yum check-update exits 100 when updates are available */
const YUM_UPDATES_AVAILABLE = 100

async function detectPackageManager(runner: CommandRunner): Promise<PackageManager | null> {
  if (await runner.has('apt-get')) return 'apt'
  if (await runner.has('yum')) return 'yum'
  return null
}

/**
 * Pending upgrades according to the local package index. The index is not
 * refreshed here: that would write to the host during an audit.
 */
async function listPendingUpdates(runner: CommandRunner, pm: PackageManager): Promise<string[]> {
  if (pm === 'apt') {
    const { stdout } = await runner.run('apt', ['list', '--upgradable'])
    return stdout
      .split('\n')
      .filter(line => line.includes('upgradable from'))
      .map(line => line.split('/')[0] ?? line)
  }

  const result = await runner.run('yum', ['check-update', '-q'])
  if (result.exitCode === 0) return []
  if (result.exitCode !== YUM_UPDATES_AVAILABLE) {
    throw AppError.commandFailed('yum check-update', result.stderr.trim() || `exit code ${result.exitCode}`)
  }
  return result.stdout
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean)
    .map(line => line.split(/\s+/)[0] ?? line)
}

export const systemUpdatesCheck: Check = {
  id: 'system-updates',
  title: 'System updates',
  category: 'patching',
  // Upgrades can restart services or require a reboot
  requiresConfirmation: true,
  mutates: true,
  targetFiles: [],

  async evaluate({ runner }): Promise<Evaluation> {
    const pm = await detectPackageManager(runner)
    if (!pm) {
      return { status: 'warn', message: 'Unknown package manager - cannot check for updates', fixable: false }
    }

    const pending = await listPendingUpdates(runner, pm)
    if (pending.length === 0) {
      return { status: 'pass', message: 'System is up to date' }
    }
    return {
      status: 'warn',
      message: `${pending.length} package updates available`,
      details: pending.slice(0, 10),
    }
  },

  async remediate({ runner }) {
    const pm = await detectPackageManager(runner)
    if (pm === 'apt') {
      const env = { DEBIAN_FRONTEND: 'noninteractive' }
      await runChecked(runner, 'apt-get', ['update', '-qq'], { env })
      await runChecked(runner, 'apt-get', ['upgrade', '-y'], { env })
      return 'Installed system updates'
    }
    if (pm === 'yum') {
      await runChecked(runner, 'yum', ['update', '-y'])
      return 'Installed system updates'
    }
    throw AppError.toolMissing('apt-get or yum')
  },
}
