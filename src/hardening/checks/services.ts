import type { CommandRunner } from '../../host/commandRunner.js'
import type { Config } from '../../config/schema.js'
import type { Check, Evaluation } from '../types.js'
import { isServiceActive, listUnitFiles, stopAndDisable } from './systemd.js'

/** Installed units whose name starts with the service, e.g. telnet.socket */
async function findActiveRiskyUnits(runner: CommandRunner, services: string[]): Promise<string[]> {
  const units = await listUnitFiles(runner)
  const active: string[] = []
  for (const service of services) {
    for (const unit of units.filter(u => u === service || u.startsWith(`${service}.`) || u.startsWith(`${service}@`))) {
      if (await isServiceActive(runner, unit)) active.push(unit)
    }
  }
  return active
}

export function createRiskyServicesCheck(config: Config): Check {
  const services = config.riskyServices

  return {
    id: 'risky-services',
    title: 'Unnecessary network services',
    category: 'unnecessary-services',
    requiresConfirmation: false,
    mutates: true,
    targetFiles: [],

    async evaluate({ runner }): Promise<Evaluation> {
      const active = await findActiveRiskyUnits(runner, services)
      if (active.length === 0) {
        return { status: 'pass', message: 'No risky services found running' }
      }
      return {
        status: 'fail',
        message: `${active.join(', ')} active (should be disabled)`,
        details: active,
      }
    },

    async remediate({ runner }) {
      const active = await findActiveRiskyUnits(runner, services)
      for (const unit of active) {
        await stopAndDisable(runner, unit)
      }
      return `Stopped and disabled ${active.join(', ')}`
    },
  }
}
