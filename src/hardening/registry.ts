import type { Config } from '../config/schema.js'
import { AppError } from '../shared/error.js'
import type { Check, CheckCategory } from './types.js'
import { createRemoteAccessChecks } from './checks/remoteAccess.js'
import { firewallCheck } from './checks/perimeter.js'
import { systemUpdatesCheck } from './checks/patching.js'
import { createAccountPolicyChecks } from './checks/accountPolicy.js'
import { createFilePermissionChecks } from './checks/filePermissions.js'
import { createKernelParameterChecks } from './checks/kernelParameters.js'
import { createRiskyServicesCheck } from './checks/services.js'
import { auditDaemonCheck } from './checks/auditSubsystem.js'

export const CATEGORY_ORDER: readonly CheckCategory[] = [
  'remote-access',
  'perimeter',
  'patching',
  'account-policy',
  'file-permissions',
  'kernel-parameters',
  'unnecessary-services',
  'audit-subsystem',
]

export const CATEGORY_LABELS: Record<CheckCategory, string> = {
  'remote-access': 'SSH Security Configuration',
  perimeter: 'Firewall Configuration',
  patching: 'System Updates',
  'account-policy': 'Password and Account Policies',
  'file-permissions': 'Critical File Permissions',
  'kernel-parameters': 'Kernel Security Parameters',
  'unnecessary-services': 'Unnecessary Services',
  'audit-subsystem': 'Audit System Configuration',
}

/** Full catalog in evaluation order, before the disabled list is applied */
function allChecks(config: Config): Check[] {
  return [
    ...createRemoteAccessChecks(config),
    firewallCheck,
    systemUpdatesCheck,
    ...createAccountPolicyChecks(config),
    ...createFilePermissionChecks(config),
    ...createKernelParameterChecks(config),
    createRiskyServicesCheck(config),
    auditDaemonCheck,
  ]
}

/**
 * Build the ordered check registry. Pure: nothing on the host is read or
 * written until a check is evaluated. Throws CONFIG_INVALID when two checks
 * would share an id (the same critical file listed twice).
 */
export function buildRegistry(config: Config): readonly Check[] {
  const checks = allChecks(config)
  const seen = new Set<string>()
  for (const check of checks) {
    // Results are matched back to checks by id
    if (seen.has(check.id)) throw AppError.configInvalid(`duplicate check id ${check.id}`)
    seen.add(check.id)
  }

  const disabled = new Set(config.checks.disabled)
  return Object.freeze(checks.filter(check => !disabled.has(check.id)).map(check => Object.freeze(check)))
}

/** Disabled ids that name no check, usually typos in the config */
export function findUnknownCheckIds(config: Config): string[] {
  const known = new Set(allChecks(config).map(c => c.id))
  return config.checks.disabled.filter(id => !known.has(id))
}

/**
 * Group by category in order of first appearance, so a registry-ordered list
 * keeps its order when rendered.
 */
export function groupByCategory<T extends { category: CheckCategory }>(
  items: readonly T[]
): Array<{ category: CheckCategory; items: T[] }> {
  const groups = new Map<CheckCategory, T[]>()
  for (const item of items) {
    const group = groups.get(item.category) ?? []
    group.push(item)
    groups.set(item.category, group)
  }
  return [...groups].map(([category, grouped]) => ({ category, items: grouped }))
}
