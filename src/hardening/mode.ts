import { AppError } from '../shared/error.js'
import type { Mode } from './types.js'

export interface ModeFlags {
  audit?: boolean
  apply?: boolean
}

/**
 * AUDIT unless APPLY is asked for explicitly. Asking for both is a usage
 * error, never a silent pick.
 */
export function resolveMode(flags: ModeFlags): Mode {
  if (flags.audit && flags.apply) throw AppError.modeConflict()
  return flags.apply ? 'apply' : 'audit'
}

/**
 * Gate checked once at startup, before any check runs. An unprivileged APPLY
 * is fatal; it does not degrade to AUDIT.
 */
export function assertModePreconditions(mode: Mode, privileged: boolean): void {
  if (mode === 'apply' && !privileged) throw AppError.privilegeRequired()
}

export function isPrivileged(): boolean {
  return process.geteuid?.() === 0
}
