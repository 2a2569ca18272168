import type { Check, CheckResult } from './types.js'

/**
 * Decision source for remediations flagged requiresConfirmation.
 */
export interface Confirmer {
  confirm(check: Check, result: CheckResult): Promise<boolean>
}

/** Same answer for every check (--yes, or a non-interactive decline) */
export function createFixedConfirmer(decision: boolean): Confirmer {
  return {
    async confirm() {
      return decision
    },
  }
}

/** Per-check answers for tests and scripted runs; unlisted checks get the fallback */
export function createScriptedConfirmer(
  decisions: Record<string, boolean>,
  fallback: boolean = false
): Confirmer & { asked: string[] } {
  const asked: string[] = []
  return {
    asked,
    async confirm(check) {
      asked.push(check.id)
      return decisions[check.id] ?? fallback
    },
  }
}

/** Wrap an interactive yes/no prompt */
export function createPromptConfirmer(
  ask: (message: string, defaultValue: boolean) => Promise<boolean>
): Confirmer {
  return {
    confirm(check, result) {
      return ask(`${result.message}. Apply "${check.title}" remediation now?`, false)
    },
  }
}
