/**
 * @entry Hardening engine
 *
 * Check registry → evaluator → remediator (apply only) → reporter.
 */

export type * from './types.js'
export { buildRegistry, findUnknownCheckIds, groupByCategory, CATEGORY_LABELS, CATEGORY_ORDER } from './registry.js'
export { evaluateAll, evaluateCheck, toCheckResult } from './evaluator.js'
export { remediateAll, remediateResult, type RemediatorDeps } from './remediator.js'
export { BackupManager, listBackups, type BackupRecord, type BackupManagerOptions } from './backup.js'
export { createFixedConfirmer, createScriptedConfirmer, createPromptConfirmer, type Confirmer } from './confirm.js'
export { summarize, renderReport, renderJson, worstStatus, countResults } from './reporter.js'
export { resolveMode, assertModePreconditions, isPrivileged, type ModeFlags } from './mode.js'
export { runHardening, type RunHardeningOptions } from './runHardening.js'
