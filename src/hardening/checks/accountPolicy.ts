import { readTextFile, writeTextFile } from '../../host/files.js'
import { KeyValueConfig, loginDefsDialect } from '../../host/keyValueConfig.js'
import { isLocked, parsePasswd, parseShadow, type ShadowEntry } from '../../host/accounts.js'
import { runChecked, type CommandRunner } from '../../host/commandRunner.js'
import { AppError, isPermissionError } from '../../shared/error.js'
import type { Config } from '../../config/schema.js'
import type { Check, Evaluation } from '../types.js'

/** Lock, never delete: the account and its files stay for review */
async function lockAccounts(runner: CommandRunner, users: string[]): Promise<void> {
  for (const user of users) {
    await runChecked(runner, 'passwd', ['-l', user])
  }
}

async function readShadowEntries(shadowPath: string): Promise<ShadowEntry[] | null> {
  const text = await readTextFile(shadowPath)
  return text === null ? null : parseShadow(text)
}

function createPasswordMaxDaysCheck(config: Config): Check {
  const { loginDefs } = config.paths
  const limit = config.policy.passMaxDays

  return {
    id: 'password-max-days',
    title: 'Password aging policy',
    category: 'account-policy',
    requiresConfirmation: false,
    mutates: true,
    targetFiles: [loginDefs],

    async evaluate(): Promise<Evaluation> {
      const text = await readTextFile(loginDefs)
      if (text === null) {
        return { status: 'warn', message: `${loginDefs} not found`, fixable: false }
      }

      const raw = KeyValueConfig.parse(text, loginDefsDialect).get('PASS_MAX_DAYS')
      if (raw === undefined || !/^\d+$/.test(raw)) {
        return { status: 'fail', message: 'Password expiration not configured' }
      }

      const maxDays = Number(raw)
      if (maxDays <= limit) {
        return { status: 'pass', message: `Password expiration set to ${maxDays} days` }
      }
      return {
        status: 'warn',
        message: `Password expiration should be ${limit} days or less (currently ${maxDays})`,
      }
    },

    async remediate() {
      const text = await readTextFile(loginDefs)
      if (text === null) throw AppError.fileNotFound(loginDefs)

      const doc = KeyValueConfig.parse(text, loginDefsDialect)
      if (doc.set('PASS_MAX_DAYS', String(limit)) !== 'unchanged') {
        await writeTextFile(loginDefs, doc.toString())
      }
      // login.defs only applies when accounts are created
      return `Set PASS_MAX_DAYS to ${limit} (applies to new accounts)`
    },
  }
}

function createEmptyPasswordCheck(config: Config): Check {
  const { shadow } = config.paths

  async function findEmpty(): Promise<string[] | null> {
    const entries = await readShadowEntries(shadow)
    return entries === null ? null : entries.filter(e => e.hash === '').map(e => e.user)
  }

  return {
    id: 'empty-passwords',
    title: 'Accounts with empty passwords',
    category: 'account-policy',
    requiresConfirmation: true,
    mutates: true,
    targetFiles: [shadow],

    async evaluate(): Promise<Evaluation> {
      const empty = await findEmpty()
      if (empty === null) {
        return { status: 'warn', message: `${shadow} not found`, fixable: false }
      }
      if (empty.length === 0) {
        return { status: 'pass', message: 'No accounts with empty passwords found' }
      }
      return {
        status: 'fail',
        message: `${empty.length} account(s) have empty passwords`,
        details: empty,
      }
    },

    async remediate({ runner }) {
      const empty = await findEmpty()
      if (empty === null) throw AppError.fileNotFound(shadow)

      await lockAccounts(runner, empty)
      return `Locked account(s): ${empty.join(', ')}`
    },
  }
}

function createUidZeroCheck(config: Config): Check {
  const { passwd, shadow } = config.paths

  /** Lock state is unknown without shadow access; treat those as unlocked */
  async function lockedUsers(): Promise<Set<string>> {
    try {
      const entries = (await readShadowEntries(shadow)) ?? []
      return new Set(entries.filter(e => isLocked(e.hash)).map(e => e.user))
    } catch (error) {
      if (isPermissionError(error)) return new Set()
      throw error
    }
  }

  async function findUidZero(): Promise<string[] | null> {
    const text = await readTextFile(passwd)
    if (text === null) return null
    return parsePasswd(text)
      .filter(e => e.uid === 0 && e.user !== 'root')
      .map(e => e.user)
  }

  return {
    id: 'uid-zero-accounts',
    title: 'Non-root UID 0 accounts',
    category: 'account-policy',
    requiresConfirmation: true,
    mutates: true,
    targetFiles: [shadow],

    async evaluate(): Promise<Evaluation> {
      const uidZero = await findUidZero()
      if (uidZero === null) {
        return { status: 'warn', message: `${passwd} not found`, fixable: false }
      }
      if (uidZero.length === 0) {
        return { status: 'pass', message: 'Only root has UID 0' }
      }

      const locked = await lockedUsers()
      const unlocked = uidZero.filter(user => !locked.has(user))
      if (unlocked.length > 0) {
        return {
          status: 'fail',
          message: `Non-root accounts with UID 0 found: ${unlocked.join(' ')}`,
          details: unlocked,
        }
      }
      // Locked accounts cannot log in; they stay listed for manual removal
      return {
        status: 'pass',
        message: `Non-root UID 0 accounts are locked: ${uidZero.join(' ')} (review manually)`,
        details: uidZero,
      }
    },

    async remediate({ runner }) {
      const uidZero = await findUidZero()
      if (uidZero === null) throw AppError.fileNotFound(passwd)

      const locked = await lockedUsers()
      const unlocked = uidZero.filter(user => !locked.has(user))
      await lockAccounts(runner, unlocked)
      return `Locked account(s): ${unlocked.join(', ')}`
    },
  }
}

export function createAccountPolicyChecks(config: Config): Check[] {
  return [
    createPasswordMaxDaysCheck(config),
    createEmptyPasswordCheck(config),
    createUidZeroCheck(config),
  ]
}
