/**
 * remediator unit tests
 * Gating order: fixable, confirmation, backup, remediation
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { BackupManager } from '../backup.js'
import { createFixedConfirmer, createScriptedConfirmer } from '../confirm.js'
import { remediateAll, remediateResult, type RemediatorDeps } from '../remediator.js'
import { makeCheck, makeContext, makeResult } from './fixtures.js'

let dir: string

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'hostward-remediator-'))
})

afterEach(() => {
  rmSync(dir, { recursive: true, force: true })
})

function deps(overrides: Partial<RemediatorDeps> = {}): RemediatorDeps {
  return {
    ctx: makeContext(),
    confirmer: createFixedConfirmer(true),
    backups: new BackupManager(),
    ...overrides,
  }
}

describe('remediateResult', () => {
  it('records applied with the remediation note', async () => {
    const check = makeCheck({ remediate: async () => 'Enabled UFW firewall' })

    const result = await remediateResult(check, makeResult(), deps())
    expect(result).toMatchObject({ remediation: 'applied', remediationNote: 'Enabled UFW firewall', status: 'fail' })
  })

  it('does not mutate the input result', async () => {
    const input = makeResult()
    const check = makeCheck({ remediate: async () => 'done' })

    const output = await remediateResult(check, input, deps())
    expect(output).not.toBe(input)
    expect(input.remediation).toBeUndefined()
  })

  it('does not attempt results that are not fixable', async () => {
    const remediate = vi.fn(async () => 'done')
    const check = makeCheck({ remediate })

    const result = await remediateResult(check, makeResult({ fixable: false }), deps())
    expect(result.remediation).toBe('not_attempted')
    expect(remediate).not.toHaveBeenCalled()
  })

  it('does not touch anything when confirmation is declined', async () => {
    const target = join(dir, 'sshd_config')
    writeFileSync(target, 'PasswordAuthentication yes\n')
    const remediate = vi.fn(async () => {
      writeFileSync(target, 'PasswordAuthentication no\n')
      return 'Set PasswordAuthentication to no'
    })
    const check = makeCheck({ requiresConfirmation: true, mutates: true, targetFiles: [target], remediate })
    const backups = new BackupManager()

    const result = await remediateResult(check, makeResult(), deps({ confirmer: createFixedConfirmer(false), backups }))

    expect(result.remediation).toBe('declined')
    expect(remediate).not.toHaveBeenCalled()
    expect(readFileSync(target, 'utf-8')).toBe('PasswordAuthentication yes\n')
    expect(backups.list()).toEqual([])
  })

  it('treats a failing confirmation prompt as a decline', async () => {
    const remediate = vi.fn(async () => 'done')
    const check = makeCheck({ requiresConfirmation: true, remediate })
    const confirmer = {
      confirm: async () => {
        throw new Error('prompt closed')
      },
    }

    const result = await remediateResult(check, makeResult(), deps({ confirmer }))
    expect(result.remediation).toBe('declined')
    expect(remediate).not.toHaveBeenCalled()
  })

  it('backs up target files before remediating', async () => {
    const target = join(dir, 'login.defs')
    writeFileSync(target, 'PASS_MAX_DAYS\t99999\n')
    let seenBackup = ''
    const backups = new BackupManager()
    const check = makeCheck({
      mutates: true,
      targetFiles: [target],
      remediate: async () => {
        seenBackup = readFileSync(backups.get(target)?.backup ?? '', 'utf-8')
        writeFileSync(target, 'PASS_MAX_DAYS\t90\n')
        return 'Set PASS_MAX_DAYS to 90'
      },
    })

    await remediateResult(check, makeResult(), deps({ backups }))
    expect(seenBackup).toBe('PASS_MAX_DAYS\t99999\n')
  })

  it('skips the backup of a file that does not exist yet', async () => {
    const target = join(dir, 'sysctl.conf')
    const check = makeCheck({ mutates: true, targetFiles: [target], remediate: async () => 'done' })

    const result = await remediateResult(check, makeResult(), deps())
    expect(result.remediation).toBe('applied')
    expect(readdirSync(dir)).toEqual([])
  })

  it('fails without mutating when the backup cannot be written', async () => {
    const target = join(dir, 'shadow')
    writeFileSync(target, 'root:*:19000::::::\n')
    const remediate = vi.fn(async () => 'done')
    const check = makeCheck({ id: 'empty-passwords', mutates: true, targetFiles: [target], remediate })
    const backups = new BackupManager({ directory: join(target, 'not-a-directory') })

    const result = await remediateResult(check, makeResult({ message: '1 account(s) have empty passwords' }), deps({ backups }))

    expect(result.remediation).toBe('failed')
    expect(result.message.startsWith('1 account(s) have empty passwords (remediation failed: Remediation of empty-passwords failed: backup of')).toBe(true)
    expect(remediate).not.toHaveBeenCalled()
  })

  it('records a thrown remediation error as failed', async () => {
    const check = makeCheck({
      remediate: async () => {
        throw new Error('systemctl start auditd failed: exit code 5')
      },
    })

    const result = await remediateResult(check, makeResult({ message: 'auditd is installed but not running' }), deps())
    expect(result).toMatchObject({
      status: 'fail',
      remediation: 'failed',
      remediationNote: 'systemctl start auditd failed: exit code 5',
      message: 'auditd is installed but not running (remediation failed: systemctl start auditd failed: exit code 5)',
    })
  })
})

describe('remediateAll', () => {
  it('leaves passing results alone and keeps order', async () => {
    const order: string[] = []
    const checks = ['a', 'b', 'c'].map(id =>
      makeCheck({
        id,
        remediate: async () => {
          order.push(id)
          return `fixed ${id}`
        },
      })
    )
    const results = [
      makeResult({ checkId: 'a' }),
      makeResult({ checkId: 'b', status: 'pass' }),
      makeResult({ checkId: 'c', status: 'warn' }),
    ]

    const remediated = await remediateAll(results, checks, deps())

    expect(order).toEqual(['a', 'c'])
    expect(remediated.map(r => r.remediation)).toEqual(['applied', undefined, 'applied'])
    expect(remediated[1]).toBe(results[1])
  })

  it('continues past a failed remediation without undoing earlier ones', async () => {
    const applied: string[] = []
    const checks = [
      makeCheck({
        id: 'one',
        remediate: async () => {
          applied.push('one')
          return 'ok'
        },
      }),
      makeCheck({
        id: 'two',
        remediate: async () => {
          throw new Error('boom')
        },
      }),
      makeCheck({
        id: 'three',
        remediate: async () => {
          applied.push('three')
          return 'ok'
        },
      }),
    ]
    const results = checks.map(c => makeResult({ checkId: c.id }))

    const remediated = await remediateAll(results, checks, deps())

    expect(remediated.map(r => r.remediation)).toEqual(['applied', 'failed', 'applied'])
    expect(applied).toEqual(['one', 'three'])
  })

  it('asks the confirmer only for gated checks', async () => {
    const checks = [
      makeCheck({ id: 'gated', requiresConfirmation: true, remediate: async () => 'ok' }),
      makeCheck({ id: 'free', remediate: async () => 'ok' }),
    ]
    const confirmer = createScriptedConfirmer({ gated: false })

    const remediated = await remediateAll(
      checks.map(c => makeResult({ checkId: c.id })),
      checks,
      deps({ confirmer })
    )

    expect(confirmer.asked).toEqual(['gated'])
    expect(remediated.map(r => r.remediation)).toEqual(['declined', 'applied'])
  })
})
