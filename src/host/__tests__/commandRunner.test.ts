/**
 * commandRunner unit tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { chmodSync, mkdtempSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { resolveCommand, runChecked, type CommandRunner } from '../commandRunner.js'

function stubRunner(exitCode: number, stderr = ''): CommandRunner {
  return {
    async has() {
      return true
    },
    async run() {
      return { exitCode, stdout: '', stderr }
    },
  }
}

describe('runChecked', () => {
  it('returns the result of a successful command', async () => {
    await expect(runChecked(stubRunner(0), 'sysctl', ['-w', 'a=1'])).resolves.toEqual({
      exitCode: 0,
      stdout: '',
      stderr: '',
    })
  })

  it('throws COMMAND_FAILED with stderr on a non-zero exit', async () => {
    await expect(runChecked(stubRunner(1, 'permission denied\n'), 'passwd', ['-l', 'guest'])).rejects.toMatchObject({
      code: 'COMMAND_FAILED',
      message: 'passwd -l guest failed: permission denied',
    })
  })

  it('falls back to the exit code when stderr is empty', async () => {
    await expect(runChecked(stubRunner(4), 'systemctl', ['start', 'auditd'])).rejects.toMatchObject({
      message: 'systemctl start auditd failed: exit code 4',
    })
  })
})

describe('resolveCommand', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'hostward-path-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('finds an executable on the search path', async () => {
    const tool = join(dir, 'hostward-fake-tool')
    writeFileSync(tool, '#!/bin/sh\n')
    chmodSync(tool, 0o755)

    await expect(resolveCommand('hostward-fake-tool', dir)).resolves.toBe(tool)
  })

  it('returns null for an unknown command', async () => {
    await expect(resolveCommand('hostward-no-such-tool', dir)).resolves.toBeNull()
  })
})
