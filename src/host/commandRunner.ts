/**
 * External command access.
 *
 * Every system facility the checks touch (systemctl, sysctl, ufw, apt-get,
 * passwd ...) goes through a CommandRunner so tests can swap in a fake.
 */

import { access } from 'fs/promises'
import { constants } from 'fs'
import { delimiter, join } from 'path'
import { execa, ExecaError } from 'execa'
import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import { createLogger } from '../shared/logger.js'

const logger = createLogger('runner')

/** Admin tools live in sbin, which is often missing from a non-root PATH */
const SBIN_DIRS = ['/usr/local/sbin', '/usr/sbin', '/sbin']

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

export interface RunOptions {
  env?: Record<string, string>
}

export interface CommandRunner {
  /** Whether the command can be found */
  has(command: string): Promise<boolean>
  /**
   * Run to completion. A non-zero exit is returned, not thrown; a command
   * that cannot be found throws TOOL_MISSING.
   */
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK)
    return true
  } catch {
    return false
  }
}

export async function resolveCommand(
  command: string,
  searchPath: string = process.env.PATH ?? ''
): Promise<string | null> {
  if (command.includes('/')) {
    return (await isExecutable(command)) ? command : null
  }
  const dirs = [...searchPath.split(delimiter).filter(Boolean), ...SBIN_DIRS]
  for (const dir of dirs) {
    const candidate = join(dir, command)
    if (await isExecutable(candidate)) return candidate
  }
  return null
}

function asText(value: unknown): string {
  return typeof value === 'string' ? value : ''
}

export function createExecaRunner(): CommandRunner {
  return {
    async has(command) {
      return (await resolveCommand(command)) !== null
    },

    async run(command, args, options = {}) {
      const resolved = await resolveCommand(command)
      if (!resolved) throw AppError.toolMissing(command)

      logger.debug(`$ ${command} ${args.join(' ')}`)
      try {
        const result = await execa(resolved, [...args], { env: options.env, stdin: 'ignore' })
        return { exitCode: result.exitCode ?? 0, stdout: result.stdout, stderr: result.stderr }
      } catch (error) {
        if (error instanceof ExecaError && typeof error.exitCode === 'number') {
          return {
            exitCode: error.exitCode,
            stdout: asText(error.stdout),
            stderr: asText(error.stderr),
          }
        }
        if (error instanceof ExecaError && error.code === 'ENOENT') {
          throw AppError.toolMissing(command)
        }
        throw AppError.commandFailed(command, getErrorMessage(error), error)
      }
    },
  }
}

/**
 * Run a mutating command and throw when it does not exit 0.
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: RunOptions
): Promise<CommandResult> {
  const result = await runner.run(command, args, options)
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim() || `exit code ${result.exitCode}`
    throw AppError.commandFailed(`${command} ${args.join(' ')}`, detail)
  }
  return result
}
