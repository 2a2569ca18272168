import { loadConfig, type Config } from '../../config/index.js'
import { createExecaRunner, type CommandRunner } from '../../host/index.js'
import {
  buildRegistry,
  createFixedConfirmer,
  createPromptConfirmer,
  findUnknownCheckIds,
  isPrivileged,
  renderJson,
  renderReport,
  resolveMode,
  runHardening,
  type Confirmer,
  type Mode,
} from '../../hardening/index.js'
import { printError, setLogLevel } from '../../shared/index.js'
import { confirm } from '../prompt.js'
import { warn } from '../output.js'

export interface HardenOptions {
  audit?: boolean
  apply?: boolean
  yes?: boolean
  config?: string
  json?: boolean
  verbose?: boolean
}

/** Seams for tests; every field defaults to the real host */
export interface HardenDeps {
  runner?: CommandRunner
  privileged?: boolean
  interactive?: boolean
  write?: (text: string) => void
  loadConfig?: (path?: string) => Promise<Config>
}

function pickConfirmer(mode: Mode, yes: boolean, interactive: boolean): Confirmer {
  if (yes) return createFixedConfirmer(true)
  if (interactive) return createPromptConfirmer(confirm)
  if (mode === 'apply') {
    warn('No terminal for confirmation prompts: confirmation-gated remediations will be declined (use --yes to accept)')
  }
  return createFixedConfirmer(false)
}

/**
 * Run one audit/apply pass and return the process exit code.
 */
export async function executeHarden(options: HardenOptions, deps: HardenDeps = {}): Promise<number> {
  if (options.verbose) setLogLevel('debug')
  const write = deps.write ?? ((text: string) => console.log(text))

  try {
    const mode = resolveMode(options)
    const privileged = deps.privileged ?? isPrivileged()

    const config = deps.loadConfig
      ? await deps.loadConfig(options.config)
      : await loadConfig({ path: options.config })
    const unknown = findUnknownCheckIds(config)
    if (unknown.length > 0) {
      warn(`Unknown check id(s) in checks.disabled: ${unknown.join(', ')}`)
    }

    const interactive = deps.interactive ?? Boolean(process.stdin.isTTY && process.stdout.isTTY)
    const report = await runHardening({
      mode,
      privileged,
      config,
      runner: deps.runner ?? createExecaRunner(),
      confirmer: pickConfirmer(mode, options.yes ?? false, interactive),
      checks: buildRegistry(config),
    })

    const color = !deps.write && Boolean(process.stdout.isTTY)
    write(options.json ? renderJson(report) : renderReport(report, { color }))
    return report.exitCode
  } catch (error) {
    printError(error instanceof Error ? error : String(error))
    return 1
  }
}
