import { readTextFile, writeTextFile } from '../../host/files.js'
import { KeyValueConfig, sysctlDialect } from '../../host/keyValueConfig.js'
import { runChecked } from '../../host/commandRunner.js'
import { AppError } from '../../shared/error.js'
import type { Config } from '../../config/schema.js'
import type { Check, CheckStatus, Evaluation } from '../types.js'

interface KernelParameter {
  id: string
  title: string
  /** Parameter read to decide compliance */
  probe: string
  expected: string
  /** Parameters written by remediation (probe plus its siblings) */
  settings: string[]
  severity: Exclude<CheckStatus, 'pass'>
  passMessage: string
  failMessage: string
  appliedMessage: string
}

const KERNEL_PARAMETERS: KernelParameter[] = [
  {
    id: 'kernel-ip-forward',
    title: 'IP forwarding',
    probe: 'net.ipv4.ip_forward',
    expected: '0',
    settings: ['net.ipv4.ip_forward'],
    // Routers and container hosts need it on
    severity: 'warn',
    passMessage: 'IP forwarding is disabled',
    failMessage: 'IP forwarding is enabled (disable unless this is a router)',
    appliedMessage: 'Disabled IP forwarding',
  },
  {
    id: 'kernel-icmp-redirects',
    title: 'ICMP redirect acceptance',
    probe: 'net.ipv4.conf.all.accept_redirects',
    expected: '0',
    settings: ['net.ipv4.conf.all.accept_redirects', 'net.ipv4.conf.default.accept_redirects'],
    severity: 'fail',
    passMessage: 'ICMP redirects are disabled',
    failMessage: 'ICMP redirects should be disabled',
    appliedMessage: 'Disabled ICMP redirects',
  },
  {
    id: 'kernel-source-route',
    title: 'Source packet routing',
    probe: 'net.ipv4.conf.all.accept_source_route',
    expected: '0',
    settings: ['net.ipv4.conf.all.accept_source_route', 'net.ipv4.conf.default.accept_source_route'],
    severity: 'fail',
    passMessage: 'Source packet routing is disabled',
    failMessage: 'Source packet routing should be disabled',
    appliedMessage: 'Disabled source packet routing',
  },
  {
    id: 'kernel-syncookies',
    title: 'SYN flood protection',
    probe: 'net.ipv4.tcp_syncookies',
    expected: '1',
    settings: ['net.ipv4.tcp_syncookies'],
    severity: 'fail',
    passMessage: 'SYN cookies are enabled',
    failMessage: 'SYN cookies should be enabled',
    appliedMessage: 'Enabled SYN cookies',
  },
]

function createKernelParameterCheck(param: KernelParameter, sysctlConf: string): Check {
  return {
    id: param.id,
    title: param.title,
    category: 'kernel-parameters',
    requiresConfirmation: false,
    mutates: true,
    targetFiles: [sysctlConf],

    async evaluate({ runner }): Promise<Evaluation> {
      const result = await runner.run('sysctl', ['-n', param.probe])
      if (result.exitCode !== 0) {
        throw AppError.commandFailed(`sysctl -n ${param.probe}`, result.stderr.trim() || `exit code ${result.exitCode}`)
      }
      const current = result.stdout.trim()
      if (current === param.expected) {
        return { status: 'pass', message: param.passMessage }
      }
      return {
        status: param.severity,
        message: param.failMessage,
        details: [`${param.probe} = ${current}`],
      }
    },

    async remediate({ runner }) {
      for (const key of param.settings) {
        await runChecked(runner, 'sysctl', ['-w', `${key}=${param.expected}`])
      }

      // Persist so the setting survives a reboot
      const doc = KeyValueConfig.parse((await readTextFile(sysctlConf)) ?? '', sysctlDialect)
      const outcomes = param.settings.map(key => doc.set(key, param.expected))
      if (outcomes.some(o => o !== 'unchanged')) {
        await writeTextFile(sysctlConf, doc.toString())
      }
      return param.appliedMessage
    },
  }
}

export function createKernelParameterChecks(config: Config): Check[] {
  return KERNEL_PARAMETERS.map(param => createKernelParameterCheck(param, config.paths.sysctlConf))
}
