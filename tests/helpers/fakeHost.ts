/**
 * In-process stand-in for a Linux host: a FakeRunner that answers the
 * commands the checks issue, plus real files in a temp directory.
 */

import { chmodSync, mkdtempSync, readFileSync, readdirSync, rmSync, statSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { AppError } from '../../src/shared/error.js'
import { configSchema, type Config, type PathsConfig } from '../../src/config/schema.js'
import type { CommandResult, CommandRunner, RunOptions } from '../../src/host/commandRunner.js'

export interface FakeHostState {
  tools: Set<string>
  /** unit → active */
  services: Map<string, boolean>
  unitFiles: string[]
  sysctl: Map<string, string>
  ufwActive: boolean
  aptUpgradable: string[]
  worldWritable: string[]
  /** Full command lines ("ufw --force enable") that exit 1 */
  failing: Set<string>
}

const MUTATING = [
  /^systemctl (start|stop|enable|disable) /,
  /^sysctl -w /,
  /^ufw --force enable$/,
  /^apt-get (update|upgrade|install)/,
  /^yum (update|install)/,
  /^passwd -l /,
]

function ok(stdout = ''): CommandResult {
  return { exitCode: 0, stdout, stderr: '' }
}

function exit(exitCode: number, stderr = ''): CommandResult {
  return { exitCode, stdout: '', stderr }
}

export class FakeRunner implements CommandRunner {
  readonly calls: string[] = []

  constructor(
    readonly state: FakeHostState,
    private readonly shadowPath: string
  ) {}

  /** Calls that would change the host */
  get mutations(): string[] {
    return this.calls.filter(line => MUTATING.some(pattern => pattern.test(line)))
  }

  async has(command: string): Promise<boolean> {
    return this.state.tools.has(command)
  }

  async run(command: string, args: readonly string[], _options?: RunOptions): Promise<CommandResult> {
    if (!this.state.tools.has(command)) throw AppError.toolMissing(command)
    const line = [command, ...args].join(' ')
    this.calls.push(line)
    if (this.state.failing.has(line)) return exit(1, 'simulated failure')

    switch (command) {
      case 'systemctl':
        return this.systemctl(args)
      case 'sysctl':
        return this.sysctlCommand(args)
      case 'ufw':
        if (args[0] === 'status') return ok(`Status: ${this.state.ufwActive ? 'active' : 'inactive'}\n`)
        this.state.ufwActive = true
        return ok('Firewall is active and enabled on system startup\n')
      case 'apt':
        return ok(
          ['Listing...', ...this.state.aptUpgradable.map(p => `${p}/stable 2.0 amd64 [upgradable from: 1.0]`)].join('\n')
        )
      case 'apt-get':
        if (args[0] === 'upgrade') this.state.aptUpgradable = []
        if (args[0] === 'install') this.state.tools.add('auditd')
        return ok()
      case 'passwd':
        return this.lock(args[1] ?? '')
      case 'find':
        return ok(this.state.worldWritable.join('\n'))
      case 'iptables':
        return ok('Chain INPUT (policy ACCEPT)\n')
      default:
        return exit(127, `${command}: not simulated`)
    }
  }

  private systemctl(args: readonly string[]): CommandResult {
    const [verb = '', ...rest] = args
    const unit = rest[rest.length - 1] ?? ''
    switch (verb) {
      case 'is-active':
        return this.state.services.get(unit) ? ok() : exit(3)
      case 'list-unit-files':
        return ok(this.state.unitFiles.map(u => `${u} enabled enabled`).join('\n'))
      case 'start':
        this.state.services.set(unit, true)
        return ok()
      case 'stop':
        this.state.services.set(unit, false)
        return ok()
      default:
        return ok()
    }
  }

  private sysctlCommand(args: readonly string[]): CommandResult {
    if (args[0] === '-w') {
      const [key = '', value = ''] = (args[1] ?? '').split('=')
      this.state.sysctl.set(key, value)
      return ok(`${key} = ${value}\n`)
    }
    const value = this.state.sysctl.get(args[1] ?? '')
    return value === undefined ? exit(255, `sysctl: cannot stat /proc/sys/${args[1]}`) : ok(`${value}\n`)
  }

  private lock(user: string): CommandResult {
    const lines = readFileSync(this.shadowPath, 'utf-8').split('\n')
    const index = lines.findIndex(l => l.startsWith(`${user}:`))
    if (index === -1) return exit(1, `passwd: user '${user}' does not exist`)
    const [name = '', hash = '', ...rest] = (lines[index] ?? '').split(':')
    lines[index] = [name, `!${hash}`, ...rest].join(':')
    writeFileSync(this.shadowPath, lines.join('\n'))
    return ok(`passwd: password expiry information changed.\n`)
  }
}

export interface TestHost {
  dir: string
  config: Config
  runner: FakeRunner
  path(name: string): string
  read(name: string): string
  /** name → content + mode + mtime of every file in the host directory */
  snapshot(): Map<string, string>
  cleanup(): void
}

const COMPLIANT_FILES = {
  sshd_config: 'PermitRootLogin no\nPasswordAuthentication no\nX11Forwarding no\nMaxAuthTries 3\n',
  'login.defs': 'PASS_MAX_DAYS\t90\n',
  passwd: 'root:x:0:0:root:/root:/bin/bash\nalice:x:1000:1000:Alice:/home/alice:/bin/bash\n',
  shadow: 'root:$6$placeholder:19000:0:99999:7:::\nalice:$6$placeholder:19000:0:99999:7:::\n',
  group: 'root:x:0:\nalice:x:1000:\n',
  'sysctl.conf': '',
}

const NON_COMPLIANT_FILES = {
  sshd_config: [
    'PermitRootLogin yes',
    'PasswordAuthentication yes',
    '#X11Forwarding no',
    'Match User backup',
    '    X11Forwarding yes',
    '',
  ].join('\n'),
  'login.defs': 'PASS_MAX_DAYS\t99999\n',
  passwd: [
    'root:x:0:0:root:/root:/bin/bash',
    'toor:x:0:0::/root:/bin/sh',
    'guest:x:1001:1001::/home/guest:/bin/sh',
    '',
  ].join('\n'),
  shadow: [
    'root:$6$placeholder:19000:0:99999:7:::',
    'toor:$6$placeholder:19000:0:99999:7:::',
    'guest::19000:0:99999:7:::',
    '',
  ].join('\n'),
  group: 'root:x:0:\n',
  'sysctl.conf': '# kernel tuning\n',
}

function compliantState(): FakeHostState {
  return {
    tools: new Set(['systemctl', 'sysctl', 'ufw', 'apt', 'apt-get', 'passwd', 'find', 'auditd']),
    services: new Map([['auditd', true]]),
    unitFiles: ['auditd.service', 'ssh.service'],
    sysctl: new Map([
      ['net.ipv4.ip_forward', '0'],
      ['net.ipv4.conf.all.accept_redirects', '0'],
      ['net.ipv4.conf.default.accept_redirects', '0'],
      ['net.ipv4.conf.all.accept_source_route', '0'],
      ['net.ipv4.conf.default.accept_source_route', '0'],
      ['net.ipv4.tcp_syncookies', '1'],
    ]),
    ufwActive: true,
    aptUpgradable: [],
    worldWritable: [],
    failing: new Set(),
  }
}

function nonCompliantState(): FakeHostState {
  const state = compliantState()
  state.tools.delete('auditd')
  state.services = new Map([['telnet.socket', true]])
  state.unitFiles = ['ssh.service', 'telnet.socket']
  state.sysctl.set('net.ipv4.ip_forward', '1')
  state.sysctl.set('net.ipv4.conf.all.accept_redirects', '1')
  state.sysctl.set('net.ipv4.tcp_syncookies', '0')
  state.ufwActive = false
  state.aptUpgradable = ['openssl', 'curl']
  return state
}

export interface CreateTestHostOptions {
  compliant: boolean
  /** Patch the fake state after the preset is applied */
  tweak?: (state: FakeHostState) => void
  /** Paths replacing the generated temp-dir ones */
  paths?: Partial<PathsConfig>
  /** Extra top-level config sections */
  config?: Record<string, unknown>
}

export function createTestHost(options: CreateTestHostOptions): TestHost {
  const dir = mkdtempSync(join(tmpdir(), 'hostward-test-'))
  const files = options.compliant ? COMPLIANT_FILES : NON_COMPLIANT_FILES
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(join(dir, name), content)
    chmodSync(join(dir, name), name === 'shadow' ? (options.compliant ? 0o600 : 0o644) : 0o644)
  }

  const state = options.compliant ? compliantState() : nonCompliantState()
  options.tweak?.(state)

  const config = configSchema.parse({
    paths: {
      sshdConfig: join(dir, 'sshd_config'),
      loginDefs: join(dir, 'login.defs'),
      passwd: join(dir, 'passwd'),
      shadow: join(dir, 'shadow'),
      group: join(dir, 'group'),
      sysctlConf: join(dir, 'sysctl.conf'),
      ...options.paths,
    },
    worldWritable: { directories: [dir] },
    ...options.config,
  })

  return {
    dir,
    config,
    runner: new FakeRunner(state, config.paths.shadow),
    path: name => join(dir, name),
    read: name => readFileSync(join(dir, name), 'utf-8'),
    snapshot() {
      const result = new Map<string, string>()
      for (const name of readdirSync(dir).sort()) {
        const stats = statSync(join(dir, name))
        result.set(name, `${readFileSync(join(dir, name), 'utf-8')}|${stats.mode}|${stats.mtimeMs}`)
      }
      return result
    },
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  }
}
