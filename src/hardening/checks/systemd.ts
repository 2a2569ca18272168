import { runChecked, type CommandRunner } from '../../host/commandRunner.js'

export async function isServiceActive(runner: CommandRunner, unit: string): Promise<boolean> {
  const result = await runner.run('systemctl', ['is-active', '--quiet', unit])
  return result.exitCode === 0
}

/** Names of installed unit files, e.g. "telnet.socket" */
export async function listUnitFiles(runner: CommandRunner): Promise<string[]> {
  const { stdout } = await runner.run('systemctl', ['list-unit-files', '--no-legend', '--no-pager'])
  return stdout
    .split('\n')
    .map(line => line.trim().split(/\s+/)[0] ?? '')
    .filter(Boolean)
}

export async function startAndEnable(runner: CommandRunner, unit: string): Promise<void> {
  await runChecked(runner, 'systemctl', ['start', unit])
  await runChecked(runner, 'systemctl', ['enable', unit])
}

export async function stopAndDisable(runner: CommandRunner, unit: string): Promise<void> {
  await runChecked(runner, 'systemctl', ['stop', unit])
  await runChecked(runner, 'systemctl', ['disable', unit])
}
