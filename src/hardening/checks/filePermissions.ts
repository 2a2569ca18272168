import { basename } from 'path'
import { formatMode, getFileMode, parseMode, setFileMode } from '../../host/files.js'
import type { Config, CriticalFileConfig } from '../../config/schema.js'
import type { Check, Evaluation } from '../types.js'

export function resolveCriticalFiles(config: Config): CriticalFileConfig[] {
  if (config.criticalFiles) return config.criticalFiles
  const { passwd, shadow, group } = config.paths
  return [
    { path: passwd, mode: '644' },
    // 640 is the Debian default (root:shadow), needed by unix_chkpwd
    { path: shadow, mode: '600', allowed: ['000', '400', '600', '640'] },
    { path: group, mode: '644' },
  ]
}

function slug(text: string): string {
  return text.replace(/^\/+/, '').replace(/[^A-Za-z0-9_-]/g, '-')
}

/**
 * `file-mode-<basename>`, or `file-mode-<full path>` for files whose basename
 * is shared with another configured file.
 */
export function fileModeCheckIds(paths: readonly string[]): string[] {
  const counts = new Map<string, number>()
  for (const path of paths) {
    counts.set(basename(path), (counts.get(basename(path)) ?? 0) + 1)
  }
  return paths.map(path => {
    const name = basename(path)
    return `file-mode-${slug((counts.get(name) ?? 0) > 1 ? path : name)}`
  })
}

function createFileModeCheck(file: CriticalFileConfig, id: string): Check {
  const allowed = (file.allowed ?? [file.mode]).map(parseMode)
  const expected = parseMode(file.mode)

  return {
    id,
    title: `Permissions of ${file.path}`,
    category: 'file-permissions',
    requiresConfirmation: false,
    mutates: true,
    targetFiles: [file.path],

    async evaluate(): Promise<Evaluation> {
      const mode = await getFileMode(file.path)
      if (mode === null) {
        return { status: 'warn', message: `${file.path} not found`, fixable: false }
      }
      const shown = formatMode(mode)
      if (allowed.includes(mode)) {
        return { status: 'pass', message: `${file.path} has correct permissions (${shown})` }
      }
      return { status: 'fail', message: `${file.path} has incorrect permissions (${shown})` }
    },

    async remediate() {
      await setFileMode(file.path, expected)
      return `Set ${file.path} permissions to ${file.mode}`
    },
  }
}

function createWorldWritableCheck(config: Config): Check {
  const { directories, limit } = config.worldWritable

  return {
    id: 'world-writable-files',
    title: 'World-writable files in system directories',
    category: 'file-permissions',
    requiresConfirmation: false,
    mutates: false,
    targetFiles: [],

    async evaluate({ runner }): Promise<Evaluation> {
      // find exits non-zero on unreadable directories; the partial listing still counts
      const { stdout } = await runner.run('find', [...directories, '-xdev', '-type', 'f', '-perm', '-0002'])
      const files = stdout.split('\n').map(l => l.trim()).filter(Boolean)
      if (files.length === 0) {
        return { status: 'pass', message: 'No world-writable files found in critical directories' }
      }
      return {
        status: 'warn',
        message: `World-writable files found (showing first ${Math.min(limit, files.length)} of ${files.length})`,
        details: files.slice(0, limit),
        fixable: false,
      }
    },
  }
}

export function createFilePermissionChecks(config: Config): Check[] {
  const files = resolveCriticalFiles(config)
  const ids = fileModeCheckIds(files.map(file => file.path))
  return [
    ...files.map((file, i) => createFileModeCheck(file, ids[i] ?? slug(file.path))),
    createWorldWritableCheck(config),
  ]
}
