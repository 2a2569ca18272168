import { copyFile, chmod, mkdir, readdir } from 'fs/promises'
import { existsSync, constants } from 'fs'
import { basename, dirname, join } from 'path'
import { format } from 'date-fns'
import { getFileMode } from '../host/files.js'
import { createLogger } from '../shared/logger.js'

const logger = createLogger('backup')

const BACKUP_MARKER = '.backup.'
/** yyyyMMdd_HHmmss plus the collision counter, if any */
const BACKUP_SUFFIX = /^(\d{8}_\d{6})(?:_(\d+))?$/

export interface BackupRecord {
  original: string
  backup: string
  createdAt: Date
}

export interface BackupManagerOptions {
  /** Keep backups here instead of next to the original */
  directory?: string
  now?: () => Date
}

/**
 * Pre-mutation snapshots. The first backup of a file in a run captures its
 * state before any change; later requests for the same file reuse it.
 */
export class BackupManager {
  private readonly records = new Map<string, BackupRecord>()
  private readonly now: () => Date

  constructor(private readonly options: BackupManagerOptions = {}) {
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Snapshot a file. Returns null when the file does not exist yet.
   */
  async backup(path: string): Promise<BackupRecord | null> {
    const existing = this.records.get(path)
    if (existing) return existing

    if ((await getFileMode(path)) === null) return null

    if (this.options.directory) {
      await mkdir(this.options.directory, { recursive: true, mode: 0o700 })
    }

    const createdAt = this.now()
    const target = this.nextBackupPath(path, createdAt)
    await copyFile(path, target, constants.COPYFILE_EXCL)
    // Owner read-only, whatever the original allowed
    await chmod(target, 0o400)

    const record: BackupRecord = { original: path, backup: target, createdAt }
    this.records.set(path, record)
    logger.info(`Backed up ${path} → ${target}`)
    return record
  }

  get(path: string): BackupRecord | undefined {
    return this.records.get(path)
  }

  list(): BackupRecord[] {
    return [...this.records.values()]
  }

  private backupBase(path: string): string {
    const { directory } = this.options
    if (!directory) return path
    // Flatten the path so /etc/a/config and /etc/b/config cannot collide
    return join(directory, path.replace(/^\/+/, '').replace(/\//g, '_'))
  }

  /** <base>.backup.<yyyyMMdd_HHmmss>[_n], always sorting after earlier backups */
  private nextBackupPath(path: string, at: Date): string {
    const stem = `${this.backupBase(path)}${BACKUP_MARKER}${format(at, 'yyyyMMdd_HHmmss')}`
    let candidate = stem
    for (let n = 1; existsSync(candidate); n++) {
      candidate = `${stem}_${n}`
    }
    return candidate
  }
}

/**
 * Existing backups of a file, newest first.
 */
export async function listBackups(path: string, directory?: string): Promise<string[]> {
  const dir = directory ?? dirname(path)
  const prefix = directory
    ? `${path.replace(/^\/+/, '').replace(/\//g, '_')}${BACKUP_MARKER}`
    : `${basename(path)}${BACKUP_MARKER}`

  if (!existsSync(dir)) return []
  const entries = await readdir(dir)
  return entries
    .filter(name => name.startsWith(prefix))
    .flatMap(name => {
      const match = BACKUP_SUFFIX.exec(name.slice(prefix.length))
      if (!match) return []
      return [{ name, stamp: match[1] ?? '', counter: Number(match[2] ?? 0) }]
    })
    .sort((a, b) => b.stamp.localeCompare(a.stamp) || b.counter - a.counter)
    .map(({ name }) => join(dir, name))
}
