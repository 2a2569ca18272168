import { readFile, writeFile, stat, chmod } from 'fs/promises'
import { AppError, isNotFoundError, isPermissionError } from '../shared/error.js'

/**
 * Read a text file. Missing files yield null; unreadable ones throw
 * PERMISSION_DENIED so the evaluator can degrade the check to WARN.
 */
export async function readTextFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8')
  } catch (error) {
    if (isNotFoundError(error)) return null
    if (isPermissionError(error)) throw AppError.permissionDenied(path, error)
    throw error
  }
}

/** Rewrite in place so owner, group and mode stay as they are */
export async function writeTextFile(path: string, content: string): Promise<void> {
  await writeFile(path, content, 'utf-8')
}

/** Permission bits of a file, or null when it does not exist */
export async function getFileMode(path: string): Promise<number | null> {
  try {
    const stats = await stat(path)
    return stats.mode & 0o7777
  } catch (error) {
    if (isNotFoundError(error)) return null
    if (isPermissionError(error)) throw AppError.permissionDenied(path, error)
    throw error
  }
}

export async function setFileMode(path: string, mode: number): Promise<void> {
  await chmod(path, mode)
}

/** 0o644 → "644", 0o2755 → "2755" */
export function formatMode(mode: number): string {
  return mode.toString(8).padStart(3, '0')
}

export function parseMode(mode: string): number {
  return parseInt(mode, 8)
}
