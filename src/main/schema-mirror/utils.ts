import * as fs from 'fs/promises'
import type { Logger, ProgressInfo } from './types'

export function createLogger(
  logCallback: (log: string) => void,
  getProgress: () => ProgressInfo
): Logger {
  return (message: string) => {
    const timestamp = new Date().toISOString()
    const progress = getProgress()
    const progressMsg =
      progress.totalItems > 0
        ? `[${progress.percentage}% - ${progress.completedItems}/${progress.totalItems}] `
        : ''
    const logMessage = `[${timestamp}] ${progressMsg}${message}`
    logCallback(logMessage)
  }
}

export function buildProgress(
  currentItem: string,
  completedItems: number,
  totalItems: number,
  status: ProgressInfo['status'],
  currentAction?: string
): ProgressInfo {
  return {
    currentItem,
    completedItems,
    totalItems,
    percentage: totalItems > 0 ? Math.round((completedItems / totalItems) * 100) : 0,
    status,
    currentAction
  }
}

export async function ensureDirectory(directory: string): Promise<void> {
  try {
    await fs.mkdir(directory, { recursive: true })
  } catch (error) {
    throw new Error(`Erro ao criar diretório ${directory}`, { cause: error })
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function pad(value: number, length = 2): string {
  return String(value).padStart(length, '0')
}

/**
 * yyyyMMdd_HHmmss in local time, used to name export folders
 */
export function formatFolderTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  )
}

/**
 * ISO-like local time with offset, e.g. 2026-01-20T08:09:04.000-03:00
 */
export function formatLocalTimestamp(date: Date): string {
  const offset = -date.getTimezoneOffset()
  const sign = offset >= 0 ? '+' : '-'
  const abs = Math.abs(offset)
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}T` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.` +
    `${pad(date.getMilliseconds(), 3)}${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`
  )
}

export function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`
}

/**
 * Converts a `*`/`?` wildcard pattern into an anchored, case-insensitive regex
 */
export function wildcardToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split('')
    .map((char) => {
      if (char === '*') return '.*'
      if (char === '?') return '.'
      return char.replace(/[.+^${}()|[\]\\]/g, '\\$&')
    })
    .join('')
  return new RegExp(`^${escaped}$`, 'i')
}
