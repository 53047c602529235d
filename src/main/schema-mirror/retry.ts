import { errorChain, errorMessage } from './errors'
import type { Logger } from './types'
import { sleep as defaultSleep } from './utils'

/**
 * SQL Server error numbers treated as transient: timeout, deadlock victim,
 * transport failures and Azure SQL throttling / failover.
 */
export const TRANSIENT_ERROR_NUMBERS: ReadonlySet<number> = new Set([
  -2, 20, 64, 233, 1205, 4060, 4221, 10053, 10054, 10060, 10928, 10929, 40143, 40197, 40501,
  40613, 49918, 49919, 49920
])

export const TRANSIENT_ERROR_CODES: ReadonlySet<string> = new Set([
  'ETIMEOUT',
  'ESOCKET',
  'ECONNRESET',
  'ECONNCLOSED'
])

const TRANSIENT_MESSAGE_PATTERNS: readonly RegExp[] = [
  /timeout/i,
  /timed out/i,
  /connection pool/i,
  /pool (is )?(exhausted|full)/i,
  /max(imum)? pool size/i
]

export interface RetryOptions {
  maxAttempts: number
  initialDelayMs: number
  log?: Logger
  sleep?: (ms: number) => Promise<void>
}

function readNumber(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined
  if ('number' in error && typeof error.number === 'number') return error.number
  if ('info' in error && typeof error.info === 'object' && error.info !== null) {
    const info = error.info
    if ('number' in info && typeof info.number === 'number') return info.number
  }
  return undefined
}

function readCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined
  if ('code' in error && typeof error.code === 'string') return error.code
  return undefined
}

export function isTransientError(error: unknown): boolean {
  return errorChain(error).some((entry) => {
    const number = readNumber(entry)
    if (number !== undefined && TRANSIENT_ERROR_NUMBERS.has(number)) return true

    const code = readCode(entry)
    if (code !== undefined && TRANSIENT_ERROR_CODES.has(code)) return true

    const message = errorMessage(entry)
    return TRANSIENT_MESSAGE_PATTERNS.some((pattern) => pattern.test(message))
  })
}

/**
 * Runs an operation, retrying transient failures with exponential backoff.
 * Non-transient errors and the last transient error are rethrown unchanged.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? defaultSleep
  const maxAttempts = Math.max(1, options.maxAttempts)
  let delay = options.initialDelayMs

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt)
    } catch (error) {
      if (attempt >= maxAttempts || !isTransientError(error)) {
        throw error
      }

      options.log?.(
        `⚠️  Erro transitório (tentativa ${attempt}/${maxAttempts}): ${errorMessage(error)}. ` +
          `Nova tentativa em ${delay}ms`
      )
      await wait(delay)
      delay *= 2
    }
  }
}
