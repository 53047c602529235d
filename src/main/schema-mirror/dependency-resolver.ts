import * as path from 'path'
import { formatErrorChain } from './errors'
import type { Logger, RetryCandidate, ScriptFailure } from './types'

export type ResolverStopReason = 'completed' | 'noProgress' | 'exhausted'

export interface ResolverOptions {
  maxRetries: number
  log: Logger
}

export interface ResolverOutcome {
  succeeded: string[]
  failed: ScriptFailure[]
  passes: number
  stopReason: ResolverStopReason
}

interface PassOutcome {
  succeeded: readonly string[]
  remaining: readonly RetryCandidate[]
  errors: ReadonlyMap<string, string>
}

export function createRetryCandidates(
  scripts: readonly { scriptPath: string; kind: RetryCandidate['kind'] }[],
  maxRetries: number
): RetryCandidate[] {
  return scripts.map((script) => ({ ...script, remainingAttempts: maxRetries }))
}

async function runPass(
  pending: readonly RetryCandidate[],
  apply: (candidate: RetryCandidate) => Promise<void>
): Promise<PassOutcome> {
  const succeeded: string[] = []
  const remaining: RetryCandidate[] = []
  const errors = new Map<string, string>()

  for (const candidate of pending) {
    try {
      await apply(candidate)
      succeeded.push(candidate.scriptPath)
    } catch (error) {
      errors.set(candidate.scriptPath, formatErrorChain(error))
      remaining.push({ ...candidate, remainingAttempts: candidate.remainingAttempts - 1 })
    }
  }

  return { succeeded, remaining, errors }
}

/**
 * Applies scripts that may reference each other until a fixpoint: every pass
 * retries what is still pending. Stops when nothing is pending, when a pass
 * resolves nothing new, or after maxRetries passes.
 */
export async function resolveDependencies(
  candidates: readonly RetryCandidate[],
  apply: (candidate: RetryCandidate) => Promise<void>,
  options: ResolverOptions
): Promise<ResolverOutcome> {
  const { log } = options
  const succeeded: string[] = []
  let lastErrors: ReadonlyMap<string, string> = new Map()
  let pending: readonly RetryCandidate[] = candidates
  let passes = 0
  let stopReason: ResolverStopReason = 'completed'

  log(
    `Resolvendo dependências de ${candidates.length} scripts ` +
      `(máximo ${options.maxRetries} passes)`
  )

  while (pending.length > 0) {
    if (passes >= options.maxRetries) {
      stopReason = 'exhausted'
      break
    }

    passes++
    const outcome = await runPass(pending, apply)
    succeeded.push(...outcome.succeeded)
    lastErrors = outcome.errors

    log(
      `  Passe ${passes}: ${outcome.succeeded.length} aplicados, ` +
        `${outcome.remaining.length} pendentes`
    )

    const progressed = outcome.remaining.length < pending.length
    pending = outcome.remaining

    if (!progressed) {
      stopReason = 'noProgress'
      break
    }
  }

  const failed = pending.map((candidate) => ({
    scriptPath: candidate.scriptPath,
    error: lastErrors.get(candidate.scriptPath) ?? 'Limite de passes atingido'
  }))

  if (failed.length === 0) {
    log(`✓ Todas as dependências resolvidas em ${passes} passe(s)`)
  } else {
    const reason =
      stopReason === 'noProgress'
        ? 'nenhum progresso no último passe'
        : 'limite de passes atingido'
    log(`✗ ${failed.length} scripts não puderam ser aplicados (${reason}):`)
    for (const failure of failed) {
      log(`    ${path.basename(failure.scriptPath)}: ${failure.error}`)
    }
  }

  return { succeeded, failed, passes, stopReason }
}
