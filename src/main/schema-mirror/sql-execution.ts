import * as fs from 'fs/promises'
import type { SqlSession } from './connection'
import { ScriptApplyError } from './errors'

/**
 * A batch separator line: GO, optional repeat count, optional trailing comment.
 * The count is accepted but the batch always runs once; exported scripts rely
 * on that, so changing it is a breaking change.
 */
export const BATCH_SEPARATOR = /^\s*GO(?:\s+\d+)?\s*(?:--.*)?$/i

export function splitSqlBatches(script: string): string[] {
  const batches: string[] = []
  let current: string[] = []

  const flush = () => {
    const batch = current.join('\n')
    if (batch.trim().length > 0) batches.push(batch)
    current = []
  }

  for (const line of script.split(/\r?\n/)) {
    if (BATCH_SEPARATOR.test(line)) {
      flush()
    } else {
      current.push(line)
    }
  }
  flush()

  return batches
}

const SQLCMD_VARIABLE = /\$\(([A-Za-z_][A-Za-z0-9_]*)\)/g

/**
 * Replaces $(NAME) references. Names are matched case-insensitively, as sqlcmd does.
 * @throws Error naming every variable without a value
 */
export function substituteSqlcmdVariables(
  script: string,
  variables: Readonly<Record<string, string>>
): string {
  const lookup = new Map(
    Object.entries(variables).map(([name, value]) => [name.toUpperCase(), value])
  )
  const missing = new Set<string>()

  const result = script.replace(SQLCMD_VARIABLE, (match, name: string) => {
    const value = lookup.get(name.toUpperCase())
    if (value === undefined) {
      missing.add(name)
      return match
    }
    return value
  })

  if (missing.size > 0) {
    throw new Error(`Variáveis SQLCMD sem valor: ${[...missing].join(', ')}`)
  }

  return result
}

export interface ApplyScriptOptions {
  variables: Readonly<Record<string, string>>
}

export type ScriptApplier = (session: SqlSession, scriptPath: string) => Promise<void>

/**
 * Reads a script file and runs its batches in order on the session.
 * Stops at the first failing batch; a partly applied script is not retried here.
 */
export async function applyScriptFile(
  session: SqlSession,
  scriptPath: string,
  options: ApplyScriptOptions
): Promise<number> {
  const content = await fs.readFile(scriptPath, 'utf8')
  const script = substituteSqlcmdVariables(content.replace(/^\uFEFF/, ''), options.variables)
  const batches = splitSqlBatches(script)

  for (const [index, batch] of batches.entries()) {
    try {
      await session.execute(batch)
    } catch (error) {
      throw new ScriptApplyError(scriptPath, index + 1, error)
    }
  }

  return batches.length
}

export function createScriptApplier(options: ApplyScriptOptions): ScriptApplier {
  return async (session, scriptPath) => {
    await applyScriptFile(session, scriptPath, options)
  }
}
