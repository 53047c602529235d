import type { SqlSession } from '../connection'
import type { ScriptOptionValue, ScriptRequest } from '../types'
import { qualifiedName } from './sql-literals'

/**
 * Script text, or the text in pieces for bodies too large to hold in memory
 */
export type ScriptBody = string | AsyncIterable<string>

/**
 * Produces the T-SQL body of one object. Headers and file writes are the
 * scripter's job, not the generator's.
 */
export type ScriptGenerator = (session: SqlSession, request: ScriptRequest) => Promise<ScriptBody>

export function batch(statement: string): string {
  return `${statement.trimEnd()}\nGO\n`
}

export function displayName(request: Pick<ScriptRequest, 'ownerGroup' | 'name'>): string {
  return request.ownerGroup ? `${request.ownerGroup}.${request.name}` : request.name
}

/**
 * `[owner].[name]` of the request, used as the argument of OBJECT_ID/TYPE_ID
 */
export function objectNameOf(request: Pick<ScriptRequest, 'ownerGroup' | 'name'>): string {
  return qualifiedName(request.ownerGroup, request.name)
}

export function childNameOf(request: ScriptRequest, key: string): string {
  const child = request.extra?.[key]
  if (!child) {
    throw new Error(`Requisição de ${request.kind} sem "${key}" para ${displayName(request)}`)
  }
  return child
}

export function booleanOption(request: ScriptRequest, name: string, fallback: boolean): boolean {
  const value: ScriptOptionValue | undefined = request.optionOverrides[name]
  if (value === undefined) return fallback
  if (typeof value === 'boolean') return value
  if (typeof value === 'string') return value.toLowerCase() === 'true'
  return value !== 0
}

export function numberOption(request: ScriptRequest, name: string, fallback: number): number {
  const value = request.optionOverrides[name]
  const parsed = typeof value === 'number' ? value : Number(value)
  return value === undefined || !Number.isFinite(parsed) ? fallback : parsed
}

/**
 * Runs a catalog query that must describe an existing object
 * @throws Error when the catalog has no row for the object
 */
export async function queryObject<T extends object>(
  session: SqlSession,
  request: ScriptRequest,
  sql: string,
  params: Record<string, unknown>
): Promise<T[]> {
  const rows = await session.query<T>(sql, params)
  if (rows.length === 0) {
    throw new Error(`${request.kind} não encontrado no catálogo: ${displayName(request)}`)
  }
  return rows
}

export async function firstRow<T extends object>(
  session: SqlSession,
  request: ScriptRequest,
  sql: string,
  params: Record<string, unknown>
): Promise<T> {
  const [row] = await queryObject<T>(session, request, sql, params)
  return row
}
