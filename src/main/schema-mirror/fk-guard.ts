import type { SqlSession } from './connection'
import { errorMessage, formatErrorChain } from './errors'
import { quoteName } from './scripter/sql-literals'
import type { FkConstraintRef, IntegrityFailure, Logger } from './types'

export interface FkGuardReport {
  constraints: FkConstraintRef[]
  integrityErrors: IntegrityFailure[]
}

interface EnabledForeignKeyRow {
  table_schema: string
  table_name: string
  constraint_name: string
}

/**
 * The load inside the guard threw; the guard report is kept so the caller can
 * still account for integrity errors.
 */
export class FkGuardLoadError extends Error {
  readonly report: FkGuardReport

  constructor(report: FkGuardReport, cause: unknown) {
    super(`Carga de dados interrompida: ${errorMessage(cause)}`, { cause })
    this.name = 'FkGuardLoadError'
    this.report = report
  }
}

export const ENABLED_FOREIGN_KEYS_QUERY = `
  SELECT
    OBJECT_SCHEMA_NAME(fk.parent_object_id) AS table_schema,
    OBJECT_NAME(fk.parent_object_id) AS table_name,
    fk.name AS constraint_name
  FROM sys.foreign_keys AS fk
  WHERE fk.is_disabled = 0
    AND OBJECTPROPERTY(fk.parent_object_id, 'IsMSShipped') = 0
  ORDER BY table_schema, table_name, constraint_name
`

export function describeConstraint(
  ref: Pick<FkConstraintRef, 'tableOwnerGroup' | 'tableName' | 'constraintName'>
): string {
  return `${ref.tableOwnerGroup}.${ref.tableName}.${ref.constraintName}`
}

function qualifiedTable(ref: FkConstraintRef): string {
  return `${quoteName(ref.tableOwnerGroup)}.${quoteName(ref.tableName)}`
}

export function suspendStatement(ref: FkConstraintRef): string {
  return `ALTER TABLE ${qualifiedTable(ref)} NOCHECK CONSTRAINT ${quoteName(ref.constraintName)}`
}

export function revalidateStatement(ref: FkConstraintRef): string {
  const constraint = quoteName(ref.constraintName)
  return `ALTER TABLE ${qualifiedTable(ref)} WITH CHECK CHECK CONSTRAINT ${constraint}`
}

/**
 * Suspends every enabled foreign key on the target and returns the ones that
 * were actually suspended. A constraint that cannot be suspended is only logged.
 */
export async function suspendForeignKeys(
  session: SqlSession,
  log: Logger
): Promise<FkConstraintRef[]> {
  const rows = await session.query<EnabledForeignKeyRow>(ENABLED_FOREIGN_KEYS_QUERY)
  const suspended: FkConstraintRef[] = []

  for (const row of rows) {
    const ref: FkConstraintRef = {
      tableOwnerGroup: row.table_schema,
      tableName: row.table_name,
      constraintName: row.constraint_name,
      wasEnabledBeforeGuard: true,
      state: 'suspended'
    }

    try {
      await session.execute(suspendStatement(ref))
      suspended.push(ref)
    } catch (error) {
      log(`⚠️  Não foi possível suspender ${describeConstraint(ref)}: ${errorMessage(error)}`)
    }
  }

  log(`✓ ${suspended.length} foreign keys suspensas para a carga de dados`)
  return suspended
}

/**
 * Re-enables each suspended constraint with validation of existing rows.
 * Every constraint ends validated or failed; none is left suspended.
 */
export async function revalidateForeignKeys(
  session: SqlSession,
  constraints: readonly FkConstraintRef[],
  log: Logger
): Promise<FkGuardReport> {
  const settled: FkConstraintRef[] = []
  const integrityErrors: IntegrityFailure[] = []

  for (const ref of constraints) {
    try {
      await session.execute(revalidateStatement(ref))
      settled.push({ ...ref, state: 'validated' })
    } catch (error) {
      const message = formatErrorChain(error)
      settled.push({ ...ref, state: 'failed' })
      integrityErrors.push({ constraint: describeConstraint(ref), error: message })
      log(`✗ Violação de integridade em ${describeConstraint(ref)}: ${message}`)
    }
  }

  const validated = settled.filter((ref) => ref.state === 'validated').length
  log(`✓ ${validated}/${constraints.length} foreign keys reabilitadas e validadas`)

  return { constraints: settled, integrityErrors }
}

/**
 * Brackets a bulk load: suspend all enabled foreign keys, run the load, then
 * re-enable and validate them whether or not the load succeeded. An error from
 * the load is rethrown after validation.
 */
export async function withForeignKeysSuspended(
  session: SqlSession,
  load: () => Promise<void>,
  log: Logger
): Promise<FkGuardReport> {
  log('Suspendendo foreign keys antes da carga de dados...')
  const suspended = await suspendForeignKeys(session, log)

  let loadError: unknown
  let loadFailed = false

  try {
    await load()
  } catch (error) {
    loadFailed = true
    loadError = error
  }

  log('Reabilitando foreign keys com validação...')
  const report = await revalidateForeignKeys(session, suspended, log)

  if (loadFailed) {
    throw new FkGuardLoadError(report, loadError)
  }

  return report
}
