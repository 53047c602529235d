import type { SqlSession } from '../connection'
import { formatDataType } from './data-types'
import { batch, numberOption, objectNameOf, queryObject, type ScriptGenerator } from './shared'
import { quoteName, sqlLiteral, unicodeLiteral } from './sql-literals'

interface DataColumnRow {
  column_name: string
  type_name: string
  max_length: number
  precision: number
  scale: number
  is_identity: boolean
  is_computed: boolean
}

const DATA_COLUMNS_QUERY = `
  SELECT
    c.name AS column_name,
    t.name AS type_name,
    c.max_length,
    c.precision,
    c.scale,
    c.is_identity,
    c.is_computed
  FROM sys.columns AS c
  JOIN sys.types AS t ON t.user_type_id = c.user_type_id
  WHERE c.object_id = OBJECT_ID(@name)
  ORDER BY c.column_id
`

/** SQL Server caps a table value constructor at 1000 rows */
export const MAX_ROWS_PER_INSERT = 1000

const UNSCRIPTABLE_TYPES = new Set(['timestamp', 'rowversion'])

/** CLR types travel as their binary form and are cast back on insert */
const CLR_TYPES = new Set(['hierarchyid', 'geometry', 'geography'])

/**
 * Types the driver would round through a JS number or Date. They are read as
 * text and cast back to the column type on insert.
 */
const TEXT_TYPES = new Set(['decimal', 'numeric', 'datetime2', 'time', 'datetimeoffset'])

/** money keeps its four decimals only with style 2 */
const MONEY_TYPES = new Set(['money', 'smallmoney'])

export function selectExpression(column: DataColumnRow): string {
  const name = quoteName(column.column_name)
  const type = column.type_name.toLowerCase()

  if (CLR_TYPES.has(type)) return `CAST(${name} AS varbinary(max)) AS ${name}`
  if (TEXT_TYPES.has(type)) return `CAST(${name} AS nvarchar(64)) AS ${name}`
  if (MONEY_TYPES.has(type)) return `CONVERT(nvarchar(64), ${name}, 2) AS ${name}`
  return name
}

export function valueLiteral(column: DataColumnRow, value: unknown): string {
  const type = column.type_name.toLowerCase()
  if (value === null || value === undefined) return 'NULL'

  if (CLR_TYPES.has(type)) return `CAST(${sqlLiteral(value)} AS ${type})`
  if (typeof value === 'string' && (TEXT_TYPES.has(type) || MONEY_TYPES.has(type))) {
    return `CAST(${unicodeLiteral(value)} AS ${formatDataType(column)})`
  }
  return sqlLiteral(value)
}

export function readRowsPerInsert(value: number): number {
  return Math.min(Math.max(1, Math.floor(value)), MAX_ROWS_PER_INSERT)
}

/**
 * One INSERT batch. With identity columns the batch switches IDENTITY_INSERT
 * on and always switches it off again, also when the INSERT fails, so a
 * failed batch does not block the next identity table on the same session.
 */
export function insertBatch(
  table: string,
  columns: readonly DataColumnRow[],
  rows: readonly Record<string, unknown>[],
  hasIdentity: boolean
): string {
  const columnList = columns.map((column) => quoteName(column.column_name)).join(', ')
  const values = rows.map((row) => {
    const literals = columns.map((column) => valueLiteral(column, row[column.column_name]))
    return `(${literals.join(', ')})`
  })
  const insert = `INSERT INTO ${table} (${columnList}) VALUES\n${values.join(',\n')}`

  if (!hasIdentity) return batch(insert)

  return batch(
    [
      `SET IDENTITY_INSERT ${table} ON`,
      'BEGIN TRY',
      insert,
      'END TRY',
      'BEGIN CATCH',
      `    SET IDENTITY_INSERT ${table} OFF;`,
      '    THROW;',
      'END CATCH',
      `SET IDENTITY_INSERT ${table} OFF`
    ].join('\n')
  )
}

async function* insertBatches(
  session: SqlSession,
  table: string,
  columns: readonly DataColumnRow[],
  rowsPerInsert: number
): AsyncGenerator<string> {
  const select = columns.map(selectExpression).join(', ')
  const hasIdentity = columns.some((column) => column.is_identity)
  let pending: Record<string, unknown>[] = []
  let total = 0

  for await (const row of session.stream<Record<string, unknown>>(
    `SELECT ${select} FROM ${table}`
  )) {
    if (total === 0) yield batch('SET NOCOUNT ON')
    total++
    pending.push(row)
    if (pending.length === rowsPerInsert) {
      yield insertBatch(table, columns, pending, hasIdentity)
      pending = []
    }
  }

  if (pending.length > 0) yield insertBatch(table, columns, pending, hasIdentity)
  if (total === 0) yield `-- ${table}: nenhuma linha\n`
}

/**
 * INSERT batches of at most rowsPerInsert rows, streamed from the source so
 * the table never sits in memory as a whole
 */
export const scriptTableData: ScriptGenerator = async (session, request) => {
  const table = objectNameOf(request)
  const columns = (
    await queryObject<DataColumnRow>(session, request, DATA_COLUMNS_QUERY, { name: table })
  ).filter(
    (column) => !column.is_computed && !UNSCRIPTABLE_TYPES.has(column.type_name.toLowerCase())
  )
  const rowsPerInsert = readRowsPerInsert(numberOption(request, 'rowsPerInsert', 100))

  return insertBatches(session, table, columns, rowsPerInsert)
}
