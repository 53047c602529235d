import type { SqlSession } from '../connection'
import type { ScriptRequest } from '../types'
import { formatDataType } from './data-types'
import {
  batch,
  booleanOption,
  childNameOf,
  firstRow,
  objectNameOf,
  queryObject,
  type ScriptGenerator
} from './shared'
import { qualifiedName, quoteName } from './sql-literals'

export interface ColumnRow {
  column_name: string
  type_name: string
  type_schema: string | null
  is_user_defined: boolean
  max_length: number
  precision: number
  scale: number
  is_nullable: boolean
  is_identity: boolean
  collation_name: string | null
  seed_value: number | string | null
  increment_value: number | string | null
  computed_definition: string | null
  is_persisted: boolean | null
  default_name: string | null
  default_definition: string | null
  is_rowguidcol: boolean
  is_filestream: boolean
  encryption_type_desc: string | null
  encryption_algorithm_name: string | null
  column_encryption_key_name: string | null
}

export const COLUMNS_QUERY = `
  SELECT
    c.name AS column_name,
    t.name AS type_name,
    SCHEMA_NAME(t.schema_id) AS type_schema,
    t.is_user_defined,
    c.max_length,
    c.precision,
    c.scale,
    c.is_nullable,
    c.is_identity,
    c.collation_name,
    ic.seed_value,
    ic.increment_value,
    cc.definition AS computed_definition,
    cc.is_persisted,
    dc.name AS default_name,
    dc.definition AS default_definition,
    c.is_rowguidcol,
    c.is_filestream,
    c.encryption_type_desc,
    c.encryption_algorithm_name,
    cek.name AS column_encryption_key_name
  FROM sys.columns AS c
  JOIN sys.types AS t ON t.user_type_id = c.user_type_id
  LEFT JOIN sys.identity_columns AS ic
    ON ic.object_id = c.object_id AND ic.column_id = c.column_id
  LEFT JOIN sys.computed_columns AS cc
    ON cc.object_id = c.object_id AND cc.column_id = c.column_id
  LEFT JOIN sys.default_constraints AS dc
    ON dc.parent_object_id = c.object_id AND dc.parent_column_id = c.column_id
  LEFT JOIN sys.column_encryption_keys AS cek
    ON cek.column_encryption_key_id = c.column_encryption_key_id
  WHERE c.object_id = @objectId
  ORDER BY c.column_id
`

interface ObjectIdRow {
  object_id: number | null
}

interface KeyColumnRow {
  constraint_name: string
  constraint_type: 'PK' | 'UQ'
  type_desc: string
  column_name: string
  is_descending_key: boolean
}

interface CheckConstraintRow {
  name: string
  definition: string
}

interface ForeignKeyRow {
  referenced_schema: string
  referenced_table: string
  delete_action: string
  update_action: string
  is_disabled: boolean
  parent_column: string
  referenced_column: string
}

/** Where a table or index is stored: a file group, or a partition scheme and its column */
interface DataSpaceRow {
  data_space_name: string | null
  data_space_type: string | null
  partition_column: string | null
}

interface TableStorageRow extends DataSpaceRow {
  filestream_data_space_name: string | null
  lob_data_space_name: string | null
}

interface IndexRow extends DataSpaceRow {
  type_desc: string
  is_unique: boolean
  filter_definition: string | null
  is_disabled: boolean
  column_name: string | null
  is_descending_key: boolean | null
  is_included_column: boolean | null
  key_ordinal: number | null
  partition_ordinal: number | null
}

const KEY_CONSTRAINTS_QUERY = `
  SELECT
    kc.name AS constraint_name,
    kc.type AS constraint_type,
    i.type_desc,
    c.name AS column_name,
    ic.is_descending_key
  FROM sys.key_constraints AS kc
  JOIN sys.indexes AS i ON i.object_id = kc.parent_object_id AND i.index_id = kc.unique_index_id
  JOIN sys.index_columns AS ic
    ON ic.object_id = i.object_id AND ic.index_id = i.index_id AND ic.key_ordinal > 0
  JOIN sys.columns AS c ON c.object_id = ic.object_id AND c.column_id = ic.column_id
  WHERE kc.parent_object_id = @objectId
  ORDER BY CASE kc.type WHEN 'PK' THEN 0 ELSE 1 END, kc.name, ic.key_ordinal
`

const TABLE_STORAGE_QUERY = `
  SELECT
    ds.name AS data_space_name,
    ds.type AS data_space_type,
    pc.name AS partition_column,
    fds.name AS filestream_data_space_name,
    lds.name AS lob_data_space_name
  FROM sys.tables AS t
  JOIN sys.indexes AS i ON i.object_id = t.object_id AND i.index_id IN (0, 1)
  JOIN sys.data_spaces AS ds ON ds.data_space_id = i.data_space_id
  LEFT JOIN sys.index_columns AS pic
    ON pic.object_id = i.object_id AND pic.index_id = i.index_id AND pic.partition_ordinal = 1
  LEFT JOIN sys.columns AS pc ON pc.object_id = pic.object_id AND pc.column_id = pic.column_id
  LEFT JOIN sys.data_spaces AS fds ON fds.data_space_id = t.filestream_data_space_id
  LEFT JOIN sys.data_spaces AS lds ON lds.data_space_id = t.lob_data_space_id
  WHERE t.object_id = @objectId
`

const CHECK_CONSTRAINTS_QUERY = `
  SELECT name, definition
  FROM sys.check_constraints
  WHERE parent_object_id = @objectId
  ORDER BY name
`

const FOREIGN_KEY_QUERY = `
  SELECT
    OBJECT_SCHEMA_NAME(fk.referenced_object_id) AS referenced_schema,
    OBJECT_NAME(fk.referenced_object_id) AS referenced_table,
    fk.delete_referential_action_desc AS delete_action,
    fk.update_referential_action_desc AS update_action,
    fk.is_disabled,
    pc.name AS parent_column,
    rc.name AS referenced_column
  FROM sys.foreign_keys AS fk
  JOIN sys.foreign_key_columns AS fkc ON fkc.constraint_object_id = fk.object_id
  JOIN sys.columns AS pc
    ON pc.object_id = fkc.parent_object_id AND pc.column_id = fkc.parent_column_id
  JOIN sys.columns AS rc
    ON rc.object_id = fkc.referenced_object_id AND rc.column_id = fkc.referenced_column_id
  WHERE fk.parent_object_id = OBJECT_ID(@tableName) AND fk.name = @constraintName
  ORDER BY fkc.constraint_column_id
`

const INDEX_QUERY = `
  SELECT
    i.type_desc,
    i.is_unique,
    i.filter_definition,
    i.is_disabled,
    ds.name AS data_space_name,
    ds.type AS data_space_type,
    CASE WHEN ic.partition_ordinal = 1 THEN c.name END AS partition_column,
    c.name AS column_name,
    ic.is_descending_key,
    ic.is_included_column,
    ic.key_ordinal,
    ic.partition_ordinal
  FROM sys.indexes AS i
  LEFT JOIN sys.data_spaces AS ds ON ds.data_space_id = i.data_space_id
  LEFT JOIN sys.index_columns AS ic ON ic.object_id = i.object_id AND ic.index_id = i.index_id
  LEFT JOIN sys.columns AS c ON c.object_id = ic.object_id AND c.column_id = ic.column_id
  WHERE i.object_id = OBJECT_ID(@tableName) AND i.name = @indexName
  ORDER BY ic.is_included_column, ic.key_ordinal, ic.index_column_id
`

/** DETERMINISTIC -> Deterministic, as the DDL keyword is written */
function keywordCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase()
}

function encryptionClause(column: ColumnRow): string | undefined {
  if (!column.column_encryption_key_name || !column.encryption_type_desc) return undefined
  const options = [
    `COLUMN_ENCRYPTION_KEY = ${quoteName(column.column_encryption_key_name)}`,
    `ENCRYPTION_TYPE = ${keywordCase(column.encryption_type_desc)}`
  ]
  if (column.encryption_algorithm_name) {
    options.push(`ALGORITHM = '${column.encryption_algorithm_name.replace(/'/g, "''")}'`)
  }
  return `ENCRYPTED WITH (${options.join(', ')})`
}

/**
 * `ON [filegroup]` or `ON [scheme]([column])`, empty when the catalog has no data space
 */
export function placementClause(row: DataSpaceRow): string {
  if (!row.data_space_name) return ''
  const space = quoteName(row.data_space_name)
  if (row.data_space_type === 'PS' && row.partition_column) {
    return `ON ${space}(${quoteName(row.partition_column)})`
  }
  return `ON ${space}`
}

function tablePlacement(storage: TableStorageRow | undefined): string {
  if (!storage) return ''
  const clauses = [placementClause(storage)]
  if (storage.lob_data_space_name && storage.data_space_type === 'FG') {
    clauses.push(`TEXTIMAGE_ON ${quoteName(storage.lob_data_space_name)}`)
  }
  if (storage.filestream_data_space_name) {
    clauses.push(`FILESTREAM_ON ${quoteName(storage.filestream_data_space_name)}`)
  }
  return clauses.filter((clause) => clause.length > 0).join(' ')
}

export function columnDefinition(column: ColumnRow, includeCollation: boolean): string {
  const name = quoteName(column.column_name)

  if (column.computed_definition !== null) {
    return `${name} AS ${column.computed_definition}${column.is_persisted ? ' PERSISTED' : ''}`
  }

  const parts = [name, formatDataType(column)]

  if (column.is_filestream) parts.push('FILESTREAM')
  if (includeCollation && column.collation_name) {
    parts.push(`COLLATE ${column.collation_name}`)
  }
  if (column.is_identity) {
    parts.push(`IDENTITY(${column.seed_value ?? 1},${column.increment_value ?? 1})`)
  }
  if (column.is_rowguidcol) parts.push('ROWGUIDCOL')
  const encryption = encryptionClause(column)
  if (encryption) parts.push(encryption)
  parts.push(column.is_nullable ? 'NULL' : 'NOT NULL')
  if (column.default_name && column.default_definition) {
    parts.push(`CONSTRAINT ${quoteName(column.default_name)} DEFAULT ${column.default_definition}`)
  }

  return parts.join(' ')
}

function keyColumnList(columns: readonly KeyColumnRow[]): string {
  return columns
    .map((column) => {
      const direction = column.is_descending_key ? 'DESC' : 'ASC'
      return `${quoteName(column.column_name)} ${direction}`
    })
    .join(', ')
}

async function objectIdOf(session: SqlSession, request: ScriptRequest, sql: string) {
  const row = await firstRow<ObjectIdRow>(session, request, sql, {
    name: objectNameOf(request)
  })
  if (row.object_id === null) {
    throw new Error(`${request.kind} não encontrado no catálogo: ${objectNameOf(request)}`)
  }
  return row.object_id
}

function keyConstraintLines(
  keyColumns: readonly KeyColumnRow[],
  types: ReadonlySet<KeyColumnRow['constraint_type']>
): string[] {
  const constraints = new Map<string, KeyColumnRow[]>()
  for (const row of keyColumns) {
    if (!types.has(row.constraint_type)) continue
    const columns = constraints.get(row.constraint_name) ?? []
    columns.push(row)
    constraints.set(row.constraint_name, columns)
  }

  return [...constraints].map(([name, columns]) => {
    const [first] = columns
    const kind = first.constraint_type === 'PK' ? 'PRIMARY KEY' : 'UNIQUE'
    const clustered = first.type_desc === 'CLUSTERED' ? 'CLUSTERED' : 'NONCLUSTERED'
    return `CONSTRAINT ${quoteName(name)} ${kind} ${clustered} (${keyColumnList(columns)})`
  })
}

export const scriptTable: ScriptGenerator = async (session, request) => {
  const objectId = await objectIdOf(session, request, 'SELECT OBJECT_ID(@name) AS object_id')
  const includeCollation = booleanOption(request, 'includeCollation', true)
  const columns = await queryObject<ColumnRow>(session, request, COLUMNS_QUERY, { objectId })

  const lines = columns.map((column) => columnDefinition(column, includeCollation))

  const keyTypes = new Set<KeyColumnRow['constraint_type']>()
  if (booleanOption(request, 'scriptPrimaryKey', true)) keyTypes.add('PK')
  if (booleanOption(request, 'scriptUniqueKeys', true)) keyTypes.add('UQ')
  if (keyTypes.size > 0) {
    const keyColumns = await session.query<KeyColumnRow>(KEY_CONSTRAINTS_QUERY, { objectId })
    lines.push(...keyConstraintLines(keyColumns, keyTypes))
  }

  const checks = await session.query<CheckConstraintRow>(CHECK_CONSTRAINTS_QUERY, { objectId })
  for (const check of checks) {
    lines.push(`CONSTRAINT ${quoteName(check.name)} CHECK ${check.definition}`)
  }

  const [storage] = await session.query<TableStorageRow>(TABLE_STORAGE_QUERY, { objectId })
  const placement = tablePlacement(storage)

  return [
    batch('SET ANSI_NULLS ON'),
    batch('SET QUOTED_IDENTIFIER ON'),
    batch(
      `CREATE TABLE ${objectNameOf(request)} (\n    ${lines.join(',\n    ')}\n)` +
        (placement ? ` ${placement}` : '')
    )
  ].join('')
}

export const scriptTableType: ScriptGenerator = async (session, request) => {
  const objectId = await objectIdOf(
    session,
    request,
    `SELECT type_table_object_id AS object_id
     FROM sys.table_types
     WHERE user_type_id = TYPE_ID(@name)`
  )
  const columns = await queryObject<ColumnRow>(session, request, COLUMNS_QUERY, { objectId })
  const lines = columns.map((column) => columnDefinition(column, false))

  return batch(`CREATE TYPE ${objectNameOf(request)} AS TABLE (\n    ${lines.join(',\n    ')}\n)`)
}

const REFERENTIAL_ACTIONS: Readonly<Record<string, string>> = {
  CASCADE: 'CASCADE',
  SET_NULL: 'SET NULL',
  SET_DEFAULT: 'SET DEFAULT'
}

export const scriptForeignKey: ScriptGenerator = async (session, request) => {
  const constraintName = childNameOf(request, 'constraint')
  const rows = await queryObject<ForeignKeyRow>(session, request, FOREIGN_KEY_QUERY, {
    tableName: objectNameOf(request),
    constraintName
  })
  const [first] = rows
  const table = objectNameOf(request)
  const constraint = quoteName(constraintName)
  const parentColumns = rows.map((row) => quoteName(row.parent_column)).join(', ')
  const referencedColumns = rows.map((row) => quoteName(row.referenced_column)).join(', ')

  const referenced = qualifiedName(first.referenced_schema, first.referenced_table)

  let statement =
    `ALTER TABLE ${table} WITH CHECK ADD CONSTRAINT ${constraint}\n` +
    `FOREIGN KEY (${parentColumns}) REFERENCES ${referenced} (${referencedColumns})`

  const onDelete = REFERENTIAL_ACTIONS[first.delete_action]
  const onUpdate = REFERENTIAL_ACTIONS[first.update_action]
  if (onDelete) statement += `\nON DELETE ${onDelete}`
  if (onUpdate) statement += `\nON UPDATE ${onUpdate}`

  const script = [batch(statement)]
  if (first.is_disabled) {
    script.push(batch(`ALTER TABLE ${table} NOCHECK CONSTRAINT ${constraint}`))
  }
  return script.join('')
}

function indexColumnList(rows: readonly IndexRow[]): string {
  return rows
    .map((row) => `${quoteName(row.column_name ?? '')} ${row.is_descending_key ? 'DESC' : 'ASC'}`)
    .join(', ')
}

export const scriptIndex: ScriptGenerator = async (session, request) => {
  const indexName = childNameOf(request, 'index')
  const rows = await queryObject<IndexRow>(session, request, INDEX_QUERY, {
    tableName: objectNameOf(request),
    indexName
  })
  const [first] = rows
  const table = objectNameOf(request)
  const index = quoteName(indexName)
  // a partitioned index carries its partition column even when it is not a key
  const columns = rows.filter(
    (row) =>
      row.column_name !== null &&
      !(row.partition_ordinal && !row.key_ordinal && !row.is_included_column)
  )
  const keys = columns.filter((row) => !row.is_included_column)
  const included = columns.filter((row) => row.is_included_column)
  const placement = placementClause({
    ...first,
    partition_column: rows.find((row) => row.partition_column)?.partition_column ?? null
  })

  let statement: string

  switch (first.type_desc) {
    case 'CLUSTERED COLUMNSTORE':
      statement = `CREATE CLUSTERED COLUMNSTORE INDEX ${index} ON ${table}`
      break
    case 'NONCLUSTERED COLUMNSTORE': {
      const list = columns.map((row) => quoteName(row.column_name ?? '')).join(', ')
      statement = `CREATE NONCLUSTERED COLUMNSTORE INDEX ${index} ON ${table} (${list})`
      break
    }
    case 'CLUSTERED':
    case 'NONCLUSTERED': {
      const unique = first.is_unique ? 'UNIQUE ' : ''
      const keyList = indexColumnList(keys)
      statement = `CREATE ${unique}${first.type_desc} INDEX ${index} ON ${table} (${keyList})`
      if (included.length > 0) {
        const includedColumns = included.map((row) => quoteName(row.column_name ?? ''))
        statement += `\nINCLUDE (${includedColumns.join(', ')})`
      }
      if (first.filter_definition) statement += `\nWHERE ${first.filter_definition}`
      break
    }
    default:
      throw new Error(`Tipo de índice sem suporte: ${first.type_desc} (${indexName})`)
  }

  if (placement) statement += `\n${placement}`

  const script = [batch(statement)]
  if (first.is_disabled) script.push(batch(`ALTER INDEX ${index} ON ${table} DISABLE`))
  return script.join('')
}
