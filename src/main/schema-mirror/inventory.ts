import type { SqlSession } from './connection'
import type { ObjectKind } from './object-kinds'
import { FILE_GROUPS_QUERY, toFileGroupDescriptors, type FileGroupRow } from './scripter/database'
import type { FileGroupDescriptor, InventoryObject, Logger } from './types'

interface CatalogObjectRow {
  type: string
  schema_name: string
  name: string
  modify_date: Date | null
  parent_schema: string | null
  parent_name: string | null
}

interface NamedRow {
  owner_group: string | null
  name: string
  parent_schema?: string | null
  parent_name?: string | null
}

/**
 * Every schema-scoped object in one pass. modify_date is shifted from server
 * local time to UTC so it compares with the export start time.
 */
export const CATALOG_OBJECTS_QUERY = `
  SELECT
    RTRIM(o.type) AS type,
    SCHEMA_NAME(o.schema_id) AS schema_name,
    o.name,
    DATEADD(minute, DATEDIFF(minute, GETDATE(), GETUTCDATE()), o.modify_date) AS modify_date,
    OBJECT_SCHEMA_NAME(o.parent_object_id) AS parent_schema,
    OBJECT_NAME(o.parent_object_id) AS parent_name
  FROM sys.objects AS o
  WHERE o.is_ms_shipped = 0
    AND o.type IN ('U', 'V', 'P', 'FN', 'IF', 'TF', 'FS', 'FT', 'TR',
                   'SN', 'SO', 'D', 'R', 'SP', 'F')
    AND NOT (o.type = 'D' AND o.parent_object_id <> 0)
`

const OBJECT_TYPE_KINDS: Readonly<Record<string, ObjectKind>> = {
  U: 'Table',
  V: 'View',
  P: 'StoredProcedure',
  FN: 'UserDefinedFunction',
  IF: 'UserDefinedFunction',
  TF: 'UserDefinedFunction',
  FS: 'UserDefinedFunction',
  FT: 'UserDefinedFunction',
  TR: 'Trigger',
  SN: 'Synonym',
  SO: 'Sequence',
  D: 'Default',
  R: 'Rule',
  SP: 'SecurityPolicy',
  F: 'ForeignKey'
}

const CHILD_KINDS: ReadonlySet<ObjectKind> = new Set(['Trigger', 'ForeignKey', 'Index'])

/**
 * Kinds that live outside sys.objects, each with the query that lists them
 */
export const CATALOG_SOURCES: readonly { kind: ObjectKind; sql: string }[] = [
  {
    kind: 'FileGroup',
    sql: `SELECT NULL AS owner_group, name FROM sys.filegroups WHERE name <> 'PRIMARY'`
  },
  {
    kind: 'DatabaseRole',
    sql: `SELECT NULL AS owner_group, name FROM sys.database_principals
          WHERE type = 'R' AND is_fixed_role = 0 AND name <> 'public'`
  },
  {
    kind: 'User',
    sql: `SELECT NULL AS owner_group, name FROM sys.database_principals
          WHERE type IN ('S', 'U', 'G', 'E', 'X') AND principal_id > 4 AND name NOT LIKE '##%'`
  },
  {
    kind: 'DatabaseScopedConfiguration',
    sql: `SELECT NULL AS owner_group, name FROM sys.database_scoped_configurations
          WHERE is_value_default = 0`
  },
  {
    kind: 'Schema',
    sql: `SELECT NULL AS owner_group, name FROM sys.schemas
          WHERE schema_id > 4 AND schema_id < 16384`
  },
  {
    kind: 'PartitionFunction',
    sql: 'SELECT NULL AS owner_group, name FROM sys.partition_functions'
  },
  {
    kind: 'PartitionScheme',
    sql: 'SELECT NULL AS owner_group, name FROM sys.partition_schemes'
  },
  {
    kind: 'UserDefinedDataType',
    sql: `SELECT SCHEMA_NAME(schema_id) AS owner_group, name FROM sys.types
          WHERE is_user_defined = 1 AND is_table_type = 0 AND is_assembly_type = 0`
  },
  {
    kind: 'UserDefinedTableType',
    sql: `SELECT SCHEMA_NAME(schema_id) AS owner_group, name FROM sys.table_types
          WHERE is_user_defined = 1`
  },
  {
    kind: 'Index',
    sql: `SELECT SCHEMA_NAME(t.schema_id) AS owner_group, i.name,
                 SCHEMA_NAME(t.schema_id) AS parent_schema, t.name AS parent_name
          FROM sys.indexes AS i
          JOIN sys.tables AS t ON t.object_id = i.object_id
          WHERE t.is_ms_shipped = 0 AND i.is_hypothetical = 0
            AND i.is_primary_key = 0 AND i.is_unique_constraint = 0
            AND i.name IS NOT NULL AND i.type IN (1, 2, 5, 6)`
  },
  {
    kind: 'FullTextCatalog',
    sql: 'SELECT NULL AS owner_group, name FROM sys.fulltext_catalogs'
  },
  {
    kind: 'ExternalDataSource',
    sql: 'SELECT NULL AS owner_group, name FROM sys.external_data_sources'
  },
  {
    kind: 'PlanGuide',
    sql: 'SELECT NULL AS owner_group, name FROM sys.plan_guides'
  }
]

function parentOf(row: { parent_schema?: string | null; parent_name?: string | null }) {
  return row.parent_schema && row.parent_name
    ? { ownerGroup: row.parent_schema, name: row.parent_name }
    : undefined
}

export function fromCatalogObject(row: CatalogObjectRow): InventoryObject | undefined {
  const kind = OBJECT_TYPE_KINDS[row.type]
  if (!kind) return undefined

  const parent = CHILD_KINDS.has(kind) ? parentOf(row) : undefined
  if (CHILD_KINDS.has(kind) && !parent) return undefined

  return {
    kind,
    ownerGroup: row.schema_name,
    name: row.name,
    parent,
    modifiedAt: row.modify_date ?? undefined
  }
}

function fromNamedRow(kind: ObjectKind, row: NamedRow): InventoryObject {
  return {
    kind,
    ownerGroup: row.owner_group ?? undefined,
    name: row.name,
    parent: CHILD_KINDS.has(kind) ? parentOf(row) : undefined
  }
}

/**
 * Enumerates every supported object of the connected database. Tables also
 * yield a TableData entry; the work item builder drops it unless data is requested.
 */
export async function getInventory(session: SqlSession, log: Logger): Promise<InventoryObject[]> {
  log('Consultando catálogo do banco de origem...')

  const inventory: InventoryObject[] = []

  const objects = await session.query<CatalogObjectRow>(CATALOG_OBJECTS_QUERY)
  for (const row of objects) {
    const object = fromCatalogObject(row)
    if (!object) continue
    inventory.push(object)
    if (object.kind === 'Table') {
      inventory.push({ kind: 'TableData', ownerGroup: object.ownerGroup, name: object.name })
    }
  }

  for (const source of CATALOG_SOURCES) {
    const rows = await session.query<NamedRow>(source.sql)
    inventory.push(...rows.map((row) => fromNamedRow(source.kind, row)))
  }

  log(`✓ ${inventory.length} objetos encontrados no catálogo`)
  return inventory
}

export async function getFileGroupDescriptors(session: SqlSession): Promise<FileGroupDescriptor[]> {
  const rows = await session.query<FileGroupRow>(FILE_GROUPS_QUERY, { name: null })
  return toFileGroupDescriptors(rows)
}

/**
 * The export start time comes from the server clock, the same clock that
 * stamps modify_date.
 */
export async function getServerTimeUtc(session: SqlSession): Promise<Date> {
  const [row] = await session.query<{ now_utc: Date }>('SELECT SYSUTCDATETIME() AS now_utc')
  return row?.now_utc ?? new Date()
}
