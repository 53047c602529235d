import { formatDataType, type TypeShape } from './data-types'
import { batch, firstRow, objectNameOf, queryObject, type ScriptGenerator } from './shared'
import { qualifiedName, quoteName, sqlLiteral, unicodeLiteral } from './sql-literals'

interface SequenceRow extends TypeShape {
  start_value: number | string
  increment: number | string
  minimum_value: number | string
  maximum_value: number | string
  is_cycling: boolean
  is_cached: boolean
  cache_size: number | null
}

export const scriptSequence: ScriptGenerator = async (session, request) => {
  const row = await firstRow<SequenceRow>(
    session,
    request,
    `SELECT TYPE_NAME(s.system_type_id) AS type_name, s.max_length, s.precision, s.scale,
            s.start_value, s.increment, s.minimum_value, s.maximum_value,
            s.is_cycling, s.is_cached, s.cache_size
     FROM sys.sequences AS s
     WHERE s.object_id = OBJECT_ID(@name)`,
    { name: objectNameOf(request) }
  )

  const cache = !row.is_cached ? 'NO CACHE' : row.cache_size ? `CACHE ${row.cache_size}` : 'CACHE'
  const lines = [
    `CREATE SEQUENCE ${objectNameOf(request)} AS ${formatDataType(row)}`,
    `    START WITH ${row.start_value}`,
    `    INCREMENT BY ${row.increment}`,
    `    MINVALUE ${row.minimum_value}`,
    `    MAXVALUE ${row.maximum_value}`,
    `    ${row.is_cycling ? 'CYCLE' : 'NO CYCLE'}`,
    `    ${cache}`
  ]
  return batch(lines.join('\n'))
}

export const scriptSynonym: ScriptGenerator = async (session, request) => {
  const row = await firstRow<{ base_object_name: string }>(
    session,
    request,
    'SELECT base_object_name FROM sys.synonyms WHERE object_id = OBJECT_ID(@name)',
    { name: objectNameOf(request) }
  )
  return batch(`CREATE SYNONYM ${objectNameOf(request)} FOR ${row.base_object_name}`)
}

interface PartitionFunctionRow extends TypeShape {
  boundary_value_on_right: boolean
  value: unknown
}

export const scriptPartitionFunction: ScriptGenerator = async (session, request) => {
  const rows = await queryObject<PartitionFunctionRow>(
    session,
    request,
    `SELECT pf.boundary_value_on_right, TYPE_NAME(pp.system_type_id) AS type_name,
            pp.max_length, pp.precision, pp.scale, prv.value
     FROM sys.partition_functions AS pf
     JOIN sys.partition_parameters AS pp ON pp.function_id = pf.function_id
     LEFT JOIN sys.partition_range_values AS prv
       ON prv.function_id = pf.function_id AND prv.parameter_id = pp.parameter_id
     WHERE pf.name = @name
     ORDER BY prv.boundary_id`,
    { name: request.name }
  )
  const [first] = rows
  const values = rows
    .filter((row) => row.value !== null && row.value !== undefined)
    .map((row) => sqlLiteral(row.value))

  const range = first.boundary_value_on_right ? 'RIGHT' : 'LEFT'
  return batch(
    `CREATE PARTITION FUNCTION ${quoteName(request.name)} (${formatDataType(first)})\n` +
      `AS RANGE ${range} FOR VALUES (${values.join(', ')})`
  )
}

interface PartitionSchemeRow {
  function_name: string
  filegroup_name: string
}

export const scriptPartitionScheme: ScriptGenerator = async (session, request) => {
  const rows = await queryObject<PartitionSchemeRow>(
    session,
    request,
    `SELECT pf.name AS function_name, fg.name AS filegroup_name
     FROM sys.partition_schemes AS ps
     JOIN sys.partition_functions AS pf ON pf.function_id = ps.function_id
     JOIN sys.destination_data_spaces AS dds ON dds.partition_scheme_id = ps.data_space_id
     JOIN sys.filegroups AS fg ON fg.data_space_id = dds.data_space_id
     WHERE ps.name = @name
     ORDER BY dds.destination_id`,
    { name: request.name }
  )
  const [first] = rows
  const fileGroups = rows.map((row) => quoteName(row.filegroup_name)).join(', ')

  return batch(
    `CREATE PARTITION SCHEME ${quoteName(request.name)}\n` +
      `AS PARTITION ${quoteName(first.function_name)} TO (${fileGroups})`
  )
}

interface DataTypeRow extends TypeShape {
  is_nullable: boolean
}

export const scriptDataType: ScriptGenerator = async (session, request) => {
  const row = await firstRow<DataTypeRow>(
    session,
    request,
    `SELECT TYPE_NAME(t.system_type_id) AS type_name, t.max_length, t.precision, t.scale,
            t.is_nullable
     FROM sys.types AS t
     WHERE t.user_type_id = TYPE_ID(@name)`,
    { name: objectNameOf(request) }
  )
  const nullability = row.is_nullable ? 'NULL' : 'NOT NULL'
  return batch(`CREATE TYPE ${objectNameOf(request)} FROM ${formatDataType(row)} ${nullability}`)
}

interface FullTextCatalogRow {
  is_default: boolean
  is_accent_sensitivity_on: boolean
}

export const scriptFullTextCatalog: ScriptGenerator = async (session, request) => {
  const row = await firstRow<FullTextCatalogRow>(
    session,
    request,
    'SELECT is_default, is_accent_sensitivity_on FROM sys.fulltext_catalogs WHERE name = @name',
    { name: request.name }
  )
  const accent = row.is_accent_sensitivity_on ? 'ON' : 'OFF'
  return batch(
    `CREATE FULLTEXT CATALOG ${quoteName(request.name)} WITH ACCENT_SENSITIVITY = ${accent}` +
      (row.is_default ? ' AS DEFAULT' : '')
  )
}

interface ExternalDataSourceRow {
  type_desc: string
  location: string
}

const EXTERNAL_SOURCE_TYPES = new Set(['HADOOP', 'BLOB_STORAGE', 'RDBMS', 'SHARD_MAP_MANAGER'])

/**
 * Credentials are not scripted; sources that need one must be completed by hand on the target
 */
export const scriptExternalDataSource: ScriptGenerator = async (session, request) => {
  const row = await firstRow<ExternalDataSourceRow>(
    session,
    request,
    'SELECT type_desc, location FROM sys.external_data_sources WHERE name = @name',
    { name: request.name }
  )
  const options = [`LOCATION = ${unicodeLiteral(row.location)}`]
  if (EXTERNAL_SOURCE_TYPES.has(row.type_desc)) options.unshift(`TYPE = ${row.type_desc}`)

  const name = quoteName(request.name)
  return batch(`CREATE EXTERNAL DATA SOURCE ${name} WITH (${options.join(', ')})`)
}

interface PlanGuideRow {
  scope_type_desc: string
  query_text: string
  scope_schema: string | null
  scope_object: string | null
  scope_batch: string | null
  parameters: string | null
  hints: string | null
  is_disabled: boolean
}

function nullableLiteral(value: string | null): string {
  return value === null ? 'NULL' : unicodeLiteral(value)
}

export const scriptPlanGuide: ScriptGenerator = async (session, request) => {
  const row = await firstRow<PlanGuideRow>(
    session,
    request,
    `SELECT scope_type_desc, query_text,
            OBJECT_SCHEMA_NAME(scope_object_id) AS scope_schema,
            OBJECT_NAME(scope_object_id) AS scope_object,
            scope_batch, parameters, hints, is_disabled
     FROM sys.plan_guides
     WHERE name = @name`,
    { name: request.name }
  )

  const moduleOrBatch =
    row.scope_type_desc === 'OBJECT' && row.scope_object
      ? unicodeLiteral(qualifiedName(row.scope_schema ?? undefined, row.scope_object))
      : nullableLiteral(row.scope_batch)

  const statement = [
    'EXEC sp_create_plan_guide',
    `    @name = ${unicodeLiteral(request.name)},`,
    `    @stmt = ${unicodeLiteral(row.query_text)},`,
    `    @type = ${unicodeLiteral(row.scope_type_desc)},`,
    `    @module_or_batch = ${moduleOrBatch},`,
    `    @params = ${nullableLiteral(row.parameters)},`,
    `    @hints = ${nullableLiteral(row.hints)}`
  ].join('\n')

  const script = [batch(statement)]
  if (row.is_disabled) {
    script.push(
      batch(`EXEC sp_control_plan_guide N'DISABLE', ${unicodeLiteral(request.name)}`)
    )
  }
  return script.join('')
}

interface SecurityPredicateRow {
  is_enabled: boolean
  is_schema_bound: boolean
  predicate_type_desc: string
  predicate_definition: string
  target_schema: string
  target_table: string
  operation_desc: string | null
}

function stripOuterParentheses(definition: string): string {
  const trimmed = definition.trim()
  return trimmed.startsWith('(') && trimmed.endsWith(')') ? trimmed.slice(1, -1) : trimmed
}

export const scriptSecurityPolicy: ScriptGenerator = async (session, request) => {
  const rows = await queryObject<SecurityPredicateRow>(
    session,
    request,
    `SELECT sp.is_enabled, sp.is_schema_bound, pr.predicate_type_desc, pr.predicate_definition,
            OBJECT_SCHEMA_NAME(pr.target_object_id) AS target_schema,
            OBJECT_NAME(pr.target_object_id) AS target_table,
            pr.operation_desc
     FROM sys.security_policies AS sp
     JOIN sys.security_predicates AS pr ON pr.object_id = sp.object_id
     WHERE sp.object_id = OBJECT_ID(@name)
     ORDER BY pr.security_predicate_id`,
    { name: objectNameOf(request) }
  )
  const [first] = rows

  const predicates = rows.map((row) => {
    const target = qualifiedName(row.target_schema, row.target_table)
    const operation = row.operation_desc ? ` ${row.operation_desc}` : ''
    const predicate = stripOuterParentheses(row.predicate_definition)
    return `ADD ${row.predicate_type_desc} PREDICATE ${predicate} ON ${target}${operation}`
  })

  return batch(
    `CREATE SECURITY POLICY ${objectNameOf(request)}\n${predicates.join(',\n')}\n` +
      `WITH (STATE = ${first.is_enabled ? 'ON' : 'OFF'}, ` +
      `SCHEMABINDING = ${first.is_schema_bound ? 'ON' : 'OFF'})`
  )
}
