import type { FileGroupDescriptor, FileGroupFileDescriptor } from '../types'
import { batch, firstRow, queryObject, type ScriptGenerator } from './shared'
import { quoteName, unicodeLiteral } from './sql-literals'

export interface FileGroupRow {
  filegroup_name: string
  filegroup_type: string
  is_default: boolean
  file_name: string | null
  physical_name: string | null
  size_pages: number | null
  growth: number | null
  is_percent_growth: boolean | null
  max_size_pages: number | null
}

export const FILE_GROUPS_QUERY = `
  SELECT
    fg.name AS filegroup_name,
    fg.type_desc AS filegroup_type,
    fg.is_default,
    df.name AS file_name,
    df.physical_name,
    df.size AS size_pages,
    df.growth,
    df.is_percent_growth,
    df.max_size AS max_size_pages
  FROM sys.filegroups AS fg
  LEFT JOIN sys.database_files AS df ON df.data_space_id = fg.data_space_id
  WHERE fg.name <> 'PRIMARY' AND (@name IS NULL OR fg.name = @name)
  ORDER BY fg.name, df.file_id
`

const PAGE_KB = 8

/**
 * Groups FILE_GROUPS_QUERY rows into descriptors; sizes are converted from pages to KB
 */
export function toFileGroupDescriptors(rows: readonly FileGroupRow[]): FileGroupDescriptor[] {
  const byName = new Map<string, FileGroupDescriptor>()

  for (const row of rows) {
    let descriptor = byName.get(row.filegroup_name)
    if (!descriptor) {
      descriptor = {
        name: row.filegroup_name,
        type: row.filegroup_type,
        isDefault: row.is_default,
        files: []
      }
      byName.set(row.filegroup_name, descriptor)
    }

    if (row.file_name === null) continue

    const isPercentGrowth = row.is_percent_growth ?? false
    const maxSizePages = row.max_size_pages ?? -1
    descriptor.files.push({
      name: row.file_name,
      physicalName: row.physical_name ?? '',
      sizeKb: (row.size_pages ?? 0) * PAGE_KB,
      growth: isPercentGrowth ? (row.growth ?? 0) : (row.growth ?? 0) * PAGE_KB,
      isPercentGrowth,
      maxSizeKb: maxSizePages < 0 ? -1 : maxSizePages * PAGE_KB
    })
  }

  return [...byName.values()]
}

function variableStem(fileGroup: string): string {
  return fileGroup.toUpperCase().replace(/[^A-Z0-9_]/g, '_')
}

/**
 * SQLCMD variable names for one file of a file group. The first file uses the
 * bare names; later files get their position appended.
 */
export function fileGroupVariables(fileGroup: string, fileIndex: number) {
  const stem = variableStem(fileGroup)
  const position = fileIndex === 0 ? '' : String(fileIndex + 1)
  return {
    path: `${stem}_PATH_FILE${position}`,
    size: `${stem}_SIZE${position}`,
    growth: `${stem}_GROWTH${position}`
  }
}

export const FILE_GROUPS_HEADER = [
  '-- FileGroups and Files',
  '-- Physical file paths and sizes are environment specific.',
  '-- Each file takes the SQLCMD variables <FILEGROUP>_PATH_FILE, <FILEGROUP>_SIZE and',
  '-- <FILEGROUP>_GROWTH (a position suffix is added from the second file on).',
  ''
].join('\n')

const CONTAINS_CLAUSE: Readonly<Record<string, string>> = {
  FILESTREAM_DATA_FILEGROUP: ' CONTAINS FILESTREAM',
  MEMORY_OPTIMIZED_DATA_FILEGROUP: ' CONTAINS MEMORY_OPTIMIZED_DATA'
}

function describeGrowth(file: FileGroupFileDescriptor): string {
  return file.isPercentGrowth ? `${file.growth}%` : `${file.growth}KB`
}

function addFileStatement(
  descriptor: FileGroupDescriptor,
  file: FileGroupFileDescriptor,
  fileIndex: number
): string {
  const variables = fileGroupVariables(descriptor.name, fileIndex)
  const isContainer = descriptor.type !== 'ROWS_FILEGROUP'
  const maxSize = file.maxSizeKb < 0 ? 'UNLIMITED' : `${file.maxSizeKb}KB`

  const comment = [
    `-- File: ${file.name}`,
    `-- Original Path: ${file.physicalName}`,
    isContainer
      ? '-- Container: folder, not a data file'
      : `-- Original Size: ${file.sizeKb}KB, Growth: ${describeGrowth(file)}, MaxSize: ${maxSize}`
  ]

  const options = [
    `    NAME = ${unicodeLiteral(file.name)}`,
    `    FILENAME = N'$(${variables.path})'`
  ]
  if (!isContainer) {
    options.push(
      `    SIZE = $(${variables.size})`,
      `    FILEGROWTH = $(${variables.growth})`,
      `    MAXSIZE = ${maxSize}`
    )
  }

  return (
    `${comment.join('\n')}\n` +
    `ALTER DATABASE CURRENT ADD FILE (\n${options.join(',\n')}\n) ` +
    `TO FILEGROUP ${quoteName(descriptor.name)};`
  )
}

export const scriptFileGroup: ScriptGenerator = async (session, request) => {
  const rows = await queryObject<FileGroupRow>(session, request, FILE_GROUPS_QUERY, {
    name: request.name
  })
  const [descriptor] = toFileGroupDescriptors(rows)
  const name = quoteName(descriptor.name)
  const literal = unicodeLiteral(descriptor.name)
  const contains = CONTAINS_CLAUSE[descriptor.type] ?? ''

  const script = [
    `-- FileGroup: ${descriptor.name}\n-- Type: ${descriptor.type}\n`,
    batch(
      `IF NOT EXISTS (SELECT 1 FROM sys.filegroups WHERE name = ${literal})\n` +
        `    ALTER DATABASE CURRENT ADD FILEGROUP ${name}${contains};`
    )
  ]

  descriptor.files.forEach((file, index) => {
    script.push(batch(addFileStatement(descriptor, file, index)))
  })

  return script.join('')
}

interface ScopedConfigurationRow {
  name: string
  value: number | string | boolean | null
}

const NUMERIC_CONFIGURATIONS = new Set(['MAXDOP', 'PAUSED_RESUMABLE_INDEX_ABORT_DURATION_MINUTES'])

function configurationValue(row: ScopedConfigurationRow): string {
  if (row.value === null) throw new Error(`Configuração ${row.name} sem valor`)
  if (typeof row.value === 'string') return row.value
  if (NUMERIC_CONFIGURATIONS.has(row.name.toUpperCase())) return String(Number(row.value))
  return row.value === true || row.value === 1 ? 'ON' : 'OFF'
}

export const scriptScopedConfiguration: ScriptGenerator = async (session, request) => {
  const row = await firstRow<ScopedConfigurationRow>(
    session,
    request,
    'SELECT name, value FROM sys.database_scoped_configurations WHERE name = @name',
    { name: request.name }
  )
  const value = configurationValue(row)
  return batch(`ALTER DATABASE SCOPED CONFIGURATION SET ${row.name.toUpperCase()} = ${value};`)
}

interface PrincipalRow {
  owner_name: string | null
}

export const scriptDatabaseRole: ScriptGenerator = async (session, request) => {
  const row = await firstRow<PrincipalRow>(
    session,
    request,
    `SELECT USER_NAME(owning_principal_id) AS owner_name
     FROM sys.database_principals WHERE name = @name AND type = 'R'`,
    { name: request.name }
  )
  const authorization = row.owner_name ? ` AUTHORIZATION ${quoteName(row.owner_name)}` : ''
  return batch(`CREATE ROLE ${quoteName(request.name)}${authorization}`)
}

interface UserRow {
  type: string
  default_schema_name: string | null
  login_name: string | null
}

interface RoleMembershipRow {
  role_name: string
}

export const scriptUser: ScriptGenerator = async (session, request) => {
  const user = await firstRow<UserRow>(
    session,
    request,
    `SELECT dp.type, dp.default_schema_name, sp.name AS login_name
     FROM sys.database_principals AS dp
     LEFT JOIN sys.server_principals AS sp ON sp.sid = dp.sid
     WHERE dp.name = @name`,
    { name: request.name }
  )
  const name = quoteName(request.name)
  const defaultSchema = user.default_schema_name
    ? ` WITH DEFAULT_SCHEMA = ${quoteName(user.default_schema_name)}`
    : ''

  let create: string
  if (user.type === 'E' || user.type === 'X') {
    create = `CREATE USER ${name} FROM EXTERNAL PROVIDER`
  } else if (user.login_name) {
    create = `CREATE USER ${name} FOR LOGIN ${quoteName(user.login_name)}${defaultSchema}`
  } else {
    create = `CREATE USER ${name} WITHOUT LOGIN${defaultSchema}`
  }

  const memberships = await session.query<RoleMembershipRow>(
    `SELECT r.name AS role_name
     FROM sys.database_role_members AS m
     JOIN sys.database_principals AS r ON r.principal_id = m.role_principal_id
     WHERE m.member_principal_id = DATABASE_PRINCIPAL_ID(@name)
     ORDER BY r.name`,
    { name: request.name }
  )

  return [
    batch(create),
    ...memberships.map((row) => batch(`ALTER ROLE ${quoteName(row.role_name)} ADD MEMBER ${name}`))
  ].join('')
}

export const scriptSchema: ScriptGenerator = async (session, request) => {
  const row = await firstRow<PrincipalRow>(
    session,
    request,
    'SELECT USER_NAME(principal_id) AS owner_name FROM sys.schemas WHERE name = @name',
    { name: request.name }
  )
  const authorization = row.owner_name ? ` AUTHORIZATION ${quoteName(row.owner_name)}` : ''
  return batch(`CREATE SCHEMA ${quoteName(request.name)}${authorization}`)
}
