import type {
  GroupingMode,
  InventoryObject,
  ObjectIdentifier,
  ObjectRecord,
  ScriptOptions,
  SpecialHandling
} from './types'

/**
 * Every object kind, in the order its phase folder is applied on import
 */
export const OBJECT_KIND_ORDER = [
  'FileGroup',
  'DatabaseRole',
  'User',
  'DatabaseScopedConfiguration',
  'Schema',
  'Sequence',
  'PartitionFunction',
  'PartitionScheme',
  'UserDefinedDataType',
  'UserDefinedTableType',
  'Table',
  'ForeignKey',
  'Index',
  'Default',
  'Rule',
  'UserDefinedFunction',
  'StoredProcedure',
  'Trigger',
  'View',
  'Synonym',
  'FullTextCatalog',
  'ExternalDataSource',
  'PlanGuide',
  'SecurityPolicy',
  'TableData'
] as const

export type ObjectKind = (typeof OBJECT_KIND_ORDER)[number]

export type ChildKey = 'index' | 'constraint' | 'trigger'

export type Addressing =
  | { type: 'owned' }
  | { type: 'unowned' }
  | { type: 'parentChild'; childKey: ChildKey }

export interface ObjectKindDefinition {
  folder: string
  label: string
  suffix: string
  addressing: Addressing
  timestamped: boolean
  forcedGrouping?: GroupingMode
  specialHandling?: SpecialHandling
  scriptOptions: ScriptOptions
}

const OWNED: Addressing = { type: 'owned' }
const UNOWNED: Addressing = { type: 'unowned' }
const HEADERS: ScriptOptions = { includeHeaders: true }

export const OBJECT_KINDS = {
  FileGroup: {
    folder: '00_FileGroups',
    label: 'FileGroups',
    suffix: '.sql',
    addressing: UNOWNED,
    timestamped: false,
    forcedGrouping: 'all',
    specialHandling: 'fileGroups',
    scriptOptions: HEADERS
  },
  DatabaseRole: {
    folder: '01_Security',
    label: 'DatabaseRoles',
    suffix: '.role.sql',
    addressing: UNOWNED,
    timestamped: false,
    scriptOptions: HEADERS
  },
  User: {
    folder: '01_Security',
    label: 'Users',
    suffix: '.user.sql',
    addressing: UNOWNED,
    timestamped: false,
    scriptOptions: HEADERS
  },
  DatabaseScopedConfiguration: {
    folder: '02_DatabaseConfiguration',
    label: 'DatabaseScopedConfigurations',
    suffix: '.sql',
    addressing: UNOWNED,
    timestamped: false,
    forcedGrouping: 'all',
    specialHandling: 'databaseConfiguration',
    scriptOptions: HEADERS
  },
  Schema: {
    folder: '03_Schemas',
    label: 'Schemas',
    suffix: '.sql',
    addressing: UNOWNED,
    timestamped: false,
    scriptOptions: HEADERS
  },
  Sequence: {
    folder: '04_Sequences',
    label: 'Sequences',
    suffix: '.sql',
    addressing: OWNED,
    timestamped: true,
    scriptOptions: HEADERS
  },
  PartitionFunction: {
    folder: '05_PartitionFunctions',
    label: 'PartitionFunctions',
    suffix: '.sql',
    addressing: UNOWNED,
    timestamped: false,
    scriptOptions: HEADERS
  },
  PartitionScheme: {
    folder: '06_PartitionSchemes',
    label: 'PartitionSchemes',
    suffix: '.sql',
    addressing: UNOWNED,
    timestamped: false,
    scriptOptions: HEADERS
  },
  UserDefinedDataType: {
    folder: '07_Types',
    label: 'UserDefinedDataTypes',
    suffix: '.uddt.sql',
    addressing: OWNED,
    timestamped: false,
    scriptOptions: HEADERS
  },
  UserDefinedTableType: {
    folder: '07_Types',
    label: 'UserDefinedTableTypes',
    suffix: '.udtt.sql',
    addressing: OWNED,
    timestamped: false,
    scriptOptions: HEADERS
  },
  Table: {
    folder: '09_Tables_PrimaryKey',
    label: 'Tables',
    suffix: '.sql',
    addressing: OWNED,
    timestamped: true,
    scriptOptions: {
      ...HEADERS,
      scriptPrimaryKey: true,
      scriptUniqueKeys: true,
      includeCollation: true
    }
  },
  ForeignKey: {
    folder: '10_Tables_ForeignKeys',
    label: 'ForeignKeys',
    suffix: '.sql',
    addressing: { type: 'parentChild', childKey: 'constraint' },
    timestamped: false,
    scriptOptions: HEADERS
  },
  Index: {
    folder: '11_Indexes',
    label: 'Indexes',
    suffix: '.sql',
    addressing: { type: 'parentChild', childKey: 'index' },
    timestamped: false,
    scriptOptions: HEADERS
  },
  Default: {
    folder: '12_Defaults',
    label: 'Defaults',
    suffix: '.sql',
    addressing: OWNED,
    timestamped: true,
    scriptOptions: HEADERS
  },
  Rule: {
    folder: '13_Rules',
    label: 'Rules',
    suffix: '.sql',
    addressing: OWNED,
    timestamped: true,
    scriptOptions: HEADERS
  },
  UserDefinedFunction: {
    folder: '14_Programmability/02_Functions',
    label: 'Functions',
    suffix: '.sql',
    addressing: OWNED,
    timestamped: true,
    scriptOptions: HEADERS
  },
  StoredProcedure: {
    folder: '14_Programmability/03_StoredProcedures',
    label: 'StoredProcedures',
    suffix: '.sql',
    addressing: OWNED,
    timestamped: true,
    scriptOptions: HEADERS
  },
  Trigger: {
    folder: '14_Programmability/04_Triggers',
    label: 'Triggers',
    suffix: '.sql',
    addressing: { type: 'parentChild', childKey: 'trigger' },
    timestamped: true,
    scriptOptions: HEADERS
  },
  View: {
    folder: '14_Programmability/05_Views',
    label: 'Views',
    suffix: '.sql',
    addressing: OWNED,
    timestamped: true,
    scriptOptions: HEADERS
  },
  Synonym: {
    folder: '15_Synonyms',
    label: 'Synonyms',
    suffix: '.sql',
    addressing: OWNED,
    timestamped: true,
    scriptOptions: HEADERS
  },
  FullTextCatalog: {
    folder: '16_FullTextSearch',
    label: 'FullTextCatalogs',
    suffix: '.sql',
    addressing: UNOWNED,
    timestamped: false,
    scriptOptions: HEADERS
  },
  ExternalDataSource: {
    folder: '17_ExternalData',
    label: 'ExternalDataSources',
    suffix: '.sql',
    addressing: UNOWNED,
    timestamped: false,
    scriptOptions: HEADERS
  },
  PlanGuide: {
    folder: '18_PlanGuides',
    label: 'PlanGuides',
    suffix: '.sql',
    addressing: UNOWNED,
    timestamped: false,
    scriptOptions: HEADERS
  },
  SecurityPolicy: {
    folder: '19_SecurityPolicies',
    label: 'SecurityPolicies',
    suffix: '.securitypolicy.sql',
    addressing: OWNED,
    timestamped: true,
    scriptOptions: HEADERS
  },
  TableData: {
    folder: '20_Data',
    label: 'Data',
    suffix: '.data.sql',
    addressing: OWNED,
    timestamped: false,
    forcedGrouping: 'single',
    specialHandling: 'tableData',
    scriptOptions: { ...HEADERS, rowsPerInsert: 100 }
  }
} as const satisfies Record<ObjectKind, ObjectKindDefinition>

export const DATA_FOLDER = OBJECT_KINDS.TableData.folder
export const SECURITY_POLICY_FOLDER = OBJECT_KINDS.SecurityPolicy.folder
export const FILE_GROUP_FOLDER = OBJECT_KINDS.FileGroup.folder

export function getKindDefinition(kind: ObjectKind): ObjectKindDefinition {
  return OBJECT_KINDS[kind]
}

export function isObjectKind(value: string): value is ObjectKind {
  return (OBJECT_KIND_ORDER as readonly string[]).includes(value)
}

export function isAlwaysExport(kind: ObjectKind): boolean {
  return !getKindDefinition(kind).timestamped
}

function childKeyOf(kind: ObjectKind): ChildKey | undefined {
  const addressing = getKindDefinition(kind).addressing
  return addressing.type === 'parentChild' ? addressing.childKey : undefined
}

/**
 * Maps an inventory entry to the identifier the scripting service addresses
 */
export function toIdentifier(object: InventoryObject): ObjectIdentifier {
  const addressing = getKindDefinition(object.kind).addressing

  switch (addressing.type) {
    case 'parentChild':
      if (!object.parent) {
        throw new Error(`Objeto ${object.kind} "${object.name}" sem tabela pai no inventário`)
      }
      return {
        ownerGroup: object.parent.ownerGroup,
        name: object.parent.name,
        extra: { [addressing.childKey]: object.name }
      }
    case 'owned':
      return { ownerGroup: object.ownerGroup, name: object.name }
    case 'unowned':
      return { name: object.name }
  }
}

/**
 * Name used in metadata records; child kinds are qualified by their table
 */
export function recordNameOf(kind: ObjectKind, identifier: ObjectIdentifier): string {
  const childKey = childKeyOf(kind)
  const child = childKey ? identifier.extra?.[childKey] : undefined
  return child ? `${identifier.name}.${child}` : identifier.name
}

export function fileStemOf(kind: ObjectKind, identifier: ObjectIdentifier): string {
  const name = recordNameOf(kind, identifier)
  return identifier.ownerGroup ? `${identifier.ownerGroup}.${name}` : name
}

export function objectKey(kind: ObjectKind, ownerGroup: string | undefined, name: string): string {
  return `${kind}|${ownerGroup ?? ''}|${name}`.toLowerCase()
}

export function inventoryKey(object: InventoryObject): string {
  const identifier = toIdentifier(object)
  return objectKey(object.kind, identifier.ownerGroup, recordNameOf(object.kind, identifier))
}

export function recordKey(record: Pick<ObjectRecord, 'kind' | 'ownerGroup' | 'name'>): string {
  return objectKey(record.kind, record.ownerGroup, record.name)
}

export function toObjectRecord(
  kind: ObjectKind,
  identifier: ObjectIdentifier,
  relativeFilePath: string
): ObjectRecord {
  return {
    kind,
    ownerGroup: identifier.ownerGroup,
    name: recordNameOf(kind, identifier),
    relativeFilePath
  }
}

/**
 * Finds the kind that owns a script, given its path relative to the export root.
 * Folders shared by two kinds are told apart by file suffix.
 */
export function kindOfScript(relativePath: string): ObjectKind | undefined {
  const normalized = relativePath.split('\\').join('/')
  const slash = normalized.lastIndexOf('/')
  const folder = slash >= 0 ? normalized.slice(0, slash) : ''
  const fileName = normalized.slice(slash + 1).toLowerCase()

  const candidates = OBJECT_KIND_ORDER.filter((kind) => OBJECT_KINDS[kind].folder === folder)
  if (candidates.length <= 1) return candidates[0]

  const bySuffix = candidates
    .filter((kind) => fileName.endsWith(OBJECT_KINDS[kind].suffix))
    .sort((a, b) => OBJECT_KINDS[b].suffix.length - OBJECT_KINDS[a].suffix.length)

  return bySuffix[0] ?? candidates[0]
}
