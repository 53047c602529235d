import type { SqlSession } from './connection'
import type { ObjectKind } from './object-kinds'

export type Logger = (message: string) => void

export type GroupingMode = 'single' | 'byGroup' | 'all'

export type SpecialHandling = 'fileGroups' | 'databaseConfiguration' | 'tableData'

export type ScriptOptionValue = string | number | boolean

export type ScriptOptions = Readonly<Record<string, ScriptOptionValue>>

/**
 * Identifies one database object. Kinds addressed through their owning table
 * (indexes, foreign keys, triggers) carry the parent in ownerGroup/name and the
 * child key in extra.
 */
export interface ObjectIdentifier {
  ownerGroup?: string
  name: string
  extra?: Readonly<Record<string, string>>
}

/**
 * One object as enumerated from the source catalog
 */
export interface InventoryObject {
  kind: ObjectKind
  ownerGroup?: string
  name: string
  parent?: { ownerGroup: string; name: string }
  modifiedAt?: Date
}

/**
 * One output artifact of an export run
 */
export interface WorkItem {
  id: string
  objectKind: ObjectKind
  groupingMode: GroupingMode
  objectIdentifiers: readonly ObjectIdentifier[]
  outputPath: string
  appendToExistingFile: boolean
  scriptOptions: ScriptOptions
  specialHandling?: SpecialHandling
}

export interface ExecutionResult {
  workItemId: string
  objectCount: number
  succeeded: boolean
  error?: string
}

export interface ObjectRecord {
  kind: ObjectKind
  ownerGroup?: string
  name: string
  relativeFilePath: string
}

export interface FileGroupFileDescriptor {
  name: string
  physicalName: string
  sizeKb: number
  growth: number
  isPercentGrowth: boolean
  maxSizeKb: number
}

export interface FileGroupDescriptor {
  name: string
  type: string
  isDefault: boolean
  files: FileGroupFileDescriptor[]
}

export interface ExportMetadata {
  formatVersion: string
  exportStartTimeUtc: string
  exportStartTimeLocal: string
  sourceServer: string
  sourceDatabase: string
  groupingMode: GroupingMode
  includesData: boolean
  objectCount: number
  objects: ObjectRecord[]
  fileGroupDescriptors: FileGroupDescriptor[]
}

export interface DeltaClassification {
  modified: InventoryObject[]
  new: InventoryObject[]
  deleted: ObjectRecord[]
  unchanged: InventoryObject[]
  alwaysExport: InventoryObject[]
  toCopy: ObjectRecord[]
}

export interface RetryCandidate {
  scriptPath: string
  kind: ObjectKind
  remainingAttempts: number
}

export type FkConstraintState = 'suspended' | 'validated' | 'failed'

export interface FkConstraintRef {
  tableOwnerGroup: string
  tableName: string
  constraintName: string
  wasEnabledBeforeGuard: boolean
  state: FkConstraintState
}

/**
 * Progress information during an export or import run
 */
export interface ProgressInfo {
  currentItem: string
  completedItems: number
  totalItems: number
  percentage: number
  status: 'starting' | 'processing' | 'completed' | 'error'
  currentAction?: string
}

export interface ExportSummary {
  outputDirectory: string
  succeeded: number
  failed: number
  copied: number
  durationMs: number
  results: ExecutionResult[]
  delta?: DeltaClassification
}

export interface ScriptFailure {
  scriptPath: string
  error: string
}

export interface IntegrityFailure {
  constraint: string
  error: string
}

export interface ImportSummary {
  applied: number
  failed: number
  skipped: number
  durationMs: number
  scriptErrors: ScriptFailure[]
  dependencyFailures: ScriptFailure[]
  integrityErrors: IntegrityFailure[]
  foreignKeysSuspended: number
}

/**
 * One call into the scripting service: script a single object to outputPath
 */
export interface ScriptRequest {
  kind: ObjectKind
  ownerGroup?: string
  name: string
  extra?: Readonly<Record<string, string>>
  optionOverrides: ScriptOptions
  outputPath: string
  append: boolean
  specialHandling?: SpecialHandling
}

export interface ScriptingService {
  script(session: SqlSession, request: ScriptRequest): Promise<void>
}
