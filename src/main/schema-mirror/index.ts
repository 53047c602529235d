export * from './types'
export * from './config'
export * from './errors'
export { OBJECT_KINDS, OBJECT_KIND_ORDER, kindOfScript, type ObjectKind } from './object-kinds'
export {
  createConnectionFactory,
  getConnectionParams,
  maskUrl,
  type ConnectionFactory,
  type SqlSession
} from './connection'
export { withRetry, isTransientError } from './retry'
export { buildWorkItems, resolveScriptRequests } from './work-items'
export { SequentialExecutor, ParallelExecutor, type ExecutionEngine } from './executor'
export { classifyChanges, validateDeltaPreconditions } from './delta'
export { resolveDependencies } from './dependency-resolver'
export { withForeignKeysSuspended } from './fk-guard'
export { readExportMetadata, writeExportMetadata, METADATA_FILE_NAME } from './metadata'
export { applyScriptFile, splitSqlBatches } from './sql-execution'
export { CatalogScripter } from './scripter'
export { SchemaExport, type ExportDependencies } from './export'
export { SchemaImport, type ImportDependencies } from './import'
