import type { ExportConfig, ImportConfig } from './config'
import type { Logger, ScriptingService } from './types'

/**
 * Read-only state of one export run, shared by every worker. Each worker still
 * opens its own connection.
 */
export interface ExportContext {
  readonly config: Readonly<ExportConfig>
  readonly outputRoot: string
  readonly scripter: ScriptingService
  readonly log: Logger
}

export interface ImportContext {
  readonly config: Readonly<ImportConfig>
  readonly sourceRoot: string
  readonly log: Logger
}

export function createExportContext(context: ExportContext): ExportContext {
  return Object.freeze({ ...context, config: Object.freeze({ ...context.config }) })
}

export function createImportContext(context: ImportContext): ImportContext {
  return Object.freeze({ ...context, config: Object.freeze({ ...context.config }) })
}
