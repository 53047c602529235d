import * as path from 'path'
import { validateExportConfig, type ExportConfig, type ExportConfigInput } from './config'
import {
  createConnectionFactory,
  databaseOf,
  maskUrl,
  serverLabel,
  validateDatabaseConnection,
  type ConnectionFactory,
  type ConnectionFactoryOptions
} from './connection'
import { createExportContext, type ExportContext } from './context'
import {
  classifyChanges,
  copyUnchangedFiles,
  logClassification,
  objectsToExport,
  validateDeltaPreconditions
} from './delta'
import { formatErrorChain } from './errors'
import {
  ParallelExecutor,
  SequentialExecutor,
  type ExecutionEngine,
  type ProgressListener
} from './executor'
import { getFileGroupDescriptors, getInventory, getServerTimeUtc } from './inventory'
import { METADATA_FORMAT_VERSION, writeExportMetadata } from './metadata'
import { CatalogScripter } from './scripter'
import type {
  DeltaClassification,
  ExecutionResult,
  ExportMetadata,
  ExportSummary,
  FileGroupDescriptor,
  InventoryObject,
  Logger,
  ObjectRecord,
  ProgressInfo,
  ScriptingService,
  WorkItem
} from './types'
import {
  buildProgress,
  createLogger,
  ensureDirectory,
  formatDuration,
  formatFolderTimestamp,
  formatLocalTimestamp
} from './utils'
import {
  buildWorkItems,
  effectiveGroupingMode,
  filterInventory,
  recordsOf,
  sanitizeFileName,
  type GroupingPolicy,
  type ObjectFilters
} from './work-items'

export interface ExportDependencies {
  connectionFactory?: (url: string, options: ConnectionFactoryOptions) => ConnectionFactory
  scripter?: ScriptingService
}

export function groupingPolicyOf(config: ExportConfig): GroupingPolicy {
  return {
    defaultMode: config.groupingMode,
    overrides: config.groupingOverrides,
    appendToExistingFiles: config.appendToExistingFiles,
    scriptOptions: config.scriptOptions
  }
}

export function objectFiltersOf(config: ExportConfig): ObjectFilters {
  return {
    includeObjectKinds: config.includeObjectKinds,
    excludeObjectKinds: config.excludeObjectKinds,
    includeObjects: config.includeObjects,
    excludeObjects: config.excludeObjects,
    includeData: config.includeData
  }
}

/**
 * `<server>_<database>_<yyyyMMdd_HHmmss>` under the configured output path
 */
export function exportRootFor(config: ExportConfig, startedAt: Date): string {
  const server = serverLabel(config.sourceUrl)
  const database = databaseOf(config.sourceUrl)
  const folder = `${server}_${database}_${formatFolderTimestamp(startedAt)}`
  return path.join(config.outputPath, sanitizeFileName(folder))
}

/**
 * Runs the primary engine; if the engine itself throws, its partial results are
 * dropped and every item is run again on the fallback engine.
 */
export async function executeWithFallback(
  primary: ExecutionEngine,
  fallback: ExecutionEngine,
  items: readonly WorkItem[],
  connect: ConnectionFactory,
  log: Logger
): Promise<ExecutionResult[]> {
  try {
    return await primary.execute(items, connect)
  } catch (error) {
    log(
      `⚠️  Execução ${primary.name} falhou (${formatErrorChain(error)}). ` +
        `Reexecutando todos os itens em modo ${fallback.name}`
    )
    return fallback.execute(items, connect)
  }
}

interface SourceSnapshot {
  startedAt: Date
  inventory: InventoryObject[]
  fileGroups: FileGroupDescriptor[]
}

export class SchemaExport {
  private readonly config: ExportConfig
  private readonly dependencies: ExportDependencies
  private readonly log: Logger
  private isRunning = false
  private progressInfo: ProgressInfo = buildProgress('', 0, 0, 'starting')

  constructor(
    config: ExportConfigInput,
    logCallback: (log: string) => void,
    dependencies: ExportDependencies = {}
  ) {
    this.config = validateExportConfig(config)
    this.dependencies = dependencies
    this.log = createLogger(logCallback, () => this.progressInfo)
  }

  private updateProgress(
    currentItem: string,
    completedItems: number,
    totalItems: number,
    status: ProgressInfo['status'],
    currentAction?: string
  ) {
    this.progressInfo = buildProgress(
      currentItem,
      completedItems,
      totalItems,
      status,
      currentAction
    )
  }

  private connectionFactory(): ConnectionFactory {
    const create = this.dependencies.connectionFactory ?? createConnectionFactory
    return create(this.config.sourceUrl, {
      sslEnabled: this.config.sourceSSLEnabled,
      connectionTimeoutSeconds: this.config.connectionTimeoutSeconds,
      commandTimeoutSeconds: this.config.commandTimeoutSeconds,
      retry: this.config.retry,
      log: this.log
    })
  }

  private async readSource(connect: ConnectionFactory): Promise<SourceSnapshot> {
    const session = await connect()
    try {
      const startedAt = await getServerTimeUtc(session)
      const inventory = await getInventory(session, this.log)
      const fileGroups = await getFileGroupDescriptors(session)
      return { startedAt, inventory, fileGroups }
    } finally {
      await session.close()
    }
  }

  private engines(context: ExportContext, total: number) {
    const onProgress: ProgressListener = (completed, _total, currentItem) => {
      this.updateProgress(currentItem, completed, total, 'processing', 'gerando scripts')
    }
    const sequential = new SequentialExecutor(context, onProgress)
    const parallel = new ParallelExecutor(context, {
      maxWorkers: this.config.parallel.maxWorkers,
      progressIntervalMs: this.config.parallel.progressIntervalMs,
      onProgress
    })
    return { sequential, parallel }
  }

  private async execute(
    context: ExportContext,
    items: readonly WorkItem[],
    connect: ConnectionFactory
  ): Promise<ExecutionResult[]> {
    const { sequential, parallel } = this.engines(context, items.length)

    if (!this.config.parallel.enabled || items.length <= 1) {
      this.log(`Modo de execução: ${sequential.name}`)
      return sequential.execute(items, connect)
    }

    const { maxWorkers } = this.config.parallel
    this.log(`Modo de execução: ${parallel.name} (até ${maxWorkers} workers)`)
    return executeWithFallback(parallel, sequential, items, connect, this.log)
  }

  /**
   * Exports the source database into a new timestamped folder and writes its metadata
   * @throws DeltaValidationError when the delta baseline cannot be used
   */
  async run(): Promise<ExportSummary> {
    if (this.isRunning) {
      throw new Error('Exportação já em andamento')
    }

    this.isRunning = true
    const startTime = Date.now()
    const { config } = this

    try {
      this.updateProgress('', 0, 0, 'starting', 'iniciando exportação')
      this.log('=== INICIANDO EXPORTAÇÃO ===')
      this.log(`Origem: ${maskUrl(config.sourceUrl)}`)

      const policy = groupingPolicyOf(config)
      const filters = objectFiltersOf(config)

      const previous = config.deltaFrom
        ? await validateDeltaPreconditions(config.deltaFrom, policy)
        : undefined
      if (previous) {
        this.log(`Modo delta: base ${config.deltaFrom} (${previous.exportStartTimeUtc})`)
      }

      const connect = this.connectionFactory()
      await validateDatabaseConnection(connect, config.sourceUrl, this.log)

      this.updateProgress('', 0, 0, 'processing', 'lendo catálogo')
      const snapshot = await this.readSource(connect)
      const selected = filterInventory(snapshot.inventory, filters)

      let delta: DeltaClassification | undefined
      let toExport = selected
      if (previous) {
        delta = classifyChanges(selected, previous)
        logClassification(delta, this.log)
        toExport = objectsToExport(delta)
      }

      const items = buildWorkItems(toExport, policy, filters)
      const outputRoot = exportRootFor(config, snapshot.startedAt)
      await ensureDirectory(outputRoot)
      this.log(`Diretório de saída: ${outputRoot}`)
      this.log(`${items.length} itens de trabalho para ${toExport.length} objetos`)

      const context = createExportContext({
        config,
        outputRoot,
        scripter: this.dependencies.scripter ?? new CatalogScripter(),
        log: this.log
      })

      this.updateProgress('', 0, items.length, 'processing', 'gerando scripts')
      const results = await this.execute(context, items, connect)

      const succeededIds = new Set(
        results.filter((result) => result.succeeded).map((result) => result.workItemId)
      )
      const records: ObjectRecord[] = items
        .filter((item) => succeededIds.has(item.id))
        .flatMap(recordsOf)

      let copied = 0
      if (previous && config.deltaFrom && delta) {
        const copy = await copyUnchangedFiles(delta.toCopy, config.deltaFrom, outputRoot, this.log)
        records.push(...copy.copied)
        results.push(...copy.results)
        copied = copy.copied.length
      }

      const metadata: ExportMetadata = {
        formatVersion: METADATA_FORMAT_VERSION,
        exportStartTimeUtc: snapshot.startedAt.toISOString(),
        exportStartTimeLocal: formatLocalTimestamp(snapshot.startedAt),
        sourceServer: serverLabel(config.sourceUrl),
        sourceDatabase: databaseOf(config.sourceUrl),
        groupingMode: effectiveGroupingMode(policy),
        includesData: config.includeData,
        objectCount: records.length,
        objects: records,
        fileGroupDescriptors: snapshot.fileGroups
      }
      const metadataPath = await writeExportMetadata(outputRoot, metadata)
      this.log(`✓ Metadados gravados em ${metadataPath}`)

      const failed = results.filter((result) => !result.succeeded).length
      const succeeded = results.filter(
        (result) => result.succeeded && !result.workItemId.startsWith('copy:')
      ).length
      const durationMs = Date.now() - startTime

      this.updateProgress('', items.length, items.length, 'completed')
      this.log(
        `=== EXPORTAÇÃO CONCLUÍDA: ${succeeded} gerados, ${copied} copiados, ` +
          `${failed} falhas em ${formatDuration(durationMs)} ===`
      )

      return { outputDirectory: outputRoot, succeeded, failed, copied, durationMs, results, delta }
    } catch (error) {
      this.updateProgress('', 0, 0, 'error')
      this.log(`=== ERRO NA EXPORTAÇÃO: ${formatErrorChain(error)} ===`)
      throw error
    } finally {
      this.isRunning = false
    }
  }

  getCurrentProgress(): ProgressInfo {
    return { ...this.progressInfo }
  }
}
