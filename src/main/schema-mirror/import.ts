import * as fs from 'fs/promises'
import * as path from 'path'
import { validateImportConfig, type ImportConfig, type ImportConfigInput } from './config'
import {
  createConnectionFactory,
  databaseOf,
  maskUrl,
  validateDatabaseConnection,
  withDatabase,
  type ConnectionFactory,
  type ConnectionFactoryOptions,
  type SqlSession
} from './connection'
import { createImportContext, type ImportContext } from './context'
import { createRetryCandidates, resolveDependencies } from './dependency-resolver'
import { ImportAbortedError, formatErrorChain } from './errors'
import { FkGuardLoadError, withForeignKeysSuspended } from './fk-guard'
import { metadataPathOf, readExportMetadata } from './metadata'
import { OBJECT_KIND_ORDER, kindOfScript, type ObjectKind } from './object-kinds'
import { quoteName } from './scripter/sql-literals'
import { createScriptApplier, type ScriptApplier } from './sql-execution'
import type { ImportSummary, IntegrityFailure, Logger, ProgressInfo, ScriptFailure } from './types'
import { buildProgress, createLogger, formatDuration, pathExists } from './utils'

export interface ImportScript {
  absolutePath: string
  relativePath: string
  kind: ObjectKind
}

export interface ImportPlan {
  ordinaryBefore: ImportScript[]
  retryEligible: ImportScript[]
  ordinaryAfter: ImportScript[]
  securityPolicies: ImportScript[]
  data: ImportScript[]
  skipped: string[]
}

export interface ImportDependencies {
  connectionFactory?: (url: string, options: ConnectionFactoryOptions) => ConnectionFactory
  applier?: ScriptApplier
}

function compareOrdinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

async function listSqlFiles(root: string, relative = ''): Promise<string[]> {
  const entries = await fs.readdir(path.join(root, relative), { withFileTypes: true })
  const files: string[] = []

  for (const entry of entries) {
    const entryPath = relative ? `${relative}/${entry.name}` : entry.name
    if (entry.isDirectory()) {
      files.push(...(await listSqlFiles(root, entryPath)))
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.sql')) {
      files.push(entryPath)
    }
  }

  return files
}

/**
 * Every script of an export tree in apply order: phase folders in kind order,
 * kinds sharing a folder in kind order, then file names in ordinal order.
 * Files outside the known folders are returned separately.
 */
export async function discoverScripts(
  root: string
): Promise<{ scripts: ImportScript[]; unknown: string[] }> {
  const scripts: ImportScript[] = []
  const unknown: string[] = []

  for (const relativePath of await listSqlFiles(root)) {
    const kind = kindOfScript(relativePath)
    if (!kind) {
      unknown.push(relativePath)
      continue
    }
    scripts.push({ absolutePath: path.join(root, ...relativePath.split('/')), relativePath, kind })
  }

  scripts.sort(
    (a, b) =>
      OBJECT_KIND_ORDER.indexOf(a.kind) - OBJECT_KIND_ORDER.indexOf(b.kind) ||
      compareOrdinal(a.relativePath, b.relativePath)
  )

  return { scripts, unknown: unknown.sort(compareOrdinal) }
}

/**
 * Splits the ordered scripts into the import phases. Ordinary scripts of kinds
 * that come before the first retry-eligible script run before the resolver;
 * the rest run after it.
 */
export function planImport(scripts: readonly ImportScript[], config: ImportConfig): ImportPlan {
  const retryKinds: ReadonlySet<ObjectKind> = new Set(
    config.dependencyRetries.enabled ? config.dependencyRetries.objectTypes : []
  )
  const plan: ImportPlan = {
    ordinaryBefore: [],
    retryEligible: [],
    ordinaryAfter: [],
    securityPolicies: [],
    data: [],
    skipped: []
  }

  const firstRetryRank = Math.min(
    ...scripts
      .filter((script) => retryKinds.has(script.kind))
      .map((script) => OBJECT_KIND_ORDER.indexOf(script.kind))
  )

  for (const script of scripts) {
    if (script.kind === 'FileGroup' && !config.includeFileGroups) {
      plan.skipped.push(script.relativePath)
    } else if (script.kind === 'TableData') {
      if (config.includeData) plan.data.push(script)
      else plan.skipped.push(script.relativePath)
    } else if (script.kind === 'SecurityPolicy') {
      plan.securityPolicies.push(script)
    } else if (retryKinds.has(script.kind)) {
      plan.retryEligible.push(script)
    } else if (OBJECT_KIND_ORDER.indexOf(script.kind) < firstRetryRank) {
      plan.ordinaryBefore.push(script)
    } else {
      plan.ordinaryAfter.push(script)
    }
  }

  return plan
}

export function countScripts(plan: ImportPlan): number {
  return (
    plan.ordinaryBefore.length +
    plan.retryEligible.length +
    plan.ordinaryAfter.length +
    plan.securityPolicies.length +
    plan.data.length
  )
}

/**
 * Creates the target database through master when it does not exist yet
 */
export async function ensureDatabase(
  connect: ConnectionFactory,
  database: string,
  log: Logger
): Promise<boolean> {
  const session = await connect()
  try {
    const [row] = await session.query<{ database_id: number | null }>(
      'SELECT DB_ID(@name) AS database_id',
      { name: database }
    )
    if (row && row.database_id !== null) {
      log(`Banco de dados ${database} já existe`)
      return false
    }
    await session.execute(`CREATE DATABASE ${quoteName(database)}`)
    log(`✓ Banco de dados ${database} criado`)
    return true
  } finally {
    await session.close()
  }
}

interface ImportTally {
  applied: number
  scriptErrors: ScriptFailure[]
  dependencyFailures: ScriptFailure[]
  integrityErrors: IntegrityFailure[]
  foreignKeysSuspended: number
}

export class SchemaImport {
  private readonly config: ImportConfig
  private readonly dependencies: ImportDependencies
  private readonly log: Logger
  private isRunning = false
  private progressInfo: ProgressInfo = buildProgress('', 0, 0, 'starting')

  constructor(
    config: ImportConfigInput,
    logCallback: (log: string) => void,
    dependencies: ImportDependencies = {}
  ) {
    this.config = validateImportConfig(config)
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

  private connectionFactory(url: string): ConnectionFactory {
    const create = this.dependencies.connectionFactory ?? createConnectionFactory
    return create(url, {
      sslEnabled: this.config.targetSSLEnabled,
      connectionTimeoutSeconds: this.config.connectionTimeoutSeconds,
      commandTimeoutSeconds: this.config.commandTimeoutSeconds,
      retry: this.config.retry,
      log: this.log
    })
  }

  private async describeSource(context: ImportContext): Promise<void> {
    if (!(await pathExists(context.sourceRoot))) {
      throw new Error(`Diretório de origem não encontrado: ${context.sourceRoot}`)
    }

    if (!(await pathExists(metadataPathOf(context.sourceRoot)))) {
      this.log('⚠️  Exportação sem arquivo de metadados; aplicando scripts encontrados')
      return
    }

    const metadata = await readExportMetadata(context.sourceRoot)
    this.log(
      `Exportação de ${metadata.sourceServer}/${metadata.sourceDatabase} ` +
        `em ${metadata.exportStartTimeLocal} (${metadata.objectCount} objetos)`
    )
  }

  /**
   * Applies scripts one by one. Without continueOnError the first failure aborts the import.
   */
  private async applyOrdinary(
    session: SqlSession,
    apply: ScriptApplier,
    scripts: readonly ImportScript[],
    tally: ImportTally,
    total: number
  ): Promise<void> {
    for (const script of scripts) {
      this.updateProgress(script.relativePath, tally.applied, total, 'processing', 'aplicando')

      try {
        await apply(session, script.absolutePath)
        tally.applied++
        this.log(`✓ ${script.relativePath}`)
      } catch (error) {
        const message = formatErrorChain(error)
        if (!this.config.continueOnError) {
          throw new ImportAbortedError(
            `Importação interrompida em ${script.relativePath}: ${message}`,
            { cause: error }
          )
        }
        tally.scriptErrors.push({ scriptPath: script.relativePath, error: message })
        this.log(`✗ ${script.relativePath}: ${message}`)
      }
    }
  }

  private async resolveRetryEligible(
    session: SqlSession,
    apply: ScriptApplier,
    scripts: readonly ImportScript[],
    tally: ImportTally
  ): Promise<void> {
    if (scripts.length === 0) return

    const byPath = new Map(scripts.map((script) => [script.absolutePath, script.relativePath]))
    const candidates = createRetryCandidates(
      scripts.map((script) => ({ scriptPath: script.absolutePath, kind: script.kind })),
      this.config.dependencyRetries.maxRetries
    )

    const outcome = await resolveDependencies(
      candidates,
      (candidate) => apply(session, candidate.scriptPath),
      { maxRetries: this.config.dependencyRetries.maxRetries, log: this.log }
    )

    tally.applied += outcome.succeeded.length
    tally.dependencyFailures.push(
      ...outcome.failed.map((failure) => ({
        scriptPath: byPath.get(failure.scriptPath) ?? failure.scriptPath,
        error: failure.error
      }))
    )

    if (outcome.failed.length > 0 && !this.config.continueOnError) {
      throw new ImportAbortedError(
        `Importação interrompida: ${outcome.failed.length} scripts com dependências não resolvidas`
      )
    }
  }

  private async loadData(
    session: SqlSession,
    apply: ScriptApplier,
    scripts: readonly ImportScript[],
    tally: ImportTally,
    total: number
  ): Promise<void> {
    if (scripts.length === 0) {
      this.log('Nenhum script de dados para carregar')
      return
    }

    try {
      const report = await withForeignKeysSuspended(
        session,
        () => this.applyOrdinary(session, apply, scripts, tally, total),
        this.log
      )
      tally.foreignKeysSuspended = report.constraints.length
      tally.integrityErrors.push(...report.integrityErrors)
    } catch (error) {
      if (error instanceof FkGuardLoadError) {
        tally.foreignKeysSuspended = error.report.constraints.length
        tally.integrityErrors.push(...error.report.integrityErrors)
        throw error.cause instanceof Error ? error.cause : error
      }
      throw error
    }
  }

  /**
   * Replays an export tree against the target database
   * @throws ImportAbortedError when a script fails and continueOnError is off
   */
  async run(): Promise<ImportSummary> {
    if (this.isRunning) {
      throw new Error('Importação já em andamento')
    }

    this.isRunning = true
    const startTime = Date.now()
    const { config } = this
    let session: SqlSession | undefined

    try {
      this.updateProgress('', 0, 0, 'starting', 'iniciando importação')
      this.log('=== INICIANDO IMPORTAÇÃO ===')
      this.log(`Destino: ${maskUrl(config.targetUrl)}`)

      const context = createImportContext({
        config,
        sourceRoot: path.resolve(config.sourcePath),
        log: this.log
      })
      await this.describeSource(context)

      const { scripts, unknown } = await discoverScripts(context.sourceRoot)
      for (const relativePath of unknown) {
        this.log(`⚠️  Script fora das pastas conhecidas ignorado: ${relativePath}`)
      }

      const plan = planImport(scripts, config)
      const total = countScripts(plan)
      const skipped = plan.skipped.length + unknown.length
      this.log(
        `${total} scripts a aplicar (${plan.retryEligible.length} com resolução de dependências, ` +
          `${plan.data.length} de dados, ${skipped} ignorados)`
      )

      if (config.createDatabase) {
        const master = this.connectionFactory(withDatabase(config.targetUrl, 'master'))
        await ensureDatabase(master, databaseOf(config.targetUrl), this.log)
      }

      const connect = this.connectionFactory(config.targetUrl)
      await validateDatabaseConnection(connect, config.targetUrl, this.log)
      session = await connect()

      const apply =
        this.dependencies.applier ?? createScriptApplier({ variables: config.sqlcmdVariables })
      const tally: ImportTally = {
        applied: 0,
        scriptErrors: [],
        dependencyFailures: [],
        integrityErrors: [],
        foreignKeysSuspended: 0
      }

      await this.applyOrdinary(session, apply, plan.ordinaryBefore, tally, total)
      await this.resolveRetryEligible(session, apply, plan.retryEligible, tally)
      await this.applyOrdinary(session, apply, plan.ordinaryAfter, tally, total)

      if (plan.securityPolicies.length > 0) {
        this.log(`Aplicando ${plan.securityPolicies.length} políticas de segurança...`)
        await this.applyOrdinary(session, apply, plan.securityPolicies, tally, total)
      }

      await this.loadData(session, apply, plan.data, tally, total)

      const failed =
        tally.scriptErrors.length + tally.dependencyFailures.length + tally.integrityErrors.length
      const durationMs = Date.now() - startTime

      this.updateProgress('', tally.applied, total, 'completed')
      this.log(
        `=== IMPORTAÇÃO CONCLUÍDA: ${tally.applied} aplicados, ${failed} falhas, ` +
          `${skipped} ignorados em ${formatDuration(durationMs)} ===`
      )

      return {
        applied: tally.applied,
        failed,
        skipped,
        durationMs,
        scriptErrors: tally.scriptErrors,
        dependencyFailures: tally.dependencyFailures,
        integrityErrors: tally.integrityErrors,
        foreignKeysSuspended: tally.foreignKeysSuspended
      }
    } catch (error) {
      this.updateProgress('', 0, 0, 'error')
      this.log(`=== ERRO NA IMPORTAÇÃO: ${formatErrorChain(error)} ===`)
      throw error
    } finally {
      if (session) {
        await session.close().catch((error: unknown) => {
          this.log(`⚠️  Erro ao fechar conexão: ${formatErrorChain(error)}`)
        })
      }
      this.isRunning = false
    }
  }

  getCurrentProgress(): ProgressInfo {
    return { ...this.progressInfo }
  }
}
