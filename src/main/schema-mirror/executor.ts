import * as fs from 'fs/promises'
import * as path from 'path'
import { MAX_PARALLEL_WORKERS } from './config'
import type { ConnectionFactory, SqlSession } from './connection'
import type { ExportContext } from './context'
import { errorMessage, formatErrorChain } from './errors'
import type { ExecutionResult, WorkItem } from './types'
import { ensureDirectory } from './utils'
import { WorkQueue } from './work-queue'
import { resolveScriptRequests } from './work-items'

export interface ExecutionEngine {
  readonly name: string
  execute(items: readonly WorkItem[], connect: ConnectionFactory): Promise<ExecutionResult[]>
}

export type ProgressListener = (completed: number, total: number, currentItem: string) => void

/**
 * Scripts every identifier of one WorkItem into its file. Never throws: a
 * failure becomes a failed result carrying the full cause chain.
 */
export async function executeWorkItem(
  context: ExportContext,
  session: SqlSession,
  item: WorkItem
): Promise<ExecutionResult> {
  const requests = resolveScriptRequests(item, context.outputRoot)
  const absolutePath = path.join(context.outputRoot, ...item.outputPath.split('/'))

  try {
    await ensureDirectory(path.dirname(absolutePath))

    if (!item.appendToExistingFile) {
      await fs.rm(absolutePath, { force: true })
    }

    for (const request of requests) {
      await context.scripter.script(session, request)
    }

    return { workItemId: item.id, objectCount: requests.length, succeeded: true }
  } catch (error) {
    const message = formatErrorChain(error)
    context.log(`✗ Falha ao gerar ${item.outputPath}: ${message}`)
    return { workItemId: item.id, objectCount: requests.length, succeeded: false, error: message }
  }
}

async function closeSession(context: ExportContext, session: SqlSession, owner: string) {
  try {
    await session.close()
  } catch (error) {
    context.log(`⚠️  Erro ao fechar conexão (${owner}): ${errorMessage(error)}`)
  }
}

/**
 * One connection, items in builder order, failures recorded and skipped past
 */
export class SequentialExecutor implements ExecutionEngine {
  readonly name = 'sequencial'

  constructor(
    private readonly context: ExportContext,
    private readonly onProgress?: ProgressListener
  ) {}

  async execute(
    items: readonly WorkItem[],
    connect: ConnectionFactory
  ): Promise<ExecutionResult[]> {
    if (items.length === 0) return []

    const session = await connect()
    const results: ExecutionResult[] = []

    try {
      for (const item of items) {
        results.push(await executeWorkItem(this.context, session, item))
        this.onProgress?.(results.length, items.length, item.outputPath)
      }
    } finally {
      await closeSession(this.context, session, this.name)
    }

    return results
  }
}

export type WorkerMessage =
  | { type: 'result'; result: ExecutionResult; item: WorkItem }
  | { type: 'setupFailed'; result: ExecutionResult }

/**
 * Worker loop: opens its own session, drains the shared queue and sends one
 * message per item. A setup failure sends a single synthetic result instead.
 */
export async function runWorker(
  workerId: number,
  context: ExportContext,
  inbound: WorkQueue<WorkItem>,
  connect: ConnectionFactory,
  emit: (message: WorkerMessage) => void
): Promise<void> {
  const session = await connect().catch((error: unknown) => {
    const message = formatErrorChain(error)
    context.log(`✗ Worker ${workerId} não conseguiu conectar: ${message}`)
    emit({
      type: 'setupFailed',
      result: {
        workItemId: `worker-${workerId}`,
        objectCount: 0,
        succeeded: false,
        error: message
      }
    })
    return undefined
  })

  if (!session) return

  try {
    for (let item = inbound.tryDequeue(); item; item = inbound.tryDequeue()) {
      const result = await executeWorkItem(context, session, item)
      emit({ type: 'result', result, item })
    }
  } finally {
    await closeSession(context, session, `worker ${workerId}`)
  }
}

export interface ParallelExecutorOptions {
  maxWorkers: number
  progressIntervalMs: number
  onProgress?: ProgressListener
}

export class ParallelExecutor implements ExecutionEngine {
  readonly name = 'paralelo'

  constructor(
    private readonly context: ExportContext,
    private readonly options: ParallelExecutorOptions
  ) {}

  workerCountFor(itemCount: number): number {
    const requested = Math.min(Math.max(1, this.options.maxWorkers), MAX_PARALLEL_WORKERS)
    return Math.min(requested, itemCount)
  }

  async execute(
    items: readonly WorkItem[],
    connect: ConnectionFactory
  ): Promise<ExecutionResult[]> {
    if (items.length === 0) return []

    const { log } = this.context
    const queue = new WorkQueue(items)
    const results: ExecutionResult[] = []
    const workerCount = this.workerCountFor(items.length)
    const startTime = Date.now()
    let completed = 0

    log(`Iniciando ${workerCount} workers para ${items.length} itens`)

    const onMessage = (message: WorkerMessage) => {
      results.push(message.result)
      if (message.type === 'result') {
        completed++
        this.options.onProgress?.(completed, items.length, message.item.outputPath)
      }
    }

    const timer = setInterval(() => {
      const elapsed = (Date.now() - startTime) / 1000
      const rate = elapsed > 0 ? (completed / elapsed).toFixed(1) : '0.0'
      log(`Progresso: ${completed}/${items.length} itens (${rate} itens/s)`)
    }, this.options.progressIntervalMs)

    let outcomes: PromiseSettledResult<void>[]
    try {
      outcomes = await Promise.allSettled(
        Array.from({ length: workerCount }, (_, index) =>
          runWorker(index + 1, this.context, queue, connect, onMessage)
        )
      )
    } finally {
      clearInterval(timer)
    }

    // every worker has stopped writing before a failure reaches the caller
    const failure = outcomes.find(
      (outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected'
    )
    if (failure) throw failure.reason

    for (let item = queue.tryDequeue(); item; item = queue.tryDequeue()) {
      results.push({
        workItemId: item.id,
        objectCount: item.objectIdentifiers.length,
        succeeded: false,
        error: 'Nenhum worker disponível para processar o item'
      })
    }

    return results
  }
}
