import * as fs from 'fs/promises'
import * as path from 'path'
import { DeltaValidationError, errorMessage } from './errors'
import { readExportMetadata } from './metadata'
import {
  OBJECT_KIND_ORDER,
  getKindDefinition,
  inventoryKey,
  isAlwaysExport,
  recordKey
} from './object-kinds'
import type {
  DeltaClassification,
  ExecutionResult,
  ExportMetadata,
  InventoryObject,
  Logger,
  ObjectRecord
} from './types'
import { ensureDirectory } from './utils'
import { groupingModeFor, type GroupingPolicy } from './work-items'

/**
 * Checks, before any connection is opened, that a previous export can serve as
 * the delta baseline. Grouped files cannot be merged incrementally.
 */
export async function validateDeltaPreconditions(
  deltaFrom: string,
  policy: GroupingPolicy
): Promise<ExportMetadata> {
  let previous: ExportMetadata
  try {
    previous = await readExportMetadata(deltaFrom)
  } catch (error) {
    throw new DeltaValidationError(
      `Exportação anterior inválida para modo delta: ${errorMessage(error)}`,
      { cause: error }
    )
  }

  if (previous.groupingMode !== 'single') {
    throw new DeltaValidationError(
      'Modo delta exige groupingMode "single" na exportação anterior ' +
        `(encontrado "${previous.groupingMode}")`
    )
  }

  // kinds with a forced grouping are always exported, never copied
  const grouped = OBJECT_KIND_ORDER.filter(
    (kind) => !getKindDefinition(kind).forcedGrouping && groupingModeFor(kind, policy) !== 'single'
  )
  if (grouped.length > 0) {
    throw new DeltaValidationError(
      'Modo delta exige groupingMode "single" para todos os tipos ' +
        `(agrupados: ${grouped.join(', ')})`
    )
  }

  return previous
}

/**
 * Splits the live inventory against the previous export. Objects changed after
 * the previous export started count as modified.
 */
export function classifyChanges(
  current: readonly InventoryObject[],
  previous: ExportMetadata
): DeltaClassification {
  const previousExportTime = Date.parse(previous.exportStartTimeUtc)
  const previousByKey = new Map(previous.objects.map((record) => [recordKey(record), record]))
  const currentKeys = new Set<string>()

  const classification: DeltaClassification = {
    modified: [],
    new: [],
    deleted: [],
    unchanged: [],
    alwaysExport: [],
    toCopy: []
  }

  for (const object of current) {
    const key = inventoryKey(object)
    currentKeys.add(key)

    if (isAlwaysExport(object.kind)) {
      classification.alwaysExport.push(object)
      continue
    }

    const previousRecord = previousByKey.get(key)
    if (!previousRecord) {
      classification.new.push(object)
    } else if (object.modifiedAt && object.modifiedAt.getTime() > previousExportTime) {
      classification.modified.push(object)
    } else {
      classification.unchanged.push(object)
      classification.toCopy.push(previousRecord)
    }
  }

  classification.deleted = previous.objects.filter((record) => !currentKeys.has(recordKey(record)))

  return classification
}

export function objectsToExport(classification: DeltaClassification): InventoryObject[] {
  return [...classification.modified, ...classification.new, ...classification.alwaysExport]
}

/**
 * Rejects absolute paths, drive letters and any `..` segment
 */
export function assertSafeRelativePath(relativePath: string): void {
  const segments = relativePath.split(/[\\/]/)

  if (
    relativePath.length === 0 ||
    path.isAbsolute(relativePath) ||
    path.win32.isAbsolute(relativePath) ||
    /^[a-zA-Z]:/.test(relativePath) ||
    segments.includes('..')
  ) {
    throw new DeltaValidationError(`Caminho inseguro nos metadados: ${relativePath}`)
  }
}

export interface CopyResult {
  copied: ObjectRecord[]
  results: ExecutionResult[]
}

/**
 * Copies unchanged files byte for byte from the previous export tree. Records
 * sharing a file are copied once.
 */
export async function copyUnchangedFiles(
  records: readonly ObjectRecord[],
  previousRoot: string,
  outputRoot: string,
  log: Logger
): Promise<CopyResult> {
  const copied: ObjectRecord[] = []
  const results: ExecutionResult[] = []
  const byFile = new Map<string, ObjectRecord[]>()

  for (const record of records) {
    const members = byFile.get(record.relativeFilePath) ?? []
    members.push(record)
    byFile.set(record.relativeFilePath, members)
  }

  for (const [relativeFilePath, members] of byFile) {
    const workItemId = `copy:${relativeFilePath}`

    try {
      assertSafeRelativePath(relativeFilePath)

      const segments = relativeFilePath.split(/[\\/]/)
      const source = path.join(previousRoot, ...segments)
      const target = path.join(outputRoot, ...segments)

      await ensureDirectory(path.dirname(target))
      await fs.copyFile(source, target)

      copied.push(...members)
      results.push({ workItemId, objectCount: members.length, succeeded: true })
    } catch (error) {
      const message = errorMessage(error)
      log(`✗ Falha ao copiar ${relativeFilePath} da exportação anterior: ${message}`)
      results.push({ workItemId, objectCount: members.length, succeeded: false, error: message })
    }
  }

  log(`✓ ${copied.length} objetos inalterados copiados da exportação anterior`)

  return { copied, results }
}

export function logClassification(classification: DeltaClassification, log: Logger): void {
  log('=== CLASSIFICAÇÃO DELTA ===')
  log(`  Modificados: ${classification.modified.length}`)
  log(`  Novos: ${classification.new.length}`)
  log(`  Inalterados: ${classification.unchanged.length}`)
  log(`  Sempre exportados: ${classification.alwaysExport.length}`)
  log(`  Removidos (apenas informativo): ${classification.deleted.length}`)
  for (const record of classification.deleted) {
    const owner = record.ownerGroup ? `${record.ownerGroup}.` : ''
    log(`    - ${record.kind} ${owner}${record.name}`)
  }
  log('===========================')
}
