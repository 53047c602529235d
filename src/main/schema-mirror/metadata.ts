import * as fs from 'fs/promises'
import * as path from 'path'
import z from 'zod'
import { OBJECT_KIND_ORDER } from './object-kinds'
import type { ExportMetadata } from './types'

export const METADATA_FILE_NAME = '_export_metadata.json'

export const METADATA_FORMAT_VERSION = '1.0'

const objectEntrySchema = z.object({
  kind: z.enum(OBJECT_KIND_ORDER),
  ownerGroup: z.string().nullable().optional(),
  name: z.string().min(1),
  filePath: z.string().min(1)
})

const fileGroupFileSchema = z.object({
  name: z.string(),
  physicalName: z.string(),
  sizeKb: z.number(),
  growth: z.number(),
  isPercentGrowth: z.boolean(),
  maxSizeKb: z.number()
})

const metadataFileSchema = z.object({
  formatVersion: z.string(),
  exportStartTimeUtc: z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
    message: 'exportStartTimeUtc não é uma data válida'
  }),
  exportStartTimeLocal: z.string(),
  sourceServer: z.string(),
  sourceDatabase: z.string(),
  groupingMode: z.enum(['single', 'byGroup', 'all']),
  includesData: z.boolean(),
  objectCount: z.number().int().min(0),
  objects: z.array(objectEntrySchema),
  fileGroupDescriptors: z
    .array(
      z.object({
        name: z.string(),
        type: z.string(),
        isDefault: z.boolean(),
        files: z.array(fileGroupFileSchema)
      })
    )
    .default([])
})

type MetadataFile = z.input<typeof metadataFileSchema>

export function metadataPathOf(exportRoot: string): string {
  return path.join(exportRoot, METADATA_FILE_NAME)
}

export function serializeMetadata(metadata: ExportMetadata): string {
  const file: MetadataFile = {
    ...metadata,
    objects: metadata.objects.map((record) => ({
      kind: record.kind,
      ownerGroup: record.ownerGroup ?? null,
      name: record.name,
      filePath: record.relativeFilePath
    }))
  }
  return `${JSON.stringify(file, null, 2)}\n`
}

export function parseMetadata(content: string, source: string): ExportMetadata {
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    throw new Error(`Metadados de exportação com JSON inválido: ${source}`, { cause: error })
  }

  const result = metadataFileSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ')
    throw new Error(`Metadados de exportação inválidos (${source}): ${issues}`)
  }

  const file = result.data
  return {
    ...file,
    objects: file.objects.map((entry) => ({
      kind: entry.kind,
      ownerGroup: entry.ownerGroup ?? undefined,
      name: entry.name,
      relativeFilePath: entry.filePath
    }))
  }
}

export async function writeExportMetadata(
  exportRoot: string,
  metadata: ExportMetadata
): Promise<string> {
  const filePath = metadataPathOf(exportRoot)
  await fs.writeFile(filePath, serializeMetadata(metadata), 'utf8')
  return filePath
}

export async function readExportMetadata(exportRoot: string): Promise<ExportMetadata> {
  const filePath = metadataPathOf(exportRoot)

  let content: string
  try {
    content = await fs.readFile(filePath, 'utf8')
  } catch (error) {
    throw new Error(`Arquivo de metadados não encontrado: ${filePath}`, { cause: error })
  }

  return parseMetadata(content, filePath)
}
