import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  METADATA_FILE_NAME,
  readExportMetadata,
  writeExportMetadata
} from '../../src/main/schema-mirror/metadata'
import type { ExportMetadata } from '../../src/main/schema-mirror/types'

const metadata: ExportMetadata = {
  formatVersion: '1.0',
  exportStartTimeUtc: '2026-03-02T15:30:00.000Z',
  exportStartTimeLocal: '2026-03-02T12:30:00.000-03:00',
  sourceServer: 'localhost,1433',
  sourceDatabase: 'SalesDb',
  groupingMode: 'single',
  includesData: true,
  objectCount: 2,
  objects: [
    { kind: 'Schema', name: 'sales', relativeFilePath: '03_Schemas/sales.sql' },
    {
      kind: 'Table',
      ownerGroup: 'sales',
      name: 'Invoices',
      relativeFilePath: '09_Tables_PrimaryKey/sales.Invoices.sql'
    }
  ],
  fileGroupDescriptors: [
    {
      name: 'FG_ARCHIVE',
      type: 'ROWS_FILEGROUP',
      isDefault: false,
      files: [
        {
          name: 'archive_1',
          physicalName: '/var/opt/mssql/data/archive_1.ndf',
          sizeKb: 8192,
          growth: 65536,
          isPercentGrowth: false,
          maxSizeKb: -1
        }
      ]
    }
  ]
}

describe('Export metadata', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'schema-mirror-meta-'))
  })

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  it('deve gravar o arquivo com filePath e ownerGroup nulo para objetos sem dono', async () => {
    const filePath = await writeExportMetadata(tempDir, metadata)
    const raw: unknown = JSON.parse(await fs.readFile(filePath, 'utf8'))

    expect(path.basename(filePath)).toBe(METADATA_FILE_NAME)
    expect(raw).toHaveProperty(['objects', 0], {
      kind: 'Schema',
      ownerGroup: null,
      name: 'sales',
      filePath: '03_Schemas/sales.sql'
    })
  })

  it('deve ler de volta exatamente o que foi gravado', async () => {
    await writeExportMetadata(tempDir, metadata)

    expect(await readExportMetadata(tempDir)).toEqual(metadata)
  })

  it('deve rejeitar metadados com data de início inválida', async () => {
    await fs.writeFile(
      path.join(tempDir, METADATA_FILE_NAME),
      JSON.stringify({ ...metadata, objects: [], exportStartTimeUtc: 'ontem' })
    )

    await expect(readExportMetadata(tempDir)).rejects.toThrow(
      'exportStartTimeUtc: exportStartTimeUtc não é uma data válida'
    )
  })

  it('deve rejeitar JSON malformado', async () => {
    await fs.writeFile(path.join(tempDir, METADATA_FILE_NAME), '{ "formatVersion": ')

    await expect(readExportMetadata(tempDir)).rejects.toThrow(
      'Metadados de exportação com JSON inválido'
    )
  })
})
