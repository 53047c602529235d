import * as fs from 'fs/promises'
import z from 'zod'
import { OBJECT_KIND_ORDER } from './object-kinds'

export const MAX_PARALLEL_WORKERS = 20

export const DEFAULT_CONFIG_FILE = 'schema-mirror.config.json'

const objectKindSchema = z.enum(OBJECT_KIND_ORDER)

const groupingModeSchema = z.enum(['single', 'byGroup', 'all'])

const isValidSqlServerUrl = (url: string): boolean => {
  try {
    const parsed = new URL(url)
    const validProtocol = ['mssql:', 'sqlserver:'].includes(parsed.protocol)
    const hasHost = !!parsed.hostname
    const hasDatabase = !!parsed.pathname && parsed.pathname !== '/'

    return validProtocol && hasHost && hasDatabase
  } catch {
    return false
  }
}

const sqlServerUrl = (field: string) =>
  z.string().refine(isValidSqlServerUrl, `${field} deve ser uma URL SQL Server válida`)

const retrySchema = z
  .object({
    maxAttempts: z.number().int().min(1, 'retry.maxAttempts deve ser pelo menos 1').default(3),
    initialDelayMs: z.number().int().min(0).default(2000)
  })
  .default({})

const timeoutFields = {
  connectionTimeoutSeconds: z.number().int().min(1).default(30),
  commandTimeoutSeconds: z.number().int().min(1).default(300)
}

export const exportConfigSchema = z
  .object({
    sourceUrl: sqlServerUrl('sourceUrl'),
    sourceSSLEnabled: z.boolean().default(true),
    outputPath: z.string().min(1, 'outputPath é obrigatório'),
    groupingMode: groupingModeSchema.default('single'),
    groupingOverrides: z.record(objectKindSchema, groupingModeSchema).default({}),
    includeData: z.boolean().default(false),
    includeObjectKinds: z.array(objectKindSchema).default([]),
    excludeObjectKinds: z.array(objectKindSchema).default([]),
    includeObjects: z.array(z.string().min(1)).default([]),
    excludeObjects: z.array(z.string().min(1)).default([]),
    deltaFrom: z.string().min(1).optional(),
    appendToExistingFiles: z.boolean().default(false),
    scriptOptions: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
    parallel: z
      .object({
        enabled: z.boolean().default(true),
        maxWorkers: z
          .number()
          .int()
          .min(1, 'parallel.maxWorkers deve ser pelo menos 1')
          .max(
            MAX_PARALLEL_WORKERS,
            `parallel.maxWorkers não pode ser maior que ${MAX_PARALLEL_WORKERS}`
          )
          .default(5),
        progressIntervalMs: z.number().int().min(100).default(2000)
      })
      .default({}),
    retry: retrySchema,
    ...timeoutFields
  })
  .superRefine((config, ctx) => {
    if (config.includeObjectKinds.length > 0 && config.excludeObjectKinds.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'includeObjectKinds e excludeObjectKinds são mutuamente exclusivos',
        path: ['includeObjectKinds']
      })
    }
  })

export const importConfigSchema = z.object({
  targetUrl: sqlServerUrl('targetUrl'),
  targetSSLEnabled: z.boolean().default(true),
  sourcePath: z.string().min(1, 'sourcePath é obrigatório'),
  createDatabase: z.boolean().default(false),
  includeData: z.boolean().default(true),
  includeFileGroups: z.boolean().default(false),
  continueOnError: z.boolean().default(false),
  sqlcmdVariables: z.record(z.string()).default({}),
  dependencyRetries: z
    .object({
      enabled: z.boolean().default(true),
      maxRetries: z
        .number()
        .int()
        .min(1, 'dependencyRetries.maxRetries deve ser pelo menos 1')
        .default(10),
      objectTypes: z
        .array(objectKindSchema.exclude(['SecurityPolicy', 'TableData', 'FileGroup']))
        .default(['UserDefinedFunction', 'View', 'StoredProcedure'])
    })
    .default({}),
  retry: retrySchema,
  ...timeoutFields
})

export const configFileSchema = z.object({
  export: z.unknown().optional(),
  import: z.unknown().optional()
})

export type ExportConfigInput = z.input<typeof exportConfigSchema>
export type ExportConfig = z.output<typeof exportConfigSchema>
export type ImportConfigInput = z.input<typeof importConfigSchema>
export type ImportConfig = z.output<typeof importConfigSchema>

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const field = issue.path.join('.')
      return issue.code === z.ZodIssueCode.custom || !field
        ? issue.message
        : `${field}: ${issue.message}`
    })
    .join(', ')
}

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw new Error(`Configuração inválida: ${formatIssues(result.error.issues)}`)
  }
  return result.data
}

/**
 * Validates an export configuration and fills in defaults
 * @throws Error listing every invalid field
 */
export function validateExportConfig(input: unknown): ExportConfig {
  return parseWith(exportConfigSchema, input)
}

/**
 * Validates an import configuration and fills in defaults
 * @throws Error listing every invalid field
 */
export function validateImportConfig(input: unknown): ImportConfig {
  return parseWith(importConfigSchema, input)
}

export interface ConfigFile {
  export?: unknown
  import?: unknown
}

export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
  let raw: string
  try {
    raw = await fs.readFile(filePath, 'utf8')
  } catch (error) {
    throw new Error(`Arquivo de configuração não encontrado: ${filePath}`, { cause: error })
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new Error(`Arquivo de configuração com JSON inválido: ${filePath}`, { cause: error })
  }

  return parseWith(configFileSchema, parsed)
}
