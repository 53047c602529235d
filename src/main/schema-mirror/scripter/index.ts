import * as fs from 'fs/promises'
import type { SqlSession } from '../connection'
import { UnsupportedObjectKindError } from '../errors'
import type { ObjectKind } from '../object-kinds'
import type { ScriptingService, ScriptRequest } from '../types'
import { scriptTableData } from './data'
import {
  FILE_GROUPS_HEADER,
  scriptDatabaseRole,
  scriptFileGroup,
  scriptSchema,
  scriptScopedConfiguration,
  scriptUser
} from './database'
import { scriptModule, scriptTrigger } from './modules'
import {
  scriptDataType,
  scriptExternalDataSource,
  scriptFullTextCatalog,
  scriptPartitionFunction,
  scriptPartitionScheme,
  scriptPlanGuide,
  scriptSecurityPolicy,
  scriptSequence,
  scriptSynonym
} from './objects'
import { booleanOption, displayName, type ScriptGenerator } from './shared'
import { scriptForeignKey, scriptIndex, scriptTable, scriptTableType } from './tables'

export type ScriptGenerators = Readonly<Partial<Record<ObjectKind, ScriptGenerator>>>

export const SCRIPT_GENERATORS: Readonly<Record<ObjectKind, ScriptGenerator>> = {
  FileGroup: scriptFileGroup,
  DatabaseRole: scriptDatabaseRole,
  User: scriptUser,
  DatabaseScopedConfiguration: scriptScopedConfiguration,
  Schema: scriptSchema,
  Sequence: scriptSequence,
  PartitionFunction: scriptPartitionFunction,
  PartitionScheme: scriptPartitionScheme,
  UserDefinedDataType: scriptDataType,
  UserDefinedTableType: scriptTableType,
  Table: scriptTable,
  ForeignKey: scriptForeignKey,
  Index: scriptIndex,
  Default: scriptModule,
  Rule: scriptModule,
  UserDefinedFunction: scriptModule,
  StoredProcedure: scriptModule,
  Trigger: scriptTrigger,
  View: scriptModule,
  Synonym: scriptSynonym,
  FullTextCatalog: scriptFullTextCatalog,
  ExternalDataSource: scriptExternalDataSource,
  PlanGuide: scriptPlanGuide,
  SecurityPolicy: scriptSecurityPolicy,
  TableData: scriptTableData
}

function objectHeader(request: ScriptRequest): string {
  const child = request.extra ? Object.values(request.extra)[0] : undefined
  const name = child ? `${displayName(request)}.${child}` : displayName(request)
  return `-- ${request.kind}: ${name}\n`
}

/**
 * ScriptingService backed by the source's catalog views. Each request writes
 * (or appends) one object's script to request.outputPath; streamed bodies are
 * written piece by piece.
 */
export class CatalogScripter implements ScriptingService {
  constructor(private readonly generators: ScriptGenerators = SCRIPT_GENERATORS) {}

  /**
   * @throws UnsupportedObjectKindError when no generator is registered for the kind
   */
  async script(session: SqlSession, request: ScriptRequest): Promise<void> {
    const generate = this.generators[request.kind]
    if (!generate) throw new UnsupportedObjectKindError(request.kind)

    const body = await generate(session, request)
    const parts: string[] = []

    if (!request.append && request.specialHandling === 'fileGroups') {
      parts.push(FILE_GROUPS_HEADER)
    }
    if (request.append) parts.push('\n')
    if (booleanOption(request, 'includeHeaders', true)) parts.push(objectHeader(request))

    const file = await fs.open(request.outputPath, request.append ? 'a' : 'w')
    try {
      await file.write(parts.join(''), null, 'utf8')
      if (typeof body === 'string') {
        await file.write(body, null, 'utf8')
      } else {
        for await (const piece of body) await file.write(piece, null, 'utf8')
      }
    } finally {
      await file.close()
    }
  }
}
