import type { ScriptRequest } from '../types'
import { batch, childNameOf, firstRow, type ScriptGenerator } from './shared'
import { qualifiedName } from './sql-literals'

interface ModuleRow {
  definition: string | null
  uses_ansi_nulls: boolean
  uses_quoted_identifier: boolean
  is_disabled: boolean | null
}

const MODULE_QUERY = `
  SELECT m.definition, m.uses_ansi_nulls, m.uses_quoted_identifier, tr.is_disabled
  FROM sys.sql_modules AS m
  LEFT JOIN sys.triggers AS tr ON tr.object_id = m.object_id
  WHERE m.object_id = OBJECT_ID(@name)
`

/**
 * Views, procedures, functions, triggers, defaults and rules are stored as
 * their original CREATE text in sys.sql_modules.
 */
function moduleGenerator(nameOf: (request: ScriptRequest) => string): ScriptGenerator {
  return async (session, request) => {
    const objectName = nameOf(request)
    const row = await firstRow<ModuleRow>(session, request, MODULE_QUERY, { name: objectName })

    if (row.definition === null) {
      throw new Error(`Definição indisponível para ${objectName} (objeto criptografado?)`)
    }

    const script = [
      batch(`SET ANSI_NULLS ${row.uses_ansi_nulls ? 'ON' : 'OFF'}`),
      batch(`SET QUOTED_IDENTIFIER ${row.uses_quoted_identifier ? 'ON' : 'OFF'}`),
      batch(row.definition.trim())
    ]

    if (row.is_disabled && request.kind === 'Trigger') {
      const table = qualifiedName(request.ownerGroup, request.name)
      script.push(batch(`DISABLE TRIGGER ${objectName} ON ${table}`))
    }

    return script.join('')
  }
}

export const scriptModule = moduleGenerator((request) =>
  qualifiedName(request.ownerGroup, request.name)
)

/**
 * Triggers are addressed through their table; the trigger lives in the table's schema
 */
export const scriptTrigger = moduleGenerator((request) =>
  qualifiedName(request.ownerGroup, childNameOf(request, 'trigger'))
)
