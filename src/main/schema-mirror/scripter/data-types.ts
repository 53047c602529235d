import { quoteName } from './sql-literals'

export interface TypeShape {
  type_name: string
  type_schema?: string | null
  is_user_defined?: boolean
  max_length: number
  precision: number
  scale: number
}

const LENGTH_TYPES = new Set(['char', 'varchar', 'binary', 'varbinary'])
const UNICODE_LENGTH_TYPES = new Set(['nchar', 'nvarchar'])
const PRECISION_SCALE_TYPES = new Set(['decimal', 'numeric'])
const SCALE_TYPES = new Set(['datetime2', 'time', 'datetimeoffset'])

function lengthOf(maxLength: number, bytesPerChar: number): string {
  return maxLength === -1 ? 'max' : String(maxLength / bytesPerChar)
}

/**
 * Column/parameter type as written in DDL, e.g. `[nvarchar](100)` or `[dbo].[PhoneNumber]`.
 * max_length is in bytes, as sys.columns and sys.types report it.
 */
export function formatDataType(shape: TypeShape): string {
  if (shape.is_user_defined && shape.type_schema) {
    return `${quoteName(shape.type_schema)}.${quoteName(shape.type_name)}`
  }

  const name = shape.type_name.toLowerCase()
  const quoted = quoteName(shape.type_name)

  if (LENGTH_TYPES.has(name)) return `${quoted}(${lengthOf(shape.max_length, 1)})`
  if (UNICODE_LENGTH_TYPES.has(name)) return `${quoted}(${lengthOf(shape.max_length, 2)})`
  if (PRECISION_SCALE_TYPES.has(name)) return `${quoted}(${shape.precision}, ${shape.scale})`
  if (SCALE_TYPES.has(name)) return `${quoted}(${shape.scale})`
  if (name === 'float' && shape.precision !== 53) return `${quoted}(${shape.precision})`

  return quoted
}
