export function quoteName(name: string): string {
  return `[${name.replace(/]/g, ']]')}]`
}

export function qualifiedName(ownerGroup: string | undefined, name: string): string {
  return ownerGroup ? `${quoteName(ownerGroup)}.${quoteName(name)}` : quoteName(name)
}

export function unicodeLiteral(value: string): string {
  return `N'${value.replace(/'/g, "''")}'`
}

function pad(value: number, length = 2): string {
  return String(value).padStart(length, '0')
}

/**
 * Dates come back from the driver as UTC-based JS dates; the literal keeps
 * millisecond precision in ISO 8601 form, which every datetime type accepts.
 */
export function dateLiteral(value: Date): string {
  const text =
    `${value.getUTCFullYear()}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}T` +
    `${pad(value.getUTCHours())}:${pad(value.getUTCMinutes())}:${pad(value.getUTCSeconds())}.` +
    pad(value.getUTCMilliseconds(), 3)
  return `'${text}'`
}

/**
 * Renders a value read through the driver as a T-SQL literal
 */
export function sqlLiteral(value: unknown): string {
  if (value === null || value === undefined) return 'NULL'
  if (typeof value === 'boolean') return value ? '1' : '0'
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new Error(`Valor numérico não representável: ${value}`)
    return String(value)
  }
  if (typeof value === 'bigint') return value.toString()
  if (typeof value === 'string') return unicodeLiteral(value)
  if (value instanceof Date) return dateLiteral(value)
  if (Buffer.isBuffer(value)) {
    return value.length === 0 ? '0x' : `0x${value.toString('hex').toUpperCase()}`
  }
  if (Array.isArray(value)) {
    throw new Error('Valores de múltiplas colunas com o mesmo nome não são suportados')
  }
  return unicodeLiteral(JSON.stringify(value))
}
