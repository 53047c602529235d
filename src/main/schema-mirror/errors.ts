export class DeltaValidationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'DeltaValidationError'
  }
}

/**
 * A script batch failed on the target. batchNumber is 1-based.
 */
export class ScriptApplyError extends Error {
  readonly scriptPath: string
  readonly batchNumber: number

  constructor(scriptPath: string, batchNumber: number, cause: unknown) {
    super(`Falha no lote ${batchNumber} de ${scriptPath}: ${errorMessage(cause)}`, { cause })
    this.name = 'ScriptApplyError'
    this.scriptPath = scriptPath
    this.batchNumber = batchNumber
  }
}

export class ImportAbortedError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ImportAbortedError'
  }
}

export class UnsupportedObjectKindError extends Error {
  constructor(kind: string) {
    super(`Tipo de objeto sem suporte no scripter: ${kind}`)
    this.name = 'UnsupportedObjectKindError'
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

function nestedErrors(error: unknown): unknown[] {
  if (typeof error !== 'object' || error === null) return []

  const nested: unknown[] = []
  if ('cause' in error && error.cause !== undefined) nested.push(error.cause)
  if ('originalError' in error && error.originalError !== undefined) {
    nested.push(error.originalError)
  }
  return nested
}

/**
 * Walks cause and the driver's originalError, breadth first
 */
export function errorChain(error: unknown): unknown[] {
  const chain: unknown[] = []
  const queue: unknown[] = [error]

  while (queue.length > 0 && chain.length < 10) {
    const current = queue.shift()
    if (current === undefined || chain.includes(current)) continue
    chain.push(current)
    queue.push(...nestedErrors(current))
  }

  return chain
}

/**
 * Messages of the chain joined by ` -> `. A cause whose message an outer
 * message already quotes is left out.
 */
export function formatErrorChain(error: unknown): string {
  const messages: string[] = []
  for (const entry of errorChain(error)) {
    const message = errorMessage(entry)
    if (!messages.some((outer) => outer.includes(message))) messages.push(message)
  }
  return messages.join(' -> ')
}
