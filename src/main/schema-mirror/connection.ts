import { ConnectionPool, type config as MssqlConfig } from 'mssql'
import { errorMessage } from './errors'
import { withRetry } from './retry'
import type { Logger } from './types'

/**
 * One open connection. Sessions are never shared between concurrent workers.
 */
export interface SqlSession {
  query<T extends object>(sql: string, params?: Record<string, unknown>): Promise<T[]>
  /** Rows one at a time, read as the consumer asks for them */
  stream<T extends object>(sql: string, params?: Record<string, unknown>): AsyncIterable<T>
  execute(sql: string): Promise<void>
  close(): Promise<void>
}

export type ConnectionFactory = () => Promise<SqlSession>

export interface ConnectionOptions {
  sslEnabled: boolean
  connectionTimeoutSeconds: number
  commandTimeoutSeconds: number
}

export interface ConnectionFactoryOptions extends ConnectionOptions {
  retry: { maxAttempts: number; initialDelayMs: number }
  log: Logger
}

const DEFAULT_PORT = 1433

export function getConnectionParams(url: string, options: ConnectionOptions): MssqlConfig {
  try {
    const urlObj = new URL(url)

    const isLocalhost =
      urlObj.hostname.includes('localhost') || urlObj.hostname.includes('127.0.0.1')
    const instanceName = urlObj.searchParams.get('instanceName') ?? undefined

    return {
      user: decodeURIComponent(urlObj.username),
      password: decodeURIComponent(urlObj.password),
      server: urlObj.hostname,
      port: instanceName ? undefined : parseInt(urlObj.port) || DEFAULT_PORT,
      database: decodeURIComponent(urlObj.pathname.replace('/', '')),
      connectionTimeout: options.connectionTimeoutSeconds * 1000,
      requestTimeout: options.commandTimeoutSeconds * 1000,
      pool: { max: 1, min: 0 },
      options: {
        instanceName,
        encrypt: options.sslEnabled,
        trustServerCertificate: isLocalhost || !options.sslEnabled
      }
    }
  } catch (error) {
    throw new Error(`Erro ao analisar URL do banco de dados (${maskUrl(url)}): ${error}`)
  }
}

export function maskUrl(url: string): string {
  try {
    const parsed = new URL(url)
    if (parsed.password) parsed.password = '****'
    return parsed.toString()
  } catch {
    return url
  }
}

/**
 * host,port as SQL Server tools print it
 */
export function serverLabel(url: string): string {
  const parsed = new URL(url)
  const instanceName = parsed.searchParams.get('instanceName')
  if (instanceName) return `${parsed.hostname}\\${instanceName}`
  return `${parsed.hostname},${parseInt(parsed.port) || DEFAULT_PORT}`
}

export function databaseOf(url: string): string {
  return decodeURIComponent(new URL(url).pathname.replace('/', ''))
}

export function withDatabase(url: string, database: string): string {
  const parsed = new URL(url)
  parsed.pathname = `/${encodeURIComponent(database)}`
  return parsed.toString()
}

function isRow<T extends object>(value: unknown): value is T {
  return typeof value === 'object' && value !== null
}

class MssqlSession implements SqlSession {
  constructor(private readonly pool: ConnectionPool) {}

  async query<T extends object>(sql: string, params: Record<string, unknown> = {}): Promise<T[]> {
    const request = this.pool.request()
    for (const [name, value] of Object.entries(params)) {
      request.input(name, value)
    }
    const result = await request.query<T>(sql)
    return result.recordset ? [...result.recordset] : []
  }

  async *stream<T extends object>(
    sql: string,
    params: Record<string, unknown> = {}
  ): AsyncGenerator<T> {
    const request = this.pool.request()
    for (const [name, value] of Object.entries(params)) {
      request.input(name, value)
    }

    const rows = request.toReadableStream()
    request.query(sql, (error) => {
      if (error) rows.destroy(error)
    })

    for await (const row of rows) {
      const value: unknown = row
      if (isRow<T>(value)) yield value
    }
  }

  async execute(sql: string): Promise<void> {
    await this.pool.request().batch(sql)
  }

  async close(): Promise<void> {
    await this.pool.close()
  }
}

export async function createSession(url: string, options: ConnectionOptions): Promise<SqlSession> {
  const params = getConnectionParams(url, options)

  if (!params.server || !params.database || !params.user) {
    throw new Error('Parâmetros de conexão incompletos')
  }

  const pool = new ConnectionPool(params)

  try {
    await pool.connect()
    await pool.request().query('SELECT 1 AS connectivity_test')
    return new MssqlSession(pool)
  } catch (error) {
    await pool.close().catch(() => undefined)

    throw new Error(`Falha na conexão com ${maskUrl(url)}: ${errorMessage(error)}`, {
      cause: error
    })
  }
}

/**
 * Every call opens a fresh session, retrying transient connection failures
 */
export function createConnectionFactory(
  url: string,
  options: ConnectionFactoryOptions
): ConnectionFactory {
  return () =>
    withRetry(() => createSession(url, options), {
      maxAttempts: options.retry.maxAttempts,
      initialDelayMs: options.retry.initialDelayMs,
      log: options.log
    })
}

export async function validateDatabaseConnection(
  connect: ConnectionFactory,
  url: string,
  log: Logger
): Promise<void> {
  const session = await connect()

  try {
    const rows = await session.query<{ db_name: string; version: string }>(
      'SELECT DB_NAME() AS db_name, @@VERSION AS version'
    )
    const parsed = new URL(url)
    log(`✓ Conexão válida com ${parsed.host}/${rows[0]?.db_name ?? databaseOf(url)}`)
  } finally {
    await session.close()
  }
}
