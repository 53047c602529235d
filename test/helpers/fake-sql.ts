import type { ConnectionFactory, SqlSession } from '../../src/main/schema-mirror/connection'

export type QueryHandler = (sql: string, params: Record<string, unknown>) => object[] | undefined

/**
 * In-process stand-in for a SQL Server connection. Queries and streams are
 * answered by the first handler that returns rows; execute() calls are
 * recorded and may be failed through failOn.
 */
export class FakeSession implements SqlSession {
  readonly executed: string[] = []
  readonly queries: { sql: string; params: Record<string, unknown> }[] = []
  closed = false

  constructor(
    private readonly handlers: QueryHandler[] = [],
    private readonly failOn: (sql: string) => Error | undefined = () => undefined
  ) {}

  async query<T extends object>(sql: string, params: Record<string, unknown> = {}): Promise<T[]> {
    this.queries.push({ sql, params })
    for (const handler of this.handlers) {
      const rows = handler(sql, params)
      if (rows) return rows.filter(isRow<T>)
    }
    return []
  }

  async *stream<T extends object>(
    sql: string,
    params: Record<string, unknown> = {}
  ): AsyncGenerator<T> {
    yield* await this.query<T>(sql, params)
  }

  async execute(sql: string): Promise<void> {
    const error = this.failOn(sql)
    if (error) throw error
    this.executed.push(sql)
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

function isRow<T extends object>(row: object): row is T {
  return typeof row === 'object'
}

export function queryMatching(fragment: string, rows: object[]): QueryHandler {
  return (sql) => (sql.includes(fragment) ? rows : undefined)
}

/**
 * Factory handing out sessions built by create, counting how many were opened
 */
export function fakeConnectionFactory(create: () => FakeSession = () => new FakeSession()) {
  const sessions: FakeSession[] = []
  const connect: ConnectionFactory = async () => {
    const session = create()
    sessions.push(session)
    return session
  }
  return { connect, sessions }
}

export function silentLogger() {
  const lines: string[] = []
  return { lines, log: (message: string) => lines.push(message) }
}
