import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ScriptApplyError } from '../../src/main/schema-mirror/errors'
import {
  applyScriptFile,
  splitSqlBatches,
  substituteSqlcmdVariables
} from '../../src/main/schema-mirror/sql-execution'
import { FakeSession } from '../helpers/fake-sql'

describe('splitSqlBatches', () => {
  it('deve separar lotes em linhas GO com espaços, contagem e comentário', () => {
    const script = [
      'SELECT 1',
      'GO',
      'SELECT 2',
      '  go  ',
      'SELECT 3',
      'GO 3',
      'SELECT 4',
      'GO -- fim do lote',
      ''
    ].join('\n')

    expect(splitSqlBatches(script)).toEqual(['SELECT 1', 'SELECT 2', 'SELECT 3', 'SELECT 4'])
  })

  it('não deve separar em linhas que apenas começam com GO', () => {
    const script = 'SELECT 1\nGOTO fim\nGO\nSELECT 2 -- GO\n'

    expect(splitSqlBatches(script)).toEqual(['SELECT 1\nGOTO fim', 'SELECT 2 -- GO\n'])
  })

  it('deve ignorar lotes vazios e aceitar quebras de linha CRLF', () => {
    expect(splitSqlBatches('GO\r\n\r\nGO\r\n')).toEqual([])
    expect(splitSqlBatches('SELECT 1\r\nGO\r\nSELECT 2')).toEqual(['SELECT 1', 'SELECT 2'])
  })
})

describe('substituteSqlcmdVariables', () => {
  it('deve substituir variáveis sem diferenciar maiúsculas e minúsculas', () => {
    expect(
      substituteSqlcmdVariables("FILENAME = N'$(FG_DATA_PATH_FILE)'", {
        fg_data_path_file: '/var/opt/mssql/data/fg_data.ndf'
      })
    ).toBe("FILENAME = N'/var/opt/mssql/data/fg_data.ndf'")
  })

  it('deve listar todas as variáveis sem valor', () => {
    expect(() => substituteSqlcmdVariables('$(A_SIZE) $(B_GROWTH) $(A_SIZE)', {})).toThrow(
      'Variáveis SQLCMD sem valor: A_SIZE, B_GROWTH'
    )
  })
})

describe('applyScriptFile', () => {
  let tempDir: string
  let scriptPath: string

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'schema-mirror-sql-'))
    scriptPath = path.join(tempDir, 'dbo.Orders.sql')
    await fs.writeFile(
      scriptPath,
      '\uFEFFCREATE TABLE [$(Schema)].[Orders] ([Id] int)\nGO 3\n' +
        'INSERT INTO [dbo].[Orders] VALUES (1)\nGO\n'
    )
  })

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  it('deve executar cada lote uma única vez, mesmo com contagem no GO', async () => {
    const session = new FakeSession()

    const batches = await applyScriptFile(session, scriptPath, { variables: { SCHEMA: 'dbo' } })

    expect(batches).toBe(2)
    expect(session.executed).toEqual([
      'CREATE TABLE [dbo].[Orders] ([Id] int)',
      'INSERT INTO [dbo].[Orders] VALUES (1)'
    ])
  })

  it('deve identificar o lote que falhou', async () => {
    const session = new FakeSession([], (sql) =>
      sql.startsWith('INSERT') ? new Error('Violation of PRIMARY KEY constraint') : undefined
    )

    const failure = await applyScriptFile(session, scriptPath, {
      variables: { Schema: 'dbo' }
    }).catch((error: unknown) => error)

    expect(failure).toBeInstanceOf(ScriptApplyError)
    if (!(failure instanceof ScriptApplyError)) return
    expect(failure.batchNumber).toBe(2)
    expect(failure.message).toBe(
      `Falha no lote 2 de ${scriptPath}: Violation of PRIMARY KEY constraint`
    )
    expect(session.executed).toEqual(['CREATE TABLE [dbo].[Orders] ([Id] int)'])
  })
})
