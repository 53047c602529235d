import { describe, expect, it } from 'vitest'
import { errorChain, formatErrorChain, ScriptApplyError } from '../../src/main/schema-mirror/errors'

describe('formatErrorChain', () => {
  it('deve citar a mensagem do driver uma única vez', () => {
    const driverError = Object.assign(new Error('Violation of PRIMARY KEY constraint'), {
      number: 2627
    })
    const requestError = Object.assign(new Error('Violation of PRIMARY KEY constraint'), {
      originalError: driverError
    })
    const failure = new ScriptApplyError('x.sql', 2, requestError)

    expect(errorChain(failure)).toEqual([failure, requestError, driverError])
    expect(formatErrorChain(failure)).toBe(
      'Falha no lote 2 de x.sql: Violation of PRIMARY KEY constraint'
    )
  })

  it('deve manter causas com mensagens próprias', () => {
    const failure = new Error('Exportação falhou', { cause: new Error('Connection timeout') })

    expect(formatErrorChain(failure)).toBe('Exportação falhou -> Connection timeout')
  })
})
