import { describe, expect, it, vi } from 'vitest'
import { isTransientError, withRetry } from '../../src/main/schema-mirror/retry'

const sqlError = (message: string, number: number) => Object.assign(new Error(message), { number })

describe('withRetry', () => {
  it('deve repetir erros transitórios com espera exponencial', async () => {
    const delays: number[] = []
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(sqlError('Transaction was deadlocked', 1205))
      .mockRejectedValueOnce(sqlError('Transaction was deadlocked', 1205))
      .mockResolvedValueOnce('ok')

    const result = await withRetry(operation, {
      maxAttempts: 3,
      initialDelayMs: 2000,
      sleep: async (ms) => {
        delays.push(ms)
      }
    })

    expect(result).toBe('ok')
    expect(operation).toHaveBeenCalledTimes(3)
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3])
    expect(delays).toEqual([2000, 4000])
  })

  it('deve propagar imediatamente um erro não transitório', async () => {
    const error = sqlError("Invalid object name 'dbo.Missing'", 208)
    const operation = vi.fn(async () => {
      throw error
    })
    const sleep = vi.fn(async () => {})

    await expect(
      withRetry(operation, { maxAttempts: 3, initialDelayMs: 2000, sleep })
    ).rejects.toBe(error)
    expect(operation).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('deve propagar o último erro transitório após esgotar as tentativas', async () => {
    const delays: number[] = []
    let attempts = 0
    const operation = async () => {
      attempts++
      throw Object.assign(new Error(`tentativa ${attempts}`), { code: 'ETIMEOUT' })
    }

    await expect(
      withRetry(operation, {
        maxAttempts: 3,
        initialDelayMs: 2000,
        sleep: async (ms) => {
          delays.push(ms)
        }
      })
    ).rejects.toThrow('tentativa 3')
    expect(attempts).toBe(3)
    expect(delays).toEqual([2000, 4000])
  })

  it('deve registrar cada nova tentativa no log', async () => {
    const lines: string[] = []
    let attempts = 0

    await withRetry(
      async () => {
        attempts++
        if (attempts === 1) throw sqlError('Database is not currently available', 40613)
        return attempts
      },
      {
        maxAttempts: 3,
        initialDelayMs: 10,
        log: (message) => lines.push(message),
        sleep: async () => {}
      }
    )

    expect(lines).toEqual([
      '⚠️  Erro transitório (tentativa 1/3): Database is not currently available. ' +
        'Nova tentativa em 10ms'
    ])
  })
})

describe('isTransientError', () => {
  it('deve reconhecer números de erro, códigos do driver e mensagens de timeout', () => {
    expect(isTransientError(sqlError('deadlock victim', 1205))).toBe(true)
    expect(isTransientError(Object.assign(new Error('socket hang up'), { code: 'ESOCKET' }))).toBe(
      true
    )
    expect(isTransientError(new Error('Timeout: Request failed to complete in 30000ms'))).toBe(true)
  })

  it('deve procurar a causa transitória dentro da cadeia de erros', () => {
    const wrapped = new Error('Falha na conexão', {
      cause: Object.assign(new Error('Login failed'), { originalError: sqlError('busy', 10928) })
    })

    expect(isTransientError(wrapped)).toBe(true)
  })

  it('não deve tratar erros de sintaxe ou de objeto inexistente como transitórios', () => {
    expect(isTransientError(sqlError("Incorrect syntax near 'FROM'", 102))).toBe(false)
    expect(isTransientError(sqlError("Invalid object name 'dbo.X'", 208))).toBe(false)
  })
})
