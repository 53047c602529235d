import { describe, expect, it } from 'vitest'
import { createProgram } from '../../src/main/index'

describe('createProgram', () => {
  it('deve registrar os comandos export, import e test-connection', () => {
    const program = createProgram()

    expect(program.name()).toBe('schema-mirror')
    expect(program.commands.map((command) => command.name())).toEqual([
      'export',
      'import',
      'test-connection'
    ])
  })

  it('deve usar o arquivo de configuração padrão em export e import', () => {
    const program = createProgram()

    for (const name of ['export', 'import']) {
      const command = program.commands.find((entry) => entry.name() === name)
      const config = command?.options.find((option) => option.long === '--config')
      expect(config?.defaultValue).toBe('schema-mirror.config.json')
    }
  })
})
