import { describe, it, expect } from 'vitest'
import type { InventoryObject } from '../../src/main/schema-mirror/types'
import {
  buildWorkItems,
  effectiveGroupingMode,
  filterInventory,
  recordsOf,
  resolveScriptRequests,
  sanitizeFileName,
  type GroupingPolicy,
  type ObjectFilters
} from '../../src/main/schema-mirror/work-items'

const policy = (overrides: Partial<GroupingPolicy> = {}): GroupingPolicy => ({
  defaultMode: 'single',
  overrides: {},
  appendToExistingFiles: false,
  scriptOptions: {},
  ...overrides
})

const filters = (overrides: Partial<ObjectFilters> = {}): ObjectFilters => ({
  includeObjectKinds: [],
  excludeObjectKinds: [],
  includeObjects: [],
  excludeObjects: [],
  includeData: false,
  ...overrides
})

const inventory: InventoryObject[] = [
  { kind: 'View', ownerGroup: 'dbo', name: 'vOrders' },
  { kind: 'Table', ownerGroup: 'sales', name: 'Invoices' },
  { kind: 'Table', ownerGroup: 'dbo', name: 'Orders' },
  { kind: 'Table', ownerGroup: 'dbo', name: 'Customers' },
  {
    kind: 'ForeignKey',
    ownerGroup: 'dbo',
    name: 'FK_Orders_Customers',
    parent: { ownerGroup: 'dbo', name: 'Orders' }
  },
  {
    kind: 'Index',
    ownerGroup: 'dbo',
    name: 'IX_Orders_Date',
    parent: { ownerGroup: 'dbo', name: 'Orders' }
  },
  { kind: 'TableData', ownerGroup: 'dbo', name: 'Orders' }
]

describe('buildWorkItems', () => {
  it('deve gerar um item por objeto no modo single, na ordem das fases', () => {
    const items = buildWorkItems(inventory, policy(), filters())

    expect(items.map((item) => item.outputPath)).toEqual([
      '09_Tables_PrimaryKey/dbo.Customers.sql',
      '09_Tables_PrimaryKey/dbo.Orders.sql',
      '09_Tables_PrimaryKey/sales.Invoices.sql',
      '10_Tables_ForeignKeys/dbo.Orders.FK_Orders_Customers.sql',
      '11_Indexes/dbo.Orders.IX_Orders_Date.sql',
      '14_Programmability/05_Views/dbo.vOrders.sql'
    ])
    expect(items[0].id).toBe('Table:09_Tables_PrimaryKey/dbo.Customers.sql')
    expect(items[0].scriptOptions).toEqual({
      includeHeaders: true,
      scriptPrimaryKey: true,
      scriptUniqueKeys: true,
      includeCollation: true
    })
  })

  it('deve endereçar chaves estrangeiras e índices pela tabela pai', () => {
    const items = buildWorkItems(inventory, policy(), filters())
    const foreignKey = items.find((item) => item.objectKind === 'ForeignKey')

    expect(foreignKey?.objectIdentifiers).toEqual([
      { ownerGroup: 'dbo', name: 'Orders', extra: { constraint: 'FK_Orders_Customers' } }
    ])
    expect(foreignKey && recordsOf(foreignKey)).toEqual([
      {
        kind: 'ForeignKey',
        ownerGroup: 'dbo',
        name: 'Orders.FK_Orders_Customers',
        relativeFilePath: '10_Tables_ForeignKeys/dbo.Orders.FK_Orders_Customers.sql'
      }
    ])
  })

  it('deve agrupar por schema com numeração ordenada no modo byGroup', () => {
    const items = buildWorkItems(
      inventory,
      policy({ overrides: { Table: 'byGroup' } }),
      filters({ includeObjectKinds: ['Table'] })
    )

    expect(items.map((item) => item.outputPath)).toEqual([
      '09_Tables_PrimaryKey/001_dbo.sql',
      '09_Tables_PrimaryKey/002_sales.sql'
    ])
    expect(items[0].objectIdentifiers.map((identifier) => identifier.name)).toEqual([
      'Customers',
      'Orders'
    ])
  })

  it('deve gerar um único arquivo por tipo no modo all', () => {
    const items = buildWorkItems(
      inventory,
      policy({ defaultMode: 'all' }),
      filters({ includeObjectKinds: ['Table'] })
    )

    expect(items).toHaveLength(1)
    expect(items[0].outputPath).toBe('09_Tables_PrimaryKey/001_Tables.sql')
    expect(items[0].objectIdentifiers).toHaveLength(3)
  })

  it('deve forçar o agrupamento de file groups independentemente da política', () => {
    const items = buildWorkItems(
      [
        { kind: 'FileGroup', name: 'FG_DATA' },
        { kind: 'FileGroup', name: 'FG_ARCHIVE' }
      ],
      policy(),
      filters()
    )

    expect(items).toHaveLength(1)
    expect(items[0].outputPath).toBe('00_FileGroups/001_FileGroups.sql')
    expect(items[0].specialHandling).toBe('fileGroups')
  })

  it('deve incluir scripts de dados somente quando solicitado', () => {
    const withoutData = buildWorkItems(inventory, policy(), filters())
    const withData = buildWorkItems(inventory, policy(), filters({ includeData: true }))

    expect(withoutData.some((item) => item.objectKind === 'TableData')).toBe(false)
    const data = withData.find((item) => item.objectKind === 'TableData')
    expect(data?.outputPath).toBe('20_Data/dbo.Orders.data.sql')
    expect(data?.specialHandling).toBe('tableData')
  })

  it('deve produzir caminhos idênticos para o mesmo inventário em qualquer ordem', () => {
    const first = buildWorkItems(inventory, policy(), filters())
    const second = buildWorkItems([...inventory].reverse(), policy(), filters())

    expect(second.map((item) => item.outputPath)).toEqual(first.map((item) => item.outputPath))
  })

  it('deve rejeitar dois objetos que resultam no mesmo arquivo', () => {
    const colliding: InventoryObject[] = [
      { kind: 'Table', ownerGroup: 'dbo', name: 'a:b' },
      { kind: 'Table', ownerGroup: 'dbo', name: 'a_b' }
    ]

    expect(() => buildWorkItems(colliding, policy(), filters())).toThrow(
      'Caminho de saída duplicado: 09_Tables_PrimaryKey/dbo.a_b.sql'
    )
  })
})

describe('effectiveGroupingMode', () => {
  it('deve considerar os overrides e ignorar tipos com agrupamento fixo', () => {
    expect(effectiveGroupingMode(policy())).toBe('single')
    expect(effectiveGroupingMode(policy({ overrides: { FileGroup: 'single' } }))).toBe('single')
    expect(effectiveGroupingMode(policy({ overrides: { View: 'byGroup' } }))).toBe('byGroup')
    const allButTables = policy({ defaultMode: 'all', overrides: { Table: 'single' } })
    expect(effectiveGroupingMode(allButTables)).toBe('all')
  })
})

describe('filterInventory', () => {
  it('deve aplicar padrões de exclusão por nome qualificado', () => {
    const result = filterInventory(inventory, filters({ excludeObjects: ['dbo.Cust*'] }))

    expect(result.some((object) => object.name === 'Customers')).toBe(false)
    expect(result.some((object) => object.name === 'Orders')).toBe(true)
  })

  it('deve aplicar padrões de inclusão também a objetos filhos pela tabela pai', () => {
    const result = filterInventory(
      inventory,
      filters({ includeObjects: ['dbo.Orders'], excludeObjectKinds: ['TableData'] })
    )

    expect(result.map((object) => `${object.kind}:${object.name}`)).toEqual([
      'Table:Orders',
      'ForeignKey:FK_Orders_Customers',
      'Index:IX_Orders_Date'
    ])
  })
})

describe('resolveScriptRequests', () => {
  it('deve truncar apenas na primeira chamada de um arquivo agrupado', () => {
    const [item] = buildWorkItems(
      inventory,
      policy({ defaultMode: 'all' }),
      filters({ includeObjectKinds: ['Table'] })
    )
    const requests = resolveScriptRequests(item, '/exports/run')

    expect(requests.map((request) => request.append)).toEqual([false, true, true])
    expect(requests[0].outputPath).toMatch(/001_Tables\.sql$/)
  })
})

describe('sanitizeFileName', () => {
  it('deve substituir caracteres inválidos em nomes de arquivo', () => {
    expect(sanitizeFileName('srv\\inst:db*?')).toBe('srv_inst_db__')
  })
})
