// tests/sql-autocomplete/pipeline/fk-graph.test.ts

import { describe, it, expect } from 'vitest'
import {
  findJoinCandidates,
  flattenJoinCandidates,
  formatJoinCandidate,
  tableKey,
  toJoinCandidate,
} from '../../../src/lib/sql/autocomplete/fk-graph'
import { createSchemaMetadataResolver, type MetadataResolver } from '../../../src/lib/sql/autocomplete/metadata'
import type { SchemaInfo, SchemaTable } from '../../../src/lib/sql/autocomplete/types'
import { testSchema } from '../../test-utils'

// ============================================================================
// TEST HELPERS
// ============================================================================

function table(schema: SchemaInfo, name: string): SchemaTable {
  const found = schema.tables.find((t) => t.name === name)
  if (!found) throw new Error(`No table ${name}`)
  return found
}

function linked(name: string, ...targets: string[]): SchemaTable {
  return {
    schema: 'dbo',
    name,
    type: 'table',
    columns: [],
    foreignKeys: targets.map((target) => ({
      name: `FK_${name}_${target}`,
      columns: [`${target}Id`],
      referencedSchema: 'dbo',
      referencedTable: target,
      referencedColumns: ['Id'],
    })),
  }
}

// A <-> B, B -> C, C -> C, C -> D
const cyclicSchema: SchemaInfo = {
  defaultSchema: 'dbo',
  tables: [linked('A', 'B'), linked('B', 'A', 'C'), linked('C', 'C', 'D'), linked('D')],
  procedures: [],
}

// Invoices -> sales.Orders
const crossSchema: SchemaInfo = {
  defaultSchema: 'dbo',
  tables: [
    {
      schema: 'dbo',
      name: 'Invoices',
      type: 'table',
      columns: [],
      foreignKeys: [
        {
          name: 'FK_Invoices_Orders',
          columns: ['OrderID'],
          referencedSchema: 'sales',
          referencedTable: 'Orders',
          referencedColumns: ['OrderID'],
        },
      ],
    },
    { schema: 'sales', name: 'Orders', type: 'table', columns: [] },
  ],
  procedures: [],
}

function names(results: { table: SchemaTable }[] | undefined): string[] {
  return (results ?? []).map((r) => r.table.name)
}

const resolver = createSchemaMetadataResolver(testSchema)
const orders = table(testSchema, 'Orders')
const employees = table(testSchema, 'Employees')

// ============================================================================
// TESTS
// ============================================================================

describe('FK graph search', () => {
  it('finds direct and two-hop targets', async () => {
    const result = await findJoinCandidates([orders], resolver)
    expect(result.cancelled).toBe(false)
    expect(result.errors).toEqual([])
    expect(names(result.byHop.get(1))).toEqual(['Employees'])
    expect(names(result.byHop.get(2))).toEqual(['Departments'])

    const [departments] = result.byHop.get(2) ?? []
    expect(departments.viaTable).toBe('Employees')
    expect(departments.sourceTable.name).toBe('Employees')
    expect(departments.path.map((entry) => entry.key)).toEqual(['sales.orders', 'dbo.employees'])
    expect(departments.constraint.name).toBe('FK_Employees_Departments')
  })

  it('stops at the depth limit', async () => {
    const result = await findJoinCandidates([orders], resolver, { maxDepth: 1 })
    expect([...result.byHop.keys()]).toEqual([1])
    expect(names(result.byHop.get(1))).toEqual(['Employees'])
  })

  it('never suggests a source table', async () => {
    const result = await findJoinCandidates([orders, employees], resolver)
    expect(names(result.byHop.get(1))).toEqual(['Departments'])
    expect(result.byHop.get(1)?.[0].sourceTable.name).toBe('Employees')
    expect(names(result.byHop.get(2))).toEqual([])
  })

  it('terminates on cycles and reaches each table once', async () => {
    const cyclic = createSchemaMetadataResolver(cyclicSchema)
    const result = await findJoinCandidates([table(cyclicSchema, 'A')], cyclic, { maxDepth: 5 })
    expect(names(result.byHop.get(1))).toEqual(['B'])
    expect(names(result.byHop.get(2))).toEqual(['C'])
    expect(names(result.byHop.get(3))).toEqual(['D'])
    expect(names(result.byHop.get(4))).toEqual([])
  })

  it('follows a self-referencing key without suggesting the source', async () => {
    const result = await findJoinCandidates([employees], resolver, { maxDepth: 3 })
    const found = names(flattenJoinCandidates(result.byHop))
    expect(found).toEqual(['Departments'])
    expect(result.byHop.get(1)?.[0].constraint.name).toBe('FK_Employees_Departments')
  })

  it('reaches each table once through cycles and self-loops', async () => {
    const cyclic = createSchemaMetadataResolver(cyclicSchema)
    const result = await findJoinCandidates([table(cyclicSchema, 'A')], cyclic, { maxDepth: 5 })
    const found = names(flattenJoinCandidates(result.byHop))
    expect(found).not.toContain('A')
    expect(new Set(found).size).toBe(found.length)
  })

  it('records lookup failures and keeps walking', async () => {
    const failing: MetadataResolver = {
      resolveTable: (name, context) => resolver.resolveTable(name, context),
      getConstraints: async (source, context) => {
        if (source.name === 'Employees') throw new Error('connection reset')
        return resolver.getConstraints(source, context)
      },
    }
    const result = await findJoinCandidates([orders], failing)
    expect(result.cancelled).toBe(false)
    expect(names(result.byHop.get(1))).toEqual(['Employees'])
    expect(names(result.byHop.get(2))).toEqual([])
    expect(result.errors.map((e) => [e.operation, e.table, e.error.message])).toEqual([
      ['getConstraints', 'dbo.employees', 'connection reset'],
    ])
  })

  it('reports cancellation before any lookup', async () => {
    const controller = new AbortController()
    controller.abort()
    const result = await findJoinCandidates([orders], resolver, { signal: controller.signal })
    expect(result.cancelled).toBe(true)
    expect(names(result.byHop.get(1))).toEqual([])
  })

  it('drops a lookup that settles after cancellation', async () => {
    const controller = new AbortController()
    const aborting: MetadataResolver = {
      resolveTable: (name, context) => resolver.resolveTable(name, context),
      getConstraints: async (source, context) => {
        controller.abort()
        return resolver.getConstraints(source, context)
      },
    }
    const result = await findJoinCandidates([orders], aborting, { signal: controller.signal })
    expect(result.cancelled).toBe(true)
    expect(names(result.byHop.get(1))).toEqual([])
  })

  it('passes the connection to the resolver', async () => {
    const seen: (string | undefined)[] = []
    const tracking: MetadataResolver = {
      resolveTable: (name, context) => resolver.resolveTable(name, context),
      getConstraints: async (source, context) => {
        seen.push(context?.connectionId)
        return resolver.getConstraints(source, context)
      },
    }
    await findJoinCandidates([orders], tracking, { maxDepth: 1, connectionId: 'local' })
    expect(seen).toEqual(['local'])
  })

  describe('formatting', () => {
    it('flattens nearest first', async () => {
      const result = await findJoinCandidates([orders], resolver)
      expect(flattenJoinCandidates(result.byHop).map((r) => [r.table.name, r.hopCount])).toEqual([
        ['Employees', 1],
        ['Departments', 2],
      ])
    })

    it('describes a direct foreign key', async () => {
      const result = await findJoinCandidates([orders], resolver, { maxDepth: 1 })
      const [direct] = result.byHop.get(1) ?? []
      expect(formatJoinCandidate(direct)).toEqual({
        label: 'Employees',
        detail: 'JOIN suggestion (FK)',
        documentation: '**Employees**\n\nDirect foreign key relationship\n\nFK: EmployeeID → EmployeeID',
      })
    })

    it('describes a chain', async () => {
      const result = await findJoinCandidates([orders], resolver)
      const [chained] = result.byHop.get(2) ?? []
      expect(formatJoinCandidate(chained)).toEqual({
        label: 'Departments (via Employees)',
        detail: 'JOIN suggestion (FK chain: 2 hops)',
        documentation: '**Departments**\n\nFK chain (2 hops)\n\nPath: Orders → Employees → Departments',
      })
      expect(toJoinCandidate(chained, 'dbo')).toEqual({
        type: 'join',
        value: 'Departments',
        displayText: 'Departments (via Employees)',
        detail: 'JOIN suggestion (FK chain: 2 hops)',
        source: 'foreign_key',
      })
    })

    it('qualifies a target outside the default schema', async () => {
      const result = await findJoinCandidates([table(crossSchema, 'Invoices')], createSchemaMetadataResolver(crossSchema))
      const [target] = result.byHop.get(1) ?? []
      expect(toJoinCandidate(target, 'dbo')).toMatchObject({ value: 'sales.Orders', displayText: 'Orders' })
      expect(toJoinCandidate(target, 'sales').value).toBe('Orders')
    })

    it('keys tables by lowercase schema and name', () => {
      expect(tableKey({ schema: 'Sales', name: 'Orders' })).toBe('sales.orders')
      expect(tableKey({ name: 'Orders' })).toBe('orders')
    })
  })
})
