// tests/sql-autocomplete/pipeline/scope.test.ts

import { describe, it, expect } from 'vitest'
import { ScopeContext } from '../../../src/lib/sql/autocomplete/scope'
import type { CTEInfo, TableReference } from '../../../src/lib/sql/autocomplete/types'

// ============================================================================
// TEST HELPERS
// ============================================================================

function table(name: string, alias?: string): TableReference {
  const ref: TableReference = { name, isTemp: false, isGlobalTemp: false, isTableVariable: false, isCte: false }
  if (alias) ref.alias = alias
  return ref
}

function cte(name: string): CTEInfo {
  return { name, columns: [], tables: [], subqueries: [], parameters: [] }
}

// ============================================================================
// TESTS
// ============================================================================

describe('ScopeContext', () => {
  it('tracks depth through children', () => {
    const root = new ScopeContext()
    const child = root.createChild()
    expect(root.depth).toBe(0)
    expect(child.depth).toBe(1)
    expect(child.createChild().depth).toBe(2)
  })

  it('resolves aliases through the parent chain', () => {
    const root = new ScopeContext()
    root.addTable(table('Employees', 'e'))
    const child = root.createChild()
    child.addTable(table('Departments', 'd'))

    expect(child.resolveAlias('E')?.name).toBe('Employees')
    expect(child.resolveAlias('d')?.name).toBe('Departments')
    expect(root.resolveAlias('d')).toBeNull()
  })

  it('inner aliases shadow outer ones', () => {
    const root = new ScopeContext()
    root.addTable(table('Employees', 'x'))
    const child = root.createChild()
    child.addTable(table('Departments', 'x'))

    expect(child.resolveAlias('x')?.name).toBe('Departments')
    expect(child.getVisibleAliases().get('x')?.name).toBe('Departments')
  })

  it('lists local tables before outer ones', () => {
    const root = new ScopeContext()
    root.addTable(table('Employees'))
    const child = root.createChild()
    child.addTable(table('Projects'))
    expect(child.getVisibleTables().map((t) => t.name)).toEqual(['Projects', 'Employees'])
  })

  it('keys unaliased tables by name', () => {
    const scope = new ScopeContext()
    scope.addTable(table('Employees'))
    expect(scope.resolveAlias('employees')?.name).toBe('Employees')
  })

  it('copies CTEs into children without leaking back', () => {
    const root = new ScopeContext()
    root.addCte(cte('Ranked'))
    const child = root.createChild()
    child.addCte(cte('Inner'))

    expect(child.isCte('ranked')).toBe(true)
    expect(child.getCte('INNER')?.name).toBe('Inner')
    expect(root.isCte('inner')).toBe(false)
    expect([...child.knownCteNames()]).toEqual(['ranked', 'inner'])
  })
})
