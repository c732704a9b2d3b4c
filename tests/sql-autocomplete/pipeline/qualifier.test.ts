// tests/sql-autocomplete/pipeline/qualifier.test.ts

import { describe, it, expect } from 'vitest'
import {
  buildCursorWindow,
  extractLeftSideColumn,
  getDotQualifier,
  getTableReferenceBeforeDot,
  type CursorWindow,
} from '../../../src/lib/sql/autocomplete/qualified-names'
import { tokenize } from '../../../src/lib/sql/autocomplete/tokenizer'
import type { ColumnReference } from '../../../src/lib/sql/autocomplete/types'
import { splitCursor } from '../../test-utils'

// ============================================================================
// TEST HELPERS
// ============================================================================

// | marks cursor position in SQL
function windowAt(sqlWithCursor: string): CursorWindow {
  const { sql, line, col } = splitCursor(sqlWithCursor)
  return buildCursorWindow(tokenize(sql).tokens, line, col)
}

// ============================================================================
// TEST DATA
// ============================================================================

const dotQualifierTests: { sql: string; expected: string[] | null }[] = [
  { sql: 'SELECT e.|', expected: ['e'] },
  { sql: 'SELECT * FROM HR.dbo.|', expected: ['HR', 'dbo'] },
  { sql: 'SELECT * FROM HR..|', expected: ['HR', ''] },
  { sql: 'SELECT * FROM [Sales Data].|', expected: ['Sales Data'] },
  { sql: 'SELECT e.Fir|', expected: ['e'] },
  { sql: 'SELECT |', expected: null },
]

const leftSideTests: { sql: string; expected: ColumnReference | null }[] = [
  { sql: 'WHERE Salary = |', expected: { column: 'Salary' } },
  { sql: 'WHERE e.DepartmentID <> |', expected: { table: 'e', column: 'DepartmentID' } },
  { sql: 'WHERE dbo.Employees.ManagerID >= |', expected: { schema: 'dbo', table: 'Employees', column: 'ManagerID' } },
  { sql: 'WHERE [e].[Name] > |', expected: { table: 'e', column: 'Name' } },
  { sql: 'WHERE Salary = Bud|', expected: { column: 'Salary' } },
  { sql: 'WHERE Salary = 1 AND |', expected: null },
  { sql: 'WHERE |', expected: null },
]

// ============================================================================
// TESTS
// ============================================================================

describe('Qualified names before the cursor', () => {
  describe('buildCursorWindow', () => {
    it('splits the word being typed from the tokens before it', () => {
      const window = windowAt('SELECT * FROM Emp|')
      expect(window.partial?.text).toBe('Emp')
      expect(window.prefix).toBe('Emp')
      expect(window.before.map((t) => t.text)).toEqual(['FROM', '*', 'SELECT'])
      expect(window.indices).toEqual([2, 1, 0])
    })

    it('keeps only the typed part of a word', () => {
      const window = windowAt('SELECT Em|ployees')
      expect(window.partial?.text).toBe('Employees')
      expect(window.prefix).toBe('Em')
    })

    it('has no partial word after a space', () => {
      const window = windowAt('SELECT |')
      expect(window.partial).toBeNull()
      expect(window.prefix).toBe('')
      expect(window.before.map((t) => t.text)).toEqual(['SELECT'])
    })

    it('treats a word starting at the cursor as following it', () => {
      const window = windowAt('SELECT |Employees')
      expect(window.partial).toBeNull()
      expect(window.before.map((t) => t.text)).toEqual(['SELECT'])
    })

    it('drops comments', () => {
      const window = windowAt('SELECT /* note */ |')
      expect(window.before.map((t) => t.text)).toEqual(['SELECT'])
    })
  })

  describe('getDotQualifier', () => {
    for (const tc of dotQualifierTests) {
      it(tc.sql, () => {
        expect(getDotQualifier(windowAt(tc.sql).before)).toEqual(tc.expected)
      })
    }
  })

  describe('getTableReferenceBeforeDot', () => {
    it('alias', () => {
      expect(getTableReferenceBeforeDot(windowAt('SELECT e.|').before)).toEqual({ table: 'e' })
    })

    it('schema and table', () => {
      expect(getTableReferenceBeforeDot(windowAt('SELECT dbo.Employees.|').before)).toEqual({
        table: 'Employees',
        schema: 'dbo',
      })
    })

    it('empty last part', () => {
      expect(getTableReferenceBeforeDot(windowAt('SELECT HR..|').before)).toBeNull()
    })
  })

  describe('extractLeftSideColumn', () => {
    for (const tc of leftSideTests) {
      it(tc.sql, () => {
        expect(extractLeftSideColumn(windowAt(tc.sql).before)).toEqual(tc.expected)
      })
    }
  })
})
