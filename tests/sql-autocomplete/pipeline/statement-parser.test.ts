// tests/sql-autocomplete/pipeline/statement-parser.test.ts

import { describe, it, expect } from 'vitest'
import {
  parse,
  getChunkAtPosition,
  getSubqueryAtPosition,
  getSubqueryChain,
  getClauseAtPosition,
} from '../../../src/lib/sql/autocomplete/statement-parser'
import type { StatementChunk } from '../../../src/lib/sql/autocomplete/types'
import { splitCursor } from '../../test-utils'

// ============================================================================
// TEST HELPERS
// ============================================================================

function firstChunk(sql: string): StatementChunk {
  const { chunks } = parse(sql)
  expect(chunks.length).toBeGreaterThan(0)
  return chunks[0]
}

function clauseAt(sqlWithCursor: string) {
  const { sql, line, col } = splitCursor(sqlWithCursor)
  const chunk = getChunkAtPosition(parse(sql).chunks, line, col)
  return chunk ? getClauseAtPosition(chunk.clausePositions, line, col) : null
}

// ============================================================================
// TESTS
// ============================================================================

describe('Statement parser', () => {
  describe('SELECT', () => {
    const sql = 'SELECT e.FirstName, d.Name FROM Employees e JOIN Departments d ON e.DepartmentID = d.DepartmentID WHERE e.Salary > 10'

    it('collects tables with aliases', () => {
      const chunk = firstChunk(sql)
      expect(chunk.statementType).toBe('SELECT')
      expect(chunk.tables.map((t) => [t.name, t.alias])).toEqual([['Employees', 'e'], ['Departments', 'd']])
      expect([...chunk.aliases.keys()]).toEqual(['e', 'd'])
    })

    it('resolves select-list columns to their tables', () => {
      expect(firstChunk(sql).columns).toEqual([
        { name: 'FirstName', isStar: false, sourceTable: 'e', parentTable: 'Employees' },
        { name: 'Name', isStar: false, sourceTable: 'd', parentTable: 'Departments' },
      ])
    })

    it('records a range for every clause', () => {
      const positions = firstChunk(sql).clausePositions
      expect(Object.keys(positions).sort()).toEqual(['from', 'join_1', 'on_1', 'select', 'where'])
      expect(positions.select).toEqual({ startLine: 1, startCol: 1, endLine: 1, endCol: 27 })
    })

    it('keeps column aliases and stars', () => {
      const chunk = firstChunk('SELECT e.*, Salary AS Pay, COUNT(*) Total FROM Employees e')
      expect(chunk.columns?.map((c) => [c.name, c.isStar])).toEqual([['*', true], ['Pay', false], ['Total', false]])
    })
  })

  describe('statements and batches', () => {
    it('splits on semicolons and batch separators', () => {
      const { chunks } = parse('SELECT 1\nGO\nSELECT 2; SELECT 3')
      expect(chunks.map((c) => c.batchIndex)).toEqual([0, 1, 1])
      expect(chunks.map((c) => [c.startLine, c.startCol])).toEqual([[1, 1], [3, 1], [3, 11]])
    })

    it('keeps aliases local to their statement', () => {
      const { chunks } = parse('SELECT * FROM Employees e;\nSELECT * FROM Departments e')
      expect(chunks[0].aliases.get('e')?.name).toBe('Employees')
      expect(chunks[1].aliases.get('e')?.name).toBe('Departments')
    })

    it('parses statements without separators', () => {
      const { chunks } = parse('SELECT 1 SELECT 2')
      expect(chunks).toHaveLength(2)
    })

    it('skips statements it does not model', () => {
      const { chunks } = parse("PRINT 'x'\nSELECT 1")
      expect(chunks.map((c) => c.statementType)).toEqual(['SELECT'])
    })
  })

  describe('CTEs', () => {
    it('attaches CTEs to the statement and marks references', () => {
      const chunk = firstChunk('WITH Ranked AS (SELECT EmployeeID, Salary FROM Employees) SELECT * FROM Ranked r')
      expect(chunk.startCol).toBe(1)
      expect(chunk.ctes.map((c) => c.name)).toEqual(['Ranked'])
      expect(chunk.ctes[0].columns.map((c) => c.name)).toEqual(['EmployeeID', 'Salary'])
      expect(chunk.ctes[0].tables.map((t) => t.name)).toEqual(['Employees'])
      expect(chunk.tables[0]).toMatchObject({ name: 'Ranked', alias: 'r', isCte: true })
    })

    it('uses an explicit column list', () => {
      const chunk = firstChunk('WITH c (Id, Total) AS (SELECT EmployeeID, Salary FROM Employees) SELECT Id FROM c')
      expect(chunk.ctes[0].columns).toEqual([
        { name: 'Id', isStar: false, parentTable: 'Employees' },
        { name: 'Total', isStar: false, parentTable: 'Employees' },
      ])
    })

    it('parses several CTEs', () => {
      const chunk = firstChunk('WITH a AS (SELECT 1 x), b AS (SELECT x FROM a) SELECT * FROM b')
      expect(chunk.ctes.map((c) => c.name)).toEqual(['a', 'b'])
      expect(chunk.ctes[1].tables[0]).toMatchObject({ name: 'a', isCte: true })
    })
  })

  describe('subqueries', () => {
    it('records a derived table with its range and alias', () => {
      const chunk = firstChunk('SELECT * FROM (SELECT EmployeeID FROM Employees) AS sub WHERE sub.EmployeeID > 1')
      expect(chunk.subqueries).toHaveLength(1)
      const sub = chunk.subqueries[0]
      expect(sub.alias).toBe('sub')
      expect(sub.columns.map((c) => c.name)).toEqual(['EmployeeID'])
      expect(sub.startPos).toEqual({ line: 1, col: 15 })
      expect(sub.endPos).toEqual({ line: 1, col: 48 })
      expect(chunk.aliases.get('sub')).toMatchObject({ isSubquery: true })
    })

    it('leaves an unterminated subquery open', () => {
      const chunk = firstChunk('SELECT * FROM Employees WHERE EmployeeID IN (SELECT ')
      expect(chunk.subqueries[0].endPos).toBeNull()
    })

    it('reads a VALUES constructor as a derived table', () => {
      const chunk = firstChunk("SELECT * FROM (VALUES (1, 'a'), (2, 'b')) AS v(Num, Code)")
      const values = chunk.subqueries[0]
      expect(values.isValues).toBe(true)
      expect(values.alias).toBe('v')
      expect(values.columns.map((c) => c.name)).toEqual(['Num', 'Code'])
    })

    it('merges the tables of every UNION member', () => {
      const chunk = firstChunk('SELECT * FROM (SELECT EmployeeID FROM Employees UNION ALL SELECT ProjectID FROM Projects) u')
      const sub = chunk.subqueries[0]
      expect(sub.alias).toBe('u')
      expect(sub.tables.map((t) => t.name)).toEqual(['Employees', 'Projects'])
      expect(sub.columns.map((c) => c.name)).toEqual(['EmployeeID'])
    })

    it('reads an APPLY subquery', () => {
      const chunk = firstChunk(
        'SELECT * FROM Employees e OUTER APPLY (SELECT ProjectID FROM Projects p WHERE p.DepartmentID = e.DepartmentID) latest'
      )
      expect(chunk.subqueries[0].alias).toBe('latest')
      expect(chunk.subqueries[0].tables.map((t) => t.name)).toEqual(['Projects'])
    })

    it('reads an APPLY table-valued function', () => {
      const chunk = firstChunk('SELECT * FROM Employees e CROSS APPLY dbo.fn_Reports(e.EmployeeID) r')
      expect(chunk.tables[1]).toMatchObject({ schema: 'dbo', name: 'fn_Reports', alias: 'r', isTvf: true })
    })
  })

  describe('temp tables', () => {
    it('registers CREATE TABLE columns', () => {
      const { tempTables } = parse('CREATE TABLE #staging (Id INT, Note NVARCHAR(50))\nGO\nSELECT * FROM #staging')
      expect(tempTables.get('#staging')).toEqual({
        name: '#staging',
        columns: [
          { name: 'Id', isStar: false, dataType: 'INT' },
          { name: 'Note', isStar: false, dataType: 'NVARCHAR' },
        ],
        createdInBatch: 0,
        createdAtLine: 1,
        isGlobal: false,
      })
    })

    it('registers SELECT INTO targets', () => {
      const { chunks, tempTables } = parse('SELECT EmployeeID INTO #ids FROM Employees')
      expect(chunks[0].tempTableName).toBe('#ids')
      expect(tempTables.get('#ids')?.columns.map((c) => c.name)).toEqual(['EmployeeID'])
    })

    it('records where a temp table is dropped', () => {
      const { tempTables } = parse('CREATE TABLE #t (A INT)\nDROP TABLE #t')
      expect(tempTables.get('#t')?.droppedAtLine).toBe(2)
    })

    it('appends columns added by ALTER TABLE', () => {
      const { tempTables } = parse('CREATE TABLE #t (A INT)\nALTER TABLE #t ADD B VARCHAR(10)')
      expect(tempTables.get('#t')?.columns.map((c) => c.name)).toEqual(['A', 'B'])
    })

    it('registers table variables', () => {
      const { tempTables } = parse('DECLARE @list TABLE (Id INT)')
      expect(tempTables.get('@list')).toMatchObject({ isTableVariable: true, isGlobal: false })
    })

    it('registers every variable of one DECLARE', () => {
      const { tempTables } = parse(
        'DECLARE @total INT = (SELECT 1), @list TABLE (Id INT, Note NVARCHAR(20)), @codes TABLE (Code INT)'
      )
      expect([...tempTables.keys()]).toEqual(['@list', '@codes'])
      expect(tempTables.get('@list')?.columns.map((c) => c.name)).toEqual(['Id', 'Note'])
      expect(tempTables.get('@codes')?.columns.map((c) => c.name)).toEqual(['Code'])
    })

    it('registers a temp table while its columns are still being typed', () => {
      const { tempTables } = parse('CREATE TABLE #draft (')
      expect(tempTables.get('#draft')).toEqual({
        name: '#draft',
        columns: [],
        createdInBatch: 0,
        createdAtLine: 1,
        isGlobal: false,
      })
    })
  })

  describe('DML', () => {
    it('INSERT records the target and column list', () => {
      const chunk = firstChunk('INSERT INTO dbo.Employees (FirstName, LastName) VALUES (1, 2)')
      expect(chunk.insertColumns).toEqual(['FirstName', 'LastName'])
      expect(chunk.tables[0]).toMatchObject({ schema: 'dbo', name: 'Employees' })
      expect(Object.keys(chunk.clausePositions).sort()).toEqual(['insert_columns', 'into', 'values'])
    })

    it('INSERT column list being typed stays open', () => {
      const chunk = firstChunk('INSERT INTO Employees (FirstName, ')
      expect(chunk.clausePositions.insert_columns?.openEnded).toBe(true)
    })

    it('UPDATE with FROM uses the FROM tables', () => {
      const chunk = firstChunk('UPDATE e SET Salary = 1 FROM Employees e WHERE e.EmployeeID = 1')
      expect(chunk.updateTarget?.name).toBe('e')
      expect(chunk.hasFromClause).toBe(true)
      expect(chunk.tables.map((t) => [t.name, t.alias])).toEqual([['Employees', 'e']])
    })

    it('UPDATE without FROM uses the target', () => {
      const chunk = firstChunk('UPDATE Employees SET Salary = 1')
      expect(chunk.tables.map((t) => t.name)).toEqual(['Employees'])
      expect(chunk.clausePositions.set).toBeDefined()
    })

    it('DELETE records the target', () => {
      const chunk = firstChunk('DELETE FROM Employees WHERE EmployeeID = 1')
      expect(chunk.deleteTarget?.name).toBe('Employees')
      expect(chunk.tables.map((t) => t.name)).toEqual(['Employees'])
    })

    it('MERGE records target and source', () => {
      const chunk = firstChunk(
        'MERGE INTO Employees AS t USING Departments AS s ON t.DepartmentID = s.DepartmentID WHEN MATCHED THEN DELETE;'
      )
      expect(chunk.tables.map((t) => [t.name, t.alias])).toEqual([['Employees', 't'], ['Departments', 's']])
      expect(chunk.clausePositions.merge).toBeDefined()
      expect(chunk.clausePositions.using).toBeDefined()
    })

    it('EXEC records the procedure', () => {
      const chunk = firstChunk('EXEC @ret = dbo.usp_GetEmployee 5')
      expect(chunk.execProcedure).toEqual({ schema: 'dbo', name: 'usp_GetEmployee' })
    })

    it('collects parameters', () => {
      const chunk = firstChunk('SELECT * FROM Employees WHERE EmployeeID = @id')
      expect(chunk.parameters.map((p) => p.fullName)).toEqual(['@id'])
    })
  })

  describe('getChunkAtPosition', () => {
    it('picks the chunk starting latest on a shared line', () => {
      const { chunks } = parse('SELECT 1; SELECT 2')
      expect(getChunkAtPosition(chunks, 1, 12)).toBe(chunks[1])
    })

    it('continues a chunk a few lines after its end', () => {
      const { chunks } = parse('SELECT * FROM Employees\n\n')
      expect(getChunkAtPosition(chunks, 3, 1)).toBe(chunks[0])
    })

    it('does not continue a chunk far away', () => {
      const { chunks } = parse('SELECT * FROM Employees')
      expect(getChunkAtPosition(chunks, 8, 1)).toBeNull()
    })

    it('returns null with no chunks', () => {
      expect(getChunkAtPosition([], 1, 1)).toBeNull()
    })
  })

  describe('getClauseAtPosition', () => {
    it('select list', () => {
      expect(clauseAt('SELECT | FROM Employees')).toBe('select')
    })

    it('FROM clause', () => {
      expect(clauseAt('SELECT * FROM | WHERE EmployeeID = 1')).toBe('from')
    })

    it('JOIN', () => {
      expect(clauseAt('SELECT * FROM Employees e JOIN |')).toBe('join')
    })

    it('ON', () => {
      expect(clauseAt('SELECT * FROM Employees e JOIN Departments d ON |')).toBe('on')
    })

    it('WHERE', () => {
      expect(clauseAt('SELECT * FROM Employees WHERE |')).toBe('where')
    })

    it('nothing starts before the cursor', () => {
      expect(getClauseAtPosition({}, 1, 1)).toBeNull()
    })
  })

  describe('subquery lookups', () => {
    const nested = 'SELECT * FROM Employees e WHERE EXISTS (SELECT 1 FROM Departments d WHERE d.DepartmentID IN (SELECT | FROM Projects))'

    it('lists enclosing subqueries outermost first', () => {
      const { sql, line, col } = splitCursor(nested)
      const chunk = firstChunk(sql)
      const chain = getSubqueryChain(chunk, line, col)
      expect(chain.map((s) => s.tables.map((t) => t.name))).toEqual([['Departments'], ['Projects']])
    })

    it('finds the innermost subquery', () => {
      const { sql, line, col } = splitCursor(nested)
      const sub = getSubqueryAtPosition(firstChunk(sql), line, col)
      expect(sub?.tables.map((t) => t.name)).toEqual(['Projects'])
    })

    it('treats a CTE body as a subquery', () => {
      const { sql, line, col } = splitCursor('WITH c AS (SELECT | FROM Employees) SELECT * FROM c')
      const sub = getSubqueryAtPosition(firstChunk(sql), line, col)
      expect(sub?.alias).toBe('c')
    })

    it('is null outside every subquery', () => {
      const { sql, line, col } = splitCursor('SELECT | FROM (SELECT 1 x) s')
      expect(getSubqueryAtPosition(firstChunk(sql), line, col)).toBeNull()
    })
  })
})
