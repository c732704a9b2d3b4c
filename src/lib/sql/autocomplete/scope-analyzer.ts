/**
 * Scope Analyzer Module
 *
 * Rebuilds the scope chain at the cursor from the parsed statement and
 * resolves the columns of anything that can appear in FROM: schema tables,
 * CTEs, temp tables, table variables and aliased subqueries.
 */

import type {
  ColumnInfo,
  CompletionContext,
  CTEInfo,
  ParsedDocument,
  ResolvedColumn,
  SchemaInfo,
  SchemaTable,
  ScopeInfo,
  ScopedTable,
  SourcePosition,
  SubqueryInfo,
  TableReference,
  TempTableInfo,
} from './types'
import { ScopeContext } from './scope'
import { comparePositions } from './tokenizer'
import { buildAliasMap } from './names'
import { getSubqueryChain } from './statement-parser'

/**
 * Analyze scope at the cursor: the statement's tables at the root, then one
 * child scope per enclosing subquery, outermost first.
 */
export function analyzeScope(context: CompletionContext, parsed: ParsedDocument, cursor: SourcePosition): ScopeInfo {
  const { chunk } = context
  let scope = new ScopeContext()
  const subqueries: SubqueryInfo[] = []

  if (chunk) {
    for (const cte of chunk.ctes) scope.addCte(cte)
    for (const table of chunk.tables) scope.addTable(table)
    collectSubqueries(chunk.subqueries, subqueries)
    for (const cte of chunk.ctes) collectSubqueries(cte.subqueries, subqueries)

    for (const subquery of getSubqueryChain(chunk, cursor.line, cursor.col)) {
      scope = scope.createChild()
      for (const table of subquery.tables) scope.addTable(table)
    }
  }

  const innermost = scope
  return {
    tables: collectScopedTables(innermost),
    ctes: [...innermost.ctes.values()],
    tempTables: getVisibleTempTables(parsed, cursor),
    subqueries,
    resolveAlias: (name) => innermost.resolveAlias(name),
  }
}

function collectSubqueries(source: SubqueryInfo[], target: SubqueryInfo[]): void {
  for (const subquery of source) {
    target.push(subquery)
    collectSubqueries(subquery.subqueries, target)
  }
}

function collectScopedTables(scope: ScopeContext): ScopedTable[] {
  const tables: ScopedTable[] = []
  for (let level: ScopeContext | null = scope; level; level = level.parent) {
    for (const ref of level.tables) tables.push({ ref, depth: level.depth })
  }
  return tables
}

/** Batch index at the cursor: the number of batch separators before it */
function batchAtPosition(parsed: ParsedDocument, cursor: SourcePosition): number {
  let batch = 0
  for (const token of parsed.tokens) {
    if (comparePositions({ line: token.line, col: token.col }, cursor) >= 0) break
    if (token.type === 'go') batch++
  }
  return batch
}

/**
 * Temp tables and table variables alive at the cursor: created at or before
 * the cursor line in the same batch (any batch for `##` tables) and not
 * dropped on an earlier line.
 */
export function getVisibleTempTables(parsed: ParsedDocument, cursor: SourcePosition): TempTableInfo[] {
  const batch = batchAtPosition(parsed, cursor)
  const visible: TempTableInfo[] = []
  for (const table of parsed.tempTables.values()) {
    if (!table.isGlobal && table.createdInBatch !== batch) continue
    if (table.createdAtLine > cursor.line) continue
    if (table.droppedAtLine !== undefined && table.droppedAtLine < cursor.line) continue
    visible.push(table)
  }
  return visible
}

// ============================================================================
// Column resolution
// ============================================================================

/**
 * Find a table in the schema by name, case-insensitively. Without an explicit
 * schema the default schema wins, then any schema.
 */
export function findTableInSchema(name: string, schemaName: string | undefined, schema: SchemaInfo): SchemaTable | undefined {
  const nameLower = name.toLowerCase()
  if (schemaName) {
    const schemaLower = schemaName.toLowerCase()
    return schema.tables.find((t) => t.schema.toLowerCase() === schemaLower && t.name.toLowerCase() === nameLower)
  }

  const defaultSchema = schema.defaultSchema.toLowerCase()
  const defaultMatch = schema.tables.find(
    (t) => t.schema.toLowerCase() === defaultSchema && t.name.toLowerCase() === nameLower
  )
  if (defaultMatch) return defaultMatch
  return schema.tables.find((t) => t.name.toLowerCase() === nameLower)
}

function findSubqueryByAlias(scope: ScopeInfo, alias: string): SubqueryInfo | undefined {
  const aliasLower = alias.toLowerCase()
  return scope.subqueries.find((s) => s.alias?.toLowerCase() === aliasLower)
}

function findCte(scope: ScopeInfo, name: string): CTEInfo | undefined {
  const nameLower = name.toLowerCase()
  return scope.ctes.find((c) => c.name.toLowerCase() === nameLower)
}

function findTempTable(scope: ScopeInfo, name: string): TempTableInfo | undefined {
  const nameLower = name.toLowerCase()
  return scope.tempTables.find((t) => t.name.toLowerCase() === nameLower)
}

/**
 * Columns of a table reference. CTE and subquery `*` columns expand against
 * their own FROM tables; a CTE already being expanded resolves to nothing,
 * which stops recursive CTEs from expanding themselves.
 */
export function getColumnsForTable(
  ref: TableReference,
  scope: ScopeInfo,
  schema: SchemaInfo,
  expanding: ReadonlySet<string> = new Set()
): ResolvedColumn[] {
  if (ref.isSubquery) {
    const alias = ref.alias ?? ref.name
    // Derived tables are keyed with their parentheses so they never collide with a CTE name
    const key = `(${alias.toLowerCase()})`
    const subquery = expanding.has(key) ? undefined : findSubqueryByAlias(scope, alias)
    if (!subquery) return expandColumns(ref.columns ?? [], [], scope, schema, expanding)
    const next = new Set(expanding)
    next.add(key)
    return expandColumns(subquery.columns, subquery.tables, scope, schema, next)
  }

  if (ref.isTemp || ref.isTableVariable) {
    const temp = findTempTable(scope, ref.name)
    if (temp) return temp.columns.map(toResolvedColumn)
    return (ref.columns ?? []).map(toResolvedColumn)
  }

  if (!ref.schema && !ref.database) {
    const cte = findCte(scope, ref.name)
    if (cte) {
      const key = cte.name.toLowerCase()
      if (expanding.has(key)) return []
      const next = new Set(expanding)
      next.add(key)
      return expandColumns(cte.columns, cte.tables, scope, schema, next)
    }
  }

  const table = findTableInSchema(ref.name, ref.schema, schema)
  if (!table) return []
  return table.columns.map((c) => ({ name: c.name, dataType: c.type, nullable: c.nullable }))
}

function toResolvedColumn(column: ColumnInfo): ResolvedColumn {
  return column.dataType ? { name: column.name, dataType: column.dataType } : { name: column.name }
}

function expandColumns(
  columns: ColumnInfo[],
  tables: TableReference[],
  scope: ScopeInfo,
  schema: SchemaInfo,
  expanding: ReadonlySet<string>
): ResolvedColumn[] {
  const result: ResolvedColumn[] = []
  const seen = new Set<string>()
  const push = (column: ResolvedColumn) => {
    const key = column.name.toLowerCase()
    if (seen.has(key)) return
    seen.add(key)
    result.push(column)
  }

  const aliases = buildAliasMap(tables)
  for (const column of columns) {
    if (!column.isStar) {
      push(toResolvedColumn(column))
      continue
    }
    const sources = column.sourceTable ? [aliases.get(column.sourceTable.toLowerCase())] : tables
    for (const source of sources) {
      if (!source) continue
      for (const expanded of getColumnsForTable(source, scope, schema, expanding)) push(expanded)
    }
  }
  return result
}
