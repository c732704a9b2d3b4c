/**
 * Candidate Generator Module
 *
 * Generates autocomplete candidates based on the classified context and the
 * scope at the cursor. Each completion mode draws from a different source.
 */

import type {
  Candidate,
  CandidateSource,
  CandidateType,
  CompletionContext,
  CompletionMode,
  SchemaInfo,
  ScopeInfo,
  StatementChunk,
  TableMode,
  TableReference,
} from './types'
import { getColumnsForTable } from './scope-analyzer'
import { getKeywordsByCategory, STATEMENT_KEYWORDS } from './keywords'
import { isGlobalTempTableName, isTableVariableName, isTempTableName } from './names'

const TABLE_MODES: ReadonlySet<string> = new Set<TableMode>([
  'from', 'join', 'update', 'delete', 'truncate', 'alter', 'insert', 'merge', 'merge_using', 'into',
])

/** Table modes where a CTE may be named */
const CTE_TABLE_MODES = new Set<TableMode>(['from', 'join', 'update', 'delete', 'insert', 'merge', 'merge_using'])

/** Table modes that accept views */
const VIEW_TABLE_MODES = new Set<TableMode>(['from', 'join', 'update', 'delete', 'insert', 'merge', 'merge_using', 'into'])

/** Column modes that also offer built-in functions */
const EXPRESSION_MODES = new Set<CompletionMode>(['select', 'where', 'on', 'having', 'set_value', 'case_expression'])

function isTableMode(value: string): value is TableMode {
  return TABLE_MODES.has(value)
}

/** `from_qualified` and `from_cross_db_qualified` both map to `from` */
export function tableModeOf(mode: CompletionMode): TableMode | null {
  const base = mode.replace(/_cross_db_qualified$|_qualified$/, '')
  return isTableMode(base) ? base : null
}

/**
 * Create a candidate.
 */
function createCandidate(type: CandidateType, value: string, source: CandidateSource, detail?: string): Candidate {
  const candidate: Candidate = { type, value, displayText: value, source }
  if (detail) candidate.detail = detail
  return candidate
}

/**
 * Generate autocomplete candidates based on context and scope.
 */
export function generateCandidates(context: CompletionContext, scope: ScopeInfo, schema: SchemaInfo): Candidate[] {
  const tableMode = tableModeOf(context.mode)
  if (tableMode) return generateTableCandidates(tableMode, context, scope, schema)

  switch (context.mode) {
    case 'string':
    case 'comment':
      return []

    case 'qualified':
      return generateQualifiedColumnCandidates(context, scope, schema)

    case 'insert_columns':
    case 'merge_insert_columns':
      return generateInsertColumnCandidates(context, scope, schema)

    case 'values':
      return generateValueCandidates(context, scope, schema)

    case 'output':
      return generateOutputCandidates(context, scope, schema)

    case 'set':
      return generateSetTargetCandidates(context, scope, schema)

    case 'select':
    case 'where':
    case 'on':
    case 'having':
    case 'group_by':
    case 'order_by':
    case 'set_value':
    case 'case_expression':
      return generateExpressionCandidates(context, scope, schema)

    case 'procedure':
      return generateProcedureCandidates(context, schema)

    case 'database':
      return generateDatabaseCandidates(schema)

    case 'schema':
      return generateSchemaCandidates(schema)

    case 'start':
      return generateStatementStartCandidates()

    default:
      return generateDefaultCandidates()
  }
}

// ============================================================================
// Tables
// ============================================================================

function schemaKey(schemaName: string, name: string): string {
  return `${schemaName.toLowerCase()}.${name.toLowerCase()}`
}

/** Schema tables already referenced by the statement */
function tablesInStatement(chunk: StatementChunk | null, schema: SchemaInfo): Set<string> {
  const keys = new Set<string>()
  if (!chunk) return keys
  for (const ref of chunk.tables) {
    if (ref.isSubquery || ref.isCte || ref.isTemp || ref.isTableVariable) continue
    keys.add(schemaKey(ref.schema ?? schema.defaultSchema, ref.name))
  }
  return keys
}

function isCurrentDatabase(name: string, schema: SchemaInfo): boolean {
  return schema.database !== undefined && schema.database.toLowerCase() === name.toLowerCase()
}

function generateTableCandidates(mode: TableMode, context: CompletionContext, scope: ScopeInfo, schema: SchemaInfo): Candidate[] {
  const { filters } = context
  const candidates: Candidate[] = []
  const qualified = filters.schema !== undefined || filters.database !== undefined

  if (!qualified) {
    if (CTE_TABLE_MODES.has(mode)) {
      for (const cte of scope.ctes) candidates.push(createCandidate('cte', cte.name, 'context', 'CTE'))
    }
    for (const temp of scope.tempTables) {
      candidates.push(createCandidate('temp_table', temp.name, 'context', temp.isTableVariable ? 'table variable' : 'temp table'))
    }
  }

  // Only the connected database's objects are known
  if (filters.database && !isCurrentDatabase(filters.database, schema)) return candidates

  if (filters.potentialDatabase && isCurrentDatabase(filters.potentialDatabase, schema)) {
    candidates.push(...generateSchemaCandidates(schema))
  }

  const schemaFilter = (filters.schema ?? (filters.database ? schema.defaultSchema : undefined))?.toLowerCase()
  const excluded = mode === 'join' ? tablesInStatement(context.chunk, schema) : new Set<string>()
  const defaultSchema = schema.defaultSchema.toLowerCase()

  for (const table of schema.tables) {
    if (schemaFilter && table.schema.toLowerCase() !== schemaFilter) continue
    if (table.type === 'view' && !VIEW_TABLE_MODES.has(mode)) continue
    if (excluded.has(schemaKey(table.schema, table.name))) continue

    const value = filters.omitSchema || table.schema.toLowerCase() === defaultSchema
      ? table.name
      : `${table.schema}.${table.name}`
    candidates.push(createCandidate(table.type, value, 'schema', `${table.type} ${table.schema}`))
  }
  return candidates
}

// ============================================================================
// Columns
// ============================================================================

/** A reference built from a bare name, classified the way the parser would */
function namedReference(name: string, schemaName: string | undefined, scope: ScopeInfo): TableReference {
  const ref: TableReference = {
    name,
    isTemp: isTempTableName(name),
    isGlobalTemp: isGlobalTempTableName(name),
    isTableVariable: isTableVariableName(name),
    isCte: !schemaName && scope.ctes.some((c) => c.name.toLowerCase() === name.toLowerCase()),
  }
  if (schemaName) ref.schema = schemaName
  return ref
}

function columnSource(ref: TableReference): CandidateSource {
  return ref.isCte || ref.isSubquery || ref.isTemp || ref.isTableVariable ? 'context' : 'schema'
}

function generateColumnCandidatesForTable(ref: TableReference, label: string, scope: ScopeInfo, schema: SchemaInfo): Candidate[] {
  const source = columnSource(ref)
  return getColumnsForTable(ref, scope, schema).map((column) =>
    createCandidate('column', column.name, source, column.dataType ? `${label}: ${column.dataType}` : label)
  )
}

function generateQualifiedColumnCandidates(context: CompletionContext, scope: ScopeInfo, schema: SchemaInfo): Candidate[] {
  const { tableRef, tableRefSchema } = context.filters
  if (!tableRef) return []
  const ref = (tableRefSchema ? null : scope.resolveAlias(tableRef)) ?? namedReference(tableRef, tableRefSchema, scope)
  return generateColumnCandidatesForTable(ref, tableRef, scope, schema)
}

/** INSERT / MERGE target: the classifier's table, else the statement's first table */
function insertTarget(context: CompletionContext, scope: ScopeInfo): TableReference | null {
  const { insertTable, insertSchema } = context.filters
  if (insertTable) return namedReference(insertTable, insertSchema, scope)
  return context.chunk?.tables[0] ?? null
}

function generateInsertColumnCandidates(context: CompletionContext, scope: ScopeInfo, schema: SchemaInfo): Candidate[] {
  const target = insertTarget(context, scope)
  if (!target) return []
  return generateColumnCandidatesForTable(target, target.name, scope, schema)
}

function generateValueCandidates(context: CompletionContext, scope: ScopeInfo, schema: SchemaInfo): Candidate[] {
  const target = insertTarget(context, scope)
  const position = context.filters.valuePosition
  let detail: string | undefined
  if (target && position !== undefined) {
    const column = getColumnsForTable(target, scope, schema)[position]
    if (column) detail = column.dataType ? `${column.name}: ${column.dataType}` : column.name
  }
  return ['NULL', 'DEFAULT'].map((keyword) => createCandidate('keyword', keyword, 'keyword', detail))
}

/** Table a DML statement writes to, resolving `UPDATE alias ... FROM table alias` */
function dmlTarget(chunk: StatementChunk | null, scope: ScopeInfo): TableReference | null {
  if (!chunk) return null
  const target = chunk.updateTarget ?? chunk.deleteTarget ?? chunk.tables[0]
  if (!target) return null
  return scope.resolveAlias(target.alias ?? target.name) ?? target
}

function generateOutputCandidates(context: CompletionContext, scope: ScopeInfo, schema: SchemaInfo): Candidate[] {
  const { pseudoTable } = context.filters
  if (pseudoTable) {
    const target = dmlTarget(context.chunk, scope)
    return target ? generateColumnCandidatesForTable(target, pseudoTable, scope, schema) : []
  }
  return [
    ...generateVisibleColumnCandidates(context, scope, schema),
    createCandidate('keyword', 'INSERTED', 'keyword'),
    createCandidate('keyword', 'DELETED', 'keyword'),
  ]
}

function generateSetTargetCandidates(context: CompletionContext, scope: ScopeInfo, schema: SchemaInfo): Candidate[] {
  const target = dmlTarget(context.chunk, scope)
  if (!target) return generateVisibleColumnCandidates(context, scope, schema)
  return generateColumnCandidatesForTable(target, target.alias ?? target.name, scope, schema)
}

/**
 * Columns of every table visible at the cursor, innermost scope first.
 * The column on the left of a comparison is left out of its own right side.
 */
function generateVisibleColumnCandidates(context: CompletionContext, scope: ScopeInfo, schema: SchemaInfo): Candidate[] {
  const { leftSide } = context.filters
  const leftTable = leftSide?.table ? scope.resolveAlias(leftSide.table) : null
  const candidates: Candidate[] = []

  for (const { ref } of scope.tables) {
    const label = ref.alias ?? ref.name
    for (const candidate of generateColumnCandidatesForTable(ref, label, scope, schema)) {
      const isLeftSide = leftSide !== undefined
        && candidate.value.toLowerCase() === leftSide.column.toLowerCase()
        && (leftTable === ref || (!leftSide.table && scope.tables.length === 1))
      if (!isLeftSide) candidates.push(candidate)
    }
  }
  return candidates
}

function generateExpressionCandidates(context: CompletionContext, scope: ScopeInfo, schema: SchemaInfo): Candidate[] {
  const candidates = generateVisibleColumnCandidates(context, scope, schema)
  if (EXPRESSION_MODES.has(context.mode)) {
    for (const fn of getKeywordsByCategory('function')) candidates.push(createCandidate('keyword', fn, 'keyword', 'function'))
  }
  return candidates
}

// ============================================================================
// Procedures, databases, schemas, keywords
// ============================================================================

function generateProcedureCandidates(context: CompletionContext, schema: SchemaInfo): Candidate[] {
  const { filters } = context
  if (filters.database && !isCurrentDatabase(filters.database, schema)) return []

  const schemaFilter = filters.schema?.toLowerCase()
  const defaultSchema = schema.defaultSchema.toLowerCase()
  const candidates: Candidate[] = []
  for (const procedure of schema.procedures) {
    if (schemaFilter && procedure.schema.toLowerCase() !== schemaFilter) continue
    const value = filters.omitSchema || procedure.schema.toLowerCase() === defaultSchema
      ? procedure.name
      : `${procedure.schema}.${procedure.name}`
    candidates.push(createCandidate('procedure', value, 'schema', procedure.signature))
  }
  return candidates
}

function generateDatabaseCandidates(schema: SchemaInfo): Candidate[] {
  const names = schema.databases ?? (schema.database ? [schema.database] : [])
  return names.map((name) => createCandidate('database', name, 'schema'))
}

function generateSchemaCandidates(schema: SchemaInfo): Candidate[] {
  const names = new Map<string, string>()
  for (const table of schema.tables) names.set(table.schema.toLowerCase(), table.schema)
  for (const procedure of schema.procedures) names.set(procedure.schema.toLowerCase(), procedure.schema)
  return [...names.values()].map((name) => createCandidate('schema', name, 'schema'))
}

/**
 * Generate candidates for statement start (SELECT, INSERT, etc.).
 */
function generateStatementStartCandidates(): Candidate[] {
  return STATEMENT_KEYWORDS.map((kw) => createCandidate('keyword', kw, 'keyword'))
}

function generateDefaultCandidates(): Candidate[] {
  return [
    ...generateStatementStartCandidates(),
    ...getKeywordsByCategory('clause').map((kw) => createCandidate('keyword', kw, 'keyword')),
  ]
}

