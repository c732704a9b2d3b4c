/**
 * Section Detector Module
 *
 * Token-window detectors for the completion context. Each looks backwards
 * from the cursor over a bounded number of tokens and either recognises its
 * pattern or returns null so the classifier can try the next one.
 */

import type { CompletionMode, ContextFilters, ContextType, TableMode, Token } from './types'
import { comparePositions } from './tokenizer'
import { JOIN_MODIFIERS } from './keywords'
import { stripBrackets } from './names'
import {
  extractLeftSideColumn,
  getDotQualifier,
  getTableReferenceBeforeDot,
  type CursorWindow,
} from './qualified-names'

export interface DetectedContext {
  type: ContextType
  mode: CompletionMode
  filters: ContextFilters
}

const DML_KEYWORDS = new Set(['INSERT', 'UPDATE', 'DELETE', 'MERGE', 'SELECT'])

/** Keyword categories that never govern a column context */
const TRANSPARENT_CATEGORIES = new Set(['function', 'datatype', 'operator', 'modifier'])
const GOVERNING_OPERATORS = new Set(['AND', 'OR', 'BETWEEN'])

export function keywordOf(token: Token | undefined): string | null {
  return token?.type === 'keyword' ? token.text.toUpperCase() : null
}

export function isStatementBoundary(token: Token | undefined): boolean {
  return token?.type === 'semicolon' || token?.type === 'go'
}

function isNameToken(token: Token): boolean {
  return token.type === 'identifier' || token.type === 'bracket_id' || token.type === 'dot'
    || token.type === 'temp_table' || token.type === 'variable'
}

function qualified(mode: TableMode): `${TableMode}_qualified` {
  return `${mode}_qualified`
}

function crossDatabase(mode: TableMode): `${TableMode}_cross_db_qualified` {
  return `${mode}_cross_db_qualified`
}

/**
 * A table context for `mode`, switched to its qualified variant when the
 * cursor follows `schema.` or `database.schema.`.
 */
export function tableContext(mode: TableMode, window: CursorWindow): DetectedContext {
  const parts = getDotQualifier(window.before)
  if (!parts) return { type: 'table', mode, filters: {} }

  if (parts.length === 1) {
    return {
      type: 'table',
      mode: qualified(mode),
      filters: { schema: parts[0], potentialDatabase: parts[0], omitSchema: true },
    }
  }
  const database = parts[parts.length - 2]
  const schema = parts[parts.length - 1]
  const filters: ContextFilters = { omitSchema: true }
  if (database) filters.database = database
  if (schema) filters.schema = schema
  return { type: 'table', mode: crossDatabase(mode), filters }
}

/** `alias.` column completion, when the cursor follows a dot */
export function qualifiedColumnContext(window: CursorWindow): DetectedContext | null {
  const ref = getTableReferenceBeforeDot(window.before)
  if (!ref) return null
  const filters: ContextFilters = { tableRef: ref.table }
  if (ref.schema) filters.tableRefSchema = ref.schema
  return { type: 'column', mode: 'qualified', filters }
}

/** Column context with the left side of a comparison, if one is being completed */
export function comparisonContext(mode: CompletionMode, window: CursorWindow): DetectedContext {
  const filters: ContextFilters = {}
  const leftSide = extractLeftSideColumn(window.before)
  if (leftSide) filters.leftSide = leftSide
  return { type: 'column', mode, filters }
}

// ============================================================================
// Special contexts
// ============================================================================

/** `OUTPUT inserted.|` / `OUTPUT deleted.|` */
export function detectOutputPseudoTable(window: CursorWindow): DetectedContext | null {
  const { before } = window
  if (before[0]?.type !== 'dot') return null
  const name = before[1]?.text.toLowerCase()
  if (name !== 'inserted' && name !== 'deleted') return null

  for (let i = 2; i < Math.min(15, before.length); i++) {
    const keyword = keywordOf(before[i])
    if (keyword === 'OUTPUT') {
      return { type: 'column', mode: 'output', filters: { pseudoTable: name, tableRef: name } }
    }
    if (keyword && DML_KEYWORDS.has(keyword)) return null
  }
  return null
}

/** `OUTPUT ... INTO |` targets a table */
export function detectOutputInto(window: CursorWindow): DetectedContext | null {
  const { before } = window
  let intoAt = -1
  for (let i = 0; i < before.length; i++) {
    if (keywordOf(before[i]) === 'INTO') {
      intoAt = i
      break
    }
    if (!isNameToken(before[i])) return null
  }
  if (intoAt === -1) return null

  for (let i = intoAt + 1; i < Math.min(intoAt + 30, before.length); i++) {
    const keyword = keywordOf(before[i])
    if (keyword === 'OUTPUT') return tableContext('into', window)
    if (keyword && DML_KEYWORDS.has(keyword)) return null
  }
  return null
}

/** `EXEC |`, `EXECUTE dbo.|`, `EXEC @ret = |` */
export function detectProcedure(window: CursorWindow): DetectedContext | null {
  const { before } = window
  for (let i = 0; i < Math.min(6, before.length); i++) {
    const token = before[i]
    const keyword = keywordOf(token)
    if (keyword === 'EXEC' || keyword === 'EXECUTE') {
      const parts = getDotQualifier(before)
      const filters: ContextFilters = {}
      if (parts) {
        const schema = parts[parts.length - 1]
        const database = parts[parts.length - 2]
        if (schema) filters.schema = schema
        if (database) filters.database = database
        filters.omitSchema = true
      }
      return { type: 'procedure', mode: 'procedure', filters }
    }
    const isReturnAssignment = token.type === 'operator' && token.text === '=' && before[i + 1]?.type === 'variable'
    if (!isNameToken(token) && !isReturnAssignment) return null
  }
  return null
}

/**
 * Target of `INSERT [INTO] name (` as table and schema, reading forward from
 * the token after INTO (or INSERT). Returns the index of the `(` as well.
 */
function readTargetBeforeParen(tokens: Token[], from: number): { table: string; schema?: string; openIndex: number } | null {
  const parts: string[] = []
  let i = from
  while (i < tokens.length) {
    const token = tokens[i]
    if (token.type === 'comment' || token.type === 'line_comment' || token.type === 'dot') {
      i++
      continue
    }
    if (token.type === 'identifier' || token.type === 'bracket_id' || token.type === 'temp_table' || token.type === 'variable') {
      parts.push(stripBrackets(token.text))
      i++
      continue
    }
    break
  }
  if (tokens[i]?.type !== 'paren_open') return null
  const table = parts[parts.length - 1]
  if (!table) return null
  const schema = parts[parts.length - 2]
  return schema ? { table, schema, openIndex: i } : { table, openIndex: i }
}

/** Index of the `)` matching the `(` at `openIndex`, or -1 */
function findClosingParen(tokens: Token[], openIndex: number): number {
  let depth = 0
  for (let i = openIndex; i < tokens.length; i++) {
    const type = tokens[i].type
    if (type === 'go') return -1
    if (type === 'paren_open') depth++
    else if (type === 'paren_close') {
      depth--
      if (depth === 0) return i
    }
  }
  return -1
}

function cursorInsideParens(window: CursorWindow, openIndex: number): boolean {
  const { tokens, cursor } = window
  const open = tokens[openIndex]
  if (comparePositions(cursor, { line: open.line, col: open.col }) <= 0) return false
  const closeIndex = findClosingParen(tokens, openIndex)
  if (closeIndex === -1) return true
  const close = tokens[closeIndex]
  return comparePositions(cursor, { line: close.line, col: close.col }) <= 0
}

/** `INSERT INTO table (a, |` */
export function detectInsertColumns(window: CursorWindow): DetectedContext | null {
  const { before, indices, tokens } = window
  for (let i = 0; i < before.length; i++) {
    const keyword = keywordOf(before[i])
    if (!keyword) continue
    if (keyword === 'SELECT' || keyword === 'UPDATE' || keyword === 'DELETE' || keyword === 'MERGE') return null
    if (keyword !== 'INTO' && keyword !== 'INSERT') continue

    if (keyword === 'INTO' && keywordOf(before[i + 1]) !== 'INSERT') return null
    const target = readTargetBeforeParen(tokens, indices[i] + 1)
    if (!target || !cursorInsideParens(window, target.openIndex)) return null

    const filters: ContextFilters = { insertTable: target.table }
    if (target.schema) filters.insertSchema = target.schema
    return { type: 'column', mode: 'insert_columns', filters }
  }
  return null
}

/** Inside a VALUES row: the zero-based position of the value being typed */
export function detectValues(window: CursorWindow): DetectedContext | null {
  const { before, indices, tokens } = window
  let valuesAt = -1
  for (let i = 0; i < before.length; i++) {
    const keyword = keywordOf(before[i])
    if (keyword === 'VALUES') {
      valuesAt = i
      break
    }
    if (keyword && DML_KEYWORDS.has(keyword)) return null
  }
  if (valuesAt === -1) return null

  let depth = 0
  let position = 0
  let inRow = false
  const last = indices[0] ?? -1
  for (let i = indices[valuesAt] + 1; i <= last; i++) {
    const token = tokens[i]
    if (token.type === 'paren_open') {
      depth++
      if (depth === 1) {
        inRow = true
        position = 0
      }
    } else if (token.type === 'paren_close') {
      depth--
      if (depth === 0) inRow = false
      if (depth < 0) return null
    } else if (token.type === 'comma' && depth === 1) {
      position++
    }
  }
  if (!inRow) return null

  const qualifiedColumn = qualifiedColumnContext(window)
  if (qualifiedColumn) return qualifiedColumn

  const filters: ContextFilters = { valuePosition: position }
  const target = findInsertTarget(window, valuesAt)
  if (target) {
    filters.insertTable = target.table
    if (target.schema) filters.insertSchema = target.schema
  }
  return { type: 'column', mode: 'values', filters }
}

/**
 * A possibly schema-qualified name read in source order from before[from]
 * towards the cursor, never reaching before[stop].
 */
function readNameForward(before: Token[], from: number, stop: number): { table: string; schema?: string } | null {
  const parts: string[] = []
  for (let j = from; j > stop; j -= 2) {
    const token = before[j]
    if (token.type !== 'identifier' && token.type !== 'bracket_id' && token.type !== 'temp_table' && token.type !== 'variable') break
    parts.push(stripBrackets(token.text))
    if (before[j - 1]?.type !== 'dot') break
  }
  const table = parts[parts.length - 1]
  if (!table) return null
  const schema = parts[parts.length - 2]
  return schema ? { table, schema } : { table }
}

/** The INSERT target preceding the VALUES keyword at before[valuesAt] */
function findInsertTarget(window: CursorWindow, valuesAt: number): { table: string; schema?: string } | null {
  const { before } = window
  for (let i = valuesAt + 1; i < before.length; i++) {
    const keyword = keywordOf(before[i])
    if (keyword === 'INTO' || keyword === 'INSERT') return readNameForward(before, i - 1, valuesAt)
    if (keyword && keyword !== 'DEFAULT' && DML_KEYWORDS.has(keyword)) return null
  }
  return null
}

/** `WHEN NOT MATCHED [BY TARGET] THEN INSERT (a, |` inside MERGE */
export function detectMergeInsertColumns(window: CursorWindow): DetectedContext | null {
  const { before } = window
  let depth = 0
  for (let i = 0; i < before.length; i++) {
    const token = before[i]
    const keyword = keywordOf(token)
    if (keyword === 'MERGE' || keyword === 'VALUES') return null
    if (token.type === 'paren_close') {
      depth++
      continue
    }
    if (token.type !== 'paren_open') continue
    if (depth > 0) {
      depth--
      continue
    }

    if (keywordOf(before[i + 1]) !== 'INSERT' || keywordOf(before[i + 2]) !== 'THEN') return null
    let j = i + 3
    // BY TARGET / BY SOURCE, or AND <condition>
    while (j < Math.min(i + 40, before.length) && keywordOf(before[j]) !== 'MATCHED') j++
    if (keywordOf(before[j]) !== 'MATCHED' || keywordOf(before[j + 1]) !== 'NOT' || keywordOf(before[j + 2]) !== 'WHEN') {
      return null
    }

    const filters: ContextFilters = {}
    const target = findMergeTarget(before, j + 3)
    if (target) {
      filters.insertTable = target.table
      if (target.schema) filters.insertSchema = target.schema
    }
    return { type: 'column', mode: 'merge_insert_columns', filters }
  }
  return null
}

function findMergeTarget(before: Token[], from: number): { table: string; schema?: string } | null {
  for (let i = from; i < before.length; i++) {
    if (keywordOf(before[i]) !== 'MERGE') continue
    const start = keywordOf(before[i - 1]) === 'INTO' ? i - 2 : i - 1
    return readNameForward(before, start, -1)
  }
  return null
}

const ON_BLOCKERS = new Set(['JOIN', 'WHERE', 'GROUP', 'ORDER', 'HAVING'])
const ON_OWNERS = new Set(['JOIN', 'USING'])
const ON_STOPS = new Set(['FROM', 'SELECT', 'INSERT', 'UPDATE', 'DELETE', 'MERGE'])

/** Cursor after `JOIN t ON` (or MERGE ... USING s ON) */
export function detectOnClause(window: CursorWindow): DetectedContext | null {
  const { before } = window
  let onFound = false
  for (let i = 0; i < Math.min(40, before.length); i++) {
    const keyword = keywordOf(before[i])
    if (!keyword) continue
    if (!onFound) {
      if (keyword === 'ON') onFound = true
      else if (ON_BLOCKERS.has(keyword) || ON_STOPS.has(keyword)) return null
      continue
    }
    if (ON_OWNERS.has(keyword)) {
      return qualifiedColumnContext(window) ?? comparisonContext('on', window)
    }
    if (ON_STOPS.has(keyword)) return null
  }
  return null
}

// ============================================================================
// Token-based contexts
// ============================================================================

/** The two most recent keywords within `limit` tokens */
function recentKeywords(before: Token[], limit: number): [string | null, string | null] {
  const found: string[] = []
  for (let i = 0; i < Math.min(limit, before.length) && found.length < 2; i++) {
    if (isStatementBoundary(before[i])) break
    const keyword = keywordOf(before[i])
    if (keyword) found.push(keyword)
  }
  return [found[0] ?? null, found[1] ?? null]
}

/**
 * Table contexts from the most recent keywords: FROM, JOIN, UPDATE, DELETE,
 * TRUNCATE TABLE, ALTER TABLE, INSERT [INTO], MERGE [INTO], USING, APPLY.
 */
export function detectTableContext(window: CursorWindow): DetectedContext | null {
  const [first, second] = recentKeywords(window.before, 10)
  switch (first) {
    case 'FROM':
    case 'APPLY':
      return tableContext('from', window)
    case 'JOIN':
      return tableContext('join', window)
    case 'UPDATE':
      return tableContext('update', window)
    case 'DELETE':
      return tableContext('delete', window)
    case 'TABLE':
      if (second === 'TRUNCATE') return tableContext('truncate', window)
      if (second === 'ALTER') return tableContext('alter', window)
      return null
    case 'INTO':
      if (second === 'INSERT') return tableContext('insert', window)
      if (second === 'MERGE') return tableContext('merge', window)
      return null
    case 'INSERT':
      return tableContext('insert', window)
    case 'MERGE':
      return tableContext('merge', window)
    case 'USING':
      return tableContext('merge_using', window)
    default:
      if (first && JOIN_MODIFIERS.has(first) && second === 'JOIN') return tableContext('join', window)
      return null
  }
}

/** The two most recent governing keywords at paren depth 0 */
function governingKeywords(before: Token[], limit: number, from = 0): Array<{ keyword: string; at: number }> {
  const found: Array<{ keyword: string; at: number }> = []
  let depth = 0
  for (let i = from; i < Math.min(limit, before.length) && found.length < 2; i++) {
    const token = before[i]
    if (isStatementBoundary(token)) break
    if (token.type === 'paren_close') depth++
    else if (token.type === 'paren_open') depth = Math.max(0, depth - 1)
    if (depth > 0 || token.type !== 'keyword') continue
    const keyword = token.text.toUpperCase()
    const category = token.keywordCategory
    if (category && TRANSPARENT_CATEGORIES.has(category) && !GOVERNING_OPERATORS.has(keyword)) continue
    found.push({ keyword, at: i })
  }
  return found
}

/** What an AND/OR continues: the condition clause further back */
function resolveConditionOwner(window: CursorWindow, from: number): DetectedContext {
  const { before } = window
  let depth = 0
  for (let i = from; i < before.length; i++) {
    const token = before[i]
    if (token.type === 'paren_close') depth++
    else if (token.type === 'paren_open') depth = Math.max(0, depth - 1)
    if (depth > 0) continue
    const keyword = keywordOf(token)
    if (!keyword) continue
    if (keyword === 'WHERE' || keyword === 'BETWEEN') return comparisonContext('where', window)
    if (keyword === 'ON') return comparisonContext('on', window)
    if (keyword === 'HAVING') return comparisonContext('having', window)
    if (keyword === 'WHEN' || keyword === 'CASE') return comparisonContext('case_expression', window)
    if (keyword === 'SELECT' || keyword === 'FROM' || keyword === 'SET') break
  }
  return comparisonContext('where', window)
}

/**
 * Column contexts from the governing keyword: SELECT, WHERE, AND/OR, ON,
 * SET, ORDER BY, GROUP BY, HAVING, CASE branches, OUTPUT.
 */
export function detectColumnContext(window: CursorWindow): DetectedContext | null {
  const qualifiedColumn = qualifiedColumnContext(window)
  if (qualifiedColumn) return qualifiedColumn

  const [first, second] = governingKeywords(window.before, 15)
  if (!first) return null

  switch (first.keyword) {
    case 'SELECT':
      return { type: 'column', mode: 'select', filters: {} }
    case 'DISTINCT':
    case 'TOP':
    case 'ALL':
      return second?.keyword === 'SELECT' ? { type: 'column', mode: 'select', filters: {} } : null
    case 'WHERE':
      return comparisonContext('where', window)
    case 'AND':
    case 'OR':
      return resolveConditionOwner(window, first.at + 1)
    case 'ON':
      return comparisonContext('on', window)
    case 'SET': {
      const context = comparisonContext('set', window)
      return context.filters.leftSide ? { ...context, mode: 'set_value' } : context
    }
    case 'BY':
      if (second?.keyword === 'ORDER') return { type: 'column', mode: 'order_by', filters: {} }
      if (second?.keyword === 'GROUP') return { type: 'column', mode: 'group_by', filters: {} }
      return null
    case 'HAVING':
      return comparisonContext('having', window)
    case 'CASE':
    case 'WHEN':
    case 'THEN':
    case 'ELSE':
      return comparisonContext('case_expression', window)
    case 'OUTPUT':
      return { type: 'column', mode: 'output', filters: {} }
    default:
      return null
  }
}

/** `USE |` lists databases; `USE db.|` lists that database's schemas */
export function detectUse(window: CursorWindow): DetectedContext | null {
  const { before } = window
  for (let i = 0; i < Math.min(5, before.length); i++) {
    const keyword = keywordOf(before[i])
    if (keyword === 'USE') {
      const parts = getDotQualifier(before)
      const database = parts?.[0]
      if (database) return { type: 'schema', mode: 'schema', filters: { database } }
      return { type: 'database', mode: 'database', filters: {} }
    }
    if (!isNameToken(before[i])) return null
  }
  return null
}

/** Statement start, or anything else */
export function detectFallback(window: CursorWindow): DetectedContext {
  const previous = window.before[0]
  if (!previous || isStatementBoundary(previous)) {
    return { type: 'keyword', mode: 'start', filters: {} }
  }
  return { type: 'keyword', mode: 'general', filters: {} }
}
