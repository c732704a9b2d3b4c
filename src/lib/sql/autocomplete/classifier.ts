/**
 * Context Classifier Module
 *
 * Decides what kind of completion the cursor calls for. Special token
 * patterns win first, then the clause positions recorded by the parser,
 * then bounded token-window detection.
 */

import type { CompletionContext, StatementChunk, SubqueryInfo, Token } from './types'
import { isInsideStringOrComment } from './tokenizer'
import { JOIN_MODIFIERS } from './keywords'
import { getClauseAtPosition, getChunkAtPosition, getSubqueryAtPosition, type ClauseAtPosition } from './statement-parser'
import { buildCursorWindow, type CursorWindow } from './qualified-names'
import {
  comparisonContext,
  detectColumnContext,
  detectFallback,
  detectInsertColumns,
  detectMergeInsertColumns,
  detectOnClause,
  detectOutputInto,
  detectOutputPseudoTable,
  detectProcedure,
  detectTableContext,
  detectUse,
  detectValues,
  isStatementBoundary,
  keywordOf,
  qualifiedColumnContext,
  tableContext,
  type DetectedContext,
} from './section-detector'

const SPECIAL_DETECTORS: Array<(window: CursorWindow) => DetectedContext | null> = [
  detectOutputPseudoTable,
  detectOutputInto,
  detectProcedure,
  detectInsertColumns,
  detectValues,
  detectMergeInsertColumns,
  detectOnClause,
]

const TABLE_CLAUSES = new Set<ClauseAtPosition>(['from', 'join', 'into', 'update', 'delete', 'merge', 'using'])

/**
 * Classify the cursor position.
 */
export function classify(tokens: Token[], chunks: StatementChunk[], line: number, col: number): CompletionContext {
  const chunk = getChunkAtPosition(chunks, line, col)
  const subquery = chunk ? getSubqueryAtPosition(chunk, line, col) : null

  const inside = isInsideStringOrComment(tokens, line, col)
  if (inside) {
    return { type: 'none', mode: inside, filters: {}, prefix: '', chunk, subquery }
  }

  const window = buildCursorWindow(tokens, line, col)
  const detected = detectContext(window, chunk, subquery)
  return { ...detected, prefix: window.prefix, chunk, subquery }
}

function detectContext(window: CursorWindow, chunk: StatementChunk | null, subquery: SubqueryInfo | null): DetectedContext {
  for (const detector of SPECIAL_DETECTORS) {
    const detected = detector(window)
    if (detected) return detected
  }

  // Past a `;` or batch separator the next statement has not started yet
  if (chunk && !isStatementBoundary(window.before[0])) {
    const byClause = detectByClausePosition(window, chunk, subquery)
    if (byClause) return byClause
    const continuation = detectContinuation(window)
    if (continuation) return continuation
  }

  return detectTableContext(window)
    ?? detectUse(window)
    ?? detectColumnContext(window)
    ?? detectFallback(window)
}

// ============================================================================
// Clause positions
// ============================================================================

function detectByClausePosition(window: CursorWindow, chunk: StatementChunk, subquery: SubqueryInfo | null): DetectedContext | null {
  const positions = subquery ? subquery.clausePositions : chunk.clausePositions
  const { line, col } = window.cursor
  const clause = getClauseAtPosition(positions, line, col)
  if (!clause) return null

  if (!subquery && (clause === 'where' || clause === 'having') && isInsideUnparsedSubquery(window)) return null
  return handleClause(clause, window)
}

/**
 * An open `(SELECT` before the cursor that has not been closed: the user is
 * typing a subquery the parser could not attach yet.
 */
function isInsideUnparsedSubquery(window: CursorWindow): boolean {
  const { before } = window
  let depth = 0
  for (let i = 0; i < before.length; i++) {
    const token = before[i]
    if (token.type === 'semicolon' || token.type === 'go') return false
    if (token.type === 'paren_close') {
      depth++
    } else if (token.type === 'paren_open') {
      if (depth === 0) return keywordOf(before[i - 1]) === 'SELECT'
      depth--
    }
  }
  return false
}

function hasRecentJoin(window: CursorWindow): boolean {
  return window.before.slice(0, 5).some((token) => keywordOf(token) === 'JOIN')
}

function handleClause(clause: ClauseAtPosition, window: CursorWindow): DetectedContext | null {
  if (!TABLE_CLAUSES.has(clause)) {
    const qualifiedColumn = qualifiedColumnContext(window)
    if (qualifiedColumn) return qualifiedColumn
  }

  switch (clause) {
    case 'select':
      return { type: 'column', mode: 'select', filters: {} }
    case 'from':
      return tableContext(hasRecentJoin(window) ? 'join' : 'from', window)
    case 'join':
      return tableContext('join', window)
    case 'into':
      return tableContext('into', window)
    case 'using':
      return tableContext('merge_using', window)
    case 'on':
      return comparisonContext('on', window)
    case 'where':
      return comparisonContext('where', window)
    case 'group_by':
      return { type: 'column', mode: 'group_by', filters: {} }
    case 'having':
      return comparisonContext('having', window)
    case 'order_by':
      return { type: 'column', mode: 'order_by', filters: {} }
    case 'set': {
      const context = comparisonContext('set', window)
      return context.filters.leftSide ? { ...context, mode: 'set_value' } : context
    }
    case 'output':
      return { type: 'column', mode: 'output', filters: {} }
    case 'alter_table':
      return tableContext('alter', window)
    default:
      return null
  }
}

// ============================================================================
// Continuation
// ============================================================================

/** Governing keyword of a comma list at paren depth 0 */
function commaListOwner(before: Token[], from: number): string | null {
  let depth = 0
  for (let i = from; i < Math.min(from + 60, before.length); i++) {
    const token = before[i]
    if (token.type === 'paren_close') depth++
    else if (token.type === 'paren_open') {
      if (depth === 0) return null
      depth--
    }
    if (depth > 0) continue
    const keyword = keywordOf(token)
    if (keyword === 'FROM' || keyword === 'JOIN') return keyword
    if (keyword === 'ON' || keyword === 'AS' || keyword === 'WITH' || JOIN_MODIFIERS.has(keyword ?? '')) continue
    if (keyword) return keyword
  }
  return null
}

/**
 * The cursor is past the recorded clause but still continuing a table list:
 * after a comma in FROM, after JOIN, or after FROM itself.
 */
function detectContinuation(window: CursorWindow): DetectedContext | null {
  const { before } = window
  for (let i = 0; i < Math.min(8, before.length); i++) {
    const token = before[i]
    if (token.type === 'identifier' || token.type === 'bracket_id' || token.type === 'dot') continue
    if (token.type === 'comma') {
      return commaListOwner(before, i + 1) === 'FROM' ? tableContext('from', window) : null
    }
    const keyword = keywordOf(token)
    if (keyword === 'FROM') return tableContext('from', window)
    if (keyword === 'JOIN' || (keyword && JOIN_MODIFIERS.has(keyword))) return tableContext('join', window)
    return null
  }
  return null
}
