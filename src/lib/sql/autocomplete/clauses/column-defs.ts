/**
 * Column definition lists of CREATE TABLE, DECLARE @t TABLE and
 * ALTER TABLE ... ADD.
 */

import type { ClausePosition, ColumnInfo, Token } from '../types'
import type { ParserState } from '../parser-state'
import { CONSTRAINT_STARTERS, isStatementStarter } from '../keywords'
import { stripBrackets } from '../names'
import { clauseSpan, openClauseSpan } from '../positions'

export interface ColumnDefinitionsResult {
  columns: ColumnInfo[]
  clausePosition: ClausePosition | null
}

/**
 * Parse `(name TYPE [(params)] [modifiers], ..., [constraints])`.
 * The state is on `(`; the closing parenthesis is consumed.
 */
export function parseColumnDefinitions(state: ParserState): ColumnDefinitionsResult {
  const open = state.current()
  if (open?.type !== 'paren_open') return { columns: [], clausePosition: null }
  state.advance()

  const columns: ColumnInfo[] = []
  let last: Token = open

  while (!state.atEnd()) {
    const token = state.current()
    if (!token || token.type === 'go' || token.type === 'semicolon') break
    if (token.type === 'paren_close') {
      state.advance()
      return { columns, clausePosition: clauseSpan(open, token) }
    }
    if (token.type === 'comma') {
      last = token
      state.advance()
      continue
    }
    if (startsStatement(state)) break

    const column = parseColumnDefinition(state)
    if (column) columns.push(column)
    skipToElementEnd(state)
    last = state.previous() ?? last
  }

  return { columns, clausePosition: openClauseSpan(open, last) }
}

/**
 * Parse unparenthesised definitions after ALTER TABLE ... ADD, up to the end
 * of the statement.
 */
export function parseAddedColumns(state: ParserState): ColumnInfo[] {
  const columns: ColumnInfo[] = []
  while (!state.atEnd()) {
    if (state.isStatementBoundary(0)) break
    if (state.isType('comma')) {
      state.advance()
      continue
    }
    const before = state.pos
    const column = parseColumnDefinition(state)
    if (column) columns.push(column)
    skipToElementEnd(state)
    if (state.pos === before && !state.isType('comma')) state.advance()
  }
  return columns
}

/**
 * One `name TYPE ...` element, or null for a constraint definition.
 * Leaves the state after the type and its parameters.
 */
function parseColumnDefinition(state: ParserState): ColumnInfo | null {
  const token = state.current()
  if (!token) return null
  if (token.type === 'keyword' && CONSTRAINT_STARTERS.has(token.text.toUpperCase())) return null
  if (token.type !== 'identifier' && token.type !== 'bracket_id' && token.type !== 'keyword') {
    state.advance()
    return null
  }

  const column: ColumnInfo = { name: stripBrackets(token.text), isStar: false }
  state.advance()

  const typeToken = state.current()
  if (typeToken && (typeToken.type === 'keyword' || typeToken.type === 'identifier' || typeToken.type === 'bracket_id')) {
    column.dataType = stripBrackets(typeToken.text).toUpperCase()
    state.advance()
    if (state.isType('paren_open')) state.skipParenContents()
  }
  return column
}

const REFERENTIAL_ACTION_PRECEDERS = new Set(['ON', 'DELETE', 'UPDATE'])

/**
 * A statement keyword inside an unclosed list starts the next statement.
 * `ON DELETE SET NULL` and friends are referential actions, not statements.
 */
function startsStatement(state: ParserState): boolean {
  const token = state.current()
  if (!token || token.type !== 'keyword') return false
  const word = token.text.toUpperCase()
  if (word === 'WITH' || !isStatementStarter(word)) return false
  const previous = state.previous()
  return !(previous?.type === 'keyword' && REFERENTIAL_ACTION_PRECEDERS.has(previous.text.toUpperCase()))
}

/** Skip modifiers or a constraint up to the next `,` or the list's `)` */
function skipToElementEnd(state: ParserState): void {
  while (!state.atEnd()) {
    const token = state.current()
    if (!token || token.type === 'go' || token.type === 'semicolon') return
    if (token.type === 'comma' || token.type === 'paren_close') return
    if (startsStatement(state)) return
    if (token.type === 'paren_open') {
      if (!state.skipParenContents()) return
      continue
    }
    state.advance()
  }
}
