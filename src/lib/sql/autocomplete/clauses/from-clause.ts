/**
 * FROM / JOIN parser.
 *
 * Handles comma lists, JOIN chains with modifiers, CROSS/OUTER APPLY,
 * derived tables, VALUES constructors and table hints, and records a range
 * for every JOIN and ON in discovery order.
 */

import type { ClausePosition, FromClauseResult, TableReference, Token } from '../types'
import type { ParserState } from '../parser-state'
import type { ScopeContext, SubqueryParser } from '../scope'
import { FROM_TERMINATORS, JOIN_MODIFIERS, SET_OPERATIONS, isStatementStarter } from '../keywords'
import { parseAlias, parseQualifiedName, parseTableReference, skipTableHints } from '../names'
import { clauseSpan } from '../positions'
import { parseValuesTable } from './values-clause'

function isJoinKeyword(state: ParserState, keyword: string): boolean {
  if (keyword === 'FROM' || keyword === 'JOIN') return true
  // LEFT(...) / RIGHT(...) are string functions
  return JOIN_MODIFIERS.has(keyword) && state.peek()?.type !== 'paren_open'
}

function isSelectAhead(state: ParserState): boolean {
  const next = state.peek()
  return next?.type === 'keyword' && next.text.toUpperCase() === 'SELECT'
}

/**
 * Parse a FROM clause. The state is on FROM (or on JOIN for a bare join list).
 * Table references are returned, not added to the scope; derived tables are
 * added to the scope as subqueries.
 */
export function parseFromClause(state: ParserState, scope: ScopeContext, parseSubquery: SubqueryParser): FromClauseResult {
  const result: FromClauseResult = { tables: [], clausePosition: null, joinPositions: [], onPositions: [] }
  const fromToken = state.current()
  if (!fromToken) return result

  let depth = 0
  let last: Token = fromToken
  let joinStart: Token | null = null
  let onStart: Token | null = null

  const closeJoin = (end: Token): void => {
    if (joinStart) result.joinPositions.push(clauseSpan(joinStart, end))
    joinStart = null
  }
  const closeOn = (end: Token): void => {
    if (onStart) result.onPositions.push(clauseSpan(onStart, end))
    onStart = null
  }
  const markLast = (): void => {
    const previous = state.previous()
    if (previous) last = previous
  }

  while (!state.atEnd()) {
    const token = state.current()
    if (!token || token.type === 'go' || token.type === 'semicolon') break

    if (token.type === 'paren_open') {
      depth++
      last = token
      state.advance()
      if (state.isKeyword('SELECT')) {
        const subquery = parseSubquery(state, scope)
        const close = state.current()
        if (close?.type === 'paren_close') {
          depth--
          last = close
          state.advance()
          const alias = parseAlias(state)
          if (alias) subquery.alias = alias
          markLast()
        }
        scope.addSubquery(subquery)
      } else if (state.isKeyword('VALUES')) {
        scope.addSubquery(parseValuesTable(state, token))
        depth--
        markLast()
      }
      continue
    }

    if (token.type === 'paren_close') {
      depth--
      if (depth < 0) break
      last = token
      state.advance()
      continue
    }

    const keyword = state.keyword()
    if (keyword && depth === 0) {
      if (isJoinKeyword(state, keyword)) {
        if (keyword !== 'FROM') {
          closeOn(last)
          closeJoin(last)
          joinStart = token
        }
        state.advance()
        while (state.isAnyKeyword(JOIN_MODIFIERS) && state.peek()?.type !== 'paren_open') state.advance()
        if (state.isKeyword('JOIN')) state.advance()
        markLast()

        if (state.isKeyword('APPLY')) {
          state.advance()
          markLast()
          parseApply(state, scope, parseSubquery, result.tables)
          markLast()
          continue
        }
        parseTableList(state, scope, result.tables)
        markLast()
        continue
      }

      if (keyword === 'ON') {
        closeOn(last)
        closeJoin(last)
        onStart = token
        last = token
        state.advance()
        continue
      }

      if (keyword === 'WITH' && state.peek()?.type === 'paren_open') {
        skipTableHints(state)
        markLast()
        continue
      }
      if (isStatementStarter(keyword)) break
      if (SET_OPERATIONS.has(keyword) || FROM_TERMINATORS.has(keyword)) break
    }

    last = token
    state.advance()
  }

  closeOn(last)
  closeJoin(last)
  result.clausePosition = clauseSpan(fromToken, last)
  return result
}

/** `table [alias], table [alias], ...` stopping before a derived table */
function parseTableList(state: ParserState, scope: ScopeContext, tables: TableReference[]): void {
  while (!state.atEnd()) {
    if (state.isType('paren_open')) return
    const ref = parseTableReference(state, scope.knownCteNames())
    if (!ref) return
    tables.push(ref)
    if (!state.isType('comma')) return
    state.advance()
  }
}

/**
 * CROSS/OUTER APPLY target: a subquery, a parenthesised expression, or a
 * table-valued function call. The state is just past APPLY.
 */
function parseApply(state: ParserState, scope: ScopeContext, parseSubquery: SubqueryParser, tables: TableReference[]): void {
  if (state.isType('paren_open')) {
    if (isSelectAhead(state)) {
      state.advance()
      const subquery = parseSubquery(state, scope)
      if (state.isType('paren_close')) {
        state.advance()
        const alias = parseAlias(state)
        if (alias) subquery.alias = alias
      }
      scope.addSubquery(subquery)
      return
    }
    state.skipParenContents()
    parseAlias(state)
    return
  }

  const name = parseQualifiedName(state)
  if (!name) return
  if (state.isType('paren_open')) state.skipParenContents()
  const alias = parseAlias(state)
  tables.push({
    ...name,
    alias: alias ?? name.name,
    isTemp: false,
    isGlobalTemp: false,
    isTableVariable: false,
    isCte: false,
    isTvf: true,
  })
}

export function fromClauseSpans(result: FromClauseResult): Array<[`join_${number}` | `on_${number}`, ClausePosition]> {
  const spans: Array<[`join_${number}` | `on_${number}`, ClausePosition]> = []
  result.joinPositions.forEach((span, index) => spans.push([`join_${index + 1}`, span]))
  result.onPositions.forEach((span, index) => spans.push([`on_${index + 1}`, span]))
  return spans
}
