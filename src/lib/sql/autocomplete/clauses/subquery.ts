/**
 * Subquery parser.
 *
 * Parses `(SELECT ...)` in its own child scope: the SELECT list, FROM, the
 * trailing clauses and any set-operation members. Members after the first
 * contribute only their tables; the first member's columns stand for the
 * whole subquery.
 */

import type { ClauseName, ClausePositions, FromClauseResult, SubqueryInfo, TableReference } from '../types'
import type { ParserState } from '../parser-state'
import type { ScopeContext } from '../scope'
import { SET_OPERATIONS, isStatementStarter } from '../keywords'
import { buildAliasMap, resolveColumnParents } from '../names'
import { startOf } from '../positions'
import { fromClauseSpans, parseFromClause } from './from-clause'
import { parseSelectList } from './select-list'
import {
  FETCH_TERMINATORS,
  GROUP_BY_TERMINATORS,
  HAVING_TERMINATORS,
  LIMIT_TERMINATORS,
  OFFSET_TERMINATORS,
  ORDER_BY_TERMINATORS,
  WHERE_TERMINATORS,
  scanClause,
} from './where-clause'

/** Trailing clauses shared by subqueries and top-level SELECT statements */
export const TRAILING_CLAUSES: ReadonlyMap<string, { clause: ClauseName; terminators: ReadonlySet<string> }> = new Map([
  ['WHERE', { clause: 'where', terminators: WHERE_TERMINATORS }],
  ['GROUP', { clause: 'group_by', terminators: GROUP_BY_TERMINATORS }],
  ['HAVING', { clause: 'having', terminators: HAVING_TERMINATORS }],
  ['ORDER', { clause: 'order_by', terminators: ORDER_BY_TERMINATORS }],
  ['LIMIT', { clause: 'limit', terminators: LIMIT_TERMINATORS }],
  ['OFFSET', { clause: 'offset', terminators: OFFSET_TERMINATORS }],
  ['FETCH', { clause: 'fetch', terminators: FETCH_TERMINATORS }],
])

/** Record a FROM result's clause ranges */
export function applyFromPositions(positions: ClausePositions, result: FromClauseResult): void {
  if (result.clausePosition && !positions.from) positions.from = result.clausePosition
  for (const [key, span] of fromClauseSpans(result)) {
    if (!positions[key]) positions[key] = span
  }
}

/**
 * Aliased derived tables and VALUES constructors as pseudo-tables, so alias
 * lookups find them alongside real tables.
 */
export function derivedTables(subqueries: SubqueryInfo[]): TableReference[] {
  return subqueries
    .filter((subquery) => subquery.alias !== undefined)
    .map((subquery) => ({
      name: subquery.alias ?? '',
      alias: subquery.alias,
      isTemp: false,
      isGlobalTemp: false,
      isTableVariable: false,
      isCte: false,
      isSubquery: true,
      columns: subquery.columns,
    }))
}

/**
 * Parse a subquery body. The state is on SELECT; the closing parenthesis is
 * left unconsumed and recorded as `endPos`.
 */
export function parseSubquery(state: ParserState, parent: ScopeContext): SubqueryInfo {
  const scope = parent.createChild()
  const open = state.previous()
  const selectToken = state.current()
  const startIndex = open?.type === 'paren_open' ? state.pos - 1 : state.pos
  const startToken = open?.type === 'paren_open' ? open : selectToken

  const info: SubqueryInfo = {
    columns: [],
    tables: [],
    subqueries: [],
    parameters: [],
    startPos: startToken ? startOf(startToken) : { line: 1, col: 1 },
    endPos: null,
    clausePositions: {},
  }

  const select = parseSelectList(state, scope, parseSubquery)
  info.columns = select.columns
  if (select.clausePosition) info.clausePositions.select = select.clausePosition

  if (state.isKeyword('FROM')) {
    const from = parseFromClause(state, scope, parseSubquery)
    applyFromPositions(info.clausePositions, from)
    for (const table of from.tables) {
      info.tables.push(table)
      scope.addTable(table)
    }
  }

  while (!state.atEnd()) {
    const token = state.current()
    if (!token || token.type === 'go' || token.type === 'semicolon') break

    if (token.type === 'paren_close') {
      info.endPos = startOf(token)
      break
    }

    const keyword = state.keyword()
    if (keyword) {
      const trailing = TRAILING_CLAUSES.get(keyword)
      if (trailing) {
        const span = scanClause(state, scope, parseSubquery, trailing.terminators)
        if (span && !info.clausePositions[trailing.clause]) info.clausePositions[trailing.clause] = span
        continue
      }
      if (SET_OPERATIONS.has(keyword)) {
        parseSetOperationMember(state, parent, info)
        continue
      }
      if (keyword !== 'WITH' && isStatementStarter(keyword)) break
    }

    if (token.type === 'paren_open') {
      if (!state.skipParenContents()) break
      continue
    }
    state.advance()
  }

  const pseudo = derivedTables(scope.subqueries)
  info.subqueries = [...scope.subqueries]
  info.tables.push(...pseudo.filter((table) => !info.tables.some((t) => t.alias === table.alias)))

  resolveColumnParents(info.columns, buildAliasMap(info.tables), info.tables)
  const endIndex = info.endPos ? state.pos : state.pos - 1
  state.extractParameters(startIndex, endIndex, info.parameters)
  return info
}

/**
 * `UNION [ALL] SELECT ... FROM ...`: only the member's tables are kept.
 * The state is on the set-operation keyword.
 */
function parseSetOperationMember(state: ParserState, parent: ScopeContext, info: SubqueryInfo): void {
  state.advance()
  if (!state.consumeKeyword('ALL')) state.consumeKeyword('DISTINCT')
  if (!state.isKeyword('SELECT')) return

  const memberScope = parent.createChild()
  parseSelectList(state, memberScope, parseSubquery)
  if (!state.isKeyword('FROM')) return
  const from = parseFromClause(state, memberScope, parseSubquery)
  info.tables.push(...from.tables)
}
