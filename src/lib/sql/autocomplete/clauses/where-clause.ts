/**
 * WHERE and the other expression clauses that need no structure beyond
 * their range and the subqueries inside them.
 */

import type { ClausePosition, Token } from '../types'
import type { ParserState } from '../parser-state'
import type { ScopeContext, SubqueryParser } from '../scope'
import { isStatementStarter } from '../keywords'
import { clauseSpan } from '../positions'

const SET_OPERATION_ENDS = ['UNION', 'INTERSECT', 'EXCEPT', 'FOR', 'OPTION']

export const WHERE_TERMINATORS: ReadonlySet<string> = new Set([
  'GROUP', 'HAVING', 'ORDER', 'LIMIT', 'OFFSET', 'FETCH', ...SET_OPERATION_ENDS,
])
export const GROUP_BY_TERMINATORS: ReadonlySet<string> = new Set([
  'HAVING', 'ORDER', 'LIMIT', 'OFFSET', 'FETCH', ...SET_OPERATION_ENDS,
])
export const HAVING_TERMINATORS: ReadonlySet<string> = new Set([
  'ORDER', 'LIMIT', 'OFFSET', 'FETCH', ...SET_OPERATION_ENDS,
])
export const ORDER_BY_TERMINATORS: ReadonlySet<string> = new Set(['LIMIT', 'OFFSET', 'FETCH', ...SET_OPERATION_ENDS])
export const LIMIT_TERMINATORS: ReadonlySet<string> = new Set(['OFFSET', 'FETCH', ...SET_OPERATION_ENDS])
export const OFFSET_TERMINATORS: ReadonlySet<string> = new Set(['FETCH', 'LIMIT', ...SET_OPERATION_ENDS])
export const FETCH_TERMINATORS: ReadonlySet<string> = new Set(SET_OPERATION_ENDS)
/** UPDATE ... SET a = b */
export const UPDATE_SET_TERMINATORS: ReadonlySet<string> = new Set(['FROM', 'WHERE', 'OUTPUT', 'OPTION'])
export const OUTPUT_TERMINATORS: ReadonlySet<string> = new Set(['FROM', 'WHERE', 'VALUES', 'DEFAULT', 'OPTION'])
export const NO_TERMINATORS: ReadonlySet<string> = new Set()

/**
 * Scan a clause from its keyword to the first terminator at paren depth 0.
 *
 * The clause keyword (and a following BY) is consumed first. The scan also
 * ends at a batch separator, a semicolon, a statement keyword (WITH only when
 * it is not a table hint), or a `)` closing an enclosing subquery, which is
 * left unconsumed. `(SELECT ...)` groups are parsed as subqueries of `scope`.
 */
export function scanClause(
  state: ParserState,
  scope: ScopeContext,
  parseSubquery: SubqueryParser,
  terminators: ReadonlySet<string>
): ClausePosition | null {
  const start = state.advance()
  if (!start) return null
  let last: Token = start
  if (state.isKeyword('BY')) last = state.advance() ?? last

  let depth = 0
  while (!state.atEnd()) {
    const token = state.current()
    if (!token || token.type === 'go' || token.type === 'semicolon') break

    if (token.type === 'paren_open') {
      const next = state.peek()
      if (next?.type === 'keyword' && next.text.toUpperCase() === 'SELECT') {
        state.advance()
        scope.addSubquery(parseSubquery(state, scope))
        const close = state.current()
        if (close?.type === 'paren_close') {
          last = close
          state.advance()
        } else {
          const previous = state.previous()
          if (previous) last = previous
        }
        continue
      }
      depth++
    } else if (token.type === 'paren_close') {
      if (depth === 0) break
      depth--
    } else if (depth === 0 && token.type === 'keyword') {
      const keyword = token.text.toUpperCase()
      if (terminators.has(keyword)) break
      if (isStatementStarter(keyword) && !(keyword === 'WITH' && state.peek()?.type === 'paren_open')) break
    }

    last = token
    state.advance()
  }

  return clauseSpan(start, last)
}

export function parseWhereClause(state: ParserState, scope: ScopeContext, parseSubquery: SubqueryParser): ClausePosition | null {
  return scanClause(state, scope, parseSubquery, WHERE_TERMINATORS)
}
