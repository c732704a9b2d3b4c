/**
 * VALUES parsers: the table-value constructor used as a derived table
 * (`FROM (VALUES (1, 'a'), (2, 'b')) AS v(Id, Label)`) and the row list of
 * INSERT ... VALUES.
 */

import type { ClausePosition, SubqueryInfo, Token } from '../types'
import type { ParserState } from '../parser-state'
import { parseAlias, parseColumnList } from '../names'
import { clauseSpan, openClauseSpan, startOf } from '../positions'

/**
 * Parse `VALUES (...), (...)) alias (cols)`. The state is on VALUES, just
 * inside the derived table's opening parenthesis `open`; the closing
 * parenthesis is consumed.
 */
export function parseValuesTable(state: ParserState, open: Token): SubqueryInfo {
  const info: SubqueryInfo = {
    columns: [],
    tables: [],
    subqueries: [],
    parameters: [],
    startPos: startOf(open),
    endPos: null,
    clausePositions: {},
    isValues: true,
  }
  const startIndex = state.pos
  state.advance()

  let depth = 1
  while (!state.atEnd()) {
    const token = state.current()
    if (!token || token.type === 'go' || token.type === 'semicolon') break
    if (token.type === 'paren_open') depth++
    else if (token.type === 'paren_close') depth--
    state.advance()
    if (depth === 0) {
      info.endPos = startOf(token)
      break
    }
  }
  state.extractParameters(startIndex, state.pos - 1, info.parameters)
  if (!info.endPos) return info

  const alias = parseAlias(state)
  if (alias) info.alias = alias
  const names = parseColumnList(state, { acceptKeywords: true })
  info.columns = names.map((name) => (alias ? { name, sourceTable: alias, isStar: false } : { name, isStar: false }))
  return info
}

/**
 * Skip the row tuples of INSERT ... VALUES. The state is on VALUES.
 * The span runs to the last closing parenthesis, or stays open while a row
 * is unterminated.
 */
export function parseInsertValues(state: ParserState): ClausePosition | null {
  const valuesToken = state.advance()
  if (!valuesToken) return null

  let last: Token = valuesToken
  while (state.isType('paren_open')) {
    const closed = state.skipParenContents()
    last = state.previous() ?? last
    if (!closed) return openClauseSpan(valuesToken, last)
    if (!state.isType('comma')) break
    last = state.advance() ?? last
  }
  return clauseSpan(valuesToken, last)
}
