/**
 * WITH clause parser: `WITH [RECURSIVE] name [(cols)] AS (body), ...`
 */

import type { CTEInfo, ColumnInfo, Token } from '../types'
import type { ParserState } from '../parser-state'
import type { ScopeContext, SubqueryParser } from '../scope'
import { isStatementStarter } from '../keywords'
import { parseColumnList, stripBrackets } from '../names'
import { startOf } from '../positions'

function isCteName(token: Token | null): token is Token {
  if (!token) return false
  if (token.type === 'identifier' || token.type === 'bracket_id') return true
  if (token.type !== 'keyword') return false
  const word = token.text.toUpperCase()
  return !isStatementStarter(word) && word !== 'FROM' && word !== 'WHERE'
}

/**
 * Parse the CTE definitions of a WITH clause. The state is on WITH and is
 * left on the token after the last definition.
 *
 * Each CTE is registered in `scope` before its body is parsed, so a
 * recursive reference inside the body is recognised as a CTE.
 */
export function parseCteClause(state: ParserState, scope: ScopeContext, parseSubquery: SubqueryParser): CTEInfo[] {
  const ctes: CTEInfo[] = []
  state.advance()

  let isRecursive = false
  if (state.current()?.text.toUpperCase() === 'RECURSIVE') {
    isRecursive = true
    state.advance()
  }

  while (!state.atEnd()) {
    const nameToken = state.current()
    if (!isCteName(nameToken)) break
    state.advance()

    const cte: CTEInfo = {
      name: stripBrackets(nameToken.text),
      columns: [],
      tables: [],
      subqueries: [],
      parameters: [],
    }
    if (isRecursive) cte.isRecursive = true

    if (state.isType('paren_open')) {
      cte.columnList = parseColumnList(state, { acceptKeywords: true })
    }
    if (!state.consumeKeyword('AS')) break
    const open = state.current()
    if (open?.type !== 'paren_open') break

    scope.addCte(cte)
    state.advance()
    cte.startPos = startOf(open)

    if (state.isKeyword('SELECT')) {
      const body = parseSubquery(state, scope)
      cte.tables = body.tables
      cte.subqueries = body.subqueries
      cte.parameters = body.parameters
      cte.clausePositions = body.clausePositions
      cte.columns = cte.columnList ? overlayColumns(cte.columnList, body.columns) : body.columns
    } else {
      skipToClosingParen(state)
      if (cte.columnList) cte.columns = cte.columnList.map((name) => ({ name, isStar: false }))
    }

    const close = state.current()
    if (close?.type === 'paren_close') {
      cte.endPos = startOf(close)
      state.advance()
    }

    scope.addCte(cte)
    ctes.push(cte)

    if (!state.isType('comma')) break
    state.advance()
  }

  return ctes
}

/** Explicit CTE column names take the place of the body's output names, by position */
function overlayColumns(names: string[], bodyColumns: ColumnInfo[]): ColumnInfo[] {
  return names.map((name, index) => {
    const column: ColumnInfo = { name, isStar: false }
    const source = bodyColumns[index]
    if (source?.sourceTable) column.sourceTable = source.sourceTable
    if (source?.parentTable) column.parentTable = source.parentTable
    if (source?.parentSchema) column.parentSchema = source.parentSchema
    return column
  })
}

/** Leave the state on the `)` matching an already-consumed `(` */
function skipToClosingParen(state: ParserState): void {
  let depth = 0
  while (!state.atEnd()) {
    const token = state.current()
    if (!token || token.type === 'go') return
    if (token.type === 'paren_open') depth++
    else if (token.type === 'paren_close') {
      if (depth === 0) return
      depth--
    }
    state.advance()
  }
}
