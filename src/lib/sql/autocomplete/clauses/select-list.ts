/**
 * SELECT list parser.
 *
 * Reads comma-separated column expressions from the SELECT keyword up to
 * FROM/INTO at paren depth 0. Only the output name, its table prefix and
 * star-ness are kept; expressions are otherwise skipped.
 */

import type { ClausePosition, ColumnInfo, ExpressionColumn, Token } from '../types'
import type { ParserState } from '../parser-state'
import type { ScopeContext, SubqueryParser } from '../scope'
import { isStatementStarter } from '../keywords'
import { stripBrackets } from '../names'
import { clauseSpan } from '../positions'

export interface SelectListResult {
  columns: ColumnInfo[]
  clausePosition: ClausePosition | null
  /** The FROM or INTO keyword that ended the list, if any */
  stoppedAt: 'FROM' | 'INTO' | null
}

const LIST_END_KEYWORDS = new Set([
  'WHERE', 'GROUP', 'HAVING', 'ORDER', 'UNION', 'INTERSECT', 'EXCEPT', 'OPTION', 'FOR',
])

/** Keywords an arithmetic `*` expression is skipped up to */
const ARITHMETIC_STOP = new Set(['AS', 'FROM', 'INTO', 'WHERE'])

function isName(token: Token): boolean {
  return token.type === 'identifier' || token.type === 'bracket_id'
}

/**
 * Parse a SELECT list. The state must be on the SELECT keyword.
 */
export function parseSelectList(state: ParserState, scope: ScopeContext, parseSubquery: SubqueryParser): SelectListResult {
  const selectToken = state.advance()
  if (!selectToken) return { columns: [], clausePosition: null, stoppedAt: null }

  state.consumeKeyword('DISTINCT')
  state.consumeKeyword('ALL')
  state.skipTopClause()

  const columns: ColumnInfo[] = []
  let depth = 0
  let columnName: string | null = null
  let sourceTable: string | null = null
  let alias: string | null = null
  let star: { sourceTable: string | null } | null = null
  let expressionColumns: ExpressionColumn[] = []
  let last: Token = selectToken
  let stopToken: Token | null = null
  let stoppedAt: SelectListResult['stoppedAt'] = null

  const flush = (): void => {
    if (star) {
      const column: ColumnInfo = { name: alias ?? '*', isStar: alias === null }
      if (star.sourceTable) column.sourceTable = star.sourceTable
      columns.push(column)
    } else if (alias !== null || columnName !== null) {
      const column: ColumnInfo = { name: alias ?? columnName ?? '', isStar: false }
      if (sourceTable) column.sourceTable = sourceTable
      if (expressionColumns.length > 1) column.expressionColumns = expressionColumns
      columns.push(column)
    }
    columnName = null
    sourceTable = null
    alias = null
    star = null
    expressionColumns = []
  }

  const takeAlias = (): void => {
    const next = state.current()
    if (next && (isName(next) || next.type === 'keyword' || next.type === 'string')) {
      alias = next.type === 'string' ? next.text.replace(/^N?'|'$/g, '') : stripBrackets(next.text)
      last = next
      state.advance()
    }
  }

  while (!state.atEnd()) {
    const token = state.current()
    if (!token) break
    if (token.type === 'go' || token.type === 'semicolon') break

    const keyword = token.type === 'keyword' ? token.text.toUpperCase() : null
    if (depth === 0 && keyword) {
      if (keyword === 'FROM' || keyword === 'INTO') {
        stopToken = token
        stoppedAt = keyword
        break
      }
      if (LIST_END_KEYWORDS.has(keyword)) break
      if (keyword !== 'WITH' && isStatementStarter(keyword)) break
    }

    if (token.type === 'paren_open') {
      if (state.peek()?.type === 'keyword' && state.peek()?.text.toUpperCase() === 'SELECT') {
        state.advance()
        const subquery = parseSubquery(state, scope)
        scope.addSubquery(subquery)
        const close = state.current()
        if (close?.type === 'paren_close') {
          last = close
          state.advance()
        }
        continue
      }
      depth++
    } else if (token.type === 'paren_close') {
      depth--
      if (depth < 0) break
    } else if (token.type === 'comma' && depth === 0) {
      flush()
    } else if (token.type === 'star') {
      const previous = state.previous()
      if (previous?.type === 'dot' && sourceTable) {
        star = { sourceTable }
      } else if (columnName !== null && depth === 0) {
        // Multiplication: keep the pending column and skip the right operand
        last = token
        state.advance()
        skipArithmetic(state)
        const skipped = state.previous()
        if (skipped) last = skipped
        continue
      } else if (depth === 0) {
        star = { sourceTable: null }
      }
    } else if (token.type === 'dot') {
      if (columnName !== null) {
        sourceTable = columnName
        columnName = null
      }
    } else if (isName(token) || (token.type === 'keyword' && state.previous()?.type === 'dot')) {
      columnName = stripBrackets(token.text)
      if (sourceTable) expressionColumns.push({ name: columnName, sourceTable })
    } else if (keyword === 'AS') {
      last = token
      state.advance()
      takeAlias()
      continue
    }

    last = token
    state.advance()
  }

  flush()

  let clausePosition: ClausePosition
  if (stopToken) {
    clausePosition = {
      startLine: selectToken.line,
      startCol: selectToken.col,
      endLine: stopToken.line,
      endCol: stopToken.col - 1,
    }
  } else {
    clausePosition = clauseSpan(selectToken, last)
  }

  return { columns, clausePosition, stoppedAt }
}

function skipArithmetic(state: ParserState): void {
  let depth = 0
  while (!state.atEnd()) {
    const token = state.current()
    if (!token || token.type === 'go' || token.type === 'semicolon') return
    if (token.type === 'paren_open') depth++
    else if (token.type === 'paren_close') {
      if (depth === 0) return
      depth--
    } else if (depth === 0) {
      if (token.type === 'comma') return
      if (token.type === 'keyword' && ARITHMETIC_STOP.has(token.text.toUpperCase())) return
    }
    state.advance()
  }
}
