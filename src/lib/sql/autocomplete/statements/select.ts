/**
 * SELECT statements, and the SELECT body shared with INSERT ... SELECT.
 */

import type { StatementChunk } from '../types'
import { SET_OPERATIONS, isStatementStarter } from '../keywords'
import { isGlobalTempTableName, isTempTableName, isTableVariableName, parseQualifiedName } from '../names'
import { clauseSpan } from '../positions'
import { parseFromClause } from '../clauses/from-clause'
import { parseSelectList } from '../clauses/select-list'
import { TRAILING_CLAUSES, parseSubquery } from '../clauses/subquery'
import { scanClause } from '../clauses/where-clause'
import { applyFromClause, createChunk, finalizeChunk, setClause, type StatementContext } from './base'

export function parseSelectStatement(context: StatementContext): StatementChunk {
  const chunk = createChunk(context.state, 'SELECT')
  parseSelectBody(context, chunk)
  return finalizeChunk(context.state, chunk, context.scope)
}

/**
 * SELECT list, INTO, FROM and the trailing clauses. The state is on SELECT.
 * A set operation at depth 0 ends the body; the next member is parsed as its
 * own statement.
 */
export function parseSelectBody(context: StatementContext, chunk: StatementChunk): void {
  const { state, scope } = context

  const select = parseSelectList(state, scope, parseSubquery)
  chunk.columns = [...(chunk.columns ?? []), ...select.columns]
  setClause(chunk, 'select', select.clausePosition)

  if (state.isKeyword('INTO')) {
    const intoToken = state.advance()
    const target = parseQualifiedName(state)
    if (intoToken) setClause(chunk, 'into', clauseSpan(intoToken, state.previous()))
    if (target && intoToken && (isTempTableName(target.name) || isTableVariableName(target.name))) {
      const isGlobal = isGlobalTempTableName(target.name)
      chunk.tempTableName = target.name
      chunk.isGlobalTemp = isGlobal
      if (isTempTableName(target.name)) {
        context.tempTables.set(target.name.toLowerCase(), {
          name: target.name,
          columns: select.columns,
          createdInBatch: state.batchIndex,
          createdAtLine: intoToken.line,
          isGlobal,
        })
      }
    }
  }

  if (state.isKeyword('FROM')) {
    applyFromClause(chunk, scope, parseFromClause(state, scope, parseSubquery))
  }

  while (!state.atEnd()) {
    const token = state.current()
    if (!token || token.type === 'go' || token.type === 'semicolon') break

    const keyword = state.keyword()
    if (keyword) {
      if (SET_OPERATIONS.has(keyword)) break
      if (isStatementStarter(keyword) && !(keyword === 'WITH' && state.peek()?.type === 'paren_open')) break
      const trailing = TRAILING_CLAUSES.get(keyword)
      if (trailing) {
        setClause(chunk, trailing.clause, scanClause(state, scope, parseSubquery, trailing.terminators))
        continue
      }
    }

    if (token.type === 'paren_open') {
      if (!state.skipParenContents()) break
      continue
    }
    state.advance()
  }
}
