/**
 * DELETE [TOP (n)] [FROM] target [OUTPUT ...] [FROM ...] [WHERE ...]
 */

import type { StatementChunk } from '../types'
import { parseTableReference } from '../names'
import { clauseSpan } from '../positions'
import { parseFromClause } from '../clauses/from-clause'
import { parseSubquery } from '../clauses/subquery'
import { OUTPUT_TERMINATORS, parseWhereClause, scanClause } from '../clauses/where-clause'
import { applyFromClause, createChunk, finalizeChunk, setClause, type StatementContext } from './base'

export function parseDeleteStatement(context: StatementContext): StatementChunk {
  const { state, scope } = context
  const chunk = createChunk(state, 'DELETE')
  const deleteToken = state.advance()
  state.skipTopClause()
  state.consumeKeyword('FROM')

  const target = parseTableReference(state, scope.knownCteNames())
  if (deleteToken) setClause(chunk, 'delete', clauseSpan(deleteToken, state.previous()))
  if (target) {
    chunk.deleteTarget = target
    scope.addTable(target)
  }

  if (state.isKeyword('OUTPUT')) {
    setClause(chunk, 'output', scanClause(state, scope, parseSubquery, OUTPUT_TERMINATORS))
  }
  if (target && state.isKeyword('FROM')) {
    applyFromClause(chunk, scope, parseFromClause(state, scope, parseSubquery), { replace: true, markFromClause: true })
  }
  if (state.isKeyword('WHERE')) {
    setClause(chunk, 'where', parseWhereClause(state, scope, parseSubquery))
  }
  state.consumeUntilStatementEnd()

  if (!chunk.hasFromClause && target) chunk.tables.unshift(target)
  return finalizeChunk(state, chunk, scope)
}
