/**
 * UPDATE [TOP (n)] target SET ... [OUTPUT ...] [FROM ...] [WHERE ...]
 *
 * With a FROM clause the target is usually an alias of one of its tables
 * (`UPDATE e SET ... FROM Employees e`), so the FROM tables replace it.
 */

import type { StatementChunk } from '../types'
import { parseTableReference } from '../names'
import { clauseSpan } from '../positions'
import { parseFromClause } from '../clauses/from-clause'
import { parseSubquery } from '../clauses/subquery'
import { OUTPUT_TERMINATORS, UPDATE_SET_TERMINATORS, parseWhereClause, scanClause } from '../clauses/where-clause'
import { applyFromClause, createChunk, finalizeChunk, setClause, type StatementContext } from './base'

export function parseUpdateStatement(context: StatementContext): StatementChunk {
  const { state, scope } = context
  const chunk = createChunk(state, 'UPDATE')
  const updateToken = state.advance()
  state.skipTopClause()

  const target = parseTableReference(state, scope.knownCteNames())
  if (updateToken) setClause(chunk, 'update', clauseSpan(updateToken, state.previous()))
  if (target) {
    chunk.updateTarget = target
    scope.addTable(target)
  }

  if (state.isKeyword('SET')) {
    setClause(chunk, 'set', scanClause(state, scope, parseSubquery, UPDATE_SET_TERMINATORS))
  }
  if (state.isKeyword('OUTPUT')) {
    setClause(chunk, 'output', scanClause(state, scope, parseSubquery, OUTPUT_TERMINATORS))
  }
  if (state.isKeyword('FROM')) {
    applyFromClause(chunk, scope, parseFromClause(state, scope, parseSubquery), { replace: true, markFromClause: true })
  }
  if (state.isKeyword('WHERE')) {
    setClause(chunk, 'where', parseWhereClause(state, scope, parseSubquery))
  }
  state.consumeUntilStatementEnd()

  if (!chunk.hasFromClause && target) chunk.tables.unshift(target)
  return finalizeChunk(state, chunk, scope)
}
