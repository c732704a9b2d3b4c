/**
 * EXEC, SET, USE, and the control-flow statements that only need skipping.
 */

import type { StatementChunk } from '../types'
import { parseQualifiedName } from '../names'
import { parseSubquery } from '../clauses/subquery'
import { NO_TERMINATORS, scanClause } from '../clauses/where-clause'
import { createChunk, finalizeChunk, setClause, type StatementContext } from './base'

/** EXEC [@ret =] [db.][schema.]procedure args */
export function parseExecStatement(context: StatementContext): StatementChunk {
  const { state, scope } = context
  const chunk = createChunk(state, 'EXEC')
  state.advance()

  if (state.isType('variable') && state.peek()?.text === '=') {
    state.advance()
    state.advance()
  }
  const procedure = parseQualifiedName(state)
  if (procedure) chunk.execProcedure = procedure

  state.consumeUntilStatementEnd()
  return finalizeChunk(state, chunk, scope)
}

/** SET @x = (SELECT ...) / SET NOCOUNT ON */
export function parseSetStatement(context: StatementContext): StatementChunk {
  const { state, scope } = context
  const chunk = createChunk(state, 'SET')
  setClause(chunk, 'set', scanClause(state, scope, parseSubquery, NO_TERMINATORS))
  state.consumeUntilStatementEnd()
  return finalizeChunk(state, chunk, scope)
}

export function parseUseStatement(context: StatementContext): StatementChunk {
  const { state, scope } = context
  const chunk = createChunk(state, 'USE')
  state.advance()
  state.consumeUntilStatementEnd()
  return finalizeChunk(state, chunk, scope)
}

/**
 * IF, WHILE, BEGIN, PRINT and other statements with no completion model.
 * The keyword is consumed first so the walk always makes progress.
 */
export function skipOtherStatement({ state }: StatementContext): null {
  state.advance()
  state.consumeUntilStatementEnd()
  return null
}
