/**
 * MERGE [INTO] target USING source ON ... WHEN ...
 *
 * Only the target and source are modelled; the WHEN branches are skipped to
 * the end of the statement.
 */

import type { StatementChunk } from '../types'
import { parseAlias, parseTableReference } from '../names'
import { clauseSpan } from '../positions'
import { parseSubquery } from '../clauses/subquery'
import { createChunk, finalizeChunk, setClause, type StatementContext } from './base'

/** Statement keywords that cannot appear inside a MERGE body */
const MERGE_BODY_ENDS = new Set([
  'SELECT', 'CREATE', 'ALTER', 'DROP', 'TRUNCATE', 'WITH', 'EXEC', 'EXECUTE', 'DECLARE', 'MERGE',
])

export function parseMergeStatement(context: StatementContext): StatementChunk {
  const { state, scope } = context
  const chunk = createChunk(state, 'MERGE')
  const mergeToken = state.advance()
  state.skipTopClause()
  state.consumeKeyword('INTO')

  const target = parseTableReference(state, scope.knownCteNames())
  if (mergeToken) setClause(chunk, 'merge', clauseSpan(mergeToken, state.previous()))
  if (target) {
    chunk.tables.push(target)
    scope.addTable(target)
  }

  const usingToken = state.isKeyword('USING') ? state.advance() : null
  if (usingToken) {
    if (state.isType('paren_open')) {
      const next = state.peek()
      if (next?.type === 'keyword' && next.text.toUpperCase() === 'SELECT') {
        state.advance()
        const subquery = parseSubquery(state, scope)
        if (state.isType('paren_close')) {
          state.advance()
          const alias = parseAlias(state)
          if (alias) subquery.alias = alias
        }
        scope.addSubquery(subquery)
      } else {
        state.skipParenContents()
        parseAlias(state)
      }
    } else {
      const source = parseTableReference(state, scope.knownCteNames())
      if (source) {
        chunk.tables.push(source)
        scope.addTable(source)
      }
    }
    setClause(chunk, 'using', clauseSpan(usingToken, state.previous()))
  }

  skipMergeBody(context)
  return finalizeChunk(state, chunk, scope)
}

function skipMergeBody({ state }: StatementContext): void {
  let depth = 0
  while (!state.atEnd()) {
    const token = state.current()
    if (!token || token.type === 'go') return
    if (token.type === 'semicolon') {
      state.advance()
      return
    }
    if (token.type === 'paren_open') depth++
    else if (token.type === 'paren_close') depth = Math.max(0, depth - 1)
    else if (depth === 0 && token.type === 'keyword' && MERGE_BODY_ENDS.has(token.text.toUpperCase())) return
    state.advance()
  }
}
