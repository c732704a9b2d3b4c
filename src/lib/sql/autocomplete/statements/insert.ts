/**
 * INSERT [INTO] target [(columns)] { VALUES ... | SELECT ... | EXEC proc | DEFAULT VALUES }
 */

import type { StatementChunk } from '../types'
import { isStatementStarter } from '../keywords'
import { parseColumnList, parseQualifiedName, parseTableReference } from '../names'
import { clauseSpan, openClauseSpan } from '../positions'
import { parseSubquery } from '../clauses/subquery'
import { parseInsertValues } from '../clauses/values-clause'
import { OUTPUT_TERMINATORS, scanClause } from '../clauses/where-clause'
import { createChunk, finalizeChunk, setClause, type StatementContext } from './base'
import { parseSelectBody } from './select'

const SOURCE_KEYWORDS = new Set(['VALUES', 'SELECT', 'EXEC', 'EXECUTE'])

export function parseInsertStatement(context: StatementContext): StatementChunk {
  const { state, scope } = context
  const chunk = createChunk(state, 'INSERT')
  const insertToken = state.advance()
  state.skipTopClause()

  const intoToken = state.isKeyword('INTO') ? state.advance() : null
  const target = parseTableReference(state, scope.knownCteNames(), { allowArguments: false })
  const targetStart = intoToken ?? insertToken
  if (targetStart) setClause(chunk, 'into', clauseSpan(targetStart, state.previous()))
  if (target) {
    chunk.tables.push(target)
    scope.addTable(target)
  }

  const open = state.current()
  if (target && open?.type === 'paren_open') {
    chunk.insertColumns = parseColumnList(state)
    const last = state.previous()
    const closed = last?.type === 'paren_close' && last !== open
    setClause(chunk, 'insert_columns', closed ? clauseSpan(open, last) : openClauseSpan(open, last))
  }

  while (!state.atEnd()) {
    const token = state.current()
    if (!token || token.type === 'go' || token.type === 'semicolon') break
    const keyword = state.keyword()
    if (keyword && SOURCE_KEYWORDS.has(keyword)) break
    if (keyword === 'OUTPUT') {
      setClause(chunk, 'output', scanClause(state, scope, parseSubquery, OUTPUT_TERMINATORS))
      continue
    }
    if (keyword && isStatementStarter(keyword)) break
    state.advance()
  }

  const keyword = state.keyword()
  if (keyword === 'VALUES') {
    setClause(chunk, 'values', parseInsertValues(state))
  } else if (keyword === 'EXEC' || keyword === 'EXECUTE') {
    state.advance()
    const procedure = parseQualifiedName(state)
    if (procedure) chunk.execProcedure = procedure
    state.consumeUntilStatementEnd()
  } else if (keyword === 'SELECT') {
    parseSelectBody(context, chunk)
  }

  return finalizeChunk(state, chunk, scope)
}
