/**
 * Chunk creation and finalization shared by every statement dispatcher.
 */

import type {
  ClausePosition,
  FromClauseResult,
  StatementChunk,
  StatementType,
  TempTableInfo,
  Token,
} from '../types'
import type { ParserState } from '../parser-state'
import type { ScopeContext } from '../scope'
import { isCommentToken, getTokenEnd, comparePositions } from '../tokenizer'
import { buildAliasMap, resolveColumnParents } from '../names'
import { spanEnd } from '../positions'
import { applyFromPositions, derivedTables } from '../clauses/subquery'

/** What a statement dispatcher works with */
export interface StatementContext {
  state: ParserState
  scope: ScopeContext
  /** Document-wide registry, keyed by lowercase name */
  tempTables: Map<string, TempTableInfo>
}

export type StatementHandler = (context: StatementContext) => StatementChunk | null

/**
 * A new chunk starting at the statement's first token (`state.chunkStartPos`).
 */
export function createChunk(state: ParserState, statementType: StatementType): StatementChunk {
  const start: Token | undefined = state.tokens[state.chunkStartPos]
  const line = start?.line ?? 1
  const col = start?.col ?? 1
  return {
    statementType,
    tables: [],
    aliases: new Map(),
    subqueries: [],
    ctes: [],
    parameters: [],
    startLine: line,
    startCol: col,
    endLine: line,
    endCol: col,
    batchIndex: state.batchIndex,
    clausePositions: {},
    tokenStartIdx: state.chunkStartPos,
    tokenEndIdx: state.chunkStartPos,
  }
}

export interface FromClauseOptions {
  /** Replace the tables collected so far (UPDATE/DELETE targets) instead of appending */
  replace?: boolean
  markFromClause?: boolean
}

/**
 * Merge a FROM result into the chunk and the statement scope.
 */
export function applyFromClause(
  chunk: StatementChunk,
  scope: ScopeContext,
  result: FromClauseResult,
  options: FromClauseOptions = {}
): void {
  if (options.replace) chunk.tables = [...result.tables]
  else chunk.tables.push(...result.tables)
  applyFromPositions(chunk.clausePositions, result)
  if (options.markFromClause) chunk.hasFromClause = true
  for (const table of result.tables) scope.addTable(table)
}

export function setClause(chunk: StatementChunk, clause: keyof StatementChunk['clausePositions'], span: ClausePosition | null): void {
  if (span && !chunk.clausePositions[clause]) chunk.clausePositions[clause] = span
}

/**
 * Close the chunk at the last consumed token: rebuild aliases, attach
 * subqueries, resolve column parents and collect parameters.
 */
export function finalizeChunk(state: ParserState, chunk: StatementChunk, scope: ScopeContext): StatementChunk {
  let endIdx = Math.max(chunk.tokenStartIdx, state.pos - 1)
  while (endIdx > chunk.tokenStartIdx && isCommentToken(state.tokens[endIdx])) endIdx--
  chunk.tokenEndIdx = endIdx

  const lastToken = state.tokens[endIdx]
  if (lastToken) {
    let end = getTokenEnd(lastToken)
    for (const span of Object.values(chunk.clausePositions)) {
      if (span && comparePositions(spanEnd(span), end) > 0) end = spanEnd(span)
    }
    chunk.endLine = end.line
    chunk.endCol = end.col
  }

  chunk.subqueries = [...scope.subqueries]
  for (const pseudo of derivedTables(chunk.subqueries)) {
    if (!chunk.tables.some((table) => table.alias === pseudo.alias)) chunk.tables.push(pseudo)
  }
  chunk.aliases = buildAliasMap(chunk.tables)
  if (chunk.columns) resolveColumnParents(chunk.columns, chunk.aliases, chunk.tables)
  state.extractParameters(chunk.tokenStartIdx, chunk.tokenEndIdx, chunk.parameters)
  return chunk
}
