/**
 * Statement Parser Module
 *
 * Splits a token stream into statement chunks, one per top-level statement,
 * tracking batches (GO) and the temp tables created along the way. Also
 * answers "which chunk / subquery / clause is the cursor in".
 */

import type {
  CTEInfo,
  ClauseName,
  ClausePositions,
  ParsedDocument,
  SourcePosition,
  StatementChunk,
  SubqueryInfo,
  TempTableInfo,
  Token,
} from './types'
import { ParserState } from './parser-state'
import { ScopeContext } from './scope'
import { isStatementStarter } from './keywords'
import { comparePositions, tokenize, type TokenizerOptions } from './tokenizer'
import { isAfterAndWithin, spanStart } from './positions'
import { parseCteClause } from './clauses/cte-clause'
import { parseSubquery } from './clauses/subquery'
import { createChunk, finalizeChunk, type StatementContext, type StatementHandler } from './statements/base'
import { parseSelectStatement } from './statements/select'
import { parseInsertStatement } from './statements/insert'
import { parseUpdateStatement } from './statements/update'
import { parseDeleteStatement } from './statements/delete'
import { parseMergeStatement } from './statements/merge'
import {
  parseAlterStatement,
  parseCreateStatement,
  parseDeclareStatement,
  parseDropStatement,
  parseTruncateStatement,
} from './statements/ddl'
import { parseExecStatement, parseSetStatement, parseUseStatement, skipOtherStatement } from './statements/procedural'

const HANDLERS: Record<string, StatementHandler> = {
  SELECT: parseSelectStatement,
  INSERT: parseInsertStatement,
  UPDATE: parseUpdateStatement,
  DELETE: parseDeleteStatement,
  MERGE: parseMergeStatement,
  CREATE: parseCreateStatement,
  ALTER: parseAlterStatement,
  DROP: parseDropStatement,
  DECLARE: parseDeclareStatement,
  TRUNCATE: parseTruncateStatement,
  EXEC: parseExecStatement,
  EXECUTE: parseExecStatement,
  SET: parseSetStatement,
  USE: parseUseStatement,
}

/** Statements a WITH clause can precede */
const CTE_TARGETS = new Set(['SELECT', 'INSERT', 'UPDATE', 'DELETE', 'MERGE'])

/** Trailing typing tolerated past a chunk's last token on its last line */
const CHUNK_END_TOLERANCE = 50
/** Lines after a chunk's end within which the cursor still continues it */
const CHUNK_CONTINUATION_LINES = 5

function dispatch(context: StatementContext): StatementChunk | null {
  const keyword = context.state.keyword()
  if (!keyword) return null
  const handler = HANDLERS[keyword] ?? skipOtherStatement
  return handler(context)
}

/**
 * Parse a token stream into statement chunks.
 */
export function parseDocument(tokens: Token[]): ParsedDocument {
  const state = new ParserState(tokens)
  const chunks: StatementChunk[] = []
  const tempTables = new Map<string, TempTableInfo>()

  while (!state.atEnd()) {
    const token = state.current()
    if (!token) break

    if (token.type === 'go') {
      state.batchIndex++
      state.advance()
      continue
    }
    if (token.type !== 'keyword' || !isStatementStarter(token.text)) {
      state.advance()
      continue
    }

    const startPos = state.pos
    state.markChunkStart()
    const context: StatementContext = { state, scope: new ScopeContext(), tempTables }

    let chunk: StatementChunk | null
    if (token.text.toUpperCase() === 'WITH') {
      chunk = parseWithStatement(context)
    } else {
      chunk = dispatch(context)
    }
    if (chunk) chunks.push(chunk)

    if (state.pos === startPos) state.advance()
  }

  return { tokens, chunks, tempTables }
}

/**
 * WITH ctes followed by the statement they belong to. The chunk starts at
 * WITH; a WITH with no usable statement still yields a chunk holding the CTEs.
 */
function parseWithStatement(context: StatementContext): StatementChunk | null {
  const { state, scope } = context
  const ctes = parseCteClause(state, scope, parseSubquery)

  const keyword = state.keyword()
  let chunk: StatementChunk | null = null
  if (keyword && CTE_TARGETS.has(keyword)) {
    chunk = dispatch(context)
  }

  if (chunk) {
    chunk.ctes = ctes
    return chunk
  }
  if (ctes.length === 0) return null

  const other = createChunk(state, 'OTHER')
  other.ctes = ctes
  return finalizeChunk(state, other, scope)
}

/**
 * Tokenize and parse SQL text.
 */
export function parse(sql: string, options: TokenizerOptions = {}): ParsedDocument {
  return parseDocument(tokenize(sql, options).tokens)
}

// ============================================================================
// Position lookups
// ============================================================================

function containsPosition(chunk: StatementChunk, line: number, col: number): boolean {
  if (line < chunk.startLine || line > chunk.endLine) return false
  if (line === chunk.startLine && col < chunk.startCol) return false
  if (line === chunk.endLine && col > chunk.endCol + CHUNK_END_TOLERANCE) return false
  return true
}

/**
 * The chunk containing the cursor. When chunks share a line the one starting
 * latest wins. Past every chunk, the cursor continues the closest chunk that
 * ended up to five lines before it.
 */
export function getChunkAtPosition(chunks: StatementChunk[], line: number, col: number): StatementChunk | null {
  const cursor: SourcePosition = { line, col }
  let inside: StatementChunk | null = null
  for (const chunk of chunks) {
    if (containsPosition(chunk, line, col)) inside = chunk
  }
  if (inside) return inside

  let best: StatementChunk | null = null
  for (const chunk of chunks) {
    const end: SourcePosition = { line: chunk.endLine, col: chunk.endCol }
    if (comparePositions(end, cursor) >= 0) continue
    if (line - chunk.endLine > CHUNK_CONTINUATION_LINES) continue
    if (!best || comparePositions(end, { line: best.endLine, col: best.endCol }) > 0) best = chunk
  }
  if (!best) return null

  // A chunk that starts between the candidate's end and the cursor owns the cursor instead
  const bestEnd: SourcePosition = { line: best.endLine, col: best.endCol }
  const interrupted = chunks.some((chunk) => {
    const start: SourcePosition = { line: chunk.startLine, col: chunk.startCol }
    return comparePositions(start, bestEnd) > 0 && comparePositions(start, cursor) <= 0
  })
  return interrupted ? null : best
}

/** A CTE body viewed as a subquery, for position lookups */
export function cteAsSubquery(cte: CTEInfo): SubqueryInfo | null {
  if (!cte.startPos) return null
  return {
    alias: cte.name,
    columns: cte.columns,
    tables: cte.tables,
    subqueries: cte.subqueries,
    parameters: cte.parameters,
    startPos: cte.startPos,
    endPos: cte.endPos ?? null,
    clausePositions: cte.clausePositions ?? {},
  }
}

function findInnermost(subqueries: SubqueryInfo[], cursor: SourcePosition): SubqueryInfo | null {
  for (const subquery of subqueries) {
    if (!isAfterAndWithin(cursor, subquery.startPos, subquery.endPos)) continue
    return findInnermost(subquery.subqueries, cursor) ?? subquery
  }
  return null
}

/**
 * The innermost subquery (or CTE body) of the chunk containing the cursor.
 */
export function getSubqueryAtPosition(chunk: StatementChunk, line: number, col: number): SubqueryInfo | null {
  const cursor: SourcePosition = { line, col }
  const candidates: SubqueryInfo[] = [...chunk.subqueries]
  for (const cte of chunk.ctes) {
    const view = cteAsSubquery(cte)
    if (view) candidates.push(view)
  }
  return findInnermost(candidates, cursor)
}

/**
 * Every enclosing subquery, outermost first.
 */
export function getSubqueryChain(chunk: StatementChunk, line: number, col: number): SubqueryInfo[] {
  const cursor: SourcePosition = { line, col }
  const chain: SubqueryInfo[] = []
  let level: SubqueryInfo[] = [...chunk.subqueries]
  for (const cte of chunk.ctes) {
    const view = cteAsSubquery(cte)
    if (view) level.push(view)
  }
  for (;;) {
    const next = level.find((subquery) => isAfterAndWithin(cursor, subquery.startPos, subquery.endPos))
    if (!next) return chain
    chain.push(next)
    level = next.subqueries
  }
}

export type ClauseAtPosition = ClauseName | 'join' | 'on'

/**
 * The clause whose start is latest among those starting before the cursor.
 * Ends are not consulted: a clause holds the cursor until the next one begins.
 */
export function getClauseAtPosition(positions: ClausePositions, line: number, col: number): ClauseAtPosition | null {
  const cursor: SourcePosition = { line, col }
  let bestKey: string | null = null
  let bestStart: SourcePosition | null = null

  for (const [key, span] of Object.entries(positions)) {
    if (!span) continue
    const start = spanStart(span)
    if (comparePositions(start, cursor) >= 0) continue
    if (!bestStart || comparePositions(start, bestStart) > 0) {
      bestKey = key
      bestStart = start
    }
  }

  if (bestKey === null) return null
  if (bestKey.startsWith('join_')) return 'join'
  if (bestKey.startsWith('on_')) return 'on'
  return toClauseName(bestKey)
}

const CLAUSE_NAMES: ReadonlySet<string> = new Set<ClauseName>([
  'select', 'into', 'from', 'where', 'group_by', 'having', 'order_by', 'limit', 'offset', 'fetch',
  'set', 'output', 'values', 'insert_columns', 'update', 'delete', 'merge', 'using',
  'create_table', 'column_definitions', 'alter_table', 'alter_add', 'drop_table', 'declare',
])

function isClauseName(key: string): key is ClauseName {
  return CLAUSE_NAMES.has(key)
}

function toClauseName(key: string): ClauseName | null {
  return isClauseName(key) ? key : null
}
