/**
 * Source-range helpers shared by the clause parsers and the position lookups.
 */

import type { ClausePosition, SourcePosition, Token } from './types'
import { comparePositions, getTokenEnd } from './tokenizer'

export function startOf(token: Token): SourcePosition {
  return { line: token.line, col: token.col }
}

/** Span from the first character of `start` to the last character of `end` */
export function clauseSpan(start: Token, end: Token | null): ClausePosition {
  const last = getTokenEnd(end ?? start)
  return { startLine: start.line, startCol: start.col, endLine: last.line, endCol: last.col }
}

/**
 * Span for a clause the user is still typing (an unclosed column list).
 * The recorded end is the last token seen; `openEnded` lifts it.
 */
export function openClauseSpan(start: Token, end: Token | null): ClausePosition {
  return { ...clauseSpan(start, end), openEnded: true }
}

export function spanStart(span: ClausePosition): SourcePosition {
  return { line: span.startLine, col: span.startCol }
}

export function spanEnd(span: ClausePosition): SourcePosition {
  return { line: span.endLine, col: span.endCol }
}

/** The later of two positions */
export function laterPosition(a: SourcePosition, b: SourcePosition): SourcePosition {
  return comparePositions(a, b) >= 0 ? a : b
}

/**
 * Whether the cursor lies after `start` and at or before `end`.
 * A null end is unbounded.
 */
export function isAfterAndWithin(cursor: SourcePosition, start: SourcePosition, end: SourcePosition | null): boolean {
  if (comparePositions(cursor, start) <= 0) return false
  return end === null || comparePositions(cursor, end) <= 0
}
