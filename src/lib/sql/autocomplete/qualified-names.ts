/**
 * Cursor window and dot-chain back-scan used by the context classifier.
 *
 * The window holds the tokens before the word being typed, most recent
 * first, with comments removed. Detectors look at a bounded prefix of it.
 */

import type { ColumnReference, SourcePosition, Token } from './types'
import { getTokenAtPosition, isCommentToken } from './tokenizer'
import { stripBrackets } from './names'

/** Longest look-behind any detector needs */
const WINDOW_SIZE = 200

const COMPARISON_OPERATORS = new Set(['=', '<>', '!=', '<', '>', '<=', '>=', '!<', '!>'])

export interface CursorWindow {
  tokens: Token[]
  cursor: SourcePosition
  /** Word the cursor is touching, if any */
  partial: Token | null
  /** Typed part of `partial` */
  prefix: string
  /** Tokens before the partial word, most recent first */
  before: Token[]
  /** Index into `tokens` of each entry of `before` */
  indices: number[]
}

const WORD_TYPES = new Set(['identifier', 'keyword', 'bracket_id', 'temp_table', 'system_procedure', 'variable'])

export function buildCursorWindow(tokens: Token[], line: number, col: number): CursorWindow {
  let index = getTokenAtPosition(tokens, line, col)
  let partial: Token | null = null
  let prefix = ''

  const token = index >= 0 ? tokens[index] : null
  if (token && token.line === line && token.col >= col) {
    // Starts at the cursor: it follows the cursor rather than preceding it
    index--
  } else if (token && WORD_TYPES.has(token.type) && token.line === line
    && col <= token.col + token.text.length) {
    partial = token
    prefix = token.text.slice(0, col - token.col)
    if (token.type === 'bracket_id') prefix = stripBrackets(prefix)
    index--
  }

  const before: Token[] = []
  const indices: number[] = []
  for (let i = index; i >= 0 && before.length < WINDOW_SIZE; i--) {
    if (isCommentToken(tokens[i])) continue
    before.push(tokens[i])
    indices.push(i)
  }

  return { tokens, cursor: { line, col }, partial, prefix, before, indices }
}

function isQualifierPart(token: Token | undefined): boolean {
  if (!token) return false
  return token.type === 'identifier' || token.type === 'bracket_id' || token.type === 'keyword'
    || token.type === 'temp_table' || token.type === 'variable'
}

/**
 * Name parts typed before a trailing dot, in source order: `db.dbo.` gives
 * ['db', 'dbo']. `db..` leaves an empty schema part. Null when the cursor
 * does not follow a dot.
 */
export function getDotQualifier(before: Token[]): string[] | null {
  if (before[0]?.type !== 'dot') return null
  const parts: string[] = []
  let i = 0
  while (before[i]?.type === 'dot') {
    const part = before[i + 1]
    if (isQualifierPart(part)) {
      parts.unshift(stripBrackets(part.text))
      i += 2
    } else if (part?.type === 'dot') {
      parts.unshift('')
      i += 1
    } else {
      break
    }
  }
  return parts.length > 0 ? parts : null
}

/** `alias.` / `schema.table.` reference before the cursor, split into table and schema */
export function getTableReferenceBeforeDot(before: Token[]): { table: string; schema?: string } | null {
  const parts = getDotQualifier(before)
  if (!parts) return null
  const table = parts[parts.length - 1]
  if (!table) return null
  const schema = parts[parts.length - 2]
  return schema ? { table, schema } : { table }
}

/**
 * The column on the left of a comparison whose right side is being typed:
 * `e.DepartmentID = |` gives { table: 'e', column: 'DepartmentID' }.
 */
export function extractLeftSideColumn(before: Token[]): ColumnReference | null {
  let operatorAt = -1
  for (let i = 0; i < Math.min(5, before.length); i++) {
    const token = before[i]
    if (token.type === 'operator' && COMPARISON_OPERATORS.has(token.text)) {
      operatorAt = i
      break
    }
    if (token.type === 'keyword') return null
  }
  if (operatorAt === -1) return null

  const parts: string[] = []
  let i = operatorAt + 1
  while (i < before.length) {
    const token = before[i]
    if (token.type !== 'identifier' && token.type !== 'bracket_id') break
    parts.unshift(stripBrackets(token.text))
    if (before[i + 1]?.type !== 'dot') break
    i += 2
  }

  const column = parts[parts.length - 1]
  if (!column) return null
  if (parts.length === 1) return { column }
  if (parts.length === 2) return { table: parts[0], column }
  return { schema: parts[parts.length - 3], table: parts[parts.length - 2], column }
}
