/**
 * Tokenizer Module
 *
 * Single-pass character scanner for T-SQL. Never fails: unterminated strings,
 * bracketed identifiers and comments at end of input still produce a token
 * covering what was seen, so joining every token's text with the skipped
 * whitespace reproduces the input exactly.
 *
 * Also exports the cursor helpers the classifier builds on.
 */

import type { KeywordCategory, SourcePosition, Token, TokenType, TokenizedSQL } from './types'
import { getKeywordCategory, isSystemProcedure } from './keywords'

export interface TokenizerOptions {
  /** Batch separator keyword (case-insensitive), default GO */
  batchSeparator?: string
  /** Called with (processed, total) characters every `progressInterval` characters and once at the end */
  onProgress?: (processed: number, total: number) => void
  progressInterval?: number
}

type ScanState = 'normal' | 'string' | 'bracket' | 'block_comment' | 'line_comment'

const WHITESPACE = new Set([' ', '\t', '\n', '\r'])
const SINGLE_CHAR_OPERATORS = new Set(['=', '<', '>', '+', '-', '/', '%', '!', ':', '&', '|', '^', '~'])
const TWO_CHAR_OPERATORS = new Set(['<>', '<=', '>=', '!=', '::'])

/** Tokens after which a `-` directly before a digit starts a negative literal */
const NEGATIVE_NUMBER_CONTEXT = new Set<TokenType>(['operator', 'comma', 'paren_open', 'keyword', 'go', 'semicolon'])

const NUMBER_PATTERNS = [/^-?\d+\.?\d*$/, /^-?\d*\.\d+$/, /^-?0[xX][0-9a-fA-F]+$/]

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9'
}

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && /^[A-Za-z0-9_]$/.test(ch)
}

/**
 * Tokenize SQL text.
 */
export function tokenize(sql: string, options: TokenizerOptions = {}): TokenizedSQL {
  const separator = (options.batchSeparator ?? 'GO').toUpperCase()
  const interval = options.progressInterval ?? 0
  const onProgress = options.onProgress
  const total = sql.length

  const tokens: Token[] = []
  let state: ScanState = 'normal'
  let current = ''
  let startLine = 1
  let startCol = 1
  let line = 1
  let col = 1
  let commentDepth = 0
  let lastType: TokenType | null = null
  let nextProgress = interval > 0 ? interval : Infinity
  let i = 0

  const startToken = () => {
    startLine = line
    startCol = col
  }

  const emit = (forced?: TokenType) => {
    if (current === '') return

    let type: TokenType
    let category: KeywordCategory | undefined
    if (forced) {
      type = forced
      if (forced === 'global_variable') category = 'global_variable'
    } else {
      const upper = current.toUpperCase()
      const keywordCategory = getKeywordCategory(current)
      if (upper === separator) {
        type = 'go'
        category = 'statement'
      } else if (keywordCategory) {
        type = 'keyword'
        category = keywordCategory
      } else if (NUMBER_PATTERNS.some((p) => p.test(current))) {
        type = 'number'
      } else if (isSystemProcedure(current)) {
        type = 'system_procedure'
        category = 'system_procedure'
      } else {
        type = 'identifier'
      }
    }

    const token: Token = { type, text: current, line: startLine, col: startCol }
    if (category) token.keywordCategory = category
    tokens.push(token)
    lastType = type
    current = ''
  }

  const emitText = (text: string, type: TokenType) => {
    emit()
    startToken()
    current = text
    emit(type)
    col += text.length
    i += text.length
  }

  /** Consume a line break inside a multi-line token (\r\n counts once) */
  const appendLineBreak = (ch: string) => {
    if (ch === '\r' && sql[i + 1] === '\n') {
      current += '\r\n'
      i += 2
    } else {
      current += ch
      i += 1
    }
    line += 1
    col = 1
  }

  while (i < sql.length) {
    if (i >= nextProgress && onProgress) {
      onProgress(i, total)
      nextProgress += interval
    }

    const ch = sql[i]
    const next = sql[i + 1]

    if (state === 'normal') {
      if (WHITESPACE.has(ch)) {
        emit()
        if (ch === '\n' || ch === '\r') {
          i += ch === '\r' && next === '\n' ? 2 : 1
          line += 1
          col = 1
        } else {
          i += 1
          col += 1
        }
      } else if (ch === "'") {
        // N'...' keeps the prefix on the string token
        if (current.toUpperCase() !== 'N') {
          emit()
          startToken()
        }
        current += ch
        state = 'string'
        i += 1
        col += 1
      } else if (ch === '[') {
        emit()
        startToken()
        current = ch
        state = 'bracket'
        i += 1
        col += 1
      } else if (ch === '/' && next === '*') {
        emit()
        startToken()
        current = '/*'
        state = 'block_comment'
        commentDepth = 1
        i += 2
        col += 2
      } else if (ch === '-' && next === '-') {
        emit()
        startToken()
        current = '--'
        state = 'line_comment'
        i += 2
        col += 2
      } else if (ch === '*') {
        emitText(ch, 'star')
      } else if (ch === '-' && (isDigit(next) || (next === '.' && isDigit(sql[i + 2])))) {
        if (current === '' && (lastType === null || NEGATIVE_NUMBER_CONTEXT.has(lastType))) {
          startToken()
          current = '-'
          i += 1
          col += 1
        } else {
          emitText(ch, 'operator')
        }
      } else if (SINGLE_CHAR_OPERATORS.has(ch)) {
        const pair = ch + (next ?? '')
        emitText(TWO_CHAR_OPERATORS.has(pair) ? pair : ch, 'operator')
      } else if (ch === '(') {
        emitText(ch, 'paren_open')
      } else if (ch === ')') {
        emitText(ch, 'paren_close')
      } else if (ch === ',') {
        emitText(ch, 'comma')
      } else if (ch === ';') {
        emitText(ch, 'semicolon')
      } else if (ch === '.') {
        if (isDigit(next) && /^-?\d*$/.test(current)) {
          if (current === '') startToken()
          current += ch
          i += 1
          col += 1
        } else {
          emitText(ch, 'dot')
        }
      } else if (ch === '@') {
        let j = i + 1
        if (next === '@') j += 1
        while (isWordChar(sql[j])) j += 1
        const text = sql.slice(i, j)
        if (text === '@' || text === '@@') {
          // A lone @ (or @@) with no name
          emitText('@', 'at')
        } else {
          emitText(text, next === '@' ? 'global_variable' : 'variable')
        }
      } else if (ch === '#') {
        let j = i + 1
        if (next === '#') j += 1
        while (isWordChar(sql[j])) j += 1
        const text = sql.slice(i, j)
        const hasName = text.replace(/^#+/, '') !== ''
        emitText(text, hasName ? 'temp_table' : 'hash')
      } else {
        if (current === '') startToken()
        current += ch
        i += 1
        col += 1
      }
    } else if (state === 'string') {
      if (ch === "'" && next === "'") {
        current += "''"
        i += 2
        col += 2
      } else if (ch === "'") {
        current += ch
        i += 1
        col += 1
        emit('string')
        state = 'normal'
      } else if (ch === '\n' || ch === '\r') {
        appendLineBreak(ch)
      } else {
        current += ch
        i += 1
        col += 1
      }
    } else if (state === 'bracket') {
      if (ch === '\n' || ch === '\r') {
        appendLineBreak(ch)
      } else {
        current += ch
        i += 1
        col += 1
        if (ch === ']') {
          emit('bracket_id')
          state = 'normal'
        }
      }
    } else if (state === 'block_comment') {
      if (ch === '/' && next === '*') {
        commentDepth += 1
        current += '/*'
        i += 2
        col += 2
      } else if (ch === '*' && next === '/') {
        commentDepth -= 1
        current += '*/'
        i += 2
        col += 2
        if (commentDepth === 0) {
          emit('comment')
          state = 'normal'
        }
      } else if (ch === '\n' || ch === '\r') {
        appendLineBreak(ch)
      } else {
        current += ch
        i += 1
        col += 1
      }
    } else {
      // Line comment: the line break is not part of the token
      if (ch === '\n' || ch === '\r') {
        emit('line_comment')
        state = 'normal'
      } else {
        current += ch
        i += 1
        col += 1
      }
    }
  }

  switch (state) {
    case 'string':
      emit('string')
      break
    case 'bracket':
      emit('bracket_id')
      break
    case 'block_comment':
      emit('comment')
      break
    case 'line_comment':
      emit('line_comment')
      break
    default:
      emit()
  }

  if (onProgress) onProgress(total, total)

  return { tokens, totalChars: total }
}

// ============================================================================
// Token geometry
// ============================================================================

export function isCommentToken(token: Token): boolean {
  return token.type === 'comment' || token.type === 'line_comment'
}

/**
 * Position of the last character of a token. Strings, bracketed identifiers
 * and block comments may span lines.
 */
export function getTokenEnd(token: Token): SourcePosition {
  const lines = token.text.split(/\r\n|\r|\n/)
  if (lines.length === 1) {
    return { line: token.line, col: token.col + token.text.length - 1 }
  }
  const last = lines[lines.length - 1]
  return { line: token.line + lines.length - 1, col: last.length }
}

export function comparePositions(a: SourcePosition, b: SourcePosition): number {
  if (a.line !== b.line) return a.line - b.line
  return a.col - b.col
}

/**
 * Convert a character offset into a 1-indexed (line, col) cursor position.
 */
export function offsetToPosition(sql: string, offset: number): SourcePosition {
  let line = 1
  let col = 1
  const end = Math.min(offset, sql.length)
  for (let i = 0; i < end; i++) {
    const ch = sql[i]
    if (ch === '\r' && sql[i + 1] === '\n') continue
    if (ch === '\n' || ch === '\r') {
      line += 1
      col = 1
    } else {
      col += 1
    }
  }
  return { line, col }
}

// ============================================================================
// Cursor navigation
// ============================================================================

/**
 * Index of the token at or immediately before the cursor, or -1.
 *
 * `col` is the column the next typed character would occupy. A token that
 * starts exactly at the cursor is returned as the token under the cursor.
 */
export function getTokenAtPosition(tokens: Token[], line: number, col: number): number {
  let best = -1

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i]
    if (token.line < line) {
      best = i
    } else if (token.line === line) {
      if (token.col < col) {
        if (token.col + token.text.length - 1 >= col) return i
        best = i
      } else if (token.col === col) {
        return i
      } else {
        break
      }
    } else {
      break
    }
  }

  return best
}

/**
 * Up to `count` tokens at or before the cursor, most recent first, comments skipped.
 */
export function getTokensBeforeCursor(tokens: Token[], line: number, col: number, count: number): Token[] {
  const start = getTokenAtPosition(tokens, line, col)
  const result: Token[] = []
  for (let i = start; i >= 0 && result.length < count; i--) {
    if (!isCommentToken(tokens[i])) result.push(tokens[i])
  }
  return result
}

/**
 * Whether the cursor sits inside a string literal or a comment.
 */
export function isInsideStringOrComment(tokens: Token[], line: number, col: number): 'string' | 'comment' | null {
  const index = getTokenAtPosition(tokens, line, col)
  if (index === -1) return null
  const token = tokens[index]
  if (token.type !== 'string' && !isCommentToken(token)) return null

  const start: SourcePosition = { line: token.line, col: token.col }
  const cursor: SourcePosition = { line, col }
  if (comparePositions(cursor, start) <= 0) return null

  const end = getTokenEnd(token)
  const closed =
    token.type === 'string' ? token.text.length > 1 && token.text.endsWith("'") && !isOpenString(token.text)
    : token.type === 'comment' ? token.text.length >= 4 && token.text.endsWith('*/')
    : false

  if (token.type === 'line_comment') {
    // Runs to the end of its line
    return cursor.line === token.line ? 'comment' : null
  }
  if (!closed) return token.type === 'string' ? 'string' : 'comment'
  return comparePositions(cursor, end) <= 0 ? (token.type === 'string' ? 'string' : 'comment') : null
}

/** A string token whose trailing quote is an escaped pair rather than a terminator */
function isOpenString(text: string): boolean {
  const body = text.replace(/^[Nn]?'/, '')
  let quotes = 0
  for (let i = body.length - 1; i >= 0 && body[i] === "'"; i--) quotes++
  return quotes % 2 === 0
}

/**
 * The partial word being typed directly before the cursor.
 */
export function getPartialWord(tokens: Token[], line: number, col: number): string {
  const index = getTokenAtPosition(tokens, line, col)
  if (index === -1) return ''
  const token = tokens[index]
  if (token.type !== 'identifier' && token.type !== 'keyword' && token.type !== 'bracket_id'
    && token.type !== 'temp_table' && token.type !== 'system_procedure') {
    return ''
  }
  if (token.line !== line || token.col >= col) return ''
  const typed = col - token.col
  if (typed > token.text.length) return ''
  const text = token.text.slice(0, typed)
  return token.type === 'bracket_id' ? text.replace(/^\[/, '').replace(/\]$/, '') : text
}
