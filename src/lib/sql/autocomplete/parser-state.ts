/**
 * Token cursor used by every clause and statement parser.
 *
 * `advance` and `peek` skip comment tokens, so parsers never see them.
 */

import type { ParameterInfo, Token, TokenType } from './types'
import { isCommentToken } from './tokenizer'
import { isStatementStarter } from './keywords'

const TABLE_VARIABLE_PRECEDERS = new Set(['FROM', 'JOIN', 'INTO'])

export class ParserState {
  readonly tokens: Token[]
  pos = 0
  /** Number of batch separators seen so far */
  batchIndex = 0
  /** Token index where the statement being parsed began */
  chunkStartPos = 0

  constructor(tokens: Token[]) {
    this.tokens = tokens
    this.skipComments()
  }

  private skipComments(): void {
    while (this.pos < this.tokens.length && isCommentToken(this.tokens[this.pos])) {
      this.pos++
    }
  }

  markChunkStart(): void {
    this.chunkStartPos = this.pos
  }

  current(): Token | null {
    return this.tokens[this.pos] ?? null
  }

  /** The nth non-comment token after the current one */
  peek(offset = 1): Token | null {
    let index = this.pos
    let remaining = offset
    while (remaining > 0) {
      index++
      while (index < this.tokens.length && isCommentToken(this.tokens[index])) index++
      remaining--
    }
    return this.tokens[index] ?? null
  }

  /** The closest non-comment token before the current one */
  previous(): Token | null {
    for (let i = this.pos - 1; i >= 0; i--) {
      if (!isCommentToken(this.tokens[i])) return this.tokens[i]
    }
    return null
  }

  advance(): Token | null {
    const token = this.current()
    if (this.pos < this.tokens.length) {
      this.pos++
      this.skipComments()
    }
    return token
  }

  atEnd(): boolean {
    return this.pos >= this.tokens.length
  }

  isType(type: TokenType): boolean {
    return this.current()?.type === type
  }

  isKeyword(keyword: string): boolean {
    const token = this.current()
    return token !== null && token.type === 'keyword' && token.text.toUpperCase() === keyword
  }

  isAnyKeyword(keywords: ReadonlySet<string>): boolean {
    const token = this.current()
    return token !== null && token.type === 'keyword' && keywords.has(token.text.toUpperCase())
  }

  /** Identifier or bracketed identifier */
  isIdentifier(): boolean {
    const type = this.current()?.type
    return type === 'identifier' || type === 'bracket_id'
  }

  /** Keyword text of the current token in upper case, or null when it is not a keyword */
  keyword(): string | null {
    const token = this.current()
    return token !== null && token.type === 'keyword' ? token.text.toUpperCase() : null
  }

  consumeKeyword(keyword: string): boolean {
    if (!this.isKeyword(keyword)) return false
    this.advance()
    return true
  }

  skipUntilKeyword(keywords: ReadonlySet<string>): void {
    while (!this.atEnd() && !this.isAnyKeyword(keywords)) {
      this.advance()
    }
  }

  /** Statement keyword at paren depth 0 that would begin a new statement */
  isStatementBoundary(parenDepth: number): boolean {
    const token = this.current()
    if (!token) return true
    if (token.type === 'go' || token.type === 'semicolon') return true
    return parenDepth === 0 && token.type === 'keyword' && isStatementStarter(token.text)
  }

  /**
   * Skip to the end of a statement that needs no structural parsing:
   * stops before a batch separator, a semicolon, or a statement keyword at depth 0.
   * Returns the last consumed token.
   */
  consumeUntilStatementEnd(parenDepth = 0): Token | null {
    let depth = parenDepth
    let last: Token | null = null
    while (!this.atEnd()) {
      if (this.isStatementBoundary(depth)) break
      if (this.isType('paren_open')) depth++
      else if (this.isType('paren_close')) depth = Math.max(0, depth - 1)
      last = this.advance()
    }
    return last
  }

  /**
   * Skip a balanced parenthesised group starting at the current `(`.
   * Returns false when the input or the batch ended before the group closed.
   */
  skipParenContents(): boolean {
    if (!this.isType('paren_open')) return true
    let depth = 0
    while (!this.atEnd()) {
      if (this.isType('go')) return false
      if (this.isType('paren_open')) depth++
      else if (this.isType('paren_close')) depth--
      this.advance()
      if (depth === 0) return true
    }
    return false
  }

  /** TOP n | TOP (expr) [PERCENT] [WITH TIES] */
  skipTopClause(): void {
    if (!this.consumeKeyword('TOP')) return
    if (this.isType('paren_open')) this.skipParenContents()
    else if (this.isType('number') || this.isType('variable')) this.advance()
    this.consumeKeyword('PERCENT')
    if (this.isKeyword('WITH') && this.peek()?.text.toUpperCase() === 'TIES') {
      this.advance()
      this.advance()
    }
  }

  /**
   * Collect @param and @@global references in tokens[start..end] into `target`,
   * de-duplicated by lowercase full name. A variable right after FROM/JOIN/INTO
   * is a table variable and is not collected.
   */
  extractParameters(start: number, end: number, target: ParameterInfo[]): void {
    const seen = new Set(target.map((p) => p.fullName.toLowerCase()))
    const last = Math.min(end, this.tokens.length - 1)

    for (let i = Math.max(0, start); i <= last; i++) {
      const token = this.tokens[i]
      let fullName: string | null = null
      let isSystem = false

      if (token.type === 'variable') {
        fullName = token.text
      } else if (token.type === 'global_variable') {
        fullName = token.text
        isSystem = true
      } else if (token.type === 'at') {
        // `@ name` split by the tokenizer
        const nextToken = this.tokens[i + 1]
        if (nextToken && (nextToken.type === 'identifier' || nextToken.type === 'keyword')
          && nextToken.line === token.line && nextToken.col === token.col + 1) {
          fullName = '@' + nextToken.text
        }
      }
      if (!fullName) continue

      if (!isSystem && precededByTableKeyword(this.tokens, i)) continue

      const key = fullName.toLowerCase()
      if (seen.has(key)) continue
      seen.add(key)

      target.push({
        name: fullName.replace(/^@+/, ''),
        fullName,
        line: token.line,
        col: token.col,
        isSystem,
      })
    }
  }
}

function precededByTableKeyword(tokens: Token[], index: number): boolean {
  for (let i = index - 1; i >= 0; i--) {
    const token = tokens[i]
    if (isCommentToken(token)) continue
    return token.type === 'keyword' && TABLE_VARIABLE_PRECEDERS.has(token.text.toUpperCase())
  }
  return false
}
