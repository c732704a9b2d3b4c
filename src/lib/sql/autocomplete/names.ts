/**
 * Name, alias and column-list parsing shared by the clause parsers.
 */

import type { ColumnInfo, QualifiedName, TableReference, Token } from './types'
import type { ParserState } from './parser-state'

export function stripBrackets(text: string): string {
  if (text.length >= 2 && text.startsWith('[') && text.endsWith(']')) {
    return text.slice(1, -1)
  }
  if (text.startsWith('[')) return text.slice(1)
  return text
}

export function isTempTableName(name: string): boolean {
  return name.startsWith('#')
}

export function isGlobalTempTableName(name: string): boolean {
  return name.startsWith('##')
}

export function isTableVariableName(name: string): boolean {
  return name.startsWith('@')
}

function isNamePart(token: Token | null, allowKeyword: boolean): token is Token {
  if (!token) return false
  if (token.type === 'identifier' || token.type === 'bracket_id' || token.type === 'system_procedure') return true
  return allowKeyword && token.type === 'keyword'
}

/**
 * Parse `[server.][database.][schema.]name`.
 *
 * Temp-table and variable tokens are single-part names. After a dot, keywords
 * are accepted as name parts (`dbo.[User]` and `dbo.User` both work); `db..name`
 * leaves the schema empty. More than four parts keeps the last four. A name
 * ending in a dot is incomplete and yields null.
 */
export function parseQualifiedName(state: ParserState): QualifiedName | null {
  const first = state.current()
  if (!first) return null

  if (first.type === 'temp_table' || first.type === 'variable') {
    state.advance()
    return { name: first.text }
  }
  if (!isNamePart(first, false)) return null

  const parts: string[] = [stripBrackets(first.text)]
  state.advance()

  while (state.isType('dot')) {
    state.advance()
    if (state.isType('dot')) {
      parts.push('')
      continue
    }
    const token = state.current()
    // `dbo.` still being typed
    if (!isNamePart(token, true)) return null
    parts.push(stripBrackets(token.text))
    state.advance()
  }

  return qualifiedNameFromParts(parts)
}

/**
 * Map 1-4 name parts right-to-left. Empty parts (from `db..table`) are left unset.
 */
export function qualifiedNameFromParts(parts: string[]): QualifiedName | null {
  const trimmed = parts.slice(-4)
  const name = trimmed[trimmed.length - 1]
  if (name === undefined) return null

  const result: QualifiedName = { name }
  const schema = trimmed[trimmed.length - 2]
  const database = trimmed[trimmed.length - 3]
  const server = trimmed[trimmed.length - 4]
  if (schema) result.schema = schema
  if (database) result.database = database
  if (server) result.server = server
  return result
}

/**
 * Parse `[AS] alias`. With an explicit AS any word is accepted, keywords
 * included; without AS only identifiers, so `FROM t LEFT JOIN` keeps LEFT.
 */
export function parseAlias(state: ParserState): string | undefined {
  if (state.isKeyword('AS')) {
    const next = state.peek()
    if (next && (next.type === 'identifier' || next.type === 'bracket_id' || next.type === 'keyword' || next.type === 'string')) {
      state.advance()
      const token = state.advance()
      return token ? unquoteAlias(token.text) : undefined
    }
    state.advance()
    return undefined
  }
  if (state.isIdentifier()) {
    const token = state.advance()
    return token ? stripBrackets(token.text) : undefined
  }
  return undefined
}

function unquoteAlias(text: string): string {
  if (text.startsWith("'") && text.endsWith("'") && text.length >= 2) return text.slice(1, -1)
  return stripBrackets(text)
}

export interface ColumnListOptions {
  /** VALUES-table column lists may use keywords as names */
  acceptKeywords?: boolean
}

/**
 * Parse `(col1, col2, ...)`. Returns an empty list when the current token is not `(`.
 * Consumes the closing parenthesis when present.
 */
export function parseColumnList(state: ParserState, options: ColumnListOptions = {}): string[] {
  if (!state.isType('paren_open')) return []
  state.advance()

  const columns: string[] = []
  let depth = 0
  while (!state.atEnd()) {
    const token = state.current()
    if (!token) break
    if (token.type === 'paren_close') {
      if (depth === 0) {
        state.advance()
        break
      }
      depth--
    } else if (token.type === 'paren_open') {
      depth++
    } else if (depth === 0 && (token.type === 'identifier' || token.type === 'bracket_id'
      || (options.acceptKeywords && token.type === 'keyword'))) {
      columns.push(stripBrackets(token.text))
    } else if (token.type === 'go' || token.type === 'semicolon') {
      break
    }
    state.advance()
  }
  return columns
}

/** WITH (NOLOCK, INDEX(ix)) after a table reference */
export function skipTableHints(state: ParserState): void {
  if (state.isKeyword('WITH') && state.peek()?.type === 'paren_open') {
    state.advance()
    state.skipParenContents()
  }
}

export interface TableReferenceOptions {
  /** Treat a following `(` as function arguments. INSERT targets turn this off for their column list. */
  allowArguments?: boolean
}

/**
 * Parse a table reference with its alias and hints.
 */
export function parseTableReference(
  state: ParserState,
  knownCtes: ReadonlySet<string>,
  options: TableReferenceOptions = {}
): TableReference | null {
  const qualified = parseQualifiedName(state)
  if (!qualified) return null

  const ref: TableReference = {
    ...qualified,
    isTemp: isTempTableName(qualified.name),
    isGlobalTemp: isGlobalTempTableName(qualified.name),
    isTableVariable: isTableVariableName(qualified.name),
    isCte: !qualified.schema && !qualified.database && knownCtes.has(qualified.name.toLowerCase()),
  }

  // Table-valued function arguments
  if (options.allowArguments !== false && state.isType('paren_open')) {
    ref.isTvf = true
    state.skipParenContents()
  }

  skipTableHints(state)
  const alias = parseAlias(state)
  if (alias) ref.alias = alias
  skipTableHints(state)

  return ref
}

/**
 * Lowercase alias (or table name when unaliased) → table.
 */
export function buildAliasMap(tables: TableReference[]): Map<string, TableReference> {
  const aliases = new Map<string, TableReference>()
  for (const table of tables) {
    if (table.alias) {
      aliases.set(table.alias.toLowerCase(), table)
    } else if (!aliases.has(table.name.toLowerCase())) {
      aliases.set(table.name.toLowerCase(), table)
    }
  }
  return aliases
}

/**
 * Fill parentTable/parentSchema from sourceTable through the alias map.
 * Unqualified columns inherit the table when exactly one is in scope.
 */
export function resolveColumnParents(
  columns: ColumnInfo[],
  aliases: Map<string, TableReference>,
  tables: TableReference[]
): void {
  const single = tables.length === 1 ? tables[0] : null

  for (const column of columns) {
    let parent: TableReference | null = null
    if (column.sourceTable) {
      parent = aliases.get(column.sourceTable.toLowerCase()) ?? null
    } else if (single) {
      parent = single
    }
    if (!parent) continue
    column.parentTable = parent.name
    if (parent.schema) column.parentSchema = parent.schema
  }
}
